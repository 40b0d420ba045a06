import Decimal from "decimal.js";
import { cacheKeys, type KeyValueCache } from "../cache/cache";
import type { EngineConfig } from "../config";
import {
  AccountNotFoundError,
  ConcurrencyConflictError,
  IdempotencyConflictError,
  MissingIdempotencyKeyError,
  RecipientNotFoundError,
  SelfTransferNotAllowedError,
  VerificationRequiredError,
} from "../errors";
import { transactionEvent, type NotificationDispatcher } from "../events/eventEmitter";
import { trackConcurrencyConflict, trackTransfer } from "../monitoring/metrics";
import type { LedgerStore, NewTransaction, UnitOfWork } from "../store/types";
import type {
  Account,
  IdempotencyRecord,
  Transaction,
  TransactionType,
  TransferOutcome,
  Wallet,
} from "../types";
import { logger } from "../utils/logger";
import { normalizeEmail } from "./account.service";
import { formatAmount, parseAmount, type AmountInput } from "../utils/money";

const MAX_IDEMPOTENCY_KEY_LENGTH = 255;

export type VerificationState = "approved" | "pending" | "rejected";

/** Outbound lookup into the identity/KYC collaborator. */
export interface VerificationProvider {
  getStatus(accountId: string): Promise<VerificationState>;
}

export interface TransferEngineDeps {
  store: LedgerStore;
  config: EngineConfig;
  verification: VerificationProvider;
  cache?: KeyValueCache;
  notifier?: NotificationDispatcher;
}

export interface CreditOptions {
  description?: string;
  /** Defaults to the external reference. */
  idempotencyKey?: string;
  /**
   * Runs the credit inside the caller's unit of work, so it commits or rolls
   * back together with the caller's own writes.
   */
  unitOfWork?: UnitOfWork;
}

// What a unit of work settled, plus the wallets it wrote.
interface Settlement {
  outcome: TransferOutcome;
  wallets: Wallet[];
}

function outcomeFrom(transaction: Transaction, replayed: boolean): TransferOutcome | null {
  if (transaction.status === "COMPLETED") {
    return { status: "COMPLETED", replayed, transaction };
  }
  if (transaction.status === "FAILED" && transaction.failure_reason) {
    return { status: "FAILED", replayed, transaction, failure_reason: transaction.failure_reason };
  }
  return null;
}

function replayOf(transaction: Transaction, type: TransactionType): TransferOutcome {
  if (transaction.transaction_type !== type) {
    throw new Error(
      `Critical: ${type} idempotency record points at ${transaction.transaction_type} transaction ${transaction.id}`,
    );
  }
  const outcome = outcomeFrom(transaction, true);
  if (!outcome) {
    throw new Error(`Critical: idempotency record points at unfinished transaction ${transaction.id}`);
  }
  return outcome;
}

/**
 * Moves money between wallets. Every call runs as one unit of work:
 * idempotency check, ordered wallet locks, balance check, mutation,
 * double-entry legs and the idempotency record commit or roll back together.
 */
export class TransferEngine {
  private readonly store: LedgerStore;
  private readonly config: EngineConfig;

  constructor(private readonly deps: TransferEngineDeps) {
    this.store = deps.store;
    this.config = deps.config;
  }

  get currency(): string {
    return this.config.currency;
  }

  get scale(): number {
    return this.config.scale;
  }

  async transfer(
    initiatorId: string,
    toIdentifier: string,
    amount: AmountInput,
    description: string,
    idempotencyKey: string | undefined,
  ): Promise<TransferOutcome> {
    const key = this.requireIdempotencyKey(idempotencyKey);
    const value = parseAmount(amount, this.config.scale);
    const amountStr = value.toFixed(this.config.scale);

    const replay = await this.findReplay(key, initiatorId, "TRANSFER");
    if (replay) {
      if (replay.transaction.amount !== amountStr) {
        logger.warn(
          { idempotencyKey: key, initiatorId, original: replay.transaction.amount, requested: amountStr },
          "Idempotency key reused with a different amount, returning original outcome",
        );
      }
      trackTransfer("TRANSFER", "REPLAYED");
      return replay;
    }

    const recipient = await this.resolveRecipient(toIdentifier);
    if (recipient.id === initiatorId) {
      throw new SelfTransferNotAllowedError();
    }

    const sourceWallet = await this.store.findWalletByAccountId(initiatorId);
    if (!sourceWallet) {
      throw new VerificationRequiredError("Sender does not hold a wallet");
    }
    const destWallet = await this.store.findWalletByAccountId(recipient.id);
    if (!destWallet) {
      throw new Error(`Critical: account ${recipient.id} has no wallet`);
    }

    await this.assertVerified(initiatorId, "Sender");
    await this.assertVerified(recipient.id, "Recipient");

    logger.debug(
      { initiatorId, recipientId: recipient.id, amount: amountStr, idempotencyKey: key },
      "Processing transfer",
    );

    const request: NewTransaction = {
      idempotency_key: key,
      initiator_id: initiatorId,
      transaction_type: "TRANSFER",
      source_account_id: initiatorId,
      destination_account_id: recipient.id,
      amount: amountStr,
      currency: this.config.currency,
      description,
      external_reference: null,
    };

    const start = performance.now();
    try {
      const settlement = await this.store.withUnitOfWork(async (uow): Promise<Settlement> => {
        // Ascending wallet id, never request order: A->B and B->A cannot deadlock.
        const sourceFirst = sourceWallet.id < destWallet.id;
        const first = await uow.wallets.getForUpdate(sourceFirst ? sourceWallet.id : destWallet.id);
        const second = await uow.wallets.getForUpdate(sourceFirst ? destWallet.id : sourceWallet.id);
        const [source, dest] = sourceFirst ? [first, second] : [second, first];

        const existing = await uow.idempotency.find(key, initiatorId, "TRANSFER");
        if (existing) {
          return { outcome: await this.replayRecord(uow, existing, "TRANSFER"), wallets: [] };
        }

        const transaction = await uow.transactions.insert(request);

        const sourceBalance = new Decimal(source.balance);
        if (sourceBalance.lessThan(value)) {
          logger.warn(
            { initiatorId, amount: amountStr, balance: sourceBalance.toString(), transactionId: transaction.id },
            "Insufficient funds",
          );
          return { outcome: await this.recordFailure(uow, transaction), wallets: [] };
        }

        const savedSource = await uow.wallets.save({
          ...source,
          balance: sourceBalance.minus(value).toFixed(this.config.scale),
        });
        const savedDest = await uow.wallets.save({
          ...dest,
          balance: new Decimal(dest.balance).plus(value).toFixed(this.config.scale),
        });

        await uow.ledger.record(transaction.id, [
          {
            leg: "DEBIT",
            wallet_id: savedSource.id,
            account_id: savedSource.account_id,
            amount: amountStr,
            balance_after: savedSource.balance,
          },
          {
            leg: "CREDIT",
            wallet_id: savedDest.id,
            account_id: savedDest.account_id,
            amount: amountStr,
            balance_after: savedDest.balance,
          },
        ]);

        return { outcome: await this.recordCompletion(uow, transaction), wallets: [savedSource, savedDest] };
      });

      const { outcome } = settlement;
      await this.afterCommit(settlement);
      trackTransfer("TRANSFER", outcome.replayed ? "REPLAYED" : outcome.status, performance.now() - start);
      return outcome;
    } catch (err) {
      return this.recover(err, key, initiatorId, "TRANSFER");
    }
  }

  /**
   * One-sided deposit from an external system into `accountId`. The debit leg
   * carries no wallet. Idempotent on (idempotency key, credited account);
   * deposit keys never collide with transfer keys.
   */
  async credit(
    accountId: string,
    amount: AmountInput,
    externalReference: string,
    options: CreditOptions = {},
  ): Promise<TransferOutcome> {
    const key = this.requireIdempotencyKey(options.idempotencyKey ?? externalReference);
    const value = parseAmount(amount, this.config.scale);

    const request: NewTransaction = {
      idempotency_key: key,
      initiator_id: accountId,
      transaction_type: "DEPOSIT",
      source_account_id: null,
      destination_account_id: accountId,
      amount: value.toFixed(this.config.scale),
      currency: this.config.currency,
      description: options.description ?? "",
      external_reference: externalReference,
    };

    const { unitOfWork } = options;
    if (unitOfWork) {
      // Side effects wait for the caller's commit and vanish with its rollback.
      const settlement = await this.applyCredit(unitOfWork, request, value);
      unitOfWork.onCommit(async () => {
        await this.afterCommit(settlement);
        trackTransfer("DEPOSIT", settlement.outcome.replayed ? "REPLAYED" : settlement.outcome.status);
      });
      return settlement.outcome;
    }

    const replay = await this.findReplay(key, accountId, "DEPOSIT");
    if (replay) {
      trackTransfer("DEPOSIT", "REPLAYED");
      return replay;
    }

    const start = performance.now();
    try {
      const settlement = await this.store.withUnitOfWork((uow) => this.applyCredit(uow, request, value));
      const { outcome } = settlement;
      await this.afterCommit(settlement);
      trackTransfer("DEPOSIT", outcome.replayed ? "REPLAYED" : outcome.status, performance.now() - start);
      return outcome;
    } catch (err) {
      return this.recover(err, key, accountId, "DEPOSIT");
    }
  }

  private async applyCredit(uow: UnitOfWork, request: NewTransaction, value: Decimal): Promise<Settlement> {
    const accountId = request.destination_account_id;
    const wallet = await uow.wallets.findByAccountId(accountId);
    if (!wallet) {
      throw new AccountNotFoundError(accountId);
    }
    const locked = await uow.wallets.getForUpdate(wallet.id);

    const existing = await uow.idempotency.find(request.idempotency_key, accountId, "DEPOSIT");
    if (existing) {
      return { outcome: await this.replayRecord(uow, existing, "DEPOSIT"), wallets: [] };
    }

    const transaction = await uow.transactions.insert(request);
    const saved = await uow.wallets.save({
      ...locked,
      balance: new Decimal(locked.balance).plus(value).toFixed(this.config.scale),
    });

    await uow.ledger.record(transaction.id, [
      { leg: "DEBIT", wallet_id: null, account_id: null, amount: request.amount, balance_after: null },
      {
        leg: "CREDIT",
        wallet_id: saved.id,
        account_id: saved.account_id,
        amount: request.amount,
        balance_after: saved.balance,
      },
    ]);

    return { outcome: await this.recordCompletion(uow, transaction), wallets: [saved] };
  }

  private requireIdempotencyKey(idempotencyKey: string | undefined): string {
    const key = idempotencyKey?.trim();
    if (!key) {
      throw new MissingIdempotencyKeyError();
    }
    if (key.length > MAX_IDEMPOTENCY_KEY_LENGTH) {
      throw new MissingIdempotencyKeyError(
        `Idempotency key must be at most ${MAX_IDEMPOTENCY_KEY_LENGTH} characters`,
      );
    }
    return key;
  }

  private async resolveRecipient(identifier: string): Promise<Account> {
    const trimmed = identifier.trim();
    const account = trimmed.includes("@")
      ? await this.store.findAccountByEmail(normalizeEmail(trimmed))
      : await this.store.findAccountById(trimmed);
    if (!account) {
      throw new RecipientNotFoundError(identifier);
    }
    return account;
  }

  private async assertVerified(accountId: string, role: "Sender" | "Recipient"): Promise<void> {
    if (!this.config.requireVerification) return;

    const status = await this.deps.verification.getStatus(accountId);
    if (status !== "approved") {
      throw new VerificationRequiredError(
        `${role} is not verified to perform transactions (status: ${status})`,
      );
    }
  }

  /** Fast path outside any lock: cache first, then the durable record. */
  private async findReplay(
    idempotencyKey: string,
    initiatorId: string,
    type: TransactionType,
  ): Promise<TransferOutcome | null> {
    const cachedId = await this.deps.cache?.get(cacheKeys.idempotency(initiatorId, type, idempotencyKey));
    if (cachedId) {
      const transaction = await this.store.findTransaction(cachedId);
      if (
        transaction &&
        transaction.transaction_type === type &&
        transaction.initiator_id === initiatorId &&
        transaction.idempotency_key === idempotencyKey
      ) {
        const outcome = outcomeFrom(transaction, true);
        if (outcome) {
          logger.info({ idempotencyKey, transactionId: cachedId }, "Duplicate transaction detected (cache)");
          return outcome;
        }
      }
    }

    const record = await this.store.findIdempotencyRecord(idempotencyKey, initiatorId, type);
    if (!record) return null;

    const transaction = await this.store.findTransaction(record.transaction_id);
    if (!transaction) {
      throw new Error(`Critical: idempotency record points at missing transaction ${record.transaction_id}`);
    }
    logger.info({ idempotencyKey, transactionId: transaction.id }, "Duplicate transaction detected");
    return replayOf(transaction, type);
  }

  private async replayRecord(
    uow: UnitOfWork,
    record: IdempotencyRecord,
    type: TransactionType,
  ): Promise<TransferOutcome> {
    const transaction = await uow.transactions.findById(record.transaction_id);
    if (!transaction) {
      throw new Error(`Critical: idempotency record points at missing transaction ${record.transaction_id}`);
    }
    logger.info(
      { idempotencyKey: record.idempotency_key, transactionId: record.transaction_id },
      "Duplicate transaction detected under lock",
    );
    return replayOf(transaction, type);
  }

  private async recordCompletion(uow: UnitOfWork, transaction: Transaction): Promise<TransferOutcome> {
    const completed = await uow.transactions.markCompleted(transaction.id);
    await uow.idempotency.record({
      idempotency_key: completed.idempotency_key,
      initiator_id: completed.initiator_id,
      transaction_type: completed.transaction_type,
      transaction_id: completed.id,
      outcome: "COMPLETED",
      failure_reason: null,
    });
    logger.info(
      { transactionId: completed.id, type: completed.transaction_type, amount: completed.amount },
      "Transfer completed successfully",
    );
    return { status: "COMPLETED", replayed: false, transaction: completed };
  }

  private async recordFailure(uow: UnitOfWork, transaction: Transaction): Promise<TransferOutcome> {
    const failed = await uow.transactions.markFailed(transaction.id, "INSUFFICIENT_FUNDS");
    await uow.idempotency.record({
      idempotency_key: failed.idempotency_key,
      initiator_id: failed.initiator_id,
      transaction_type: failed.transaction_type,
      transaction_id: failed.id,
      outcome: "FAILED",
      failure_reason: "INSUFFICIENT_FUNDS",
    });
    return { status: "FAILED", replayed: false, transaction: failed, failure_reason: "INSUFFICIENT_FUNDS" };
  }

  // Runs only after commit, with every wallet lock released.
  private async afterCommit({ outcome, wallets }: Settlement): Promise<void> {
    const { cache, notifier } = this.deps;
    const { transaction } = outcome;

    if (cache) {
      // Versioned writes: a reader that loaded an older balance cannot overwrite these.
      for (const wallet of wallets) {
        await cache.setVersioned(
          cacheKeys.balance(wallet.account_id),
          { version: wallet.version, value: formatAmount(wallet.balance, this.config.scale) },
          this.config.balanceCacheTtlSeconds,
        );
      }
      await cache.set(
        cacheKeys.idempotency(transaction.initiator_id, transaction.transaction_type, transaction.idempotency_key),
        transaction.id,
        this.config.idempotencyCacheTtlSeconds,
      );
    }

    if (notifier && !outcome.replayed) {
      void notifier.dispatch(transactionEvent(transaction)).catch((err: unknown) => {
        logger.error({ err, transactionId: transaction.id }, "Notification dispatch failed");
      });
    }
  }

  private async recover(
    err: unknown,
    idempotencyKey: string,
    initiatorId: string,
    type: TransactionType,
  ): Promise<TransferOutcome> {
    if (err instanceof IdempotencyConflictError) {
      // A concurrent request with the same key committed first.
      const replay = await this.findReplay(idempotencyKey, initiatorId, type);
      if (replay) {
        trackTransfer(type, "REPLAYED");
        return replay;
      }
      throw new ConcurrencyConflictError(
        "A concurrent request with the same idempotency key is in flight",
        { cause: err },
      );
    }

    if (err instanceof ConcurrencyConflictError) {
      trackConcurrencyConflict(type);
      logger.warn({ idempotencyKey, initiatorId, type }, "Transfer aborted by lock contention");
    }
    throw err;
  }
}
