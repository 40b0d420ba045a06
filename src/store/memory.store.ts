import { randomUUID } from "node:crypto";
import {
  DuplicateAccountError,
  ConcurrencyConflictError,
  IdempotencyConflictError,
} from "../errors";
import type {
  Account,
  FailureReason,
  IdempotencyRecord,
  LedgerEntry,
  PaymentIntent,
  Transaction,
  TransactionType,
  VerificationStatus,
  Wallet,
} from "../types";
import { formatAmount } from "../utils/money";
import { drainAfterCommit } from "./after-commit";
import { RowLockManager } from "./lock-manager";
import type {
  AfterCommitCallback,
  HistoryQuery,
  LedgerLegInput,
  LedgerStore,
  NewAccount,
  NewIdempotencyRecord,
  NewPaymentIntent,
  NewTransaction,
  PaymentIntentUpdate,
  UnitOfWork,
} from "./types";

// In-process LedgerStore for development and tests. A unit of work stages its
// writes in an overlay and applies them in one synchronous step on commit.

interface Rows {
  accounts: Account;
  wallets: Wallet;
  transactions: Transaction;
  ledgerEntries: LedgerEntry;
  idempotency: IdempotencyRecord;
  paymentIntents: PaymentIntent;
}

type Tables = { [K in keyof Rows]: Map<string, Rows[K]> };

export interface MemoryStoreOptions {
  lockTimeoutMs: number;
  /** Fractional digits of stored balances. */
  scale: number;
}

function emptyTables(): Tables {
  return {
    accounts: new Map(),
    wallets: new Map(),
    transactions: new Map(),
    ledgerEntries: new Map(),
    idempotency: new Map(),
    paymentIntents: new Map(),
  };
}

function idempotencyKeyOf(idempotencyKey: string, initiatorId: string, type: TransactionType): string {
  return `${initiatorId}:${type}:${idempotencyKey}`;
}

function clone<T extends object>(row: T): T {
  return { ...row };
}

function mergeInto<R>(target: Map<string, R>, source: Map<string, R>): void {
  for (const [id, row] of source) {
    target.set(id, row);
  }
}

function bySequenceDesc(a: Transaction, b: Transaction): number {
  return Number(b.sequence) - Number(a.sequence);
}

function newestFirst(a: PaymentIntent, b: PaymentIntent): number {
  return b.created_at.getTime() - a.created_at.getTime();
}

function debitFirst(a: LedgerEntry, b: LedgerEntry): number {
  if (a.leg === b.leg) return 0;
  return a.leg === "DEBIT" ? -1 : 1;
}

class MemoryUnitOfWork implements UnitOfWork {
  readonly staged: Tables = emptyTables();
  readonly afterCommit: AfterCommitCallback[] = [];
  private readonly owner = Symbol("unit-of-work");
  private readonly heldLocks = new Set<string>();

  constructor(
    private readonly store: MemoryLedgerStore,
    private readonly committed: Tables,
    private readonly locks: RowLockManager,
    private readonly lockTimeoutMs: number,
    private readonly scale: number,
  ) {}

  onCommit(callback: AfterCommitCallback): void {
    this.afterCommit.push(callback);
  }

  private read<K extends keyof Rows>(table: K, id: string): Rows[K] | undefined {
    return this.staged[table].get(id) ?? this.committed[table].get(id);
  }

  private async lock(key: string): Promise<void> {
    await this.locks.acquire(key, this.owner, this.lockTimeoutMs);
    this.heldLocks.add(key);
  }

  releaseLocks(): void {
    for (const key of this.heldLocks) {
      this.locks.release(key, this.owner);
    }
    this.heldLocks.clear();
  }

  accounts = {
    insert: async (input: NewAccount): Promise<Account> => {
      if (await this.accounts.findByEmail(input.email)) {
        throw new DuplicateAccountError(input.email);
      }
      const account: Account = {
        id: randomUUID(),
        email: input.email,
        verification_status: input.verification_status,
        created_at: new Date(),
      };
      this.staged.accounts.set(account.id, account);
      return clone(account);
    },

    findById: async (accountId: string): Promise<Account | null> => {
      const account = this.read("accounts", accountId);
      return account ? clone(account) : null;
    },

    findByEmail: async (email: string): Promise<Account | null> => {
      for (const table of [this.staged.accounts, this.committed.accounts]) {
        for (const account of table.values()) {
          if (account.email === email) return clone(account);
        }
      }
      return null;
    },

    updateVerificationStatus: async (
      accountId: string,
      status: VerificationStatus,
    ): Promise<Account | null> => {
      const account = this.read("accounts", accountId);
      if (!account) return null;
      const updated = { ...account, verification_status: status };
      this.staged.accounts.set(accountId, updated);
      return clone(updated);
    },
  };

  wallets = {
    create: async (accountId: string, currency: string): Promise<Wallet> => {
      const now = new Date();
      const wallet: Wallet = {
        id: randomUUID(),
        account_id: accountId,
        balance: formatAmount(0, this.scale),
        currency,
        version: 0,
        created_at: now,
        updated_at: now,
      };
      this.staged.wallets.set(wallet.id, wallet);
      return clone(wallet);
    },

    findByAccountId: async (accountId: string): Promise<Wallet | null> => {
      for (const table of [this.staged.wallets, this.committed.wallets]) {
        for (const wallet of table.values()) {
          if (wallet.account_id === accountId) return clone(wallet);
        }
      }
      return null;
    },

    getForUpdate: async (walletId: string): Promise<Wallet> => {
      await this.lock(`wallet:${walletId}`);
      const wallet = this.read("wallets", walletId);
      if (!wallet) {
        throw new Error(`Critical: wallet ${walletId} does not exist`);
      }
      return clone(wallet);
    },

    save: async (wallet: Wallet): Promise<Wallet> => {
      if (!this.heldLocks.has(`wallet:${wallet.id}`)) {
        throw new Error(`Critical: wallet ${wallet.id} saved without holding its lock`);
      }
      const current = this.read("wallets", wallet.id);
      if (!current || current.version !== wallet.version) {
        throw new ConcurrencyConflictError(`Wallet ${wallet.id} changed while locked`);
      }
      const saved: Wallet = {
        ...current,
        balance: wallet.balance,
        version: current.version + 1,
        updated_at: new Date(),
      };
      this.staged.wallets.set(saved.id, saved);
      return clone(saved);
    },
  };

  transactions = {
    insert: async (input: NewTransaction): Promise<Transaction> => {
      for (const table of [this.staged.transactions, this.committed.transactions]) {
        for (const existing of table.values()) {
          if (
            existing.initiator_id === input.initiator_id &&
            existing.transaction_type === input.transaction_type &&
            existing.idempotency_key === input.idempotency_key
          ) {
            throw new IdempotencyConflictError();
          }
        }
      }
      const transaction: Transaction = {
        ...input,
        id: randomUUID(),
        sequence: this.store.nextSequence(),
        status: "PENDING",
        failure_reason: null,
        created_at: new Date(),
        completed_at: null,
      };
      this.staged.transactions.set(transaction.id, transaction);
      return clone(transaction);
    },

    markCompleted: async (transactionId: string): Promise<Transaction> =>
      this.finish(transactionId, { status: "COMPLETED", failure_reason: null }),

    markFailed: async (transactionId: string, reason: FailureReason): Promise<Transaction> =>
      this.finish(transactionId, { status: "FAILED", failure_reason: reason }),

    findById: async (transactionId: string): Promise<Transaction | null> => {
      const transaction = this.read("transactions", transactionId);
      return transaction ? clone(transaction) : null;
    },
  };

  private async finish(
    transactionId: string,
    terminal: Pick<Transaction, "status" | "failure_reason">,
  ): Promise<Transaction> {
    const transaction = this.read("transactions", transactionId);
    if (!transaction || transaction.status !== "PENDING") {
      throw new Error(`Critical: transaction ${transactionId} is not pending`);
    }
    const finished: Transaction = { ...transaction, ...terminal, completed_at: new Date() };
    this.staged.transactions.set(transactionId, finished);
    return clone(finished);
  }

  ledger = {
    record: async (
      transactionId: string,
      legs: [LedgerLegInput, LedgerLegInput],
    ): Promise<LedgerEntry[]> => {
      const createdAt = new Date();
      return legs.map((leg) => {
        const entry: LedgerEntry = {
          ...leg,
          id: randomUUID(),
          transaction_id: transactionId,
          created_at: createdAt,
        };
        this.staged.ledgerEntries.set(entry.id, entry);
        return clone(entry);
      });
    },
  };

  idempotency = {
    find: async (
      idempotencyKey: string,
      initiatorId: string,
      type: TransactionType,
    ): Promise<IdempotencyRecord | null> => {
      const record = this.read("idempotency", idempotencyKeyOf(idempotencyKey, initiatorId, type));
      return record ? clone(record) : null;
    },

    record: async (input: NewIdempotencyRecord): Promise<IdempotencyRecord> => {
      const key = idempotencyKeyOf(input.idempotency_key, input.initiator_id, input.transaction_type);
      if (this.read("idempotency", key)) {
        throw new IdempotencyConflictError();
      }
      const record: IdempotencyRecord = { ...input, created_at: new Date() };
      this.staged.idempotency.set(key, record);
      return clone(record);
    },
  };

  paymentIntents = {
    insert: async (input: NewPaymentIntent): Promise<PaymentIntent> => {
      const now = new Date();
      const intent: PaymentIntent = {
        ...input,
        id: randomUUID(),
        status: "CREATED",
        transaction_id: null,
        error_message: null,
        created_at: now,
        updated_at: now,
      };
      this.staged.paymentIntents.set(intent.id, intent);
      return clone(intent);
    },

    getForUpdate: async (intentId: string): Promise<PaymentIntent | null> => {
      if (!this.read("paymentIntents", intentId)) return null;
      await this.lock(`payment_intent:${intentId}`);
      const intent = this.read("paymentIntents", intentId);
      return intent ? clone(intent) : null;
    },

    update: async (intentId: string, update: PaymentIntentUpdate): Promise<PaymentIntent> => {
      const intent = this.read("paymentIntents", intentId);
      if (!intent) {
        throw new Error(`Critical: payment intent ${intentId} does not exist`);
      }
      const updated: PaymentIntent = {
        ...intent,
        status: update.status,
        transaction_id: update.transaction_id ?? intent.transaction_id,
        error_message: update.error_message ?? intent.error_message,
        updated_at: new Date(),
      };
      this.staged.paymentIntents.set(intentId, updated);
      return clone(updated);
    },
  };
}

export class MemoryLedgerStore implements LedgerStore {
  private tables: Tables = emptyTables();
  private sequence = 0;
  private readonly locks = new RowLockManager();

  constructor(private readonly options: MemoryStoreOptions) {}

  nextSequence(): string {
    this.sequence += 1;
    return String(this.sequence);
  }

  async withUnitOfWork<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    const uow = new MemoryUnitOfWork(
      this,
      this.tables,
      this.locks,
      this.options.lockTimeoutMs,
      this.options.scale,
    );
    const result = await this.run(uow, work);
    await drainAfterCommit(uow.afterCommit);
    return result;
  }

  private async run<T>(uow: MemoryUnitOfWork, work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    try {
      const result = await work(uow);
      this.commit(uow.staged);
      return result;
    } finally {
      uow.releaseLocks();
    }
  }

  private commit(staged: Tables): void {
    for (const key of staged.idempotency.keys()) {
      if (this.tables.idempotency.has(key)) {
        throw new IdempotencyConflictError();
      }
    }
    for (const account of staged.accounts.values()) {
      for (const existing of this.tables.accounts.values()) {
        if (existing.email === account.email && existing.id !== account.id) {
          throw new DuplicateAccountError(account.email);
        }
      }
    }

    mergeInto(this.tables.accounts, staged.accounts);
    mergeInto(this.tables.wallets, staged.wallets);
    mergeInto(this.tables.transactions, staged.transactions);
    mergeInto(this.tables.ledgerEntries, staged.ledgerEntries);
    mergeInto(this.tables.idempotency, staged.idempotency);
    mergeInto(this.tables.paymentIntents, staged.paymentIntents);
  }

  async findAccountById(accountId: string) {
    const account = this.tables.accounts.get(accountId);
    return account ? clone(account) : null;
  }

  async findAccountByEmail(email: string) {
    for (const account of this.tables.accounts.values()) {
      if (account.email === email) return clone(account);
    }
    return null;
  }

  async findWalletByAccountId(accountId: string) {
    for (const wallet of this.tables.wallets.values()) {
      if (wallet.account_id === accountId) return clone(wallet);
    }
    return null;
  }

  async findTransaction(transactionId: string) {
    const transaction = this.tables.transactions.get(transactionId);
    return transaction ? clone(transaction) : null;
  }

  async findIdempotencyRecord(idempotencyKey: string, initiatorId: string, type: TransactionType) {
    const record = this.tables.idempotency.get(idempotencyKeyOf(idempotencyKey, initiatorId, type));
    return record ? clone(record) : null;
  }

  async listTransactions(accountId: string, query: HistoryQuery) {
    const before = query.beforeSequence === undefined ? Infinity : Number(query.beforeSequence);
    return [...this.tables.transactions.values()]
      .filter(
        (t) =>
          (t.source_account_id === accountId || t.destination_account_id === accountId) &&
          Number(t.sequence) < before,
      )
      .sort(bySequenceDesc)
      .slice(0, query.limit)
      .map(clone);
  }

  async listLedgerEntries(transactionId: string) {
    return [...this.tables.ledgerEntries.values()]
      .filter((entry) => entry.transaction_id === transactionId)
      .sort(debitFirst)
      .map(clone);
  }

  async findPaymentIntent(intentId: string) {
    const intent = this.tables.paymentIntents.get(intentId);
    return intent ? clone(intent) : null;
  }

  async listPaymentIntents(accountId: string) {
    // Reversed first so intents created in the same millisecond stay newest first.
    return [...this.tables.paymentIntents.values()]
      .reverse()
      .filter((intent) => intent.account_id === accountId)
      .sort(newestFirst)
      .map(clone);
  }

  /** Every wallet as last committed. */
  async listWallets(): Promise<Wallet[]> {
    return [...this.tables.wallets.values()].map(clone);
  }

  async close() {
    this.tables = emptyTables();
  }
}
