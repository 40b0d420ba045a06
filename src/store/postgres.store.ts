import postgres from "postgres";
import type { Sql } from "../db/index";
import {
  ConcurrencyConflictError,
  DuplicateAccountError,
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
import { logger } from "../utils/logger";
import { drainAfterCommit } from "./after-commit";
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

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// lock_not_available, serialization_failure, deadlock_detected
const CONCURRENCY_ERROR_CODES = new Set(["55P03", "40001", "40P01"]);
const UNIQUE_VIOLATION = "23505";
const IDEMPOTENCY_CONSTRAINTS = new Set([
  "idempotency_records_pkey",
  "transactions_idempotency_key",
]);

export interface PostgresStoreOptions {
  lockTimeoutMs: number;
  statementTimeoutMs: number;
}

function isUniqueViolation(err: unknown, constraints: Set<string>): boolean {
  return (
    err instanceof postgres.PostgresError &&
    err.code === UNIQUE_VIOLATION &&
    err.constraint_name !== undefined &&
    constraints.has(err.constraint_name)
  );
}

function translateError(err: unknown): unknown {
  if (err instanceof postgres.PostgresError && CONCURRENCY_ERROR_CODES.has(err.code)) {
    logger.warn({ code: err.code }, "Unit of work aborted by lock contention");
    return new ConcurrencyConflictError(
      "Wallet is locked by a concurrent transfer, retry with the same idempotency key",
      { cause: err },
    );
  }
  return err;
}

// Every query in a unit of work runs on the transaction connection `tx`.
function createUnitOfWork(tx: postgres.TransactionSql, afterCommit: AfterCommitCallback[]): UnitOfWork {
  return {
    onCommit(callback: AfterCommitCallback) {
      afterCommit.push(callback);
    },

    accounts: {
      async insert(input: NewAccount) {
        try {
          const [account] = await tx<Account[]>`
            INSERT INTO accounts (email, verification_status)
            VALUES (${input.email}, ${input.verification_status})
            RETURNING *
          `;
          return account;
        } catch (err) {
          if (isUniqueViolation(err, new Set(["accounts_email_key"]))) {
            throw new DuplicateAccountError(input.email);
          }
          throw err;
        }
      },

      async findById(accountId: string) {
        if (!UUID_PATTERN.test(accountId)) return null;
        const [account] = await tx<Account[]>`
          SELECT * FROM accounts WHERE id = ${accountId}
        `;
        return account ?? null;
      },

      async findByEmail(email: string) {
        const [account] = await tx<Account[]>`
          SELECT * FROM accounts WHERE email = ${email}
        `;
        return account ?? null;
      },

      async updateVerificationStatus(accountId: string, status: VerificationStatus) {
        if (!UUID_PATTERN.test(accountId)) return null;
        const [account] = await tx<Account[]>`
          UPDATE accounts SET verification_status = ${status}
          WHERE id = ${accountId}
          RETURNING *
        `;
        return account ?? null;
      },
    },

    wallets: {
      async create(accountId: string, currency: string) {
        const [wallet] = await tx<Wallet[]>`
          INSERT INTO wallets (account_id, balance, currency)
          VALUES (${accountId}, 0, ${currency})
          RETURNING *
        `;
        return wallet;
      },

      async findByAccountId(accountId: string) {
        if (!UUID_PATTERN.test(accountId)) return null;
        const [wallet] = await tx<Wallet[]>`
          SELECT * FROM wallets WHERE account_id = ${accountId}
        `;
        return wallet ?? null;
      },

      async getForUpdate(walletId: string) {
        const [wallet] = await tx<Wallet[]>`
          SELECT * FROM wallets WHERE id = ${walletId} FOR UPDATE
        `;
        if (!wallet) {
          throw new Error(`Critical: wallet ${walletId} does not exist`);
        }
        return wallet;
      },

      async save(wallet: Wallet) {
        const [saved] = await tx<Wallet[]>`
          UPDATE wallets
          SET balance = ${wallet.balance}, version = version + 1, updated_at = NOW()
          WHERE id = ${wallet.id} AND version = ${wallet.version}
          RETURNING *
        `;
        if (!saved) {
          throw new ConcurrencyConflictError(`Wallet ${wallet.id} changed while locked`);
        }
        return saved;
      },
    },

    transactions: {
      async insert(input: NewTransaction) {
        try {
          const [transaction] = await tx<Transaction[]>`
            INSERT INTO transactions (
              idempotency_key, initiator_id, transaction_type, source_account_id,
              destination_account_id, amount, currency, description, external_reference, status
            ) VALUES (
              ${input.idempotency_key}, ${input.initiator_id}, ${input.transaction_type},
              ${input.source_account_id}, ${input.destination_account_id}, ${input.amount},
              ${input.currency}, ${input.description}, ${input.external_reference}, 'PENDING'
            )
            RETURNING *
          `;
          return transaction;
        } catch (err) {
          if (isUniqueViolation(err, IDEMPOTENCY_CONSTRAINTS)) {
            throw new IdempotencyConflictError();
          }
          throw err;
        }
      },

      async markCompleted(transactionId: string) {
        const [transaction] = await tx<Transaction[]>`
          UPDATE transactions
          SET status = 'COMPLETED', completed_at = NOW()
          WHERE id = ${transactionId} AND status = 'PENDING'
          RETURNING *
        `;
        if (!transaction) {
          throw new Error(`Critical: transaction ${transactionId} is not pending`);
        }
        return transaction;
      },

      async markFailed(transactionId: string, reason: FailureReason) {
        const [transaction] = await tx<Transaction[]>`
          UPDATE transactions
          SET status = 'FAILED', failure_reason = ${reason}, completed_at = NOW()
          WHERE id = ${transactionId} AND status = 'PENDING'
          RETURNING *
        `;
        if (!transaction) {
          throw new Error(`Critical: transaction ${transactionId} is not pending`);
        }
        return transaction;
      },

      async findById(transactionId: string) {
        const [transaction] = await tx<Transaction[]>`
          SELECT * FROM transactions WHERE id = ${transactionId}
        `;
        return transaction ?? null;
      },
    },

    ledger: {
      async record(transactionId: string, legs: [LedgerLegInput, LedgerLegInput]) {
        const entries: LedgerEntry[] = [];
        for (const leg of legs) {
          const [entry] = await tx<LedgerEntry[]>`
            INSERT INTO ledger_entries (
              transaction_id, leg, wallet_id, account_id, amount, balance_after
            ) VALUES (
              ${transactionId}, ${leg.leg}, ${leg.wallet_id}, ${leg.account_id},
              ${leg.amount}, ${leg.balance_after}
            )
            RETURNING *
          `;
          entries.push(entry);
        }
        return entries;
      },
    },

    idempotency: {
      async find(idempotencyKey: string, initiatorId: string, type: TransactionType) {
        const [record] = await tx<IdempotencyRecord[]>`
          SELECT * FROM idempotency_records
          WHERE idempotency_key = ${idempotencyKey}
            AND initiator_id = ${initiatorId}
            AND transaction_type = ${type}
        `;
        return record ?? null;
      },

      async record(input: NewIdempotencyRecord) {
        try {
          const [record] = await tx<IdempotencyRecord[]>`
            INSERT INTO idempotency_records (
              idempotency_key, initiator_id, transaction_type, transaction_id, outcome, failure_reason
            ) VALUES (
              ${input.idempotency_key}, ${input.initiator_id}, ${input.transaction_type},
              ${input.transaction_id}, ${input.outcome}, ${input.failure_reason}
            )
            RETURNING *
          `;
          return record;
        } catch (err) {
          if (isUniqueViolation(err, IDEMPOTENCY_CONSTRAINTS)) {
            throw new IdempotencyConflictError();
          }
          throw err;
        }
      },
    },

    paymentIntents: {
      async insert(input: NewPaymentIntent) {
        const [intent] = await tx<PaymentIntent[]>`
          INSERT INTO payment_intents (account_id, amount, currency, description, status)
          VALUES (${input.account_id}, ${input.amount}, ${input.currency}, ${input.description}, 'CREATED')
          RETURNING *
        `;
        return intent;
      },

      async getForUpdate(intentId: string) {
        if (!UUID_PATTERN.test(intentId)) return null;
        const [intent] = await tx<PaymentIntent[]>`
          SELECT * FROM payment_intents WHERE id = ${intentId} FOR UPDATE
        `;
        return intent ?? null;
      },

      async update(intentId: string, update: PaymentIntentUpdate) {
        const [intent] = await tx<PaymentIntent[]>`
          UPDATE payment_intents
          SET status = ${update.status},
              transaction_id = COALESCE(${update.transaction_id ?? null}, transaction_id),
              error_message = COALESCE(${update.error_message ?? null}, error_message),
              updated_at = NOW()
          WHERE id = ${intentId}
          RETURNING *
        `;
        if (!intent) {
          throw new Error(`Critical: payment intent ${intentId} does not exist`);
        }
        return intent;
      },
    },
  };
}

export class PostgresLedgerStore implements LedgerStore {
  constructor(
    private readonly sql: Sql,
    private readonly options: PostgresStoreOptions,
  ) {}

  async withUnitOfWork<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    const afterCommit: AfterCommitCallback[] = [];
    // Held outside `begin`, whose return type unwraps promises inside arrays.
    const box: { result?: { value: T } } = {};
    try {
      await this.sql.begin(async (tx) => {
        await tx`
          SELECT
            set_config('lock_timeout', ${`${this.options.lockTimeoutMs}ms`}, true),
            set_config('statement_timeout', ${`${this.options.statementTimeoutMs}ms`}, true)
        `;
        box.result = { value: await work(createUnitOfWork(tx, afterCommit)) };
      });
    } catch (err) {
      throw translateError(err);
    }
    if (!box.result) {
      throw new Error("Critical: unit of work committed without a result");
    }
    await drainAfterCommit(afterCommit);
    return box.result.value;
  }

  async findAccountById(accountId: string) {
    if (!UUID_PATTERN.test(accountId)) return null;
    const [account] = await this.sql<Account[]>`
      SELECT * FROM accounts WHERE id = ${accountId}
    `;
    return account ?? null;
  }

  async findAccountByEmail(email: string) {
    const [account] = await this.sql<Account[]>`
      SELECT * FROM accounts WHERE email = ${email}
    `;
    return account ?? null;
  }

  async findWalletByAccountId(accountId: string) {
    if (!UUID_PATTERN.test(accountId)) return null;
    const [wallet] = await this.sql<Wallet[]>`
      SELECT * FROM wallets WHERE account_id = ${accountId}
    `;
    return wallet ?? null;
  }

  async findTransaction(transactionId: string) {
    if (!UUID_PATTERN.test(transactionId)) return null;
    const [transaction] = await this.sql<Transaction[]>`
      SELECT * FROM transactions WHERE id = ${transactionId}
    `;
    return transaction ?? null;
  }

  async findIdempotencyRecord(idempotencyKey: string, initiatorId: string, type: TransactionType) {
    if (!UUID_PATTERN.test(initiatorId)) return null;
    const [record] = await this.sql<IdempotencyRecord[]>`
      SELECT * FROM idempotency_records
      WHERE idempotency_key = ${idempotencyKey}
        AND initiator_id = ${initiatorId}
        AND transaction_type = ${type}
    `;
    return record ?? null;
  }

  async listTransactions(accountId: string, query: HistoryQuery) {
    if (!UUID_PATTERN.test(accountId)) return [];
    const rows = await this.sql<Transaction[]>`
      SELECT * FROM transactions
      WHERE (source_account_id = ${accountId} OR destination_account_id = ${accountId})
      ${query.beforeSequence ? this.sql`AND sequence < ${query.beforeSequence}` : this.sql``}
      ORDER BY sequence DESC
      LIMIT ${query.limit}
    `;
    return [...rows];
  }

  async listLedgerEntries(transactionId: string) {
    if (!UUID_PATTERN.test(transactionId)) return [];
    const rows = await this.sql<LedgerEntry[]>`
      SELECT * FROM ledger_entries
      WHERE transaction_id = ${transactionId}
      ORDER BY leg DESC
    `;
    return [...rows];
  }

  async findPaymentIntent(intentId: string) {
    if (!UUID_PATTERN.test(intentId)) return null;
    const [intent] = await this.sql<PaymentIntent[]>`
      SELECT * FROM payment_intents WHERE id = ${intentId}
    `;
    return intent ?? null;
  }

  async listPaymentIntents(accountId: string) {
    if (!UUID_PATTERN.test(accountId)) return [];
    const rows = await this.sql<PaymentIntent[]>`
      SELECT * FROM payment_intents
      WHERE account_id = ${accountId}
      ORDER BY created_at DESC, id DESC
    `;
    return [...rows];
  }

  async close() {
    await this.sql.end();
  }
}
