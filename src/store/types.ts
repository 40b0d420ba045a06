import type {
  Account,
  FailureReason,
  IdempotencyRecord,
  LedgerEntry,
  LedgerLeg,
  PaymentIntent,
  PaymentIntentStatus,
  Transaction,
  TransactionType,
  VerificationStatus,
  Wallet,
} from "../types";

export interface NewAccount {
  email: string;
  verification_status: VerificationStatus;
}

export interface NewTransaction {
  idempotency_key: string;
  initiator_id: string;
  transaction_type: TransactionType;
  source_account_id: string | null;
  destination_account_id: string;
  amount: string;
  currency: string;
  description: string;
  external_reference: string | null;
}

export interface LedgerLegInput {
  leg: LedgerLeg;
  wallet_id: string | null;
  account_id: string | null;
  amount: string;
  balance_after: string | null;
}

export interface NewIdempotencyRecord {
  idempotency_key: string;
  initiator_id: string;
  transaction_type: TransactionType;
  transaction_id: string;
  outcome: "COMPLETED" | "FAILED";
  failure_reason: FailureReason | null;
}

export interface NewPaymentIntent {
  account_id: string;
  amount: string;
  currency: string;
  description: string;
}

export interface PaymentIntentUpdate {
  status: PaymentIntentStatus;
  transaction_id?: string | null;
  error_message?: string | null;
}

export interface AccountRepository {
  insert(input: NewAccount): Promise<Account>;
  findById(accountId: string): Promise<Account | null>;
  findByEmail(email: string): Promise<Account | null>;
  updateVerificationStatus(accountId: string, status: VerificationStatus): Promise<Account | null>;
}

export interface WalletStore {
  /** Provisioning only: a zero-balance wallet for a freshly inserted account. */
  create(accountId: string, currency: string): Promise<Wallet>;
  findByAccountId(accountId: string): Promise<Wallet | null>;
  /**
   * Exclusive lock on the wallet row until the unit of work ends. Waits at
   * most the configured lock timeout, then throws ConcurrencyConflictError.
   */
  getForUpdate(walletId: string): Promise<Wallet>;
  /** Writes balance and bumps version. Caller must hold the lock. */
  save(wallet: Wallet): Promise<Wallet>;
}

export interface TransactionRepository {
  insert(input: NewTransaction): Promise<Transaction>;
  markCompleted(transactionId: string): Promise<Transaction>;
  markFailed(transactionId: string, reason: FailureReason): Promise<Transaction>;
  findById(transactionId: string): Promise<Transaction | null>;
}

/** Append-only. There is deliberately no update or delete. */
export interface Ledger {
  record(transactionId: string, legs: [LedgerLegInput, LedgerLegInput]): Promise<LedgerEntry[]>;
}

export interface IdempotencyIndex {
  find(idempotencyKey: string, initiatorId: string, type: TransactionType): Promise<IdempotencyRecord | null>;
  record(input: NewIdempotencyRecord): Promise<IdempotencyRecord>;
}

export interface PaymentIntentRepository {
  insert(input: NewPaymentIntent): Promise<PaymentIntent>;
  getForUpdate(intentId: string): Promise<PaymentIntent | null>;
  update(intentId: string, update: PaymentIntentUpdate): Promise<PaymentIntent>;
}

export type AfterCommitCallback = () => void | Promise<void>;

/** The transaction handle passed through one atomic unit of work. */
export interface UnitOfWork {
  accounts: AccountRepository;
  wallets: WalletStore;
  transactions: TransactionRepository;
  ledger: Ledger;
  idempotency: IdempotencyIndex;
  paymentIntents: PaymentIntentRepository;
  /** Queues `callback` to run once this unit of work has committed; dropped on rollback. */
  onCommit(callback: AfterCommitCallback): void;
}

export interface HistoryQuery {
  limit: number;
  beforeSequence?: string;
}

/** Latest-committed reads that take no locks. */
export interface LedgerReader {
  findAccountById(accountId: string): Promise<Account | null>;
  findAccountByEmail(email: string): Promise<Account | null>;
  findWalletByAccountId(accountId: string): Promise<Wallet | null>;
  findTransaction(transactionId: string): Promise<Transaction | null>;
  findIdempotencyRecord(
    idempotencyKey: string,
    initiatorId: string,
    type: TransactionType,
  ): Promise<IdempotencyRecord | null>;
  listTransactions(accountId: string, query: HistoryQuery): Promise<Transaction[]>;
  listLedgerEntries(transactionId: string): Promise<LedgerEntry[]>;
  findPaymentIntent(intentId: string): Promise<PaymentIntent | null>;
  /** Newest first. */
  listPaymentIntents(accountId: string): Promise<PaymentIntent[]>;
}

export interface LedgerStore extends LedgerReader {
  /**
   * Runs `work` inside one unit of work. Commits when it resolves, rolls back
   * on every rejection, and releases all locks either way.
   */
  withUnitOfWork<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
