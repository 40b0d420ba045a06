export type VerificationStatus = "PENDING" | "APPROVED" | "REJECTED";

export interface Account {
  id: string; // UUID
  email: string;
  verification_status: VerificationStatus;
  created_at: Date;
}

export interface Wallet {
  id: string; // UUID
  account_id: string;
  balance: string; // NUMERIC, fixed scale
  currency: string;
  version: number;
  created_at: Date;
  updated_at: Date;
}

export type TransactionType = "TRANSFER" | "DEPOSIT";
export type TransactionStatus = "PENDING" | "COMPLETED" | "FAILED";
export type FailureReason = "INSUFFICIENT_FUNDS";

export interface Transaction {
  id: string; // UUID
  sequence: string; // BIGSERIAL as string
  idempotency_key: string;
  initiator_id: string;
  transaction_type: TransactionType;
  source_account_id: string | null; // null for deposits
  destination_account_id: string;
  amount: string;
  currency: string;
  description: string;
  external_reference: string | null;
  status: TransactionStatus;
  failure_reason: FailureReason | null;
  created_at: Date;
  completed_at: Date | null;
}

export type LedgerLeg = "DEBIT" | "CREDIT";

export interface LedgerEntry {
  id: string;
  transaction_id: string;
  leg: LedgerLeg;
  wallet_id: string | null; // null for the external side of a deposit
  account_id: string | null;
  amount: string;
  balance_after: string | null;
  created_at: Date;
}

// Keys are scoped per initiator and per transaction type: a caller's transfer
// key never collides with a system-issued deposit reference.
export interface IdempotencyRecord {
  idempotency_key: string;
  initiator_id: string;
  transaction_type: TransactionType;
  transaction_id: string;
  outcome: "COMPLETED" | "FAILED";
  failure_reason: FailureReason | null;
  created_at: Date;
}

export type PaymentIntentStatus =
  | "CREATED"
  | "PENDING"
  | "SUCCEEDED"
  | "FAILED"
  | "EXPIRED";

export interface PaymentIntent {
  id: string;
  account_id: string;
  amount: string;
  currency: string;
  description: string;
  status: PaymentIntentStatus;
  transaction_id: string | null;
  error_message: string | null;
  created_at: Date;
  updated_at: Date;
}

export type TransferOutcome =
  | {
      status: "COMPLETED";
      replayed: boolean;
      transaction: Transaction;
    }
  | {
      status: "FAILED";
      replayed: boolean;
      transaction: Transaction;
      failure_reason: FailureReason;
    };

export interface HistoryItem extends Transaction {
  direction: "SENT" | "RECEIVED";
}

export interface HistoryPage {
  items: HistoryItem[];
  next_cursor: string | null;
}
