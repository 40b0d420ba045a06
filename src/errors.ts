export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "SELF_TRANSFER_NOT_ALLOWED"
  | "RECIPIENT_NOT_FOUND"
  | "VERIFICATION_REQUIRED"
  | "MISSING_IDEMPOTENCY_KEY"
  | "INSUFFICIENT_FUNDS"
  | "CONCURRENCY_CONFLICT"
  | "ACCOUNT_NOT_FOUND"
  | "DUPLICATE_ACCOUNT"
  | "PAYMENT_INTENT_NOT_FOUND"
  | "INVALID_STATE_TRANSITION"
  | "INVALID_SIGNATURE"
  | "INVALID_CURSOR"
  | "TRANSACTION_NOT_FOUND";

export type HttpErrorStatus = 400 | 401 | 402 | 403 | 404 | 409;

/**
 * Base class for every failure the ledger reports to its callers.
 * `retryable` tells a client whether resubmitting the same request
 * (with the same idempotency key) can succeed.
 */
export abstract class LedgerError extends Error {
  abstract readonly code: LedgerErrorCode;
  abstract readonly status: HttpErrorStatus;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON() {
    return { error: this.message, code: this.code };
  }
}

export class InvalidAmountError extends LedgerError {
  readonly code = "INVALID_AMOUNT";
  readonly status = 400;
}

export class SelfTransferNotAllowedError extends LedgerError {
  readonly code = "SELF_TRANSFER_NOT_ALLOWED";
  readonly status = 400;

  constructor(message = "Cannot transfer to yourself") {
    super(message);
  }
}

export class RecipientNotFoundError extends LedgerError {
  readonly code = "RECIPIENT_NOT_FOUND";
  readonly status = 404;

  constructor(identifier: string) {
    super(`Recipient not found: ${identifier}`);
  }
}

export class VerificationRequiredError extends LedgerError {
  readonly code = "VERIFICATION_REQUIRED";
  readonly status = 403;
}

export class MissingIdempotencyKeyError extends LedgerError {
  readonly code = "MISSING_IDEMPOTENCY_KEY";
  readonly status = 400;

  constructor(message = "Idempotency key is required") {
    super(message);
  }
}

export class ConcurrencyConflictError extends LedgerError {
  readonly code = "CONCURRENCY_CONFLICT";
  readonly status = 409;
  override readonly retryable = true;
}

export class AccountNotFoundError extends LedgerError {
  readonly code = "ACCOUNT_NOT_FOUND";
  readonly status = 404;

  constructor(accountId: string) {
    super(`Account not found: ${accountId}`);
  }
}

export class DuplicateAccountError extends LedgerError {
  readonly code = "DUPLICATE_ACCOUNT";
  readonly status = 409;

  constructor(email: string) {
    super(`An account already exists for ${email}`);
  }
}

export class PaymentIntentNotFoundError extends LedgerError {
  readonly code = "PAYMENT_INTENT_NOT_FOUND";
  readonly status = 404;

  constructor(intentId: string) {
    super(`Payment intent not found: ${intentId}`);
  }
}

export class InvalidStateTransitionError extends LedgerError {
  readonly code = "INVALID_STATE_TRANSITION";
  readonly status = 409;

  constructor(from: string, to: string) {
    super(`Cannot move payment intent from ${from} to ${to}`);
  }
}

export class InvalidSignatureError extends LedgerError {
  readonly code = "INVALID_SIGNATURE";
  readonly status = 401;

  constructor(message = "Webhook signature verification failed") {
    super(message);
  }
}

export class TransactionNotFoundError extends LedgerError {
  readonly code = "TRANSACTION_NOT_FOUND";
  readonly status = 404;

  constructor(transactionId: string) {
    super(`Transaction not found: ${transactionId}`);
  }
}

export class InvalidCursorError extends LedgerError {
  readonly code = "INVALID_CURSOR";
  readonly status = 400;

  constructor(cursor: string) {
    super(`Invalid history cursor: ${cursor}`);
  }
}

/**
 * Raised by a store when the (idempotency key, initiator) pair was committed
 * by a concurrent unit of work. The engine answers it with a replay.
 */
export class IdempotencyConflictError extends Error {
  constructor(message = "Idempotency key already recorded") {
    super(message);
    this.name = "IdempotencyConflictError";
  }
}
