import { OpenAPIHono, z } from "@hono/zod-openapi";
import type { Account, LedgerEntry, PaymentIntent, Transaction, TransferOutcome, Wallet } from "../types";

export const ErrorSchema = z
  .object({
    error: z.string(),
    code: z.string(),
  })
  .openapi("Error");

const errorResponse = (description: string) => ({
  content: { "application/json": { schema: ErrorSchema } },
  description,
});

export const errorResponses = {
  400: errorResponse("Invalid request"),
  404: errorResponse("Not found"),
  409: errorResponse("Conflict, safe to retry with the same idempotency key"),
};

// Accepts "10.50" or 10.5; exactness is enforced by the money parser.
export const AmountSchema = z
  .union([z.string(), z.number()])
  .openapi({ example: "25.00", description: "Positive decimal amount" });

export const AccountSchema = z
  .object({
    id: z.string().uuid(),
    email: z.string(),
    verification_status: z.enum(["PENDING", "APPROVED", "REJECTED"]),
    created_at: z.string(),
  })
  .openapi("Account");

export const WalletSchema = z
  .object({
    id: z.string().uuid(),
    account_id: z.string().uuid(),
    balance: z.string(),
    currency: z.string(),
    version: z.number(),
  })
  .openapi("Wallet");

export const TransactionSchema = z
  .object({
    id: z.string().uuid(),
    sequence: z.string(),
    idempotency_key: z.string(),
    initiator_id: z.string(),
    transaction_type: z.enum(["TRANSFER", "DEPOSIT"]),
    source_account_id: z.string().nullable(),
    destination_account_id: z.string(),
    amount: z.string(),
    currency: z.string(),
    description: z.string(),
    external_reference: z.string().nullable(),
    status: z.enum(["PENDING", "COMPLETED", "FAILED"]),
    failure_reason: z.enum(["INSUFFICIENT_FUNDS"]).nullable(),
    created_at: z.string(),
    completed_at: z.string().nullable(),
  })
  .openapi("Transaction");

export const TransferResultSchema = z
  .object({
    status: z.enum(["COMPLETED", "FAILED"]),
    replayed: z.boolean(),
    failure_reason: z.enum(["INSUFFICIENT_FUNDS"]).nullable(),
    transaction: TransactionSchema,
  })
  .openapi("TransferResult");

export const LedgerEntrySchema = z
  .object({
    id: z.string(),
    transaction_id: z.string(),
    leg: z.enum(["DEBIT", "CREDIT"]),
    wallet_id: z.string().nullable(),
    account_id: z.string().nullable(),
    amount: z.string(),
    balance_after: z.string().nullable(),
    created_at: z.string(),
  })
  .openapi("LedgerEntry");

export const PaymentIntentSchema = z
  .object({
    id: z.string().uuid(),
    account_id: z.string(),
    amount: z.string(),
    currency: z.string(),
    description: z.string(),
    status: z.enum(["CREATED", "PENDING", "SUCCEEDED", "FAILED", "EXPIRED"]),
    transaction_id: z.string().nullable(),
    error_message: z.string().nullable(),
    created_at: z.string(),
    updated_at: z.string(),
  })
  .openapi("PaymentIntent");

// Map rows to plain JSON objects to satisfy the response schemas

export function serializeAccount(account: Account): z.infer<typeof AccountSchema> {
  return { ...account, created_at: account.created_at.toISOString() };
}

export function serializeWallet(wallet: Wallet): z.infer<typeof WalletSchema> {
  return {
    id: wallet.id,
    account_id: wallet.account_id,
    balance: wallet.balance,
    currency: wallet.currency,
    version: wallet.version,
  };
}

export function serializeTransaction(transaction: Transaction): z.infer<typeof TransactionSchema> {
  return {
    ...transaction,
    created_at: transaction.created_at.toISOString(),
    completed_at: transaction.completed_at ? transaction.completed_at.toISOString() : null,
  };
}

export function serializeOutcome(outcome: TransferOutcome): z.infer<typeof TransferResultSchema> {
  return {
    status: outcome.status,
    replayed: outcome.replayed,
    failure_reason: outcome.status === "FAILED" ? outcome.failure_reason : null,
    transaction: serializeTransaction(outcome.transaction),
  };
}

export function serializeLedgerEntry(entry: LedgerEntry): z.infer<typeof LedgerEntrySchema> {
  return { ...entry, created_at: entry.created_at.toISOString() };
}

export function serializePaymentIntent(intent: PaymentIntent): z.infer<typeof PaymentIntentSchema> {
  return {
    ...intent,
    created_at: intent.created_at.toISOString(),
    updated_at: intent.updated_at.toISOString(),
  };
}

/** Router whose request validation failures answer in the ledger's error shape. */
export function createRouter() {
  return new OpenAPIHono({
    defaultHook: (result, c) => {
      if (!result.success) {
        const message = result.error.issues
          .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
          .join("; ");
        return c.json({ error: message, code: "VALIDATION_ERROR" }, 400);
      }
    },
  });
}
