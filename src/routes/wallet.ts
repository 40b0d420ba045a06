import { createRoute, z } from "@hono/zod-openapi";
import { TransactionNotFoundError } from "../errors";
import type { TransferEngine } from "../services/transfer.engine";
import type { WalletService } from "../services/wallet.service";
import {
  createRouter,
  errorResponses,
  AmountSchema,
  LedgerEntrySchema,
  TransactionSchema,
  TransferResultSchema,
  serializeLedgerEntry,
  serializeOutcome,
  serializeTransaction,
} from "./schemas";

const AccountParams = z.object({
  accountId: z.string().openapi({ param: { name: "accountId", in: "path" } }),
});

const transferRoute = createRoute({
  method: "post",
  path: "/transfer",
  request: {
    headers: z.object({
      "idempotency-key": z.string().optional(),
    }),
    body: {
      content: {
        "application/json": {
          schema: z.object({
            initiatorId: z.string().openapi("initiatorId"),
            to: z.string().openapi({ description: "Recipient account id or email" }),
            amount: AmountSchema,
            description: z.string().max(500).optional(),
            idempotencyKey: z.string().optional(),
          }),
        },
      },
    },
  },
  responses: {
    201: {
      content: { "application/json": { schema: TransferResultSchema } },
      description: "Transfer completed",
    },
    200: {
      content: { "application/json": { schema: TransferResultSchema } },
      description: "Replay of an earlier request with the same idempotency key",
    },
    402: {
      content: { "application/json": { schema: TransferResultSchema } },
      description: "Insufficient funds; the failure is recorded and replayed on retry",
    },
    403: {
      content: { "application/json": { schema: z.object({ error: z.string(), code: z.string() }) } },
      description: "Sender or recipient not verified",
    },
    ...errorResponses,
  },
});

const balanceRoute = createRoute({
  method: "get",
  path: "/{accountId}/balance",
  request: { params: AccountParams },
  responses: {
    200: {
      content: {
        "application/json": {
          schema: z.object({
            account_id: z.string(),
            balance: z.string(),
            currency: z.string(),
          }),
        },
      },
      description: "Current wallet balance",
    },
    ...errorResponses,
  },
});

const historyRoute = createRoute({
  method: "get",
  path: "/{accountId}/transactions",
  request: {
    params: AccountParams,
    query: z.object({
      limit: z.coerce.number().int().positive().optional(),
      cursor: z.string().optional(),
    }),
  },
  responses: {
    200: {
      content: {
        "application/json": {
          schema: z.object({
            items: z.array(TransactionSchema.extend({ direction: z.enum(["SENT", "RECEIVED"]) })),
            next_cursor: z.string().nullable(),
          }),
        },
      },
      description: "Transactions touching the account, newest first",
    },
    ...errorResponses,
  },
});

const ledgerRoute = createRoute({
  method: "get",
  path: "/transactions/{transactionId}/ledger",
  request: {
    params: z.object({
      transactionId: z.string().openapi({ param: { name: "transactionId", in: "path" } }),
    }),
  },
  responses: {
    200: {
      content: {
        "application/json": {
          schema: z.object({
            transaction: TransactionSchema,
            entries: z.array(LedgerEntrySchema),
          }),
        },
      },
      description: "Double-entry legs of a transaction",
    },
    ...errorResponses,
  },
});

export function createWalletRoutes(deps: { engine: TransferEngine; wallets: WalletService }) {
  const walletRoutes = createRouter();

  walletRoutes.openapi(transferRoute, async (c) => {
    const body = c.req.valid("json");
    const headers = c.req.valid("header");

    const outcome = await deps.engine.transfer(
      body.initiatorId,
      body.to,
      body.amount,
      body.description ?? "",
      body.idempotencyKey ?? headers["idempotency-key"],
    );

    const result = serializeOutcome(outcome);
    if (outcome.status === "FAILED") {
      return c.json(result, 402);
    }
    if (outcome.replayed) {
      return c.json(result, 200);
    }
    return c.json(result, 201);
  });

  walletRoutes.openapi(balanceRoute, async (c) => {
    const { accountId } = c.req.valid("param");
    const balance = await deps.wallets.getBalance(accountId);
    return c.json(balance, 200);
  });

  walletRoutes.openapi(historyRoute, async (c) => {
    const { accountId } = c.req.valid("param");
    const { limit, cursor } = c.req.valid("query");

    const page = await deps.wallets.getHistory(accountId, { limit, cursor });

    return c.json(
      {
        items: page.items.map((item) => ({ ...serializeTransaction(item), direction: item.direction })),
        next_cursor: page.next_cursor,
      },
      200,
    );
  });

  walletRoutes.openapi(ledgerRoute, async (c) => {
    const { transactionId } = c.req.valid("param");

    const transaction = await deps.wallets.getTransaction(transactionId);
    if (!transaction) {
      throw new TransactionNotFoundError(transactionId);
    }
    const entries = await deps.wallets.getLedgerEntries(transactionId);

    return c.json(
      {
        transaction: serializeTransaction(transaction),
        entries: entries.map(serializeLedgerEntry),
      },
      200,
    );
  });

  return walletRoutes;
}
