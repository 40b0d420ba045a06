import { createRoute, z } from "@hono/zod-openapi";
import type { AccountService } from "../services/account.service";
import {
  createRouter,
  errorResponses,
  AccountSchema,
  WalletSchema,
  serializeAccount,
  serializeWallet,
} from "./schemas";

const VerificationStatusSchema = z.enum(["PENDING", "APPROVED", "REJECTED"]);

const openAccountRoute = createRoute({
  method: "post",
  path: "/",
  request: {
    body: {
      content: {
        "application/json": {
          schema: z.object({
            email: z.string().email(),
            verificationStatus: VerificationStatusSchema.optional(),
          }),
        },
      },
    },
  },
  responses: {
    201: {
      content: {
        "application/json": {
          schema: z.object({ account: AccountSchema, wallet: WalletSchema }),
        },
      },
      description: "Account and its wallet created",
    },
    ...errorResponses,
  },
});

const AccountParams = z.object({
  accountId: z.string().openapi({ param: { name: "accountId", in: "path" } }),
});

const getAccountRoute = createRoute({
  method: "get",
  path: "/{accountId}",
  request: { params: AccountParams },
  responses: {
    200: {
      content: { "application/json": { schema: AccountSchema } },
      description: "Account details",
    },
    ...errorResponses,
  },
});

const verificationRoute = createRoute({
  method: "put",
  path: "/{accountId}/verification",
  request: {
    params: AccountParams,
    body: {
      content: {
        "application/json": {
          schema: z.object({ status: VerificationStatusSchema }),
        },
      },
    },
  },
  responses: {
    200: {
      content: { "application/json": { schema: AccountSchema } },
      description: "Verification status updated",
    },
    ...errorResponses,
  },
});

export function createAccountRoutes(deps: { accounts: AccountService }) {
  const accountRoutes = createRouter();

  accountRoutes.openapi(openAccountRoute, async (c) => {
    const body = c.req.valid("json");
    const { account, wallet } = await deps.accounts.openAccount({
      email: body.email,
      verificationStatus: body.verificationStatus,
    });
    return c.json({ account: serializeAccount(account), wallet: serializeWallet(wallet) }, 201);
  });

  accountRoutes.openapi(getAccountRoute, async (c) => {
    const { accountId } = c.req.valid("param");
    const account = await deps.accounts.getAccount(accountId);
    return c.json(serializeAccount(account), 200);
  });

  accountRoutes.openapi(verificationRoute, async (c) => {
    const { accountId } = c.req.valid("param");
    const { status } = c.req.valid("json");
    const account = await deps.accounts.setVerificationStatus(accountId, status);
    return c.json(serializeAccount(account), 200);
  });

  return accountRoutes;
}
