import { createRoute, z } from "@hono/zod-openapi";
import { InvalidSignatureError } from "../errors";
import { PAYMENT_EVENT_TYPES, type PaymentReconciler } from "../services/payment.reconciler";
import { logger } from "../utils/logger";
import { verifySignature } from "../utils/signature";
import {
  createRouter,
  errorResponses,
  AmountSchema,
  PaymentIntentSchema,
  serializePaymentIntent,
} from "./schemas";

const IntentParams = z.object({
  intentId: z.string().openapi({ param: { name: "intentId", in: "path" } }),
});

const createIntentRoute = createRoute({
  method: "post",
  path: "/intents",
  request: {
    body: {
      content: {
        "application/json": {
          schema: z.object({
            accountId: z.string(),
            amount: AmountSchema,
            description: z.string().max(500).optional(),
          }),
        },
      },
    },
  },
  responses: {
    201: {
      content: { "application/json": { schema: PaymentIntentSchema } },
      description: "Payment intent created",
    },
    ...errorResponses,
  },
});

const getIntentRoute = createRoute({
  method: "get",
  path: "/intents/{intentId}",
  request: { params: IntentParams },
  responses: {
    200: {
      content: { "application/json": { schema: PaymentIntentSchema } },
      description: "Payment intent",
    },
    ...errorResponses,
  },
});

const listIntentsRoute = createRoute({
  method: "get",
  path: "/intents",
  request: {
    query: z.object({
      accountId: z.string().min(1),
    }),
  },
  responses: {
    200: {
      content: {
        "application/json": {
          schema: z.object({ items: z.array(PaymentIntentSchema) }),
        },
      },
      description: "Payment intents of an account, newest first",
    },
    ...errorResponses,
  },
});

const submitIntentRoute = createRoute({
  method: "post",
  path: "/intents/{intentId}/submit",
  request: { params: IntentParams },
  responses: {
    200: {
      content: { "application/json": { schema: PaymentIntentSchema } },
      description: "Intent handed to the provider and awaiting confirmation",
    },
    ...errorResponses,
  },
});

const WebhookPayloadSchema = z.object({
  event: z.enum(PAYMENT_EVENT_TYPES),
  payment_id: z.string().min(1),
  error_message: z.string().optional(),
});

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export interface PaymentRoutesOptions {
  /** HMAC secret shared with the payment provider. Unsigned webhooks are accepted only when unset. */
  webhookSecret?: string;
}

export function createPaymentRoutes(deps: { payments: PaymentReconciler }, options: PaymentRoutesOptions = {}) {
  const paymentRoutes = createRouter();

  paymentRoutes.openapi(createIntentRoute, async (c) => {
    const body = c.req.valid("json");
    const intent = await deps.payments.createIntent(body.accountId, body.amount, body.description);
    return c.json(serializePaymentIntent(intent), 201);
  });

  paymentRoutes.openapi(listIntentsRoute, async (c) => {
    const { accountId } = c.req.valid("query");
    const intents = await deps.payments.listIntents(accountId);
    return c.json({ items: intents.map(serializePaymentIntent) }, 200);
  });

  paymentRoutes.openapi(getIntentRoute, async (c) => {
    const { intentId } = c.req.valid("param");
    const intent = await deps.payments.getIntent(intentId);
    return c.json(serializePaymentIntent(intent), 200);
  });

  paymentRoutes.openapi(submitIntentRoute, async (c) => {
    const { intentId } = c.req.valid("param");
    const intent = await deps.payments.markPending(intentId);
    return c.json(serializePaymentIntent(intent), 200);
  });

  // Raw body is needed for the signature, so this one skips the OpenAPI validator
  paymentRoutes.post("/webhook", async (c) => {
    const raw = await c.req.text();

    if (options.webhookSecret) {
      const signature = c.req.header("x-signature") ?? "";
      if (!verifySignature(raw, signature, options.webhookSecret)) {
        throw new InvalidSignatureError();
      }
    } else {
      logger.warn("PAYMENT_WEBHOOK_SECRET not set, accepting unsigned payment webhook");
    }

    const parsed = WebhookPayloadSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      return c.json({ error: "Malformed payment webhook payload", code: "VALIDATION_ERROR" }, 400);
    }

    const { event, payment_id, error_message } = parsed.data;
    logger.info({ event, paymentId: payment_id }, "Payment webhook received");

    const result = await deps.payments.handleEvent({
      intentId: payment_id,
      type: event,
      errorMessage: error_message,
    });

    return c.json({
      intent: serializePaymentIntent(result.intent),
      transaction_id: result.outcome ? result.outcome.transaction.id : null,
      replayed: result.outcome ? result.outcome.replayed : null,
    });
  });

  return paymentRoutes;
}
