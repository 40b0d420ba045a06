import { swaggerUI } from "@hono/swagger-ui";
import { OpenAPIHono } from "@hono/zod-openapi";
import { HTTPException } from "hono/http-exception";
import { logger as honoLogger } from "hono/logger";
import type { Container } from "./container";
import { LedgerError } from "./errors";
import { rateLimiter } from "./middlewares/rateLimiter";
import { metricsMiddleware } from "./monitoring/metrics";
import { createAccountRoutes } from "./routes/accounts";
import { createMetricsRoutes } from "./routes/metrics";
import { createPaymentRoutes } from "./routes/payments";
import { createWalletRoutes } from "./routes/wallet";
import { createWebhookRoutes } from "./routes/webhooks";
import { logger } from "./utils/logger";

const PROBE_ACCOUNT_ID = "00000000-0000-0000-0000-000000000000";

export function createApp(container: Container) {
  const { config } = container;
  const app = new OpenAPIHono();

  app.use(honoLogger((str) => logger.info(str)));
  app.use("*", metricsMiddleware());

  // Bypass rate limiting during tests and when no Redis is configured
  if (container.redis && config.NODE_ENV !== "test") {
    app.use(
      "*",
      rateLimiter({
        redis: container.redis,
        windowMs: config.RATE_LIMIT_WINDOW_MS,
        max: config.RATE_LIMIT_MAX,
        keyPrefix: "global",
      }),
    );
    app.use(
      "/wallet/*",
      rateLimiter({
        redis: container.redis,
        windowMs: config.RATE_LIMIT_WINDOW_MS,
        max: config.WALLET_RATE_LIMIT_MAX,
        keyPrefix: "wallet",
      }),
    );
  }

  app.onError((err, c) => {
    if (err instanceof LedgerError) {
      if (err.retryable) {
        c.header("Retry-After", "1");
      }
      return c.json(err.toJSON(), err.status);
    }
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    logger.error({ err, path: c.req.path }, "Unhandled error");
    return c.json({ error: "Internal server error", code: "INTERNAL_ERROR" }, 500);
  });

  app.get("/", (c) => {
    return c.json({
      service: "Wallet Ledger Service",
      version: "1.0.0",
      status: "running",
      endpoints: {
        accounts: "/accounts",
        wallet: "/wallet",
        payments: "/payments",
        webhooks: "/webhooks",
        metrics: "/metrics",
        health: "/metrics/health",
        swagger: "/swagger",
        docs: "/doc",
      },
    });
  });

  app.route("/accounts", createAccountRoutes(container));
  app.route("/wallet", createWalletRoutes(container));
  app.route("/payments", createPaymentRoutes(container, { webhookSecret: config.PAYMENT_WEBHOOK_SECRET }));
  app.route("/webhooks", createWebhookRoutes(container));
  app.route(
    "/metrics",
    createMetricsRoutes({
      readinessCheck: async () => {
        await container.store.findAccountById(PROBE_ACCOUNT_ID);
      },
    }),
  );

  app.doc("/doc", {
    openapi: "3.0.0",
    info: {
      version: "1.0.0",
      title: "Wallet Ledger API",
      description: "Accounts, wallet transfers, payment deposits, webhooks and metrics",
    },
  });

  app.get(
    "/swagger",
    swaggerUI({
      url: "/doc",
    }),
  );

  return app;
}
