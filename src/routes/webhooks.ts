import { randomUUID } from "node:crypto";
import { createRoute, z } from "@hono/zod-openapi";
import {
  LEDGER_EVENT_TYPES,
  type EventEmitter,
  type WebhookSubscription,
} from "../events/eventEmitter";
import { createRouter, errorResponses } from "./schemas";

const eventTypeEnum = z.enum(LEDGER_EVENT_TYPES);

const SubscriptionSchema = z.object({
  id: z.string(),
  url: z.string(),
  eventTypes: z.array(eventTypeEnum),
  active: z.boolean(),
});

// Register webhook
const registerRoute = createRoute({
  method: "post",
  path: "/register",
  request: {
    body: {
      content: {
        "application/json": {
          schema: z.object({
            url: z.string().url(),
            eventTypes: z.array(eventTypeEnum).min(1),
            secret: z.string().optional(),
          }),
        },
      },
    },
  },
  responses: {
    200: {
      content: {
        "application/json": {
          schema: z.object({
            subscriptionId: z.string(),
            message: z.string(),
          }),
        },
      },
      description: "Webhook registered successfully",
    },
    400: errorResponses[400],
  },
});

// Unregister webhook
const unregisterRoute = createRoute({
  method: "delete",
  path: "/{subscriptionId}",
  request: {
    params: z.object({
      subscriptionId: z.string().openapi({ param: { name: "subscriptionId", in: "path" } }),
    }),
  },
  responses: {
    200: {
      content: {
        "application/json": {
          schema: z.object({
            message: z.string(),
            removed: z.boolean(),
          }),
        },
      },
      description: "Webhook unregistered",
    },
  },
});

// List webhooks
const listRoute = createRoute({
  method: "get",
  path: "/list",
  responses: {
    200: {
      content: {
        "application/json": {
          schema: z.object({ subscriptions: z.array(SubscriptionSchema) }),
        },
      },
      description: "List of all webhooks",
    },
  },
});

// Get event history
const eventsRoute = createRoute({
  method: "get",
  path: "/events",
  responses: {
    200: {
      content: {
        "application/json": {
          schema: z.object({
            events: z.array(
              z.object({
                eventId: z.string(),
                eventType: eventTypeEnum,
                timestamp: z.string(),
                accountId: z.string(),
                amount: z.string(),
                currency: z.string(),
                transactionId: z.string().nullable(),
              }),
            ),
          }),
        },
      },
      description: "Recent event history",
    },
  },
});

export function createWebhookRoutes(deps: { events: EventEmitter }) {
  const webhookRoutes = createRouter();

  webhookRoutes.openapi(registerRoute, async (c) => {
    const body = c.req.valid("json");

    const subscription: WebhookSubscription = {
      id: randomUUID(),
      url: body.url,
      eventTypes: body.eventTypes,
      secret: body.secret,
      active: true,
      createdAt: new Date(),
    };

    deps.events.subscribe(subscription);

    return c.json(
      {
        subscriptionId: subscription.id,
        message: "Webhook registered successfully",
      },
      200,
    );
  });

  webhookRoutes.openapi(listRoute, async (c) => {
    const subscriptions = deps.events.listSubscriptions().map((sub) => ({
      id: sub.id,
      url: sub.url,
      eventTypes: sub.eventTypes,
      active: sub.active,
    }));

    return c.json({ subscriptions }, 200);
  });

  webhookRoutes.openapi(eventsRoute, async (c) => {
    const history = deps.events.getHistory(100);

    return c.json(
      {
        events: history.map((event) => ({
          eventId: event.eventId,
          eventType: event.eventType,
          timestamp: event.timestamp.toISOString(),
          accountId: event.accountId,
          amount: event.amount,
          currency: event.currency,
          transactionId: event.transactionId ?? null,
        })),
      },
      200,
    );
  });

  webhookRoutes.openapi(unregisterRoute, async (c) => {
    const { subscriptionId } = c.req.valid("param");
    const removed = deps.events.unsubscribe(subscriptionId);

    return c.json(
      {
        message: removed ? "Webhook unregistered successfully" : "No such webhook",
        removed,
      },
      200,
    );
  });

  return webhookRoutes;
}
