// Post-commit notifications for ledger events.
// Delivered to registered webhook subscribers; never called while wallet locks are held.

import { randomUUID } from "node:crypto";
import type { PaymentIntent, Transaction } from "../types";
import { logger } from "../utils/logger";
import { signPayload } from "../utils/signature";

export const LEDGER_EVENT_TYPES = [
  "TRANSFER_COMPLETED",
  "TRANSFER_FAILED",
  "DEPOSIT_COMPLETED",
  "PAYMENT_FAILED",
] as const;

export type LedgerEventType = (typeof LEDGER_EVENT_TYPES)[number];

export interface LedgerEvent {
  eventId: string;
  eventType: LedgerEventType;
  timestamp: Date;
  accountId: string;
  amount: string;
  currency: string;
  transactionId?: string;
  metadata?: Record<string, string | null>;
}

export interface WebhookSubscription {
  id: string;
  url: string;
  eventTypes: LedgerEventType[];
  secret?: string;
  active: boolean;
  createdAt: Date;
}

/** Outbound hook the engine fires after commit. */
export interface NotificationDispatcher {
  dispatch(event: LedgerEvent): Promise<void>;
}

export class EventEmitter implements NotificationDispatcher {
  private subscribers: Map<LedgerEventType, WebhookSubscription[]> = new Map();
  private eventHistory: LedgerEvent[] = [];

  constructor(
    private readonly maxHistorySize = 1000,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  subscribe(subscription: WebhookSubscription): void {
    for (const eventType of subscription.eventTypes) {
      const subs = this.subscribers.get(eventType) ?? [];
      subs.push(subscription);
      this.subscribers.set(eventType, subs);
    }
    logger.info(
      { subscriptionId: subscription.id, url: subscription.url, eventTypes: subscription.eventTypes },
      "Webhook subscribed",
    );
  }

  unsubscribe(subscriptionId: string): boolean {
    let removed = false;
    for (const [eventType, subs] of this.subscribers.entries()) {
      const filtered = subs.filter((sub) => sub.id !== subscriptionId);
      removed = removed || filtered.length !== subs.length;
      this.subscribers.set(eventType, filtered);
    }
    logger.info({ subscriptionId, removed }, "Webhook unsubscribed");
    return removed;
  }

  async dispatch(event: LedgerEvent): Promise<void> {
    this.eventHistory.push(event);
    if (this.eventHistory.length > this.maxHistorySize) {
      this.eventHistory.shift();
    }

    logger.debug({ eventType: event.eventType, accountId: event.accountId }, "Event emitted");

    const deliveries = (this.subscribers.get(event.eventType) ?? [])
      .filter((sub) => sub.active)
      .map((sub) => this.sendWebhook(sub, event));

    await Promise.allSettled(deliveries);
  }

  private async sendWebhook(subscription: WebhookSubscription, event: LedgerEvent): Promise<void> {
    const body = JSON.stringify({
      eventId: event.eventId,
      eventType: event.eventType,
      timestamp: event.timestamp.toISOString(),
      data: {
        accountId: event.accountId,
        amount: event.amount,
        currency: event.currency,
        transactionId: event.transactionId,
        metadata: event.metadata,
      },
    });

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "X-Event-Type": event.eventType,
      "X-Event-ID": event.eventId,
    };
    if (subscription.secret) {
      headers["X-Webhook-Signature"] = signPayload(body, subscription.secret);
    }

    try {
      const response = await this.fetchImpl(subscription.url, { method: "POST", headers, body });
      if (!response.ok) {
        throw new Error(`Webhook failed: ${response.status}`);
      }
      logger.info({ url: subscription.url, eventType: event.eventType }, "Webhook delivered");
    } catch (err) {
      logger.error({ err, url: subscription.url, eventId: event.eventId }, "Webhook delivery failed");
    }
  }

  getHistory(limit: number = 100): LedgerEvent[] {
    return this.eventHistory.slice(-limit);
  }

  listSubscriptions(): WebhookSubscription[] {
    const unique = new Map<string, WebhookSubscription>();
    for (const subs of this.subscribers.values()) {
      for (const sub of subs) {
        unique.set(sub.id, sub);
      }
    }
    return [...unique.values()];
  }
}

function baseEvent(eventType: LedgerEventType, accountId: string, amount: string, currency: string) {
  return {
    eventId: randomUUID(),
    eventType,
    timestamp: new Date(),
    accountId,
    amount,
    currency,
  };
}

export function transactionEvent(transaction: Transaction): LedgerEvent {
  if (transaction.transaction_type === "DEPOSIT") {
    return {
      ...baseEvent(
        "DEPOSIT_COMPLETED",
        transaction.destination_account_id,
        transaction.amount,
        transaction.currency,
      ),
      transactionId: transaction.id,
      metadata: { externalReference: transaction.external_reference },
    };
  }

  return {
    ...baseEvent(
      transaction.status === "COMPLETED" ? "TRANSFER_COMPLETED" : "TRANSFER_FAILED",
      transaction.initiator_id,
      transaction.amount,
      transaction.currency,
    ),
    transactionId: transaction.id,
    metadata: {
      destinationAccountId: transaction.destination_account_id,
      failureReason: transaction.failure_reason,
    },
  };
}

export function paymentFailedEvent(intent: PaymentIntent): LedgerEvent {
  return {
    ...baseEvent("PAYMENT_FAILED", intent.account_id, intent.amount, intent.currency),
    metadata: { paymentIntentId: intent.id, status: intent.status, error: intent.error_message },
  };
}
