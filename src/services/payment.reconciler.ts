import {
  AccountNotFoundError,
  InvalidStateTransitionError,
  PaymentIntentNotFoundError,
} from "../errors";
import { paymentFailedEvent, type NotificationDispatcher } from "../events/eventEmitter";
import type { LedgerStore, UnitOfWork } from "../store/types";
import type { PaymentIntent, PaymentIntentStatus, TransferOutcome } from "../types";
import { logger } from "../utils/logger";
import { parseAmount, type AmountInput } from "../utils/money";
import type { TransferEngine } from "./transfer.engine";

export const PAYMENT_EVENT_TYPES = ["payment.succeeded", "payment.failed", "payment.expired"] as const;

export type PaymentEventType = (typeof PAYMENT_EVENT_TYPES)[number];

export interface PaymentEvent {
  intentId: string;
  type: PaymentEventType;
  errorMessage?: string;
}

export interface ReconcileResult {
  intent: PaymentIntent;
  /** Null when the event changed no money, including a repeat delivery. */
  outcome: TransferOutcome | null;
}

const TRANSITIONS: Record<PaymentIntentStatus, readonly PaymentIntentStatus[]> = {
  CREATED: ["PENDING", "SUCCEEDED", "FAILED", "EXPIRED"],
  PENDING: ["SUCCEEDED", "FAILED", "EXPIRED"],
  SUCCEEDED: [],
  FAILED: [],
  EXPIRED: [],
};

const EVENT_TARGETS: Record<PaymentEventType, "SUCCEEDED" | "FAILED" | "EXPIRED"> = {
  "payment.succeeded": "SUCCEEDED",
  "payment.failed": "FAILED",
  "payment.expired": "EXPIRED",
};

export function canTransition(from: PaymentIntentStatus, to: PaymentIntentStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

function assertTransition(from: PaymentIntentStatus, to: PaymentIntentStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidStateTransitionError(from, to);
  }
}

async function lockIntent(uow: UnitOfWork, intentId: string): Promise<PaymentIntent> {
  const intent = await uow.paymentIntents.getForUpdate(intentId);
  if (!intent) {
    throw new PaymentIntentNotFoundError(intentId);
  }
  return intent;
}

export interface PaymentReconcilerDeps {
  store: LedgerStore;
  engine: TransferEngine;
  notifier?: NotificationDispatcher;
}

/**
 * Turns payment-provider events into ledger deposits. A succeeded intent is
 * credited exactly once: the credit is keyed by the intent id, runs in the
 * same unit of work that marks the intent, and the intent row lock
 * serializes competing deliveries.
 */
export class PaymentReconciler {
  constructor(private readonly deps: PaymentReconcilerDeps) {}

  async createIntent(accountId: string, amount: AmountInput, description = ""): Promise<PaymentIntent> {
    const { store, engine } = this.deps;
    const value = parseAmount(amount, engine.scale);

    const account = await store.findAccountById(accountId);
    if (!account) {
      throw new AccountNotFoundError(accountId);
    }

    const intent = await store.withUnitOfWork((uow) =>
      uow.paymentIntents.insert({
        account_id: accountId,
        amount: value.toFixed(engine.scale),
        currency: engine.currency,
        description,
      }),
    );
    logger.info({ intentId: intent.id, accountId, amount: intent.amount }, "Payment intent created");
    return intent;
  }

  async getIntent(intentId: string): Promise<PaymentIntent> {
    const intent = await this.deps.store.findPaymentIntent(intentId);
    if (!intent) {
      throw new PaymentIntentNotFoundError(intentId);
    }
    return intent;
  }

  async listIntents(accountId: string): Promise<PaymentIntent[]> {
    const { store } = this.deps;
    if (!(await store.findAccountById(accountId))) {
      throw new AccountNotFoundError(accountId);
    }
    return store.listPaymentIntents(accountId);
  }

  async markPending(intentId: string): Promise<PaymentIntent> {
    return this.deps.store.withUnitOfWork(async (uow) => {
      const intent = await lockIntent(uow, intentId);
      if (intent.status === "PENDING") return intent;
      assertTransition(intent.status, "PENDING");
      return uow.paymentIntents.update(intentId, { status: "PENDING" });
    });
  }

  async handleEvent(event: PaymentEvent): Promise<ReconcileResult> {
    const target = EVENT_TARGETS[event.type];
    if (target === "SUCCEEDED") {
      return this.succeed(event.intentId);
    }
    return this.fail(event.intentId, target, event.errorMessage ?? null);
  }

  private async succeed(intentId: string): Promise<ReconcileResult> {
    const { store, engine } = this.deps;

    return store.withUnitOfWork(async (uow): Promise<ReconcileResult> => {
      const locked = await lockIntent(uow, intentId);
      if (locked.status === "SUCCEEDED") {
        logger.info({ intentId }, "Payment intent already processed");
        return { intent: locked, outcome: null };
      }
      assertTransition(locked.status, "SUCCEEDED");

      // Same unit of work: the deposit and the intent update commit together.
      const outcome = await engine.credit(locked.account_id, locked.amount, locked.id, {
        description: locked.description || `Deposit for payment intent ${locked.id}`,
        unitOfWork: uow,
      });

      const intent = await uow.paymentIntents.update(intentId, {
        status: "SUCCEEDED",
        transaction_id: outcome.transaction.id,
        error_message: null,
      });
      logger.info({ intentId, transactionId: outcome.transaction.id }, "Payment intent succeeded");
      return { intent, outcome };
    });
  }

  private async fail(
    intentId: string,
    target: "FAILED" | "EXPIRED",
    errorMessage: string | null,
  ): Promise<ReconcileResult> {
    const { intent, changed } = await this.deps.store.withUnitOfWork(async (uow) => {
      const locked = await lockIntent(uow, intentId);
      if (locked.status === target) return { intent: locked, changed: false };
      assertTransition(locked.status, target);
      const updated = await uow.paymentIntents.update(intentId, {
        status: target,
        error_message: errorMessage,
      });
      return { intent: updated, changed: true };
    });

    if (changed) {
      logger.warn({ intentId, status: target, errorMessage }, "Payment intent did not succeed");
      const { notifier } = this.deps;
      if (notifier) {
        void notifier.dispatch(paymentFailedEvent(intent)).catch((err: unknown) => {
          logger.error({ err, intentId }, "Notification dispatch failed");
        });
      }
    }

    return { intent, outcome: null };
  }
}
