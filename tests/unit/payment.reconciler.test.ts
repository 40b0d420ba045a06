import { beforeEach, describe, expect, test, vi } from "vitest";
import {
  AccountNotFoundError,
  InvalidAmountError,
  InvalidStateTransitionError,
  PaymentIntentNotFoundError,
} from "../../src/errors";
import { PaymentReconciler, canTransition } from "../../src/services/payment.reconciler";
import type { Account } from "../../src/types";
import { balanceOf, createHarness, openFundedAccount, type LedgerHarness } from "../fixtures/ledger";

describe("PaymentReconciler - Unit Tests", () => {
  let harness: LedgerHarness;
  let reconciler: PaymentReconciler;
  let alice: Account;

  beforeEach(async () => {
    harness = createHarness();
    reconciler = new PaymentReconciler({
      store: harness.store,
      engine: harness.engine,
      notifier: harness.notifier,
    });
    alice = await openFundedAccount(harness);
  });

  describe("createIntent()", () => {
    test("should create an intent in CREATED state", async () => {
      const intent = await reconciler.createIntent(alice.id, "50", "Card top-up");

      expect(intent).toMatchObject({
        account_id: alice.id,
        amount: "50.00",
        currency: "USD",
        description: "Card top-up",
        status: "CREATED",
        transaction_id: null,
        error_message: null,
      });
    });

    test("should validate account and amount", async () => {
      await expect(
        reconciler.createIntent("00000000-0000-0000-0000-000000000000", "50.00"),
      ).rejects.toBeInstanceOf(AccountNotFoundError);
      await expect(reconciler.createIntent(alice.id, "-1")).rejects.toBeInstanceOf(InvalidAmountError);
    });
  });

  describe("getIntent() / listIntents()", () => {
    test("should read back an intent", async () => {
      const intent = await reconciler.createIntent(alice.id, "50.00");

      expect(await reconciler.getIntent(intent.id)).toEqual(intent);
      await expect(
        reconciler.getIntent("00000000-0000-0000-0000-000000000000"),
      ).rejects.toBeInstanceOf(PaymentIntentNotFoundError);
    });

    test("should list an account's intents newest first", async () => {
      const first = await reconciler.createIntent(alice.id, "10.00");
      const second = await reconciler.createIntent(alice.id, "20.00");

      const intents = await reconciler.listIntents(alice.id);

      expect(intents.map((intent) => intent.id)).toEqual([second.id, first.id]);
      await expect(
        reconciler.listIntents("00000000-0000-0000-0000-000000000000"),
      ).rejects.toBeInstanceOf(AccountNotFoundError);
    });
  });

  describe("markPending()", () => {
    test("should move CREATED to PENDING and tolerate repeats", async () => {
      const intent = await reconciler.createIntent(alice.id, "50.00");

      expect((await reconciler.markPending(intent.id)).status).toBe("PENDING");
      expect((await reconciler.markPending(intent.id)).status).toBe("PENDING");
    });

    test("should refuse to reopen a settled intent", async () => {
      const intent = await reconciler.createIntent(alice.id, "50.00");
      await reconciler.handleEvent({ intentId: intent.id, type: "payment.succeeded" });

      await expect(reconciler.markPending(intent.id)).rejects.toBeInstanceOf(InvalidStateTransitionError);
    });
  });

  describe("handleEvent()", () => {
    test("should credit the wallet when a payment succeeds", async () => {
      const intent = await reconciler.createIntent(alice.id, "50.00");
      await reconciler.markPending(intent.id);

      const result = await reconciler.handleEvent({ intentId: intent.id, type: "payment.succeeded" });

      expect(result.intent.status).toBe("SUCCEEDED");
      expect(result.outcome?.status).toBe("COMPLETED");
      expect(result.outcome?.transaction).toMatchObject({
        transaction_type: "DEPOSIT",
        external_reference: intent.id,
        amount: "50.00",
      });
      expect(result.intent.transaction_id).toBe(result.outcome?.transaction.id);
      expect(await balanceOf(harness, alice.id)).toBe("50.00");
    });

    test("should credit exactly once for repeated deliveries", async () => {
      const intent = await reconciler.createIntent(alice.id, "50.00");
      const first = await reconciler.handleEvent({ intentId: intent.id, type: "payment.succeeded" });

      const second = await reconciler.handleEvent({ intentId: intent.id, type: "payment.succeeded" });

      expect(second.outcome).toBeNull();
      expect(second.intent.transaction_id).toBe(first.intent.transaction_id);
      expect(await balanceOf(harness, alice.id)).toBe("50.00");
    });

    test("should credit exactly once for concurrent deliveries", async () => {
      const intent = await reconciler.createIntent(alice.id, "50.00");

      const results = await Promise.all([
        reconciler.handleEvent({ intentId: intent.id, type: "payment.succeeded" }),
        reconciler.handleEvent({ intentId: intent.id, type: "payment.succeeded" }),
      ]);

      expect(results.filter((r) => r.outcome !== null)).toHaveLength(1);
      expect(await balanceOf(harness, alice.id)).toBe("50.00");
    });

    test("should credit even when the intent id was used as a transfer key", async () => {
      const payer = await openFundedAccount(harness, "10.00");
      const intent = await reconciler.createIntent(payer.id, "500.00");
      const transfer = await harness.engine.transfer(payer.id, alice.id, "1.00", "", intent.id);

      const result = await reconciler.handleEvent({ intentId: intent.id, type: "payment.succeeded" });

      expect(result.outcome).toMatchObject({ status: "COMPLETED", replayed: false });
      expect(result.outcome?.transaction.transaction_type).toBe("DEPOSIT");
      expect(result.intent.transaction_id).not.toBe(transfer.transaction.id);
      expect(await balanceOf(harness, payer.id)).toBe("509.00");
    });

    test("should let a later transfer reuse a settled intent id as its key", async () => {
      const payer = await openFundedAccount(harness, "10.00");
      const intent = await reconciler.createIntent(payer.id, "500.00");
      const result = await reconciler.handleEvent({ intentId: intent.id, type: "payment.succeeded" });

      const transfer = await harness.engine.transfer(payer.id, alice.id, "1.00", "", intent.id);

      expect(transfer.replayed).toBe(false);
      expect(transfer.transaction.transaction_type).toBe("TRANSFER");
      expect(transfer.transaction.id).not.toBe(result.intent.transaction_id);
      expect(await balanceOf(harness, payer.id)).toBe("509.00");
    });

    test("should roll back the deposit when the intent cannot be marked", async () => {
      const intent = await reconciler.createIntent(alice.id, "50.00");
      const withUnitOfWork = harness.store.withUnitOfWork.bind(harness.store);
      vi.spyOn(harness.store, "withUnitOfWork").mockImplementationOnce((work) =>
        withUnitOfWork((uow) => {
          vi.spyOn(uow.paymentIntents, "update").mockRejectedValueOnce(new Error("connection reset"));
          return work(uow);
        }),
      );

      await expect(
        reconciler.handleEvent({ intentId: intent.id, type: "payment.succeeded" }),
      ).rejects.toThrow("connection reset");

      expect(await balanceOf(harness, alice.id)).toBe("0.00");
      expect(await harness.store.findIdempotencyRecord(intent.id, alice.id, "DEPOSIT")).toBeNull();
      expect((await reconciler.getIntent(intent.id)).status).toBe("CREATED");
      expect(harness.notifier.events.filter((e) => e.eventType === "DEPOSIT_COMPLETED")).toHaveLength(0);

      const retried = await reconciler.handleEvent({ intentId: intent.id, type: "payment.succeeded" });

      expect(retried.outcome).toMatchObject({ status: "COMPLETED", replayed: false });
      expect(await balanceOf(harness, alice.id)).toBe("50.00");
    });

    test("should notify about the deposit only after it commits", async () => {
      const intent = await reconciler.createIntent(alice.id, "50.00");

      const result = await reconciler.handleEvent({ intentId: intent.id, type: "payment.succeeded" });

      const deposits = harness.notifier.events.filter((e) => e.eventType === "DEPOSIT_COMPLETED");
      expect(deposits).toHaveLength(1);
      expect(deposits[0]?.transactionId).toBe(result.outcome?.transaction.id);
      expect((await harness.wallets.getBalance(alice.id)).balance).toBe("50.00");
    });

    test("should record a failure and notify once", async () => {
      const intent = await reconciler.createIntent(alice.id, "50.00");
      await reconciler.markPending(intent.id);

      const result = await reconciler.handleEvent({
        intentId: intent.id,
        type: "payment.failed",
        errorMessage: "card declined",
      });
      await reconciler.handleEvent({ intentId: intent.id, type: "payment.failed", errorMessage: "card declined" });

      expect(result.intent).toMatchObject({ status: "FAILED", error_message: "card declined", transaction_id: null });
      expect(result.outcome).toBeNull();
      expect(await balanceOf(harness, alice.id)).toBe("0.00");

      const failures = harness.notifier.events.filter((e) => e.eventType === "PAYMENT_FAILED");
      expect(failures).toHaveLength(1);
      expect(failures[0]?.metadata).toEqual({
        paymentIntentId: intent.id,
        status: "FAILED",
        error: "card declined",
      });
    });

    test("should expire an intent", async () => {
      const intent = await reconciler.createIntent(alice.id, "50.00");

      const result = await reconciler.handleEvent({ intentId: intent.id, type: "payment.expired" });

      expect(result.intent.status).toBe("EXPIRED");
    });

    test("should reject success after failure without crediting", async () => {
      const intent = await reconciler.createIntent(alice.id, "50.00");
      await reconciler.handleEvent({ intentId: intent.id, type: "payment.failed" });

      await expect(
        reconciler.handleEvent({ intentId: intent.id, type: "payment.succeeded" }),
      ).rejects.toThrow("Cannot move payment intent from FAILED to SUCCEEDED");
      expect(await balanceOf(harness, alice.id)).toBe("0.00");
    });

    test("should reject failure after success", async () => {
      const intent = await reconciler.createIntent(alice.id, "50.00");
      await reconciler.handleEvent({ intentId: intent.id, type: "payment.succeeded" });

      await expect(
        reconciler.handleEvent({ intentId: intent.id, type: "payment.failed" }),
      ).rejects.toBeInstanceOf(InvalidStateTransitionError);
      expect(await balanceOf(harness, alice.id)).toBe("50.00");
    });

    test("should report an unknown intent", async () => {
      await expect(
        reconciler.handleEvent({ intentId: "00000000-0000-0000-0000-000000000000", type: "payment.succeeded" }),
      ).rejects.toBeInstanceOf(PaymentIntentNotFoundError);
    });
  });

  describe("canTransition()", () => {
    test("should allow only forward moves out of open states", () => {
      expect(canTransition("CREATED", "PENDING")).toBe(true);
      expect(canTransition("CREATED", "SUCCEEDED")).toBe(true);
      expect(canTransition("PENDING", "EXPIRED")).toBe(true);
      expect(canTransition("PENDING", "CREATED")).toBe(false);
      expect(canTransition("SUCCEEDED", "FAILED")).toBe(false);
      expect(canTransition("EXPIRED", "SUCCEEDED")).toBe(false);
    });
  });
});
