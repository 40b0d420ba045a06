import { beforeEach, describe, expect, test, vi } from "vitest";
import {
  AccountNotFoundError,
  InvalidAmountError,
  MissingIdempotencyKeyError,
  RecipientNotFoundError,
  SelfTransferNotAllowedError,
  VerificationRequiredError,
} from "../../src/errors";
import type { Account } from "../../src/types";
import { TransferEngine } from "../../src/services/transfer.engine";
import {
  TEST_ENGINE_CONFIG,
  balanceOf,
  createHarness,
  openFundedAccount,
  type LedgerHarness,
} from "../fixtures/ledger";
import { generateIdempotencyKey, testAmounts } from "../fixtures/transactions";

describe("TransferEngine - Unit Tests", () => {
  let harness: LedgerHarness;
  let alice: Account;
  let bob: Account;

  beforeEach(async () => {
    harness = createHarness();
    alice = await openFundedAccount(harness, "100.00");
    bob = await openFundedAccount(harness);
  });

  describe("transfer()", () => {
    test("should move funds between verified accounts", async () => {
      const outcome = await harness.engine.transfer(
        alice.id,
        bob.id,
        "30.00",
        "Dinner",
        generateIdempotencyKey("transfer"),
      );

      expect(outcome.status).toBe("COMPLETED");
      expect(outcome.replayed).toBe(false);
      expect(outcome.transaction.transaction_type).toBe("TRANSFER");
      expect(outcome.transaction.source_account_id).toBe(alice.id);
      expect(outcome.transaction.destination_account_id).toBe(bob.id);
      expect(outcome.transaction.amount).toBe("30.00");
      expect(outcome.transaction.description).toBe("Dinner");
      expect(outcome.transaction.completed_at).toBeInstanceOf(Date);

      expect(await balanceOf(harness, alice.id)).toBe("70.00");
      expect(await balanceOf(harness, bob.id)).toBe("30.00");
    });

    test("should accept numeric amounts and normalize them to the currency scale", async () => {
      const outcome = await harness.engine.transfer(alice.id, bob.id, 12.5, "", generateIdempotencyKey());

      expect(outcome.transaction.amount).toBe("12.50");
      expect(await balanceOf(harness, alice.id)).toBe("87.50");
    });

    test("should resolve the recipient by email, ignoring case", async () => {
      const outcome = await harness.engine.transfer(
        alice.id,
        bob.email.toUpperCase(),
        "5.00",
        "",
        generateIdempotencyKey(),
      );

      expect(outcome.transaction.destination_account_id).toBe(bob.id);
      expect(await balanceOf(harness, bob.id)).toBe("5.00");
    });

    test("should write a debit and a credit leg carrying post-transfer balances", async () => {
      const outcome = await harness.engine.transfer(alice.id, bob.id, "30.00", "", generateIdempotencyKey());
      const aliceWallet = await harness.store.findWalletByAccountId(alice.id);
      const bobWallet = await harness.store.findWalletByAccountId(bob.id);

      const entries = await harness.store.listLedgerEntries(outcome.transaction.id);

      expect(entries).toHaveLength(2);
      expect(entries[0]).toMatchObject({
        leg: "DEBIT",
        wallet_id: aliceWallet?.id,
        account_id: alice.id,
        amount: "30.00",
        balance_after: "70.00",
      });
      expect(entries[1]).toMatchObject({
        leg: "CREDIT",
        wallet_id: bobWallet?.id,
        account_id: bob.id,
        amount: "30.00",
        balance_after: "30.00",
      });
    });

    test("should replay the original outcome for a repeated idempotency key", async () => {
      const key = generateIdempotencyKey("replay");
      const first = await harness.engine.transfer(alice.id, bob.id, "30.00", "", key);
      const second = await harness.engine.transfer(alice.id, bob.id, "30.00", "", key);

      expect(second.replayed).toBe(true);
      expect(second.status).toBe("COMPLETED");
      expect(second.transaction.id).toBe(first.transaction.id);
      expect(await balanceOf(harness, alice.id)).toBe("70.00");
      expect(await balanceOf(harness, bob.id)).toBe("30.00");
    });

    test("should replay from the durable record when the cache is empty", async () => {
      const key = generateIdempotencyKey("replay-durable");
      const first = await harness.engine.transfer(alice.id, bob.id, "30.00", "", key);
      const uncached = new TransferEngine({
        store: harness.store,
        config: TEST_ENGINE_CONFIG,
        verification: harness.accounts,
      });

      const second = await uncached.transfer(alice.id, bob.id, "30.00", "", key);

      expect(second.replayed).toBe(true);
      expect(second.transaction.id).toBe(first.transaction.id);
      expect(await balanceOf(harness, alice.id)).toBe("70.00");
    });

    test("should return the stored outcome when a key is reused with a different amount", async () => {
      const key = generateIdempotencyKey("mismatch");
      await harness.engine.transfer(alice.id, bob.id, "30.00", "", key);

      const reused = await harness.engine.transfer(alice.id, bob.id, "45.00", "", key);

      expect(reused.replayed).toBe(true);
      expect(reused.transaction.amount).toBe("30.00");
      expect(await balanceOf(harness, alice.id)).toBe("70.00");
    });

    test("should scope idempotency keys to the initiator", async () => {
      const key = generateIdempotencyKey("shared");
      await harness.engine.transfer(alice.id, bob.id, "10.00", "", key);

      const outcome = await harness.engine.transfer(bob.id, alice.id, "4.00", "", key);

      expect(outcome.replayed).toBe(false);
      expect(await balanceOf(harness, alice.id)).toBe("94.00");
      expect(await balanceOf(harness, bob.id)).toBe("6.00");
    });

    test("should record insufficient funds as a failed transaction", async () => {
      const outcome = await harness.engine.transfer(alice.id, bob.id, "150.00", "", generateIdempotencyKey());

      expect(outcome.status).toBe("FAILED");
      if (outcome.status !== "FAILED") return;
      expect(outcome.failure_reason).toBe("INSUFFICIENT_FUNDS");
      expect(outcome.transaction.status).toBe("FAILED");
      expect(await balanceOf(harness, alice.id)).toBe("100.00");
      expect(await balanceOf(harness, bob.id)).toBe("0.00");
      expect(await harness.store.listLedgerEntries(outcome.transaction.id)).toEqual([]);
    });

    test("should keep replaying a failure even after the sender is funded", async () => {
      const key = generateIdempotencyKey("failed-replay");
      const first = await harness.engine.transfer(alice.id, bob.id, "150.00", "", key);
      await harness.engine.credit(alice.id, "100.00", generateIdempotencyKey("top-up"));

      const retry = await harness.engine.transfer(alice.id, bob.id, "150.00", "", key);

      expect(retry.status).toBe("FAILED");
      expect(retry.replayed).toBe(true);
      expect(retry.transaction.id).toBe(first.transaction.id);
      expect(await balanceOf(harness, alice.id)).toBe("200.00");
    });

    test("should allow spending the exact balance", async () => {
      const outcome = await harness.engine.transfer(alice.id, bob.id, "100.00", "", generateIdempotencyKey());

      expect(outcome.status).toBe("COMPLETED");
      expect(await balanceOf(harness, alice.id)).toBe("0.00");
    });

    test("should reject a transfer to yourself before writing anything", async () => {
      await expect(
        harness.engine.transfer(alice.id, alice.id, "10.00", "", generateIdempotencyKey()),
      ).rejects.toBeInstanceOf(SelfTransferNotAllowedError);

      const history = await harness.store.listTransactions(alice.id, { limit: 10 });
      expect(history).toHaveLength(1); // the funding deposit
    });

    test("should reject a transfer to your own email", async () => {
      await expect(
        harness.engine.transfer(alice.id, alice.email, "10.00", "", generateIdempotencyKey()),
      ).rejects.toBeInstanceOf(SelfTransferNotAllowedError);
    });

    test("should require an idempotency key", async () => {
      await expect(harness.engine.transfer(alice.id, bob.id, "10.00", "", undefined)).rejects.toBeInstanceOf(
        MissingIdempotencyKeyError,
      );
      await expect(harness.engine.transfer(alice.id, bob.id, "10.00", "", "   ")).rejects.toBeInstanceOf(
        MissingIdempotencyKeyError,
      );
    });

    test.each([testAmounts.zero, testAmounts.negative, testAmounts.tooPrecise, "ten"])(
      "should reject amount %s before resolving the recipient",
      async (amount) => {
        await expect(
          harness.engine.transfer(alice.id, "nobody", amount, "", generateIdempotencyKey()),
        ).rejects.toBeInstanceOf(InvalidAmountError);
      },
    );

    test("should report an unknown recipient", async () => {
      await expect(
        harness.engine.transfer(alice.id, "ghost@example.com", "10.00", "", generateIdempotencyKey()),
      ).rejects.toThrow("Recipient not found: ghost@example.com");
      await expect(
        harness.engine.transfer(alice.id, "not-an-account", "10.00", "", generateIdempotencyKey()),
      ).rejects.toBeInstanceOf(RecipientNotFoundError);
    });

    test("should refuse an unverified sender", async () => {
      const pending = await openFundedAccount(harness, "50.00", "PENDING");

      await expect(
        harness.engine.transfer(pending.id, bob.id, "10.00", "", generateIdempotencyKey()),
      ).rejects.toThrow("Sender is not verified to perform transactions (status: pending)");
      expect(await balanceOf(harness, pending.id)).toBe("50.00");
    });

    test("should refuse a rejected recipient", async () => {
      const rejected = await openFundedAccount(harness, undefined, "REJECTED");

      await expect(
        harness.engine.transfer(alice.id, rejected.id, "10.00", "", generateIdempotencyKey()),
      ).rejects.toBeInstanceOf(VerificationRequiredError);
    });

    test("should skip verification when it is disabled", async () => {
      const relaxed = createHarness({ requireVerification: false });
      const sender = await openFundedAccount(relaxed, "20.00", "PENDING");
      const recipient = await openFundedAccount(relaxed, undefined, "PENDING");

      const outcome = await relaxed.engine.transfer(sender.id, recipient.id, "20.00", "", generateIdempotencyKey());

      expect(outcome.status).toBe("COMPLETED");
    });

    test("should notify once per committed transfer", async () => {
      const key = generateIdempotencyKey("notify");
      const outcome = await harness.engine.transfer(alice.id, bob.id, "30.00", "", key);
      await harness.engine.transfer(alice.id, bob.id, "30.00", "", key);

      const transferEvents = harness.notifier.events.filter((e) => e.eventType === "TRANSFER_COMPLETED");
      expect(transferEvents).toHaveLength(1);
      expect(transferEvents[0]).toMatchObject({
        accountId: alice.id,
        amount: "30.00",
        currency: "USD",
        transactionId: outcome.transaction.id,
        metadata: { destinationAccountId: bob.id, failureReason: null },
      });
    });

    test("should notify about a recorded failure", async () => {
      await harness.engine.transfer(alice.id, bob.id, "500.00", "", generateIdempotencyKey());

      const last = harness.notifier.events[harness.notifier.events.length - 1];
      expect(last?.eventType).toBe("TRANSFER_FAILED");
      expect(last?.metadata).toEqual({ destinationAccountId: bob.id, failureReason: "INSUFFICIENT_FUNDS" });
    });

    test("should roll back every write when the unit of work fails midway", async () => {
      const key = generateIdempotencyKey("rollback");
      const withUnitOfWork = harness.store.withUnitOfWork.bind(harness.store);
      vi.spyOn(harness.store, "withUnitOfWork").mockImplementationOnce((work) =>
        withUnitOfWork((uow) => {
          vi.spyOn(uow.ledger, "record").mockRejectedValueOnce(new Error("disk full"));
          return work(uow);
        }),
      );

      await expect(harness.engine.transfer(alice.id, bob.id, "40.00", "", key)).rejects.toThrow("disk full");

      expect(await balanceOf(harness, alice.id)).toBe("100.00");
      expect(await balanceOf(harness, bob.id)).toBe("0.00");
      expect(await harness.store.findIdempotencyRecord(key, alice.id, "TRANSFER")).toBeNull();
      const rows = await harness.store.listTransactions(alice.id, { limit: 10 });
      expect(rows.map((row) => row.transaction_type)).toEqual(["DEPOSIT"]);

      const retried = await harness.engine.transfer(alice.id, bob.id, "40.00", "", key);

      expect(retried).toMatchObject({ status: "COMPLETED", replayed: false });
      expect(await balanceOf(harness, alice.id)).toBe("60.00");
      expect(await balanceOf(harness, bob.id)).toBe("40.00");
    });

    test("should not replay a deposit that used the same key", async () => {
      const deposit = await harness.engine.credit(alice.id, "40.00", "shared-ref-1");

      const outcome = await harness.engine.transfer(alice.id, bob.id, "10.00", "", "shared-ref-1");

      expect(outcome.replayed).toBe(false);
      expect(outcome.transaction.transaction_type).toBe("TRANSFER");
      expect(outcome.transaction.id).not.toBe(deposit.transaction.id);
      expect(await balanceOf(harness, alice.id)).toBe("130.00");
      expect(await balanceOf(harness, bob.id)).toBe("10.00");
    });

    test("should refresh cached balances of both parties", async () => {
      expect((await harness.wallets.getBalance(alice.id)).balance).toBe("100.00");
      expect((await harness.wallets.getBalance(bob.id)).balance).toBe("0.00");

      await harness.engine.transfer(alice.id, bob.id, "30.00", "", generateIdempotencyKey());

      expect((await harness.wallets.getBalance(alice.id)).balance).toBe("70.00");
      expect((await harness.wallets.getBalance(bob.id)).balance).toBe("30.00");
    });
  });

  describe("credit()", () => {
    test("should deposit with an external debit leg", async () => {
      const outcome = await harness.engine.credit(bob.id, "25.00", "psp-ref-1", { description: "Card top-up" });

      expect(outcome.status).toBe("COMPLETED");
      expect(outcome.transaction).toMatchObject({
        transaction_type: "DEPOSIT",
        source_account_id: null,
        destination_account_id: bob.id,
        initiator_id: bob.id,
        idempotency_key: "psp-ref-1",
        external_reference: "psp-ref-1",
        description: "Card top-up",
      });
      expect(await balanceOf(harness, bob.id)).toBe("25.00");

      const entries = await harness.store.listLedgerEntries(outcome.transaction.id);
      expect(entries.map((e) => [e.leg, e.wallet_id === null, e.balance_after])).toEqual([
        ["DEBIT", true, null],
        ["CREDIT", false, "25.00"],
      ]);
    });

    test("should credit once per external reference", async () => {
      const first = await harness.engine.credit(bob.id, "25.00", "psp-ref-2");
      const second = await harness.engine.credit(bob.id, "25.00", "psp-ref-2");

      expect(second.replayed).toBe(true);
      expect(second.transaction.id).toBe(first.transaction.id);
      expect(await balanceOf(harness, bob.id)).toBe("25.00");
    });

    test("should not replay a transfer that used the same key", async () => {
      const transfer = await harness.engine.transfer(alice.id, bob.id, "10.00", "", "shared-ref-2");

      const deposit = await harness.engine.credit(alice.id, "40.00", "shared-ref-2");

      expect(deposit.replayed).toBe(false);
      expect(deposit.transaction.transaction_type).toBe("DEPOSIT");
      expect(deposit.transaction.id).not.toBe(transfer.transaction.id);
      expect(await balanceOf(harness, alice.id)).toBe("130.00");
    });

    test("should emit a deposit event", async () => {
      const outcome = await harness.engine.credit(bob.id, "25.00", "psp-ref-3");

      const last = harness.notifier.events[harness.notifier.events.length - 1];
      expect(last).toMatchObject({
        eventType: "DEPOSIT_COMPLETED",
        accountId: bob.id,
        transactionId: outcome.transaction.id,
        metadata: { externalReference: "psp-ref-3" },
      });
    });

    test("should reject unknown accounts and missing references", async () => {
      await expect(
        harness.engine.credit("00000000-0000-0000-0000-000000000000", "5.00", "psp-ref-4"),
      ).rejects.toBeInstanceOf(AccountNotFoundError);
      await expect(harness.engine.credit(bob.id, "5.00", "")).rejects.toBeInstanceOf(
        MissingIdempotencyKeyError,
      );
    });
  });
});
