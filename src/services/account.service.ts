import type { LedgerStore } from "../store/types";
import type { Account, VerificationStatus, Wallet } from "../types";
import { AccountNotFoundError } from "../errors";
import { logger } from "../utils/logger";
import type { VerificationProvider, VerificationState } from "./transfer.engine";

export interface OpenAccountInput {
  email: string;
  verificationStatus?: VerificationStatus;
}

const VERIFICATION_STATES: Record<VerificationStatus, VerificationState> = {
  PENDING: "pending",
  APPROVED: "approved",
  REJECTED: "rejected",
};

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Account provisioning. Every account gets exactly one wallet, created in the
 * same unit of work, so no account is ever observable without one.
 */
export class AccountService implements VerificationProvider {
  constructor(
    private readonly store: LedgerStore,
    private readonly currency: string,
  ) {}

  async openAccount(input: OpenAccountInput): Promise<{ account: Account; wallet: Wallet }> {
    const email = normalizeEmail(input.email);

    const result = await this.store.withUnitOfWork(async (uow) => {
      const account = await uow.accounts.insert({
        email,
        verification_status: input.verificationStatus ?? "PENDING",
      });
      const wallet = await uow.wallets.create(account.id, this.currency);
      return { account, wallet };
    });

    logger.info({ accountId: result.account.id, walletId: result.wallet.id }, "Account opened");
    return result;
  }

  async getAccount(accountId: string): Promise<Account> {
    const account = await this.store.findAccountById(accountId);
    if (!account) {
      throw new AccountNotFoundError(accountId);
    }
    return account;
  }

  async setVerificationStatus(accountId: string, status: VerificationStatus): Promise<Account> {
    const account = await this.store.withUnitOfWork((uow) =>
      uow.accounts.updateVerificationStatus(accountId, status),
    );
    if (!account) {
      throw new AccountNotFoundError(accountId);
    }
    logger.info({ accountId, status }, "Verification status updated");
    return account;
  }

  // Unknown accounts read as unverified.
  async getStatus(accountId: string): Promise<VerificationState> {
    const account = await this.store.findAccountById(accountId);
    return account ? VERIFICATION_STATES[account.verification_status] : "pending";
  }
}
