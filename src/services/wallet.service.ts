import { cacheKeys, type KeyValueCache } from "../cache/cache";
import { AccountNotFoundError } from "../errors";
import type { LedgerStore } from "../store/types";
import type { HistoryItem, HistoryPage, LedgerEntry, Transaction } from "../types";
import { decodeCursor, encodeCursor } from "../utils/cursor";
import { formatAmount } from "../utils/money";

export interface WalletServiceOptions {
  currency: string;
  scale: number;
  balanceCacheTtlSeconds: number;
  maxPageSize: number;
}

export interface Balance {
  account_id: string;
  balance: string;
  currency: string;
}

export interface HistoryOptions {
  limit?: number;
  cursor?: string;
}

const DEFAULT_PAGE_SIZE = 20;

/** Read side of the ledger. Never takes a lock. */
export class WalletService {
  constructor(
    private readonly store: LedgerStore,
    private readonly options: WalletServiceOptions,
    private readonly cache?: KeyValueCache,
  ) {}

  async getBalance(accountId: string): Promise<Balance> {
    const cacheKey = cacheKeys.balance(accountId);
    const cached = await this.cache?.getVersioned(cacheKey);
    if (cached) {
      return { account_id: accountId, balance: cached.value, currency: this.options.currency };
    }

    const wallet = await this.store.findWalletByAccountId(accountId);
    if (!wallet) {
      throw new AccountNotFoundError(accountId);
    }

    const balance = formatAmount(wallet.balance, this.options.scale);
    // Skipped when a transfer committed a newer version since our read
    await this.cache?.setVersioned(
      cacheKey,
      { version: wallet.version, value: balance },
      this.options.balanceCacheTtlSeconds,
    );

    return { account_id: accountId, balance, currency: wallet.currency };
  }

  // Newest first, keyset-paginated on commit sequence.
  async getHistory(accountId: string, options: HistoryOptions = {}): Promise<HistoryPage> {
    const limit = Math.min(Math.max(options.limit ?? DEFAULT_PAGE_SIZE, 1), this.options.maxPageSize);
    const beforeSequence = options.cursor ? decodeCursor(options.cursor) : undefined;

    const account = await this.store.findAccountById(accountId);
    if (!account) {
      throw new AccountNotFoundError(accountId);
    }

    const rows = await this.store.listTransactions(accountId, { limit: limit + 1, beforeSequence });
    const page = rows.slice(0, limit);
    const last = page[page.length - 1];

    return {
      items: page.map((transaction): HistoryItem => ({
        ...transaction,
        direction: transaction.source_account_id === accountId ? "SENT" : "RECEIVED",
      })),
      next_cursor: rows.length > limit && last ? encodeCursor(last.sequence) : null,
    };
  }

  async getTransaction(transactionId: string): Promise<Transaction | null> {
    return this.store.findTransaction(transactionId);
  }

  async getLedgerEntries(transactionId: string): Promise<LedgerEntry[]> {
    return this.store.listLedgerEntries(transactionId);
  }
}
