import type Redis from "ioredis";
import { MemoryCache, RedisCache, type KeyValueCache } from "./cache/cache";
import { toEngineConfig, type Configuration } from "./config";
import { createSql } from "./db/index";
import { createRedis } from "./db/redis";
import { EventEmitter } from "./events/eventEmitter";
import { AccountService } from "./services/account.service";
import { PaymentReconciler } from "./services/payment.reconciler";
import { TransferEngine } from "./services/transfer.engine";
import { WalletService } from "./services/wallet.service";
import { MemoryLedgerStore } from "./store/memory.store";
import { PostgresLedgerStore } from "./store/postgres.store";
import type { LedgerStore } from "./store/types";
import { logger } from "./utils/logger";

export interface Container {
  config: Configuration;
  store: LedgerStore;
  cache?: KeyValueCache;
  redis?: Redis;
  events: EventEmitter;
  engine: TransferEngine;
  accounts: AccountService;
  wallets: WalletService;
  payments: PaymentReconciler;
  close(): Promise<void>;
}

export interface ContainerOverrides {
  store?: LedgerStore;
  cache?: KeyValueCache;
  events?: EventEmitter;
}

function createStore(config: Configuration): LedgerStore {
  if (config.STORE_DRIVER === "memory") {
    logger.warn("Using the in-memory ledger store; balances do not survive a restart");
    return new MemoryLedgerStore({ lockTimeoutMs: config.LOCK_TIMEOUT_MS, scale: config.CURRENCY_SCALE });
  }
  return new PostgresLedgerStore(createSql(config.DATABASE_URL, config.DATABASE_POOL_SIZE), {
    lockTimeoutMs: config.LOCK_TIMEOUT_MS,
    statementTimeoutMs: config.STATEMENT_TIMEOUT_MS,
  });
}

// A process-local cache is only coherent when the store is process-local too.
function createCache(config: Configuration, redis: Redis | undefined): KeyValueCache | undefined {
  if (redis) return new RedisCache(redis);
  if (config.STORE_DRIVER === "memory") return new MemoryCache();
  return undefined;
}

/** Composition root: the only place that turns configuration into collaborators. */
export function createContainer(config: Configuration, overrides: ContainerOverrides = {}): Container {
  const store = overrides.store ?? createStore(config);
  const redis = config.REDIS_URL ? createRedis(config.REDIS_URL) : undefined;
  const cache = overrides.cache ?? createCache(config, redis);
  const events = overrides.events ?? new EventEmitter();

  const accounts = new AccountService(store, config.CURRENCY);
  const engine = new TransferEngine({
    store,
    config: toEngineConfig(config),
    verification: accounts,
    cache,
    notifier: events,
  });
  const wallets = new WalletService(
    store,
    {
      currency: config.CURRENCY,
      scale: config.CURRENCY_SCALE,
      balanceCacheTtlSeconds: config.BALANCE_CACHE_TTL_SECONDS,
      maxPageSize: config.HISTORY_MAX_PAGE_SIZE,
    },
    cache,
  );
  const payments = new PaymentReconciler({ store, engine, notifier: events });

  return {
    config,
    store,
    cache,
    redis,
    events,
    engine,
    accounts,
    wallets,
    payments,
    async close() {
      await store.close();
      if (redis) {
        await redis.quit();
      }
    },
  };
}
