import type Redis from "ioredis";
import { logger } from "../utils/logger";

export interface VersionedValue {
  version: number;
  value: string;
}

/**
 * Best-effort read-through cache. Nothing correctness-relevant lives here:
 * a miss or a Redis outage only sends the caller to the database.
 */
export interface KeyValueCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  getVersioned(key: string): Promise<VersionedValue | null>;
  /**
   * Stores `value` tagged with `version` unless the entry already carries
   * that version or a newer one, so a slow reader never overwrites a fresher
   * write.
   */
  setVersioned(key: string, entry: VersionedValue, ttlSeconds: number): Promise<void>;
}

export const cacheKeys = {
  balance: (accountId: string) => `balance:${accountId}`,
  idempotency: (initiatorId: string, type: string, idempotencyKey: string) =>
    `txn_idempotency:${initiatorId}:${type}:${idempotencyKey}`,
};

// Entries are stored as "<version>:<value>".
export function parseVersioned(raw: string | null): VersionedValue | null {
  if (!raw) return null;
  const separator = raw.indexOf(":");
  const version = Number(raw.slice(0, separator));
  if (separator <= 0 || !Number.isInteger(version)) return null;
  return { version, value: raw.slice(separator + 1) };
}

const SET_IF_NEWER = `
local current = redis.call('GET', KEYS[1])
if current then
  local seen = tonumber(string.match(current, '^(%d+):'))
  if seen and seen >= tonumber(ARGV[1]) then
    return 0
  end
end
redis.call('SET', KEYS[1], ARGV[1] .. ':' .. ARGV[2], 'EX', ARGV[3])
return 1
`;

export class RedisCache implements KeyValueCache {
  constructor(private readonly redis: Redis) {}

  async get(key: string) {
    try {
      return await this.redis.get(key);
    } catch (err) {
      logger.warn({ err, key }, "Cache read failed, falling back to store");
      return null;
    }
  }

  async set(key: string, value: string, ttlSeconds: number) {
    try {
      await this.redis.set(key, value, "EX", ttlSeconds);
    } catch (err) {
      logger.warn({ err, key }, "Cache write failed");
    }
  }

  async getVersioned(key: string) {
    return parseVersioned(await this.get(key));
  }

  async setVersioned(key: string, entry: VersionedValue, ttlSeconds: number) {
    try {
      // Compare and write in one step on the Redis side
      await this.redis.eval(SET_IF_NEWER, 1, key, entry.version, entry.value, ttlSeconds);
    } catch (err) {
      logger.warn({ err, key }, "Cache write failed");
    }
  }
}

export class MemoryCache implements KeyValueCache {
  private entries = new Map<string, { value: string; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string) {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number) {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async getVersioned(key: string) {
    return parseVersioned(await this.get(key));
  }

  async setVersioned(key: string, entry: VersionedValue, ttlSeconds: number) {
    const current = await this.getVersioned(key);
    if (current && current.version >= entry.version) return;
    await this.set(key, `${entry.version}:${entry.value}`, ttlSeconds);
  }
}
