import { describe, expect, test } from "vitest";
import { ConfigValidationError, loadConfig, toEngineConfig } from "../../src/config";

describe("Configuration", () => {
  test("should apply defaults", () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(3000);
    expect(config.STORE_DRIVER).toBe("postgres");
    expect(config.CURRENCY).toBe("USD");
    expect(config.CURRENCY_SCALE).toBe(2);
    expect(config.REQUIRE_VERIFICATION).toBe(true);
    expect(config.REDIS_URL).toBeUndefined();
    expect(config.PAYMENT_WEBHOOK_SECRET).toBeUndefined();
  });

  test("should coerce environment strings", () => {
    const config = loadConfig({
      PORT: "8080",
      STORE_DRIVER: "memory",
      LOCK_TIMEOUT_MS: "250",
      REQUIRE_VERIFICATION: "0",
    });

    expect(config.PORT).toBe(8080);
    expect(config.STORE_DRIVER).toBe("memory");
    expect(config.LOCK_TIMEOUT_MS).toBe(250);
    expect(config.REQUIRE_VERIFICATION).toBe(false);
  });

  test("should list every invalid setting", () => {
    let error: unknown;
    try {
      loadConfig({ PORT: "not-a-port", STORE_DRIVER: "sqlite" });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigValidationError);
    if (!(error instanceof ConfigValidationError)) return;
    expect(error.issues.map((issue) => issue.path.join("."))).toEqual(["PORT", "STORE_DRIVER"]);
  });

  test("should derive the engine settings", () => {
    const config = loadConfig({ CURRENCY: "EUR", IDEMPOTENCY_CACHE_TTL_SECONDS: "120" });

    expect(toEngineConfig(config)).toEqual({
      currency: "EUR",
      scale: 2,
      lockTimeoutMs: 5000,
      requireVerification: true,
      idempotencyCacheTtlSeconds: 120,
      balanceCacheTtlSeconds: 60,
    });
  });

  test("should cap the currency scale at the stored precision", () => {
    expect(loadConfig({ CURRENCY_SCALE: "0" }).CURRENCY_SCALE).toBe(0);
    expect(loadConfig({ CURRENCY_SCALE: "2" }).CURRENCY_SCALE).toBe(2);
    expect(() => loadConfig({ CURRENCY_SCALE: "3" })).toThrow(ConfigValidationError);
  });
});
