import { describe, test } from "node:test";
import assert from "node:assert";
import { ConfigError, loadConfig } from "./config.js";

const base = { TOKEN_SECRET: "test-secret-0123456789" };

describe("loadConfig", () => {
  test("fills defaults for a file-backed server", () => {
    const c = loadConfig(base);
    assert.strictEqual(c.port, 7090);
    assert.strictEqual(c.logLevel, "info");
    assert.deepStrictEqual(c.store, { driver: "file", dataDir: "./data" });
    assert.deepStrictEqual(c.auth, { tokenSecret: base.TOKEN_SECRET, tokenTtlMinutes: 720, adminKey: undefined });
    assert.deepStrictEqual(c.normalizer, { maxPartySize: 30 });
    assert.deepStrictEqual(c.rateLimit, { windowMs: 60_000, max: 30 });
  });

  test("treats blank optional secrets as unset", () => {
    const c = loadConfig({ ...base, ADMIN_KEY: "  ", VAPI_API_KEY: "" });
    assert.strictEqual(c.auth.adminKey, undefined);
    assert.strictEqual(c.voice.apiKey, undefined);
  });

  test("builds the hosted store settings and trims the api url", () => {
    const c = loadConfig({
      ...base,
      STORE_DRIVER: "hosted",
      AIRTABLE_API_KEY: "test-key",
      AIRTABLE_BASE_ID: "appTest",
      AIRTABLE_API_URL: "https://tables.example.com/v0/",
      AIRTABLE_BUSINESSES_TABLE: "Venues",
    });
    assert.deepStrictEqual(c.store, {
      driver: "hosted",
      apiKey: "test-key",
      baseId: "appTest",
      apiUrl: "https://tables.example.com/v0",
      tables: {
        users: "Users",
        businesses: "Venues",
        reservations: "Reservations",
        pending: "PendingReservations",
        calls: "CallLogs",
      },
    });
  });

  test("rejects a hosted driver without credentials", () => {
    assert.throws(() => loadConfig({ ...base, STORE_DRIVER: "hosted" }), ConfigError);
  });

  test("rejects a short token secret and bad numbers", () => {
    assert.throws(
      () => loadConfig({ TOKEN_SECRET: "short" }),
      (e: unknown) => e instanceof ConfigError && e.issues[0].startsWith("TOKEN_SECRET:"),
    );
    assert.throws(() => loadConfig({ ...base, PORT: "http" }), ConfigError);
    assert.throws(() => loadConfig({ ...base, MAX_PARTY_SIZE: "0" }), ConfigError);
  });
});
