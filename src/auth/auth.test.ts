import { describe, test } from "node:test";
import assert from "node:assert";
import { hashPassword, verifyPassword } from "./password.js";
import { issueToken, verifyToken } from "./token.js";

const SECRET = "test-secret-0123456789";

describe("passwords", () => {
  test("verifies the right password only", async () => {
    const stored = await hashPassword("hunter22");
    assert.ok(stored.startsWith("scrypt$"));
    assert.strictEqual(await verifyPassword("hunter22", stored), true);
    assert.strictEqual(await verifyPassword("hunter23", stored), false);
  });

  test("salts each hash", async () => {
    assert.notStrictEqual(await hashPassword("same"), await hashPassword("same"));
  });

  test("rejects malformed stored values", async () => {
    assert.strictEqual(await verifyPassword("x", "plain-text"), false);
    assert.strictEqual(await verifyPassword("x", "scrypt$abc$def"), false);
  });
});

describe("tokens", () => {
  const now = () => 1_750_000_000_000;

  test("round-trips claims", () => {
    const token = issueToken("usr_1", "biz_1", { secret: SECRET, ttlMinutes: 60, now });
    assert.deepStrictEqual(verifyToken(token, { secret: SECRET, now }), {
      sub: "usr_1",
      biz: "biz_1",
      exp: 1_750_000_000 + 3600,
    });
  });

  test("keeps an unscoped session unscoped", () => {
    const token = issueToken("usr_1", null, { secret: SECRET, ttlMinutes: 60, now });
    assert.strictEqual(verifyToken(token, { secret: SECRET, now })?.biz, null);
  });

  test("rejects tampering, a wrong secret and expiry", () => {
    const token = issueToken("usr_1", "biz_1", { secret: SECRET, ttlMinutes: 1, now });
    const [v, , sig] = token.split(".");
    const forged = Buffer.from(JSON.stringify({ sub: "usr_2", biz: "biz_2", exp: 9_999_999_999 })).toString("base64url");

    assert.strictEqual(verifyToken(`${v}.${forged}.${sig}`, { secret: SECRET, now }), null);
    assert.strictEqual(verifyToken(token, { secret: "another-test-secret", now }), null);
    assert.strictEqual(verifyToken(token, { secret: SECRET, now: () => now() + 61_000 }), null);
    assert.strictEqual(verifyToken("garbage", { secret: SECRET, now }), null);
  });
});
