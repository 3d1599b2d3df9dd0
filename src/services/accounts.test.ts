import { describe, test, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import pino from "pino";
import { SqliteStore } from "../store/sqlite.js";
import { createAccounts } from "./accounts.js";
import type { Accounts } from "./accounts.js";
import { verifyToken } from "../auth/token.js";
import { Conflict, NotFound, Unauthorized, ValidationError } from "../core/errors.js";
import type { HttpError } from "../core/errors.js";
import type { VoiceVendor } from "../voice/vapi.js";
import type { Business } from "../types/contracts.js";
import type { UserPatch } from "../store/store.js";

const SECRET = "test-secret-0123456789";
const NOW = new Date("2025-06-11T15:00:00Z");

const signupBody = {
  email: " Owner@Example.com ",
  password: "correct-horse",
  businessName: "Bella Cucina",
  fullName: "Ada Owner",
  occupation: "Owner",
  phone: "555-0100",
};

/** Fails the next owner link, as a dropped connection would. */
class LinkFailsOnce extends SqliteStore {
  failNextLink = false;

  async updateUser(id: string, patch: UserPatch) {
    if (this.failNextLink && patch.businessId) {
      this.failNextLink = false;
      throw new Error("store down");
    }
    return super.updateUser(id, patch);
  }
}

function rejectsWith(Kind: new (...args: never[]) => HttpError, code: string) {
  return (e: unknown) => e instanceof Kind && e.code === code;
}

describe("accounts", () => {
  let store: SqliteStore;
  let accounts: Accounts;
  let registered: Business[];

  beforeEach(async () => {
    store = new SqliteStore(":memory:");
    await store.init();
    registered = [];
    const voice: VoiceVendor = {
      async registerPrompt(business) {
        registered.push(business);
        return "asst_1";
      },
    };
    accounts = createAccounts({
      store,
      tokenSecret: SECRET,
      tokenTtlMinutes: 60,
      voice,
      logger: pino({ level: "silent" }),
      now: () => NOW,
    });
  });

  afterEach(async () => {
    await store.close();
  });

  test("signup creates a pending account without exposing the hash", async () => {
    const { user } = await accounts.signup(signupBody);
    assert.strictEqual(user.email, "owner@example.com");
    assert.strictEqual(user.status, "pending");
    assert.strictEqual(user.createdAt, NOW.toISOString());
    assert.strictEqual("passwordHash" in user, false);
  });

  test("signup rejects a taken email regardless of case", async () => {
    await accounts.signup(signupBody);
    await assert.rejects(
      accounts.signup({ ...signupBody, email: "OWNER@example.com" }),
      rejectsWith(Conflict, "email_taken"),
    );
  });

  test("signup rejects a short password and missing fields", async () => {
    await assert.rejects(accounts.signup({ ...signupBody, password: "short" }), ValidationError);
    await assert.rejects(accounts.signup({ email: "a@example.com", password: "long-enough" }), ValidationError);
  });

  test("login gives the same error for an unknown email and a wrong password", async () => {
    await accounts.signup(signupBody);
    await assert.rejects(
      accounts.login({ email: "owner@example.com", password: "wrong-password" }),
      rejectsWith(Unauthorized, "invalid_credentials"),
    );
    await assert.rejects(
      accounts.login({ email: "nobody@example.com", password: "correct-horse" }),
      rejectsWith(Unauthorized, "invalid_credentials"),
    );
  });

  test("a pending account gets a session with no business scope", async () => {
    const { user } = await accounts.signup(signupBody);
    const { token } = await accounts.login({ email: "owner@example.com", password: "correct-horse" });
    const claims = verifyToken(token, { secret: SECRET, now: () => NOW.getTime() });
    assert.deepStrictEqual(claims, { sub: user.id, biz: null, exp: Math.floor(NOW.getTime() / 1000) + 3600 });
  });

  test("an active, linked account gets a business-scoped session", async () => {
    const { user } = await accounts.signup(signupBody);
    const { business } = await accounts.createBusiness({ ownerId: user.id, name: "Bella Cucina", phone: "+1 555 010 0000" });
    await accounts.activateUser(user.id);

    const { token } = await accounts.login({ email: "owner@example.com", password: "correct-horse" });
    const claims = verifyToken(token, { secret: SECRET, now: () => NOW.getTime() });
    assert.strictEqual(claims?.biz, business.id);

    const me = await accounts.me(user.id);
    assert.strictEqual(me.user.businessId, business.id);
    assert.strictEqual(me.business?.id, business.id);
  });

  test("activation happens once", async () => {
    const { user } = await accounts.signup(signupBody);
    const { user: active } = await accounts.activateUser(user.id);
    assert.strictEqual(active.status, "active");
    await assert.rejects(accounts.activateUser(user.id), rejectsWith(Conflict, "invalid_transition"));
    await assert.rejects(accounts.activateUser("missing"), rejectsWith(NotFound, "user_not_found"));
  });

  test("an owner links to one business only", async () => {
    const { user } = await accounts.signup(signupBody);
    await accounts.createBusiness({ ownerId: user.id, name: "Bella Cucina", phone: "+1 555 010 0000" });
    await assert.rejects(
      accounts.createBusiness({ ownerId: user.id, name: "Second", phone: "+1 555 010 9999" }),
      rejectsWith(Conflict, "owner_has_business"),
    );
    await assert.rejects(
      accounts.createBusiness({ ownerId: "missing", name: "Third", phone: "+1 555 010 8888" }),
      rejectsWith(NotFound, "owner_not_found"),
    );
  });

  test("a retried createBusiness links the owner to the business it already made", async () => {
    const flaky = new LinkFailsOnce(":memory:");
    await flaky.init();
    const svc = createAccounts({
      store: flaky,
      tokenSecret: SECRET,
      tokenTtlMinutes: 60,
      logger: pino({ level: "silent" }),
      now: () => NOW,
    });
    const { user } = await svc.signup(signupBody);
    const body = { ownerId: user.id, name: "Bella Cucina", phone: "+1 555 010 0000" };

    flaky.failNextLink = true;
    await assert.rejects(svc.createBusiness(body), /store down/);
    assert.strictEqual((await flaky.getUser(user.id))?.businessId, undefined);

    const { business } = await svc.createBusiness(body);
    assert.strictEqual((await flaky.getUser(user.id))?.businessId, business.id);
    assert.strictEqual((await flaky.findBusinessByPhone("15550100000"))?.id, business.id);
    await flaky.close();
  });

  test("createBusiness refuses a line that belongs to another owner", async () => {
    const { user } = await accounts.signup(signupBody);
    await accounts.createBusiness({ ownerId: user.id, name: "Bella Cucina", phone: "+1 555 010 0000" });
    const { user: other } = await accounts.signup({ ...signupBody, email: "other@example.com" });
    await assert.rejects(
      accounts.createBusiness({ ownerId: other.id, name: "Copycat", phone: "(555) 010-0000 " }),
      rejectsWith(Conflict, "phone_taken"),
    );
  });

  test("createBusiness rejects unknown fields and short phone numbers", async () => {
    const { user } = await accounts.signup(signupBody);
    await assert.rejects(
      accounts.createBusiness({ ownerId: user.id, name: "X", phone: "+1 555 010 0000", color: "red" }),
      ValidationError,
    );
    await assert.rejects(accounts.createBusiness({ ownerId: user.id, name: "X", phone: "12-34" }), ValidationError);
  });

  test("updateBusiness patches the profile and refuses an empty patch", async () => {
    const { user } = await accounts.signup(signupBody);
    const { business } = await accounts.createBusiness({ ownerId: user.id, name: "Bella Cucina", phone: "+1 555 010 0000" });

    const { business: updated } = await accounts.updateBusiness(business.id, {
      businessType: "restaurant",
      address: "1 Main St",
    });
    assert.strictEqual(updated.businessType, "restaurant");
    assert.strictEqual(updated.address, "1 Main St");
    assert.strictEqual(updated.name, "Bella Cucina");

    await assert.rejects(accounts.updateBusiness(business.id, {}), ValidationError);
    await assert.rejects(accounts.updateBusiness("missing", { name: "Y" }), rejectsWith(NotFound, "business_not_found"));
  });

  test("registerVoicePrompt stores the assistant id from the vendor", async () => {
    const { user } = await accounts.signup(signupBody);
    const { business } = await accounts.createBusiness({ ownerId: user.id, name: "Bella Cucina", phone: "+1 555 010 0000" });

    const { business: updated } = await accounts.registerVoicePrompt(business.id);
    assert.strictEqual(updated.assistantId, "asst_1");
    assert.strictEqual(registered.length, 1);
    assert.strictEqual(registered[0].id, business.id);
  });

  test("registerVoicePrompt without a vendor is a conflict", async () => {
    const bare = createAccounts({
      store,
      tokenSecret: SECRET,
      tokenTtlMinutes: 60,
      logger: pino({ level: "silent" }),
      now: () => NOW,
    });
    const { user } = await bare.signup(signupBody);
    const { business } = await bare.createBusiness({ ownerId: user.id, name: "Bella Cucina", phone: "+1 555 010 0000" });
    await assert.rejects(bare.registerVoicePrompt(business.id), rejectsWith(Conflict, "voice_not_configured"));
  });
});
