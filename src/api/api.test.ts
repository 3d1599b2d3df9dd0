import { describe, test, before, after } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type http from "node:http";
import pino from "pino";
import { makeApp } from "../app.js";
import { loadConfig } from "../config/config.js";
import { FileStore } from "../store/file.js";
import type { VoiceVendor } from "../voice/vapi.js";

const NOW = new Date("2025-06-11T15:00:00Z");
const ADMIN_KEY = "test-admin-key";
const WEBHOOK_SECRET = "test-webhook-secret";

type Harness = {
  baseUrl: string;
  close: () => Promise<void>;
};

async function startApp(env: Record<string, string>, voice?: VoiceVendor): Promise<Harness> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "callbook-api-"));
  const store = new FileStore(dir);
  await store.init();
  const config = loadConfig({ TOKEN_SECRET: "test-secret-0123456789", LOG_LEVEL: "silent", ...env });
  const app = makeApp({ config, store, logger: pino({ level: "silent" }), voice, now: () => NOW });

  const server = await new Promise<http.Server>((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("server has no port");

  return {
    baseUrl: `http://127.0.0.1:${addr.port}`,
    close: async () => {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
      await store.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

type CallOpts = { body?: unknown; rawBody?: string; token?: string; headers?: Record<string, string> };

function client(h: Harness) {
  return async (method: string, urlPath: string, opts: CallOpts = {}) => {
    const headers: Record<string, string> = { ...opts.headers };
    if (opts.token) headers.authorization = `Bearer ${opts.token}`;
    let body: string | undefined;
    if (opts.rawBody !== undefined) body = opts.rawBody;
    else if (opts.body !== undefined) body = JSON.stringify(opts.body);
    if (body !== undefined) headers["content-type"] = "application/json";

    const res = await fetch(`${h.baseUrl}${urlPath}`, { method, headers, body });
    return { status: res.status, headers: res.headers, json: JSON.parse(await res.text()) };
  };
}

const signupBody = {
  email: "owner@example.com",
  password: "correct-horse",
  businessName: "Bella Cucina",
  fullName: "Ada Owner",
  occupation: "Owner",
  phone: "555-0100",
};

const bookingTranscript = [
  "AI: Thanks for calling Bella Cucina, how can I help?",
  "User: Hi, I'd like to book a table for four tomorrow at 7pm please.",
  "User: My name is Jane Doe.",
].join("\n");

function endOfCall(callId: string, transcript: string) {
  return {
    message: {
      type: "end-of-call-report",
      call: {
        id: callId,
        phoneNumber: { number: "+15550100000" },
        customer: { number: "+15550102030" },
      },
      endedAt: NOW.toISOString(),
      transcript,
      analysis: { summary: "Caller asked for a table." },
      recordingUrl: `https://recordings.example.com/${callId}.wav`,
    },
  };
}

describe("http api", () => {
  let h: Harness;
  let call: ReturnType<typeof client>;
  let prompts: string[];
  const admin = { "x-admin-key": ADMIN_KEY };
  const vendor = { "x-vapi-secret": WEBHOOK_SECRET };

  let firstToken: string;
  let token: string;
  let userId: string;
  let businessId: string;

  before(async () => {
    prompts = [];
    const voice: VoiceVendor = {
      async registerPrompt(business) {
        prompts.push(business.id);
        return "asst_1";
      },
    };
    h = await startApp({ ADMIN_KEY, VAPI_WEBHOOK_SECRET: WEBHOOK_SECRET, RATE_LIMIT_MAX: "100" }, voice);
    call = client(h);
  });

  after(async () => {
    await h.close();
  });

  test("health answers without auth", async () => {
    const res = await call("GET", "/api/health");
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.json, { ok: true });
  });

  test("signup then login gives an unscoped session", async () => {
    const signup = await call("POST", "/api/auth/signup", { body: signupBody });
    assert.strictEqual(signup.status, 201);
    assert.strictEqual(signup.json.user.status, "pending");
    assert.strictEqual(signup.json.user.passwordHash, undefined);
    userId = signup.json.user.id;

    const dup = await call("POST", "/api/auth/signup", { body: signupBody });
    assert.strictEqual(dup.status, 409);
    assert.strictEqual(dup.json.error, "email_taken");

    const login = await call("POST", "/api/auth/login", {
      body: { email: signupBody.email, password: signupBody.password },
    });
    assert.strictEqual(login.status, 200);
    firstToken = login.json.token;

    const me = await call("GET", "/api/auth/me", { token: firstToken });
    assert.strictEqual(me.status, 200);
    assert.strictEqual(me.json.user.id, userId);
    assert.strictEqual(me.json.business, null);
  });

  test("a pending account is kept out of business routes", async () => {
    const res = await call("GET", "/api/reservations", { token: firstToken });
    assert.strictEqual(res.status, 403);
    assert.strictEqual(res.json.error, "account_not_active");
  });

  test("bad and missing credentials are unauthorized", async () => {
    const wrong = await call("POST", "/api/auth/login", { body: { email: signupBody.email, password: "nope-nope" } });
    assert.strictEqual(wrong.status, 401);
    assert.strictEqual(wrong.json.error, "invalid_credentials");

    const none = await call("GET", "/api/reservations");
    assert.strictEqual(none.status, 401);
    assert.strictEqual(none.json.error, "missing_token");

    const forged = await call("GET", "/api/auth/me", { token: `${firstToken}x` });
    assert.strictEqual(forged.status, 401);
    assert.strictEqual(forged.json.error, "invalid_token");
  });

  test("admin routes need the admin key", async () => {
    const res = await call("POST", `/api/admin/users/${userId}/activate`);
    assert.strictEqual(res.status, 401);
    assert.strictEqual(res.json.error, "unauthorized");

    const wrong = await call("POST", `/api/admin/users/${userId}/activate`, { token: "not-the-key" });
    assert.strictEqual(wrong.status, 401);
  });

  test("admin links a business and activates the owner", async () => {
    const created = await call("POST", "/api/admin/businesses", {
      headers: admin,
      body: { ownerId: userId, name: "Bella Cucina", phone: "+1 (555) 010-0000", businessType: "restaurant" },
    });
    assert.strictEqual(created.status, 201);
    businessId = created.json.business.id;

    const activated = await call("POST", `/api/admin/users/${userId}/activate`, { token: ADMIN_KEY });
    assert.strictEqual(activated.status, 200);
    assert.strictEqual(activated.json.user.status, "active");
    assert.strictEqual(activated.json.user.businessId, businessId);

    const again = await call("POST", `/api/admin/users/${userId}/activate`, { headers: admin });
    assert.strictEqual(again.status, 409);
    assert.strictEqual(again.json.error, "invalid_transition");

    const patched = await call("PATCH", `/api/admin/businesses/${businessId}`, {
      headers: admin,
      body: { address: "1 Main St" },
    });
    assert.strictEqual(patched.status, 200);
    assert.strictEqual(patched.json.business.address, "1 Main St");

    const registered = await call("POST", `/api/admin/businesses/${businessId}/voice-prompt`, { headers: admin });
    assert.strictEqual(registered.status, 200);
    assert.strictEqual(registered.json.business.assistantId, "asst_1");
    assert.deepStrictEqual(prompts, [businessId]);
  });

  test("a session issued before linking stays unscoped", async () => {
    const res = await call("GET", "/api/reservations", { token: firstToken });
    assert.strictEqual(res.status, 403);
    assert.strictEqual(res.json.error, "business_not_linked");

    const login = await call("POST", "/api/auth/login", {
      body: { email: signupBody.email, password: signupBody.password },
    });
    token = login.json.token;
    const me = await call("GET", "/api/auth/me", { token });
    assert.strictEqual(me.json.business.id, businessId);
  });

  test("reservation lifecycle", async () => {
    const created = await call("POST", "/api/reservations", {
      token,
      body: { guestName: "Lee", date: "2025-06-20", time: "18:30", partySize: 2 },
    });
    assert.strictEqual(created.status, 201);
    const id = created.json.reservation.id;
    assert.strictEqual(created.json.reservation.source, "manual");
    assert.strictEqual(created.json.reservation.guestPhone, "");

    const fetched = await call("GET", `/api/reservations/${id}`, { token });
    assert.deepStrictEqual(fetched.json.reservation, created.json.reservation);

    const edited = await call("PATCH", `/api/reservations/${id}`, { token, body: { time: "19:15" } });
    assert.strictEqual(edited.status, 200);
    assert.strictEqual(edited.json.reservation.time, "19:15");

    const cancelled = await call("POST", `/api/reservations/${id}/cancel`, { token });
    assert.strictEqual(cancelled.json.reservation.status, "cancelled");

    const twice = await call("POST", `/api/reservations/${id}/cancel`, {
      token,
      headers: { "x-request-id": "req-cancel-twice" },
    });
    assert.strictEqual(twice.status, 409);
    assert.deepStrictEqual(twice.json, {
      ok: false,
      error: "invalid_transition",
      details: { from: "cancelled", to: "cancelled" },
      requestId: "req-cancel-twice",
    });
    assert.strictEqual(twice.headers.get("x-request-id"), "req-cancel-twice");

    const listed = await call("GET", "/api/reservations?status=cancelled", { token });
    assert.deepStrictEqual(
      listed.json.reservations.map((r: { id: string }) => r.id),
      [id],
    );

    const missing = await call("GET", "/api/reservations/nope", { token });
    assert.strictEqual(missing.status, 404);
    assert.strictEqual(missing.json.error, "reservation_not_found");
  });

  test("malformed input is rejected whole", async () => {
    const bad = await call("POST", "/api/reservations", {
      token,
      body: { guestName: "Lee", date: "2025-06-20", time: "7pm", partySize: 0 },
    });
    assert.strictEqual(bad.status, 400);
    assert.strictEqual(bad.json.error, "validation_failed");
    assert.deepStrictEqual(Object.keys(bad.json.details.fieldErrors).sort(), ["partySize", "time"]);

    const garbled = await call("POST", "/api/reservations", { token, rawBody: "{not json" });
    assert.strictEqual(garbled.status, 400);
    assert.strictEqual(garbled.json.error, "invalid_json");
  });

  test("the webhook rejects calls without the vendor secret", async () => {
    const res = await call("POST", "/api/voice/webhook", { body: endOfCall("call-x", bookingTranscript) });
    assert.strictEqual(res.status, 401);
    assert.strictEqual(res.json.error, "invalid_webhook_secret");
  });

  test("an end-of-call report books the reservation and logs the call", async () => {
    const res = await call("POST", "/api/voice/webhook", {
      headers: vendor,
      body: endOfCall("call-42", bookingTranscript),
    });
    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.headers.get("x-request-id"), "call-42");
    assert.strictEqual(res.json.outcome, "booked");
    assert.strictEqual(res.json.intent, "new_reservation");
    assert.strictEqual(res.json.businessId, businessId);

    const booked = await call("GET", `/api/reservations/${res.json.reservationId}`, { token });
    assert.strictEqual(booked.json.reservation.date, "2025-06-12");
    assert.strictEqual(booked.json.reservation.time, "19:00");
    assert.strictEqual(booked.json.reservation.partySize, 4);
    assert.strictEqual(booked.json.reservation.guestPhone, "15550102030");

    const redelivered = await call("POST", "/api/voice/webhook", {
      headers: vendor,
      body: endOfCall("call-42", bookingTranscript),
    });
    assert.strictEqual(redelivered.json.reservationId, res.json.reservationId);

    const calls = await call("GET", "/api/calls", { token });
    assert.strictEqual(calls.json.calls.length, 1);
    assert.strictEqual(calls.json.calls[0].callId, "call-42");
    assert.strictEqual(calls.json.calls[0].summary, "Caller asked for a table.");
  });

  test("an unreadable request is staged for review and promoted by hand", async () => {
    const res = await call("POST", "/api/voice/webhook", {
      headers: vendor,
      body: endOfCall("call-43", "User: I'd like to book a table for Friday, my name is Sam"),
    });
    assert.strictEqual(res.json.outcome, "staged");
    const pendingId = res.json.pendingId;

    const pending = await call("GET", "/api/pending", { token });
    assert.deepStrictEqual(
      pending.json.pending.map((p: { id: string }) => p.id),
      [pendingId],
    );

    const promoted = await call("POST", `/api/pending/${pendingId}/promote`, {
      token,
      body: { guestName: "Sam", date: "2025-06-13", time: "20:00", partySize: 3 },
    });
    assert.strictEqual(promoted.status, 201);
    assert.strictEqual(promoted.json.reservation.source, "promoted");
    assert.strictEqual(promoted.json.reservation.pendingId, pendingId);

    const again = await call("POST", `/api/pending/${pendingId}/promote`, {
      token,
      body: { guestName: "Sam", date: "2025-06-13", time: "20:00", partySize: 3 },
    });
    assert.strictEqual(again.status, 409);
    assert.strictEqual(again.json.error, "already_promoted");

    const discarded = await call("DELETE", `/api/pending/${pendingId}`, { token });
    assert.deepStrictEqual(discarded.json, { ok: true, id: pendingId });
  });

  test("assistant requests and other messages", async () => {
    const assistant = await call("POST", "/api/voice/webhook", {
      headers: vendor,
      body: { message: { type: "assistant-request", call: { id: "call-44", phoneNumber: { number: "+15550100000" } } } },
    });
    assert.strictEqual(assistant.status, 200);
    assert.strictEqual(assistant.json.assistant.firstMessage, "Hi, thanks for calling Bella Cucina. How can I help you?");

    const ignored = await call("POST", "/api/voice/webhook", {
      headers: vendor,
      body: { message: { type: "status-update", call: { id: "call-44" } } },
    });
    assert.deepStrictEqual(ignored.json, { ok: true, ignored: "status-update" });

    const invalid = await call("POST", "/api/voice/webhook", { headers: vendor, body: { hello: "world" } });
    assert.strictEqual(invalid.status, 400);
    assert.strictEqual(invalid.json.error, "validation_failed");
  });

  test("the dashboard sums the business's activity", async () => {
    const res = await call("GET", "/api/dashboard", { token });
    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.json.stats.totalCalls, 2);
    assert.strictEqual(res.json.stats.missedCalls, 0);
    assert.deepStrictEqual(res.json.stats.byHour, [{ hour: "15", calls: 2 }]);
    assert.deepStrictEqual(res.json.stats.byIntent, [{ intent: "new_reservation", count: 2 }]);
    assert.deepStrictEqual(res.json.stats.reservations, { confirmed: 2, cancelled: 1, pending_review: 0 });
    assert.strictEqual(res.json.stats.pendingCount, 0);
  });

  test("a request to an unknown line waits for an admin to assign it", async () => {
    const body = endOfCall("call-45", "User: I'd like to book a table for two tomorrow at 7pm, my name is Kim");
    body.message.call.phoneNumber.number = "+15550109999";
    const res = await call("POST", "/api/voice/webhook", { headers: vendor, body });
    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.json.outcome, "staged");
    assert.strictEqual(res.json.businessId, null);
    const pendingId = res.json.pendingId;

    const mine = await call("GET", "/api/pending", { token });
    assert.deepStrictEqual(mine.json.pending, []);

    const closed = await call("GET", "/api/admin/pending");
    assert.strictEqual(closed.status, 401);

    const stray = await call("GET", "/api/admin/pending", { headers: admin });
    assert.deepStrictEqual(
      stray.json.pending.map((p: { id: string }) => p.id),
      [pendingId],
    );

    const assigned = await call("POST", `/api/admin/pending/${pendingId}/assign`, {
      headers: admin,
      body: { businessId },
    });
    assert.strictEqual(assigned.status, 200);
    assert.strictEqual(assigned.json.pending.businessId, businessId);

    const again = await call("POST", `/api/admin/pending/${pendingId}/assign`, {
      headers: admin,
      body: { businessId },
    });
    assert.strictEqual(again.status, 409);
    assert.strictEqual(again.json.error, "pending_already_assigned");

    const owned = await call("GET", "/api/pending", { token });
    assert.deepStrictEqual(
      owned.json.pending.map((p: { id: string }) => p.id),
      [pendingId],
    );
    const left = await call("GET", "/api/admin/pending", { headers: admin });
    assert.deepStrictEqual(left.json.pending, []);
  });

  test("unknown routes are 404", async () => {
    const res = await call("GET", "/api/nothing-here");
    assert.strictEqual(res.status, 404);
    assert.strictEqual(res.json.error, "route_not_found");
  });
});

describe("rate limiting", () => {
  let h: Harness;

  before(async () => {
    h = await startApp({ RATE_LIMIT_MAX: "2" });
  });

  after(async () => {
    await h.close();
  });

  test("login attempts beyond the limit are refused", async () => {
    const call = client(h);
    const body = { body: { email: "nobody@example.com", password: "whatever-1" } };
    assert.strictEqual((await call("POST", "/api/auth/login", body)).status, 401);
    assert.strictEqual((await call("POST", "/api/auth/login", body)).status, 401);
    const limited = await call("POST", "/api/auth/login", body);
    assert.strictEqual(limited.status, 429);
    assert.strictEqual(limited.json.error, "rate_limited");
  });

  test("admin routes are closed when no admin key is configured", async () => {
    const res = await client(h)("POST", "/api/admin/businesses", { headers: { "x-admin-key": "" }, body: {} });
    assert.strictEqual(res.status, 401);
  });
});
