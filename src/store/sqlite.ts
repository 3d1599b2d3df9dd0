import sqlite3 from "sqlite3";
import type { Database } from "sqlite3";
import { nanoid } from "nanoid";
import type {
  BusinessPatch,
  NewBusiness,
  NewCallRecord,
  NewPending,
  NewReservation,
  NewUser,
  Page,
  ReservationPatch,
  ReservationQuery,
  Store,
  UserPatch,
} from "./store.js";
import { compact, digitsOf } from "./store.js";
import {
  BusinessSchema,
  CallRecordSchema,
  PendingSchema,
  ReservationSchema,
  UserSchema,
  readRecord,
} from "./schemas.js";
import { Conflict, ValidationError } from "../core/errors.js";
import type { Business, CallRecord, PendingReservation, Reservation, User } from "../types/contracts.js";

type Row = Record<string, unknown>;
type Param = string | number | null;

function run(db: Database, sql: string, params: Param[] = []) {
  return new Promise<number>((resolve, reject) => {
    db.run(sql, params, function (err) {
      if (err) return reject(toStoreError(err));
      resolve(this.changes);
    });
  });
}
function get(db: Database, sql: string, params: Param[] = []) {
  return new Promise<Row | undefined>((resolve, reject) => {
    db.get(sql, params, (err: Error | null, row: Row | undefined) => (err ? reject(err) : resolve(row)));
  });
}
function all(db: Database, sql: string, params: Param[] = []) {
  return new Promise<Row[]>((resolve, reject) => {
    db.all(sql, params, (err: Error | null, rows: Row[]) => (err ? reject(err) : resolve(rows)));
  });
}

function toStoreError(err: Error) {
  if ("code" in err && err.code === "SQLITE_CONSTRAINT") {
    if (/users\.email/.test(err.message)) return new Conflict("email_taken");
    if (/businesses\.phone_digits/.test(err.message)) return new Conflict("phone_taken");
    return new Conflict("constraint_violation");
  }
  return err;
}

/** SQL NULL reads back as an absent optional field. */
function opt(v: unknown) {
  return v === null ? undefined : v;
}

function parseJson(v: unknown, where: string): unknown {
  if (typeof v !== "string") return v;
  try {
    return JSON.parse(v);
  } catch {
    throw new ValidationError("invalid_record", { where });
  }
}

const USER_COLUMNS: Record<keyof UserPatch, string> = { status: "status", businessId: "business_id" };

const BUSINESS_COLUMNS: Record<keyof BusinessPatch, string> = {
  name: "name",
  phone: "phone_number",
  businessType: "business_type",
  address: "address",
  description: "description",
  policies: "policies",
  reservationRules: "reservation_rules",
  script: "script",
  knowledgeBase: "knowledge_base",
  assistantId: "assistant_id",
};

const RESERVATION_COLUMNS: Record<keyof ReservationPatch, string> = {
  guestName: "guest_name",
  guestPhone: "guest_phone",
  date: "date",
  time: "time",
  partySize: "guests",
  specialRequests: "special_requests",
  status: "status",
  updatedAt: "updated_at",
};

function setClause(columns: Record<string, string>, patch: Record<string, string | number | undefined>) {
  const sets: string[] = [];
  const params: Param[] = [];
  for (const [key, value] of Object.entries(patch)) {
    const col = columns[key];
    if (!col || value === undefined) continue;
    sets.push(`${col} = ?`);
    params.push(value);
  }
  return { sets, params };
}

export class SqliteStore implements Store {
  private db: Database;

  constructor(private dbPath: string) {
    this.db = new sqlite3.Database(dbPath);
  }

  async init(): Promise<void> {
    if (this.dbPath !== ":memory:") await run(this.db, `pragma journal_mode = wal;`);
    await run(this.db, `pragma foreign_keys = on;`);
    await run(this.db, `
      create table if not exists users (
        id text primary key,
        email text not null unique collate nocase,
        business_name text not null,
        full_name text not null,
        occupation text not null,
        phone text not null,
        password_hash text not null,
        status text not null default 'pending',
        business_id text,
        created_at text not null
      );
    `);
    await run(this.db, `
      create table if not exists businesses (
        id text primary key,
        name text not null,
        phone_number text not null,
        phone_digits text unique,
        owner_id text not null references users(id),
        business_type text,
        address text,
        description text,
        policies text,
        reservation_rules text,
        script text,
        knowledge_base text,
        assistant_id text,
        created_at text not null
      );
    `);
    await run(this.db, `
      create table if not exists reservations (
        id text primary key,
        business_id text not null references businesses(id),
        guest_name text not null,
        guest_phone text not null,
        date text not null,
        time text not null,
        guests integer not null,
        special_requests text not null,
        status text not null default 'confirmed',
        source text not null,
        call_id text,
        pending_id text,
        created_at text not null,
        updated_at text not null
      );
    `);
    await run(this.db, `create index if not exists idx_reservations_business_date on reservations(business_id, date, time);`);
    await run(this.db, `create index if not exists idx_reservations_call on reservations(call_id);`);
    await run(this.db, `create index if not exists idx_reservations_pending on reservations(pending_id);`);

    await run(this.db, `
      create table if not exists pending_reservations (
        id text primary key,
        business_id text,
        call_id text,
        data text not null,
        created_at text not null
      );
    `);
    await run(this.db, `create index if not exists idx_pending_business on pending_reservations(business_id, created_at);`);

    await run(this.db, `
      create table if not exists call_logs (
        id text primary key,
        business_id text not null references businesses(id),
        call_uuid text not null,
        intent text not null,
        outcome text not null,
        agent_summary text not null,
        recording_url text not null,
        caller_number text not null,
        timestamp text not null
      );
    `);
    await run(this.db, `create index if not exists idx_call_logs_call_uuid on call_logs(call_uuid);`);
    await run(this.db, `create index if not exists idx_call_logs_business on call_logs(business_id, timestamp);`);
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => this.db.close((err) => (err ? reject(err) : resolve())));
  }

  // users

  async createUser(user: NewUser): Promise<User> {
    const id = nanoid();
    await run(this.db, `
      insert into users (id, email, business_name, full_name, occupation, phone, password_hash, status, business_id, created_at)
      values (?,?,?,?,?,?,?,?,?,?)
    `, [
      id, user.email, user.businessName, user.fullName, user.occupation, user.phone,
      user.passwordHash, user.status, user.businessId ?? null, user.createdAt,
    ]);
    return { ...user, id };
  }

  async getUser(id: string): Promise<User | null> {
    const row = await get(this.db, `select * from users where id=?`, [id]);
    return row ? this.rowToUser(row) : null;
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const row = await get(this.db, `select * from users where email=? collate nocase`, [email]);
    return row ? this.rowToUser(row) : null;
  }

  async updateUser(id: string, patch: UserPatch): Promise<User | null> {
    const { sets, params } = setClause(USER_COLUMNS, compact(patch));
    if (sets.length) await run(this.db, `update users set ${sets.join(", ")} where id=?`, [...params, id]);
    return this.getUser(id);
  }

  // businesses

  async createBusiness(business: NewBusiness): Promise<Business> {
    const id = nanoid();
    await run(this.db, `
      insert into businesses (
        id, name, phone_number, phone_digits, owner_id, business_type, address, description,
        policies, reservation_rules, script, knowledge_base, assistant_id, created_at
      ) values (?,?,?,?,?,?,?,?,?,?,?,?,?,?)
    `, [
      id, business.name, business.phone, digitsOf(business.phone) || null, business.ownerId,
      business.businessType ?? null, business.address ?? null, business.description ?? null,
      business.policies ?? null, business.reservationRules ?? null, business.script ?? null,
      business.knowledgeBase ?? null, business.assistantId ?? null, business.createdAt,
    ]);
    return { ...business, id };
  }

  async getBusiness(id: string): Promise<Business | null> {
    const row = await get(this.db, `select * from businesses where id=?`, [id]);
    return row ? this.rowToBusiness(row) : null;
  }

  async findBusinessByPhone(digits: string): Promise<Business | null> {
    if (!digits) return null;
    const row = await get(this.db, `select * from businesses where phone_digits=?`, [digits]);
    return row ? this.rowToBusiness(row) : null;
  }

  async updateBusiness(id: string, patch: BusinessPatch): Promise<Business | null> {
    const next = compact(patch);
    const { sets, params } = setClause(BUSINESS_COLUMNS, next);
    if (next.phone !== undefined) {
      sets.push(`phone_digits = ?`);
      params.push(digitsOf(next.phone) || null);
    }
    if (sets.length) await run(this.db, `update businesses set ${sets.join(", ")} where id=?`, [...params, id]);
    return this.getBusiness(id);
  }

  // reservations

  async createReservation(r: NewReservation): Promise<Reservation> {
    const id = nanoid();
    await run(this.db, `
      insert into reservations (
        id, business_id, guest_name, guest_phone, date, time, guests, special_requests,
        status, source, call_id, pending_id, created_at, updated_at
      ) values (?,?,?,?,?,?,?,?,?,?,?,?,?,?)
    `, [
      id, r.businessId, r.guestName, r.guestPhone, r.date, r.time, r.partySize, r.specialRequests,
      r.status, r.source, r.callId ?? null, r.pendingId ?? null, r.createdAt, r.updatedAt,
    ]);
    return { ...r, id };
  }

  async getReservation(businessId: string, id: string): Promise<Reservation | null> {
    const row = await get(this.db, `select * from reservations where business_id=? and id=?`, [businessId, id]);
    return row ? this.rowToReservation(row) : null;
  }

  async findReservationByCallId(callId: string): Promise<Reservation | null> {
    const row = await get(this.db, `select * from reservations where call_id=? limit 1`, [callId]);
    return row ? this.rowToReservation(row) : null;
  }

  async findReservationByPendingId(pendingId: string): Promise<Reservation | null> {
    const row = await get(this.db, `select * from reservations where pending_id=? limit 1`, [pendingId]);
    return row ? this.rowToReservation(row) : null;
  }

  async listReservations(businessId: string, q: ReservationQuery = {}): Promise<Reservation[]> {
    const where: string[] = [`business_id = ?`];
    const params: Param[] = [businessId];

    if (q.status) { where.push(`status = ?`); params.push(q.status); }
    if (q.fromDate) { where.push(`date >= ?`); params.push(q.fromDate); }

    params.push(q.limit ?? -1, q.offset ?? 0);
    const rows = await all(this.db, `
      select * from reservations
      where ${where.join(" and ")}
      order by date asc, time asc, created_at asc
      limit ? offset ?
    `, params);
    return rows.map((r) => this.rowToReservation(r));
  }

  async updateReservation(businessId: string, id: string, patch: ReservationPatch): Promise<Reservation | null> {
    const { sets, params } = setClause(RESERVATION_COLUMNS, compact(patch));
    if (sets.length) {
      await run(this.db, `update reservations set ${sets.join(", ")} where business_id=? and id=?`, [...params, businessId, id]);
    }
    return this.getReservation(businessId, id);
  }

  // pending

  async createPending(p: NewPending): Promise<PendingReservation> {
    const id = nanoid();
    await run(this.db, `
      insert into pending_reservations (id, business_id, call_id, data, created_at) values (?,?,?,?,?)
    `, [id, p.businessId ?? null, p.callId ?? null, JSON.stringify(p.payload), p.createdAt]);
    return { ...p, id };
  }

  async getPending(id: string): Promise<PendingReservation | null> {
    const row = await get(this.db, `select * from pending_reservations where id=?`, [id]);
    return row ? this.rowToPending(row) : null;
  }

  async findPendingByCallId(callId: string): Promise<PendingReservation | null> {
    const row = await get(this.db, `select * from pending_reservations where call_id=? limit 1`, [callId]);
    return row ? this.rowToPending(row) : null;
  }

  async listPending(businessId: string, q: Page = {}): Promise<PendingReservation[]> {
    const rows = await all(this.db, `
      select * from pending_reservations
      where business_id = ?
      order by created_at asc
      limit ? offset ?
    `, [businessId, q.limit ?? -1, q.offset ?? 0]);
    return rows.map((r) => this.rowToPending(r));
  }

  async listUnassignedPending(q: Page = {}): Promise<PendingReservation[]> {
    const rows = await all(this.db, `
      select * from pending_reservations
      where business_id is null
      order by created_at asc
      limit ? offset ?
    `, [q.limit ?? -1, q.offset ?? 0]);
    return rows.map((r) => this.rowToPending(r));
  }

  async assignPending(id: string, businessId: string): Promise<PendingReservation | null> {
    await run(this.db, `update pending_reservations set business_id=? where id=?`, [businessId, id]);
    return this.getPending(id);
  }

  async deletePending(id: string): Promise<boolean> {
    const changes = await run(this.db, `delete from pending_reservations where id=?`, [id]);
    return changes > 0;
  }

  // calls

  async appendCall(c: NewCallRecord): Promise<CallRecord> {
    const id = nanoid();
    await run(this.db, `
      insert into call_logs (id, business_id, call_uuid, intent, outcome, agent_summary, recording_url, caller_number, timestamp)
      values (?,?,?,?,?,?,?,?,?)
    `, [id, c.businessId, c.callId, c.intent, c.outcome, c.summary, c.recordingUrl, c.callerNumber, c.timestamp]);
    return { ...c, id };
  }

  async findCallByCallId(callId: string): Promise<CallRecord | null> {
    const row = await get(this.db, `select * from call_logs where call_uuid=? limit 1`, [callId]);
    return row ? this.rowToCall(row) : null;
  }

  async listCalls(businessId: string, q: Page = {}): Promise<CallRecord[]> {
    const rows = await all(this.db, `
      select * from call_logs
      where business_id = ?
      order by timestamp desc
      limit ? offset ?
    `, [businessId, q.limit ?? -1, q.offset ?? 0]);
    return rows.map((r) => this.rowToCall(r));
  }

  // rows

  private rowToUser(r: Row): User {
    return readRecord(UserSchema, compact({
      id: r.id,
      email: r.email,
      businessName: r.business_name,
      fullName: r.full_name,
      occupation: r.occupation,
      phone: r.phone,
      passwordHash: r.password_hash,
      status: r.status,
      businessId: opt(r.business_id),
      createdAt: r.created_at,
    }), "users");
  }

  private rowToBusiness(r: Row): Business {
    return readRecord(BusinessSchema, compact({
      id: r.id,
      name: r.name,
      phone: r.phone_number,
      ownerId: r.owner_id,
      businessType: opt(r.business_type),
      address: opt(r.address),
      description: opt(r.description),
      policies: opt(r.policies),
      reservationRules: opt(r.reservation_rules),
      script: opt(r.script),
      knowledgeBase: opt(r.knowledge_base),
      assistantId: opt(r.assistant_id),
      createdAt: r.created_at,
    }), "businesses");
  }

  private rowToReservation(r: Row): Reservation {
    return readRecord(ReservationSchema, compact({
      id: r.id,
      businessId: r.business_id,
      guestName: r.guest_name,
      guestPhone: r.guest_phone,
      date: r.date,
      time: r.time,
      partySize: r.guests,
      specialRequests: r.special_requests,
      status: r.status,
      source: r.source,
      callId: opt(r.call_id),
      pendingId: opt(r.pending_id),
      createdAt: r.created_at,
      updatedAt: r.updated_at,
    }), "reservations");
  }

  private rowToPending(r: Row): PendingReservation {
    return readRecord(PendingSchema, compact({
      id: r.id,
      businessId: opt(r.business_id),
      callId: opt(r.call_id),
      payload: parseJson(r.data, "pending_reservations"),
      createdAt: r.created_at,
    }), "pending_reservations");
  }

  private rowToCall(r: Row): CallRecord {
    return readRecord(CallRecordSchema, compact({
      id: r.id,
      businessId: r.business_id,
      callId: r.call_uuid,
      intent: r.intent,
      outcome: r.outcome,
      summary: r.agent_summary,
      recordingUrl: r.recording_url,
      callerNumber: r.caller_number,
      timestamp: r.timestamp,
    }), "call_logs");
  }
}
