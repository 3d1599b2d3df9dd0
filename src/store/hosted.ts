import { z } from "zod";
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
import { byDateTime, compact, digitsOf, matchesQuery, paginate } from "./store.js";
import {
  BusinessSchema,
  CallRecordSchema,
  PendingSchema,
  ReservationSchema,
  UserSchema,
  readRecord,
} from "./schemas.js";
import type { HostedTables } from "../config/config.js";
import { Conflict, UpstreamUnavailable, ValidationError } from "../core/errors.js";
import type { Business, CallRecord, PendingReservation, Reservation, User } from "../types/contracts.js";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type HostedStoreOptions = {
  apiKey: string;
  baseId: string;
  /** e.g. https://api.airtable.com/v0 */
  apiUrl: string;
  tables: HostedTables;
  fetch?: FetchLike;
};

type Fields = Record<string, unknown>;

const RecordSchema = z.object({
  id: z.string().min(1),
  createdTime: z.string().optional(),
  fields: z.record(z.unknown()).default({}),
});
type HostedRecord = z.infer<typeof RecordSchema>;

const ListSchema = z.object({
  records: z.array(RecordSchema),
  offset: z.string().optional(),
});

const PAGE_SIZE = 100;

/** `{field}='value'` with the value quoted for the formula language. */
export function eq(field: string, value: string) {
  return `{${field}}='${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

/** Airtable leaves empty cells out of the response. */
function text(v: unknown) {
  return v === undefined ? "" : v;
}

function optText(v: unknown) {
  return v === "" || v === null ? undefined : v;
}

function count(v: unknown) {
  return typeof v === "string" && /^\d+$/.test(v.trim()) ? Number(v) : v;
}

function parseJson(v: unknown, where: string): unknown {
  if (typeof v !== "string") return v;
  try {
    return JSON.parse(v);
  } catch {
    throw new ValidationError("invalid_record", { where });
  }
}

/** One table of the hosted base over its REST API. */
class HostedTable {
  constructor(
    private opts: HostedStoreOptions,
    private table: string,
    private fetchImpl: FetchLike,
  ) {}

  private url(suffix = "") {
    return `${this.opts.apiUrl}/${encodeURIComponent(this.opts.baseId)}/${encodeURIComponent(this.table)}${suffix}`;
  }

  private async request(method: string, url: string, body?: unknown): Promise<unknown> {
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.opts.apiKey}`,
          "Content-Type": "application/json",
        },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (e) {
      throw new UpstreamUnavailable("hosted store", { table: this.table, message: String(e) });
    }

    if (res.status === 404) return null;
    if (res.status >= 500 || res.status === 429) {
      throw new UpstreamUnavailable("hosted store", { table: this.table, status: res.status });
    }

    const raw = await res.text();
    if (!res.ok) {
      throw new Error(`hosted store rejected ${method} ${this.table}: ${res.status} ${raw.slice(0, 200)}`);
    }
    return raw ? parseJson(raw, this.table) : null;
  }

  private record(value: unknown): HostedRecord {
    return readRecord(RecordSchema, value, this.table);
  }

  async create(fields: Fields): Promise<HostedRecord> {
    const res = await this.request("POST", this.url(), { fields, typecast: true });
    return this.record(res);
  }

  async get(id: string): Promise<HostedRecord | null> {
    const res = await this.request("GET", this.url(`/${encodeURIComponent(id)}`));
    return res === null ? null : this.record(res);
  }

  async list(filterByFormula?: string): Promise<HostedRecord[]> {
    const out: HostedRecord[] = [];
    let offset: string | undefined;
    do {
      const qs = new URLSearchParams({ pageSize: String(PAGE_SIZE) });
      if (filterByFormula) qs.set("filterByFormula", filterByFormula);
      if (offset) qs.set("offset", offset);
      const res = await this.request("GET", this.url(`?${qs.toString()}`));
      const page = readRecord(ListSchema, res, this.table);
      out.push(...page.records);
      offset = page.offset;
    } while (offset);
    return out;
  }

  async first(filterByFormula: string): Promise<HostedRecord | null> {
    const rows = await this.list(filterByFormula);
    return rows[0] ?? null;
  }

  async patch(id: string, fields: Fields): Promise<HostedRecord | null> {
    const res = await this.request("PATCH", this.url(`/${encodeURIComponent(id)}`), { fields, typecast: true });
    return res === null ? null : this.record(res);
  }

  async delete(id: string): Promise<boolean> {
    const res = await this.request("DELETE", this.url(`/${encodeURIComponent(id)}`));
    return res !== null;
  }
}

/**
 * Store over an Airtable-style base. Ids are the base's record ids; column
 * names follow the legacy snake_case schema so existing bases keep working.
 */
export class HostedStore implements Store {
  private users: HostedTable;
  private businesses: HostedTable;
  private reservations: HostedTable;
  private pending: HostedTable;
  private calls: HostedTable;

  constructor(opts: HostedStoreOptions) {
    const f: FetchLike = opts.fetch ?? ((url, init) => fetch(url, init));
    this.users = new HostedTable(opts, opts.tables.users, f);
    this.businesses = new HostedTable(opts, opts.tables.businesses, f);
    this.reservations = new HostedTable(opts, opts.tables.reservations, f);
    this.pending = new HostedTable(opts, opts.tables.pending, f);
    this.calls = new HostedTable(opts, opts.tables.calls, f);
  }

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  // users

  async createUser(user: NewUser): Promise<User> {
    if (await this.findUserByEmail(user.email)) throw new Conflict("email_taken");
    const rec = await this.users.create({
      email: user.email,
      business_name: user.businessName,
      full_name: user.fullName,
      occupation: user.occupation,
      phone: user.phone,
      password_hash: user.passwordHash,
      status: user.status,
      restaurant_id: user.businessId,
      created_at: user.createdAt,
    });
    return this.toUser(rec);
  }

  async getUser(id: string): Promise<User | null> {
    const rec = await this.users.get(id);
    return rec ? this.toUser(rec) : null;
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const needle = email.toLowerCase().replace(/\\/g, "\\\\").replace(/'/g, "\\'");
    const rec = await this.users.first(`LOWER({email})='${needle}'`);
    return rec ? this.toUser(rec) : null;
  }

  async updateUser(id: string, patch: UserPatch): Promise<User | null> {
    const p = compact(patch);
    const rec = await this.users.patch(id, compact({ status: p.status, restaurant_id: p.businessId }));
    return rec ? this.toUser(rec) : null;
  }

  // businesses

  async createBusiness(business: NewBusiness): Promise<Business> {
    const digits = digitsOf(business.phone);
    if (digits && (await this.findBusinessByPhone(digits))) throw new Conflict("phone_taken");
    const rec = await this.businesses.create(
      compact({ ...this.businessFields(business), owner_id: business.ownerId, created_at: business.createdAt }),
    );
    return this.toBusiness(rec);
  }

  async getBusiness(id: string): Promise<Business | null> {
    const rec = await this.businesses.get(id);
    return rec ? this.toBusiness(rec) : null;
  }

  async findBusinessByPhone(digits: string): Promise<Business | null> {
    if (!digits) return null;
    const rec = await this.businesses.first(eq("normalized_phone", digits));
    return rec ? this.toBusiness(rec) : null;
  }

  async updateBusiness(id: string, patch: BusinessPatch): Promise<Business | null> {
    const next = compact(patch);
    if (next.phone !== undefined && digitsOf(next.phone)) {
      const other = await this.findBusinessByPhone(digitsOf(next.phone));
      if (other && other.id !== id) throw new Conflict("phone_taken");
    }
    const rec = await this.businesses.patch(id, compact(this.businessFields(next)));
    return rec ? this.toBusiness(rec) : null;
  }

  private businessFields(b: BusinessPatch): Fields {
    return {
      name: b.name,
      phone_number: b.phone,
      normalized_phone: b.phone === undefined ? undefined : digitsOf(b.phone),
      business_type: b.businessType,
      address: b.address,
      description: b.description,
      policies: b.policies,
      reservation_rules: b.reservationRules,
      script: b.script,
      knowledge_base: b.knowledgeBase,
      assistant_id: b.assistantId,
    };
  }

  // reservations

  async createReservation(r: NewReservation): Promise<Reservation> {
    const rec = await this.reservations.create(
      compact({
        restaurant_id: r.businessId,
        ...this.reservationFields(r),
        source: r.source,
        call_id: r.callId,
        pending_id: r.pendingId,
        created_at: r.createdAt,
      }),
    );
    return this.toReservation(rec);
  }

  async getReservation(businessId: string, id: string): Promise<Reservation | null> {
    const rec = await this.reservations.get(id);
    if (!rec) return null;
    const r = this.toReservation(rec);
    return r.businessId === businessId ? r : null;
  }

  async findReservationByCallId(callId: string): Promise<Reservation | null> {
    const rec = await this.reservations.first(eq("call_id", callId));
    return rec ? this.toReservation(rec) : null;
  }

  async findReservationByPendingId(pendingId: string): Promise<Reservation | null> {
    const rec = await this.reservations.first(eq("pending_id", pendingId));
    return rec ? this.toReservation(rec) : null;
  }

  async listReservations(businessId: string, q: ReservationQuery = {}): Promise<Reservation[]> {
    // legacy rows carry "Confirmed" etc., so status and date filter after normalization
    const recs = await this.reservations.list(eq("restaurant_id", businessId));
    const rows = recs.map((rec) => this.toReservation(rec)).filter((r) => matchesQuery(r, q)).sort(byDateTime);
    return paginate(rows, q);
  }

  async updateReservation(businessId: string, id: string, patch: ReservationPatch): Promise<Reservation | null> {
    if (!(await this.getReservation(businessId, id))) return null;
    const rec = await this.reservations.patch(id, compact(this.reservationFields(patch)));
    return rec ? this.toReservation(rec) : null;
  }

  private reservationFields(r: Partial<ReservationPatch>): Fields {
    return {
      guest_name: r.guestName,
      guest_phone: r.guestPhone,
      date: r.date,
      time: r.time,
      guests: r.partySize,
      special_requests: r.specialRequests,
      status: r.status,
      updated_at: r.updatedAt,
    };
  }

  // pending

  async createPending(p: NewPending): Promise<PendingReservation> {
    const rec = await this.pending.create(
      compact({
        restaurant_id: p.businessId,
        call_id: p.callId,
        data: JSON.stringify(p.payload),
        created_at: p.createdAt,
      }),
    );
    return this.toPending(rec);
  }

  async getPending(id: string): Promise<PendingReservation | null> {
    const rec = await this.pending.get(id);
    return rec ? this.toPending(rec) : null;
  }

  async findPendingByCallId(callId: string): Promise<PendingReservation | null> {
    const rec = await this.pending.first(eq("call_id", callId));
    return rec ? this.toPending(rec) : null;
  }

  async listPending(businessId: string, q: Page = {}): Promise<PendingReservation[]> {
    const recs = await this.pending.list(eq("restaurant_id", businessId));
    const rows = recs.map((rec) => this.toPending(rec)).sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    return paginate(rows, q);
  }

  async listUnassignedPending(q: Page = {}): Promise<PendingReservation[]> {
    const recs = await this.pending.list(eq("restaurant_id", ""));
    const rows = recs.map((rec) => this.toPending(rec)).sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    return paginate(rows, q);
  }

  async assignPending(id: string, businessId: string): Promise<PendingReservation | null> {
    const rec = await this.pending.patch(id, { restaurant_id: businessId });
    return rec ? this.toPending(rec) : null;
  }

  async deletePending(id: string): Promise<boolean> {
    return this.pending.delete(id);
  }

  // calls

  async appendCall(c: NewCallRecord): Promise<CallRecord> {
    const rec = await this.calls.create({
      restaurant_id: c.businessId,
      call_uuid: c.callId,
      intent: c.intent,
      outcome: c.outcome,
      agent_summary: c.summary,
      recording_url: c.recordingUrl,
      caller_number: c.callerNumber,
      timestamp: c.timestamp,
    });
    return this.toCall(rec);
  }

  async findCallByCallId(callId: string): Promise<CallRecord | null> {
    const rec = await this.calls.first(eq("call_uuid", callId));
    return rec ? this.toCall(rec) : null;
  }

  async listCalls(businessId: string, q: Page = {}): Promise<CallRecord[]> {
    const recs = await this.calls.list(eq("restaurant_id", businessId));
    const rows = recs.map((rec) => this.toCall(rec)).sort((a, b) => b.timestamp.localeCompare(a.timestamp));
    return paginate(rows, q);
  }

  // records

  private toUser({ id, createdTime, fields: f }: HostedRecord): User {
    return readRecord(UserSchema, compact({
      id,
      email: f.email,
      businessName: text(f.business_name),
      fullName: text(f.full_name),
      occupation: text(f.occupation),
      phone: text(f.phone),
      passwordHash: text(f.password_hash),
      status: f.status ?? "pending",
      businessId: optText(f.restaurant_id),
      createdAt: f.created_at ?? createdTime,
    }), "users");
  }

  private toBusiness({ id, createdTime, fields: f }: HostedRecord): Business {
    return readRecord(BusinessSchema, compact({
      id,
      name: text(f.name),
      phone: text(f.phone_number),
      ownerId: f.owner_id,
      businessType: optText(f.business_type),
      address: optText(f.address),
      description: optText(f.description),
      policies: optText(f.policies),
      reservationRules: optText(f.reservation_rules),
      script: optText(f.script),
      knowledgeBase: optText(f.knowledge_base),
      assistantId: optText(f.assistant_id),
      createdAt: f.created_at ?? createdTime,
    }), "businesses");
  }

  private toReservation({ id, createdTime, fields: f }: HostedRecord): Reservation {
    const createdAt = f.created_at ?? createdTime;
    return readRecord(ReservationSchema, compact({
      id,
      businessId: f.restaurant_id,
      guestName: text(f.guest_name),
      guestPhone: text(f.guest_phone),
      date: f.date,
      time: f.time,
      partySize: count(f.guests),
      specialRequests: text(f.special_requests),
      status: f.status ?? "confirmed",
      source: f.source ?? "call",
      callId: optText(f.call_id),
      pendingId: optText(f.pending_id),
      createdAt,
      updatedAt: f.updated_at ?? createdAt,
    }), "reservations");
  }

  private toPending({ id, createdTime, fields: f }: HostedRecord): PendingReservation {
    return readRecord(PendingSchema, compact({
      id,
      businessId: optText(f.restaurant_id),
      callId: optText(f.call_id),
      payload: parseJson(f.data, "pending"),
      createdAt: f.created_at ?? createdTime,
    }), "pending");
  }

  private toCall({ id, createdTime, fields: f }: HostedRecord): CallRecord {
    return readRecord(CallRecordSchema, compact({
      id,
      businessId: f.restaurant_id,
      callId: text(f.call_uuid),
      intent: f.intent ?? "general_inquiry",
      outcome: f.outcome ?? "completed",
      summary: text(f.agent_summary),
      recordingUrl: text(f.recording_url),
      callerNumber: text(f.caller_number),
      timestamp: f.timestamp ?? createdTime,
    }), "calls");
  }
}
