import fs from "fs";
import path from "path";
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
import { byDateTime, compact, digitsOf, matchesQuery, paginate } from "./store.js";
import {
  BusinessSchema,
  CallRecordSchema,
  PendingSchema,
  ReservationSchema,
  UserSchema,
  readRecord,
} from "./schemas.js";
import { Conflict } from "../core/errors.js";
import type { Business, CallRecord, PendingReservation, Reservation, User } from "../types/contracts.js";

type Tombstone = { id: string; deleted: true };

/**
 * One JSONL log per entity. Every write appends the whole record; on load the
 * last line for an id wins and a tombstone removes it.
 */
class Collection<T extends { id: string }> {
  readonly byId = new Map<string, T>();

  constructor(
    private filePath: string,
    private parse: (value: unknown) => T,
  ) {}

  load() {
    if (!fs.existsSync(this.filePath)) fs.writeFileSync(this.filePath, "", "utf8");
    const lines = fs.readFileSync(this.filePath, "utf8").split("\n").filter(Boolean);
    for (const line of lines) {
      const value: unknown = JSON.parse(line);
      if (isTombstone(value)) {
        this.byId.delete(value.id);
        continue;
      }
      const rec = this.parse(value);
      this.byId.set(rec.id, rec);
    }
  }

  values() {
    return [...this.byId.values()];
  }

  get(id: string) {
    return this.byId.get(id) ?? null;
  }

  put(rec: T) {
    fs.appendFileSync(this.filePath, JSON.stringify(rec) + "\n", "utf8");
    this.byId.set(rec.id, rec);
    return rec;
  }

  remove(id: string) {
    if (!this.byId.has(id)) return false;
    const tomb: Tombstone = { id, deleted: true };
    fs.appendFileSync(this.filePath, JSON.stringify(tomb) + "\n", "utf8");
    this.byId.delete(id);
    return true;
  }
}

function isTombstone(v: unknown): v is Tombstone {
  return typeof v === "object" && v !== null && "deleted" in v && v.deleted === true && "id" in v && typeof v.id === "string";
}

export class FileStore implements Store {
  private users: Collection<User>;
  private businesses: Collection<Business>;
  private reservations: Collection<Reservation>;
  private pending: Collection<PendingReservation>;
  private calls: Collection<CallRecord>;

  constructor(private dir: string) {
    const file = (name: string) => path.join(this.dir, `${name}.jsonl`);
    this.users = new Collection<User>(file("users"), (v) => readRecord(UserSchema, v, "users.jsonl"));
    this.businesses = new Collection<Business>(file("businesses"), (v) => readRecord(BusinessSchema, v, "businesses.jsonl"));
    this.reservations = new Collection<Reservation>(file("reservations"), (v) => readRecord(ReservationSchema, v, "reservations.jsonl"));
    this.pending = new Collection<PendingReservation>(file("pending"), (v) => readRecord(PendingSchema, v, "pending.jsonl"));
    this.calls = new Collection<CallRecord>(file("calls"), (v) => readRecord(CallRecordSchema, v, "calls.jsonl"));
  }

  async init(): Promise<void> {
    fs.mkdirSync(this.dir, { recursive: true });
    this.users.load();
    this.businesses.load();
    this.reservations.load();
    this.pending.load();
    this.calls.load();
  }

  async close(): Promise<void> {}

  // users

  async createUser(user: NewUser): Promise<User> {
    if (await this.findUserByEmail(user.email)) throw new Conflict("email_taken");
    return this.users.put({ ...user, id: nanoid() });
  }

  async getUser(id: string): Promise<User | null> {
    return this.users.get(id);
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const needle = email.toLowerCase();
    return this.users.values().find((u) => u.email.toLowerCase() === needle) ?? null;
  }

  async updateUser(id: string, patch: UserPatch): Promise<User | null> {
    const cur = this.users.get(id);
    if (!cur) return null;
    return this.users.put({ ...cur, ...compact(patch) });
  }

  // businesses

  async createBusiness(business: NewBusiness): Promise<Business> {
    if (digitsOf(business.phone) && (await this.findBusinessByPhone(digitsOf(business.phone)))) {
      throw new Conflict("phone_taken");
    }
    return this.businesses.put({ ...business, id: nanoid() });
  }

  async getBusiness(id: string): Promise<Business | null> {
    return this.businesses.get(id);
  }

  async findBusinessByPhone(digits: string): Promise<Business | null> {
    if (!digits) return null;
    return this.businesses.values().find((b) => digitsOf(b.phone) === digits) ?? null;
  }

  async updateBusiness(id: string, patch: BusinessPatch): Promise<Business | null> {
    const cur = this.businesses.get(id);
    if (!cur) return null;
    const next = compact(patch);
    if (next.phone !== undefined && digitsOf(next.phone)) {
      const other = await this.findBusinessByPhone(digitsOf(next.phone));
      if (other && other.id !== id) throw new Conflict("phone_taken");
    }
    return this.businesses.put({ ...cur, ...next });
  }

  // reservations

  async createReservation(reservation: NewReservation): Promise<Reservation> {
    return this.reservations.put({ ...reservation, id: nanoid() });
  }

  async getReservation(businessId: string, id: string): Promise<Reservation | null> {
    const r = this.reservations.get(id);
    return r && r.businessId === businessId ? r : null;
  }

  async findReservationByCallId(callId: string): Promise<Reservation | null> {
    return this.reservations.values().find((r) => r.callId === callId) ?? null;
  }

  async findReservationByPendingId(pendingId: string): Promise<Reservation | null> {
    return this.reservations.values().find((r) => r.pendingId === pendingId) ?? null;
  }

  async listReservations(businessId: string, q: ReservationQuery = {}): Promise<Reservation[]> {
    const rows = this.reservations
      .values()
      .filter((r) => r.businessId === businessId && matchesQuery(r, q))
      .sort(byDateTime);
    return paginate(rows, q);
  }

  async updateReservation(businessId: string, id: string, patch: ReservationPatch): Promise<Reservation | null> {
    const cur = await this.getReservation(businessId, id);
    if (!cur) return null;
    return this.reservations.put({ ...cur, ...compact(patch) });
  }

  // pending

  async createPending(pending: NewPending): Promise<PendingReservation> {
    return this.pending.put({ ...pending, id: nanoid() });
  }

  async getPending(id: string): Promise<PendingReservation | null> {
    return this.pending.get(id);
  }

  async findPendingByCallId(callId: string): Promise<PendingReservation | null> {
    return this.pending.values().find((p) => p.callId === callId) ?? null;
  }

  async listPending(businessId: string, q: Page = {}): Promise<PendingReservation[]> {
    const rows = this.pending
      .values()
      .filter((p) => p.businessId === businessId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    return paginate(rows, q);
  }

  async listUnassignedPending(q: Page = {}): Promise<PendingReservation[]> {
    const rows = this.pending
      .values()
      .filter((p) => !p.businessId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    return paginate(rows, q);
  }

  async assignPending(id: string, businessId: string): Promise<PendingReservation | null> {
    const cur = this.pending.get(id);
    if (!cur) return null;
    return this.pending.put({ ...cur, businessId });
  }

  async deletePending(id: string): Promise<boolean> {
    return this.pending.remove(id);
  }

  // calls

  async appendCall(call: NewCallRecord): Promise<CallRecord> {
    return this.calls.put({ ...call, id: nanoid() });
  }

  async findCallByCallId(callId: string): Promise<CallRecord | null> {
    return this.calls.values().find((c) => c.callId === callId) ?? null;
  }

  async listCalls(businessId: string, q: Page = {}): Promise<CallRecord[]> {
    const rows = this.calls
      .values()
      .filter((c) => c.businessId === businessId)
      .sort((a, b) => b.timestamp.localeCompare(a.timestamp));
    return paginate(rows, q);
  }
}
