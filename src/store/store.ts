import type {
  Business,
  CallRecord,
  PendingReservation,
  Reservation,
  ReservationDetails,
  ReservationStatus,
  User,
} from "../types/contracts.js";

/** `limit` undefined means every matching record. */
export type Page = { limit?: number; offset?: number };

export type ReservationQuery = Page & {
  status?: ReservationStatus;
  /** inclusive, YYYY-MM-DD */
  fromDate?: string;
};

export type NewUser = Omit<User, "id">;
export type NewBusiness = Omit<Business, "id">;
export type NewReservation = Omit<Reservation, "id">;
export type NewPending = Omit<PendingReservation, "id">;
export type NewCallRecord = Omit<CallRecord, "id">;

export type UserPatch = Partial<Pick<User, "status" | "businessId">>;
export type BusinessPatch = Partial<Omit<Business, "id" | "ownerId" | "createdAt">>;
export type ReservationPatch = Partial<ReservationDetails> & { status?: ReservationStatus; updatedAt: string };

/**
 * Persistence seam. Adapters assign ids on create and return the stored record.
 * Reservations list by date then time; pending records oldest first; calls newest first.
 */
export interface Store {
  init(): Promise<void>;
  close(): Promise<void>;

  createUser(user: NewUser): Promise<User>;
  getUser(id: string): Promise<User | null>;
  findUserByEmail(email: string): Promise<User | null>;
  updateUser(id: string, patch: UserPatch): Promise<User | null>;

  createBusiness(business: NewBusiness): Promise<Business>;
  getBusiness(id: string): Promise<Business | null>;
  /** `digits` is the dialed number with everything but digits removed. */
  findBusinessByPhone(digits: string): Promise<Business | null>;
  updateBusiness(id: string, patch: BusinessPatch): Promise<Business | null>;

  createReservation(reservation: NewReservation): Promise<Reservation>;
  getReservation(businessId: string, id: string): Promise<Reservation | null>;
  findReservationByCallId(callId: string): Promise<Reservation | null>;
  findReservationByPendingId(pendingId: string): Promise<Reservation | null>;
  listReservations(businessId: string, q?: ReservationQuery): Promise<Reservation[]>;
  updateReservation(businessId: string, id: string, patch: ReservationPatch): Promise<Reservation | null>;

  createPending(pending: NewPending): Promise<PendingReservation>;
  getPending(id: string): Promise<PendingReservation | null>;
  findPendingByCallId(callId: string): Promise<PendingReservation | null>;
  listPending(businessId: string, q?: Page): Promise<PendingReservation[]>;
  /** Requests staged from a line no business owns. */
  listUnassignedPending(q?: Page): Promise<PendingReservation[]>;
  assignPending(id: string, businessId: string): Promise<PendingReservation | null>;
  deletePending(id: string): Promise<boolean>;

  appendCall(call: NewCallRecord): Promise<CallRecord>;
  findCallByCallId(callId: string): Promise<CallRecord | null>;
  listCalls(businessId: string, q?: Page): Promise<CallRecord[]>;
}

export function digitsOf(phone: string) {
  return phone.replace(/\D/g, "");
}

export function paginate<T>(items: T[], q: Page = {}): T[] {
  const offset = Math.max(0, q.offset ?? 0);
  return q.limit === undefined ? items.slice(offset) : items.slice(offset, offset + q.limit);
}

export function byDateTime(a: Reservation, b: Reservation) {
  return a.date.localeCompare(b.date) || a.time.localeCompare(b.time) || a.createdAt.localeCompare(b.createdAt);
}

export function matchesQuery(r: Reservation, q: ReservationQuery = {}) {
  if (q.status && r.status !== q.status) return false;
  if (q.fromDate && r.date < q.fromDate) return false;
  return true;
}

/** Drops keys whose value is undefined so a spread never erases a stored field. */
export function compact<T extends object>(patch: T): Partial<T> {
  return Object.fromEntries(Object.entries(patch).filter(([, v]) => v !== undefined));
}
