import { z } from "zod";
import type { Logger } from "pino";
import type { Store } from "../store/store.js";
import type { PendingReservation, Reservation, ReservationDetails } from "../types/contracts.js";
import { Conflict, NotFound } from "../core/errors.js";
import { canTransitionReservation } from "../core/transitions.js";
import { DEFAULT_MAX_PARTY_SIZE } from "../core/normalize.js";
import { parseInput } from "../core/validate.js";

function isCalendarDay(s: string) {
  const [y, m, d] = s.split("-").map(Number);
  const dt = new Date(Date.UTC(y, m - 1, d));
  return dt.getUTCFullYear() === y && dt.getUTCMonth() === m - 1 && dt.getUTCDate() === d;
}

/** The strict shape a reservation takes when a person types it in. */
export function detailsSchema(maxPartySize = DEFAULT_MAX_PARTY_SIZE) {
  return z
    .object({
      guestName: z.string().trim().min(1).max(80).regex(/\p{L}/u, "must contain a letter"),
      guestPhone: z
        .string()
        .default("")
        .transform((p) => p.replace(/\D/g, ""))
        .refine((d) => d === "" || (d.length >= 7 && d.length <= 15), "phone needs 7-15 digits"),
      date: z
        .string()
        .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
        .refine(isCalendarDay, "not a calendar date"),
      time: z.string().regex(/^(?:[01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM (24-hour)"),
      partySize: z.number().int().min(1).max(maxPartySize),
      specialRequests: z.string().trim().max(500).default(""),
    })
    .strict();
}

const AssignSchema = z.object({ businessId: z.string().trim().min(1) }).strict();

const ListQuerySchema = z.object({
  status: z.enum(["confirmed", "cancelled", "pending_review"]).optional(),
  from: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const PageSchema = ListQuerySchema.pick({ limit: true, offset: true });

export function createLedger(args: { store: Store; logger: Logger; maxPartySize?: number; now?: () => Date }) {
  const log = args.logger;
  const now = args.now ?? (() => new Date());
  const Details = detailsSchema(args.maxPartySize);
  const Patch = Details.partial()
    .strict()
    .refine((p) => Object.values(p).some((v) => v !== undefined), "nothing to update");

  async function load(businessId: string, id: string) {
    const r = await args.store.getReservation(businessId, id);
    if (!r) throw new NotFound("reservation_not_found");
    return r;
  }

  async function loadPending(businessId: string, id: string) {
    const p = await args.store.getPending(id);
    if (!p || p.businessId !== businessId) throw new NotFound("pending_not_found");
    return p;
  }

  async function create(businessId: string, raw: unknown): Promise<Reservation> {
    const details: ReservationDetails = parseInput(Details, raw);
    const at = now().toISOString();
    const r = await args.store.createReservation({
      ...details,
      businessId,
      status: "confirmed",
      source: "manual",
      createdAt: at,
      updatedAt: at,
    });
    log.info({ businessId, reservationId: r.id }, "reservation: created");
    return r;
  }

  async function get(businessId: string, id: string) {
    return load(businessId, id);
  }

  async function list(businessId: string, rawQuery: unknown) {
    const q = parseInput(ListQuerySchema, rawQuery);
    return args.store.listReservations(businessId, {
      status: q.status,
      fromDate: q.from,
      limit: q.limit,
      offset: q.offset,
    });
  }

  /** Only a confirmed reservation takes edits. */
  async function edit(businessId: string, id: string, raw: unknown) {
    const patch = parseInput(Patch, raw);
    const current = await load(businessId, id);
    if (current.status !== "confirmed") {
      throw new Conflict("reservation_not_editable", { status: current.status });
    }
    const updated = await args.store.updateReservation(businessId, id, { ...patch, updatedAt: now().toISOString() });
    if (!updated) throw new NotFound("reservation_not_found");

    log.info({ businessId, reservationId: id, fields: Object.keys(patch) }, "reservation: edited");
    return updated;
  }

  async function cancel(businessId: string, id: string) {
    const current = await load(businessId, id);
    if (!canTransitionReservation(current.status, "cancelled")) {
      throw new Conflict("invalid_transition", { from: current.status, to: "cancelled" });
    }
    const updated = await args.store.updateReservation(businessId, id, {
      status: "cancelled",
      updatedAt: now().toISOString(),
    });
    if (!updated) throw new NotFound("reservation_not_found");

    log.info({ businessId, reservationId: id }, "reservation: cancelled");
    return updated;
  }

  async function listPending(businessId: string, rawQuery: unknown): Promise<PendingReservation[]> {
    const q = parseInput(PageSchema, rawQuery);
    return args.store.listPending(businessId, q);
  }

  /** The pending record stays behind as the audit trail of the call. */
  async function promote(businessId: string, pendingId: string, raw: unknown) {
    const details: ReservationDetails = parseInput(Details, raw);
    const pending = await loadPending(businessId, pendingId);
    const existing = await args.store.findReservationByPendingId(pending.id);
    if (existing) throw new Conflict("already_promoted", { reservationId: existing.id });

    const at = now().toISOString();
    const r = await args.store.createReservation({
      ...details,
      businessId,
      status: "confirmed",
      source: "promoted",
      pendingId: pending.id,
      createdAt: at,
      updatedAt: at,
    });
    log.info({ businessId, pendingId, reservationId: r.id }, "pending: promoted");
    return r;
  }

  async function discard(businessId: string, pendingId: string) {
    const pending = await loadPending(businessId, pendingId);
    await args.store.deletePending(pending.id);
    log.info({ businessId, pendingId }, "pending: discarded");
    return { id: pending.id };
  }

  async function listUnassigned(rawQuery: unknown): Promise<PendingReservation[]> {
    const q = parseInput(PageSchema, rawQuery);
    return args.store.listUnassignedPending(q);
  }

  /** Hands a request staged from an unknown line to the business it was meant for. */
  async function assign(pendingId: string, raw: unknown) {
    const { businessId } = parseInput(AssignSchema, raw);
    const pending = await args.store.getPending(pendingId);
    if (!pending) throw new NotFound("pending_not_found");
    if (pending.businessId) throw new Conflict("pending_already_assigned", { businessId: pending.businessId });
    if (!(await args.store.getBusiness(businessId))) throw new NotFound("business_not_found");

    const assigned = await args.store.assignPending(pendingId, businessId);
    if (!assigned) throw new NotFound("pending_not_found");
    log.info({ businessId, pendingId }, "pending: assigned");
    return assigned;
  }

  return { create, get, list, edit, cancel, listPending, promote, discard, listUnassigned, assign };
}

export type Ledger = ReturnType<typeof createLedger>;
