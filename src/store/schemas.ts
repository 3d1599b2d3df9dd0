import { z } from "zod";
import { ValidationError } from "../core/errors.js";

const LEGACY_USER_STATUS: Record<string, string> = { done: "active", Pending: "pending", Active: "active" };
const LEGACY_RESERVATION_STATUS: Record<string, string> = {
  Confirmed: "confirmed",
  Cancelled: "cancelled",
  Canceled: "cancelled",
  canceled: "cancelled",
  "Pending Review": "pending_review",
};

function legacy(map: Record<string, string>) {
  return (v: unknown) => (typeof v === "string" && Object.hasOwn(map, v) ? map[v] : v);
}

export const UserStatusSchema = z.preprocess(legacy(LEGACY_USER_STATUS), z.enum(["pending", "active"]));
export const ReservationStatusSchema = z.preprocess(
  legacy(LEGACY_RESERVATION_STATUS),
  z.enum(["confirmed", "cancelled", "pending_review"]),
);

const IsoDay = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
const Clock = z.string().regex(/^(?:[01]\d|2[0-3]):[0-5]\d$/);

export const UserSchema = z.object({
  id: z.string().min(1),
  email: z.string().min(1),
  businessName: z.string(),
  fullName: z.string(),
  occupation: z.string(),
  phone: z.string(),
  passwordHash: z.string(),
  status: UserStatusSchema,
  businessId: z.string().min(1).optional(),
  createdAt: z.string(),
});

export const BusinessSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  phone: z.string(),
  ownerId: z.string().min(1),
  businessType: z.string().optional(),
  address: z.string().optional(),
  description: z.string().optional(),
  policies: z.string().optional(),
  reservationRules: z.string().optional(),
  script: z.string().optional(),
  knowledgeBase: z.string().optional(),
  assistantId: z.string().optional(),
  createdAt: z.string(),
});

export const ReservationSchema = z.object({
  id: z.string().min(1),
  businessId: z.string().min(1),
  guestName: z.string(),
  guestPhone: z.string(),
  date: IsoDay,
  time: Clock,
  partySize: z.number().int().positive(),
  specialRequests: z.string(),
  status: ReservationStatusSchema,
  source: z.enum(["call", "manual", "promoted"]),
  callId: z.string().optional(),
  pendingId: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const RawFieldsSchema = z.object({
  guestName: z.string().optional(),
  guestPhone: z.string().optional(),
  date: z.string().optional(),
  time: z.string().optional(),
  partySize: z.string().optional(),
  specialRequests: z.string().optional(),
});

export const PendingPayloadSchema = z.object({
  raw: RawFieldsSchema,
  failures: z.array(
    z.object({
      field: z.enum(["guestName", "guestPhone", "date", "time", "partySize", "specialRequests"]),
      input: z.string(),
      reason: z.enum(["missing", "ambiguous", "unparsable", "out_of_range"]),
    }),
  ),
  referenceTime: z.string().optional(),
});

export const PendingSchema = z.object({
  id: z.string().min(1),
  businessId: z.string().optional(),
  callId: z.string().optional(),
  payload: PendingPayloadSchema,
  createdAt: z.string(),
});

export const CallRecordSchema = z.object({
  id: z.string().min(1),
  businessId: z.string().min(1),
  callId: z.string(),
  intent: z.enum([
    "new_reservation",
    "cancellation",
    "modification",
    "menu_inquiry",
    "hours_inquiry",
    "general_inquiry",
  ]),
  outcome: z.enum(["booked", "staged", "completed", "missed"]),
  summary: z.string(),
  recordingUrl: z.string(),
  callerNumber: z.string(),
  timestamp: z.string(),
});

/** Parse a record read back from storage; a mismatch means the store holds something we never wrote. */
export function readRecord<S extends z.ZodTypeAny>(schema: S, value: unknown, where: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError("invalid_record", { where, issues: parsed.error.flatten() });
  }
  return parsed.data;
}
