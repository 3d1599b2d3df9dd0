export type UserStatus = "pending" | "active";
export type ReservationStatus = "confirmed" | "cancelled" | "pending_review";
export type ReservationSource = "call" | "manual" | "promoted";

export type CallIntent =
  | "new_reservation"
  | "cancellation"
  | "modification"
  | "menu_inquiry"
  | "hours_inquiry"
  | "general_inquiry";

export type CallOutcome = "booked" | "staged" | "completed" | "missed";

export interface User {
  id: string;
  email: string;
  businessName: string;
  fullName: string;
  occupation: string;
  phone: string;
  passwordHash: string;
  status: UserStatus;
  businessId?: string;
  createdAt: string; // ISO
}

export interface VoiceProfile {
  businessType?: string;
  address?: string;
  description?: string;
  policies?: string;
  reservationRules?: string;
  script?: string;
  knowledgeBase?: string;
}

export interface Business extends VoiceProfile {
  id: string;
  name: string;
  phone: string;
  ownerId: string;
  assistantId?: string;
  createdAt: string; // ISO
}

export interface ReservationDetails {
  guestName: string;
  guestPhone: string;
  date: string; // YYYY-MM-DD
  time: string; // HH:MM
  partySize: number;
  specialRequests: string;
}

export interface Reservation extends ReservationDetails {
  id: string;
  businessId: string;
  status: ReservationStatus;
  source: ReservationSource;
  callId?: string;
  pendingId?: string;
  createdAt: string; // ISO
  updatedAt: string; // ISO
}

/** Free-text fields as captured from a call, before normalization. */
export interface RawReservationFields {
  guestName?: string;
  guestPhone?: string;
  date?: string;
  time?: string;
  partySize?: string;
  specialRequests?: string;
}

export type NormalizationField = keyof RawReservationFields;
export type NormalizationReason = "missing" | "ambiguous" | "unparsable" | "out_of_range";

export interface NormalizationFailure {
  field: NormalizationField;
  input: string;
  reason: NormalizationReason;
}

export interface PendingPayload {
  raw: RawReservationFields;
  failures: NormalizationFailure[];
  referenceTime?: string; // ISO
}

export interface PendingReservation {
  id: string;
  businessId?: string;
  callId?: string;
  payload: PendingPayload;
  createdAt: string; // ISO
}

export interface CallRecord {
  id: string;
  businessId: string;
  callId: string;
  intent: CallIntent;
  outcome: CallOutcome;
  summary: string;
  recordingUrl: string;
  callerNumber: string;
  timestamp: string; // ISO
}
