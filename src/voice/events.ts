import { z } from "zod";
import type { RawReservationFields } from "../types/contracts.js";

const PhoneRef = z
  .union([z.string(), z.object({ number: z.string().optional() }).passthrough()])
  .nullable()
  .optional();

const CallSchema = z
  .object({
    id: z.string().optional(),
    phoneNumber: PhoneRef,
    to: PhoneRef,
    customer: PhoneRef,
    startedAt: z.string().optional(),
    endedAt: z.string().optional(),
  })
  .passthrough();

const MessageSchema = z
  .object({
    type: z.string().min(1),
    call: CallSchema.optional(),
    phoneNumber: PhoneRef,
    customer: PhoneRef,
    transcript: z.string().optional(),
    summary: z.string().optional(),
    analysis: z
      .object({
        summary: z.string().optional(),
        structuredData: z.record(z.unknown()).nullable().optional(),
      })
      .passthrough()
      .optional(),
    recordingUrl: z.string().optional(),
    stereoRecordingUrl: z.string().optional(),
    startedAt: z.string().optional(),
    endedAt: z.string().optional(),
  })
  .passthrough();

export const WebhookSchema = z.object({ message: MessageSchema }).passthrough();

export type WebhookMessage = z.infer<typeof MessageSchema>;

/** What the call desk needs from an end-of-call report. */
export type CallReport = {
  callId: string;
  dialedNumber: string;
  callerNumber: string;
  transcript: string;
  summary: string;
  recordingUrl: string;
  /** Fields the vendor already extracted; they win over transcript extraction. */
  structured: RawReservationFields;
  endedAt?: string;
};

function numberOf(ref: z.infer<typeof PhoneRef>): string | undefined {
  if (!ref) return undefined;
  if (typeof ref === "string") return ref;
  return ref.number;
}

export function dialedNumber(msg: WebhookMessage): string {
  return numberOf(msg.call?.phoneNumber) ?? numberOf(msg.call?.to) ?? numberOf(msg.phoneNumber) ?? "";
}

export function callerNumber(msg: WebhookMessage): string {
  return numberOf(msg.call?.customer) ?? numberOf(msg.customer) ?? "";
}

export function callIdOf(msg: WebhookMessage): string | undefined {
  return msg.call?.id;
}

const STRUCTURED_KEYS: Array<[keyof RawReservationFields, string[]]> = [
  ["guestName", ["guest_name", "guestName", "name"]],
  ["guestPhone", ["guest_phone", "guestPhone", "phone"]],
  ["date", ["date"]],
  ["time", ["time"]],
  ["partySize", ["guests", "party_size", "partySize"]],
  ["specialRequests", ["special_requests", "specialRequests"]],
];

export function structuredFields(data: Record<string, unknown> | null | undefined): RawReservationFields {
  const out: RawReservationFields = {};
  if (!data) return out;
  for (const [field, keys] of STRUCTURED_KEYS) {
    for (const key of keys) {
      const v = data[key];
      if (typeof v === "string" && v.trim()) {
        out[field] = v.trim();
        break;
      }
      if (typeof v === "number" && Number.isFinite(v)) {
        out[field] = String(v);
        break;
      }
    }
  }
  return out;
}

export function toCallReport(msg: WebhookMessage, fallbackId: string): CallReport {
  return {
    callId: callIdOf(msg) ?? fallbackId,
    dialedNumber: dialedNumber(msg),
    callerNumber: callerNumber(msg),
    transcript: msg.transcript ?? "",
    summary: msg.analysis?.summary ?? msg.summary ?? "",
    recordingUrl: msg.recordingUrl ?? msg.stereoRecordingUrl ?? "",
    structured: structuredFields(msg.analysis?.structuredData),
    endedAt: msg.endedAt ?? msg.call?.endedAt,
  };
}
