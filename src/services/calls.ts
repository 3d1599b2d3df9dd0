import { z } from "zod";
import type { Logger } from "pino";
import type { Store } from "../store/store.js";
import { compact, digitsOf } from "../store/store.js";
import type { Business, CallIntent, CallOutcome, CallRecord, RawReservationFields } from "../types/contracts.js";
import { extractReservationFields } from "../core/extract.js";
import { classifyIntent } from "../core/intent.js";
import { normalizeReservation } from "../core/normalize.js";
import { parseInput } from "../core/validate.js";
import type { CallReport } from "../voice/events.js";
import { UNKNOWN_NUMBER_GREETING, assistantConfig } from "../voice/prompts.js";
import type { AssistantConfig } from "../voice/prompts.js";

export type CallResult = {
  callId: string;
  businessId: string | null;
  intent: CallIntent;
  outcome: CallOutcome;
  reservationId?: string;
  pendingId?: string;
};

const PageSchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

function referenceTime(report: CallReport, fallback: Date) {
  const t = report.endedAt ? new Date(report.endedAt) : fallback;
  return Number.isNaN(t.getTime()) ? fallback : t;
}

function outcomeFor(hasWords: boolean, intent: CallIntent, kind: "parsed" | "staged" | null): CallOutcome {
  if (!hasWords) return "missed";
  if (intent !== "new_reservation" || kind === null) return "completed";
  return kind === "parsed" ? "booked" : "staged";
}

export function createCallDesk(args: { store: Store; logger: Logger; maxPartySize?: number; now?: () => Date }) {
  const log = args.logger;
  const now = args.now ?? (() => new Date());

  async function resolveBusiness(dialed: string): Promise<Business | null> {
    const digits = digitsOf(dialed);
    return digits ? args.store.findBusinessByPhone(digits) : null;
  }

  /**
   * End-of-call flow. Each write is keyed by the call id, so a redelivered
   * report finishes whatever an earlier attempt left undone and never duplicates.
   */
  async function completeCall(report: CallReport): Promise<CallResult> {
    const clog = log.child({ callId: report.callId });
    const ref = referenceTime(report, now());
    const business = await resolveBusiness(report.dialedNumber);
    if (!business) clog.warn({ dialed: report.dialedNumber }, "call: unknown dialed number");

    const fields: RawReservationFields = {
      ...extractReservationFields(report.transcript),
      ...compact(report.structured),
    };
    const hasStructured = Object.keys(compact(report.structured)).length > 0;
    const hasWords = report.transcript.trim().length > 0 || hasStructured;
    const intent: CallIntent = hasStructured ? "new_reservation" : classifyIntent(report.transcript, fields);

    const result: CallResult = {
      callId: report.callId,
      businessId: business?.id ?? null,
      intent,
      outcome: "completed",
    };

    let kind: "parsed" | "staged" | null = null;
    if (hasWords && intent === "new_reservation") {
      if (!fields.guestPhone && report.callerNumber) fields.guestPhone = report.callerNumber;
      const normalized = normalizeReservation(fields, { referenceTime: ref, maxPartySize: args.maxPartySize });

      if (normalized.kind === "parsed" && business) {
        kind = "parsed";
        const existing = await args.store.findReservationByCallId(report.callId);
        const r =
          existing ??
          (await args.store.createReservation({
            ...normalized.reservation,
            businessId: business.id,
            status: "confirmed",
            source: "call",
            callId: report.callId,
            createdAt: now().toISOString(),
            updatedAt: now().toISOString(),
          }));
        result.reservationId = r.id;
        if (!existing) clog.info({ reservationId: r.id }, "call: reservation booked");
      } else {
        // an unknown line still keeps the request so nothing the caller said is lost
        kind = "staged";
        const existing = await args.store.findPendingByCallId(report.callId);
        const p =
          existing ??
          (await args.store.createPending({
            businessId: business?.id,
            callId: report.callId,
            payload: {
              raw: fields,
              failures: normalized.kind === "staged" ? normalized.failures : [],
              referenceTime: ref.toISOString(),
            },
            createdAt: now().toISOString(),
          }));
        result.pendingId = p.id;
        if (!existing) {
          clog.info(
            { pendingId: p.id, failures: normalized.kind === "staged" ? normalized.failures.map((f) => f.field) : [] },
            "call: reservation staged",
          );
        }
      }
    }

    result.outcome = outcomeFor(hasWords, intent, kind);

    if (business && !(await args.store.findCallByCallId(report.callId))) {
      await args.store.appendCall({
        businessId: business.id,
        callId: report.callId,
        intent,
        outcome: result.outcome,
        summary: report.summary,
        recordingUrl: report.recordingUrl,
        callerNumber: report.callerNumber,
        timestamp: ref.toISOString(),
      });
    }

    clog.info({ businessId: result.businessId, intent, outcome: result.outcome }, "call: completed");
    return result;
  }

  /** Per-call assistant for the dialed line; an unknown line gets an apology. */
  async function assistantFor(dialed: string): Promise<{ assistant: AssistantConfig | { firstMessage: string } }> {
    const business = await resolveBusiness(dialed);
    if (!business) {
      log.warn({ dialed }, "assistant: unknown dialed number");
      return { assistant: { firstMessage: UNKNOWN_NUMBER_GREETING } };
    }
    return { assistant: assistantConfig(business, now()) };
  }

  async function list(businessId: string, rawQuery: unknown): Promise<CallRecord[]> {
    const q = parseInput(PageSchema, rawQuery);
    return args.store.listCalls(businessId, q);
  }

  return { completeCall, assistantFor, list };
}

export type CallDesk = ReturnType<typeof createCallDesk>;
