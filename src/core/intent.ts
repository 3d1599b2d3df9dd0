import type { CallIntent, RawReservationFields } from "../types/contracts.js";
import { callerText } from "./extract.js";

const RULES: Array<[CallIntent, RegExp]> = [
  ["cancellation", /\bcancel/],
  ["modification", /\breschedul|\b(?:change|move|modify|update) (?:my |our |the )?(?:reservation|booking|table)/],
  ["new_reservation", /\b(?:reserv|book)|\btable for\b|\bparty of\b/],
  ["menu_inquiry", /\b(?:menu|food|dishes|specials|drinks)\b/],
  ["hours_inquiry", /\b(?:hours|open|opening|close|closing)\b/],
];

/** First matching rule wins; extracted booking details count as a reservation request. */
export function classifyIntent(transcript: string, fields: RawReservationFields = {}): CallIntent {
  const text = callerText(transcript).toLowerCase();
  for (const [intent, re] of RULES) {
    if (intent === "new_reservation" && fields.guestName && (fields.date || fields.time || fields.partySize)) {
      return intent;
    }
    if (re.test(text)) return intent;
  }
  return "general_inquiry";
}
