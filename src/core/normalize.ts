import type {
  NormalizationFailure,
  NormalizationReason,
  RawReservationFields,
  ReservationDetails,
} from "../types/contracts.js";
import { parseNumberPhrase } from "./words.js";

export type FieldResult<T> = { ok: true; value: T } | { ok: false; reason: NormalizationReason };

export type NormalizeOutcome =
  | { kind: "parsed"; reservation: ReservationDetails }
  | { kind: "staged"; failures: NormalizationFailure[]; raw: RawReservationFields };

export type NormalizeOptions = {
  /** Relative dates ("tomorrow", "next friday") resolve against this instant's UTC calendar day. */
  referenceTime: Date;
  maxPartySize?: number;
};

export const DEFAULT_MAX_PARTY_SIZE = 30;
const MAX_NAME_LENGTH = 80;
const MAX_REQUESTS_LENGTH = 500;
const MAX_DAYS_AHEAD = 365;

const ok = <T>(value: T): FieldResult<T> => ({ ok: true, value });
const fail = (reason: NormalizationReason): FieldResult<never> => ({ ok: false, reason });

function pad2(n: number) {
  return String(n).padStart(2, "0");
}

function squash(input: string) {
  return input.trim().toLowerCase().replace(/\s+/g, " ");
}

// ---------------------------------------------------------------------------
// time
// ---------------------------------------------------------------------------

type Meridiem = "am" | "pm";

function dayPartOf(s: string): { meridiem?: Meridiem; rest: string } {
  const pm = /\b(?:in the |this |at )?(afternoon|evening|night|tonight)\b/;
  const am = /\b(?:in the |this )?(morning)\b/;
  if (pm.test(s) && am.test(s)) return { rest: s };
  if (pm.test(s)) return { meridiem: "pm", rest: s.replace(pm, " ") };
  if (am.test(s)) return { meridiem: "am", rest: s.replace(am, " ") };
  return { rest: s };
}

type ClockParts = { hour: number; minute: number; offset: number; twoDigitHour: boolean; digits: boolean };

function parseClock(text: string): ClockParts | null {
  const core = text.replace(/ ?oclock$/, "");
  const digits = core.match(/^(\d{1,2})(?:[:.h](\d{2}))?$/);
  if (digits) {
    return {
      hour: Number(digits[1]),
      minute: digits[2] === undefined ? 0 : Number(digits[2]),
      offset: 0,
      twoDigitHour: digits[1].length === 2 && digits[2] !== undefined,
      digits: true,
    };
  }

  const relative = core.match(/^(half|quarter|\d{1,2}|[a-z]+(?:[ -][a-z]+)?) (past|after|to|till|before) (.+)$/);
  if (relative) {
    const [, amount, direction, hourText] = relative;
    const minutes = amount === "half" ? 30 : amount === "quarter" ? 15 : parseNumberPhrase(amount);
    const hour = parseNumberPhrase(hourText.replace(/ ?oclock$/, ""));
    if (minutes === null || hour === null || minutes <= 0 || minutes >= 60) return null;
    if (amount === "half" && direction !== "past" && direction !== "after") return null;
    const back = direction === "to" || direction === "till" || direction === "before";
    return { hour, minute: 0, offset: back ? -minutes : minutes, twoDigitHour: false, digits: false };
  }

  const words = core.match(/^([a-z]+)(?: (oclock|[a-z]+(?:[ -][a-z]+)?))?$/);
  if (words) {
    const hour = parseNumberPhrase(words[1]);
    if (hour === null) return null;
    let minute = 0;
    if (words[2] && words[2] !== "oclock") {
      const m = parseNumberPhrase(words[2].replace(/^oh /, ""));
      if (m === null || m >= 60) return null;
      minute = m;
    }
    return { hour, minute, offset: 0, twoDigitHour: false, digits: false };
  }

  return null;
}

/**
 * Maps an informal time expression to 24-hour HH:MM.
 * A clock value with no meridiem or day part ("7", "7:30", "seven o'clock") is ambiguous.
 */
export function normalizeTime(input: string): FieldResult<string> {
  let s = squash(input)
    .replace(/\b([ap])\.? ?m\b\.?/g, "$1m")
    .replace(/\bo'? ?clock\b/g, "oclock")
    .replace(/^(?:at|around|about|by|for) /, "")
    .replace(/[,!?]+/g, " ")
    .replace(/\.$/, "")
    .replace(/\b(?:today|tomorrow)\b/g, " ")
    .replace(/\s+/g, " ")
    .trim();
  if (!s) return fail("missing");

  if (/^(?:12 )?(?:noon|midday)$/.test(s)) return ok("12:00");
  if (/^(?:12 )?midnight$/.test(s)) return ok("00:00");

  const part = dayPartOf(s);
  s = part.rest.replace(/\s+/g, " ").trim().replace(/^(?:at|around|about) /, "");

  let meridiem: Meridiem | undefined;
  const suffix = s.match(/^(.*?) ?(am|pm)$/);
  if (suffix) {
    s = suffix[1].trim();
    meridiem = suffix[2] === "am" ? "am" : "pm";
  }
  if (meridiem && part.meridiem && meridiem !== part.meridiem) return fail("ambiguous");

  const clock = parseClock(s);
  if (!clock) return fail("unparsable");
  if (clock.minute > 59) return fail("out_of_range");

  let hour = clock.hour;
  if (meridiem) {
    if (hour < 1 || hour > 12) return fail("out_of_range");
    hour = (hour % 12) + (meridiem === "pm" ? 12 : 0);
  } else if (part.meridiem) {
    if (hour >= 13 && hour <= 23 && part.meridiem === "pm") {
      // "19:00 in the evening" is already on the 24-hour clock
    } else if (hour >= 1 && hour <= 12) {
      hour = (hour % 12) + (part.meridiem === "pm" ? 12 : 0);
    } else {
      return fail("out_of_range");
    }
  } else if (clock.digits && (hour === 0 || hour >= 13 || clock.twoDigitHour)) {
    if (hour > 23) return fail("out_of_range");
  } else {
    return fail("ambiguous");
  }

  const total = (((hour * 60 + clock.minute + clock.offset) % 1440) + 1440) % 1440;
  return ok(`${pad2(Math.floor(total / 60))}:${pad2(total % 60)}`);
}

// ---------------------------------------------------------------------------
// date
// ---------------------------------------------------------------------------

const WEEKDAYS = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"];

const MONTHS = new Map<string, number>([
  ["january", 1], ["jan", 1], ["february", 2], ["feb", 2], ["march", 3], ["mar", 3],
  ["april", 4], ["apr", 4], ["may", 5], ["june", 6], ["jun", 6], ["july", 7], ["jul", 7],
  ["august", 8], ["aug", 8], ["september", 9], ["sept", 9], ["sep", 9], ["october", 10],
  ["oct", 10], ["november", 11], ["nov", 11], ["december", 12], ["dec", 12],
]);

const MONTH = [...MONTHS.keys()].sort((a, b) => b.length - a.length).join("|");
const DAY_MS = 86_400_000;

function utcDay(d: Date) {
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
}

function isoDay(ms: number) {
  return new Date(ms).toISOString().slice(0, 10);
}

/** UTC midnight of y-m-d, or null when the calendar has no such day. */
function calendarDay(year: number, month: number, day: number): number | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const ms = Date.UTC(year, month - 1, day);
  const d = new Date(ms);
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return ms;
}

function absolute(year: number | undefined, month: number, day: number, today: number): FieldResult<string> {
  if (year !== undefined) {
    const ms = calendarDay(year, month, day);
    if (ms === null) return fail("unparsable");
    if (ms < today) return fail("out_of_range");
    return ok(isoDay(ms));
  }
  const thisYear = new Date(today).getUTCFullYear();
  let ms = calendarDay(thisYear, month, day);
  if (ms !== null && ms < today) ms = calendarDay(thisYear + 1, month, day);
  if (ms === null) return fail("unparsable");
  return ok(isoDay(ms));
}

/** Maps a relative or absolute date expression to YYYY-MM-DD, anchored on `referenceTime`. */
export function normalizeDate(input: string, referenceTime: Date): FieldResult<string> {
  const s = squash(input)
    .replace(/,/g, " ")
    .replace(/[.!?]+$/, "")
    .replace(/^(?:on|for) /, "")
    .replace(/^the /, "")
    .replace(/\s+/g, " ")
    .trim();
  if (!s) return fail("missing");
  if (Number.isNaN(referenceTime.getTime())) return fail("unparsable");

  const today = utcDay(referenceTime);
  const plus = (days: number) => ok(isoDay(today + days * DAY_MS));

  if (/^(?:today|tonight|this (?:morning|afternoon|evening))$/.test(s)) return plus(0);
  if (/^tomorrow(?: (?:morning|afternoon|evening|night))?$/.test(s)) return plus(1);
  if (/^day after tomorrow$/.test(s)) return plus(2);

  const inDays = s.match(/^(?:in|after) (.+?) days?(?: from now)?$/);
  if (inDays) {
    const n = parseNumberPhrase(inDays[1].replace(/^a$/, "one"));
    if (n === null) return fail("unparsable");
    if (n < 0 || n > MAX_DAYS_AHEAD) return fail("out_of_range");
    return plus(n);
  }

  const weekday = s.match(/^(this coming |coming |this |next )?(sunday|monday|tuesday|wednesday|thursday|friday|saturday)$/);
  if (weekday) {
    const target = WEEKDAYS.indexOf(weekday[2]);
    const current = new Date(today).getUTCDay();
    let delta = (target - current + 7) % 7;
    if (weekday[1] === "next " && delta === 0) delta = 7;
    return plus(delta);
  }

  const iso = s.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
  if (iso) return absolute(Number(iso[1]), Number(iso[2]), Number(iso[3]), today);

  const numeric = s.match(/^(\d{1,2})[/.-](\d{1,2})[/.-](\d{2}|\d{4})$/);
  if (numeric) {
    const year = numeric[3].length === 2 ? 2000 + Number(numeric[3]) : Number(numeric[3]);
    return absolute(year, Number(numeric[2]), Number(numeric[1]), today);
  }

  const dayFirst = s.match(new RegExp(`^(\\d{1,2})(?:st|nd|rd|th)?(?: of)? (${MONTH})(?: (\\d{4}))?$`));
  if (dayFirst) {
    const month = MONTHS.get(dayFirst[2]) ?? 0;
    return absolute(dayFirst[3] ? Number(dayFirst[3]) : undefined, month, Number(dayFirst[1]), today);
  }

  const monthFirst = s.match(new RegExp(`^(${MONTH}) (?:the )?(\\d{1,2})(?:st|nd|rd|th)?(?: (\\d{4}))?$`));
  if (monthFirst) {
    const month = MONTHS.get(monthFirst[1]) ?? 0;
    return absolute(monthFirst[3] ? Number(monthFirst[3]) : undefined, month, Number(monthFirst[2]), today);
  }

  return fail("unparsable");
}

// ---------------------------------------------------------------------------
// guests
// ---------------------------------------------------------------------------

/** Coerces "4", "four", "party of six", "table for 2" to an integer in [1, max]. Never clamps. */
export function normalizePartySize(input: string, max = DEFAULT_MAX_PARTY_SIZE): FieldResult<number> {
  const s = squash(input)
    .replace(/[.!?]+$/, "")
    .replace(/^(?:a )?(?:party|table|group|booking|reservation) (?:of|for) /, "")
    .replace(/^for /, "")
    .replace(/ (?:people|persons|person|guests|guest|pax|adults|of us)$/, "")
    .trim();
  if (!s) return fail("missing");

  const n = parseNumberPhrase(s);
  if (n === null) return fail("unparsable");
  if (n <= 0 || n > max) return fail("out_of_range");
  return ok(n);
}

// ---------------------------------------------------------------------------
// guest details
// ---------------------------------------------------------------------------

export function normalizeGuestName(input: string): FieldResult<string> {
  const s = input
    .replace(/\s+/g, " ")
    .replace(/^[\s"'.,!?;:-]+|[\s"'.,!?;:-]+$/g, "");
  if (!s) return fail("missing");
  if (s.length > MAX_NAME_LENGTH || !/\p{L}/u.test(s)) return fail("unparsable");
  return ok(s);
}

/** Digits only; an absent phone is fine, a present one needs 7-15 digits. */
export function normalizePhone(input: string): FieldResult<string> {
  if (!input.trim()) return ok("");
  const digits = input.replace(/\D/g, "");
  if (digits.length < 7 || digits.length > 15) return fail("unparsable");
  return ok(digits);
}

export function normalizeSpecialRequests(input: string): string {
  const s = input.trim().replace(/\s+/g, " ");
  if (/^(?:none|no|nothing|n\/a|no special requests?|nothing special)\.?$/i.test(s)) return "";
  return s.slice(0, MAX_REQUESTS_LENGTH);
}

// ---------------------------------------------------------------------------
// whole record
// ---------------------------------------------------------------------------

/**
 * Pure. Never throws for malformed input: anything that cannot be normalized with
 * confidence comes back as `staged` with one failure per offending field.
 */
export function normalizeReservation(raw: RawReservationFields, opts: NormalizeOptions): NormalizeOutcome {
  const failures: NormalizationFailure[] = [];

  function take<T>(field: NormalizationFailure["field"], r: FieldResult<T>, fallback: T): T {
    if (r.ok) return r.value;
    failures.push({ field, input: raw[field] ?? "", reason: r.reason });
    return fallback;
  }

  const reservation: ReservationDetails = {
    guestName: take("guestName", normalizeGuestName(raw.guestName ?? ""), ""),
    guestPhone: take("guestPhone", normalizePhone(raw.guestPhone ?? ""), ""),
    date: take("date", normalizeDate(raw.date ?? "", opts.referenceTime), ""),
    time: take("time", normalizeTime(raw.time ?? ""), ""),
    partySize: take("partySize", normalizePartySize(raw.partySize ?? "", opts.maxPartySize), 0),
    specialRequests: normalizeSpecialRequests(raw.specialRequests ?? ""),
  };

  if (failures.length) return { kind: "staged", failures, raw };
  return { kind: "parsed", reservation };
}
