import type { RawReservationFields } from "../types/contracts.js";
import { NUMBER_PHRASE, NUMBER_WORD } from "./words.js";

const CALLER_LINE = /^\s*(?:user|customer|caller|guest)\s*:\s*/i;

const NAME_TRIGGER =
  /\b(?:my name is|my name's|name is|name's|this is|i am|i'm|it's under|under the name(?: of)?)\s+([a-z][a-z'-]*(?:\s+[a-z][a-z'-]*){0,2})/gi;

const NAME_STOP = new Set([
  "a", "an", "the", "and", "i", "i'd", "id", "im", "calling", "looking", "here", "from", "for", "to",
  "with", "at", "on", "please", "just", "trying", "wanting", "hoping", "interested", "wondering",
  "booking", "reserving", "sorry", "hi", "hello", "yes", "no", "not", "so", "it", "that", "going",
  "good", "fine", "great", "okay", "ok", "sure", "available", "free", "also", "again", "about",
]);

const MONTH_WORD =
  "january|february|march|april|may|june|july|august|september|sept|october|november|december|jan|feb|mar|apr|jun|jul|aug|sep|oct|nov|dec";
const WEEKDAY_WORD = "monday|tuesday|wednesday|thursday|friday|saturday|sunday";

const DATE_PHRASE = new RegExp(
  [
    "\\b(?:the )?day after tomorrow\\b",
    "\\b(?:today|tonight|tomorrow)\\b",
    `\\b(?:in|after) (?:a|${NUMBER_PHRASE}) days?\\b`,
    `\\b(?:this coming |coming |this |next )?(?:${WEEKDAY_WORD})\\b`,
    "\\b\\d{4}-\\d{1,2}-\\d{1,2}\\b",
    "\\b\\d{1,2}[/.-]\\d{1,2}[/.-](?:\\d{4}|\\d{2})\\b",
    `\\b\\d{1,2}(?:st|nd|rd|th)?(?: of)? (?:${MONTH_WORD})\\b(?: \\d{4}\\b)?`,
    `\\b(?:${MONTH_WORD}) (?:the )?\\d{1,2}(?:st|nd|rd|th)?\\b(?:,? \\d{4}\\b)?`,
  ].join("|"),
  "i",
);

const DAY_PART = "(?:in the (?:morning|afternoon|evening)|at night|tonight|this evening)";
const DATED_DAY_PART = "(?:today|tomorrow) (?:in the )?(?:morning|afternoon|evening|night)";
const MERIDIEM = "(?:a\\.?m\\b\\.?|p\\.?m\\b\\.?)";
const MINUTE_WORD = "(?:thirty|fifteen|forty[ -]five|oh five)";

const TIME_PHRASE = new RegExp(
  [
    `\\b\\d{1,2}(?:[:.]\\d{2})?\\s*${MERIDIEM}(?:\\s+${DAY_PART})?`,
    `\\b(?:half past|quarter past|quarter to) (?:${NUMBER_WORD}|\\d{1,2})\\b(?:\\s*${MERIDIEM})?(?:\\s+${DAY_PART})?`,
    `\\b(?:${NUMBER_WORD}|\\d{1,2})(?: ${MINUTE_WORD})?(?: o'?clock)?\\s+${DAY_PART}`,
    `\\b(?:${NUMBER_WORD}|\\d{1,2})(?:[:.]\\d{2})?(?: ${MINUTE_WORD})?(?: o'?clock)?\\s+${DATED_DAY_PART}\\b`,
    `\\b(?:${NUMBER_WORD})(?: ${MINUTE_WORD})?\\s*${MERIDIEM}`,
    "\\b\\d{1,2}:\\d{2}\\b",
    "\\b(?:noon|midnight)\\b",
    `\\b(?:${NUMBER_WORD}) o'?clock\\b`,
  ].join("|"),
  "i",
);

const PARTY_PHRASES = [
  new RegExp(`\\b(?:party|table|group|reservation|booking) (?:of|for) (${NUMBER_PHRASE})\\b`, "i"),
  new RegExp(`\\b(${NUMBER_PHRASE}) (?:people|persons|guests|pax|adults|of us)\\b`, "i"),
  new RegExp(`\\bfor (${NUMBER_PHRASE})\\b(?![/:.\\-\\d]| ?(?:am|pm|a\\.m|p\\.m|o'?clock|days?|st|nd|rd|th)\\b)`, "i"),
];

const SPECIAL_REQUESTS: Array<[RegExp, string]> = [
  [/\bbirthday\b/i, "birthday"],
  [/\banniversary\b/i, "anniversary"],
  [/\bvegan\b/i, "vegan"],
  [/\bvegetarian\b/i, "vegetarian"],
  [/\ballerg(?:y|ic|ies)\b/i, "allergy"],
  [/\bgluten\b/i, "gluten free"],
  [/\bwheelchair\b/i, "wheelchair access"],
  [/\bhigh ?chair\b/i, "high chair"],
  [/\bwindow\b/i, "window seat"],
  [/\boutdoors?\b|\boutside\b|\bpatio\b/i, "outdoor seating"],
];

const PHONE = /\+?\d[\d\s().-]{5,}\d/g;
const DATE_LIKE = /^(?:\d{1,2}[-.]\d{1,2}[-.]\d{2,4}|\d{4}-\d{1,2}-\d{1,2})$/;

/** The caller's side of a transcript when it carries speaker prefixes; the whole text otherwise. */
export function callerText(transcript: string): string {
  const lines = transcript.split(/\r?\n/);
  const caller = lines.filter((l) => CALLER_LINE.test(l)).map((l) => l.replace(CALLER_LINE, ""));
  return (caller.length ? caller.join("\n") : transcript).replace(/[ \t]+/g, " ");
}

function extractName(text: string): string | undefined {
  for (const m of text.matchAll(NAME_TRIGGER)) {
    const kept: string[] = [];
    for (const word of m[1].split(/\s+/)) {
      if (NAME_STOP.has(word.toLowerCase())) break;
      kept.push(word);
    }
    if (kept.length) return kept.join(" ");
  }
  return undefined;
}

function extractPhone(text: string): string | undefined {
  for (const m of text.matchAll(PHONE)) {
    const candidate = m[0].trim();
    if (DATE_LIKE.test(candidate)) continue;
    const digits = candidate.replace(/\D/g, "");
    if (digits.length >= 7 && digits.length <= 15) return candidate;
  }
  return undefined;
}

function extractPartySize(text: string): string | undefined {
  for (const re of PARTY_PHRASES) {
    const m = text.match(re);
    if (m) return m[1];
  }
  return undefined;
}

/** Spaces out a match so later patterns cannot reuse its words. */
function blankOut(text: string, m: RegExpMatchArray): string {
  const at = m.index ?? text.indexOf(m[0]);
  return text.slice(0, at) + " ".repeat(m[0].length) + text.slice(at + m[0].length);
}

function extractSpecialRequests(text: string): string | undefined {
  const found = SPECIAL_REQUESTS.filter(([re]) => re.test(text)).map(([, label]) => label);
  return found.length ? found.join(", ") : undefined;
}

/**
 * Pulls raw reservation expressions out of a transcript. Nothing is interpreted here:
 * "next friday" stays "next friday" and is resolved by the normalizer.
 */
export function extractReservationFields(transcript: string): RawReservationFields {
  const text = callerText(transcript);
  const out: RawReservationFields = {};

  const name = extractName(text);
  if (name) out.guestName = name;

  const phone = extractPhone(text);
  if (phone) out.guestPhone = phone;

  const date = text.match(DATE_PHRASE);
  if (date) out.date = date[0];

  const time = text.match(TIME_PHRASE);
  if (time) out.time = time[0];

  // "for seven thirty pm" is a time, not a party of seven
  const party = extractPartySize(time ? blankOut(text, time) : text);
  if (party) out.partySize = party;

  const special = extractSpecialRequests(text);
  if (special) out.specialRequests = special;

  return out;
}
