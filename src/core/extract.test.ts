import { describe, test } from "node:test";
import assert from "node:assert";
import { callerText, extractReservationFields } from "./extract.js";

describe("callerText", () => {
  test("keeps only the caller's lines when speakers are labelled", () => {
    const text = "AI: hello\nUser: hi  there\nCaller: bye";
    assert.strictEqual(callerText(text), "hi there\nbye");
  });

  test("falls back to the whole transcript", () => {
    assert.strictEqual(callerText("table for two please"), "table for two please");
  });
});

describe("extractReservationFields", () => {
  test("pulls every field out of a labelled conversation", () => {
    const transcript = [
      "AI: Thanks for calling Bella Cucina, how can I help?",
      "User: Hi, I'd like to book a table for four tomorrow at 7pm please.",
      "AI: Sure, can I get a name?",
      "User: My name is Jane Doe.",
      "AI: And a phone number?",
      "User: It's 555-010-2030.",
      "User: It's my wife's birthday, and a window seat if possible.",
    ].join("\n");

    assert.deepStrictEqual(extractReservationFields(transcript), {
      guestName: "Jane Doe",
      guestPhone: "555-010-2030",
      date: "tomorrow",
      time: "7pm",
      partySize: "four",
      specialRequests: "birthday, window seat",
    });
  });

  test("works on unlabelled text and does not read an ISO date as a phone", () => {
    const fields = extractReservationFields("hi this is Tom calling, can I get a party of 6 on 2025-07-04 at 19:30");
    assert.deepStrictEqual(fields, {
      guestName: "Tom",
      date: "2025-07-04",
      time: "19:30",
      partySize: "6",
    });
  });

  test("ignores the assistant's words", () => {
    const fields = extractReservationFields("AI: Would you like to book for tomorrow at 8pm?\nUser: no thanks");
    assert.deepStrictEqual(fields, {});
  });

  test("stops a name at filler words", () => {
    assert.deepStrictEqual(extractReservationFields("User: I'm calling to ask about your hours"), {});
  });

  test("skips dotted dates when looking for a phone", () => {
    const fields = extractReservationFields("User: see you on 12.06.2025");
    assert.strictEqual(fields.guestPhone, undefined);
    assert.strictEqual(fields.date, "12.06.2025");
  });

  test("leaves relative expressions for the normalizer", () => {
    const fields = extractReservationFields("User: can we do the day after tomorrow at half past seven in the evening");
    assert.strictEqual(fields.date, "the day after tomorrow");
    assert.strictEqual(fields.time, "half past seven in the evening");
  });

  test("does not take the hour of a spoken time as the party size", () => {
    const fields = extractReservationFields(
      "User: Hi, my name is Dana Lee. Could I book for seven thirty pm tomorrow? My number is 555-010-2030.",
    );
    assert.deepStrictEqual(fields, {
      guestName: "Dana Lee",
      guestPhone: "555-010-2030",
      date: "tomorrow",
      time: "seven thirty pm",
    });
  });

  test("still finds the party when a time follows it", () => {
    const fields = extractReservationFields("User: a table for 4 at 7pm please");
    assert.strictEqual(fields.partySize, "4");
    assert.strictEqual(fields.time, "7pm");
  });

  test("keeps a day part that comes after the date word", () => {
    const fields = extractReservationFields("User: can I get a table for two at seven thirty tomorrow evening");
    assert.strictEqual(fields.time, "seven thirty tomorrow evening");
    assert.strictEqual(fields.date, "tomorrow");
    assert.strictEqual(fields.partySize, "two");
  });
});
