import type { Business } from "../types/contracts.js";

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

const RESTAURANT_STEPS = `Collect, in a natural order:
1. Guest name
2. Reservation date
3. Time (if missing, ask "What time works for you?")
4. Number of guests
5. Phone number
6. Special requests (ask only once)

Once you have everything, acknowledge politely. Do not say the reservation is confirmed;
the restaurant confirms it after the call.`;

const HOTEL_STEPS = `Collect:
- Guest name
- Check-in date
- Number of guests
- Phone number
- Special notes (ask once)

Do not confirm the booking; the front desk follows up after the call.`;

const GENERIC_STEPS = `Collect the caller's name, the date they want, their phone number and the number of people.
Ask for special requests once. Do not promise anything; the business follows up after the call.`;

function stepsFor(businessType: string) {
  if (businessType.includes("restaurant")) return RESTAURANT_STEPS;
  if (businessType.includes("hotel")) return HOTEL_STEPS;
  return GENERIC_STEPS;
}

function clock(now: Date) {
  return `${String(now.getUTCHours()).padStart(2, "0")}:${String(now.getUTCMinutes()).padStart(2, "0")}`;
}

/** System prompt for the voice agent answering `business`'s line. Times are given in UTC. */
export function buildSystemPrompt(business: Business, now: Date): string {
  const type = (business.businessType ?? "business").trim().toLowerCase() || "business";

  return `ROLE:
You are the voice receptionist for ${business.name} (${type}). Sound warm and natural.

CURRENT DATE/TIME:
- Today: ${now.toISOString().slice(0, 10)} (${WEEKDAYS[now.getUTCDay()]})
- Time: ${clock(now)} UTC

BUSINESS INFO:
- Address: ${business.address || "not provided"}
- Description: ${business.description || "not provided"}
- Policies: ${business.policies || "standard policies apply"}
- Reservation rules: ${business.reservationRules || "standard rules apply"}
- Additional info: ${business.knowledgeBase || "none"}

TONE:
${business.script ? `Use the style: "${business.script}"` : "Friendly and concise."}

${stepsFor(type)}

RULES:
- Ask only the questions you need.
- Never read out JSON or mention tools.
- End the call politely once everything is collected.`;
}

export function greetingFor(business: Business) {
  return `Hi, thanks for calling ${business.name}. How can I help you?`;
}

export const UNKNOWN_NUMBER_GREETING = "Sorry, I cannot identify this business right now. Please try again later.";

export type AssistantConfig = {
  name: string;
  firstMessage: string;
  model: {
    provider: "openai";
    model: string;
    temperature: number;
    messages: Array<{ role: "system"; content: string }>;
  };
};

/** Assistant definition handed to the voice vendor, either at registration or per call. */
export function assistantConfig(business: Business, now: Date): AssistantConfig {
  return {
    name: business.name.slice(0, 40),
    firstMessage: greetingFor(business),
    model: {
      provider: "openai",
      model: "gpt-4o-mini",
      temperature: 0.5,
      messages: [{ role: "system", content: buildSystemPrompt(business, now) }],
    },
  };
}
