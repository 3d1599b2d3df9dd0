import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(7090),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  STORE_DRIVER: z.enum(["hosted", "sqlite", "file"]).default("file"),
  DATA_DIR: z.string().default("./data"),
  DB_PATH: z.string().default("./data/callbook.sqlite"),

  AIRTABLE_API_KEY: optionalString,
  AIRTABLE_BASE_ID: optionalString,
  AIRTABLE_API_URL: z.string().url().default("https://api.airtable.com/v0"),
  AIRTABLE_USERS_TABLE: z.string().default("Users"),
  AIRTABLE_BUSINESSES_TABLE: z.string().default("Restaurants"),
  AIRTABLE_RESERVATIONS_TABLE: z.string().default("Reservations"),
  AIRTABLE_PENDING_TABLE: z.string().default("PendingReservations"),
  AIRTABLE_CALLS_TABLE: z.string().default("CallLogs"),

  TOKEN_SECRET: z.string().min(16, "TOKEN_SECRET must be at least 16 characters"),
  TOKEN_TTL_MINUTES: z.coerce.number().int().positive().default(720),
  ADMIN_KEY: optionalString,

  VAPI_API_KEY: optionalString,
  VAPI_API_URL: z.string().url().default("https://api.vapi.ai"),
  VAPI_WEBHOOK_SECRET: optionalString,

  MAX_PARTY_SIZE: z.coerce.number().int().positive().default(30),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(30),
});

export type HostedTables = {
  users: string;
  businesses: string;
  reservations: string;
  pending: string;
  calls: string;
};

export type Config = {
  port: number;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  store:
    | { driver: "file"; dataDir: string }
    | { driver: "sqlite"; dbPath: string }
    | { driver: "hosted"; apiKey: string; baseId: string; apiUrl: string; tables: HostedTables };
  auth: { tokenSecret: string; tokenTtlMinutes: number; adminKey?: string };
  voice: { apiKey?: string; apiUrl: string; webhookSecret?: string };
  normalizer: { maxPartySize: number };
  rateLimit: { windowMs: number; max: number };
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Parse the environment once at startup. Nothing else reads process.env. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;

  let store: Config["store"];
  if (e.STORE_DRIVER === "hosted") {
    if (!e.AIRTABLE_API_KEY || !e.AIRTABLE_BASE_ID) {
      throw new ConfigError(["AIRTABLE_API_KEY and AIRTABLE_BASE_ID are required when STORE_DRIVER=hosted"]);
    }
    store = {
      driver: "hosted",
      apiKey: e.AIRTABLE_API_KEY,
      baseId: e.AIRTABLE_BASE_ID,
      apiUrl: e.AIRTABLE_API_URL.replace(/\/+$/, ""),
      tables: {
        users: e.AIRTABLE_USERS_TABLE,
        businesses: e.AIRTABLE_BUSINESSES_TABLE,
        reservations: e.AIRTABLE_RESERVATIONS_TABLE,
        pending: e.AIRTABLE_PENDING_TABLE,
        calls: e.AIRTABLE_CALLS_TABLE,
      },
    };
  } else if (e.STORE_DRIVER === "sqlite") {
    store = { driver: "sqlite", dbPath: e.DB_PATH };
  } else {
    store = { driver: "file", dataDir: e.DATA_DIR };
  }

  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    store,
    auth: { tokenSecret: e.TOKEN_SECRET, tokenTtlMinutes: e.TOKEN_TTL_MINUTES, adminKey: e.ADMIN_KEY },
    voice: { apiKey: e.VAPI_API_KEY, apiUrl: e.VAPI_API_URL.replace(/\/+$/, ""), webhookSecret: e.VAPI_WEBHOOK_SECRET },
    normalizer: { maxPartySize: e.MAX_PARTY_SIZE },
    rateLimit: { windowMs: e.RATE_LIMIT_WINDOW_MS, max: e.RATE_LIMIT_MAX },
  };
}
