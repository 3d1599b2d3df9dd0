export { makeApp } from "./app.js";
export type { AppDeps } from "./app.js";
export { loadConfig, ConfigError } from "./config/config.js";
export type { Config } from "./config/config.js";
export { makeStore } from "./store/index.js";
export { FileStore } from "./store/file.js";
export { SqliteStore } from "./store/sqlite.js";
export { HostedStore } from "./store/hosted.js";
export type { Store } from "./store/store.js";
export { normalizeReservation, normalizeDate, normalizeTime, normalizePartySize } from "./core/normalize.js";
export { extractReservationFields } from "./core/extract.js";
export { classifyIntent } from "./core/intent.js";
export { VapiClient } from "./voice/vapi.js";
export type { VoiceVendor } from "./voice/vapi.js";
export { buildSystemPrompt } from "./voice/prompts.js";
export * from "./core/errors.js";
export type * from "./types/contracts.js";
