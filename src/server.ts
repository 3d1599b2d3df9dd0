import path from "path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import pino from "pino";

import { loadConfig } from "./config/config.js";
import { makeStore } from "./store/index.js";
import { VapiClient } from "./voice/vapi.js";
import { makeApp } from "./app.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });

async function main() {
  const store = makeStore(config.store);
  await store.init();

  const voice = config.voice.apiKey
    ? new VapiClient({ apiKey: config.voice.apiKey, apiUrl: config.voice.apiUrl, logger: log.child({ component: "vapi" }) })
    : undefined;

  const app = makeApp({ config, store, logger: log, voice });

  const server = app.listen(config.port, () => {
    log.info(
      {
        PORT: config.port,
        STORE_DRIVER: config.store.driver,
        ADMIN_KEY_CONFIGURED: Boolean(config.auth.adminKey),
        VOICE_VENDOR_CONFIGURED: Boolean(voice),
        WEBHOOK_SECRET_CONFIGURED: Boolean(config.voice.webhookSecret),
      },
      "Callbook server running",
    );
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, "shutting down");
    server.close(() => {
      store.close().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err }, "store close failed");
          process.exit(1);
        },
      );
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
