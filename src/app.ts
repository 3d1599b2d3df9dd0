import express from "express";
import type { Logger } from "pino";
import type { Config } from "./config/config.js";
import type { Store } from "./store/store.js";
import type { VoiceVendor } from "./voice/vapi.js";
import { createAccounts } from "./services/accounts.js";
import { createLedger } from "./services/ledger.js";
import { createCallDesk } from "./services/calls.js";
import { createDashboard } from "./services/dashboard.js";
import { makeRoutes } from "./api/routes.js";
import { makeAuthRoutes } from "./api/auth.js";
import { makeAdminRoutes } from "./api/admin.js";
import { makeVoiceWebhook } from "./api/webhook.js";
import { makeRateLimiter } from "./api/rate-limit.js";
import { errorHandler, notFound, requestId } from "./api/http.js";

export type AppDeps = {
  config: Pick<Config, "auth" | "voice" | "normalizer" | "rateLimit">;
  store: Store;
  logger: Logger;
  /** Absent when no vendor API key is configured. */
  voice?: VoiceVendor;
  now?: () => Date;
};

export function makeApp(deps: AppDeps) {
  const { config, store, logger, now } = deps;
  const maxPartySize = config.normalizer.maxPartySize;

  const accounts = createAccounts({
    store,
    tokenSecret: config.auth.tokenSecret,
    tokenTtlMinutes: config.auth.tokenTtlMinutes,
    voice: deps.voice,
    logger: logger.child({ component: "accounts" }),
    now,
  });
  const ledger = createLedger({ store, logger: logger.child({ component: "ledger" }), maxPartySize, now });
  const calls = createCallDesk({ store, logger: logger.child({ component: "calls" }), maxPartySize, now });
  const dashboard = createDashboard({ store, now });

  const app = express();
  app.disable("x-powered-by");
  app.use(requestId());
  app.use(express.json({ limit: "512kb" }));

  app.use(
    "/api/auth",
    makeAuthRoutes({ accounts, tokenSecret: config.auth.tokenSecret, limiter: makeRateLimiter(config.rateLimit), now }),
  );
  app.use(
    "/api/voice",
    makeVoiceWebhook({ calls, webhookSecret: config.voice.webhookSecret, logger: logger.child({ component: "webhook" }) }),
  );
  app.use("/api/admin", makeAdminRoutes({ accounts, ledger, adminKey: config.auth.adminKey }));
  app.use("/api", makeRoutes({ store, ledger, calls, dashboard, tokenSecret: config.auth.tokenSecret, now }));

  app.use(notFound());
  app.use(errorHandler(logger.child({ component: "http" })));
  return app;
}
