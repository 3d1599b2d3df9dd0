import path from "path";
import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import pino from "pino";
import { makeStore } from "../store/index.js";

const log = pino({ level: process.env.LOG_LEVEL || "info" });

// only needs the database path, so no full config (and no TOKEN_SECRET) here
const DB_PATH = process.env.DB_PATH || "./data/callbook.sqlite";
const store = makeStore({ driver: "sqlite", dbPath: DB_PATH });

store
  .init()
  .then(() => store.close())
  .then(() => {
    log.info({ DB_PATH }, "db initialized");
  })
  .catch((err: unknown) => {
    log.error({ err, DB_PATH }, "db init failed");
    process.exit(1);
  });
