import fs from "node:fs";
import path from "node:path";
import type { Config } from "../config/config.js";
import type { Store } from "./store.js";
import { FileStore } from "./file.js";
import { SqliteStore } from "./sqlite.js";
import { HostedStore } from "./hosted.js";
import type { FetchLike } from "./hosted.js";

/** Adapter for the configured driver. Call init() before use. */
export function makeStore(config: Config["store"], opts: { fetch?: FetchLike } = {}): Store {
  switch (config.driver) {
    case "hosted":
      return new HostedStore({
        apiKey: config.apiKey,
        baseId: config.baseId,
        apiUrl: config.apiUrl,
        tables: config.tables,
        fetch: opts.fetch,
      });
    case "sqlite":
      if (config.dbPath !== ":memory:") fs.mkdirSync(path.dirname(path.resolve(config.dbPath)), { recursive: true });
      return new SqliteStore(config.dbPath);
    case "file":
      fs.mkdirSync(config.dataDir, { recursive: true });
      return new FileStore(path.resolve(config.dataDir));
  }
}
