import { z } from "zod";
import type { FetchLike } from "./hosted.js";

type Row = { id: string; createdTime: string; fields: Record<string, unknown> };

const BodySchema = z.object({ fields: z.record(z.unknown()).default({}) });

const FORMULA = /^(LOWER\()?\{(\w+)\}\)?='((?:[^'\\]|\\.)*)'$/;

function matches(formula: string | null, row: Row) {
  if (!formula) return true;
  const m = formula.match(FORMULA);
  if (!m) throw new Error(`fake hosted store cannot evaluate ${formula}`);
  const [, lower, field, quoted] = m;
  const expected = quoted.replace(/\\(.)/g, "$1");
  // the hosted API compares an empty cell as ''
  const actual = row.fields[field] ?? "";
  if (typeof actual !== "string" && typeof actual !== "number") return false;
  return (lower ? String(actual).toLowerCase() : String(actual)) === expected;
}

function json(status: number, body: unknown) {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

/**
 * In-process stand-in for the hosted tabular REST API: create, get, list with
 * `filterByFormula` (equality clauses only) and offset paging, patch, delete.
 */
export function fakeHostedApi(opts: { pageSize?: number } = {}) {
  const tables = new Map<string, Map<string, Row>>();
  const requests: string[] = [];
  let seq = 0;
  let failNext: number | "network" | null = null;

  const table = (name: string) => {
    const existing = tables.get(name);
    if (existing) return existing;
    const created = new Map<string, Row>();
    tables.set(name, created);
    return created;
  };

  const fetchImpl: FetchLike = async (url, init) => {
    const method = init?.method ?? "GET";
    requests.push(`${method} ${url}`);

    if (failNext === "network") {
      failNext = null;
      throw new TypeError("fetch failed");
    }
    if (failNext !== null) {
      const status = failNext;
      failNext = null;
      return json(status, { error: "SERVER_ERROR" });
    }

    const u = new URL(url);
    const [, , tableName, id] = u.pathname.split("/").filter(Boolean).map(decodeURIComponent);
    const rows = table(tableName);
    const body = typeof init?.body === "string" ? BodySchema.parse(JSON.parse(init.body)) : { fields: {} };

    if (method === "POST" && !id) {
      seq += 1;
      const row: Row = { id: `rec${String(seq).padStart(6, "0")}`, createdTime: new Date(0).toISOString(), fields: body.fields };
      rows.set(row.id, row);
      return json(200, row);
    }

    if (method === "GET" && !id) {
      const filtered = [...rows.values()].filter((r) => matches(u.searchParams.get("filterByFormula"), r));
      const size = Math.min(Number(u.searchParams.get("pageSize") ?? 100), opts.pageSize ?? 100);
      const start = Number(u.searchParams.get("offset") ?? 0);
      const page = filtered.slice(start, start + size);
      const next = start + size < filtered.length ? String(start + size) : undefined;
      return json(200, next ? { records: page, offset: next } : { records: page });
    }

    const row = id ? rows.get(id) : undefined;
    if (!row || !id) return json(404, { error: "NOT_FOUND" });

    if (method === "GET") return json(200, row);
    if (method === "PATCH") {
      row.fields = { ...row.fields, ...body.fields };
      return json(200, row);
    }
    if (method === "DELETE") {
      rows.delete(id);
      return json(200, { id, deleted: true });
    }
    return json(405, { error: "METHOD_NOT_ALLOWED" });
  };

  return {
    fetch: fetchImpl,
    requests,
    /** Seed a row as a legacy base would hold it. */
    seed(tableName: string, fields: Record<string, unknown>) {
      seq += 1;
      const row: Row = { id: `rec${String(seq).padStart(6, "0")}`, createdTime: new Date(0).toISOString(), fields };
      table(tableName).set(row.id, row);
      return row.id;
    },
    failNext(status: number | "network") {
      failNext = status;
    },
  };
}
