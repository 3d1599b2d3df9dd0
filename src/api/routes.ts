import { Router } from "express";
import type { Store } from "../store/store.js";
import type { Ledger } from "../services/ledger.js";
import type { CallDesk } from "../services/calls.js";
import type { Dashboard } from "../services/dashboard.js";
import { route } from "./http.js";
import { businessIdOf, requireBusiness, requireUser } from "./guard.js";

/** Everything a linked, active business owner reaches with their bearer token. */
export function makeRoutes(args: {
  store: Store;
  ledger: Ledger;
  calls: CallDesk;
  dashboard: Dashboard;
  tokenSecret: string;
  now?: () => Date;
}) {
  const r = Router();
  const biz = [requireUser({ tokenSecret: args.tokenSecret, now: args.now }), requireBusiness(args.store)];

  r.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  r.get(
    "/reservations",
    ...biz,
    route(async (req, res) => {
      const reservations = await args.ledger.list(businessIdOf(req), req.query);
      res.json({ ok: true, reservations });
    }),
  );

  r.post(
    "/reservations",
    ...biz,
    route(async (req, res) => {
      const reservation = await args.ledger.create(businessIdOf(req), req.body);
      res.status(201).json({ ok: true, reservation });
    }),
  );

  r.get(
    "/reservations/:id",
    ...biz,
    route(async (req, res) => {
      const reservation = await args.ledger.get(businessIdOf(req), req.params.id);
      res.json({ ok: true, reservation });
    }),
  );

  r.patch(
    "/reservations/:id",
    ...biz,
    route(async (req, res) => {
      const reservation = await args.ledger.edit(businessIdOf(req), req.params.id, req.body);
      res.json({ ok: true, reservation });
    }),
  );

  r.post(
    "/reservations/:id/cancel",
    ...biz,
    route(async (req, res) => {
      const reservation = await args.ledger.cancel(businessIdOf(req), req.params.id);
      res.json({ ok: true, reservation });
    }),
  );

  r.get(
    "/pending",
    ...biz,
    route(async (req, res) => {
      const pending = await args.ledger.listPending(businessIdOf(req), req.query);
      res.json({ ok: true, pending });
    }),
  );

  r.post(
    "/pending/:id/promote",
    ...biz,
    route(async (req, res) => {
      const reservation = await args.ledger.promote(businessIdOf(req), req.params.id, req.body);
      res.status(201).json({ ok: true, reservation });
    }),
  );

  r.delete(
    "/pending/:id",
    ...biz,
    route(async (req, res) => {
      const out = await args.ledger.discard(businessIdOf(req), req.params.id);
      res.json({ ok: true, ...out });
    }),
  );

  r.get(
    "/calls",
    ...biz,
    route(async (req, res) => {
      const calls = await args.calls.list(businessIdOf(req), req.query);
      res.json({ ok: true, calls });
    }),
  );

  r.get(
    "/dashboard",
    ...biz,
    route(async (req, res) => {
      const stats = await args.dashboard.stats(businessIdOf(req));
      res.json({ ok: true, stats });
    }),
  );

  return r;
}
