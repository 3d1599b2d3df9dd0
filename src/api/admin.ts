import { Router } from "express";
import type { Accounts } from "../services/accounts.js";
import type { Ledger } from "../services/ledger.js";
import { route } from "./http.js";
import { requireAdmin } from "./guard.js";

export function makeAdminRoutes(args: { accounts: Accounts; ledger: Ledger; adminKey?: string }) {
  const r = Router();
  r.use(requireAdmin(args.adminKey));

  // POST /api/admin/users/:id/activate
  r.post(
    "/users/:id/activate",
    route(async (req, res) => {
      const out = await args.accounts.activateUser(req.params.id);
      res.json({ ok: true, ...out });
    }),
  );

  // POST /api/admin/businesses { ownerId, name, phone, ...profile }
  r.post(
    "/businesses",
    route(async (req, res) => {
      const out = await args.accounts.createBusiness(req.body);
      res.status(201).json({ ok: true, ...out });
    }),
  );

  // PATCH /api/admin/businesses/:id { ...profile }
  r.patch(
    "/businesses/:id",
    route(async (req, res) => {
      const out = await args.accounts.updateBusiness(req.params.id, req.body);
      res.json({ ok: true, ...out });
    }),
  );

  // POST /api/admin/businesses/:id/voice-prompt
  r.post(
    "/businesses/:id/voice-prompt",
    route(async (req, res) => {
      const out = await args.accounts.registerVoicePrompt(req.params.id);
      res.json({ ok: true, ...out });
    }),
  );

  // GET /api/admin/pending?limit&offset  requests staged from lines no business owns
  r.get(
    "/pending",
    route(async (req, res) => {
      const pending = await args.ledger.listUnassigned(req.query);
      res.json({ ok: true, pending });
    }),
  );

  // POST /api/admin/pending/:id/assign { businessId }
  r.post(
    "/pending/:id/assign",
    route(async (req, res) => {
      const pending = await args.ledger.assign(req.params.id, req.body);
      res.json({ ok: true, pending });
    }),
  );

  return r;
}
