import { Router } from "express";
import type { RequestHandler } from "express";
import type { Accounts } from "../services/accounts.js";
import { route } from "./http.js";
import { requireUser, userIdOf } from "./guard.js";

export function makeAuthRoutes(args: {
  accounts: Accounts;
  tokenSecret: string;
  limiter: RequestHandler;
  now?: () => Date;
}) {
  const r = Router();
  const authed = requireUser({ tokenSecret: args.tokenSecret, now: args.now });

  r.post(
    "/signup",
    args.limiter,
    route(async (req, res) => {
      const out = await args.accounts.signup(req.body);
      res.status(201).json({ ok: true, ...out });
    }),
  );

  r.post(
    "/login",
    args.limiter,
    route(async (req, res) => {
      const out = await args.accounts.login(req.body);
      res.json({ ok: true, ...out });
    }),
  );

  r.get(
    "/me",
    authed,
    route(async (req, res) => {
      const out = await args.accounts.me(userIdOf(req));
      res.json({ ok: true, ...out });
    }),
  );

  return r;
}
