import type { Request, RequestHandler } from "express";
import type { Store } from "../store/store.js";
import { Forbidden, Unauthorized } from "../core/errors.js";
import { safeEqual, verifyToken } from "../auth/token.js";
import type { TokenClaims } from "../auth/token.js";

type Session = { claims: TokenClaims; businessId?: string };

const sessions = new WeakMap<Request, Session>();

function bearerOf(req: Request) {
  const a = req.header("authorization") || "";
  return a.toLowerCase().startsWith("bearer ") ? a.slice(7).trim() : "";
}

export function requireUser(args: { tokenSecret: string; now?: () => Date }): RequestHandler {
  const now = args.now;
  return (req, _res, next) => {
    const token = bearerOf(req);
    if (!token) return next(new Unauthorized("missing_token"));
    const claims = verifyToken(token, {
      secret: args.tokenSecret,
      now: now ? () => now().getTime() : undefined,
    });
    if (!claims) return next(new Unauthorized("invalid_token"));
    sessions.set(req, { claims });
    next();
  };
}

/**
 * Business routes need an active account whose session was issued for the
 * business the account is linked to. Must run after requireUser.
 */
export function requireBusiness(store: Store): RequestHandler {
  async function check(req: Request) {
    const session = sessions.get(req);
    if (!session) throw new Unauthorized("missing_token");
    const user = await store.getUser(session.claims.sub);
    if (!user) throw new Unauthorized("invalid_token");
    if (user.status !== "active") throw new Forbidden("account_not_active");
    if (!session.claims.biz || session.claims.biz !== user.businessId) throw new Forbidden("business_not_linked");
    session.businessId = session.claims.biz;
  }

  return (req, _res, next) => {
    check(req).then(() => next(), next);
  };
}

export function userIdOf(req: Request): string {
  const session = sessions.get(req);
  if (!session) throw new Unauthorized("missing_token");
  return session.claims.sub;
}

export function businessIdOf(req: Request): string {
  const id = sessions.get(req)?.businessId;
  if (!id) throw new Forbidden("business_not_linked");
  return id;
}

/** Admin key from x-admin-key or a bearer token. No key configured means no admin access. */
export function requireAdmin(adminKey?: string): RequestHandler {
  return (req, _res, next) => {
    const h = (req.header("x-admin-key") || "").trim();
    const bearer = bearerOf(req);
    const ok = !!adminKey && (safeEqual(h, adminKey) || safeEqual(bearer, adminKey));
    next(ok ? undefined : new Unauthorized("unauthorized"));
  };
}
