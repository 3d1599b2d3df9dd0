import rateLimit from "express-rate-limit";
import { HttpError } from "../core/errors.js";

export function makeRateLimiter(opts: { windowMs: number; max: number }) {
  return rateLimit({
    windowMs: opts.windowMs,
    limit: opts.max,
    standardHeaders: true,
    legacyHeaders: false,
    // through the error middleware so the body carries the request id
    handler: (_req, _res, next) => next(new HttpError(429, "rate_limited")),
  });
}
