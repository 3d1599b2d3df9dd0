import type { ErrorRequestHandler, Request, RequestHandler, Response } from "express";
import type { Logger } from "pino";
import { nanoid } from "nanoid";
import { ZodError } from "zod";
import { HttpError, NotFound, ValidationError } from "../core/errors.js";

const requestIds = new WeakMap<Request, string>();

export function bindRequestId(req: Request, res: Response, id: string) {
  requestIds.set(req, id);
  res.setHeader("x-request-id", id);
}

export function requestIdOf(req: Request): string {
  return requestIds.get(req) ?? "";
}

/** Takes the caller's x-request-id when it looks sane, otherwise mints one. */
export function requestId(): RequestHandler {
  return (req, res, next) => {
    const given = (req.header("x-request-id") || "").trim();
    bindRequestId(req, res, given && given.length <= 128 ? given : nanoid());
    next();
  };
}

/** Express 4 does not catch rejected handlers. */
export function route(fn: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function notFound(): RequestHandler {
  return (_req, _res, next) => next(new NotFound("route_not_found"));
}

// body-parser failures carry a `type` such as "entity.parse.failed"
function bodyParserError(err: unknown): HttpError | null {
  if (typeof err !== "object" || err === null || !("type" in err)) return null;
  if (err.type === "entity.parse.failed") return new ValidationError("invalid_json");
  if (err.type === "entity.too.large") return new HttpError(413, "payload_too_large");
  return null;
}

function toHttpError(err: unknown): HttpError {
  if (err instanceof HttpError) return err;
  if (err instanceof ZodError) return new ValidationError("validation_failed", err.flatten());
  return bodyParserError(err) ?? new HttpError(500, "internal_error", "Internal error");
}

export function errorHandler(log: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) return next(err);

    const requestId = requestIdOf(req);
    const e = toHttpError(err);
    if (e.status >= 500) {
      log.error({ err, requestId, method: req.method, path: req.path, code: e.code }, "request failed");
    } else {
      log.warn({ requestId, method: req.method, path: req.path, status: e.status, code: e.code }, "request rejected");
    }

    res.status(e.status).json({
      ok: false,
      error: e.code,
      ...(e.details !== undefined ? { details: e.details } : {}),
      requestId,
    });
  };
}
