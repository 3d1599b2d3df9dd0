export class HttpError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(status: number, code: string, message?: string, details?: unknown) {
    super(message || code);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

/** Malformed input. Rejected whole, never partially applied. */
export class ValidationError extends HttpError {
  constructor(code = "validation_failed", details?: unknown) {
    super(400, code, code, details);
  }
}

export class Unauthorized extends HttpError {
  constructor(code = "unauthorized") {
    super(401, code);
  }
}

export class Forbidden extends HttpError {
  constructor(code = "forbidden") {
    super(403, code);
  }
}

export class NotFound extends HttpError {
  constructor(code = "not_found") {
    super(404, code);
  }
}

export class Conflict extends HttpError {
  constructor(code = "conflict", details?: unknown) {
    super(409, code, code, details);
  }
}

/** External store or voice vendor unreachable. Safe to retry. */
export class UpstreamUnavailable extends HttpError {
  constructor(service: string, details?: unknown) {
    super(503, "upstream_unavailable", `${service} unavailable`, details);
  }
}
