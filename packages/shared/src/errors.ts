export type FieldIssue = { path: string; message: string };

export type ErrorCategory =
  | "auth"
  | "rate_limit"
  | "timeout"
  | "network"
  | "upstream"
  | "bad_request"
  | "malformed_response"
  | "api_error";

/** Caller input that failed schema checks. Never retried. */
export class ValidationInputError extends Error {
  readonly issues: FieldIssue[];
  constructor(message: string, issues: FieldIssue[] = []) {
    super(message);
    this.name = "ValidationInputError";
    this.issues = issues;
  }
}

export type ExternalServiceErrorOptions = {
  status?: number;
  retryable?: boolean;
  category?: ErrorCategory;
  cause?: unknown;
};

/** An embedding or LLM API call that could not be completed. */
export class ExternalServiceError extends Error {
  readonly service: string;
  readonly status?: number;
  readonly retryable: boolean;
  readonly category: ErrorCategory;

  constructor(service: string, message: string, opts: ExternalServiceErrorOptions = {}) {
    super(message, { cause: opts.cause });
    this.name = "ExternalServiceError";
    this.service = service;
    this.status = opts.status;
    this.retryable = opts.retryable ?? true;
    this.category = opts.category ?? "api_error";
  }

  static fromStatus(service: string, status: number, body: string) {
    const detail = body.length > 300 ? `${body.slice(0, 300)}...` : body;
    const message = `${service} responded ${status}${detail ? `: ${detail}` : ""}`;
    if (status === 401 || status === 403)
      return new ExternalServiceError(service, message, {
        status,
        retryable: false,
        category: "auth",
      });
    if (status === 429)
      return new ExternalServiceError(service, message, {
        status,
        retryable: true,
        category: "rate_limit",
      });
    if (status === 408)
      return new ExternalServiceError(service, message, {
        status,
        retryable: true,
        category: "timeout",
      });
    if (status >= 500 || status === 409)
      return new ExternalServiceError(service, message, {
        status,
        retryable: true,
        category: "upstream",
      });
    return new ExternalServiceError(service, message, {
      status,
      retryable: false,
      category: "bad_request",
    });
  }

  static fromNetworkError(service: string, err: unknown) {
    const aborted = err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
    const reason = err instanceof Error ? err.message : String(err);
    return new ExternalServiceError(
      service,
      aborted ? `${service} request timed out` : `${service} unreachable: ${reason}`,
      { retryable: true, category: aborted ? "timeout" : "network", cause: err },
    );
  }

  /** True when the service could not be reached at all, or is shedding load. */
  get unavailable(): boolean {
    return (
      this.category === "network" ||
      this.category === "timeout" ||
      this.category === "rate_limit" ||
      this.status === 503
    );
  }
}

/** The LLM answered, but not with the JSON shape that was asked for. */
export class MalformedResponseError extends Error {
  readonly raw?: string;
  constructor(message: string, raw?: string) {
    super(message);
    this.name = "MalformedResponseError";
    this.raw = raw && raw.length > 500 ? `${raw.slice(0, 500)}...` : raw;
  }
}

export type IndexNotFoundReason = "missing" | "unreadable" | "invalid";

export class IndexNotFoundError extends Error {
  readonly path: string;
  readonly reason: IndexNotFoundReason;
  constructor(path: string, reason: IndexNotFoundReason, cause?: unknown) {
    super(`Vector index ${reason} at ${path}`, { cause });
    this.name = "IndexNotFoundError";
    this.path = path;
    this.reason = reason;
  }
}

export class ConfigError extends Error {
  readonly variable: string;
  constructor(variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

/** Default retry predicate for LLM calls: transient transport errors and bad JSON. */
export function isTransientError(err: unknown): boolean {
  if (err instanceof MalformedResponseError) return true;
  if (err instanceof ExternalServiceError) return err.retryable;
  return false;
}

export function categorizeError(err: unknown): ErrorCategory {
  if (err instanceof ExternalServiceError) return err.category;
  if (err instanceof MalformedResponseError) return "malformed_response";
  const msg = err instanceof Error ? err.message : String(err ?? "");
  if (/rate limit|429/i.test(msg)) return "rate_limit";
  if (/timeout/i.test(msg)) return "timeout";
  if (/network|fetch failed|ENOTFOUND|ECONN/i.test(msg)) return "network";
  return "api_error";
}
