export type MatchingErrorKind =
  | "ValidationFailure"
  | "NotFound"
  | "UpstreamUnavailable"
  | "RateLimited"
  | "Internal";

const STATUS_BY_KIND: Record<MatchingErrorKind, number> = {
  ValidationFailure: 400,
  NotFound: 404,
  UpstreamUnavailable: 503,
  RateLimited: 429,
  Internal: 500,
};

const RETRYABLE_KINDS: ReadonlySet<MatchingErrorKind> = new Set([
  "UpstreamUnavailable",
  "RateLimited",
]);

export interface MatchingErrorOptions {
  details?: unknown;
  retryAfterSeconds?: number;
  cause?: unknown;
}

/**
 * Expected failure of a matching operation. `kind` tells the caller whether
 * to fix the request, give up, or retry (and when).
 */
export class MatchingError extends Error {
  readonly kind: MatchingErrorKind;
  readonly statusCode: number;
  readonly retryable: boolean;
  readonly details?: unknown;
  readonly retryAfterSeconds?: number;

  constructor(
    kind: MatchingErrorKind,
    message: string,
    options: MatchingErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "MatchingError";
    this.kind = kind;
    this.statusCode = STATUS_BY_KIND[kind];
    this.retryable = RETRYABLE_KINDS.has(kind);
    this.details = options.details;
    this.retryAfterSeconds = options.retryAfterSeconds;
  }
}

export function validationFailure(
  message: string,
  details?: unknown,
): MatchingError {
  return new MatchingError("ValidationFailure", message, { details });
}

export function notFound(message: string): MatchingError {
  return new MatchingError("NotFound", message);
}

export function upstreamUnavailable(
  message: string,
  cause?: unknown,
): MatchingError {
  return new MatchingError("UpstreamUnavailable", message, { cause });
}

export function rateLimited(retryAfterSeconds: number): MatchingError {
  return new MatchingError(
    "RateLimited",
    "Too many requests. Please try again later.",
    { retryAfterSeconds },
  );
}

export function isMatchingError(err: unknown): err is MatchingError {
  return err instanceof MatchingError;
}

/** True for the rejection produced when an AbortSignal fires. */
export function isAbortError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === "AbortError" || err.name === "CanceledError")
  );
}
