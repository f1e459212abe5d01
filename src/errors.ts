/**
 * Structured error types for monologue.
 *
 * Error boundaries wrap failures with monologueError instead of
 * stringifying with e.message, so the stack and cause survive into the
 * event log and the console.
 */

export type MonologueErrorKind =
  | "generation_error"
  | "tool_error"
  | "config_error"
  | "search_error"
  | "timeout_error"
  | "session_error";

export interface MonologueError extends Error {
  kind: MonologueErrorKind;
  endpoint?: string;
  model?: string;
  retryable: boolean;
  latency_ms?: number;
  cause?: unknown;
}

export interface MonologueErrorOptions {
  endpoint?: string;
  model?: string;
  retryable?: boolean;
  latency_ms?: number;
  cause?: unknown;
}

/**
 * Create a MonologueError with structured fields.
 */
export function monologueError(
  kind: MonologueErrorKind,
  message: string,
  opts: MonologueErrorOptions = {},
): MonologueError {
  const err: MonologueError = Object.assign(new Error(message), {
    kind,
    retryable: opts.retryable ?? false,
  });
  if (opts.endpoint) err.endpoint = opts.endpoint;
  if (opts.model) err.model = opts.model;
  if (opts.latency_ms !== undefined) err.latency_ms = opts.latency_ms;
  if (opts.cause !== undefined) err.cause = opts.cause;
  return err;
}

/**
 * Normalize an unknown thrown value into an Error.
 * Handles strings, objects and nulls.
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (typeof e === "string") return new Error(e);
  if (e === null || e === undefined) return new Error("Unknown error");
  try {
    return new Error(String(e));
  } catch {
    return new Error("Unknown error");
  }
}

export function isMonologueError(e: unknown): e is MonologueError {
  return e instanceof Error && "kind" in e && "retryable" in e;
}

/**
 * Format a MonologueError for structured logging.
 * Returns a plain object suitable for JSON.stringify.
 */
export function errorLogFields(e: MonologueError): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    kind: e.kind,
    message: e.message,
    retryable: e.retryable,
  };
  if (e.endpoint) fields.endpoint = e.endpoint;
  if (e.model) fields.model = e.model;
  if (e.latency_ms !== undefined) fields.latency_ms = e.latency_ms;
  if (e.cause) {
    const cause = asError(e.cause);
    fields.cause_message = cause.message;
    if (cause.stack) fields.cause_stack = cause.stack;
  }
  if (e.stack) fields.stack = e.stack;
  return fields;
}
