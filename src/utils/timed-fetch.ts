import { asError, monologueError } from "../errors.js";

export interface TimedFetchInit extends RequestInit {
  timeoutMs?: number;
  /** Short label naming the caller, carried into the error message. */
  where?: string;
}

/** Wrap fetch with timeout and location context for debugging. */
export async function timedFetch(url: string, init: TimedFetchInit = {}): Promise<Response> {
  const { timeoutMs, where, ...rest } = init;
  let timer: ReturnType<typeof setTimeout> | null = null;

  try {
    if (timeoutMs && timeoutMs > 0) {
      const controller = new AbortController();
      rest.signal = controller.signal;
      timer = setTimeout(() => controller.abort(), timeoutMs);
    }
    return await fetch(url, rest);
  } catch (e: unknown) {
    const wrapped = asError(e);
    const isAbort = wrapped.name === "AbortError";
    const tag = isAbort ? "fetch timeout" : "fetch error";
    throw monologueError(
      isAbort ? "timeout_error" : "generation_error",
      `[${tag}] ${where ?? ""} ${url} -> ${wrapped.name}: ${wrapped.message}`,
      { endpoint: url, retryable: isAbort, cause: e },
    );
  } finally {
    if (timer) clearTimeout(timer);
  }
}
