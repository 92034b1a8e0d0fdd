// CHANGE: Retry-wrapped GET with fixed delay and per-request timeout.
// WHY: Callers receive a result value and choose their own fallback; nothing here throws.

import axios, { AxiosError, type AxiosInstance, type AxiosRequestConfig } from "axios";
import { NET } from "../config.js";
import { debug, describeError, error as logError, warn } from "../logger.js";

/**
 * Attempt budget applied to a single request.
 *
 * @property attempts - Total tries including the first one.
 * @property delayMs - Fixed wait between two tries.
 * @property timeoutMs - Per-try timeout.
 */
export interface RetryPolicy {
  readonly attempts: number;
  readonly delayMs: number;
  readonly timeoutMs: number;
}

export type FetchResult<T> =
  | { readonly ok: true; readonly value: T; readonly attempts: number }
  | { readonly ok: false; readonly error: string; readonly attempts: number };

export type RetryState = "attempting" | "waiting" | "succeeded" | "exhausted";

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: NET.RETRY_ATTEMPTS,
  delayMs: NET.RETRY_DELAY,
  timeoutMs: NET.TIMEOUT
};

const httpClient: AxiosInstance = axios.create({
  timeout: NET.TIMEOUT,
  maxRedirects: 5,
  headers: {
    "User-Agent": "PluginMirror/0.2 (+https://github.com/)"
  }
});

function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}

/**
 * Describe a failed attempt: HTTP status when the server answered, error code otherwise.
 */
export function describeHttpError(cause: unknown): string {
  if (cause instanceof AxiosError) {
    if (cause.response) {
      return `HTTP ${cause.response.status}${cause.response.statusText ? ` ${cause.response.statusText}` : ""}`;
    }
    return cause.code ? `${cause.code}: ${cause.message}` : cause.message;
  }
  return describeError(cause);
}

export type RetryEvent = "success" | "failure" | "waited";

/**
 * Transition table of the retry state machine.
 *
 * @param attempt - Attempts made so far, including the one that produced `event`.
 */
export function nextRetryState(state: RetryState, event: RetryEvent, attempt: number, maxAttempts: number): RetryState {
  switch (state) {
    case "attempting":
      if (event === "success") {
        return "succeeded";
      }
      if (event === "failure") {
        return attempt >= maxAttempts ? "exhausted" : "waiting";
      }
      return state;
    case "waiting":
      return event === "waited" ? "attempting" : state;
    default:
      return state;
  }
}

/**
 * Run one GET under the retry policy.
 *
 * A `parse` that throws counts as a failed attempt. Every failed attempt is logged at
 * warning level, the final one at error level.
 *
 * @param config - Axios request options applied to every attempt.
 * @param parse - Converts the response body into the value handed back.
 * @param label - Subject used in log lines, defaults to the URL.
 */
export async function fetchWithRetry<T>(
  url: string,
  config: AxiosRequestConfig,
  parse: (data: unknown) => T,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  label = url
): Promise<FetchResult<T>> {
  const maxAttempts = Math.max(1, policy.attempts);
  let state: RetryState = "attempting";
  let attempt = 0;
  let lastError = "no attempt made";

  for (;;) {
    if (state === "waiting") {
      await sleep(policy.delayMs);
      state = nextRetryState(state, "waited", attempt, maxAttempts);
      continue;
    }
    if (state !== "attempting") {
      return { ok: false, error: lastError, attempts: attempt };
    }

    attempt += 1;
    try {
      const response = await httpClient.get<unknown>(url, { ...config, timeout: policy.timeoutMs });
      const value = parse(response.data);
      debug(`GET ${url} succeeded with status ${response.status} (attempt ${attempt}/${maxAttempts})`);
      return { ok: true, value, attempts: attempt };
    } catch (cause) {
      lastError = describeHttpError(cause);
      state = nextRetryState(state, "failure", attempt, maxAttempts);
      const line = `${label} failed (attempt ${attempt}/${maxAttempts}): ${lastError}`;
      if (state === "exhausted") {
        logError(line);
      } else {
        warn(line);
      }
    }
  }
}

/**
 * GET a JSON document.
 */
export function fetchJson<T>(
  url: string,
  parse: (data: unknown) => T,
  policy?: RetryPolicy,
  label?: string
): Promise<FetchResult<T>> {
  return fetchWithRetry(url, { headers: { Accept: "application/json" } }, parse, policy, label);
}

function asIs(data: unknown): unknown {
  return data;
}

function asText(data: unknown): string {
  if (typeof data !== "string") {
    throw new Error("Response body is not text");
  }
  return data;
}

/**
 * GET a text payload; the body is never JSON-parsed.
 */
export function fetchText(url: string, policy?: RetryPolicy, label?: string): Promise<FetchResult<string>> {
  return fetchWithRetry(url, { responseType: "text", transformResponse: [asIs] }, asText, policy, label);
}

export { httpClient };
