/**
 * Retrying API Invoker
 *
 * Every call to the quote gateway goes through invokeWithRetry. A call
 * fails when it throws, when the gateway answers with a non-success status,
 * or when it returns no rows. Failed calls are retried after a constant
 * delay; once the attempts are used up the last failure is thrown to the
 * caller.
 */

import { systemClock, type Clock } from "./clock.js";
import { RET_OK, type ApiResponse } from "./gateway/types.js";

/** Raised for a non-success gateway status or a transport failure */
export class ApiCallError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "ApiCallError";
  }
}

/** Raised when the gateway reports success but returns no rows */
export class EmptyResultError extends ApiCallError {
  constructor(label: string) {
    super(`${label} returned no data`, RET_OK);
    this.name = "EmptyResultError";
  }
}

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxRetries: number;
  /** Constant wait between attempts */
  delayMs: number;
  /** Name used in log lines */
  label?: string;
  clock?: Clock;
  signal?: AbortSignal;
}

/** Gateway calls: 3 attempts, 10 seconds apart */
export const API_RETRY: Pick<RetryPolicy, "maxRetries" | "delayMs"> = { maxRetries: 3, delayMs: 10_000 };

/** Whole operations: 3 attempts, 5 seconds apart */
export const OPERATION_RETRY: Pick<RetryPolicy, "maxRetries" | "delayMs"> = { maxRetries: 3, delayMs: 5_000 };

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function attemptLoop<T>(run: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  const clock = policy.clock ?? systemClock;
  const label = policy.label ?? "API call";
  const maxRetries = Math.max(1, policy.maxRetries);

  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      return await run();
    } catch (error) {
      if (attempt >= maxRetries || policy.signal?.aborted) {
        console.error(`❌ ${label} failed after ${attempt} attempt(s), giving up: ${describe(error)}`);
        throw error;
      }
      console.warn(`⚠️ ${label} failed (${attempt}/${maxRetries}), retrying in ${policy.delayMs}ms: ${describe(error)}`);
      await clock.sleep(policy.delayMs, policy.signal);
    }
  }
}

/**
 * Call a gateway operation until it returns a non-empty successful result
 *
 * @param operation - Gateway method returning an ApiResponse
 * @param args - Arguments passed to the operation on every attempt
 * @param policy - Attempt count and delay
 * @returns The rows of the first successful response
 */
export function invokeWithRetry<A extends unknown[], T>(
  operation: (...args: A) => Promise<ApiResponse<T>>,
  args: A,
  policy: RetryPolicy
): Promise<T[]> {
  const label = policy.label ?? "API call";

  return attemptLoop(async () => {
    const response = await operation(...args);
    if (response.status !== RET_OK) {
      throw new ApiCallError(
        `${label} returned status ${response.status}${response.message ? `: ${response.message}` : ""}`,
        response.status
      );
    }
    if (response.rows.length === 0) {
      throw new EmptyResultError(label);
    }
    console.log(`   ${label}: ${response.rows.length} row(s)`);
    return response.rows;
  }, policy);
}

/**
 * Wrap an async function so each call is retried with the given policy
 */
export function withRetry<A extends unknown[], T>(
  fn: (...args: A) => Promise<T>,
  policy: RetryPolicy
): (...args: A) => Promise<T> {
  return (...args: A) => attemptLoop(() => fn(...args), policy);
}
