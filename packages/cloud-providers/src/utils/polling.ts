/**
 * Fixed-delay, bounded-attempt polling.
 *
 * Each attempt either finishes the poll, asks for another attempt, or throws.
 * A thrown error ends the poll immediately; checks that want to tolerate a
 * failed read catch it themselves and return `{ done: false }`.
 */

import { CancelledError, TimeoutError } from "@skyforge/adapters-common";
import type { LogCallback, SleepFn } from "../types";
import { sleep as defaultSleep } from "./provider-utils";

export type PollResult<T> = { done: true; value: T } | { done: false };

export interface PollOptions {
  maxAttempts: number;
  delayMs: number;
  /** Used in timeout and progress messages */
  description: string;
  sleep?: SleepFn;
  /** Sleep before the first attempt as well as between attempts */
  delayFirst?: boolean;
  signal?: AbortSignal;
  log?: LogCallback;
}

export async function pollUntil<T>(
  check: (attempt: number) => Promise<PollResult<T>>,
  options: PollOptions,
): Promise<T> {
  const { maxAttempts, delayMs, description, delayFirst = false, signal, log } = options;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    throwIfAborted(signal, description);
    if (delayFirst || attempt > 1) {
      await sleep(delayMs);
      throwIfAborted(signal, description);
    }

    const result = await check(attempt);
    if (result.done) {
      return result.value;
    }
    log?.(`Waiting for ${description} (${attempt}/${maxAttempts})...`);
  }

  throw new TimeoutError(
    `Timed out waiting for ${description} after ${maxAttempts} attempts`,
    maxAttempts,
  );
}

function throwIfAborted(signal: AbortSignal | undefined, description: string): void {
  if (signal?.aborted) {
    throw new CancelledError(`Cancelled while waiting for ${description}`);
  }
}
