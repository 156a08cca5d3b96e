/**
 * Async utilities for sleeping and polling with a deadline
 */

import { PollTimeoutError } from '../lib/errors';

export interface PollOptions {
  /** Delay between two checks */
  intervalMs: number;
  /** Total wait budget, measured from the first check */
  timeoutMs: number;
  message?: string;
}

export const sleep = (ms: number): Promise<void> => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Re-run `check` until it reports true or the budget is spent.
 *
 * The check runs at least once, and once more after the deadline has been
 * crossed, so a condition that became true during the last sleep is not
 * reported as a timeout.
 */
export async function pollUntil(
  check: () => Promise<boolean> | boolean,
  { intervalMs, timeoutMs, message = 'Timed out while polling' }: PollOptions,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    if (await check()) return;
    if (Date.now() >= deadline) break;
    await sleep(intervalMs);
  }

  throw new PollTimeoutError(message, timeoutMs);
}
