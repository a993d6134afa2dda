/**
 * Per-call timeouts for external provider calls.
 */

import { TransientError } from './errors.js';

/**
 * Run `operation` with an abort signal that fires after `timeoutMs`.
 *
 * When the timer wins, the signal is aborted and the returned promise rejects
 * with a `TransientError` coded `TIMEOUT`, whether or not the operation
 * honours the signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TransientError(`${label} timed out after ${timeoutMs}ms`, 'TIMEOUT'));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
