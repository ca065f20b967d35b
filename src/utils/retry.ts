import type { Logger } from '../logger.js';
import { errMsg } from './error.js';
import { sleep } from '../ble/types.js';

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 2). Total attempts = maxRetries + 1. */
  maxRetries?: number;
  /** Delay before retry n is `backoffMs * n` (default: 1000). */
  backoffMs?: number;
  /** Logger instance for retry/error messages. */
  log: Logger;
  /** Label for log messages (e.g. 'connect', 'battery read'). */
  label: string;
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (err: unknown) => boolean;
  /** Injected for tests. */
  delay?: (ms: number) => Promise<void>;
}

/**
 * Execute an async function with retries and linear backoff.
 *
 * The `fn` should throw on failure. The last error is rethrown once all
 * attempts are exhausted.
 */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const maxRetries = opts.maxRetries ?? 2;
  const backoffMs = opts.backoffMs ?? 1000;
  const wait = opts.delay ?? sleep;

  for (let attempt = 0; ; attempt++) {
    if (attempt > 0) {
      const delayMs = backoffMs * attempt;
      opts.log.info(`Retrying ${opts.label} (${attempt}/${maxRetries}) in ${delayMs}ms...`);
      await wait(delayMs);
    }

    try {
      return await fn();
    } catch (err) {
      opts.log.error(`${opts.label} failed: ${errMsg(err)}`);
      if (attempt >= maxRetries || (opts.shouldRetry && !opts.shouldRetry(err))) throw err;
    }
  }
}
