import { cfg } from '../config/index.js';
import { isRetryable, TransportError } from './errors.js';
import { logger } from './logger.js';

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type RetryingCall = <A extends unknown[], R>(
  operation: (...args: A) => Promise<R>,
  ...args: A
) => Promise<R>;

// the trailing CallOptions of a transport call, when it carries a signal
function signalOf(args: readonly unknown[]): AbortSignal | undefined {
  const last = args[args.length - 1];
  if (typeof last === 'object' && last !== null && 'signal' in last && last.signal instanceof AbortSignal) {
    return last.signal;
  }
  return undefined;
}

function sleep(ms: number, signal: AbortSignal | undefined, lastErr: unknown): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new TransportError('request aborted', 'ABORTED', { cause: lastErr }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    if (signal?.aborted) onAbort();
    else signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
}

/**
 * Builds a caller that re-invokes `operation` with the same arguments until it
 * resolves or the policy runs out, then rethrows the last error as-is.
 * Errors that `isRetryable` rejects are rethrown on the first attempt.
 * When the last argument carries an `AbortSignal`, aborting it during a
 * backoff rejects at once with an `ABORTED` `TransportError`.
 */
export function createRetrying(policy: RetryPolicy): RetryingCall {
  return async function retrying<A extends unknown[], R>(
    operation: (...args: A) => Promise<R>,
    ...args: A
  ): Promise<R> {
    const signal = signalOf(args);
    let attempt = 0;
    for (;;) {
      attempt++;
      try {
        return await operation(...args);
      } catch (err) {
        if (!isRetryable(err) || attempt >= policy.maxAttempts) throw err;
        const delayMs = backoffDelay(policy, attempt);
        logger.warn({ err, op: operation.name || 'anonymous', attempt, delayMs }, 'call failed; retrying');
        await sleep(delayMs, signal, err);
      }
    }
  };
}

export const retryingCall: RetryingCall = createRetrying(cfg.retry);
