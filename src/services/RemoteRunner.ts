/**
 * Remote-then-fallback execution shared by classification, guidance and
 * summary narratives.
 *
 * A remote attempt is bounded per call by `timeoutMs` and overall by
 * `deadlineMs`; transient failures (rate limiting, network) get at most
 * `maxRetries` more attempts after `retryBackoffMs`. Whatever happens, the
 * fallback produces the answer: remote failures are logged, never thrown.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { RemoteError, toRemoteError } from '../errors.js';

export interface RemotePolicy {
  /** Per-attempt timeout. */
  timeoutMs: number;
  /** Extra attempts after a transient failure. */
  maxRetries: number;
  retryBackoffMs: number;
  /** Budget for all attempts together. */
  deadlineMs: number;
}

export const DEFAULT_REMOTE_POLICY: RemotePolicy = {
  timeoutMs: 4000,
  maxRetries: 1,
  retryBackoffMs: 250,
  deadlineMs: 9000,
};

/** One remote attempt, given its time budget and abort signal. */
export type RemoteCall<T> = (timeoutMs: number, signal: AbortSignal) => Promise<T>;

export class RemoteRunner {
  /** Controllers of runs with a remote attempt still pending. */
  private readonly inFlight = new Set<AbortController>();

  constructor(
    private readonly policy: RemotePolicy,
    private readonly logger: ILogProvider
  ) {}

  /** Runs whose remote attempt has not settled yet; 0 once every call has returned. */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Produce a value through `remote` when given, else (or on any remote
   * failure) through `fallback`. Never rejects unless `fallback` throws.
   */
  async run<T>(
    operation: string,
    remote: RemoteCall<T> | null,
    fallback: () => T,
    signal?: AbortSignal
  ): Promise<T> {
    if (!remote) {
      this.logger.debug(`${operation}: remote disabled, using fallback`, { operation });
      return fallback();
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    this.inFlight.add(controller);
    const progress = { attempts: 0 };

    try {
      return await this.attempt(remote, controller.signal, progress);
    } catch (err) {
      const failure = toRemoteError(err);
      this.logger.warn(`${operation}: remote failed, using fallback`, {
        operation,
        kind: failure.kind,
        attempt: progress.attempts,
        error: failure.message,
      });
      return fallback();
    } finally {
      this.inFlight.delete(controller);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async attempt<T>(
    remote: RemoteCall<T>,
    signal: AbortSignal,
    progress: { attempts: number }
  ): Promise<T> {
    const { timeoutMs, maxRetries, retryBackoffMs, deadlineMs } = this.policy;
    const startedAt = Date.now();

    for (let attempt = 0; ; attempt++) {
      const remaining = deadlineMs - (Date.now() - startedAt);
      if (remaining <= 0) {
        throw new RemoteError('Timeout', `Deadline of ${deadlineMs}ms exhausted`);
      }

      progress.attempts = attempt + 1;
      try {
        return await remote(Math.min(timeoutMs, remaining), signal);
      } catch (err) {
        const failure = toRemoteError(err);
        const elapsed = Date.now() - startedAt;
        const retry =
          failure.transient &&
          attempt < maxRetries &&
          !signal.aborted &&
          elapsed + retryBackoffMs < deadlineMs;
        if (!retry) throw failure;

        this.logger.debug('remote attempt failed, retrying', {
          kind: failure.kind,
          attempt: attempt + 1,
        });
        try {
          await delay(retryBackoffMs, undefined, { signal });
        } catch {
          throw failure;
        }
      }
    }
  }
}
