/**
 * Scoped timeout for remote calls.
 *
 * The callee receives an AbortSignal that fires on the deadline or when the
 * caller's signal aborts. The returned promise settles at that moment even if
 * the callee ignores its signal, so control always comes back in time.
 */

import { RemoteError, toRemoteError } from '../errors.js';

export async function withDeadline<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw new RemoteError('Timeout', 'Cancelled by caller before the call started');
  }

  const controller = new AbortController();
  let expired: RemoteError | null = null;

  const abortWith = (err: RemoteError) => {
    if (controller.signal.aborted) return;
    expired = err;
    controller.abort(err);
  };

  const timer = setTimeout(
    () => abortWith(new RemoteError('Timeout', `No response within ${timeoutMs}ms`)),
    timeoutMs
  );
  const onParentAbort = () => abortWith(new RemoteError('Timeout', 'Cancelled by caller'));
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const aborted = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => reject(expired ?? new RemoteError('Timeout', 'Aborted')),
      { once: true }
    );
  });

  aborted.catch(() => undefined);

  try {
    const call = run(controller.signal);
    // The call may still settle after the deadline; nobody is waiting for it then.
    call.catch(() => undefined);
    return await Promise.race([call, aborted]);
  } catch (err) {
    // An SDK abort error raised by our own signal reports the real reason.
    throw expired ?? toRemoteError(err);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
