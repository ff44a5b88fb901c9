/**
 * Combine a caller's AbortSignal with a timeout. The combined signal aborts
 * with the caller's reason, or with a TimeoutError once `timeoutMs` elapses.
 * Always call `cleanup` when the guarded work settles.
 */
export function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const combinedController = new AbortController();

  const abortCombined = (reason?: unknown) => {
    if (combinedController.signal.aborted) return;
    combinedController.abort(reason);
  };

  const timeout = setTimeout(() => {
    abortCombined(new TimeoutError(timeoutMs));
  }, timeoutMs);
  timeout.unref?.();

  const onCallerAbort = () => abortCombined(callerSignal?.reason);

  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  const cleanup = () => {
    clearTimeout(timeout);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  };

  return { signal: combinedController.signal, cleanup };
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** Our own TimeoutError, or the DOMException `AbortSignal.timeout()` aborts with. */
export function isTimeoutReason(reason: unknown): boolean {
  if (reason instanceof TimeoutError) return true;
  return reason instanceof DOMException && reason.name === 'TimeoutError';
}
