/**
 * Settles with `promise`, or rejects with the signal's reason as soon as the
 * signal aborts. The underlying work is not stopped; it is only abandoned.
 */
export function raceWithSignal<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
  });

  return Promise.race([promise, aborted]).finally(() => {
    if (onAbort) signal.removeEventListener('abort', onAbort);
  });
}

/**
 * One signal that fires on the caller's abort or after `timeoutMs`,
 * whichever comes first. The timeout signal is returned separately so the
 * two causes can be told apart.
 */
export function withDeadline(
  timeoutMs: number,
  signal?: AbortSignal
): { signal: AbortSignal; timeout: AbortSignal } {
  const timeout = AbortSignal.timeout(timeoutMs);
  return {
    signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    timeout,
  };
}
