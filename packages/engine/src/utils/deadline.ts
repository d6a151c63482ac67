export type TimeoutOutcome<T> =
  | { timedOut: false; value: T }
  | { timedOut: true };

/**
 * Race a promise against a timer. The timer is always cleared, and a
 * rejection of `promise` still propagates to the caller.
 */
export async function raceWithTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
): Promise<TimeoutOutcome<T>> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expired = new Promise<TimeoutOutcome<T>>((resolve) => {
    timer = setTimeout(() => resolve({ timedOut: true }), timeoutMs);
  });

  try {
    return await Promise.race([
      promise.then((value): TimeoutOutcome<T> => ({ timedOut: false, value })),
      expired,
    ]);
  } finally {
    clearTimeout(timer);
  }
}
