/**
 * Scoped resources: acquire, use, always release. Release failures are
 * handed to `onReleaseError` and never replace the body's outcome.
 */

export interface Resource<T> {
  value: T;
  release(): Promise<void>;
}

export type ReleaseErrorHandler = (error: unknown) => void;

export async function withResource<T, R>(
  acquire: () => Promise<Resource<T>>,
  use: (value: T) => Promise<R>,
  onReleaseError: ReleaseErrorHandler,
): Promise<R> {
  const resource = await acquire();
  try {
    return await use(resource.value);
  } finally {
    try {
      await resource.release();
    } catch (error) {
      onReleaseError(error);
    }
  }
}

export type RaceOutcome<T> = { kind: "settled"; value: T } | { kind: "timeout" };

/**
 * Races `promise` against a timer. On timeout the original promise keeps
 * running; callers must attach their own handler to it if it may reject.
 */
export async function raceTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<RaceOutcome<T>> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<RaceOutcome<T>>((resolve) => {
    timer = setTimeout(() => resolve({ kind: "timeout" }), Math.max(0, timeoutMs));
  });
  try {
    return await Promise.race([
      promise.then((value): RaceOutcome<T> => ({ kind: "settled", value })),
      timeout,
    ]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
