// Timer helpers for stream sessions

/**
 * Sleep/delay helper
 * @param ms - Milliseconds to sleep
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait for a promise to settle, giving up after `ms`.
 * Resolves true if it settled (either way) in time, false otherwise.
 * The promise itself is left running.
 */
export async function settlesWithin(
  promise: Promise<unknown>,
  ms: number,
): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timedOut = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  const settled = promise.then(
    () => true,
    () => true,
  );

  try {
    return await Promise.race([settled, timedOut]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Wall-clock stopwatch
 */
export class Timer {
  private startTime?: number;
  private endTime?: number;

  start(): void {
    this.startTime = Date.now();
    this.endTime = undefined;
  }

  stop(): void {
    if (this.startTime === undefined) return;
    this.endTime = Date.now();
  }

  /**
   * Elapsed time in milliseconds (0 if never started)
   */
  elapsed(): number {
    if (this.startTime === undefined) return 0;
    const end = this.endTime ?? Date.now();
    return end - this.startTime;
  }

  reset(): void {
    this.startTime = undefined;
    this.endTime = undefined;
  }

  isRunning(): boolean {
    return this.startTime !== undefined && this.endTime === undefined;
  }
}
