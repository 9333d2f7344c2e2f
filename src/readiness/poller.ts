export interface Timer {
  promise: Promise<void>;
  cancel(): void;
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
  /** Resolves after `ms` unless cancelled first */
  timer(ms: number): Timer;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms)),
  timer: (ms: number) => {
    let handle: ReturnType<typeof setTimeout> | undefined;
    const promise = new Promise<void>(resolve => {
      handle = setTimeout(resolve, ms);
    });
    return { promise, cancel: () => clearTimeout(handle) };
  }
};

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  clock?: Clock;
  onAttempt?: (attempt: number, ready: boolean) => void;
}

export type PollOutcome =
  | { status: 'ready'; attempts: number; elapsedMs: number }
  | { status: 'timed-out'; attempts: number; elapsedMs: number; lastError?: string };

/**
 * Run one attempt, giving up once `limitMs` has passed. The abandoned attempt is
 * left to settle on its own.
 */
async function attemptWithin(predicate: (limitMs: number) => Promise<boolean>, limitMs: number, clock: Clock): Promise<boolean> {
  const timer = clock.timer(limitMs);
  const expired = timer.promise.then((): never => {
    throw new Error(`attempt did not finish within ${limitMs}ms`);
  });
  try {
    return await Promise.race([predicate(limitMs), expired]);
  } finally {
    timer.cancel();
  }
}

/**
 * Fixed-interval bounded poll. The first attempt runs immediately, the next ones
 * every `intervalMs`; polling stops once the next attempt would start at or past
 * the deadline. A predicate that throws counts as "not ready", and so does one
 * still running when the deadline passes. The predicate receives the time left.
 */
export async function pollUntil(predicate: (limitMs: number) => Promise<boolean>, options: PollOptions): Promise<PollOutcome> {
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();
  const deadline = startedAt + options.timeoutMs;
  let attempts = 0;
  let lastError: string | undefined;

  for (;;) {
    attempts++;
    let ready = false;
    try {
      ready = await attemptWithin(predicate, Math.max(deadline - clock.now(), 0), clock);
    } catch (error) {
      lastError = error instanceof Error ? error.message : String(error);
    }
    options.onAttempt?.(attempts, ready);

    if (ready) {
      return { status: 'ready', attempts, elapsedMs: clock.now() - startedAt };
    }

    if (clock.now() + options.intervalMs >= deadline) {
      return { status: 'timed-out', attempts, elapsedMs: clock.now() - startedAt, lastError };
    }

    await clock.sleep(options.intervalMs);
  }
}
