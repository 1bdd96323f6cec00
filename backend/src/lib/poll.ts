import logger from './logger';
import { TimeoutError, isTransientClusterError } from './errors';

/**
 * Time source for polling loops. Tests substitute a fake that advances
 * instantly on sleep.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Current clock time as integer epoch seconds
 */
export function nowSeconds(clock: Clock): number {
  return Math.floor(clock.now() / 1000);
}

export interface PollOptions {
  /** What is being waited for, used in logs and TimeoutError */
  description: string;
  /** Delay between polls in milliseconds */
  intervalMs: number;
  /** Give up once this much time has elapsed since the first poll */
  timeoutMs: number;
  clock?: Clock;
  /** Called after every poll that did not satisfy the predicate */
  onPoll?: (attempt: number) => void;
  /** Query errors that count as "nothing observed" (default: transient cluster errors) */
  isTransient?: (error: unknown) => boolean;
}

/**
 * Repeatedly run `query` until `predicate` holds for its result.
 *
 * Polls immediately, then once per interval. After an unsuccessful poll the
 * loop sleeps one interval and fails with TimeoutError, without polling again,
 * if the bound has elapsed by then. There are no retries beyond the bound.
 */
export async function awaitCondition<S, R extends S>(
  query: () => Promise<S>,
  predicate: (state: S) => state is R,
  options: PollOptions
): Promise<R>;
export async function awaitCondition<S>(
  query: () => Promise<S>,
  predicate: (state: S) => boolean,
  options: PollOptions
): Promise<S>;
export async function awaitCondition<S>(
  query: () => Promise<S>,
  predicate: (state: S) => boolean,
  options: PollOptions
): Promise<S> {
  const {
    description,
    intervalMs,
    timeoutMs,
    clock = systemClock,
    onPoll,
    isTransient = isTransientClusterError,
  } = options;

  const startedAt = clock.now();
  let lastState: S | undefined;
  let polls = 0;

  for (;;) {
    polls++;
    try {
      const state = await query();
      lastState = state;
      if (predicate(state)) {
        logger.debug({ description, polls, elapsedMs: clock.now() - startedAt }, `Condition met: ${description}`);
        return state;
      }
    } catch (error) {
      if (!isTransient(error)) {
        throw error;
      }
      logger.debug(
        { description, polls, errorMessage: error instanceof Error ? error.message : String(error) },
        `Transient error while waiting for ${description}`
      );
    }

    onPoll?.(polls);
    await clock.sleep(intervalMs);

    const elapsedMs = clock.now() - startedAt;
    if (elapsedMs >= timeoutMs) {
      logger.warn({ description, polls, elapsedMs }, `Timed out waiting for ${description}`);
      throw new TimeoutError(description, elapsedMs, polls, lastState);
    }
  }
}
