import type { TimestampPhase } from '@coldstart/shared';

/**
 * Base class for every failure that ends a measurement run.
 * `context` carries what a human needs to diagnose and re-invoke.
 */
export class BenchmarkError extends Error {
  constructor(
    message: string,
    public readonly context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'BenchmarkError';
  }
}

/**
 * A poll exceeded its bound
 */
export class TimeoutError extends BenchmarkError {
  constructor(
    public readonly description: string,
    public readonly elapsedMs: number,
    public readonly polls: number,
    public readonly lastState: unknown
  ) {
    super(
      `Timed out after ${Math.round(elapsedMs / 1000)}s (${polls} polls) waiting for ${description}`,
      { description, elapsedSeconds: Math.round(elapsedMs / 1000), polls, lastState }
    );
    this.name = 'TimeoutError';
  }
}

/**
 * The watched pod reported a terminal failure phase
 */
export class PodFailedError extends BenchmarkError {
  constructor(
    public readonly podName: string,
    lastState: unknown
  ) {
    super(`Pod ${podName} failed to start`, { podName, lastState });
    this.name = 'PodFailedError';
  }
}

/**
 * The inference backend could not be reached
 */
export class ProxyError extends BenchmarkError {
  constructor(
    public readonly upstreamUrl: string,
    cause: unknown
  ) {
    super(`Inference backend unreachable: ${upstreamUrl}`, {
      upstreamUrl,
      cause: cause instanceof Error ? cause.message : String(cause),
    });
    this.name = 'ProxyError';
  }
}

/**
 * Reduction was attempted before every required timestamp was observed
 */
export class MissingTimestampError extends BenchmarkError {
  constructor(public readonly missing: TimestampPhase[]) {
    super(`Cannot reduce timestamps, missing: ${missing.join(', ')}`, { missing });
    this.name = 'MissingTimestampError';
  }
}

/**
 * Status code carried by @kubernetes/client-node HttpError and similar errors
 */
export function getStatusCode(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  if ('response' in error && error.response && typeof error.response === 'object') {
    const response = error.response;
    if ('statusCode' in response && typeof response.statusCode === 'number') {
      return response.statusCode;
    }
  }
  return undefined;
}

/**
 * Whether a cluster read failure should count as "nothing observed yet"
 * rather than aborting the poll: server errors, rate limiting, network errors,
 * and 404 for objects that do not exist yet.
 */
export function isTransientClusterError(error: unknown): boolean {
  if (!error || typeof error !== 'object') {
    return false;
  }

  const statusCode = getStatusCode(error);
  if (statusCode && (statusCode >= 500 || statusCode === 429 || statusCode === 404)) {
    return true;
  }

  const networkErrors = ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN'];
  if ('code' in error && typeof error.code === 'string' && networkErrors.includes(error.code)) {
    return true;
  }

  const retryableMessages = ['socket hang up', 'network error', 'ECONNRESET', 'ETIMEDOUT'];
  if ('message' in error && typeof error.message === 'string') {
    const message = error.message;
    return retryableMessages.some((msg) => message.includes(msg));
  }

  return false;
}
