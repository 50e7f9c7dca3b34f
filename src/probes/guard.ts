import { ConnectionTimeoutError, toProbeError, type ProbeError } from '../errors.js';
import { elapsedSince } from '../utils/format.js';
import type { ProbeContext } from '../types/probes.js';

/** How long past its own timeout a probe may run before it is abandoned */
export const DEFAULT_GRACE_MS = 500;

export interface GuardOptions<T> {
  timeoutMs: number;
  graceMs?: number | undefined;
  /** Builds the failure result for a probe that rejected or outlived its deadline */
  fail: (error: ProbeError, elapsedMs: number) => T;
}

/**
 * Runs a probe with a fresh AbortSignal. A rejection becomes a failure
 * result, and a probe still running at timeout + grace is aborted and
 * reported as a connection timeout.
 */
export async function runGuarded<T>(probe: (ctx: ProbeContext) => Promise<T>, options: GuardOptions<T>): Promise<T> {
  const { timeoutMs, graceMs = DEFAULT_GRACE_MS, fail } = options;
  const controller = new AbortController();
  const start = performance.now();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<T>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(fail(new ConnectionTimeoutError(`Probe timed out after ${timeoutMs}ms`), elapsedSince(start)));
    }, timeoutMs + graceMs);
  });

  const attempt = Promise.resolve()
    .then(() => probe({ timeoutMs, signal: controller.signal }))
    .catch((error: unknown) => fail(toProbeError(error), elapsedSince(start)));

  try {
    return await Promise.race([attempt, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
