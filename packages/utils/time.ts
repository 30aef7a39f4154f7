// packages/utils/time.ts

export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly ms: number,
  ) {
    super(`Timeout ${ms}ms in ${label}`);
    this.name = "TimeoutError";
  }
}

/** Races a promise against a timer; the timer is always cleared. */
export function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  let t: NodeJS.Timeout | undefined;
  const killer = new Promise<never>((_, rej) => {
    t = setTimeout(() => rej(new TimeoutError(label, ms)), ms);
  });
  return Promise.race([p, killer]).finally(() => clearTimeout(t));
}

/**
 * Runs `fn` with a signal that aborts when either the parent (request) signal
 * aborts or `ms` elapses. The returned promise rejects with TimeoutError on expiry
 * even if `fn` ignores the signal.
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string,
  parent?: AbortSignal,
): Promise<T> {
  const local = new AbortController();
  const signal = parent ? AbortSignal.any([parent, local.signal]) : local.signal;
  if (parent?.aborted) throw new Error(`Request aborted before ${label}`);
  try {
    return await withTimeout(fn(signal), ms, label);
  } catch (e) {
    if (e instanceof TimeoutError) local.abort(e);
    throw e;
  }
}

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

/** YYYY-MM-DD (UTC) */
export function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** YYYY-MM-DD HH:MM (UTC) */
export function isoMinute(d: Date): string {
  return d.toISOString().slice(0, 16).replace("T", " ");
}
