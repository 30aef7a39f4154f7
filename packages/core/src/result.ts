// packages/core/src/result.ts
import { errMessage, type Log } from "@orcha/utils";

/** Outcome of a best-effort sub-step: a failed step still carries a usable value. */
export type Step<T> = { ok: true; value: T } | { ok: false; value: T; error: string };

export async function degrade<T>(label: string, fallback: T, fn: () => Promise<T>, log: Log): Promise<Step<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (e) {
    log.warn(`${label} degraded:`, errMessage(e));
    return { ok: false, value: fallback, error: errMessage(e) };
  }
}

/** Collects the labels of degraded steps for the turn response. */
export class Degradations {
  readonly labels: string[] = [];

  take<T>(label: string, step: Step<T>): T {
    if (!step.ok) this.labels.push(label);
    return step.value;
  }
}
