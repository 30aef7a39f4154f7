// packages/pulse/src/scheduler.ts
import { createLog, errMessage, type Log } from "@orcha/utils";
import type { PulseStore } from "@orcha/memory";
import type { PulseService } from "./service";

export type RunSummary = { succeeded: number; failed: number };

export type PulseSchedulerOptions = {
  cron: string;
  checkCron: string;
  now?: () => Date;
  log?: Log;
};

/**
 * Two cron tasks over the same stores: a daily pass over every active user and an
 * hourly pass that catches pulses whose next_generation is already due.
 */
export class PulseScheduler {
  private readonly log: Log;
  private readonly now: () => Date;

  constructor(
    private readonly service: PulseService,
    private readonly store: PulseStore,
    private readonly opts: PulseSchedulerOptions,
  ) {
    this.log = opts.log ?? createLog("pulse-scheduler");
    this.now = opts.now ?? (() => new Date());
  }

  async runAll(): Promise<RunSummary> {
    const users = await this.store.activeUserIds();
    this.log.info(`generating pulses for ${users.length} active users`);
    const summary = await this.runFor(users);
    this.log.info(`pulse generation complete: ${summary.succeeded} succeeded, ${summary.failed} failed`);
    return summary;
  }

  async runDue(): Promise<RunSummary> {
    const due = await this.store.dueUserIds(this.now());
    if (!due.length) {
      this.log.debug("no pulses due");
      return { succeeded: 0, failed: 0 };
    }
    this.log.info(`${due.length} pulses due for regeneration`);
    return this.runFor(due);
  }

  private async runFor(userIds: number[]): Promise<RunSummary> {
    const summary: RunSummary = { succeeded: 0, failed: 0 };
    for (const id of userIds) {
      const saved = await this.service.update(id);
      if (saved) summary.succeeded++;
      else summary.failed++;
    }
    return summary;
  }

  /** Schedules both tasks; the returned function stops them. */
  async start(): Promise<() => void> {
    const { default: cron } = await import("node-cron");
    this.log.info(`scheduling daily "${this.opts.cron}", due check "${this.opts.checkCron}"`);

    const daily = cron.schedule(this.opts.cron, async () => {
      try {
        await this.runAll();
      } catch (e) {
        this.log.error("daily tick error:", errMessage(e));
      }
    });
    const check = cron.schedule(this.opts.checkCron, async () => {
      try {
        await this.runDue();
      } catch (e) {
        this.log.error("due check error:", errMessage(e));
      }
    });

    return () => {
      daily.stop();
      check.stop();
    };
  }
}
