// src/modules/records/mirrorResync.scheduler.ts
// Periodic driver for MirrorResyncJob. Guarded against overlap in-process and, when a lock is supplied, across instances.

import { errorMeta, log } from "@/lib/observability/logger";
import type { MirrorResyncJob } from "./mirrorResync.job";

/** Cross-instance mutual exclusion, e.g. a Postgres advisory lock. */
export interface SchedulerLock {
  tryAcquire(): Promise<boolean>;
  release(): Promise<void>;
}

export interface SchedulerOptions {
  intervalMs?: number;
  runImmediately?: boolean;
  enabled?: boolean;
  lock?: SchedulerLock;
}

export class MirrorResyncScheduler {
  private readonly intervalMs: number;
  private readonly runImmediately: boolean;
  private readonly enabled: boolean;
  private readonly lock: SchedulerLock | null;

  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private inFlight = false;

  constructor(
    private readonly job: MirrorResyncJob,
    options?: SchedulerOptions,
  ) {
    this.intervalMs = options?.intervalMs ?? 60_000;
    this.runImmediately = options?.runImmediately ?? false;
    this.enabled = options?.enabled ?? true;
    this.lock = options?.lock ?? null;
  }

  start(): void {
    if (!this.enabled) {
      log("INFO", "MIRROR_RESYNC_SCHEDULER_DISABLED");
      return;
    }

    if (this.running) return;
    this.running = true;

    if (this.runImmediately) {
      void this.safeRun();
    }

    this.timer = setInterval(() => {
      void this.safeRun();
    }, this.intervalMs);

    log("INFO", "MIRROR_RESYNC_SCHEDULER_STARTED", { intervalMs: this.intervalMs });
  }

  stop(): void {
    this.running = false;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    log("INFO", "MIRROR_RESYNC_SCHEDULER_STOPPED");
  }

  isRunning(): boolean {
    return this.running;
  }

  ////////////////////////////////////////////////////////////////
  // Safe runner
  ////////////////////////////////////////////////////////////////

  /** Never rejects. Returns whether the job actually ran. */
  async safeRun(): Promise<boolean> {
    if (!this.running || this.inFlight) return false;

    this.inFlight = true;

    try {
      if (this.lock && !(await this.lock.tryAcquire())) {
        log("INFO", "MIRROR_RESYNC_SKIPPED_LOCK_HELD");
        return false;
      }

      try {
        await this.job.run();
        return true;
      } finally {
        if (this.lock) await this.lock.release();
      }
    } catch (err) {
      log("ERROR", "MIRROR_RESYNC_RUN_FAILED", errorMeta(err));
      return false;
    } finally {
      this.inFlight = false;
    }
  }
}
