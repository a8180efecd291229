/**
 * Scheduler Loop
 *
 * Runs a batch immediately, then sleeps for the interval and runs the next
 * one. The interval is measured from the end of a batch, so batches never
 * overlap however long they take.
 *
 *   idle → running_batch → sleeping → running_batch → … → stopped
 *
 * Time is read and slept through a {@link Clock} so tests can drive the loop
 * without real timers.
 */

import type pino from "pino";
import { systemClock } from "../lib/clock.js";
import type { Clock } from "../lib/clock.js";
import { createComponentLogger } from "../lib/logger.js";
import { captureExceptionWithContext } from "../lib/sentry.js";

export type SchedulerState = "idle" | "running_batch" | "sleeping" | "stopped";

export interface SchedulerOptions {
  intervalMs: number;
  runBatch: () => Promise<unknown>;
  clock?: Clock;
  logger?: pino.Logger;
}

export class BatchScheduler {
  private currentState: SchedulerState = "idle";
  private loop: Promise<void> | null = null;
  private readonly controller = new AbortController();
  private readonly clock: Clock;
  private readonly logger: pino.Logger;

  constructor(private readonly options: SchedulerOptions) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createComponentLogger("scheduler");
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  /**
   * Start the loop. Resolves once the scheduler has stopped.
   */
  start(): Promise<void> {
    if (!this.loop) {
      this.loop = this.runLoop();
    }
    return this.loop;
  }

  /**
   * Interrupt the current sleep, let an in-flight batch finish, and resolve
   * when the loop has ended.
   */
  async stop(): Promise<void> {
    this.controller.abort();

    if (this.loop) {
      await this.loop;
    }
    this.currentState = "stopped";
  }

  private async runLoop(): Promise<void> {
    const { signal } = this.controller;
    this.logger.info({ msg: "Scheduler started", intervalMs: this.options.intervalMs });

    while (!signal.aborted) {
      this.currentState = "running_batch";
      try {
        await this.options.runBatch();
      } catch (error) {
        this.logger.error({ msg: "Batch threw unexpectedly", err: error });
        captureExceptionWithContext(error, { tags: { component: "scheduler" } });
      }

      if (signal.aborted) break;

      this.currentState = "sleeping";
      const nextRunAt = new Date(this.clock.now().getTime() + this.options.intervalMs);
      this.logger.info({ msg: "Sleeping until next batch", nextRunAt: nextRunAt.toISOString() });

      try {
        await this.clock.sleep(this.options.intervalMs, signal);
      } catch (error) {
        if (signal.aborted) break;
        throw error;
      }
    }

    this.currentState = "stopped";
    this.logger.info({ msg: "Scheduler stopped" });
  }
}
