/**
 * Poll Loop - drives the controller on a fixed interval.
 *
 * Samples idle time and the schedule snapshot, hands both to the controller
 * and keeps going whatever a single tick does. Ticks never overlap: a tick
 * that fires while the previous poll is still awaiting is skipped.
 */

import type { Logger } from 'pino';
import type { IdleSampler } from '../idle/idle-sampler.js';
import type { ScheduleSource } from '../schedule/types.js';
import type { NotificationController } from './notification-controller.js';

export interface PollLoopOptions {
  /** Controller to drive */
  controller: NotificationController;
  /** Source of idle time */
  idleSampler: IdleSampler;
  /** Source of the current schedule */
  scheduleSource: ScheduleSource;
  /** Logger instance */
  logger: Logger;
  /** Poll interval in milliseconds (default: 300) */
  intervalMs?: number;
  /** Wall clock (default: new Date()) */
  clock?: () => Date;
}

export class PollLoop {
  private controller: NotificationController;
  private idleSampler: IdleSampler;
  private scheduleSource: ScheduleSource;
  private logger: Logger;
  private intervalMs: number;
  private clock: () => Date;

  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;

  constructor(options: PollLoopOptions) {
    this.controller = options.controller;
    this.idleSampler = options.idleSampler;
    this.scheduleSource = options.scheduleSource;
    this.logger = options.logger.child({ component: 'poll-loop' });
    this.intervalMs = options.intervalMs ?? 300;
    this.clock = options.clock ?? (() => new Date());
  }

  start(): void {
    if (this.running) {
      this.logger.warn('Poll loop already running');
      return;
    }

    this.running = true;
    this.logger.info({ intervalMs: this.intervalMs }, 'Poll loop started');

    this.intervalHandle = setInterval(() => {
      this.tick().catch((err) => {
        this.logger.error({ error: (err as Error).message }, 'Poll tick failed');
      });
    }, this.intervalMs);
  }

  /**
   * Stop polling, wait for the current tick and tear down every surface.
   */
  async stop(): Promise<void> {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
    const wasRunning = this.running;
    this.running = false;

    if (this.inFlight) {
      await this.inFlight;
    }
    await this.controller.teardown();

    if (wasRunning) {
      this.logger.info('Poll loop stopped');
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one poll unless one is already in flight.
   */
  async tick(): Promise<void> {
    if (this.inFlight) {
      this.logger.trace('Skipping tick, previous poll still running');
      return;
    }

    this.inFlight = this.pollOnce();
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private async pollOnce(): Promise<void> {
    try {
      const idleMs = this.sampleIdle();
      const schedule = this.scheduleSource.currentSchedule();
      await this.controller.poll(this.clock(), idleMs, schedule);
    } catch (error) {
      this.logger.error({ error: (error as Error).message }, 'Poll failed');
    }
  }

  /**
   * Idle time, or 0 (active) when the sampler fails or returns garbage.
   */
  private sampleIdle(): number {
    try {
      const idleMs = this.idleSampler.getIdleDuration();
      return Number.isFinite(idleMs) && idleMs > 0 ? idleMs : 0;
    } catch (error) {
      this.logger.debug({ error: (error as Error).message }, 'Idle sampling failed');
      return 0;
    }
  }
}
