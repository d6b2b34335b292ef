import * as path from 'path';
import type { Logger } from 'pino';
import type { Config } from '../config/config.js';
import { SECOND_MS, MINUTE_MS, toTimeOfDay } from '../utils/time-of-day.js';
import { ScheduleLoader } from '../schedule/loader.js';
import type { ScheduleEventKind, ScheduleSource } from '../schedule/types.js';
import { SystemIdleSampler, type IdleSampler } from '../idle/idle-sampler.js';
import { PresentationDispatcher } from '../presentation/dispatcher.js';
import { createConsoleSurfaces } from '../presentation/console-surfaces.js';
import type { PresentationSurfaces } from '../presentation/types.js';
import { NotificationController, settingsFromConfig } from '../controller/notification-controller.js';
import { PollLoop } from '../controller/poll-loop.js';

/** Idle threshold used by debug idle runs unless one is given */
export const DEBUG_IDLE_THRESHOLD_SECONDS = 5;

export interface HudDebugOptions {
  /** Show the idle message right after start */
  showIdleMessage?: boolean;
  /** Idle threshold override in seconds */
  idleThresholdSeconds?: number;
  /** Show this scheduled message right after start */
  scheduledMessage?: { label: string; kind: ScheduleEventKind };
}

export interface HudOptions {
  config: Config;
  logger: Logger;
  debug?: HudDebugOptions;
  /** Surfaces to drive (default: console surfaces) */
  surfaces?: PresentationSurfaces;
  /** Idle sampler (default: system sampler) */
  idleSampler?: IdleSampler;
  /** Schedule source (default: loader reading the data folder) */
  scheduleSource?: ScheduleSource;
  clock?: () => Date;
}

/**
 * Wires schedule loading, idle sampling, the controller and the poll loop
 * into one service.
 */
export class Hud {
  private config: Config;
  private logger: Logger;
  private debug: HudDebugOptions;
  private clock: () => Date;

  private loader: ScheduleLoader | null = null;
  private scheduleSource: ScheduleSource;
  private controller: NotificationController;
  private pollLoop: PollLoop;
  private isRunning = false;

  constructor(options: HudOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.debug = options.debug ?? {};
    this.clock = options.clock ?? (() => new Date());

    if (options.scheduleSource) {
      this.scheduleSource = options.scheduleSource;
    } else {
      this.loader = new ScheduleLoader({
        filePath: path.join(this.config.hud.dataDir, this.config.schedule.fileName),
        logger: this.logger,
        reloadIntervalMs: this.config.schedule.reloadIntervalMinutes * MINUTE_MS,
      });
      this.scheduleSource = this.loader;
    }

    const settings = settingsFromConfig(this.config);
    const debugThreshold = this.debug.idleThresholdSeconds
      ?? (this.debug.showIdleMessage ? DEBUG_IDLE_THRESHOLD_SECONDS : undefined);
    if (debugThreshold !== undefined && debugThreshold > 0) {
      settings.idleThresholdMs = debugThreshold * SECOND_MS;
    }

    const surfaces = options.surfaces ?? createConsoleSurfaces({
      logger: this.logger,
      fade: {
        fadeInDelayMs: this.config.hud.idleFadeDelaySeconds * SECOND_MS,
        fadeDurationMs: this.config.hud.idleFadeDurationMs,
        targetOpacity: this.config.hud.idleTargetOpacity,
      },
    });

    this.controller = new NotificationController({
      surfaces,
      dispatcher: new PresentationDispatcher({ logger: this.logger }),
      logger: this.logger,
      settings,
    });

    this.pollLoop = new PollLoop({
      controller: this.controller,
      idleSampler: options.idleSampler ?? new SystemIdleSampler({ logger: this.logger }),
      scheduleSource: this.scheduleSource,
      logger: this.logger,
      intervalMs: this.config.hud.pollIntervalMs,
      clock: this.clock,
    });
  }

  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;

    this.logger.info({ dataDir: this.config.hud.dataDir }, 'Starting HUD...');
    this.loader?.start();

    if (this.debug.showIdleMessage) {
      this.logger.info('Debug mode: showing idle message');
      this.controller.showIdleMessage(this.clock().getTime(), this.scheduleSource.currentSchedule());
    }

    if (this.debug.scheduledMessage) {
      this.logger.info('Debug mode: showing scheduled message');
      this.controller.showScheduledMessage({
        at: toTimeOfDay(this.clock()),
        label: this.debug.scheduledMessage.label,
        kind: this.debug.scheduledMessage.kind,
      });
    }

    this.pollLoop.start();
  }

  async stop(): Promise<void> {
    if (!this.isRunning) return;
    this.isRunning = false;

    this.logger.info('Stopping HUD...');
    await this.pollLoop.stop();
    this.loader?.stop();
  }

  getController(): NotificationController {
    return this.controller;
  }
}

export function setupGracefulShutdown(hud: Hud, logger: Logger): void {
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    try {
      await hud.stop();
      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ error: (error as Error).message }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}
