/**
 * Notification Controller
 *
 * Turns idle time and the schedule into presentation commands. Four
 * independent sub-machines share one clock tick per poll:
 *
 * - idle message: shown on going idle inside a tracking window, hidden as
 *   soon as the user is active again or the window closes
 * - rewards: a star count that grows while the user keeps working, checked
 *   every reward interval
 * - engagement overlay: appears after an unbroken active streak and grows in
 *   two stages; reset and destroyed on idle or when tracking stops
 * - scheduled alerts: schedule items announced near their time, with a
 *   suppression window
 *
 * All state lives here and is only written from poll() and the explicit
 * entry points below. Surfaces are touched exclusively through the
 * dispatcher.
 */

import type { Logger } from 'pino';
import type { Config } from '../config/config.js';
import { MINUTE_MS, SECOND_MS, toTimeOfDay, type TimeOfDay } from '../utils/time-of-day.js';
import type { Schedule } from '../schedule/schedule.js';
import type { ScheduleEvent } from '../schedule/types.js';
import { matchNow } from '../schedule/matcher.js';
import type { PresentationDispatcher } from '../presentation/dispatcher.js';
import type {
  IdleSurfaceFrame,
  OverlayFrame,
  PresentationSurfaces,
  SurfaceHandle,
} from '../presentation/types.js';
import {
  MIN_OVERLAY_FRAME,
  computeOverlayGrowth,
  type OverlayGrowth,
} from './overlay-growth.js';

// ============ Constants ============

/** A reward check only pays out when the last input is more recent than this */
const REWARD_MAX_IDLE_MS = 5 * SECOND_MS;

// ============ Types ============

export interface ControllerSettings {
  idleThresholdMs: number;
  idleMessage: string;
  rewardCheckIntervalSeconds: number;
  rewardActivityWindowSeconds: number;
  overlayDelaySeconds: number;
  overlayStageDurationSeconds: number;
  overlayMaxOpacity: number;
  overlayMaxSize: number;
  cooldownSeconds: number;
  suppressionMinutes: number;
}

export const DEFAULT_CONTROLLER_SETTINGS: ControllerSettings = {
  idleThresholdMs: 30 * SECOND_MS,
  idleMessage: 'You have been idle for a while',
  rewardCheckIntervalSeconds: 20,
  rewardActivityWindowSeconds: 20,
  overlayDelaySeconds: 60,
  overlayStageDurationSeconds: 300,
  overlayMaxOpacity: 0.6,
  overlayMaxSize: 100,
  cooldownSeconds: 30,
  suppressionMinutes: 1,
};

export function settingsFromConfig(config: Config): ControllerSettings {
  return {
    idleThresholdMs: config.hud.idleThresholdSeconds * SECOND_MS,
    idleMessage: config.hud.idleMessage,
    rewardCheckIntervalSeconds: config.rewards.checkIntervalSeconds,
    rewardActivityWindowSeconds: config.rewards.activityWindowSeconds,
    overlayDelaySeconds: config.overlay.delaySeconds,
    overlayStageDurationSeconds: config.overlay.stageDurationSeconds,
    overlayMaxOpacity: config.overlay.maxOpacity,
    overlayMaxSize: config.overlay.maxSizePixels,
    cooldownSeconds: config.scheduled.cooldownSeconds,
    suppressionMinutes: config.scheduled.suppressionMinutes,
  };
}

/**
 * Controller state. Timestamps are epoch milliseconds.
 */
export interface ControllerState {
  idlePresented: boolean;
  lastScheduledMessageAt: number | null;
  lastRewardCheckAt: number;
  activityStartedAt: number | null;
  starCount: number;
  vignetteGrowthStartedAt: number | null;
  idleSurface: SurfaceHandle | null;
  scheduledSurface: SurfaceHandle | null;
  vignetteSurface: SurfaceHandle | null;
}

/**
 * What one poll decided
 */
export interface PollSnapshot {
  isIdle: boolean;
  isTracking: boolean;
  starCount: number;
  /** Growth handed to the overlay this poll, null when not shown */
  overlay: OverlayGrowth | null;
  /** Scheduled event shown this poll */
  scheduledEvent: ScheduleEvent | null;
}

export interface NotificationControllerOptions {
  /** Surfaces to drive */
  surfaces: PresentationSurfaces;
  /** Command queue all surface calls go through */
  dispatcher: PresentationDispatcher;
  /** Logger instance */
  logger: Logger;
  /** Overrides for the default settings */
  settings?: Partial<ControllerSettings>;
  /** Random source for reward delays (default: Math.random) */
  random?: () => number;
}

// ============ Controller ============

export class NotificationController {
  private surfaces: PresentationSurfaces;
  private dispatcher: PresentationDispatcher;
  private logger: Logger;
  private settings: ControllerSettings;
  private random: () => number;

  private state: ControllerState = {
    idlePresented: false,
    lastScheduledMessageAt: null,
    lastRewardCheckAt: 0,
    activityStartedAt: null,
    starCount: 0,
    vignetteGrowthStartedAt: null,
    idleSurface: null,
    scheduledSurface: null,
    vignetteSurface: null,
  };

  /** Overlay show has been requested and not yet reset */
  private overlayRequested = false;
  /** Bumped by every idle show; failure hooks of older shows leave state alone */
  private idleGeneration = 0;
  /** Latest frame waiting for its queued update, one per surface */
  private pendingIdleFrame: IdleSurfaceFrame | null = null;
  private pendingOverlayFrame: OverlayFrame | null = null;
  private rewardTimers = new Set<ReturnType<typeof setTimeout>>();

  constructor(options: NotificationControllerOptions) {
    this.surfaces = options.surfaces;
    this.dispatcher = options.dispatcher;
    this.logger = options.logger.child({ component: 'notification-controller' });
    this.settings = { ...DEFAULT_CONTROLLER_SETTINGS, ...options.settings };
    this.random = options.random ?? Math.random;
  }

  /**
   * Evaluate one tick. Never throws: failures are logged and the next poll
   * starts from whatever state was reached.
   *
   * @param now - Wall-clock time of this tick
   * @param idleDurationMs - Time since the last user input
   * @param schedule - Current schedule snapshot, null when none is loaded
   */
  async poll(now: Date, idleDurationMs: number, schedule: Schedule | null): Promise<PollSnapshot | null> {
    try {
      return await this.evaluate(now.getTime(), toTimeOfDay(now), idleDurationMs, schedule);
    } catch (error) {
      this.logger.error({ error: (error as Error).message }, 'Poll failed');
      return null;
    }
  }

  getState(): Readonly<ControllerState> {
    return { ...this.state };
  }

  getSettings(): Readonly<ControllerSettings> {
    return this.settings;
  }

  private async evaluate(
    nowMs: number,
    timeOfDay: TimeOfDay,
    idleDurationMs: number,
    schedule: Schedule | null,
  ): Promise<PollSnapshot> {
    const isIdle = idleDurationMs >= this.settings.idleThresholdMs;
    const isTracking = schedule?.isCurrentlyTracking(timeOfDay) ?? false;

    this.updateIdleMessage(nowMs, isIdle, isTracking, schedule);
    this.updateRewards(nowMs, idleDurationMs, isIdle, isTracking);
    const overlay = await this.updateOverlay(nowMs, isIdle, isTracking);
    const scheduledEvent = this.checkScheduledMessage(nowMs, timeOfDay, schedule);

    return {
      isIdle,
      isTracking,
      starCount: this.state.starCount,
      overlay,
      scheduledEvent,
    };
  }

  // ============ Idle message ============

  private updateIdleMessage(
    nowMs: number,
    isIdle: boolean,
    isTracking: boolean,
    schedule: Schedule | null,
  ): void {
    if (!isIdle && (this.state.idlePresented || this.state.idleSurface)) {
      // Returning to activity always wins
      this.hideIdleMessage();
    } else if (isIdle && !this.state.idlePresented && isTracking) {
      this.showIdleMessage(nowMs, schedule);
    } else if (this.state.idlePresented && !isTracking) {
      this.hideIdleMessage();
    }

    if (this.state.idlePresented) {
      this.queueIdleUpdate({ now: nowMs, schedule });
    }
  }

  /**
   * Hand the idle surface its latest frame. At most one update is queued;
   * later polls only replace the frame it will carry.
   */
  private queueIdleUpdate(frame: IdleSurfaceFrame): void {
    const alreadyQueued = this.pendingIdleFrame !== null;
    this.pendingIdleFrame = frame;
    if (alreadyQueued) return;

    const generation = this.idleGeneration;
    let target: SurfaceHandle | null = null;
    this.dispatcher.post(
      'idle.update',
      async () => {
        const next = this.pendingIdleFrame;
        this.pendingIdleFrame = null;
        target = this.state.idleSurface;
        if (target && next) {
          await this.surfaces.idle.update(target, next);
        }
      },
      () => {
        this.pendingIdleFrame = null;
        const handle = target;
        if (handle && this.state.idleSurface === handle) {
          this.discardIdleSurface(handle);
        }
        if (generation === this.idleGeneration) {
          this.state.idlePresented = false;
        }
      },
    );
  }

  /**
   * Forget a surface that failed and try to remove it; the next poll shows
   * a fresh one.
   */
  private discardIdleSurface(handle: SurfaceHandle): void {
    this.state.idleSurface = null;
    this.dispatcher.post('idle.discard', async () => {
      await this.surfaces.idle.destroy(handle);
    });
  }

  /**
   * Show the idle message unless it is already shown.
   */
  showIdleMessage(nowMs: number = Date.now(), schedule: Schedule | null = null): void {
    if (this.state.idlePresented) return;
    this.state.idlePresented = true;
    const generation = ++this.idleGeneration;

    const params = {
      message: this.settings.idleMessage,
      idleThresholdMs: this.settings.idleThresholdMs,
      alarmSoundReference: schedule?.alarmSoundReference,
      shownAt: nowMs,
    };

    this.dispatcher.post(
      'idle.show',
      async () => {
        if (this.state.idleSurface) return;
        this.state.idleSurface = await this.surfaces.idle.create(params);
        this.logger.info('Idle message shown');
      },
      () => {
        if (generation !== this.idleGeneration) return;
        this.state.idleSurface = null;
        this.state.idlePresented = false;
      },
    );
  }

  hideIdleMessage(): void {
    this.state.idlePresented = false;

    this.dispatcher.post(
      'idle.hide',
      async () => {
        const handle = this.state.idleSurface;
        if (!handle) return;
        this.state.idleSurface = null;
        await this.surfaces.idle.destroy(handle);
        this.logger.info('Idle message hidden');
      },
      () => {
        this.state.idleSurface = null;
      },
    );
  }

  // ============ Rewards ============

  private updateRewards(nowMs: number, idleDurationMs: number, isIdle: boolean, isTracking: boolean): void {
    const intervalMs = this.settings.rewardCheckIntervalSeconds * SECOND_MS;
    const windowMs = this.settings.rewardActivityWindowSeconds * SECOND_MS;

    if (isTracking && !isIdle && nowMs - this.state.lastRewardCheckAt >= intervalMs) {
      if (idleDurationMs < windowMs && idleDurationMs < REWARD_MAX_IDLE_MS) {
        this.state.starCount++;
        this.showRewards(this.state.starCount);
      } else if (idleDurationMs >= windowMs) {
        this.state.starCount = 0;
      }
      // Between REWARD_MAX_IDLE_MS and the window the count is left alone

      this.state.lastRewardCheckAt = nowMs;
    }

    if (isIdle || !isTracking) {
      this.state.starCount = 0;
    }
  }

  /**
   * Present `count` rewards, each after its own random delay within one
   * check interval so they trickle in.
   */
  private showRewards(count: number): void {
    const maxDelayMs = this.settings.rewardCheckIntervalSeconds * SECOND_MS;

    for (let i = 1; i <= count; i++) {
      const delay = 1 + Math.floor(this.random() * maxDelayMs);
      const timer = setTimeout(() => {
        this.rewardTimers.delete(timer);
        this.dispatcher.post('reward.present', async () => {
          await this.surfaces.reward.present({ index: i, total: count });
        });
      }, delay);
      this.rewardTimers.add(timer);
    }

    this.logger.info({ stars: count }, 'Rewards scheduled for staying active');
  }

  private clearRewardTimers(): void {
    for (const timer of this.rewardTimers) {
      clearTimeout(timer);
    }
    this.rewardTimers.clear();
  }

  // ============ Engagement overlay ============

  private async updateOverlay(nowMs: number, isIdle: boolean, isTracking: boolean): Promise<OverlayGrowth | null> {
    if (isTracking && !isIdle) {
      if (this.state.activityStartedAt === null) {
        this.state.activityStartedAt = nowMs;
        this.logger.debug({ startedAt: new Date(nowMs).toISOString() }, 'Activity streak started');
      }

      const activeMs = nowMs - this.state.activityStartedAt;
      if (activeMs < this.settings.overlayDelaySeconds * SECOND_MS) {
        return null;
      }

      this.ensureOverlay();
      if (this.state.vignetteGrowthStartedAt === null) {
        this.state.vignetteGrowthStartedAt = nowMs;
      }

      const growth = computeOverlayGrowth(nowMs - this.state.vignetteGrowthStartedAt, {
        stageDurationMs: this.settings.overlayStageDurationSeconds * SECOND_MS,
        maxOpacity: this.settings.overlayMaxOpacity,
        maxSize: this.settings.overlayMaxSize,
      });
      this.queueOverlayUpdate({
        opacity: growth.opacity,
        sizeParam: growth.sizeParam,
        colorCycleIntensity: growth.colorCycleIntensity,
      });

      return growth;
    }

    if (this.state.activityStartedAt !== null || this.overlayRequested) {
      this.logger.debug({ isIdle, isTracking }, 'Activity streak ended');
      await this.resetOverlay();
    }

    return null;
  }

  /**
   * Same coalescing as the idle update. A failed update drops the surface
   * so ensureOverlay() creates a new one on the next poll.
   */
  private queueOverlayUpdate(frame: OverlayFrame): void {
    const alreadyQueued = this.pendingOverlayFrame !== null;
    this.pendingOverlayFrame = frame;
    if (alreadyQueued) return;

    let target: SurfaceHandle | null = null;
    this.dispatcher.post(
      'overlay.update',
      async () => {
        const next = this.pendingOverlayFrame;
        this.pendingOverlayFrame = null;
        target = this.state.vignetteSurface;
        if (target && next) {
          await this.surfaces.overlay.update(target, next);
        }
      },
      () => {
        this.pendingOverlayFrame = null;
        const handle = target;
        if (!handle || this.state.vignetteSurface !== handle) return;
        this.state.vignetteSurface = null;
        this.overlayRequested = false;
        this.dispatcher.post('overlay.discard', async () => {
          await this.surfaces.overlay.destroy(handle);
        });
      },
    );
  }

  private ensureOverlay(): void {
    if (this.overlayRequested) return;
    this.overlayRequested = true;

    this.dispatcher.post(
      'overlay.show',
      async () => {
        if (this.state.vignetteSurface) return;
        this.state.vignetteSurface = await this.surfaces.overlay.create({});
        this.logger.debug('Overlay surface created');
      },
      () => {
        this.state.vignetteSurface = null;
        this.overlayRequested = false;
      },
    );
  }

  /**
   * Clear the streak and wait until the overlay has been shrunk to its
   * minimum and destroyed.
   */
  private async resetOverlay(): Promise<void> {
    this.state.activityStartedAt = null;
    this.state.vignetteGrowthStartedAt = null;

    if (!this.overlayRequested) return;
    this.overlayRequested = false;

    await this.dispatcher.send(
      'overlay.reset',
      async () => {
        await this.destroyOverlaySurface();
      },
      () => {
        this.state.vignetteSurface = null;
      },
    );
  }

  private async destroyOverlaySurface(): Promise<void> {
    const handle = this.state.vignetteSurface;
    if (!handle) return;
    this.state.vignetteSurface = null;

    try {
      await this.surfaces.overlay.update(handle, MIN_OVERLAY_FRAME);
    } finally {
      await this.surfaces.overlay.destroy(handle);
    }
    this.logger.debug('Overlay surface destroyed');
  }

  // ============ Scheduled messages ============

  private checkScheduledMessage(
    nowMs: number,
    timeOfDay: TimeOfDay,
    schedule: Schedule | null,
  ): ScheduleEvent | null {
    const event = matchNow(schedule, timeOfDay, this.settings.cooldownSeconds);
    if (!event) return null;

    const last = this.state.lastScheduledMessageAt;
    if (last !== null && nowMs - last < this.settings.suppressionMinutes * MINUTE_MS) {
      return null;
    }

    this.showScheduledMessage(event);
    this.state.lastScheduledMessageAt = nowMs;
    return event;
  }

  /**
   * Show a scheduled message, replacing the one currently shown.
   */
  showScheduledMessage(event: ScheduleEvent): void {
    this.dispatcher.post(
      'scheduled.show',
      async () => {
        const previous = this.state.scheduledSurface;
        if (previous) {
          this.state.scheduledSurface = null;
          await this.surfaces.scheduled.destroy(previous);
        }
        this.state.scheduledSurface = await this.surfaces.scheduled.create({ event });
        this.logger.info({ label: event.label, kind: event.kind }, 'Scheduled message shown');
      },
      () => {
        this.state.scheduledSurface = null;
      },
    );
  }

  // ============ Teardown ============

  /**
   * Destroy every live surface and wait for it. Safe to call repeatedly.
   */
  async teardown(): Promise<void> {
    this.clearRewardTimers();
    this.state.idlePresented = false;
    this.state.activityStartedAt = null;
    this.state.vignetteGrowthStartedAt = null;
    this.state.starCount = 0;
    this.overlayRequested = false;
    this.pendingIdleFrame = null;
    this.pendingOverlayFrame = null;

    await this.dispatcher.send('teardown.idle', async () => {
      const handle = this.state.idleSurface;
      if (!handle) return;
      this.state.idleSurface = null;
      await this.surfaces.idle.destroy(handle);
    });

    await this.dispatcher.send('teardown.overlay', async () => {
      await this.destroyOverlaySurface();
    });

    await this.dispatcher.send('teardown.scheduled', async () => {
      const handle = this.state.scheduledSurface;
      if (!handle) return;
      this.state.scheduledSurface = null;
      await this.surfaces.scheduled.destroy(handle);
    });

    this.logger.debug('Presentation torn down');
  }
}
