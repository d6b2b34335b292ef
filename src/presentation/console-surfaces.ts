/**
 * Console surfaces - headless presentation that reports through the logger.
 *
 * Used when no graphical surface is attached. Each surface keeps its own
 * handle table so create/destroy stay idempotent, and derives its effects
 * from the pure functions in effects.ts.
 */

import type { Logger } from 'pino';
import { nanoid } from 'nanoid';
import { toTimeOfDay } from '../utils/time-of-day.js';
import { generateTimeline } from '../timeline/timeline.js';
import { formatTimeline } from '../timeline/format.js';
import {
  OVERLAY_LAYER_COUNT,
  blinkPhaseAt,
  colorCycleHue,
  idleFadeOpacity,
  isAlarmDue,
  layerColor,
  overlayLayerInset,
  overlayLayerOpacity,
  type IdleFadeOptions,
} from './effects.js';
import type {
  IdleSurface,
  IdleSurfaceFrame,
  IdleSurfaceParams,
  OverlayFrame,
  OverlaySurface,
  PresentationSurfaces,
  RewardParams,
  RewardSurface,
  ScheduledSurface,
  ScheduledSurfaceParams,
  SurfaceHandle,
} from './types.js';

export interface ConsoleSurfacesOptions {
  logger: Logger;
  fade: IdleFadeOptions;
  /** Clock for the overlay color cycle (default: Date.now) */
  clock?: () => number;
}

// ============ Idle ============

interface IdleState {
  params: IdleSurfaceParams;
  alarmPlaying: boolean;
  lastOpacity: number;
}

export class ConsoleIdleSurface implements IdleSurface {
  private surfaces = new Map<SurfaceHandle, IdleState>();

  constructor(
    private logger: Logger,
    private fade: IdleFadeOptions,
  ) {}

  create(params: IdleSurfaceParams): SurfaceHandle {
    const handle = nanoid(10);
    this.surfaces.set(handle, { params, alarmPlaying: false, lastOpacity: 0 });
    this.logger.info({ handle, message: params.message }, params.message);
    return handle;
  }

  update(handle: SurfaceHandle, frame: IdleSurfaceFrame): void {
    const state = this.surfaces.get(handle);
    if (!state) return;

    const elapsed = frame.now - state.params.shownAt;
    const opacity = idleFadeOpacity(elapsed, this.fade);
    if (opacity > 0 && state.lastOpacity === 0 && frame.schedule) {
      const timeline = generateTimeline(frame.schedule, toTimeOfDay(new Date(frame.now)), {
        blinkPhase: blinkPhaseAt(frame.now),
      });
      this.logger.info({ handle, timeline: formatTimeline(timeline) }, 'Idle fade-in started');
    }
    state.lastOpacity = opacity;

    const alarmDue = isAlarmDue(elapsed, {
      fadeInDelayMs: this.fade.fadeInDelayMs,
      idleThresholdMs: state.params.idleThresholdMs,
      alarmSoundReference: state.params.alarmSoundReference,
    });
    if (alarmDue && !state.alarmPlaying) {
      state.alarmPlaying = true;
      this.logger.warn({ handle, sound: state.params.alarmSoundReference }, 'Idle alarm started');
    }
  }

  destroy(handle: SurfaceHandle): void {
    const state = this.surfaces.get(handle);
    if (!state) return;
    this.surfaces.delete(handle);
    if (state.alarmPlaying) {
      this.logger.info({ handle }, 'Idle alarm stopped');
    }
  }

  get size(): number {
    return this.surfaces.size;
  }
}

// ============ Scheduled alert ============

export class ConsoleScheduledSurface implements ScheduledSurface {
  private surfaces = new Map<SurfaceHandle, ScheduledSurfaceParams>();

  constructor(private logger: Logger) {}

  create(params: ScheduledSurfaceParams): SurfaceHandle {
    const handle = nanoid(10);
    this.surfaces.set(handle, params);
    this.logger.info({ handle, kind: params.event.kind }, params.event.label);
    return handle;
  }

  update(): void {
    // Scheduled alerts are static
  }

  destroy(handle: SurfaceHandle): void {
    this.surfaces.delete(handle);
  }

  get size(): number {
    return this.surfaces.size;
  }
}

// ============ Overlay ============

interface OverlayState {
  frame: OverlayFrame;
  cycleStartedAt: number | null;
}

export class ConsoleOverlaySurface implements OverlaySurface {
  private surfaces = new Map<SurfaceHandle, OverlayState>();

  constructor(
    private logger: Logger,
    private clock: () => number,
  ) {}

  create(): SurfaceHandle {
    const handle = nanoid(10);
    this.surfaces.set(handle, {
      frame: { opacity: 0, sizeParam: 1, colorCycleIntensity: 0 },
      cycleStartedAt: null,
    });
    this.logger.info({ handle }, 'Engagement overlay shown');
    return handle;
  }

  update(handle: SurfaceHandle, frame: OverlayFrame): void {
    const state = this.surfaces.get(handle);
    if (!state) return;

    const now = this.clock();
    if (frame.colorCycleIntensity > 0 && state.cycleStartedAt === null) {
      state.cycleStartedAt = now;
    } else if (frame.colorCycleIntensity === 0) {
      state.cycleStartedAt = null;
    }
    state.frame = frame;

    if (!this.logger.isLevelEnabled('trace')) return;

    const cycleElapsed = state.cycleStartedAt === null ? 0 : now - state.cycleStartedAt;
    const layers = Array.from({ length: OVERLAY_LAYER_COUNT }, (_, i) => ({
      opacity: overlayLayerOpacity(frame.opacity, i),
      inset: overlayLayerInset(frame.sizeParam, i),
      color: layerColor(colorCycleHue(cycleElapsed, i), frame.colorCycleIntensity),
    }));
    this.logger.trace({ handle, ...frame, layers }, 'Overlay frame');
  }

  destroy(handle: SurfaceHandle): void {
    if (this.surfaces.delete(handle)) {
      this.logger.info({ handle }, 'Engagement overlay hidden');
    }
  }

  get size(): number {
    return this.surfaces.size;
  }
}

// ============ Reward ============

export class ConsoleRewardSurface implements RewardSurface {
  constructor(private logger: Logger) {}

  present(params: RewardParams): void {
    this.logger.info({ star: params.index, of: params.total }, '★');
  }
}

/**
 * Build the full set of console surfaces.
 */
export function createConsoleSurfaces(options: ConsoleSurfacesOptions): PresentationSurfaces {
  const logger = options.logger.child({ component: 'console-surface' });
  return {
    idle: new ConsoleIdleSurface(logger, options.fade),
    scheduled: new ConsoleScheduledSurface(logger),
    overlay: new ConsoleOverlaySurface(logger, options.clock ?? Date.now),
    reward: new ConsoleRewardSurface(logger),
  };
}
