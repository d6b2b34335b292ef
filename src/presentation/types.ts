/**
 * Presentation surface contracts.
 *
 * The controller owns handles and drives surfaces only through these
 * interfaces; drawing, fading and sounds belong to the implementation.
 */

import type { Schedule } from '../schedule/schedule.js';
import type { ScheduleEvent } from '../schedule/types.js';

export type SurfaceHandle = string;

/**
 * A surface the controller can create, update and destroy.
 * `create` and `destroy` are no-ops when the surface is already in the
 * target state.
 */
export interface PresentationSurface<TCreate, TUpdate> {
  create(params: TCreate): SurfaceHandle | Promise<SurfaceHandle>;
  update(handle: SurfaceHandle, params: TUpdate): void | Promise<void>;
  destroy(handle: SurfaceHandle): void | Promise<void>;
}

export interface IdleSurfaceParams {
  message: string;
  idleThresholdMs: number;
  /** Sound to loop once the alarm triggers */
  alarmSoundReference?: string;
  /** Epoch ms the surface was requested */
  shownAt: number;
}

/**
 * Sent every poll while the idle surface is shown. The surface derives its
 * fade-in and alarm from `now - shownAt`.
 */
export interface IdleSurfaceFrame {
  now: number;
  schedule: Schedule | null;
}

export interface ScheduledSurfaceParams {
  event: ScheduleEvent;
}

export interface OverlayFrame {
  /** 0..1 */
  opacity: number;
  /** Integer pixels, at least 1 */
  sizeParam: number;
  /** 0..1 */
  colorCycleIntensity: number;
}

export interface RewardParams {
  /** 1-based position in the batch */
  index: number;
  total: number;
}

export type IdleSurface = PresentationSurface<IdleSurfaceParams, IdleSurfaceFrame>;
export type ScheduledSurface = PresentationSurface<ScheduledSurfaceParams, never>;
export type OverlaySurface = PresentationSurface<Record<string, never>, OverlayFrame>;

/** Short-lived reward; the implementation removes it on its own */
export interface RewardSurface {
  present(params: RewardParams): void | Promise<void>;
}

export interface PresentationSurfaces {
  idle: IdleSurface;
  scheduled: ScheduledSurface;
  overlay: OverlaySurface;
  reward: RewardSurface;
}
