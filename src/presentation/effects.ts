/**
 * Visual effects as pure functions of elapsed time.
 *
 * Surfaces sample these once per poll with the poll clock instead of running
 * their own fade, blink and color timers, so effects cannot drift apart.
 */

import type { Rgb } from '../timeline/timeline.js';

// ============ Constants ============

/** Blink half-period for the current timeline segment */
export const BLINK_PERIOD_MS = 500;

/** Hue step per color-cycle tick */
const HUE_STEP_DEGREES = 5;

/** Color-cycle tick length */
const HUE_TICK_MS = 30;

/** Hue offset between consecutive overlay layers */
const LAYER_PHASE_DEGREES = 90;

/** Number of stacked overlay layers, outermost first */
export const OVERLAY_LAYER_COUNT = 4;

/** Opacity falloff exponent step per layer */
export const LAYER_OPACITY_EXPONENT_STEP = 1;

// ============ Idle surface ============

export interface IdleFadeOptions {
  /** Grace period before the fade starts */
  fadeInDelayMs: number;
  fadeDurationMs: number;
  targetOpacity: number;
}

/**
 * Background opacity of the idle surface `elapsedMs` after it was shown:
 * 0 during the grace delay, then linear up to the target.
 */
export function idleFadeOpacity(elapsedMs: number, options: IdleFadeOptions): number {
  const fadeElapsed = elapsedMs - options.fadeInDelayMs;
  if (fadeElapsed <= 0) return 0;
  const progress = Math.min(fadeElapsed / options.fadeDurationMs, 1);
  return progress * options.targetOpacity;
}

/**
 * The alarm starts once twice the idle threshold has passed since the fade
 * began. Never due without an alarm sound.
 */
export function isAlarmDue(
  elapsedMs: number,
  options: { fadeInDelayMs: number; idleThresholdMs: number; alarmSoundReference?: string },
): boolean {
  if (!options.alarmSoundReference || !options.alarmSoundReference.trim()) return false;
  const sinceFadeIn = elapsedMs - options.fadeInDelayMs;
  if (sinceFadeIn < 0) return false;
  return sinceFadeIn >= options.idleThresholdMs * 2;
}

/**
 * Which blink phase a refresh at `nowMs` falls in.
 */
export function blinkPhaseAt(nowMs: number, periodMs: number = BLINK_PERIOD_MS): boolean {
  return Math.floor(nowMs / periodMs) % 2 === 1;
}

// ============ Overlay ============

/**
 * Opacity of one overlay layer: outer layers are more opaque. Layer 0 takes
 * the overlay opacity as is.
 */
export function overlayLayerOpacity(
  opacity: number,
  layerIndex: number,
  exponentStep: number = LAYER_OPACITY_EXPONENT_STEP,
): number {
  const exponent = layerIndex * exponentStep;
  if (exponent === 0) return opacity > 0 ? opacity : 0;
  return Math.pow(opacity, exponent);
}

/**
 * Inset of a layer's transparent hole, in pixels.
 */
export function overlayLayerInset(sizeParam: number, layerIndex: number): number {
  return (layerIndex + 1) * sizeParam;
}

/**
 * Hue of a layer `elapsedMs` into the color cycle, with each layer offset so
 * the colors travel inwards.
 */
export function colorCycleHue(elapsedMs: number, layerIndex: number): number {
  const ticks = Math.floor(Math.max(0, elapsedMs) / HUE_TICK_MS);
  return (layerIndex * LAYER_PHASE_DEGREES + ticks * HUE_STEP_DEGREES) % 360;
}

/**
 * Fully saturated color for a hue in degrees.
 */
export function hueToRgb(hue: number): Rgb {
  const h = (((hue % 360) + 360) % 360) / 60;
  const x = 1 - Math.abs((h % 2) - 1);

  let r = 0;
  let g = 0;
  let b = 0;
  if (h < 1) { r = 1; g = x; }
  else if (h < 2) { r = x; g = 1; }
  else if (h < 3) { g = 1; b = x; }
  else if (h < 4) { g = x; b = 1; }
  else if (h < 5) { r = x; b = 1; }
  else { r = 1; b = x; }

  return {
    r: Math.trunc(r * 255),
    g: Math.trunc(g * 255),
    b: Math.trunc(b * 255),
  };
}

/**
 * Layer background: black blended toward the cycling hue by intensity.
 */
export function layerColor(hue: number, intensity: number): Rgb {
  if (intensity <= 0) return { r: 0, g: 0, b: 0 };
  const color = hueToRgb(hue);
  return {
    r: Math.trunc(color.r * intensity),
    g: Math.trunc(color.g * intensity),
    b: Math.trunc(color.b * intensity),
  };
}
