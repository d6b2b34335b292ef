/**
 * Engagement overlay growth.
 *
 * Stage 1 grows opacity and size linearly over one stage duration. Stage 2
 * holds them at maximum and ramps the color-cycle intensity over a second
 * stage duration, then holds it at 1.
 */

import type { OverlayFrame } from '../presentation/types.js';

export interface OverlayGrowthOptions {
  stageDurationMs: number;
  maxOpacity: number;
  /** Maximum size parameter in pixels (>= 1) */
  maxSize: number;
}

export interface OverlayGrowth extends OverlayFrame {
  stage: 1 | 2;
}

/** Overlay state before growth starts and after a reset */
export const MIN_OVERLAY_FRAME: OverlayFrame = Object.freeze({
  opacity: 0,
  sizeParam: 1,
  colorCycleIntensity: 0,
});

export function computeOverlayGrowth(elapsedMs: number, options: OverlayGrowthOptions): OverlayGrowth {
  const elapsed = Math.max(0, elapsedMs);
  const { stageDurationMs, maxOpacity, maxSize } = options;

  if (elapsed < stageDurationMs) {
    const progress = elapsed / stageDurationMs;
    return {
      stage: 1,
      opacity: progress * maxOpacity,
      sizeParam: Math.trunc(1 + progress * (maxSize - 1)),
      colorCycleIntensity: 0,
    };
  }

  const stage2Progress = Math.min(1, (elapsed - stageDurationMs) / stageDurationMs);
  return {
    stage: 2,
    opacity: maxOpacity,
    sizeParam: maxSize,
    colorCycleIntensity: stage2Progress,
  };
}
