import { describe, it, expect } from 'vitest';
import { computeOverlayGrowth, MIN_OVERLAY_FRAME } from './overlay-growth.js';

const options = { stageDurationMs: 300_000, maxOpacity: 0.6, maxSize: 100 };

describe('computeOverlayGrowth', () => {
  it('starts from the minimum frame', () => {
    expect(computeOverlayGrowth(0, options)).toEqual({ stage: 1, ...MIN_OVERLAY_FRAME });
    expect(computeOverlayGrowth(-500, options)).toEqual({ stage: 1, ...MIN_OVERLAY_FRAME });
  });

  it('grows linearly through stage 1', () => {
    expect(computeOverlayGrowth(150_000, options)).toEqual({
      stage: 1,
      opacity: 0.3,
      sizeParam: 50,
      colorCycleIntensity: 0,
    });
  });

  it('never shrinks during stage 1', () => {
    let previous = computeOverlayGrowth(0, options);
    for (let elapsed = 997; elapsed < options.stageDurationMs; elapsed += 997) {
      const next = computeOverlayGrowth(elapsed, options);
      expect(next.stage).toBe(1);
      expect(next.opacity).toBeGreaterThanOrEqual(previous.opacity);
      expect(next.sizeParam).toBeGreaterThanOrEqual(previous.sizeParam);
      previous = next;
    }
  });

  it('holds maximum opacity and size through stage 2', () => {
    for (let elapsed = 300_000; elapsed <= 1_000_000; elapsed += 50_000) {
      const growth = computeOverlayGrowth(elapsed, options);
      expect(growth.stage).toBe(2);
      expect(growth.opacity).toBe(0.6);
      expect(growth.sizeParam).toBe(100);
    }
  });

  it('ramps color-cycle intensity over stage 2 and caps it', () => {
    expect(computeOverlayGrowth(300_000, options).colorCycleIntensity).toBe(0);
    expect(computeOverlayGrowth(450_000, options).colorCycleIntensity).toBe(0.5);
    expect(computeOverlayGrowth(900_000, options).colorCycleIntensity).toBe(1);
  });
});
