/**
 * Timeline renderer.
 *
 * Pure functions that turn a schedule and the current time into fixed-size
 * segments for display. No timers and no state: callers pass the blink phase
 * they want and may call this on every refresh tick.
 */

import { MINUTE_MS, type TimeOfDay } from '../utils/time-of-day.js';
import type { Schedule } from '../schedule/schedule.js';
import type { ScheduleEvent } from '../schedule/types.js';

// ============ Constants ============

/** Minutes covered by one segment */
export const MINUTES_PER_SEGMENT = 10;

/** Channel multiplier applied to past segments */
export const PAST_DARKEN_FACTOR = 0.5;

export const ACTIVE_COLOR: Rgb = { r: 0, g: 200, b: 0 };
export const NEUTRAL_COLOR: Rgb = { r: 128, g: 128, b: 128 };
export const HIGHLIGHT_COLOR: Rgb = { r: 255, g: 255, b: 0 };

// ============ Types ============

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export interface TimelineSegment {
  startsAt: TimeOfDay;
  endsAt: TimeOfDay;
  isCurrent: boolean;
  isPast: boolean;
  baseColor: Rgb;
  /** Color to draw: darkened when past, blinking when current */
  color: Rgb;
  labelAbove?: string;
  isLabelStrikethrough: boolean;
}

export interface TimelineOptions {
  /** Current segment shows the highlight color when true */
  blinkPhase?: boolean;
}

// ============ Functions ============

export function generateTimeline(
  schedule: Schedule,
  now: TimeOfDay,
  options: TimelineOptions = {},
): TimelineSegment[] {
  const segmentMs = MINUTES_PER_SEGMENT * MINUTE_MS;
  const { start, end } = schedule.timelineBounds();
  const count = Math.max(0, Math.floor((end - start) / segmentMs));
  const sortedItems = schedule.sortedItems();

  const segments: TimelineSegment[] = [];
  for (let i = 0; i < count; i++) {
    const startsAt = start + i * segmentMs;
    const endsAt = startsAt + segmentMs;

    const isCurrent = now >= startsAt && now < endsAt;
    const isPast = now >= endsAt;
    const baseColor = baseColorAt(startsAt, sortedItems);

    let color = baseColor;
    if (isPast) {
      color = darkenColor(baseColor);
    } else if (isCurrent) {
      color = blinkColor(baseColor, options.blinkPhase ?? false);
    }

    const item = sortedItems.find((it) => it.at >= startsAt && it.at < endsAt);

    segments.push({
      startsAt,
      endsAt,
      isCurrent,
      isPast,
      baseColor,
      color,
      labelAbove: item?.label,
      isLabelStrikethrough: item ? now > item.at : false,
    });
  }

  return segments;
}

/**
 * Even intervals between consecutive items are active, odd ones neutral.
 * Anything before the first or from the last item on is neutral.
 */
function baseColorAt(time: TimeOfDay, sortedItems: ScheduleEvent[]): Rgb {
  if (sortedItems.length === 0) return NEUTRAL_COLOR;

  const first = sortedItems[0];
  const last = sortedItems[sortedItems.length - 1];
  if (time < first.at || time >= last.at) return NEUTRAL_COLOR;

  for (let i = 0; i < sortedItems.length - 1; i++) {
    if (time >= sortedItems[i].at && time < sortedItems[i + 1].at) {
      return i % 2 === 0 ? ACTIVE_COLOR : NEUTRAL_COLOR;
    }
  }

  return NEUTRAL_COLOR;
}

export function darkenColor(color: Rgb, factor: number = PAST_DARKEN_FACTOR): Rgb {
  return {
    r: Math.trunc(color.r * factor),
    g: Math.trunc(color.g * factor),
    b: Math.trunc(color.b * factor),
  };
}

export function blinkColor(color: Rgb, highlightPhase: boolean): Rgb {
  return highlightPhase ? HIGHLIGHT_COLOR : color;
}
