/**
 * Schedule - immutable list of timestamped events plus padding and an
 * optional alarm sound.
 *
 * A reload never mutates a Schedule; the loader swaps in a new value.
 */

import { DAY_MS, addMinutesClamped, type TimeOfDay } from '../utils/time-of-day.js';
import type { ScheduleEvent, ScheduleInit, TimelineBounds } from './types.js';

export class Schedule {
  readonly padMinutes: number;
  readonly items: readonly ScheduleEvent[];
  readonly alarmSoundReference?: string;
  /** Earliest event minus padding, or 00:00 when empty */
  readonly startsAt: TimeOfDay;
  /** Latest event plus padding, or 24:00 when empty */
  readonly endsAt: TimeOfDay;

  constructor(init: ScheduleInit) {
    this.padMinutes = init.padMinutes;
    this.items = Object.freeze(init.items.map((item) => Object.freeze({ ...item })));
    this.alarmSoundReference = init.alarmSoundReference;

    if (this.items.length === 0) {
      this.startsAt = 0;
      this.endsAt = DAY_MS;
    } else {
      const times = this.items.map((item) => item.at);
      this.startsAt = addMinutesClamped(Math.min(...times), -this.padMinutes);
      this.endsAt = addMinutesClamped(Math.max(...times), this.padMinutes);
    }

    Object.freeze(this);
  }

  /**
   * True when `now` lies in a tracking window: the latest StartTracking at or
   * before `now`, up to (excluding) the first EndTracking after that start.
   * A start with no later end never counts as tracking.
   */
  isCurrentlyTracking(now: TimeOfDay): boolean {
    let lastStart: ScheduleEvent | null = null;
    for (const item of this.items) {
      if (item.kind === 'StartTracking' && item.at <= now) {
        if (!lastStart || item.at > lastStart.at) {
          lastStart = item;
        }
      }
    }
    if (!lastStart) return false;

    let end: ScheduleEvent | null = null;
    for (const item of this.items) {
      if (item.kind === 'EndTracking' && item.at > lastStart.at) {
        if (!end || item.at < end.at) {
          end = item;
        }
      }
    }

    return end !== null && now < end.at;
  }

  timelineBounds(): TimelineBounds {
    return { start: this.startsAt, end: this.endsAt };
  }

  /** Items ordered by time; ties keep declaration order */
  sortedItems(): ScheduleEvent[] {
    return [...this.items].sort((a, b) => a.at - b.at);
  }
}
