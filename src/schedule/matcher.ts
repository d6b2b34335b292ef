import { SECOND_MS, elapsedSince, type TimeOfDay } from '../utils/time-of-day.js';
import type { Schedule } from './schedule.js';
import type { ScheduleEvent } from './types.js';

/** Window after an event's time in which it counts as "now" */
export const DEFAULT_COOLDOWN_SECONDS = 30;

/**
 * Find the schedule event to announce at `now`.
 *
 * An item matches from its own time until `cooldownSeconds` later, counting
 * past midnight; never before it. Items are scanned in declaration order and
 * the first match wins, even when a later item is more recent. Schedules
 * should not put two items inside one cooldown window.
 */
export function matchNow(
  schedule: Schedule | null,
  now: TimeOfDay,
  cooldownSeconds: number = DEFAULT_COOLDOWN_SECONDS,
): ScheduleEvent | null {
  if (!schedule) return null;

  const cooldownMs = cooldownSeconds * SECOND_MS;
  for (const item of schedule.items) {
    if (elapsedSince(now, item.at) < cooldownMs) {
      return item;
    }
  }

  return null;
}
