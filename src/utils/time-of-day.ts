/**
 * Time-of-day values.
 *
 * A time of day is the number of milliseconds since local midnight, in
 * [0, DAY_MS]. DAY_MS itself is only used as the exclusive end of a full-day
 * range.
 */

// ============ Constants ============

export const SECOND_MS = 1000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

// ============ Types ============

/** Milliseconds since local midnight */
export type TimeOfDay = number;

// ============ Functions ============

/**
 * Build a time of day from its parts.
 * @throws Error if a part is out of range
 */
export function timeOfDay(hours: number, minutes = 0, seconds = 0, millis = 0): TimeOfDay {
  if (!Number.isInteger(hours) || hours < 0 || hours > 23) {
    throw new Error(`Invalid hour: ${hours}`);
  }
  if (!Number.isInteger(minutes) || minutes < 0 || minutes > 59) {
    throw new Error(`Invalid minute: ${minutes}`);
  }
  if (seconds < 0 || seconds >= 60) {
    throw new Error(`Invalid second: ${seconds}`);
  }
  return hours * HOUR_MS + minutes * MINUTE_MS + Math.floor(seconds * SECOND_MS) + millis;
}

/**
 * Local time of day of a wall-clock instant.
 */
export function toTimeOfDay(date: Date): TimeOfDay {
  return (
    date.getHours() * HOUR_MS +
    date.getMinutes() * MINUTE_MS +
    date.getSeconds() * SECOND_MS +
    date.getMilliseconds()
  );
}

/**
 * Parse "8.00", "08.30", "8:00", "08:00:15" or a number such as 8.3
 * (read as "8.30").
 * @throws Error if the value is not a time of day
 */
export function parseTimeOfDay(value: string | number): TimeOfDay {
  const text = typeof value === 'number' ? value.toFixed(2) : value.trim();
  const parts = text.replace(/:/g, '.').split('.');

  if (parts.length < 2 || parts.length > 3 || parts.some((p) => !/^\d{1,2}$/.test(p))) {
    throw new Error(`Invalid time of day: "${value}"`);
  }

  const [hours, minutes, seconds] = parts.map((p) => parseInt(p, 10));
  return timeOfDay(hours, minutes, seconds ?? 0);
}

/**
 * Format as HH:MM, or HH:MM:SS when seconds are present.
 */
export function formatTimeOfDay(time: TimeOfDay): string {
  const totalSeconds = Math.floor(time / SECOND_MS);
  const hours = Math.floor(totalSeconds / 3600) % 24;
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  const hhmm = `${pad2(hours)}:${pad2(minutes)}`;
  return seconds === 0 ? hhmm : `${hhmm}:${pad2(seconds)}`;
}

/**
 * Time elapsed from `since` forward to `now`, going past midnight when `now`
 * is earlier in the day (00:00:10 is 20 seconds after 23:59:50, and 11:59:35
 * is almost a full day after 12:00). Always in [0, DAY_MS).
 */
export function elapsedSince(now: TimeOfDay, since: TimeOfDay): number {
  return (((now - since) % DAY_MS) + DAY_MS) % DAY_MS;
}

/**
 * Add minutes, clamping to [0, DAY_MS] instead of wrapping.
 */
export function addMinutesClamped(time: TimeOfDay, minutes: number): TimeOfDay {
  return Math.min(DAY_MS, Math.max(0, time + minutes * MINUTE_MS));
}

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}
