import { describe, it, expect } from 'vitest';
import {
  DAY_MS,
  HOUR_MS,
  MINUTE_MS,
  timeOfDay,
  toTimeOfDay,
  parseTimeOfDay,
  formatTimeOfDay,
  elapsedSince,
  addMinutesClamped,
} from './time-of-day.js';

describe('timeOfDay', () => {
  it('builds milliseconds since midnight', () => {
    expect(timeOfDay(8, 30)).toBe(8 * HOUR_MS + 30 * MINUTE_MS);
    expect(timeOfDay(0)).toBe(0);
  });

  it('rejects out-of-range parts', () => {
    expect(() => timeOfDay(24)).toThrow('Invalid hour: 24');
    expect(() => timeOfDay(8, 60)).toThrow('Invalid minute: 60');
    expect(() => timeOfDay(8, 0, 60)).toThrow('Invalid second: 60');
  });
});

describe('toTimeOfDay', () => {
  it('uses the local wall clock', () => {
    expect(toTimeOfDay(new Date(2024, 0, 15, 8, 0, 5))).toBe(timeOfDay(8, 0, 5));
  });
});

describe('parseTimeOfDay', () => {
  it('accepts dotted and colon forms', () => {
    expect(parseTimeOfDay('8.00')).toBe(timeOfDay(8));
    expect(parseTimeOfDay('08:30')).toBe(timeOfDay(8, 30));
    expect(parseTimeOfDay(' 17.45 ')).toBe(timeOfDay(17, 45));
    expect(parseTimeOfDay('08:00:15')).toBe(timeOfDay(8, 0, 15));
  });

  it('reads numbers with two decimals', () => {
    expect(parseTimeOfDay(8.3)).toBe(timeOfDay(8, 30));
    expect(parseTimeOfDay(9)).toBe(timeOfDay(9));
  });

  it('rejects malformed values', () => {
    expect(() => parseTimeOfDay('8')).toThrow('Invalid time of day: "8"');
    expect(() => parseTimeOfDay('eight.00')).toThrow('Invalid time of day');
    expect(() => parseTimeOfDay('25.00')).toThrow('Invalid hour: 25');
  });
});

describe('formatTimeOfDay', () => {
  it('formats HH:MM and adds seconds only when present', () => {
    expect(formatTimeOfDay(timeOfDay(8, 5))).toBe('08:05');
    expect(formatTimeOfDay(timeOfDay(23, 59, 30))).toBe('23:59:30');
  });
});

describe('elapsedSince', () => {
  it('measures forward from the earlier time', () => {
    expect(elapsedSince(timeOfDay(8, 0, 20), timeOfDay(8))).toBe(20_000);
    expect(elapsedSince(timeOfDay(8), timeOfDay(8))).toBe(0);
  });

  it('goes past midnight instead of going backwards', () => {
    expect(elapsedSince(timeOfDay(0, 0, 10), timeOfDay(23, 59, 50))).toBe(20_000);
    expect(elapsedSince(timeOfDay(11, 59, 35), timeOfDay(12))).toBe(DAY_MS - 25_000);
  });
});

describe('addMinutesClamped', () => {
  it('clamps at both ends of the day', () => {
    expect(addMinutesClamped(timeOfDay(0, 10), -30)).toBe(0);
    expect(addMinutesClamped(timeOfDay(23, 50), 30)).toBe(DAY_MS);
    expect(addMinutesClamped(timeOfDay(8), 15)).toBe(timeOfDay(8, 15));
  });
});
