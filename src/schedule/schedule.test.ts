import { describe, it, expect } from 'vitest';
import { Schedule } from './schedule.js';
import { DAY_MS, timeOfDay } from '../utils/time-of-day.js';
import type { ScheduleEvent } from './types.js';

function event(hours: number, minutes: number, kind: ScheduleEvent['kind'], label: string = kind): ScheduleEvent {
  return { at: timeOfDay(hours, minutes), label, kind };
}

describe('Schedule', () => {
  describe('empty schedule', () => {
    const schedule = new Schedule({ padMinutes: 10, items: [] });

    it('is never tracking', () => {
      for (let minute = 0; minute < 24 * 60; minute += 7) {
        expect(schedule.isCurrentlyTracking(minute * 60_000)).toBe(false);
      }
    });

    it('spans the full day', () => {
      expect(schedule.timelineBounds()).toEqual({ start: 0, end: DAY_MS });
    });
  });

  describe('08:00 to 09:00 window', () => {
    const schedule = new Schedule({
      padMinutes: 0,
      items: [event(8, 0, 'StartTracking'), event(9, 0, 'EndTracking')],
    });

    it('tracks from the start up to but excluding the end', () => {
      expect(schedule.isCurrentlyTracking(timeOfDay(8, 0))).toBe(true);
      expect(schedule.isCurrentlyTracking(timeOfDay(8, 30))).toBe(true);
      expect(schedule.isCurrentlyTracking(timeOfDay(8, 59, 59))).toBe(true);
    });

    it('does not track outside the window', () => {
      expect(schedule.isCurrentlyTracking(timeOfDay(7, 59, 59))).toBe(false);
      expect(schedule.isCurrentlyTracking(timeOfDay(9, 0))).toBe(false);
      expect(schedule.isCurrentlyTracking(timeOfDay(12, 0))).toBe(false);
    });
  });

  it('never tracks after a start with no later end', () => {
    const schedule = new Schedule({
      padMinutes: 0,
      items: [event(7, 0, 'EndTracking'), event(8, 0, 'StartTracking')],
    });

    for (let minute = 0; minute < 24 * 60; minute += 5) {
      expect(schedule.isCurrentlyTracking(minute * 60_000)).toBe(false);
    }
  });

  it('uses the latest start and the first end after it', () => {
    const schedule = new Schedule({
      padMinutes: 0,
      items: [
        event(8, 0, 'StartTracking'),
        event(10, 0, 'EndTracking'),
        event(9, 0, 'EndTracking'),
        event(13, 0, 'StartTracking'),
        event(14, 0, 'EndTracking'),
      ],
    });

    expect(schedule.isCurrentlyTracking(timeOfDay(9, 30))).toBe(false);
    expect(schedule.isCurrentlyTracking(timeOfDay(13, 30))).toBe(true);
    expect(schedule.isCurrentlyTracking(timeOfDay(11, 0))).toBe(false);
  });

  it('ignores alert and success items for tracking', () => {
    const schedule = new Schedule({
      padMinutes: 0,
      items: [event(8, 0, 'Alert'), event(9, 0, 'Success')],
    });

    expect(schedule.isCurrentlyTracking(timeOfDay(8, 30))).toBe(false);
  });

  it('pads the bounds and clamps them to the day', () => {
    const padded = new Schedule({
      padMinutes: 10,
      items: [event(8, 0, 'StartTracking'), event(10, 0, 'EndTracking')],
    });
    expect(padded.timelineBounds()).toEqual({ start: timeOfDay(7, 50), end: timeOfDay(10, 10) });

    const edge = new Schedule({
      padMinutes: 30,
      items: [event(0, 10, 'StartTracking'), event(23, 50, 'EndTracking')],
    });
    expect(edge.timelineBounds()).toEqual({ start: 0, end: DAY_MS });
  });

  it('is immutable', () => {
    const items = [event(8, 0, 'StartTracking')];
    const schedule = new Schedule({ padMinutes: 0, items });
    items.push(event(9, 0, 'EndTracking'));

    expect(schedule.items).toHaveLength(1);
    expect(Object.isFrozen(schedule)).toBe(true);
    expect(Object.isFrozen(schedule.items[0])).toBe(true);
  });

  it('sorts items stably by time', () => {
    const schedule = new Schedule({
      padMinutes: 0,
      items: [event(9, 0, 'EndTracking', 'b'), event(8, 0, 'StartTracking', 'a'), event(9, 0, 'Alert', 'c')],
    });

    expect(schedule.sortedItems().map((item) => item.label)).toEqual(['a', 'b', 'c']);
  });
});
