import type { TimeOfDay } from '../utils/time-of-day.js';
import type { Schedule } from './schedule.js';

/**
 * Kinds of schedule events.
 *
 * StartTracking/EndTracking bound tracking windows. Alert/Success are only
 * used for ad-hoc messages and never affect tracking.
 */
export type ScheduleEventKind = 'StartTracking' | 'EndTracking' | 'Alert' | 'Success';

export const SCHEDULE_EVENT_KINDS: readonly ScheduleEventKind[] = [
  'StartTracking',
  'EndTracking',
  'Alert',
  'Success',
];

export interface ScheduleEvent {
  readonly at: TimeOfDay;
  readonly label: string;
  readonly kind: ScheduleEventKind;
}

export interface ScheduleInit {
  padMinutes: number;
  items: ScheduleEvent[];
  alarmSoundReference?: string;
}

export interface TimelineBounds {
  start: TimeOfDay;
  end: TimeOfDay;
}

/**
 * Read-only view of the current schedule. Returns null before the first
 * successful load or after a failed one.
 */
export interface ScheduleSource {
  currentSchedule(): Schedule | null;
}
