export { Schedule } from './schedule.js';
export { matchNow, DEFAULT_COOLDOWN_SECONDS } from './matcher.js';
export {
  ScheduleLoader,
  parseScheduleFile,
  scheduleFileSchema,
  type ScheduleLoaderOptions,
  type ScheduleFile,
} from './loader.js';
export {
  SCHEDULE_EVENT_KINDS,
  type ScheduleEvent,
  type ScheduleEventKind,
  type ScheduleInit,
  type ScheduleSource,
  type TimelineBounds,
} from './types.js';
