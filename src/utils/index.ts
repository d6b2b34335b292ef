export { createLogger } from './logger.js';
export {
  SECOND_MS,
  MINUTE_MS,
  HOUR_MS,
  DAY_MS,
  timeOfDay,
  toTimeOfDay,
  parseTimeOfDay,
  formatTimeOfDay,
  elapsedSince,
  addMinutesClamped,
  type TimeOfDay,
} from './time-of-day.js';
