export {
  generateTimeline,
  darkenColor,
  blinkColor,
  MINUTES_PER_SEGMENT,
  PAST_DARKEN_FACTOR,
  ACTIVE_COLOR,
  NEUTRAL_COLOR,
  HIGHLIGHT_COLOR,
  type Rgb,
  type TimelineSegment,
  type TimelineOptions,
} from './timeline.js';
export { formatTimeline } from './format.js';
