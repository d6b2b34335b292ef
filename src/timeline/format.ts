import { formatTimeOfDay } from '../utils/time-of-day.js';
import type { Rgb, TimelineSegment } from './timeline.js';

const BLOCK = '█';
const RESET = '\x1b[0m';
const STRIKE = '\x1b[9m';

function fg(color: Rgb): string {
  return `\x1b[38;2;${color.r};${color.g};${color.b}m`;
}

/**
 * Render segments for a 24-bit color terminal: one bar line, then one line
 * per labelled segment. Passed labels are struck through.
 */
export function formatTimeline(segments: TimelineSegment[]): string[] {
  if (segments.length === 0) return [];

  const bar = segments.map((s) => `${fg(s.color)}${BLOCK}`).join('') + RESET;
  const lines = [bar];

  for (const segment of segments) {
    if (segment.labelAbove === undefined) continue;
    const label = segment.isLabelStrikethrough
      ? `${STRIKE}${segment.labelAbove}${RESET}`
      : segment.labelAbove;
    lines.push(`${formatTimeOfDay(segment.startsAt)} ${label}`);
  }

  return lines;
}
