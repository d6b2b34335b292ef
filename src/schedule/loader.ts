/**
 * Schedule Loader
 *
 * Reads the schedule file from the data folder, validates it and keeps the
 * latest good snapshot. Reloads on an interval; a failed load clears the
 * snapshot so the HUD goes inactive instead of running on stale data.
 *
 * The file is parsed with js-yaml, which accepts plain JSON as well as YAML
 * with comments. Top-level and item keys match case-insensitively on their
 * first letter (PadMinutes and padMinutes are the same key).
 */

import * as fs from 'fs';
import { load as loadYaml } from 'js-yaml';
import { z } from 'zod';
import type { Logger } from 'pino';
import { MINUTE_MS, parseTimeOfDay } from '../utils/time-of-day.js';
import { Schedule } from './schedule.js';
import { SCHEDULE_EVENT_KINDS, type ScheduleEventKind, type ScheduleSource } from './types.js';

// ============ File Schema ============

const kindSchema = z.string().transform((value, ctx): ScheduleEventKind => {
  const kind = SCHEDULE_EVENT_KINDS.find((k) => k.toLowerCase() === value.trim().toLowerCase());
  if (!kind) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown kind "${value}" (expected one of ${SCHEDULE_EVENT_KINDS.join(', ')})`,
    });
    return z.NEVER;
  }
  return kind;
});

const atSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  try {
    return parseTimeOfDay(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: (error as Error).message });
    return z.NEVER;
  }
});

const itemSchema = z.preprocess(
  normalizeKeys,
  z.object({
    at: atSchema,
    label: z.string().default(''),
    kind: kindSchema,
  }),
);

export const scheduleFileSchema = z.preprocess(
  normalizeKeys,
  z.object({
    padMinutes: z.number().int().min(0).default(0),
    schedule: z.array(itemSchema).default([]),
    alarmSoundFile: z.string().optional(),
  }),
);

export type ScheduleFile = z.infer<typeof scheduleFileSchema>;

/**
 * Lower-case the first letter of every key of a plain object.
 */
function normalizeKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return value;
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key.charAt(0).toLowerCase() + key.slice(1)] = entry;
  }
  return result;
}

// ============ Parsing ============

/**
 * Parse schedule file contents.
 * @throws Error describing the first problems found
 */
export function parseScheduleFile(content: string): Schedule {
  const raw: unknown = loadYaml(content);
  const result = scheduleFileSchema.safeParse(raw);

  if (!result.success) {
    const errorMessages = result.error.errors
      .map((err) => `${err.path.join('.') || '(root)'}: ${err.message}`)
      .join('\n');
    throw new Error(`Invalid schedule file:\n${errorMessages}`);
  }

  const file = result.data;
  return new Schedule({
    padMinutes: file.padMinutes,
    items: file.schedule.map((item) => ({ at: item.at, label: item.label, kind: item.kind })),
    alarmSoundReference: file.alarmSoundFile && file.alarmSoundFile.trim() ? file.alarmSoundFile : undefined,
  });
}

// ============ Loader ============

export interface ScheduleLoaderOptions {
  /** Absolute path of the schedule file */
  filePath: string;
  /** Logger instance */
  logger: Logger;
  /** Reload interval in milliseconds (default: 5 minutes) */
  reloadIntervalMs?: number;
}

export class ScheduleLoader implements ScheduleSource {
  private filePath: string;
  private logger: Logger;
  private reloadIntervalMs: number;
  private current: Schedule | null = null;
  private reloadHandle: ReturnType<typeof setInterval> | null = null;

  constructor(options: ScheduleLoaderOptions) {
    this.filePath = options.filePath;
    this.logger = options.logger.child({ component: 'schedule-loader' });
    this.reloadIntervalMs = options.reloadIntervalMs ?? 5 * MINUTE_MS;
  }

  currentSchedule(): Schedule | null {
    return this.current;
  }

  /**
   * Load the file now. The snapshot is replaced in one assignment, with
   * null on any failure.
   */
  load(): Schedule | null {
    if (!fs.existsSync(this.filePath)) {
      this.logger.warn({ filePath: this.filePath }, 'Schedule file not found');
      this.current = null;
      return null;
    }

    try {
      const content = fs.readFileSync(this.filePath, 'utf-8');
      const schedule = parseScheduleFile(content);
      this.current = schedule;
      this.logger.info(
        { filePath: this.filePath, items: schedule.items.length },
        'Schedule loaded'
      );
    } catch (error) {
      this.logger.error(
        { filePath: this.filePath, error: (error as Error).message },
        'Failed to load schedule'
      );
      this.current = null;
    }

    return this.current;
  }

  /**
   * Load immediately, then on the reload interval
   */
  start(): void {
    if (this.reloadHandle) return;

    this.load();
    this.reloadHandle = setInterval(() => {
      this.load();
    }, this.reloadIntervalMs);
    this.logger.debug({ intervalMs: this.reloadIntervalMs }, 'Schedule reload started');
  }

  stop(): void {
    if (this.reloadHandle) {
      clearInterval(this.reloadHandle);
      this.reloadHandle = null;
    }
  }
}
