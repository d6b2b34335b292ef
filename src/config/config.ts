import { z } from 'zod';
import dotenv from 'dotenv';

// Load environment variables from .env file
dotenv.config();

// HUD timing configuration schema
const hudSchema = z.object({
  dataDir: z.string().min(1, 'Data folder path is required'),
  pollIntervalMs: z.number().int().positive().default(300),
  idleThresholdSeconds: z.number().positive().default(30),
  idleMessage: z.string().default('You have been idle for a while'),
  idleFadeDelaySeconds: z.number().min(0).default(5),
  idleFadeDurationMs: z.number().int().positive().default(30000),
  idleTargetOpacity: z.number().min(0).max(1).default(0.75),
});

// Reward configuration schema
const rewardsSchema = z.object({
  checkIntervalSeconds: z.number().positive().default(20),
  activityWindowSeconds: z.number().positive().default(20),
});

// Engagement overlay configuration schema
const overlaySchema = z.object({
  delaySeconds: z.number().min(0).default(60),
  stageDurationSeconds: z.number().positive().default(300),
  maxOpacity: z.number().min(0).max(1).default(0.6),
  maxSizePixels: z.number().int().min(1).default(100),
});

// Scheduled message configuration schema
const scheduledSchema = z.object({
  cooldownSeconds: z.number().positive().default(30),
  suppressionMinutes: z.number().min(0).default(1),
});

// Schedule file configuration schema
const scheduleSchema = z.object({
  fileName: z.string().min(1).default('schedule.json'),
  reloadIntervalMinutes: z.number().positive().default(5),
});

// Logging configuration schema
const loggingSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

// Main configuration schema
export const configSchema = z.object({
  hud: hudSchema,
  rewards: rewardsSchema.default({ checkIntervalSeconds: 20, activityWindowSeconds: 20 }),
  overlay: overlaySchema.default({ delaySeconds: 60, stageDurationSeconds: 300, maxOpacity: 0.6, maxSizePixels: 100 }),
  scheduled: scheduledSchema.default({ cooldownSeconds: 30, suppressionMinutes: 1 }),
  schedule: scheduleSchema.default({ fileName: 'schedule.json', reloadIntervalMinutes: 5 }),
  logging: loggingSchema.default({ level: 'info' }),
});

// Type inference from schema
export type Config = z.infer<typeof configSchema>;
export type HudConfig = z.infer<typeof hudSchema>;
export type RewardsConfig = z.infer<typeof rewardsSchema>;
export type OverlayConfig = z.infer<typeof overlaySchema>;
export type ScheduledConfig = z.infer<typeof scheduledSchema>;
export type ScheduleFileConfig = z.infer<typeof scheduleSchema>;
export type LoggingConfig = z.infer<typeof loggingSchema>;

function readNumber(name: string): number | undefined {
  const raw = process.env[name];
  return raw ? parseFloat(raw) : undefined;
}

function readInt(name: string): number | undefined {
  const raw = process.env[name];
  return raw ? parseInt(raw, 10) : undefined;
}

/**
 * Load configuration from environment variables
 * @param overrides - Values that win over the environment (e.g. CLI arguments)
 * @returns Validated configuration object
 * @throws Error if configuration is invalid
 */
export function loadConfig(overrides?: { dataDir?: string }): Config {
  const rawConfig = {
    hud: {
      dataDir: overrides?.dataDir || process.env.HUD_DATA_DIR || process.cwd(),
      pollIntervalMs: readInt('HUD_POLL_INTERVAL_MS'),
      idleThresholdSeconds: readNumber('HUD_IDLE_THRESHOLD_SECONDS'),
      idleMessage: process.env.HUD_IDLE_MESSAGE || undefined,
      idleFadeDelaySeconds: readNumber('HUD_IDLE_FADE_DELAY_SECONDS'),
      idleFadeDurationMs: readInt('HUD_IDLE_FADE_DURATION_MS'),
      idleTargetOpacity: readNumber('HUD_IDLE_TARGET_OPACITY'),
    },
    rewards: {
      checkIntervalSeconds: readNumber('HUD_REWARD_CHECK_INTERVAL_SECONDS'),
      activityWindowSeconds: readNumber('HUD_REWARD_ACTIVITY_WINDOW_SECONDS'),
    },
    overlay: {
      delaySeconds: readNumber('HUD_OVERLAY_DELAY_SECONDS'),
      stageDurationSeconds: readNumber('HUD_OVERLAY_STAGE_DURATION_SECONDS'),
      maxOpacity: readNumber('HUD_OVERLAY_MAX_OPACITY'),
      maxSizePixels: readInt('HUD_OVERLAY_MAX_SIZE_PX'),
    },
    scheduled: {
      cooldownSeconds: readNumber('HUD_SCHEDULED_COOLDOWN_SECONDS'),
      suppressionMinutes: readNumber('HUD_SUPPRESSION_MINUTES'),
    },
    schedule: {
      fileName: process.env.HUD_SCHEDULE_FILE || undefined,
      reloadIntervalMinutes: readNumber('HUD_SCHEDULE_RELOAD_MINUTES'),
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errorMessages = result.error.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errorMessages}`);
  }

  return result.data;
}

// Export a singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
