import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadConfig, getConfig, resetConfig } from './config.js';

const HUD_ENV = [
  'HUD_DATA_DIR',
  'HUD_POLL_INTERVAL_MS',
  'HUD_IDLE_THRESHOLD_SECONDS',
  'HUD_IDLE_MESSAGE',
  'HUD_IDLE_FADE_DELAY_SECONDS',
  'HUD_IDLE_FADE_DURATION_MS',
  'HUD_IDLE_TARGET_OPACITY',
  'HUD_REWARD_CHECK_INTERVAL_SECONDS',
  'HUD_REWARD_ACTIVITY_WINDOW_SECONDS',
  'HUD_OVERLAY_DELAY_SECONDS',
  'HUD_OVERLAY_STAGE_DURATION_SECONDS',
  'HUD_OVERLAY_MAX_OPACITY',
  'HUD_OVERLAY_MAX_SIZE_PX',
  'HUD_SCHEDULED_COOLDOWN_SECONDS',
  'HUD_SUPPRESSION_MINUTES',
  'HUD_SCHEDULE_FILE',
  'HUD_SCHEDULE_RELOAD_MINUTES',
  'LOG_LEVEL',
];

describe('loadConfig', () => {
  beforeEach(() => {
    for (const name of HUD_ENV) {
      vi.stubEnv(name, '');
    }
    resetConfig();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfig();
  });

  it('applies defaults when nothing is set', () => {
    const config = loadConfig();

    expect(config.hud.dataDir).toBe(process.cwd());
    expect(config.hud.pollIntervalMs).toBe(300);
    expect(config.hud.idleThresholdSeconds).toBe(30);
    expect(config.hud.idleFadeDelaySeconds).toBe(5);
    expect(config.hud.idleFadeDurationMs).toBe(30000);
    expect(config.hud.idleTargetOpacity).toBe(0.75);
    expect(config.rewards).toEqual({ checkIntervalSeconds: 20, activityWindowSeconds: 20 });
    expect(config.overlay).toEqual({
      delaySeconds: 60,
      stageDurationSeconds: 300,
      maxOpacity: 0.6,
      maxSizePixels: 100,
    });
    expect(config.scheduled).toEqual({ cooldownSeconds: 30, suppressionMinutes: 1 });
    expect(config.schedule).toEqual({ fileName: 'schedule.json', reloadIntervalMinutes: 5 });
    expect(config.logging.level).toBe('info');
  });

  it('reads values from the environment', () => {
    vi.stubEnv('HUD_DATA_DIR', '/tmp/hud-data');
    vi.stubEnv('HUD_IDLE_THRESHOLD_SECONDS', '45');
    vi.stubEnv('HUD_OVERLAY_MAX_OPACITY', '0.4');
    vi.stubEnv('HUD_SCHEDULE_FILE', 'today.yaml');
    vi.stubEnv('LOG_LEVEL', 'debug');

    const config = loadConfig();

    expect(config.hud.dataDir).toBe('/tmp/hud-data');
    expect(config.hud.idleThresholdSeconds).toBe(45);
    expect(config.overlay.maxOpacity).toBe(0.4);
    expect(config.schedule.fileName).toBe('today.yaml');
    expect(config.logging.level).toBe('debug');
  });

  it('lets an explicit data folder win over the environment', () => {
    vi.stubEnv('HUD_DATA_DIR', '/tmp/from-env');

    expect(loadConfig({ dataDir: '/tmp/from-cli' }).hud.dataDir).toBe('/tmp/from-cli');
  });

  it('throws on invalid values', () => {
    vi.stubEnv('HUD_IDLE_TARGET_OPACITY', '1.5');

    expect(() => loadConfig()).toThrow(/Configuration validation failed:\nhud\.idleTargetOpacity:/);
  });

  it('throws on an unknown log level', () => {
    vi.stubEnv('LOG_LEVEL', 'loud');

    expect(() => loadConfig()).toThrow(/logging\.level/);
  });
});

describe('getConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('caches until reset', () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});
