export {
  configSchema,
  loadConfig,
  getConfig,
  resetConfig,
  type Config,
  type HudConfig,
  type RewardsConfig,
  type OverlayConfig,
  type ScheduledConfig,
  type ScheduleFileConfig,
  type LoggingConfig,
} from './config.js';
