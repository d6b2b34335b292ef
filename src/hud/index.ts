export {
  Hud,
  setupGracefulShutdown,
  DEBUG_IDLE_THRESHOLD_SECONDS,
  type HudOptions,
  type HudDebugOptions,
} from './hud.js';
