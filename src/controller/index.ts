export {
  NotificationController,
  DEFAULT_CONTROLLER_SETTINGS,
  settingsFromConfig,
  type ControllerSettings,
  type ControllerState,
  type PollSnapshot,
  type NotificationControllerOptions,
} from './notification-controller.js';
export {
  computeOverlayGrowth,
  MIN_OVERLAY_FRAME,
  type OverlayGrowth,
  type OverlayGrowthOptions,
} from './overlay-growth.js';
export { PollLoop, type PollLoopOptions } from './poll-loop.js';
