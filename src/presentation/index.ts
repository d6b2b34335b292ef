export {
  PresentationDispatcher,
  type PresentationDispatcherOptions,
  type PresentationCommand,
  type CommandErrorHook,
} from './dispatcher.js';
export {
  ConsoleIdleSurface,
  ConsoleScheduledSurface,
  ConsoleOverlaySurface,
  ConsoleRewardSurface,
  createConsoleSurfaces,
  type ConsoleSurfacesOptions,
} from './console-surfaces.js';
export {
  BLINK_PERIOD_MS,
  OVERLAY_LAYER_COUNT,
  idleFadeOpacity,
  isAlarmDue,
  blinkPhaseAt,
  overlayLayerOpacity,
  overlayLayerInset,
  colorCycleHue,
  hueToRgb,
  layerColor,
  type IdleFadeOptions,
} from './effects.js';
export type {
  SurfaceHandle,
  PresentationSurface,
  PresentationSurfaces,
  IdleSurface,
  IdleSurfaceParams,
  IdleSurfaceFrame,
  ScheduledSurface,
  ScheduledSurfaceParams,
  OverlaySurface,
  OverlayFrame,
  RewardSurface,
  RewardParams,
} from './types.js';
