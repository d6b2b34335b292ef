// focus-hud - idle, notification and schedule heads-up display
// Main entry point for library usage

export * from './config/index.js';
export * from './utils/index.js';
export * from './schedule/index.js';
export * from './timeline/index.js';
export * from './presentation/index.js';
export * from './controller/index.js';
export * from './idle/index.js';
export * from './hud/index.js';
