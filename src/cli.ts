#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import { pino } from 'pino';
import { loadConfig, resetConfig } from './config/index.js';
import { Hud, setupGracefulShutdown, type HudDebugOptions } from './hud/index.js';
import { ScheduleLoader } from './schedule/loader.js';
import { generateTimeline, formatTimeline } from './timeline/index.js';
import { createLogger } from './utils/logger.js';
import { parseTimeOfDay, toTimeOfDay } from './utils/time-of-day.js';

const VERSION = '0.1.0';
const DEFAULT_DEBUG_MESSAGE = 'Debug scheduled message';

const program = new Command();

program
  .name('focus-hud')
  .description('Idle, notification and schedule heads-up display')
  .version(VERSION);

function debugText(value: string | boolean | undefined): string | undefined {
  if (value === undefined || value === false) return undefined;
  return value === true ? DEFAULT_DEBUG_MESSAGE : value;
}

// Start command - runs the poll loop until interrupted
program
  .command('start')
  .description('Start the HUD')
  .argument('[dataDir]', 'Folder holding the schedule file')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('--debug-idle', 'Show the idle message immediately with a short idle threshold')
  .option('--debug-scheduled-alert [text]', 'Show an alert-style scheduled message on start')
  .option('--debug-scheduled-success [text]', 'Show a success-style scheduled message on start')
  .option('--debug-idle-time <seconds>', 'Override the idle threshold in seconds')
  .action((dataDir: string | undefined, options) => {
    try {
      resetConfig();
      const config = loadConfig({ dataDir });

      if (options.verbose) {
        config.logging.level = 'debug';
      }

      const logger = createLogger(config.logging);

      const debug: HudDebugOptions = { showIdleMessage: Boolean(options.debugIdle) };

      if (options.debugIdleTime !== undefined) {
        const seconds = Number(options.debugIdleTime);
        if (!Number.isFinite(seconds) || seconds <= 0) {
          throw new Error(`Invalid --debug-idle-time: ${options.debugIdleTime}`);
        }
        debug.idleThresholdSeconds = seconds;
      }

      const alertText = debugText(options.debugScheduledAlert);
      const successText = debugText(options.debugScheduledSuccess);
      if (alertText !== undefined) {
        debug.scheduledMessage = { label: alertText, kind: 'StartTracking' };
      } else if (successText !== undefined) {
        debug.scheduledMessage = { label: successText, kind: 'EndTracking' };
      }

      logger.info({ version: VERSION }, 'Starting focus-hud...');

      const hud = new Hud({ config, logger, debug });
      setupGracefulShutdown(hud, logger);
      hud.start();

      logger.info('focus-hud is running. Press Ctrl+C to stop.');
    } catch (error) {
      console.error('Failed to start focus-hud:', (error as Error).message);
      process.exit(1);
    }
  });

// Timeline command - prints the schedule bar once
program
  .command('timeline')
  .description('Print the schedule timeline')
  .argument('[dataDir]', 'Folder holding the schedule file')
  .option('--at <time>', 'Render as if it were this time of day (HH:MM)')
  .action((dataDir: string | undefined, options) => {
    try {
      resetConfig();
      const config = loadConfig({ dataDir });
      const filePath = path.join(config.hud.dataDir, config.schedule.fileName);

      const loader = new ScheduleLoader({ filePath, logger: pino({ level: 'silent' }) });
      const schedule = loader.load();
      if (!schedule) {
        console.error(`No usable schedule at ${filePath}`);
        process.exit(1);
      }

      const now = options.at !== undefined
        ? parseTimeOfDay(String(options.at))
        : toTimeOfDay(new Date());

      const lines = formatTimeline(generateTimeline(schedule, now));
      if (lines.length === 0) {
        console.log('(empty timeline)');
        return;
      }
      for (const line of lines) {
        console.log(line);
      }
    } catch (error) {
      console.error('Failed to render timeline:', (error as Error).message);
      process.exit(1);
    }
  });

// Config command - show current configuration
program
  .command('config')
  .description('Show current configuration')
  .option('--json', 'Output as JSON')
  .action((options) => {
    try {
      resetConfig();
      const config = loadConfig();

      if (options.json) {
        console.log(JSON.stringify(config, null, 2));
        return;
      }

      console.log('focus-hud Configuration\n');
      console.log(`Data folder: ${config.hud.dataDir}`);
      console.log(`Schedule file: ${config.schedule.fileName} (reload every ${config.schedule.reloadIntervalMinutes} min)`);
      console.log(`Poll interval: ${config.hud.pollIntervalMs} ms`);
      console.log(`Idle threshold: ${config.hud.idleThresholdSeconds} s`);
      console.log(`Rewards: every ${config.rewards.checkIntervalSeconds} s, activity window ${config.rewards.activityWindowSeconds} s`);
      console.log(`Overlay: after ${config.overlay.delaySeconds} s, stage ${config.overlay.stageDurationSeconds} s`);
      console.log(`Scheduled: cooldown ${config.scheduled.cooldownSeconds} s, suppression ${config.scheduled.suppressionMinutes} min`);
      console.log(`Log level: ${config.logging.level}`);
    } catch (error) {
      console.error('Failed to load config:', (error as Error).message);
      process.exit(1);
    }
  });

program.parse();
