/**
 * Idle time sampling.
 *
 * SystemIdleSampler asks an OS tool for the time since the last keyboard or
 * mouse input. The query runs in the background; getIdleDuration() returns
 * the latest finished sample straight away and starts the next query.
 *
 * Supported:
 * - linux: `xprintidle` (milliseconds)
 * - darwin: `ioreg -c IOHIDSystem` (HIDIdleTime, nanoseconds)
 */

import { execFile } from 'child_process';
import type { Logger } from 'pino';

export interface IdleSampler {
  /** Milliseconds since the last user input; 0 when unknown */
  getIdleDuration(): number;
}

/**
 * Sampler with a settable value, for debug runs and tests.
 */
export class FixedIdleSampler implements IdleSampler {
  constructor(private idleMs = 0) {}

  set(idleMs: number): void {
    this.idleMs = idleMs;
  }

  getIdleDuration(): number {
    return this.idleMs;
  }
}

// ============ Probes ============

export interface IdleProbe {
  command: string;
  args: string[];
  /** Idle milliseconds from the command output, null if unreadable */
  parse(output: string): number | null;
}

export const XPRINTIDLE_PROBE: IdleProbe = {
  command: 'xprintidle',
  args: [],
  parse(output) {
    const trimmed = output.trim();
    if (!/^\d+$/.test(trimmed)) return null;
    return parseInt(trimmed, 10);
  },
};

export const IOREG_PROBE: IdleProbe = {
  command: 'ioreg',
  args: ['-c', 'IOHIDSystem'],
  parse(output) {
    const match = output.match(/"HIDIdleTime"\s*=\s*(\d+)/);
    if (!match) return null;
    return Math.floor(parseInt(match[1], 10) / 1_000_000);
  },
};

export function probeForPlatform(platform: NodeJS.Platform): IdleProbe | null {
  switch (platform) {
    case 'linux':
      return XPRINTIDLE_PROBE;
    case 'darwin':
      return IOREG_PROBE;
    default:
      return null;
  }
}

// ============ System sampler ============

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

function runCommand(command: string, args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(command, args, { encoding: 'utf-8', timeout: 2000 }, (error, stdout) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(stdout);
    });
  });
}

export interface SystemIdleSamplerOptions {
  /** Logger instance */
  logger: Logger;
  /** Probe to run (default: chosen by platform) */
  probe?: IdleProbe | null;
  /** Platform used to choose the probe (default: process.platform) */
  platform?: NodeJS.Platform;
  /** Command runner (default: child_process.execFile) */
  runCommand?: CommandRunner;
}

export class SystemIdleSampler implements IdleSampler {
  private logger: Logger;
  private probe: IdleProbe | null;
  private run: CommandRunner;
  private lastIdleMs = 0;
  private inFlight: Promise<void> | null = null;

  constructor(options: SystemIdleSamplerOptions) {
    this.logger = options.logger.child({ component: 'idle-sampler' });
    this.probe = options.probe !== undefined
      ? options.probe
      : probeForPlatform(options.platform ?? process.platform);
    this.run = options.runCommand ?? runCommand;

    if (!this.probe) {
      this.logger.warn(
        { platform: options.platform ?? process.platform },
        'No idle probe for this platform, idle time will read as 0'
      );
    }
  }

  getIdleDuration(): number {
    void this.refresh();
    return this.lastIdleMs;
  }

  /**
   * Start a query unless one is running. Resolves when the running query
   * finishes; never rejects.
   */
  refresh(): Promise<void> {
    if (this.inFlight) return this.inFlight;
    const probe = this.probe;
    if (!probe) return Promise.resolve();

    this.inFlight = this.run(probe.command, probe.args)
      .then((output) => {
        const idleMs = probe.parse(output);
        if (idleMs === null) {
          this.logger.debug({ command: probe.command }, 'Unreadable idle probe output');
        }
        this.lastIdleMs = idleMs ?? 0;
      })
      .catch((err) => {
        this.logger.debug({ command: probe.command, error: (err as Error).message }, 'Idle probe failed');
        this.lastIdleMs = 0;
      })
      .finally(() => {
        this.inFlight = null;
      });

    return this.inFlight;
  }
}
