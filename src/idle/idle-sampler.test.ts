import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Logger } from 'pino';
import {
  FixedIdleSampler,
  SystemIdleSampler,
  XPRINTIDLE_PROBE,
  IOREG_PROBE,
  probeForPlatform,
} from './idle-sampler.js';

const createMockLogger = () => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn().mockReturnThis(),
}) as unknown as Logger;

describe('probes', () => {
  it('reads xprintidle milliseconds', () => {
    expect(XPRINTIDLE_PROBE.parse('12345\n')).toBe(12345);
    expect(XPRINTIDLE_PROBE.parse("couldn't open display")).toBeNull();
  });

  it('reads HIDIdleTime nanoseconds from ioreg', () => {
    const output = '    | |   "HIDIdleTime" = 2500000000\n    | |   "HIDKeyboard" = 1';
    expect(IOREG_PROBE.parse(output)).toBe(2500);
    expect(IOREG_PROBE.parse('no such key')).toBeNull();
  });

  it('picks a probe per platform', () => {
    expect(probeForPlatform('linux')).toBe(XPRINTIDLE_PROBE);
    expect(probeForPlatform('darwin')).toBe(IOREG_PROBE);
    expect(probeForPlatform('win32')).toBeNull();
  });
});

describe('FixedIdleSampler', () => {
  it('returns whatever was set', () => {
    const sampler = new FixedIdleSampler();
    expect(sampler.getIdleDuration()).toBe(0);

    sampler.set(42_000);
    expect(sampler.getIdleDuration()).toBe(42_000);
  });
});

describe('SystemIdleSampler', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it('returns the previous sample while the next one runs', async () => {
    const runCommand = vi.fn().mockResolvedValue('1500\n');
    const sampler = new SystemIdleSampler({ logger, probe: XPRINTIDLE_PROBE, runCommand });

    expect(sampler.getIdleDuration()).toBe(0);
    await sampler.refresh();
    expect(sampler.getIdleDuration()).toBe(1500);
    expect(runCommand).toHaveBeenCalledWith('xprintidle', []);
  });

  it('runs one query at a time', async () => {
    let release: (output: string) => void = () => {};
    const runCommand = vi.fn(() => new Promise<string>((resolve) => {
      release = resolve;
    }));
    const sampler = new SystemIdleSampler({ logger, probe: XPRINTIDLE_PROBE, runCommand });

    sampler.getIdleDuration();
    sampler.getIdleDuration();
    const pending = sampler.refresh();
    release('10');
    await pending;

    expect(runCommand).toHaveBeenCalledTimes(1);
    expect(sampler.getIdleDuration()).toBe(10);
  });

  it('falls back to 0 when the command fails', async () => {
    const runCommand = vi.fn()
      .mockResolvedValueOnce('5000')
      .mockRejectedValueOnce(new Error('spawn xprintidle ENOENT'));
    const sampler = new SystemIdleSampler({ logger, probe: XPRINTIDLE_PROBE, runCommand });

    await sampler.refresh();
    expect(sampler.getIdleDuration()).toBe(5000);
    await sampler.refresh();

    expect(sampler.getIdleDuration()).toBe(0);
    expect(logger.debug).toHaveBeenCalledWith(
      { command: 'xprintidle', error: 'spawn xprintidle ENOENT' },
      'Idle probe failed'
    );
  });

  it('falls back to 0 on unreadable output', async () => {
    const runCommand = vi.fn().mockResolvedValue('garbage');
    const sampler = new SystemIdleSampler({ logger, probe: XPRINTIDLE_PROBE, runCommand });

    await sampler.refresh();

    expect(sampler.getIdleDuration()).toBe(0);
    expect(logger.debug).toHaveBeenCalledWith({ command: 'xprintidle' }, 'Unreadable idle probe output');
  });

  it('warns and reads 0 without a probe', async () => {
    const runCommand = vi.fn();
    const sampler = new SystemIdleSampler({ logger, platform: 'win32', runCommand });

    await sampler.refresh();

    expect(sampler.getIdleDuration()).toBe(0);
    expect(runCommand).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith(
      { platform: 'win32' },
      'No idle probe for this platform, idle time will read as 0'
    );
  });
});
