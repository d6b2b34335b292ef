/**
 * Tests for the presentation dispatcher lane.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Logger } from 'pino';
import { PresentationDispatcher } from './dispatcher.js';

const createMockLogger = () => ({
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn().mockReturnThis(),
}) as unknown as Logger;

describe('PresentationDispatcher', () => {
  let logger: Logger;
  let dispatcher: PresentationDispatcher;

  beforeEach(() => {
    logger = createMockLogger();
    dispatcher = new PresentationDispatcher({ logger });
  });

  it('runs commands one at a time in submission order', async () => {
    const order: string[] = [];

    dispatcher.post('slow', async () => {
      await new Promise(r => setTimeout(r, 20));
      order.push('slow');
    });
    dispatcher.post('fast', () => {
      order.push('fast');
    });

    await dispatcher.whenIdle();
    expect(order).toEqual(['slow', 'fast']);
  });

  it('starts the first command synchronously', () => {
    const command = vi.fn();

    dispatcher.post('sync', command);

    expect(command).toHaveBeenCalledTimes(1);
  });

  it('resolves send after everything queued before it', async () => {
    const order: string[] = [];

    dispatcher.post('show', async () => {
      await new Promise(r => setTimeout(r, 10));
      order.push('show');
    });
    await dispatcher.send('teardown', () => {
      order.push('teardown');
    });

    expect(order).toEqual(['show', 'teardown']);
  });

  it('logs failures and runs the error hook without rejecting', async () => {
    const onError = vi.fn();

    await dispatcher.send('broken', () => {
      throw new Error('surface gone');
    }, onError);

    expect(onError).toHaveBeenCalledWith(expect.objectContaining({ message: 'surface gone' }));
    expect(logger.error).toHaveBeenCalledWith(
      { command: 'broken', error: 'surface gone' },
      'Presentation command failed'
    );
  });

  it('keeps draining after a failure', async () => {
    const after = vi.fn();

    dispatcher.post('broken', async () => {
      throw new Error('boom');
    });
    dispatcher.post('after', after);

    await dispatcher.whenIdle();
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('logs a failing error hook', async () => {
    await dispatcher.send('broken', () => {
      throw new Error('boom');
    }, () => {
      throw new Error('hook boom');
    });

    expect(logger.error).toHaveBeenCalledWith(
      { command: 'broken', error: 'hook boom' },
      'Presentation error hook failed'
    );
  });

  it('reports pending commands behind the running one', async () => {
    dispatcher.post('slow', () => new Promise<void>(r => setTimeout(r, 10)));
    dispatcher.post('a', vi.fn());
    dispatcher.post('b', vi.fn());

    expect(dispatcher.pending).toBe(2);

    await dispatcher.whenIdle();
    expect(dispatcher.pending).toBe(0);
  });

  it('is idle immediately when nothing was queued', async () => {
    await expect(dispatcher.whenIdle()).resolves.toBeUndefined();
  });
});
