/**
 * Presentation Dispatcher (command queue)
 *
 * Serializes every presentation command into one lane so surfaces are only
 * touched by one unit of work at a time, in submission order.
 *
 * - post(): fire-and-forget, for show/update
 * - send(): resolves once the unit (and everything queued before it) has run,
 *   for teardown that must finish before the next command
 *
 * A failing unit is logged and its onError hook runs; it never rejects back
 * into the caller.
 */

import type { Logger } from 'pino';

export type PresentationCommand = () => void | Promise<void>;
export type CommandErrorHook = (error: Error) => void;

type QueueEntry = {
  name: string;
  command: PresentationCommand;
  onError?: CommandErrorHook;
  done?: () => void;
  enqueuedAt: number;
};

export interface PresentationDispatcherOptions {
  /** Logger instance */
  logger: Logger;
  /** Warn when a command waited longer than this (default: 1000ms) */
  warnAfterMs?: number;
}

export class PresentationDispatcher {
  private logger: Logger;
  private warnAfterMs: number;
  private queue: QueueEntry[] = [];
  private active = false;
  private idleWaiters: Array<() => void> = [];

  constructor(options: PresentationDispatcherOptions) {
    this.logger = options.logger.child({ component: 'presentation-dispatcher' });
    this.warnAfterMs = options.warnAfterMs ?? 1000;
  }

  /**
   * Queue a command without waiting for it.
   */
  post(name: string, command: PresentationCommand, onError?: CommandErrorHook): void {
    this.queue.push({ name, command, onError, enqueuedAt: Date.now() });
    this.drain();
  }

  /**
   * Queue a command and wait until it has run. Never rejects.
   */
  send(name: string, command: PresentationCommand, onError?: CommandErrorHook): Promise<void> {
    return new Promise<void>((resolve) => {
      this.queue.push({ name, command, onError, done: resolve, enqueuedAt: Date.now() });
      this.drain();
    });
  }

  /**
   * Resolves when nothing is queued or running.
   */
  whenIdle(): Promise<void> {
    if (!this.active && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  get pending(): number {
    return this.queue.length;
  }

  private drain(): void {
    if (this.active) return;

    const entry = this.queue.shift();
    if (!entry) {
      const waiters = this.idleWaiters.splice(0);
      for (const resolve of waiters) resolve();
      return;
    }

    this.active = true;

    const waitTime = Date.now() - entry.enqueuedAt;
    if (waitTime > this.warnAfterMs) {
      this.logger.warn({ command: entry.name, waitTime }, 'Presentation command waited too long');
    }

    void this.run(entry).finally(() => {
      this.active = false;
      entry.done?.();
      this.drain();
    });
  }

  private async run(entry: QueueEntry): Promise<void> {
    try {
      await entry.command();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error({ command: entry.name, error: err.message }, 'Presentation command failed');
      try {
        entry.onError?.(err);
      } catch (hookError) {
        this.logger.error(
          { command: entry.name, error: (hookError as Error).message },
          'Presentation error hook failed'
        );
      }
    }
  }
}
