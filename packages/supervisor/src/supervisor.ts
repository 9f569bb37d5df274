/**
 * @fileoverview Keeps a long batch alive across hangs and crashes.
 *
 * Runs one child at a time, relays its output, and watches the progress
 * lines. A child that stalls inside an item, or exits without finishing, is
 * replaced by a fresh one after a delay. The child resumes from its own
 * checkpoint; the supervisor only counts restarts.
 *
 * @module @minutely/supervisor/supervisor
 */

import type { Clock, Sleep } from '@minutely/contracts';
import { errorMessage, sleep as defaultSleep, systemClock } from '@minutely/contracts';
import type { Logger } from '@minutely/logger';
import { createSilentLogger } from '@minutely/logger';
import type { ChildHandle, ChildLauncher } from './child.js';
import { classifyLine } from './classifier.js';
import type { LineClassifier } from './classifier.js';
import { LineQueue } from './line-queue.js';
import { LivenessMonitor } from './liveness.js';

/** Anything with a `write(string)`, such as `process.stdout`. */
export interface OutputSink {
  write(chunk: string): unknown;
}

export interface SupervisorOptions {
  launch: ChildLauncher;

  /** Longest an item may run without a saved line (default 240000) */
  timeoutMs?: number;

  /** Pause before relaunching (default 15000) */
  restartDelayMs?: number;

  /** Give up after this many restarts; 0 means never (default 0) */
  maxRestarts?: number;

  /** Longest wait for a line before re-checking the timer (default 1000) */
  pollMs?: number;

  /** Time between SIGTERM and SIGKILL (default 1000) */
  graceMs?: number;

  /** Time to wait for an exit code once output ends (default 3000) */
  exitWaitMs?: number;

  classify?: LineClassifier;

  /** Receives every child line unchanged (default stdout) */
  output?: OutputSink;

  clock?: Clock;
  sleep?: Sleep;
  logger?: Logger;
}

export type SupervisorStatus = 'completed' | 'aborted' | 'interrupted';

export interface SupervisorOutcome {
  status: SupervisorStatus;
  restarts: number;
}

type ChildResult = 'completed' | 'restart' | 'interrupted';

type ExitWait = { exited: true; code: number | null } | { exited: false };

/**
 * @example
 * ```typescript
 * const controller = new AbortController();
 * process.once('SIGINT', () => controller.abort());
 *
 * const supervisor = new Supervisor({
 *   launch: createExecaLauncher({ command: process.execPath, args: ['collect.js'] }),
 *   logger,
 * });
 * const { status, restarts } = await supervisor.run(controller.signal);
 * ```
 */
export class Supervisor {
  private readonly launch: ChildLauncher;
  private readonly timeoutMs: number;
  private readonly restartDelayMs: number;
  private readonly maxRestarts: number;
  private readonly pollMs: number;
  private readonly graceMs: number;
  private readonly exitWaitMs: number;
  private readonly classify: LineClassifier;
  private readonly output: OutputSink;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(options: SupervisorOptions) {
    this.launch = options.launch;
    this.timeoutMs = options.timeoutMs ?? 240_000;
    this.restartDelayMs = options.restartDelayMs ?? 15_000;
    this.maxRestarts = options.maxRestarts ?? 0;
    this.pollMs = options.pollMs ?? 1000;
    this.graceMs = options.graceMs ?? 1000;
    this.exitWaitMs = options.exitWaitMs ?? 3000;
    this.classify = options.classify ?? classifyLine;
    this.output = options.output ?? process.stdout;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Supervises children until one completes the batch, the restart limit is
   * exceeded, or `signal` aborts.
   */
  async run(signal?: AbortSignal): Promise<SupervisorOutcome> {
    let restarts = 0;

    for (;;) {
      if (signal?.aborted) {
        return { status: 'interrupted', restarts };
      }

      const result = await this.superviseChild(restarts, signal);
      if (result !== 'restart') {
        return { status: result, restarts };
      }

      restarts++;
      if (this.maxRestarts > 0 && restarts > this.maxRestarts) {
        this.logger.error('[ABORT] Restart limit exceeded', {
          restarts,
          max_restarts: this.maxRestarts,
        });
        return { status: 'aborted', restarts };
      }

      this.logger.warn('[RESTART] Relaunching collector', {
        restarts,
        delay_ms: this.restartDelayMs,
      });
      if (await this.pause(this.restartDelayMs, signal)) {
        return { status: 'interrupted', restarts };
      }
    }
  }

  private async superviseChild(restarts: number, signal?: AbortSignal): Promise<ChildResult> {
    const child = this.launch();
    const queue = new LineQueue();
    const monitor = new LivenessMonitor(this.timeoutMs);

    this.logger.info('[RUN] Collector started', { pid: child.pid, restarts });
    const reading = this.pump(child, queue);

    try {
      return await this.watch(child, queue, monitor, signal);
    } catch (error) {
      this.logger.error('Supervision failed, restarting collector', {
        error: errorMessage(error),
      });
      await this.terminate(child);
      return 'restart';
    } finally {
      await Promise.race([reading, this.sleep(this.exitWaitMs)]);
    }
  }

  private async watch(
    child: ChildHandle,
    queue: LineQueue,
    monitor: LivenessMonitor,
    signal?: AbortSignal
  ): Promise<ChildResult> {
    for (;;) {
      if (signal?.aborted) {
        this.logger.warn('[INTERRUPT] Stopping collector', { pid: child.pid });
        child.kill('SIGKILL');
        await this.exitWithin(child, this.exitWaitMs);
        return 'interrupted';
      }

      const next = await queue.take(this.pollMs, signal);
      const now = this.clock();

      if (next.type === 'end') {
        return this.onStreamEnd(child, monitor);
      }

      if (next.type === 'line') {
        this.output.write(`${next.line}\n`);
        const event = this.classify(next.line);
        monitor.observe(event, now);
        if (event.kind === 'saved') {
          this.logger.debug('Item saved', { rows: event.rows });
        }
      }

      if (monitor.check(now) === 'timeout') {
        this.logger.warn('[TIMEOUT] No progress within the item timeout, killing collector', {
          pid: child.pid,
          timeout_ms: this.timeoutMs,
          elapsed_ms: monitor.elapsed(now),
        });
        await this.terminate(child);
        return 'restart';
      }
    }
  }

  private async onStreamEnd(child: ChildHandle, monitor: LivenessMonitor): Promise<ChildResult> {
    const wait = await this.exitWithin(child, this.exitWaitMs);

    if (wait.exited && wait.code === 0 && monitor.state === 'idle') {
      this.logger.info('[DONE] Collector completed the batch');
      return 'completed';
    }

    this.logger.warn('[EXIT] Collector stopped before completing', {
      exit_code: wait.exited ? wait.code : 'pending',
      state: monitor.state,
    });
    if (child.isRunning()) {
      await this.terminate(child);
    }
    return 'restart';
  }

  private async pump(child: ChildHandle, queue: LineQueue): Promise<void> {
    try {
      for await (const line of child.lines) {
        queue.push(line);
      }
    } catch (error) {
      this.logger.warn('Collector output stream failed', { error: errorMessage(error) });
    } finally {
      queue.close();
    }
  }

  /**
   * SIGTERM, then SIGKILL if the child outlives the grace period.
   */
  private async terminate(child: ChildHandle): Promise<void> {
    if (!child.isRunning()) {
      return;
    }

    child.kill('SIGTERM');
    const graceful = await this.exitWithin(child, this.graceMs);
    if (graceful.exited) {
      return;
    }

    this.logger.warn('Collector ignored SIGTERM, sending SIGKILL', { pid: child.pid });
    child.kill('SIGKILL');
    await this.exitWithin(child, this.exitWaitMs);
  }

  private async exitWithin(child: ChildHandle, ms: number): Promise<ExitWait> {
    const timedOut = this.sleep(ms).then((): ExitWait => ({ exited: false }));
    const exited = child.exited.then((code): ExitWait => ({ exited: true, code }));
    return Promise.race([exited, timedOut]);
  }

  /**
   * Waits `ms`, returning early with true if `signal` aborts.
   */
  private async pause(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (!signal) {
      await this.sleep(ms);
      return false;
    }
    if (signal.aborted) {
      return true;
    }

    let onAbort = (): void => {};
    const aborted = new Promise<void>((resolve) => {
      onAbort = () => resolve();
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      await Promise.race([this.sleep(ms), aborted]);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
    return signal.aborted;
  }
}
