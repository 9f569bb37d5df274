/**
 * @fileoverview Launching the supervised child with merged output.
 *
 * @module @minutely/supervisor/child
 */

import { createInterface } from 'node:readline';
import { execa } from 'execa';
import type { ExecaReturnValue } from 'execa';

/**
 * A running child process as the supervisor sees it.
 */
export interface ChildHandle {
  readonly pid: number | undefined;

  /** stdout and stderr interleaved, one line at a time, ending at stream close */
  readonly lines: AsyncIterable<string>;

  /** Exit code, or null when the child died from a signal or never started */
  readonly exited: Promise<number | null>;

  isRunning(): boolean;
  kill(signal: NodeJS.Signals): void;
}

export type ChildLauncher = () => ChildHandle;

export interface CommandSpec {
  command: string;
  args: readonly string[];
  cwd?: string;
  env?: Record<string, string>;
}

function exitCodeOf(result: ExecaReturnValue): number | null {
  if (result.signal !== undefined || typeof result.exitCode !== 'number') {
    return null;
  }
  return result.exitCode;
}

async function* noLines(): AsyncGenerator<string> {
  // A child without a merged stream produces no output
}

/**
 * Launches `spec` through execa with stdout and stderr merged.
 *
 * @example
 * ```typescript
 * const launch = createExecaLauncher({
 *   command: process.execPath,
 *   args: ['--import', 'tsx', 'packages/collector/bin/collect.ts'],
 * });
 * const child = launch();
 * for await (const line of child.lines) console.log(line);
 * ```
 */
export function createExecaLauncher(spec: CommandSpec): ChildLauncher {
  return () => {
    const subprocess = execa(spec.command, [...spec.args], {
      all: true,
      buffer: false,
      reject: false,
      stdin: 'ignore',
      cwd: spec.cwd,
      env: spec.env,
      windowsHide: true,
    });

    let running = true;
    const exited = subprocess.then((result) => {
      running = false;
      return exitCodeOf(result);
    });

    const lines: AsyncIterable<string> = subprocess.all
      ? createInterface({ input: subprocess.all, crlfDelay: Infinity })
      : noLines();

    return {
      pid: subprocess.pid,
      lines,
      exited,
      isRunning: () => running,
      kill: (signal) => {
        subprocess.kill(signal);
      },
    };
  };
}
