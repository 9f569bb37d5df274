import type { ChildHandle, ChildLauncher } from '../src/child.js';
import { LineQueue } from '../src/line-queue.js';

/**
 * In-process stand-in for a child process. Lines and exit are driven by the
 * test; SIGTERM ends it unless `ignoreTerm` is set, SIGKILL always does.
 */
export class FakeChild implements ChildHandle {
  readonly pid = 4242;
  readonly signals: NodeJS.Signals[] = [];
  readonly exited: Promise<number | null>;
  readonly lines: AsyncIterable<string>;

  private readonly queue = new LineQueue();
  private running = true;
  private resolveExit: (code: number | null) => void = () => {};

  constructor(private readonly ignoreTerm = false) {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
    this.lines = { [Symbol.asyncIterator]: () => this.iterate() };
  }

  emit(...lines: string[]): this {
    for (const line of lines) {
      this.queue.push(line);
    }
    return this;
  }

  exit(code: number | null): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.queue.close();
    this.resolveExit(code);
  }

  isRunning(): boolean {
    return this.running;
  }

  kill(signal: NodeJS.Signals): void {
    this.signals.push(signal);
    if (signal === 'SIGKILL' || !this.ignoreTerm) {
      this.exit(null);
    }
  }

  private async *iterate(): AsyncGenerator<string> {
    for (;;) {
      const item = await this.queue.take();
      if (item.type !== 'line') {
        return;
      }
      yield item.line;
    }
  }
}

export type ChildScript = (child: FakeChild) => void;

/**
 * Launcher that plays one script per launch; the last script repeats.
 */
export function scriptedLauncher(...scripts: Array<{ script: ChildScript; ignoreTerm?: boolean }>): {
  launch: ChildLauncher;
  children: FakeChild[];
} {
  const children: FakeChild[] = [];
  const launch: ChildLauncher = () => {
    const spec = scripts[Math.min(children.length, scripts.length - 1)];
    const child = new FakeChild(spec?.ignoreTerm ?? false);
    children.push(child);
    spec?.script(child);
    return child;
  };
  return { launch, children };
}
