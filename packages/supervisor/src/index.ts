/**
 * @minutely/supervisor
 *
 * Restarts a line-reporting batch process when it stalls or crashes.
 */

export { classifyLine, createLineClassifier, DEFAULT_PATTERNS } from './classifier.js';
export type { LineClassifier, LinePatterns, LivenessEvent } from './classifier.js';

export { LivenessMonitor } from './liveness.js';
export type { LivenessDecision, LivenessState } from './liveness.js';

export { LineQueue } from './line-queue.js';
export type { QueueItem } from './line-queue.js';

export { createExecaLauncher } from './child.js';
export type { ChildHandle, ChildLauncher, CommandSpec } from './child.js';

export { Supervisor } from './supervisor.js';
export type {
  OutputSink,
  SupervisorOptions,
  SupervisorOutcome,
  SupervisorStatus,
} from './supervisor.js';

export { loadConfig, splitCommand, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';

/** Process exit code for each outcome. */
export const EXIT_CODES = {
  completed: 0,
  aborted: 2,
  interrupted: 130,
} as const;
