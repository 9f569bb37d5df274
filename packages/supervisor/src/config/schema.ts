/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import type { EnvMapping } from '@minutely/contracts';
import { loggingConfigSchema, loggingEnvMapping } from '@minutely/logger';

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

/**
 * Supervisor configuration schema
 */
export const configSchema = z.object({
  logging: loggingConfigSchema,

  supervisor: z
    .object({
      timeoutMs: positiveInt.default(240_000),
      restartDelayMs: nonNegativeInt.default(15_000),
      maxRestarts: nonNegativeInt.default(0),
      pollMs: positiveInt.default(1000),
      graceMs: nonNegativeInt.default(1000),
      exitWaitMs: positiveInt.default(3000),
      /** Whitespace-separated command line; unset runs the collector */
      command: z.string().trim().min(1).optional(),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mappings
 */
export const envMapping: EnvMapping = {
  ...loggingEnvMapping,

  SUPERVISOR_TIMEOUT_MS: 'supervisor.timeoutMs',
  SUPERVISOR_RESTART_DELAY_MS: 'supervisor.restartDelayMs',
  SUPERVISOR_MAX_RESTARTS: 'supervisor.maxRestarts',
  SUPERVISOR_POLL_MS: 'supervisor.pollMs',
  SUPERVISOR_GRACE_MS: 'supervisor.graceMs',
  SUPERVISOR_EXIT_WAIT_MS: 'supervisor.exitWaitMs',
  SUPERVISOR_COMMAND: 'supervisor.command',
};
