/**
 * @fileoverview Durable batch position over a JSON file.
 *
 * The file holds `{ "nextIndex": n, "items": [...] }` and is rewritten in
 * full on every save. A checkpoint only applies to the exact work list it
 * was written for.
 *
 * @module @minutely/collector/checkpoint-store
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Checkpoint, WorkItem } from '@minutely/contracts';
import { CheckpointError, errorMessage } from '@minutely/contracts';
import type { Logger } from '@minutely/logger';
import { createSilentLogger } from '@minutely/logger';
import { writeFileAtomic } from './atomic-write.js';

const checkpointSchema = z.object({
  nextIndex: z.number().int(),
  items: z.array(z.string()),
});

const EMPTY_CHECKPOINT: Checkpoint = { nextIndex: 0, items: [] };

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function sameSequence(a: readonly WorkItem[], b: readonly WorkItem[]): boolean {
  return a.length === b.length && a.every((item, index) => item === b[index]);
}

/**
 * Loads, reconciles and saves the batch checkpoint.
 *
 * @example
 * ```typescript
 * const store = new CheckpointStore('checkpoint.json', logger);
 * const { nextIndex, items } = await store.reconcile(freshItems);
 * await store.save(nextIndex + 1, items);
 * ```
 */
export class CheckpointStore {
  constructor(
    readonly filePath: string,
    private readonly logger: Logger = createSilentLogger()
  ) {}

  /**
   * Reads the checkpoint. Any unusable file yields the empty checkpoint.
   */
  async load(): Promise<Checkpoint> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.warn('Checkpoint unreadable, starting fresh', {
          path: this.filePath,
          error: errorMessage(error),
        });
      }
      return { ...EMPTY_CHECKPOINT };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.warn('Checkpoint is not valid JSON, starting fresh', {
        path: this.filePath,
        error: errorMessage(error),
      });
      return { ...EMPTY_CHECKPOINT };
    }

    const result = checkpointSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn('Checkpoint has unexpected shape, starting fresh', {
        path: this.filePath,
        issues: result.error.issues.map((issue) => issue.message),
      });
      return { ...EMPTY_CHECKPOINT };
    }

    return result.data;
  }

  /**
   * Returns the position to resume from for `fresh`.
   *
   * A persisted list that differs from `fresh` in content or order is
   * discarded and the batch starts over at index 0.
   */
  async reconcile(fresh: WorkItem[]): Promise<Checkpoint> {
    const persisted = await this.load();

    if (!sameSequence(persisted.items, fresh)) {
      if (persisted.items.length > 0) {
        this.logger.info('Work list changed, checkpoint reset', {
          previous: persisted.items.length,
          current: fresh.length,
        });
      }
      return { nextIndex: 0, items: [...fresh] };
    }

    const nextIndex = Math.min(Math.max(persisted.nextIndex, 0), fresh.length);
    return { nextIndex, items: [...fresh] };
  }

  /**
   * Atomically replaces the checkpoint file.
   *
   * @throws CheckpointError if the file cannot be written
   */
  async save(nextIndex: number, items: WorkItem[]): Promise<void> {
    const checkpoint: Checkpoint = { nextIndex, items };
    try {
      await writeFileAtomic(this.filePath, JSON.stringify(checkpoint));
    } catch (error) {
      throw new CheckpointError(`Failed to save checkpoint: ${errorMessage(error)}`, {
        path: this.filePath,
        nextIndex,
      });
    }
  }
}
