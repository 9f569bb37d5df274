/**
 * @fileoverview Checkpointed batch over the work list.
 *
 * Walks the work list from the persisted position, collecting and writing
 * one artifact per item. Every item advances the checkpoint, whatever its
 * outcome, so a restarted process resumes right after the last item handled.
 *
 * @module @minutely/collector/orchestrator
 */

import type { Sleep, WorkItem, WorkItemSource } from '@minutely/contracts';
import { errorMessage, sleep as defaultSleep } from '@minutely/contracts';
import type { Logger } from '@minutely/logger';
import { createSilentLogger, startTimer } from '@minutely/logger';
import type { ArtifactStore } from './bar-store.js';
import type { CheckpointStore } from './checkpoint-store.js';
import type { ProgressReporter } from './progress.js';
import type { ItemCollector } from './range-fetcher.js';

export interface OrchestratorOptions {
  source: WorkItemSource;
  collector: ItemCollector;
  store: ArtifactStore;
  checkpoints: Pick<CheckpointStore, 'reconcile' | 'save'>;
  reporter: ProgressReporter;

  /** Display name lookup; failures fall back to no name */
  itemName?: (item: WorkItem) => Promise<string>;

  /** Pause after each collected item (default 150) */
  itemDelayMs?: number;

  sleep?: Sleep;
  logger?: Logger;
}

export interface RunSummary {
  total: number;
  startIndex: number;
  saved: number;
  skipped: number;
  empty: number;
  failed: number;
  rows: number;
}

type ItemOutcome =
  | { kind: 'skipped' }
  | { kind: 'saved'; rows: number }
  | { kind: 'empty' }
  | { kind: 'failed' };

export class Orchestrator {
  private readonly itemDelayMs: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(private readonly options: OrchestratorOptions) {
    this.itemDelayMs = options.itemDelayMs ?? 150;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Runs the batch to the end of the work list.
   *
   * @throws CheckpointError when the checkpoint cannot be persisted
   */
  async run(): Promise<RunSummary> {
    const { source, checkpoints, reporter } = this.options;
    const timer = startTimer();

    const fresh = await source.listItems();
    const { nextIndex, items } = await checkpoints.reconcile(fresh);
    const total = items.length;

    const summary: RunSummary = {
      total,
      startIndex: nextIndex,
      saved: 0,
      skipped: 0,
      empty: 0,
      failed: 0,
      rows: 0,
    };

    reporter.runStarted(total, nextIndex);
    this.logger.info('Batch started', { total, start_index: nextIndex });

    for (let index = nextIndex; index < total; index++) {
      const item = items[index];
      if (item === undefined) {
        break;
      }
      const name = await this.lookupName(item);
      const outcome = await this.processItem(index, total, item, name);

      switch (outcome.kind) {
        case 'skipped':
          summary.skipped++;
          break;
        case 'saved':
          summary.saved++;
          summary.rows += outcome.rows;
          break;
        case 'empty':
          summary.empty++;
          break;
        case 'failed':
          summary.failed++;
          break;
      }

      await checkpoints.save(index + 1, items);
      if (outcome.kind === 'skipped') {
        continue;
      }
      await this.sleep(this.itemDelayMs);
    }

    reporter.runFinished(summary.saved, summary.skipped, summary.empty, summary.failed);
    this.logger.info('Batch finished', { ...summary, duration_ms: timer.elapsed() });
    return summary;
  }

  /**
   * Skips, collects or fails one item. Nothing thrown here escapes the batch,
   * including a failed existence check.
   */
  private async processItem(
    index: number,
    total: number,
    item: WorkItem,
    name: string
  ): Promise<ItemOutcome> {
    const { collector, store, reporter } = this.options;
    const timer = startTimer();
    let started = false;

    try {
      if (await store.exists(item)) {
        reporter.itemSkipped(index, total, item, name);
        return { kind: 'skipped' };
      }

      reporter.itemStarted(index, total, item, name);
      started = true;

      const bars = await collector.collect(item);
      if (bars.length === 0) {
        reporter.itemEmpty();
        this.logger.info('No bars found', { item, duration_ms: timer.elapsed() });
        return { kind: 'empty' };
      }

      const filePath = await store.write(item, bars);
      reporter.itemSaved(bars.length);
      this.logger.info('Item collected', {
        item,
        rows: bars.length,
        path: filePath,
        duration_ms: timer.elapsed(),
      });
      return { kind: 'saved', rows: bars.length };
    } catch (error) {
      if (!started) {
        reporter.itemStarted(index, total, item, name);
      }
      reporter.itemFailed(errorMessage(error));
      this.logger.error('Item failed', { item, error, duration_ms: timer.elapsed() });
      return { kind: 'failed' };
    }
  }

  private async lookupName(item: WorkItem): Promise<string> {
    if (!this.options.itemName) {
      return '';
    }
    try {
      return (await this.options.itemName(item)).trim();
    } catch (error) {
      this.logger.debug('Name lookup failed', { item, error: errorMessage(error) });
      return '';
    }
  }
}
