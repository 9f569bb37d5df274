/**
 * @fileoverview Market data types and provider contracts.
 *
 * Defines the data model shared by the collector and its providers: work
 * items, minute bars, checkpoints and the chunk-oriented provider
 * capability. All types are pure data structures with no I/O.
 *
 * @module @minutely/contracts/market
 */

/**
 * Opaque identifier for one unit of collection, e.g. a normalized
 * instrument code such as `'A005930'`. Equality is by string value.
 */
export type WorkItem = string;

/**
 * A single OHLCV bar as returned by the upstream provider.
 *
 * @invariant date is an integer of the form YYYYMMDD
 * @invariant time is an integer of the form HHMM (time of day)
 * @invariant (date, time) identifies the bar within one work item
 *
 * @example
 * ```typescript
 * const bar: Bar = {
 *   date: 20250115,
 *   time: 901,
 *   open: 71200,
 *   high: 71300,
 *   low: 71100,
 *   close: 71250,
 *   volume: 48213
 * };
 * ```
 */
export interface Bar {
  /** Trading date as YYYYMMDD */
  date: number;

  /** Time of day as HHMM (bar close) */
  time: number;

  /** Opening price for the period */
  open: number;

  /** Highest price during the period */
  high: number;

  /** Lowest price during the period */
  low: number;

  /** Closing price for the period */
  close: number;

  /** Traded volume during the period */
  volume: number;
}

/**
 * Persisted resumption state of a batch.
 *
 * @invariant 0 <= nextIndex <= items.length
 * @invariant items is the snapshot taken when the batch started
 */
export interface Checkpoint {
  /** Index of the next unprocessed item */
  nextIndex: number;

  /** Ordered work list this checkpoint belongs to */
  items: WorkItem[];
}

/**
 * Remaining-quota signal reported by the provider.
 *
 * When `remaining` is zero or less, callers should wait `waitMs` before the
 * next request.
 */
export interface QuotaStatus {
  /** Requests still allowed in the provider's current quota window */
  remaining: number;

  /** Milliseconds until the provider's quota window refills */
  waitMs: number;
}

/**
 * Capability the collector requires from an upstream data provider.
 *
 * The provider may silently answer a minute-bar request with coarser
 * (daily) bars instead of failing; callers must check granularity
 * themselves. Only `requestChunk` is mandatory.
 *
 * @example
 * ```typescript
 * const provider: ChunkProvider = {
 *   name: 'fixture',
 *   async requestChunk(item, from, to) {
 *     return [];
 *   }
 * };
 * ```
 */
export interface ChunkProvider {
  /** Short provider name used in logs and errors */
  readonly name: string;

  /**
   * Requests one-minute bars for an inclusive date range.
   *
   * @param item - Work item identifier
   * @param fromYmd - First date, YYYYMMDD
   * @param toYmd - Last date, YYYYMMDD
   * @returns Bars in any order; possibly empty
   */
  requestChunk(item: WorkItem, fromYmd: number, toYmd: number): Promise<Bar[]>;

  /**
   * Best-effort remaining-quota probe. May throw; callers must tolerate it.
   */
  remainingQuota?(): Promise<QuotaStatus>;

  /**
   * Whether the provider knows the item as a tradable instrument.
   */
  isValidItem?(item: WorkItem): Promise<boolean>;

  /**
   * Human-readable display name for the item.
   */
  itemName?(item: WorkItem): Promise<string>;
}

/**
 * Produces the ordered work list for a batch.
 *
 * @invariant the returned list is deduplicated and deterministically ordered
 */
export interface WorkItemSource {
  listItems(): Promise<WorkItem[]>;
}
