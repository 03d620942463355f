/**
 * The unified store: one record per platform per date.
 *
 * Counts from different sources landing on the same date are summed; rates are
 * averaged over the sources that reported them. Ingestion writes, then freezes;
 * analysis only ever sees the read-only view.
 */

import { StoreFrozenError } from '../errors.js';
import {
  CANONICAL_FIELDS,
  PLATFORMS,
  isCanonicalField,
  type CanonicalField,
  type Metrics,
  type Platform,
  type SkipReason,
  type TypedRecord,
} from '../types/models.js';

export interface UnifiedStoreView {
  readonly frozen: boolean;
  /** Records for one platform, oldest first. */
  recordsFor(platform: Platform): readonly TypedRecord[];
  /** Platforms with at least one record. */
  platforms(): Platform[];
  recordCount(platform?: Platform): number;
  dateRange(platform: Platform): { start: string; end: string } | null;
  readonly skipped: readonly SkipReason[];
  readonly droppedRows: number;
  readonly filesLoaded: number;
}

interface Bucket {
  metrics: Metrics;
  /** How many sources contributed each rate, for the running mean. */
  rateSamples: Partial<Record<CanonicalField, number>>;
}

export class UnifiedStore implements UnifiedStoreView {
  private readonly buckets = new Map<Platform, Map<string, Bucket>>();
  private readonly skips: SkipReason[] = [];
  private dropped = 0;
  private loaded = 0;
  private isFrozen = false;

  get frozen(): boolean {
    return this.isFrozen;
  }

  get skipped(): readonly SkipReason[] {
    return this.skips;
  }

  get droppedRows(): number {
    return this.dropped;
  }

  get filesLoaded(): number {
    return this.loaded;
  }

  // ── Writes ──

  merge(record: TypedRecord): void {
    this.assertWritable();
    let byDate = this.buckets.get(record.platform);
    if (!byDate) {
      byDate = new Map();
      this.buckets.set(record.platform, byDate);
    }

    const bucket = byDate.get(record.date) ?? { metrics: {}, rateSamples: {} };
    for (const [field, value] of Object.entries(record.metrics)) {
      if (!isCanonicalField(field) || value === undefined) continue;
      const existing = bucket.metrics[field];
      if (CANONICAL_FIELDS[field].kind === 'count') {
        bucket.metrics[field] = (existing ?? 0) + value;
      } else {
        const n = bucket.rateSamples[field] ?? 0;
        bucket.metrics[field] = existing === undefined ? value : (existing * n + value) / (n + 1);
        bucket.rateSamples[field] = n + 1;
      }
    }
    byDate.set(record.date, bucket);
  }

  mergeAll(records: Iterable<TypedRecord>): void {
    for (const record of records) this.merge(record);
  }

  addSkip(skip: SkipReason): void {
    this.assertWritable();
    this.skips.push(skip);
  }

  addDroppedRows(count: number): void {
    this.assertWritable();
    this.dropped += count;
  }

  markFileLoaded(): void {
    this.assertWritable();
    this.loaded += 1;
  }

  freeze(): this {
    this.isFrozen = true;
    return this;
  }

  // ── Reads ──

  recordsFor(platform: Platform): readonly TypedRecord[] {
    const byDate = this.buckets.get(platform);
    if (!byDate) return [];
    return [...byDate.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([date, bucket]) => Object.freeze({ platform, date, metrics: Object.freeze({ ...bucket.metrics }) }));
  }

  /** Dates that already hold a record, oldest first. */
  datesFor(platform: Platform): string[] {
    return [...(this.buckets.get(platform)?.keys() ?? [])].sort();
  }

  platforms(): Platform[] {
    return PLATFORMS.filter((p) => (this.buckets.get(p)?.size ?? 0) > 0);
  }

  recordCount(platform?: Platform): number {
    if (platform) return this.buckets.get(platform)?.size ?? 0;
    let total = 0;
    for (const byDate of this.buckets.values()) total += byDate.size;
    return total;
  }

  dateRange(platform: Platform): { start: string; end: string } | null {
    const dates = this.datesFor(platform);
    if (dates.length === 0) return null;
    return { start: dates[0], end: dates[dates.length - 1] };
  }

  private assertWritable(): void {
    if (this.isFrozen) throw new StoreFrozenError();
  }
}
