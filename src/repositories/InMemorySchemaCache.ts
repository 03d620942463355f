/**
 * Process-lifetime schema cache.
 * Unbounded by default; with `maxEntries` it evicts the least recently used mapping.
 */

import { createHash } from 'node:crypto';
import type { ISchemaCache } from './ISchemaCache.js';
import { freezeMapping, type FileFingerprint, type SchemaMapping } from '../types/models.js';

export function fingerprintKey(fingerprint: FileFingerprint): string {
  return createHash('sha256')
    .update(`${fingerprint.path}\0${fingerprint.modifiedAt.toISOString()}`)
    .digest('hex');
}

export class InMemorySchemaCache implements ISchemaCache {
  // Map keeps insertion order; re-inserting on read makes the first key the LRU one.
  private readonly entries = new Map<string, SchemaMapping>();
  private readonly maxEntries: number | undefined;

  constructor(opts?: { maxEntries?: number }) {
    if (opts?.maxEntries !== undefined && opts.maxEntries < 1) {
      throw new RangeError('maxEntries must be at least 1');
    }
    this.maxEntries = opts?.maxEntries;
  }

  get size(): number {
    return this.entries.size;
  }

  get(fingerprint: FileFingerprint): SchemaMapping | undefined {
    const key = fingerprintKey(fingerprint);
    const mapping = this.entries.get(key);
    if (mapping && this.maxEntries !== undefined) {
      this.entries.delete(key);
      this.entries.set(key, mapping);
    }
    return mapping;
  }

  put(fingerprint: FileFingerprint, mapping: SchemaMapping): void {
    const key = fingerprintKey(fingerprint);
    this.entries.delete(key);
    this.entries.set(key, freezeMapping(mapping));

    if (this.maxEntries !== undefined) {
      while (this.entries.size > this.maxEntries) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
      }
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
