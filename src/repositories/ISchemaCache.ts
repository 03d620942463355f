/**
 * Schema mapping cache interface.
 * Keyed by file fingerprint, so a file that changes on disk is rediscovered.
 */

import type { FileFingerprint, SchemaMapping } from '../types/models.js';

export interface ISchemaCache {
  get(fingerprint: FileFingerprint): SchemaMapping | undefined;

  put(fingerprint: FileFingerprint, mapping: SchemaMapping): void;

  /** Number of cached mappings. */
  readonly size: number;

  clear(): void;
}
