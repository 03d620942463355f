/**
 * Ingestion pipeline: every source family's files → one frozen UnifiedStore.
 *
 * Per file: read, look up the mapping by fingerprint, ask the oracle on a miss,
 * load. Oracle failures fall through to the loader's filename heuristics and
 * file failures become skip reasons, so no single file can abort a run.
 */

import type { AggregatePolicy } from '../config.js';
import { FileLoadError, PipelineFatalError, isOracleError } from '../errors.js';
import type { ISourceLoader, LoadOutcome, SourceDocument } from '../loaders/ISourceLoader.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ISchemaCache } from '../repositories/ISchemaCache.js';
import { fingerprintOf } from '../sources/SourceFile.js';
import {
  CANONICAL_FIELDS,
  PLATFORM_FIELDS,
  SOURCE_FAMILIES,
  isCanonicalField,
  type Metrics,
  type SchemaMapping,
  type SourceFamily,
  type SourceFile,
  type TypedRecord,
} from '../types/models.js';
import type { ISchemaOracle } from './SchemaOracle.js';
import { UnifiedStore } from './UnifiedStore.js';

const DEFAULT_SAMPLE_ROWS = 5;

export type FileSets = Partial<Record<SourceFamily, SourceFile[]>>;

export interface FamilySummary {
  family: SourceFamily;
  filesSeen: number;
  filesLoaded: number;
  filesSkipped: number;
  /** Per-row records merged straight into the store. */
  recordsMerged: number;
  droppedRows: number;
  /** Pre-aggregated records, merged once every family has run. */
  aggregateRecords: TypedRecord[];
}

export class IngestionPipeline {
  private readonly loaders = new Map<SourceFamily, ISourceLoader>();
  private readonly sampleRows: number;
  private readonly aggregatePolicy: AggregatePolicy;

  constructor(
    loaders: readonly ISourceLoader[],
    private readonly cache: ISchemaCache,
    private readonly oracle: ISchemaOracle,
    private readonly logger: ILogProvider,
    opts?: { sampleRows?: number; aggregatePolicy?: AggregatePolicy }
  ) {
    for (const loader of loaders) this.loaders.set(loader.family, loader);
    this.sampleRows = opts?.sampleRows ?? DEFAULT_SAMPLE_ROWS;
    this.aggregatePolicy = opts?.aggregatePolicy ?? 'single-day';
  }

  async run(fileSets: FileSets): Promise<UnifiedStore> {
    const totalFiles = SOURCE_FAMILIES.reduce((n, family) => n + (fileSets[family]?.length ?? 0), 0);
    if (totalFiles === 0) {
      throw new PipelineFatalError('No source files to ingest');
    }

    const store = new UnifiedStore();
    const aggregates: TypedRecord[] = [];

    for (const family of SOURCE_FAMILIES) {
      const files = fileSets[family] ?? [];
      if (files.length === 0) continue;
      const summary = await this.runFamily(family, files, store);
      aggregates.push(...summary.aggregateRecords);
    }

    mergeAggregates(store, aggregates, this.aggregatePolicy);

    this.logger.info('Ingestion complete', {
      files: totalFiles,
      filesLoaded: store.filesLoaded,
      records: store.recordCount(),
      skipped: store.skipped.length,
      droppedRows: store.droppedRows,
    });

    return store.freeze();
  }

  /** Load one family's files into `store`. Touches only this family's loader, the cache and the store. */
  async runFamily(family: SourceFamily, files: readonly SourceFile[], store: UnifiedStore): Promise<FamilySummary> {
    const summary: FamilySummary = {
      family,
      filesSeen: files.length,
      filesLoaded: 0,
      filesSkipped: 0,
      recordsMerged: 0,
      droppedRows: 0,
      aggregateRecords: [],
    };

    const loader = this.loaders.get(family);
    if (!loader) {
      for (const file of files) {
        store.addSkip({ file: file.name, family, reason: 'unreadable', detail: `No loader for ${family} files` });
      }
      summary.filesSkipped = files.length;
      this.logger.warn('No loader registered for source family', { family, files: files.length });
      return summary;
    }

    for (const file of files) {
      let document: SourceDocument;
      try {
        document = await loader.read(file);
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        if (!(err instanceof FileLoadError)) {
          this.logger.error('Unexpected failure reading file', { file: file.name, family, error: detail });
        } else {
          this.logger.warn('Skipping unreadable file', { file: file.name, family, error: detail });
        }
        store.addSkip({ file: file.name, family, reason: 'unreadable', detail });
        summary.filesSkipped++;
        continue;
      }

      const mapping = await this.mappingFor(file, document, loader);
      let outcome: LoadOutcome;
      try {
        outcome = loader.load(document, mapping);
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        this.logger.error('Unexpected failure loading file', { file: file.name, family, error: detail });
        store.addSkip({ file: file.name, family, reason: 'unreadable', detail });
        summary.filesSkipped++;
        continue;
      }

      store.addDroppedRows(outcome.droppedRows);
      summary.droppedRows += outcome.droppedRows;

      if (outcome.skip) {
        store.addSkip(outcome.skip);
        summary.filesSkipped++;
        this.logger.warn('Skipping file', { ...outcome.skip });
        continue;
      }

      store.markFileLoaded();
      summary.filesLoaded++;
      if (outcome.mapping?.aggregationLevel === 'pre-aggregated') {
        summary.aggregateRecords.push(...outcome.records);
      } else {
        store.mergeAll(outcome.records);
        summary.recordsMerged += outcome.records.length;
      }

      this.logger.info('Loaded file', {
        file: file.name,
        family,
        platform: file.platform,
        records: outcome.records.length,
        droppedRows: outcome.droppedRows,
        origin: outcome.mapping?.origin,
        sourceKind: outcome.mapping?.sourceKind,
      });
    }

    return summary;
  }

  /** Cached mapping, or a fresh oracle discovery; null sends the loader to its heuristics. */
  private async mappingFor(
    file: SourceFile,
    document: SourceDocument,
    loader: ISourceLoader
  ): Promise<SchemaMapping | null> {
    const fingerprint = fingerprintOf(file);
    const cached = this.cache.get(fingerprint);
    if (cached) {
      this.logger.debug('Schema cache hit', { file: file.name });
      return cached;
    }

    try {
      const mapping = await this.oracle.discover(
        loader.sample(document, this.sampleRows),
        PLATFORM_FIELDS[file.platform]
      );
      this.cache.put(fingerprint, mapping);
      return mapping;
    } catch (err) {
      if (!isOracleError(err)) throw err;
      this.logger.warn('Schema discovery failed, falling back to heuristics', {
        file: file.name,
        code: err.code,
        error: err.message,
      });
      return null;
    }
  }
}

/**
 * Merge pre-aggregated records under `policy`.
 *
 * `single-day` puts each record on its own date. `distribute-evenly` spreads
 * its counts over the dates the platform already has; rates stay on the
 * record's own date. A platform with no daily records gets single-day.
 */
export function mergeAggregates(store: UnifiedStore, records: readonly TypedRecord[], policy: AggregatePolicy): void {
  if (policy === 'single-day') {
    store.mergeAll(records);
    return;
  }

  const datesByPlatform = new Map<TypedRecord['platform'], string[]>();
  for (const record of records) {
    if (!datesByPlatform.has(record.platform)) {
      datesByPlatform.set(record.platform, store.datesFor(record.platform));
    }
  }

  for (const record of records) {
    const dates = datesByPlatform.get(record.platform) ?? [];
    if (dates.length === 0) {
      store.merge(record);
      continue;
    }

    const share: Metrics = {};
    const rates: Metrics = {};
    for (const [field, value] of Object.entries(record.metrics)) {
      if (!isCanonicalField(field) || value === undefined) continue;
      if (CANONICAL_FIELDS[field].kind === 'count') {
        share[field] = value / dates.length;
      } else {
        rates[field] = value;
      }
    }

    if (Object.keys(share).length > 0) {
      for (const date of dates) store.merge({ platform: record.platform, date, metrics: share });
    }
    if (Object.keys(rates).length > 0) {
      store.merge({ platform: record.platform, date: record.date, metrics: rates });
    }
  }
}
