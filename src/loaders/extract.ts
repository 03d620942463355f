/**
 * Shared mapping selection and row extraction for every source family.
 */

import { RowExtractionError } from '../errors.js';
import { normalizeDate } from '../parsing/dates.js';
import { parseMetricValue } from '../parsing/numbers.js';
import { resolvePath, splitPath } from '../parsing/paths.js';
import {
  freezeMapping,
  isCanonicalField,
  type Metrics,
  type SchemaMapping,
  type SourceFile,
  type SourceKind,
  type TypedRecord,
} from '../types/models.js';
import { findHeuristicRules, type HeuristicRule } from './heuristics.js';
import type { LoadOutcome, SourceDocument } from './ISourceLoader.js';

/** An oracle mapping is only trusted when it can actually produce dated records. */
export function isUsableMapping(mapping: SchemaMapping, mappableKinds: ReadonlySet<SourceKind>): boolean {
  if (!mappableKinds.has(mapping.sourceKind)) return false;
  if (Object.keys(mapping.mappings).length === 0) return false;
  return mapping.timeKeyPath !== null || mapping.aggregationLevel === 'pre-aggregated';
}

/**
 * The oracle's mapping when usable, else the first heuristic rule whose time
 * key exists in the document, trimmed to the metric fields that exist too.
 */
export function selectMapping(
  document: SourceDocument,
  candidate: SchemaMapping | null,
  mappableKinds: ReadonlySet<SourceKind>,
  rules?: readonly HeuristicRule[]
): SchemaMapping | null {
  if (candidate && isUsableMapping(candidate, mappableKinds)) {
    return candidate;
  }

  for (const rule of findHeuristicRules(document.family, document.file.platform, document.file.name, rules)) {
    const { timeKeyPath } = rule.mapping;
    if (timeKeyPath !== null && !hasField(document, timeKeyPath)) continue;

    const mappings: SchemaMapping['mappings'] = {};
    for (const [field, path] of Object.entries(rule.mapping.mappings)) {
      if (isCanonicalField(field) && path !== undefined && hasField(document, path)) {
        mappings[field] = path;
      }
    }
    if (Object.keys(mappings).length === 0) continue;

    return freezeMapping({ ...rule.mapping, mappings, origin: 'heuristic' });
  }

  return null;
}

function hasField(document: SourceDocument, path: string): boolean {
  if (document.fields.includes(path)) return true;
  const normalized = splitPath(path).join('.');
  return document.fields.some((field) => splitPath(field).join('.') === normalized);
}

/** Apply a mapping to a document's entries. Rows that fail extraction are counted, not thrown. */
export function applyMapping(
  document: SourceDocument,
  entries: unknown[],
  mapping: SchemaMapping | null
): LoadOutcome {
  const file = document.file.name;
  const family = document.family;

  if (!mapping) {
    return {
      records: [],
      skip: {
        file,
        family,
        reason: 'unclassified',
        detail: 'No usable oracle mapping and no filename heuristic matched',
      },
      droppedRows: 0,
      mapping: null,
    };
  }

  if (entries.length === 0) {
    return {
      records: [],
      skip: { file, family, reason: 'empty', detail: 'Document has no data rows' },
      droppedRows: 0,
      mapping,
    };
  }

  const fallbackDate = mapping.timeKeyPath === null ? periodEndDate(document.file) : null;
  const records: TypedRecord[] = [];
  let droppedRows = 0;
  let firstError: string | null = null;

  for (const [index, entry] of entries.entries()) {
    try {
      records.push(extractRecord(document.file, entry, index + 1, mapping, fallbackDate));
    } catch (err) {
      if (!(err instanceof RowExtractionError)) throw err;
      droppedRows++;
      firstError ??= err.message;
    }
  }

  if (records.length === 0) {
    return {
      records,
      skip: {
        file,
        family,
        reason: 'no-valid-rows',
        detail: `All ${droppedRows} rows were dropped (${firstError ?? 'no detail'})`,
      },
      droppedRows,
      mapping,
    };
  }

  return { records, skip: null, droppedRows, mapping };
}

function extractRecord(
  file: SourceFile,
  entry: unknown,
  row: number,
  mapping: SchemaMapping,
  fallbackDate: string | null
): TypedRecord {
  let date: string | null = fallbackDate;
  if (mapping.timeKeyPath !== null) {
    const raw = resolvePath(entry, mapping.timeKeyPath);
    if (!raw.found) {
      throw new RowExtractionError(row, `missing time key "${mapping.timeKeyPath}"`);
    }
    date = normalizeDate(raw.value, mapping.dateFormat);
  }
  if (date === null) {
    throw new RowExtractionError(row, 'unparseable date');
  }

  const metrics: Metrics = {};
  for (const [field, path] of Object.entries(mapping.mappings)) {
    if (!isCanonicalField(field) || path === undefined) continue;
    const raw = resolvePath(entry, path);
    if (!raw.found) {
      throw new RowExtractionError(row, `missing field "${path}"`);
    }
    const value = parseMetricValue(raw.value);
    if (value !== undefined) metrics[field] = value;
  }

  if (Object.keys(metrics).length === 0) {
    throw new RowExtractionError(row, 'no metric values');
  }

  return { platform: file.platform, date, metrics };
}

/**
 * Date for undated aggregate rows: the last `yyyy-MM-dd` in the file name
 * (exports are named after their period), else the file's modification date.
 */
export function periodEndDate(file: SourceFile): string | null {
  const matches = file.name.match(/\d{4}-\d{2}-\d{2}/g) ?? [];
  for (let i = matches.length - 1; i >= 0; i--) {
    const date = normalizeDate(matches[i], 'yyyy-MM-dd');
    if (date) return date;
  }
  return Number.isNaN(file.modifiedAt.getTime()) ? null : file.modifiedAt.toISOString().slice(0, 10);
}
