/**
 * Schema oracle: asks a language model which canonical metric each column
 * (or JSON path) of a sample holds.
 *
 * Every failure comes out as one of two errors. OracleUnavailableError means
 * the call never produced text; OracleInvalidResponseError means it did, but
 * no usable mapping could be recovered from it, even after truncation repair.
 */

import { z } from 'zod';
import { OracleInvalidResponseError, OracleUnavailableError } from '../errors.js';
import type { Sample } from '../loaders/ISourceLoader.js';
import { isDateFormat } from '../parsing/dates.js';
import { parseModelJson } from '../parsing/json.js';
import type { CompletionResponse, ICompletionProvider } from '../providers/ICompletionProvider.js';
import {
  CANONICAL_FIELDS,
  SOURCE_KINDS,
  freezeMapping,
  toSourceKind,
  type CanonicalField,
  type SchemaMapping,
} from '../types/models.js';

export const SCHEMA_ORACLE_CALLER = 'schema-oracle';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_TOKENS = 800;
const MAX_FIELDS = 60;
const MAX_VALUE_LENGTH = 120;

const SYSTEM_PROMPT = [
  'You map marketing analytics exports onto a fixed set of canonical metrics.',
  'Reply with one JSON object and nothing else.',
].join(' ');

const nullableString = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() !== '' ? v.trim() : null));

const OracleResponseSchema = z.object({
  sourceKind: z.string().default('unclassified'),
  timeKeyPath: nullableString,
  mappings: z.record(z.unknown()).default({}),
  aggregationLevel: z.string().nullish(),
  dateFormat: nullableString,
  recordsPath: nullableString,
});

export interface ISchemaOracle {
  /** Throws OracleUnavailableError or OracleInvalidResponseError. */
  discover(sample: Sample, candidateFields: readonly CanonicalField[]): Promise<SchemaMapping>;
}

export class SchemaOracle implements ISchemaOracle {
  private readonly timeoutMs: number;
  private readonly maxTokens: number;

  constructor(
    private readonly completions: ICompletionProvider,
    opts?: { timeoutMs?: number; maxTokens?: number }
  ) {
    this.timeoutMs = opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxTokens = opts?.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  async discover(sample: Sample, candidateFields: readonly CanonicalField[]): Promise<SchemaMapping> {
    if (!this.completions.available) {
      throw new OracleUnavailableError('No completion provider configured', { file: sample.fileName });
    }

    let response: CompletionResponse;
    try {
      response = await this.completions.complete({
        systemPrompt: SYSTEM_PROMPT,
        userPrompt: buildDiscoveryPrompt(sample, candidateFields),
        maxTokens: this.maxTokens,
        timeoutMs: this.timeoutMs,
        json: true,
        caller: SCHEMA_ORACLE_CALLER,
      });
    } catch (err) {
      if (err instanceof OracleUnavailableError) throw err;
      throw new OracleUnavailableError(err instanceof Error ? err.message : String(err), {
        file: sample.fileName,
      });
    }

    const truncated = response.finishReason === 'length';
    const parsed = parseModelJson(response.text, truncated);
    if (parsed === undefined) {
      throw new OracleInvalidResponseError(
        truncated ? 'Truncated response could not be repaired' : 'Response is not valid JSON',
        { file: sample.fileName }
      );
    }

    const result = OracleResponseSchema.safeParse(parsed);
    if (!result.success) {
      throw new OracleInvalidResponseError('Response does not have the mapping shape', {
        file: sample.fileName,
        issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }

    return toMapping(result.data, candidateFields);
  }
}

function toMapping(
  data: z.infer<typeof OracleResponseSchema>,
  candidateFields: readonly CanonicalField[]
): SchemaMapping {
  const mappings: SchemaMapping['mappings'] = {};
  for (const [field, path] of Object.entries(data.mappings)) {
    const candidate = candidateFields.find((c) => c === field);
    if (candidate && typeof path === 'string' && path.trim() !== '') {
      mappings[candidate] = path.trim();
    }
  }

  return freezeMapping({
    sourceKind: toSourceKind(data.sourceKind),
    timeKeyPath: data.timeKeyPath,
    mappings,
    aggregationLevel: isPreAggregated(data.aggregationLevel) ? 'pre-aggregated' : 'per-row',
    // Models often answer in moment-style tokens (`YYYY-MM-DD`) that date-fns rejects.
    dateFormat: data.dateFormat !== null && isDateFormat(data.dateFormat) ? data.dateFormat : null,
    recordsPath: data.recordsPath,
    origin: 'oracle',
  });
}

function isPreAggregated(level: string | null | undefined): boolean {
  if (!level) return false;
  const normalized = level.trim().toLowerCase().replace(/[\s_]+/g, '-');
  return normalized === 'pre-aggregated' || normalized === 'aggregate' || normalized === 'aggregated';
}

// ── Prompt ──

export function buildDiscoveryPrompt(sample: Sample, candidateFields: readonly CanonicalField[]): string {
  const fields = sample.fields.slice(0, MAX_FIELDS);
  const omitted = sample.fields.length - fields.length;
  const rows = sample.rows.map((row) =>
    Object.fromEntries(
      Object.entries(row)
        .slice(0, MAX_FIELDS)
        .map(([key, value]) => [key, truncateValue(value)])
    )
  );
  const candidates = candidateFields.map((f) => `- ${f}: ${CANONICAL_FIELDS[f].description}`);
  const kinds = SOURCE_KINDS.filter((k) => k !== 'unclassified').join(', ');

  return [
    `File: ${sample.fileName}`,
    `Format: ${sample.family === 'tabular' ? 'CSV' : 'JSON'}`,
    `Platform: ${sample.platform}`,
    ...(sample.recordsPath ? [`Entries found under: ${sample.recordsPath}`] : []),
    '',
    `Fields${omitted > 0 ? ` (first ${fields.length}, ${omitted} more omitted)` : ''}:`,
    fields.join(' | '),
    '',
    `First ${rows.length} rows:`,
    ...rows.map((row) => JSON.stringify(row)),
    '',
    'Canonical fields:',
    ...candidates,
    '',
    'Return JSON with exactly these keys:',
    `- sourceKind: one of ${kinds}`,
    '- timeKeyPath: the field holding each row\'s date, or null',
    '- mappings: object from canonical field name to source field (dot paths for nested JSON); only fields you are sure of',
    '- aggregationLevel: "per-row" for one row per date, "pre-aggregated" for period totals',
    '- dateFormat: the date pattern in date-fns tokens (e.g. "MM/dd/yyyy"), or null',
    '- recordsPath: for JSON, the dot path to the array of entries, or null',
  ].join('\n');
}

function truncateValue(value: unknown): string {
  const text = typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
  return text.length > MAX_VALUE_LENGTH ? `${text.slice(0, MAX_VALUE_LENGTH)}…` : text;
}
