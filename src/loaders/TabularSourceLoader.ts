/**
 * Tabular (CSV) source loader.
 * Platform exports often carry a line or two of preamble above the real header;
 * the header is the first of the opening lines with at least two non-empty cells.
 */

import { parse } from 'csv-parse/sync';
import { FileLoadError } from '../errors.js';
import { isRecord } from '../parsing/paths.js';
import type { SchemaMapping, SourceFile, SourceKind } from '../types/models.js';
import { applyMapping, selectMapping } from './extract.js';
import type { HeuristicRule } from './heuristics.js';
import type { ISourceLoader, LoadOutcome, Sample, SourceDocument } from './ISourceLoader.js';

const HEADER_SEARCH_LINES = 5;
const MIN_HEADER_CELLS = 2;

export class TabularSourceLoader implements ISourceLoader {
  readonly family = 'tabular' as const;
  readonly mappableKinds: ReadonlySet<SourceKind> = new Set<SourceKind>([
    'content',
    'followers',
    'visitors',
    'traffic',
  ]);

  constructor(private readonly rules?: readonly HeuristicRule[]) {}

  async read(file: SourceFile): Promise<SourceDocument> {
    let text: string;
    try {
      text = await file.read();
    } catch (err) {
      throw new FileLoadError(file.name, err instanceof Error ? err.message : String(err));
    }

    const lines = parseLines(file.name, text);
    const headerIndex = lines
      .slice(0, HEADER_SEARCH_LINES)
      .findIndex((cells) => cells.filter((c) => c !== '').length >= MIN_HEADER_CELLS);
    if (headerIndex === -1) {
      throw new FileLoadError(file.name, `no header row in the first ${HEADER_SEARCH_LINES} lines`);
    }

    const header = lines[headerIndex];
    const entries: Array<Record<string, string>> = [];
    for (const cells of lines.slice(headerIndex + 1)) {
      if (cells.every((c) => c === '')) continue;
      const row: Record<string, string> = {};
      header.forEach((column, i) => {
        if (column !== '') row[column] = cells[i] ?? '';
      });
      entries.push(row);
    }

    return {
      file,
      family: this.family,
      fields: header.filter((c) => c !== ''),
      entries,
      recordsPath: null,
      root: null,
    };
  }

  sample(document: SourceDocument, n: number): Sample {
    return {
      fileName: document.file.name,
      family: this.family,
      platform: document.file.platform,
      fields: document.fields,
      rows: document.entries.slice(0, n).filter(isRecord),
      recordsPath: null,
    };
  }

  load(document: SourceDocument, mapping: SchemaMapping | null): LoadOutcome {
    const selected = selectMapping(document, mapping, this.mappableKinds, this.rules);
    return applyMapping(document, document.entries, selected);
  }
}

function parseLines(fileName: string, text: string): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
    });
  } catch (err) {
    throw new FileLoadError(fileName, err instanceof Error ? err.message : String(err));
  }

  if (!Array.isArray(parsed)) {
    throw new FileLoadError(fileName, 'CSV parser returned no rows');
  }
  return parsed.map((line: unknown) => (Array.isArray(line) ? line.map((cell: unknown) => String(cell)) : []));
}
