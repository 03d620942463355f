/**
 * Hierarchical (JSON) source loader.
 * Entries come from the mapping's `recordsPath` when it has one; otherwise the
 * root array, the first array-valued top-level property, or the root object itself.
 */

import { FileLoadError } from '../errors.js';
import { isRecord, listLeafPaths, resolvePath } from '../parsing/paths.js';
import type { SchemaMapping, SourceFile, SourceKind } from '../types/models.js';
import { applyMapping, selectMapping } from './extract.js';
import type { HeuristicRule } from './heuristics.js';
import type { ISourceLoader, LoadOutcome, Sample, SourceDocument } from './ISourceLoader.js';

export class HierarchicalSourceLoader implements ISourceLoader {
  readonly family = 'hierarchical' as const;
  readonly mappableKinds: ReadonlySet<SourceKind> = new Set<SourceKind>([
    'content',
    'engagement',
    'audience',
    'followers',
  ]);

  constructor(private readonly rules?: readonly HeuristicRule[]) {}

  async read(file: SourceFile): Promise<SourceDocument> {
    let root: unknown;
    try {
      root = JSON.parse(await file.read());
    } catch (err) {
      throw new FileLoadError(file.name, err instanceof Error ? err.message : String(err));
    }

    if (!Array.isArray(root) && !isRecord(root)) {
      throw new FileLoadError(file.name, 'top-level value is neither an object nor an array');
    }

    const { entries, recordsPath } = locateEntries(root);
    return {
      file,
      family: this.family,
      fields: entries.length > 0 ? listLeafPaths(entries[0]) : [],
      entries,
      recordsPath,
      root,
    };
  }

  sample(document: SourceDocument, n: number): Sample {
    return {
      fileName: document.file.name,
      family: this.family,
      platform: document.file.platform,
      fields: document.fields,
      rows: document.entries.slice(0, n).map(flattenEntry),
      recordsPath: document.recordsPath,
    };
  }

  load(document: SourceDocument, mapping: SchemaMapping | null): LoadOutcome {
    const selected = selectMapping(document, mapping, this.mappableKinds, this.rules);
    let entries = document.entries;

    if (selected?.recordsPath && selected.recordsPath !== document.recordsPath) {
      const located = resolvePath(document.root, selected.recordsPath);
      entries = located.found && Array.isArray(located.value) ? located.value : [];
    }

    return applyMapping(document, entries, selected);
  }
}

function locateEntries(root: unknown): { entries: unknown[]; recordsPath: string | null } {
  if (Array.isArray(root)) {
    return { entries: root, recordsPath: null };
  }
  if (isRecord(root)) {
    for (const [key, value] of Object.entries(root)) {
      if (Array.isArray(value)) return { entries: value, recordsPath: key };
    }
  }
  return { entries: [root], recordsPath: null };
}

function flattenEntry(entry: unknown): Record<string, unknown> {
  const flat: Record<string, unknown> = {};
  for (const path of listLeafPaths(entry)) {
    const lookup = resolvePath(entry, path);
    if (lookup.found) flat[path] = lookup.value;
  }
  return flat;
}
