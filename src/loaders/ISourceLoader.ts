/**
 * Source loader interface: one implementation per source family.
 */

import type {
  SchemaMapping,
  SkipReason,
  SourceFamily,
  SourceFile,
  SourceKind,
  TypedRecord,
} from '../types/models.js';

/** A parsed file, before any mapping is applied. */
export interface SourceDocument {
  file: SourceFile;
  family: SourceFamily;
  /** Column names (tabular) or leaf paths of the first entry (hierarchical). */
  fields: string[];
  /** Data rows (tabular) or entries (hierarchical). */
  entries: unknown[];
  /** Where the entries were found inside a hierarchical root; null for tabular files. */
  recordsPath: string | null;
  /** The parsed root value; null for tabular files. */
  root: unknown;
}

/** What the oracle gets to see of a document. */
export interface Sample {
  fileName: string;
  family: SourceFamily;
  platform: SourceFile['platform'];
  fields: string[];
  rows: Array<Record<string, unknown>>;
  recordsPath: string | null;
}

export interface LoadOutcome {
  records: TypedRecord[];
  /** Set when the file contributed nothing. */
  skip: SkipReason | null;
  droppedRows: number;
  /** The mapping actually applied, oracle or heuristic. */
  mapping: SchemaMapping | null;
}

export interface ISourceLoader {
  readonly family: SourceFamily;

  /** Source kinds this family knows how to turn into records. */
  readonly mappableKinds: ReadonlySet<SourceKind>;

  /** Parse a file. Throws FileLoadError on I/O or structural failure. */
  read(file: SourceFile): Promise<SourceDocument>;

  sample(document: SourceDocument, n: number): Sample;

  /** Apply a mapping (or, when it is null or unusable, the filename heuristics). */
  load(document: SourceDocument, mapping: SchemaMapping | null): LoadOutcome;
}
