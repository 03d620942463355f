/**
 * Domain models: the shapes every phase of a run agrees on.
 * Loader-, oracle- and orchestration-specific types live beside their modules.
 */

// ── Platforms & Sources ──

export type Platform = 'linkedin' | 'instagram' | 'website';

export const PLATFORMS: readonly Platform[] = ['linkedin', 'instagram', 'website'];

export type SourceFamily = 'tabular' | 'hierarchical';

export const SOURCE_FAMILIES: readonly SourceFamily[] = ['tabular', 'hierarchical'];

/**
 * What a source file contains. Closed on purpose: anything the oracle says
 * that is not listed here becomes `'unclassified'`.
 */
export type SourceKind =
  | 'content'
  | 'followers'
  | 'visitors'
  | 'traffic'
  | 'engagement'
  | 'audience'
  | 'other'
  | 'unclassified';

export const SOURCE_KINDS: readonly SourceKind[] = [
  'content',
  'followers',
  'visitors',
  'traffic',
  'engagement',
  'audience',
  'other',
  'unclassified',
];

export function toSourceKind(value: string): SourceKind {
  const normalized = value.trim().toLowerCase();
  return SOURCE_KINDS.find((kind) => kind === normalized) ?? 'unclassified';
}

/** A file handed over by discovery. The core never walks directories. */
export interface SourceFile {
  name: string;
  path: string;
  platform: Platform;
  modifiedAt: Date;
  read(): Promise<string>;
}

export interface FileFingerprint {
  path: string;
  modifiedAt: Date;
}

// ── Canonical Fields ──

export type CanonicalField =
  | 'impressions'
  | 'clicks'
  | 'reactions'
  | 'likes'
  | 'comments'
  | 'shares'
  | 'reach'
  | 'engagementRate'
  | 'followers'
  | 'pageViews'
  | 'uniqueVisitors'
  | 'bounceRate';

/** Counts are summed when two sources land on the same date; rates are averaged. */
export type FieldKind = 'count' | 'rate';

export interface CanonicalFieldDefinition {
  kind: FieldKind;
  description: string;
}

export const CANONICAL_FIELDS: Record<CanonicalField, CanonicalFieldDefinition> = {
  impressions: { kind: 'count', description: 'Times content was shown' },
  clicks: { kind: 'count', description: 'Clicks on content or links' },
  reactions: { kind: 'count', description: 'Reactions such as likes or applause' },
  likes: { kind: 'count', description: 'Likes on posts' },
  comments: { kind: 'count', description: 'Comments on posts' },
  shares: { kind: 'count', description: 'Shares or reposts' },
  reach: { kind: 'count', description: 'Unique accounts reached' },
  engagementRate: { kind: 'rate', description: 'Engagements divided by impressions, as a fraction' },
  followers: { kind: 'count', description: 'Follower count or follower gain' },
  pageViews: { kind: 'count', description: 'Website page views' },
  uniqueVisitors: { kind: 'count', description: 'Unique website visitors' },
  bounceRate: { kind: 'rate', description: 'Share of single-page sessions, as a fraction' },
};

export const PLATFORM_FIELDS: Record<Platform, readonly CanonicalField[]> = {
  linkedin: ['impressions', 'clicks', 'reactions', 'engagementRate', 'followers', 'pageViews', 'uniqueVisitors'],
  instagram: ['impressions', 'reach', 'likes', 'comments', 'shares', 'engagementRate', 'followers'],
  website: ['pageViews', 'uniqueVisitors', 'bounceRate'],
};

export function isCanonicalField(value: string): value is CanonicalField {
  return Object.prototype.hasOwnProperty.call(CANONICAL_FIELDS, value);
}

export type Metrics = Partial<Record<CanonicalField, number>>;

/** A dated, platform-tagged measurement. `date` is always `yyyy-MM-dd`. */
export interface TypedRecord {
  platform: Platform;
  date: string;
  metrics: Metrics;
}

// ── Schema Mapping ──

export type AggregationLevel = 'per-row' | 'pre-aggregated';

export interface SchemaMapping {
  sourceKind: SourceKind;
  /** Column name or dot-path to the date of each row/entry. */
  timeKeyPath: string | null;
  mappings: Partial<Record<CanonicalField, string>>;
  aggregationLevel: AggregationLevel;
  /** date-fns format tried before the built-in list, e.g. `dd/MM/yyyy`. */
  dateFormat: string | null;
  /** Hierarchical files only: dot-path to the array of entries. */
  recordsPath: string | null;
  origin: 'oracle' | 'heuristic';
}

export function freezeMapping(mapping: SchemaMapping): SchemaMapping {
  return Object.freeze({ ...mapping, mappings: Object.freeze({ ...mapping.mappings }) });
}

// ── Findings ──

export type Confidence = 'Low' | 'Medium' | 'High';

const CONFIDENCE_RANK: Record<Confidence, number> = { Low: 0, Medium: 1, High: 2 };

/** Negative when `a` is less confident than `b`. */
export function compareConfidence(a: Confidence, b: Confidence): number {
  return CONFIDENCE_RANK[a] - CONFIDENCE_RANK[b];
}

export interface Finding {
  readonly title: string;
  readonly summary: string;
  readonly confidence: Confidence;
  readonly evidence: readonly string[];
  readonly recommendation: string;
  /** The headline number behind the finding, e.g. "Bounce rate: 48.0%". */
  readonly metricBasis: string;
  readonly timeRange: string;
  /** Whether the prose came from the oracle or the statistical fallback. */
  readonly narrativeSource: 'oracle' | 'statistical';
}

export function createFinding(input: Finding): Finding {
  return Object.freeze({ ...input, evidence: Object.freeze([...input.evidence]) });
}

// ── Ingestion Outcomes ──

export type SkipCause = 'unclassified' | 'unreadable' | 'empty' | 'no-valid-rows';

/** Why a file contributed nothing to the store. */
export interface SkipReason {
  file: string;
  family: SourceFamily;
  reason: SkipCause;
  detail: string;
}
