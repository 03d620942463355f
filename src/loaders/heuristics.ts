/**
 * Filename heuristics: the mapping of last resort when the oracle is
 * unavailable or answers with something unusable. Patterns match
 * case-insensitively anywhere in the file name; the first rule wins.
 */

import type { Platform, SchemaMapping, SourceFamily } from '../types/models.js';

export interface HeuristicRule {
  family: SourceFamily;
  platform: Platform;
  pattern: string;
  mapping: Omit<SchemaMapping, 'origin'>;
}

export const HEURISTIC_RULES: readonly HeuristicRule[] = [
  // ── LinkedIn page exports ──
  {
    family: 'tabular',
    platform: 'linkedin',
    pattern: '_content',
    mapping: {
      sourceKind: 'content',
      timeKeyPath: 'Date',
      mappings: {
        impressions: 'Impressions (total)',
        clicks: 'Clicks (total)',
        reactions: 'Reactions (total)',
        engagementRate: 'Engagement rate (total)',
      },
      aggregationLevel: 'per-row',
      dateFormat: 'MM/dd/yyyy',
      recordsPath: null,
    },
  },
  {
    family: 'tabular',
    platform: 'linkedin',
    pattern: '_followers',
    mapping: {
      sourceKind: 'followers',
      timeKeyPath: 'Date',
      mappings: { followers: 'Total followers' },
      aggregationLevel: 'per-row',
      dateFormat: 'MM/dd/yyyy',
      recordsPath: null,
    },
  },
  {
    family: 'tabular',
    platform: 'linkedin',
    pattern: '_visitors',
    mapping: {
      sourceKind: 'visitors',
      timeKeyPath: 'Date',
      mappings: {
        pageViews: 'Total page views (total)',
        uniqueVisitors: 'Total unique visitors (total)',
      },
      aggregationLevel: 'per-row',
      dateFormat: 'MM/dd/yyyy',
      recordsPath: null,
    },
  },

  // ── Website analytics ──
  {
    family: 'tabular',
    platform: 'website',
    pattern: 'blog_table',
    mapping: {
      sourceKind: 'content',
      timeKeyPath: 'Action date',
      mappings: { pageViews: 'Post views', uniqueVisitors: 'Unique visitors' },
      aggregationLevel: 'per-row',
      dateFormat: 'dd/MM/yyyy',
      recordsPath: null,
    },
  },
  {
    family: 'tabular',
    platform: 'website',
    pattern: 'traffic report',
    mapping: {
      sourceKind: 'traffic',
      timeKeyPath: null,
      mappings: { pageViews: 'Page views', uniqueVisitors: 'Unique visitors' },
      aggregationLevel: 'pre-aggregated',
      dateFormat: null,
      recordsPath: null,
    },
  },

  // ── Instagram ──
  {
    family: 'tabular',
    platform: 'instagram',
    pattern: 'posts',
    mapping: {
      sourceKind: 'content',
      timeKeyPath: 'Publish time',
      mappings: {
        impressions: 'Impressions',
        reach: 'Reach',
        likes: 'Likes',
        comments: 'Comments',
        shares: 'Shares',
      },
      aggregationLevel: 'per-row',
      dateFormat: 'MM/dd/yyyy HH:mm',
      recordsPath: null,
    },
  },
  {
    family: 'hierarchical',
    platform: 'instagram',
    pattern: 'insights',
    mapping: {
      sourceKind: 'engagement',
      timeKeyPath: 'date',
      mappings: {
        impressions: 'metrics.impressions',
        reach: 'metrics.reach',
        likes: 'metrics.likes',
        comments: 'metrics.comments',
        shares: 'metrics.shares',
      },
      aggregationLevel: 'per-row',
      dateFormat: null,
      recordsPath: null,
    },
  },
  {
    family: 'hierarchical',
    platform: 'instagram',
    pattern: 'media',
    mapping: {
      sourceKind: 'content',
      timeKeyPath: 'timestamp',
      mappings: { likes: 'like_count', comments: 'comments_count' },
      aggregationLevel: 'per-row',
      dateFormat: null,
      recordsPath: null,
    },
  },
  {
    family: 'hierarchical',
    platform: 'instagram',
    pattern: 'follower',
    mapping: {
      sourceKind: 'followers',
      timeKeyPath: 'end_time',
      mappings: { followers: 'value' },
      aggregationLevel: 'per-row',
      dateFormat: null,
      recordsPath: null,
    },
  },
];

export function findHeuristicRules(
  family: SourceFamily,
  platform: Platform,
  fileName: string,
  rules: readonly HeuristicRule[] = HEURISTIC_RULES
): HeuristicRule[] {
  const name = fileName.toLowerCase();
  return rules.filter(
    (rule) => rule.family === family && rule.platform === platform && name.includes(rule.pattern)
  );
}
