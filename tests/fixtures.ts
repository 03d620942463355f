/**
 * Test data builders. Everything is generated; nothing is read from disk.
 */

import { addDays, format, parseISO } from 'date-fns';
import { memorySourceFile } from '../src/sources/SourceFile.js';
import { UnifiedStore } from '../src/services/UnifiedStore.js';
import type { Metrics, Platform, SourceFile } from '../src/types/models.js';

/** `count` consecutive `yyyy-MM-dd` dates starting at `start`. */
export function isoDates(start: string, count: number): string[] {
  const first = parseISO(start);
  return Array.from({ length: count }, (_, i) => format(addDays(first, i), 'yyyy-MM-dd'));
}

/**
 * A LinkedIn content export: one preamble line, then one row per day.
 * Impressions are 1000 + i, clicks 10 + i % 7, reactions 20 + i % 5, engagement 3.0%.
 */
export function linkedinContentCsv(start: string, days: number): string {
  const first = parseISO(start);
  const lines = [
    'Content metrics,,,,',
    'Date,Impressions (total),Clicks (total),Reactions (total),Engagement rate (total)',
  ];
  for (let i = 0; i < days; i++) {
    const date = format(addDays(first, i), 'MM/dd/yyyy');
    const impressions = (1000 + i).toLocaleString('en-US');
    lines.push(`${date},"${impressions}",${10 + (i % 7)},${20 + (i % 5)},3.0%`);
  }
  return lines.join('\n');
}

export function linkedinContentFile(start = '2024-01-01', days = 365, modifiedAt = new Date('2025-01-01T00:00:00Z')): SourceFile {
  return memorySourceFile({
    name: 'acme_content_1700000000000.csv',
    platform: 'linkedin',
    content: linkedinContentCsv(start, days),
    path: '/data/linkedin/acme_content_1700000000000.csv',
    modifiedAt,
  });
}

/** An unfrozen store holding one record per day for `platform`. */
export function seededStore(
  platform: Platform,
  start: string,
  days: number,
  metrics: (index: number) => Metrics
): UnifiedStore {
  const store = new UnifiedStore();
  isoDates(start, days).forEach((date, i) => store.merge({ platform, date, metrics: metrics(i) }));
  return store;
}

/** Add another platform's daily records to an unfrozen store. */
export function seedPlatform(
  store: UnifiedStore,
  platform: Platform,
  start: string,
  days: number,
  metrics: (index: number) => Metrics
): UnifiedStore {
  isoDates(start, days).forEach((date, i) => store.merge({ platform, date, metrics: metrics(i) }));
  return store;
}
