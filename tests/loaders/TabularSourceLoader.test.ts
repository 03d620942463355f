import { describe, it, expect } from 'vitest';
import { FileLoadError } from '../../src/errors.js';
import { TabularSourceLoader } from '../../src/loaders/TabularSourceLoader.js';
import { memorySourceFile } from '../../src/sources/SourceFile.js';
import type { Platform, SchemaMapping, SourceFile } from '../../src/types/models.js';

const loader = new TabularSourceLoader();

function csv(name: string, content: string, platform: Platform = 'linkedin'): SourceFile {
  return memorySourceFile({ name, platform, content });
}

function oracleMapping(overrides: Partial<SchemaMapping>): SchemaMapping {
  return {
    sourceKind: 'content',
    timeKeyPath: 'Day',
    mappings: { impressions: 'Views' },
    aggregationLevel: 'per-row',
    dateFormat: null,
    recordsPath: null,
    origin: 'oracle',
    ...overrides,
  };
}

const CONTENT_EXPORT = [
  'Content metrics,,,,',
  'Date,Impressions (total),Clicks (total),Reactions (total),Engagement rate (total)',
  '03/01/2024,"1,200",30,12,2.5%',
  '03/02/2024,900,20,9,0.021',
  'bad-date,100,1,1,1%',
  '03/04/2024,,,,',
].join('\n');

describe('TabularSourceLoader', () => {
  describe('read', () => {
    it('should skip preamble lines above the header', async () => {
      const doc = await loader.read(csv('acme_content_1.csv', CONTENT_EXPORT));
      expect(doc.fields).toEqual([
        'Date',
        'Impressions (total)',
        'Clicks (total)',
        'Reactions (total)',
        'Engagement rate (total)',
      ]);
      expect(doc.entries).toHaveLength(4);
      expect(doc.entries[0]).toEqual({
        Date: '03/01/2024',
        'Impressions (total)': '1,200',
        'Clicks (total)': '30',
        'Reactions (total)': '12',
        'Engagement rate (total)': '2.5%',
      });
    });

    it('should strip a byte order mark', async () => {
      const doc = await loader.read(csv('acme_followers.csv', '\uFEFFDate,Total followers\n03/01/2024,10'));
      expect(doc.fields).toEqual(['Date', 'Total followers']);
    });

    it('should throw FileLoadError when no header is found', async () => {
      await expect(loader.read(csv('notes.csv', 'hello\nworld'))).rejects.toBeInstanceOf(FileLoadError);
    });

    it('should throw FileLoadError when the file cannot be read', async () => {
      const broken: SourceFile = {
        ...csv('gone.csv', ''),
        read: async () => {
          throw new Error('ENOENT');
        },
      };
      await expect(loader.read(broken)).rejects.toThrow('Could not load gone.csv: ENOENT');
    });
  });

  describe('sample', () => {
    it('should return the first n rows and every field', async () => {
      const doc = await loader.read(csv('acme_content_1.csv', CONTENT_EXPORT));
      const sample = loader.sample(doc, 2);
      expect(sample.fileName).toBe('acme_content_1.csv');
      expect(sample.family).toBe('tabular');
      expect(sample.platform).toBe('linkedin');
      expect(sample.rows).toHaveLength(2);
      expect(sample.fields).toHaveLength(5);
    });
  });

  describe('load', () => {
    it('should fall back to filename heuristics without a mapping', async () => {
      const doc = await loader.read(csv('acme_content_1.csv', CONTENT_EXPORT));
      const outcome = loader.load(doc, null);

      expect(outcome.skip).toBeNull();
      expect(outcome.mapping?.origin).toBe('heuristic');
      expect(outcome.records).toEqual([
        {
          platform: 'linkedin',
          date: '2024-03-01',
          metrics: { impressions: 1200, clicks: 30, reactions: 12, engagementRate: 0.025 },
        },
        {
          platform: 'linkedin',
          date: '2024-03-02',
          metrics: { impressions: 900, clicks: 20, reactions: 9, engagementRate: 0.021 },
        },
      ]);
      // bad date, then a row with no metric values
      expect(outcome.droppedRows).toBe(2);
    });

    it('should trim heuristic mappings to the columns present', async () => {
      const doc = await loader.read(csv('acme_content_2.csv', 'Date,Impressions (total)\n03/01/2024,50'));
      const outcome = loader.load(doc, null);
      expect(outcome.mapping?.mappings).toEqual({ impressions: 'Impressions (total)' });
      expect(outcome.records[0].metrics).toEqual({ impressions: 50 });
    });

    it('should use a usable oracle mapping', async () => {
      const doc = await loader.read(csv('export.csv', 'Day,Views\n2024-03-01,5\n2024-03-02,7'));
      const outcome = loader.load(doc, oracleMapping({}));
      expect(outcome.mapping?.origin).toBe('oracle');
      expect(outcome.records.map((r) => r.metrics.impressions)).toEqual([5, 7]);
    });

    it('should ignore an oracle mapping of a kind the family cannot map', async () => {
      const doc = await loader.read(csv('export.csv', 'Day,Views\n2024-03-01,5'));
      const outcome = loader.load(doc, oracleMapping({ sourceKind: 'audience' }));
      expect(outcome.skip?.reason).toBe('unclassified');
      expect(outcome.records).toEqual([]);
    });

    it('should ignore an oracle mapping without a time key', async () => {
      const doc = await loader.read(csv('acme_followers.csv', 'Date,Total followers\n03/01/2024,10'));
      const outcome = loader.load(doc, oracleMapping({ timeKeyPath: null }));
      expect(outcome.mapping?.origin).toBe('heuristic');
      expect(outcome.records[0]).toEqual({ platform: 'linkedin', date: '2024-03-01', metrics: { followers: 10 } });
    });

    it('should skip as unclassified when nothing matches', async () => {
      const doc = await loader.read(csv('mystery.csv', 'A,B\n1,2'));
      const outcome = loader.load(doc, null);
      expect(outcome.skip).toEqual({
        file: 'mystery.csv',
        family: 'tabular',
        reason: 'unclassified',
        detail: 'No usable oracle mapping and no filename heuristic matched',
      });
    });

    it('should drop rows whose mapped column is missing', async () => {
      const doc = await loader.read(csv('export.csv', 'Day,Clicks\n2024-03-01,5\n2024-03-02,6'));
      const outcome = loader.load(doc, oracleMapping({}));
      expect(outcome.skip?.reason).toBe('no-valid-rows');
      expect(outcome.skip?.detail).toBe('All 2 rows were dropped (Row 1: missing field "Views")');
      expect(outcome.droppedRows).toBe(2);
    });

    it('should skip a document without data rows as empty', async () => {
      const doc = await loader.read(csv('acme_followers.csv', 'Date,Total followers\n'));
      const outcome = loader.load(doc, null);
      expect(outcome.skip?.reason).toBe('empty');
    });

    it('should date undated aggregate rows from the file name', async () => {
      const doc = await loader.read(
        csv(
          'Traffic report_2024-12-23-2025-12-23.csv',
          'Page,Page views,Unique visitors\n/home,"1,000",400\n/blog,500,200',
          'website'
        )
      );
      const outcome = loader.load(doc, null);
      expect(outcome.mapping?.aggregationLevel).toBe('pre-aggregated');
      expect(outcome.records).toEqual([
        { platform: 'website', date: '2025-12-23', metrics: { pageViews: 1000, uniqueVisitors: 400 } },
        { platform: 'website', date: '2025-12-23', metrics: { pageViews: 500, uniqueVisitors: 200 } },
      ]);
    });

    it('should read day-first website dates', async () => {
      const doc = await loader.read(
        csv('blog_table_api.csv', 'Action date,Post views,Unique visitors\n25/12/2024,10,4', 'website')
      );
      const outcome = loader.load(doc, null);
      expect(outcome.records).toEqual([
        { platform: 'website', date: '2024-12-25', metrics: { pageViews: 10, uniqueVisitors: 4 } },
      ]);
    });
  });
});
