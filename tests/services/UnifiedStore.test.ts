import { describe, it, expect, beforeEach } from 'vitest';
import { StoreFrozenError } from '../../src/errors.js';
import { UnifiedStore } from '../../src/services/UnifiedStore.js';

describe('UnifiedStore', () => {
  let store: UnifiedStore;

  beforeEach(() => {
    store = new UnifiedStore();
  });

  describe('merge', () => {
    it('should sum counts that land on the same date', () => {
      store.merge({ platform: 'website', date: '2024-03-01', metrics: { pageViews: 100, uniqueVisitors: 40 } });
      store.merge({ platform: 'website', date: '2024-03-01', metrics: { pageViews: 50 } });

      expect(store.recordsFor('website')).toEqual([
        { platform: 'website', date: '2024-03-01', metrics: { pageViews: 150, uniqueVisitors: 40 } },
      ]);
    });

    it('should average rates over the sources that reported them', () => {
      store.merge({ platform: 'website', date: '2024-03-01', metrics: { bounceRate: 0.4 } });
      store.merge({ platform: 'website', date: '2024-03-01', metrics: { pageViews: 10 } });
      store.merge({ platform: 'website', date: '2024-03-01', metrics: { bounceRate: 0.6 } });
      store.merge({ platform: 'website', date: '2024-03-01', metrics: { bounceRate: 0.8 } });

      const [record] = store.recordsFor('website');
      expect(record.metrics.bounceRate).toBeCloseTo(0.6);
      expect(record.metrics.pageViews).toBe(10);
    });

    it('should keep platforms apart', () => {
      store.merge({ platform: 'linkedin', date: '2024-03-01', metrics: { impressions: 5 } });
      store.merge({ platform: 'instagram', date: '2024-03-01', metrics: { impressions: 7 } });

      expect(store.recordsFor('linkedin')[0].metrics).toEqual({ impressions: 5 });
      expect(store.recordsFor('instagram')[0].metrics).toEqual({ impressions: 7 });
      expect(store.recordCount()).toBe(2);
    });
  });

  describe('reads', () => {
    beforeEach(() => {
      store.mergeAll([
        { platform: 'linkedin', date: '2024-03-03', metrics: { impressions: 3 } },
        { platform: 'linkedin', date: '2024-03-01', metrics: { impressions: 1 } },
        { platform: 'linkedin', date: '2024-03-02', metrics: { impressions: 2 } },
        { platform: 'website', date: '2024-02-10', metrics: { pageViews: 9 } },
      ]);
    });

    it('should return records oldest first', () => {
      expect(store.recordsFor('linkedin').map((r) => r.date)).toEqual(['2024-03-01', '2024-03-02', '2024-03-03']);
    });

    it('should return frozen records', () => {
      const [record] = store.recordsFor('linkedin');
      expect(Object.isFrozen(record)).toBe(true);
      expect(Object.isFrozen(record.metrics)).toBe(true);
    });

    it('should return an empty list for a platform with no records', () => {
      expect(store.recordsFor('instagram')).toEqual([]);
      expect(store.dateRange('instagram')).toBeNull();
    });

    it('should list platforms in a fixed order', () => {
      expect(store.platforms()).toEqual(['linkedin', 'website']);
    });

    it('should count records per platform and overall', () => {
      expect(store.recordCount('linkedin')).toBe(3);
      expect(store.recordCount('website')).toBe(1);
      expect(store.recordCount()).toBe(4);
    });

    it('should report the date range', () => {
      expect(store.dateRange('linkedin')).toEqual({ start: '2024-03-01', end: '2024-03-03' });
      expect(store.datesFor('website')).toEqual(['2024-02-10']);
    });
  });

  describe('bookkeeping', () => {
    it('should track skips, dropped rows and loaded files', () => {
      store.addSkip({ file: 'a.csv', family: 'tabular', reason: 'empty', detail: 'Document has no data rows' });
      store.addDroppedRows(3);
      store.addDroppedRows(2);
      store.markFileLoaded();

      expect(store.skipped).toEqual([
        { file: 'a.csv', family: 'tabular', reason: 'empty', detail: 'Document has no data rows' },
      ]);
      expect(store.droppedRows).toBe(5);
      expect(store.filesLoaded).toBe(1);
    });
  });

  describe('freeze', () => {
    it('should reject every write once frozen', () => {
      store.merge({ platform: 'linkedin', date: '2024-03-01', metrics: { impressions: 1 } });
      expect(store.freeze()).toBe(store);
      expect(store.frozen).toBe(true);

      expect(() => store.merge({ platform: 'linkedin', date: '2024-03-02', metrics: { impressions: 1 } })).toThrow(
        StoreFrozenError
      );
      expect(() => store.addDroppedRows(1)).toThrow(StoreFrozenError);
      expect(() => store.markFileLoaded()).toThrow(StoreFrozenError);
      expect(() =>
        store.addSkip({ file: 'b.csv', family: 'tabular', reason: 'empty', detail: 'x' })
      ).toThrow('Unified store is frozen; ingestion has already finished');
    });

    it('should keep reads working once frozen', () => {
      store.merge({ platform: 'linkedin', date: '2024-03-01', metrics: { impressions: 1 } });
      store.freeze();
      expect(store.recordCount('linkedin')).toBe(1);
    });
  });
});
