import { Logger } from '@nestjs/common';
import { ContentType } from '../../database/schema';
import { RatioItem } from '../types/content.types';
import {
  ContentRatioConfigError,
  ContentRatioManager,
  isSelectionMetrics,
  roundHalfEven,
} from './content-ratio.manager';

const NOW = new Date('2026-05-10T12:00:00.000Z');

function item(
  id: number,
  contentType: ContentType,
  score: number,
  extra: Partial<RatioItem> = {},
): RatioItem {
  return {
    id,
    title: `Item ${id}`,
    summary: `Summary ${id}`,
    contentType,
    score,
    publishedAt: null,
    tags: [],
    ...extra,
  };
}

function pool(counts: Record<ContentType, number>, score = 0.8): RatioItem[] {
  const out: RatioItem[] = [];
  let id = 1;
  (Object.keys(counts) as ContentType[]).forEach((type) => {
    for (let i = 0; i < counts[type]; i += 1) {
      out.push(item(id, type, score - i * 0.01));
      id += 1;
    }
  });
  return out;
}

describe('ContentRatioManager', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('rounds halves to even', () => {
    expect(roundHalfEven(6.5)).toBe(6);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
    expect(roundHalfEven(1.4)).toBe(1);
  });

  it('fails fast when ratios do not sum to one', () => {
    expect(
      () => new ContentRatioManager({
        ratios: { original: 0.5, curated: 0.3, syndicated: 0.1 },
      }),
    ).toThrow(ContentRatioConfigError);
    expect(
      () => new ContentRatioManager({
        ratios: { original: 0.655, curated: 0.25, syndicated: 0.1 },
      }),
    ).not.toThrow();
  });

  it('computes 7/2/1 for ten items with the default ratios', () => {
    expect(new ContentRatioManager().calculateItemCounts(10)).toEqual({
      original: 7,
      curated: 2,
      syndicated: 1,
    });
  });

  it('forces at least one original item', () => {
    const manager = new ContentRatioManager({
      ratios: { original: 0, curated: 0.5, syndicated: 0.5 },
    });
    expect(manager.calculateItemCounts(2)).toEqual({
      original: 1,
      curated: 1,
      syndicated: 0,
    });
  });

  it('hits the target mix exactly when every bucket is deep enough', () => {
    const manager = new ContentRatioManager();
    const [selected, metrics] = manager.selectContent(
      pool({ original: 8, curated: 8, syndicated: 4 }),
      10,
    );

    expect(selected).toHaveLength(10);
    expect(isSelectionMetrics(metrics)).toBe(true);
    if (isSelectionMetrics(metrics)) {
      expect(metrics.target_counts).toEqual({
        original: 7,
        curated: 2,
        syndicated: 1,
      });
      expect(metrics.actual_counts).toEqual({
        original: 7,
        curated: 2,
        syndicated: 1,
      });
      expect(metrics.deviation_from_target).toBeCloseTo(0, 10);
      expect(metrics.total_qualified).toBe(20);
      expect(metrics.total_read_time).toBe(30);
    }
  });

  it('returns an error outcome for an empty pool', () => {
    expect(new ContentRatioManager().selectContent([])).toEqual([
      [],
      { error: 'No content available' },
    ]);
  });

  it('falls back to the first min items when nothing meets the threshold', () => {
    const manager = new ContentRatioManager();
    const items = pool({ original: 4, curated: 4, syndicated: 2 });

    const [selected] = manager.selectContent(items, undefined, 1.1);

    expect(selected).toHaveLength(5);
    expect(
      selected.map((entry) => entry.id).sort((a, b) => Number(a) - Number(b)),
    ).toEqual([
      1, 2, 3, 4, 5,
    ]);
  });

  it('borrows a deficit from other buckets without duplicating items', () => {
    const manager = new ContentRatioManager();
    const items = pool({ original: 2, curated: 10, syndicated: 3 });

    const [selected, metrics] = manager.selectContent(items, 10);

    expect(selected).toHaveLength(10);
    expect(new Set(selected.map((entry) => entry.id)).size).toBe(10);
    if (isSelectionMetrics(metrics)) {
      expect(metrics.actual_counts).toEqual({
        original: 2,
        curated: 7,
        syndicated: 1,
      });
    }
  });

  it('never selects more than the target and orders by score', () => {
    const manager = new ContentRatioManager();
    const items = [
      item(1, 'syndicated', 0.95),
      item(2, 'original', 0.6),
      item(3, 'curated', 0.9),
      item(4, 'original', 0.7),
    ];

    // three slots split 2/1/0, so the syndicated item has no room
    const [selected] = manager.selectContent(items, 3);

    expect(selected.map((entry) => entry.id)).toEqual([3, 4, 2]);
  });

  it('derives the default target from the qualified pool', () => {
    const manager = new ContentRatioManager();
    const [selected] = manager.selectContent(
      pool({ original: 20, curated: 8, syndicated: 4 }),
    );

    // floor(32 / 2) = 16, capped at 15
    expect(selected).toHaveLength(15);
  });

  it('deduplicates on title and summary, first one wins, idempotently', () => {
    const manager = new ContentRatioManager();
    const items = [
      item(1, 'original', 0.9),
      { ...item(2, 'curated', 0.8), title: 'Item 1', summary: 'Summary 1' },
      item(3, 'curated', 0.7),
    ];

    const once = manager.deduplicateContent(items);
    expect(once.map((entry) => entry.id)).toEqual([1, 3]);
    expect(manager.deduplicateContent(once)).toEqual(once);
  });

  it('blends engagement into the ratios and renormalizes', () => {
    const manager = new ContentRatioManager();
    const ratios = manager.adjustRatiosByEngagement({
      original: 1,
      curated: 1,
      syndicated: 2,
    });

    expect(ratios.original).toBeCloseTo(0.7 * 0.65 + 0.3 * 0.25, 10);
    expect(ratios.curated).toBeCloseTo(0.7 * 0.25 + 0.3 * 0.25, 10);
    expect(ratios.syndicated).toBeCloseTo(0.7 * 0.1 + 0.3 * 0.5, 10);
    expect(manager.adjustRatiosByEngagement({ original: 0 })).toEqual(
      manager.targetRatios,
    );
  });

  it('prefers items that introduce unseen tags', () => {
    const manager = new ContentRatioManager();
    const items = [
      item(1, 'original', 0.9, { tags: ['a'] }),
      item(2, 'original', 0.9, { tags: ['b'] }),
      item(3, 'original', 0.9, { tags: ['c'] }),
      item(4, 'original', 0.9, { tags: ['a'] }),
      item(5, 'original', 0.9, { tags: ['d'] }),
    ];

    expect(
      manager.ensureTopicDiversity(items).map((entry) => entry.id),
    ).toEqual([
      1, 2, 3, 5, 4,
    ]);
  });

  it('balances fresh and older items 40/30/20/10', () => {
    const manager = new ContentRatioManager();
    const hoursAgo = (h: number) => new Date(
      NOW.getTime() - h * 3600 * 1000,
    ).toISOString();
    const items = [
      ...[1, 2, 3, 4, 5, 6].map((id) =>
        item(id, 'original', 0.9 - id / 100, { publishedAt: hoursAgo(2) }),
      ),
      item(7, 'original', 0.5, { publishedAt: hoursAgo(48) }),
      item(8, 'original', 0.5, { publishedAt: hoursAgo(100) }),
      item(9, 'original', 0.5, { publishedAt: hoursAgo(400) }),
      item(10, 'original', 0.4),
    ];

    const result = manager.applyTemporalDistribution(items, NOW);

    // quotas 4/3/2/1 then best-scoring leftovers fill the gaps
    expect(result.map((entry) => entry.id)).toEqual([
      1,
      2,
      3,
      4,
      7,
      8,
      10,
      9,
      5,
      6,
    ]);
  });
});
