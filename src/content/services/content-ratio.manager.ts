import { Logger } from '@nestjs/common';
import { ContentType } from '../../database/schema';
import { DAY_MS } from '../../common/utils/date.util';
import { sha256Hex } from '../../common/utils/text.util';
import {
  CONTENT_TYPES,
  RatioItem,
  SelectionMetrics,
  SelectionOutcome,
  TypeCounts,
  TypeRatios,
} from '../types/content.types';

export const DEFAULT_CONTENT_RATIOS: TypeRatios = {
  original: 0.65,
  curated: 0.25,
  syndicated: 0.1,
};

const TEMPORAL_SHARES = [0.4, 0.3, 0.2, 0.1];

export class ContentRatioConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContentRatioConfigError';
  }
}

/** Rounds .5 to the nearest even integer. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (Math.abs(diff - 0.5) < 1e-9) {
    return floor % 2 === 0 ? floor : floor + 1;
  }
  return Math.round(value);
}

function emptyCounts(): TypeCounts {
  return { original: 0, curated: 0, syndicated: 0 };
}

function byScoreDesc<T extends RatioItem>(items: T[]): T[] {
  // Array.prototype.sort is stable, so equal scores keep pool order
  return [...items].sort((a, b) => b.score - a.score);
}

export interface ContentRatioOptions {
  ratios?: TypeRatios;
  minItems?: number;
  maxItems?: number;
}

export class ContentRatioManager {
  private readonly logger = new Logger(ContentRatioManager.name);
  readonly targetRatios: TypeRatios;
  readonly minItems: number;
  readonly maxItems: number;

  constructor(options: ContentRatioOptions = {}) {
    this.targetRatios = { ...(options.ratios ?? DEFAULT_CONTENT_RATIOS) };
    this.minItems = options.minItems ?? 5;
    this.maxItems = options.maxItems ?? 15;

    const values = CONTENT_TYPES.map((type) => this.targetRatios[type]);
    if (values.some((value) => !Number.isFinite(value) || value < 0)) {
      throw new ContentRatioConfigError(
        'content ratios must be non-negative numbers',
      );
    }
    const sum = values.reduce((acc, value) => acc + value, 0);
    if (Math.abs(sum - 1) > 0.01) {
      throw new ContentRatioConfigError(
        `content ratios must sum to 1.0, got ${Number(sum.toFixed(4))}`,
      );
    }
  }

  calculateItemCounts(
    totalItems: number,
    ratios: TypeRatios = this.targetRatios,
  ): TypeCounts {
    const counts = emptyCounts();
    let remaining = totalItems;
    for (const type of CONTENT_TYPES) {
      counts[type] = roundHalfEven(totalItems * ratios[type]);
      remaining -= counts[type];
    }
    counts.original += remaining;

    if (counts.original < 1) {
      counts.original = 1;
      if (counts.syndicated > 0) {
        counts.syndicated -= 1;
      }
    }
    return counts;
  }

  selectContent<T extends RatioItem>(
    pool: T[],
    targetCount?: number,
    qualityThreshold = 0.5,
  ): [T[], SelectionOutcome] {
    return this.selectWithRatios(
      pool,
      this.targetRatios,
      targetCount,
      qualityThreshold,
    );
  }

  /**
   * Blends the configured ratios with per-type engagement (70/30), selects,
   * then applies topic diversity and the temporal mix.
   */
  optimizeContentMix<T extends RatioItem>(
    items: T[],
    engagement?: Partial<Record<ContentType, number>>,
    now: Date = new Date(),
  ): T[] {
    const ratios = engagement ? this.adjustRatiosByEngagement(
      engagement,
    ) : this.targetRatios;
    const [selected] = this.selectWithRatios(items, ratios);
    return this.applyTemporalDistribution(
      this.ensureTopicDiversity(selected),
      now,
    );
  }

  adjustRatiosByEngagement(
    engagement: Partial<Record<ContentType, number>>,
  ): TypeRatios {
    const total = CONTENT_TYPES.reduce(
      (sum, type) => sum + (engagement[type] ?? 0),
      0,
    );
    if (total === 0) {
      return { ...this.targetRatios };
    }

    const adjusted = emptyCounts();
    for (const type of CONTENT_TYPES) {
      const value = engagement[type];
      adjusted[type] =
        value == null
          ? this.targetRatios[type]
          : 0.7 * this.targetRatios[type] + 0.3 * (value / total);
    }
    const sum = CONTENT_TYPES.reduce((acc, type) => acc + adjusted[type], 0);
    return {
      original: adjusted.original / sum,
      curated: adjusted.curated / sum,
      syndicated: adjusted.syndicated / sum,
    };
  }

  ensureTopicDiversity<T extends RatioItem>(
    items: T[],
    minUniqueTags = 3,
  ): T[] {
    if (items.length <= minUniqueTags) {
      return items;
    }

    const seen = new Set<string>();
    const diverse: T[] = [];
    const rest: T[] = [];
    for (const item of items) {
      if (item.tags.length === 0) {
        rest.push(item);
        continue;
      }
      const introducesTag = item.tags.some((tag) => !seen.has(tag));
      if (introducesTag || seen.size < minUniqueTags) {
        diverse.push(item);
        item.tags.forEach((tag) => seen.add(tag));
      } else {
        rest.push(item);
      }
    }
    return [
      ...diverse,
      ...rest.slice(0, Math.max(0, items.length - diverse.length)),
    ];
  }

  applyTemporalDistribution<T extends RatioItem>(
    items: T[],
    now: Date = new Date(),
  ): T[] {
    if (items.length <= 3) {
      return items;
    }

    const buckets: T[][] = [[], [], [], []];
    for (const item of items) {
      buckets[this.ageBucket(item.publishedAt, now)]?.push(item);
    }

    const total = items.length;
    const result: T[] = [];
    buckets.forEach((bucket, index) => {
      result.push(
        ...bucket.slice(0, Math.floor(total * (TEMPORAL_SHARES[index] ?? 0)))
      );
    });

    const taken = new Set(result);
    const leftovers = byScoreDesc(
      buckets.flat().filter((item) => !taken.has(item)),
    );
    result.push(...leftovers.slice(0, total - result.length));
    return result;
  }

  contentHash(item: Pick<RatioItem, 'title' | 'summary'>): string {
    return sha256Hex(item.title + item.summary).slice(0, 16);
  }

  deduplicateContent<T extends RatioItem>(items: T[]): T[] {
    const seen = new Set<string>();
    return items.filter((item) => {
      const hash = this.contentHash(item);
      if (seen.has(hash)) {
        this.logger.debug(`duplicate content skipped: ${item.title}`);
        return false;
      }
      seen.add(hash);
      return true;
    });
  }

  private selectWithRatios<T extends RatioItem>(
    pool: T[],
    ratios: TypeRatios,
    targetCount?: number,
    qualityThreshold = 0.5,
  ): [T[], SelectionOutcome] {
    if (pool.length === 0) {
      return [[], { error: 'No content available' }];
    }

    let qualified = pool.filter((item) => item.score >= qualityThreshold);
    if (qualified.length === 0) {
      this.logger.warn(
        `no content meets quality threshold ${qualityThreshold}`,
      );
      qualified = pool.slice(0, this.minItems);
    }

    const byType: Record<ContentType, T[]> = {
      original: byScoreDesc(
        qualified.filter((item) => item.contentType === 'original'),
      ),
      curated: byScoreDesc(
        qualified.filter((item) => item.contentType === 'curated'),
      ),
      syndicated: byScoreDesc(
        qualified.filter((item) => item.contentType === 'syndicated'),
      ),
    };

    const target =
      targetCount ??
      Math.min(
        Math.max(this.minItems, Math.floor(qualified.length / 2)),
        this.maxItems,
      );
    const targetCounts = this.calculateItemCounts(target, ratios);

    // cursor per bucket: everything before it is already selected
    const taken = emptyCounts();
    const selected: T[] = [];
    const take = (type: ContentType, count: number): number => {
      const items = byType[type].slice(taken[type], taken[type] + count);
      selected.push(...items);
      taken[type] += items.length;
      return items.length;
    };

    for (const type of CONTENT_TYPES) {
      const want = targetCounts[type];
      let deficit = want - take(type, want);
      if (deficit <= 0) {
        continue;
      }
      this.logger.debug(`selection deficit: type=${type} missing=${deficit}`);
      for (const fallback of CONTENT_TYPES) {
        if (fallback === type || deficit <= 0) {
          continue;
        }
        deficit -= take(fallback, deficit);
      }
    }

    const ordered = byScoreDesc(selected);
    return [
      ordered,
      this.calculateMetrics(
        ordered,
        taken,
        targetCounts,
        ratios,
        qualified.length,
      ),
    ];
  }

  private calculateMetrics(
    selected: RatioItem[],
    actualCounts: TypeCounts,
    targetCounts: TypeCounts,
    ratios: TypeRatios,
    totalQualified: number,
  ): SelectionOutcome {
    const total = selected.length;
    if (total === 0) {
      return { total_selected: 0, ratios: {}, deviation: 1, quality: 0 };
    }

    const actualRatios: TypeRatios = {
      original: actualCounts.original / total,
      curated: actualCounts.curated / total,
      syndicated: actualCounts.syndicated / total,
    };
    const deviation = CONTENT_TYPES.reduce(
      (sum, type) => sum + Math.abs(actualRatios[type] - ratios[type]),
      0,
    );
    const readTime = selected.reduce(
      (sum, item) => sum + (item.readTime ?? 0),
      0,
    );

    const metrics: SelectionMetrics = {
      total_selected: total,
      total_qualified: totalQualified,
      target_counts: targetCounts,
      actual_counts: { ...actualCounts },
      target_ratios: { ...ratios },
      actual_ratios: actualRatios,
      deviation_from_target: deviation,
      average_quality_score: selected.reduce(
        (sum, item) => sum + item.score,
        0,
      ) / total,
      total_read_time: readTime || total * 3,
      has_code_examples: selected.some((item) => Boolean(item.hasCode)),
      has_visuals: selected.some((item) => Boolean(item.hasVisuals)),
    };
    return metrics;
  }

  private ageBucket(publishedAt: string | null, now: Date): number {
    if (!publishedAt) {
      return 2;
    }
    const published = new Date(publishedAt).getTime();
    if (Number.isNaN(published)) {
      return 2;
    }
    const ageDays = (now.getTime() - published) / DAY_MS;
    if (ageDays < 1) {
      return 0;
    }
    if (ageDays < 3) {
      return 1;
    }
    if (ageDays < 7) {
      return 2;
    }
    return 3;
  }
}

export function isSelectionMetrics(
  outcome: SelectionOutcome,
): outcome is SelectionMetrics {
  return 'deviation_from_target' in outcome;
}
