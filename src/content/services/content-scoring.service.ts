import { Injectable } from '@nestjs/common';
import { SourceConfig } from '../../database/schema';
import { computeAgeHours } from '../../common/utils/date.util';
import { ParsedItem } from '../types/content.types';

const BASE_SCORE = 40;
const MAX_KEYWORD_BONUS = 25;

@Injectable()
export class ContentScoringService {
  /** Relevance score on a 0..100 scale. */
  scoreItem(
    item: ParsedItem,
    config: SourceConfig,
    now: Date = new Date(),
  ): number {
    let score = BASE_SCORE;

    if (item.author) {
      score += 5;
      if ((config.trusted_authors ?? []).includes(item.author)) {
        score += 10;
      }
    }

    score += this.recencyBonus(computeAgeHours(item.publishedAt, now));
    score += this.engagementBonus(item.engagement);
    score += this.commentBonus(item.comments);

    const keywords = config.keywords ?? [];
    if (keywords.length) {
      const text = `${item.title} ${item.content}`.toLowerCase();
      const matches = keywords
        .filter((kw) => text.includes(kw.toLowerCase()))
        .length;
      score += Math.min(matches * 5, MAX_KEYWORD_BONUS);
    }

    return Math.min(score, 100);
  }

  filterByConfig<T extends ParsedItem & { score: number }>(
    items: T[],
    config: SourceConfig,
  ): T[] {
    let out = items;
    const text = (item: T) => `${item.title}${item.content}`.toLowerCase();

    const keywords = (config.keywords ?? []).map((kw) => kw.toLowerCase());
    if (keywords.length) {
      out = out.filter((item) =>
        keywords.some((kw) => text(item).includes(kw)),
      );
    }
    const exclude = (
      config.exclude_keywords ?? []
    ).map((kw) => kw.toLowerCase());
    if (exclude.length) {
      out = out.filter(
        (item) => !exclude.some((kw) => text(item).includes(kw)),
      );
    }
    if (config.min_score) {
      const minScore = config.min_score;
      out = out.filter((item) => item.score >= minScore);
    }
    if (config.limit) {
      out = out.slice(0, config.limit);
    }
    return out;
  }

  private recencyBonus(ageHours: number | null): number {
    if (ageHours == null) {
      return 0;
    }
    if (ageHours < 6) {
      return 25;
    }
    if (ageHours < 24) {
      return 20;
    }
    if (ageHours < 72) {
      return 10;
    }
    if (ageHours < 168) {
      return 5;
    }
    return 0;
  }

  private engagementBonus(engagement?: number): number {
    if (engagement == null) {
      return 0;
    }
    if (engagement > 1000) {
      return 20;
    }
    if (engagement > 500) {
      return 15;
    }
    if (engagement > 100) {
      return 10;
    }
    if (engagement > 50) {
      return 5;
    }
    return 0;
  }

  private commentBonus(comments?: number): number {
    if (comments == null) {
      return 0;
    }
    if (comments > 100) {
      return 10;
    }
    return comments > 50 ? 5 : 0;
  }
}
