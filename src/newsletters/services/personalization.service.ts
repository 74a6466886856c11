import { Inject, Injectable, Logger } from '@nestjs/common';
import { Settings, SETTINGS } from '../../config/settings';
import {
  EditionArticle,
  EditionSection,
  Subscriber,
} from '../../database/schema';
import { computeAgeHours } from '../../common/utils/date.util';
import { containsAny } from '../../common/utils/text.util';
import { groupIntoSections } from '../utils/sections.util';

const PREFERRED_KEYWORD_BOOST = 10;

@Injectable()
export class PersonalizationService {
  private readonly logger = new Logger(PersonalizationService.name);

  constructor(@Inject(SETTINGS) private readonly settings: Settings) {}

  /**
   * Per-subscriber sections, or null when personalization does not apply
   * (disabled, or every article was filtered out).
   */
  personalize(
    subscriber: Pick<Subscriber, 'id' | 'preferences'>,
    sections: EditionSection[],
    now: Date = new Date(),
  ): EditionSection[] | null {
    if (!this.settings.enablePersonalization) {
      return null;
    }

    const prefs = subscriber.preferences;
    const blocked = prefs.blocked_keywords ?? [];
    const preferred = prefs.preferred_keywords ?? [];
    const articles = sections.flatMap((section) =>
      section.articles.map((article) => ({ article, section: section.name })),
    );

    const kept = articles.filter(
      ({ article }) => !containsAny(
        `${article.title} ${article.summary}`,
        blocked,
      ),
    );
    if (!kept.length) {
      this.logger.debug(
        `personalization skipped: subscriber=${subscriber.id} ` +
          `reason=all_blocked`,
      );
      return null;
    }

    const ranked = kept
      .map((entry) => ({
        ...entry,
        rank: this.rank(entry.article, preferred, now),
      }))
      .sort((a, b) => b.rank - a.rank)
      .slice(0, prefs.max_articles ?? kept.length);

    return groupIntoSections(
      ranked.map(({ article, section }) => ({ article, category: section })),
    );
  }

  private rank(
    article: EditionArticle,
    preferred: string[],
    now: Date,
  ): number {
    let rank = article.score;
    const text = [article.title, article.summary, ...article.tags]
      .join(' ')
      .toLowerCase();
    for (const keyword of preferred) {
      if (keyword && text.includes(keyword.toLowerCase())) {
        rank += PREFERRED_KEYWORD_BOOST;
      }
    }

    const ageHours = computeAgeHours(article.published_at, now);
    if (ageHours != null) {
      if (ageHours < 24) {
        rank += 20;
      } else if (ageHours < 72) {
        rank += 10;
      }
    }
    return rank;
  }
}
