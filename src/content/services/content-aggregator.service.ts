import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { and, desc, eq, gte, inArray, lt, SQL } from 'drizzle-orm';
import { Settings, SETTINGS } from '../../config/settings';
import { DatabaseService } from '../../database/database.service';
import {
  ContentItem,
  contentItems,
  ContentSource,
  contentSources,
} from '../../database/schema';
import { daysAgo, hoursAgo } from '../../common/utils/date.util';
import { titleSimilarity } from '../../common/utils/similarity.util';
import {
  estimateReadTimeMinutes,
  sha256Hex,
} from '../../common/utils/text.util';
import { matchNiche } from '../config/niches';
import {
  AggregationResult,
  FeedResult,
  ParsedItem,
  RecentContentQuery,
} from '../types/content.types';
import { ContentScoringService } from './content-scoring.service';
import { HackerNewsService } from './hacker-news.service';
import { RedditService } from './reddit.service';
import { RssFeedService } from './rss-feed.service';

export interface FetchAllOptions {
  newsletterId?: number;
  sourceIds?: number[];
  force?: boolean;
}

const DEFAULT_FEED_LIMIT = 50;

export function needsFetch(
  source: ContentSource,
  now: Date = new Date(),
): boolean {
  if (!source.active) {
    return false;
  }
  if (
    source.disabledUntil &&
    new Date(source.disabledUntil).getTime() > now.getTime()
  ) {
    return false;
  }
  if (!source.lastFetched) {
    return true;
  }
  const elapsedMs = now.getTime() - new Date(source.lastFetched).getTime();
  return elapsedMs >= source.fetchFrequencyMinutes * 60 * 1000;
}

@Injectable()
export class ContentAggregatorService {
  private readonly logger = new Logger(ContentAggregatorService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly rssFeed: RssFeedService,
    private readonly hackerNews: HackerNewsService,
    private readonly reddit: RedditService,
    private readonly scoring: ContentScoringService,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  async fetchAll(
    options: FetchAllOptions = {},
    now: Date = new Date(),
  ): Promise<AggregationResult> {
    const sources = this.getSources(options, now);
    if (!sources.length) {
      this.logger.log('content fetch skipped: no sources due');
      return { sources: 0, items: 0, errors: [], details: {} };
    }

    const startedAt = Date.now();
    const results = await Promise.all(
      sources.map(async (source) => ({
        source,
        outcome: await this.fetchSource(source, now),
      })),
    );

    const errors: string[] = [];
    const details: Record<number, number> = {};
    let total = 0;
    for (const { source, outcome } of results) {
      if (typeof outcome === 'string') {
        errors.push(`error fetching ${source.name}: ${outcome}`);
        continue;
      }
      details[source.id] = outcome;
      total += outcome;
    }

    this.logger.log(
      `content fetch done: sources=${sources.length} items=${total} ` +
        `errors=${errors.length} elapsedMs=${Date.now() - startedAt}`,
    );
    return { sources: sources.length, items: total, errors, details };
  }

  getRecentContent(
    query: RecentContentQuery = {},
    now: Date = new Date(),
  ): ContentItem[] {
    const { hours = 24, minScore = 0, limit = 100, newsletterId } = query;
    const { db } = this.database;

    const filters: SQL[] = [
      gte(contentItems.fetchedAt, hoursAgo(hours, now)),
      gte(contentItems.score, minScore),
    ];
    if (newsletterId != null) {
      filters.push(
        inArray(
          contentItems.sourceId,
          db
            .select({ id: contentSources.id })
            .from(contentSources)
            .where(eq(contentSources.newsletterId, newsletterId)),
        ),
      );
    }

    return db
      .select()
      .from(contentItems)
      .where(and(...filters))
      .orderBy(desc(contentItems.score), desc(contentItems.publishedAt))
      .limit(limit)
      .all();
  }

  getItem(id: number): ContentItem {
    const item = this.database.db
      .select()
      .from(contentItems)
      .where(eq(contentItems.id, id))
      .get();
    if (!item) {
      throw new NotFoundException(`content item ${id} not found`);
    }
    return item;
  }

  /**
   * Drops repeated URLs and near-identical titles, keeping the highest score.
   */
  deduplicateContent<T extends { url: string; title: string; score: number }>(
    items: T[],
    threshold = 0.8,
  ): T[] {
    const sorted = [...items].sort((a, b) => b.score - a.score);
    const seenUrls = new Set<string>();
    const seenTitles: string[] = [];
    const unique: T[] = [];

    for (const item of sorted) {
      if (seenUrls.has(item.url)) {
        continue;
      }
      if (
        seenTitles.some(
          (title) => titleSimilarity(item.title, title) > threshold,
        )
      ) {
        continue;
      }
      unique.push(item);
      seenUrls.add(item.url);
      seenTitles.push(item.title);
    }

    if (unique.length !== items.length) {
      this.logger.debug(
        `content dedupe: before=${items.length} after=${unique.length}`,
      );
    }
    return unique;
  }

  cleanupOldContent(
    days = this.settings.contentRetentionDays,
    now: Date = new Date(),
  ): number {
    const result = this.database.db
      .delete(contentItems)
      .where(lt(contentItems.fetchedAt, daysAgo(days, now)))
      .run();
    this.logger.log(
      `content cleanup done: removed=${result.changes} days=${days}`,
    );
    return result.changes;
  }

  private getSources(options: FetchAllOptions, now: Date): ContentSource[] {
    const filters: SQL[] = [eq(contentSources.active, true)];
    if (options.newsletterId != null) {
      filters.push(eq(contentSources.newsletterId, options.newsletterId));
    }
    if (options.sourceIds?.length) {
      filters.push(inArray(contentSources.id, options.sourceIds));
    }

    const sources = this.database.db
      .select()
      .from(contentSources)
      .where(and(...filters))
      .all();

    return sources.filter((source) => {
      if (options.force) {
        return !source.disabledUntil || new Date(
          source.disabledUntil,
        ).getTime() <= now.getTime();
      }
      return needsFetch(source, now);
    });
  }

  private fetchEntries(source: ContentSource): Promise<FeedResult> {
    const { config } = source;
    const limit = config.limit ?? DEFAULT_FEED_LIMIT;
    switch (source.type) {
      case 'hackernews':
        return this.hackerNews.fetchStories(
          source.url,
          config.story_type,
          limit,
        );
      case 'reddit':
        return this.reddit.fetchPosts(source.url, config, limit);
      default:
        return this.rssFeed.fetchFeed(source.url, limit);
    }
  }

  /** Number of stored items, or the error message. */
  private async fetchSource(
    source: ContentSource,
    now: Date,
  ): Promise<number | string> {
    const config = source.config;
    const feed = await this.fetchEntries(source);

    if (feed.error) {
      this.database.db
        .update(contentSources)
        .set({
          errorCount: source.errorCount + 1,
          consecutiveFailures: source.consecutiveFailures + 1,
          lastError: feed.error,
          lastFetched: now.toISOString(),
        })
        .where(eq(contentSources.id, source.id))
        .run();
      this.logger.warn(
        `source fetch failed: source=${source.id} name=${source.name} ` +
          `error=${feed.error}`,
      );
      return feed.error;
    }

    const scored = feed.entries.map((entry) => {
      const parsed: ParsedItem = {
        title: entry.title,
        url: entry.link,
        content: entry.content,
        author: entry.author,
        publishedAt: entry.publishedAt,
        tags: entry.categories,
        engagement: entry.engagement,
        comments: entry.comments,
      };
      return { ...parsed, score: this.scoring.scoreItem(parsed, config, now) };
    });
    const accepted = this.scoring.filterByConfig(scored, config);

    const stored = this.database.transaction(() => {
      let count = 0;
      for (const item of accepted) {
        const existing = this.database.db
          .select({ id: contentItems.id })
          .from(contentItems)
          .where(eq(contentItems.url, item.url))
          .get();
        if (existing) {
          continue;
        }

        const niche = config.niche ?? matchNiche(
          `${item.title} ${item.content}`,
        );
        this.database.db
          .insert(contentItems)
          .values({
            sourceId: source.id,
            url: item.url,
            title: item.title,
            content: item.content,
            author: item.author || null,
            publishedAt: item.publishedAt || null,
            fetchedAt: now.toISOString(),
            contentType: config.content_type ?? 'curated',
            score: item.score,
            contentHash: sha256Hex(`${item.url}${item.title}`),
            tags: item.tags,
            metadata: {
              ...(niche ? { niche } : {}),
              read_time: estimateReadTimeMinutes(item.content),
              has_code: /```|\bfunction\b|\bconst\b|\bdef\b/.test(item.content),
            },
          })
          .run();
        count += 1;
      }

      this.database.db
        .update(contentSources)
        .set({
          lastFetched: now.toISOString(),
          consecutiveFailures: 0,
          lastError: null,
        })
        .where(eq(contentSources.id, source.id))
        .run();
      return count;
    });

    this.logger.log(
      `source fetch done: source=${source.id} entries=${feed.entries.length} ` +
        `accepted=${accepted.length} stored=${stored}`,
    );
    return stored;
  }
}
