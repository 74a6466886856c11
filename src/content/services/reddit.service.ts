import { Inject, Injectable, Logger } from '@nestjs/common';
import { Settings, SETTINGS } from '../../config/settings';
import { SourceConfig } from '../../database/schema';
import {
  describeUrl,
  fetchWithTimeout,
  readJson,
} from '../../common/utils/http.util';
import {
  asNumber,
  asRecord,
  asString,
  errorMessage,
} from '../../common/utils/object.util';
import { cleanText } from '../../common/utils/text.util';
import { FeedEntry, FeedResult } from '../types/content.types';

const USER_AGENT = 'newsletter-engine/1.0 (content aggregator)';
const SITE_URL = 'https://www.reddit.com';

type RedditOptions = Pick<
  SourceConfig,
  'sort' | 'time_filter' | 'include_stickied' | 'include_nsfw'
>;

/**
 * Listing URL for a subreddit URL such as
 * `https://www.reddit.com/r/programming`.
 */
export function listingUrl(
  subredditUrl: string,
  options: RedditOptions,
  limit: number,
): string {
  const sort = options.sort ?? 'hot';
  const url = new URL(`${subredditUrl.replace(/\/+$/, '')}/${sort}.json`);
  url.searchParams.set('limit', String(limit));
  url.searchParams.set('raw_json', '1');
  if (sort === 'top') {
    url.searchParams.set('t', options.time_filter ?? 'week');
  }
  return url.toString();
}

/** Reads posts from a subreddit's public JSON listing. */
@Injectable()
export class RedditService {
  private readonly logger = new Logger(RedditService.name);

  constructor(@Inject(SETTINGS) private readonly settings: Settings) {}

  async fetchPosts(
    subredditUrl: string,
    options: RedditOptions = {},
    limit = 50,
  ): Promise<FeedResult> {
    const startedAt = Date.now();
    let url = subredditUrl;

    try {
      url = listingUrl(subredditUrl, options, limit);
      const listing = await fetchWithTimeout(
        url,
        { headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' } },
        this.settings.rssFetchTimeoutSec * 1000,
        readJson,
      );
      const children = asRecord(asRecord(listing)?.data)?.children;
      if (!Array.isArray(children)) {
        throw new Error('listing has no children');
      }

      const entries = children
        .map((child) => this.parsePost(asRecord(child)?.data, options))
        .filter((entry): entry is FeedEntry => entry !== null)
        .slice(0, limit);
      this.logger.log(
        `reddit fetch done: items=${entries.length} ` +
          `elapsedMs=${Date.now() - startedAt} ${describeUrl(url)}`,
      );
      return { entries };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(`reddit fetch error: ${describeUrl(url)} ${message}`);
      return { entries: [], error: message };
    }
  }

  /** Null for posts the options exclude, or that lack a title. */
  parsePost(value: unknown, options: RedditOptions = {}): FeedEntry | null {
    const post = asRecord(value);
    const title = cleanText(asString(post?.title));
    if (!post || !title) {
      return null;
    }
    if (post.stickied === true && !options.include_stickied) {
      return null;
    }
    if (post.over_18 === true && !options.include_nsfw) {
      return null;
    }

    const permalink = `${SITE_URL}${asString(post.permalink)}`;
    const isSelf = post.is_self === true;
    const external = asString(post.url);
    const subreddit = asString(post.subreddit);
    const score = asNumber(post.score) ?? 0;
    const comments = asNumber(post.num_comments) ?? 0;
    const created = asNumber(post.created_utc);
    const flair = cleanText(asString(post.link_flair_text));

    let content = asString(post.selftext).trim();
    if (!content && !isSelf) {
      content = `External link: ${external}`;
    }
    content +=
      `\n\n---\nPosted in r/${subreddit} | ` +
      `Score: ${score} | Comments: ${comments}`;

    return {
      title,
      link: isSelf || !external ? permalink : external,
      content,
      author: asString(post.author, '[deleted]'),
      publishedAt:
        created == null ? '' : new Date(created * 1000).toISOString(),
      categories: ['reddit', `r/${subreddit}`, ...(flair ? [flair] : [])],
      engagement: score + comments * 2,
      comments,
    };
  }
}
