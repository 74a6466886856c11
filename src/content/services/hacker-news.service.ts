import { Inject, Injectable, Logger } from '@nestjs/common';
import { Settings, SETTINGS } from '../../config/settings';
import { HackerNewsStoryType } from '../../database/schema';
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

const ITEM_BATCH_SIZE = 10;
const DISCUSSION_URL = 'https://news.ycombinator.com/item?id=';

export function storyCategory(title: string): string {
  if (title.startsWith('Ask HN:')) {
    return 'ask';
  }
  if (title.startsWith('Show HN:')) {
    return 'show';
  }
  if (title.startsWith('Launch HN:')) {
    return 'launch';
  }
  return 'link';
}

/** Reads stories from the Hacker News Firebase API rooted at `baseUrl`. */
@Injectable()
export class HackerNewsService {
  private readonly logger = new Logger(HackerNewsService.name);

  constructor(@Inject(SETTINGS) private readonly settings: Settings) {}

  async fetchStories(
    baseUrl: string,
    storyType: HackerNewsStoryType = 'top',
    limit = 50,
  ): Promise<FeedResult> {
    const startedAt = Date.now();
    const root = baseUrl.replace(/\/+$/, '');
    const listUrl = `${root}/${storyType}stories.json`;

    try {
      const ids = await this.getJson(listUrl);
      if (!Array.isArray(ids)) {
        throw new Error('story list is not an array');
      }
      // extra ids make up for jobs, polls and dead stories
      const candidates = ids
        .filter((id): id is number => typeof id === 'number')
        .slice(0, limit * 2);

      const entries: FeedEntry[] = [];
      for (
        let offset = 0;
        offset < candidates.length && entries.length < limit;
        offset += ITEM_BATCH_SIZE
      ) {
        const batch = await Promise.all(
          candidates
            .slice(offset, offset + ITEM_BATCH_SIZE)
            .map((id) => this.fetchStory(root, id)),
        );
        for (const entry of batch) {
          if (entry) {
            entries.push(entry);
          }
        }
      }

      const stories = entries.slice(0, limit);
      this.logger.log(
        `hackernews fetch done: items=${stories.length} type=${storyType} ` +
          `elapsedMs=${Date.now() - startedAt}`,
      );
      return { entries: stories };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(
        `hackernews fetch error: ${describeUrl(listUrl)} ${message}`,
      );
      return { entries: [], error: message };
    }
  }

  /** Null for anything but a live story, or when the item cannot be read. */
  parseStory(value: unknown): FeedEntry | null {
    const story = asRecord(value);
    const id = asNumber(story?.id);
    if (!story || id == null || story.type !== 'story') {
      return null;
    }
    if (story.dead === true || story.deleted === true) {
      return null;
    }
    const title = cleanText(asString(story.title));
    if (!title) {
      return null;
    }

    const discussion = `${DISCUSSION_URL}${id}`;
    const external = asString(story.url);
    const points = asNumber(story.score) ?? 0;
    const comments = asNumber(story.descendants) ?? 0;
    const time = asNumber(story.time);

    let content = cleanText(asString(story.text));
    if (!content && external) {
      content = `External link: ${external}`;
    }
    content +=
      `\n\n---\nHackerNews Discussion: ${discussion}\n` +
      `Points: ${points} | Comments: ${comments}`;

    return {
      title,
      link: external || discussion,
      content,
      author: asString(story.by),
      publishedAt: time == null ? '' : new Date(time * 1000).toISOString(),
      categories: ['hackernews', storyCategory(title)],
      engagement: points + comments * 1.5,
      comments,
    };
  }

  private async fetchStory(
    root: string,
    id: number,
  ): Promise<FeedEntry | null> {
    try {
      return this.parseStory(await this.getJson(`${root}/item/${id}.json`));
    } catch (error) {
      this.logger.debug(
        `hackernews item skipped: id=${id} ${errorMessage(error)}`,
      );
      return null;
    }
  }

  private getJson(url: string): Promise<unknown> {
    return fetchWithTimeout(
      url,
      { headers: { Accept: 'application/json' } },
      this.settings.rssFetchTimeoutSec * 1000,
      readJson,
    );
  }
}
