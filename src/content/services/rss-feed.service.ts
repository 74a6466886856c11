import { Inject, Injectable, Logger } from '@nestjs/common';
import { Settings, SETTINGS } from '../../config/settings';
import { parseDateToIso } from '../../common/utils/date.util';
import { describeUrl, fetchWithTimeout } from '../../common/utils/http.util';
import { errorMessage } from '../../common/utils/object.util';
import {
  cleanText,
  decodeHtmlEntities,
  stripCdata,
} from '../../common/utils/text.util';
import { FeedEntry, FeedResult } from '../types/content.types';

const USER_AGENT = 'newsletter-engine/1.0 (RSS Reader)';
const CATEGORY_RE =
  /<category\b([^>]*?)(?:\/>|>([\s\S]*?)<\/category>)/gi;

@Injectable()
export class RssFeedService {
  private readonly logger = new Logger(RssFeedService.name);

  constructor(@Inject(SETTINGS) private readonly settings: Settings) {}

  async fetchFeed(url: string, limit = 50): Promise<FeedResult> {
    const startedAt = Date.now();
    const init: RequestInit = {
      headers: {
        'User-Agent': USER_AGENT,
        Accept:
          'application/rss+xml, application/atom+xml, application/xml, ' +
          'text/xml;q=0.9, */*;q=0.8',
      },
    };

    try {
      const body = await fetchWithTimeout(
        url,
        init,
        this.settings.rssFetchTimeoutSec * 1000,
        async (res) => (res.ok ? res.text() : res.status),
      );
      if (typeof body === 'number') {
        this.logger.warn(
          `rss fetch failed: status=${body} ${describeUrl(url)}`,
        );
        return { entries: [], error: `HTTP ${body}` };
      }

      const entries = this.parseFeed(body).slice(0, limit);
      this.logger.log(
        `rss fetch done: items=${entries.length} ` +
          `elapsedMs=${Date.now() - startedAt} ${describeUrl(url)}`,
      );
      return { entries };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(`rss fetch error: ${describeUrl(url)} ${message}`);
      return { entries: [], error: message };
    }
  }

  /** Handles RSS 2.0 `<item>` and Atom `<entry>` documents. */
  parseFeed(xml: string): FeedEntry[] {
    const rssItems = xml.match(/<item\b[\s\S]*?<\/item>/gi) ?? [];
    const atomEntries = rssItems.length
      ? []
      : (xml.match(/<entry\b[\s\S]*?<\/entry>/gi) ?? []);

    return [...rssItems, ...atomEntries]
      .map((itemXml) => {
        const content =
          this.extractTag(itemXml, 'content:encoded') ||
          this.extractTag(itemXml, 'content') ||
          this.extractTag(itemXml, 'description') ||
          this.extractTag(itemXml, 'summary');

        return {
          title: this.extractTag(itemXml, 'title'),
          link: this.extractLink(itemXml),
          content,
          author:
            this.extractTag(itemXml, 'author') ||
            this.extractTag(itemXml, 'dc:creator') ||
            this.extractTag(itemXml, 'name'),
          publishedAt: this.extractPublishedAt(itemXml),
          categories: this.extractCategories(itemXml),
        };
      })
      .filter((entry) => entry.title && entry.link);
  }

  private extractLink(itemXml: string): string {
    const text = this.extractTag(itemXml, 'link');
    if (text) {
      return text;
    }
    const alternate =
      itemXml.match(/<link\b[^>]*rel=["']alternate["'][^>]*href=["']([^"']+)["']/i) ??
      itemXml.match(/<link\b[^>]*href=["']([^"']+)["']/i);
    return alternate?.[1] ? decodeHtmlEntities(alternate[1]).trim() : '';
  }

  private extractCategories(itemXml: string): string[] {
    const out = new Set<string>();
    for (const match of itemXml.matchAll(CATEGORY_RE)) {
      const term = /term=["']([^"']+)["']/i.exec(match[1] ?? '')?.[1];
      const value = cleanText(term ?? match[2] ?? '');
      if (value) {
        out.add(value);
      }
    }
    return [...out];
  }

  private extractPublishedAt(itemXml: string): string {
    const tags = ['pubDate', 'published', 'updated', 'dc:date'];
    for (const tag of tags) {
      const iso = parseDateToIso(this.extractTag(itemXml, tag));
      if (iso) {
        return iso;
      }
    }
    return '';
  }

  private extractTag(xml: string, tagName: string): string {
    const escapedTag = tagName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const regex = new RegExp(
      `<${escapedTag}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/${escapedTag}>`,
      'i',
    );
    const match = xml.match(regex);
    if (!match?.[1]) {
      return '';
    }
    return cleanText(stripCdata(match[1]));
  }
}
