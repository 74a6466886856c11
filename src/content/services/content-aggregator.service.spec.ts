import { Logger } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { DatabaseService } from '../../database/database.service';
import {
  contentItems,
  contentSources,
  newsletters,
} from '../../database/schema';
import { createTestDatabase, testSettings } from '../../database/testing';
import { sha256Hex } from '../../common/utils/text.util';
import { createAggregator } from '../testing';
import {
  ContentAggregatorService,
  needsFetch,
} from './content-aggregator.service';

const NOW = new Date('2026-03-02T12:00:00.000Z');

function feedXml(
  items: Array<{ title: string; link: string; body?: string }>,
): string {
  const xml = items
    .map(
      (item) =>
        `<item><title>${item.title}</title><link>${item.link}</link><description>${item.body ?? ''}</description></item>`,
    )
    .join('');
  return `<rss><channel>${xml}</channel></rss>`;
}

describe('ContentAggregatorService', () => {
  const settings = testSettings();
  let database: DatabaseService;
  let aggregator: ContentAggregatorService;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    database = createTestDatabase(settings);
    aggregator = createAggregator(database, settings);
  });

  afterEach(() => {
    database.onModuleDestroy();
    jest.restoreAllMocks();
  });

  function addSource(values: Partial<typeof contentSources.$inferInsert> = {}) {
    return database.db
      .insert(contentSources)
      .values({
        name: 'Example Feed',
        url: 'https://feeds.example.com/rss',
        ...values,
      })
      .returning()
      .get();
  }

  it('stores new items, skips known URLs and updates the source', async () => {
    const source = addSource({
      config: { content_type: 'original', niche: 'devops_cloud' },
    });
    database.db
      .insert(contentItems)
      .values({
        url: 'https://example.com/known',
        title: 'Known',
        contentHash: 'x',
        fetchedAt: NOW.toISOString(),
      })
      .run();
    jest.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(
        feedXml([
          { title: 'Known', link: 'https://example.com/known' },
          {
            title: 'Fresh post',
            link: 'https://example.com/fresh',
            body: 'Plain words here.',
          },
        ]),
      ),
    );

    const result = await aggregator.fetchAll({}, NOW);

    expect(result).toEqual({
      sources: 1,
      items: 1,
      errors: [],
      details: { [source.id]: 1 },
    });
    const stored = database.db
      .select()
      .from(contentItems)
      .where(eq(contentItems.url, 'https://example.com/fresh'))
      .get();
    expect(stored?.contentType).toBe('original');
    expect(stored?.score).toBe(40);
    expect(stored?.contentHash).toBe(
      sha256Hex('https://example.com/freshFresh post'),
    );
    expect(stored?.metadata.niche).toBe('devops_cloud');

    const updated = database.db
      .select()
      .from(contentSources)
      .where(eq(contentSources.id, source.id))
      .get();
    expect(updated?.lastFetched).toBe(NOW.toISOString());
    expect(updated?.consecutiveFailures).toBe(0);
  });

  it('scores API sources with their engagement', async () => {
    const source = addSource({
      name: 'HN',
      url: 'https://hn.example.com/v0',
      type: 'hackernews',
      config: { limit: 1 },
    });
    const routes: Record<string, unknown> = {
      'https://hn.example.com/v0/topstories.json': [11, 12],
      'https://hn.example.com/v0/item/11.json': {
        id: 11,
        type: 'story',
        title: 'Show HN: Queue viewer',
        url: 'https://example.com/queue-viewer',
        by: 'casey',
        score: 120,
        descendants: 60,
        time: Date.parse('2026-03-02T10:00:00.000Z') / 1000,
      },
      'https://hn.example.com/v0/item/12.json': {
        id: 12,
        type: 'job',
        title: 'Hiring',
      },
    };
    jest
      .spyOn(globalThis, 'fetch')
      .mockImplementation(
        async (input) => new Response(JSON.stringify(routes[String(input)])),
      );

    const result = await aggregator.fetchAll({}, NOW);

    expect(result.details).toEqual({ [source.id]: 1 });
    const stored = database.db
      .select()
      .from(contentItems)
      .where(eq(contentItems.url, 'https://example.com/queue-viewer'))
      .get();
    // 40 base + 5 author + 25 recency + 10 engagement + 5 comments
    expect(stored?.score).toBe(85);
    expect(stored?.tags).toEqual(['hackernews', 'show']);
    expect(stored?.publishedAt).toBe('2026-03-02T10:00:00.000Z');
  });

  it('records failures on the source and reports them', async () => {
    const source = addSource({ consecutiveFailures: 2, errorCount: 4 });
    jest
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response('down', { status: 500 }));

    const result = await aggregator.fetchAll({}, NOW);

    expect(result.errors).toEqual(['error fetching Example Feed: HTTP 500']);
    expect(result.items).toBe(0);
    const updated = database.db
      .select()
      .from(contentSources)
      .where(eq(contentSources.id, source.id))
      .get();
    expect(updated?.consecutiveFailures).toBe(3);
    expect(updated?.errorCount).toBe(5);
    expect(updated?.lastError).toBe('HTTP 500');
  });

  it('skips sources that are not due or are disabled unless forced', async () => {
    addSource({ lastFetched: '2026-03-02T11:30:00.000Z' });
    addSource({
      url: 'https://feeds.example.com/other',
      disabledUntil: '2026-03-02T15:00:00.000Z',
    });
    const fetchSpy = jest
      .spyOn(globalThis, 'fetch')
      .mockImplementation(async () => new Response(feedXml([])));

    await expect(aggregator.fetchAll({}, NOW)).resolves.toEqual({
      sources: 0,
      items: 0,
      errors: [],
      details: {},
    });
    expect(fetchSpy).not.toHaveBeenCalled();

    const forced = await aggregator.fetchAll({ force: true }, NOW);
    expect(forced.sources).toBe(1);
  });

  it('decides whether a source is due', () => {
    const base = addSource();
    expect(needsFetch(base, NOW)).toBe(true);
    expect(
      needsFetch({ ...base, lastFetched: '2026-03-02T10:59:00.000Z' }, NOW),
    ).toBe(true);
    expect(
      needsFetch({ ...base, lastFetched: '2026-03-02T11:01:00.000Z' }, NOW),
    ).toBe(false);
    expect(needsFetch({ ...base, active: false }, NOW)).toBe(false);
  });

  it('returns recent content for a newsletter ordered by score', () => {
    const [first, second] = ['Mine', 'Other'].map(
      (name) =>
        database.db
          .insert(newsletters)
          .values({
            name,
            niche: 'devops_cloud',
            settings: {
              frequency: 'daily',
              send_time: '08:00',
              max_articles: 10,
            },
          })
          .returning()
          .get().id,
    );
    const mine = addSource({ newsletterId: first });
    const other = addSource({
      newsletterId: second,
      url: 'https://feeds.example.com/2',
    });
    const insert = (
      sourceId: number,
      url: string,
      score: number,
      fetchedAt: string,
    ) =>
      database.db
        .insert(contentItems)
        .values({
          sourceId,
          url,
          title: url,
          score,
          contentHash: url,
          fetchedAt,
        })
        .run();
    insert(mine.id, 'https://example.com/a', 50, '2026-03-02T10:00:00.000Z');
    insert(mine.id, 'https://example.com/b', 80, '2026-03-02T09:00:00.000Z');
    insert(mine.id, 'https://example.com/old', 90, '2026-02-20T09:00:00.000Z');
    insert(mine.id, 'https://example.com/low', 10, '2026-03-02T09:00:00.000Z');
    insert(other.id, 'https://example.com/c', 99, '2026-03-02T09:00:00.000Z');

    const items = aggregator.getRecentContent(
      { hours: 24, minScore: 20, newsletterId: first },
      NOW,
    );

    expect(items.map((item) => item.url)).toEqual([
      'https://example.com/b',
      'https://example.com/a',
    ]);
  });

  it('deduplicates by url and similar titles keeping the best score', () => {
    const out = aggregator.deduplicateContent([
      { url: 'https://a', title: 'Kubernetes 1.30 released', score: 50 },
      { url: 'https://b', title: 'Kubernetes 1.30 released!', score: 70 },
      { url: 'https://b', title: 'Something else', score: 60 },
      { url: 'https://c', title: 'Postgres tuning guide', score: 40 },
    ]);

    expect(out.map((item) => `${item.url}|${item.score}`)).toEqual([
      'https://b|70',
      'https://c|40',
    ]);
  });

  it('removes content older than the retention window', () => {
    const insert = (url: string, fetchedAt: string) =>
      database.db
        .insert(contentItems)
        .values({ url, title: url, contentHash: url, fetchedAt })
        .run();
    insert('https://example.com/old', '2026-02-20T00:00:00.000Z');
    insert('https://example.com/new', '2026-03-01T00:00:00.000Z');

    expect(aggregator.cleanupOldContent(7, NOW)).toBe(1);
    expect(
      database.db.select().from(contentItems).all().map((item) => item.url),
    ).toEqual([
      'https://example.com/new',
    ]);
  });
});
