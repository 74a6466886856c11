import { Logger } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { createAggregator } from '../../content/testing';
import { DatabaseService } from '../../database/database.service';
import {
  cacheEntries,
  contentItems,
  newsletters,
  subscriberEvents,
  subscribers,
} from '../../database/schema';
import { createTestDatabase, testSettings } from '../../database/testing';
import { insertSubscriber } from '../../email/testing';
import { LlmCacheService } from '../../llm/services/llm-cache.service';
import { NewslettersService } from '../../newsletters/services/newsletters.service';
import { insertNewsletter } from '../../newsletters/testing';
import { MaintenanceService } from './maintenance.service';

const NOW = new Date('2026-03-10T12:00:00.000Z');

describe('MaintenanceService', () => {
  const settings = testSettings();
  let database: DatabaseService;
  let service: MaintenanceService;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    database = createTestDatabase(settings);
    service = new MaintenanceService(
      database,
      createAggregator(database, settings),
      new NewslettersService(database, settings),
      new LlmCacheService(database, settings),
      settings,
    );
  });

  afterEach(() => {
    database.onModuleDestroy();
    jest.restoreAllMocks();
  });

  function opened(subscriberId: number, createdAt: string): void {
    database.db
      .insert(subscriberEvents)
      .values({ subscriberId, eventType: 'open', createdAt })
      .run();
  }

  function stored(id: number) {
    return database.db
      .select()
      .from(subscribers)
      .where(eq(subscribers.id, id))
      .get();
  }

  describe('processSubscriberEvents', () => {
    it('marks silent subscribers inactive and lapsing ones at risk', () => {
      const newsletter = insertNewsletter(database);
      const old = '2025-12-01T00:00:00.000Z';
      const silent = insertSubscriber(
        database,
        newsletter.id,
        'silent@example.com',
        { subscribedAt: old },
      );
      const lapsing = insertSubscriber(
        database,
        newsletter.id,
        'lapsing@example.com',
        { subscribedAt: old },
      );
      const engaged = insertSubscriber(
        database,
        newsletter.id,
        'engaged@example.com',
        { subscribedAt: old },
      );
      const recent = insertSubscriber(
        database,
        newsletter.id,
        'recent@example.com',
        { subscribedAt: '2026-01-20T00:00:00.000Z' },
      );
      const fresh = insertSubscriber(
        database,
        newsletter.id,
        'fresh@example.com',
        { subscribedAt: '2026-03-01T00:00:00.000Z' },
      );
      const flagged = insertSubscriber(
        database,
        newsletter.id,
        'flagged@example.com',
        {
          subscribedAt: '2026-01-20T00:00:00.000Z',
          segments: ['tier_free', 'at_risk'],
        },
      );
      const pending = insertSubscriber(
        database,
        newsletter.id,
        'pending@example.com',
        {
          subscribedAt: old,
          status: 'pending',
        },
      );
      opened(lapsing.id, '2026-01-15T00:00:00.000Z');
      opened(lapsing.id, '2026-02-01T00:00:00.000Z');
      opened(engaged.id, '2026-03-01T00:00:00.000Z');

      expect(service.processSubscriberEvents(NOW)).toEqual({
        inactive: 1,
        atRisk: 2,
      });

      expect(stored(silent.id)?.status).toBe('inactive');
      expect(stored(lapsing.id)?.status).toBe('active');
      expect(stored(lapsing.id)?.segments).toEqual(['at_risk']);
      expect(stored(engaged.id)?.segments).toEqual([]);
      expect(stored(recent.id)?.segments).toEqual(['at_risk']);
      expect(stored(fresh.id)?.segments).toEqual([]);
      expect(stored(flagged.id)?.segments).toEqual(['tier_free', 'at_risk']);
      expect(stored(pending.id)?.status).toBe('pending');
    });

    it('changes nothing on a second pass', () => {
      const newsletter = insertNewsletter(database);
      insertSubscriber(database, newsletter.id, 'silent@example.com', {
        subscribedAt: '2026-01-20T00:00:00.000Z',
      });

      expect(service.processSubscriberEvents(NOW)).toEqual({
        inactive: 0,
        atRisk: 1,
      });
      expect(service.processSubscriberEvents(NOW)).toEqual({
        inactive: 0,
        atRisk: 0,
      });
    });
  });

  it('recounts active subscriptions', () => {
    const newsletter = insertNewsletter(database);
    insertSubscriber(database, newsletter.id, 'a@example.com');
    insertSubscriber(database, newsletter.id, 'b@example.com');
    insertSubscriber(database, newsletter.id, 'c@example.com', {
      unsubscribedAt: '2026-03-01T00:00:00.000Z',
    });

    expect(service.updateSubscriberCounts()).toBe(1);
    const row = database.db
      .select()
      .from(newsletters)
      .where(eq(newsletters.id, newsletter.id))
      .get();
    expect(row?.subscriberCount).toBe(2);
  });

  it('runs the daily pass', () => {
    insertNewsletter(database);
    database.db
      .insert(contentItems)
      .values([
        {
          url: 'https://example.com/old',
          title: 'Old',
          contentHash: 'h1',
          fetchedAt: '2026-03-01T00:00:00.000Z',
        },
        {
          url: 'https://example.com/new',
          title: 'New',
          contentHash: 'h2',
          fetchedAt: '2026-03-09T00:00:00.000Z',
        },
      ])
      .run();
    database.db
      .insert(cacheEntries)
      .values([
        {
          cacheKey: 'k1',
          operation: 'summary',
          model: 'm',
          response: 'x',
          expiresAt: '2026-03-01T00:00:00.000Z',
        },
        {
          cacheKey: 'k2',
          operation: 'summary',
          model: 'm',
          response: 'y',
          expiresAt: '2026-04-01T00:00:00.000Z',
        },
      ])
      .run();

    const summary = service.dailyMaintenance(NOW);

    expect(summary).toMatchObject({
      contentRemoved: 1,
      subscribers: { inactive: 0, atRisk: 0 },
      subscriberCounts: 1,
      cacheEntriesRemoved: 1,
    });
    expect(
      database.db.select().from(contentItems).all().map((item) => item.title),
    ).toEqual(['New']);
    expect(
      database.db
        .select()
        .from(cacheEntries)
        .all()
        .map((entry) => entry.cacheKey),
    ).toEqual(['k2']);
  });
});
