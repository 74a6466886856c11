import { Logger, NotFoundException } from '@nestjs/common';
import { DatabaseService } from '../../database/database.service';
import {
  Edition,
  Newsletter,
  newsletterSubscribers,
  subscriberEvents,
  subscribers,
  users,
} from '../../database/schema';
import { createTestDatabase, testSettings } from '../../database/testing';
import { EditionsService } from '../../newsletters/services/editions.service';
import { NewslettersService } from '../../newsletters/services/newsletters.service';
import { makeContent } from '../../newsletters/testing';
import { AnalyticsService } from './analytics.service';

const NOW = new Date('2026-03-10T12:00:00.000Z');

describe('AnalyticsService', () => {
  const settings = testSettings();
  let database: DatabaseService;
  let editionsService: EditionsService;
  let service: AnalyticsService;
  let userId: number;
  let weekly: Newsletter;
  let briefing: Newsletter;
  let recent: Edition;
  let older: Edition;

  function subscribe(
    email: string,
    newsletterIds: number[],
    subscribedAt: string,
    unsubscribedAt: string | null = null,
  ): number {
    const id = database.db
      .insert(subscribers)
      .values({
        email,
        status: 'active',
        verifiedAt: '2026-01-01T00:00:00.000Z',
      })
      .returning()
      .get().id;
    for (const newsletterId of newsletterIds) {
      database.db
        .insert(newsletterSubscribers)
        .values({
          newsletterId,
          subscriberId: id,
          subscribedAt,
          unsubscribedAt,
        })
        .run();
    }
    return id;
  }

  function sentEdition(
    newsletter: Newsletter,
    sentAt: string,
    testMode = false,
  ): Edition {
    return editionsService.create({
      newsletterId: newsletter.id,
      subject: 'Notes',
      content: makeContent({ id: newsletter.id, name: newsletter.name }),
      status: 'sent',
      sentAt,
      testMode,
    });
  }

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    database = createTestDatabase(settings);
    const newslettersService = new NewslettersService(database, settings);
    editionsService = new EditionsService(database);
    service = new AnalyticsService(database, newslettersService);
    userId = database.db
      .insert(users)
      .values({
        email: 'owner@example.com',
        username: 'owner',
        hashedPassword: 'x',
      })
      .returning()
      .get().id;
    weekly = newslettersService.create(
      { name: 'Weekly', niche: 'security', settings: {} },
      userId,
    );
    briefing = newslettersService.create(
      { name: 'Briefing', niche: 'ai_ml', settings: {} },
      userId,
    );

    const s1 = subscribe(
      's1@example.com',
      [weekly.id],
      '2026-01-01T00:00:00.000Z',
    );
    const s2 = subscribe(
      's2@example.com',
      [weekly.id, briefing.id],
      '2026-03-09T08:00:00.000Z',
    );
    subscribe(
      's3@example.com',
      [weekly.id],
      '2026-01-01T00:00:00.000Z',
      '2026-03-05T00:00:00.000Z',
    );

    recent = sentEdition(weekly, '2026-03-06T08:00:00.000Z');
    older = sentEdition(weekly, '2026-02-01T08:00:00.000Z');
    const rehearsal = sentEdition(briefing, '2026-03-07T08:00:00.000Z', true);
    editionsService.incrementStats(recent.id, {
      sentCount: 10,
      openedCount: 4,
      clickedCount: 1,
    });
    editionsService.incrementStats(older.id, {
      sentCount: 10,
      openedCount: 8,
      clickedCount: 5,
    });
    editionsService.incrementStats(rehearsal.id, {
      sentCount: 5,
      openedCount: 5,
    });

    database.db
      .insert(subscriberEvents)
      .values([
        {
          subscriberId: s1,
          editionId: recent.id,
          eventType: 'open',
          createdAt: '2026-03-07T09:00:00.000Z',
        },
        {
          subscriberId: s2,
          editionId: recent.id,
          eventType: 'open',
          createdAt: '2026-03-07T10:00:00.000Z',
        },
        {
          subscriberId: s1,
          editionId: recent.id,
          eventType: 'click',
          createdAt: '2026-03-07T09:01:00.000Z',
        },
        {
          subscriberId: s1,
          editionId: older.id,
          eventType: 'open',
          createdAt: '2026-03-08T09:00:00.000Z',
        },
        {
          subscriberId: s2,
          editionId: rehearsal.id,
          eventType: 'open',
          createdAt: '2026-03-08T09:00:00.000Z',
        },
      ])
      .run();
  });

  afterEach(() => {
    database.onModuleDestroy();
    jest.restoreAllMocks();
  });

  it('summarizes the last week for the owner', () => {
    expect(service.overview({ userId }, 'week', NOW)).toEqual({
      period: 'week',
      subscribers: { total: 2, new: 1, growth_rate: 100 },
      engagement: {
        editions_sent: 1,
        total_opens: 3,
        total_clicks: 1,
        avg_open_rate: 40,
        avg_click_rate: 10,
      },
    });
  });

  it('hides newsletters of other owners', () => {
    expect(() =>
      service.overview(
        { userId: userId + 1, newsletterId: weekly.id },
        'week',
        NOW,
      ),
    ).toThrow(NotFoundException);
    expect(
      service.overview({ userId: userId + 1 }, 'week', NOW).subscribers,
    ).toEqual({
      total: 0,
      new: 0,
      growth_rate: 0,
    });
  });

  it('counts active subscribers per day', () => {
    expect(service.growth({ userId }, 3, NOW)).toEqual({
      period_days: 3,
      data: [
        { date: '2026-03-07', subscribers: 1 },
        { date: '2026-03-08', subscribers: 2 },
        { date: '2026-03-09', subscribers: 2 },
      ],
    });
  });

  it('reports edition and overall engagement', () => {
    expect(service.editionEngagement(recent.id, userId)).toEqual({
      edition_id: recent.id,
      sent: 10,
      delivered: 0,
      opened: 4,
      clicked: 1,
      open_rate: 40,
      click_rate: 10,
    });
    expect(() => service.editionEngagement(recent.id, userId + 1)).toThrow(
      NotFoundException,
    );
    expect(service.overallEngagement({ userId })).toEqual({
      total_sent: 20,
      total_opened: 12,
      total_clicked: 6,
      avg_open_rate: 60,
      avg_click_rate: 30,
    });
  });

  it('builds the thirty-day report across every newsletter', () => {
    expect(service.buildReport(undefined, NOW)).toEqual({
      generated_at: '2026-03-10T12:00:00.000Z',
      period: 'last_30_days',
      newsletter_id: null,
      subscribers: { total: 2, new: 1, growth_rate: 100 },
      editions: { sent: 1, frequency: 'weekly' },
      engagement: {
        total_opens: 3,
        total_clicks: 1,
        avg_open_rate: 40,
        avg_click_rate: 10,
      },
    });
  });
});
