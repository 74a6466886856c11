import { Logger } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { DatabaseService } from '../../database/database.service';
import {
  Edition,
  Subscriber,
  subscriberEvents,
  subscribers,
} from '../../database/schema';
import { createTestDatabase } from '../../database/testing';
import { EditionsService } from '../../newsletters/services/editions.service';
import { insertNewsletter, makeContent } from '../../newsletters/testing';
import { insertSubscriber } from '../testing';
import { EmailTrackerService } from './email-tracker.service';

const TRACKING_ID = 'abcdef0123456789';

describe('EmailTrackerService', () => {
  let database: DatabaseService;
  let editions: EditionsService;
  let tracker: EmailTrackerService;
  let edition: Edition;
  let subscriber: Subscriber;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    database = createTestDatabase();
    editions = new EditionsService(database);
    tracker = new EmailTrackerService(database, editions);

    const newsletter = insertNewsletter(database);
    subscriber = insertSubscriber(
      database,
      newsletter.id,
      'reader@example.com',
    );
    edition = editions.create({
      newsletterId: newsletter.id,
      subject: 'Hi',
      content: makeContent(newsletter),
    });
    editions.incrementStats(edition.id, { sentCount: 4 });
    database.db
      .insert(subscriberEvents)
      .values({
        subscriberId: subscriber.id,
        editionId: edition.id,
        eventType: 'sent',
        metadata: { tracking_id: TRACKING_ID, edition_id: edition.id },
      })
      .run();
  });

  afterEach(() => {
    database.onModuleDestroy();
    jest.restoreAllMocks();
  });

  function events(type: string) {
    return database.db
      .select()
      .from(subscriberEvents)
      .all()
      .filter((event) => event.eventType === type);
  }

  it('counts the first open once and logs every open', () => {
    expect(
      tracker.trackOpen(TRACKING_ID, {
        ipAddress: '127.0.0.1',
        userAgent: 'Mail',
      }),
    ).toBe(true);
    expect(tracker.trackOpen(TRACKING_ID)).toBe(true);

    expect(events('open').map((event) => event.metadata.first_open)).toEqual([
      true,
      false,
    ]);
    expect(events('open')[0]?.userAgent).toBe('Mail');
    expect(editions.getStats(edition.id)).toMatchObject({
      openedCount: 1,
      openRate: 25,
    });
  });

  it('counts unique clicks and keeps the url', () => {
    tracker.trackClick(TRACKING_ID, 'https://example.com/a');
    tracker.trackClick(TRACKING_ID, 'https://example.com/b');

    expect(events('click').map((event) => event.metadata.url)).toEqual([
      'https://example.com/a',
      'https://example.com/b',
    ]);
    expect(editions.getStats(edition.id)).toMatchObject({
      clickedCount: 1,
      clickRate: 25,
    });
  });

  it('ignores unknown or malformed tracking ids', () => {
    expect(tracker.trackOpen('0000000000000000')).toBe(false);
    expect(tracker.trackClick('not-a-tracking-id', 'https://example.com')).toBe(
      false,
    );
    expect(events('open')).toEqual([]);
  });

  it('marks hard bounces and complaints on the subscriber and edition', () => {
    expect(
      tracker.trackBounce(
        'Reader@example.com',
        'hard',
        'mailbox full',
        edition.id,
      ),
    ).toBe(true);
    expect(
      tracker.trackComplaint('reader@example.com', 'abuse', edition.id),
    ).toBe(true);
    expect(tracker.trackBounce('nobody@example.com', 'hard')).toBe(false);

    const row = database.db
      .select()
      .from(subscribers)
      .where(eq(subscribers.id, subscriber.id))
      .get();
    expect(row).toMatchObject({
      status: 'complained',
      bounceCount: 1,
      complaintCount: 1,
    });
    expect(tracker.getEditionStats(edition.id)).toEqual({
      sent: 4,
      delivered: 0,
      opened: 0,
      clicked: 0,
      unsubscribed: 0,
      bounced: 1,
      complained: 1,
      open_rate: 0,
      click_rate: 0,
    });
  });

  it('leaves soft bounces without a status change', () => {
    tracker.trackBounce('reader@example.com', 'soft');

    const row = database.db
      .select()
      .from(subscribers)
      .where(eq(subscribers.id, subscriber.id))
      .get();
    expect(row).toMatchObject({ status: 'active', bounceCount: 0 });
  });

  it('scores engagement from recent events', () => {
    tracker.trackOpen(TRACKING_ID);
    tracker.trackOpen(TRACKING_ID);
    tracker.trackClick(TRACKING_ID, 'https://example.com/a');
    tracker.trackClick(TRACKING_ID, 'https://example.com/b');

    expect(tracker.getSubscriberEngagement(subscriber.id)).toEqual({
      opens: 2,
      clicks: 2,
      bounces: 0,
      complaints: 0,
      engagement_score: 8,
      is_engaged: true,
      is_at_risk: false,
    });

    tracker.trackComplaint('reader@example.com');
    expect(
      tracker.getSubscriberEngagement(subscriber.id).engagement_score,
    ).toBe(0);
  });
});
