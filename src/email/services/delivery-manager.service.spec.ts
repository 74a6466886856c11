import { BadRequestException, Logger } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { Settings } from '../../config/settings';
import { createAggregator } from '../../content/testing';
import { DatabaseService } from '../../database/database.service';
import {
  Newsletter,
  subscriberEvents,
  subscribers,
} from '../../database/schema';
import { createTestDatabase, testSettings } from '../../database/testing';
import { LlmCacheService } from '../../llm/services/llm-cache.service';
import { OllamaClientService } from '../../llm/services/ollama-client.service';
import { EditionsService } from '../../newsletters/services/editions.service';
import { NewsletterGeneratorService } from '../../newsletters/services/newsletter-generator.service';
import { NewslettersService } from '../../newsletters/services/newsletters.service';
import { PersonalizationService } from '../../newsletters/services/personalization.service';
import { TemplateEngineService } from '../../newsletters/services/template-engine.service';
import { insertNewsletter, makeContent } from '../../newsletters/testing';
import { FakeMailSender, insertSubscriber } from '../testing';
import { DeliveryManagerService } from './delivery-manager.service';
import { EmailTrackerService } from './email-tracker.service';

function buildGenerator(
  database: DatabaseService,
  settings: Settings,
  editions: EditionsService,
) {
  return new NewsletterGeneratorService(
    database,
    createAggregator(database, settings),
    new OllamaClientService(settings, new LlmCacheService(database, settings)),
    new NewslettersService(database, settings),
    editions,
    new TemplateEngineService(settings),
    new PersonalizationService(settings),
    settings,
  );
}

describe('DeliveryManagerService', () => {
  const settings = testSettings({ DELIVERY_BATCH_SIZE: '2' });
  let database: DatabaseService;
  let editions: EditionsService;
  let mailer: FakeMailSender;
  let delivery: DeliveryManagerService;
  let newsletter: Newsletter;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    database = createTestDatabase(settings);
    editions = new EditionsService(database);
    mailer = new FakeMailSender();
    delivery = new DeliveryManagerService(
      database,
      editions,
      buildGenerator(database, settings, editions),
      mailer,
      settings,
    );
    newsletter = insertNewsletter(database);
    for (const name of ['r1', 'r2', 'r3', 'r4', 'r5']) {
      insertSubscriber(database, newsletter.id, `${name}@example.com`);
    }
    insertSubscriber(database, newsletter.id, 'pending@example.com', {
      status: 'pending',
      verifiedAt: null,
    });
    insertSubscriber(database, newsletter.id, 'left@example.com', {
      unsubscribedAt: '2026-02-01T00:00:00.000Z',
    });
  });

  afterEach(() => {
    database.onModuleDestroy();
    jest.restoreAllMocks();
  });

  function createEdition(newsletterId = newsletter.id) {
    return editions.create({
      newsletterId,
      subject: 'Weekly notes',
      content: makeContent({ id: newsletterId, name: newsletter.name }),
    });
  }

  function sentEvents(editionId: number) {
    return database.db
      .select()
      .from(subscriberEvents)
      .where(eq(subscriberEvents.editionId, editionId))
      .all()
      .filter((event) => event.eventType === 'sent');
  }

  it('sends to active verified subscribers and isolates failures', async () => {
    mailer.failFor.add('r3@example.com');
    const edition = createEdition();

    const result = await delivery.sendEdition(edition.id);

    expect(result).toEqual({
      sent: [
        'r1@example.com',
        'r2@example.com',
        'r4@example.com',
        'r5@example.com',
      ],
      failed: ['r3@example.com'],
      total: 5,
    });
    const updated = editions.get(edition.id);
    expect(updated.status).toBe('sent');
    expect(updated.sentAt).not.toBeNull();
    expect(editions.getStats(edition.id)).toMatchObject({
      sentCount: 4,
      deliveredCount: 4,
    });
    expect(sentEvents(edition.id)).toHaveLength(4);
  });

  it('embeds the tracking id it records and sets list headers', async () => {
    const edition = createEdition();

    await delivery.sendEdition(edition.id);

    const message = mailer.sent[0];
    const r1 = database.db
      .select()
      .from(subscribers)
      .where(eq(subscribers.email, 'r1@example.com'))
      .get();
    const event = sentEvents(
      edition.id,
    ).find((row) => row.subscriberId === r1?.id);
    const trackingId = String(event?.metadata.tracking_id);
    expect(trackingId).toMatch(/^[0-9a-f]{16}$/);
    expect(message?.to).toBe('r1@example.com');
    expect(message?.html).toContain(
      `src="http://localhost:8000/track/open/${trackingId}"`,
    );
    expect(message?.html).toContain(
      `href="http://localhost:8000/track/click/${trackingId}?url=https%3A%2F%2Fexample.com%2Fqueues"`,
    );
    expect(message?.headers).toMatchObject({
      'List-Unsubscribe-Post': 'List-Unsubscribe=One-Click',
      'X-Newsletter-ID': String(newsletter.id),
      'X-Edition-ID': String(edition.id),
    });
    expect(message?.headers?.['List-Unsubscribe']).toMatch(
      /^<http:\/\/localhost:8000\/unsubscribe\/one-click\?token=[\w-]+\.[0-9a-f]{16}>$/,
    );
    expect(r1?.lastEmailSent).not.toBeNull();
  });

  it('counts each send before an open can be tracked for it', async () => {
    const tracker = new EmailTrackerService(database, editions);
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const send = mailer.send.bind(mailer);
    jest.spyOn(mailer, 'send').mockImplementation(async (message) => {
      if (message.to === 'r2@example.com') {
        await gate;
      }
      return send(message);
    });
    const edition = createEdition();

    const sending = delivery.sendEdition(edition.id);
    await new Promise((resolve) => setImmediate(resolve));

    const [first] = sentEvents(edition.id);
    expect(tracker.trackOpen(String(first?.metadata.tracking_id))).toBe(true);
    expect(editions.getStats(edition.id)).toMatchObject({
      sentCount: 1,
      openedCount: 1,
      openRate: 100,
    });

    release();
    await sending;
    expect(editions.getStats(edition.id)).toMatchObject({
      sentCount: 5,
      openedCount: 1,
      openRate: 20,
    });
  });

  it('rejects a second live send', async () => {
    const edition = createEdition();
    await delivery.sendEdition(edition.id);

    await expect(delivery.sendEdition(edition.id)).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });

  it('resends only to recipients without a sent event', async () => {
    mailer.failFor.add('r3@example.com');
    const edition = createEdition();
    await delivery.sendEdition(edition.id);
    mailer.failFor.clear();

    await expect(delivery.resendFailed(edition.id)).resolves.toEqual({
      sent: ['r3@example.com'],
      failed: [],
      total: 1,
    });
    await expect(delivery.resendFailed(edition.id)).resolves.toEqual({
      sent: [],
      failed: [],
      total: 0,
    });
    expect(editions.getStats(edition.id).sentCount).toBe(5);
  });

  it('sends test copies without tracking or status changes', async () => {
    const edition = createEdition();

    const result = await delivery.sendEdition(edition.id, true, [
      '  Someone@Example.com',
    ]);

    expect(result).toEqual({
      sent: ['someone@example.com'],
      failed: [],
      total: 1,
    });
    expect(mailer.sent[0]?.html).not.toContain('/track/open/');
    expect(mailer.sent[0]?.headers?.['List-Unsubscribe']).toBe(
      '<http://localhost:8000/unsubscribe>',
    );
    expect(editions.get(edition.id).status).toBe('draft');
    expect(sentEvents(edition.id)).toEqual([]);
  });

  it('marks scheduled editions failed when they cannot be sent', async () => {
    const empty = insertNewsletter(database, { name: 'Empty' });
    const good = createEdition();
    const bad = createEdition(empty.id);
    editions.schedule(good.id, new Date('2026-03-02T08:00:00.000Z'));
    editions.schedule(bad.id, new Date('2026-03-02T08:00:00.000Z'));

    const outcome = await delivery.processScheduledSends(
      new Date('2026-03-02T09:00:00.000Z'),
    );

    expect(outcome).toEqual({ processed: 2, failed: [bad.id] });
    expect(editions.get(good.id).status).toBe('sent');
    expect(editions.get(bad.id).status).toBe('failed');
  });
});
