import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, Logger } from '@nestjs/common';
import { and, eq } from 'drizzle-orm';
import request from 'supertest';
import { App } from 'supertest/types';
import { AppModule } from './../src/app.module';
import { configureApp } from './../src/app.setup';
import {
  generateUnsubscribeToken,
  generateVerificationToken,
} from './../src/auth/utils/tokens.util';
import { DatabaseService } from './../src/database/database.service';
import {
  newsletterSubscribers,
  subscriberEvents,
  subscribers,
} from './../src/database/schema';
import { testSettings } from './../src/database/testing';
import { FakeMailSender, insertSubscriber } from './../src/email/testing';
import { TRACKING_PIXEL } from './../src/email/tracking.controller';
import { MAIL_SENDER } from './../src/email/types/email.types';
import { OllamaClientService } from './../src/llm/services/ollama-client.service';
import { EditionsService } from './../src/newsletters/services/editions.service';
import { insertNewsletter, makeContent } from './../src/newsletters/testing';

describe('Newsletter API (e2e)', () => {
  const settings = testSettings({ APP_VERSION: '2.1.0' });
  let app: INestApplication<App>;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule.forRoot(settings)],
    })
      .overrideProvider(MAIL_SENDER)
      .useValue(new FakeMailSender())
      .compile();

    app = moduleFixture.createNestApplication();
    configureApp(app, settings);
    await app.init();
  });

  afterEach(async () => {
    await app.close();
    jest.restoreAllMocks();
  });

  it('/ (GET)', () => {
    return request(app.getHttpServer()).get('/').expect(200).expect({
      name: 'Newsletter Engine',
      version: '2.1.0',
      api: '/api/v1',
      health: '/health',
    });
  });

  it('/health (GET)', async () => {
    jest
      .spyOn(OllamaClientService.prototype, 'listModels')
      .mockResolvedValue(['mistral:7b-instruct', 'llama3.2:3b']);

    const res = await request(app.getHttpServer()).get('/health').expect(200);

    expect(res.body).toMatchObject({
      status: 'healthy',
      version: '2.1.0',
      services: { database: 'connected', ollama: 'connected' },
    });
  });

  it('/health (GET) degrades without the model server', async () => {
    jest
      .spyOn(OllamaClientService.prototype, 'listModels')
      .mockResolvedValue(null);

    const res = await request(app.getHttpServer()).get('/health').expect(200);

    expect(res.body).toMatchObject({
      status: 'degraded',
      services: { database: 'connected', ollama: 'disconnected' },
    });
  });

  it('guards the prefixed API', () => {
    return request(app.getHttpServer()).get('/api/v1/newsletters').expect(
      401,
    ).expect({
      message: 'not authenticated',
      error: 'Unauthorized',
      statusCode: 401,
    });
  });

  it('registers, logs in and creates a newsletter', async () => {
    const server = app.getHttpServer();
    await request(server)
      .post('/api/v1/auth/register')
      .send({
        email: 'editor@example.com',
        username: 'editor',
        password: 'test-password',
      })
      .expect(201);
    const login = await request(server)
      .post('/api/v1/auth/token')
      .send({ username: 'editor', password: 'test-password' })
      .expect(200);
    const auth = `Bearer ${String(login.body.access_token)}`;

    const created = await request(server)
      .post('/api/v1/newsletters')
      .set('Authorization', auth)
      .send({
        name: 'Cloud Notes',
        niche: 'devops_cloud',
        settings: { frequency: 'weekly' },
      })
      .expect(201);
    expect(created.body).toMatchObject({
      id: 1,
      name: 'Cloud Notes',
      niche: 'devops_cloud',
      userId: 1,
    });

    const listed = await request(server).get('/api/v1/newsletters').set(
      'Authorization',
      auth,
    ).expect(200);
    expect(listed.body).toHaveLength(1);
  });

  it('rejects invalid bodies with the failing fields', async () => {
    const res = await request(app.getHttpServer())
      .post('/api/v1/auth/register')
      .send({ email: 'editor@example.com', username: 'ed', password: 'short' })
      .expect(400);

    expect(res.body.issues).toEqual([
      {
        path: 'username',
        message: 'String must contain at least 3 character(s)',
      },
      {
        path: 'password',
        message: 'String must contain at least 8 character(s)',
      },
    ]);
  });

  describe('public endpoints', () => {
    const TRACKING_ID = 'abcdef0123456789';
    let database: DatabaseService;
    let editions: EditionsService;

    beforeEach(() => {
      database = app.get(DatabaseService);
      editions = app.get(EditionsService);
    });

    function sentEdition() {
      const newsletter = insertNewsletter(database);
      const subscriber = insertSubscriber(
        database,
        newsletter.id,
        'reader@example.com',
      );
      const edition = editions.create({
        newsletterId: newsletter.id,
        subject: 'Weekly notes',
        content: makeContent(newsletter),
      });
      database.db
        .insert(subscriberEvents)
        .values({
          subscriberId: subscriber.id,
          editionId: edition.id,
          eventType: 'sent',
          metadata: { tracking_id: TRACKING_ID, edition_id: edition.id },
        })
        .run();
      editions.incrementStats(edition.id, { sentCount: 1 });
      return { newsletter, subscriber, edition };
    }

    it('serves the pixel for unknown tracking ids', async () => {
      const res = await request(app.getHttpServer())
        .get('/track/open/not-a-tracking-id')
        .expect(200);

      expect(res.headers['content-type']).toBe('image/gif');
      expect(res.headers['cache-control']).toBe(
        'no-store, no-cache, must-revalidate',
      );
      expect(res.body).toEqual(TRACKING_PIXEL);
    });

    it('counts an open behind the pixel', async () => {
      const { edition } = sentEdition();

      await request(app.getHttpServer())
        .get(`/track/open/${TRACKING_ID}`)
        .expect(200)
        .expect('Content-Type', 'image/gif');

      expect(editions.getStats(edition.id)).toMatchObject({
        sentCount: 1,
        openedCount: 1,
        openRate: 100,
      });
    });

    it('redirects clicks to http targets only', async () => {
      const { edition } = sentEdition();
      const server = app.getHttpServer();

      await request(server)
        .get(`/track/click/${TRACKING_ID}`)
        .query({ url: 'https://example.com/queues' })
        .expect(302)
        .expect('Location', 'https://example.com/queues');
      await request(server)
        .get('/track/click/0000000000000000')
        .query({ url: 'javascript:alert(1)' })
        .expect(302)
        .expect('Location', 'http://localhost:8000');

      expect(editions.getStats(edition.id).clickedCount).toBe(1);
    });

    it('unsubscribes with one click and repeats harmlessly', async () => {
      const { newsletter, subscriber } = sentEdition();
      const token = generateUnsubscribeToken(
        settings.secretKey,
        subscriber.id,
        newsletter.id,
      );
      const server = app.getHttpServer();
      const expected = {
        status: 'unsubscribed',
        message: 'Successfully unsubscribed',
      };

      await request(server)
        .post('/unsubscribe/one-click')
        .query({ token })
        .expect(200)
        .expect(expected);
      await request(server)
        .post('/unsubscribe/one-click')
        .query({ token })
        .expect(200)
        .expect(expected);

      const subscription = database.db
        .select()
        .from(newsletterSubscribers)
        .where(
          and(
            eq(newsletterSubscribers.subscriberId, subscriber.id),
            eq(newsletterSubscribers.newsletterId, newsletter.id),
          ),
        )
        .get();
      expect(subscription?.unsubscribedAt).not.toBeNull();
    });

    it('confirms an unsubscribe through the pages', async () => {
      const { newsletter, subscriber } = sentEdition();
      const token = generateUnsubscribeToken(
        settings.secretKey,
        subscriber.id,
        newsletter.id,
      );
      const server = app.getHttpServer();

      const page = await request(server)
        .get('/unsubscribe')
        .query({ token })
        .expect(200)
        .expect('Content-Type', 'text/html; charset=utf-8');
      expect(page.text).toContain('<h1>Confirm Unsubscribe</h1>');

      const done = await request(server)
        .post('/unsubscribe/confirm')
        .query({ token })
        .expect(200);
      expect(done.text).toContain('<h1 class="success">Unsubscribed</h1>');
    });

    it('renders a friendly page for a bad unsubscribe link', async () => {
      const res = await request(app.getHttpServer())
        .get('/unsubscribe')
        .query({ token: 'bogus' })
        .expect(400)
        .expect('Content-Type', /^text\/html/);

      expect(res.text).toContain('<h1 class="error">Something went wrong</h1>');
      expect(res.text).toContain('<p>Invalid or expired unsubscribe link</p>');
    });

    it('verifies an address once', async () => {
      const newsletter = insertNewsletter(database);
      const pending = insertSubscriber(
        database,
        newsletter.id,
        'new@example.com',
        { status: 'pending', verifiedAt: null },
      );
      const token = generateVerificationToken(
        settings.secretKey,
        'new@example.com',
      );
      const server = app.getHttpServer();

      const first = await request(server)
        .get('/verify')
        .query({ token })
        .expect(200);
      expect(first.text).toContain('<h1 class="success">Email Verified!</h1>');

      const again = await request(server)
        .get('/verify')
        .query({ token })
        .expect(200);
      expect(again.text).toContain(
        '<h1 class="success">Email already verified</h1>',
      );

      const stored = database.db
        .select()
        .from(subscribers)
        .where(eq(subscribers.id, pending.id))
        .get();
      expect(stored?.status).toBe('active');
    });

    it('rejects a tampered verification link with the error page', async () => {
      const res = await request(app.getHttpServer())
        .get('/verify')
        .query({ token: 'e30.deadbeef' })
        .expect(400);

      expect(res.text).toContain(
        '<p>Invalid or expired verification link</p>',
      );
    });
  });
});
