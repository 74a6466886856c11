import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { and, eq, inArray, isNull } from 'drizzle-orm';
import { Settings, SETTINGS } from '../../config/settings';
import { DatabaseService } from '../../database/database.service';
import {
  EventMetadata,
  EventType,
  Newsletter,
  NewsletterSubscriber,
  newsletterSubscribers,
  newsletters,
  Subscriber,
  subscriberEvents,
  subscribers,
} from '../../database/schema';
import {
  generateVerificationToken,
  validateUnsubscribeToken,
  validateVerificationToken,
} from '../../auth/utils/tokens.util';
import { MAIL_SENDER, MailSender } from '../../email/types/email.types';
import { normalizeEmail } from '../../email/utils/email-builder.util';
import { NewslettersService } from '../../newsletters/services/newsletters.service';
import { renderVerificationEmail } from '../templates/pages.template';
import {
  SubscriberCreateInput,
  SubscriberListQuery,
  SubscriberUpdateInput,
} from '../types/subscriber.types';

export interface TokenSubscription {
  subscriber: Subscriber;
  newsletter: Newsletter;
  subscription: NewsletterSubscriber;
}

export interface VerificationOutcome {
  email: string;
  alreadyVerified: boolean;
}

@Injectable()
export class SubscribersService {
  private readonly logger = new Logger(SubscribersService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly newslettersService: NewslettersService,
    @Inject(MAIL_SENDER) private readonly mailer: MailSender,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  /** Subscribers of the user's newsletters, newest first. */
  list(userId: number, query: SubscriberListQuery = {}): Subscriber[] {
    const newsletterIds =
      query.newsletterId != null
        ? [this.newslettersService.get(query.newsletterId, userId).id]
        : this.newslettersService
          .list(userId)
          .map((newsletter) => newsletter.id);
    if (!newsletterIds.length) {
      return [];
    }

    const memberIds = this.database.db
      .selectDistinct({ id: newsletterSubscribers.subscriberId })
      .from(newsletterSubscribers)
      .where(inArray(newsletterSubscribers.newsletterId, newsletterIds))
      .all()
      .map((row) => row.id);
    if (!memberIds.length) {
      return [];
    }

    return this.database.db
      .select()
      .from(subscribers)
      .where(
        and(
          inArray(subscribers.id, memberIds),
          query.status ? eq(subscribers.status, query.status) : undefined,
        ),
      )
      .orderBy(subscribers.id)
      .limit(query.limit ?? 100)
      .offset(query.offset ?? 0)
      .all();
  }

  /**
   * With `userId` the subscriber must belong to one of the user's newsletters.
   */
  get(id: number, userId?: number): Subscriber {
    const subscriber = this.database.db
      .select()
      .from(subscribers)
      .where(eq(subscribers.id, id))
      .get();
    if (!subscriber || (userId != null && !this.belongsToUser(id, userId))) {
      throw new NotFoundException(`subscriber ${id} not found`);
    }
    return subscriber;
  }

  findByEmail(email: string): Subscriber | undefined {
    return this.database.db
      .select()
      .from(subscribers)
      .where(eq(subscribers.email, normalizeEmail(email)))
      .get();
  }

  /**
   * Re-uses the subscriber when the email is known. New subscribers start
   * pending and get a verification email when registration is enabled.
   */
  async create(
    input: SubscriberCreateInput,
    userId: number | null = null,
  ): Promise<Subscriber> {
    const targets = input.newsletter_ids.map((id) =>
      this.newslettersService.get(id, userId ?? undefined),
    );
    const email = normalizeEmail(input.email);
    const existing = this.findByEmail(email);

    const subscriber = this.database.transaction(() => {
      const row =
        existing ??
        this.database.db
          .insert(subscribers)
          .values({
            email,
            name: input.name ?? null,
            status: 'pending',
            preferences: input.preferences,
            attributes: input.attributes,
            segments: input.segments,
          })
          .returning()
          .get();

      for (const newsletter of targets) {
        this.attach(row.id, newsletter.id, 'api');
      }
      return row;
    });
    for (const newsletter of targets) {
      this.newslettersService.refreshSubscriberCount(newsletter.id);
    }

    this.logger.log(
      `subscriber ${existing ? 'reused' : 'created'}: id=${subscriber.id} ` +
        `newsletters=${targets.length}`,
    );
    if (!existing && this.settings.enableRegistration) {
      await this.sendVerification(subscriber, 'registration');
    }
    return this.get(subscriber.id);
  }

  update(
    id: number,
    input: SubscriberUpdateInput,
    userId?: number,
  ): Subscriber {
    const current = this.get(id, userId);
    return this.database.db
      .update(subscribers)
      .set({
        ...(input.name !== undefined ? { name: input.name } : {}),
        ...(input.status ? { status: input.status } : {}),
        ...(input.segments ? { segments: input.segments } : {}),
        preferences: { ...current.preferences, ...input.preferences },
        attributes: { ...current.attributes, ...input.attributes },
        updatedAt: new Date().toISOString(),
      })
      .where(eq(subscribers.id, id))
      .returning()
      .get();
  }

  /**
   * One newsletter when `newsletterId` is given, otherwise every subscription.
   */
  unsubscribe(
    id: number,
    options: { newsletterId?: number; reason?: string } = {},
    userId?: number,
  ): void {
    this.get(id, userId);
    const now = new Date().toISOString();

    if (options.newsletterId != null) {
      const subscription = this.subscription(id, options.newsletterId);
      if (!subscription) {
        throw new NotFoundException(
          `subscriber ${id} is not subscribed to newsletter ` +
            `${options.newsletterId}`,
        );
      }
      this.endSubscription(subscription, 'api');
      return;
    }

    const affected = this.database.transaction(() => {
      this.database.db
        .update(subscribers)
        .set({
          status: 'unsubscribed',
          unsubscribedAt: now,
          unsubscribeReason: options.reason ?? null,
          updatedAt: now,
        })
        .where(eq(subscribers.id, id))
        .run();
      const active = this.database.db
        .update(newsletterSubscribers)
        .set({ unsubscribedAt: now })
        .where(
          and(
            eq(newsletterSubscribers.subscriberId, id),
            isNull(newsletterSubscribers.unsubscribedAt),
          ),
        )
        .returning()
        .all();
      for (const row of active) {
        this.recordEvent(id, 'unsubscribe', {
          newsletter_id: row.newsletterId,
          method: 'api',
        });
      }
      return active.map((row) => row.newsletterId);
    });
    for (const newsletterId of affected) {
      this.newslettersService.refreshSubscriberCount(newsletterId);
    }
    this.logger.log(
      `subscriber unsubscribed: id=${id} newsletters=${affected.length}`,
    );
  }

  /**
   * Resolves an unsubscribe token; 400 when invalid, 404 when the subscription
   * is gone.
   */
  resolveUnsubscribeToken(token: string): TokenSubscription {
    const payload = validateUnsubscribeToken(this.settings.secretKey, token);
    if (!payload) {
      throw new BadRequestException('Invalid or expired unsubscribe link');
    }
    const subscriber = this.database.db
      .select()
      .from(subscribers)
      .where(eq(subscribers.id, payload.subscriberId))
      .get();
    const subscription = this.subscription(
      payload.subscriberId,
      payload.newsletterId,
    );
    const newsletter = this.database.db
      .select()
      .from(newsletters)
      .where(eq(newsletters.id, payload.newsletterId))
      .get();
    if (!subscriber || !subscription || !newsletter) {
      throw new NotFoundException('Subscription not found');
    }
    return { subscriber, newsletter, subscription };
  }

  /** False when the subscription had already ended. */
  unsubscribeByToken(token: string, method: 'link' | 'one-click'): boolean {
    const { subscription } = this.resolveUnsubscribeToken(token);
    if (subscription.unsubscribedAt) {
      return false;
    }
    this.endSubscription(subscription, method);
    return true;
  }

  /** False when the subscription was still active. */
  resubscribeByToken(token: string): boolean {
    const { subscription } = this.resolveUnsubscribeToken(token);
    if (!subscription.unsubscribedAt) {
      return false;
    }

    this.database.transaction(() => {
      this.database.db
        .update(newsletterSubscribers)
        .set({ unsubscribedAt: null })
        .where(eq(newsletterSubscribers.id, subscription.id))
        .run();
      this.recordEvent(subscription.subscriberId, 'subscribe', {
        newsletter_id: subscription.newsletterId,
        method: 'resubscribe',
      });
    });
    this.newslettersService.refreshSubscriberCount(subscription.newsletterId);
    this.logger.log(
      `subscriber resubscribed: id=${subscription.subscriberId} ` +
        `newsletter=${subscription.newsletterId}`,
    );
    return true;
  }

  verify(token: string, now: Date = new Date()): VerificationOutcome {
    const email = validateVerificationToken(this.settings.secretKey, token);
    if (!email) {
      throw new BadRequestException('Invalid or expired verification link');
    }
    const subscriber = this.findByEmail(email);
    if (!subscriber) {
      throw new NotFoundException('Email address not found');
    }
    if (subscriber.verifiedAt) {
      return { email: subscriber.email, alreadyVerified: true };
    }

    this.database.transaction(() => {
      this.database.db
        .update(subscribers)
        .set({
          verifiedAt: now.toISOString(),
          status: 'active',
          verificationToken: null,
          updatedAt: now.toISOString(),
        })
        .where(eq(subscribers.id, subscriber.id))
        .run();
      this.recordEvent(subscriber.id, 'verified', { method: 'email_link' });
    });
    this.logger.log(`subscriber verified: id=${subscriber.id}`);
    return { email: subscriber.email, alreadyVerified: false };
  }

  /** The message never reveals whether the address is known. */
  async resendVerification(email: string): Promise<string> {
    const subscriber = this.findByEmail(email);
    if (!subscriber) {
      return 'If the email exists, a verification link has been sent';
    }
    if (subscriber.verifiedAt) {
      return 'Email already verified';
    }
    await this.sendVerification(subscriber, 'resend');
    return 'Verification email sent';
  }

  /** Mail failures are logged; the token stays valid for a later resend. */
  async sendVerification(
    subscriber: Subscriber,
    method: string,
  ): Promise<boolean> {
    const token = generateVerificationToken(
      this.settings.secretKey,
      subscriber.email,
    );
    const url = `${this.settings.frontendUrl}/verify?token=${token}`;
    const message = renderVerificationEmail(
      subscriber.name,
      url,
      this.settings.appName,
    );

    this.database.db
      .update(subscribers)
      .set({ verificationToken: token })
      .where(eq(subscribers.id, subscriber.id))
      .run();

    try {
      await this.mailer.send({ to: subscriber.email, ...message });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `verification email failed: subscriber=${subscriber.id} ${reason}`,
      );
      return false;
    }
    this.recordEvent(subscriber.id, 'verification_sent', { method });
    return true;
  }

  private attach(
    subscriberId: number,
    newsletterId: number,
    method: string,
  ): void {
    if (this.subscription(subscriberId, newsletterId)) {
      return;
    }
    this.database.db
      .insert(newsletterSubscribers)
      .values({ subscriberId, newsletterId })
      .run();
    this.recordEvent(subscriberId, 'subscribe', {
      newsletter_id: newsletterId,
      method,
    });
  }

  private endSubscription(
    subscription: NewsletterSubscriber,
    method: string,
  ): void {
    this.database.transaction(() => {
      this.database.db
        .update(newsletterSubscribers)
        .set({ unsubscribedAt: new Date().toISOString() })
        .where(eq(newsletterSubscribers.id, subscription.id))
        .run();
      this.recordEvent(subscription.subscriberId, 'unsubscribe', {
        newsletter_id: subscription.newsletterId,
        method,
      });
    });
    this.newslettersService.refreshSubscriberCount(subscription.newsletterId);
    this.logger.log(
      `subscription ended: subscriber=${subscription.subscriberId} ` +
        `newsletter=${subscription.newsletterId} method=${method}`,
    );
  }

  private subscription(
    subscriberId: number,
    newsletterId: number,
  ): NewsletterSubscriber | undefined {
    return this.database.db
      .select()
      .from(newsletterSubscribers)
      .where(
        and(
          eq(newsletterSubscribers.subscriberId, subscriberId),
          eq(newsletterSubscribers.newsletterId, newsletterId),
        ),
      )
      .get();
  }

  private belongsToUser(subscriberId: number, userId: number): boolean {
    const row = this.database.db
      .select({ id: newsletterSubscribers.id })
      .from(newsletterSubscribers)
      .innerJoin(
        newsletters,
        eq(newsletters.id, newsletterSubscribers.newsletterId),
      )
      .where(
        and(
          eq(newsletterSubscribers.subscriberId, subscriberId),
          eq(newsletters.userId, userId),
        ),
      )
      .get();
    return row != null;
  }

  private recordEvent(
    subscriberId: number,
    type: EventType,
    metadata: EventMetadata,
  ): void {
    this.database.db
      .insert(subscriberEvents)
      .values({ subscriberId, eventType: type, metadata })
      .run();
  }
}
