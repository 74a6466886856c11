import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { and, eq, inArray, isNotNull, isNull, notInArray } from 'drizzle-orm';
import { Settings, SETTINGS } from '../../config/settings';
import { DatabaseService } from '../../database/database.service';
import {
  Edition,
  newsletterSubscribers,
  Subscriber,
  subscriberEvents,
  subscribers,
} from '../../database/schema';
import { generateUnsubscribeToken } from '../../auth/utils/tokens.util';
import { EditionsService } from '../../newsletters/services/editions.service';
import { NewsletterGeneratorService } from '../../newsletters/services/newsletter-generator.service';
import { canTransition } from '../../newsletters/utils/edition-status.util';
import { errorMessage } from '../../common/utils/object.util';
import {
  DeliveryResult,
  MAIL_SENDER,
  MailSender,
  ScheduledSendResult,
} from '../types/email.types';
import {
  addClickTracking,
  addTrackingPixel,
  createTrackingId,
  normalizeEmail,
} from '../utils/email-builder.util';

type Recipient = Pick<Subscriber, 'id' | 'email' | 'name' | 'preferences'> & {
  /** Test address with no subscriber row behind it. */
  transient: boolean;
};

@Injectable()
export class DeliveryManagerService {
  private readonly logger = new Logger(DeliveryManagerService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly editionsService: EditionsService,
    private readonly generator: NewsletterGeneratorService,
    @Inject(MAIL_SENDER) private readonly mailer: MailSender,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  async sendEdition(
    editionId: number,
    testMode = false,
    testEmails: string[] = [],
  ): Promise<DeliveryResult> {
    const startedAt = Date.now();
    const edition = this.editionsService.get(editionId);
    if (edition.status === 'sent' && !testMode) {
      throw new BadRequestException(`edition ${editionId} already sent`);
    }

    const recipients =
      testMode && testEmails.length
        ? this.testRecipients(testEmails)
        : this.activeRecipients(edition.newsletterId);
    if (!recipients.length) {
      throw new BadRequestException('no recipients available');
    }

    if (!testMode && edition.status !== 'sending') {
      this.editionsService.transition(editionId, 'sending');
    }
    this.logger.log(
      `delivery started: edition=${editionId} ` +
        `recipients=${recipients.length} testMode=${testMode}`,
    );

    const result = await this.runBatches(edition, recipients, testMode);

    if (!testMode) {
      this.editionsService.incrementStats(editionId, {
        deliveredCount: result.sent.length,
      });
      this.editionsService.transition(editionId, 'sent', {
        sentAt: new Date().toISOString(),
      });
    }
    this.logger.log(
      `delivery done: edition=${editionId} sent=${result.sent.length} ` +
        `failed=${result.failed.length} elapsedMs=${Date.now() - startedAt}`,
    );
    return result;
  }

  /** Sends to active recipients that have no SENT event for the edition yet. */
  async resendFailed(editionId: number): Promise<DeliveryResult> {
    const edition = this.editionsService.get(editionId);
    this.editionsService.getStats(editionId);

    const delivered = this.database.db
      .selectDistinct({ id: subscriberEvents.subscriberId })
      .from(subscriberEvents)
      .where(
        and(
          eq(subscriberEvents.eventType, 'sent'),
          eq(subscriberEvents.editionId, editionId),
        ),
      )
      .all()
      .map((row) => row.id);
    const recipients = this.activeRecipients(edition.newsletterId, delivered);
    if (!recipients.length) {
      return { sent: [], failed: [], total: 0 };
    }

    const result = await this.runBatches(edition, recipients, false);
    this.editionsService.incrementStats(editionId, {
      deliveredCount: result.sent.length,
    });
    this.logger.log(
      `resend done: edition=${editionId} sent=${result.sent.length} ` +
        `failed=${result.failed.length}`,
    );
    return result;
  }

  /**
   * Sends due scheduled editions; an edition that throws is marked failed and
   * not retried.
   */
  async processScheduledSends(
    now: Date = new Date(),
  ): Promise<ScheduledSendResult> {
    const due = this.editionsService.dueScheduled(now);
    const failed: number[] = [];

    for (const edition of due) {
      try {
        await this.sendEdition(edition.id);
      } catch (error) {
        this.logger.error(
          `scheduled send failed: edition=${edition.id} ${errorMessage(error)}`,
        );
        failed.push(edition.id);
        const current = this.editionsService.get(edition.id);
        if (canTransition(current.status, 'failed')) {
          this.editionsService.transition(edition.id, 'failed');
        }
      }
    }
    return { processed: due.length, failed };
  }

  private async runBatches(
    edition: Edition,
    recipients: Recipient[],
    testMode: boolean,
  ): Promise<DeliveryResult> {
    const result: DeliveryResult = {
      sent: [],
      failed: [],
      total: recipients.length,
    };
    const batchSize = this.settings.deliveryBatchSize;

    for (let offset = 0; offset < recipients.length; offset += batchSize) {
      const batch = recipients.slice(offset, offset + batchSize);
      const outcomes = await Promise.all(
        batch.map((recipient) => this.deliver(edition, recipient, testMode)),
      );

      const sentIds: number[] = [];
      outcomes.forEach((ok, index) => {
        const recipient = batch[index];
        if (!recipient) {
          return;
        }
        if (ok) {
          result.sent.push(recipient.email);
          if (!recipient.transient) {
            sentIds.push(recipient.id);
          }
        } else {
          result.failed.push(recipient.email);
        }
      });

      if (!testMode && sentIds.length) {
        this.database.db
          .update(subscribers)
          .set({ lastEmailSent: new Date().toISOString() })
          .where(inArray(subscribers.id, sentIds))
          .run();
      }
      this.logger.debug(
        `delivery batch done: edition=${edition.id} offset=${offset} ` +
          `size=${batch.length}`,
      );
    }
    return result;
  }

  /**
   * Resolves to false instead of rejecting so one recipient cannot fail the
   * batch.
   */
  private async deliver(
    edition: Edition,
    recipient: Recipient,
    testMode: boolean,
  ): Promise<boolean> {
    try {
      const rendered = this.generator.renderEdition(
        edition,
        recipient.transient ? null : recipient,
      );
      const trackingId =
        testMode || recipient.transient
          ? null
          : createTrackingId(edition.id, recipient.id);
      const html = trackingId
        ? addClickTracking(
            addTrackingPixel(
              rendered.html,
              trackingId,
              this.settings.trackingBaseUrl,
            ),
            trackingId,
            this.settings.trackingBaseUrl,
          )
        : rendered.html;

      await this.mailer.send({
        to: recipient.email,
        subject: edition.subject || 'Newsletter',
        html,
        text: rendered.text,
        headers: this.headers(edition, recipient),
      });

      if (trackingId) {
        // sent_count covers every tracking id that can resolve
        this.database.transaction(() => {
          this.database.db
            .insert(subscriberEvents)
            .values({
              subscriberId: recipient.id,
              editionId: edition.id,
              eventType: 'sent',
              metadata: { tracking_id: trackingId, edition_id: edition.id },
            })
            .run();
          this.editionsService.incrementStats(edition.id, { sentCount: 1 });
        });
      }
      return true;
    } catch (error) {
      this.logger.warn(
        `delivery failed: edition=${edition.id} to=${recipient.email} ` +
          errorMessage(error),
      );
      return false;
    }
  }

  private headers(
    edition: Edition,
    recipient: Recipient,
  ): Record<string, string> {
    const base = this.settings.unsubscribeBaseUrl;
    const oneClick = recipient.transient
      ? base
      : `${base}/one-click?token=${generateUnsubscribeToken(
          this.settings.secretKey,
          recipient.id,
          edition.newsletterId,
        )}`;
    return {
      'List-Unsubscribe': `<${oneClick}>`,
      'List-Unsubscribe-Post': 'List-Unsubscribe=One-Click',
      'X-Newsletter-ID': String(edition.newsletterId),
      'X-Edition-ID': String(edition.id),
    };
  }

  private activeRecipients(
    newsletterId: number,
    exclude: number[] = [],
  ): Recipient[] {
    const rows = this.database.db
      .select({
        id: subscribers.id,
        email: subscribers.email,
        name: subscribers.name,
        preferences: subscribers.preferences,
      })
      .from(subscribers)
      .innerJoin(
        newsletterSubscribers,
        eq(newsletterSubscribers.subscriberId, subscribers.id),
      )
      .where(
        and(
          eq(newsletterSubscribers.newsletterId, newsletterId),
          isNull(newsletterSubscribers.unsubscribedAt),
          eq(subscribers.status, 'active'),
          isNotNull(subscribers.verifiedAt),
          exclude.length ? notInArray(subscribers.id, exclude) : undefined,
        ),
      )
      .orderBy(subscribers.id)
      .all();
    return rows.map((row) => ({ ...row, transient: false }));
  }

  private testRecipients(emails: string[]): Recipient[] {
    return emails.map((raw) => {
      const email = normalizeEmail(raw);
      const known = this.database.db
        .select()
        .from(subscribers)
        .where(eq(subscribers.email, email))
        .get();
      return known
        ? {
          id: known.id,
          email: known.email,
          name: known.name,
          preferences: known.preferences,
          transient: false,
        }
        : { id: 0, email, name: 'Test User', preferences: {}, transient: true };
    });
  }
}
