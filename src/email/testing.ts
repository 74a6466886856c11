import { SmtpRelay } from '../config/settings';
import { DatabaseService } from '../database/database.service';
import {
  newsletterSubscribers,
  NewSubscriber,
  Subscriber,
  subscribers,
} from '../database/schema';
import { MailMessage, MailSender } from './types/email.types';

/**
 * In-memory transport; addresses in `failFor` are rejected, hosts in
 * `failingHosts` refuse everything.
 */
export class FakeMailSender implements MailSender {
  readonly sent: MailMessage[] = [];
  readonly failFor = new Set<string>();
  readonly failingHosts = new Set<string>();
  verifyError: Error | null = null;
  private relay: SmtpRelay = { host: 'smtp.test.local', port: 587 };

  async send(message: MailMessage): Promise<void> {
    if (this.failingHosts.has(this.relay.host)) {
      throw new Error(`554 ${this.relay.host} refused: sender on blacklist`);
    }
    if (this.failFor.has(message.to)) {
      throw new Error(`550 mailbox unavailable: ${message.to}`);
    }
    this.sent.push(message);
  }

  async verify(): Promise<void> {
    if (this.failingHosts.has(this.relay.host)) {
      throw new Error(`connection refused by ${this.relay.host}`);
    }
    if (this.verifyError) {
      throw this.verifyError;
    }
  }

  currentRelay(): SmtpRelay {
    return { ...this.relay };
  }

  useRelay(relay: SmtpRelay): void {
    this.relay = { ...relay };
  }
}

export function insertSubscriber(
  database: DatabaseService,
  newsletterId: number,
  email: string,
  values: Partial<NewSubscriber> & { unsubscribedAt?: string } = {},
): Subscriber {
  const { unsubscribedAt, ...rest } = values;
  const subscriber = database.db
    .insert(subscribers)
    .values({
      email,
      status: 'active',
      verifiedAt: '2026-01-01T00:00:00.000Z',
      ...rest,
    })
    .returning()
    .get();
  database.db
    .insert(newsletterSubscribers)
    .values({
      newsletterId,
      subscriberId: subscriber.id,
      unsubscribedAt: unsubscribedAt ?? null,
    })
    .run();
  return subscriber;
}
