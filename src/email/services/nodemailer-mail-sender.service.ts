import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import nodemailer, { Transporter } from 'nodemailer';
import { Settings, SETTINGS, SmtpRelay } from '../../config/settings';
import { MailMessage, MailSender } from '../types/email.types';

@Injectable()
export class NodemailerMailSender implements MailSender, OnModuleDestroy {
  private readonly logger = new Logger(NodemailerMailSender.name);
  private relay: SmtpRelay;
  private transporter: Transporter | null = null;

  constructor(@Inject(SETTINGS) private readonly settings: Settings) {
    this.relay = { host: settings.smtpHost, port: settings.smtpPort };
  }

  async send(message: MailMessage): Promise<void> {
    const startedAt = Date.now();
    await this.transport().sendMail({
      from: this.settings.smtpFrom,
      to: message.to,
      subject: message.subject,
      html: message.html,
      text: message.text,
      headers: message.headers,
    });
    this.logger.debug(
      `mail sent: to=${message.to} relay=${this.relay.host} ` +
        `elapsedMs=${Date.now() - startedAt}`,
    );
  }

  async verify(): Promise<void> {
    await this.transport().verify();
  }

  currentRelay(): SmtpRelay {
    return { ...this.relay };
  }

  useRelay(relay: SmtpRelay): void {
    this.close();
    this.relay = { ...relay };
    this.logger.log(
      `smtp relay switched: host=${relay.host} port=${relay.port}`,
    );
  }

  onModuleDestroy(): void {
    this.close();
  }

  private transport(): Transporter {
    if (!this.transporter) {
      const timeoutMs = this.settings.smtpTimeoutSec * 1000;
      const secure = this.relay.port === 465;
      this.transporter = nodemailer.createTransport({
        host: this.relay.host,
        port: this.relay.port,
        secure,
        requireTLS: this.settings.smtpTls && !secure,
        connectionTimeout: timeoutMs,
        greetingTimeout: timeoutMs,
        socketTimeout: timeoutMs,
        auth:
          this.settings.smtpUser && this.settings.smtpPassword
            ? { user: this.settings.smtpUser, pass: this.settings.smtpPassword }
            : undefined,
      });
    }
    return this.transporter;
  }

  private close(): void {
    this.transporter?.close();
    this.transporter = null;
  }
}
