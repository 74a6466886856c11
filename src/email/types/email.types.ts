import { z } from 'zod';
import { SmtpRelay } from '../../config/settings';

export const MAIL_SENDER = Symbol('MAIL_SENDER');

export interface MailMessage {
  to: string;
  subject: string;
  html: string;
  text?: string;
  headers?: Record<string, string>;
}

/**
 * Outbound mail transport. `send` rejects when the relay refuses the message.
 */
export interface MailSender {
  send(message: MailMessage): Promise<void>;
  verify(): Promise<void>;
  currentRelay(): SmtpRelay;
  useRelay(relay: SmtpRelay): void;
}

export interface DeliveryResult {
  sent: string[];
  failed: string[];
  total: number;
}

export interface ScheduledSendResult {
  processed: number;
  failed: number[];
}

export interface EditionStatsView {
  sent: number;
  delivered: number;
  opened: number;
  clicked: number;
  unsubscribed: number;
  bounced: number;
  complained: number;
  open_rate: number;
  click_rate: number;
}

export interface SubscriberEngagement {
  opens: number;
  clicks: number;
  bounces: number;
  complaints: number;
  engagement_score: number;
  is_engaged: boolean;
  is_at_risk: boolean;
}

export interface TrackingContext {
  ipAddress?: string | null;
  userAgent?: string | null;
}

export const bounceSchema = z.object({
  email: z.string().email(),
  bounce_type: z.enum(['hard', 'soft']).default('hard'),
  reason: z.string().max(500).optional(),
  edition_id: z.number().int().positive().optional(),
});

export const complaintSchema = z.object({
  email: z.string().email(),
  complaint_type: z.string().max(100).optional(),
  edition_id: z.number().int().positive().optional(),
});
