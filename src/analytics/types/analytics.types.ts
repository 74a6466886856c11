import { z } from 'zod';

export const PERIOD_DAYS = {
  day: 1,
  week: 7,
  month: 30,
  year: 365,
} as const;

export type Period = keyof typeof PERIOD_DAYS;

const optionalId = z.coerce.number().int().positive().optional();

export const overviewQuerySchema = z.object({
  newsletter_id: optionalId,
  period: z.enum(['day', 'week', 'month', 'year']).default('week'),
});

export const growthQuerySchema = z.object({
  newsletter_id: optionalId,
  days: z.coerce.number().int().min(1).max(365).default(30),
});

export const engagementQuerySchema = z.object({
  newsletter_id: optionalId,
  edition_id: optionalId,
});

export interface SubscriberSummary {
  total: number;
  new: number;
  growth_rate: number;
}

export interface AnalyticsOverview {
  period: Period;
  subscribers: SubscriberSummary;
  engagement: {
    editions_sent: number;
    total_opens: number;
    total_clicks: number;
    avg_open_rate: number;
    avg_click_rate: number;
  };
}

export interface GrowthPoint {
  date: string;
  subscribers: number;
}

export interface GrowthSeries {
  period_days: number;
  data: GrowthPoint[];
}

export interface EditionEngagement {
  edition_id: number;
  sent: number;
  delivered: number;
  opened: number;
  clicked: number;
  open_rate: number;
  click_rate: number;
}

export interface OverallEngagement {
  total_sent: number;
  total_opened: number;
  total_clicked: number;
  avg_open_rate: number;
  avg_click_rate: number;
}

export interface AnalyticsReport {
  generated_at: string;
  period: 'last_30_days';
  newsletter_id: number | null;
  subscribers: SubscriberSummary;
  editions: {
    sent: number;
    frequency: 'daily' | 'weekly';
  };
  engagement: {
    total_opens: number;
    total_clicks: number;
    avg_open_rate: number;
    avg_click_rate: number;
  };
}
