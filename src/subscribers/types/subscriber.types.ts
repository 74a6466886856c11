import { z } from 'zod';
import { SubscriberStatus, SubscriberTier } from '../../database/schema';

const preferencesSchema = z.object({
  preferred_keywords: z.array(z.string().min(1)).optional(),
  blocked_keywords: z.array(z.string().min(1)).optional(),
  max_articles: z.number().int().min(1).max(50).optional(),
  format: z.enum(['html', 'text']).optional(),
});

const attributesSchema = z.object({
  company: z.string().max(200).optional(),
  job_title: z.string().max(200).optional(),
  company_size: z.number().int().min(1).optional(),
  industry: z.string().max(100).optional(),
  country: z.string().max(100).optional(),
  timezone: z.string().max(100).optional(),
  tier: z.enum(['enterprise', 'premium', 'team', 'free', 'trial']).optional(),
  referral_count: z.number().int().min(0).optional(),
  feedback_count: z.number().int().min(0).optional(),
  preferred_send_time: z.string().max(10).optional(),
  device_type: z.string().max(20).optional(),
  signup_source: z.string().max(100).optional(),
});

export const subscriberCreateSchema = z.object({
  email: z.string().email(),
  name: z.string().max(200).optional(),
  newsletter_ids: z.array(z.number().int().positive()).default([]),
  preferences: preferencesSchema.default({}),
  attributes: attributesSchema.default({}),
  segments: z.array(z.string().min(1)).default([]),
});

export type SubscriberCreateInput = z.infer<typeof subscriberCreateSchema>;

export const subscriberUpdateSchema = z.object({
  name: z.string().max(200).nullable().optional(),
  status: z.enum(['active', 'inactive', 'unsubscribed']).optional(),
  preferences: preferencesSchema.optional(),
  attributes: attributesSchema.optional(),
  segments: z.array(z.string().min(1)).optional(),
});

export type SubscriberUpdateInput = z.infer<typeof subscriberUpdateSchema>;

export const unsubscribeSchema = z.object({
  newsletter_id: z.number().int().positive().optional(),
  reason: z.string().max(500).optional(),
});

export interface SubscriberListQuery {
  newsletterId?: number;
  status?: SubscriberStatus;
  limit?: number;
  offset?: number;
}

export type SegmentType =
  | 'engagement'
  | 'preference'
  | 'demographic'
  | 'behavioral'
  | 'lifecycle'
  | 'value';

export type EngagementLevel =
  | 'highly_engaged'
  | 'engaged'
  | 'moderate'
  | 'low'
  | 'inactive'
  | 'new';

export interface SegmentConditions {
  openRateMin?: number;
  openRateMax?: number;
  clickRateMin?: number;
  /** Last open no older than this many days. */
  lastOpenDays?: number;
  lastOpenDaysMin?: number;
  lastOpenDaysMax?: number;
  tier?: SubscriberTier;
  companies?: string[];
  /** Substrings matched against the lowercased job title. */
  roles?: string[];
  companySizeMin?: number;
  companySizeMax?: number;
  referredSubscribersMin?: number;
  feedbackSubmittedMin?: number;
  subscriptionAgeDaysMin?: number;
  subscriptionAgeDaysMax?: number;
  preferredSendTimes?: string[];
  deviceTypes?: string[];
}

export interface SegmentCriteria {
  key: string;
  name: string;
  type: SegmentType;
  conditions: SegmentConditions;
  priority: number;
  description?: string;
  tags: string[];
}

export const customSegmentSchema = z.object({
  key: z.string().regex(/^[a-z0-9_]+$/, 'key must be snake_case'),
  name: z.string().min(1).max(100),
  type: z.enum([
    'engagement',
    'preference',
    'demographic',
    'behavioral',
    'lifecycle',
    'value',
  ]),
  conditions: z
    .object({
      openRateMin: z.number().min(0).max(1),
      openRateMax: z.number().min(0).max(1),
      clickRateMin: z.number().min(0).max(1),
      lastOpenDays: z.number().int().min(0),
      lastOpenDaysMin: z.number().int().min(0),
      lastOpenDaysMax: z.number().int().min(0),
      tier: z.enum(['enterprise', 'premium', 'team', 'free', 'trial']),
      companies: z.array(z.string()),
      roles: z.array(z.string()),
      companySizeMin: z.number().int().min(1),
      companySizeMax: z.number().int().min(1),
      referredSubscribersMin: z.number().int().min(0),
      feedbackSubmittedMin: z.number().int().min(0),
      subscriptionAgeDaysMin: z.number().int().min(0),
      subscriptionAgeDaysMax: z.number().int().min(0),
      preferredSendTimes: z.array(z.string()),
      deviceTypes: z.array(z.string()),
    })
    .partial(),
  priority: z.number().int().min(1).max(10).default(1),
  description: z.string().max(500).optional(),
  tags: z.array(z.string()).default([]),
});

export interface SubscriberProfile {
  subscriberId: number;
  email: string;
  company: string | null;
  role: string | null;
  companySize: number | null;
  tier: SubscriberTier;
  totalSent: number;
  totalOpens: number;
  totalClicks: number;
  lastOpenDate: Date | null;
  lastClickDate: Date | null;
  openRate: number;
  clickRate: number;
  preferredTopics: string[];
  preferredSendTime: string | null;
  subscriptionAgeDays: number;
  referredSubscribers: number;
  feedbackSubmitted: number;
  deviceType: string | null;
}

export interface SegmentRecommendation {
  segment: string;
  reason: string;
  action: string;
}

export interface SubscriberSegmentsView {
  subscriber_id: number;
  engagement_level: EngagementLevel;
  open_rate: number;
  click_rate: number;
  segments: string[];
  recommendations: SegmentRecommendation[];
}
