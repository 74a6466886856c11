import { z } from 'zod';

export const TEST_TYPES = [
  'subject_line',
  'content_variant',
  'send_time',
  'from_name',
  'cta_button',
  'template',
  'frequency',
] as const;
export type TestType = (typeof TEST_TYPES)[number];

export type TestStatus =
  | 'draft'
  | 'running'
  | 'completed'
  | 'paused'
  | 'cancelled';

export const WINNER_CRITERIA = [
  'open_rate',
  'click_rate',
  'conversion_rate',
  'revenue',
  'engagement_score',
] as const;
export type WinnerCriteria = (typeof WINNER_CRITERIA)[number];

export const AB_EVENT_TYPES = [
  'send',
  'open',
  'click',
  'conversion',
  'unsubscribe',
] as const;
export type AbEventType = (typeof AB_EVENT_TYPES)[number];

export type AssignmentMethod = 'random' | 'hash';

export interface TestVariant {
  variantId: string;
  name: string;
  content: Record<string, unknown>;
  subscriberIds: number[];
  sends: number;
  opens: number;
  clicks: number;
  conversions: number;
  unsubscribes: number;
  revenue: number;
  /** Rates are fractions of sends; ctr is clicks over opens. */
  openRate: number;
  clickRate: number;
  conversionRate: number;
  ctr: number;
  isWinner: boolean;
}

export interface AbTest {
  testId: string;
  name: string;
  testType: TestType;
  status: TestStatus;
  newsletterId: number;
  segmentIds: string[];
  testSize: number;
  minSampleSize: number;
  maxRuntimeHours: number;
  confidenceThreshold: number;
  winnerCriteria: WinnerCriteria;
  control: TestVariant;
  variants: TestVariant[];
  holdoutAudience: number[];
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  winnerId: string | null;
  statisticalSignificance: number;
  improvementPercentage: number;
  tags: string[];
  notes: string | null;
}

export const testOptionsSchema = z.object({
  segment_ids: z.array(z.string()).default([]),
  test_size: z.number().gt(0).max(1).default(0.2),
  min_sample_size: z.number().int().min(1).default(100),
  max_runtime_hours: z.number().int().min(1).default(48),
  confidence_threshold: z.number().gt(0).lt(1).default(0.95),
  winner_criteria: z.enum(WINNER_CRITERIA).default('open_rate'),
  tags: z.array(z.string()).default([]),
  notes: z.string().max(2000).optional(),
});

export type TestOptionsInput = z.input<typeof testOptionsSchema>;

export const createTestSchema = testOptionsSchema.extend({
  name: z.string().min(1).max(200),
  test_type: z.enum(TEST_TYPES),
  newsletter_id: z.number().int().positive(),
  variants: z.array(z.record(z.unknown())).min(2),
});

export type CreateTestInput = z.infer<typeof createTestSchema>;

export const subjectLineTestSchema = z.object({
  newsletter_id: z.number().int().positive(),
  topic: z.string().min(1).max(120),
  patterns: z.array(z.string().min(1)).min(2).optional(),
});

export const assignSchema = z.object({
  method: z.enum(['random', 'hash']).default('random'),
});

export const recordEventSchema = z.object({
  variant_id: z.string().min(1),
  event_type: z.enum(AB_EVENT_TYPES),
  subscriber_id: z.number().int().positive(),
  value: z.number().optional(),
});

export interface VariantResult {
  variant_id: string;
  name: string;
  subscribers: number;
  sends: number;
  opens: number;
  clicks: number;
  open_rate: number;
  click_rate: number;
  is_winner: boolean;
}

export interface TestResults {
  test_id: string;
  name: string;
  status: TestStatus;
  type: TestType;
  newsletter_id: number;
  started_at: string | null;
  completed_at: string | null;
  winner: string | null;
  statistical_significance: number;
  improvement_percentage: number;
  holdout_size: number;
  variants: VariantResult[];
}

export interface WinningPattern {
  pattern: string;
  improvement: number;
  sample_size: number;
}

export interface WinningPatterns {
  subject_lines: WinningPattern[];
  send_times: WinningPattern[];
  content_types: WinningPattern[];
}

/**
 * Source of uniform numbers in [0, 1) used for sampling and placeholder picks.
 */
export const AB_RANDOM = Symbol('AB_RANDOM');
export type RandomSource = () => number;
