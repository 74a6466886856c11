import { z } from 'zod';
import { EditionContent, Frequency, TemplateName } from '../../database/schema';

const ratioSchema = z.object({
  original: z.number().min(0).max(1),
  curated: z.number().min(0).max(1),
  syndicated: z.number().min(0).max(1),
}).refine(
  (ratio) => Math.abs(
    ratio.original + ratio.curated + ratio.syndicated - 1,
  ) <= 0.01,
  'content_ratio must sum to 1.0',
);

const settingsSchema = z.object({
  frequency: z.enum(['daily', 'weekly', 'monthly']).optional(),
  send_time: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'send_time must be HH:MM')
    .optional(),
  max_articles: z.number().int().min(1).max(50).optional(),
  price: z.number().min(0).optional(),
  categories: z.array(z.string().min(1)).min(1).optional(),
  content_ratio: ratioSchema.optional(),
  template: z.enum(['default', 'responsive']).optional(),
  min_score: z.number().min(0).max(100).optional(),
});

export const newsletterCreateSchema = z.object({
  name: z.string().min(1).max(200),
  niche: z.string().min(1).max(100),
  description: z.string().max(2000).optional(),
  settings: settingsSchema.default({}),
});

export type NewsletterCreateInput = z.infer<typeof newsletterCreateSchema>;

export const newsletterUpdateSchema = z.object({
  name: z.string().min(1).max(200).optional(),
  description: z.string().max(2000).nullable().optional(),
  status: z.enum(['active', 'paused', 'archived']).optional(),
  settings: settingsSchema.optional(),
});

export type NewsletterUpdateInput = z.infer<typeof newsletterUpdateSchema>;

export const sourceCreateSchema = z.object({
  name: z.string().min(1).max(200),
  url: z.string().url(),
  type: z.enum(['rss', 'hackernews', 'reddit']).default('rss'),
  content_type: z
    .enum(['original', 'curated', 'syndicated'])
    .default('curated'),
  story_type: z.enum(['top', 'best', 'new']).optional(),
  sort: z.enum(['hot', 'new', 'top', 'rising']).optional(),
  time_filter: z
    .enum(['hour', 'day', 'week', 'month', 'year', 'all'])
    .optional(),
  include_stickied: z.boolean().optional(),
  include_nsfw: z.boolean().optional(),
  keywords: z.array(z.string()).optional(),
  exclude_keywords: z.array(z.string()).optional(),
  trusted_authors: z.array(z.string()).optional(),
  limit: z.number().int().min(1).max(200).optional(),
  min_score: z.number().min(0).max(100).optional(),
  fetch_frequency_minutes: z.number().int().min(5).max(24 * 60).default(60),
});

export type SourceCreateInput = z.infer<typeof sourceCreateSchema>;

export const generateEditionSchema = z.object({
  newsletter_id: z.number().int().positive(),
  test_mode: z.boolean().default(false),
  max_articles: z.number().int().min(1).max(50).optional(),
  min_score: z.number().min(0).max(100).optional(),
});

export const scheduleEditionSchema = z.object({
  send_at: z.string().datetime({ offset: true }),
});

export const sendEditionSchema = z.object({
  test_emails: z.array(z.string().email()).min(1).optional(),
});

export interface GenerateOptions {
  testMode?: boolean;
  maxArticles?: number;
  minScore?: number;
}

export interface RenderedEdition {
  html: string;
  text: string;
}

export interface EditionPreview extends RenderedEdition {
  edition_id: number;
  subject: string;
  personalized: boolean;
}

export interface TemplateContext {
  newsletter: { id: number; name: string; description: string | null };
  subject: string;
  editionNumber: number;
  sections: EditionContent['sections'];
  unsubscribeUrl: string;
  preferencesUrl: string;
  subscriberName?: string | null;
  generatedAt: Date;
}

export const DEFAULT_CATEGORIES = [
  'Technology',
  'Science',
  'Business',
  'General',
];

export const FREQUENCY_LOOKBACK_HOURS: Record<Frequency, number> = {
  daily: 24,
  weekly: 168,
  monthly: 72,
};

export const TEMPLATE_NAMES: readonly TemplateName[] = [
  'default',
  'responsive',
];
