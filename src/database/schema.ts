import {
  index,
  integer,
  real,
  sqliteTable,
  text,
  uniqueIndex,
} from 'drizzle-orm/sqlite-core';

const now = () => new Date().toISOString();

export type NewsletterStatus = 'active' | 'paused' | 'archived';
export type Frequency = 'daily' | 'weekly' | 'monthly';
export type TemplateName = 'default' | 'responsive';

export interface ContentRatioSettings {
  original: number;
  curated: number;
  syndicated: number;
}

export interface NewsletterSettings {
  frequency: Frequency;
  send_time: string;
  max_articles: number;
  price?: number;
  categories?: string[];
  content_ratio?: ContentRatioSettings;
  template?: TemplateName;
  min_score?: number;
}

export type SubscriberStatus =
  | 'pending'
  | 'active'
  | 'inactive'
  | 'unsubscribed'
  | 'bounced'
  | 'complained';

export interface SubscriberPreferences {
  preferred_keywords?: string[];
  blocked_keywords?: string[];
  max_articles?: number;
  format?: 'html' | 'text';
}

export type SubscriberTier =
  | 'enterprise'
  | 'premium'
  | 'team'
  | 'free'
  | 'trial';

export interface SubscriberAttributes {
  company?: string;
  job_title?: string;
  company_size?: number;
  industry?: string;
  country?: string;
  timezone?: string;
  tier?: SubscriberTier;
  referral_count?: number;
  feedback_count?: number;
  preferred_send_time?: string;
  device_type?: string;
  signup_source?: string;
}

export type ContentType = 'original' | 'curated' | 'syndicated';

export type SourceType = 'rss' | 'hackernews' | 'reddit';
export type HackerNewsStoryType = 'top' | 'best' | 'new';
export type RedditSort = 'hot' | 'new' | 'top' | 'rising';
export type RedditTimeFilter =
  | 'hour'
  | 'day'
  | 'week'
  | 'month'
  | 'year'
  | 'all';

export interface SourceConfig {
  content_type?: ContentType;
  story_type?: HackerNewsStoryType;
  sort?: RedditSort;
  time_filter?: RedditTimeFilter;
  include_stickied?: boolean;
  include_nsfw?: boolean;
  keywords?: string[];
  exclude_keywords?: string[];
  trusted_authors?: string[];
  limit?: number;
  min_score?: number;
  niche?: string;
}

export interface ContentMetadata {
  category?: string;
  topics?: string[];
  sentiment?: string;
  niche?: string;
  engagement?: number;
  comments?: number;
  has_code?: boolean;
  has_images?: boolean;
  read_time?: number;
  summarized_by?: 'llm' | 'extractive';
}

export type EditionStatus =
  | 'draft'
  | 'scheduled'
  | 'sending'
  | 'sent'
  | 'failed';

export interface EditionArticle {
  id: number;
  title: string;
  url: string;
  summary: string;
  author: string | null;
  source: string;
  category: string;
  score: number;
  content_type: ContentType;
  published_at: string | null;
  key_points: string[];
  tags: string[];
}

export interface EditionSection {
  name: string;
  articles: EditionArticle[];
}

export interface EditionContent {
  newsletter_id: number;
  newsletter_name: string;
  sections: EditionSection[];
  total_articles: number;
  generated_at: string;
}

export type EventType =
  | 'subscribe'
  | 'unsubscribe'
  | 'sent'
  | 'open'
  | 'click'
  | 'bounce'
  | 'complaint'
  | 'forward'
  | 'verified'
  | 'verification_sent';

export type EventMetadata = Record<string, string | number | boolean | null>;

export const users = sqliteTable('users', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  email: text('email').notNull().unique(),
  username: text('username').notNull().unique(),
  hashedPassword: text('hashed_password').notNull(),
  fullName: text('full_name'),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  isSuperuser: integer('is_superuser', { mode: 'boolean' })
    .notNull()
    .default(false),
  createdAt: text('created_at').notNull().$defaultFn(now),
  updatedAt: text('updated_at').notNull().$defaultFn(now),
});

export const apiKeys = sqliteTable(
  'api_keys',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    userId: integer('user_id').notNull(),
    name: text('name').notNull(),
    keyPrefix: text('key_prefix').notNull(),
    keyHash: text('key_hash').notNull().unique(),
    revoked: integer('revoked', { mode: 'boolean' }).notNull().default(false),
    lastUsedAt: text('last_used_at'),
    createdAt: text('created_at').notNull().$defaultFn(now),
  },
  (table) => ({
    userIdx: index('idx_api_keys_user').on(table.userId),
  }),
);

export const newsletters = sqliteTable(
  'newsletters',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    userId: integer('user_id'),
    name: text('name').notNull().unique(),
    niche: text('niche').notNull(),
    description: text('description'),
    status: text('status').$type<NewsletterStatus>().notNull().default(
      'active',
    ),
    settings: text('settings', { mode: 'json' })
      .$type<NewsletterSettings>()
      .notNull(),
    subscriberCount: integer('subscriber_count').notNull().default(0),
    createdAt: text('created_at').notNull().$defaultFn(now),
    updatedAt: text('updated_at').notNull().$defaultFn(now),
  },
  (table) => ({
    userIdx: index('idx_newsletters_user').on(table.userId),
  }),
);

export const subscribers = sqliteTable(
  'subscribers',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    email: text('email').notNull().unique(),
    name: text('name'),
    status: text('status').$type<SubscriberStatus>().notNull().default(
      'pending',
    ),
    verificationToken: text('verification_token'),
    verifiedAt: text('verified_at'),
    subscribedAt: text('subscribed_at').notNull().$defaultFn(now),
    unsubscribedAt: text('unsubscribed_at'),
    unsubscribeReason: text('unsubscribe_reason'),
    preferences: text('preferences', { mode: 'json' })
      .$type<SubscriberPreferences>()
      .notNull()
      .$defaultFn(() => ({})),
    attributes: text('attributes', { mode: 'json' })
      .$type<SubscriberAttributes>()
      .notNull()
      .$defaultFn(() => ({})),
    segments: text('segments', { mode: 'json' })
      .$type<string[]>()
      .notNull()
      .$defaultFn(() => []),
    bounceCount: integer('bounce_count').notNull().default(0),
    complaintCount: integer('complaint_count').notNull().default(0),
    lastEmailSent: text('last_email_sent'),
    createdAt: text('created_at').notNull().$defaultFn(now),
    updatedAt: text('updated_at').notNull().$defaultFn(now),
  },
  (table) => ({
    statusIdx: index('idx_subscribers_status').on(table.status),
  }),
);

export const newsletterSubscribers = sqliteTable(
  'newsletter_subscribers',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    newsletterId: integer('newsletter_id').notNull(),
    subscriberId: integer('subscriber_id').notNull(),
    subscribedAt: text('subscribed_at').notNull().$defaultFn(now),
    unsubscribedAt: text('unsubscribed_at'),
  },
  (table) => ({
    pairIdx: uniqueIndex('idx_newsletter_subscriber_pair').on(
      table.newsletterId,
      table.subscriberId,
    ),
  }),
);

export const contentSources = sqliteTable('content_sources', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  newsletterId: integer('newsletter_id'),
  name: text('name').notNull(),
  url: text('url').notNull(),
  type: text('type').$type<SourceType>().notNull().default('rss'),
  config: text('config', { mode: 'json' })
    .$type<SourceConfig>()
    .notNull()
    .$defaultFn(() => ({})),
  active: integer('active', { mode: 'boolean' }).notNull().default(true),
  fetchFrequencyMinutes: integer('fetch_frequency_minutes')
    .notNull()
    .default(60),
  lastFetched: text('last_fetched'),
  errorCount: integer('error_count').notNull().default(0),
  consecutiveFailures: integer('consecutive_failures').notNull().default(0),
  lastError: text('last_error'),
  disabledUntil: text('disabled_until'),
  disabledReason: text('disabled_reason'),
  createdAt: text('created_at').notNull().$defaultFn(now),
});

export const contentItems = sqliteTable(
  'content_items',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    sourceId: integer('source_id'),
    url: text('url').notNull().unique(),
    title: text('title').notNull(),
    content: text('content'),
    summary: text('summary'),
    author: text('author'),
    publishedAt: text('published_at'),
    fetchedAt: text('fetched_at').notNull().$defaultFn(now),
    processedAt: text('processed_at'),
    contentType: text('content_type')
      .$type<ContentType>()
      .notNull()
      .default('curated'),
    score: real('score').notNull().default(0),
    contentHash: text('content_hash').notNull(),
    tags: text('tags', { mode: 'json' })
      .$type<string[]>()
      .notNull()
      .$defaultFn(() => []),
    keyPoints: text('key_points', { mode: 'json' })
      .$type<string[]>()
      .notNull()
      .$defaultFn(() => []),
    metadata: text('metadata', { mode: 'json' })
      .$type<ContentMetadata>()
      .notNull()
      .$defaultFn(() => ({})),
    createdAt: text('created_at').notNull().$defaultFn(now),
  },
  (table) => ({
    fetchedIdx: index('idx_content_items_fetched').on(table.fetchedAt),
    scoreIdx: index('idx_content_items_score').on(table.score),
  }),
);

export const editions = sqliteTable(
  'editions',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    newsletterId: integer('newsletter_id').notNull(),
    editionNumber: integer('edition_number').notNull().default(1),
    subject: text('subject').notNull(),
    content: text('content', { mode: 'json' })
      .$type<EditionContent>()
      .notNull(),
    status: text('status').$type<EditionStatus>().notNull().default('draft'),
    testMode: integer('test_mode', { mode: 'boolean' })
      .notNull()
      .default(false),
    scheduledFor: text('scheduled_for'),
    sentAt: text('sent_at'),
    createdAt: text('created_at').notNull().$defaultFn(now),
    updatedAt: text('updated_at').notNull().$defaultFn(now),
  },
  (table) => ({
    statusIdx: index('idx_editions_status').on(table.status),
  }),
);

export const editionStats = sqliteTable('edition_stats', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  editionId: integer('edition_id').notNull().unique(),
  sentCount: integer('sent_count').notNull().default(0),
  deliveredCount: integer('delivered_count').notNull().default(0),
  openedCount: integer('opened_count').notNull().default(0),
  clickedCount: integer('clicked_count').notNull().default(0),
  unsubscribedCount: integer('unsubscribed_count').notNull().default(0),
  bouncedCount: integer('bounced_count').notNull().default(0),
  complainedCount: integer('complained_count').notNull().default(0),
  openRate: real('open_rate').notNull().default(0),
  clickRate: real('click_rate').notNull().default(0),
  updatedAt: text('updated_at').notNull().$defaultFn(now),
});

export const subscriberEvents = sqliteTable(
  'subscriber_events',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    subscriberId: integer('subscriber_id').notNull(),
    editionId: integer('edition_id'),
    eventType: text('event_type').$type<EventType>().notNull(),
    metadata: text('metadata', { mode: 'json' })
      .$type<EventMetadata>()
      .notNull()
      .$defaultFn(() => ({})),
    ipAddress: text('ip_address'),
    userAgent: text('user_agent'),
    createdAt: text('created_at').notNull().$defaultFn(now),
  },
  (table) => ({
    subscriberIdx: index('idx_events_subscriber').on(table.subscriberId),
    editionIdx: index('idx_events_edition').on(table.editionId),
    typeIdx: index('idx_events_type').on(table.eventType),
  }),
);

export const cacheEntries = sqliteTable('cache_entries', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  cacheKey: text('cache_key').notNull().unique(),
  operation: text('operation').notNull(),
  model: text('model').notNull(),
  response: text('response', { mode: 'json' }).$type<unknown>().notNull(),
  expiresAt: text('expires_at').notNull(),
  hitCount: integer('hit_count').notNull().default(0),
  createdAt: text('created_at').notNull().$defaultFn(now),
});

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type ApiKey = typeof apiKeys.$inferSelect;
export type Newsletter = typeof newsletters.$inferSelect;
export type NewNewsletter = typeof newsletters.$inferInsert;
export type Subscriber = typeof subscribers.$inferSelect;
export type NewSubscriber = typeof subscribers.$inferInsert;
export type NewsletterSubscriber = typeof newsletterSubscribers.$inferSelect;
export type ContentSource = typeof contentSources.$inferSelect;
export type NewContentSource = typeof contentSources.$inferInsert;
export type ContentItem = typeof contentItems.$inferSelect;
export type NewContentItem = typeof contentItems.$inferInsert;
export type Edition = typeof editions.$inferSelect;
export type NewEdition = typeof editions.$inferInsert;
export type EditionStats = typeof editionStats.$inferSelect;
export type SubscriberEvent = typeof subscriberEvents.$inferSelect;
export type CacheEntry = typeof cacheEntries.$inferSelect;
