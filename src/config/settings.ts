import { z } from 'zod';

export const SETTINGS = Symbol('SETTINGS');

const booleanFlag = (fallback: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .optional()
    .transform((value, ctx) => {
      if (value == null || value === '') {
        return fallback;
      }
      if (typeof value === 'boolean') {
        return value;
      }
      const lowered = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'y', 'on'].includes(lowered)) {
        return true;
      }
      if (['0', 'false', 'no', 'n', 'off'].includes(lowered)) {
        return false;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected a boolean value, got "${value}"`,
      });
      return z.NEVER;
    });

const int = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const num = (fallback: number) => z.coerce.number().nonnegative().default(
  fallback,
);

const relaySchema = z.object({
  host: z.string().min(1),
  port: z.number().int().positive().default(587),
});

export type SmtpRelay = z.infer<typeof relaySchema>;

export const DEFAULT_BACKUP_RELAYS: SmtpRelay[] = [
  { host: 'smtp.sendgrid.net', port: 587 },
  { host: 'smtp.resend.com', port: 587 },
  { host: 'smtp.gmail.com', port: 587 },
];

const relayList = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (!value || !value.trim()) {
      return DEFAULT_BACKUP_RELAYS;
    }
    try {
      return z.array(relaySchema).parse(JSON.parse(value));
    } catch {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'SMTP_BACKUP_RELAYS must be a JSON array of {host, port}',
      });
      return z.NEVER;
    }
  });

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  APP_NAME: z.string().default('Newsletter Engine'),
  APP_VERSION: z.string().default('1.0.0'),
  DEBUG: booleanFlag(false),
  PORT: int(8000, 1),
  API_PREFIX: z.string().default('/api/v1'),
  DATABASE_URL: z.string().default('sqlite:///./data/newsletter.db'),
  DATA_DIR: z.string().default('./data'),

  SECRET_KEY: z.string().min(1).default('change-me-in-production'),
  JWT_EXPIRATION_HOURS: int(24, 1),

  OLLAMA_HOST: z.string().url().default('http://localhost:11434'),
  OLLAMA_TIMEOUT_SEC: int(120, 1),
  OLLAMA_MAX_RETRIES: int(2),
  OLLAMA_RETRY_BACKOFF_SEC: num(1.5),
  PRIMARY_MODEL: z.string().default('mistral:7b-instruct'),
  FALLBACK_MODEL: z.string().default('llama3.2:3b'),
  CLASSIFICATION_MODEL: z.string().default('phi3:mini'),
  DEFAULT_TEMPERATURE: num(0.7),
  DEFAULT_MAX_TOKENS: int(500, 1),
  LLM_CACHE_ENABLED: booleanFlag(true),
  CACHE_TTL_DAYS: int(7, 1),

  SMTP_HOST: z.string().default('smtp.gmail.com'),
  SMTP_PORT: int(587, 1),
  SMTP_USER: optionalString,
  SMTP_PASSWORD: optionalString,
  SMTP_FROM: z.string().default('Newsletter <noreply@example.com>'),
  SMTP_TLS: booleanFlag(true),
  SMTP_TIMEOUT_SEC: int(30, 1),
  SMTP_CANARY_EMAIL: z.string().email().default('canary@example.com'),
  SMTP_BACKUP_RELAYS: relayList,

  FRONTEND_URL: z.string().default('http://localhost:8000'),
  TRACKING_BASE_URL: z.string().default('http://localhost:8000/track'),
  UNSUBSCRIBE_BASE_URL: z.string().default('http://localhost:8000/unsubscribe'),
  RSS_FETCH_TIMEOUT_SEC: int(30, 1),

  ENABLE_REGISTRATION: booleanFlag(true),
  ENABLE_ANALYTICS: booleanFlag(true),
  ENABLE_AB_TESTING: booleanFlag(false),
  ENABLE_PERSONALIZATION: booleanFlag(true),

  MAX_NEWSLETTERS_PER_USER: int(10, 1),
  DELIVERY_BATCH_SIZE: int(50, 1),
  SCHEDULER_POLL_SEC: int(300, 1),
  SELF_HEAL_INTERVAL_SEC: int(300, 1),
  CONTENT_RETENTION_DAYS: int(7, 1),
});

export interface Settings {
  readonly appName: string;
  readonly appVersion: string;
  readonly debug: boolean;
  readonly port: number;
  readonly apiPrefix: string;
  readonly databaseUrl: string;
  readonly dataDir: string;
  readonly secretKey: string;
  readonly jwtExpirationHours: number;
  readonly ollamaHost: string;
  readonly ollamaTimeoutSec: number;
  readonly ollamaMaxRetries: number;
  readonly ollamaRetryBackoffSec: number;
  readonly primaryModel: string;
  readonly fallbackModel: string;
  readonly classificationModel: string;
  readonly defaultTemperature: number;
  readonly defaultMaxTokens: number;
  readonly llmCacheEnabled: boolean;
  readonly cacheTtlDays: number;
  readonly smtpHost: string;
  readonly smtpPort: number;
  readonly smtpUser?: string;
  readonly smtpPassword?: string;
  readonly smtpFrom: string;
  readonly smtpTls: boolean;
  readonly smtpTimeoutSec: number;
  readonly smtpCanaryEmail: string;
  readonly smtpBackupRelays: readonly SmtpRelay[];
  readonly frontendUrl: string;
  readonly trackingBaseUrl: string;
  readonly unsubscribeBaseUrl: string;
  readonly rssFetchTimeoutSec: number;
  readonly enableRegistration: boolean;
  readonly enableAnalytics: boolean;
  readonly enableAbTesting: boolean;
  readonly enablePersonalization: boolean;
  readonly maxNewslettersPerUser: number;
  readonly deliveryBatchSize: number;
  readonly schedulerPollSec: number;
  readonly selfHealIntervalSec: number;
  readonly contentRetentionDays: number;
}

export type SettingsSource = Record<string, string | undefined>;

export class SettingsError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'SettingsError';
  }
}

function trimSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

export function loadSettings(env: SettingsSource = process.env): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new SettingsError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`,
      ),
    );
  }
  const e = parsed.data;

  return Object.freeze({
    appName: e.APP_NAME,
    appVersion: e.APP_VERSION,
    debug: e.DEBUG,
    port: e.PORT,
    apiPrefix: e.API_PREFIX,
    databaseUrl: e.DATABASE_URL,
    dataDir: e.DATA_DIR,
    secretKey: e.SECRET_KEY,
    jwtExpirationHours: e.JWT_EXPIRATION_HOURS,
    ollamaHost: trimSlash(e.OLLAMA_HOST),
    ollamaTimeoutSec: e.OLLAMA_TIMEOUT_SEC,
    ollamaMaxRetries: e.OLLAMA_MAX_RETRIES,
    ollamaRetryBackoffSec: e.OLLAMA_RETRY_BACKOFF_SEC,
    primaryModel: e.PRIMARY_MODEL,
    fallbackModel: e.FALLBACK_MODEL,
    classificationModel: e.CLASSIFICATION_MODEL,
    defaultTemperature: e.DEFAULT_TEMPERATURE,
    defaultMaxTokens: e.DEFAULT_MAX_TOKENS,
    llmCacheEnabled: e.LLM_CACHE_ENABLED,
    cacheTtlDays: e.CACHE_TTL_DAYS,
    smtpHost: e.SMTP_HOST,
    smtpPort: e.SMTP_PORT,
    smtpUser: e.SMTP_USER,
    smtpPassword: e.SMTP_PASSWORD,
    smtpFrom: e.SMTP_FROM,
    smtpTls: e.SMTP_TLS,
    smtpTimeoutSec: e.SMTP_TIMEOUT_SEC,
    smtpCanaryEmail: e.SMTP_CANARY_EMAIL,
    smtpBackupRelays: Object.freeze([...e.SMTP_BACKUP_RELAYS]),
    frontendUrl: trimSlash(e.FRONTEND_URL),
    trackingBaseUrl: trimSlash(e.TRACKING_BASE_URL),
    unsubscribeBaseUrl: trimSlash(e.UNSUBSCRIBE_BASE_URL),
    rssFetchTimeoutSec: e.RSS_FETCH_TIMEOUT_SEC,
    enableRegistration: e.ENABLE_REGISTRATION,
    enableAnalytics: e.ENABLE_ANALYTICS,
    enableAbTesting: e.ENABLE_AB_TESTING,
    enablePersonalization: e.ENABLE_PERSONALIZATION,
    maxNewslettersPerUser: e.MAX_NEWSLETTERS_PER_USER,
    deliveryBatchSize: e.DELIVERY_BATCH_SIZE,
    schedulerPollSec: e.SCHEDULER_POLL_SEC,
    selfHealIntervalSec: e.SELF_HEAL_INTERVAL_SEC,
    contentRetentionDays: e.CONTENT_RETENTION_DAYS,
  });
}
