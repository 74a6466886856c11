export const BLACKLIST_KEYWORDS = [
  'blacklist',
  'spam',
  'reputation',
  'blocked',
  'refused',
];

export const FEED_FAILURE_THRESHOLD = 3;
export const FEED_UNHEALTHY_RATE = 0.2;
export const MIN_TABLE_COUNT = 5;

export interface SmtpHealth {
  healthy: boolean;
  smtp_host: string;
  smtp_port: number;
  test_send?: 'success';
  error?: string;
  blacklisted?: boolean;
}

export interface OllamaHealth {
  healthy: boolean;
  error?: string;
  available_models?: string[];
  missing_models?: string[];
  model_count?: number;
}

export interface FeedInfo {
  source_id: number;
  name: string;
  url: string;
  failure_count: number;
}

export interface FeedHealth {
  healthy: boolean;
  total_feeds: number;
  failed_feeds: FeedInfo[];
  warning_feeds: FeedInfo[];
  failure_rate: number;
  error?: string;
}

export interface DatabaseHealth {
  healthy: boolean;
  connection: 'ok' | 'failed';
  table_count?: number;
  db_size_mb?: number | null;
  error?: string;
}

export interface ComprehensiveHealth {
  overall_healthy: boolean;
  timestamp: string;
  checks: {
    smtp: SmtpHealth;
    ollama: OllamaHealth;
    feeds: FeedHealth;
    database: DatabaseHealth;
  };
}

export type HealComponent =
  | 'smtp_connection'
  | 'smtp_blacklist'
  | 'ollama'
  | 'feeds'
  | 'database';

export type HealArea = 'smtp' | 'ollama' | 'feeds' | 'database';

/** Consecutive unhealthy checks before a heal is attempted. */
export const HEAL_THRESHOLDS: Record<HealComponent, number> = {
  smtp_connection: 3,
  smtp_blacklist: 1,
  ollama: 3,
  feeds: 1,
  database: 3,
};

export const HEAL_COOLDOWN_MS = 10 * 60 * 1000;
export const FEED_DISABLE_HOURS = 6;

export interface HealAttempt {
  component: HealComponent;
  success: boolean;
  detail: string;
}

export interface HealReport {
  timestamp: string;
  healthy: Record<HealArea, boolean>;
  attempts: HealAttempt[];
  errors: string[];
}
