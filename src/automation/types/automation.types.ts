export const INACTIVE_AFTER_DAYS = 60;
export const AT_RISK_AFTER_DAYS = 30;
export const AT_RISK_SEGMENT = 'at_risk';

export const CRONTAB_RUNNER = Symbol('CRONTAB_RUNNER');

/** Reads and replaces the current user's crontab. */
export interface CrontabRunner {
  read(): Promise<string>;
  write(content: string): Promise<void>;
}

export interface SubscriberSweepResult {
  inactive: number;
  atRisk: number;
}

export interface MaintenanceSummary {
  contentRemoved: number;
  subscribers: SubscriberSweepResult;
  subscriberCounts: number;
  cacheEntriesRemoved: number;
  elapsedMs: number;
}

export interface CronJob {
  schedule: string;
  command: string;
  comment: string;
}

export interface CronJobDefinition {
  name: string;
  schedule: string;
  subcommand: string;
  description: string;
}

export const STANDARD_JOBS: readonly CronJobDefinition[] = [
  {
    name: 'fetch-content',
    schedule: '0 * * * *',
    subcommand: 'fetch-content',
    description: 'Fetch content from all sources',
  },
  {
    name: 'process-scheduled',
    schedule: '*/5 * * * *',
    subcommand: 'process-scheduled',
    description: 'Process scheduled newsletter sends',
  },
  {
    name: 'daily-maintenance',
    schedule: '0 3 * * *',
    subcommand: 'daily-maintenance',
    description: 'Daily maintenance tasks',
  },
  {
    name: 'generate-report',
    schedule: '0 9 * * 1',
    subcommand: 'generate-report',
    description: 'Weekly analytics report',
  },
];
