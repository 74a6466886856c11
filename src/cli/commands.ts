import { HttpException, INestApplicationContext } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { AnalyticsService } from '../analytics/services/analytics.service';
import { ReportStorageService } from '../analytics/services/report-storage.service';
import { AnalyticsReport } from '../analytics/types/analytics.types';
import { CronManagerService } from '../automation/services/cron-manager.service';
import { MaintenanceService } from '../automation/services/maintenance.service';
import { SchedulerService } from '../automation/services/scheduler.service';
import {
  renderSystemdUnit,
  systemdUnitPath,
} from '../automation/utils/systemd.util';
import { asRecord, errorMessage } from '../common/utils/object.util';
import { parseWith } from '../common/utils/validation.util';
import { listNiches } from '../content/config/niches';
import { ContentAggregatorService } from '../content/services/content-aggregator.service';
import { DatabaseService } from '../database/database.service';
import { DeliveryManagerService } from '../email/services/delivery-manager.service';
import { SelfHealService } from '../health/services/self-heal.service';
import { NewsletterGeneratorService } from '../newsletters/services/newsletter-generator.service';
import { NewslettersService } from '../newsletters/services/newsletters.service';
import { newsletterCreateSchema } from '../newsletters/types/newsletter.types';
import { SubscribersService } from '../subscribers/services/subscribers.service';
import { subscriberCreateSchema } from '../subscribers/types/subscriber.types';

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

const OPTIONS = {
  newsletter: { type: 'string' },
  force: { type: 'boolean' },
  format: { type: 'string' },
  name: { type: 'string' },
  niche: { type: 'string' },
  description: { type: 'string' },
  frequency: { type: 'string' },
  email: { type: 'string' },
  output: { type: 'string' },
  user: { type: 'string' },
} as const;

const DEFAULT_NICHE = 'engineering_leadership';

type Flags = ReturnType<typeof parseFlags>['values'];

interface CommandContext {
  app: INestApplicationContext;
  args: string[];
  flags: Flags;
  out: CliOutput;
}

interface Command {
  usage: string;
  summary: string;
  run(context: CommandContext): Promise<number>;
}

function parseFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    options: OPTIONS,
    allowPositionals: true,
    strict: true,
  });
}

function parseId(value: string | undefined, label: string): number {
  const id = Number(value);
  if (value === undefined || !Number.isInteger(id) || id <= 0) {
    throw new Error(`${label} must be a positive integer`);
  }
  return id;
}

function optionalId(
  value: string | undefined,
  label: string,
): number | undefined {
  return value === undefined ? undefined : parseId(value, label);
}

/** Validation failures carry their issues in the response body. */
function describeError(error: unknown): string {
  if (error instanceof HttpException) {
    const issues = asRecord(error.getResponse())?.issues;
    if (Array.isArray(issues)) {
      const details = issues
        .map((issue) => asRecord(issue))
        .map((issue) =>
          issue
            ? `${String(issue.path) || 'input'}: ${String(issue.message)}`
            : '',
        )
        .filter(Boolean);
      return `${error.message} (${details.join('; ')})`;
    }
  }
  return errorMessage(error);
}

function reportLines(report: AnalyticsReport): string[] {
  return [
    `Analytics report (${report.period}) generated ${report.generated_at}`,
    `Subscribers: ${report.subscribers.total} total, ` +
      `${report.subscribers.new} new, growth ` +
      `${report.subscribers.growth_rate}%`,
    `Editions sent: ${report.editions.sent} (${report.editions.frequency})`,
    `Opens: ${report.engagement.total_opens}, avg open rate ` +
      `${report.engagement.avg_open_rate}%`,
    `Clicks: ${report.engagement.total_clicks}, avg click rate ` +
      `${report.engagement.avg_click_rate}%`,
  ];
}

export const COMMANDS: Record<string, Command> = {
  init: {
    usage: 'init',
    summary: 'Create the database tables',
    async run({ app, out }) {
      const database = app.get(DatabaseService);
      out.log(
        `database ready: ${database.tableNames().length} tables at ` +
          `${database.filePath}`,
      );
      return 0;
    },
  },

  'fetch-content': {
    usage: 'fetch-content [--newsletter <id>] [--force]',
    summary: 'Fetch content from all due sources',
    async run({ app, flags, out }) {
      const result = await app.get(ContentAggregatorService).fetchAll({
        newsletterId: optionalId(flags.newsletter, 'newsletter'),
        force: flags.force ?? false,
      });
      out.log(
        `fetched ${result.items} new items from ${result.sources} sources`,
      );
      for (const failure of result.errors) {
        out.error(`  ${failure}`);
      }
      return 0;
    },
  },

  'process-scheduled': {
    usage: 'process-scheduled',
    summary: 'Send editions whose scheduled time has passed',
    async run({ app, out }) {
      const result = await app
        .get(DeliveryManagerService)
        .processScheduledSends();
      out.log(`processed ${result.processed} scheduled editions`);
      if (result.failed.length) {
        out.error(`failed editions: ${result.failed.join(', ')}`);
        return 1;
      }
      return 0;
    },
  },

  'daily-maintenance': {
    usage: 'daily-maintenance',
    summary: 'Clean up content, sweep subscribers, vacuum the database',
    async run({ app, out }) {
      const summary = app.get(MaintenanceService).dailyMaintenance();
      out.log(`content removed: ${summary.contentRemoved}`);
      out.log(
        `subscribers inactive: ${summary.subscribers.inactive}, at risk: ` +
          `${summary.subscribers.atRisk}`,
      );
      out.log(`newsletters recounted: ${summary.subscriberCounts}`);
      out.log(`cache entries removed: ${summary.cacheEntriesRemoved}`);
      return 0;
    },
  },

  'generate-report': {
    usage: 'generate-report [--newsletter <id>] [--format json|text]',
    summary: 'Build and save the 30-day analytics report',
    async run({ app, flags, out }) {
      const format = flags.format ?? 'text';
      if (format !== 'json' && format !== 'text') {
        throw new Error(`unknown format: ${format}`);
      }
      const report = app
        .get(AnalyticsService)
        .buildReport(optionalId(flags.newsletter, 'newsletter'));
      const filePath = await app.get(ReportStorageService).saveReport(report);
      if (format === 'json') {
        out.log(JSON.stringify(report, null, 2));
      } else {
        reportLines(report).forEach((line) => out.log(line));
        out.log(`saved to ${filePath}`);
      }
      return 0;
    },
  },

  'setup-cron': {
    usage: 'setup-cron',
    summary: 'Install the standard cron jobs',
    async run({ app, out }) {
      const cron = app.get(CronManagerService);
      const installed = await cron.setupStandardJobs();
      for (const job of await cron.getOwnJobs()) {
        out.log(`${job.schedule}  ${job.comment || job.command}`);
      }
      if (!installed) {
        out.error('some cron jobs could not be installed');
        return 1;
      }
      return 0;
    },
  },

  'remove-cron': {
    usage: 'remove-cron',
    summary: 'Remove every cron job this tool installed',
    async run({ app, out }) {
      const removed = await app.get(CronManagerService).removeOwnJobs();
      out.log(`removed ${removed} cron jobs`);
      return 0;
    },
  },

  'systemd-unit': {
    usage: 'systemd-unit [--user <name>]',
    summary: 'Print a service unit that runs start-scheduler',
    async run({ flags, out }) {
      const projectDir = process.cwd();
      out.log(`# ${systemdUnitPath('newsletter-engine')}`);
      out.log(
        renderSystemdUnit({
          execStart: `${process.execPath} ${path.join(projectDir, 'dist/cli/main.js')} start-scheduler`,
          workingDirectory: projectDir,
          user: flags.user,
        }),
      );
      return 0;
    },
  },

  'start-scheduler': {
    usage: 'start-scheduler',
    summary: 'Run the send scheduler and self-heal loops until interrupted',
    async run({ app, out }) {
      const scheduler = app.get(SchedulerService);
      const selfHeal = app.get(SelfHealService);
      const stop = (): void => {
        out.log('stopping scheduler');
        scheduler.stop();
        selfHeal.stop();
      };
      process.once('SIGINT', stop);
      process.once('SIGTERM', stop);
      try {
        await Promise.all([scheduler.start(), selfHeal.start()]);
      } finally {
        process.removeListener('SIGINT', stop);
        process.removeListener('SIGTERM', stop);
      }
      return 0;
    },
  },

  'add-subscriber': {
    usage: 'add-subscriber <email> [--name <name>] [--newsletter <id>]',
    summary: 'Add a subscriber, optionally to one newsletter',
    async run({ app, args, flags, out }) {
      const newsletterId = optionalId(flags.newsletter, 'newsletter');
      const input = parseWith(subscriberCreateSchema, {
        email: args[0],
        name: flags.name,
        newsletter_ids: newsletterId ? [newsletterId] : [],
      });
      const subscriber = await app.get(SubscribersService).create(input);
      out.log(
        `subscriber ${subscriber.id}: ${subscriber.email} ` +
          `(${subscriber.status})`,
      );
      return 0;
    },
  },

  'create-newsletter': {
    usage: 'create-newsletter <name> [--niche <key>] [--description <text>] [--frequency daily|weekly|monthly]',
    summary: 'Create a newsletter',
    async run({ app, args, flags, out }) {
      const niche = flags.niche ?? DEFAULT_NICHE;
      if (!listNiches().includes(niche)) {
        throw new Error(
          `unknown niche: ${niche} (choose from ${listNiches().join(', ')})`,
        );
      }
      const input = parseWith(newsletterCreateSchema, {
        name: args[0],
        niche,
        description: flags.description,
        settings: flags.frequency ? { frequency: flags.frequency } : {},
      });
      const newsletter = app.get(NewslettersService).create(input);
      out.log(
        `newsletter ${newsletter.id}: ${newsletter.name} ` +
          `[${newsletter.niche}, ${newsletter.settings.frequency}]`,
      );
      return 0;
    },
  },

  'generate-test-newsletter': {
    usage: 'generate-test-newsletter <newsletterId>',
    summary: 'Generate a draft edition in test mode',
    async run({ app, args, out }) {
      const newsletter = app
        .get(NewslettersService)
        .get(parseId(args[0], 'newsletterId'));
      const edition = await app
        .get(NewsletterGeneratorService)
        .generateEdition(newsletter, { testMode: true });
      out.log(`edition ${edition.id}: ${edition.subject}`);
      out.log(`articles: ${edition.content.total_articles}`);
      return 0;
    },
  },

  'preview-newsletter': {
    usage: 'preview-newsletter <newsletterId> [--email <address>] [--output <file>]',
    summary: 'Render the latest edition, personalized when an email is given',
    async run({ app, args, flags, out }) {
      const preview = await app
        .get(NewsletterGeneratorService)
        .previewEdition(parseId(args[0], 'newsletterId'), flags.email);
      out.log(
        `edition ${preview.edition_id}: ` +
          `${preview.subject}${preview.personalized ? ' (personalized)' : ''}`,
      );
      if (flags.output) {
        await fs.writeFile(flags.output, preview.html, 'utf-8');
        out.log(`html written to ${flags.output}`);
      } else {
        out.log(preview.text);
      }
      return 0;
    },
  },

  'send-test-email': {
    usage: 'send-test-email <editionId> <email...>',
    summary: 'Send an edition to test addresses without changing its status',
    async run({ app, args, out }) {
      const editionId = parseId(args[0], 'editionId');
      const emails = args.slice(1);
      if (!emails.length) {
        throw new Error('at least one email is required');
      }
      const result = await app
        .get(DeliveryManagerService)
        .sendEdition(editionId, true, emails);
      out.log(`sent ${result.sent.length}/${result.total}`);
      if (result.failed.length) {
        out.error(`failed: ${result.failed.join(', ')}`);
        return 1;
      }
      return 0;
    },
  },
};

function printHelp(out: CliOutput): void {
  out.log('Usage: newsletter-engine <command> [options]');
  out.log('');
  const width = Math.max(...Object.keys(COMMANDS).map((name) => name.length));
  for (const [name, command] of Object.entries(COMMANDS)) {
    out.log(`  ${name.padEnd(width)}  ${command.summary}`);
    out.log(`  ${' '.repeat(width)}  ${command.usage}`);
  }
}

/** Runs one command; the result is the process exit code. */
export async function runCommand(
  app: INestApplicationContext,
  argv: string[],
  out: CliOutput,
): Promise<number> {
  const [name, ...rest] = argv;
  if (!name || name === 'help' || name === '--help') {
    printHelp(out);
    return 0;
  }
  const command = COMMANDS[name];
  if (!command) {
    out.error(`unknown command: ${name}`);
    printHelp(out);
    return 2;
  }

  try {
    const { values, positionals } = parseFlags(rest);
    return await command.run({ app, args: positionals, flags: values, out });
  } catch (error) {
    out.error(`error: ${describeError(error)}`);
    return 1;
  }
}
