import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { addHours } from '../../common/utils/date.util';
import { errorMessage } from '../../common/utils/object.util';
import { PollingLoop } from '../../common/utils/polling-loop.util';
import { Settings, SETTINGS, SmtpRelay } from '../../config/settings';
import { DatabaseService } from '../../database/database.service';
import { contentSources } from '../../database/schema';
import { MAIL_SENDER, MailSender } from '../../email/types/email.types';
import { OllamaClientService } from '../../llm/services/ollama-client.service';
import {
  FEED_DISABLE_HOURS,
  FeedInfo,
  HEAL_COOLDOWN_MS,
  HEAL_THRESHOLDS,
  HealArea,
  HealAttempt,
  HealComponent,
  HealReport,
} from '../types/health.types';
import { HealthChecksService } from './health-checks.service';

interface AreaOutcome {
  healthy: boolean;
  attempt: HealAttempt | null;
}

const AREAS: HealArea[] = ['smtp', 'ollama', 'feeds', 'database'];

function sameRelay(a: SmtpRelay, b: SmtpRelay): boolean {
  return a.host === b.host && a.port === b.port;
}

/**
 * Polls the health checks and runs a compensating action once a component
 * has failed often enough. Attempts per component are at least ten minutes
 * apart.
 */
@Injectable()
export class SelfHealService implements OnModuleDestroy {
  private readonly logger = new Logger(SelfHealService.name);
  private readonly failureCounts = new Map<HealComponent, number>();
  private readonly lastHealAttempt = new Map<HealComponent, number>();
  private readonly loop: PollingLoop;

  constructor(
    private readonly checks: HealthChecksService,
    private readonly database: DatabaseService,
    private readonly ollama: OllamaClientService,
    @Inject(MAIL_SENDER) private readonly mailer: MailSender,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {
    this.loop = new PollingLoop(
      'self-heal',
      settings.selfHealIntervalSec * 1000,
      async () => {
        await this.checkAndHealAll();
      },
      this.logger,
    );
  }

  get isRunning(): boolean {
    return this.loop.isRunning;
  }

  start(): Promise<void> {
    return this.loop.run();
  }

  stop(): void {
    this.loop.stop();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  failureCount(component: HealComponent): number {
    return this.failureCounts.get(component) ?? 0;
  }

  /** One failing area never stops the others. */
  async checkAndHealAll(now: Date = new Date()): Promise<HealReport> {
    const settled = await Promise.allSettled([
      this.checkAndHealSmtp(now),
      this.checkAndHealOllama(now),
      this.checkAndHealFeeds(now),
      this.checkAndHealDatabase(now),
    ]);

    const report: HealReport = {
      timestamp: now.toISOString(),
      healthy: { smtp: false, ollama: false, feeds: false, database: false },
      attempts: [],
      errors: [],
    };
    settled.forEach((result, index) => {
      const area = AREAS[index];
      if (result.status === 'rejected') {
        const message = errorMessage(result.reason);
        this.logger.error(`health check crashed: area=${area} ${message}`);
        report.errors.push(`${area}: ${message}`);
        return;
      }
      report.healthy[area] = result.value.healthy;
      if (result.value.attempt) {
        report.attempts.push(result.value.attempt);
      }
    });
    return report;
  }

  private async checkAndHealSmtp(now: Date): Promise<AreaOutcome> {
    const health = await this.checks.checkSmtp();
    if (health.healthy) {
      this.resetFailures('smtp_connection');
      this.resetFailures('smtp_blacklist');
      return { healthy: true, attempt: null };
    }

    const component: HealComponent =
      health.blacklisted ? 'smtp_blacklist' : 'smtp_connection';
    this.logger.warn(
      `smtp unhealthy: component=${component} ` +
        `error=${health.error ?? 'unknown'}`,
    );
    this.recordFailure(component);
    if (!this.shouldAttemptHeal(component, now)) {
      return { healthy: false, attempt: null };
    }
    const attempt =
      component === 'smtp_blacklist'
        ? await this.rotateRelay()
        : await this.reprobeSmtp();
    return { healthy: attempt.success, attempt };
  }

  /**
   * Walks the backup relays until one accepts the canary; restores the original
   * otherwise.
   */
  private async rotateRelay(): Promise<HealAttempt> {
    const original = this.mailer.currentRelay();
    for (const relay of this.settings.smtpBackupRelays) {
      if (sameRelay(relay, original)) {
        continue;
      }
      this.mailer.useRelay(relay);
      const probe = await this.checks.checkSmtp();
      if (probe.healthy) {
        this.logger.log(
          `smtp relay rotated: from=${original.host} ` +
            `to=${relay.host}:${relay.port}`,
        );
        this.resetFailures('smtp_blacklist');
        return {
          component: 'smtp_blacklist',
          success: true,
          detail: `switched to ${relay.host}:${relay.port}`,
        };
      }
      this.logger.warn(
        `backup relay rejected: host=${relay.host} ` +
          `error=${probe.error ?? 'unknown'}`,
      );
    }
    this.mailer.useRelay(original);
    this.logger.error(`smtp relay rotation failed: kept=${original.host}`);
    return {
      component: 'smtp_blacklist',
      success: false,
      detail: 'no backup relay accepted the canary',
    };
  }

  private async reprobeSmtp(): Promise<HealAttempt> {
    const probe = await this.checks.checkSmtp();
    if (probe.healthy) {
      this.resetFailures('smtp_connection');
      return {
        component: 'smtp_connection',
        success: true,
        detail: 'connection restored',
      };
    }
    this.logger.error(
      `smtp still unreachable: error=${probe.error ?? 'unknown'}`,
    );
    return {
      component: 'smtp_connection',
      success: false,
      detail: probe.error ?? 'still unreachable',
    };
  }

  private async checkAndHealOllama(now: Date): Promise<AreaOutcome> {
    const health = await this.checks.checkOllama();
    if (health.healthy) {
      this.resetFailures('ollama');
      return { healthy: true, attempt: null };
    }
    this.logger.warn(`ollama unhealthy: error=${health.error ?? 'unknown'}`);
    this.recordFailure('ollama');
    if (!this.shouldAttemptHeal('ollama', now)) {
      return { healthy: false, attempt: null };
    }

    const models = this.checks.requiredModels();
    let pulled = 0;
    for (const model of models) {
      if (await this.ollama.pullModel(model)) {
        pulled += 1;
      }
    }
    const recheck = await this.checks.checkOllama();
    if (recheck.healthy) {
      this.resetFailures('ollama');
    } else {
      this.logger.error(
        `ollama heal failed: pulled=${pulled}/${models.length}`,
      );
    }
    return {
      healthy: recheck.healthy,
      attempt: {
        component: 'ollama',
        success: recheck.healthy,
        detail: `pulled ${pulled}/${models.length} models`,
      },
    };
  }

  private async checkAndHealFeeds(now: Date): Promise<AreaOutcome> {
    const health = this.checks.checkFeeds(now);
    if (health.error) {
      throw new Error(health.error);
    }
    if (!health.failed_feeds.length) {
      this.resetFailures('feeds');
      return { healthy: health.healthy, attempt: null };
    }
    this.logger.warn(
      `feeds failing: count=${health.failed_feeds.length} ` +
        `total=${health.total_feeds}`,
    );
    this.recordFailure('feeds');
    if (!this.shouldAttemptHeal('feeds', now)) {
      return { healthy: health.healthy, attempt: null };
    }
    this.disableFeeds(health.failed_feeds, now);
    this.resetFailures('feeds');
    return {
      healthy: health.healthy,
      attempt: {
        component: 'feeds',
        success: true,
        detail: `disabled ${health.failed_feeds.length} feeds for ${FEED_DISABLE_HOURS}h`,
      },
    };
  }

  private disableFeeds(feeds: FeedInfo[], now: Date): void {
    const until = addHours(now, FEED_DISABLE_HOURS).toISOString();
    this.database.transaction(() => {
      for (const feed of feeds) {
        this.database.db
          .update(contentSources)
          .set({
            disabledUntil: until,
            disabledReason: `Auto-disabled: ${feed.failure_count} consecutive failures`,
          })
          .where(eq(contentSources.id, feed.source_id))
          .run();
        this.logger.log(
          `feed disabled: source=${feed.source_id} until=${until}`,
        );
      }
    });
  }

  private async checkAndHealDatabase(now: Date): Promise<AreaOutcome> {
    const health = await this.checks.checkDatabase();
    if (health.healthy) {
      this.resetFailures('database');
      return { healthy: true, attempt: null };
    }
    this.logger.warn(`database unhealthy: error=${health.error ?? 'unknown'}`);
    this.recordFailure('database');
    if (!this.shouldAttemptHeal('database', now)) {
      return { healthy: false, attempt: null };
    }

    let reachable = false;
    try {
      reachable = this.database.ping();
    } catch (error) {
      this.logger.error(`database still unhealthy: ${errorMessage(error)}`);
    }
    if (reachable) {
      this.resetFailures('database');
    }
    return {
      healthy: false,
      attempt: {
        component: 'database',
        success: reachable,
        detail: reachable ? 'connection answers' : 'connection still failing',
      },
    };
  }

  private recordFailure(component: HealComponent): void {
    const count = this.failureCount(component) + 1;
    this.failureCounts.set(component, count);
    this.logger.debug(
      `failure recorded: component=${component} count=${count}`,
    );
  }

  private resetFailures(component: HealComponent): void {
    this.failureCounts.set(component, 0);
  }

  private shouldAttemptHeal(component: HealComponent, now: Date): boolean {
    const last = this.lastHealAttempt.get(component);
    if (last !== undefined && now.getTime() - last < HEAL_COOLDOWN_MS) {
      return false;
    }
    if (this.failureCount(component) < HEAL_THRESHOLDS[component]) {
      return false;
    }
    this.lastHealAttempt.set(component, now.getTime());
    this.logger.log(`heal attempt: component=${component}`);
    return true;
  }
}
