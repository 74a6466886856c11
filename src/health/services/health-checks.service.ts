import { Inject, Injectable, Logger } from '@nestjs/common';
import { and, eq, isNull, lte, or } from 'drizzle-orm';
import { promises as fs } from 'node:fs';
import { errorMessage } from '../../common/utils/object.util';
import { Settings, SETTINGS } from '../../config/settings';
import { DatabaseService, MEMORY_PATH } from '../../database/database.service';
import { contentSources } from '../../database/schema';
import { MAIL_SENDER, MailSender } from '../../email/types/email.types';
import { OllamaClientService } from '../../llm/services/ollama-client.service';
import {
  BLACKLIST_KEYWORDS,
  ComprehensiveHealth,
  DatabaseHealth,
  FEED_FAILURE_THRESHOLD,
  FEED_UNHEALTHY_RATE,
  FeedHealth,
  FeedInfo,
  MIN_TABLE_COUNT,
  OllamaHealth,
  SmtpHealth,
} from '../types/health.types';

export function looksBlacklisted(message: string): boolean {
  const lowered = message.toLowerCase();
  return BLACKLIST_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

/**
 * Probes never throw; a failed probe comes back as `healthy: false` with the
 * error.
 */
@Injectable()
export class HealthChecksService {
  private readonly logger = new Logger(HealthChecksService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly ollama: OllamaClientService,
    @Inject(MAIL_SENDER) private readonly mailer: MailSender,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  /** Connects to the current relay and sends a canary message. */
  async checkSmtp(): Promise<SmtpHealth> {
    const relay = this.mailer.currentRelay();
    try {
      await this.mailer.verify();
      await this.mailer.send({
        to: this.settings.smtpCanaryEmail,
        subject: 'Health Check',
        html: '<html><body>Health check test</body></html>',
        text: 'Health check test',
      });
      return {
        healthy: true,
        smtp_host: relay.host,
        smtp_port: relay.port,
        test_send: 'success',
      };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(`smtp check failed: host=${relay.host} ${message}`);
      return {
        healthy: false,
        smtp_host: relay.host,
        smtp_port: relay.port,
        error: message,
        blacklisted: looksBlacklisted(message),
      };
    }
  }

  /**
   * Required models match by name prefix, so `mistral:7b` is satisfied by
   * `mistral:latest`.
   */
  async checkOllama(): Promise<OllamaHealth> {
    const available = await this.ollama.listModels();
    if (!available) {
      return { healthy: false, error: 'Cannot connect to Ollama service' };
    }
    const missing = this.requiredModels().filter((model) => {
      const family = model.split(':')[0];
      return !available.some((name) => name.includes(family));
    });
    if (missing.length) {
      return {
        healthy: false,
        error: `Missing models: ${missing.join(', ')}`,
        available_models: available,
        missing_models: missing,
      };
    }
    return {
      healthy: true,
      available_models: available,
      model_count: available.length,
    };
  }

  /** Sources already disabled until later are left out. */
  checkFeeds(now: Date = new Date()): FeedHealth {
    try {
      const sources = this.database.db
        .select()
        .from(contentSources)
        .where(
          and(
            eq(contentSources.active, true),
            or(
              isNull(contentSources.disabledUntil),
              lte(contentSources.disabledUntil, now.toISOString()),
            ),
          ),
        )
        .all();

      const failed: FeedInfo[] = [];
      const warning: FeedInfo[] = [];
      for (const source of sources) {
        const info = {
          source_id: source.id,
          name: source.name,
          url: source.url,
          failure_count: source.consecutiveFailures,
        };
        if (source.consecutiveFailures >= FEED_FAILURE_THRESHOLD) {
          failed.push(info);
        } else if (source.consecutiveFailures > 0) {
          warning.push(info);
        }
      }

      const rate = sources.length ? failed.length / sources.length : 0;
      return {
        healthy: rate < FEED_UNHEALTHY_RATE,
        total_feeds: sources.length,
        failed_feeds: failed,
        warning_feeds: warning,
        failure_rate: Number(rate.toFixed(3)),
      };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`feed check failed: ${message}`);
      return {
        healthy: false,
        total_feeds: 0,
        failed_feeds: [],
        warning_feeds: [],
        failure_rate: 0,
        error: message,
      };
    }
  }

  async checkDatabase(): Promise<DatabaseHealth> {
    try {
      if (!this.database.ping()) {
        return {
          healthy: false,
          connection: 'failed',
          error: 'Query returned unexpected result',
        };
      }
      const tableCount = this.database.tableNames().length;
      if (tableCount < MIN_TABLE_COUNT) {
        return {
          healthy: false,
          connection: 'ok',
          table_count: tableCount,
          error: `Only ${tableCount} tables found (expected >=${MIN_TABLE_COUNT})`,
        };
      }
      return {
        healthy: true,
        connection: 'ok',
        table_count: tableCount,
        db_size_mb: await this.databaseSizeMb(),
      };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`database check failed: ${message}`);
      return { healthy: false, connection: 'failed', error: message };
    }
  }

  async checkAll(now: Date = new Date()): Promise<ComprehensiveHealth> {
    const [smtp, ollama, database] = await Promise.all([
      this.checkSmtp(),
      this.checkOllama(),
      this.checkDatabase(),
    ]);
    const feeds = this.checkFeeds(now);
    return {
      overall_healthy:
        smtp.healthy && ollama.healthy && feeds.healthy && database.healthy,
      timestamp: now.toISOString(),
      checks: { smtp, ollama, feeds, database },
    };
  }

  requiredModels(): string[] {
    return [this.settings.primaryModel, this.settings.fallbackModel];
  }

  private async databaseSizeMb(): Promise<number | null> {
    if (this.database.filePath === MEMORY_PATH) {
      return null;
    }
    try {
      const stat = await fs.stat(this.database.filePath);
      return Number((stat.size / (1024 * 1024)).toFixed(2));
    } catch {
      return null;
    }
  }
}
