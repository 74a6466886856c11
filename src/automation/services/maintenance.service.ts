import { Inject, Injectable, Logger } from '@nestjs/common';
import { and, eq, lte, max } from 'drizzle-orm';
import { daysAgo } from '../../common/utils/date.util';
import { Settings, SETTINGS } from '../../config/settings';
import { ContentAggregatorService } from '../../content/services/content-aggregator.service';
import { DatabaseService } from '../../database/database.service';
import { subscriberEvents, subscribers } from '../../database/schema';
import { LlmCacheService } from '../../llm/services/llm-cache.service';
import { NewslettersService } from '../../newsletters/services/newsletters.service';
import {
  AT_RISK_AFTER_DAYS,
  AT_RISK_SEGMENT,
  INACTIVE_AFTER_DAYS,
  MaintenanceSummary,
  SubscriberSweepResult,
} from '../types/automation.types';

@Injectable()
export class MaintenanceService {
  private readonly logger = new Logger(MaintenanceService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly aggregator: ContentAggregatorService,
    private readonly newslettersService: NewslettersService,
    private readonly cache: LlmCacheService,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  cleanupOldContent(
    days = this.settings.contentRetentionDays,
    now: Date = new Date(),
  ): number {
    return this.aggregator.cleanupOldContent(days, now);
  }

  /**
   * Active subscribers without an open for 60 days become inactive; without
   * one for 30 days they join the at-risk segment. Subscribers younger than
   * the window are left alone.
   */
  processSubscriberEvents(now: Date = new Date()): SubscriberSweepResult {
    const inactiveCutoff = daysAgo(INACTIVE_AFTER_DAYS, now);
    const atRiskCutoff = daysAgo(AT_RISK_AFTER_DAYS, now);

    const lastOpens = new Map(
      this.database.db
        .select({
          subscriberId: subscriberEvents.subscriberId,
          lastOpen: max(subscriberEvents.createdAt),
        })
        .from(subscriberEvents)
        .where(eq(subscriberEvents.eventType, 'open'))
        .groupBy(subscriberEvents.subscriberId)
        .all()
        .map((row) => [row.subscriberId, row.lastOpen ?? '']),
    );
    const candidates = this.database.db
      .select()
      .from(subscribers)
      .where(
        and(
          eq(subscribers.status, 'active'),
          lte(subscribers.subscribedAt, atRiskCutoff),
        ),
      )
      .all();

    const result: SubscriberSweepResult = { inactive: 0, atRisk: 0 };
    const updatedAt = now.toISOString();
    this.database.transaction(() => {
      for (const subscriber of candidates) {
        const lastOpen = lastOpens.get(subscriber.id) ?? '';
        if (
          lastOpen < inactiveCutoff &&
          subscriber.subscribedAt <= inactiveCutoff
        ) {
          this.database.db
            .update(subscribers)
            .set({ status: 'inactive', updatedAt })
            .where(eq(subscribers.id, subscriber.id))
            .run();
          result.inactive += 1;
          this.logger.log(`subscriber marked inactive: id=${subscriber.id}`);
          continue;
        }
        if (
          lastOpen < atRiskCutoff &&
          !subscriber.segments.includes(AT_RISK_SEGMENT)
        ) {
          this.database.db
            .update(subscribers)
            .set({
              segments: [...subscriber.segments, AT_RISK_SEGMENT],
              updatedAt,
            })
            .where(eq(subscribers.id, subscriber.id))
            .run();
          result.atRisk += 1;
          this.logger.debug(`subscriber at risk: id=${subscriber.id}`);
        }
      }
    });
    return result;
  }

  updateSubscriberCounts(): number {
    return this.newslettersService.refreshAllSubscriberCounts();
  }

  maintainDatabase(): number {
    const startedAt = Date.now();
    this.database.vacuum();
    const updated = this.updateSubscriberCounts();
    this.logger.log(
      `database maintained: newsletters=${updated} ` +
        `elapsedMs=${Date.now() - startedAt}`,
    );
    return updated;
  }

  clearExpiredCache(now: Date = new Date()): number {
    return this.cache.clearExpired(now);
  }

  dailyMaintenance(now: Date = new Date()): MaintenanceSummary {
    const startedAt = Date.now();
    const contentRemoved = this.cleanupOldContent(
      this.settings.contentRetentionDays,
      now,
    );
    const sweep = this.processSubscriberEvents(now);
    const subscriberCounts = this.maintainDatabase();
    const cacheEntriesRemoved = this.clearExpiredCache(now);
    const summary: MaintenanceSummary = {
      contentRemoved,
      subscribers: sweep,
      subscriberCounts,
      cacheEntriesRemoved,
      elapsedMs: Date.now() - startedAt,
    };
    this.logger.log(
      `daily maintenance done: content=${contentRemoved} ` +
        `inactive=${sweep.inactive} atRisk=${sweep.atRisk} ` +
        `cache=${cacheEntriesRemoved} elapsedMs=${summary.elapsedMs}`,
    );
    return summary;
  }
}
