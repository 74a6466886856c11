import { Injectable, NotFoundException } from '@nestjs/common';
import {
  and,
  avg,
  count,
  countDistinct,
  eq,
  gte,
  inArray,
  isNull,
  lt,
  sum,
} from 'drizzle-orm';
import { DatabaseService } from '../../database/database.service';
import {
  editions,
  editionStats,
  EventType,
  newsletterSubscribers,
  subscriberEvents,
  subscribers,
} from '../../database/schema';
import { DAY_MS, daysAgo } from '../../common/utils/date.util';
import { NewslettersService } from '../../newsletters/services/newsletters.service';
import {
  AnalyticsOverview,
  AnalyticsReport,
  EditionEngagement,
  GrowthSeries,
  OverallEngagement,
  Period,
  PERIOD_DAYS,
  SubscriberSummary,
} from '../types/analytics.types';

function round2(value: number): number {
  return Number(value.toFixed(2));
}

function percent(part: number, total: number): number {
  return total > 0 ? round2((part / total) * 100) : 0;
}

/**
 * Scope: the given newsletter, the owner's newsletters, or all of them when no
 * owner is given.
 */
interface Scope {
  userId?: number;
  newsletterId?: number;
}

@Injectable()
export class AnalyticsService {
  constructor(
    private readonly database: DatabaseService,
    private readonly newslettersService: NewslettersService,
  ) {}

  overview(
    scope: Scope,
    period: Period,
    now: Date = new Date(),
  ): AnalyticsOverview {
    const since = daysAgo(PERIOD_DAYS[period], now);
    const newsletterIds = this.newsletterIds(scope);
    const editionIds = this.sentEditionIds(newsletterIds, since);
    const totals = this.statTotals(editionIds);
    const allEditions = this.editionIdsFor(newsletterIds);

    return {
      period,
      subscribers: this.subscriberSummary(newsletterIds, since),
      engagement: {
        editions_sent: editionIds.length,
        total_opens: this.countEvents(allEditions, 'open', since),
        total_clicks: this.countEvents(allEditions, 'click', since),
        avg_open_rate: percent(totals.opened, totals.sent),
        avg_click_rate: percent(totals.clicked, totals.sent),
      },
    };
  }

  /**
   * Active subscribers per day, counting subscriptions started before the end
   * of that day.
   */
  growth(scope: Scope, days: number, now: Date = new Date()): GrowthSeries {
    const newsletterIds = this.newsletterIds(scope);
    const start = now.getTime() - days * DAY_MS;
    const data = Array.from({ length: days }, (_, index) => {
      const day = new Date(start + index * DAY_MS);
      const next = new Date(day.getTime() + DAY_MS).toISOString();
      return {
        date: day.toISOString().slice(0, 10),
        subscribers: newsletterIds.length ? this.activeSubscribers(
          newsletterIds,
          next,
        ) : 0,
      };
    });
    return { period_days: days, data };
  }

  editionEngagement(editionId: number, userId?: number): EditionEngagement {
    const edition = this.database.db
      .select({ newsletterId: editions.newsletterId })
      .from(editions)
      .where(eq(editions.id, editionId))
      .get();
    if (!edition) {
      throw new NotFoundException(`edition ${editionId} not found`);
    }
    this.newslettersService.get(edition.newsletterId, userId);

    const stats = this.database.db
      .select()
      .from(editionStats)
      .where(eq(editionStats.editionId, editionId))
      .get();
    return {
      edition_id: editionId,
      sent: stats?.sentCount ?? 0,
      delivered: stats?.deliveredCount ?? 0,
      opened: stats?.openedCount ?? 0,
      clicked: stats?.clickedCount ?? 0,
      open_rate: stats?.openRate ?? 0,
      click_rate: stats?.clickRate ?? 0,
    };
  }

  overallEngagement(scope: Scope): OverallEngagement {
    const editionIds = this.editionIdsFor(this.newsletterIds(scope));
    const totals = this.statTotals(editionIds);
    return {
      total_sent: totals.sent,
      total_opened: totals.opened,
      total_clicked: totals.clicked,
      avg_open_rate: percent(totals.opened, totals.sent),
      avg_click_rate: percent(totals.clicked, totals.sent),
    };
  }

  /** Thirty-day summary for operators; rates average the per-edition rates. */
  buildReport(newsletterId?: number, now: Date = new Date()): AnalyticsReport {
    const since = daysAgo(30, now);
    const newsletterIds = this.newsletterIds({ newsletterId });
    const editionIds = this.sentEditionIds(newsletterIds, since);
    const allEditions = this.editionIdsFor(newsletterIds);

    const rates = editionIds.length
      ? this.database.db
          .select({
            open: avg(editionStats.openRate),
            click: avg(editionStats.clickRate),
          })
          .from(editionStats)
          .where(inArray(editionStats.editionId, editionIds))
          .get()
      : undefined;

    return {
      generated_at: now.toISOString(),
      period: 'last_30_days',
      newsletter_id: newsletterId ?? null,
      subscribers: this.subscriberSummary(newsletterIds, since),
      editions: {
        sent: editionIds.length,
        frequency: editionIds.length >= 25 ? 'daily' : 'weekly',
      },
      engagement: {
        total_opens: this.countEvents(allEditions, 'open', since),
        total_clicks: this.countEvents(allEditions, 'click', since),
        avg_open_rate: round2(Number(rates?.open ?? 0)),
        avg_click_rate: round2(Number(rates?.click ?? 0)),
      },
    };
  }

  private newsletterIds(scope: Scope): number[] {
    if (scope.newsletterId != null) {
      return [this.newslettersService.get(scope.newsletterId, scope.userId).id];
    }
    return this.newslettersService
      .list(scope.userId)
      .map((newsletter) => newsletter.id);
  }

  private subscriberSummary(
    newsletterIds: number[],
    since: string,
  ): SubscriberSummary {
    if (!newsletterIds.length) {
      return { total: 0, new: 0, growth_rate: 0 };
    }
    const total = this.activeSubscribers(newsletterIds);
    const joined = this.database.db
      .select({ value: countDistinct(newsletterSubscribers.subscriberId) })
      .from(newsletterSubscribers)
      .where(
        and(
          inArray(newsletterSubscribers.newsletterId, newsletterIds),
          gte(newsletterSubscribers.subscribedAt, since),
        ),
      )
      .get()?.value ?? 0;

    return {
      total,
      new: joined,
      growth_rate: round2((joined / Math.max(total - joined, 1)) * 100),
    };
  }

  private activeSubscribers(newsletterIds: number[], before?: string): number {
    return (
      this.database.db
        .select({ value: countDistinct(subscribers.id) })
        .from(subscribers)
        .innerJoin(
          newsletterSubscribers,
          eq(newsletterSubscribers.subscriberId, subscribers.id),
        )
        .where(
          and(
            inArray(newsletterSubscribers.newsletterId, newsletterIds),
            isNull(newsletterSubscribers.unsubscribedAt),
            eq(subscribers.status, 'active'),
            before ? lt(newsletterSubscribers.subscribedAt, before) : undefined,
          ),
        )
        .get()?.value ?? 0
    );
  }

  private editionIdsFor(newsletterIds: number[]): number[] {
    if (!newsletterIds.length) {
      return [];
    }
    return this.database.db
      .select({ id: editions.id })
      .from(editions)
      .where(
        and(
          inArray(editions.newsletterId, newsletterIds),
          eq(editions.testMode, false),
        ),
      )
      .all()
      .map((row) => row.id);
  }

  private sentEditionIds(newsletterIds: number[], since: string): number[] {
    if (!newsletterIds.length) {
      return [];
    }
    return this.database.db
      .select({ id: editions.id })
      .from(editions)
      .where(
        and(
          inArray(editions.newsletterId, newsletterIds),
          eq(editions.testMode, false),
          gte(editions.sentAt, since),
        ),
      )
      .all()
      .map((row) => row.id);
  }

  private statTotals(editionIds: number[]): {
    sent: number;
    opened: number;
    clicked: number;
  } {
    if (!editionIds.length) {
      return { sent: 0, opened: 0, clicked: 0 };
    }
    const row = this.database.db
      .select({
        sent: sum(editionStats.sentCount),
        opened: sum(editionStats.openedCount),
        clicked: sum(editionStats.clickedCount),
      })
      .from(editionStats)
      .where(inArray(editionStats.editionId, editionIds))
      .get();
    return {
      sent: Number(row?.sent ?? 0),
      opened: Number(row?.opened ?? 0),
      clicked: Number(row?.clicked ?? 0),
    };
  }

  private countEvents(
    editionIds: number[],
    type: EventType,
    since: string,
  ): number {
    if (!editionIds.length) {
      return 0;
    }
    return (
      this.database.db
        .select({ value: count() })
        .from(subscriberEvents)
        .where(
          and(
            inArray(subscriberEvents.editionId, editionIds),
            eq(subscriberEvents.eventType, type),
            gte(subscriberEvents.createdAt, since),
          ),
        )
        .get()?.value ?? 0
    );
  }
}
