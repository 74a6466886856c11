import { Injectable, Logger } from '@nestjs/common';
import { and, count, desc, eq, gte, sql } from 'drizzle-orm';
import { DatabaseService } from '../../database/database.service';
import {
  EventType,
  subscriberEvents,
  subscribers,
} from '../../database/schema';
import { daysAgo } from '../../common/utils/date.util';
import { EditionsService } from '../../newsletters/services/editions.service';
import {
  EditionStatsView,
  SubscriberEngagement,
  TrackingContext,
} from '../types/email.types';

interface TrackedRecipient {
  subscriberId: number;
  editionId: number;
}

@Injectable()
export class EmailTrackerService {
  private readonly logger = new Logger(EmailTrackerService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly editionsService: EditionsService,
  ) {}

  /**
   * Records every open; only the first per subscriber and edition counts toward
   * stats.
   */
  trackOpen(trackingId: string, context: TrackingContext = {}): boolean {
    const target = this.resolveTrackingId(trackingId);
    if (!target) {
      this.logger.debug(
        `open ignored: trackingId=${trackingId} reason=unknown`,
      );
      return false;
    }

    const firstOpen = !this.hasEvent(target, 'open');
    this.recordEvent(
      target,
      'open',
      { tracking_id: trackingId, first_open: firstOpen },
      context,
    );
    if (firstOpen) {
      this.editionsService.incrementStats(target.editionId, { openedCount: 1 });
    }
    return true;
  }

  trackClick(
    trackingId: string,
    url: string,
    context: TrackingContext = {},
  ): boolean {
    const target = this.resolveTrackingId(trackingId);
    if (!target) {
      this.logger.debug(
        `click ignored: trackingId=${trackingId} reason=unknown`,
      );
      return false;
    }

    const firstClick = !this.hasEvent(target, 'click');
    this.recordEvent(
      target,
      'click',
      { tracking_id: trackingId, url, first_click: firstClick },
      context,
    );
    if (firstClick) {
      this.editionsService.incrementStats(target.editionId, {
        clickedCount: 1,
      });
    }
    return true;
  }

  /** Hard bounces stop further mail to the address. */
  trackBounce(
    email: string,
    bounceType: 'hard' | 'soft',
    reason?: string,
    editionId?: number,
  ): boolean {
    const subscriber = this.findSubscriber(email);
    if (!subscriber) {
      this.logger.warn(`bounce for unknown subscriber: email=${email}`);
      return false;
    }

    this.database.transaction(() => {
      this.database.db
        .insert(subscriberEvents)
        .values({
          subscriberId: subscriber.id,
          editionId: editionId ?? null,
          eventType: 'bounce',
          metadata: { bounce_type: bounceType, bounce_reason: reason ?? null },
        })
        .run();
      if (bounceType === 'hard') {
        this.database.db
          .update(subscribers)
          .set({
            status: 'bounced',
            bounceCount: subscriber.bounceCount + 1,
            updatedAt: new Date().toISOString(),
          })
          .where(eq(subscribers.id, subscriber.id))
          .run();
      }
      if (editionId != null) {
        this.editionsService.incrementStats(editionId, { bouncedCount: 1 });
      }
    });
    this.logger.log(
      `bounce recorded: subscriber=${subscriber.id} type=${bounceType}`,
    );
    return true;
  }

  trackComplaint(
    email: string,
    complaintType?: string,
    editionId?: number,
  ): boolean {
    const subscriber = this.findSubscriber(email);
    if (!subscriber) {
      this.logger.warn(`complaint for unknown subscriber: email=${email}`);
      return false;
    }

    this.database.transaction(() => {
      this.database.db
        .insert(subscriberEvents)
        .values({
          subscriberId: subscriber.id,
          editionId: editionId ?? null,
          eventType: 'complaint',
          metadata: { complaint_type: complaintType ?? null },
        })
        .run();
      this.database.db
        .update(subscribers)
        .set({
          status: 'complained',
          complaintCount: subscriber.complaintCount + 1,
          updatedAt: new Date().toISOString(),
        })
        .where(eq(subscribers.id, subscriber.id))
        .run();
      if (editionId != null) {
        this.editionsService.incrementStats(editionId, { complainedCount: 1 });
      }
    });
    this.logger.log(`complaint recorded: subscriber=${subscriber.id}`);
    return true;
  }

  getEditionStats(editionId: number): EditionStatsView {
    const stats = this.editionsService.getStats(editionId);
    return {
      sent: stats.sentCount,
      delivered: stats.deliveredCount,
      opened: stats.openedCount,
      clicked: stats.clickedCount,
      unsubscribed: stats.unsubscribedCount,
      bounced: this.countEditionEvents(editionId, 'bounce'),
      complained: this.countEditionEvents(editionId, 'complaint'),
      open_rate: stats.openRate,
      click_rate: stats.clickRate,
    };
  }

  getSubscriberEngagement(
    subscriberId: number,
    days = 90,
    now: Date = new Date(),
  ): SubscriberEngagement {
    const rows = this.database.db
      .select({ type: subscriberEvents.eventType, total: count() })
      .from(subscriberEvents)
      .where(
        and(
          eq(subscriberEvents.subscriberId, subscriberId),
          gte(subscriberEvents.createdAt, daysAgo(days, now)),
        ),
      )
      .groupBy(subscriberEvents.eventType)
      .all();
    const totals = new Map(rows.map((row) => [row.type, row.total]));

    const opens = totals.get('open') ?? 0;
    const clicks = totals.get('click') ?? 0;
    const bounces = totals.get('bounce') ?? 0;
    const complaints = totals.get('complaint') ?? 0;
    const score = Math.max(
      0,
      opens + clicks * 3 - (bounces * 5 + complaints * 10),
    );

    return {
      opens,
      clicks,
      bounces,
      complaints,
      engagement_score: score,
      is_engaged: score > 5,
      is_at_risk: score <= 1,
    };
  }

  /** Latest SENT event carrying the tracking id. */
  resolveTrackingId(trackingId: string): TrackedRecipient | null {
    if (!/^[0-9a-f]{16}$/.test(trackingId)) {
      return null;
    }
    const event = this.database.db
      .select({
        subscriberId: subscriberEvents.subscriberId,
        editionId: subscriberEvents.editionId,
      })
      .from(subscriberEvents)
      .where(
        and(
          eq(subscriberEvents.eventType, 'sent'),
          sql`json_extract(${subscriberEvents.metadata}, '$.tracking_id') = ${trackingId}`,
        ),
      )
      .orderBy(desc(subscriberEvents.id))
      .get();
    if (!event || event.editionId == null) {
      return null;
    }
    return { subscriberId: event.subscriberId, editionId: event.editionId };
  }

  private hasEvent(target: TrackedRecipient, type: EventType): boolean {
    const existing = this.database.db
      .select({ id: subscriberEvents.id })
      .from(subscriberEvents)
      .where(
        and(
          eq(subscriberEvents.subscriberId, target.subscriberId),
          eq(subscriberEvents.editionId, target.editionId),
          eq(subscriberEvents.eventType, type),
        ),
      )
      .get();
    return existing != null;
  }

  private recordEvent(
    target: TrackedRecipient,
    type: EventType,
    metadata: Record<string, string | boolean>,
    context: TrackingContext,
  ): void {
    this.database.db
      .insert(subscriberEvents)
      .values({
        subscriberId: target.subscriberId,
        editionId: target.editionId,
        eventType: type,
        metadata,
        ipAddress: context.ipAddress ?? null,
        userAgent: context.userAgent ?? null,
      })
      .run();
  }

  private countEditionEvents(editionId: number, type: EventType): number {
    const row = this.database.db
      .select({ value: count() })
      .from(subscriberEvents)
      .where(
        and(
          eq(subscriberEvents.editionId, editionId),
          eq(subscriberEvents.eventType, type),
        ),
      )
      .get();
    return row?.value ?? 0;
  }

  private findSubscriber(email: string) {
    return this.database.db
      .select()
      .from(subscribers)
      .where(eq(subscribers.email, email.trim().toLowerCase()))
      .get();
  }
}
