import { Injectable, NotFoundException } from '@nestjs/common';
import { and, count, countDistinct, eq, max } from 'drizzle-orm';
import { DatabaseService } from '../../database/database.service';
import {
  EventType,
  subscriberEvents,
  subscribers,
} from '../../database/schema';
import { DAY_MS } from '../../common/utils/date.util';
import { PREDEFINED_SEGMENTS } from '../config/segments';
import {
  EngagementLevel,
  SegmentCriteria,
  SegmentRecommendation,
  SubscriberProfile,
  SubscriberSegmentsView,
} from '../types/subscriber.types';

function daysSince(date: Date, now: Date): number {
  return Math.floor((now.getTime() - date.getTime()) / DAY_MS);
}

function ratio(part: number, total: number): number {
  return total > 0 ? Math.min(1, part / total) : 0;
}

@Injectable()
export class SegmentationService {
  constructor(private readonly database: DatabaseService) {}

  listSegments(): readonly SegmentCriteria[] {
    return PREDEFINED_SEGMENTS;
  }

  calculateEngagementLevel(profile: SubscriberProfile): EngagementLevel {
    if (profile.subscriptionAgeDays < 30 || profile.totalSent === 0) {
      return 'new';
    }
    if (profile.openRate >= 0.6) {
      return 'highly_engaged';
    }
    if (profile.openRate >= 0.3) {
      return 'engaged';
    }
    if (profile.openRate >= 0.15) {
      return 'moderate';
    }
    if (profile.openRate >= 0.05) {
      return 'low';
    }
    return 'inactive';
  }

  /** Matching segment keys, then `engagement_<level>` and `tier_<tier>`. */
  segmentSubscriber(
    profile: SubscriberProfile,
    customSegments: SegmentCriteria[] = [],
    now: Date = new Date(),
  ): string[] {
    const matched = [...PREDEFINED_SEGMENTS, ...customSegments]
      .filter((criteria) => this.matchesCriteria(profile, criteria, now))
      .map((criteria) => criteria.key);

    return [
      ...matched,
      `engagement_${this.calculateEngagementLevel(profile)}`,
      `tier_${profile.tier}`,
    ];
  }

  matchesCriteria(
    profile: SubscriberProfile,
    criteria: SegmentCriteria,
    now: Date = new Date(),
  ): boolean {
    const c = criteria.conditions;

    if (c.openRateMin != null && profile.openRate < c.openRateMin) {
      return false;
    }
    if (c.openRateMax != null && profile.openRate > c.openRateMax) {
      return false;
    }
    if (c.clickRateMin != null && profile.clickRate < c.clickRateMin) {
      return false;
    }

    // recency bounds only apply once there is an open on record
    if (profile.lastOpenDate) {
      const idle = daysSince(profile.lastOpenDate, now);
      if (c.lastOpenDays != null && idle > c.lastOpenDays) {
        return false;
      }
      if (c.lastOpenDaysMin != null && idle < c.lastOpenDaysMin) {
        return false;
      }
      if (c.lastOpenDaysMax != null && idle > c.lastOpenDaysMax) {
        return false;
      }
    }

    if (c.tier != null && profile.tier !== c.tier) {
      return false;
    }

    if (
      c.companies &&
      (!profile.company || !c.companies.includes(profile.company))
    ) {
      return false;
    }
    if (c.roles) {
      const role = profile.role?.toLowerCase();
      if (!role || !c.roles.some((candidate) => role.includes(candidate))) {
        return false;
      }
    }
    if (profile.companySize != null) {
      if (c.companySizeMin != null && profile.companySize < c.companySizeMin) {
        return false;
      }
      if (c.companySizeMax != null && profile.companySize > c.companySizeMax) {
        return false;
      }
    }

    if (
      c.referredSubscribersMin != null &&
      profile.referredSubscribers < c.referredSubscribersMin
    ) {
      return false;
    }
    if (
      c.feedbackSubmittedMin != null &&
      profile.feedbackSubmitted < c.feedbackSubmittedMin
    ) {
      return false;
    }

    if (
      c.subscriptionAgeDaysMin != null &&
      profile.subscriptionAgeDays < c.subscriptionAgeDaysMin
    ) {
      return false;
    }
    if (
      c.subscriptionAgeDaysMax != null &&
      profile.subscriptionAgeDays > c.subscriptionAgeDaysMax
    ) {
      return false;
    }

    if (
      c.preferredSendTimes &&
      (
        !profile.preferredSendTime || !c.preferredSendTimes.includes(
          profile.preferredSendTime,
        )
      )
    ) {
      return false;
    }
    if (
      c.deviceTypes &&
      (!profile.deviceType || !c.deviceTypes.includes(profile.deviceType))
    ) {
      return false;
    }
    return true;
  }

  recommendSegments(
    profile: SubscriberProfile,
    now: Date = new Date(),
  ): SegmentRecommendation[] {
    const level = this.calculateEngagementLevel(profile);
    const recommendations: SegmentRecommendation[] = [];

    if (profile.tier === 'free' && profile.openRate > 0.4) {
      recommendations.push({
        segment: 'upsell_candidate',
        reason: 'High engagement on free tier',
        action: 'Send premium features showcase',
      });
    }

    if ((level === 'low' || level === 'moderate') && profile.lastOpenDate) {
      const idle = daysSince(profile.lastOpenDate, now);
      if (idle > 7 && idle < 30) {
        recommendations.push({
          segment: 're_engagement',
          reason: `No opens in ${idle} days`,
          action: 'Send re-engagement campaign',
        });
      }
    }

    if (level === 'highly_engaged' && profile.referredSubscribers === 0) {
      recommendations.push({
        segment: 'referral_potential',
        reason: "Highly engaged but hasn't referred",
        action: 'Send referral incentive',
      });
    }
    return recommendations;
  }

  /**
   * Profile from the subscriber row and its logged events; rates count distinct
   * editions.
   */
  buildProfile(
    subscriberId: number,
    now: Date = new Date(),
  ): SubscriberProfile {
    const subscriber = this.database.db
      .select()
      .from(subscribers)
      .where(eq(subscribers.id, subscriberId))
      .get();
    if (!subscriber) {
      throw new NotFoundException(`subscriber ${subscriberId} not found`);
    }

    const totalSent = this.database.db
      .select({ value: count() })
      .from(subscriberEvents)
      .where(
        and(
          eq(subscriberEvents.subscriberId, subscriberId),
          eq(subscriberEvents.eventType, 'sent'),
        ),
      )
      .get()?.value ?? 0;
    const opens = this.activity(subscriberId, 'open');
    const clicks = this.activity(subscriberId, 'click');
    const { attributes, preferences } = subscriber;

    return {
      subscriberId,
      email: subscriber.email,
      company: attributes.company ?? null,
      role: attributes.job_title ?? null,
      companySize: attributes.company_size ?? null,
      tier: attributes.tier ?? 'free',
      totalSent,
      totalOpens: opens.editions,
      totalClicks: clicks.editions,
      lastOpenDate: opens.last,
      lastClickDate: clicks.last,
      openRate: ratio(opens.editions, totalSent),
      clickRate: ratio(clicks.editions, totalSent),
      preferredTopics: preferences.preferred_keywords ?? [],
      preferredSendTime: attributes.preferred_send_time ?? null,
      subscriptionAgeDays: Math.max(
        0,
        daysSince(new Date(subscriber.subscribedAt), now),
      ),
      referredSubscribers: attributes.referral_count ?? 0,
      feedbackSubmitted: attributes.feedback_count ?? 0,
      deviceType: attributes.device_type ?? null,
    };
  }

  describe(
    subscriberId: number,
    customSegments: SegmentCriteria[] = [],
    now: Date = new Date(),
  ): SubscriberSegmentsView {
    const profile = this.buildProfile(subscriberId, now);
    return {
      subscriber_id: subscriberId,
      engagement_level: this.calculateEngagementLevel(profile),
      open_rate: Number(profile.openRate.toFixed(4)),
      click_rate: Number(profile.clickRate.toFixed(4)),
      segments: this.segmentSubscriber(profile, customSegments, now),
      recommendations: this.recommendSegments(profile, now),
    };
  }

  private activity(subscriberId: number, type: EventType): {
    editions: number;
    last: Date | null;
  } {
    const row = this.database.db
      .select({
        editions: countDistinct(subscriberEvents.editionId),
        last: max(subscriberEvents.createdAt),
      })
      .from(subscriberEvents)
      .where(
        and(
          eq(subscriberEvents.subscriberId, subscriberId),
          eq(subscriberEvents.eventType, type),
        ),
      )
      .get();
    return {
      editions: row?.editions ?? 0,
      last: row?.last ? new Date(row.last) : null,
    };
  }
}
