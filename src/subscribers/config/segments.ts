import { SegmentCriteria } from '../types/subscriber.types';

export const PREDEFINED_SEGMENTS: readonly SegmentCriteria[] = [
  {
    key: 'power_users',
    name: 'Power Users',
    type: 'engagement',
    conditions: { openRateMin: 0.6, clickRateMin: 0.2, lastOpenDays: 7 },
    priority: 10,
    description: 'Opens and clicks nearly every edition',
    tags: ['high_value', 'engaged'],
  },
  {
    key: 'at_risk',
    name: 'At Risk',
    type: 'engagement',
    conditions: { openRateMax: 0.3, lastOpenDaysMin: 14, lastOpenDaysMax: 30 },
    priority: 8,
    description: 'Activity dropping off over the last month',
    tags: ['retention', 're-engagement'],
  },
  {
    key: 'dormant',
    name: 'Dormant',
    type: 'engagement',
    conditions: { lastOpenDaysMin: 30, openRateMax: 0.05 },
    priority: 3,
    description: 'No meaningful activity for a month or more',
    tags: ['inactive', 'win-back'],
  },
  {
    key: 'enterprise_accounts',
    name: 'Enterprise Accounts',
    type: 'value',
    conditions: { tier: 'enterprise', companySizeMin: 500 },
    priority: 10,
    tags: ['enterprise', 'high_value'],
  },
  {
    key: 'premium_engaged',
    name: 'Premium Engaged',
    type: 'value',
    conditions: { tier: 'premium', openRateMin: 0.4 },
    priority: 9,
    tags: ['premium', 'engaged'],
  },
  {
    key: 'big_tech_engineers',
    name: 'Big Tech Engineers',
    type: 'demographic',
    conditions: {
      companies: ['Google', 'Apple', 'Meta', 'Amazon', 'Netflix', 'Microsoft'],
      roles: ['engineer', 'developer', 'architect', 'sre'],
    },
    priority: 9,
    tags: ['tech', 'high_value'],
  },
  {
    key: 'startup_founders',
    name: 'Startup Founders',
    type: 'demographic',
    conditions: {
      roles: ['founder', 'ceo', 'cto', 'co-founder'],
      companySizeMax: 50,
    },
    priority: 8,
    tags: ['startup', 'decision_maker'],
  },
  {
    key: 'referral_champions',
    name: 'Referral Champions',
    type: 'behavioral',
    conditions: { referredSubscribersMin: 3 },
    priority: 9,
    tags: ['advocate', 'referral'],
  },
  {
    key: 'feedback_providers',
    name: 'Feedback Providers',
    type: 'behavioral',
    conditions: { feedbackSubmittedMin: 2 },
    priority: 7,
    tags: ['engaged', 'feedback'],
  },
  {
    key: 'new_subscribers',
    name: 'New Subscribers',
    type: 'lifecycle',
    conditions: { subscriptionAgeDaysMax: 30 },
    priority: 8,
    description: 'Joined within the last 30 days',
    tags: ['new', 'onboarding'],
  },
  {
    key: 'veterans',
    name: 'Veterans',
    type: 'lifecycle',
    conditions: { subscriptionAgeDaysMin: 365, openRateMin: 0.3 },
    priority: 7,
    tags: ['loyal', 'veteran'],
  },
  {
    key: 'morning_readers',
    name: 'Morning Readers',
    type: 'preference',
    conditions: { preferredSendTimes: ['6AM', '7AM', '8AM', '9AM'] },
    priority: 5,
    tags: ['timing', 'morning'],
  },
  {
    key: 'mobile_first',
    name: 'Mobile First',
    type: 'preference',
    conditions: { deviceTypes: ['mobile', 'tablet'] },
    priority: 6,
    tags: ['mobile', 'responsive'],
  },
];
