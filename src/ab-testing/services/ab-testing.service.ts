import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { and, eq, isNull } from 'drizzle-orm';
import { z } from 'zod';
import { formatCompactTimestamp, HOUR_MS } from '../../common/utils/date.util';
import { DatabaseService } from '../../database/database.service';
import { newsletterSubscribers, subscribers } from '../../database/schema';
import rawPatterns from '../data/subject-patterns.json';
import {
  AB_RANDOM,
  AbEventType,
  AbTest,
  AssignmentMethod,
  RandomSource,
  TestOptionsInput,
  testOptionsSchema,
  TestResults,
  TestStatus,
  TestType,
  TestVariant,
  WinningPatterns,
} from '../types/ab-test.types';
import {
  chiSquaredSignificance,
  stableHash,
  twoProportionSignificance,
} from '../utils/statistics.util';

const patternLibrarySchema = z.object({
  patterns: z.record(z.array(z.string()).min(1)),
  default_mix: z.array(z.string()).min(1),
  placeholders: z.record(z.array(z.string()).min(1)),
});

export const SUBJECT_PATTERNS = patternLibrarySchema.parse(rawPatterns);

function newVariant(
  variantId: string,
  name: string,
  content: Record<string, unknown>,
): TestVariant {
  return {
    variantId,
    name,
    content,
    subscriberIds: [],
    sends: 0,
    opens: 0,
    clicks: 0,
    conversions: 0,
    unsubscribes: 0,
    revenue: 0,
    openRate: 0,
    clickRate: 0,
    conversionRate: 0,
    ctr: 0,
    isWinner: false,
  };
}

function calculateRates(variant: TestVariant): void {
  if (variant.sends > 0) {
    variant.openRate = variant.opens / variant.sends;
    variant.clickRate = variant.clicks / variant.sends;
    variant.conversionRate = variant.conversions / variant.sends;
  }
  if (variant.opens > 0) {
    variant.ctr = variant.clicks / variant.opens;
  }
}

function allVariants(test: AbTest): TestVariant[] {
  return [test.control, ...test.variants];
}

function variantLetter(index: number): string {
  return String.fromCharCode(65 + index);
}

@Injectable()
export class AbTestingService {
  private readonly logger = new Logger(AbTestingService.name);
  private readonly tests = new Map<string, AbTest>();

  constructor(
    private readonly database: DatabaseService,
    @Inject(AB_RANDOM) private readonly random: RandomSource,
  ) {}

  list(newsletterIds?: number[]): AbTest[] {
    const tests = [...this.tests.values()];
    return newsletterIds
      ? tests.filter((test) => newsletterIds.includes(test.newsletterId))
      : tests;
  }

  get(testId: string): AbTest {
    const test = this.tests.get(testId);
    if (!test) {
      throw new NotFoundException(`ab test ${testId} not found`);
    }
    return test;
  }

  /** The first variant config becomes the control. */
  createTest(
    name: string,
    testType: TestType,
    newsletterId: number,
    variantsConfig: Record<string, unknown>[],
    options: TestOptionsInput = {},
    now: Date = new Date(),
  ): AbTest {
    if (variantsConfig.length < 2) {
      throw new BadRequestException('an ab test needs at least two variants');
    }
    const opts = testOptionsSchema.parse(options);
    const testId = this.generateTestId(name, now);
    const variants = variantsConfig.map((config, index) =>
      newVariant(
        `${testId}_v${index}`,
        typeof config.name === 'string'
          ? config.name
          : `Variant ${variantLetter(index)}`,
        config,
      ),
    );

    const test: AbTest = {
      testId,
      name,
      testType,
      status: 'draft',
      newsletterId,
      segmentIds: opts.segment_ids,
      testSize: opts.test_size,
      minSampleSize: opts.min_sample_size,
      maxRuntimeHours: opts.max_runtime_hours,
      confidenceThreshold: opts.confidence_threshold,
      winnerCriteria: opts.winner_criteria,
      control: variants[0],
      variants: variants.slice(1),
      holdoutAudience: [],
      createdAt: now.toISOString(),
      startedAt: null,
      completedAt: null,
      winnerId: null,
      statisticalSignificance: 0,
      improvementPercentage: 0,
      tags: opts.tags,
      notes: opts.notes ?? null,
    };
    this.tests.set(testId, test);
    this.logger.log(
      `ab test created: id=${testId} type=${testType} ` +
        `variants=${variants.length}`,
    );
    return test;
  }

  /**
   * Without explicit patterns one pattern is drawn from each group of the
   * default mix.
   */
  createSubjectLineTest(
    newsletterId: number,
    topic: string,
    patterns?: string[],
    options: TestOptionsInput = {},
    now: Date = new Date(),
  ): AbTest {
    const chosen =
      patterns ??
      SUBJECT_PATTERNS.default_mix.flatMap((group) => {
        const groupPatterns = SUBJECT_PATTERNS.patterns[group];
        return groupPatterns ? [this.pick(groupPatterns)] : [];
      });

    const variantsConfig = chosen.map((pattern, index) => ({
      name: `Pattern ${variantLetter(index)}`,
      subject_line: this.generateSubjectLine(pattern, topic, now),
      pattern_type: this.identifyPatternType(pattern),
    }));

    return this.createTest(
      `Subject Line Test - ${topic}`,
      'subject_line',
      newsletterId,
      variantsConfig,
      {
        winner_criteria: 'open_rate',
        test_size: 0.2,
        min_sample_size: 100,
        ...options,
      },
      now,
    );
  }

  generateSubjectLine(
    pattern: string,
    topic: string,
    now: Date = new Date(),
  ): string {
    return pattern.replace(/\{(\w+)\}/g, (match, key: string) => {
      if (key === 'topic') {
        return topic;
      }
      if (key === 'year') {
        return String(now.getUTCFullYear());
      }
      if (key === 'version') {
        return `${2 + Math.floor(this.random() * 4)}.0`;
      }
      const values = SUBJECT_PATTERNS.placeholders[key];
      return values ? this.pick(values) : match;
    });
  }

  identifyPatternType(pattern: string): string {
    for (const [group, patterns] of Object.entries(SUBJECT_PATTERNS.patterns)) {
      if (patterns.includes(pattern)) {
        return group;
      }
    }
    return 'custom';
  }

  /** Active subscribers of the newsletter, in id order. */
  audience(newsletterId: number): number[] {
    return this.database.db
      .select({ id: subscribers.id })
      .from(newsletterSubscribers)
      .innerJoin(
        subscribers,
        eq(subscribers.id, newsletterSubscribers.subscriberId),
      )
      .where(
        and(
          eq(newsletterSubscribers.newsletterId, newsletterId),
          isNull(newsletterSubscribers.unsubscribedAt),
          eq(subscribers.status, 'active'),
        ),
      )
      .orderBy(subscribers.id)
      .all()
      .map((row) => row.id);
  }

  /**
   * Splits `testSize` of the audience across the variants; the rest is held out
   * for the winner.
   * `hash` picks the audience and the variant from the subscriber id alone, so
   * a rerun gives the same split.
   */
  assignSubscribers(
    testId: string,
    subscriberIds: number[],
    method: AssignmentMethod = 'random',
  ): Record<string, number[]> {
    const test = this.get(testId);
    if (test.status !== 'draft') {
      throw new BadRequestException(
        `ab test ${testId} is ${test.status}; only drafts can be assigned`,
      );
    }

    const ids = [...new Set(subscriberIds)];
    const size = Math.floor(ids.length * test.testSize);
    const audience =
      method === 'hash'
        ? [...ids]
            .sort(
              (a, b) =>
                stableHash(`${testId}:${a}`) - stableHash(`${testId}:${b}`),
            )
            .slice(0, size)
        : this.shuffle(ids).slice(0, size);
    const selected = new Set(audience);
    test.holdoutAudience = ids.filter((id) => !selected.has(id));

    const variants = allVariants(test);
    for (const variant of variants) {
      variant.subscriberIds = [];
    }

    if (method === 'hash') {
      for (const subscriberId of audience) {
        const slot = stableHash(String(subscriberId)) % variants.length;
        variants[slot].subscriberIds.push(subscriberId);
      }
    } else {
      const share = Math.floor(audience.length / variants.length);
      variants.forEach((variant, index) => {
        const start = index * share;
        const end =
          index < variants.length - 1 ? start + share : audience.length;
        variant.subscriberIds = audience.slice(start, end);
      });
    }

    this.logger.log(
      `ab test assigned: id=${testId} method=${method} ` +
        `audience=${audience.length} holdout=${test.holdoutAudience.length}`,
    );
    return Object.fromEntries(
      variants.map((variant) => [variant.variantId, variant.subscriberIds]),
    );
  }

  startTest(testId: string, now: Date = new Date()): AbTest {
    const test = this.get(testId);
    if (test.status !== 'draft') {
      throw new BadRequestException(
        `ab test ${testId} cannot start from ${test.status}`,
      );
    }
    for (const variant of allVariants(test)) {
      if (variant.subscriberIds.length < test.minSampleSize) {
        throw new BadRequestException(
          `variant ${variant.name} has ${variant.subscriberIds.length} ` +
            `subscribers; ${test.minSampleSize} required`,
        );
      }
    }
    test.status = 'running';
    test.startedAt = now.toISOString();
    this.logger.log(`ab test started: id=${testId}`);
    return test;
  }

  pauseTest(testId: string): AbTest {
    return this.move(testId, ['running'], 'paused');
  }

  resumeTest(testId: string): AbTest {
    return this.move(testId, ['paused'], 'running');
  }

  cancelTest(testId: string): AbTest {
    return this.move(testId, ['draft', 'running', 'paused'], 'cancelled');
  }

  /**
   * Counts the event against the variant and completes the test once it is
   * decided.
   * Events for tests that are not running, unknown variants, or subscribers
   * outside the variant are dropped.
   */
  recordEvent(
    testId: string,
    variantId: string,
    eventType: AbEventType,
    subscriberId: number,
    value?: number,
    now: Date = new Date(),
  ): boolean {
    const test = this.tests.get(testId);
    if (!test || test.status !== 'running') {
      return false;
    }
    const variant = allVariants(
      test,
    ).find((candidate) => candidate.variantId === variantId);
    if (!variant || !variant.subscriberIds.includes(subscriberId)) {
      return false;
    }

    switch (eventType) {
      case 'send':
        variant.sends += 1;
        break;
      case 'open':
        variant.opens += 1;
        break;
      case 'click':
        variant.clicks += 1;
        break;
      case 'conversion':
        variant.conversions += 1;
        variant.revenue += value ?? 0;
        break;
      case 'unsubscribe':
        variant.unsubscribes += 1;
        break;
    }
    calculateRates(variant);
    this.checkCompletion(test, now);
    return true;
  }

  /**
   * Two variants use a pooled z-test, more use chi-squared with k - 1 degrees
   * of freedom.
   */
  calculateSignificance(test: AbTest): number {
    const variants = allVariants(test);
    const successes = variants.map((variant) => {
      switch (test.winnerCriteria) {
        case 'open_rate':
          return variant.opens;
        case 'click_rate':
          return variant.clicks;
        default:
          return variant.conversions;
      }
    });
    const trials = variants.map((variant) => variant.sends);

    const significance =
      variants.length === 2
        ? twoProportionSignificance(
            [successes[0], successes[1]],
            [trials[0], trials[1]],
          )
        : chiSquaredSignificance(successes, trials);
    test.statisticalSignificance = significance;
    return significance;
  }

  completeTest(testId: string, now: Date = new Date()): TestVariant {
    const test = this.get(testId);
    if (test.status !== 'running' && test.status !== 'paused') {
      throw new BadRequestException(
        `ab test ${testId} cannot be completed while ${test.status}`,
      );
    }

    const ranked = allVariants(test)
      .map((variant) => ({ variant, value: this.metric(test, variant) }))
      .sort((a, b) => b.value - a.value);
    const winner = ranked[0].variant;
    winner.isWinner = true;

    test.status = 'completed';
    test.completedAt = now.toISOString();
    test.winnerId = winner.variantId;
    const controlValue = this.metric(test, test.control);
    test.improvementPercentage =
      controlValue > 0 ? (
        (ranked[0].value - controlValue) / controlValue
      ) * 100 : 0;

    this.logger.log(
      `ab test completed: id=${testId} winner=${winner.name} ` +
        `improvement=${test.improvementPercentage.toFixed(1)}%`,
    );
    return winner;
  }

  getTestResults(testId: string): TestResults {
    const test = this.get(testId);
    const variants = allVariants(test);
    return {
      test_id: test.testId,
      name: test.name,
      status: test.status,
      type: test.testType,
      newsletter_id: test.newsletterId,
      started_at: test.startedAt,
      completed_at: test.completedAt,
      winner: variants.find((variant) => variant.isWinner)?.name ?? null,
      statistical_significance: test.statisticalSignificance,
      improvement_percentage: test.improvementPercentage,
      holdout_size: test.holdoutAudience.length,
      variants: variants.map((variant) => ({
        variant_id: variant.variantId,
        name: variant.name,
        subscribers: variant.subscriberIds.length,
        sends: variant.sends,
        opens: variant.opens,
        clicks: variant.clicks,
        open_rate: variant.openRate,
        click_rate: variant.clickRate,
        is_winner: variant.isWinner,
      })),
    };
  }

  /**
   * Patterns from completed tests whose winner beat the control by more than 10
   * %.
   */
  getWinningPatterns(): WinningPatterns {
    const patterns: WinningPatterns = {
      subject_lines: [],
      send_times: [],
      content_types: [],
    };
    for (const test of this.tests.values()) {
      const winner = allVariants(test).find((variant) => variant.isWinner);
      if (
        test.status !== 'completed' ||
        !winner ||
        test.improvementPercentage <= 10
      ) {
        continue;
      }
      const entry = {
        improvement: test.improvementPercentage,
        sample_size: winner.sends,
      };
      if (test.testType === 'subject_line') {
        patterns.subject_lines.push({
          pattern: String(winner.content.pattern_type ?? 'custom'),
          ...entry,
        });
      } else if (test.testType === 'send_time') {
        patterns.send_times.push({
          pattern: String(winner.content.send_time ?? winner.name),
          ...entry,
        });
      } else if (test.testType === 'content_variant') {
        patterns.content_types.push({
          pattern: String(winner.content.content_type ?? winner.name),
          ...entry,
        });
      }
    }
    return patterns;
  }

  private checkCompletion(test: AbTest, now: Date): void {
    if (test.startedAt) {
      const runtime = now.getTime() - new Date(test.startedAt).getTime();
      if (runtime > test.maxRuntimeHours * HOUR_MS) {
        this.completeTest(test.testId, now);
        return;
      }
    }
    if (
      allVariants(test).every((variant) => variant.sends >= test.minSampleSize)
    ) {
      if (this.calculateSignificance(test) >= test.confidenceThreshold) {
        this.completeTest(test.testId, now);
      }
    }
  }

  private metric(test: AbTest, variant: TestVariant): number {
    switch (test.winnerCriteria) {
      case 'open_rate':
        return variant.openRate;
      case 'click_rate':
        return variant.clickRate;
      case 'revenue':
        return variant.revenue;
      default:
        return variant.conversionRate;
    }
  }

  private move(testId: string, from: TestStatus[], to: TestStatus): AbTest {
    const test = this.get(testId);
    if (!from.includes(test.status)) {
      throw new BadRequestException(
        `ab test ${testId} cannot move from ${test.status} to ${to}`,
      );
    }
    test.status = to;
    this.logger.log(`ab test status: id=${testId} to=${to}`);
    return test;
  }

  private generateTestId(name: string, now: Date): string {
    const digest = stableHash(name).toString(16).padStart(8, '0');
    const base = `test_${formatCompactTimestamp(now)}_${digest}`;
    let testId = base;
    for (let n = 2; this.tests.has(testId); n += 1) {
      testId = `${base}_${n}`;
    }
    return testId;
  }

  private pick<T>(values: T[]): T {
    return values[Math.floor(this.random() * values.length) % values.length];
  }

  private shuffle<T>(values: T[]): T[] {
    const copy = [...values];
    for (let i = copy.length - 1; i > 0; i -= 1) {
      const j = Math.floor(this.random() * (i + 1));
      [copy[i], copy[j]] = [copy[j], copy[i]];
    }
    return copy;
  }
}
