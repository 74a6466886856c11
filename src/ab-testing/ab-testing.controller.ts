import {
  Body,
  Controller,
  ForbiddenException,
  Get,
  HttpCode,
  Inject,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '../auth/auth.guard';
import { CurrentUser } from '../auth/current-user.decorator';
import { parseWith } from '../common/utils/validation.util';
import { Settings, SETTINGS } from '../config/settings';
import { User } from '../database/schema';
import { NewslettersService } from '../newsletters/services/newsletters.service';
import { AbTestingService } from './services/ab-testing.service';
import {
  AbTest,
  assignSchema,
  createTestSchema,
  recordEventSchema,
  subjectLineTestSchema,
  TestResults,
  WinningPatterns,
} from './types/ab-test.types';

@Controller('ab-tests')
@UseGuards(AuthGuard)
export class AbTestingController {
  constructor(
    private readonly abTesting: AbTestingService,
    private readonly newslettersService: NewslettersService,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  @Get()
  list(@CurrentUser() user: User): TestResults[] {
    this.assertEnabled();
    const owned = this.newslettersService
      .list(user.id)
      .map((newsletter) => newsletter.id);
    return this.abTesting
      .list(owned)
      .map((test) => this.abTesting.getTestResults(test.testId));
  }

  @Post()
  create(@CurrentUser() user: User, @Body() body: unknown): TestResults {
    this.assertEnabled();
    const { name, test_type, newsletter_id, variants, ...options } = parseWith(
      createTestSchema,
      body,
    );
    this.newslettersService.get(newsletter_id, user.id);
    const test = this.abTesting.createTest(
      name,
      test_type,
      newsletter_id,
      variants,
      options,
    );
    return this.abTesting.getTestResults(test.testId);
  }

  @Post('subject-line')
  createSubjectLine(
    @CurrentUser() user: User,
    @Body() body: unknown,
  ): TestResults {
    this.assertEnabled();
    const { newsletter_id, topic, patterns } = parseWith(
      subjectLineTestSchema,
      body,
    );
    this.newslettersService.get(newsletter_id, user.id);
    const test = this.abTesting.createSubjectLineTest(
      newsletter_id,
      topic,
      patterns,
    );
    return this.abTesting.getTestResults(test.testId);
  }

  @Get('patterns/winning')
  winningPatterns(): WinningPatterns {
    this.assertEnabled();
    return this.abTesting.getWinningPatterns();
  }

  @Get(':testId')
  get(@CurrentUser() user: User, @Param('testId') testId: string): TestResults {
    this.owned(user, testId);
    return this.abTesting.getTestResults(testId);
  }

  /** Assigns the newsletter's active subscribers. */
  @Post(':testId/assign')
  @HttpCode(200)
  assign(
    @CurrentUser() user: User,
    @Param('testId') testId: string,
    @Body() body: unknown,
  ): TestResults {
    const test = this.owned(user, testId);
    const { method } = parseWith(assignSchema, body ?? {});
    this.abTesting.assignSubscribers(
      testId,
      this.abTesting.audience(test.newsletterId),
      method,
    );
    return this.abTesting.getTestResults(testId);
  }

  @Post(':testId/start')
  @HttpCode(200)
  start(
    @CurrentUser() user: User,
    @Param('testId') testId: string,
  ): TestResults {
    this.owned(user, testId);
    this.abTesting.startTest(testId);
    return this.abTesting.getTestResults(testId);
  }

  @Post(':testId/pause')
  @HttpCode(200)
  pause(
    @CurrentUser() user: User,
    @Param('testId') testId: string,
  ): TestResults {
    this.owned(user, testId);
    this.abTesting.pauseTest(testId);
    return this.abTesting.getTestResults(testId);
  }

  @Post(':testId/resume')
  @HttpCode(200)
  resume(
    @CurrentUser() user: User,
    @Param('testId') testId: string,
  ): TestResults {
    this.owned(user, testId);
    this.abTesting.resumeTest(testId);
    return this.abTesting.getTestResults(testId);
  }

  @Post(':testId/cancel')
  @HttpCode(200)
  cancel(
    @CurrentUser() user: User,
    @Param('testId') testId: string,
  ): TestResults {
    this.owned(user, testId);
    this.abTesting.cancelTest(testId);
    return this.abTesting.getTestResults(testId);
  }

  @Post(':testId/events')
  @HttpCode(200)
  recordEvent(
    @CurrentUser() user: User,
    @Param('testId') testId: string,
    @Body() body: unknown,
  ): { recorded: boolean } {
    this.owned(user, testId);
    const event = parseWith(recordEventSchema, body);
    return {
      recorded: this.abTesting.recordEvent(
        testId,
        event.variant_id,
        event.event_type,
        event.subscriber_id,
        event.value,
      ),
    };
  }

  @Post(':testId/complete')
  @HttpCode(200)
  complete(
    @CurrentUser() user: User,
    @Param('testId') testId: string,
  ): TestResults {
    this.owned(user, testId);
    this.abTesting.completeTest(testId);
    return this.abTesting.getTestResults(testId);
  }

  private owned(user: User, testId: string): AbTest {
    this.assertEnabled();
    const test = this.abTesting.get(testId);
    this.newslettersService.get(test.newsletterId, user.id);
    return test;
  }

  private assertEnabled(): void {
    if (!this.settings.enableAbTesting) {
      throw new ForbiddenException('A/B testing is disabled');
    }
  }
}
