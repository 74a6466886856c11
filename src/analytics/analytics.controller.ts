import {
  Controller,
  ForbiddenException,
  Get,
  Inject,
  Query,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '../auth/auth.guard';
import { CurrentUser } from '../auth/current-user.decorator';
import { Settings, SETTINGS } from '../config/settings';
import { User } from '../database/schema';
import { parseWith } from '../common/utils/validation.util';
import { AnalyticsService } from './services/analytics.service';
import {
  AnalyticsOverview,
  EditionEngagement,
  engagementQuerySchema,
  growthQuerySchema,
  GrowthSeries,
  OverallEngagement,
  overviewQuerySchema,
} from './types/analytics.types';

@Controller('analytics')
@UseGuards(AuthGuard)
export class AnalyticsController {
  constructor(
    private readonly analytics: AnalyticsService,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  @Get('overview')
  overview(
    @CurrentUser() user: User,
    @Query() query: unknown,
  ): AnalyticsOverview {
    this.assertEnabled();
    const { newsletter_id, period } = parseWith(overviewQuerySchema, query);
    return this.analytics.overview(
      { userId: user.id, newsletterId: newsletter_id },
      period,
    );
  }

  @Get('growth')
  growth(@CurrentUser() user: User, @Query() query: unknown): GrowthSeries {
    this.assertEnabled();
    const { newsletter_id, days } = parseWith(growthQuerySchema, query);
    return this.analytics.growth(
      { userId: user.id, newsletterId: newsletter_id },
      days,
    );
  }

  @Get('engagement')
  engagement(
    @CurrentUser() user: User,
    @Query() query: unknown,
  ): EditionEngagement | OverallEngagement {
    this.assertEnabled();
    const { newsletter_id, edition_id } = parseWith(
      engagementQuerySchema,
      query,
    );
    if (edition_id != null) {
      return this.analytics.editionEngagement(edition_id, user.id);
    }
    return this.analytics.overallEngagement({
      userId: user.id,
      newsletterId: newsletter_id,
    });
  }

  private assertEnabled(): void {
    if (!this.settings.enableAnalytics) {
      throw new ForbiddenException('analytics are disabled');
    }
  }
}
