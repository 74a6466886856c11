import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { z } from 'zod';
import { AuthGuard } from '../auth/auth.guard';
import { CurrentUser } from '../auth/current-user.decorator';
import { Edition, User } from '../database/schema';
import { parseOptionalInt, parseWith } from '../common/utils/validation.util';
import { DeliveryManagerService } from '../email/services/delivery-manager.service';
import { EmailTrackerService } from '../email/services/email-tracker.service';
import { DeliveryResult, EditionStatsView } from '../email/types/email.types';
import { EditionsService } from '../newsletters/services/editions.service';
import { NewsletterGeneratorService } from '../newsletters/services/newsletter-generator.service';
import { NewslettersService } from '../newsletters/services/newsletters.service';
import {
  EditionPreview,
  generateEditionSchema,
  scheduleEditionSchema,
  sendEditionSchema,
} from '../newsletters/types/newsletter.types';

const previewSchema = z.object({
  newsletter_id: z.number().int().positive(),
  email: z.string().email().optional(),
});

@Controller('editions')
@UseGuards(AuthGuard)
export class EditionsController {
  constructor(
    private readonly newslettersService: NewslettersService,
    private readonly editionsService: EditionsService,
    private readonly generator: NewsletterGeneratorService,
    private readonly delivery: DeliveryManagerService,
    private readonly tracker: EmailTrackerService,
  ) {}

  @Get()
  list(
    @CurrentUser() user: User,
    @Query('newsletter_id') newsletterIdRaw?: string,
    @Query('limit') limitRaw?: string,
  ): Edition[] {
    const newsletterId = parseOptionalInt(newsletterIdRaw, 'newsletter_id', {
      min: 1,
    });
    const limit = parseOptionalInt(limitRaw, 'limit', { min: 1, max: 200 });
    const owned = newsletterId
      ? [this.newslettersService.get(newsletterId, user.id)]
      : this.newslettersService.list(user.id);
    return owned.flatMap((newsletter) =>
      this.editionsService.listForNewsletter(newsletter.id, limit),
    );
  }

  @Post('generate')
  async generate(
    @CurrentUser() user: User,
    @Body() body: unknown,
  ): Promise<Edition> {
    const input = parseWith(generateEditionSchema, body);
    const newsletter = this.newslettersService.get(
      input.newsletter_id,
      user.id,
    );
    return this.generator.generateEdition(newsletter, {
      testMode: input.test_mode,
      maxArticles: input.max_articles,
      minScore: input.min_score,
    });
  }

  @Post('preview')
  @HttpCode(200)
  async previewNew(
    @CurrentUser() user: User,
    @Body() body: unknown,
  ): Promise<EditionPreview> {
    const input = parseWith(previewSchema, body);
    this.newslettersService.get(input.newsletter_id, user.id);
    return this.generator.previewEdition(input.newsletter_id, input.email);
  }

  @Get(':id')
  get(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
  ): Edition {
    return this.owned(id, user);
  }

  @Get(':id/preview')
  preview(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
  ): EditionPreview {
    const edition = this.owned(id, user);
    return {
      edition_id: edition.id,
      subject: edition.subject,
      ...this.generator.renderEdition(edition),
      personalized: false,
    };
  }

  @Post(':id/schedule')
  @HttpCode(200)
  schedule(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ): Edition {
    this.owned(id, user);
    const input = parseWith(scheduleEditionSchema, body);
    return this.generator.scheduleEdition(id, new Date(input.send_at));
  }

  @Post(':id/send')
  @HttpCode(200)
  async send(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ): Promise<DeliveryResult> {
    this.owned(id, user);
    const input = parseWith(sendEditionSchema, body ?? {});
    const testEmails = input.test_emails ?? [];
    return this.delivery.sendEdition(id, testEmails.length > 0, testEmails);
  }

  @Post(':id/resend-failed')
  @HttpCode(200)
  async resendFailed(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<DeliveryResult> {
    this.owned(id, user);
    return this.delivery.resendFailed(id);
  }

  @Get(':id/stats')
  stats(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
  ): EditionStatsView {
    this.owned(id, user);
    return this.tracker.getEditionStats(id);
  }

  private owned(id: number, user: User): Edition {
    const edition = this.editionsService.get(id);
    this.newslettersService.get(edition.newsletterId, user.id);
    return edition;
  }
}
