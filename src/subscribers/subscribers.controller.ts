import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { z } from 'zod';
import { AuthGuard } from '../auth/auth.guard';
import { CurrentUser } from '../auth/current-user.decorator';
import { Subscriber, SubscriberStatus, User } from '../database/schema';
import { parseOptionalInt, parseWith } from '../common/utils/validation.util';
import { SegmentationService } from './services/segmentation.service';
import { SubscribersService } from './services/subscribers.service';
import {
  customSegmentSchema,
  subscriberCreateSchema,
  SubscriberSegmentsView,
  subscriberUpdateSchema,
  unsubscribeSchema,
} from './types/subscriber.types';

const statusSchema = z
  .enum([
    'pending',
    'active',
    'inactive',
    'unsubscribed',
    'bounced',
    'complained',
  ])
  .optional();

const customSegmentsBodySchema = z.object({
  custom_segments: z.array(customSegmentSchema).max(50).default([]),
});

@Controller('subscribers')
@UseGuards(AuthGuard)
export class SubscribersController {
  constructor(
    private readonly subscribersService: SubscribersService,
    private readonly segmentation: SegmentationService,
  ) {}

  @Get()
  list(
    @CurrentUser() user: User,
    @Query('newsletter_id') newsletterIdRaw?: string,
    @Query('status') statusRaw?: string,
    @Query('limit') limitRaw?: string,
    @Query('offset') offsetRaw?: string,
  ): Subscriber[] {
    const status: SubscriberStatus | undefined = parseWith(
      statusSchema,
      statusRaw || undefined,
    );
    return this.subscribersService.list(user.id, {
      newsletterId: parseOptionalInt(newsletterIdRaw, 'newsletter_id', {
        min: 1,
      }),
      status,
      limit: parseOptionalInt(limitRaw, 'limit', { min: 1, max: 1000 }),
      offset: parseOptionalInt(offsetRaw, 'offset', { min: 0 }),
    });
  }

  @Post()
  create(
    @CurrentUser() user: User,
    @Body() body: unknown,
  ): Promise<Subscriber> {
    return this.subscribersService.create(
      parseWith(subscriberCreateSchema, body),
      user.id,
    );
  }

  @Get(':id')
  get(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
  ): Subscriber {
    return this.subscribersService.get(id, user.id);
  }

  @Put(':id')
  replace(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ): Subscriber {
    return this.update(user, id, body);
  }

  @Patch(':id')
  update(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ): Subscriber {
    return this.subscribersService.update(
      id,
      parseWith(subscriberUpdateSchema, body),
      user.id,
    );
  }

  @Post(':id/unsubscribe')
  @HttpCode(200)
  unsubscribe(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ): { message: string } {
    const input = parseWith(unsubscribeSchema, body ?? {});
    this.subscribersService.unsubscribe(
      id,
      { newsletterId: input.newsletter_id, reason: input.reason },
      user.id,
    );
    return { message: 'Successfully unsubscribed' };
  }

  @Get(':id/segments')
  segments(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
  ): SubscriberSegmentsView {
    this.subscribersService.get(id, user.id);
    return this.segmentation.describe(id);
  }

  /** Evaluates the predefined segments plus the ad-hoc ones in the body. */
  @Post(':id/segments')
  @HttpCode(200)
  evaluateSegments(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ): SubscriberSegmentsView {
    this.subscribersService.get(id, user.id);
    const { custom_segments } = parseWith(customSegmentsBodySchema, body ?? {});
    return this.segmentation.describe(id, custom_segments);
  }
}
