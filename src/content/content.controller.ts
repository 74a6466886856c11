import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { z } from 'zod';
import { AuthGuard } from '../auth/auth.guard';
import { ContentItem } from '../database/schema';
import { parseOptionalInt, parseWith } from '../common/utils/validation.util';
import { ContentAggregatorService } from './services/content-aggregator.service';
import { AggregationResult } from './types/content.types';

const fetchSchema = z.object({
  newsletter_id: z.number().int().positive().optional(),
  source_ids: z.array(z.number().int().positive()).optional(),
  force: z.boolean().default(false),
});

@Controller('content')
@UseGuards(AuthGuard)
export class ContentController {
  constructor(private readonly aggregator: ContentAggregatorService) {}

  @Get()
  list(
    @Query('hours') hours?: string,
    @Query('min_score') minScore?: string,
    @Query('limit') limit?: string,
    @Query('newsletter_id') newsletterId?: string,
  ): ContentItem[] {
    return this.aggregator.getRecentContent({
      hours: parseOptionalInt(hours, 'hours', { min: 1, max: 24 * 90 }),
      minScore: parseOptionalInt(minScore, 'min_score', { min: 0, max: 100 }),
      limit: parseOptionalInt(limit, 'limit', { min: 1, max: 500 }),
      newsletterId: parseOptionalInt(newsletterId, 'newsletter_id', { min: 1 }),
    });
  }

  @Post('fetch')
  async fetch(@Body() body: unknown): Promise<AggregationResult> {
    const input = parseWith(fetchSchema, body ?? {});
    return this.aggregator.fetchAll({
      newsletterId: input.newsletter_id,
      sourceIds: input.source_ids,
      force: input.force,
    });
  }

  @Get(':id')
  get(@Param('id', ParseIntPipe) id: number): ContentItem {
    return this.aggregator.getItem(id);
  }
}
