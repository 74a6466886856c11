import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '../auth/auth.guard';
import { CurrentUser } from '../auth/current-user.decorator';
import { ContentSource, Newsletter, User } from '../database/schema';
import { parseWith } from '../common/utils/validation.util';
import { NewslettersService } from './services/newsletters.service';
import {
  newsletterCreateSchema,
  newsletterUpdateSchema,
  sourceCreateSchema,
} from './types/newsletter.types';

@Controller('newsletters')
@UseGuards(AuthGuard)
export class NewslettersController {
  constructor(private readonly newslettersService: NewslettersService) {}

  @Get()
  list(@CurrentUser() user: User): Newsletter[] {
    return this.newslettersService.list(user.id);
  }

  @Post()
  create(@CurrentUser() user: User, @Body() body: unknown): Newsletter {
    return this.newslettersService.create(
      parseWith(newsletterCreateSchema, body),
      user.id,
    );
  }

  @Get(':id')
  get(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
  ): Newsletter {
    return this.newslettersService.get(id, user.id);
  }

  @Put(':id')
  replace(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ): Newsletter {
    return this.update(user, id, body);
  }

  @Patch(':id')
  update(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ): Newsletter {
    return this.newslettersService.update(
      id,
      parseWith(newsletterUpdateSchema, body),
      user.id,
    );
  }

  @Delete(':id')
  @HttpCode(204)
  remove(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
  ): void {
    this.newslettersService.archive(id, user.id);
  }

  @Get(':id/sources')
  listSources(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
  ): ContentSource[] {
    this.newslettersService.get(id, user.id);
    return this.newslettersService.listSources(id);
  }

  @Post(':id/sources')
  addSource(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: unknown,
  ): ContentSource {
    this.newslettersService.get(id, user.id);
    return this.newslettersService.addSource(
      id,
      parseWith(sourceCreateSchema, body),
    );
  }

  @Delete(':id/sources/:sourceId')
  @HttpCode(204)
  removeSource(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
    @Param('sourceId', ParseIntPipe) sourceId: number,
  ): void {
    this.newslettersService.get(id, user.id);
    this.newslettersService.removeSource(id, sourceId);
  }
}
