import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { and, count, eq, isNull, ne } from 'drizzle-orm';
import { Settings, SETTINGS } from '../../config/settings';
import { DatabaseService } from '../../database/database.service';
import {
  ContentSource,
  contentSources,
  Newsletter,
  newsletters,
  NewsletterSettings,
  newsletterSubscribers,
} from '../../database/schema';
import { getNiche } from '../../content/config/niches';
import { DEFAULT_CONTENT_RATIOS } from '../../content/services/content-ratio.manager';
import {
  DEFAULT_CATEGORIES,
  NewsletterCreateInput,
  NewsletterUpdateInput,
  SourceCreateInput,
} from '../types/newsletter.types';

export function defaultNewsletterSettings(niche: string): NewsletterSettings {
  const config = getNiche(niche);
  return {
    frequency: config?.frequency ?? 'weekly',
    send_time: '08:00',
    max_articles: 10,
    categories: config?.categories ?? DEFAULT_CATEGORIES,
    content_ratio: config?.content_ratio ?? DEFAULT_CONTENT_RATIOS,
    template: config?.template ?? 'default',
  };
}

@Injectable()
export class NewslettersService {
  private readonly logger = new Logger(NewslettersService.name);

  constructor(
    private readonly database: DatabaseService,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  list(userId?: number): Newsletter[] {
    return this.database.db
      .select()
      .from(newsletters)
      .where(userId == null ? undefined : eq(newsletters.userId, userId))
      .orderBy(newsletters.id)
      .all();
  }

  /** Without `userId` any newsletter is visible; with it only the owner's. */
  get(id: number, userId?: number): Newsletter {
    const newsletter = this.database.db
      .select()
      .from(newsletters)
      .where(eq(newsletters.id, id))
      .get();
    if (!newsletter || (userId != null && newsletter.userId !== userId)) {
      throw new NotFoundException(`newsletter ${id} not found`);
    }
    return newsletter;
  }

  create(
    input: NewsletterCreateInput,
    userId: number | null = null,
  ): Newsletter {
    const { db } = this.database;

    if (userId != null) {
      const owned = db
        .select({ value: count() })
        .from(newsletters)
        .where(
          and(
            eq(newsletters.userId, userId),
            ne(newsletters.status, 'archived'),
          ),
        )
        .get();
      if ((owned?.value ?? 0) >= this.settings.maxNewslettersPerUser) {
        throw new BadRequestException(
          `newsletter limit reached (${this.settings.maxNewslettersPerUser})`,
        );
      }
    }
    this.assertNameFree(input.name);

    const newsletter = this.database.transaction(() => {
      const row = db
        .insert(newsletters)
        .values({
          userId,
          name: input.name,
          niche: input.niche,
          description: input.description ?? getNiche(
            input.niche,
          )?.description ?? null,
          settings: {
            ...defaultNewsletterSettings(input.niche),
            ...input.settings,
          },
        })
        .returning()
        .get();
      this.seedNicheSources(row);
      return row;
    });

    this.logger.log(
      `newsletter created: id=${newsletter.id} niche=${newsletter.niche}`,
    );
    return newsletter;
  }

  update(
    id: number,
    input: NewsletterUpdateInput,
    userId?: number,
  ): Newsletter {
    const current = this.get(id, userId);
    if (input.name && input.name !== current.name) {
      this.assertNameFree(input.name);
    }

    return this.database.db
      .update(newsletters)
      .set({
        ...(input.name ? { name: input.name } : {}),
        ...(
          input.description !== undefined ? {
            description: input.description,
          } : {}
        ),
        ...(input.status ? { status: input.status } : {}),
        settings: { ...current.settings, ...(input.settings ?? {}) },
        updatedAt: new Date().toISOString(),
      })
      .where(eq(newsletters.id, id))
      .returning()
      .get();
  }

  /** Soft delete: the newsletter is archived and keeps its history. */
  archive(id: number, userId?: number): void {
    this.get(id, userId);
    this.database.db
      .update(newsletters)
      .set({ status: 'archived', updatedAt: new Date().toISOString() })
      .where(eq(newsletters.id, id))
      .run();
    this.logger.log(`newsletter archived: id=${id}`);
  }

  listSources(newsletterId: number): ContentSource[] {
    return this.database.db
      .select()
      .from(contentSources)
      .where(eq(contentSources.newsletterId, newsletterId))
      .orderBy(contentSources.id)
      .all();
  }

  addSource(newsletterId: number, input: SourceCreateInput): ContentSource {
    const newsletter = this.get(newsletterId);
    return this.database.db
      .insert(contentSources)
      .values({
        newsletterId,
        name: input.name,
        url: input.url,
        type: input.type,
        fetchFrequencyMinutes: input.fetch_frequency_minutes,
        config: {
          content_type: input.content_type,
          story_type: input.story_type,
          sort: input.sort,
          time_filter: input.time_filter,
          include_stickied: input.include_stickied,
          include_nsfw: input.include_nsfw,
          keywords: input.keywords,
          exclude_keywords: input.exclude_keywords,
          trusted_authors: input.trusted_authors,
          limit: input.limit,
          min_score: input.min_score,
          niche: newsletter.niche,
        },
      })
      .returning()
      .get();
  }

  removeSource(newsletterId: number, sourceId: number): void {
    const result = this.database.db
      .delete(contentSources)
      .where(
        and(
          eq(contentSources.id, sourceId),
          eq(contentSources.newsletterId, newsletterId),
        ),
      )
      .run();
    if (result.changes === 0) {
      throw new NotFoundException(`source ${sourceId} not found`);
    }
  }

  /** Recomputes the denormalized count from active subscriptions. */
  refreshSubscriberCount(newsletterId: number): number {
    const { db } = this.database;
    const row = db
      .select({ value: count() })
      .from(newsletterSubscribers)
      .where(
        and(
          eq(newsletterSubscribers.newsletterId, newsletterId),
          isNull(newsletterSubscribers.unsubscribedAt),
        ),
      )
      .get();
    const total = row?.value ?? 0;
    db.update(newsletters)
      .set({ subscriberCount: total })
      .where(eq(newsletters.id, newsletterId))
      .run();
    return total;
  }

  refreshAllSubscriberCounts(): number {
    const ids = this.database.db
      .select({ id: newsletters.id })
      .from(newsletters)
      .all();
    for (const { id } of ids) {
      this.refreshSubscriberCount(id);
    }
    return ids.length;
  }

  private assertNameFree(name: string): void {
    const existing = this.database.db
      .select({ id: newsletters.id })
      .from(newsletters)
      .where(eq(newsletters.name, name))
      .get();
    if (existing) {
      throw new ConflictException(`newsletter name already in use: ${name}`);
    }
  }

  private seedNicheSources(newsletter: Newsletter): void {
    const niche = getNiche(newsletter.niche);
    if (!niche?.sources.length) {
      return;
    }
    this.database.db
      .insert(contentSources)
      .values(
        niche.sources.map((source) => ({
          newsletterId: newsletter.id,
          name: source.name,
          url: source.url,
          type: source.type,
          config: {
            content_type: source.content_type,
            exclude_keywords: niche.exclude_keywords,
            niche: newsletter.niche,
          },
        })),
      )
      .run();
  }
}
