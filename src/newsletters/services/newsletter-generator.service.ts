import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { Settings, SETTINGS } from '../../config/settings';
import { DatabaseService } from '../../database/database.service';
import {
  ContentItem,
  contentItems,
  Edition,
  EditionArticle,
  EditionContent,
  Newsletter,
  Subscriber,
  subscribers,
} from '../../database/schema';
import { generateUnsubscribeToken } from '../../auth/utils/tokens.util';
import { ContentAggregatorService } from '../../content/services/content-aggregator.service';
import {
  ContentRatioManager,
  DEFAULT_CONTENT_RATIOS,
} from '../../content/services/content-ratio.manager';
import { getNiche } from '../../content/config/niches';
import { RatioItem } from '../../content/types/content.types';
import {
  OllamaClientService,
  SummaryResult,
} from '../../llm/services/ollama-client.service';
import {
  DEFAULT_CATEGORIES,
  EditionPreview,
  FREQUENCY_LOOKBACK_HOURS,
  GenerateOptions,
  RenderedEdition,
} from '../types/newsletter.types';
import { groupIntoSections } from '../utils/sections.util';
import { EditionsService } from './editions.service';
import { NewslettersService } from './newsletters.service';
import { PersonalizationService } from './personalization.service';
import { TemplateEngineService } from './template-engine.service';

const MIN_POOL_SIZE = 5;
const MAX_SUBJECT_LENGTH = 60;
const DEFAULT_MIN_SCORE = 50;

type RatioCandidate = RatioItem & { item: ContentItem };

@Injectable()
export class NewsletterGeneratorService {
  private readonly logger = new Logger(NewsletterGeneratorService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly aggregator: ContentAggregatorService,
    private readonly llm: OllamaClientService,
    private readonly newslettersService: NewslettersService,
    private readonly editionsService: EditionsService,
    private readonly templateEngine: TemplateEngineService,
    private readonly personalization: PersonalizationService,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  async generateEdition(
    newsletter: Newsletter,
    options: GenerateOptions = {},
    now: Date = new Date(),
  ): Promise<Edition> {
    const startedAt = Date.now();
    const maxArticles = options.maxArticles ?? newsletter.settings.max_articles;
    const minScore =
      options.minScore ?? newsletter.settings.min_score ?? DEFAULT_MIN_SCORE;

    const pool = await this.fetchContent(newsletter, minScore, now);
    if (!pool.length) {
      this.logger.warn(
        `edition skipped: newsletter=${newsletter.id} reason=no_content`,
      );
      throw new BadRequestException(
        'no content available for newsletter generation',
      );
    }

    const processed = await this.processContent(pool, newsletter);
    const selected = this.selectContent(processed, newsletter, maxArticles);
    if (!selected.length) {
      throw new BadRequestException(
        'no processable content for newsletter generation',
      );
    }
    const subject = await this.generateSubject(selected, newsletter);

    const edition = this.editionsService.create({
      newsletterId: newsletter.id,
      subject,
      status: 'draft',
      testMode: options.testMode ?? false,
      content: this.buildStructure(selected, newsletter, maxArticles, now),
    });

    this.logger.log(
      `edition generated: id=${edition.id} newsletter=${newsletter.id} ` +
        `pool=${pool.length} articles=${edition.content.total_articles} ` +
        `elapsedMs=${Date.now() - startedAt}`,
    );
    return edition;
  }

  /**
   * Recent content for the frequency window; triggers a fetch when the pool is
   * thin.
   */
  async fetchContent(
    newsletter: Newsletter,
    minScore: number,
    now: Date = new Date(),
  ): Promise<ContentItem[]> {
    const hours = FREQUENCY_LOOKBACK_HOURS[newsletter.settings.frequency];
    const scoped = this.newslettersService
      .listSources(newsletter.id)
      .length > 0;
    const query = {
      hours,
      minScore,
      limit: 100,
      newsletterId: scoped ? newsletter.id : undefined,
    };

    let content = this.aggregator.getRecentContent(query, now);
    if (content.length < MIN_POOL_SIZE) {
      this.logger.log(
        `content pool thin: newsletter=${newsletter.id} ` +
          `items=${content.length}`,
      );
      await this.aggregator.fetchAll(
        { newsletterId: scoped ? newsletter.id : undefined },
        now,
      );
      content = this.aggregator.getRecentContent(query, now);
    }
    return this.aggregator.deduplicateContent(content);
  }

  /** Fills in summaries and categories; items that fail are dropped. */
  async processContent(
    items: ContentItem[],
    newsletter: Newsletter,
  ): Promise<ContentItem[]> {
    const categories = newsletter.settings.categories ?? DEFAULT_CATEGORIES;
    const processed: ContentItem[] = [];

    for (const item of items) {
      if (item.processedAt && item.summary) {
        processed.push(item);
        continue;
      }

      try {
        const summary: SummaryResult = item.summary
          ? { text: item.summary, method: item.metadata.summarized_by ?? 'llm' }
          : await this.llm.summarize(item.content ?? item.title);
        const classification = await this.llm.classifyContent(
          item.content || summary.text || item.title,
          categories,
        );

        const updated = this.database.db
          .update(contentItems)
          .set({
            summary: summary.text || item.title,
            processedAt: new Date().toISOString(),
            metadata: {
              ...item.metadata,
              category: classification.category,
              topics: classification.topics,
              sentiment: classification.sentiment,
              summarized_by: summary.method,
            },
          })
          .where(eq(contentItems.id, item.id))
          .returning()
          .get();
        processed.push(updated);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(
          `content processing failed: item=${item.id} ${message}`,
        );
      }
    }
    return processed;
  }

  selectContent(
    items: ContentItem[],
    newsletter: Newsletter,
    maxArticles: number,
  ): ContentItem[] {
    const ratios =
      newsletter.settings.content_ratio ?? getNiche(
        newsletter.niche,
      )?.content_ratio ?? DEFAULT_CONTENT_RATIOS;
    const manager = new ContentRatioManager({
      ratios,
      minItems: Math.min(5, maxArticles),
      maxItems: maxArticles,
    });

    const candidates: RatioCandidate[] = items.map((item) => ({
      id: item.id,
      title: item.title,
      summary: item.summary ?? '',
      contentType: item.contentType,
      score: item.score / 100,
      publishedAt: item.publishedAt,
      tags: item.tags,
      readTime: item.metadata.read_time,
      hasCode: item.metadata.has_code,
      hasVisuals: item.metadata.has_images,
      item,
    }));

    const [selected] = manager.selectContent(
      manager.deduplicateContent(candidates),
      Math.min(maxArticles, candidates.length),
    );
    return selected.map((candidate) => candidate.item);
  }

  async generateSubject(
    items: ContentItem[],
    newsletter: Newsletter,
  ): Promise<string> {
    const titles = items.slice(0, 3).map((item) => item.title);
    const fallback = `${newsletter.name}: ${(titles[0] ?? '').slice(0, 40)}...`;

    try {
      const subject = await this.llm.generateTitle(
        titles.map((title) => `- ${title}`).join('\n'),
        'engaging',
      );
      if (!subject || subject.length > MAX_SUBJECT_LENGTH) {
        return fallback;
      }
      return subject;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `subject generation failed: newsletter=${newsletter.id} ${message}`,
      );
      return `${newsletter.name}: Today's Top Stories`;
    }
  }

  buildStructure(
    items: ContentItem[],
    newsletter: Newsletter,
    maxArticles: number,
    now: Date = new Date(),
  ): EditionContent {
    const sections = groupIntoSections(
      items.slice(0, maxArticles).map((item) => ({
        article: this.toArticle(item),
        category: item.metadata.category ?? 'General',
      })),
    );

    return {
      newsletter_id: newsletter.id,
      newsletter_name: newsletter.name,
      sections,
      total_articles: sections.reduce(
        (sum, section) => sum + section.articles.length,
        0,
      ),
      generated_at: now.toISOString(),
    };
  }

  renderEdition(
    edition: Edition,
    subscriber?: Pick<Subscriber, 'id' | 'name' | 'preferences'> | null,
    now: Date = new Date(),
  ): RenderedEdition {
    const newsletter = this.newslettersService.get(edition.newsletterId);
    const token = subscriber
      ? generateUnsubscribeToken(
        this.settings.secretKey,
        subscriber.id,
        newsletter.id,
        now,
      )
      : null;
    const personalized = subscriber
      ? this.personalization.personalize(
        subscriber,
        edition.content.sections,
        now,
      )
      : null;

    const template = newsletter.settings.template ?? 'default';
    return this.templateEngine.render(template, {
      newsletter: {
        id: newsletter.id,
        name: newsletter.name,
        description: newsletter.description,
      },
      subject: edition.subject,
      editionNumber: edition.editionNumber,
      sections: personalized ?? edition.content.sections,
      unsubscribeUrl: token
        ? `${this.settings.unsubscribeBaseUrl}?token=${token}`
        : this.settings.unsubscribeBaseUrl,
      preferencesUrl: token
        ? `${this.settings.frontendUrl}/preferences?token=${token}`
        : `${this.settings.frontendUrl}/preferences`,
      subscriberName: subscriber?.name ?? null,
      generatedAt: now,
    });
  }

  scheduleEdition(editionId: number, sendAt: Date): Edition {
    const edition = this.editionsService.schedule(editionId, sendAt);
    this.logger.log(
      `edition scheduled: id=${editionId} sendAt=${sendAt.toISOString()}`,
    );
    return edition;
  }

  async previewEdition(
    newsletterId: number,
    subscriberEmail?: string,
  ): Promise<EditionPreview> {
    const newsletter = this.newslettersService.get(newsletterId);
    const edition = await this.generateEdition(newsletter, {
      testMode: true,
      maxArticles: 5,
    });

    const subscriber = subscriberEmail
      ? this.database.db
        .select()
        .from(subscribers)
        .where(eq(subscribers.email, subscriberEmail))
        .get()
      : undefined;
    const rendered = this.renderEdition(edition, subscriber ?? null);

    return {
      edition_id: edition.id,
      subject: edition.subject,
      ...rendered,
      personalized: subscriber != null,
    };
  }

  private toArticle(item: ContentItem): EditionArticle {
    return {
      id: item.id,
      title: item.title,
      url: item.url,
      summary: item.summary ?? '',
      author: item.author,
      source: this.sourceLabel(item.url),
      category: item.metadata.category ?? 'General',
      score: item.score,
      content_type: item.contentType,
      published_at: item.publishedAt,
      key_points: item.keyPoints,
      tags: item.tags,
    };
  }

  private sourceLabel(url: string): string {
    try {
      return new URL(url).hostname.replace(/^www\./, '');
    } catch {
      return '';
    }
  }
}
