import { DatabaseService } from '../database/database.service';
import {
  EditionArticle,
  EditionContent,
  Newsletter,
  NewsletterSettings,
  newsletters,
} from '../database/schema';

export function insertNewsletter(
  database: DatabaseService,
  values: {
    name?: string;
    niche?: string;
    settings?: Partial<NewsletterSettings>;
  } = {},
): Newsletter {
  return database.db
    .insert(newsletters)
    .values({
      name: values.name ?? 'Test Weekly',
      niche: values.niche ?? 'devops_cloud',
      description: 'Notes for testers',
      settings: {
        frequency: 'weekly',
        send_time: '08:00',
        max_articles: 10,
        ...values.settings,
      },
    })
    .returning()
    .get();
}

export function makeArticle(
  overrides: Partial<EditionArticle> = {},
): EditionArticle {
  return {
    id: 1,
    title: 'Scaling queues',
    url: 'https://example.com/queues',
    summary: 'How one team scaled its queues.',
    author: null,
    source: 'example.com',
    category: 'General',
    score: 50,
    content_type: 'curated',
    published_at: null,
    key_points: [],
    tags: [],
    ...overrides,
  };
}

export function makeContent(
  newsletter: Pick<Newsletter, 'id' | 'name'>,
  articles: EditionArticle[] = [makeArticle()],
): EditionContent {
  return {
    newsletter_id: newsletter.id,
    newsletter_name: newsletter.name,
    sections: [{ name: 'General', articles }],
    total_articles: articles.length,
    generated_at: '2026-03-02T12:00:00.000Z',
  };
}
