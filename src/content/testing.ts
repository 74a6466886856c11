import { Settings } from '../config/settings';
import { DatabaseService } from '../database/database.service';
import { ContentAggregatorService } from './services/content-aggregator.service';
import { ContentScoringService } from './services/content-scoring.service';
import { HackerNewsService } from './services/hacker-news.service';
import { RedditService } from './services/reddit.service';
import { RssFeedService } from './services/rss-feed.service';

export function createAggregator(
  database: DatabaseService,
  settings: Settings,
): ContentAggregatorService {
  return new ContentAggregatorService(
    database,
    new RssFeedService(settings),
    new HackerNewsService(settings),
    new RedditService(settings),
    new ContentScoringService(),
    settings,
  );
}
