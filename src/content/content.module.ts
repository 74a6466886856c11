import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { ContentController } from './content.controller';
import { ContentAggregatorService } from './services/content-aggregator.service';
import { ContentScoringService } from './services/content-scoring.service';
import { HackerNewsService } from './services/hacker-news.service';
import { RedditService } from './services/reddit.service';
import { RssFeedService } from './services/rss-feed.service';

@Module({
  imports: [AuthModule],
  controllers: [ContentController],
  providers: [
    ContentAggregatorService,
    ContentScoringService,
    HackerNewsService,
    RedditService,
    RssFeedService,
  ],
  exports: [ContentAggregatorService],
})
export class ContentModule {}
