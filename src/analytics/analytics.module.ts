import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { NewslettersModule } from '../newsletters/newsletters.module';
import { AnalyticsController } from './analytics.controller';
import { AnalyticsService } from './services/analytics.service';
import { ReportStorageService } from './services/report-storage.service';

@Module({
  imports: [AuthModule, NewslettersModule],
  controllers: [AnalyticsController],
  providers: [AnalyticsService, ReportStorageService],
  exports: [AnalyticsService, ReportStorageService],
})
export class AnalyticsModule {}
