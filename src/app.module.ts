import { DynamicModule, Module } from '@nestjs/common';
import { AbTestingModule } from './ab-testing/ab-testing.module';
import { AnalyticsModule } from './analytics/analytics.module';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { AuthModule } from './auth/auth.module';
import { AutomationModule } from './automation/automation.module';
import { loadSettings, Settings } from './config/settings';
import { SettingsModule } from './config/settings.module';
import { ContentModule } from './content/content.module';
import { DatabaseModule } from './database/database.module';
import { EditionsModule } from './editions/editions.module';
import { EmailModule } from './email/email.module';
import { HealthModule } from './health/health.module';
import { LlmModule } from './llm/llm.module';
import { NewslettersModule } from './newsletters/newsletters.module';
import { SubscribersModule } from './subscribers/subscribers.module';

@Module({})
export class AppModule {
  static forRoot(settings: Settings = loadSettings()): DynamicModule {
    return {
      module: AppModule,
      imports: [
        SettingsModule.forRoot(settings),
        DatabaseModule,
        AuthModule,
        LlmModule,
        ContentModule,
        NewslettersModule,
        EmailModule,
        EditionsModule,
        SubscribersModule,
        AnalyticsModule,
        AbTestingModule,
        HealthModule,
        AutomationModule,
      ],
      controllers: [AppController],
      providers: [AppService],
    };
  }
}
