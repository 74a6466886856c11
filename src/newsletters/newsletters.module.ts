import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { ContentModule } from '../content/content.module';
import { LlmModule } from '../llm/llm.module';
import { NewslettersController } from './newsletters.controller';
import { EditionsService } from './services/editions.service';
import { NewsletterGeneratorService } from './services/newsletter-generator.service';
import { NewslettersService } from './services/newsletters.service';
import { PersonalizationService } from './services/personalization.service';
import { TemplateEngineService } from './services/template-engine.service';

@Module({
  imports: [AuthModule, ContentModule, LlmModule],
  controllers: [NewslettersController],
  providers: [
    NewslettersService,
    EditionsService,
    NewsletterGeneratorService,
    TemplateEngineService,
    PersonalizationService,
  ],
  exports: [NewslettersService, EditionsService, NewsletterGeneratorService],
})
export class NewslettersModule {}
