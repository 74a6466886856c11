import { Module } from '@nestjs/common';
import { EmailModule } from '../email/email.module';
import { LlmModule } from '../llm/llm.module';
import { HealthController } from './health.controller';
import { HealthChecksService } from './services/health-checks.service';
import { SelfHealService } from './services/self-heal.service';

@Module({
  imports: [EmailModule, LlmModule],
  controllers: [HealthController],
  providers: [HealthChecksService, SelfHealService],
  exports: [HealthChecksService, SelfHealService],
})
export class HealthModule {}
