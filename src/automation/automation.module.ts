import { Module } from '@nestjs/common';
import { ContentModule } from '../content/content.module';
import { EmailModule } from '../email/email.module';
import { LlmModule } from '../llm/llm.module';
import { NewslettersModule } from '../newsletters/newsletters.module';
import { CronManagerService } from './services/cron-manager.service';
import { MaintenanceService } from './services/maintenance.service';
import { SchedulerService } from './services/scheduler.service';
import { SystemCrontabRunner } from './services/system-crontab-runner.service';
import { CRONTAB_RUNNER } from './types/automation.types';

@Module({
  imports: [ContentModule, EmailModule, LlmModule, NewslettersModule],
  providers: [
    { provide: CRONTAB_RUNNER, useClass: SystemCrontabRunner },
    CronManagerService,
    MaintenanceService,
    SchedulerService,
  ],
  exports: [CronManagerService, MaintenanceService, SchedulerService],
})
export class AutomationModule {}
