import { Module } from '@nestjs/common';
import { NewslettersModule } from '../newsletters/newsletters.module';
import { DeliveryManagerService } from './services/delivery-manager.service';
import { EmailTrackerService } from './services/email-tracker.service';
import { NodemailerMailSender } from './services/nodemailer-mail-sender.service';
import { TrackingController } from './tracking.controller';
import { MAIL_SENDER } from './types/email.types';

@Module({
  imports: [NewslettersModule],
  controllers: [TrackingController],
  providers: [
    { provide: MAIL_SENDER, useClass: NodemailerMailSender },
    DeliveryManagerService,
    EmailTrackerService,
  ],
  exports: [MAIL_SENDER, DeliveryManagerService, EmailTrackerService],
})
export class EmailModule {}
