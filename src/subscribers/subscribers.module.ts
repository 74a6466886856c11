import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { EmailModule } from '../email/email.module';
import { NewslettersModule } from '../newsletters/newsletters.module';
import { SegmentationService } from './services/segmentation.service';
import { SubscribersService } from './services/subscribers.service';
import { SubscribersController } from './subscribers.controller';
import { UnsubscribeController } from './unsubscribe.controller';
import { VerifyController } from './verify.controller';

@Module({
  imports: [AuthModule, NewslettersModule, EmailModule],
  controllers: [SubscribersController, UnsubscribeController, VerifyController],
  providers: [SubscribersService, SegmentationService],
  exports: [SubscribersService, SegmentationService],
})
export class SubscribersModule {}
