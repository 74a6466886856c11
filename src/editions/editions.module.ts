import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { EmailModule } from '../email/email.module';
import { NewslettersModule } from '../newsletters/newsletters.module';
import { EditionsController } from './editions.controller';

@Module({
  imports: [AuthModule, NewslettersModule, EmailModule],
  controllers: [EditionsController],
})
export class EditionsModule {}
