import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { NewslettersModule } from '../newsletters/newsletters.module';
import { AbTestingController } from './ab-testing.controller';
import { AbTestingService } from './services/ab-testing.service';
import { AB_RANDOM } from './types/ab-test.types';

@Module({
  imports: [AuthModule, NewslettersModule],
  controllers: [AbTestingController],
  providers: [{ provide: AB_RANDOM, useValue: Math.random }, AbTestingService],
  exports: [AbTestingService],
})
export class AbTestingModule {}
