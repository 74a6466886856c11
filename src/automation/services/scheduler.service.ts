import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { HOUR_MS } from '../../common/utils/date.util';
import { PollingLoop } from '../../common/utils/polling-loop.util';
import { Settings, SETTINGS } from '../../config/settings';
import { ContentAggregatorService } from '../../content/services/content-aggregator.service';
import { AggregationResult } from '../../content/types/content.types';
import { DeliveryManagerService } from '../../email/services/delivery-manager.service';

export interface SchedulerTick {
  processed: number;
  failed: number[];
  fetched: AggregationResult | null;
}

/** Sends due editions on every poll and refreshes content once an hour. */
@Injectable()
export class SchedulerService implements OnModuleDestroy {
  private readonly logger = new Logger(SchedulerService.name);
  private readonly loop: PollingLoop;
  private lastFetchAt: number | null = null;

  constructor(
    private readonly delivery: DeliveryManagerService,
    private readonly aggregator: ContentAggregatorService,
    @Inject(SETTINGS) settings: Settings,
  ) {
    this.loop = new PollingLoop(
      'scheduler',
      settings.schedulerPollSec * 1000,
      async () => {
        await this.tick();
      },
      this.logger,
    );
  }

  get isRunning(): boolean {
    return this.loop.isRunning;
  }

  start(): Promise<void> {
    return this.loop.run();
  }

  stop(): void {
    this.loop.stop();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  async tick(now: Date = new Date()): Promise<SchedulerTick> {
    const sends = await this.delivery.processScheduledSends(now);
    let fetched: AggregationResult | null = null;
    if (
      this.lastFetchAt === null ||
      now.getTime() - this.lastFetchAt >= HOUR_MS
    ) {
      this.lastFetchAt = now.getTime();
      fetched = await this.aggregator.fetchAll({}, now);
    }
    return { processed: sends.processed, failed: sends.failed, fetched };
  }
}
