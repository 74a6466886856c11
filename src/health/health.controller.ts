import { Controller, Get, Inject } from '@nestjs/common';
import { Settings, SETTINGS } from '../config/settings';
import { HealthChecksService } from './services/health-checks.service';
import { ComprehensiveHealth } from './types/health.types';
import { collectSystemStats, SystemStats } from './utils/system-stats.util';

export interface ServiceHealth {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime_seconds: number;
  version: string;
  services: { database: string; ollama: string };
}

@Controller('health')
export class HealthController {
  constructor(
    private readonly checks: HealthChecksService,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  @Get()
  async getHealth(): Promise<ServiceHealth> {
    const [database, ollama] = await Promise.all([
      this.checks.checkDatabase(),
      this.checks.checkOllama(),
    ]);
    const ollamaUp = ollama.available_models !== undefined;
    return {
      status: database.healthy && ollamaUp ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime_seconds: Math.round(process.uptime()),
      version: this.settings.appVersion,
      services: {
        database: database.healthy
          ? 'connected'
          : `error: ${database.error ?? 'unknown'}`,
        ollama: ollamaUp ? 'connected' : 'disconnected',
      },
    };
  }

  @Get('system')
  getSystem(): Promise<SystemStats> {
    return collectSystemStats();
  }

  @Get('detailed')
  getDetailed(): Promise<ComprehensiveHealth> {
    return this.checks.checkAll();
  }
}
