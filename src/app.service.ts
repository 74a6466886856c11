import { Inject, Injectable } from '@nestjs/common';
import { Settings, SETTINGS } from './config/settings';

export interface AppInfo {
  name: string;
  version: string;
  api: string;
  health: string;
}

@Injectable()
export class AppService {
  constructor(@Inject(SETTINGS) private readonly settings: Settings) {}

  getInfo(): AppInfo {
    return {
      name: this.settings.appName,
      version: this.settings.appVersion,
      api: this.settings.apiPrefix,
      health: '/health',
    };
  }
}
