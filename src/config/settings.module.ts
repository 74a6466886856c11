import { DynamicModule, Global, Module } from '@nestjs/common';
import { loadSettings, Settings, SETTINGS } from './settings';

@Global()
@Module({
  providers: [{ provide: SETTINGS, useFactory: () => loadSettings() }],
  exports: [SETTINGS],
})
export class SettingsModule {
  static forRoot(settings: Settings): DynamicModule {
    return {
      module: SettingsModule,
      global: true,
      providers: [{ provide: SETTINGS, useValue: settings }],
      exports: [SETTINGS],
    };
  }
}
