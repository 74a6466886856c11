import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { SETTINGS } from './config/settings';
import { testSettings } from './database/testing';

describe('AppController', () => {
  let appController: AppController;

  beforeEach(async () => {
    const app: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        AppService,
        { provide: SETTINGS, useValue: testSettings({ APP_VERSION: '2.1.0' }) },
      ],
    }).compile();

    appController = app.get<AppController>(AppController);
  });

  it('should describe the service', () => {
    expect(appController.getRoot()).toEqual({
      name: 'Newsletter Engine',
      version: '2.1.0',
      api: '/api/v1',
      health: '/health',
    });
  });
});
