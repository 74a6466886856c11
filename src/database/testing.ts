import { loadSettings, Settings, SettingsSource } from '../config/settings';
import { DatabaseService } from './database.service';

export function testSettings(overrides: SettingsSource = {}): Settings {
  return loadSettings({
    DATABASE_URL: 'sqlite:///:memory:',
    SECRET_KEY: 'test-secret',
    DATA_DIR: './tmp-test-data',
    ...overrides,
  });
}

export function createTestDatabase(settings = testSettings()): DatabaseService {
  return new DatabaseService(settings);
}
