import { loadSettings, SettingsError } from './settings';

describe('loadSettings', () => {
  it('applies defaults for an empty environment', () => {
    const settings = loadSettings({});

    expect(settings.appName).toBe('Newsletter Engine');
    expect(settings.apiPrefix).toBe('/api/v1');
    expect(settings.databaseUrl).toBe('sqlite:///./data/newsletter.db');
    expect(settings.smtpPort).toBe(587);
    expect(settings.smtpUser).toBeUndefined();
    expect(settings.enableAbTesting).toBe(false);
    expect(settings.deliveryBatchSize).toBe(50);
    expect(settings.smtpBackupRelays.map((relay) => relay.host)).toEqual([
      'smtp.sendgrid.net',
      'smtp.resend.com',
      'smtp.gmail.com',
    ]);
  });

  it('coerces numbers and boolean flags and trims trailing slashes', () => {
    const settings = loadSettings({
      SMTP_PORT: '2525',
      ENABLE_AB_TESTING: 'yes',
      ENABLE_REGISTRATION: '0',
      TRACKING_BASE_URL: 'https://mail.example.com/track/',
    });

    expect(settings.smtpPort).toBe(2525);
    expect(settings.enableAbTesting).toBe(true);
    expect(settings.enableRegistration).toBe(false);
    expect(settings.trackingBaseUrl).toBe('https://mail.example.com/track');
  });

  it('parses backup relays from JSON', () => {
    const settings = loadSettings({
      SMTP_BACKUP_RELAYS: '[{"host":"relay.example.com","port":2525}]',
    });

    expect(settings.smtpBackupRelays).toEqual([
      { host: 'relay.example.com', port: 2525 },
    ]);
  });

  it('rejects invalid values with the offending keys', () => {
    expect(() =>
      loadSettings({ SMTP_PORT: 'abc', ENABLE_ANALYTICS: 'maybe' }),
    ).toThrow(SettingsError);

    try {
      loadSettings({ ENABLE_ANALYTICS: 'maybe' });
    } catch (error) {
      expect(error).toBeInstanceOf(SettingsError);
      if (error instanceof SettingsError) {
        expect(error.issues[0]).toContain('ENABLE_ANALYTICS');
      }
    }
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadSettings({}))).toBe(true);
  });
});
