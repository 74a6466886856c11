import {
  ConflictException,
  ForbiddenException,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { DatabaseService } from '../../database/database.service';
import { users } from '../../database/schema';
import { createTestDatabase, testSettings } from '../../database/testing';
import { AuthService } from './auth.service';

describe('AuthService', () => {
  const settings = testSettings({ JWT_EXPIRATION_HOURS: '2' });
  let database: DatabaseService;
  let service: AuthService;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    database = createTestDatabase(settings);
    service = new AuthService(database, settings);
  });

  afterEach(() => {
    database.onModuleDestroy();
    jest.restoreAllMocks();
  });

  const input = {
    email: 'ops@example.com',
    username: 'ops',
    password: 'test-password',
  };

  it('registers a user and rejects duplicates', async () => {
    const user = await service.register(input);

    expect(user).toMatchObject({
      email: 'ops@example.com',
      username: 'ops',
      role: 'user',
      is_active: true,
    });
    await expect(
      service.register({ ...input, username: 'other' }),
    ).rejects.toBeInstanceOf(
      ConflictException,
    );
  });

  it('refuses registration when disabled', async () => {
    const closed = new AuthService(
      database,
      testSettings({ ENABLE_REGISTRATION: 'false' }),
    );

    await expect(closed.register(input)).rejects.toBeInstanceOf(
      ForbiddenException,
    );
  });

  it('issues a bearer token that authenticates the user', async () => {
    await service.register(input);

    const token = await service.login('ops', 'test-password');

    expect(token.token_type).toBe('bearer');
    expect(token.expires_in).toBe(7200);
    expect(service.authenticateToken(token.access_token).username).toBe('ops');
    await expect(service.login('ops', 'wrong-password')).rejects.toBeInstanceOf(
      UnauthorizedException,
    );
  });

  it('rejects tokens for inactive users', async () => {
    await service.register(input);
    const token = await service.login('ops', 'test-password');
    database.db
      .update(users)
      .set({ isActive: false })
      .where(eq(users.username, 'ops'))
      .run();

    expect(() => service.authenticateToken(token.access_token)).toThrow(
      ForbiddenException,
    );
  });

  it('creates, authenticates and revokes api keys', async () => {
    const user = await service.register(input);

    const created = service.createApiKey(user.id, 'cron');

    expect(created.key.startsWith(created.prefix)).toBe(true);
    expect(service.authenticateApiKey(created.key).id).toBe(user.id);
    expect(service.listApiKeys(user.id)[0]?.lastUsedAt).not.toBeNull();

    service.revokeApiKey(user.id, created.id);
    expect(() => service.authenticateApiKey(created.key)).toThrow(
      UnauthorizedException,
    );
  });
});
