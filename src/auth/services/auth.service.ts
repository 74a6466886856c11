import {
  ConflictException,
  ForbiddenException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { and, eq, or } from 'drizzle-orm';
import { randomBytes } from 'node:crypto';
import { Settings, SETTINGS } from '../../config/settings';
import { DatabaseService } from '../../database/database.service';
import { ApiKey, apiKeys, User, users } from '../../database/schema';
import { sha256Hex } from '../../common/utils/text.util';
import { signJwt, verifyJwt } from '../utils/jwt.util';
import { hashPassword, verifyPassword } from '../utils/password.util';
import {
  CreatedApiKey,
  PublicUser,
  RegisterInput,
  TokenResponse,
} from '../types/auth.types';

const API_KEY_PREFIX = 'nle_';

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    full_name: user.fullName,
    role: user.isSuperuser ? 'admin' : 'user',
    is_active: user.isActive,
    created_at: user.createdAt,
  };
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly database: DatabaseService,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  async register(input: RegisterInput): Promise<PublicUser> {
    if (!this.settings.enableRegistration) {
      throw new ForbiddenException('registration is disabled');
    }

    const existing = this.database.db
      .select({ id: users.id })
      .from(users)
      .where(
        or(eq(users.email, input.email), eq(users.username, input.username)),
      )
      .get();
    if (existing) {
      throw new ConflictException('user already exists');
    }

    const user = this.database.db
      .insert(users)
      .values({
        email: input.email,
        username: input.username,
        hashedPassword: await hashPassword(input.password),
        fullName: input.full_name ?? null,
      })
      .returning()
      .get();

    this.logger.log(`user registered: id=${user.id}`);
    return toPublicUser(user);
  }

  async login(
    username: string,
    password: string,
    now: Date = new Date(),
  ): Promise<TokenResponse> {
    const user = this.database.db
      .select()
      .from(users)
      .where(eq(users.username, username))
      .get();
    if (!user || !(await verifyPassword(password, user.hashedPassword))) {
      throw new UnauthorizedException('incorrect username or password');
    }

    const expiresIn = this.settings.jwtExpirationHours * 3600;
    return {
      access_token: signJwt(
        this.settings.secretKey,
        { username: user.username, userId: user.id },
        expiresIn,
        now,
      ),
      token_type: 'bearer',
      expires_in: expiresIn,
    };
  }

  authenticateToken(token: string, now: Date = new Date()): User {
    const claims = verifyJwt(this.settings.secretKey, token, now);
    if (!claims) {
      throw new UnauthorizedException('could not validate credentials');
    }
    const user = this.database.db
      .select()
      .from(users)
      .where(eq(users.username, claims.sub))
      .get();
    return this.requireActive(user);
  }

  authenticateApiKey(rawKey: string, now: Date = new Date()): User {
    const key = this.database.db
      .select()
      .from(apiKeys)
      .where(
        and(eq(apiKeys.keyHash, sha256Hex(rawKey)), eq(apiKeys.revoked, false)),
      )
      .get();
    if (!key) {
      throw new UnauthorizedException('invalid api key');
    }

    this.database.db
      .update(apiKeys)
      .set({ lastUsedAt: now.toISOString() })
      .where(eq(apiKeys.id, key.id))
      .run();
    const user = this.database.db
      .select()
      .from(users)
      .where(eq(users.id, key.userId))
      .get();
    return this.requireActive(user);
  }

  createApiKey(userId: number, name: string): CreatedApiKey {
    const key = `${API_KEY_PREFIX}${randomBytes(24).toString('hex')}`;
    const prefix = key.slice(0, API_KEY_PREFIX.length + 6);
    const row = this.database.db
      .insert(apiKeys)
      .values({ userId, name, keyPrefix: prefix, keyHash: sha256Hex(key) })
      .returning()
      .get();

    this.logger.log(`api key created: id=${row.id} user=${userId}`);
    return { id: row.id, name: row.name, prefix, key };
  }

  listApiKeys(
    userId: number,
  ): Array<
    Pick<
      ApiKey,
      'id' | 'name' | 'keyPrefix' | 'revoked' | 'lastUsedAt' | 'createdAt'
    >
  > {
    return this.database.db
      .select({
        id: apiKeys.id,
        name: apiKeys.name,
        keyPrefix: apiKeys.keyPrefix,
        revoked: apiKeys.revoked,
        lastUsedAt: apiKeys.lastUsedAt,
        createdAt: apiKeys.createdAt,
      })
      .from(apiKeys)
      .where(eq(apiKeys.userId, userId))
      .all();
  }

  revokeApiKey(userId: number, keyId: number): void {
    const result = this.database.db
      .update(apiKeys)
      .set({ revoked: true })
      .where(and(eq(apiKeys.id, keyId), eq(apiKeys.userId, userId)))
      .run();
    if (result.changes === 0) {
      throw new NotFoundException(`api key ${keyId} not found`);
    }
  }

  private requireActive(user: User | undefined): User {
    if (!user) {
      throw new UnauthorizedException('could not validate credentials');
    }
    if (!user.isActive) {
      throw new ForbiddenException('inactive user');
    }
    return user;
  }
}
