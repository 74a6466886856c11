import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { User } from '../database/schema';
import { parseWith } from '../common/utils/validation.util';
import { AuthGuard } from './auth.guard';
import { CurrentUser } from './current-user.decorator';
import { AuthService, toPublicUser } from './services/auth.service';
import {
  apiKeyCreateSchema,
  CreatedApiKey,
  loginSchema,
  PublicUser,
  registerSchema,
  TokenResponse,
} from './types/auth.types';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('register')
  async register(@Body() body: unknown): Promise<PublicUser> {
    return this.authService.register(parseWith(registerSchema, body));
  }

  /** Accepts the OAuth2 password form or the same fields as JSON. */
  @Post('token')
  @HttpCode(200)
  async token(@Body() body: unknown): Promise<TokenResponse> {
    const { username, password } = parseWith(loginSchema, body);
    return this.authService.login(username, password);
  }

  @Get('me')
  @UseGuards(AuthGuard)
  me(@CurrentUser() user: User): PublicUser {
    return toPublicUser(user);
  }

  @Post('api-keys')
  @UseGuards(AuthGuard)
  createApiKey(
    @CurrentUser() user: User,
    @Body() body: unknown,
  ): CreatedApiKey {
    const { name } = parseWith(apiKeyCreateSchema, body);
    return this.authService.createApiKey(user.id, name);
  }

  @Get('api-keys')
  @UseGuards(AuthGuard)
  listApiKeys(@CurrentUser() user: User) {
    return this.authService.listApiKeys(user.id);
  }

  @Delete('api-keys/:id')
  @UseGuards(AuthGuard)
  @HttpCode(204)
  revokeApiKey(
    @CurrentUser() user: User,
    @Param('id', ParseIntPipe) id: number,
  ): void {
    this.authService.revokeApiKey(user.id, id);
  }
}
