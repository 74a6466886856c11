import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { AuthService } from './services/auth.service';
import { AuthenticatedRequest } from './types/auth.types';

/** Accepts `Authorization: Bearer <jwt>` or `X-API-Key: <key>`. */
@Injectable()
export class AuthGuard implements CanActivate {
  constructor(private readonly authService: AuthService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    const apiKey = request.header('x-api-key');
    if (apiKey) {
      request.user = this.authService.authenticateApiKey(apiKey);
      return true;
    }

    const [scheme, token] = (request.header('authorization') ?? '').split(' ');
    if (scheme?.toLowerCase() !== 'bearer' || !token) {
      throw new UnauthorizedException('not authenticated');
    }
    request.user = this.authService.authenticateToken(token);
    return true;
  }
}
