// apps/api/src/fieldsync/security/auth/auth.guard.ts

import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { Request } from 'express';

import { FN_AUTH_VALIDATE_ACCESS_TOKEN } from '../../core/functional-ids';
import { LogService } from '../../core/logging/log.service';

/**
 * Authenticated user context attached to the request.
 */
export interface AuthenticatedUserContext {
  userId: string;
}

export interface AuthenticatedRequest extends Request {
  user?: AuthenticatedUserContext;
}

/**
 * JWT payload shape for access tokens.
 * Only fields used by the guard are modelled.
 */
interface AccessTokenPayload {
  sub?: string | number;
  type?: string; // 'access' | 'refresh' | other
}

/**
 * AuthGuard
 *
 * Responsibilities:
 *  - Validate HS256 bearer access tokens signed with JWT_SECRET.
 *  - Attach { userId } (the token subject) to request.user.
 */
@Injectable()
export class AuthGuard implements CanActivate {
  private readonly logger = new Logger(AuthGuard.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly logService: LogService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    request.user = await this.validateAccessToken(request);

    return true;
  }

  async validateAccessToken(req: Request): Promise<AuthenticatedUserContext> {
    const token = this.extractBearerToken(req);

    let payload: AccessTokenPayload;

    try {
      payload = await this.jwtService.verifyAsync<AccessTokenPayload>(token);
    } catch (err) {
      const message =
        err instanceof Error ? err.message : 'Unknown JWT verification error';
      this.logger.debug(`Access token verification failed: ${message}`);
      this.logService.logSecurityEvent('Rejected invalid access token', {
        functionId: FN_AUTH_VALIDATE_ACCESS_TOKEN,
        metadata: { reason: message, path: req.path },
      });
      throw new UnauthorizedException('Invalid or expired access token.');
    }

    if (payload.type && payload.type !== 'access') {
      throw new UnauthorizedException('Invalid token type (expected access token).');
    }

    const userId =
      typeof payload.sub === 'string' || typeof payload.sub === 'number'
        ? String(payload.sub)
        : undefined;

    if (!userId) {
      throw new UnauthorizedException(
        'Access token payload is missing subject (sub).',
      );
    }

    return { userId };
  }

  /**
   * Expected format:
   *   Authorization: Bearer <jwt>
   */
  private extractBearerToken(req: Request): string {
    const header = req.headers.authorization;

    if (!header) {
      throw new UnauthorizedException('Missing Authorization header.');
    }

    const [scheme, token, ...rest] = header.split(' ').filter(Boolean);

    if (scheme?.toLowerCase() !== 'bearer' || !token || rest.length > 0) {
      throw new UnauthorizedException(
        'Invalid Authorization header format (expected "Bearer <token>").',
      );
    }

    return token;
  }
}

/**
 * Reads the user id the guard attached to the request.
 */
export function authenticatedUserId(request: AuthenticatedRequest): string {
  if (!request.user) {
    throw new UnauthorizedException('Request is not authenticated.');
  }
  return request.user.userId;
}
