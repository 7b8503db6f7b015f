// apps/api/src/auth/bearer-auth.guard.ts
import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import * as jwt from 'jsonwebtoken';
import { AppLogger } from '../common/app-logger';
import { ORDERING_CONFIG, type OrderingConfig } from '../config/ordering.config';

export type AuthenticatedUser = {
  id: string;
  email?: string;
};

export type AuthenticatedRequest = {
  headers: Record<string, string | string[] | undefined>;
  user?: AuthenticatedUser;
};

export function getBearerToken(header?: string): string | undefined {
  if (!header) return undefined;
  const [scheme, value] = header.split(' ');
  if (scheme?.toLowerCase() !== 'bearer' || !value) return undefined;
  return value.trim();
}

const unauthorized = (message: string) =>
  new UnauthorizedException({ code: 'unauthorized', message });

/**
 * Verifies an HS256 access token and attaches `{ id, email }` to the
 * request. Runs before any data access.
 */
@Injectable()
export class BearerAuthGuard implements CanActivate {
  private readonly logger = new AppLogger(BearerAuthGuard.name);

  constructor(
    @Inject(ORDERING_CONFIG) private readonly config: OrderingConfig,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const rawHeader = request.headers.authorization;
    const authHeader = Array.isArray(rawHeader) ? rawHeader[0] : rawHeader;

    const token = getBearerToken(authHeader);
    if (!token) {
      throw unauthorized('Missing authorization header');
    }

    request.user = this.verify(token);
    return true;
  }

  verify(token: string): AuthenticatedUser {
    const secret = this.config.auth.jwtSecret;
    if (!secret) {
      this.logger.error('AUTH_JWT_SECRET is not configured');
      throw unauthorized('Authentication is not configured');
    }

    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, secret, { algorithms: ['HS256'] });
    } catch (error) {
      const reason = error instanceof Error ? error.message : 'invalid token';
      this.logger.warn(`rejected bearer token: ${reason}`);
      throw unauthorized('Invalid or expired token');
    }

    if (typeof payload === 'string' || typeof payload.sub !== 'string' || !payload.sub) {
      throw unauthorized('Token has no subject');
    }

    const email =
      typeof payload.email === 'string' && payload.email.trim()
        ? payload.email.trim()
        : undefined;
    return { id: payload.sub, email };
  }
}

/** Narrows `request.user` inside handlers that sit behind the guard. */
export function requireUser(request: AuthenticatedRequest): AuthenticatedUser {
  if (!request.user) {
    throw unauthorized('Not authenticated');
  }
  return request.user;
}
