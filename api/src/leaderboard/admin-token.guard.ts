import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Inject,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import * as crypto from 'crypto';
import { TRACKER_CONFIG, TrackerConfig } from '../config/tracker.config';

interface RequestWithHeaders {
  headers: Record<string, string | string[] | undefined>;
}

/**
 * Bearer-token gate for the admin endpoints. Without ADMIN_API_TOKEN
 * configured every request is refused.
 */
@Injectable()
export class AdminTokenGuard implements CanActivate {
  constructor(
    @Inject(TRACKER_CONFIG) private readonly config: TrackerConfig,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.config.adminApiToken;
    if (!expected) {
      throw new ForbiddenException('Admin API is disabled');
    }

    const request = context.switchToHttp().getRequest<RequestWithHeaders>();
    const header = request.headers['authorization'];
    const match =
      typeof header === 'string' ? /^Bearer\s+(.+)$/i.exec(header) : null;
    if (!match) {
      throw new UnauthorizedException('Missing bearer token');
    }

    const given = Buffer.from(match[1].trim());
    const wanted = Buffer.from(expected);
    if (given.length !== wanted.length || !crypto.timingSafeEqual(given, wanted)) {
      throw new ForbiddenException('Invalid admin token');
    }
    return true;
  }
}
