import { createHash, timingSafeEqual } from 'node:crypto';
import { Injectable, CanActivate, ExecutionContext, UnauthorizedException, Logger } from '@nestjs/common';
import type { Request } from 'express';
import { AppConfigService } from '@/config/app.config';

export const ADMIN_TOKEN_HEADER = 'x-admin-token';

const digest = (value: string): Buffer => createHash('sha256').update(value).digest();

@Injectable()
export class AdminTokenGuard implements CanActivate {
  private readonly logger = new Logger(AdminTokenGuard.name);

  constructor(private readonly appConfig: AppConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const token = request.headers[ADMIN_TOKEN_HEADER];

    if (typeof token !== 'string' || !token) throw new UnauthorizedException();

    // Hashing first gives both sides the same length for the constant-time compare
    if (!timingSafeEqual(digest(token), digest(this.appConfig.getAdminApiToken()))) {
      this.logger.warn(`Rejected admin request to ${request.method} ${request.path}`);
      throw new UnauthorizedException();
    }

    return true;
  }
}
