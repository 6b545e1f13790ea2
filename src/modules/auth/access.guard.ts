import {
  CanActivate,
  ExecutionContext,
  Injectable,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request } from 'express';

import { IS_PUBLIC_KEY } from './decorators/public.decorator';
import { STAFF_ONLY_KEY } from './decorators/staff-only.decorator';
import type { AuthenticatedRequest } from './authenticated-request';
import type { CredentialResolver } from './resolvers/credential-resolver.interface';
import { BearerTokenCredentialResolver } from './resolvers/bearer-token.resolver';
import { SessionCredentialResolver } from './resolvers/session.resolver';
import { ForbiddenError, UnauthorizedError } from '../common/api-errors';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';

/**
 * AccessGuard: global capability check.
 *
 * Public routes pass untouched. Everything else needs a credential that
 * resolves to an active principal; @StaffOnly routes also need the elevated
 * role. The principal is attached to the request for @CurrentPrincipal().
 */
@Injectable()
export class AccessGuard implements CanActivate {
  private readonly resolvers: CredentialResolver[];

  constructor(
    private readonly reflector: Reflector,
    bearer: BearerTokenCredentialResolver,
    session: SessionCredentialResolver,
    private readonly logger: AppLogger,
  ) {
    this.resolvers = [bearer, session];
  }

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const targets = [context.getHandler(), context.getClass()];
    if (this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, targets)) {
      this.logger.trace(LogCategory.AUTH, 'Skipping auth – route is public');
      return true;
    }

    const request = context.switchToHttp().getRequest<Request & Partial<AuthenticatedRequest>>();

    const resolver = this.resolvers.find(candidate => candidate.applies(request));
    if (!resolver) {
      this.logger.debug(LogCategory.AUTH, 'No credentials on request', { path: request.originalUrl });
      throw new UnauthorizedError();
    }

    const principal = await resolver.resolve(request);
    if (!principal) {
      this.logger.warn(LogCategory.AUTH, 'Credential did not resolve to a principal', { authType: resolver.authType });
      throw new UnauthorizedError(
        resolver.authType === 'token' ? 'Invalid token.' : 'Session is no longer valid.',
      );
    }
    if (!principal.isActive) {
      this.logger.warn(LogCategory.AUTH, 'Inactive principal rejected', { principalId: principal.id });
      throw new UnauthorizedError('User inactive or deleted.');
    }

    request.principal = principal;
    request.authType = resolver.authType;
    this.logger.enrichContext({ principalId: principal.id, authType: resolver.authType });

    if (this.reflector.getAllAndOverride<boolean>(STAFF_ONLY_KEY, targets) && !principal.isStaff) {
      this.logger.warn(LogCategory.AUTH, 'Staff-only route refused', { principalId: principal.id });
      throw new ForbiddenError();
    }

    this.logger.debug(LogCategory.AUTH, 'Request authenticated', {
      principalId: principal.id,
      authType: resolver.authType,
    });
    return true;
  }
}
