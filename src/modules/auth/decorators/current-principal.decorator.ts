import { createParamDecorator, type ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import type { PrincipalRecord } from '../../../domain/models/principal.model';

/**
 * The principal AccessGuard attached to the request; undefined on public
 * routes.
 */
export const CurrentPrincipal = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): PrincipalRecord | undefined => {
    const request = ctx.switchToHttp().getRequest<Request & { principal?: PrincipalRecord }>();
    return request.principal;
  },
);
