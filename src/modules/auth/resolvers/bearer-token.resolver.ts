import { Inject, Injectable } from '@nestjs/common';
import type { Request } from 'express';

import { PRINCIPAL_REPOSITORY } from '../../../domain/repositories/repository.tokens';
import type { IPrincipalRepository } from '../../../domain/repositories/principal.repository.interface';
import type { PrincipalRecord } from '../../../domain/models/principal.model';
import { AuthTokenService } from '../auth-token.service';
import type { CredentialResolver } from './credential-resolver.interface';

const SCHEME = /^(?:Bearer|Token)\s+(\S+)\s*$/i;

/** The key from `Authorization: Bearer <key>` or `Authorization: Token <key>`. */
export function extractTokenKey(header: string | undefined): string | undefined {
  if (!header) return undefined;
  return SCHEME.exec(header)?.[1];
}

@Injectable()
export class BearerTokenCredentialResolver implements CredentialResolver {
  readonly authType = 'token';

  constructor(
    private readonly tokens: AuthTokenService,
    @Inject(PRINCIPAL_REPOSITORY) private readonly principals: IPrincipalRepository,
  ) {}

  /** Any Authorization header selects this resolver, so a bad one is never skipped. */
  applies(request: Request): boolean {
    return typeof request.headers.authorization === 'string' && request.headers.authorization.length > 0;
  }

  async resolve(request: Request): Promise<PrincipalRecord | null> {
    const key = extractTokenKey(request.headers.authorization);
    if (!key) return null;
    const token = await this.tokens.authenticate(key);
    if (!token) return null;
    return this.principals.findById(token.principalId);
  }
}
