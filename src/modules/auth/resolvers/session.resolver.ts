import { Inject, Injectable } from '@nestjs/common';
import type { Request } from 'express';

import '../session.types';
import { PRINCIPAL_REPOSITORY } from '../../../domain/repositories/repository.tokens';
import type { IPrincipalRepository } from '../../../domain/repositories/principal.repository.interface';
import type { PrincipalRecord } from '../../../domain/models/principal.model';
import type { CredentialResolver } from './credential-resolver.interface';

@Injectable()
export class SessionCredentialResolver implements CredentialResolver {
  readonly authType = 'session';

  constructor(
    @Inject(PRINCIPAL_REPOSITORY) private readonly principals: IPrincipalRepository,
  ) {}

  applies(request: Request): boolean {
    return typeof request.session?.principalId === 'number';
  }

  async resolve(request: Request): Promise<PrincipalRecord | null> {
    const principalId = request.session?.principalId;
    if (principalId === undefined) return null;
    return this.principals.findById(principalId);
  }
}
