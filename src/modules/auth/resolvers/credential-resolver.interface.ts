import type { Request } from 'express';
import type { PrincipalRecord } from '../../../domain/models/principal.model';
import type { AuthType } from '../authenticated-request';

/**
 * One way of turning credential material on a request into a principal.
 * AccessGuard asks each resolver in turn and uses the first that applies.
 */
export interface CredentialResolver {
  readonly authType: AuthType;

  /** True when the request carries this resolver's kind of credential. */
  applies(request: Request): boolean;

  /** The principal behind the credential, or null when it does not check out. */
  resolve(request: Request): Promise<PrincipalRecord | null>;
}
