import type { Request } from 'express';
import type { PrincipalRecord } from '../../domain/models/principal.model';

export type AuthType = 'session' | 'token';

/** Request after AccessGuard has resolved the caller. */
export interface AuthenticatedRequest extends Request {
  principal: PrincipalRecord;
  authType: AuthType;
}
