import type { AuthTokenRecord } from '../models/auth-token.model';

/**
 * IAuthTokenRepository: persistence port for mobile bearer tokens.
 * At most one token exists per principal.
 */
export interface IAuthTokenRepository {
  findByKey(key: string): Promise<AuthTokenRecord | null>;

  findByPrincipal(principalId: number): Promise<AuthTokenRecord | null>;

  /**
   * Store `candidateKey` for the principal unless a token already exists.
   * Returns whichever token is stored afterwards, so concurrent logins
   * converge on one value.
   */
  findOrCreate(principalId: number, candidateKey: string): Promise<{ token: AuthTokenRecord; created: boolean }>;

  delete(key: string): Promise<void>;
}
