import { Injectable } from '@nestjs/common';
import type { IAuthTokenRepository } from '../../../domain/repositories/auth-token.repository.interface';
import type { AuthTokenRecord } from '../../../domain/models/auth-token.model';

@Injectable()
export class InMemoryAuthTokenRepository implements IAuthTokenRepository {
  /** Keyed by principal id. */
  private readonly tokens: Map<number, AuthTokenRecord> = new Map();

  async findByKey(key: string): Promise<AuthTokenRecord | null> {
    for (const token of this.tokens.values()) {
      if (token.key === key) {
        return { ...token };
      }
    }
    return null;
  }

  async findByPrincipal(principalId: number): Promise<AuthTokenRecord | null> {
    const found = this.tokens.get(principalId);
    return found ? { ...found } : null;
  }

  async findOrCreate(
    principalId: number,
    candidateKey: string,
  ): Promise<{ token: AuthTokenRecord; created: boolean }> {
    const existing = this.tokens.get(principalId);
    if (existing) {
      return { token: { ...existing }, created: false };
    }
    const token: AuthTokenRecord = { key: candidateKey, principalId, createdAt: new Date() };
    this.tokens.set(principalId, token);
    return { token: { ...token }, created: true };
  }

  async delete(key: string): Promise<void> {
    for (const [principalId, token] of this.tokens) {
      if (token.key === key) {
        this.tokens.delete(principalId);
      }
    }
  }

  clear(): void {
    this.tokens.clear();
  }
}
