import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'node:crypto';

import { AUTH_TOKEN_REPOSITORY } from '../../domain/repositories/repository.tokens';
import type { IAuthTokenRepository } from '../../domain/repositories/auth-token.repository.interface';
import type { AuthTokenRecord } from '../../domain/models/auth-token.model';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';

const DAY_MS = 24 * 60 * 60 * 1000;

/** 40 hex characters. */
export function generateTokenKey(): string {
  return randomBytes(20).toString('hex');
}

/**
 * AuthTokenService: opaque bearer tokens for the mobile channel.
 *
 * One token per principal. A valid token is handed out again on every
 * mobile login. With AUTH_TOKEN_TTL_DAYS set, older tokens stop
 * authenticating and are replaced at the next login.
 */
@Injectable()
export class AuthTokenService {
  private readonly ttlMs: number | undefined;

  constructor(
    @Inject(AUTH_TOKEN_REPOSITORY) private readonly tokens: IAuthTokenRepository,
    config: ConfigService,
    private readonly logger: AppLogger,
  ) {
    const days = Number(config.get<string>('AUTH_TOKEN_TTL_DAYS'));
    this.ttlMs = Number.isFinite(days) && days > 0 ? days * DAY_MS : undefined;
  }

  isExpired(token: AuthTokenRecord, now: Date = new Date()): boolean {
    return this.ttlMs !== undefined && now.getTime() - token.createdAt.getTime() >= this.ttlMs;
  }

  async issue(principalId: number): Promise<AuthTokenRecord> {
    const current = await this.tokens.findByPrincipal(principalId);
    if (current && this.isExpired(current)) {
      this.logger.info(LogCategory.AUTH, 'Replacing expired bearer token', { principalId });
      await this.tokens.delete(current.key);
    }
    const { token, created } = await this.tokens.findOrCreate(principalId, generateTokenKey());
    this.logger.debug(LogCategory.AUTH, created ? 'Bearer token created' : 'Bearer token reused', { principalId });
    return token;
  }

  /** The stored token for `key`, or null when unknown or expired. */
  async authenticate(key: string): Promise<AuthTokenRecord | null> {
    const token = await this.tokens.findByKey(key);
    if (!token) return null;
    if (this.isExpired(token)) {
      this.logger.debug(LogCategory.AUTH, 'Bearer token expired', { principalId: token.principalId });
      return null;
    }
    return token;
  }
}
