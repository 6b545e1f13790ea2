import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import type { Session, SessionData } from 'express-session';

import './session.types';
import { UsosClient } from '../../usos/usos.client';
import { PrincipalReconciler } from './principal-reconciler.service';
import { AuthTokenService } from './auth-token.service';
import { PRINCIPAL_REPOSITORY } from '../../domain/repositories/repository.tokens';
import type { IPrincipalRepository } from '../../domain/repositories/principal.repository.interface';
import type { PrincipalRecord } from '../../domain/models/principal.model';
import { toPrincipalView, type PrincipalView } from './principal.view';
import { DEFAULT_LOGIN_CHANNEL, isLoginChannel, resolveLoginChannel, type LoginChannel } from './login-channel';
import { CALLBACK_PATH, DASHBOARD_PATH, DEFAULT_FRONTEND_URL } from './session.constants';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';

export interface MobileLoginBody extends PrincipalView {
  token: string;
}

/** What the callback hands back to the client. */
export type LoginOutcome =
  | { kind: 'json'; body: MobileLoginBody }
  | { kind: 'redirect'; location: string };

function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  return raw?.split(',')[0]?.trim() || undefined;
}

function regenerate(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate(error => (error ? reject(error) : resolve()));
  });
}

function save(session: Session & Partial<SessionData>): Promise<void> {
  return new Promise((resolve, reject) => {
    session.save(error => (error ? reject(error) : resolve()));
  });
}

function destroy(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.destroy(error => (error ? reject(error) : resolve()));
  });
}

/**
 * SessionAuthenticator: drives a USOS login from handshake to credential.
 *
 *   UNAUTHENTICATED → HANDSHAKE_PENDING → RECONCILED → AUTHENTICATED
 *
 * Any failure propagates before a session or token is issued, leaving the
 * caller unauthenticated.
 */
@Injectable()
export class SessionAuthenticator {
  private readonly publicBaseUrl: string | undefined;
  private readonly frontendUrl: string;

  constructor(
    private readonly usos: UsosClient,
    private readonly reconciler: PrincipalReconciler,
    private readonly tokens: AuthTokenService,
    @Inject(PRINCIPAL_REPOSITORY) private readonly principals: IPrincipalRepository,
    config: ConfigService,
    private readonly logger: AppLogger,
  ) {
    this.publicBaseUrl = config.get<string>('PUBLIC_BASE_URL')?.replace(/\/+$/, '') || undefined;
    this.frontendUrl = config.get<string>('FRONTEND_URL') || DEFAULT_FRONTEND_URL;
  }

  /** Absolute callback URL carrying the channel hint. */
  callbackUrl(req: Request, channel: LoginChannel): string {
    const origin = this.publicBaseUrl ?? this.requestOrigin(req);
    return `${origin}${CALLBACK_PATH}?source=${encodeURIComponent(channel)}`;
  }

  /** HANDSHAKE_PENDING: returns the USOS authorization URL. */
  async startLogin(req: Request, channelHint: unknown): Promise<string> {
    const channel = isLoginChannel(channelHint) ? channelHint : DEFAULT_LOGIN_CHANNEL;
    const { authorizationUrl, requestToken } = await this.usos.beginHandshake(this.callbackUrl(req, channel));

    req.session.requestToken = requestToken;
    req.session.loginChannel = channel;
    await save(req.session);

    this.logger.info(LogCategory.OAUTH, 'Login started', { channel });
    return authorizationUrl;
  }

  async completeLogin(req: Request, verifier: unknown, channelHint: unknown): Promise<LoginOutcome> {
    const channel = resolveLoginChannel(channelHint, req.session.loginChannel);
    const requestToken = req.session.requestToken;

    const access = await this.usos.completeHandshake(
      requestToken?.key,
      requestToken?.secret,
      typeof verifier === 'string' ? verifier : undefined,
    );
    // The temporary pair is single-use once exchanged.
    delete req.session.requestToken;

    const profile = await this.usos.fetchProfile(access);
    req.session.profile = profile;

    const { principal, created } = await this.reconciler.reconcile(profile);
    this.logger.info(LogCategory.AUTH, 'Login reconciled', { principalId: principal.id, created, channel });

    return this.dispatch(req, principal, channel);
  }

  async logout(req: Request): Promise<void> {
    const principalId = req.session.principalId;
    await destroy(req);
    this.logger.info(LogCategory.AUTH, 'Logged out', { principalId });
  }

  // ─── internals ────────────────────────────────────────────────────

  private async dispatch(req: Request, principal: PrincipalRecord, channel: LoginChannel): Promise<LoginOutcome> {
    switch (channel) {
      case 'mobile': {
        await this.principals.touchLastLogin(principal.id, new Date());
        const token = await this.tokens.issue(principal.id);
        await save(req.session);
        return { kind: 'json', body: { ...toPrincipalView(principal), token: token.key } };
      }
      case 'backend_test':
        await this.establishSession(req, principal);
        return { kind: 'redirect', location: DASHBOARD_PATH };
      case 'web':
        await this.establishSession(req, principal);
        return { kind: 'redirect', location: this.frontendUrl };
      default: {
        const unreachable: never = channel;
        throw new Error(`Unhandled login channel: ${String(unreachable)}`);
      }
    }
  }

  /**
   * AUTHENTICATED: fresh session id bound to the principal. The login is
   * stamped first so a failed write leaves no authenticated session behind.
   */
  private async establishSession(req: Request, principal: PrincipalRecord): Promise<void> {
    await this.principals.touchLastLogin(principal.id, new Date());
    const profile = req.session.profile;
    await regenerate(req);
    req.session.principalId = principal.id;
    req.session.profile = profile;
    await save(req.session);
    this.logger.debug(LogCategory.AUTH, 'Session established', { principalId: principal.id });
  }

  private requestOrigin(req: Request): string {
    const proto = firstHeaderValue(req.headers['x-forwarded-proto']) ?? req.protocol;
    const host = firstHeaderValue(req.headers['x-forwarded-host']) ?? req.get('host') ?? 'localhost';
    return `${proto}://${host}`;
  }
}
