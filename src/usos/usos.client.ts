import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OAuth from 'oauth-1.0a';
import { createHmac } from 'node:crypto';

import { AppLogger } from '../modules/logging/app-logger.service';
import { LogCategory } from '../modules/logging/log-levels';
import {
  MissingCredentialError,
  ProfileFetchFailedError,
  UpstreamUnavailableError,
} from '../modules/common/api-errors';
import {
  ACCESS_TOKEN_PATH,
  AUTHORIZE_PATH,
  MAX_UPSTREAM_BODY,
  PROFILE_FIELDS,
  REQUEST_TOKEN_PATH,
  STAFF_STATUS_ELEVATED,
  USER_PATH,
} from './usos.constants';
import { loadUsosSettings } from './usos.config';
import type { HandshakeStart, OAuthTokenPair, UsosProfile, UsosSettings } from './usos.types';

interface UpstreamResponse {
  status: number;
  ok: boolean;
  body: string;
}

/** Thrown by `send` when the request never produced a response. */
class TransportError extends Error {
  constructor(readonly timedOut: boolean, cause: unknown) {
    super(
      timedOut
        ? 'timed out'
        : cause instanceof Error ? cause.message : String(cause),
      { cause },
    );
    this.name = 'TransportError';
  }
}

/** `staff_status` → elevated role; anything outside the table is not elevated. */
export function isElevated(staffStatus: unknown): boolean {
  return typeof staffStatus === 'number' && STAFF_STATUS_ELEVATED[staffStatus] === true;
}

function truncate(body: string): string {
  return body.length > MAX_UPSTREAM_BODY ? body.slice(0, MAX_UPSTREAM_BODY) : body;
}

function optionalString(value: unknown): string | null | undefined {
  if (value === null) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function optionalNumber(value: unknown): number | null | undefined {
  if (value === null) return null;
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return undefined;
}

/** Pick the fields this service reads out of a decoded `services/users/user` body. */
export function toUsosProfile(raw: Record<string, unknown>): UsosProfile {
  return {
    id: optionalString(raw.id),
    first_name: optionalString(raw.first_name),
    last_name: optionalString(raw.last_name),
    student_status: optionalNumber(raw.student_status),
    staff_status: optionalNumber(raw.staff_status),
    email: optionalString(raw.email),
    has_email: typeof raw.has_email === 'boolean' ? raw.has_email : raw.has_email === null ? null : undefined,
    profile_url: optionalString(raw.profile_url),
  };
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * UsosClient: OAuth 1.0a (HMAC-SHA1) client for the USOS API.
 *
 * Covers the three-legged handshake and the profile lookup. Every call is
 * signed with the consumer pair and, after the first leg, the token pair the
 * caller passes in. Nothing is retried.
 */
@Injectable()
export class UsosClient {
  private readonly settings: UsosSettings;
  private readonly oauth: OAuth;

  constructor(
    config: ConfigService,
    private readonly logger: AppLogger,
  ) {
    this.settings = loadUsosSettings(config, logger);
    this.oauth = new OAuth({
      consumer: { key: this.settings.consumerKey, secret: this.settings.consumerSecret },
      signature_method: 'HMAC-SHA1',
      hash_function: (baseString, key) => createHmac('sha1', key).update(baseString).digest('base64'),
    });
  }

  /**
   * First leg: obtain a temporary token bound to `callbackUrl` and build the
   * URL the user is sent to.
   */
  async beginHandshake(callbackUrl: string): Promise<HandshakeStart> {
    const params: Record<string, string> = { oauth_callback: callbackUrl };
    if (this.settings.scopes.length > 0) {
      params.scopes = this.settings.scopes.join('|');
    }

    const response = await this.signedPost(REQUEST_TOKEN_PATH, params);
    const requestToken = this.readTokenPair(response, 'request token');

    const authorize = new URL(`${this.settings.baseUrl}/${AUTHORIZE_PATH}`);
    authorize.searchParams.set('oauth_token', requestToken.key);
    authorize.searchParams.set('interactivity', 'minimal');

    this.logger.debug(LogCategory.OAUTH, 'Request token obtained', { callbackUrl });
    return { authorizationUrl: authorize.toString(), requestToken };
  }

  /**
   * Third leg: trade the authorised temporary pair and the verifier for an
   * access pair. Missing input fails before anything is sent.
   */
  async completeHandshake(
    tempKey: string | undefined,
    tempSecret: string | undefined,
    verifier: string | undefined,
  ): Promise<OAuthTokenPair> {
    const missing: string[] = [];
    if (!tempKey) missing.push('oauth_token');
    if (!tempSecret) missing.push('oauth_token_secret');
    if (!verifier) missing.push('oauth_verifier');
    if (!tempKey || !tempSecret || !verifier) {
      this.logger.warn(LogCategory.OAUTH, 'Callback without complete handshake state', { missing });
      throw new MissingCredentialError(missing);
    }

    const response = await this.signedPost(
      ACCESS_TOKEN_PATH,
      { oauth_verifier: verifier },
      { key: tempKey, secret: tempSecret },
    );
    const access = this.readTokenPair(response, 'access token');
    this.logger.debug(LogCategory.OAUTH, 'Access token obtained');
    return access;
  }

  async fetchProfile(credential: OAuthTokenPair): Promise<UsosProfile> {
    const url = `${this.settings.baseUrl}/${USER_PATH}?fields=${encodeURIComponent(PROFILE_FIELDS.join('|'))}`;
    const headers = this.oauth.toHeader(this.oauth.authorize({ url, method: 'GET' }, credential));

    let response: UpstreamResponse;
    try {
      response = await this.send(url, { method: 'GET', headers: { ...headers, Accept: 'application/json' } });
    } catch (error) {
      const message = error instanceof TransportError && error.timedOut
        ? 'USOS profile request timed out.'
        : 'Unable to retrieve user info from USOS.';
      this.logger.error(LogCategory.OAUTH, message, error);
      throw new ProfileFetchFailedError(message, {}, error);
    }

    if (!response.ok) {
      this.logger.error(LogCategory.OAUTH, 'USOS profile request rejected', undefined, {
        upstreamStatus: response.status,
        upstreamBody: response.body,
      });
      throw new ProfileFetchFailedError('Unable to retrieve user info from USOS.', {
        upstreamStatus: response.status,
        upstreamBody: response.body,
      });
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(response.body);
    } catch (error) {
      throw new ProfileFetchFailedError(
        'USOS returned a profile that is not valid JSON.',
        { upstreamStatus: response.status, upstreamBody: response.body },
        error,
      );
    }
    if (!isJsonObject(decoded)) {
      throw new ProfileFetchFailedError('USOS returned a profile that is not a JSON object.', {
        upstreamStatus: response.status,
        upstreamBody: response.body,
      });
    }

    return toUsosProfile(decoded);
  }

  // ─── internals ────────────────────────────────────────────────────

  /**
   * POST form parameters signed with the consumer pair (and `token` when
   * given). Parameters travel in the body; oauth-1.0a only signs them.
   */
  private async signedPost(
    path: string,
    params: Record<string, string>,
    token?: OAuthTokenPair,
  ): Promise<UpstreamResponse> {
    const url = `${this.settings.baseUrl}/${path}`;
    const headers = this.oauth.toHeader(this.oauth.authorize({ url, method: 'POST', data: params }, token));

    try {
      return await this.send(url, {
        method: 'POST',
        headers: { ...headers, 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams(params).toString(),
      });
    } catch (error) {
      const timedOut = error instanceof TransportError && error.timedOut;
      this.logger.error(LogCategory.OAUTH, `USOS ${path} unreachable`, error);
      throw new UpstreamUnavailableError(
        timedOut ? `USOS did not answer within ${this.settings.timeoutMs}ms.` : 'USOS is unreachable.',
        undefined,
        error,
      );
    }
  }

  private async send(url: string, init: RequestInit): Promise<UpstreamResponse> {
    this.logger.trace(LogCategory.OAUTH, `${init.method ?? 'GET'} ${url}`);
    let response: Response;
    try {
      response = await fetch(url, { ...init, signal: AbortSignal.timeout(this.settings.timeoutMs) });
    } catch (error) {
      const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
      throw new TransportError(timedOut, error);
    }
    const body = truncate(await response.text());
    return { status: response.status, ok: response.ok, body };
  }

  /** Parse a form-encoded `oauth_token` / `oauth_token_secret` answer. */
  private readTokenPair(response: UpstreamResponse, what: string): OAuthTokenPair {
    if (!response.ok) {
      this.logger.error(LogCategory.OAUTH, `USOS refused the ${what} request`, undefined, {
        upstreamStatus: response.status,
        upstreamBody: response.body,
      });
      throw new UpstreamUnavailableError(`Failed to obtain ${what} from USOS.`, {
        upstreamStatus: response.status,
        upstreamBody: response.body,
      });
    }
    const form = new URLSearchParams(response.body);
    const key = form.get('oauth_token');
    const secret = form.get('oauth_token_secret');
    if (!key || !secret) {
      throw new UpstreamUnavailableError(`USOS response did not contain a complete ${what}.`, {
        upstreamStatus: response.status,
        upstreamBody: response.body,
      });
    }
    return { key, secret };
  }
}
