import type { ConfigService } from '@nestjs/config';
import type { AppLogger } from '../modules/logging/app-logger.service';
import { LogCategory } from '../modules/logging/log-levels';
import { DEFAULT_USOS_BASE_URL, DEFAULT_USOS_TIMEOUT_MS } from './usos.constants';
import type { UsosSettings } from './usos.types';

const PLACEHOLDER_CONSUMER = 'development-consumer';

/**
 * Read the USOS consumer settings. Missing consumer credentials are fatal in
 * production; elsewhere a placeholder is used so the app still boots.
 */
export function loadUsosSettings(config: ConfigService, logger: AppLogger): UsosSettings {
  const isProd = process.env.NODE_ENV === 'production';
  let consumerKey = config.get<string>('USOS_CONSUMER_KEY');
  let consumerSecret = config.get<string>('USOS_CONSUMER_SECRET');

  if (!consumerKey || !consumerSecret) {
    if (isProd) {
      throw new Error('USOS_CONSUMER_KEY and USOS_CONSUMER_SECRET are required in production.');
    }
    consumerKey = consumerKey || PLACEHOLDER_CONSUMER;
    consumerSecret = consumerSecret || PLACEHOLDER_CONSUMER;
    logger.warn(LogCategory.OAUTH, 'USOS consumer credentials not configured; USOS will reject signed requests', {
      hint: 'Set USOS_CONSUMER_KEY and USOS_CONSUMER_SECRET',
    });
  }

  const rawTimeout = Number(config.get<string>('USOS_TIMEOUT_MS'));
  const rawScopes = config.get<string>('USOS_SCOPES') ?? '';

  return {
    baseUrl: (config.get<string>('USOS_BASE_URL') || DEFAULT_USOS_BASE_URL).replace(/\/+$/, ''),
    consumerKey,
    consumerSecret,
    scopes: rawScopes.split('|').map(scope => scope.trim()).filter(Boolean),
    timeoutMs: Number.isFinite(rawTimeout) && rawTimeout > 0 ? rawTimeout : DEFAULT_USOS_TIMEOUT_MS,
  };
}
