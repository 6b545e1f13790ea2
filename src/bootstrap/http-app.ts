import { ValidationPipe, type INestApplication } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { json } from 'express';
import session from 'express-session';
import { randomBytes } from 'node:crypto';

import { AppLogger } from '../modules/logging/app-logger.service';
import { LogCategory } from '../modules/logging/log-levels';
import { requestContextMiddleware } from '../modules/logging/request-context.middleware';
import { DEFAULT_SESSION_MAX_AGE_MS, SESSION_COOKIE_NAME } from '../modules/auth/session.constants';

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function sessionSecret(config: ConfigService, logger: AppLogger): string {
  const secret = config.get<string>('SESSION_SECRET');
  if (secret) return secret;
  if (config.get<string>('NODE_ENV') === 'production') {
    throw new Error('SESSION_SECRET must be set in production');
  }
  logger.warn(LogCategory.GENERAL, 'SESSION_SECRET not set; using a per-process random secret');
  return randomBytes(32).toString('hex');
}

const DEFAULT_CORS_ORIGINS = 'http://localhost:3000,http://127.0.0.1:3000';

/** An empty CORS_ORIGINS turns CORS off. */
function corsOrigins(config: ConfigService): string[] {
  return (config.get<string>('CORS_ORIGINS') ?? DEFAULT_CORS_ORIGINS)
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
}

/**
 * Middleware and global pipes shared by main.ts and the e2e harness.
 * The application must be created with `bodyParser: false`.
 */
export function configureHttpApp(app: INestApplication): void {
  const config = app.get(ConfigService);
  const logger = app.get(AppLogger);

  const maxAge = Number(config.get<string>('SESSION_MAX_AGE_MS'));
  app.use(
    session({
      name: SESSION_COOKIE_NAME,
      secret: sessionSecret(config, logger),
      resave: false,
      saveUninitialized: false,
      cookie: {
        httpOnly: true,
        sameSite: 'lax',
        secure: parseBoolean(
          config.get<string>('SESSION_COOKIE_SECURE'),
          config.get<string>('NODE_ENV') === 'production',
        ),
        maxAge: Number.isFinite(maxAge) && maxAge > 0 ? maxAge : DEFAULT_SESSION_MAX_AGE_MS,
      },
    }),
  );

  // Non-strict so scalar bodies reach the handlers and fail validation there.
  app.use(json({ limit: '5mb', strict: false }));
  app.use(requestContextMiddleware(logger));

  const origins = corsOrigins(config);
  if (origins.length > 0) {
    app.enableCors({
      origin: origins,
      methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'Accept', 'X-Request-Id'],
      credentials: true,
    });
  }

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );
}
