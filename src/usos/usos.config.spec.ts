import { ConfigService } from '@nestjs/config';

import { loadUsosSettings } from './usos.config';
import { AppLogger } from '../modules/logging/app-logger.service';

const KEYS = ['USOS_CONSUMER_KEY', 'USOS_CONSUMER_SECRET', 'USOS_BASE_URL', 'USOS_SCOPES', 'USOS_TIMEOUT_MS', 'NODE_ENV'];

describe('loadUsosSettings', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      if (saved[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = saved[key];
      }
    }
  });

  it('should read the configured values', () => {
    const settings = loadUsosSettings(
      new ConfigService({
        USOS_CONSUMER_KEY: 'key',
        USOS_CONSUMER_SECRET: 'test-secret',
        USOS_BASE_URL: 'https://usos.example.edu//',
        USOS_SCOPES: 'email| studies |',
        USOS_TIMEOUT_MS: '2500',
      }),
      new AppLogger(),
    );

    expect(settings).toEqual({
      baseUrl: 'https://usos.example.edu',
      consumerKey: 'key',
      consumerSecret: 'test-secret',
      scopes: ['email', 'studies'],
      timeoutMs: 2500,
    });
  });

  it('should fall back to defaults and a placeholder consumer outside production', () => {
    const settings = loadUsosSettings(new ConfigService({}), new AppLogger());

    expect(settings).toEqual({
      baseUrl: 'https://apps.usos.pw.edu.pl',
      consumerKey: 'development-consumer',
      consumerSecret: 'development-consumer',
      scopes: [],
      timeoutMs: 10000,
    });
  });

  it('should refuse to start in production without consumer credentials', () => {
    process.env.NODE_ENV = 'production';

    expect(() => loadUsosSettings(new ConfigService({ USOS_CONSUMER_KEY: 'key' }), new AppLogger())).toThrow(
      'USOS_CONSUMER_KEY and USOS_CONSUMER_SECRET are required in production.',
    );
  });
});
