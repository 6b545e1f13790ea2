import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';

import { AppModule } from './modules/app/app.module';
import { configureHttpApp } from './bootstrap/http-app';
import { AppLogger } from './modules/logging/app-logger.service';
import { LogCategory } from './modules/logging/log-levels';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bodyParser: false,
    bufferLogs: true,
  });

  // Behind a reverse proxy req.protocol and req.hostname must reflect the
  // client request; the OAuth callback URL is built from them.
  app.set('trust proxy', true);

  // OnModuleDestroy (pg pool shutdown) fires on SIGTERM/SIGINT.
  app.enableShutdownHooks();

  configureHttpApp(app);

  const port = Number(process.env.PORT ?? 8000);
  await app.listen(port);
  app.get(AppLogger).info(LogCategory.GENERAL, `Inventory API listening on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start', error);
  process.exit(1);
});
