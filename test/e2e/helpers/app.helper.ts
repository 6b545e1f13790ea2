import type { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';

import { AppModule } from '@app/modules/app/app.module';
import { configureHttpApp } from '@app/bootstrap/http-app';
import { UsosClient } from '@app/usos/usos.client';
import {
  AUTH_TOKEN_REPOSITORY,
  INVENTORY_ITEM_REPOSITORY,
  INVENTORY_REPOSITORY,
  PRINCIPAL_REPOSITORY,
} from '@app/domain/repositories/repository.tokens';
import type { InMemoryPrincipalRepository } from '@app/infrastructure/repositories/inmemory/inmemory-principal.repository';
import type { InMemoryInventoryRepository } from '@app/infrastructure/repositories/inmemory/inmemory-inventory.repository';
import type { InMemoryInventoryItemRepository } from '@app/infrastructure/repositories/inmemory/inmemory-inventory-item.repository';
import type { InMemoryAuthTokenRepository } from '@app/infrastructure/repositories/inmemory/inmemory-auth-token.repository';
import { FakeUsosClient } from './fake-usos.client';

export interface TestApp {
  app: INestApplication;
  usos: FakeUsosClient;
}

/**
 * Bootstraps the full application for E2E testing.
 *
 * - persistence runs on the in-memory repositories (see test/setup-env.ts)
 * - UsosClient is replaced by FakeUsosClient
 * - the same middleware stack as main.ts is applied
 *
 * Call `app.close()` in your `afterAll()` to shut down cleanly.
 */
export async function createTestApp(): Promise<TestApp> {
  const usos = new FakeUsosClient();

  const moduleFixture = await Test.createTestingModule({
    imports: [AppModule],
  })
    .overrideProvider(UsosClient)
    .useValue(usos)
    .compile();

  const app = moduleFixture.createNestApplication({ bodyParser: false });
  configureHttpApp(app);
  await app.init();
  return { app, usos };
}

/** Empties every in-memory store and the fake's recorded calls. */
export function resetState(testApp: TestApp): void {
  const { app, usos } = testApp;
  app.get<InMemoryAuthTokenRepository>(AUTH_TOKEN_REPOSITORY).clear();
  app.get<InMemoryInventoryItemRepository>(INVENTORY_ITEM_REPOSITORY).clear();
  app.get<InMemoryInventoryRepository>(INVENTORY_REPOSITORY).clear();
  app.get<InMemoryPrincipalRepository>(PRINCIPAL_REPOSITORY).clear();
  usos.reset();
}
