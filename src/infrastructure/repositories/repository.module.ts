/**
 * RepositoryModule: dynamic module that provides the persistence ports.
 *
 * Selects the backend via the PERSISTENCE_BACKEND environment variable:
 *   - "postgres" (default) → Postgres*Repository over a pg pool
 *   - "inmemory"           → InMemory*Repository
 *
 * Usage:
 *   imports: [RepositoryModule.register()]
 */
import { Module, type DynamicModule } from '@nestjs/common';
import {
  PRINCIPAL_REPOSITORY,
  INVENTORY_REPOSITORY,
  INVENTORY_ITEM_REPOSITORY,
  AUTH_TOKEN_REPOSITORY,
} from '../../domain/repositories/repository.tokens';
import { PostgresPrincipalRepository } from './postgres/postgres-principal.repository';
import { PostgresInventoryRepository } from './postgres/postgres-inventory.repository';
import { PostgresInventoryItemRepository } from './postgres/postgres-inventory-item.repository';
import { PostgresAuthTokenRepository } from './postgres/postgres-auth-token.repository';
import { InMemoryPrincipalRepository } from './inmemory/inmemory-principal.repository';
import { InMemoryInventoryRepository } from './inmemory/inmemory-inventory.repository';
import { InMemoryInventoryItemRepository } from './inmemory/inmemory-inventory-item.repository';
import { InMemoryAuthTokenRepository } from './inmemory/inmemory-auth-token.repository';
import { PostgresModule } from '../../modules/postgres/postgres.module';

const TOKENS = [PRINCIPAL_REPOSITORY, INVENTORY_REPOSITORY, INVENTORY_ITEM_REPOSITORY, AUTH_TOKEN_REPOSITORY];

@Module({})
export class RepositoryModule {
  static register(): DynamicModule {
    const backend = (process.env.PERSISTENCE_BACKEND ?? 'postgres').toLowerCase();

    if (backend === 'inmemory') {
      return {
        module: RepositoryModule,
        global: true,
        providers: [
          // The inventory store cascades deletes into this same item store instance.
          InMemoryInventoryItemRepository,
          { provide: INVENTORY_ITEM_REPOSITORY, useExisting: InMemoryInventoryItemRepository },
          { provide: PRINCIPAL_REPOSITORY, useClass: InMemoryPrincipalRepository },
          { provide: INVENTORY_REPOSITORY, useClass: InMemoryInventoryRepository },
          { provide: AUTH_TOKEN_REPOSITORY, useClass: InMemoryAuthTokenRepository },
        ],
        exports: TOKENS,
      };
    }

    return {
      module: RepositoryModule,
      global: true,
      imports: [PostgresModule],
      providers: [
        { provide: PRINCIPAL_REPOSITORY, useClass: PostgresPrincipalRepository },
        { provide: INVENTORY_REPOSITORY, useClass: PostgresInventoryRepository },
        { provide: INVENTORY_ITEM_REPOSITORY, useClass: PostgresInventoryItemRepository },
        { provide: AUTH_TOKEN_REPOSITORY, useClass: PostgresAuthTokenRepository },
      ],
      exports: TOKENS,
    };
  }
}
