/**
 * NestJS injection tokens for repository interfaces.
 *
 * Usage:
 *   @Inject(PRINCIPAL_REPOSITORY) private readonly principals: IPrincipalRepository
 */
export const PRINCIPAL_REPOSITORY = 'PRINCIPAL_REPOSITORY';
export const INVENTORY_REPOSITORY = 'INVENTORY_REPOSITORY';
export const INVENTORY_ITEM_REPOSITORY = 'INVENTORY_ITEM_REPOSITORY';
export const AUTH_TOKEN_REPOSITORY = 'AUTH_TOKEN_REPOSITORY';
