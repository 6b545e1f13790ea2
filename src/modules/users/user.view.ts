import type { PrincipalRecord } from '../../domain/models/principal.model';

/** Wire shape of a principal on the /users endpoints. */
export interface UserView {
  id: number;
  username: string;
  email: string;
  /** Ids of the inventories the principal owns. */
  inventories: number[];
}

export function toUserView(principal: PrincipalRecord, inventoryIds: number[]): UserView {
  return {
    id: principal.id,
    username: principal.username,
    email: principal.email,
    inventories: inventoryIds,
  };
}
