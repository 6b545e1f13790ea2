import type { InventoryRecord } from '../../domain/models/inventory.model';
import type { PrincipalRecord } from '../../domain/models/principal.model';

export interface InventoryOwnerView {
  id: number;
  username: string;
  email: string;
}

export interface InventoryView {
  id: number;
  name: string;
  date: string;
  user: InventoryOwnerView;
  /** Ids of the items in this inventory. */
  items: number[];
}

export function toInventoryView(inventory: InventoryRecord, owner: PrincipalRecord, itemIds: number[]): InventoryView {
  return {
    id: inventory.id,
    name: inventory.name,
    date: inventory.date,
    user: { id: owner.id, username: owner.username, email: owner.email },
    items: itemIds,
  };
}
