import type {
  InventoryRecord,
  InventoryCreateInput,
  InventoryUpdateInput,
} from '../models/inventory.model';

/**
 * IInventoryRepository: persistence port for inventories.
 * Ownership rules live in the services; this port only runs keyed queries.
 */
export interface IInventoryRepository {
  create(input: InventoryCreateInput): Promise<InventoryRecord>;

  findById(id: number): Promise<InventoryRecord | null>;

  /** Inventories of one owner, ordered by id. */
  findByOwner(ownerId: number): Promise<InventoryRecord[]>;

  update(id: number, data: InventoryUpdateInput): Promise<InventoryRecord>;

  /** Deletes the inventory and its items. */
  delete(id: number): Promise<void>;
}
