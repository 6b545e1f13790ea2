import type {
  InventoryItemRecord,
  InventoryItemCreateInput,
  InventoryItemUpdateInput,
  InventoryItemQuery,
} from '../models/inventory-item.model';

/**
 * IInventoryItemRepository: persistence port for inventory items.
 */
export interface IInventoryItemRepository {
  create(input: InventoryItemCreateInput): Promise<InventoryItemRecord>;

  /**
   * Insert every input or none of them. Results keep input order.
   */
  createMany(inputs: InventoryItemCreateInput[]): Promise<InventoryItemRecord[]>;

  findById(id: number): Promise<InventoryItemRecord | null>;

  /** Ordered by id. */
  findAll(query: InventoryItemQuery): Promise<InventoryItemRecord[]>;

  update(id: number, data: InventoryItemUpdateInput): Promise<InventoryItemRecord>;

  delete(id: number): Promise<void>;
}
