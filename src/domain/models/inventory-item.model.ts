/**
 * Domain model for a physical asset listed in an inventory.
 *
 * Ownership is not stored here: an item belongs to whoever owns its inventory.
 */
export interface InventoryItemRecord {
  id: number;
  inventoryId: number;
  department: number;
  assetGroup: number;
  category: string;
  inventoryNumber: string;
  assetComponent: number;
  subNumber: number;
  /** `YYYY-MM-DD` */
  acquisitionDate: string;
  assetDescription: string;
  quantity: number;
  /** Decimal string with two fraction digits, e.g. "1299.00". */
  initialValue: string;
  lastInventoryRoom: string;
  currentRoom: string | null;
  scanned: boolean | null;
}

export type InventoryItemCreateInput = Omit<InventoryItemRecord, 'id'>;

export type InventoryItemUpdateInput = Partial<InventoryItemCreateInput>;

export interface InventoryItemQuery {
  /** Items whose inventory is one of these ids. An empty list matches nothing. */
  inventoryIds: number[];
}
