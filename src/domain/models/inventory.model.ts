export interface InventoryRecord {
  id: number;
  name: string;
  /** `YYYY-MM-DD` */
  date: string;
  /** Set from the authenticated request at creation; never changes. */
  ownerId: number;
}

export interface InventoryCreateInput {
  name: string;
  date: string;
  ownerId: number;
}

export interface InventoryUpdateInput {
  name?: string;
  date?: string;
}
