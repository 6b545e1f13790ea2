import { Injectable } from '@nestjs/common';
import type { IInventoryRepository } from '../../../domain/repositories/inventory.repository.interface';
import type {
  InventoryRecord,
  InventoryCreateInput,
  InventoryUpdateInput,
} from '../../../domain/models/inventory.model';
import { InMemoryInventoryItemRepository } from './inmemory-inventory-item.repository';

/**
 * InMemoryInventoryRepository: IInventoryRepository backed by a Map.
 * Deleting an inventory cascades to its items in the sibling item store.
 */
@Injectable()
export class InMemoryInventoryRepository implements IInventoryRepository {
  private readonly inventories: Map<number, InventoryRecord> = new Map();
  private nextId = 1;

  constructor(
    private readonly items: InMemoryInventoryItemRepository,
  ) {}

  async create(input: InventoryCreateInput): Promise<InventoryRecord> {
    const record: InventoryRecord = { id: this.nextId++, ...input };
    this.inventories.set(record.id, record);
    return { ...record };
  }

  async findById(id: number): Promise<InventoryRecord | null> {
    const found = this.inventories.get(id);
    return found ? { ...found } : null;
  }

  async findByOwner(ownerId: number): Promise<InventoryRecord[]> {
    return Array.from(this.inventories.values())
      .filter((inv) => inv.ownerId === ownerId)
      .sort((a, b) => a.id - b.id)
      .map((inv) => ({ ...inv }));
  }

  async update(id: number, data: InventoryUpdateInput): Promise<InventoryRecord> {
    const existing = this.inventories.get(id);
    if (!existing) {
      throw new Error(`Inventory with id ${id} not found`);
    }
    const updated: InventoryRecord = { ...existing, ...data };
    this.inventories.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<void> {
    this.inventories.delete(id);
    this.items.deleteByInventory(id);
  }

  clear(): void {
    this.inventories.clear();
    this.nextId = 1;
  }
}
