import { Injectable } from '@nestjs/common';
import type { IInventoryItemRepository } from '../../../domain/repositories/inventory-item.repository.interface';
import type {
  InventoryItemRecord,
  InventoryItemCreateInput,
  InventoryItemUpdateInput,
  InventoryItemQuery,
} from '../../../domain/models/inventory-item.model';

@Injectable()
export class InMemoryInventoryItemRepository implements IInventoryItemRepository {
  private readonly items: Map<number, InventoryItemRecord> = new Map();
  private nextId = 1;

  async create(input: InventoryItemCreateInput): Promise<InventoryItemRecord> {
    const record: InventoryItemRecord = { id: this.nextId++, ...input };
    this.items.set(record.id, record);
    return { ...record };
  }

  /** Single-threaded inserts: nothing can fail halfway, so the batch is atomic. */
  async createMany(inputs: InventoryItemCreateInput[]): Promise<InventoryItemRecord[]> {
    const created: InventoryItemRecord[] = [];
    for (const input of inputs) {
      created.push(await this.create(input));
    }
    return created;
  }

  async findById(id: number): Promise<InventoryItemRecord | null> {
    const found = this.items.get(id);
    return found ? { ...found } : null;
  }

  async findAll(query: InventoryItemQuery): Promise<InventoryItemRecord[]> {
    const wanted = new Set(query.inventoryIds);
    return Array.from(this.items.values())
      .filter((item) => wanted.has(item.inventoryId))
      .sort((a, b) => a.id - b.id)
      .map((item) => ({ ...item }));
  }

  async update(id: number, data: InventoryItemUpdateInput): Promise<InventoryItemRecord> {
    const existing = this.items.get(id);
    if (!existing) {
      throw new Error(`Inventory item with id ${id} not found`);
    }
    const updated: InventoryItemRecord = { ...existing, ...data };
    this.items.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<void> {
    this.items.delete(id);
  }

  deleteByInventory(inventoryId: number): void {
    for (const [id, item] of this.items) {
      if (item.inventoryId === inventoryId) {
        this.items.delete(id);
      }
    }
  }

  clear(): void {
    this.items.clear();
    this.nextId = 1;
  }
}
