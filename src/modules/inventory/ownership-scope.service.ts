import { Inject, Injectable } from '@nestjs/common';

import {
  INVENTORY_ITEM_REPOSITORY,
  INVENTORY_REPOSITORY,
} from '../../domain/repositories/repository.tokens';
import type { IInventoryRepository } from '../../domain/repositories/inventory.repository.interface';
import type { IInventoryItemRepository } from '../../domain/repositories/inventory-item.repository.interface';
import type { InventoryRecord } from '../../domain/models/inventory.model';
import type { InventoryItemRecord } from '../../domain/models/inventory-item.model';
import type { PrincipalRecord } from '../../domain/models/principal.model';
import { ForbiddenError } from '../common/api-errors';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';

/**
 * OwnershipScope: the Principal → Inventory → Item ownership graph.
 *
 * Reads outside the caller's graph come back empty or null. Writes into an
 * inventory the caller does not own raise ForbiddenError. A missing caller
 * owns nothing.
 */
@Injectable()
export class OwnershipScope {
  constructor(
    @Inject(INVENTORY_REPOSITORY) private readonly inventories: IInventoryRepository,
    @Inject(INVENTORY_ITEM_REPOSITORY) private readonly items: IInventoryItemRepository,
    private readonly logger: AppLogger,
  ) {}

  async visibleInventories(principal: PrincipalRecord | undefined): Promise<InventoryRecord[]> {
    if (!principal) return [];
    return this.inventories.findByOwner(principal.id);
  }

  async findOwnedInventory(principal: PrincipalRecord | undefined, inventoryId: number): Promise<InventoryRecord | null> {
    if (!principal) return null;
    const inventory = await this.inventories.findById(inventoryId);
    return inventory && inventory.ownerId === principal.id ? inventory : null;
  }

  /** Items of the caller's inventories, optionally narrowed to one inventory. */
  async visibleItems(principal: PrincipalRecord | undefined, inventoryId?: number): Promise<InventoryItemRecord[]> {
    let owned = (await this.visibleInventories(principal)).map(inventory => inventory.id);
    if (inventoryId !== undefined) {
      owned = owned.filter(id => id === inventoryId);
    }
    if (owned.length === 0) return [];
    return this.items.findAll({ inventoryIds: owned });
  }

  async findVisibleItem(principal: PrincipalRecord | undefined, itemId: number): Promise<InventoryItemRecord | null> {
    const item = await this.items.findById(itemId);
    if (!item) return null;
    const inventory = await this.findOwnedInventory(principal, item.inventoryId);
    return inventory ? item : null;
  }

  /**
   * The target inventory of a write, or ForbiddenError. An inventory that
   * does not exist is refused the same way, so ids cannot be enumerated.
   */
  async assertWritable(principal: PrincipalRecord | undefined, inventoryId: number): Promise<InventoryRecord> {
    const inventory = await this.findOwnedInventory(principal, inventoryId);
    if (!inventory) {
      this.logger.warn(LogCategory.ITEMS, 'Write into foreign inventory refused', {
        principalId: principal?.id,
        inventoryId,
      });
      throw new ForbiddenError(
        `You do not have permission to add items to inventory ${inventoryId}.`,
        { inventoryId },
      );
    }
    return inventory;
  }
}
