import { Inject, Injectable } from '@nestjs/common';

import { INVENTORY_ITEM_REPOSITORY } from '../../domain/repositories/repository.tokens';
import type { IInventoryItemRepository } from '../../domain/repositories/inventory-item.repository.interface';
import type { InventoryItemRecord } from '../../domain/models/inventory-item.model';
import type { PrincipalRecord } from '../../domain/models/principal.model';
import { NotFoundError } from '../common/api-errors';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';
import { OwnershipScope } from '../inventory/ownership-scope.service';
import type { CreateInventoryItemDto } from './dto/create-inventory-item.dto';
import type { UpdateInventoryItemDto } from './dto/update-inventory-item.dto';
import {
  toItemCreateInput,
  toItemUpdateInput,
  toItemView,
  type InventoryItemView,
} from './inventory-item.view';

/**
 * ItemsService: item CRUD scoped to the caller's inventories.
 *
 * Items outside the scope read as absent (empty list / NotFound). Creating
 * into, or moving an item to, an inventory the caller does not own is
 * Forbidden.
 */
@Injectable()
export class ItemsService {
  constructor(
    @Inject(INVENTORY_ITEM_REPOSITORY) private readonly items: IInventoryItemRepository,
    private readonly scope: OwnershipScope,
    private readonly logger: AppLogger,
  ) {}

  async list(principal: PrincipalRecord | undefined, inventoryId?: number): Promise<InventoryItemView[]> {
    const items = await this.scope.visibleItems(principal, inventoryId);
    return items.map(toItemView);
  }

  async get(principal: PrincipalRecord | undefined, id: number): Promise<InventoryItemView> {
    return toItemView(await this.requireVisible(principal, id));
  }

  /** Single-item create; the payload is already structurally valid. */
  async create(principal: PrincipalRecord | undefined, dto: CreateInventoryItemDto): Promise<InventoryItemView> {
    await this.scope.assertWritable(principal, dto.inventory);
    const created = await this.items.create(toItemCreateInput(dto));
    this.logger.info(LogCategory.ITEMS, 'Item created', { itemId: created.id, inventoryId: created.inventoryId });
    return toItemView(created);
  }

  /** PUT: every field replaced. */
  async replace(
    principal: PrincipalRecord | undefined,
    id: number,
    dto: CreateInventoryItemDto,
  ): Promise<InventoryItemView> {
    const current = await this.requireVisible(principal, id);
    if (dto.inventory !== current.inventoryId) {
      await this.scope.assertWritable(principal, dto.inventory);
    }
    const updated = await this.items.update(id, toItemCreateInput(dto));
    this.logger.info(LogCategory.ITEMS, 'Item replaced', { itemId: id });
    return toItemView(updated);
  }

  /** PATCH: only the fields present. */
  async update(
    principal: PrincipalRecord | undefined,
    id: number,
    dto: UpdateInventoryItemDto,
  ): Promise<InventoryItemView> {
    const current = await this.requireVisible(principal, id);
    if (dto.inventory !== undefined && dto.inventory !== current.inventoryId) {
      await this.scope.assertWritable(principal, dto.inventory);
    }
    const updated = await this.items.update(id, toItemUpdateInput(dto));
    this.logger.info(LogCategory.ITEMS, 'Item updated', { itemId: id });
    return toItemView(updated);
  }

  async remove(principal: PrincipalRecord | undefined, id: number): Promise<void> {
    await this.requireVisible(principal, id);
    await this.items.delete(id);
    this.logger.info(LogCategory.ITEMS, 'Item deleted', { itemId: id });
  }

  private async requireVisible(principal: PrincipalRecord | undefined, id: number): Promise<InventoryItemRecord> {
    const item = await this.scope.findVisibleItem(principal, id);
    if (!item) {
      throw new NotFoundError('Inventory item', id);
    }
    return item;
  }
}
