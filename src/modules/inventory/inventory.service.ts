import { Inject, Injectable } from '@nestjs/common';

import {
  INVENTORY_ITEM_REPOSITORY,
  INVENTORY_REPOSITORY,
} from '../../domain/repositories/repository.tokens';
import type { IInventoryRepository } from '../../domain/repositories/inventory.repository.interface';
import type { IInventoryItemRepository } from '../../domain/repositories/inventory-item.repository.interface';
import type { InventoryRecord } from '../../domain/models/inventory.model';
import type { PrincipalRecord } from '../../domain/models/principal.model';
import { NotFoundError, UnauthorizedError } from '../common/api-errors';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';
import { OwnershipScope } from './ownership-scope.service';
import { toInventoryView, type InventoryView } from './inventory.view';
import type { CreateInventoryDto } from './dto/create-inventory.dto';
import type { UpdateInventoryDto } from './dto/update-inventory.dto';

/**
 * InventoryService: inventory CRUD within the caller's ownership scope.
 * Every visible inventory is owned by the caller, so the caller is also the
 * `user` rendered on each view.
 */
@Injectable()
export class InventoryService {
  constructor(
    @Inject(INVENTORY_REPOSITORY) private readonly inventories: IInventoryRepository,
    @Inject(INVENTORY_ITEM_REPOSITORY) private readonly items: IInventoryItemRepository,
    private readonly scope: OwnershipScope,
    private readonly logger: AppLogger,
  ) {}

  /** `userId` narrows the list; any id other than the caller's yields nothing. */
  async list(principal: PrincipalRecord | undefined, userId?: number): Promise<InventoryView[]> {
    if (!principal || (userId !== undefined && userId !== principal.id)) {
      return [];
    }
    const inventories = await this.scope.visibleInventories(principal);
    return this.render(principal, inventories);
  }

  async get(principal: PrincipalRecord | undefined, id: number): Promise<InventoryView> {
    const inventory = await this.requireOwned(principal, id);
    const [view] = await this.render(inventory.owner, [inventory.record]);
    return view;
  }

  async create(principal: PrincipalRecord | undefined, dto: CreateInventoryDto): Promise<InventoryView> {
    if (!principal) throw new UnauthorizedError();
    const created = await this.inventories.create({ name: dto.name, date: dto.date, ownerId: principal.id });
    this.logger.info(LogCategory.INVENTORY, 'Inventory created', { inventoryId: created.id });
    return toInventoryView(created, principal, []);
  }

  async update(principal: PrincipalRecord | undefined, id: number, dto: UpdateInventoryDto): Promise<InventoryView> {
    const { owner } = await this.requireOwned(principal, id);
    const updated = await this.inventories.update(id, {
      ...(dto.name !== undefined ? { name: dto.name } : {}),
      ...(dto.date !== undefined ? { date: dto.date } : {}),
    });
    this.logger.info(LogCategory.INVENTORY, 'Inventory updated', { inventoryId: id });
    const [view] = await this.render(owner, [updated]);
    return view;
  }

  async remove(principal: PrincipalRecord | undefined, id: number): Promise<void> {
    await this.requireOwned(principal, id);
    await this.inventories.delete(id);
    this.logger.info(LogCategory.INVENTORY, 'Inventory deleted', { inventoryId: id });
  }

  private async requireOwned(
    principal: PrincipalRecord | undefined,
    id: number,
  ): Promise<{ record: InventoryRecord; owner: PrincipalRecord }> {
    const record = await this.scope.findOwnedInventory(principal, id);
    if (!record || !principal) {
      throw new NotFoundError('Inventory', id);
    }
    return { record, owner: principal };
  }

  private async render(owner: PrincipalRecord, inventories: InventoryRecord[]): Promise<InventoryView[]> {
    if (inventories.length === 0) return [];
    const items = await this.items.findAll({ inventoryIds: inventories.map(inventory => inventory.id) });
    const itemIds = new Map<number, number[]>();
    for (const item of items) {
      const ids = itemIds.get(item.inventoryId) ?? [];
      ids.push(item.id);
      itemIds.set(item.inventoryId, ids);
    }
    return inventories.map(inventory => toInventoryView(inventory, owner, itemIds.get(inventory.id) ?? []));
  }
}
