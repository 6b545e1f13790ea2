import { Inject, Injectable } from '@nestjs/common';

import { INVENTORY_ITEM_REPOSITORY } from '../../domain/repositories/repository.tokens';
import type { IInventoryItemRepository } from '../../domain/repositories/inventory-item.repository.interface';
import type { PrincipalRecord } from '../../domain/models/principal.model';
import { ValidationError, type FieldError } from '../common/api-errors';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';
import { OwnershipScope } from '../inventory/ownership-scope.service';
import { ItemsService } from './items.service';
import type { CreateInventoryItemDto } from './dto/create-inventory-item.dto';
import { toItemCreateInput, toItemView, type InventoryItemView } from './inventory-item.view';
import { checkItemPayload, isPayloadObject, notAnObjectMessage } from './item-payload.validator';

/**
 * BulkItemIntake: POST /items accepting one item or a batch.
 *
 * A batch lands whole or not at all:
 *   1. every element is checked structurally; all errors are reported
 *   2. every target inventory must be the caller's; the first that is not
 *      rejects the batch
 *   3. the rows are inserted in one createMany
 */
@Injectable()
export class BulkItemIntake {
  constructor(
    private readonly items: ItemsService,
    private readonly scope: OwnershipScope,
    @Inject(INVENTORY_ITEM_REPOSITORY) private readonly repository: IInventoryItemRepository,
    private readonly logger: AppLogger,
  ) {}

  async createItems(
    principal: PrincipalRecord | undefined,
    payload: unknown,
  ): Promise<InventoryItemView | InventoryItemView[]> {
    if (Array.isArray(payload)) {
      return this.createBatch(principal, payload);
    }
    if (isPayloadObject(payload)) {
      const check = checkItemPayload(payload);
      if (!check.ok) throw new ValidationError(check.errors);
      return this.items.create(principal, check.dto);
    }
    const message = notAnObjectMessage(payload);
    throw new ValidationError([{ messages: [message] }], message);
  }

  private async createBatch(principal: PrincipalRecord | undefined, elements: unknown[]): Promise<InventoryItemView[]> {
    if (elements.length === 0) return [];

    const dtos: CreateInventoryItemDto[] = [];
    const errors: FieldError[] = [];
    elements.forEach((element, index) => {
      const check = checkItemPayload(element, index);
      if (check.ok) {
        dtos.push(check.dto);
      } else {
        errors.push(...check.errors);
      }
    });
    if (errors.length > 0) {
      this.logger.debug(LogCategory.ITEMS, 'Batch rejected on structure', { errors: errors.length });
      throw new ValidationError(errors);
    }

    const checked = new Set<number>();
    for (const dto of dtos) {
      if (checked.has(dto.inventory)) continue;
      await this.scope.assertWritable(principal, dto.inventory);
      checked.add(dto.inventory);
    }

    const created = await this.repository.createMany(dtos.map(toItemCreateInput));
    this.logger.info(LogCategory.ITEMS, 'Batch created', {
      count: created.length,
      inventories: Array.from(checked),
    });
    return created.map(toItemView);
  }
}
