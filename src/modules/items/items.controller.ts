import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Put,
  Query,
} from '@nestjs/common';

import { ItemsService } from './items.service';
import { BulkItemIntake } from './bulk-item-intake.service';
import type { InventoryItemView } from './inventory-item.view';
import { CreateInventoryItemDto } from './dto/create-inventory-item.dto';
import { UpdateInventoryItemDto } from './dto/update-inventory-item.dto';
import { CurrentPrincipal } from '../auth/decorators/current-principal.decorator';
import type { PrincipalRecord } from '../../domain/models/principal.model';

/**
 * Routes: /items, /items/:id
 */
@Controller('items')
export class ItemsController {
  constructor(
    private readonly items: ItemsService,
    private readonly intake: BulkItemIntake,
  ) {}

  @Get()
  list(
    @CurrentPrincipal() principal: PrincipalRecord | undefined,
    @Query('inventory_id', new ParseIntPipe({ optional: true })) inventoryId?: number,
  ): Promise<InventoryItemView[]> {
    return this.items.list(principal, inventoryId);
  }

  /** One item object, or an array of them. */
  @Post()
  create(
    @CurrentPrincipal() principal: PrincipalRecord | undefined,
    @Body() payload: unknown,
  ): Promise<InventoryItemView | InventoryItemView[]> {
    return this.intake.createItems(principal, payload);
  }

  @Get(':id')
  get(
    @CurrentPrincipal() principal: PrincipalRecord | undefined,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<InventoryItemView> {
    return this.items.get(principal, id);
  }

  @Put(':id')
  replace(
    @CurrentPrincipal() principal: PrincipalRecord | undefined,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: CreateInventoryItemDto,
  ): Promise<InventoryItemView> {
    return this.items.replace(principal, id, dto);
  }

  @Patch(':id')
  update(
    @CurrentPrincipal() principal: PrincipalRecord | undefined,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateInventoryItemDto,
  ): Promise<InventoryItemView> {
    return this.items.update(principal, id, dto);
  }

  @Delete(':id')
  @HttpCode(204)
  remove(
    @CurrentPrincipal() principal: PrincipalRecord | undefined,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    return this.items.remove(principal, id);
  }
}
