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

import { InventoryService } from './inventory.service';
import type { InventoryView } from './inventory.view';
import { CreateInventoryDto } from './dto/create-inventory.dto';
import { UpdateInventoryDto } from './dto/update-inventory.dto';
import { CurrentPrincipal } from '../auth/decorators/current-principal.decorator';
import type { PrincipalRecord } from '../../domain/models/principal.model';

/**
 * Routes: /inventories, /inventories/:id
 */
@Controller('inventories')
export class InventoryController {
  constructor(private readonly inventories: InventoryService) {}

  @Get()
  list(
    @CurrentPrincipal() principal: PrincipalRecord | undefined,
    @Query('user_id', new ParseIntPipe({ optional: true })) userId?: number,
  ): Promise<InventoryView[]> {
    return this.inventories.list(principal, userId);
  }

  @Post()
  create(
    @CurrentPrincipal() principal: PrincipalRecord | undefined,
    @Body() dto: CreateInventoryDto,
  ): Promise<InventoryView> {
    return this.inventories.create(principal, dto);
  }

  @Get(':id')
  get(
    @CurrentPrincipal() principal: PrincipalRecord | undefined,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<InventoryView> {
    return this.inventories.get(principal, id);
  }

  /** Full replacement of the editable fields. */
  @Put(':id')
  replace(
    @CurrentPrincipal() principal: PrincipalRecord | undefined,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: CreateInventoryDto,
  ): Promise<InventoryView> {
    return this.inventories.update(principal, id, dto);
  }

  @Patch(':id')
  update(
    @CurrentPrincipal() principal: PrincipalRecord | undefined,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateInventoryDto,
  ): Promise<InventoryView> {
    return this.inventories.update(principal, id, dto);
  }

  @Delete(':id')
  @HttpCode(204)
  remove(
    @CurrentPrincipal() principal: PrincipalRecord | undefined,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    return this.inventories.remove(principal, id);
  }
}
