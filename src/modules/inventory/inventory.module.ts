import { Module } from '@nestjs/common';

import { InventoryController } from './inventory.controller';
import { InventoryService } from './inventory.service';
import { OwnershipScope } from './ownership-scope.service';

@Module({
  controllers: [InventoryController],
  providers: [InventoryService, OwnershipScope],
  exports: [OwnershipScope],
})
export class InventoryModule {}
