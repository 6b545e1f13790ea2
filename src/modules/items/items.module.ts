import { Module } from '@nestjs/common';

import { InventoryModule } from '../inventory/inventory.module';
import { ItemsController } from './items.controller';
import { ItemsService } from './items.service';
import { BulkItemIntake } from './bulk-item-intake.service';

@Module({
  imports: [InventoryModule],
  controllers: [ItemsController],
  providers: [ItemsService, BulkItemIntake],
})
export class ItemsModule {}
