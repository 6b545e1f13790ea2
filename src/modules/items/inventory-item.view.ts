import type {
  InventoryItemCreateInput,
  InventoryItemRecord,
  InventoryItemUpdateInput,
} from '../../domain/models/inventory-item.model';
import type { CreateInventoryItemDto } from './dto/create-inventory-item.dto';
import type { UpdateInventoryItemDto } from './dto/update-inventory-item.dto';

export interface InventoryItemView {
  id: number;
  inventory: number;
  department: number;
  asset_group: number;
  category: string;
  inventory_number: string;
  asset_component: number;
  sub_number: number;
  acquisition_date: string;
  asset_description: string;
  quantity: number;
  initial_value: string;
  lastInventoryRoom: string;
  currentRoom: string | null;
  scanned: boolean | null;
}

/** "12.5" → "12.50", matching what a numeric(10,2) column returns. */
export function normalizeDecimal(value: string): string {
  return Number(value).toFixed(2);
}

export function toItemView(item: InventoryItemRecord): InventoryItemView {
  return {
    id: item.id,
    inventory: item.inventoryId,
    department: item.department,
    asset_group: item.assetGroup,
    category: item.category,
    inventory_number: item.inventoryNumber,
    asset_component: item.assetComponent,
    sub_number: item.subNumber,
    acquisition_date: item.acquisitionDate,
    asset_description: item.assetDescription,
    quantity: item.quantity,
    initial_value: item.initialValue,
    lastInventoryRoom: item.lastInventoryRoom,
    currentRoom: item.currentRoom,
    scanned: item.scanned,
  };
}

export function toItemCreateInput(dto: CreateInventoryItemDto): InventoryItemCreateInput {
  return {
    inventoryId: dto.inventory,
    department: dto.department,
    assetGroup: dto.asset_group,
    category: dto.category,
    inventoryNumber: dto.inventory_number,
    assetComponent: dto.asset_component,
    subNumber: dto.sub_number,
    acquisitionDate: dto.acquisition_date,
    assetDescription: dto.asset_description,
    quantity: dto.quantity,
    initialValue: normalizeDecimal(dto.initial_value),
    lastInventoryRoom: dto.lastInventoryRoom,
    currentRoom: dto.currentRoom ?? null,
    scanned: dto.scanned ?? null,
  };
}

/** Only the fields present on the payload. */
export function toItemUpdateInput(dto: UpdateInventoryItemDto): InventoryItemUpdateInput {
  const input: InventoryItemUpdateInput = {};
  if (dto.inventory !== undefined) input.inventoryId = dto.inventory;
  if (dto.department !== undefined) input.department = dto.department;
  if (dto.asset_group !== undefined) input.assetGroup = dto.asset_group;
  if (dto.category !== undefined) input.category = dto.category;
  if (dto.inventory_number !== undefined) input.inventoryNumber = dto.inventory_number;
  if (dto.asset_component !== undefined) input.assetComponent = dto.asset_component;
  if (dto.sub_number !== undefined) input.subNumber = dto.sub_number;
  if (dto.acquisition_date !== undefined) input.acquisitionDate = dto.acquisition_date;
  if (dto.asset_description !== undefined) input.assetDescription = dto.asset_description;
  if (dto.quantity !== undefined) input.quantity = dto.quantity;
  if (dto.initial_value !== undefined) input.initialValue = normalizeDecimal(dto.initial_value);
  if (dto.lastInventoryRoom !== undefined) input.lastInventoryRoom = dto.lastInventoryRoom;
  if (dto.currentRoom !== undefined) input.currentRoom = dto.currentRoom;
  if (dto.scanned !== undefined) input.scanned = dto.scanned;
  return input;
}
