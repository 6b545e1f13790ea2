/**
 * Payload factories for E2E tests. Each accepts an `overrides` spread so
 * individual tests can tweak fields.
 */

export interface InventoryPayload {
  name?: unknown;
  date?: unknown;
  [key: string]: unknown;
}

export function inventoryPayload(overrides: InventoryPayload = {}): InventoryPayload {
  return { name: 'Room 101 stocktake', date: '2024-03-15', ...overrides };
}

export type ItemPayload = Record<string, unknown>;

export function itemPayload(inventory: number, overrides: ItemPayload = {}): ItemPayload {
  return {
    inventory,
    department: 12,
    asset_group: 3,
    category: 'IT',
    inventory_number: 'INV-0001',
    asset_component: 0,
    sub_number: 0,
    acquisition_date: '2021-09-01',
    asset_description: 'Laptop',
    quantity: 1,
    initial_value: '1299.00',
    lastInventoryRoom: 'A-101',
    ...overrides,
  };
}
