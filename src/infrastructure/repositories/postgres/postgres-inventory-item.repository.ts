import { Injectable } from '@nestjs/common';
import { PostgresService, isStoredId, type Queryable } from '../../../modules/postgres/postgres.service';
import type { IInventoryItemRepository } from '../../../domain/repositories/inventory-item.repository.interface';
import type {
  InventoryItemRecord,
  InventoryItemCreateInput,
  InventoryItemUpdateInput,
  InventoryItemQuery,
} from '../../../domain/models/inventory-item.model';

export interface InventoryItemRow {
  id: number;
  inventory_id: number;
  department: number;
  asset_group: number;
  category: string;
  inventory_number: string;
  /** pg returns int8 as a string. */
  asset_component: string;
  sub_number: number;
  acquisition_date: string;
  asset_description: string;
  quantity: number;
  /** pg returns numeric as a string. */
  initial_value: string;
  last_inventory_room: string;
  current_room: string | null;
  scanned: boolean | null;
}

const COLUMNS = [
  'id', 'inventory_id', 'department', 'asset_group', 'category', 'inventory_number',
  'asset_component', 'sub_number', 'acquisition_date::text AS acquisition_date',
  'asset_description', 'quantity', 'initial_value', 'last_inventory_room', 'current_room', 'scanned',
].join(', ');

/** Domain attribute → column, in insert order. */
const FIELD_COLUMNS: ReadonlyArray<readonly [keyof InventoryItemCreateInput, string]> = [
  ['inventoryId', 'inventory_id'],
  ['department', 'department'],
  ['assetGroup', 'asset_group'],
  ['category', 'category'],
  ['inventoryNumber', 'inventory_number'],
  ['assetComponent', 'asset_component'],
  ['subNumber', 'sub_number'],
  ['acquisitionDate', 'acquisition_date'],
  ['assetDescription', 'asset_description'],
  ['quantity', 'quantity'],
  ['initialValue', 'initial_value'],
  ['lastInventoryRoom', 'last_inventory_room'],
  ['currentRoom', 'current_room'],
  ['scanned', 'scanned'],
];

const INSERT_COLUMNS = FIELD_COLUMNS.map(([, column]) => column).join(', ');
const INSERT_PLACEHOLDERS = FIELD_COLUMNS.map((_, i) => `$${i + 1}`).join(', ');

export function toInventoryItemRecord(row: InventoryItemRow): InventoryItemRecord {
  return {
    id: row.id,
    inventoryId: row.inventory_id,
    department: row.department,
    assetGroup: row.asset_group,
    category: row.category,
    inventoryNumber: row.inventory_number,
    assetComponent: Number(row.asset_component),
    subNumber: row.sub_number,
    acquisitionDate: row.acquisition_date,
    assetDescription: row.asset_description,
    quantity: row.quantity,
    initialValue: row.initial_value,
    lastInventoryRoom: row.last_inventory_room,
    currentRoom: row.current_room,
    scanned: row.scanned,
  };
}

async function insertItem(db: Queryable, input: InventoryItemCreateInput): Promise<InventoryItemRecord> {
  const { rows } = await db.query<InventoryItemRow>(
    `INSERT INTO inventory_item (${INSERT_COLUMNS})
     VALUES (${INSERT_PLACEHOLDERS}) RETURNING ${COLUMNS}`,
    FIELD_COLUMNS.map(([field]) => input[field]),
  );
  return toInventoryItemRecord(rows[0]);
}

@Injectable()
export class PostgresInventoryItemRepository implements IInventoryItemRepository {
  constructor(private readonly db: PostgresService) {}

  create(input: InventoryItemCreateInput): Promise<InventoryItemRecord> {
    return insertItem(this.db, input);
  }

  async createMany(inputs: InventoryItemCreateInput[]): Promise<InventoryItemRecord[]> {
    if (inputs.length === 0) return [];
    return this.db.transaction(async (tx) => {
      const created: InventoryItemRecord[] = [];
      for (const input of inputs) {
        created.push(await insertItem(tx, input));
      }
      return created;
    });
  }

  async findById(id: number): Promise<InventoryItemRecord | null> {
    if (!isStoredId(id)) return null;
    const { rows } = await this.db.query<InventoryItemRow>(`SELECT ${COLUMNS} FROM inventory_item WHERE id = $1`, [id]);
    return rows.length > 0 ? toInventoryItemRecord(rows[0]) : null;
  }

  async findAll(query: InventoryItemQuery): Promise<InventoryItemRecord[]> {
    if (query.inventoryIds.length === 0) return [];
    const { rows } = await this.db.query<InventoryItemRow>(
      `SELECT ${COLUMNS} FROM inventory_item WHERE inventory_id = ANY($1::int[]) ORDER BY id`,
      [query.inventoryIds],
    );
    return rows.map(toInventoryItemRecord);
  }

  async update(id: number, data: InventoryItemUpdateInput): Promise<InventoryItemRecord> {
    const assignments: string[] = [];
    const values: unknown[] = [];
    for (const [field, column] of FIELD_COLUMNS) {
      if (data[field] !== undefined) {
        values.push(data[field]);
        assignments.push(`${column} = $${values.length}`);
      }
    }
    values.push(id);
    const sql = assignments.length > 0
      ? `UPDATE inventory_item SET ${assignments.join(', ')} WHERE id = $${values.length} RETURNING ${COLUMNS}`
      : `SELECT ${COLUMNS} FROM inventory_item WHERE id = $${values.length}`;
    const { rows } = await this.db.query<InventoryItemRow>(sql, values);
    if (rows.length === 0) {
      throw new Error(`Inventory item with id ${id} not found`);
    }
    return toInventoryItemRecord(rows[0]);
  }

  async delete(id: number): Promise<void> {
    await this.db.query('DELETE FROM inventory_item WHERE id = $1', [id]);
  }
}
