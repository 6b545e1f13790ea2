import { Injectable } from '@nestjs/common';
import { PostgresService, isStoredId } from '../../../modules/postgres/postgres.service';
import type { IInventoryRepository } from '../../../domain/repositories/inventory.repository.interface';
import type {
  InventoryRecord,
  InventoryCreateInput,
  InventoryUpdateInput,
} from '../../../domain/models/inventory.model';

interface InventoryRow {
  id: number;
  name: string;
  /** Selected as text so no timezone shift applies. */
  date: string;
  owner_id: number;
}

const COLUMNS = 'id, name, date::text AS date, owner_id';

function toInventoryRecord(row: InventoryRow): InventoryRecord {
  return { id: row.id, name: row.name, date: row.date, ownerId: row.owner_id };
}

@Injectable()
export class PostgresInventoryRepository implements IInventoryRepository {
  constructor(private readonly db: PostgresService) {}

  async create(input: InventoryCreateInput): Promise<InventoryRecord> {
    const { rows } = await this.db.query<InventoryRow>(
      `INSERT INTO inventory (name, date, owner_id) VALUES ($1, $2, $3) RETURNING ${COLUMNS}`,
      [input.name, input.date, input.ownerId],
    );
    return toInventoryRecord(rows[0]);
  }

  async findById(id: number): Promise<InventoryRecord | null> {
    if (!isStoredId(id)) return null;
    const { rows } = await this.db.query<InventoryRow>(`SELECT ${COLUMNS} FROM inventory WHERE id = $1`, [id]);
    return rows.length > 0 ? toInventoryRecord(rows[0]) : null;
  }

  async findByOwner(ownerId: number): Promise<InventoryRecord[]> {
    const { rows } = await this.db.query<InventoryRow>(
      `SELECT ${COLUMNS} FROM inventory WHERE owner_id = $1 ORDER BY id`,
      [ownerId],
    );
    return rows.map(toInventoryRecord);
  }

  async update(id: number, data: InventoryUpdateInput): Promise<InventoryRecord> {
    const { rows } = await this.db.query<InventoryRow>(
      `UPDATE inventory SET name = COALESCE($1, name), date = COALESCE($2::date, date)
       WHERE id = $3 RETURNING ${COLUMNS}`,
      [data.name ?? null, data.date ?? null, id],
    );
    if (rows.length === 0) {
      throw new Error(`Inventory with id ${id} not found`);
    }
    return toInventoryRecord(rows[0]);
  }

  /** Items go with it through ON DELETE CASCADE. */
  async delete(id: number): Promise<void> {
    await this.db.query('DELETE FROM inventory WHERE id = $1', [id]);
  }
}
