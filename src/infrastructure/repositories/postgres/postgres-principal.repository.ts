/**
 * PostgresPrincipalRepository: IPrincipalRepository over the `principal` table.
 */
import { Injectable } from '@nestjs/common';
import { PostgresService, isStoredId, isUniqueViolation } from '../../../modules/postgres/postgres.service';
import {
  UniqueViolation,
  type IPrincipalRepository,
} from '../../../domain/repositories/principal.repository.interface';
import type {
  PrincipalRecord,
  PrincipalCreateInput,
  PrincipalUpdateInput,
} from '../../../domain/models/principal.model';

export interface PrincipalRow {
  id: number;
  username: string;
  first_name: string;
  last_name: string;
  email: string;
  is_active: boolean;
  is_staff: boolean;
  password: string;
  date_joined: Date;
  last_login: Date | null;
}

const COLUMNS = 'id, username, first_name, last_name, email, is_active, is_staff, password, date_joined, last_login';

/** Domain attribute → column, for partial updates. */
const UPDATE_COLUMNS: ReadonlyArray<readonly [keyof PrincipalUpdateInput, string]> = [
  ['firstName', 'first_name'],
  ['lastName', 'last_name'],
  ['email', 'email'],
  ['isStaff', 'is_staff'],
  ['isActive', 'is_active'],
];

export function toPrincipalRecord(row: PrincipalRow): PrincipalRecord {
  return {
    id: row.id,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    isActive: row.is_active,
    isStaff: row.is_staff,
    password: row.password,
    dateJoined: row.date_joined,
    lastLogin: row.last_login,
  };
}

@Injectable()
export class PostgresPrincipalRepository implements IPrincipalRepository {
  constructor(private readonly db: PostgresService) {}

  async create(input: PrincipalCreateInput): Promise<PrincipalRecord> {
    try {
      const { rows } = await this.db.query<PrincipalRow>(
        `INSERT INTO principal (username, first_name, last_name, email, is_active, is_staff, password)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING ${COLUMNS}`,
        [input.username, input.firstName, input.lastName, input.email, input.isActive, input.isStaff, input.password],
      );
      return toPrincipalRecord(rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new UniqueViolation('username', input.username);
      }
      throw error;
    }
  }

  async findById(id: number): Promise<PrincipalRecord | null> {
    if (!isStoredId(id)) return null;
    const { rows } = await this.db.query<PrincipalRow>(`SELECT ${COLUMNS} FROM principal WHERE id = $1`, [id]);
    return rows.length > 0 ? toPrincipalRecord(rows[0]) : null;
  }

  async findByUsername(username: string): Promise<PrincipalRecord | null> {
    const { rows } = await this.db.query<PrincipalRow>(`SELECT ${COLUMNS} FROM principal WHERE username = $1`, [username]);
    return rows.length > 0 ? toPrincipalRecord(rows[0]) : null;
  }

  async findAll(): Promise<PrincipalRecord[]> {
    const { rows } = await this.db.query<PrincipalRow>(`SELECT ${COLUMNS} FROM principal ORDER BY id`);
    return rows.map(toPrincipalRecord);
  }

  async update(id: number, data: PrincipalUpdateInput): Promise<PrincipalRecord> {
    const assignments: string[] = [];
    const values: unknown[] = [];
    for (const [key, column] of UPDATE_COLUMNS) {
      if (data[key] !== undefined) {
        values.push(data[key]);
        assignments.push(`${column} = $${values.length}`);
      }
    }
    if (assignments.length === 0) {
      const current = await this.findById(id);
      if (!current) throw new Error(`Principal with id ${id} not found`);
      return current;
    }
    values.push(id);
    const { rows } = await this.db.query<PrincipalRow>(
      `UPDATE principal SET ${assignments.join(', ')} WHERE id = $${values.length} RETURNING ${COLUMNS}`,
      values,
    );
    if (rows.length === 0) {
      throw new Error(`Principal with id ${id} not found`);
    }
    return toPrincipalRecord(rows[0]);
  }

  async touchLastLogin(id: number, at: Date): Promise<void> {
    await this.db.query('UPDATE principal SET last_login = $1 WHERE id = $2', [at, id]);
  }
}
