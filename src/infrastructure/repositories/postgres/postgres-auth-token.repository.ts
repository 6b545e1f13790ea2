import { Injectable } from '@nestjs/common';
import { PostgresService } from '../../../modules/postgres/postgres.service';
import type { IAuthTokenRepository } from '../../../domain/repositories/auth-token.repository.interface';
import type { AuthTokenRecord } from '../../../domain/models/auth-token.model';

interface AuthTokenRow {
  key: string;
  principal_id: number;
  created_at: Date;
}

function toAuthTokenRecord(row: AuthTokenRow): AuthTokenRecord {
  return { key: row.key, principalId: row.principal_id, createdAt: row.created_at };
}

@Injectable()
export class PostgresAuthTokenRepository implements IAuthTokenRepository {
  constructor(private readonly db: PostgresService) {}

  async findByKey(key: string): Promise<AuthTokenRecord | null> {
    const { rows } = await this.db.query<AuthTokenRow>(
      'SELECT key, principal_id, created_at FROM auth_token WHERE key = $1',
      [key],
    );
    return rows.length > 0 ? toAuthTokenRecord(rows[0]) : null;
  }

  async findByPrincipal(principalId: number): Promise<AuthTokenRecord | null> {
    const { rows } = await this.db.query<AuthTokenRow>(
      'SELECT key, principal_id, created_at FROM auth_token WHERE principal_id = $1',
      [principalId],
    );
    return rows.length > 0 ? toAuthTokenRecord(rows[0]) : null;
  }

  /** ON CONFLICT keeps the first writer's key when two logins race. */
  async findOrCreate(
    principalId: number,
    candidateKey: string,
  ): Promise<{ token: AuthTokenRecord; created: boolean }> {
    const inserted = await this.db.query<AuthTokenRow>(
      `INSERT INTO auth_token (key, principal_id) VALUES ($1, $2)
       ON CONFLICT (principal_id) DO NOTHING
       RETURNING key, principal_id, created_at`,
      [candidateKey, principalId],
    );
    if (inserted.rows.length > 0) {
      return { token: toAuthTokenRecord(inserted.rows[0]), created: true };
    }
    const existing = await this.findByPrincipal(principalId);
    if (!existing) {
      throw new Error(`Token for principal ${principalId} vanished during find-or-create`);
    }
    return { token: existing, created: false };
  }

  async delete(key: string): Promise<void> {
    await this.db.query('DELETE FROM auth_token WHERE key = $1', [key]);
  }
}
