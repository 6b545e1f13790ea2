/**
 * InMemoryPrincipalRepository: IPrincipalRepository backed by a Map.
 * Suitable for testing and lightweight deployments.
 */
import { Injectable } from '@nestjs/common';
import {
  UniqueViolation,
  type IPrincipalRepository,
} from '../../../domain/repositories/principal.repository.interface';
import type {
  PrincipalRecord,
  PrincipalCreateInput,
  PrincipalUpdateInput,
} from '../../../domain/models/principal.model';

@Injectable()
export class InMemoryPrincipalRepository implements IPrincipalRepository {
  private readonly principals: Map<number, PrincipalRecord> = new Map();
  private nextId = 1;

  async create(input: PrincipalCreateInput): Promise<PrincipalRecord> {
    for (const existing of this.principals.values()) {
      if (existing.username === input.username) {
        throw new UniqueViolation('username', input.username);
      }
    }
    const record: PrincipalRecord = {
      id: this.nextId++,
      ...input,
      dateJoined: new Date(),
      lastLogin: null,
    };
    this.principals.set(record.id, record);
    return { ...record };
  }

  async findById(id: number): Promise<PrincipalRecord | null> {
    const found = this.principals.get(id);
    return found ? { ...found } : null;
  }

  async findByUsername(username: string): Promise<PrincipalRecord | null> {
    for (const principal of this.principals.values()) {
      if (principal.username === username) {
        return { ...principal };
      }
    }
    return null;
  }

  async findAll(): Promise<PrincipalRecord[]> {
    return Array.from(this.principals.values())
      .sort((a, b) => a.id - b.id)
      .map((p) => ({ ...p }));
  }

  async update(id: number, data: PrincipalUpdateInput): Promise<PrincipalRecord> {
    const existing = this.principals.get(id);
    if (!existing) {
      throw new Error(`Principal with id ${id} not found`);
    }
    const updated: PrincipalRecord = { ...existing, ...data };
    this.principals.set(id, updated);
    return { ...updated };
  }

  async touchLastLogin(id: number, at: Date): Promise<void> {
    const existing = this.principals.get(id);
    if (existing) {
      existing.lastLogin = at;
    }
  }

  /** Clear all data: useful in test teardowns. */
  clear(): void {
    this.principals.clear();
    this.nextId = 1;
  }
}
