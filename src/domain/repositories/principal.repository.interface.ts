/**
 * IPrincipalRepository: persistence port for local accounts.
 *
 * Implementations:
 *   - PostgresPrincipalRepository
 *   - InMemoryPrincipalRepository (testing / lightweight deployments)
 */
import type {
  PrincipalRecord,
  PrincipalCreateInput,
  PrincipalUpdateInput,
} from '../models/principal.model';

export interface IPrincipalRepository {
  /**
   * Insert a principal. Rejects with a `UniqueViolation` when the username is
   * already taken.
   */
  create(input: PrincipalCreateInput): Promise<PrincipalRecord>;

  findById(id: number): Promise<PrincipalRecord | null>;

  findByUsername(username: string): Promise<PrincipalRecord | null>;

  /** All principals ordered by id. */
  findAll(): Promise<PrincipalRecord[]>;

  /** Write only the given attributes. */
  update(id: number, data: PrincipalUpdateInput): Promise<PrincipalRecord>;

  touchLastLogin(id: number, at: Date): Promise<void>;
}

/** Raised by `create` when another row already holds the username. */
export class UniqueViolation extends Error {
  constructor(readonly field: string, readonly value: string) {
    super(`${field} "${value}" already exists`);
    this.name = 'UniqueViolation';
  }
}
