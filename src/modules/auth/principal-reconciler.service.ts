import { Inject, Injectable } from '@nestjs/common';
import { randomInt } from 'node:crypto';

import { PRINCIPAL_REPOSITORY } from '../../domain/repositories/repository.tokens';
import {
  UniqueViolation,
  type IPrincipalRepository,
} from '../../domain/repositories/principal.repository.interface';
import {
  UNUSABLE_PASSWORD_PREFIX,
  type PrincipalRecord,
  type PrincipalUpdateInput,
  type ReconciledAttributes,
} from '../../domain/models/principal.model';
import { ApiError, MissingExternalIdError, ProvisioningError } from '../common/api-errors';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';
import { isElevated } from '../../usos/usos.client';
import type { UsosProfile } from '../../usos/usos.types';

export interface ReconcileResult {
  principal: PrincipalRecord;
  created: boolean;
  /** Attributes written on an existing principal; empty when nothing changed. */
  changed: Array<keyof ReconciledAttributes>;
}

const PASSWORD_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const PASSWORD_LENGTH = 40;

const RECONCILED_KEYS: ReadonlyArray<keyof ReconciledAttributes> = [
  'firstName',
  'lastName',
  'email',
  'isStaff',
  'isActive',
];

export function usernameFor(externalId: string): string {
  return `usos_${externalId}`;
}

/** A password marker no input can ever match. */
export function unusablePassword(): string {
  let suffix = '';
  for (let i = 0; i < PASSWORD_LENGTH; i++) {
    suffix += PASSWORD_ALPHABET[randomInt(PASSWORD_ALPHABET.length)];
  }
  return UNUSABLE_PASSWORD_PREFIX + suffix;
}

/** Local attribute values a profile implies. Reconciled principals are always active. */
export function desiredAttributes(profile: UsosProfile): ReconciledAttributes {
  return {
    firstName: profile.first_name ?? '',
    lastName: profile.last_name ?? '',
    email: profile.email || '',
    isStaff: isElevated(profile.staff_status),
    isActive: true,
  };
}

function copyAttribute<K extends keyof ReconciledAttributes>(
  target: PrincipalUpdateInput,
  source: ReconciledAttributes,
  key: K,
): void {
  target[key] = source[key];
}

/** Attributes of `desired` that differ from `current`. */
export function diffPrincipal(current: ReconciledAttributes, desired: ReconciledAttributes): PrincipalUpdateInput {
  const changes: PrincipalUpdateInput = {};
  for (const key of RECONCILED_KEYS) {
    if (current[key] !== desired[key]) {
      copyAttribute(changes, desired, key);
    }
  }
  return changes;
}

/**
 * PrincipalReconciler: maps a USOS profile onto a local principal.
 *
 * Creates the principal on first sight; afterwards writes only the
 * attributes that drifted. Storage failures surface as ProvisioningError.
 */
@Injectable()
export class PrincipalReconciler {
  constructor(
    @Inject(PRINCIPAL_REPOSITORY) private readonly principals: IPrincipalRepository,
    private readonly logger: AppLogger,
  ) {}

  async reconcile(profile: UsosProfile): Promise<ReconcileResult> {
    const externalId = profile.id?.trim();
    if (!externalId) {
      this.logger.error(LogCategory.PROVISIONING, 'USOS profile has no id');
      throw new MissingExternalIdError();
    }

    const username = usernameFor(externalId);
    const desired = desiredAttributes(profile);

    try {
      let existing = await this.principals.findByUsername(username);
      if (!existing) {
        try {
          const principal = await this.principals.create({
            username,
            ...desired,
            password: unusablePassword(),
          });
          this.logger.info(LogCategory.PROVISIONING, 'Principal created', { username, isStaff: principal.isStaff });
          return { principal, created: true, changed: [] };
        } catch (error) {
          if (!(error instanceof UniqueViolation)) throw error;
          // Another login created it first; reconcile against that row.
          existing = await this.principals.findByUsername(username);
          if (!existing) throw error;
          this.logger.debug(LogCategory.PROVISIONING, 'Lost creation race, reconciling existing row', { username });
        }
      }

      const changes = diffPrincipal(existing, desired);
      const changed = RECONCILED_KEYS.filter(key => changes[key] !== undefined);
      if (changed.length === 0) {
        this.logger.debug(LogCategory.PROVISIONING, 'Principal already up to date', { username });
        return { principal: existing, created: false, changed };
      }

      const principal = await this.principals.update(existing.id, changes);
      this.logger.info(LogCategory.PROVISIONING, 'Principal updated', { username, fields: changed });
      return { principal, created: false, changed };
    } catch (error) {
      if (error instanceof ApiError) throw error;
      this.logger.error(LogCategory.PROVISIONING, `Provisioning failed for ${username}`, error);
      throw new ProvisioningError(username, error);
    }
  }
}
