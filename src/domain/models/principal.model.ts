/**
 * Domain model for a local account backed by a USOS identity.
 *
 * `password` only ever holds an unusable marker: principals authenticate
 * through USOS, never by password.
 */
export interface PrincipalRecord {
  id: number;
  /** `usos_<external id>`; unique and stable. */
  username: string;
  firstName: string;
  lastName: string;
  /** Empty string when USOS reports none. */
  email: string;
  isActive: boolean;
  /** Elevated (staff/lecturer) role. */
  isStaff: boolean;
  password: string;
  dateJoined: Date;
  lastLogin: Date | null;
}

export interface PrincipalCreateInput {
  username: string;
  firstName: string;
  lastName: string;
  email: string;
  isActive: boolean;
  isStaff: boolean;
  password: string;
}

/** Attributes the reconciler owns. */
export type ReconciledAttributes = Pick<PrincipalRecord, 'firstName' | 'lastName' | 'email' | 'isStaff' | 'isActive'>;

export type PrincipalUpdateInput = Partial<ReconciledAttributes>;

/** Prefix of a password hash that no input can ever match. */
export const UNUSABLE_PASSWORD_PREFIX = '!';

export function hasUsablePassword(principal: Pick<PrincipalRecord, 'password'>): boolean {
  return !principal.password.startsWith(UNUSABLE_PASSWORD_PREFIX);
}
