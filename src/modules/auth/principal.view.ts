import type { PrincipalRecord } from '../../domain/models/principal.model';

/** Wire representation of the signed-in account. */
export interface PrincipalView {
  id: number;
  username: string;
  first_name: string;
  last_name: string;
  email: string;
  is_staff: boolean;
}

export function toPrincipalView(principal: PrincipalRecord): PrincipalView {
  return {
    id: principal.id,
    username: principal.username,
    first_name: principal.firstName,
    last_name: principal.lastName,
    email: principal.email,
    is_staff: principal.isStaff,
  };
}
