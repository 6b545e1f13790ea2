import { Inject, Injectable } from '@nestjs/common';

import {
  INVENTORY_REPOSITORY,
  PRINCIPAL_REPOSITORY,
} from '../../domain/repositories/repository.tokens';
import type { IPrincipalRepository } from '../../domain/repositories/principal.repository.interface';
import type { IInventoryRepository } from '../../domain/repositories/inventory.repository.interface';
import type { PrincipalRecord } from '../../domain/models/principal.model';
import { NotFoundError } from '../common/api-errors';
import { toUserView, type UserView } from './user.view';

/** Read-only directory of principals for staff. */
@Injectable()
export class UsersService {
  constructor(
    @Inject(PRINCIPAL_REPOSITORY) private readonly principals: IPrincipalRepository,
    @Inject(INVENTORY_REPOSITORY) private readonly inventories: IInventoryRepository,
  ) {}

  async list(): Promise<UserView[]> {
    const principals = await this.principals.findAll();
    return Promise.all(principals.map(principal => this.render(principal)));
  }

  async get(id: number): Promise<UserView> {
    const principal = await this.principals.findById(id);
    if (!principal) {
      throw new NotFoundError('User', id);
    }
    return this.render(principal);
  }

  private async render(principal: PrincipalRecord): Promise<UserView> {
    const owned = await this.inventories.findByOwner(principal.id);
    return toUserView(principal, owned.map(inventory => inventory.id));
  }
}
