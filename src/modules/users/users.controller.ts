import { Controller, Get, Param, ParseIntPipe } from '@nestjs/common';

import { StaffOnly } from '../auth/decorators/staff-only.decorator';
import { UsersService } from './users.service';
import type { UserView } from './user.view';

/**
 * Routes: /users, /users/:id (staff only)
 */
@StaffOnly()
@Controller('users')
export class UsersController {
  constructor(private readonly users: UsersService) {}

  @Get()
  list(): Promise<UserView[]> {
    return this.users.list();
  }

  @Get(':id')
  get(@Param('id', ParseIntPipe) id: number): Promise<UserView> {
    return this.users.get(id);
  }
}
