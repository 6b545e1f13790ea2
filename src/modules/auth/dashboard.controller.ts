import { Controller, Get, Header, Req } from '@nestjs/common';
import type { Request } from 'express';

import './session.types';
import { CurrentPrincipal } from './decorators/current-principal.decorator';
import { toPrincipalView, type PrincipalView } from './principal.view';
import type { PrincipalRecord } from '../../domain/models/principal.model';
import type { UsosProfile } from '../../usos/usos.types';

/** Landing page of the backend_test login channel. */
@Controller('dashboard')
export class DashboardController {
  @Get()
  @Header('Cache-Control', 'no-store')
  show(
    @CurrentPrincipal() principal: PrincipalRecord,
    @Req() req: Request,
  ): { principal: PrincipalView; profile: UsosProfile | null } {
    return {
      principal: toPrincipalView(principal),
      profile: req.session.profile ?? null,
    };
  }
}
