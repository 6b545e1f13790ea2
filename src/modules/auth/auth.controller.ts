import {
  Controller,
  Get,
  HttpCode,
  Post,
  Query,
  Req,
  Res,
} from '@nestjs/common';
import type { Request, Response } from 'express';

import { Public } from './decorators/public.decorator';
import { CurrentPrincipal } from './decorators/current-principal.decorator';
import { SessionAuthenticator } from './session-authenticator.service';
import { toPrincipalView, type PrincipalView } from './principal.view';
import { SESSION_COOKIE_NAME } from './session.constants';
import type { AuthType, AuthenticatedRequest } from './authenticated-request';
import type { PrincipalRecord } from '../../domain/models/principal.model';

/**
 * Login, callback, status and logout.
 *
 * Routes: /oauth/login, /oauth/callback, /auth/status, /logout
 */
@Controller()
export class AuthController {
  constructor(private readonly authenticator: SessionAuthenticator) {}

  @Public()
  @Get('oauth/login')
  async login(
    @Req() req: Request,
    @Res() res: Response,
    @Query('source') source: unknown,
  ): Promise<void> {
    const authorizationUrl = await this.authenticator.startLogin(req, source);
    res.redirect(302, authorizationUrl);
  }

  @Public()
  @Get('oauth/callback')
  async callback(
    @Req() req: Request,
    @Res() res: Response,
    @Query('oauth_verifier') verifier: unknown,
    @Query('source') source: unknown,
  ): Promise<void> {
    const outcome = await this.authenticator.completeLogin(req, verifier, source);
    if (outcome.kind === 'json') {
      res.status(200).json(outcome.body);
    } else {
      res.redirect(302, outcome.location);
    }
  }

  @Get('auth/status')
  status(
    @CurrentPrincipal() principal: PrincipalRecord,
    @Req() req: AuthenticatedRequest,
  ): PrincipalView & { auth_type: AuthType } {
    return { ...toPrincipalView(principal), auth_type: req.authType };
  }

  @Post('logout')
  @HttpCode(200)
  logout(@Req() req: Request, @Res({ passthrough: true }) res: Response): Promise<{ message: string }> {
    return this.performLogout(req, res);
  }

  /** Kept for browser testing; clients should POST. */
  @Get('logout')
  logoutViaGet(@Req() req: Request, @Res({ passthrough: true }) res: Response): Promise<{ message: string }> {
    return this.performLogout(req, res);
  }

  private async performLogout(req: Request, res: Response): Promise<{ message: string }> {
    await this.authenticator.logout(req);
    res.clearCookie(SESSION_COOKIE_NAME, { path: '/' });
    return { message: 'Successfully logged out.' };
  }
}
