import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';

import { UsosModule } from '../../usos/usos.module';
import { AccessGuard } from './access.guard';
import { AuthController } from './auth.controller';
import { DashboardController } from './dashboard.controller';
import { AuthTokenService } from './auth-token.service';
import { PrincipalReconciler } from './principal-reconciler.service';
import { SessionAuthenticator } from './session-authenticator.service';
import { BearerTokenCredentialResolver } from './resolvers/bearer-token.resolver';
import { SessionCredentialResolver } from './resolvers/session.resolver';

@Module({
  imports: [UsosModule],
  controllers: [AuthController, DashboardController],
  providers: [
    AuthTokenService,
    PrincipalReconciler,
    SessionAuthenticator,
    BearerTokenCredentialResolver,
    SessionCredentialResolver,
    {
      provide: APP_GUARD,
      useClass: AccessGuard,
    },
  ],
  exports: [AuthTokenService, PrincipalReconciler],
})
export class AuthModule {}
