import 'express-session';
import type { LoginChannel } from './login-channel';
import type { OAuthTokenPair, UsosProfile } from '../../usos/usos.types';

declare module 'express-session' {
  interface SessionData {
    /** Temporary OAuth pair, held between /oauth/login and /oauth/callback. */
    requestToken?: OAuthTokenPair;
    loginChannel?: LoginChannel;
    /** Present once the session is authenticated. */
    principalId?: number;
    /** Last profile fetched from USOS. */
    profile?: UsosProfile;
  }
}
