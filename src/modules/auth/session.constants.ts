export const SESSION_COOKIE_NAME = 'sessionid';

/** Two weeks. */
export const DEFAULT_SESSION_MAX_AGE_MS = 14 * 24 * 60 * 60 * 1000;

export const DEFAULT_FRONTEND_URL = 'http://localhost:3000/';

export const CALLBACK_PATH = '/oauth/callback/';
export const DASHBOARD_PATH = '/dashboard/';
