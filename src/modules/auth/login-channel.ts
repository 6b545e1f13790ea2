/** Where a completed login is delivered. */
export const LOGIN_CHANNELS = ['web', 'mobile', 'backend_test'] as const;

export type LoginChannel = (typeof LOGIN_CHANNELS)[number];

export const DEFAULT_LOGIN_CHANNEL: LoginChannel = 'web';

export function isLoginChannel(value: unknown): value is LoginChannel {
  return typeof value === 'string' && LOGIN_CHANNELS.some(channel => channel === value);
}

/**
 * Channel for a callback: the `source` hint carried on the callback URL,
 * else the one recorded at login start, else web. Unrecognised hints fall
 * through to the next source.
 */
export function resolveLoginChannel(hint: unknown, stored: unknown): LoginChannel {
  if (isLoginChannel(hint)) return hint;
  if (isLoginChannel(stored)) return stored;
  return DEFAULT_LOGIN_CHANNEL;
}
