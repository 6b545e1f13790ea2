export const DEFAULT_USOS_BASE_URL = 'https://apps.usos.pw.edu.pl';
export const DEFAULT_USOS_TIMEOUT_MS = 10_000;

export const REQUEST_TOKEN_PATH = 'services/oauth/request_token';
export const AUTHORIZE_PATH = 'services/oauth/authorize';
export const ACCESS_TOKEN_PATH = 'services/oauth/access_token';
export const USER_PATH = 'services/users/user';

/** Profile fields requested from `services/users/user`. */
export const PROFILE_FIELDS = [
  'id',
  'first_name',
  'last_name',
  'student_status',
  'staff_status',
  'email',
  'has_email',
  'profile_url',
] as const;

/**
 * USOS `staff_status` → elevated role.
 * 0 = not staff, 1 = employee (non-teaching), 2 = academic staff.
 * Values missing from the table are treated as not elevated.
 */
export const STAFF_STATUS_ELEVATED: Readonly<Record<number, boolean>> = {
  0: false,
  1: true,
  2: true,
};

/** Upstream bodies are cut to this length before they reach logs or error details. */
export const MAX_UPSTREAM_BODY = 2048;
