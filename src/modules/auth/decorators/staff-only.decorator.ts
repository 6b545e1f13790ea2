import { SetMetadata } from '@nestjs/common';

export const STAFF_ONLY_KEY = 'staffOnly';

/** Require an authenticated principal with the elevated (staff) role. */
export const StaffOnly = () => SetMetadata(STAFF_ONLY_KEY, true);
