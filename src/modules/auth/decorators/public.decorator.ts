import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

/** Skip AccessGuard for this handler or controller. */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
