import { makeLogger } from '@tilerun/logger';

export const logger = makeLogger('simulator');
