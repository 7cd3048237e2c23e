import { makeLogger } from '@lh/logger';

export const logger = makeLogger('playtester');
