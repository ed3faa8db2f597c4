/**
 * Storage Package Logger
 * ======================
 * Centralized logger for the storage package with namespace '@expsync/storage'
 */

import { createPackageLogger } from '@expsync/utils';

export const logger = createPackageLogger('@expsync/storage');
