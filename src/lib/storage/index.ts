import { getConfig } from '../config';
import { logger } from '../logger';
import { createMemoryStorage } from './memory';
import { createNeonStorage } from './neon';
import { Storage } from './types';

export type * from './types';
export { createMemoryStorage } from './memory';

let storage: Storage | null = null;

export function getStorage(): Storage {
  if (!storage) {
    const { DATABASE_URL } = getConfig();
    if (DATABASE_URL) {
      storage = createNeonStorage(DATABASE_URL);
    } else {
      logger.warn('storage', 'DATABASE_URL is not set; using in-memory storage');
      storage = createMemoryStorage();
    }
  }
  return storage;
}
