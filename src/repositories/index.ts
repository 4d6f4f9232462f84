import type { StorageConfig } from '../config';
import { createDatabase } from '../db/connection';
import type { Logger } from '../types/logger';
import { DrizzleShoeRepository } from './drizzleShoeRepository';
import { InMemoryShoeRepository } from './inMemoryShoeRepository';
import type { ShoeRepository } from './shoeRepository';

export type { ShoeRepository } from './shoeRepository';
export { DrizzleShoeRepository } from './drizzleShoeRepository';
export { InMemoryShoeRepository } from './inMemoryShoeRepository';

export interface Storage {
  repository: ShoeRepository;
  close(): Promise<void>;
}

/** Picks the storage backend once, for the lifetime of the process. */
export function createStorage(config: StorageConfig, logger: Logger = console): Storage {
  switch (config.backend) {
    case 'memory':
      logger.warn('⚠️ Using in-memory storage. Data will be lost on restart.');
      return {
        repository: new InMemoryShoeRepository(),
        close: async () => {},
      };
    case 'postgres': {
      const { db, pool } = createDatabase(config.databaseUrl, logger);
      return {
        repository: new DrizzleShoeRepository(db),
        close: () => pool.end(),
      };
    }
  }
}
