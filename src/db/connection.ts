import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from './schema';
import type { Logger } from '../types/logger';

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseConnection {
  db: Database;
  pool: Pool;
}

export function createDatabase(databaseUrl: string, logger: Logger = console): DatabaseConnection {
  const pool = new Pool({
    connectionString: databaseUrl,
  });

  // Idle clients can fail after a server restart; the pool replaces them on the next checkout
  pool.on('error', (err) => {
    logger.error('❌ Database connection error:', err);
  });

  pool.on('connect', () => {
    logger.log('✅ Database client connected');
  });

  return { db: drizzle(pool, { schema }), pool };
}
