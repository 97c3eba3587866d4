/**
 * State Store Selection
 *
 * PostgreSQL when a connection string is available, otherwise in-memory.
 */

import { db, initializeDatabase, closeDatabase, getPoolStats } from '../infrastructure/database/index.js';
import type { ComponentLogger } from '../infrastructure/logger/index.js';
import { MemoryStateStore } from './memory.js';
import { PostgresStateStore } from './postgres.js';
import type { StateStore } from './types.js';

/**
 * Opens the state store.
 *
 * @throws {DatabaseConnectionError} When a database URL is given but unreachable
 */
export async function openStateStore(
  databaseUrl: string | undefined,
  logger: ComponentLogger
): Promise<StateStore> {
  if (!databaseUrl) {
    logger.warn('Database not configured - state is kept in memory only');
    return new MemoryStateStore();
  }

  await initializeDatabase(databaseUrl);
  logger.info('Database connection established', getPoolStats());
  return new PostgresStateStore(db, closeDatabase);
}
