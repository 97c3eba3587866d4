/**
 * Database Infrastructure
 *
 * PostgreSQL connection pool and query utilities.
 */

import pg from 'pg';
import { getEnvConfig } from '../../config/env.js';
import { DatabaseError, DatabaseConnectionError } from '../../core/errors.js';
import { getComponentLogger, type ComponentLogger } from '../logger/index.js';

const { Pool } = pg;

// =============================================================================
// TYPES
// =============================================================================

export interface DatabaseConfig {
  connectionString: string;
  min: number;
  max: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number | null;
}

/**
 * Anything that can run a parameterized query.
 * The pool singleton satisfies it; tests substitute an in-process fake.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
}

// =============================================================================
// DATABASE CLASS
// =============================================================================

class Database implements Queryable {
  private pool: pg.Pool | null = null;
  private logger: ComponentLogger | null = null;
  private initialized = false;

  /**
   * Initializes the database connection pool.
   *
   * @param connectionString - overrides DATABASE_URL
   */
  async initialize(connectionString?: string): Promise<void> {
    if (this.initialized) {
      return;
    }

    this.logger = getComponentLogger('database');

    try {
      const env = getEnvConfig();
      const url = connectionString ?? env.DATABASE_URL;
      if (!url) {
        throw new Error('no connection string configured');
      }

      const config: DatabaseConfig = {
        connectionString: url,
        min: env.DATABASE_POOL_MIN,
        max: env.DATABASE_POOL_MAX,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 10000,
      };

      this.pool = new Pool(config);

      // Set up error handlers
      this.pool.on('error', (err) => {
        this.logger?.error('Unexpected pool error', { error: err.message });
      });

      this.pool.on('connect', () => {
        this.logger?.debug('New client connected to pool');
      });

      // Test connection
      if (!(await this.testConnection())) {
        await this.pool.end();
        this.pool = null;
        throw new Error('connection test failed');
      }

      this.initialized = true;
      this.logger?.info('Database initialized', {
        min: config.min,
        max: config.max,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DatabaseConnectionError(message);
    }
  }

  /**
   * Tests the database connection.
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await this.query<{ now: Date }>('SELECT NOW() as now');
      this.logger?.debug('Connection test successful', {
        serverTime: result.rows[0]?.now,
      });
      return true;
    } catch (error) {
      this.logger?.error('Connection test failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Executes a SQL query.
   */
  async query<T = Record<string, unknown>>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<T>> {
    if (!this.pool) {
      throw new DatabaseError('Database not initialized');
    }

    const start = Date.now();

    try {
      const result = await this.pool.query(text, values);

      this.logger?.trace('Query executed', {
        text: text.substring(0, 100),
        duration: Date.now() - start,
        rowCount: result.rowCount,
      });

      return {
        rows: result.rows,
        rowCount: result.rowCount,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.error('Query failed', {
        text: text.substring(0, 100),
        error: message,
        duration: Date.now() - start,
      });
      throw new DatabaseError(`Query failed: ${message}`, { query: text.substring(0, 100) });
    }
  }

  /**
   * Gets pool statistics.
   */
  getPoolStats(): {
    total: number;
    idle: number;
    waiting: number;
  } {
    if (!this.pool) {
      return { total: 0, idle: 0, waiting: 0 };
    }
    return {
      total: this.pool.totalCount,
      idle: this.pool.idleCount,
      waiting: this.pool.waitingCount,
    };
  }

  /**
   * Closes the database connection pool.
   */
  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this.initialized = false;
      this.logger?.info('Database connection closed');
    }
  }
}

// =============================================================================
// SINGLETON EXPORT
// =============================================================================

export const db = new Database();

// Export convenience methods
export const initializeDatabase = (connectionString?: string) => db.initialize(connectionString);
export const closeDatabase = () => db.close();
export const getPoolStats = () => db.getPoolStats();
