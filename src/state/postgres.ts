/**
 * PostgreSQL State Store
 *
 * Keeps each system's state as a JSONB document in `system_state`.
 * A merge is one upsert: JSONB concatenation for set fields, key removal
 * for unset fields, and an in-database increment for the cycle counter.
 */

import { STATE_TABLE } from '../config/constants.js';
import { StateStoreError } from '../core/errors.js';
import type { Queryable } from '../infrastructure/database/index.js';
import {
  systemStateSchema,
  type StateStore,
  type StateUpdate,
  type SystemStateDocument,
} from './types.js';

// $1 id, $2 set fields, $3 counter increment, $4 keys to remove
export const MERGE_STATE_SQL = `INSERT INTO ${STATE_TABLE} (id, state_data, updated_at)
VALUES ($1, $2::jsonb || jsonb_build_object('cycleCount', $3::bigint), NOW())
ON CONFLICT (id) DO UPDATE SET
  state_data = (${STATE_TABLE}.state_data - $4::text[])
    || $2::jsonb
    || jsonb_build_object(
      'cycleCount',
      COALESCE((${STATE_TABLE}.state_data->>'cycleCount')::bigint, 0) + $3::bigint
    ),
  updated_at = NOW()`;

export const READ_STATE_SQL = `SELECT state_data FROM ${STATE_TABLE} WHERE id = $1`;

export class PostgresStateStore implements StateStore {
  readonly name = 'postgres';

  constructor(
    private readonly database: Queryable,
    private readonly onClose?: () => Promise<void>
  ) {}

  async merge(systemId: string, update: StateUpdate): Promise<void> {
    try {
      await this.database.query(MERGE_STATE_SQL, [
        systemId,
        JSON.stringify(update.set),
        update.increment?.cycleCount ?? 0,
        update.unset ?? [],
      ]);
    } catch (error) {
      throw new StateStoreError(
        `Failed to merge state for ${systemId}: ${messageOf(error)}`,
        { systemId, store: this.name },
        error
      );
    }
  }

  async read(systemId: string): Promise<SystemStateDocument | null> {
    let rows: Array<Record<string, unknown>>;
    try {
      const result = await this.database.query(READ_STATE_SQL, [systemId]);
      rows = result.rows;
    } catch (error) {
      throw new StateStoreError(
        `Failed to read state for ${systemId}: ${messageOf(error)}`,
        { systemId, store: this.name },
        error
      );
    }

    const row = rows[0];
    if (!row) {
      return null;
    }

    const parsed = systemStateSchema.safeParse(row.state_data);
    if (!parsed.success) {
      throw new StateStoreError(`Stored state for ${systemId} is malformed`, {
        systemId,
        store: this.name,
        issues: parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
      });
    }

    return parsed.data;
  }

  async close(): Promise<void> {
    await this.onClose?.();
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
