/**
 * State Store Tests
 *
 * Merge-update semantics for the memory and PostgreSQL stores,
 * and the best-effort recorder on top of them.
 */

import {
  MemoryStateStore,
  PostgresStateStore,
  StateRecorder,
  SystemStatus,
  applyUpdate,
  MERGE_STATE_SQL,
  READ_STATE_SQL,
  type StateStore,
  type StateUpdate,
  type SystemStateDocument,
} from '../../src/state/index.js';
import type { Queryable, QueryResult } from '../../src/infrastructure/database/index.js';
import { getComponentLogger } from '../../src/infrastructure/logger/index.js';
import { StateStoreError } from '../../src/core/errors.js';

// =============================================================================
// FAKES
// =============================================================================

/**
 * Records every query; answers with canned rows or a canned failure
 */
class FakeDatabase implements Queryable {
  calls: Array<{ text: string; values?: unknown[] }> = [];
  rows: Array<Record<string, unknown>> = [];
  failure: Error | null = null;

  async query(text: string, values?: unknown[]): Promise<QueryResult> {
    this.calls.push({ text, values });
    if (this.failure) {
      throw this.failure;
    }
    return { rows: this.rows, rowCount: this.rows.length };
  }
}

const SYSTEM_ID = 'trading_system';
const AT = new Date('2026-02-01T08:30:00.000Z');
const AT_ISO = AT.toISOString();

// =============================================================================
// TESTS
// =============================================================================

describe('applyUpdate', () => {
  it('should create a document with defaults', () => {
    const doc = applyUpdate(null, { set: { updatedAt: AT_ISO } });

    expect(doc).toEqual({ status: SystemStatus.RUNNING, cycleCount: 0, updatedAt: AT_ISO });
  });

  it('should overwrite set fields and keep the rest', () => {
    const current: SystemStateDocument = {
      status: SystemStatus.RUNNING,
      cycleCount: 4,
      lastCycleAt: '2026-01-31T00:00:00.000Z',
    };

    const doc = applyUpdate(current, { set: { status: SystemStatus.ERROR, lastError: 'boom' } });

    expect(doc).toEqual({
      status: SystemStatus.ERROR,
      cycleCount: 4,
      lastCycleAt: '2026-01-31T00:00:00.000Z',
      lastError: 'boom',
    });
    expect(current.status).toBe(SystemStatus.RUNNING);
  });

  it('should remove unset fields and add increments', () => {
    const current: SystemStateDocument = {
      status: SystemStatus.ERROR,
      cycleCount: 9,
      lastError: 'boom',
      errorAt: AT_ISO,
    };

    const doc = applyUpdate(current, {
      set: { status: SystemStatus.RUNNING },
      increment: { cycleCount: 1 },
      unset: ['lastError', 'errorAt'],
    });

    expect(doc).toEqual({ status: SystemStatus.RUNNING, cycleCount: 10 });
  });
});

describe('MemoryStateStore', () => {
  it('should return null for an unknown system', async () => {
    const store = new MemoryStateStore();

    await expect(store.read('missing')).resolves.toBeNull();
  });

  it('should keep systems separate', async () => {
    const store = new MemoryStateStore();

    await store.merge('alpha', { set: { status: SystemStatus.ERROR }, increment: { cycleCount: 2 } });
    await store.merge('beta', { set: { status: SystemStatus.SHUTDOWN } });

    await expect(store.read('alpha')).resolves.toEqual({ status: SystemStatus.ERROR, cycleCount: 2 });
    await expect(store.read('beta')).resolves.toEqual({ status: SystemStatus.SHUTDOWN, cycleCount: 0 });
  });

  it('should return copies', async () => {
    const store = new MemoryStateStore();
    await store.merge(SYSTEM_ID, { set: { status: SystemStatus.RUNNING } });

    const doc = await store.read(SYSTEM_ID);
    if (doc) {
      doc.cycleCount = 99;
    }

    expect(store.snapshot(SYSTEM_ID)?.cycleCount).toBe(0);
  });

  it('should forget everything on clear', async () => {
    const store = new MemoryStateStore();
    await store.merge(SYSTEM_ID, { set: { status: SystemStatus.RUNNING } });

    store.clear();

    expect(store.snapshot(SYSTEM_ID)).toBeNull();
  });
});

describe('PostgresStateStore', () => {
  it('should upsert with set fields, increment and removed keys', async () => {
    const database = new FakeDatabase();
    const store = new PostgresStateStore(database);
    const update: StateUpdate = {
      set: { status: SystemStatus.RUNNING, lastCycleAt: AT_ISO },
      increment: { cycleCount: 1 },
      unset: ['lastError', 'errorAt'],
    };

    await store.merge(SYSTEM_ID, update);

    expect(database.calls).toEqual([
      {
        text: MERGE_STATE_SQL,
        values: [
          SYSTEM_ID,
          `{"status":"running","lastCycleAt":"${AT_ISO}"}`,
          1,
          ['lastError', 'errorAt'],
        ],
      },
    ]);
  });

  it('should default the increment to zero and removed keys to none', async () => {
    const database = new FakeDatabase();
    const store = new PostgresStateStore(database);

    await store.merge(SYSTEM_ID, { set: { status: SystemStatus.SHUTDOWN } });

    expect(database.calls[0]?.values).toEqual([SYSTEM_ID, '{"status":"shutdown"}', 0, []]);
  });

  it('should wrap query failures', async () => {
    const database = new FakeDatabase();
    database.failure = new Error('connection refused');
    const store = new PostgresStateStore(database);

    const error = await store.merge(SYSTEM_ID, { set: {} }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StateStoreError);
    expect(error).toMatchObject({
      message: 'Failed to merge state for trading_system: connection refused',
    });
  });

  it('should read and validate the stored document', async () => {
    const database = new FakeDatabase();
    database.rows = [{ state_data: { status: 'error', cycleCount: 7, lastError: 'boom', errorAt: AT_ISO } }];
    const store = new PostgresStateStore(database);

    const doc = await store.read(SYSTEM_ID);

    expect(database.calls).toEqual([{ text: READ_STATE_SQL, values: [SYSTEM_ID] }]);
    expect(doc).toEqual({
      status: SystemStatus.ERROR,
      cycleCount: 7,
      lastError: 'boom',
      errorAt: AT_ISO,
    });
  });

  it('should return null when no row exists', async () => {
    const store = new PostgresStateStore(new FakeDatabase());

    await expect(store.read(SYSTEM_ID)).resolves.toBeNull();
  });

  it('should reject a malformed document', async () => {
    const database = new FakeDatabase();
    database.rows = [{ state_data: { status: 'paused', cycleCount: 1 } }];
    const store = new PostgresStateStore(database);

    await expect(store.read(SYSTEM_ID)).rejects.toThrow('Stored state for trading_system is malformed');
  });

  it('should release the pool on close', async () => {
    const onClose = jest.fn(async (): Promise<void> => undefined);
    const store = new PostgresStateStore(new FakeDatabase(), onClose);

    await store.close();

    expect(onClose).toHaveBeenCalledTimes(1);
  });
});

describe('StateRecorder', () => {
  const logger = getComponentLogger('state-test');

  it('should record success, failure and shutdown in turn', async () => {
    const store = new MemoryStateStore();
    const recorder = new StateRecorder(store, SYSTEM_ID, logger);

    await recorder.recordSuccess(AT);
    expect(store.snapshot(SYSTEM_ID)).toEqual({
      status: SystemStatus.RUNNING,
      cycleCount: 1,
      lastCycleAt: AT_ISO,
      updatedAt: AT_ISO,
    });

    await recorder.recordFailure('predict failed', AT);
    expect(store.snapshot(SYSTEM_ID)).toEqual({
      status: SystemStatus.ERROR,
      cycleCount: 1,
      lastCycleAt: AT_ISO,
      lastError: 'predict failed',
      errorAt: AT_ISO,
      updatedAt: AT_ISO,
    });

    await recorder.recordShutdown(AT);
    expect(store.snapshot(SYSTEM_ID)).toEqual({
      status: SystemStatus.SHUTDOWN,
      cycleCount: 1,
      lastCycleAt: AT_ISO,
      shutdownAt: AT_ISO,
      updatedAt: AT_ISO,
    });
    expect(recorder.getStats()).toEqual({ written: 3, failed: 0, skipped: 0, lastFailure: null });
  });

  it('should report a failed write instead of throwing', async () => {
    const store: StateStore = {
      name: 'broken',
      merge: async () => {
        throw new Error('disk full');
      },
      read: async () => null,
    };
    const recorder = new StateRecorder(store, SYSTEM_ID, logger);

    const result = await recorder.recordFailure('execute failed', AT);

    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.error).toBeInstanceOf(StateStoreError);
      expect(result.error.message).toBe('disk full');
    }
    expect(recorder.getStats()).toEqual({ written: 0, failed: 1, skipped: 0, lastFailure: 'disk full' });
  });

  it('should count skipped writes', () => {
    const recorder = new StateRecorder(new MemoryStateStore(), SYSTEM_ID, logger);

    expect(recorder.skip('shutdown in progress')).toEqual({
      status: 'skipped',
      reason: 'shutdown in progress',
    });
    expect(recorder.getStats().skipped).toBe(1);
  });

  it('should load null when the store cannot be read', async () => {
    const store: StateStore = {
      name: 'broken',
      merge: async () => undefined,
      read: async () => {
        throw new StateStoreError('Failed to read state for trading_system: timeout');
      },
    };
    const recorder = new StateRecorder(store, SYSTEM_ID, logger);

    await expect(recorder.load()).resolves.toBeNull();
  });
});
