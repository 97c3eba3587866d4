/**
 * State Recorder
 *
 * Best-effort writer for the system state document. Store failures are
 * logged and counted, never thrown: callers get a StateWriteResult.
 */

import { StateStoreError, getErrorMessage } from '../core/errors.js';
import type { ComponentLogger } from '../infrastructure/logger/index.js';
import {
  SystemStatus,
  type StateStore,
  type StateUpdate,
  type StateWriteResult,
  type StateWriteStats,
  type SystemStateDocument,
} from './types.js';

export class StateRecorder {
  private stats: StateWriteStats = { written: 0, failed: 0, skipped: 0, lastFailure: null };

  constructor(
    private readonly store: StateStore,
    private readonly systemId: string,
    private readonly logger: ComponentLogger
  ) {}

  /**
   * Cycle completed: status running, counter +1, error and shutdown fields cleared.
   */
  recordSuccess(at: Date): Promise<StateWriteResult> {
    const timestamp = at.toISOString();
    return this.write('success', {
      set: { status: SystemStatus.RUNNING, lastCycleAt: timestamp, updatedAt: timestamp },
      increment: { cycleCount: 1 },
      unset: ['lastError', 'errorAt', 'shutdownAt'],
    });
  }

  /**
   * Cycle failed: status error with message, counter untouched.
   */
  recordFailure(message: string, at: Date): Promise<StateWriteResult> {
    const timestamp = at.toISOString();
    return this.write('failure', {
      set: { status: SystemStatus.ERROR, lastError: message, errorAt: timestamp, updatedAt: timestamp },
      unset: ['shutdownAt'],
    });
  }

  /**
   * Process stopping: status shutdown, error fields cleared.
   */
  recordShutdown(at: Date): Promise<StateWriteResult> {
    const timestamp = at.toISOString();
    return this.write('shutdown', {
      set: { status: SystemStatus.SHUTDOWN, shutdownAt: timestamp, updatedAt: timestamp },
      unset: ['lastError', 'errorAt'],
    });
  }

  /**
   * Records that a write was deliberately not attempted.
   */
  skip(reason: string): StateWriteResult {
    this.stats.skipped++;
    this.logger.debug('State write skipped', { systemId: this.systemId, reason });
    return { status: 'skipped', reason };
  }

  /**
   * Reads the current document; null when absent or unreadable.
   */
  async load(): Promise<SystemStateDocument | null> {
    try {
      return await this.store.read(this.systemId);
    } catch (error) {
      this.logger.warn('Could not load persisted state', {
        systemId: this.systemId,
        store: this.store.name,
        error: getErrorMessage(error),
      });
      return null;
    }
  }

  getStats(): StateWriteStats {
    return { ...this.stats };
  }

  private async write(kind: string, update: StateUpdate): Promise<StateWriteResult> {
    try {
      await this.store.merge(this.systemId, update);
      this.stats.written++;
      this.logger.debug('State persisted', { systemId: this.systemId, kind });
      return { status: 'written', update };
    } catch (error) {
      const storeError =
        error instanceof StateStoreError
          ? error
          : new StateStoreError(getErrorMessage(error), { systemId: this.systemId, store: this.store.name }, error);

      this.stats.failed++;
      this.stats.lastFailure = storeError.message;
      this.logger.error('Failed to persist state', {
        systemId: this.systemId,
        kind,
        store: this.store.name,
        error: storeError.message,
      });
      return { status: 'failed', update, error: storeError };
    }
  }
}
