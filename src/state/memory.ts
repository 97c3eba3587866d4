/**
 * In-Memory State Store
 *
 * Process-local store used when no database is configured, and in tests.
 */

import type { StateStore, StateUpdate, SystemStateDocument } from './types.js';
import { SystemStatus } from './types.js';

export class MemoryStateStore implements StateStore {
  readonly name = 'memory';
  private documents: Map<string, SystemStateDocument> = new Map();

  async merge(systemId: string, update: StateUpdate): Promise<void> {
    this.documents.set(systemId, applyUpdate(this.documents.get(systemId) ?? null, update));
  }

  async read(systemId: string): Promise<SystemStateDocument | null> {
    const doc = this.documents.get(systemId);
    return doc ? { ...doc } : null;
  }

  /**
   * Synchronous snapshot of a document (for inspection in tests and diagnostics)
   */
  snapshot(systemId: string): SystemStateDocument | null {
    const doc = this.documents.get(systemId);
    return doc ? { ...doc } : null;
  }

  clear(): void {
    this.documents.clear();
  }
}

/**
 * Applies a merge-update to a document, returning a new document.
 */
export function applyUpdate(
  current: SystemStateDocument | null,
  update: StateUpdate
): SystemStateDocument {
  const next: SystemStateDocument = {
    status: SystemStatus.RUNNING,
    cycleCount: 0,
    ...current,
    ...update.set,
  };

  for (const field of update.unset ?? []) {
    delete next[field];
  }

  const increment = update.increment?.cycleCount;
  if (increment !== undefined) {
    next.cycleCount += increment;
  }

  return next;
}
