/**
 * State Store Types
 *
 * The persisted system state document and the merge-update contract
 * every store implementation honors.
 */

import { z } from 'zod';
import type { IsoTimestamp } from '../core/types.js';
import type { StateStoreError } from '../core/errors.js';

// =============================================================================
// SYSTEM STATE DOCUMENT
// =============================================================================

/**
 * Persisted system status
 */
export enum SystemStatus {
  RUNNING = 'running',
  ERROR = 'error',
  SHUTDOWN = 'shutdown',
}

export const systemStateSchema = z.object({
  status: z.nativeEnum(SystemStatus),
  cycleCount: z.number().int().nonnegative().default(0),
  lastCycleAt: z.string().optional(),
  lastError: z.string().optional(),
  errorAt: z.string().optional(),
  shutdownAt: z.string().optional(),
  updatedAt: z.string().optional(),
});

/**
 * State document keyed by system id.
 *
 * `lastError`/`errorAt` exist only while status is ERROR,
 * `shutdownAt` only while status is SHUTDOWN.
 */
export interface SystemStateDocument {
  status: SystemStatus;
  cycleCount: number;
  lastCycleAt?: IsoTimestamp;
  lastError?: string;
  errorAt?: IsoTimestamp;
  shutdownAt?: IsoTimestamp;
  updatedAt?: IsoTimestamp;
}

export type CounterField = 'cycleCount';

export type RemovableField = 'lastCycleAt' | 'lastError' | 'errorAt' | 'shutdownAt';

// =============================================================================
// MERGE UPDATE
// =============================================================================

/**
 * Partial write against one state document.
 * Fields not named are left untouched; last write wins per field.
 */
export interface StateUpdate {
  /** Fields to overwrite */
  set: Partial<Omit<SystemStateDocument, CounterField>>;

  /** Atomic counter increments */
  increment?: Partial<Record<CounterField, number>>;

  /** Fields to remove */
  unset?: RemovableField[];
}

/**
 * Keyed document store supporting merge-updates.
 */
export interface StateStore {
  /** Store name for logs */
  readonly name: string;

  /** Applies a merge-update, creating the document if absent */
  merge(systemId: string, update: StateUpdate): Promise<void>;

  /** Reads the document, or null when none exists */
  read(systemId: string): Promise<SystemStateDocument | null>;

  /** Releases connections */
  close?(): Promise<void>;
}

// =============================================================================
// WRITE OUTCOMES
// =============================================================================

/**
 * Outcome of a best-effort state write.
 */
export type StateWriteResult =
  | { status: 'written'; update: StateUpdate }
  | { status: 'failed'; update: StateUpdate; error: StateStoreError }
  | { status: 'skipped'; reason: string };

export interface StateWriteStats {
  written: number;
  failed: number;
  skipped: number;
  lastFailure: string | null;
}
