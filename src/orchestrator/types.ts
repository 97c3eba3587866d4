/**
 * Orchestrator Types
 *
 * Lifecycle states, cycle outcomes and events for the orchestration loop.
 */

import type { Timestamp } from '../core/types.js';
import type { CycleStageError } from '../core/errors.js';
import type { Settings } from '../config/settings.js';
import type { Credentials } from '../config/credentials.js';
import type { CollaboratorFactories } from '../collaborators/types.js';
import type { ComponentLogger } from '../infrastructure/logger/index.js';
import type { StateStore, StateWriteResult, StateWriteStats } from '../state/types.js';
import type { SleepFn } from '../utils/backoff.js';

// =============================================================================
// LIFECYCLE
// =============================================================================

/**
 * Process lifecycle.
 *
 * created → initializing → running ⇄ backoff → shutting_down → terminated.
 * A fatal construction failure leaves the orchestrator in error.
 */
export enum OrchestratorStatus {
  CREATED = 'CREATED',
  INITIALIZING = 'INITIALIZING',
  RUNNING = 'RUNNING',
  BACKOFF = 'BACKOFF',
  SHUTTING_DOWN = 'SHUTTING_DOWN',
  TERMINATED = 'TERMINATED',
  ERROR = 'ERROR',
}

/**
 * Why the loop stopped or shutdown was requested
 */
export enum ShutdownReason {
  USER_REQUEST = 'USER_REQUEST',
  SIGNAL = 'SIGNAL',
  RETRY_LIMIT = 'RETRY_LIMIT',
  CRITICAL_ERROR = 'CRITICAL_ERROR',
}

// =============================================================================
// PIPELINE
// =============================================================================

/**
 * Pipeline stages, in execution order
 */
export enum PipelineStage {
  CAPTURE = 'capture',
  PREDICT = 'predict',
  STRATEGIZE = 'strategize',
  OPTIMIZE = 'optimize',
  EXECUTE = 'execute',
  FEEDBACK = 'feedback',
}

interface CycleResultBase {
  /** 1-based cycle number this run */
  cycleNumber: number;
  startedAt: Timestamp;
  durationMs: number;
  stateWrite: StateWriteResult;
}

export interface CycleSuccess extends CycleResultBase {
  success: true;
  /** Whether the execution stage ran (live trading enabled) */
  executed: boolean;
  strategiesCount: number;
}

export interface CycleFailure extends CycleResultBase {
  success: false;
  stage: PipelineStage;
  error: CycleStageError;
}

export type CycleResult = CycleSuccess | CycleFailure;

// =============================================================================
// RUN / SHUTDOWN RESULTS
// =============================================================================

export interface RunResult {
  /** Cycles attempted (successful or not) */
  cyclesRun: number;
  /** Loop-level failures absorbed by backoff */
  loopFailures: number;
  reason: ShutdownReason;
}

export interface ShutdownResult {
  reason: ShutdownReason;
  stateWrite: StateWriteResult;
  cyclesCompleted: number;
  durationMs: number;
}

// =============================================================================
// OPTIONS
// =============================================================================

export interface OrchestratorOptions {
  settings: Settings;
  store: StateStore;
  collaborators: CollaboratorFactories;
  credentials?: Credentials;
  logger?: ComponentLogger;

  /** Injected for tests */
  sleep?: SleepFn;
  clock?: () => Date;
}

export interface OrchestratorSnapshot {
  status: OrchestratorStatus;
  running: boolean;
  cycleCount: number;
  consecutiveLoopFailures: number;
  stateWrites: StateWriteStats;
}

// =============================================================================
// EVENTS
// =============================================================================

export interface OrchestratorEvents {
  'status:changed': (oldStatus: OrchestratorStatus, newStatus: OrchestratorStatus) => void;
  'cycle:started': (cycleNumber: number) => void;
  'cycle:completed': (result: CycleSuccess) => void;
  'cycle:failed': (result: CycleFailure) => void;
  'loop:error': (error: unknown, backoffSeconds: number) => void;
  'shutdown:initiated': (reason: ShutdownReason) => void;
  'shutdown:complete': (result: ShutdownResult) => void;
}
