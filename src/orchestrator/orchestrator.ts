/**
 * Cycle Orchestrator
 *
 * Owns the five pipeline collaborators and drives them one cycle at a
 * time: capture → predict → strategize → optimize → (execute → feedback).
 * Persists a status record after every cycle and at shutdown.
 */

import { EventEmitter } from 'events';
import { getComponentLogger, type ComponentLogger } from '../infrastructure/logger/index.js';
import {
  CycleStageError,
  OrchestratorStateError,
  RetryLimitExceededError,
  getErrorMessage,
} from '../core/errors.js';
import type { Settings } from '../config/settings.js';
import type { Credentials } from '../config/credentials.js';
import { buildCollaborators } from '../collaborators/factory.js';
import type { CollaboratorFactories, Collaborators } from '../collaborators/types.js';
import { StateRecorder } from '../state/recorder.js';
import type { StateStore, StateWriteResult } from '../state/types.js';
import { computeBackoffSeconds, sleep, type SleepFn } from '../utils/backoff.js';
import { formatDuration } from '../utils/formatting.js';
import {
  OrchestratorStatus,
  PipelineStage,
  ShutdownReason,
  type CycleFailure,
  type CycleResult,
  type CycleSuccess,
  type OrchestratorEvents,
  type OrchestratorOptions,
  type OrchestratorSnapshot,
  type RunResult,
  type ShutdownResult,
} from './types.js';

// =============================================================================
// ORCHESTRATOR CLASS
// =============================================================================

/**
 * Cycle-driven coordinator.
 *
 * Emits the events described by {@link OrchestratorEvents}.
 */
export class Orchestrator extends EventEmitter {
  private readonly settings: Settings;
  private readonly store: StateStore;
  private readonly factories: CollaboratorFactories;
  private readonly credentials: Credentials;
  private readonly logger: ComponentLogger;
  private readonly sleepFn: SleepFn;
  private readonly clock: () => Date;
  private readonly recorder: StateRecorder;

  // Cooperative cancellation for the loop; aborted by interrupt() or shutdown()
  private readonly stopController = new AbortController();
  private stopReason: ShutdownReason | null = null;

  private status: OrchestratorStatus = OrchestratorStatus.CREATED;
  private collaborators: Collaborators | null = null;

  // Successful cycles, resumed from the persisted document
  private cycleCount = 0;
  // Cycles attempted by this process
  private cyclesAttempted = 0;
  private consecutiveLoopFailures = 0;

  private shutdownPromise: Promise<ShutdownResult> | null = null;

  constructor(options: OrchestratorOptions) {
    super();
    this.settings = options.settings;
    this.store = options.store;
    this.factories = options.collaborators;
    this.credentials = options.credentials ?? {};
    this.logger = options.logger ?? getComponentLogger('orchestrator');
    this.sleepFn = options.sleep ?? sleep;
    this.clock = options.clock ?? (() => new Date());
    this.recorder = new StateRecorder(this.store, this.settings.systemId, this.logger);
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  /**
   * Resumes persisted state and constructs all collaborators.
   *
   * @throws {CollaboratorConstructionError} If any factory fails; the
   *   orchestrator is then left in ERROR and cannot run.
   */
  async initialize(): Promise<void> {
    if (this.status !== OrchestratorStatus.CREATED) {
      throw new OrchestratorStateError('initialize', this.status);
    }

    this.updateStatus(OrchestratorStatus.INITIALIZING);
    this.logger.info('Initializing orchestrator...', {
      systemId: this.settings.systemId,
      store: this.store.name,
      cycleIntervalSeconds: this.settings.cycleIntervalSeconds,
      liveTradingEnabled: this.settings.liveTradingEnabled,
    });

    const persisted = await this.recorder.load();
    if (persisted) {
      this.cycleCount = persisted.cycleCount;
      this.logger.info('Resumed persisted state', {
        status: persisted.status,
        cycleCount: persisted.cycleCount,
      });
    }

    try {
      this.collaborators = await buildCollaborators(this.factories, {
        settings: this.settings,
        credentials: this.credentials,
        store: this.store,
        logger: this.logger,
      });
    } catch (error) {
      this.updateStatus(OrchestratorStatus.ERROR);
      this.logger.error('Collaborator construction failed', { error: getErrorMessage(error) });
      throw error;
    }

    // shutdown() may have been called while factories were running
    if (!this.isStopping()) {
      this.updateStatus(OrchestratorStatus.RUNNING);
      this.logger.info('Orchestrator initialized');
    }
  }

  /**
   * Main loop: one cycle, then sleep for the cycle interval, until stopped.
   *
   * Cycle-stage failures are handled inside runCycle(). Anything else that
   * escapes an iteration triggers a capped backoff before the next attempt.
   *
   * @throws {CollaboratorConstructionError} When initialization fails
   * @throws {RetryLimitExceededError} When maxConsecutiveLoopFailures is set and reached
   */
  async run(): Promise<RunResult> {
    if (this.status === OrchestratorStatus.CREATED) {
      await this.initialize();
    }

    if (this.status !== OrchestratorStatus.RUNNING) {
      throw new OrchestratorStateError('run', this.status);
    }

    const signal = this.stopController.signal;
    const intervalMs = this.settings.cycleIntervalSeconds * 1000;
    let loopFailures = 0;

    this.logger.info('Orchestrator loop started', {
      interval: formatDuration(intervalMs),
    });

    while (!signal.aborted) {
      try {
        await this.runCycle();
        this.consecutiveLoopFailures = 0;
        await this.sleepFn(intervalMs, signal);
      } catch (error) {
        if (signal.aborted) {
          break;
        }

        loopFailures++;
        this.consecutiveLoopFailures++;
        const backoffSeconds = computeBackoffSeconds(
          this.settings.cycleIntervalSeconds,
          this.settings.maxBackoffSeconds
        );

        this.logger.error('Loop iteration failed', {
          error: getErrorMessage(error),
          consecutiveFailures: this.consecutiveLoopFailures,
          backoffSeconds,
        });
        this.safeEmit('loop:error', error, backoffSeconds);

        const ceiling = this.settings.maxConsecutiveLoopFailures;
        if (ceiling > 0 && this.consecutiveLoopFailures >= ceiling) {
          this.interrupt(ShutdownReason.RETRY_LIMIT);
          throw new RetryLimitExceededError(this.consecutiveLoopFailures, error);
        }

        await this.backoff(backoffSeconds * 1000, signal);
      }
    }

    const result: RunResult = {
      cyclesRun: this.cyclesAttempted,
      loopFailures,
      reason: this.stopReason ?? ShutdownReason.USER_REQUEST,
    };

    this.logger.info('Orchestrator loop stopped', { ...result });
    return result;
  }

  /**
   * Requests the loop to stop at the next boundary.
   * A cycle already in flight runs to completion.
   */
  interrupt(reason: ShutdownReason = ShutdownReason.SIGNAL): void {
    if (this.stopController.signal.aborted) {
      return;
    }

    this.stopReason = reason;
    this.logger.info('Stop requested', { reason });
    this.stopController.abort();
  }

  /**
   * Stops the loop and persists the shutdown record.
   * Idempotent; never rejects, even when the store is unreachable.
   */
  shutdown(reason?: ShutdownReason): Promise<ShutdownResult> {
    // If already shutting down, return existing promise
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.performShutdown(
        reason ?? this.stopReason ?? ShutdownReason.USER_REQUEST
      );
    }
    return this.shutdownPromise;
  }

  // ===========================================================================
  // CYCLE
  // ===========================================================================

  /**
   * Runs the five-stage pipeline once and persists the outcome.
   *
   * A failing stage aborts the cycle; the failure is recorded and returned,
   * not thrown.
   *
   * @throws {OrchestratorStateError} Unless the orchestrator is RUNNING
   */
  async runCycle(): Promise<CycleResult> {
    const collaborators = this.collaborators;
    if (this.status !== OrchestratorStatus.RUNNING || !collaborators) {
      throw new OrchestratorStateError('run a cycle', this.status);
    }

    const cycleNumber = ++this.cyclesAttempted;
    const startedAt = this.clock();
    this.emit('cycle:started', cycleNumber);
    this.logger.debug('Cycle started', { cycleNumber });

    let stage = PipelineStage.CAPTURE;
    let executed = false;
    let strategiesCount = 0;

    try {
      const snapshot = await collaborators.dataProcessor.captureData();

      stage = PipelineStage.PREDICT;
      const predictions = await collaborators.modelBuilder.generatePredictions(snapshot);

      stage = PipelineStage.STRATEGIZE;
      const strategies = await collaborators.strategyGenerator.generateStrategies(predictions, snapshot);

      stage = PipelineStage.OPTIMIZE;
      const optimized = await collaborators.optimizer.optimize(strategies);
      strategiesCount = optimized.length;

      if (this.settings.liveTradingEnabled) {
        stage = PipelineStage.EXECUTE;
        const results = await collaborators.executor.executeTrades(optimized);

        stage = PipelineStage.FEEDBACK;
        await collaborators.optimizer.updateFeedback(results);
        executed = true;
      }
    } catch (cause) {
      return this.failCycle(cycleNumber, startedAt, stage, cause);
    }

    const finishedAt = this.clock();
    this.cycleCount++;

    const stateWrite = this.isStopping()
      ? this.recorder.skip('shutdown in progress')
      : await this.recorder.recordSuccess(finishedAt);

    const result: CycleSuccess = {
      success: true,
      cycleNumber,
      startedAt: startedAt.getTime(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      executed,
      strategiesCount,
      stateWrite,
    };

    this.logger.info('Cycle completed', {
      cycleNumber,
      totalCycles: this.cycleCount,
      strategies: strategiesCount,
      executed,
      duration: formatDuration(result.durationMs),
      stateWrite: stateWrite.status,
    });
    this.emit('cycle:completed', result);

    return result;
  }

  private async failCycle(
    cycleNumber: number,
    startedAt: Date,
    stage: PipelineStage,
    cause: unknown
  ): Promise<CycleFailure> {
    const error = new CycleStageError(stage, cause);
    const finishedAt = this.clock();

    this.logger.error('Cycle failed', { cycleNumber, stage, error: error.message });

    const stateWrite = this.isStopping()
      ? this.recorder.skip('shutdown in progress')
      : await this.recorder.recordFailure(error.message, finishedAt);

    const result: CycleFailure = {
      success: false,
      cycleNumber,
      startedAt: startedAt.getTime(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      stage,
      error,
      stateWrite,
    };

    this.emit('cycle:failed', result);
    return result;
  }

  // ===========================================================================
  // STATE
  // ===========================================================================

  getStatus(): OrchestratorStatus {
    return this.status;
  }

  /**
   * True while the loop may execute cycles and no stop has been requested
   */
  isRunning(): boolean {
    return (
      (this.status === OrchestratorStatus.RUNNING || this.status === OrchestratorStatus.BACKOFF) &&
      !this.stopController.signal.aborted
    );
  }

  /**
   * Fires when interrupt() or shutdown() is called
   */
  get stopSignal(): AbortSignal {
    return this.stopController.signal;
  }

  getSnapshot(): OrchestratorSnapshot {
    return {
      status: this.status,
      running: this.isRunning(),
      cycleCount: this.cycleCount,
      consecutiveLoopFailures: this.consecutiveLoopFailures,
      stateWrites: this.recorder.getStats(),
    };
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async backoff(ms: number, signal: AbortSignal): Promise<void> {
    this.updateStatus(OrchestratorStatus.BACKOFF);
    try {
      await this.sleepFn(ms, signal);
    } finally {
      if (this.status === OrchestratorStatus.BACKOFF) {
        this.updateStatus(OrchestratorStatus.RUNNING);
      }
    }
  }

  private async performShutdown(reason: ShutdownReason): Promise<ShutdownResult> {
    const startTime = this.clock().getTime();

    this.interrupt(reason);
    this.updateStatus(OrchestratorStatus.SHUTTING_DOWN);
    this.safeEmit('shutdown:initiated', reason);
    this.logger.info('Shutting down orchestrator...', { reason });

    const stateWrite: StateWriteResult = await this.recorder.recordShutdown(this.clock());

    this.updateStatus(OrchestratorStatus.TERMINATED);

    const result: ShutdownResult = {
      reason,
      stateWrite,
      cyclesCompleted: this.cycleCount,
      durationMs: this.clock().getTime() - startTime,
    };

    this.safeEmit('shutdown:complete', result);
    this.logger.info('Orchestrator shutdown complete', {
      reason,
      cyclesCompleted: result.cyclesCompleted,
      stateWrite: stateWrite.status,
    });

    return result;
  }

  private isStopping(): boolean {
    return (
      this.status === OrchestratorStatus.SHUTTING_DOWN ||
      this.status === OrchestratorStatus.TERMINATED
    );
  }

  private updateStatus(newStatus: OrchestratorStatus): void {
    const oldStatus = this.status;
    if (oldStatus !== newStatus) {
      this.status = newStatus;
      this.safeEmit('status:changed', oldStatus, newStatus);
      this.logger.debug('Orchestrator status changed', { from: oldStatus, to: newStatus });
    }
  }

  /**
   * Emits without letting a listener's exception escape lifecycle transitions.
   */
  private safeEmit<K extends keyof OrchestratorEvents>(
    event: K,
    ...args: Parameters<OrchestratorEvents[K]>
  ): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      this.logger.error('Event listener failed', { event, error: getErrorMessage(error) });
    }
  }
}
