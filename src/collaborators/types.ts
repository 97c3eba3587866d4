/**
 * Collaborator Types
 *
 * Capability contracts for the five pipeline collaborators and the
 * artifacts passed between them. Artifacts are opaque to the orchestrator.
 */

import type { Settings } from '../config/settings.js';
import type { Credentials } from '../config/credentials.js';
import type { SettingsRecord } from '../core/types.js';
import type { CollaboratorConstructionError } from '../core/errors.js';
import type { ComponentLogger } from '../infrastructure/logger/index.js';
import type { StateStore } from '../state/types.js';

// =============================================================================
// PIPELINE ARTIFACTS
// =============================================================================

/** Market data captured at the start of a cycle */
export type MarketDataSnapshot = Record<string, unknown>;

/** Model output for one snapshot */
export type Predictions = Record<string, unknown>;

/** One candidate or optimized strategy */
export type Strategy = Record<string, unknown>;

/** Executor report for one batch of strategies */
export type ExecutionResults = Record<string, unknown>;

// =============================================================================
// CAPABILITIES
// =============================================================================

export interface DataProcessor {
  captureData(): Promise<MarketDataSnapshot>;
}

export interface ModelBuilder {
  generatePredictions(snapshot: MarketDataSnapshot): Promise<Predictions>;
}

export interface StrategyGenerator {
  generateStrategies(predictions: Predictions, snapshot: MarketDataSnapshot): Promise<Strategy[]>;
}

export interface Optimizer {
  optimize(strategies: Strategy[]): Promise<Strategy[]>;
  updateFeedback(results: ExecutionResults): Promise<void>;
}

export interface Executor {
  executeTrades(strategies: Strategy[]): Promise<ExecutionResults>;
}

/**
 * The five collaborator slots owned by the orchestrator
 */
export interface Collaborators {
  dataProcessor: DataProcessor;
  modelBuilder: ModelBuilder;
  strategyGenerator: StrategyGenerator;
  optimizer: Optimizer;
  executor: Executor;
}

export type CollaboratorSlot = keyof Collaborators;

// =============================================================================
// CONSTRUCTION
// =============================================================================

/**
 * Everything a collaborator factory receives
 */
export interface CollaboratorContext {
  slot: CollaboratorSlot;

  /** Shared, frozen settings */
  settings: Settings;

  /** This slot's entry under `settings.collaborators` */
  slotSettings: SettingsRecord;

  credentials: Credentials;

  /** Shared state store handle */
  store: StateStore;

  logger: ComponentLogger;
}

export type CollaboratorFactory<T> = (context: CollaboratorContext) => T | Promise<T>;

export type CollaboratorFactories = {
  [K in CollaboratorSlot]: CollaboratorFactory<Collaborators[K]>;
};

/**
 * Outcome of one factory invocation
 */
export type ConstructionResult<T> =
  | { ok: true; slot: CollaboratorSlot; handle: T }
  | { ok: false; slot: CollaboratorSlot; error: CollaboratorConstructionError };
