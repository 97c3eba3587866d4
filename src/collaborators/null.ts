/**
 * Null Collaborators
 *
 * Paper stand-ins that let the loop run end-to-end without real
 * subsystems: a timestamp-only snapshot, no predictions, no strategies,
 * pass-through optimization and empty executions.
 */

import type { ComponentLogger } from '../infrastructure/logger/index.js';
import type {
  CollaboratorContext,
  CollaboratorFactories,
  DataProcessor,
  ExecutionResults,
  Executor,
  MarketDataSnapshot,
  ModelBuilder,
  Optimizer,
  Predictions,
  Strategy,
  StrategyGenerator,
} from './types.js';

export class NullDataProcessor implements DataProcessor {
  constructor(private readonly clock: () => Date = () => new Date()) {}

  async captureData(): Promise<MarketDataSnapshot> {
    return { capturedAt: this.clock().toISOString(), instruments: [] };
  }
}

export class NullModelBuilder implements ModelBuilder {
  async generatePredictions(snapshot: MarketDataSnapshot): Promise<Predictions> {
    return { basedOn: snapshot.capturedAt ?? null, signals: [] };
  }
}

export class NullStrategyGenerator implements StrategyGenerator {
  async generateStrategies(_predictions: Predictions, _snapshot: MarketDataSnapshot): Promise<Strategy[]> {
    return [];
  }
}

export class NullOptimizer implements Optimizer {
  constructor(private readonly logger: ComponentLogger) {}

  async optimize(strategies: Strategy[]): Promise<Strategy[]> {
    return strategies;
  }

  async updateFeedback(results: ExecutionResults): Promise<void> {
    this.logger.debug('Feedback received', { keys: Object.keys(results) });
  }
}

export class NullExecutor implements Executor {
  async executeTrades(strategies: Strategy[]): Promise<ExecutionResults> {
    return { submitted: strategies.length, fills: [] };
  }
}

/**
 * Factories for the paper collaborator set
 */
export function createNullCollaborators(): CollaboratorFactories {
  return {
    dataProcessor: () => new NullDataProcessor(),
    modelBuilder: () => new NullModelBuilder(),
    strategyGenerator: () => new NullStrategyGenerator(),
    optimizer: (context: CollaboratorContext) => new NullOptimizer(context.logger),
    executor: () => new NullExecutor(),
  };
}
