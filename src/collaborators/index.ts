/**
 * Collaborators Module
 *
 * Capability contracts, the fail-fast factory and the paper collaborator set.
 */

export * from './types.js';
export { buildCollaborators, constructCollaborator, type SharedCollaboratorContext } from './factory.js';
export {
  NullDataProcessor,
  NullModelBuilder,
  NullStrategyGenerator,
  NullOptimizer,
  NullExecutor,
  createNullCollaborators,
} from './null.js';
