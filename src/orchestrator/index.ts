/**
 * Orchestrator Module
 *
 * Cycle loop, lifecycle and failure handling.
 *
 * Components:
 * - Orchestrator: drives the collaborator pipeline one cycle at a time
 * - Types: lifecycle states, cycle results, events
 */

// =============================================================================
// TYPES
// =============================================================================

export * from './types.js';

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export { Orchestrator } from './orchestrator.js';
