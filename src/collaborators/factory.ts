/**
 * Collaborator Factory
 *
 * Builds the five collaborators in slot order. Construction is fail-fast:
 * the first failing factory aborts the build and later ones never run.
 */

import { CollaboratorConstructionError } from '../core/errors.js';
import type {
  CollaboratorContext,
  CollaboratorFactories,
  CollaboratorFactory,
  CollaboratorSlot,
  Collaborators,
  ConstructionResult,
} from './types.js';

/**
 * Shared part of every collaborator context
 */
export type SharedCollaboratorContext = Omit<CollaboratorContext, 'slot' | 'slotSettings'>;

/**
 * Invokes one factory, capturing failure as a structured result.
 */
export async function constructCollaborator<T>(
  slot: CollaboratorSlot,
  factory: CollaboratorFactory<T>,
  shared: SharedCollaboratorContext
): Promise<ConstructionResult<T>> {
  const context: CollaboratorContext = {
    ...shared,
    slot,
    slotSettings: shared.settings.collaborators[slot],
    logger: shared.logger.child(slot),
  };

  try {
    const handle = await factory(context);
    if (handle === null || handle === undefined) {
      return {
        ok: false,
        slot,
        error: new CollaboratorConstructionError(slot, new Error('factory returned no handle')),
      };
    }
    return { ok: true, slot, handle };
  } catch (error) {
    return { ok: false, slot, error: new CollaboratorConstructionError(slot, error) };
  }
}

/**
 * Builds every collaborator.
 *
 * @throws {CollaboratorConstructionError} For the first slot whose factory fails
 */
export async function buildCollaborators(
  factories: CollaboratorFactories,
  shared: SharedCollaboratorContext
): Promise<Collaborators> {
  const dataProcessor = unwrap(
    await constructCollaborator('dataProcessor', factories.dataProcessor, shared)
  );
  const modelBuilder = unwrap(
    await constructCollaborator('modelBuilder', factories.modelBuilder, shared)
  );
  const strategyGenerator = unwrap(
    await constructCollaborator('strategyGenerator', factories.strategyGenerator, shared)
  );
  const optimizer = unwrap(await constructCollaborator('optimizer', factories.optimizer, shared));
  const executor = unwrap(await constructCollaborator('executor', factories.executor, shared));

  return { dataProcessor, modelBuilder, strategyGenerator, optimizer, executor };
}

function unwrap<T>(result: ConstructionResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.handle;
}
