/**
 * State Module
 *
 * System state document, store implementations and the best-effort recorder.
 */

export * from './types.js';
export { MemoryStateStore, applyUpdate } from './memory.js';
export { PostgresStateStore, MERGE_STATE_SQL, READ_STATE_SQL } from './postgres.js';
export { StateRecorder } from './recorder.js';
export { openStateStore } from './select.js';
