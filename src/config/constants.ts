/**
 * Orchestrator Constants
 *
 * Defaults and fixed identifiers used by the cycle loop and state store.
 */

// =============================================================================
// STATE DOCUMENT
// =============================================================================

/** Key of the state document when settings do not name one */
export const DEFAULT_SYSTEM_ID = 'trading_system';

/** Table holding one JSONB state document per system id */
export const STATE_TABLE = 'system_state';

// =============================================================================
// TIMING
// =============================================================================

export const TIMING = {
  /** Upper bound on the loop backoff sleep (seconds) */
  MAX_BACKOFF_SECONDS: 300,

  /** Backoff is this multiple of the cycle interval, before the cap */
  BACKOFF_MULTIPLIER: 2,
} as const;

// =============================================================================
// LOOP
// =============================================================================

/** 0 disables the consecutive loop failure ceiling */
export const UNLIMITED_LOOP_FAILURES = 0;
