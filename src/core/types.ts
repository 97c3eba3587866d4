/**
 * Core Types
 *
 * Primitive aliases shared across modules.
 */

/** Milliseconds since epoch */
export type Timestamp = number;

/** ISO-8601 timestamp string, as persisted in state documents */
export type IsoTimestamp = string;

/** Free-form settings object handed to a collaborator */
export type SettingsRecord = Readonly<Record<string, unknown>>;
