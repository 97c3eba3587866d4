/**
 * Orchestrator Settings
 *
 * Loads the JSON settings file, applies environment overrides and
 * validates the result. The returned object is deeply frozen.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { DEFAULT_SYSTEM_ID, TIMING, UNLIMITED_LOOP_FAILURES } from './constants.js';

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

const slotSettingsSchema = z.record(z.unknown()).default({});

const collaboratorSettingsSchema = z
  .object({
    dataProcessor: slotSettingsSchema,
    modelBuilder: slotSettingsSchema,
    strategyGenerator: slotSettingsSchema,
    optimizer: slotSettingsSchema,
    executor: slotSettingsSchema,
  })
  .default({});

const settingsSchema = z.object({
  systemId: z.string().min(1).default(DEFAULT_SYSTEM_ID),
  credentialPath: z.string().min(1, 'credentialPath is required'),
  cycleIntervalSeconds: z.number().int().positive(),
  liveTradingEnabled: z.boolean().default(false),
  maxBackoffSeconds: z.number().int().positive().default(TIMING.MAX_BACKOFF_SECONDS),
  maxConsecutiveLoopFailures: z.number().int().nonnegative().default(UNLIMITED_LOOP_FAILURES),
  collaborators: collaboratorSettingsSchema,
});

export type Settings = Readonly<z.infer<typeof settingsSchema>>;

/**
 * Values that take precedence over the settings file (usually from env).
 */
export interface SettingsOverrides {
  systemId?: string;
  credentialPath?: string;
  cycleIntervalSeconds?: number;
  liveTradingEnabled?: boolean;
}

// =============================================================================
// LOADING
// =============================================================================

/**
 * Validates a raw settings object.
 *
 * @throws {ConfigurationError} When validation fails
 */
export function parseSettings(raw: unknown, overrides: SettingsOverrides = {}): Settings {
  const base = isPlainObject(raw) ? raw : {};
  const merged = { ...base, ...definedOnly(overrides) };

  const result = settingsSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new ConfigurationError(`Invalid settings:\n  - ${issues.join('\n  - ')}`, { issues });
  }

  return deepFreeze(result.data);
}

/**
 * Reads and validates the settings file.
 *
 * @throws {ConfigurationError} When the file is missing, malformed or invalid
 */
export function loadSettings(filePath: string, overrides: SettingsOverrides = {}): Settings {
  const resolved = path.resolve(filePath);

  let contents: string;
  try {
    contents = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read settings file ${resolved}: ${reason}`, {
      path: resolved,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Settings file ${resolved} is not valid JSON: ${reason}`, {
      path: resolved,
    });
  }

  return parseSettings(raw, overrides);
}

// =============================================================================
// HELPERS
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function definedOnly(overrides: SettingsOverrides): Partial<SettingsOverrides> {
  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
