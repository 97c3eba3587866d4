/**
 * Configuration Module
 *
 * Central configuration aggregator that combines environment variables
 * and the settings file into a unified config object.
 */

import { getEnvConfig, getSanitizedConfig, type EnvConfig } from './env.js';
import { loadSettings, type Settings } from './settings.js';

// =============================================================================
// AGGREGATED CONFIG TYPE
// =============================================================================

export interface AppConfig {
  // Environment config
  env: EnvConfig;

  // Validated, frozen settings file
  settings: Settings;
}

// =============================================================================
// CONFIG LOADING
// =============================================================================

let cachedConfig: AppConfig | null = null;

/**
 * Gets the complete application configuration.
 * Validates environment variables and the settings file on first call.
 */
export function getConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = getEnvConfig();
  const settings = loadSettings(env.SETTINGS_PATH, {
    systemId: env.SYSTEM_ID,
    credentialPath: env.CREDENTIALS_PATH,
    cycleIntervalSeconds: env.CYCLE_INTERVAL_SECONDS,
    liveTradingEnabled: env.ENABLE_LIVE_TRADING,
  });

  cachedConfig = { env, settings };
  return cachedConfig;
}

/**
 * Resets the cached configuration (for testing).
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Gets a loggable version of the config (sensitive values redacted).
 */
export function getLoggableConfig(): Record<string, unknown> {
  const { settings } = getConfig();

  return {
    env: getSanitizedConfig(),
    settings: {
      systemId: settings.systemId,
      credentialPath: settings.credentialPath,
      cycleIntervalSeconds: settings.cycleIntervalSeconds,
      liveTradingEnabled: settings.liveTradingEnabled,
      maxBackoffSeconds: settings.maxBackoffSeconds,
      maxConsecutiveLoopFailures: settings.maxConsecutiveLoopFailures,
      collaborators: Object.keys(settings.collaborators),
    },
  };
}

// =============================================================================
// RE-EXPORTS
// =============================================================================

export { getEnvConfig, resetEnvConfig, getSanitizedConfig, type EnvConfig } from './env.js';
export { loadSettings, parseSettings, type Settings, type SettingsOverrides } from './settings.js';
export { loadCredentials, type Credentials } from './credentials.js';
export * from './constants.js';
