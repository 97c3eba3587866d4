/**
 * Trading Cycle Orchestrator
 *
 * Main entry point. Loads configuration, opens the state store and runs
 * the capture → predict → strategize → optimize → execute loop until
 * interrupted.
 */

import { getConfig, getLoggableConfig, loadCredentials } from './config/index.js';
import { initializeLogger, logger, getComponentLogger } from './infrastructure/logger/index.js';
import { createNullCollaborators } from './collaborators/index.js';
import { openStateStore, type StateStore } from './state/index.js';
import { Orchestrator, ShutdownReason } from './orchestrator/index.js';
import { getErrorMessage, RetryLimitExceededError } from './core/errors.js';

// =============================================================================
// STATE
// =============================================================================

let orchestrator: Orchestrator | null = null;
let store: StateStore | null = null;

// Stop requested before the orchestrator existed
let pendingStop: ShutdownReason | null = null;

// =============================================================================
// INITIALIZATION
// =============================================================================

/**
 * Builds the orchestrator from configuration.
 * Any failure here is fatal.
 */
async function initializeOrchestrator(): Promise<Orchestrator> {
  // 1. Initialize logger first (other components need it)
  initializeLogger();
  logger.info('═══════════════════════════════════════════════════');
  logger.info('          TRADING CYCLE ORCHESTRATOR STARTING');
  logger.info('═══════════════════════════════════════════════════');

  // 2. Load and validate configuration
  const { env, settings } = getConfig();
  logger.info('Configuration loaded', getLoggableConfig());

  // 3. Load credentials
  const credentials = loadCredentials(settings.credentialPath);
  logger.info('Credentials loaded', { keys: Object.keys(credentials).length });

  // 4. Open state store
  store = await openStateStore(credentials.databaseUrl ?? env.DATABASE_URL, getComponentLogger('state'));

  // 5. Construct collaborators
  const instance = new Orchestrator({
    settings,
    store,
    credentials,
    collaborators: createNullCollaborators(),
  });
  orchestrator = instance;

  if (pendingStop) {
    instance.interrupt(pendingStop);
    pendingStop = null;
  }

  await instance.initialize();

  if (settings.liveTradingEnabled) {
    logger.warn('💰 LIVE TRADING ENABLED - optimized strategies will be executed');
  } else {
    logger.warn('📝 LIVE TRADING DISABLED - execution stage is skipped');
  }

  return instance;
}

/**
 * Asks the loop to stop. Before the orchestrator exists the request is
 * held and applied as soon as it is constructed.
 */
function requestStop(reason: ShutdownReason): void {
  if (orchestrator) {
    orchestrator.interrupt(reason);
  } else {
    pendingStop = reason;
  }
}

function getOrchestrator(): Orchestrator | null {
  return orchestrator;
}

/**
 * Stops the loop, persists shutdown state and releases the store.
 */
async function shutdown(reason: ShutdownReason): Promise<void> {
  if (orchestrator) {
    await orchestrator.shutdown(reason);
  }

  try {
    await store?.close?.();
  } catch (error) {
    logger.error('Error closing state store', { error: getErrorMessage(error) });
  }
}

// =============================================================================
// SIGNAL HANDLERS
// =============================================================================

function registerSignalHandlers(): void {
  const handleSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, stopping after the current cycle...`);
    requestStop(ShutdownReason.SIGNAL);
  };

  process.on('SIGINT', handleSignal);
  process.on('SIGTERM', handleSignal);

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
    });
  });
}

// =============================================================================
// MAIN
// =============================================================================

async function main(): Promise<number> {
  orchestrator = null;
  store = null;
  pendingStop = null;
  registerSignalHandlers();

  let instance: Orchestrator;
  try {
    instance = await initializeOrchestrator();
  } catch (error) {
    logger.error('Failed to initialize orchestrator', {
      error: getErrorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    await shutdown(ShutdownReason.CRITICAL_ERROR);
    return 1;
  }

  logger.info('Press Ctrl+C to stop.');

  try {
    const result = await instance.run();
    await shutdown(result.reason);
    return 0;
  } catch (error) {
    const reason =
      error instanceof RetryLimitExceededError
        ? ShutdownReason.RETRY_LIMIT
        : ShutdownReason.CRITICAL_ERROR;
    logger.error('Orchestrator loop aborted', { error: getErrorMessage(error) });
    await shutdown(reason);
    return 1;
  }
}

// Run if executed directly
if (require.main === module) {
  main()
    .then((code) => {
      process.exit(code);
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}

// Export for testing
export { initializeOrchestrator, shutdown, main, requestStop, getOrchestrator };
