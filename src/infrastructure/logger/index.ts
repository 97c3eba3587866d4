/**
 * Structured Logger
 *
 * Logging infrastructure with:
 * - Structured JSON logging for analysis
 * - Daily file rotation
 * - Component-specific loggers
 * - Sensitive data sanitization
 */

import winston from 'winston';
import { getEnvConfig } from '../../config/env.js';
import { sanitizeObject } from '../../utils/formatting.js';
import {
  createTransports,
  createComponentTransport,
  type TransportOptions,
} from './transports.js';

// =============================================================================
// TYPES
// =============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface LogMeta {
  component?: string;
  [key: string]: unknown;
}

// =============================================================================
// SENSITIVE KEYS (for sanitization)
// =============================================================================

const SENSITIVE_KEYS = [
  'password',
  'apiKey',
  'token',
  'secret',
  'authorization',
  'credentials',
  'databaseUrl',
  'connectionString',
];

/** winston's npm levels plus trace */
const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

// =============================================================================
// LOGGER CLASS
// =============================================================================

class Logger {
  private mainLogger: winston.Logger;
  private componentLoggers: Map<string, winston.Logger> = new Map();
  private options: TransportOptions;
  private initialized = false;

  constructor() {
    this.options = {
      logDir: './data/logs',
      level: 'info',
      retentionDays: 30,
      logToConsole: process.env.LOG_TO_CONSOLE !== 'false',
      logToFile: false,
    };

    // Minimal logger until initialize() runs
    this.mainLogger = buildLogger(this.options.level, createTransports(this.options));
  }

  /**
   * Initializes the logger with configuration.
   * Should be called after environment validation.
   */
  initialize(): void {
    if (this.initialized) {
      return;
    }

    try {
      const env = getEnvConfig();

      this.options = {
        logDir: env.LOG_DIR,
        level: env.LOG_LEVEL,
        retentionDays: env.LOG_RETENTION_DAYS,
        logToConsole: env.LOG_TO_CONSOLE,
        logToFile: env.LOG_TO_FILE,
      };

      this.mainLogger = buildLogger(this.options.level, createTransports(this.options));

      // Component loggers created before initialization pick up the new options
      this.componentLoggers.clear();

      this.initialized = true;
      this.debug('Logger initialized', { options: this.options });
    } catch (error) {
      // Fallback to console if initialization fails
      console.error('Failed to initialize logger:', error);
    }
  }

  /**
   * Gets or creates a component-specific logger
   */
  getComponentLogger(componentName: string): ComponentLogger {
    return new ComponentLogger(componentName, () => this.resolveComponentLogger(componentName));
  }

  // ---------------------------------------------------------------------------
  // Logging Methods
  // ---------------------------------------------------------------------------

  error(message: string, meta?: LogMeta): void {
    this.log('error', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }

  trace(message: string, meta?: LogMeta): void {
    this.log('trace', message, meta);
  }

  // ---------------------------------------------------------------------------
  // Internal Methods
  // ---------------------------------------------------------------------------

  private resolveComponentLogger(componentName: string): winston.Logger {
    const existing = this.componentLoggers.get(componentName);
    if (existing) {
      return existing;
    }

    const transport = createComponentTransport(this.options, componentName);
    const transports: winston.transport[] = transport
      ? [transport, ...createTransports({ ...this.options, logToFile: false })]
      : createTransports(this.options);

    const componentLogger = buildLogger(this.options.level, transports, componentName);
    this.componentLoggers.set(componentName, componentLogger);
    return componentLogger;
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    const sanitizedMeta = meta ? sanitizeObject(meta, SENSITIVE_KEYS) : {};
    this.mainLogger.log(level, message, sanitizedMeta);
  }
}

// =============================================================================
// COMPONENT LOGGER CLASS
// =============================================================================

/**
 * Logger instance for a specific component.
 * Automatically adds component name to all log entries.
 */
export class ComponentLogger {
  constructor(
    private componentName: string,
    private resolve: () => winston.Logger
  ) {}

  get name(): string {
    return this.componentName;
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log('trace', message, meta);
  }

  /**
   * Creates a logger for a sub-component, e.g. `orchestrator:dataProcessor`
   */
  child(name: string): ComponentLogger {
    return logger.getComponentLogger(`${this.componentName}:${name}`);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    const sanitizedMeta = meta ? sanitizeObject(meta, SENSITIVE_KEYS) : {};
    this.resolve().log(level, message, sanitizedMeta);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function buildLogger(
  level: string,
  transports: winston.transport[],
  component?: string
): winston.Logger {
  return winston.createLogger({
    levels: LEVELS,
    level,
    defaultMeta: component ? { component } : undefined,
    transports,
    // winston complains about writes with no transports
    silent: transports.length === 0,
    exitOnError: false,
  });
}

// =============================================================================
// SINGLETON EXPORT
// =============================================================================

export const logger = new Logger();

// Export convenience methods bound to the singleton
export const getComponentLogger = (name: string) => logger.getComponentLogger(name);
export const initializeLogger = () => logger.initialize();
