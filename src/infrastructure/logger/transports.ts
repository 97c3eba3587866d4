/**
 * Logger Transports
 *
 * Console output plus daily-rotated JSON files: a combined log, an
 * error-only log, and one file per component under `components/`.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';

// npm levels already have colors; trace does not
winston.addColors({ trace: 'magenta' });

// =============================================================================
// FORMATS
// =============================================================================

export const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

/**
 * `12:00:00.000 info [orchestrator] Cycle completed {"cycleNumber":3}`
 */
export const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ level, message, timestamp, component, ...meta }) => {
    const prefix = component ? ` [${String(component)}]` : '';
    const suffix = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${prefix} ${String(message)}${suffix}`;
  })
);

// =============================================================================
// TRANSPORT FACTORY
// =============================================================================

export interface TransportOptions {
  logDir: string;
  level: string;
  retentionDays: number;
  logToConsole: boolean;
  logToFile: boolean;
}

interface RotatingFileSpec {
  dirname: string;
  /** Prefix before `-%DATE%.log` */
  prefix: string;
  level: string;
  maxSize: string;
}

function rotatingFile(options: TransportOptions, spec: RotatingFileSpec): winston.transport {
  if (!fs.existsSync(spec.dirname)) {
    fs.mkdirSync(spec.dirname, { recursive: true });
  }

  return new DailyRotateFile({
    dirname: spec.dirname,
    filename: `${spec.prefix}-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    level: spec.level,
    format: jsonFormat,
    maxFiles: `${options.retentionDays}d`,
    maxSize: spec.maxSize,
    zippedArchive: true,
  });
}

/**
 * Transports for the main logger. Empty when both outputs are disabled.
 */
export function createTransports(options: TransportOptions): winston.transport[] {
  const transports: winston.transport[] = [];

  if (options.logToConsole) {
    transports.push(new winston.transports.Console({ level: options.level, format: consoleFormat }));
  }

  if (options.logToFile) {
    transports.push(
      rotatingFile(options, {
        dirname: options.logDir,
        prefix: 'combined',
        level: options.level,
        maxSize: '100m',
      }),
      rotatingFile(options, {
        dirname: options.logDir,
        prefix: 'error',
        level: 'error',
        maxSize: '50m',
      })
    );
  }

  return transports;
}

/**
 * Per-component file, or null when file logging is off
 */
export function createComponentTransport(
  options: TransportOptions,
  componentName: string
): winston.transport | null {
  if (!options.logToFile) {
    return null;
  }

  return rotatingFile(options, {
    dirname: path.join(options.logDir, 'components'),
    // Sub-component names contain ':'
    prefix: componentName.replace(/[^\w.-]/g, '_'),
    level: options.level,
    maxSize: '50m',
  });
}
