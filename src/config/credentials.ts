/**
 * Credentials File
 *
 * JSON object of string secrets read from the configured credential path.
 * An optional `databaseUrl` selects the PostgreSQL state store.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

const credentialsSchema = z
  .object({
    databaseUrl: z.string().url('databaseUrl must be a valid PostgreSQL URL').optional(),
  })
  .catchall(z.string());

export type Credentials = Readonly<z.infer<typeof credentialsSchema>>;

/**
 * Reads and validates the credentials file.
 *
 * @throws {ConfigurationError} When the file is missing, malformed or invalid
 */
export function loadCredentials(filePath: string): Credentials {
  const resolved = path.resolve(filePath);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot load credentials from ${resolved}: ${reason}`, {
      path: resolved,
    });
  }

  const result = credentialsSchema.safeParse(raw);
  if (!result.success) {
    // Keys only; values are secrets
    const keys = result.error.errors.map(e => e.path.join('.') || '(root)');
    throw new ConfigurationError(`Invalid credentials file ${resolved}`, { path: resolved, keys });
  }

  return Object.freeze(result.data);
}
