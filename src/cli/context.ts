/**
 * Shared CLI plumbing: config loading, logger setup, database and API access.
 */

import { resolve } from 'path';
import { OperatorClient } from '../client/operator-client.js';
import { ConfigManager } from '../core/config.js';
import { databasePath, openDatabase, type SqliteDatabase } from '../core/database.js';
import { createLogger, setLogger } from '../core/logger.js';
import type { ConfigOverrides, UpliftConfig } from '../core/types.js';
import { readAdminKey } from '../runtime/admin-key.js';

export interface ProjectOptions {
  dir: string;
}

export function loadConfig(options: ProjectOptions, overrides?: ConfigOverrides): UpliftConfig {
  return new ConfigManager(resolve(options.dir)).load(overrides);
}

export function configureLogging(config: UpliftConfig, verbose = false): void {
  setLogger(createLogger('uplift', {
    verbose: verbose || config.logging.pretty,
    level: config.logging.level,
  }));
}

export function openRuntimeDatabase(config: UpliftConfig): SqliteDatabase {
  return openDatabase(databasePath(config.runtime.dataDir));
}

export function apiUrl(config: UpliftConfig): string {
  const host = config.runtime.host === '0.0.0.0' ? '127.0.0.1' : config.runtime.host;
  return `http://${host}:${config.runtime.port}`;
}

export function operatorClient(config: UpliftConfig): OperatorClient {
  return new OperatorClient({
    apiUrl: apiUrl(config),
    adminKey: config.runtime.adminKey ?? readAdminKey(config.runtime.dataDir) ?? undefined,
  });
}

/** Run `fn` against the runtime database, closing it afterwards. */
export function withDatabase<T>(config: UpliftConfig, fn: (db: SqliteDatabase) => T): T {
  const db = openRuntimeDatabase(config);
  try {
    return fn(db);
  } finally {
    db.close();
  }
}

export function formatTimestamp(ms: number | null): string {
  return ms === null ? '-' : new Date(ms).toISOString().replace('T', ' ').slice(0, 19);
}
