/**
 * UPLIFT: agent runtime with permissioned memory, orchestration and
 * human approvals.
 */

export { VERSION, NAME } from './version.js';

// Core
export { ConfigManager, PROJECT_CONFIG_FILE } from './core/config.js';
export { createLogger, getLogger, setLogger, getSubsystemLogger } from './core/logger.js';
export { openDatabase, databasePath } from './core/database.js';
export type { SqliteDatabase } from './core/database.js';
export { EventBus } from './core/events.js';
export * from './core/errors.js';
export * from './core/types.js';

// Subsystems
export * from './manifest/index.js';
export * from './memory/index.js';
export * from './sessions/index.js';
export * from './approvals/index.js';
export * from './orchestration/index.js';
export * from './controller/index.js';
export * from './api/index.js';
export * from './client/index.js';
export * from './runtime/index.js';
