import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { generateAdminKey } from '../api/auth.js';
import { writeFileSafe } from '../utils/fs.js';

export const ADMIN_KEY_FILE = 'admin.key';

export function adminKeyPath(dataDir: string): string {
  return join(dataDir, ADMIN_KEY_FILE);
}

/** The operator key stored beside the database, or null if none was written yet. */
export function readAdminKey(dataDir: string): string | null {
  const path = adminKeyPath(dataDir);
  if (!existsSync(path)) return null;
  const key = readFileSync(path, 'utf-8').trim();
  return key.length > 0 ? key : null;
}

/**
 * Configured key if any, otherwise the stored one, otherwise a fresh key
 * written to `<dataDir>/admin.key` (mode 0600) for the local CLI.
 */
export function resolveAdminKey(dataDir: string, configured?: string): string {
  if (configured) return configured;
  const existing = readAdminKey(dataDir);
  if (existing) return existing;

  const key = generateAdminKey();
  writeFileSafe(adminKeyPath(dataDir), `${key}\n`, 0o600);
  return key;
}
