export { Runtime } from './runtime.js';
export type { RuntimeOptions } from './runtime.js';
export { adminKeyPath, readAdminKey, resolveAdminKey, ADMIN_KEY_FILE } from './admin-key.js';
