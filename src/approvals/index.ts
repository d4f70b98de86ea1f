export { ApprovalService, toOutcome } from './service.js';
export type { ApprovalServiceOptions, WaitOptions } from './service.js';
export { ApprovalDatabase } from './database.js';
export * from './types.js';
