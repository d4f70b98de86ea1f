export { OrchestrationGateway } from './gateway.js';
export type { GatewayOptions } from './gateway.js';
export * from './types.js';
