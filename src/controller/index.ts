export { MasterController } from './controller.js';
export type { MasterControllerDeps } from './controller.js';
export { ChildProcessLauncher } from './launcher.js';
export { KillSwitch } from './kill-switch.js';
export type { KillSwitchOptions, EmergencyStopResult, GracefulShutdownResult } from './kill-switch.js';
export { MessageBus } from './message-bus.js';
export type { BusMessage, MessageType, MessageHandler, MessageFilter } from './message-bus.js';
export { EventLog } from './event-log.js';
export type { EventRecord } from './event-log.js';
export * from './types.js';
