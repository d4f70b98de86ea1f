export { AgentClient, PRIVATE_SCOPE_URI } from './agent-client.js';
export type { AgentClientOptions, DelegateOptions, CompleteOptions, ApprovalOptions } from './agent-client.js';
export { OperatorClient } from './operator-client.js';
export type { OperatorClientOptions } from './operator-client.js';
export { HttpClient } from './http.js';
export type {
  Approval,
  ApprovalRef,
  AgentAction,
  AgentInfo,
  DirectoryAgent,
  Entry,
  Health,
  KillResponse,
  QueryResult,
  StoreResponse,
  TaskContext,
  TaskRef,
} from './schemas.js';
