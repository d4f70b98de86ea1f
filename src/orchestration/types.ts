import type { AgentManifest } from '../manifest/types.js';
import type { ManifestLookup } from '../memory/access.js';

export type TaskPriority = 'low' | 'normal' | 'high' | 'critical';

export const PRIORITY_WEIGHTS: Record<TaskPriority, number> = {
  low: 1,
  normal: 5,
  high: 8,
  critical: 10,
};

export type TaskStatus =
  | 'awaiting_approval'
  | 'pending'
  | 'running'
  | 'completed'
  | 'failed'
  | 'cancelled';

export const FINAL_TASK_STATUSES: readonly TaskStatus[] = ['completed', 'failed', 'cancelled'];

export interface Task {
  id: string;
  /** Delegating agent id, or the operator name */
  from: string;
  target: string;
  objective: string;
  inputData: Record<string, unknown>;
  /** Canonical scope URIs the target may read while the task is open */
  sharedScopes: string[];
  priority: TaskPriority;
  status: TaskStatus;
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
  outputMemoryKey: string | null;
  error: string | null;
  approvalRequestId: string | null;
}

export interface DelegateRequest {
  targetAgentId: string;
  objective: string;
  inputData?: Record<string, unknown>;
  sharedScopes?: string[];
  priority?: TaskPriority;
}

export interface CompleteRequest {
  taskId: string;
  status: 'success' | 'failure';
  outputMemoryKey?: string;
  error?: string;
}

export interface TaskFilter {
  status?: TaskStatus;
  /** Matches either side of the delegation */
  agent?: string;
  limit?: number;
}

export interface DirectoryEntry {
  id: string;
  name: string;
  description: string;
  version: string;
  capabilities: string[];
  status: string;
}

/** Registry of known agents, as seen by the gateway. */
export interface AgentDirectory extends ManifestLookup {
  getManifest(agentId: string): AgentManifest | undefined;
  listAgents(): DirectoryEntry[];
}

export function isTaskPriority(value: unknown): value is TaskPriority {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(PRIORITY_WEIGHTS, value);
}

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string'
    && ['awaiting_approval', 'pending', 'running', 'completed', 'failed', 'cancelled'].includes(value);
}
