/**
 * Gateway HTTP API: wire types and request schemas.
 *
 * Field names on the wire are snake_case; timestamps are epoch milliseconds.
 */

import { z } from 'zod';
import type { ApprovalService } from '../approvals/service.js';
import type { ApprovalRequest, ApprovalStatus } from '../approvals/types.js';
import type { EventLog } from '../controller/event-log.js';
import type { MasterController } from '../controller/controller.js';
import type { KillSwitch } from '../controller/kill-switch.js';
import type { AgentRecord, AgentStatus } from '../controller/types.js';
import { RiskLevelSchema, type RiskLevel } from '../core/types.js';
import type { MemoryEntry, MemoryQueryResult } from '../memory/types.js';
import type { MemoryStore } from '../memory/store.js';
import type { OrchestrationGateway } from '../orchestration/gateway.js';
import type { DirectoryEntry, Task, TaskPriority, TaskStatus } from '../orchestration/types.js';
import type { SessionRegistry } from '../sessions/session-registry.js';

// ─── Server Config ──────────────────────────────────────────

export interface RuntimeServerConfig {
  host: string;
  port: number;
  /** Operator bearer key; operator endpoints answer 401 without it */
  adminKey?: string;
  corsOrigins?: string[];
  maxRequestBytes?: number;
}

export interface RuntimeServices {
  memory: MemoryStore;
  gateway: OrchestrationGateway;
  approvals: ApprovalService;
  controller: MasterController;
  sessions: SessionRegistry;
  killSwitch: KillSwitch;
  events: EventLog;
}

// ─── Request Bodies ─────────────────────────────────────────

const PrioritySchema = z.enum(['low', 'normal', 'high', 'critical']);

export const StoreBodySchema = z.object({
  scope: z.string().min(1),
  key: z.string().min(1),
  value: z.unknown(),
});

export const QueryBodySchema = z.object({
  query: z.string().default(''),
  scopes: z.array(z.string().min(1)).min(1),
  limit: z.number().int().positive().max(1000).optional(),
});

export const DelegateBodySchema = z.object({
  target_agent_id: z.string().min(1),
  objective: z.string().min(1),
  input_data: z.record(z.unknown()).optional(),
  shared_scopes: z.array(z.string().min(1)).optional(),
  priority: PrioritySchema.optional(),
});

export const CompleteBodySchema = z.object({
  task_id: z.string().min(1),
  status: z.enum(['success', 'failure']),
  output_memory_key: z.string().min(1).optional(),
  error: z.string().optional(),
});

export const ApprovalBodySchema = z.object({
  action: z.string().min(1),
  details: z.record(z.unknown()).optional(),
  risk_level: RiskLevelSchema.optional(),
  category: z.string().min(1).optional(),
  /** Seconds */
  timeout: z.number().positive().optional(),
});

export const DecisionBodySchema = z.object({
  approver: z.string().min(1).optional(),
  comment: z.string().optional(),
  reason: z.string().optional(),
});

export const KillBodySchema = z.object({
  mode: z.enum(['emergency', 'graceful']),
  reason: z.string().optional(),
  timeout_ms: z.number().int().positive().optional(),
});

export type StoreBody = z.infer<typeof StoreBodySchema>;
export type QueryBody = z.input<typeof QueryBodySchema>;
export type DelegateBody = z.infer<typeof DelegateBodySchema>;
export type CompleteBody = z.infer<typeof CompleteBodySchema>;
export type ApprovalBody = z.infer<typeof ApprovalBodySchema>;
export type KillBody = z.infer<typeof KillBodySchema>;

// ─── Responses ──────────────────────────────────────────────

export interface MemoryEntryPayload {
  scope: string;
  key: string;
  value: unknown;
  written_by: string;
  created_at: number;
  updated_at: number;
}

export interface MemoryResultPayload {
  scope: string;
  key: string;
  value: unknown;
  score: number;
  updated_at: number;
}

export interface TaskPayload {
  task_id: string;
  from: string;
  target_agent_id: string;
  objective: string;
  input_data: Record<string, unknown>;
  shared_scopes: string[];
  priority: TaskPriority;
  status: TaskStatus;
  created_at: number;
  started_at: number | null;
  completed_at: number | null;
  output_memory_key: string | null;
  error: string | null;
  approval_request_id: string | null;
}

export interface ApprovalPayload {
  request_id: string;
  agent: string;
  action: string;
  details: Record<string, unknown>;
  risk_level: RiskLevel;
  category: string | null;
  status: ApprovalStatus;
  created_at: number;
  timeout_at: number;
  approved_by: string | null;
  approved_at: number | null;
  denial_reason: string | null;
  comment: string | null;
}

export interface AgentPayload {
  name: string;
  description: string;
  version: string;
  status: AgentStatus;
  pid: number | null;
  priority: number;
  restart_count: number;
  started_at: number | null;
  last_health_check: number | null;
  exit_code: number | null;
  last_error: string | null;
}

export interface HealthResponse {
  status: 'ok';
  version: string;
  uptime: number;
  agents: { total: number; running: number };
  pendingApprovals: number;
}

export interface DirectoryResponse {
  agents: DirectoryEntry[];
}

export interface APIError {
  error: string;
  code: string;
  details?: unknown;
}

// ─── Mappers ────────────────────────────────────────────────

export function toEntryPayload(entry: MemoryEntry): MemoryEntryPayload {
  return {
    scope: entry.scope,
    key: entry.key,
    value: entry.value,
    written_by: entry.writtenBy,
    created_at: entry.createdAt,
    updated_at: entry.updatedAt,
  };
}

export function toResultPayload(result: MemoryQueryResult): MemoryResultPayload {
  return {
    scope: result.scope,
    key: result.key,
    value: result.value,
    score: result.score,
    updated_at: result.updatedAt,
  };
}

export function toTaskPayload(task: Task): TaskPayload {
  return {
    task_id: task.id,
    from: task.from,
    target_agent_id: task.target,
    objective: task.objective,
    input_data: task.inputData,
    shared_scopes: task.sharedScopes,
    priority: task.priority,
    status: task.status,
    created_at: task.createdAt,
    started_at: task.startedAt,
    completed_at: task.completedAt,
    output_memory_key: task.outputMemoryKey,
    error: task.error,
    approval_request_id: task.approvalRequestId,
  };
}

export function toApprovalPayload(request: ApprovalRequest): ApprovalPayload {
  return {
    request_id: request.id,
    agent: request.agent,
    action: request.action,
    details: request.details,
    risk_level: request.riskLevel,
    category: request.category,
    status: request.status,
    created_at: request.createdAt,
    timeout_at: request.timeoutAt,
    approved_by: request.approvedBy,
    approved_at: request.approvedAt,
    denial_reason: request.denialReason,
    comment: request.comment,
  };
}

export function toAgentPayload(record: AgentRecord): AgentPayload {
  return {
    name: record.name,
    description: record.manifest.description,
    version: record.manifest.version,
    status: record.status,
    pid: record.pid,
    priority: record.manifest.priority,
    restart_count: record.restartCount,
    started_at: record.startedAt,
    last_health_check: record.lastHealthCheck,
    exit_code: record.exitCode,
    last_error: record.lastError,
  };
}
