/**
 * Response schemas for the gateway API, used to validate what the runtime
 * sends back before handing it to agent code.
 */

import { z } from 'zod';
import { RiskLevelSchema } from '../core/types.js';

const TaskStatusSchema = z.enum(['awaiting_approval', 'pending', 'running', 'completed', 'failed', 'cancelled']);
const ApprovalStatusSchema = z.enum(['pending', 'approved', 'denied', 'expired', 'cancelled']);

export const ErrorBodySchema = z.object({
  error: z.string(),
  code: z.string(),
  details: z.unknown().optional(),
});

export const StoreResponseSchema = z.object({
  scope: z.string(),
  key: z.string(),
  updated_at: z.number(),
});

export const EntrySchema = z.object({
  scope: z.string(),
  key: z.string(),
  value: z.unknown(),
  written_by: z.string(),
  created_at: z.number(),
  updated_at: z.number(),
});

export const QueryResponseSchema = z.object({
  results: z.array(z.object({
    scope: z.string(),
    key: z.string(),
    value: z.unknown(),
    score: z.number(),
    updated_at: z.number(),
  })),
});

export const DirectoryResponseSchema = z.object({
  agents: z.array(z.object({
    id: z.string(),
    name: z.string(),
    description: z.string(),
    version: z.string(),
    capabilities: z.array(z.string()),
    status: z.string(),
  })),
});

export const TaskRefSchema = z.object({
  task_id: z.string(),
  status: TaskStatusSchema,
});

export const TaskSchema = z.object({
  task_id: z.string(),
  from: z.string(),
  target_agent_id: z.string(),
  objective: z.string(),
  input_data: z.record(z.unknown()),
  shared_scopes: z.array(z.string()),
  priority: z.enum(['low', 'normal', 'high', 'critical']),
  status: TaskStatusSchema,
  created_at: z.number(),
  started_at: z.number().nullable(),
  completed_at: z.number().nullable(),
  output_memory_key: z.string().nullable(),
  error: z.string().nullable(),
  approval_request_id: z.string().nullable(),
});

export const ApprovalRefSchema = z.object({
  request_id: z.string(),
  status: ApprovalStatusSchema,
  timeout_at: z.number(),
});

export const ApprovalSchema = z.object({
  request_id: z.string(),
  agent: z.string(),
  action: z.string(),
  details: z.record(z.unknown()),
  risk_level: RiskLevelSchema,
  category: z.string().nullable(),
  status: ApprovalStatusSchema,
  created_at: z.number(),
  timeout_at: z.number(),
  approved_by: z.string().nullable(),
  approved_at: z.number().nullable(),
  denial_reason: z.string().nullable(),
  comment: z.string().nullable(),
});

export type StoreResponse = z.infer<typeof StoreResponseSchema>;
export type Entry = z.infer<typeof EntrySchema>;
export type QueryResult = z.infer<typeof QueryResponseSchema>['results'][number];
export type DirectoryAgent = z.infer<typeof DirectoryResponseSchema>['agents'][number];
export type TaskRef = z.infer<typeof TaskRefSchema>;
export type TaskContext = z.infer<typeof TaskSchema>;
export type ApprovalRef = z.infer<typeof ApprovalRefSchema>;
export type Approval = z.infer<typeof ApprovalSchema>;

// ─── Operator API ───────────────────────────────────────────

export const HealthSchema = z.object({
  status: z.literal('ok'),
  version: z.string(),
  uptime: z.number(),
  agents: z.object({ total: z.number(), running: z.number() }),
  pendingApprovals: z.number(),
});

export const AgentInfoSchema = z.object({
  name: z.string(),
  description: z.string(),
  version: z.string(),
  status: z.string(),
  pid: z.number().nullable(),
  priority: z.number(),
  restart_count: z.number(),
  started_at: z.number().nullable(),
  last_health_check: z.number().nullable(),
  exit_code: z.number().nullable(),
  last_error: z.string().nullable(),
});

export const AgentListSchema = z.object({ agents: z.array(AgentInfoSchema) });

export const AgentActionSchema = z.object({
  agent: AgentInfoSchema,
  started: z.boolean().optional(),
  stopped: z.boolean().optional(),
});

export const KillResponseSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('emergency'),
    killed: z.array(z.object({ name: z.string(), pid: z.number().nullable() })),
    log_file: z.string(),
  }),
  z.object({
    mode: z.literal('graceful'),
    stopped: z.array(z.string()),
  }),
]);

export type Health = z.infer<typeof HealthSchema>;
export type AgentInfo = z.infer<typeof AgentInfoSchema>;
export type AgentAction = z.infer<typeof AgentActionSchema>;
export type KillResponse = z.infer<typeof KillResponseSchema>;
