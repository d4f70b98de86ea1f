/**
 * AgentClient: SDK for agents written in TypeScript.
 *
 * The runtime injects UPLIFT_API_URL and UPLIFT_SESSION_TOKEN into every
 * agent it launches; `AgentClient.fromEnv()` picks them up.
 *
 * @example
 * ```ts
 * const client = AgentClient.fromEnv();
 * await client.store('uplift://agent/private', 'note', 'hello');
 * ```
 */

import { ConfigError } from '../core/errors.js';
import type { RiskLevel } from '../core/types.js';
import type { TaskPriority } from '../orchestration/types.js';
import { sleep } from '../utils/retry.js';
import { HttpClient, parseResponse, toApiError } from './http.js';
import {
  ApprovalRefSchema,
  ApprovalSchema,
  DirectoryResponseSchema,
  EntrySchema,
  QueryResponseSchema,
  StoreResponseSchema,
  TaskRefSchema,
  TaskSchema,
  type Approval,
  type ApprovalRef,
  type DirectoryAgent,
  type Entry,
  type QueryResult,
  type StoreResponse,
  type TaskContext,
  type TaskRef,
} from './schemas.js';

export const PRIVATE_SCOPE_URI = 'uplift://agent/private';

export interface AgentClientOptions {
  apiUrl: string;
  token: string;
  retries?: number;
  fetch?: typeof fetch;
}

export interface DelegateOptions {
  targetAgentId: string;
  objective: string;
  inputData?: Record<string, unknown>;
  sharedScopes?: string[];
  priority?: TaskPriority;
}

export interface CompleteOptions {
  taskId: string;
  status: 'success' | 'failure';
  outputMemoryKey?: string;
  error?: string;
}

export interface ApprovalOptions {
  action: string;
  details?: Record<string, unknown>;
  riskLevel?: RiskLevel;
  category?: string;
  /** Seconds */
  timeout?: number;
}

export class AgentClient {
  private readonly http: HttpClient;

  constructor(options: AgentClientOptions) {
    this.http = new HttpClient({
      baseUrl: options.apiUrl,
      token: options.token,
      retries: options.retries,
      fetch: options.fetch,
    });
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env): AgentClient {
    const apiUrl = env.UPLIFT_API_URL;
    const token = env.UPLIFT_SESSION_TOKEN;
    if (!apiUrl || !token) {
      throw new ConfigError('UPLIFT_API_URL and UPLIFT_SESSION_TOKEN must be set; agents are launched by the runtime');
    }
    return new AgentClient({ apiUrl, token });
  }

  // ─── Memory ───

  store(scope: string, key: string, value: unknown): Promise<StoreResponse> {
    return this.http.request('POST', '/memory/store', StoreResponseSchema, { scope, key, value });
  }

  /** Null when the key does not exist. */
  async get(scope: string, key: string): Promise<Entry | null> {
    const path = `/memory/get?${new URLSearchParams({ scope, key }).toString()}`;
    const response = await this.http.raw('GET', path);
    if (response.status === 404) return null;
    if (response.status !== 200) throw toApiError('GET', path, response);
    return parseResponse(EntrySchema, response, `GET ${path}`);
  }

  async query(query: string, scopes: string[], limit?: number): Promise<QueryResult[]> {
    const body = await this.http.request(
      'POST',
      '/memory/query',
      QueryResponseSchema,
      { query, scopes, limit },
      { idempotent: true },
    );
    return body.results;
  }

  // ─── Orchestration ───

  async directory(): Promise<DirectoryAgent[]> {
    const body = await this.http.request('GET', '/orchestrate/directory', DirectoryResponseSchema);
    return body.agents;
  }

  delegate(options: DelegateOptions): Promise<TaskRef> {
    return this.http.request('POST', '/orchestrate/delegate', TaskRefSchema, {
      target_agent_id: options.targetAgentId,
      objective: options.objective,
      input_data: options.inputData,
      shared_scopes: options.sharedScopes,
      priority: options.priority,
    });
  }

  /** The task this agent should work on, or null when idle. */
  async currentTask(): Promise<TaskContext | null> {
    const response = await this.http.raw('GET', '/orchestrate/current_task');
    if (response.status === 204) return null;
    if (response.status !== 200) throw toApiError('GET', '/orchestrate/current_task', response);
    return parseResponse(TaskSchema, response, 'GET /orchestrate/current_task');
  }

  complete(options: CompleteOptions): Promise<TaskRef> {
    return this.http.request('POST', '/orchestrate/complete', TaskRefSchema, {
      task_id: options.taskId,
      status: options.status,
      output_memory_key: options.outputMemoryKey,
      error: options.error,
    });
  }

  // ─── Approvals ───

  requestApproval(options: ApprovalOptions): Promise<ApprovalRef> {
    return this.http.request('POST', '/approvals/request', ApprovalRefSchema, {
      action: options.action,
      details: options.details,
      risk_level: options.riskLevel,
      category: options.category,
      timeout: options.timeout,
    });
  }

  getApproval(requestId: string): Promise<Approval> {
    return this.http.request('GET', `/approvals/${encodeURIComponent(requestId)}`, ApprovalSchema);
  }

  /** Poll until the request is decided, expired or cancelled. */
  async waitForApproval(
    requestId: string,
    options: { pollIntervalMs?: number; signal?: AbortSignal } = {},
  ): Promise<Approval> {
    const pollIntervalMs = options.pollIntervalMs ?? 5000;
    for (;;) {
      const approval = await this.getApproval(requestId);
      if (approval.status !== 'pending') return approval;
      await sleep(pollIntervalMs, options.signal);
    }
  }
}
