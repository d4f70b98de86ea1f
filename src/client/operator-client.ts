/**
 * OperatorClient: the operator API under /api, used by the CLI.
 */

import { z } from 'zod';
import { ApiRequestError } from '../core/errors.js';
import { HttpClient } from './http.js';
import {
  AgentActionSchema,
  AgentListSchema,
  ApprovalSchema,
  HealthSchema,
  KillResponseSchema,
  type AgentAction,
  type AgentInfo,
  type Approval,
  type Health,
  type KillResponse,
} from './schemas.js';

const ApprovalListSchema = z.object({ requests: z.array(ApprovalSchema) });

export interface OperatorClientOptions {
  apiUrl: string;
  adminKey?: string;
  fetch?: typeof fetch;
}

export class OperatorClient {
  private readonly http: HttpClient;

  constructor(options: OperatorClientOptions) {
    this.http = new HttpClient({
      baseUrl: options.apiUrl,
      token: options.adminKey,
      retries: 0,
      fetch: options.fetch,
    });
  }

  health(): Promise<Health> {
    return this.http.request('GET', '/api/health', HealthSchema);
  }

  /** True when a runtime answers on the configured URL. */
  async isReachable(): Promise<boolean> {
    try {
      await this.health();
      return true;
    } catch (err) {
      if (err instanceof ApiRequestError || err instanceof TypeError) return false;
      throw err;
    }
  }

  async listAgents(): Promise<AgentInfo[]> {
    const body = await this.http.request('GET', '/api/agents', AgentListSchema);
    return body.agents;
  }

  startAgent(name: string): Promise<AgentAction> {
    return this.http.request('POST', `/api/agents/${encodeURIComponent(name)}/start`, AgentActionSchema);
  }

  stopAgent(name: string): Promise<AgentAction> {
    return this.http.request('POST', `/api/agents/${encodeURIComponent(name)}/stop`, AgentActionSchema);
  }

  async pendingApprovals(): Promise<Approval[]> {
    const body = await this.http.request('GET', '/api/approvals?status=pending', ApprovalListSchema);
    return body.requests;
  }

  approve(requestId: string, approver?: string, comment?: string): Promise<Approval> {
    return this.http.request('POST', `/api/approvals/${encodeURIComponent(requestId)}/approve`, ApprovalSchema, {
      approver,
      comment,
    });
  }

  deny(requestId: string, approver?: string, reason?: string): Promise<Approval> {
    return this.http.request('POST', `/api/approvals/${encodeURIComponent(requestId)}/deny`, ApprovalSchema, {
      approver,
      reason,
    });
  }

  kill(mode: 'emergency' | 'graceful', reason?: string): Promise<KillResponse> {
    return this.http.request('POST', '/api/kill', KillResponseSchema, { mode, reason });
  }
}
