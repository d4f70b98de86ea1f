/**
 * Gateway HTTP Server
 *
 * The runtime's single HTTP surface: agent endpoints for memory,
 * orchestration and approvals, plus the operator API under /api.
 * Uses Node.js built-in http module.
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server } from 'node:http';
import type { z } from 'zod';
import {
  InvalidStateError,
  NotFoundError,
  PayloadTooLargeError,
  PermissionDeniedError,
  ScopeAccessError,
  UnauthorizedError,
  UpliftError,
  ValidationError,
  toError,
} from '../core/errors.js';
import { getSubsystemLogger } from '../core/logger.js';
import { principalName } from '../memory/access.js';
import type { Principal } from '../memory/types.js';
import { isTaskStatus } from '../orchestration/types.js';
import { VERSION } from '../version.js';
import { createAuthenticator, createCorsMiddleware, type Authenticator, type RequestHandler } from './auth.js';
import {
  ApprovalBodySchema,
  CompleteBodySchema,
  DecisionBodySchema,
  DelegateBodySchema,
  KillBodySchema,
  QueryBodySchema,
  StoreBodySchema,
  toAgentPayload,
  toApprovalPayload,
  toEntryPayload,
  toResultPayload,
  toTaskPayload,
  type APIError,
  type HealthResponse,
  type RuntimeServerConfig,
  type RuntimeServices,
} from './types.js';

const DEFAULT_MAX_REQUEST_BYTES = 1024 * 1024;

// ═══════════════════════════════════════════════════════════════
// GATEWAY SERVER
// ═══════════════════════════════════════════════════════════════

export class GatewayServer {
  private server: Server | null = null;
  private config: Required<RuntimeServerConfig>;
  private startedAt: number = 0;
  private middleware: RequestHandler[] = [];
  private authenticate: Authenticator;

  constructor(config: RuntimeServerConfig, private readonly services: RuntimeServices) {
    this.config = {
      host: config.host,
      port: config.port,
      adminKey: config.adminKey ?? '',
      corsOrigins: config.corsOrigins ?? ['*'],
      maxRequestBytes: config.maxRequestBytes ?? DEFAULT_MAX_REQUEST_BYTES,
    };

    this.middleware.push(createCorsMiddleware(this.config.corsOrigins));
    this.authenticate = createAuthenticator(services.sessions, this.config.adminKey || undefined);
  }

  /** Start listening; resolves with the base URL agents should use. */
  async start(): Promise<string> {
    return new Promise((resolve, reject) => {
      this.startedAt = Date.now();

      this.server = createServer((req, res) => {
        this.runMiddleware(req, res, 0, () => {
          this.handleRequest(req, res).catch(err => {
            getSubsystemLogger('api').error({ err }, 'Unhandled request failure');
            if (!res.headersSent) this.sendError(res, err);
          });
        });
      });

      this.server.once('error', reject);

      this.server.listen(this.config.port, this.config.host, () => {
        getSubsystemLogger('api').info({ url: this.url() }, 'Gateway listening');
        resolve(this.url());
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      const server = this.server;
      this.server = null;
      server.close(err => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  isRunning(): boolean {
    return this.server?.listening ?? false;
  }

  /** Base URL, with the bound port once listening. */
  url(): string {
    const address = this.server?.address();
    const port = address && typeof address === 'object' ? address.port : this.config.port;
    const host = this.config.host === '0.0.0.0' || this.config.host === '::' ? '127.0.0.1' : this.config.host;
    return `http://${host.includes(':') ? `[${host}]` : host}:${port}`;
  }

  // ─── Request Handling ─────────────────────────────────────

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', 'http://localhost');
    const method = req.method?.toUpperCase() || 'GET';
    const path = url.pathname.replace(/\/+$/, '') || '/';

    try {
      if (path === '/api/health' && method === 'GET') {
        return this.handleHealth(res);
      }

      const principal = this.authenticate(req);

      if (path === '/api' || path.startsWith('/api/')) {
        if (!principal) {
          throw new UnauthorizedError(this.config.adminKey ? 'Unauthorized' : 'Operator API is disabled: no admin key configured');
        }
        if (principal.kind !== 'operator') {
          throw new PermissionDeniedError('Operator credentials required');
        }
        return await this.handleOperator(method, path, url, req, res, principal);
      }

      if (!principal) {
        throw new UnauthorizedError();
      }
      return await this.handleAgent(method, path, url, req, res, principal);
    } catch (err) {
      this.sendError(res, err);
    } finally {
      getSubsystemLogger('api').debug({ method, path, status: res.statusCode }, 'Request handled');
    }
  }

  private async handleAgent(
    method: string,
    path: string,
    url: URL,
    req: IncomingMessage,
    res: ServerResponse,
    principal: Principal,
  ): Promise<void> {
    const { memory, gateway, approvals } = this.services;

    // ─── Memory ───
    if (path === '/memory/store' && method === 'POST') {
      const body = parseBody(StoreBodySchema, await this.readJson(req));
      const entry = memory.store(principal, body.scope, body.key, body.value);
      return this.sendJSON(res, 201, { scope: entry.scope, key: entry.key, updated_at: entry.updatedAt });
    }

    if (path === '/memory/get' && method === 'GET') {
      const scope = url.searchParams.get('scope');
      const key = url.searchParams.get('key');
      if (!scope || !key) {
        throw new ValidationError('Missing required query parameters: scope, key');
      }
      return this.sendJSON(res, 200, toEntryPayload(memory.get(principal, scope, key)));
    }

    if (path === '/memory/query' && method === 'POST') {
      const body = parseBody(QueryBodySchema, await this.readJson(req));
      const results = memory.query(principal, { text: body.query, scopes: body.scopes, limit: body.limit });
      return this.sendJSON(res, 200, { results: results.map(toResultPayload) });
    }

    // ─── Orchestration ───
    if (path === '/orchestrate/directory' && method === 'GET') {
      return this.sendJSON(res, 200, { agents: gateway.directory() });
    }

    if (path === '/orchestrate/delegate' && method === 'POST') {
      const body = parseBody(DelegateBodySchema, await this.readJson(req));
      const task = gateway.delegate(principal, {
        targetAgentId: body.target_agent_id,
        objective: body.objective,
        inputData: body.input_data,
        sharedScopes: body.shared_scopes,
        priority: body.priority,
      });
      return this.sendJSON(res, 202, { task_id: task.id, status: task.status });
    }

    if (path === '/orchestrate/current_task' && method === 'GET') {
      const task = gateway.currentTask(requireAgent(principal));
      if (!task) {
        res.writeHead(204);
        res.end();
        return;
      }
      return this.sendJSON(res, 200, toTaskPayload(task));
    }

    if (path === '/orchestrate/complete' && method === 'POST') {
      const body = parseBody(CompleteBodySchema, await this.readJson(req));
      const task = gateway.complete(requireAgent(principal), {
        taskId: body.task_id,
        status: body.status,
        outputMemoryKey: body.output_memory_key,
        error: body.error,
      });
      return this.sendJSON(res, 200, { task_id: task.id, status: task.status });
    }

    // ─── Approvals ───
    if (path === '/approvals/request' && method === 'POST') {
      const body = parseBody(ApprovalBodySchema, await this.readJson(req));
      const request = approvals.requestApproval({
        agent: principalName(principal),
        action: body.action,
        details: body.details,
        riskLevel: body.risk_level,
        category: body.category,
        timeoutSeconds: body.timeout,
      });
      return this.sendJSON(res, 201, {
        request_id: request.id,
        status: request.status,
        timeout_at: request.timeoutAt,
      });
    }

    const approvalMatch = path.match(/^\/approvals\/([^/]+)$/);
    if (approvalMatch && method === 'GET') {
      const id = decodeParam(approvalMatch[1]);
      const request = approvals.getStatus(id);
      // Agents only see their own requests
      if (!request || (principal.kind === 'agent' && request.agent !== principal.agentId)) {
        throw new NotFoundError('Approval request', id);
      }
      return this.sendJSON(res, 200, toApprovalPayload(request));
    }

    this.sendJSON(res, 404, { error: 'Not found', code: 'NOT_FOUND' });
  }

  private async handleOperator(
    method: string,
    path: string,
    url: URL,
    req: IncomingMessage,
    res: ServerResponse,
    principal: Principal,
  ): Promise<void> {
    const { controller, gateway, approvals, killSwitch, events } = this.services;

    // ─── Agents ───
    if (path === '/api/agents' && method === 'GET') {
      return this.sendJSON(res, 200, { agents: controller.listAgentRecords().map(toAgentPayload) });
    }

    const agentMatch = path.match(/^\/api\/agents\/([^/]+)\/(start|stop)$/);
    if (agentMatch && method === 'POST') {
      const name = decodeParam(agentMatch[1]);
      if (agentMatch[2] === 'start') {
        const started = controller.startAgent(name);
        return this.sendJSON(res, 200, { agent: toAgentPayload(requireRecord(controller.getAgent(name), name)), started });
      }
      const stopped = await controller.stopAgent(name);
      return this.sendJSON(res, 200, { agent: toAgentPayload(requireRecord(controller.getAgent(name), name)), stopped });
    }

    // ─── Tasks ───
    if (path === '/api/tasks' && method === 'GET') {
      const status = url.searchParams.get('status');
      if (status !== null && !isTaskStatus(status)) {
        throw new ValidationError(`Invalid task status: ${status}`);
      }
      const tasks = gateway.listTasks({
        status: status ?? undefined,
        agent: url.searchParams.get('agent') ?? undefined,
        limit: parseLimit(url, 'limit', 100),
      });
      return this.sendJSON(res, 200, { tasks: tasks.map(toTaskPayload) });
    }

    const taskMatch = path.match(/^\/api\/tasks\/([^/]+)$/);
    if (taskMatch && method === 'GET') {
      const id = decodeParam(taskMatch[1]);
      const task = gateway.getTask(id);
      if (!task) throw new NotFoundError('Task', id);
      return this.sendJSON(res, 200, toTaskPayload(task));
    }

    const cancelMatch = path.match(/^\/api\/tasks\/([^/]+)\/cancel$/);
    if (cancelMatch && method === 'POST') {
      const task = gateway.cancel(decodeParam(cancelMatch[1]), principal);
      return this.sendJSON(res, 200, toTaskPayload(task));
    }

    // ─── Approvals ───
    if (path === '/api/approvals' && method === 'GET') {
      const view = url.searchParams.get('status') ?? 'pending';
      if (view === 'pending') {
        return this.sendJSON(res, 200, { requests: approvals.listPending().map(toApprovalPayload) });
      }
      if (view === 'history') {
        const requests = approvals.history(parseLimit(url, 'days', 30), parseLimit(url, 'limit', 100));
        return this.sendJSON(res, 200, { requests: requests.map(toApprovalPayload) });
      }
      throw new ValidationError(`Invalid approvals view: ${view}`, { allowed: ['pending', 'history'] });
    }

    const decisionMatch = path.match(/^\/api\/approvals\/([^/]+)\/(approve|deny)$/);
    if (decisionMatch && method === 'POST') {
      const id = decodeParam(decisionMatch[1]);
      const body = parseBody(DecisionBodySchema, await this.readJson(req));
      const approver = body.approver ?? principalName(principal);
      const request = decisionMatch[2] === 'approve'
        ? approvals.approve(id, approver, body.comment)
        : approvals.deny(id, approver, body.reason);
      return this.sendJSON(res, 200, toApprovalPayload(request));
    }

    // ─── Kill Switch ───
    if (path === '/api/kill' && method === 'POST') {
      const body = parseBody(KillBodySchema, await this.readJson(req));
      if (body.mode === 'emergency') {
        const result = killSwitch.emergencyStop(body.reason);
        return this.sendJSON(res, 200, { mode: body.mode, killed: result.killed, log_file: result.logFile });
      }
      const result = await killSwitch.gracefulShutdown(body.timeout_ms);
      return this.sendJSON(res, 200, { mode: body.mode, stopped: result.stopped });
    }

    // ─── Events ───
    if (path === '/api/events' && method === 'GET') {
      const type = url.searchParams.get('type') ?? undefined;
      return this.sendJSON(res, 200, { events: events.recent(parseLimit(url, 'limit', 100), type) });
    }

    this.sendJSON(res, 404, { error: 'Not found', code: 'NOT_FOUND' });
  }

  private handleHealth(res: ServerResponse): void {
    const agents = this.services.controller.listAgentRecords();
    const response: HealthResponse = {
      status: 'ok',
      version: VERSION,
      uptime: Date.now() - this.startedAt,
      agents: {
        total: agents.length,
        running: agents.filter(a => a.status === 'running').length,
      },
      pendingApprovals: this.services.approvals.countPending(),
    };
    this.sendJSON(res, 200, response);
  }

  // ─── Helpers ──────────────────────────────────────────────

  private runMiddleware(req: IncomingMessage, res: ServerResponse, index: number, done: () => void): void {
    if (index >= this.middleware.length) return done();
    this.middleware[index](req, res, () => this.runMiddleware(req, res, index + 1, done));
  }

  /** Collect the body; past the size limit the rest is drained and discarded. */
  private readBody(req: IncomingMessage): Promise<string> {
    const limit = this.config.maxRequestBytes;
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      req.on('data', (chunk: Buffer) => {
        size += chunk.length;
        if (size <= limit) chunks.push(chunk);
      });
      req.on('end', () => {
        if (size > limit) {
          reject(new PayloadTooLargeError(limit));
        } else {
          resolve(Buffer.concat(chunks).toString('utf-8'));
        }
      });
      req.on('error', reject);
    });
  }

  private async readJson(req: IncomingMessage): Promise<unknown> {
    const body = await this.readBody(req);
    if (body.trim().length === 0) return {};
    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch (err) {
      throw new ValidationError('Invalid JSON body', { cause: toError(err).message });
    }
  }

  private sendJSON(res: ServerResponse, status: number, data: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data));
  }

  private sendError(res: ServerResponse, err: unknown): void {
    const status = httpStatusFor(err);
    const error = toError(err);
    if (status >= 500) {
      getSubsystemLogger('api').error({ err: error }, 'Request failed');
    }

    const body: APIError = error instanceof UpliftError
      ? { error: error.message, code: error.code }
      : { error: error.message || 'Internal server error', code: 'INTERNAL_ERROR' };
    if (error instanceof ValidationError && error.details !== undefined) {
      body.details = error.details;
    }
    this.sendJSON(res, status, body);
  }
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

export function httpStatusFor(err: unknown): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof UnauthorizedError) return 401;
  if (err instanceof ScopeAccessError || err instanceof PermissionDeniedError) return 403;
  if (err instanceof NotFoundError) return 404;
  if (err instanceof InvalidStateError) return 409;
  if (err instanceof PayloadTooLargeError) return 413;
  return 500;
}

function parseBody<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`);
    throw new ValidationError(`Invalid request body: ${issues.join('; ')}`, result.error.issues);
  }
  return result.data;
}

function requireAgent(principal: Principal): string {
  if (principal.kind !== 'agent') {
    throw new PermissionDeniedError('Only agents have a task queue');
  }
  return principal.agentId;
}

function requireRecord<T>(record: T | undefined, name: string): T {
  if (record === undefined) throw new NotFoundError('Agent', name);
  return record;
}

function decodeParam(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch (err) {
    throw new ValidationError(`Malformed path parameter: ${value}`, { cause: toError(err).message });
  }
}

function parseLimit(url: URL, name: string, fallback: number): number {
  const raw = url.searchParams.get(name);
  if (raw === null) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer`);
  }
  return value;
}
