/**
 * Orchestration Gateway
 *
 * Mediates delegation between agents: queues tasks per target, gates them on
 * human approval where the target's manifest asks for it, and grants the
 * target read access to the delegator's shared scopes while the task is open.
 */

import { nanoid } from 'nanoid';
import type { ApprovalService } from '../approvals/service.js';
import type { ApprovalRequest } from '../approvals/types.js';
import type { MessageBus, MessageType } from '../controller/message-bus.js';
import {
  InvalidStateError,
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
} from '../core/errors.js';
import { getSubsystemLogger } from '../core/logger.js';
import { principalName, type ScopeAccessPolicy, type ScopeGrantSource } from '../memory/access.js';
import { resolveScope } from '../memory/scope.js';
import type { Principal } from '../memory/types.js';
import {
  FINAL_TASK_STATUSES,
  PRIORITY_WEIGHTS,
  isTaskPriority,
  type AgentDirectory,
  type CompleteRequest,
  type DelegateRequest,
  type DirectoryEntry,
  type Task,
  type TaskFilter,
} from './types.js';

export interface GatewayOptions {
  approvals: ApprovalService;
  bus?: MessageBus;
  now?: () => number;
  /** Finished tasks kept in memory before the oldest are dropped */
  maxFinishedTasks?: number;
}

const DEFAULT_LIST_LIMIT = 100;

export class OrchestrationGateway implements ScopeGrantSource {
  private tasks: Map<string, Task> = new Map();
  private readonly approvals: ApprovalService;
  private readonly bus?: MessageBus;
  private readonly now: () => number;
  private readonly maxFinishedTasks: number;
  private readonly onDecided = ({ request }: { request: ApprovalRequest }) => this.handleDecision(request);

  constructor(
    private readonly agents: AgentDirectory,
    private readonly policy: ScopeAccessPolicy,
    options: GatewayOptions,
  ) {
    this.approvals = options.approvals;
    this.bus = options.bus;
    this.now = options.now ?? Date.now;
    this.maxFinishedTasks = options.maxFinishedTasks ?? 1000;

    policy.addGrantSource(this);
    this.approvals.events.on('approval:decided', this.onDecided);
  }

  // ═══════════════════════════════════════════════════════════════
  // DIRECTORY
  // ═══════════════════════════════════════════════════════════════

  directory(): DirectoryEntry[] {
    return this.agents.listAgents();
  }

  // ═══════════════════════════════════════════════════════════════
  // DELEGATION
  // ═══════════════════════════════════════════════════════════════

  delegate(principal: Principal, request: DelegateRequest): Task {
    const from = principalName(principal);

    if (typeof request.targetAgentId !== 'string' || request.targetAgentId.length === 0) {
      throw new ValidationError('Missing required field: target_agent_id');
    }
    if (typeof request.objective !== 'string' || request.objective.trim().length === 0) {
      throw new ValidationError('Missing required field: objective');
    }
    const priority = request.priority ?? 'normal';
    if (!isTaskPriority(priority)) {
      throw new ValidationError(`Invalid priority: ${String(priority)}`, {
        allowed: Object.keys(PRIORITY_WEIGHTS),
      });
    }

    if (principal.kind === 'agent') {
      const own = this.agents.getManifest(principal.agentId);
      if (!own?.permissions.canDelegate) {
        throw new PermissionDeniedError(`Agent "${from}" is not allowed to delegate tasks`);
      }
    }

    const target = this.agents.getManifest(request.targetAgentId);
    if (!target) {
      throw new NotFoundError('Agent', request.targetAgentId);
    }

    // Shared scopes resolve against the delegator, who must be able to read them
    const delegatorId = principal.kind === 'agent' ? principal.agentId : null;
    const sharedScopes: string[] = [];
    for (const uri of request.sharedScopes ?? []) {
      if (typeof uri !== 'string') {
        throw new ValidationError('shared_scopes must be a list of scope URIs');
      }
      const canonical = resolveScope(uri, delegatorId);
      this.policy.assertRead(principal, canonical);
      if (!sharedScopes.includes(canonical)) sharedScopes.push(canonical);
    }

    const task: Task = {
      id: `task-${nanoid(12)}`,
      from,
      target: target.id,
      objective: request.objective.trim(),
      inputData: request.inputData ?? {},
      sharedScopes,
      priority,
      status: target.approval.required ? 'awaiting_approval' : 'pending',
      createdAt: this.now(),
      startedAt: null,
      completedAt: null,
      outputMemoryKey: null,
      error: null,
      approvalRequestId: null,
    };

    if (target.approval.required) {
      const approval = this.approvals.requestApproval({
        agent: from,
        action: `delegate:${target.id}`,
        details: { task_id: task.id, objective: task.objective, shared_scopes: sharedScopes },
        riskLevel: target.approval.riskLevel,
        category: 'delegation',
      });
      task.approvalRequestId = approval.id;
    }

    this.tasks.set(task.id, task);
    getSubsystemLogger('gateway').info(
      { taskId: task.id, from, target: task.target, priority, status: task.status },
      'Task delegated',
    );
    this.publish('task.delegated', from, task.target, task);
    return snapshot(task);
  }

  /**
   * The agent's running task, else its highest-priority pending task (oldest
   * first within a priority), which becomes running. Null when idle.
   */
  currentTask(agentId: string): Task | null {
    let next: Task | null = null;
    for (const task of this.tasks.values()) {
      if (task.target !== agentId) continue;
      if (task.status === 'running') return snapshot(task);
      if (task.status === 'pending'
        && (!next || PRIORITY_WEIGHTS[task.priority] > PRIORITY_WEIGHTS[next.priority])) {
        next = task;
      }
    }
    if (!next) return null;

    next.status = 'running';
    next.startedAt = this.now();
    getSubsystemLogger('gateway').info({ taskId: next.id, agent: agentId }, 'Task started');
    this.publish('task.started', agentId, next.from, next);
    return snapshot(next);
  }

  complete(agentId: string, request: CompleteRequest): Task {
    const task = this.requireTask(request.taskId);
    if (task.target !== agentId) {
      throw new PermissionDeniedError(`Task ${task.id} is not assigned to agent "${agentId}"`);
    }
    if (task.status !== 'running') {
      throw new InvalidStateError(`Task ${task.id} is ${task.status}, not running`, task.status);
    }
    if (request.status !== 'success' && request.status !== 'failure') {
      throw new ValidationError(`Invalid completion status: ${String(request.status)}`, {
        allowed: ['success', 'failure'],
      });
    }

    task.status = request.status === 'success' ? 'completed' : 'failed';
    task.completedAt = this.now();
    task.outputMemoryKey = request.outputMemoryKey ?? null;
    task.error = request.error ?? null;

    getSubsystemLogger('gateway').info(
      { taskId: task.id, agent: agentId, status: task.status, outputMemoryKey: task.outputMemoryKey },
      'Task finished',
    );
    this.publish(task.status === 'completed' ? 'task.completed' : 'task.failed', agentId, task.from, task);
    this.pruneFinished();
    return snapshot(task);
  }

  /** Cancel an open task. Agents may only cancel tasks they delegated. */
  cancel(taskId: string, principal: Principal): Task {
    const task = this.requireTask(taskId);
    const by = principalName(principal);
    if (principal.kind === 'agent' && task.from !== principal.agentId) {
      throw new PermissionDeniedError(`Agent "${by}" did not delegate task ${task.id}`);
    }
    if (FINAL_TASK_STATUSES.includes(task.status)) {
      throw new InvalidStateError(`Task ${task.id} is already ${task.status}`, task.status);
    }

    this.finishCancelled(task, `Cancelled by ${by}`);

    if (task.approvalRequestId && this.approvals.getStatus(task.approvalRequestId)?.status === 'pending') {
      this.approvals.cancel(task.approvalRequestId, by);
    }
    return snapshot(task);
  }

  // ═══════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════

  getTask(taskId: string): Task | null {
    const task = this.tasks.get(taskId);
    return task ? snapshot(task) : null;
  }

  listTasks(filter: TaskFilter = {}): Task[] {
    const limit = filter.limit ?? DEFAULT_LIST_LIMIT;
    return Array.from(this.tasks.values())
      .filter(task => !filter.status || task.status === filter.status)
      .filter(task => !filter.agent || task.from === filter.agent || task.target === filter.agent)
      .reverse()
      .slice(0, limit)
      .map(snapshot);
  }

  /** Scopes shared with `agentId` through its pending or running tasks. */
  grantedScopes(agentId: string): string[] {
    const scopes = new Set<string>();
    for (const task of this.tasks.values()) {
      if (task.target === agentId && (task.status === 'pending' || task.status === 'running')) {
        task.sharedScopes.forEach(scope => scopes.add(scope));
      }
    }
    return Array.from(scopes);
  }

  destroy(): void {
    this.approvals.events.off('approval:decided', this.onDecided);
    this.tasks.clear();
  }

  // ═══════════════════════════════════════════════════════════════
  // INTERNAL
  // ═══════════════════════════════════════════════════════════════

  private handleDecision(request: ApprovalRequest): void {
    for (const task of this.tasks.values()) {
      if (task.approvalRequestId !== request.id || task.status !== 'awaiting_approval') continue;

      if (request.status === 'approved') {
        task.status = 'pending';
        getSubsystemLogger('gateway').info({ taskId: task.id, approvedBy: request.approvedBy }, 'Task approved');
        this.publish('task.queued', task.from, task.target, task);
      } else {
        this.finishCancelled(task, `Approval ${request.status}`);
      }
    }
  }

  private finishCancelled(task: Task, reason: string): void {
    task.status = 'cancelled';
    task.completedAt = this.now();
    task.error = reason;
    getSubsystemLogger('gateway').info({ taskId: task.id, reason }, 'Task cancelled');
    this.publish('task.cancelled', task.target, task.from, task);
    this.pruneFinished();
  }

  private requireTask(taskId: string): Task {
    const task = typeof taskId === 'string' ? this.tasks.get(taskId) : undefined;
    if (!task) throw new NotFoundError('Task', String(taskId));
    return task;
  }

  private publish(type: MessageType, from: string, to: string, task: Task): void {
    this.bus?.send({
      from,
      to,
      type,
      payload: {
        task_id: task.id,
        status: task.status,
        from: task.from,
        target: task.target,
        objective: task.objective,
        output_memory_key: task.outputMemoryKey,
        error: task.error,
      },
    });
  }

  private pruneFinished(): void {
    const finished = Array.from(this.tasks.values()).filter(t => FINAL_TASK_STATUSES.includes(t.status));
    const excess = finished.length - this.maxFinishedTasks;
    for (let i = 0; i < excess; i++) {
      this.tasks.delete(finished[i].id);
    }
  }
}

function snapshot(task: Task): Task {
  return { ...task, inputData: { ...task.inputData }, sharedScopes: [...task.sharedScopes] };
}
