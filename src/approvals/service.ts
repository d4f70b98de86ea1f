/**
 * Approval Service
 *
 * Queue of human decisions for high-stakes actions. Requests live in SQLite,
 * every transition is audited, and decisions are emitted on `events` so other
 * subsystems can react without polling.
 */

import { nanoid } from 'nanoid';
import type { SqliteDatabase } from '../core/database.js';
import { InvalidStateError, NotFoundError, ValidationError } from '../core/errors.js';
import { EventBus } from '../core/events.js';
import { getSubsystemLogger } from '../core/logger.js';
import { RiskLevelSchema } from '../core/types.js';
import { shortMd5 } from '../utils/crypto.js';
import { sleep } from '../utils/retry.js';
import { ApprovalDatabase, type StatusUpdate } from './database.js';
import type {
  ApprovalEvents,
  ApprovalOutcome,
  ApprovalRequest,
  ApprovalRequestInput,
  ApprovalSettings,
  AuditEntry,
} from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ApprovalServiceOptions {
  settings: ApprovalSettings;
  now?: () => number;
}

export interface WaitOptions {
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

export class ApprovalService {
  readonly events = new EventBus<ApprovalEvents>();
  private readonly db: ApprovalDatabase;
  private readonly settings: ApprovalSettings;
  private readonly now: () => number;
  private monitor: ReturnType<typeof setInterval> | null = null;

  constructor(db: SqliteDatabase, options: ApprovalServiceOptions) {
    this.db = new ApprovalDatabase(db);
    this.settings = options.settings;
    this.now = options.now ?? Date.now;
  }

  // ═══════════════════════════════════════════════════════════════
  // REQUESTS
  // ═══════════════════════════════════════════════════════════════

  requestApproval(input: ApprovalRequestInput): ApprovalRequest {
    if (!input.agent) throw new ValidationError('Missing required field: agent');
    if (!input.action) throw new ValidationError('Missing required field: action');

    const risk = RiskLevelSchema.safeParse(input.riskLevel ?? 'medium');
    if (!risk.success) {
      throw new ValidationError(`Invalid risk level: ${String(input.riskLevel)}`);
    }
    if (input.timeoutSeconds !== undefined && !(Number.isFinite(input.timeoutSeconds) && input.timeoutSeconds > 0)) {
      throw new ValidationError('timeout must be a positive number of seconds');
    }

    const createdAt = this.now();
    const timeoutSeconds = input.timeoutSeconds ?? this.settings.riskLevels[risk.data].timeout;
    const request: ApprovalRequest = {
      id: `AR-${createdAt}-${shortMd5(`${input.agent}:${input.action}:${createdAt}:${nanoid(8)}`)}`,
      agent: input.agent,
      action: input.action,
      details: input.details ?? {},
      riskLevel: risk.data,
      category: input.category ?? null,
      status: 'pending',
      createdAt,
      timeoutAt: createdAt + Math.round(timeoutSeconds * 1000),
      approvedBy: null,
      approvedAt: null,
      denialReason: null,
      comment: null,
    };

    this.db.createRequest(request);
    getSubsystemLogger('approvals').info(
      { requestId: request.id, agent: request.agent, action: request.action, riskLevel: request.riskLevel },
      'Approval requested',
    );
    this.events.emit('approval:requested', { request });
    return request;
  }

  approve(id: string, approver: string, comment?: string): ApprovalRequest {
    return this.decide(id, { status: 'approved', user: approver, comment, at: this.now() });
  }

  deny(id: string, approver: string, reason?: string): ApprovalRequest {
    return this.decide(id, { status: 'denied', user: approver, denialReason: reason, at: this.now() });
  }

  cancel(id: string, by: string): ApprovalRequest {
    return this.decide(id, { status: 'cancelled', user: by, at: this.now() });
  }

  // ═══════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════

  /** Current state of a request; an overdue pending request is expired first. */
  getStatus(id: string): ApprovalRequest | null {
    const request = this.db.getRequest(id);
    if (request?.status === 'pending' && request.timeoutAt <= this.now()) {
      this.expire(id, this.now());
      return this.db.getRequest(id);
    }
    return request;
  }

  requireRequest(id: string): ApprovalRequest {
    const request = this.getStatus(id);
    if (!request) throw new NotFoundError('Approval request', id);
    return request;
  }

  listPending(): ApprovalRequest[] {
    this.checkTimeouts();
    return this.db.getPendingRequests();
  }

  countPending(): number {
    this.checkTimeouts();
    return this.db.countPending();
  }

  history(days = 30, limit = 100): ApprovalRequest[] {
    return this.db.getHistory(this.now() - days * DAY_MS, limit);
  }

  auditTrail(id: string): AuditEntry[] {
    return this.db.getAuditTrail(id);
  }

  // ═══════════════════════════════════════════════════════════════
  // TIMEOUTS
  // ═══════════════════════════════════════════════════════════════

  /** Expire every pending request past its deadline; returns the expired ids. */
  checkTimeouts(now: number = this.now()): string[] {
    const expired: string[] = [];
    for (const request of this.db.getOverdueRequests(now)) {
      if (this.expire(request.id, now)) expired.push(request.id);
    }
    return expired;
  }

  /**
   * Poll until the request leaves `pending`. Expires it once its deadline
   * passes.
   */
  async waitForApproval(id: string, options: WaitOptions = {}): Promise<ApprovalOutcome> {
    const pollIntervalMs = options.pollIntervalMs ?? this.settings.pollIntervalMs;

    for (;;) {
      const request = this.getStatus(id);
      if (!request) throw new NotFoundError('Approval request', id);
      const outcome = toOutcome(request);
      if (outcome) return outcome;

      const remaining = Math.max(request.timeoutAt - this.now(), 1);
      await sleep(Math.min(pollIntervalMs, remaining), options.signal);
    }
  }

  startTimeoutMonitor(): void {
    if (this.monitor || this.settings.checkIntervalMs <= 0) return;
    this.monitor = setInterval(() => {
      try {
        this.checkTimeouts();
      } catch (err) {
        getSubsystemLogger('approvals').error({ err }, 'Timeout check failed');
      }
    }, this.settings.checkIntervalMs);
    this.monitor.unref();
  }

  stop(): void {
    if (this.monitor) {
      clearInterval(this.monitor);
      this.monitor = null;
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // INTERNAL
  // ═══════════════════════════════════════════════════════════════

  private decide(id: string, update: StatusUpdate): ApprovalRequest {
    const current = this.requireRequest(id);
    if (current.status === 'pending' && current.timeoutAt <= update.at) {
      this.expire(id, update.at);
    }

    if (!this.db.resolvePending(id, update)) {
      const latest = this.requireRequest(id);
      throw new InvalidStateError(`Approval request ${id} is already ${latest.status}`, latest.status);
    }
    return this.announce(id, update.user);
  }

  private expire(id: string, at: number): boolean {
    if (!this.db.resolvePending(id, { status: 'expired', at })) return false;
    this.announce(id);
    return true;
  }

  private announce(id: string, user?: string): ApprovalRequest {
    const request = this.requireRequest(id);
    getSubsystemLogger('approvals').info(
      { requestId: id, status: request.status, by: user ?? null },
      `Approval request ${request.status}`,
    );
    this.events.emit('approval:decided', { request });
    return request;
  }
}

/** Final outcome of a request, or null while it is still pending. */
export function toOutcome(request: ApprovalRequest): ApprovalOutcome | null {
  switch (request.status) {
    case 'pending':
      return null;
    case 'approved':
      return {
        status: 'approved',
        approvedBy: request.approvedBy,
        approvedAt: request.approvedAt,
        comment: request.comment,
      };
    case 'denied':
      return { status: 'denied', deniedBy: request.approvedBy, reason: request.denialReason };
    case 'expired':
      return { status: 'expired' };
    case 'cancelled':
      return { status: 'cancelled' };
  }
}
