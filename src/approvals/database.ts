/**
 * Approval request persistence: requests plus an append-only audit log.
 */

import type Database from 'better-sqlite3';
import type { SqliteDatabase } from '../core/database.js';
import type { RiskLevel } from '../core/types.js';
import type { ApprovalRequest, ApprovalStatus, AuditEntry } from './types.js';

interface RequestRow {
  id: string;
  agent: string;
  action: string;
  details: string | null;
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

interface AuditRow {
  id: number;
  request_id: string;
  timestamp: number;
  action: string;
  user: string | null;
  details: string | null;
}

export interface StatusUpdate {
  status: Exclude<ApprovalStatus, 'pending'>;
  user?: string;
  comment?: string;
  denialReason?: string;
  at: number;
}

export class ApprovalDatabase {
  private readonly insertStmt: Database.Statement<[
    string, string, string, string, string, string | null, string, number, number,
  ]>;
  private readonly auditStmt: Database.Statement<[string, number, string, string | null, string]>;
  private readonly getStmt: Database.Statement<[string], RequestRow>;

  constructor(private readonly db: SqliteDatabase) {
    this.initialize();

    this.insertStmt = db.prepare<[
      string, string, string, string, string, string | null, string, number, number,
    ]>(`
      INSERT INTO approval_requests (
        id, agent, action, details, risk_level, category, status, created_at, timeout_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.auditStmt = db.prepare<[string, number, string, string | null, string]>(`
      INSERT INTO approval_audit_log (request_id, timestamp, action, user, details)
      VALUES (?, ?, ?, ?, ?)
    `);
    this.getStmt = db.prepare<[string], RequestRow>('SELECT * FROM approval_requests WHERE id = ?');
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS approval_requests (
        id TEXT PRIMARY KEY,
        agent TEXT NOT NULL,
        action TEXT NOT NULL,
        details TEXT,
        risk_level TEXT NOT NULL,
        category TEXT,
        status TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        timeout_at INTEGER NOT NULL,
        approved_by TEXT,
        approved_at INTEGER,
        denial_reason TEXT,
        comment TEXT
      )
    `);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS approval_audit_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        request_id TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        action TEXT NOT NULL,
        user TEXT,
        details TEXT,
        FOREIGN KEY (request_id) REFERENCES approval_requests(id)
      )
    `);
    this.db.exec('CREATE INDEX IF NOT EXISTS idx_approval_status ON approval_requests(status)');
    this.db.exec('CREATE INDEX IF NOT EXISTS idx_approval_agent ON approval_requests(agent)');
  }

  createRequest(request: ApprovalRequest): void {
    const tx = this.db.transaction(() => {
      this.insertStmt.run(
        request.id,
        request.agent,
        request.action,
        JSON.stringify(request.details),
        request.riskLevel,
        request.category,
        request.status,
        request.createdAt,
        request.timeoutAt,
      );
      this.auditStmt.run(request.id, request.createdAt, 'created', request.agent, JSON.stringify({ risk_level: request.riskLevel }));
    });
    tx();
  }

  getRequest(id: string): ApprovalRequest | null {
    const row = this.getStmt.get(id);
    return row ? toRequest(row) : null;
  }

  /**
   * Move a pending request to a final status. Returns false when the request
   * was no longer pending (or does not exist); nothing is written then.
   */
  resolvePending(id: string, update: StatusUpdate): boolean {
    const fields = ['status = ?'];
    const params: Array<string | number | null> = [update.status];

    if (update.status === 'approved' || update.status === 'denied') {
      fields.push('approved_by = ?');
      params.push(update.user ?? null);
    }
    if (update.status === 'approved') {
      fields.push('approved_at = ?');
      params.push(update.at);
    }
    if (update.comment) {
      fields.push('comment = ?');
      params.push(update.comment);
    }
    if (update.denialReason) {
      fields.push('denial_reason = ?');
      params.push(update.denialReason);
    }
    params.push(id);

    const tx = this.db.transaction((): boolean => {
      const result = this.db
        .prepare<Array<string | number | null>>(`UPDATE approval_requests SET ${fields.join(', ')} WHERE id = ? AND status = 'pending'`)
        .run(...params);
      if (result.changes === 0) return false;

      this.auditStmt.run(
        id,
        update.at,
        update.status,
        update.user ?? null,
        JSON.stringify({ comment: update.comment ?? null, denial_reason: update.denialReason ?? null }),
      );
      return true;
    });
    return tx();
  }

  getPendingRequests(): ApprovalRequest[] {
    return this.db
      .prepare<[], RequestRow>("SELECT * FROM approval_requests WHERE status = 'pending' ORDER BY created_at DESC, id DESC")
      .all()
      .map(toRequest);
  }

  /** Pending requests whose deadline is at or before `now`. */
  getOverdueRequests(now: number): ApprovalRequest[] {
    return this.db
      .prepare<[number], RequestRow>("SELECT * FROM approval_requests WHERE status = 'pending' AND timeout_at <= ? ORDER BY timeout_at ASC")
      .all(now)
      .map(toRequest);
  }

  getHistory(since: number, limit: number): ApprovalRequest[] {
    return this.db
      .prepare<[number, number], RequestRow>('SELECT * FROM approval_requests WHERE created_at >= ? ORDER BY created_at DESC, id DESC LIMIT ?')
      .all(since, limit)
      .map(toRequest);
  }

  getAuditTrail(requestId: string): AuditEntry[] {
    return this.db
      .prepare<[string], AuditRow>('SELECT * FROM approval_audit_log WHERE request_id = ? ORDER BY id ASC')
      .all(requestId)
      .map(row => ({
        id: row.id,
        requestId: row.request_id,
        timestamp: row.timestamp,
        action: row.action,
        user: row.user,
        details: parseRecord(row.details),
      }));
  }

  countPending(): number {
    const row = this.db
      .prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM approval_requests WHERE status = 'pending'")
      .get();
    return row?.count ?? 0;
  }
}

function toRequest(row: RequestRow): ApprovalRequest {
  return {
    id: row.id,
    agent: row.agent,
    action: row.action,
    details: parseRecord(row.details),
    riskLevel: row.risk_level,
    category: row.category,
    status: row.status,
    createdAt: row.created_at,
    timeoutAt: row.timeout_at,
    approvedBy: row.approved_by,
    approvedAt: row.approved_at,
    denialReason: row.denial_reason,
    comment: row.comment,
  };
}

function parseRecord(text: string | null): Record<string, unknown> {
  if (!text) return {};
  const parsed: unknown = JSON.parse(text);
  return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : {};
}
