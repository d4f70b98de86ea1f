/**
 * Approval System Types
 *
 * Human-in-the-loop approval for high-stakes agent actions.
 */

import type { RiskLevel } from '../core/types.js';

export type ApprovalStatus = 'pending' | 'approved' | 'denied' | 'expired' | 'cancelled';

export const APPROVAL_STATUSES: readonly ApprovalStatus[] = [
  'pending', 'approved', 'denied', 'expired', 'cancelled',
];

export interface ApprovalRequest {
  /** `AR-<epochMs>-<8 hex>` */
  id: string;
  /** Agent (or principal) asking for approval */
  agent: string;
  action: string;
  details: Record<string, unknown>;
  riskLevel: RiskLevel;
  category: string | null;
  status: ApprovalStatus;
  createdAt: number;
  timeoutAt: number;
  /** Decider for both approvals and denials */
  approvedBy: string | null;
  approvedAt: number | null;
  denialReason: string | null;
  comment: string | null;
}

export interface ApprovalRequestInput {
  agent: string;
  action: string;
  details?: Record<string, unknown>;
  riskLevel?: RiskLevel;
  category?: string;
  /** Overrides the risk level's configured timeout */
  timeoutSeconds?: number;
}

export interface AuditEntry {
  id: number;
  requestId: string;
  timestamp: number;
  action: string;
  user: string | null;
  details: Record<string, unknown>;
}

export type ApprovalOutcome =
  | { status: 'approved'; approvedBy: string | null; approvedAt: number | null; comment: string | null }
  | { status: 'denied'; deniedBy: string | null; reason: string | null }
  | { status: 'expired' }
  | { status: 'cancelled' };

export interface ApprovalSettings {
  riskLevels: Record<RiskLevel, { timeout: number }>;
  checkIntervalMs: number;
  pollIntervalMs: number;
}

export type ApprovalEvents = {
  'approval:requested': { request: ApprovalRequest };
  'approval:decided': { request: ApprovalRequest };
};
