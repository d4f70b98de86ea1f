/**
 * Session tokens handed to agent processes at launch (UPLIFT_SESSION_TOKEN).
 * One live token per agent; issuing again revokes the previous one.
 * Tokens are kept only as SHA-256 digests.
 */

import { generateToken, sha256 } from '../utils/crypto.js';

export const SESSION_TOKEN_PREFIX = 'upl';

export interface SessionInfo {
  agentId: string;
  issuedAt: number;
}

export class SessionRegistry {
  private byDigest: Map<string, SessionInfo> = new Map();
  private digestByAgent: Map<string, string> = new Map();

  constructor(private readonly now: () => number = Date.now) {}

  issue(agentId: string): string {
    this.revoke(agentId);

    const token = generateToken(SESSION_TOKEN_PREFIX);
    const digest = sha256(token);
    this.byDigest.set(digest, { agentId, issuedAt: this.now() });
    this.digestByAgent.set(agentId, digest);
    return token;
  }

  /** Agent id owning `token`, or null for unknown or revoked tokens. */
  resolve(token: string): string | null {
    if (!token.startsWith(`${SESSION_TOKEN_PREFIX}_`)) return null;
    return this.byDigest.get(sha256(token))?.agentId ?? null;
  }

  revoke(agentId: string): boolean {
    const digest = this.digestByAgent.get(agentId);
    if (!digest) return false;
    this.byDigest.delete(digest);
    this.digestByAgent.delete(agentId);
    return true;
  }

  has(agentId: string): boolean {
    return this.digestByAgent.has(agentId);
  }

  list(): SessionInfo[] {
    return Array.from(this.byDigest.values());
  }

  clear(): void {
    this.byDigest.clear();
    this.digestByAgent.clear();
  }
}
