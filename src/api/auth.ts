/**
 * API Authentication
 *
 * Bearer tokens are either an agent session token (issued at launch) or the
 * operator admin key.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { operatorPrincipal, agentPrincipal } from '../memory/access.js';
import type { Principal } from '../memory/types.js';
import type { SessionRegistry } from '../sessions/session-registry.js';
import { constantTimeEquals, generateToken } from '../utils/crypto.js';

export const ADMIN_KEY_PREFIX = 'upa';

/**
 * Generate a random operator key
 */
export function generateAdminKey(): string {
  return generateToken(ADMIN_KEY_PREFIX);
}

export type RequestHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  next: () => void
) => void;

export type Authenticator = (req: IncomingMessage) => Principal | null;

export function extractBearerToken(req: IncomingMessage): string | null {
  const header = req.headers.authorization;
  if (!header?.startsWith('Bearer ')) return null;
  const token = header.slice(7).trim();
  return token.length > 0 ? token : null;
}

/**
 * Resolve the caller of a request. Unknown or missing tokens resolve to null.
 */
export function createAuthenticator(sessions: SessionRegistry, adminKey?: string): Authenticator {
  return req => {
    const token = extractBearerToken(req);
    if (!token) return null;

    if (adminKey && constantTimeEquals(token, adminKey)) {
      return operatorPrincipal();
    }

    const agentId = sessions.resolve(token);
    return agentId ? agentPrincipal(agentId) : null;
  };
}

/**
 * Create CORS middleware
 */
export function createCorsMiddleware(origins: string[] = ['*']): RequestHandler {
  return (req, res, next) => {
    const origin = req.headers.origin || '*';
    const allowed = origins.includes('*') || origins.includes(origin);

    if (allowed) {
      res.setHeader('Access-Control-Allow-Origin', origins.includes('*') ? '*' : origin);
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    }

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    next();
  };
}
