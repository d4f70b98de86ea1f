/**
 * Scope URIs
 *
 *   uplift://agent/private[/...]      the calling agent's own partition (relative)
 *   uplift://agent/<agentId>/<name>   an agent partition (canonical)
 *   uplift://user/<name>              user data
 *   uplift://shared/<name>            shared data
 */

import { ValidationError } from '../core/errors.js';
import type { ParsedScope, ScopeKind } from './types.js';

export const SCOPE_PREFIX = 'uplift://';
export const PRIVATE_SCOPE = 'uplift://agent/private';

const SEGMENT_PATTERN = /^[a-z0-9][a-z0-9._-]*$/;
const KINDS: readonly ScopeKind[] = ['agent', 'user', 'shared'];

function isScopeKind(value: string): value is ScopeKind {
  return KINDS.some(kind => kind === value);
}

export function parseScopeUri(uri: string): ParsedScope {
  if (typeof uri !== 'string' || !uri.toLowerCase().startsWith(SCOPE_PREFIX)) {
    throw new ValidationError(`Invalid scope URI "${String(uri)}": must start with ${SCOPE_PREFIX}`);
  }

  const path = uri.slice(SCOPE_PREFIX.length).toLowerCase().replace(/\/+$/, '');
  const [kind, ...segments] = path.split('/');

  if (!kind || !isScopeKind(kind)) {
    throw new ValidationError(`Invalid scope URI "${uri}": kind must be one of ${KINDS.join(', ')}`);
  }
  if (segments.length === 0) {
    throw new ValidationError(`Invalid scope URI "${uri}": missing scope name`);
  }
  for (const segment of segments) {
    if (!SEGMENT_PATTERN.test(segment)) {
      throw new ValidationError(`Invalid scope URI "${uri}": bad segment "${segment}"`);
    }
  }

  const relative = kind === 'agent' && segments[0] === 'private';
  if (kind === 'agent' && !relative && segments.length < 2) {
    throw new ValidationError(`Invalid scope URI "${uri}": agent scopes need an agent id and a name`);
  }

  return { kind, segments, relative };
}

export function formatScope(scope: ParsedScope): string {
  return `${SCOPE_PREFIX}${scope.kind}/${scope.segments.join('/')}`;
}

/**
 * Canonicalize a scope URI for `agentId`. Relative private scopes become
 * `uplift://agent/<agentId>/private...`; everything else is normalized only.
 */
export function resolveScope(uri: string, agentId: string | null): string {
  const parsed = parseScopeUri(uri);
  if (!parsed.relative) {
    return formatScope(parsed);
  }
  if (!agentId) {
    throw new ValidationError(`Scope "${uri}" is relative to an agent and cannot be resolved here`);
  }
  return formatScope({ kind: 'agent', segments: [agentId, ...parsed.segments], relative: false });
}

/** Root of everything an agent owns. */
export function agentRootScope(agentId: string): string {
  return `${SCOPE_PREFIX}agent/${agentId}`;
}

/** True when `scope` equals `base` or lies beneath it. Both must be canonical. */
export function scopeCovers(base: string, scope: string): boolean {
  return scope === base || scope.startsWith(`${base}/`);
}
