/**
 * Scope access policy.
 *
 * An agent reads and writes everything under its own root, plus whatever its
 * manifest lists, plus read access to scopes shared with it through an
 * active delegated task. Operators are not checked.
 */

import { ScopeAccessError } from '../core/errors.js';
import type { AgentManifest } from '../manifest/types.js';
import { agentRootScope, resolveScope, scopeCovers } from './scope.js';
import type { Principal } from './types.js';

export interface ManifestLookup {
  getManifest(agentId: string): AgentManifest | undefined;
}

/** Supplies scopes temporarily granted to an agent (by orchestration). */
export interface ScopeGrantSource {
  grantedScopes(agentId: string): string[];
}

export class ScopeAccessPolicy {
  private grantSources: ScopeGrantSource[] = [];

  constructor(private readonly manifests: ManifestLookup) {}

  addGrantSource(source: ScopeGrantSource): void {
    this.grantSources.push(source);
  }

  canRead(principal: Principal, scope: string): boolean {
    if (principal.kind === 'operator') return true;
    const { agentId } = principal;
    if (scopeCovers(agentRootScope(agentId), scope)) return true;

    const manifest = this.manifests.getManifest(agentId);
    if (manifest) {
      const listed = [...manifest.permissions.memory.read, ...manifest.permissions.memory.write];
      if (this.anyCovers(listed, agentId, scope)) return true;
    }

    return this.grantSources.some(source =>
      source.grantedScopes(agentId).some(granted => scopeCovers(granted, scope)),
    );
  }

  canWrite(principal: Principal, scope: string): boolean {
    if (principal.kind === 'operator') return true;
    const { agentId } = principal;
    if (scopeCovers(agentRootScope(agentId), scope)) return true;

    const manifest = this.manifests.getManifest(agentId);
    return manifest ? this.anyCovers(manifest.permissions.memory.write, agentId, scope) : false;
  }

  assertRead(principal: Principal, scope: string): void {
    if (!this.canRead(principal, scope)) {
      throw new ScopeAccessError(principalName(principal), scope, 'read');
    }
  }

  assertWrite(principal: Principal, scope: string): void {
    if (!this.canWrite(principal, scope)) {
      throw new ScopeAccessError(principalName(principal), scope, 'write');
    }
  }

  private anyCovers(uris: string[], agentId: string, scope: string): boolean {
    // Manifests are validated at load time, so every entry resolves.
    return uris.some(uri => scopeCovers(resolveScope(uri, agentId), scope));
  }
}

export function principalName(principal: Principal): string {
  return principal.kind === 'agent' ? principal.agentId : principal.name;
}

export function agentPrincipal(agentId: string): Principal {
  return { kind: 'agent', agentId };
}

export function operatorPrincipal(name = 'operator'): Principal {
  return { kind: 'operator', name };
}
