export { MemoryStore } from './store.js';
export {
  ScopeAccessPolicy,
  agentPrincipal,
  operatorPrincipal,
  principalName,
  type ManifestLookup,
  type ScopeGrantSource,
} from './access.js';
export {
  parseScopeUri,
  resolveScope,
  formatScope,
  agentRootScope,
  scopeCovers,
  SCOPE_PREFIX,
  PRIVATE_SCOPE,
} from './scope.js';
export { tokenize, scoreTokens } from './search.js';
export type {
  ScopeKind,
  ParsedScope,
  Principal,
  MemoryEntry,
  MemoryQuery,
  MemoryQueryResult,
  ScopeSummary,
  MemoryStoreOptions,
} from './types.js';
