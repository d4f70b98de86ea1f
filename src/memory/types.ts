/**
 * Memory Layer Type Definitions
 * Key/value entries partitioned into permissioned scopes.
 */

export type ScopeKind = 'agent' | 'user' | 'shared';

export interface ParsedScope {
  kind: ScopeKind;
  /** Path segments after the kind, e.g. ['researcher', 'private'] */
  segments: string[];
  /** True for `uplift://agent/private...`, which names the caller's own scope */
  relative: boolean;
}

/** Who is asking. Operators bypass scope permissions. */
export type Principal =
  | { kind: 'agent'; agentId: string }
  | { kind: 'operator'; name: string };

export interface MemoryEntry {
  scope: string;
  key: string;
  value: unknown;
  writtenBy: string;
  createdAt: number;
  updatedAt: number;
}

export interface MemoryQuery {
  text: string;
  scopes: string[];
  limit?: number;
}

export interface MemoryQueryResult extends MemoryEntry {
  /** 0-1, fraction of query terms found in the entry */
  score: number;
}

export interface ScopeSummary {
  scope: string;
  entries: number;
  updatedAt: number;
}

export interface MemoryStoreOptions {
  maxValueBytes: number;
  defaultQueryLimit: number;
  now?: () => number;
}
