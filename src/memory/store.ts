/**
 * SQLite-backed scoped memory store.
 * Every read and write is checked against the ScopeAccessPolicy first;
 * a denied request touches nothing.
 */

import type Database from 'better-sqlite3';
import type { SqliteDatabase } from '../core/database.js';
import { NotFoundError, ValidationError } from '../core/errors.js';
import { getSubsystemLogger } from '../core/logger.js';
import { principalName, type ScopeAccessPolicy } from './access.js';
import { resolveScope } from './scope.js';
import { documentText, scoreTokens, tokenize } from './search.js';
import type {
  MemoryEntry,
  MemoryQuery,
  MemoryQueryResult,
  MemoryStoreOptions,
  Principal,
  ScopeSummary,
} from './types.js';

const MAX_KEY_LENGTH = 256;

interface MemoryRow {
  scope: string;
  key: string;
  value: string;
  written_by: string;
  created_at: number;
  updated_at: number;
}

interface ScopeRow {
  scope: string;
  entries: number;
  updated_at: number;
}

export class MemoryStore {
  private readonly now: () => number;
  private readonly upsertStmt: Database.Statement<[string, string, string, string, number, number]>;
  private readonly getStmt: Database.Statement<[string, string], MemoryRow>;
  private readonly listStmt: Database.Statement<[string], MemoryRow>;
  private readonly deleteStmt: Database.Statement<[string, string]>;

  constructor(
    private readonly db: SqliteDatabase,
    private readonly policy: ScopeAccessPolicy,
    private readonly options: MemoryStoreOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.initialize();

    this.upsertStmt = db.prepare<[string, string, string, string, number, number]>(`
      INSERT INTO memory_entries (scope, key, value, written_by, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT (scope, key) DO UPDATE SET
        value = excluded.value,
        written_by = excluded.written_by,
        updated_at = excluded.updated_at
    `);
    this.getStmt = db.prepare<[string, string], MemoryRow>('SELECT * FROM memory_entries WHERE scope = ? AND key = ?');
    this.listStmt = db.prepare<[string], MemoryRow>('SELECT * FROM memory_entries WHERE scope = ? ORDER BY updated_at DESC, key ASC');
    this.deleteStmt = db.prepare<[string, string]>('DELETE FROM memory_entries WHERE scope = ? AND key = ?');
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS memory_entries (
        scope TEXT NOT NULL,
        key TEXT NOT NULL,
        value TEXT NOT NULL,
        written_by TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY (scope, key)
      )
    `);
    this.db.exec('CREATE INDEX IF NOT EXISTS idx_memory_scope ON memory_entries(scope)');
  }

  /** Insert or overwrite `key` in `scope`. */
  store(principal: Principal, scope: string, key: string, value: unknown): MemoryEntry {
    const canonical = this.resolveFor(principal, scope);
    this.validateKey(key);
    if (value === undefined) {
      throw new ValidationError('Missing required field: value');
    }

    this.policy.assertWrite(principal, canonical);

    const serialized = JSON.stringify(value);
    const size = Buffer.byteLength(serialized, 'utf-8');
    if (size > this.options.maxValueBytes) {
      throw new ValidationError(
        `Value for "${key}" is ${size} bytes, limit is ${this.options.maxValueBytes}`,
      );
    }

    const now = this.now();
    this.upsertStmt.run(canonical, key, serialized, principalName(principal), now, now);
    getSubsystemLogger('memory').debug({ scope: canonical, key, by: principalName(principal) }, 'Stored memory');

    return this.requireRow(canonical, key);
  }

  /** Fetch an entry, or null when the key is absent. */
  find(principal: Principal, scope: string, key: string): MemoryEntry | null {
    const canonical = this.resolveFor(principal, scope);
    this.policy.assertRead(principal, canonical);
    const row = this.getStmt.get(canonical, key);
    return row ? toEntry(row) : null;
  }

  get(principal: Principal, scope: string, key: string): MemoryEntry {
    const entry = this.find(principal, scope, key);
    if (!entry) {
      throw new NotFoundError('Memory key', `${scope}#${key}`);
    }
    return entry;
  }

  /**
   * Rank entries across `scopes` by keyword overlap with `text`.
   * Every scope must be readable or the whole query is refused.
   */
  query(principal: Principal, query: MemoryQuery): MemoryQueryResult[] {
    if (!Array.isArray(query.scopes) || query.scopes.length === 0) {
      throw new ValidationError('Query needs at least one scope');
    }

    const scopes = [...new Set(query.scopes.map(s => this.resolveFor(principal, s)))];
    for (const scope of scopes) {
      this.policy.assertRead(principal, scope);
    }

    const limit = query.limit ?? this.options.defaultQueryLimit;
    const queryTokens = tokenize(query.text ?? '');
    const results: MemoryQueryResult[] = [];

    for (const scope of scopes) {
      for (const row of this.listStmt.all(scope)) {
        const entry = toEntry(row);
        const score = scoreTokens(queryTokens, tokenize(documentText(entry.key, entry.value)));
        if (score > 0) {
          results.push({ ...entry, score });
        }
      }
    }

    results.sort((a, b) => b.score - a.score || b.updatedAt - a.updatedAt);
    return results.slice(0, limit);
  }

  delete(principal: Principal, scope: string, key: string): boolean {
    const canonical = this.resolveFor(principal, scope);
    this.policy.assertWrite(principal, canonical);
    return this.deleteStmt.run(canonical, key).changes > 0;
  }

  /** All entries of a canonical scope, newest first. Operator inspection. */
  list(scope: string): MemoryEntry[] {
    const canonical = resolveScope(scope, null);
    return this.listStmt.all(canonical).map(toEntry);
  }

  listScopes(): ScopeSummary[] {
    const rows = this.db.prepare<[], ScopeRow>(`
      SELECT scope, COUNT(*) AS entries, MAX(updated_at) AS updated_at
      FROM memory_entries
      GROUP BY scope
      ORDER BY scope ASC
    `).all();
    return rows.map(r => ({ scope: r.scope, entries: r.entries, updatedAt: r.updated_at }));
  }

  private resolveFor(principal: Principal, scope: string): string {
    return resolveScope(scope, principal.kind === 'agent' ? principal.agentId : null);
  }

  private validateKey(key: string): void {
    if (typeof key !== 'string' || key.length === 0) {
      throw new ValidationError('Missing required field: key');
    }
    if (key.length > MAX_KEY_LENGTH) {
      throw new ValidationError(`Key exceeds ${MAX_KEY_LENGTH} characters`);
    }
  }

  private requireRow(scope: string, key: string): MemoryEntry {
    const row = this.getStmt.get(scope, key);
    if (!row) {
      throw new NotFoundError('Memory key', `${scope}#${key}`);
    }
    return toEntry(row);
  }
}

function toEntry(row: MemoryRow): MemoryEntry {
  return {
    scope: row.scope,
    key: row.key,
    value: JSON.parse(row.value) as unknown,
    writtenBy: row.written_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
