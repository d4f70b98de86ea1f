/**
 * Persists every bus message to the `events` table.
 */

import type Database from 'better-sqlite3';
import type { SqliteDatabase } from '../core/database.js';
import { getSubsystemLogger } from '../core/logger.js';
import type { BusMessage, MessageBus } from './message-bus.js';

export interface EventRecord {
  id: string;
  timestamp: number;
  type: string;
  source: string;
  target: string;
  data: Record<string, unknown>;
}

interface EventRow {
  id: string;
  timestamp: number;
  type: string;
  source: string;
  target: string;
  data: string;
}

export class EventLog {
  private readonly insertStmt: Database.Statement<[string, number, string, string, string, string]>;
  private unsubscribe: (() => void) | null = null;

  constructor(private readonly db: SqliteDatabase) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        id TEXT PRIMARY KEY,
        timestamp INTEGER NOT NULL,
        type TEXT NOT NULL,
        source TEXT NOT NULL,
        target TEXT NOT NULL,
        data TEXT NOT NULL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_events_timestamp ON events(timestamp)');
    this.insertStmt = db.prepare<[string, number, string, string, string, string]>(
      'INSERT OR IGNORE INTO events (id, timestamp, type, source, target, data) VALUES (?, ?, ?, ?, ?, ?)',
    );
  }

  /** Start recording `bus` traffic. */
  attach(bus: MessageBus): void {
    this.detach();
    this.unsubscribe = bus.subscribeAll(message => this.record(message));
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  record(message: BusMessage): void {
    try {
      this.insertStmt.run(
        message.id,
        message.timestamp,
        message.type,
        message.from,
        message.to,
        JSON.stringify(message.payload),
      );
    } catch (err) {
      getSubsystemLogger('controller').error({ err, type: message.type }, 'Failed to record event');
    }
  }

  /** Most recent events first. */
  recent(limit = 100, type?: string): EventRecord[] {
    const rows = type
      ? this.db
          .prepare<[string, number], EventRow>('SELECT * FROM events WHERE type = ? ORDER BY timestamp DESC, rowid DESC LIMIT ?')
          .all(type, limit)
      : this.db
          .prepare<[number], EventRow>('SELECT * FROM events ORDER BY timestamp DESC, rowid DESC LIMIT ?')
          .all(limit);

    return rows.map(row => {
      const data: unknown = JSON.parse(row.data);
      return {
        id: row.id,
        timestamp: row.timestamp,
        type: row.type,
        source: row.source,
        target: row.target,
        data: typeof data === 'object' && data !== null && !Array.isArray(data) ? Object.fromEntries(Object.entries(data)) : {},
      };
    });
  }
}
