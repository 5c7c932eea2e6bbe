import sqlite3 from 'sqlite3';
import { open, Database } from 'sqlite';
import {
  ESCROW_EVENT_NAMES,
  EscrowEventBus,
  EscrowEventMap,
  EscrowEventName
} from '@hashlock-swap/escrow-core';
import { logger } from '../logger';
import { ActivityFilter, ActivityRecord } from '../types';
import { toJson } from '../utils/json';

type LedgerEvent = EscrowEventMap[EscrowEventName];

interface ActivityRow {
  sequence: number;
  event: EscrowEventName;
  subject_id: string;
  subject_address: string;
  maker: string;
  resolver: string;
  amount: string;
  payload: string;
  timestamp: number;
  recorded_at: number;
}

/**
 * Append-only record of every ledger event. Writes are queued as events
 * arrive; reads wait for queued writes first.
 */
export class ActivityJournal {
  private db: Database<sqlite3.Database, sqlite3.Statement> | null = null;
  private pending = new Set<Promise<void>>();

  async initialize(dbPath: string): Promise<void> {
    this.db = await open({
      filename: dbPath,
      driver: sqlite3.Database
    });

    await this.createTables();
  }

  private async createTables(): Promise<void> {
    if (!this.db) throw new Error('Database not initialized');

    await this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        sequence INTEGER PRIMARY KEY AUTOINCREMENT,
        event TEXT NOT NULL,
        subject_id TEXT NOT NULL,
        subject_address TEXT NOT NULL,
        maker TEXT NOT NULL,
        resolver TEXT NOT NULL,
        amount TEXT NOT NULL,
        payload TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        recorded_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_subject_id ON events(subject_id);
      CREATE INDEX IF NOT EXISTS idx_event ON events(event);
    `);
  }

  /** Journal every event published on the bus. Returns a function that detaches. */
  attach(bus: EscrowEventBus): () => void {
    const unsubscribers = ESCROW_EVENT_NAMES.map((name) =>
      bus.subscribe(name, (payload) => this.enqueue(name, payload))
    );

    return () => {
      for (const unsubscribe of unsubscribers) {
        unsubscribe();
      }
    };
  }

  async record(event: EscrowEventName, payload: LedgerEvent): Promise<void> {
    if (!this.db) throw new Error('Database not initialized');

    const subjectAddress = 'escrowAddress' in payload ? payload.escrowAddress : payload.orderAddress;

    await this.db.run(`
      INSERT INTO events (
        event, subject_id, subject_address, maker, resolver,
        amount, payload, timestamp, recorded_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `, [
      event, payload.id, subjectAddress, payload.maker, payload.resolver,
      payload.amount.toString(), toJson(payload), payload.timestamp, Date.now()
    ]);
  }

  /** Resolves once every queued write has settled. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  async list(filter: ActivityFilter = {}): Promise<ActivityRecord[]> {
    if (!this.db) throw new Error('Database not initialized');
    await this.flush();

    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (filter.subjectId) {
      clauses.push('subject_id = ?');
      params.push(filter.subjectId);
    }

    if (filter.event) {
      clauses.push('event = ?');
      params.push(filter.event);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const limit = filter.limit ? `LIMIT ${Math.max(1, Math.floor(filter.limit))}` : '';

    // newest rows win the limit; results still read oldest first
    const rows = await this.db.all<ActivityRow[]>(`
      SELECT * FROM (
        SELECT * FROM events
        ${where}
        ORDER BY sequence DESC
        ${limit}
      )
      ORDER BY sequence ASC
    `, params);

    return rows.map(this.rowToRecord);
  }

  async count(): Promise<number> {
    if (!this.db) throw new Error('Database not initialized');
    await this.flush();

    const row = await this.db.get<{ total: number }>('SELECT COUNT(*) AS total FROM events');
    return row?.total ?? 0;
  }

  async close(): Promise<void> {
    await this.flush();
    if (this.db) {
      await this.db.close();
      this.db = null;
    }
  }

  private enqueue(event: EscrowEventName, payload: LedgerEvent): void {
    const write: Promise<void> = this.record(event, payload)
      .catch((error) => {
        logger.error(`Failed to journal ${event} for ${payload.id}:`, error);
      })
      .finally(() => {
        this.pending.delete(write);
      });

    this.pending.add(write);
  }

  private rowToRecord(row: ActivityRow): ActivityRecord {
    const payload: unknown = JSON.parse(row.payload);

    return {
      sequence: row.sequence,
      event: row.event,
      subjectId: row.subject_id,
      subjectAddress: row.subject_address,
      maker: row.maker,
      resolver: row.resolver,
      amount: row.amount,
      payload: isRecord(payload) ? payload : {},
      timestamp: row.timestamp,
      recordedAt: row.recorded_at
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
