import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import type { BackendType, RoutingEventSnapshot, RoutingEventType } from '../types/routing.js';
import { scrubSensitiveText } from '../utils/logger.js';

export interface RoutingEventStoreOptions {
  /** SQLite file, or `:memory:`. */
  dbPath: string;
  maxRuntimeEvents?: number;
  maxPersistedEvents?: number;
  now?: () => number;
}

export interface RoutingEventInput {
  type: RoutingEventType;
  backend?: BackendType | null;
  detail: string;
  correlationId?: string | null;
}

interface RoutingEventRow {
  id: string;
  event_type: RoutingEventType;
  backend: BackendType | null;
  detail: string;
  correlation_id: string | null;
  created_at: string;
}

const DEFAULT_MAX_RUNTIME_EVENTS = 120;
const DEFAULT_MAX_PERSISTED_EVENTS = 500;
const DEFAULT_BOOTSTRAP_EVENT_COUNT = 30;
const TRIM_INTERVAL = 25;

const EVENT_TYPES: readonly RoutingEventType[] = [
  'decision',
  'fallback',
  'failure',
  'success',
  'circuit_change',
  'capability_refresh',
  'cache_invalidated',
];

function isEventRow(value: unknown): value is RoutingEventRow {
  if (typeof value !== 'object' || value === null) return false;
  const id: unknown = Reflect.get(value, 'id');
  const type: unknown = Reflect.get(value, 'event_type');
  const backend: unknown = Reflect.get(value, 'backend');
  const detail: unknown = Reflect.get(value, 'detail');
  const correlationId: unknown = Reflect.get(value, 'correlation_id');
  const createdAt: unknown = Reflect.get(value, 'created_at');
  return (
    typeof id === 'string' &&
    EVENT_TYPES.some((known) => known === type) &&
    (backend === null || backend === 'primary' || backend === 'legacy') &&
    typeof detail === 'string' &&
    (correlationId === null || typeof correlationId === 'string') &&
    typeof createdAt === 'string'
  );
}

function toSnapshot(row: RoutingEventRow): RoutingEventSnapshot {
  return {
    id: row.id,
    type: row.event_type,
    backend: row.backend,
    detail: scrubSensitiveText(row.detail),
    correlationId: row.correlation_id,
    createdAt: row.created_at,
  };
}

/**
 * Routing telemetry journal: a bounded in-process ring for the control plane and a
 * bounded SQLite table that survives restarts.
 */
export class RoutingEventStore {
  private readonly db: Database.Database;
  private readonly runtimeEvents: RoutingEventSnapshot[] = [];
  private readonly maxRuntimeEvents: number;
  private readonly maxPersistedEvents: number;
  private readonly nowFn: () => number;
  private readonly insertStatement: Database.Statement;
  private readonly selectStatement: Database.Statement;
  private readonly trimStatement: Database.Statement;
  private insertsSinceTrim = 0;

  constructor(options: RoutingEventStoreOptions) {
    if (options.dbPath !== ':memory:') {
      mkdirSync(path.dirname(path.resolve(options.dbPath)), { recursive: true });
    }
    this.db = new Database(options.dbPath);
    this.maxRuntimeEvents = Math.max(10, Math.floor(options.maxRuntimeEvents ?? DEFAULT_MAX_RUNTIME_EVENTS));
    this.maxPersistedEvents = Math.max(50, Math.floor(options.maxPersistedEvents ?? DEFAULT_MAX_PERSISTED_EVENTS));
    this.nowFn = options.now ?? (() => Date.now());

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS routing_events (
        id TEXT PRIMARY KEY,
        event_type TEXT NOT NULL,
        backend TEXT,
        detail TEXT NOT NULL DEFAULT '',
        correlation_id TEXT,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_routing_events_created
        ON routing_events(created_at DESC);
    `);

    this.insertStatement = this.db.prepare(`
      INSERT INTO routing_events (id, event_type, backend, detail, correlation_id, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    this.selectStatement = this.db.prepare(`
      SELECT id, event_type, backend, detail, correlation_id, created_at
      FROM routing_events
      ORDER BY created_at DESC, rowid DESC
      LIMIT ?
    `);
    this.trimStatement = this.db.prepare(`
      DELETE FROM routing_events
      WHERE id IN (
        SELECT id
        FROM routing_events
        ORDER BY created_at DESC, rowid DESC
        LIMIT -1 OFFSET ?
      )
    `);

    this.hydrateRecentEvents();
  }

  public record(input: RoutingEventInput): RoutingEventSnapshot {
    const event: RoutingEventSnapshot = {
      id: randomUUID(),
      type: input.type,
      backend: input.backend ?? null,
      detail: scrubSensitiveText(input.detail),
      correlationId: input.correlationId ?? null,
      createdAt: new Date(this.nowFn()).toISOString(),
    };

    this.runtimeEvents.unshift(event);
    if (this.runtimeEvents.length > this.maxRuntimeEvents) {
      this.runtimeEvents.splice(this.maxRuntimeEvents);
    }

    try {
      this.persist(event);
    } catch (error) {
      const message = scrubSensitiveText(error instanceof Error ? error.message : String(error));
      console.warn(`[RoutingEvents] Failed to persist routing event: ${message}`);
    }
    return event;
  }

  /** Newest first, from the in-process ring. */
  public listRecent(limit = 50): RoutingEventSnapshot[] {
    const bounded = Math.max(1, Math.min(this.maxRuntimeEvents, Math.floor(limit)));
    return this.runtimeEvents.slice(0, bounded);
  }

  /** Newest first, from SQLite. */
  public listPersisted(limit = 80): RoutingEventSnapshot[] {
    const bounded = Math.max(1, Math.min(this.maxPersistedEvents, Math.floor(limit)));
    this.trimIfPending();
    const rows: unknown[] = this.selectStatement.all(bounded);
    return rows.filter(isEventRow).map(toSnapshot);
  }

  public countPersisted(): number {
    this.trimIfPending();
    const row: unknown = this.db.prepare('SELECT COUNT(*) AS total FROM routing_events').get();
    const total: unknown = typeof row === 'object' && row !== null ? Reflect.get(row, 'total') : 0;
    return typeof total === 'number' ? total : 0;
  }

  public close(): void {
    this.trimIfPending();
    this.db.close();
  }

  private persist(event: RoutingEventSnapshot): void {
    this.insertStatement.run(event.id, event.type, event.backend, event.detail, event.correlationId, event.createdAt);

    this.insertsSinceTrim += 1;
    if (this.insertsSinceTrim >= TRIM_INTERVAL) {
      this.trimIfPending();
    }
  }

  /** The table may run up to TRIM_INTERVAL rows over its cap between trims; reads trim first. */
  private trimIfPending(): void {
    if (this.insertsSinceTrim === 0) return;
    this.trimStatement.run(this.maxPersistedEvents);
    this.insertsSinceTrim = 0;
  }

  private hydrateRecentEvents(): void {
    try {
      this.runtimeEvents.push(...this.listPersisted(Math.min(this.maxRuntimeEvents, DEFAULT_BOOTSTRAP_EVENT_COUNT)));
    } catch (error) {
      const message = scrubSensitiveText(error instanceof Error ? error.message : String(error));
      console.warn(`[RoutingEvents] Failed to hydrate routing events: ${message}`);
    }
  }
}
