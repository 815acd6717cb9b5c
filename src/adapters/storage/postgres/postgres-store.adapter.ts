// =============================================================================
// PostgresStore — Trajectory and session persistence on PostgreSQL
// =============================================================================
//
// Requires: pg
// Tables: <prefix>_sessions (id, created_at, metadata JSONB)
//         <prefix>_trajectory (id, session_id, record_type, current_cost,
//                              input_tokens, output_tokens, step_data JSONB,
//                              created_at)
//
// Usage:
//   const store = new PostgresStore({ connectionString: '...' })
//   await store.initialize() // creates tables if not exist
//   const accountant = await UsageAccountant.create({
//     modelName, sessions: store, trajectory: store,
//   })
//
// =============================================================================

import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { QueryResultRow } from "pg";

import type { SessionRecord, SessionStorePort } from "../../../ports/session-store.port.js";
import type {
  TrajectoryFilter,
  TrajectoryPort,
  TrajectoryRecord,
  TrajectoryRecordInput,
} from "../../../ports/trajectory.port.js";
import { TrajectoryRecordSchema } from "../../../domain/trajectory.schema.js";
import { PersistenceError } from "../../../errors.js";

/** The subset of pg.Pool the store talks to */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end?(): Promise<void>;
}

export interface PostgresStoreOptions {
  /** PostgreSQL connection string, used when no pool is given */
  connectionString?: string;
  /** Existing pool or client */
  pool?: PgQueryable;
  /** Schema name (default: 'public') */
  schema?: string;
  /** Table name prefix (default: 'spendguard') */
  tablePrefix?: string;
  /** Pool size (default: 10) */
  poolSize?: number;
}

const SessionRowSchema = z.object({
  id: z.string(),
  created_at: z.coerce.number(),
  metadata: z.record(z.unknown()).nullable().optional(),
});

const TrajectoryRowSchema = z.object({
  id: z.string(),
  session_id: z.string(),
  record_type: z.string(),
  current_cost: z.coerce.number().nullable(),
  input_tokens: z.coerce.number().nullable(),
  output_tokens: z.coerce.number().nullable(),
  step_data: z.unknown(),
  created_at: z.coerce.number(),
});

function parseJson(value: unknown): unknown {
  return typeof value === "string" ? JSON.parse(value) : value;
}

export function rowToRecord(row: unknown): TrajectoryRecord {
  const r = TrajectoryRowSchema.parse(row);
  return TrajectoryRecordSchema.parse({
    id: r.id,
    createdAt: r.created_at,
    recordType: r.record_type,
    sessionId: r.session_id,
    stepData: parseJson(r.step_data),
    ...(r.record_type === "model_usage"
      ? {
          currentCost: r.current_cost ?? 0,
          inputTokens: r.input_tokens ?? 0,
          outputTokens: r.output_tokens ?? 0,
        }
      : {}),
  });
}

export class PostgresStore implements TrajectoryPort, SessionStorePort {
  private db: PgQueryable | null;
  private readonly options: PostgresStoreOptions;
  private readonly sessionsTable: string;
  private readonly trajectoryTable: string;
  private readonly prefix: string;

  constructor(options: PostgresStoreOptions) {
    this.options = options;
    this.db = options.pool ?? null;
    const schema = options.schema ?? "public";
    this.prefix = options.tablePrefix ?? "spendguard";
    this.sessionsTable = `${schema}.${this.prefix}_sessions`;
    this.trajectoryTable = `${schema}.${this.prefix}_trajectory`;
  }

  /** Opens the pool when needed and creates tables if not exist */
  async initialize(): Promise<void> {
    if (!this.db) {
      if (!this.options.connectionString) {
        throw new PersistenceError("postgres initialize", "connectionString or pool is required");
      }
      const { default: pg } = await import("pg");
      const pool = new pg.Pool({
        connectionString: this.options.connectionString,
        max: this.options.poolSize ?? 10,
      });
      this.db = {
        query: (text, values) => pool.query<QueryResultRow, unknown[]>(text, values),
        end: () => pool.end(),
      };
    }

    await this.run("postgres initialize", `
      CREATE TABLE IF NOT EXISTS ${this.sessionsTable} (
        id TEXT PRIMARY KEY,
        created_at BIGINT NOT NULL,
        metadata JSONB
      )
    `);

    await this.run("postgres initialize", `
      CREATE TABLE IF NOT EXISTS ${this.trajectoryTable} (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        record_type TEXT NOT NULL,
        current_cost DOUBLE PRECISION,
        input_tokens INTEGER,
        output_tokens INTEGER,
        step_data JSONB NOT NULL DEFAULT '{}',
        created_at BIGINT NOT NULL
      )
    `);

    await this.run("postgres initialize", `
      CREATE INDEX IF NOT EXISTS idx_${this.prefix}_trajectory_session
      ON ${this.trajectoryTable} (session_id)
    `);
  }

  // ─── Sessions ──────────────────────────────────────────────────────────────

  async startSession(metadata?: Record<string, unknown>): Promise<SessionRecord> {
    const record: SessionRecord = { id: randomUUID(), createdAt: Date.now(), metadata };
    await this.run(
      "session insert",
      `INSERT INTO ${this.sessionsTable} (id, created_at, metadata) VALUES ($1, $2, $3)`,
      [record.id, record.createdAt, metadata ? JSON.stringify(metadata) : null],
    );
    return record;
  }

  async getCurrentSession(): Promise<SessionRecord | null> {
    const rows = await this.run(
      "session read",
      `SELECT * FROM ${this.sessionsTable} ORDER BY created_at DESC LIMIT 1`,
    );
    if (rows.length === 0) return null;
    const row = SessionRowSchema.parse(rows[0]);
    return { id: row.id, createdAt: row.created_at, metadata: row.metadata ?? undefined };
  }

  // ─── Trajectory ────────────────────────────────────────────────────────────

  async create(input: TrajectoryRecordInput): Promise<TrajectoryRecord> {
    const record: TrajectoryRecord = { ...input, id: randomUUID(), createdAt: Date.now() };
    const usage = record.recordType === "model_usage" ? record : null;
    await this.run(
      "trajectory insert",
      `INSERT INTO ${this.trajectoryTable}
         (id, session_id, record_type, current_cost, input_tokens, output_tokens, step_data, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        record.id,
        String(record.sessionId),
        record.recordType,
        usage?.currentCost ?? null,
        usage?.inputTokens ?? null,
        usage?.outputTokens ?? null,
        JSON.stringify(record.stepData),
        record.createdAt,
      ],
    );
    return record;
  }

  async list(filter: TrajectoryFilter = {}): Promise<TrajectoryRecord[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filter.sessionId !== undefined) {
      values.push(String(filter.sessionId));
      conditions.push(`session_id = $${values.length}`);
    }
    if (filter.recordType !== undefined) {
      values.push(filter.recordType);
      conditions.push(`record_type = $${values.length}`);
    }

    const where = conditions.length > 0 ? ` WHERE ${conditions.join(" AND ")}` : "";
    const rows = await this.run(
      "trajectory read",
      `SELECT * FROM ${this.trajectoryTable}${where} ORDER BY created_at ASC`,
      values,
    );
    return rows.map(rowToRecord);
  }

  /** Close the pool */
  async close(): Promise<void> {
    await this.db?.end?.();
  }

  private async run(operation: string, text: string, values?: unknown[]): Promise<unknown[]> {
    if (!this.db) {
      throw new PersistenceError(operation, "store is not initialized");
    }
    try {
      const result = await this.db.query(text, values);
      return result.rows;
    } catch (error) {
      throw new PersistenceError(
        operation,
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined,
      );
    }
  }
}
