// =============================================================================
// NdjsonTrajectoryAdapter — Append-only trajectory file, one JSON record per line
// =============================================================================

import { appendFile, mkdir, readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { randomUUID } from "node:crypto";

import type {
  TrajectoryFilter,
  TrajectoryPort,
  TrajectoryRecord,
  TrajectoryRecordInput,
} from "../../ports/trajectory.port.js";
import type { LoggerPort } from "../../ports/logging.port.js";
import { TrajectoryRecordSchema } from "../../domain/trajectory.schema.js";
import { PersistenceError } from "../../errors.js";
import { matchesFilter } from "./in-memory-trajectory.adapter.js";

export function defaultTrajectoryPath(): string {
  return join(homedir(), ".spendguard", "trajectory.ndjson");
}

export interface NdjsonTrajectoryOptions {
  /** File path (default: ~/.spendguard/trajectory.ndjson) */
  path?: string;
  logger?: LoggerPort;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class NdjsonTrajectoryAdapter implements TrajectoryPort {
  readonly path: string;
  private readonly logger?: LoggerPort;

  constructor(options: NdjsonTrajectoryOptions = {}) {
    this.path = options.path ?? defaultTrajectoryPath();
    this.logger = options.logger;
  }

  async create(input: TrajectoryRecordInput): Promise<TrajectoryRecord> {
    const record: TrajectoryRecord = { ...input, id: randomUUID(), createdAt: Date.now() };
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await appendFile(this.path, JSON.stringify(record) + "\n", "utf-8");
    } catch (error) {
      throw new PersistenceError(
        "trajectory append",
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined,
      );
    }
    return record;
  }

  async list(filter?: TrajectoryFilter): Promise<TrajectoryRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw new PersistenceError(
        "trajectory read",
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined,
      );
    }

    const records: TrajectoryRecord[] = [];
    const lines = raw.split("\n");
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]?.trim();
      if (!line) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        this.logger?.warn("trajectory:bad-line", { path: this.path, line: i + 1 });
        continue;
      }

      const result = TrajectoryRecordSchema.safeParse(parsed);
      if (!result.success) {
        this.logger?.warn("trajectory:bad-line", { path: this.path, line: i + 1 });
        continue;
      }
      if (matchesFilter(result.data, filter)) records.push(result.data);
    }
    return records;
  }
}
