// =============================================================================
// InMemoryTrajectoryStore — Trajectory records held in process memory
// =============================================================================

import { randomUUID } from "node:crypto";

import type {
  TrajectoryFilter,
  TrajectoryPort,
  TrajectoryRecord,
  TrajectoryRecordInput,
} from "../../ports/trajectory.port.js";

export function matchesFilter(record: TrajectoryRecord, filter: TrajectoryFilter = {}): boolean {
  if (filter.sessionId !== undefined && String(record.sessionId) !== String(filter.sessionId)) return false;
  if (filter.recordType !== undefined && record.recordType !== filter.recordType) return false;
  return true;
}

export class InMemoryTrajectoryStore implements TrajectoryPort {
  private readonly records: TrajectoryRecord[] = [];

  async create(input: TrajectoryRecordInput): Promise<TrajectoryRecord> {
    const record: TrajectoryRecord = { ...input, id: randomUUID(), createdAt: Date.now() };
    this.records.push(record);
    return record;
  }

  async list(filter?: TrajectoryFilter): Promise<TrajectoryRecord[]> {
    return this.records.filter((r) => matchesFilter(r, filter));
  }
}
