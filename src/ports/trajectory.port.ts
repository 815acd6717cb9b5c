// =============================================================================
// TrajectoryPort — Append-only log of usage and limit events per session
// =============================================================================

import type { SessionId } from "./session-store.port.js";

export interface ModelUsageInput {
  recordType: "model_usage";
  sessionId: SessionId;
  /** Cost of this call in currency units, converted from decimal */
  currentCost: number;
  inputTokens: number;
  outputTokens: number;
  stepData: {
    duration: number;
    model: string;
  };
}

export interface LimitReachedInput {
  recordType: "limit_reached";
  sessionId: SessionId;
  stepData: {
    limitType: "cost" | "tokens";
    currentValue: number;
    limitValue: number;
    exitAtLimit: boolean;
  };
}

export type TrajectoryRecordInput = ModelUsageInput | LimitReachedInput;

export type TrajectoryRecord = TrajectoryRecordInput & {
  id: string;
  createdAt: number;
};

export interface TrajectoryFilter {
  sessionId?: SessionId;
  recordType?: TrajectoryRecordInput["recordType"];
}

export interface TrajectoryPort {
  create(record: TrajectoryRecordInput): Promise<TrajectoryRecord>;
  list(filter?: TrajectoryFilter): Promise<TrajectoryRecord[]>;
}
