// =============================================================================
// usage — Summarize the recorded trajectory
// =============================================================================

import type { SessionId } from "../../ports/session-store.port.js";
import type { TrajectoryPort, TrajectoryRecord } from "../../ports/trajectory.port.js";
import { money, ZERO, type Money } from "../../domain/money.js";
import { bold, color, formatSeconds, formatTokens, formatUsd } from "../format.js";

export interface ModelUsageSummary {
  model: string;
  calls: number;
  inputTokens: number;
  outputTokens: number;
  cost: Money;
}

export interface TrajectorySummary {
  sessions: number;
  calls: number;
  inputTokens: number;
  outputTokens: number;
  cost: Money;
  duration: number;
  limitEvents: number;
  byModel: ModelUsageSummary[];
}

export function summarizeTrajectory(records: TrajectoryRecord[]): TrajectorySummary {
  const sessions = new Set<string>();
  const byModel = new Map<string, ModelUsageSummary>();
  const summary: TrajectorySummary = {
    sessions: 0,
    calls: 0,
    inputTokens: 0,
    outputTokens: 0,
    cost: ZERO,
    duration: 0,
    limitEvents: 0,
    byModel: [],
  };

  for (const record of records) {
    sessions.add(String(record.sessionId));

    if (record.recordType === "limit_reached") {
      summary.limitEvents++;
      continue;
    }

    const cost = money(record.currentCost);
    summary.calls++;
    summary.inputTokens += record.inputTokens;
    summary.outputTokens += record.outputTokens;
    summary.cost = summary.cost.plus(cost);
    summary.duration += record.stepData.duration;

    const model = record.stepData.model;
    const entry = byModel.get(model) ?? { model, calls: 0, inputTokens: 0, outputTokens: 0, cost: ZERO };
    entry.calls++;
    entry.inputTokens += record.inputTokens;
    entry.outputTokens += record.outputTokens;
    entry.cost = entry.cost.plus(cost);
    byModel.set(model, entry);
  }

  summary.sessions = sessions.size;
  summary.byModel = [...byModel.values()].sort((a, b) => b.cost.comparedTo(a.cost));
  return summary;
}

export async function runUsage(trajectory: TrajectoryPort, sessionId?: SessionId): Promise<void> {
  const records = await trajectory.list(sessionId !== undefined ? { sessionId } : {});
  if (records.length === 0) {
    console.log(color("dim", "No usage records found."));
    return;
  }

  const summary = summarizeTrajectory(records);
  console.log(bold(sessionId !== undefined ? `\nUsage for session ${sessionId}:` : "\nUsage across all sessions:"));
  console.log(`  Sessions:       ${summary.sessions}`);
  console.log(`  Calls:          ${summary.calls}`);
  console.log(`  Input tokens:   ${formatTokens(summary.inputTokens)}`);
  console.log(`  Output tokens:  ${formatTokens(summary.outputTokens)}`);
  console.log(`  Total cost:     ${formatUsd(summary.cost)}`);
  console.log(`  Model time:     ${formatSeconds(summary.duration)}`);
  if (summary.limitEvents > 0) {
    console.log(color("yellow", `  Limit events:   ${summary.limitEvents}`));
  }

  if (summary.byModel.length > 0) {
    console.log(bold("\n  By model:"));
    for (const m of summary.byModel) {
      console.log(
        `    ${m.model}: ${m.calls} call(s), ${formatTokens(m.inputTokens)} in / ${formatTokens(m.outputTokens)} out, ${formatUsd(m.cost)}`,
      );
    }
  }
  console.log();
}
