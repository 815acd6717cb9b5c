// =============================================================================
// Usage Types — Per-call usage, running totals, limit state
// =============================================================================

import type { Money } from "./money.js";
import type { SessionId } from "../ports/session-store.port.js";

/** Normalized token counts for one LLM call */
export interface UsageEvent {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  durationSeconds: number;
}

export interface RunningTotals {
  /** Last-call snapshot, overwritten on every call */
  totalTokens: number;
  promptTokens: number;
  completionTokens: number;
  /** Additive over the lifetime of the accountant */
  cumulativeTotalTokens: number;
  cumulativePromptTokens: number;
  cumulativeCompletionTokens: number;
  totalCost: Money;
  successfulRequests: number;
}

export interface SessionTotals {
  cost: Money;
  tokens: number;
  inputTokens: number;
  outputTokens: number;
  /** Seconds, summed over calls */
  duration: number;
  sessionId: SessionId | null;
}

export type LimitType = "cost" | "tokens";

export interface LimitBreach {
  limitType: LimitType;
  currentValue: number;
  limitValue: number;
  exitAtLimit: boolean;
}

/** Remembered answer to a limit prompt, global across limit types */
export type UserLimitDecision = "undecided" | "continue" | "exit";

export interface UsageStats {
  totalTokens: number;
  promptTokens: number;
  completionTokens: number;
  totalCost: Money;
  successfulRequests: number;
  modelName: string;
  sessionTotals: SessionTotals;
  cumulativeTokens: {
    total: number;
    prompt: number;
    completion: number;
  };
}
