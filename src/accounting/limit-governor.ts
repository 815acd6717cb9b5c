// =============================================================================
// LimitGovernor — Cost/token ceilings and the remembered user decision
// =============================================================================

import type { LimitBreach, LimitType, SessionTotals, UserLimitDecision } from "../domain/usage.js";

export interface LimitSettings {
  /** null or <= 0 disables the ceiling */
  maxCost: number | null;
  maxTokens: number | null;
  exitAtLimit: boolean;
}

export type LimitResolution =
  | { action: "continue" }
  | { action: "exit"; notice: string }
  | { action: "confirm"; message: string };

function isActive(limit: number | null): limit is number {
  return limit !== null && limit > 0;
}

/** Cost is checked before tokens; a value equal to the ceiling is a breach. */
export function checkLimits(totals: SessionTotals, settings: LimitSettings): LimitBreach | null {
  if (isActive(settings.maxCost) && totals.cost.gte(settings.maxCost)) {
    return {
      limitType: "cost",
      currentValue: totals.cost.toNumber(),
      limitValue: settings.maxCost,
      exitAtLimit: settings.exitAtLimit,
    };
  }

  if (isActive(settings.maxTokens) && totals.tokens >= settings.maxTokens) {
    return {
      limitType: "tokens",
      currentValue: totals.tokens,
      limitValue: settings.maxTokens,
      exitAtLimit: settings.exitAtLimit,
    };
  }

  return null;
}

export function formatLimitMessage(limitType: LimitType, currentValue: number, limitValue: number): string {
  if (limitType === "cost") {
    return `Cost limit exceeded: $${currentValue.toFixed(6)} >= $${limitValue.toFixed(6)}. Continue anyway?`;
  }
  return `Token limit exceeded: ${currentValue.toLocaleString("en-US")} >= ${limitValue.toLocaleString("en-US")}. Continue anyway?`;
}

export function declineNotice(limitType: LimitType): string {
  return `User chose to exit after ${limitType} limit warning.`;
}

export class LimitGovernor {
  private userDecision: UserLimitDecision = "undecided";

  get decision(): UserLimitDecision {
    return this.userDecision;
  }

  check(totals: SessionTotals, settings: LimitSettings): LimitBreach | null {
    return checkLimits(totals, settings);
  }

  /** Decides what a breach leads to. Never prompts itself. */
  resolve(breach: LimitBreach): LimitResolution {
    const { limitType, currentValue, limitValue } = breach;

    switch (this.userDecision) {
      case "continue":
        return { action: "continue" };
      case "exit":
        return {
          action: "exit",
          notice: `Exiting due to ${limitType} limit (${currentValue} >= ${limitValue}) and previous user decision to not continue.`,
        };
      case "undecided":
        if (breach.exitAtLimit) {
          return {
            action: "exit",
            notice: `Exiting due to ${limitType} limit reached: ${currentValue} >= ${limitValue} (auto-exit enabled).`,
          };
        }
        return { action: "confirm", message: formatLimitMessage(limitType, currentValue, limitValue) };
    }
  }

  remember(accepted: boolean): void {
    this.userDecision = accepted ? "continue" : "exit";
  }

  reset(): void {
    this.userDecision = "undecided";
  }
}
