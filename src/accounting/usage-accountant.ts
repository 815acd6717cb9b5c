// =============================================================================
// UsageAccountant — Lock-guarded usage totals, limit enforcement, persistence
// =============================================================================

import type { ConfigStorePort } from "../ports/config-store.port.js";
import type { SessionId, SessionStorePort } from "../ports/session-store.port.js";
import type { TrajectoryPort } from "../ports/trajectory.port.js";
import type { PricingLookupPort } from "../ports/pricing.port.js";
import type { ConfirmationPort } from "../ports/confirmation.port.js";
import type { LoggerPort } from "../ports/logging.port.js";
import type {
  LimitBreach,
  RunningTotals,
  SessionTotals,
  UsageEvent,
  UsageStats,
  UserLimitDecision,
} from "../domain/usage.js";
import { ZERO, type Money } from "../domain/money.js";
import { DEFAULT_SETTINGS, readSettings, type AccountingSettings } from "../domain/settings.schema.js";
import { describeError } from "../errors.js";
import { ConsoleLoggingAdapter } from "../adapters/logging/console-logging.adapter.js";
import { ReadlineConfirmationAdapter } from "../adapters/confirmation/readline-confirmation.adapter.js";
import { AsyncLock } from "./async-lock.js";
import { CostModel, ZERO_RULE, type PricingRule } from "./cost-model.js";
import { LimitGovernor, declineNotice } from "./limit-governor.js";
import {
  DEFAULT_EXTRACTORS,
  extractUsage,
  normalizeUsage,
  type UsageExtractor,
} from "./usage-extractor.js";

/** Duration recorded when a call ends without a matching start */
export const DEFAULT_CALL_DURATION_SECONDS = 0.1;

export interface UsageAccountantOptions {
  modelName: string;
  provider?: string;
  config?: ConfigStorePort;
  sessions?: SessionStorePort;
  trajectory?: TrajectoryPort;
  pricing?: PricingLookupPort;
  /** Asked when a ceiling is reached (default: readline y/n prompt) */
  confirmation?: ConfirmationPort;
  logger?: LoggerPort;
  /** Process exit hook (default: process.exit) */
  exit?: (code: number) => void;
  /** Millisecond clock (default: Date.now) */
  now?: () => number;
  extractors?: readonly UsageExtractor[];
}

/** Serialized call metadata passed at call start */
export interface CallStartInfo {
  name?: string;
}

export interface ResetOptions {
  modelName?: string;
  provider?: string;
}

function emptyRunningTotals(): RunningTotals {
  return {
    totalTokens: 0,
    promptTokens: 0,
    completionTokens: 0,
    cumulativeTotalTokens: 0,
    cumulativePromptTokens: 0,
    cumulativeCompletionTokens: 0,
    totalCost: ZERO,
    successfulRequests: 0,
  };
}

function emptySessionTotals(sessionId: SessionId | null): SessionTotals {
  return { cost: ZERO, tokens: 0, inputTokens: 0, outputTokens: 0, duration: 0, sessionId };
}

type AccumulationOutcome =
  | { kind: "done" }
  | { kind: "confirm"; breach: LimitBreach };

export class UsageAccountant {
  private readonly config?: ConfigStorePort;
  private readonly sessions?: SessionStorePort;
  private readonly trajectory?: TrajectoryPort;
  private readonly confirmation: ConfirmationPort;
  private readonly logger: LoggerPort;
  private readonly exit: (code: number) => void;
  private readonly now: () => number;
  private readonly extractors: readonly UsageExtractor[];
  private readonly costModel: CostModel;
  private readonly governor = new LimitGovernor();
  private readonly lock = new AsyncLock();
  private readonly promptLock = new AsyncLock();

  private modelName: string;
  private provider?: string;
  private rule: PricingRule = ZERO_RULE;
  private totals: RunningTotals = emptyRunningTotals();
  private session: SessionTotals = emptySessionTotals(null);
  private lastRequestTime: number | null = null;

  private constructor(options: UsageAccountantOptions) {
    this.modelName = options.modelName;
    this.provider = options.provider;
    this.config = options.config;
    this.sessions = options.sessions;
    this.trajectory = options.trajectory;
    this.confirmation = options.confirmation ?? new ReadlineConfirmationAdapter();
    this.logger = options.logger ?? new ConsoleLoggingAdapter({ scope: "accounting", level: "warn" });
    this.exit = options.exit ?? ((code) => process.exit(code));
    this.now = options.now ?? Date.now;
    this.extractors = options.extractors ?? DEFAULT_EXTRACTORS;
    this.costModel = new CostModel({ pricing: options.pricing, logger: this.logger });
  }

  /** Builds an accountant with its pricing rule and session id resolved. */
  static async create(options: UsageAccountantOptions): Promise<UsageAccountant> {
    const accountant = new UsageAccountant(options);
    await accountant.lock.runExclusive(() => accountant.initialize());
    return accountant;
  }

  get currentModelName(): string {
    return this.modelName;
  }

  get decision(): UserLimitDecision {
    return this.governor.decision;
  }

  get pricingRule(): PricingRule {
    return this.rule;
  }

  // ─── Call events ───────────────────────────────────────────────────────────

  onCallStart(serialized?: CallStartInfo): void {
    try {
      this.lastRequestTime = this.now();
      if (serialized?.name) this.modelName = serialized.name;
    } catch (error) {
      this.logger.error("accounting:call-start-failed", describeError(error));
    }
  }

  /** Accounts one finished call. Never throws; may exit the process at a limit. */
  async onCallEnd(response: unknown): Promise<void> {
    try {
      const duration = this.takeDuration();
      const extracted = extractUsage(response, this.extractors);
      if (extracted.modelName) this.modelName = extracted.modelName;
      await this.record(normalizeUsage(extracted.usage, duration));
    } catch (error) {
      this.logger.error("accounting:call-end-failed", describeError(error));
    }
  }

  // ─── Accumulation ──────────────────────────────────────────────────────────

  private takeDuration(): number {
    if (this.lastRequestTime === null) {
      this.logger.debug("accounting:no-start-time", { duration: DEFAULT_CALL_DURATION_SECONDS });
      return DEFAULT_CALL_DURATION_SECONDS;
    }
    const duration = (this.now() - this.lastRequestTime) / 1000;
    this.lastRequestTime = null;
    return duration;
  }

  private async record(event: UsageEvent): Promise<void> {
    let cost: Money = ZERO;

    const outcome = await this.lock.runExclusive(async (): Promise<AccumulationOutcome> => {
      cost = this.accumulate(event);

      const breach = this.checkLimits();
      if (!breach) {
        await this.persistUsage(event, cost);
        return { kind: "done" };
      }

      await this.recordLimitReached(breach);
      const resolution = this.governor.resolve(breach);
      switch (resolution.action) {
        case "continue":
          await this.persistUsage(event, cost);
          return { kind: "done" };
        case "exit":
          console.log(resolution.notice);
          this.exit(0);
          return { kind: "done" };
        case "confirm":
          return { kind: "confirm", breach };
      }
    });

    if (outcome.kind === "confirm") {
      await this.confirmBreach(outcome.breach, event, cost);
    }
  }

  private accumulate(event: UsageEvent): Money {
    const { promptTokens, completionTokens, totalTokens, durationSeconds } = event;
    const totals = this.totals;

    totals.cumulativePromptTokens += promptTokens;
    totals.cumulativeCompletionTokens += completionTokens;
    totals.cumulativeTotalTokens += totalTokens;

    totals.promptTokens = promptTokens;
    totals.completionTokens = completionTokens;
    totals.totalTokens = totalTokens;

    const cost = this.costModel.costOf(this.rule, promptTokens, completionTokens);
    totals.totalCost = totals.totalCost.plus(cost);
    totals.successfulRequests += 1;

    const session = this.session;
    session.cost = session.cost.plus(cost);
    session.inputTokens += promptTokens;
    session.outputTokens += completionTokens;
    session.tokens = session.inputTokens + session.outputTokens;
    session.duration += durationSeconds;

    return cost;
  }

  private settings(): AccountingSettings {
    if (!this.config) return DEFAULT_SETTINGS;
    try {
      return readSettings(this.config, (error) => {
        this.logger.error("accounting:settings-invalid", { field: error.field, ...describeError(error) });
      });
    } catch (error) {
      this.logger.error("accounting:settings-invalid", describeError(error));
      return DEFAULT_SETTINGS;
    }
  }

  private checkLimits(): LimitBreach | null {
    if (!this.config) return null;
    return this.governor.check(this.session, this.settings());
  }

  /** Prompts outside the accumulation lock, one prompt at a time. */
  private async confirmBreach(breach: LimitBreach, event: UsageEvent, cost: Money): Promise<void> {
    await this.promptLock.runExclusive(async () => {
      // Another call may have been answered while this one waited.
      const resolution = this.governor.resolve(breach);
      if (resolution.action === "exit") {
        console.log(resolution.notice);
        this.exit(0);
        return;
      }

      let accepted = true;
      if (resolution.action === "confirm") {
        accepted = await this.confirmation.confirm(resolution.message, false);
        await this.lock.runExclusive(() => this.governor.remember(accepted));
      }

      if (accepted) {
        await this.lock.runExclusive(() => this.persistUsage(event, cost));
      } else {
        console.log(declineNotice(breach.limitType));
        this.exit(0);
      }
    });
  }

  // ─── Persistence ───────────────────────────────────────────────────────────

  private async persistUsage(event: UsageEvent, cost: Money): Promise<void> {
    if (!this.trajectory) return;

    const sessionId = this.session.sessionId;
    if (sessionId === null) {
      this.logger.warn("accounting:session-missing", { message: "session_id not initialized" });
      return;
    }

    try {
      await this.trajectory.create({
        recordType: "model_usage",
        sessionId,
        currentCost: cost.toNumber(),
        inputTokens: event.promptTokens,
        outputTokens: event.completionTokens,
        stepData: { duration: event.durationSeconds, model: this.modelName },
      });
    } catch (error) {
      this.logger.error("accounting:persist-failed", { recordType: "model_usage", ...describeError(error) });
    }
  }

  private async recordLimitReached(breach: LimitBreach): Promise<void> {
    const sessionId = this.session.sessionId;
    if (!this.trajectory || sessionId === null) return;

    try {
      await this.trajectory.create({
        recordType: "limit_reached",
        sessionId,
        stepData: {
          limitType: breach.limitType,
          currentValue: breach.currentValue,
          limitValue: breach.limitValue,
          exitAtLimit: breach.exitAtLimit,
        },
      });
    } catch (error) {
      this.logger.error("accounting:persist-failed", { recordType: "limit_reached", ...describeError(error) });
    }
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  private async initialize(): Promise<void> {
    try {
      this.rule = await this.costModel.resolvePricing(this.modelName, this.provider, this.settings().showCost);
      this.session.sessionId = await this.currentSessionId();
    } catch (error) {
      this.logger.error("accounting:init-failed", { model: this.modelName, ...describeError(error) });
    }
  }

  private async currentSessionId(): Promise<SessionId | null> {
    if (!this.sessions) return null;
    const current = await this.sessions.getCurrentSession();
    return current?.id ?? null;
  }

  /** Zeroes the session totals, keeping the session id. */
  async resetSessionTotals(): Promise<void> {
    await this.lock.runExclusive(() => {
      this.session = emptySessionTotals(this.session.sessionId);
    });
  }

  /**
   * Clears every counter and the remembered limit decision, then re-resolves
   * pricing (optionally for another model) and the current session.
   */
  async resetAllTotals(next: ResetOptions = {}): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.totals = emptyRunningTotals();
      this.session = emptySessionTotals(null);
      this.lastRequestTime = null;
      this.rule = ZERO_RULE;
      this.governor.reset();
      if (next.modelName) this.modelName = next.modelName;
      if (next.provider !== undefined) this.provider = next.provider;
      await this.initialize();
    });
  }

  // ─── Reporting ─────────────────────────────────────────────────────────────

  getStats(): UsageStats {
    const { totals, session } = this;
    return {
      totalTokens: totals.totalTokens,
      promptTokens: totals.promptTokens,
      completionTokens: totals.completionTokens,
      totalCost: totals.totalCost,
      successfulRequests: totals.successfulRequests,
      modelName: this.modelName,
      sessionTotals: { ...session },
      cumulativeTokens: {
        total: totals.cumulativeTotalTokens,
        prompt: totals.cumulativePromptTokens,
        completion: totals.cumulativeCompletionTokens,
      },
    };
  }

  toString(): string {
    const { promptTokens, completionTokens, successfulRequests, totalCost } = this.totals;
    return [
      `Tokens Used: ${promptTokens + completionTokens}`,
      `\tPrompt Tokens: ${promptTokens}`,
      `\tCompletion Tokens: ${completionTokens}`,
      `Successful Requests: ${successfulRequests}`,
      `Total Cost (USD): $${totalCost.toFixed(6)}`,
    ].join("\n");
  }
}
