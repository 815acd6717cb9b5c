// =============================================================================
// CostModel — Pricing rule resolution and decimal cost arithmetic
// =============================================================================

import type { PricingLookupPort } from "../ports/pricing.port.js";
import type { LoggerPort } from "../ports/logging.port.js";
import { describeError } from "../errors.js";
import { money, ZERO, type Money } from "../domain/money.js";
import { MODEL_COSTS, isTiered } from "./model-costs.js";

export interface FlatPricingRule {
  kind: "flat";
  input: Money;
  output: Money;
}

export interface TieredPricingRule {
  kind: "tiered";
  threshold: number;
  inputUnder: Money;
  inputOver: Money;
  outputUnder: Money;
  outputOver: Money;
}

export type PricingRule = FlatPricingRule | TieredPricingRule;

/** Where a rule came from: the lookup port, the static table, or neither */
export type PricingSource = "lookup" | "table" | "default";

export interface ResolvedPricing {
  rule: PricingRule;
  source: PricingSource;
}

export interface TokenRates {
  input: Money;
  output: Money;
}

export interface CostModelOptions {
  pricing?: PricingLookupPort;
  logger?: LoggerPort;
  /** Print a notice when a model has no known price, unless a call says otherwise */
  showCost?: boolean;
}

export const ZERO_RULE: FlatPricingRule = { kind: "flat", input: ZERO, output: ZERO };

export class CostModel {
  private readonly pricing?: PricingLookupPort;
  private readonly logger?: LoggerPort;
  private readonly showCost: boolean;

  /** Models already reported as unpriced */
  readonly unpricedModels = new Set<string>();

  constructor(options: CostModelOptions = {}) {
    this.pricing = options.pricing;
    this.logger = options.logger;
    this.showCost = options.showCost ?? false;
  }

  async resolvePricing(modelName: string, provider?: string, showCost = this.showCost): Promise<PricingRule> {
    const { rule } = await this.resolve(modelName, provider, showCost);
    return rule;
  }

  async resolve(modelName: string, provider?: string, showCost = this.showCost): Promise<ResolvedPricing> {
    if (this.pricing) {
      try {
        const info = await this.pricing.getModelInfo(modelName, provider);
        if (info && info.inputCostPerToken && info.outputCostPerToken) {
          return {
            rule: { kind: "flat", input: money(info.inputCostPerToken), output: money(info.outputCostPerToken) },
            source: "lookup",
          };
        }
      } catch (error) {
        this.logger?.debug("pricing:lookup-failed", { model: modelName, provider, ...describeError(error) });
      }
    }

    const entry = MODEL_COSTS[modelName];
    if (entry) {
      const rule: PricingRule = isTiered(entry)
        ? {
            kind: "tiered",
            threshold: entry.threshold,
            inputUnder: money(entry.inputUnder),
            inputOver: money(entry.inputOver),
            outputUnder: money(entry.outputUnder),
            outputOver: money(entry.outputOver),
          }
        : { kind: "flat", input: money(entry.input), output: money(entry.output) };
      return { rule, source: "table" };
    }

    if (!this.unpricedModels.has(modelName)) {
      this.unpricedModels.add(modelName);
      if (showCost) {
        console.warn(`Could not find costs for model '${modelName}'. Defaulting to 0.0.`);
      }
      this.logger?.info("pricing:unknown-model", { model: modelName, provider });
    }
    return { rule: ZERO_RULE, source: "default" };
  }

  /** Tier is picked by this call's prompt tokens; equality stays in the under tier. */
  ratesFor(rule: PricingRule, promptTokens: number): TokenRates {
    if (rule.kind === "flat") {
      return { input: rule.input, output: rule.output };
    }
    const over = promptTokens > rule.threshold;
    return {
      input: over ? rule.inputOver : rule.inputUnder,
      output: over ? rule.outputOver : rule.outputUnder,
    };
  }

  costOf(rule: PricingRule, promptTokens: number, completionTokens: number): Money {
    const rates = this.ratesFor(rule, promptTokens);
    return rates.input.times(promptTokens).plus(rates.output.times(completionTokens));
  }
}
