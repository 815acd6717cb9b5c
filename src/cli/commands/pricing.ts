// =============================================================================
// pricing — Show the pricing rule resolved for a model
// =============================================================================

import type { LoggerPort } from "../../ports/logging.port.js";
import type { PricingLookupPort } from "../../ports/pricing.port.js";
import { CostModel, type PricingRule, type PricingSource } from "../../accounting/cost-model.js";
import { bold, color, formatTokens } from "../format.js";

const SOURCE_LABELS: Record<PricingSource, string> = {
  lookup: "remote catalog",
  table: "built-in table",
  default: "unknown model (zero cost)",
};

export function describeRule(rule: PricingRule): string[] {
  if (rule.kind === "flat") {
    return [
      `  Input:  $${rule.input.toFixed()} / token`,
      `  Output: $${rule.output.toFixed()} / token`,
    ];
  }
  return [
    `  Prompt tokens <= ${formatTokens(rule.threshold)}:`,
    `    Input:  $${rule.inputUnder.toFixed()} / token`,
    `    Output: $${rule.outputUnder.toFixed()} / token`,
    `  Prompt tokens > ${formatTokens(rule.threshold)}:`,
    `    Input:  $${rule.inputOver.toFixed()} / token`,
    `    Output: $${rule.outputOver.toFixed()} / token`,
  ];
}

export async function runPricing(
  model: string,
  options: { provider?: string; pricing?: PricingLookupPort; logger: LoggerPort },
): Promise<void> {
  const costModel = new CostModel({ pricing: options.pricing, logger: options.logger });
  const { rule, source } = await costModel.resolve(model, options.provider);

  console.log(bold(`\nPricing for ${model}${options.provider ? ` (${options.provider})` : ""}:`));
  console.log(`  Source: ${source === "default" ? color("yellow", SOURCE_LABELS[source]) : SOURCE_LABELS[source]}`);
  for (const line of describeRule(rule)) console.log(line);
  console.log();
}
