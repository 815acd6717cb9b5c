#!/usr/bin/env node
// =============================================================================
// spendguard CLI — Main entry point
// =============================================================================

import { parseArgs } from "node:util";

import { ConsoleLoggingAdapter } from "../adapters/logging/console-logging.adapter.js";
import { NdjsonTrajectoryAdapter } from "../adapters/trajectory/ndjson-trajectory.adapter.js";
import { LiteLLMPricingAdapter } from "../adapters/pricing/litellm-pricing.adapter.js";
import { SpendGuardError } from "../errors.js";
import { parseLimitFlags, resolveSettings } from "./config.js";
import { bold, color } from "./format.js";
import { runReplay } from "./commands/replay.js";
import { runUsage } from "./commands/usage.js";
import { runPricing } from "./commands/pricing.js";
import { runConfig } from "./commands/settings.js";

const VERSION = "0.4.0";

const HELP = `
${bold("spendguard")} — Token usage and spend limits for LLM agents

${bold("Usage:")}
  spendguard replay <responses.ndjson> [options]   Account recorded responses
  spendguard usage [--session <id>]                Summarize recorded usage
  spendguard pricing <model> [--provider <name>]   Show the pricing for a model
  spendguard config show                           Show effective settings
  spendguard config set <key> <value>              Save a setting
  spendguard config unset <key>                    Remove a setting

${bold("Options:")}
  --model          Model name for replay (default: unknown)
  --provider       Provider name used for price lookup
  --remote         Look prices up in the LiteLLM catalog first
  --trajectory     Trajectory file (default: ~/.spendguard/trajectory.ndjson)
  --session        Session id filter for usage
  --max-cost       Session cost ceiling in USD
  --max-tokens     Session token ceiling
  --exit-at-limit  Exit at a ceiling instead of asking
  --show-cost      Print cost notices
  --verbose        Debug logging
  --help           Show this help
  --version        Show version

${bold("Settings:")}
  maxCost, maxTokens, exitAtLimit, showCost

${bold("Environment Variables:")}
  SPENDGUARD_MAX_COST, SPENDGUARD_MAX_TOKENS,
  SPENDGUARD_EXIT_AT_LIMIT, SPENDGUARD_SHOW_COST
`;

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      model: { type: "string", short: "m" },
      provider: { type: "string", short: "p" },
      remote: { type: "boolean" },
      trajectory: { type: "string" },
      session: { type: "string", short: "s" },
      "max-cost": { type: "string" },
      "max-tokens": { type: "string" },
      "exit-at-limit": { type: "boolean" },
      "show-cost": { type: "boolean" },
      verbose: { type: "boolean" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
    },
    strict: true,
  });

  if (values.help) {
    console.log(HELP);
    return;
  }

  if (values.version) {
    console.log(`spendguard v${VERSION}`);
    return;
  }

  const logger = new ConsoleLoggingAdapter({ scope: "cli", level: values.verbose ? "debug" : "warn" });
  const trajectory = new NdjsonTrajectoryAdapter({ path: values.trajectory, logger: logger.child("trajectory") });
  const pricing = values.remote ? new LiteLLMPricingAdapter() : undefined;
  const command = positionals[0];

  switch (command) {
    case "replay": {
      const file = positionals[1];
      if (!file) {
        console.error(color("red", "Usage: spendguard replay <responses.ndjson>"));
        process.exitCode = 1;
        return;
      }
      const settings = resolveSettings({ flags: parseLimitFlags(values) });
      return runReplay(file, {
        modelName: values.model ?? "unknown",
        provider: values.provider,
        settings,
        trajectory,
        pricing,
        logger: logger.child("replay"),
      });
    }

    case "usage":
      return runUsage(trajectory, values.session);

    case "pricing": {
      const model = positionals[1] ?? values.model;
      if (!model) {
        console.error(color("red", "Usage: spendguard pricing <model> [--provider <name>] [--remote]"));
        process.exitCode = 1;
        return;
      }
      return runPricing(model, { provider: values.provider, pricing, logger: logger.child("pricing") });
    }

    case "config":
      return runConfig(positionals.slice(1));

    default:
      console.log(HELP);
      if (command) process.exitCode = 1;
  }
}

main().catch((err) => {
  const code = err instanceof SpendGuardError ? ` [${err.code}]` : "";
  console.error(color("red", `\n✗ Fatal error${code}: ${err instanceof Error ? err.message : String(err)}\n`));
  process.exitCode = 1;
});
