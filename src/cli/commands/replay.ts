// =============================================================================
// replay — Account recorded LLM responses under a fresh session
// =============================================================================

import { readFile } from "node:fs/promises";

import type { AccountingSettings } from "../../domain/settings.schema.js";
import type { LoggerPort } from "../../ports/logging.port.js";
import type { PricingLookupPort } from "../../ports/pricing.port.js";
import type { TrajectoryPort } from "../../ports/trajectory.port.js";
import { UsageAccountant } from "../../accounting/usage-accountant.js";
import { InMemoryConfigStore } from "../../adapters/config/in-memory-config.adapter.js";
import { InMemorySessionStore } from "../../adapters/session/in-memory-session.adapter.js";
import { box, color } from "../format.js";

export interface ReplayOptions {
  modelName: string;
  provider?: string;
  settings: AccountingSettings;
  trajectory: TrajectoryPort;
  pricing?: PricingLookupPort;
  logger: LoggerPort;
  exit?: (code: number) => void;
}

export interface ReplayResult {
  accountant: UsageAccountant;
  sessionId: string | number;
  replayed: number;
  skipped: number;
}

/** Feeds each non-blank NDJSON line to a new accountant, in order. */
export async function replayResponses(lines: string[], options: ReplayOptions): Promise<ReplayResult> {
  const sessions = new InMemorySessionStore();
  const session = await sessions.startSession({ source: "replay" });

  const accountant = await UsageAccountant.create({
    modelName: options.modelName,
    provider: options.provider,
    config: new InMemoryConfigStore({ ...options.settings }),
    sessions,
    trajectory: options.trajectory,
    pricing: options.pricing,
    logger: options.logger,
    exit: options.exit,
  });

  let replayed = 0;
  let skipped = 0;
  for (const [index, line] of lines.entries()) {
    if (!line.trim()) continue;

    let response: unknown;
    try {
      response = JSON.parse(line);
    } catch {
      options.logger.warn("replay:bad-line", { line: index + 1 });
      skipped++;
      continue;
    }

    await accountant.onCallEnd(response);
    replayed++;
  }

  return { accountant, sessionId: session.id, replayed, skipped };
}

export async function runReplay(file: string, options: ReplayOptions): Promise<void> {
  const content = await readFile(file, "utf-8");
  const result = await replayResponses(content.split("\n"), options);

  const summary = [
    `Session: ${result.sessionId}`,
    `Model: ${result.accountant.currentModelName}`,
    `Responses: ${result.replayed}${result.skipped ? ` (${result.skipped} skipped)` : ""}`,
    "",
    result.accountant.toString().replaceAll("\t", "  "),
  ].join("\n");

  console.log(box("Replay", summary));
  if (result.skipped > 0) {
    console.log(color("yellow", `  ⚠ ${result.skipped} line(s) were not valid JSON`));
  }
}
