// =============================================================================
// config — Limit settings in ~/.spendguardrc
// =============================================================================

import { isSettingKey, SETTING_KEYS } from "../../domain/settings.schema.js";
import { ConfigValidationError } from "../../errors.js";
import { loadConfig, resolveSettings, setSetting, unsetSetting } from "../config.js";
import { bold, color } from "../format.js";

function formatValue(value: unknown): string {
  return value === null || value === undefined ? color("dim", "(not set)") : String(value);
}

export function runConfig(args: string[]): void {
  const subcommand = args[0];

  switch (subcommand) {
    case "show":
    case undefined: {
      const stored = loadConfig();
      const effective = resolveSettings({ rc: stored });
      console.log(bold("\nConfiguration (~/.spendguardrc):"));
      for (const key of SETTING_KEYS) {
        const fromFile = key in stored ? "" : color("dim", " (default/env)");
        console.log(`  ${key}: ${formatValue(effective[key])}${fromFile}`);
      }
      console.log();
      break;
    }

    case "set": {
      const key = args[1];
      const value = args[2];
      if (!key || value === undefined) {
        console.error(color("red", "Usage: spendguard config set <key> <value>"));
        process.exitCode = 1;
        return;
      }
      if (!isSettingKey(key)) {
        console.error(color("red", `Unknown setting: ${key}`));
        console.log(color("dim", `Available: ${SETTING_KEYS.join(", ")}`));
        process.exitCode = 1;
        return;
      }
      try {
        const config = setSetting(key, value);
        console.log(color("green", `✓ ${key} set to ${formatValue(config[key])}`));
      } catch (error) {
        if (!(error instanceof ConfigValidationError)) throw error;
        console.error(color("red", error.message));
        process.exitCode = 1;
      }
      break;
    }

    case "unset": {
      const key = args[1];
      if (!key || !isSettingKey(key)) {
        console.error(color("red", `Usage: spendguard config unset <${SETTING_KEYS.join("|")}>`));
        process.exitCode = 1;
        return;
      }
      if (unsetSetting(key)) {
        console.log(color("green", `✓ ${key} removed`));
      } else {
        console.log(color("yellow", `${key} was not set`));
      }
      break;
    }

    default:
      console.error(color("red", "Usage: spendguard config [show|set|unset]"));
      process.exitCode = 1;
  }
}
