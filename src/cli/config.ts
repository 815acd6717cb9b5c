// =============================================================================
// CLI Config — ~/.spendguardrc, environment overrides, limit flags
// =============================================================================

import { readFileSync, writeFileSync, existsSync, chmodSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";

import {
  AccountingSettingsSchema,
  DEFAULT_SETTINGS,
  SETTING_KEYS,
  type AccountingSettings,
  type SettingKey,
} from "../domain/settings.schema.js";
import { ConfigValidationError } from "../errors.js";

const CONFIG_FILE = ".spendguardrc";

const PartialSettingsSchema = AccountingSettingsSchema.partial();

export type PartialSettings = Partial<AccountingSettings>;

export const ENV_MAP: Record<SettingKey, string> = {
  maxCost: "SPENDGUARD_MAX_COST",
  maxTokens: "SPENDGUARD_MAX_TOKENS",
  exitAtLimit: "SPENDGUARD_EXIT_AT_LIMIT",
  showCost: "SPENDGUARD_SHOW_COST",
};

export function configPath(): string {
  return join(homedir(), CONFIG_FILE);
}

function validatePartial(raw: Record<string, unknown>): PartialSettings {
  const parsed = PartialSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigValidationError(issue?.message ?? "invalid value", issue?.path.join("."));
  }
  return parsed.data;
}

function defined(layer: PartialSettings): Record<string, unknown> {
  return Object.fromEntries(Object.entries(layer).filter(([, value]) => value !== undefined));
}

// ─────────────────────────────────────────────────────────────────────────────
// Value parsing
// ─────────────────────────────────────────────────────────────────────────────

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

/** Parses a textual setting value; "none" clears a numeric ceiling. */
export function parseSettingValue(key: SettingKey, raw: string): unknown {
  const text = raw.trim().toLowerCase();

  if (key === "maxCost" || key === "maxTokens") {
    if (text === "none" || text === "null") return null;
    const value = Number(text);
    if (text === "" || Number.isNaN(value)) {
      throw new ConfigValidationError(`expected a number, got "${raw}"`, key);
    }
    return value;
  }

  if (TRUE_VALUES.has(text)) return true;
  if (FALSE_VALUES.has(text)) return false;
  throw new ConfigValidationError(`expected true or false, got "${raw}"`, key);
}

// ─────────────────────────────────────────────────────────────────────────────
// Rc file
// ─────────────────────────────────────────────────────────────────────────────

export function loadConfig(): PartialSettings {
  const path = configPath();
  if (!existsSync(path)) return {};
  const warning = `Warning: ~/${CONFIG_FILE} is corrupted or unreadable. Using empty config.`;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch {
    console.error(warning);
    return {};
  }

  const parsed = PartialSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    console.error(warning);
    return {};
  }
  return parsed.data;
}

export function saveConfig(config: PartialSettings): void {
  const path = configPath();
  writeFileSync(path, JSON.stringify(config, null, 2) + "\n", {
    encoding: "utf-8",
    mode: 0o600,
  });
  chmodSync(path, 0o600);
}

export function setSetting(key: SettingKey, raw: string): PartialSettings {
  const update = validatePartial({ [key]: parseSettingValue(key, raw) });
  const config = { ...loadConfig(), ...update };
  saveConfig(config);
  return config;
}

export function unsetSetting(key: SettingKey): boolean {
  const config = loadConfig();
  if (!(key in config)) return false;
  delete config[key];
  saveConfig(config);
  return true;
}

// ─────────────────────────────────────────────────────────────────────────────
// Environment and flags
// ─────────────────────────────────────────────────────────────────────────────

export function envSettings(env: NodeJS.ProcessEnv = process.env): PartialSettings {
  const raw: Record<string, unknown> = {};
  for (const key of SETTING_KEYS) {
    const value = env[ENV_MAP[key]];
    if (value === undefined || value === "") continue;
    raw[key] = parseSettingValue(key, value);
  }
  return validatePartial(raw);
}

export interface LimitFlagValues {
  "max-cost"?: string;
  "max-tokens"?: string;
  "exit-at-limit"?: boolean;
  "show-cost"?: boolean;
}

/** `--max-cost 5.0` → `{ maxCost: 5 }`; absent flags stay absent. */
export function parseLimitFlags(values: LimitFlagValues): PartialSettings {
  const raw: Record<string, unknown> = {};
  if (values["max-cost"] !== undefined) raw.maxCost = parseSettingValue("maxCost", values["max-cost"]);
  if (values["max-tokens"] !== undefined) raw.maxTokens = parseSettingValue("maxTokens", values["max-tokens"]);
  if (values["exit-at-limit"]) raw.exitAtLimit = true;
  if (values["show-cost"]) raw.showCost = true;
  return validatePartial(raw);
}

export interface SettingsSources {
  flags?: PartialSettings;
  env?: NodeJS.ProcessEnv;
  rc?: PartialSettings;
}

/** Flags win over environment, environment over the rc file. */
export function resolveSettings(sources: SettingsSources = {}): AccountingSettings {
  const merged = {
    ...DEFAULT_SETTINGS,
    ...defined(sources.rc ?? loadConfig()),
    ...defined(envSettings(sources.env)),
    ...defined(sources.flags ?? {}),
  };
  return AccountingSettingsSchema.parse(merged);
}
