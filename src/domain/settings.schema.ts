// =============================================================================
// Settings Schema — Spend ceilings and display flags
// =============================================================================

import { z } from "zod";

import type { ConfigStorePort } from "../ports/config-store.port.js";
import { ConfigValidationError } from "../errors.js";

export const AccountingSettingsSchema = z.object({
  /** Session cost ceiling in currency units; null or <= 0 disables it */
  maxCost: z.number().finite().nullable().default(null),
  /** Session token ceiling; null or <= 0 disables it */
  maxTokens: z.number().int().nullable().default(null),
  /** Exit without prompting when a ceiling is reached */
  exitAtLimit: z.boolean().default(false),
  /** Print console notices about cost (e.g. unknown model pricing) */
  showCost: z.boolean().default(false),
});

export type AccountingSettings = z.infer<typeof AccountingSettingsSchema>;

export type SettingKey = keyof AccountingSettings;

export const SETTING_KEYS: readonly SettingKey[] = [
  "maxCost",
  "maxTokens",
  "exitAtLimit",
  "showCost",
];

export const DEFAULT_SETTINGS: AccountingSettings = AccountingSettingsSchema.parse({});

export function isSettingKey(key: string): key is SettingKey {
  return (SETTING_KEYS as readonly string[]).includes(key);
}

/**
 * Reads and validates each setting on its own. Missing or null entries fall
 * back to their defaults. A malformed entry throws, unless `onInvalid` is
 * given: it then receives the error and that key alone takes its default.
 */
export function readSettings(
  store: ConfigStorePort,
  onInvalid?: (error: ConfigValidationError) => void,
): AccountingSettings {
  const raw: Record<string, unknown> = {};
  for (const key of SETTING_KEYS) {
    const value = store.get(key);
    if (value === undefined || value === null) continue;

    const parsed = AccountingSettingsSchema.shape[key].safeParse(value);
    if (parsed.success) {
      raw[key] = parsed.data;
      continue;
    }

    const error = new ConfigValidationError(parsed.error.issues[0]?.message ?? "invalid value", key);
    if (!onInvalid) throw error;
    onInvalid(error);
  }
  return AccountingSettingsSchema.parse(raw);
}
