// =============================================================================
// Model costs — Static per-token price table
// =============================================================================

/** Flat per-token rates, USD, as decimal strings. */
export interface FlatModelCost {
  input: string;
  output: string;
}

/** Rates switch to the "over" tier once prompt tokens exceed `threshold`. */
export interface TieredModelCost {
  threshold: number;
  inputUnder: string;
  inputOver: string;
  outputUnder: string;
  outputOver: string;
}

export type ModelCostEntry = FlatModelCost | TieredModelCost;

const GEMINI_PRO_TIERS: TieredModelCost = {
  threshold: 200_000,
  inputUnder: "0.00000125",
  inputOver: "0.0000025",
  outputUnder: "0.00001",
  outputOver: "0.000015",
};

// Lookup is by exact model name.
export const MODEL_COSTS: Readonly<Record<string, ModelCostEntry>> = {
  // Anthropic
  "claude-3-7-sonnet-20250219":               { input: "0.000003", output: "0.000015" },
  "claude-3-opus-20240229":                   { input: "0.000015", output: "0.000075" },
  "claude-3-sonnet-20240229":                 { input: "0.000003", output: "0.000015" },
  "claude-3-haiku-20240307":                  { input: "0.00000025", output: "0.00000125" },
  "claude-2":                                 { input: "0.00001102", output: "0.00003268" },
  "claude-instant-1":                         { input: "0.00000163", output: "0.00000551" },
  "anthropic/claude-sonnet-4":                { input: "0.000003", output: "0.000015" },
  // Google
  "google/gemini-2.5-pro-exp-03-25:free":     { input: "0", output: "0" },
  "google/gemini-2.5-pro-exp-03-25":          GEMINI_PRO_TIERS,
  "gemini-2.5-pro-exp-03-25":                 GEMINI_PRO_TIERS,
  "google/gemini-2.5-pro-preview-03-25":      GEMINI_PRO_TIERS,
  "gemini-2.5-pro-preview-03-25":             GEMINI_PRO_TIERS,
  "google/gemini-2.5-pro-preview-05-06":      GEMINI_PRO_TIERS,
  "gemini-2.5-pro-preview-05-06":             GEMINI_PRO_TIERS,
  // DeepSeek
  "deepseek/deepseek-chat-v3-0324":           { input: "0.00000027", output: "0.0000011" },
  // Mistral
  "mistral-nemo":                             { input: "0.00015", output: "0.00015" },
  "pixtral-12b":                              { input: "0.00015", output: "0.00015" },
  "mistral-large-24b11":                      { input: "0.002", output: "0.006" },
  "mistralai/mistral-small-3.1-24b-instruct": { input: "0.0001", output: "0.0003" },
  // Others
  "weaver-ai":                                { input: "0.001875", output: "0.00225" },
  "airoboros-v1":                             { input: "0.0005", output: "0.0005" },
};

export function isTiered(entry: ModelCostEntry): entry is TieredModelCost {
  return "threshold" in entry;
}
