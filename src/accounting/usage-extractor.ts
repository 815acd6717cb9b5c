// =============================================================================
// UsageExtractor — Token usage from heterogeneous LLM response payloads
// =============================================================================

import { z } from "zod";

import type { UsageEvent } from "../domain/usage.js";

export interface TokenUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface ExtractionResult {
  usage: TokenUsage;
  /** Model name reported by the response, if any */
  modelName?: string;
}

export interface UsageExtractor {
  name: string;
  extract(response: unknown): ExtractionResult | null;
}

/** Share of a total-only count attributed to the prompt */
export const PROMPT_SHARE_OF_TOTAL = 0.9;

const count = z.number().int().nonnegative();
const optionalCount = count.optional().catch(undefined);

const SnakeUsageSchema = z.object({
  prompt_tokens: optionalCount,
  completion_tokens: optionalCount,
  total_tokens: optionalCount,
});

const InputOutputUsageSchema = z.object({
  input_tokens: optionalCount,
  output_tokens: optionalCount,
  total_tokens: optionalCount,
});

function hasCounts(usage: TokenUsage): boolean {
  return (
    usage.promptTokens !== undefined ||
    usage.completionTokens !== undefined ||
    usage.totalTokens !== undefined
  );
}

function fromSnake(usage: z.infer<typeof SnakeUsageSchema>): TokenUsage {
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// 1. llm_output bag: token_usage, or usage with input/output naming
// ─────────────────────────────────────────────────────────────────────────────

const LlmOutputSchema = z.object({
  llm_output: z.object({
    token_usage: SnakeUsageSchema.optional().catch(undefined),
    usage: InputOutputUsageSchema.optional().catch(undefined),
    model_name: z.string().min(1).optional().catch(undefined),
  }),
});

export const llmOutputExtractor: UsageExtractor = {
  name: "llm-output",
  extract(response) {
    const parsed = LlmOutputSchema.safeParse(response);
    if (!parsed.success) return null;
    const { token_usage, usage, model_name } = parsed.data.llm_output;

    let tokens: TokenUsage = {};
    if (token_usage) {
      tokens = fromSnake(token_usage);
    } else if (usage) {
      tokens = { promptTokens: usage.input_tokens, completionTokens: usage.output_tokens };
    }
    return { usage: tokens, modelName: model_name };
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// 2. Top-level usage with prompt/completion/total naming
// ─────────────────────────────────────────────────────────────────────────────

const UsageAttributeSchema = z.object({ usage: SnakeUsageSchema });

export const usageAttributeExtractor: UsageExtractor = {
  name: "usage-attribute",
  extract(response) {
    const parsed = UsageAttributeSchema.safeParse(response);
    if (!parsed.success) return null;
    return { usage: fromSnake(parsed.data.usage) };
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// 3. AI SDK usage (generate results and stream finish parts)
// ─────────────────────────────────────────────────────────────────────────────

// Counts are plain numbers, or { total } objects in newer provider specs.
const aiSdkCount = z
  .union([count, z.object({ total: count.optional() })])
  .optional()
  .catch(undefined)
  .transform((value) => (typeof value === "number" ? value : value?.total));

const AiSdkResultSchema = z.object({
  usage: z.object({
    inputTokens: aiSdkCount,
    outputTokens: aiSdkCount,
    totalTokens: aiSdkCount,
  }),
  response: z
    .object({ modelId: z.string().min(1).optional().catch(undefined) })
    .optional()
    .catch(undefined),
});

export const aiSdkExtractor: UsageExtractor = {
  name: "ai-sdk",
  extract(response) {
    const parsed = AiSdkResultSchema.safeParse(response);
    if (!parsed.success) return null;
    const { usage } = parsed.data;
    return {
      usage: {
        promptTokens: usage.inputTokens,
        completionTokens: usage.outputTokens,
        totalTokens: usage.totalTokens,
      },
      modelName: parsed.data.response?.modelId,
    };
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// 4. Per-generation metadata
// ─────────────────────────────────────────────────────────────────────────────

const GenerationSchema = z.object({
  generation_info: z
    .object({ usage: SnakeUsageSchema.optional().catch(undefined) })
    .nullable()
    .optional()
    .catch(undefined),
  message: z
    .object({ usage_metadata: InputOutputUsageSchema.nullable().optional().catch(undefined) })
    .optional()
    .catch(undefined),
});

const GenerationsSchema = z.object({
  generations: z.array(z.array(z.unknown())),
});

function fromGeneration(generation: unknown): TokenUsage | null {
  const parsed = GenerationSchema.safeParse(generation);
  if (!parsed.success) return null;

  const info = parsed.data.generation_info?.usage;
  if (info) {
    const usage = fromSnake(info);
    if (hasCounts(usage)) return usage;
  }

  const metadata = parsed.data.message?.usage_metadata;
  if (metadata) {
    const usage: TokenUsage = {
      promptTokens: metadata.input_tokens,
      completionTokens: metadata.output_tokens,
    };
    // Total only counts when no breakdown was reported
    if (!usage.promptTokens && !usage.completionTokens && metadata.total_tokens !== undefined) {
      usage.totalTokens = metadata.total_tokens;
    }
    if (hasCounts(usage)) return usage;
  }
  return null;
}

export const generationsExtractor: UsageExtractor = {
  name: "generations",
  extract(response) {
    const parsed = GenerationsSchema.safeParse(response);
    if (!parsed.success) return null;
    for (const candidates of parsed.data.generations) {
      const usage = fromGeneration(candidates[0]);
      if (usage) return { usage };
    }
    return null;
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// Chain
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_EXTRACTORS: readonly UsageExtractor[] = [
  llmOutputExtractor,
  usageAttributeExtractor,
  aiSdkExtractor,
  generationsExtractor,
];

/**
 * Runs extractors in order and returns the first non-empty usage. A model
 * name override is taken from the first extractor that reports one, even if
 * its usage was empty. Unrecognized responses yield empty usage.
 */
export function extractUsage(
  response: unknown,
  extractors: readonly UsageExtractor[] = DEFAULT_EXTRACTORS,
): ExtractionResult {
  let modelName: string | undefined;

  for (const extractor of extractors) {
    const result = extractor.extract(response);
    if (!result) continue;
    modelName ??= result.modelName;
    if (hasCounts(result.usage)) {
      return { usage: result.usage, modelName };
    }
  }

  return { usage: {}, modelName };
}

/**
 * Fills in missing counts. A response that reports only a total is split
 * {@link PROMPT_SHARE_OF_TOTAL} to prompt and the remainder to completion.
 */
export function normalizeUsage(usage: TokenUsage, durationSeconds: number): UsageEvent {
  let promptTokens = usage.promptTokens ?? 0;
  let completionTokens = usage.completionTokens ?? 0;
  const totalTokens = usage.totalTokens ?? promptTokens + completionTokens;

  if (totalTokens > 0 && promptTokens === 0 && completionTokens === 0) {
    promptTokens = Math.floor(totalTokens * PROMPT_SHARE_OF_TOTAL);
    completionTokens = totalTokens - promptTokens;
  }

  return { promptTokens, completionTokens, totalTokens, durationSeconds };
}
