import { describe, it, expect } from "vitest";
import { extractUsage, normalizeUsage } from "../usage-extractor.js";

describe("extractUsage", () => {
  it("reads llm_output.token_usage and the model name override", () => {
    const result = extractUsage({
      llm_output: {
        token_usage: { prompt_tokens: 100, completion_tokens: 50, total_tokens: 150 },
        model_name: "claude-3-haiku-20240307",
      },
    });
    expect(result).toEqual({
      usage: { promptTokens: 100, completionTokens: 50, totalTokens: 150 },
      modelName: "claude-3-haiku-20240307",
    });
  });

  it("renames llm_output.usage input/output tokens", () => {
    const result = extractUsage({ llm_output: { usage: { input_tokens: 10, output_tokens: 5 } } });
    expect(result.usage).toEqual({ promptTokens: 10, completionTokens: 5 });
    expect(result.modelName).toBeUndefined();
  });

  it("reads a top-level usage attribute", () => {
    const result = extractUsage({ usage: { prompt_tokens: 7, completion_tokens: 3 } });
    expect(result.usage).toEqual({ promptTokens: 7, completionTokens: 3 });
  });

  it("reads AI SDK usage with the response model id", () => {
    const result = extractUsage({
      usage: { inputTokens: 1200, outputTokens: 300, totalTokens: 1500 },
      response: { modelId: "claude-3-7-sonnet-20250219" },
    });
    expect(result).toEqual({
      usage: { promptTokens: 1200, completionTokens: 300, totalTokens: 1500 },
      modelName: "claude-3-7-sonnet-20250219",
    });
  });

  it("reads AI SDK usage given as { total } objects", () => {
    const result = extractUsage({
      usage: { inputTokens: { total: 40, noCache: 40 }, outputTokens: { total: 8 } },
    });
    expect(result.usage).toEqual({ promptTokens: 40, completionTokens: 8 });
  });

  it("reads generation_info.usage from generations", () => {
    const result = extractUsage({
      generations: [[{ generation_info: { usage: { prompt_tokens: 11, completion_tokens: 4 } } }]],
    });
    expect(result.usage).toEqual({ promptTokens: 11, completionTokens: 4 });
  });

  it("reads message.usage_metadata and ignores its total when a breakdown exists", () => {
    const result = extractUsage({
      generations: [[{ message: { usage_metadata: { input_tokens: 20, output_tokens: 6, total_tokens: 26 } } }]],
    });
    expect(result.usage).toEqual({ promptTokens: 20, completionTokens: 6 });
  });

  it("keeps a usage_metadata total when no breakdown is reported", () => {
    const result = extractUsage({
      generations: [[{ message: { usage_metadata: { input_tokens: 0, output_tokens: 0, total_tokens: 1500 } } }]],
    });
    expect(result.usage).toEqual({ promptTokens: 0, completionTokens: 0, totalTokens: 1500 });
  });

  it("takes the first generation that carries usage", () => {
    const result = extractUsage({
      generations: [
        [{ message: {} }],
        [{ generation_info: { usage: { prompt_tokens: 3, completion_tokens: 2 } } }],
      ],
    });
    expect(result.usage).toEqual({ promptTokens: 3, completionTokens: 2 });
  });

  it("keeps the llm_output model name when usage comes from a later shape", () => {
    const result = extractUsage({
      llm_output: { model_name: "m1" },
      generations: [[{ generation_info: { usage: { prompt_tokens: 1, completion_tokens: 1 } } }]],
    });
    expect(result).toEqual({ usage: { promptTokens: 1, completionTokens: 1 }, modelName: "m1" });
  });

  it("drops malformed counts instead of failing", () => {
    const result = extractUsage({ usage: { prompt_tokens: "ten", completion_tokens: 5 } });
    expect(result.usage).toEqual({ completionTokens: 5 });
  });

  it.each([null, undefined, "text", 42, { foo: 1 }, { generations: "nope" }])(
    "returns empty usage for unrecognized response %j",
    (response) => {
      expect(extractUsage(response)).toEqual({ usage: {} });
    },
  );
});

describe("normalizeUsage", () => {
  it("derives the total from prompt and completion", () => {
    expect(normalizeUsage({ promptTokens: 100, completionTokens: 50 }, 2)).toEqual({
      promptTokens: 100,
      completionTokens: 50,
      totalTokens: 150,
      durationSeconds: 2,
    });
  });

  it("splits a total-only count 90/10", () => {
    expect(normalizeUsage({ totalTokens: 1500 }, 0.1)).toEqual({
      promptTokens: 1350,
      completionTokens: 150,
      totalTokens: 1500,
      durationSeconds: 0.1,
    });
  });

  it("floors the prompt share", () => {
    const event = normalizeUsage({ totalTokens: 15 }, 0);
    expect(event.promptTokens).toBe(13);
    expect(event.completionTokens).toBe(2);
  });

  it("zeroes missing counts", () => {
    expect(normalizeUsage({}, 0)).toEqual({
      promptTokens: 0,
      completionTokens: 0,
      totalTokens: 0,
      durationSeconds: 0,
    });
  });
});
