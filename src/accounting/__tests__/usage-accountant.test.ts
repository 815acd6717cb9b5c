import { describe, it, expect, vi, beforeEach, type MockInstance } from "vitest";
import { UsageAccountant, type UsageAccountantOptions } from "../usage-accountant.js";
import { InMemoryConfigStore } from "../../adapters/config/in-memory-config.adapter.js";
import { InMemorySessionStore } from "../../adapters/session/in-memory-session.adapter.js";
import { InMemoryTrajectoryStore } from "../../adapters/trajectory/in-memory-trajectory.adapter.js";
import type { LoggerPort } from "../../ports/logging.port.js";

const MODEL = "claude-3-7-sonnet-20250219";

// 1000 prompt + 500 completion on MODEL costs $0.0105
const CALL = { usage: { inputTokens: 1000, outputTokens: 500, totalTokens: 1500 } };

async function setup(settings: Record<string, unknown> = {}, overrides: Partial<UsageAccountantOptions> = {}) {
  const config = new InMemoryConfigStore(settings);
  const sessions = new InMemorySessionStore();
  const session = await sessions.startSession();
  const trajectory = new InMemoryTrajectoryStore();
  const confirm = vi.fn(async (_message: string, _defaultValue: boolean) => true);
  const exit = vi.fn((_code: number) => {});
  const logger: LoggerPort = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

  const accountant = await UsageAccountant.create({
    modelName: MODEL,
    config,
    sessions,
    trajectory,
    confirmation: { confirm },
    logger,
    exit,
    ...overrides,
  });

  return { accountant, config, sessions, session, trajectory, confirm, exit, logger };
}

describe("UsageAccountant", () => {
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    log = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  describe("accumulation", () => {
    it("updates totals and persists a usage record", async () => {
      const { accountant, trajectory, session } = await setup();

      await accountant.onCallEnd(CALL);

      const stats = accountant.getStats();
      expect(stats.promptTokens).toBe(1000);
      expect(stats.completionTokens).toBe(500);
      expect(stats.totalTokens).toBe(1500);
      expect(stats.totalCost.toString()).toBe("0.0105");
      expect(stats.successfulRequests).toBe(1);
      expect(stats.sessionTotals).toMatchObject({
        tokens: 1500,
        inputTokens: 1000,
        outputTokens: 500,
        duration: 0.1,
        sessionId: session.id,
      });

      const records = await trajectory.list({ recordType: "model_usage" });
      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({
        recordType: "model_usage",
        sessionId: session.id,
        currentCost: 0.0105,
        inputTokens: 1000,
        outputTokens: 500,
        stepData: { duration: 0.1, model: MODEL },
      });
    });

    it("measures duration from the call start", async () => {
      let now = 1_000;
      const { accountant } = await setup({}, { now: () => now });

      accountant.onCallStart();
      now = 3_500;
      await accountant.onCallEnd(CALL);

      expect(accountant.getStats().sessionTotals.duration).toBe(2.5);
    });

    it("takes the model name from call start and from the response", async () => {
      const { accountant, trajectory } = await setup();

      accountant.onCallStart({ name: "claude-3-haiku-20240307" });
      await accountant.onCallEnd(CALL);
      await accountant.onCallEnd({ ...CALL, response: { modelId: "claude-3-opus-20240229" } });

      const models = (await trajectory.list()).map((r) => (r.recordType === "model_usage" ? r.stepData.model : null));
      expect(models).toEqual(["claude-3-haiku-20240307", "claude-3-opus-20240229"]);
      expect(accountant.currentModelName).toBe("claude-3-opus-20240229");
    });

    it("splits a total-only response 90/10", async () => {
      const { accountant } = await setup();

      await accountant.onCallEnd({ usage: { total_tokens: 1500 } });

      const stats = accountant.getStats();
      expect(stats.promptTokens).toBe(1350);
      expect(stats.completionTokens).toBe(150);
      expect(stats.sessionTotals.tokens).toBe(1500);
    });

    it("counts an unrecognized response as a zero-usage request", async () => {
      const { accountant } = await setup();

      await accountant.onCallEnd("plain text");

      const stats = accountant.getStats();
      expect(stats.successfulRequests).toBe(1);
      expect(stats.totalTokens).toBe(0);
      expect(stats.totalCost.isZero()).toBe(true);
    });

    it("serializes concurrent completions", async () => {
      const { accountant, trajectory } = await setup();
      const call = { usage: { prompt_tokens: 10, completion_tokens: 5 } };

      await Promise.all(Array.from({ length: 50 }, () => accountant.onCallEnd(call)));

      const stats = accountant.getStats();
      expect(stats.cumulativeTokens).toEqual({ total: 750, prompt: 500, completion: 250 });
      expect(stats.successfulRequests).toBe(50);
      expect(stats.sessionTotals.tokens).toBe(750);
      expect(await trajectory.list()).toHaveLength(50);
    });

    it("keeps session tokens equal to input plus output", async () => {
      const { accountant } = await setup();

      await accountant.onCallEnd({ usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 20 } });

      const { sessionTotals, cumulativeTokens } = accountant.getStats();
      expect(sessionTotals.tokens).toBe(sessionTotals.inputTokens + sessionTotals.outputTokens);
      expect(cumulativeTokens.total).toBe(20);
    });
  });

  describe("persistence", () => {
    it("skips persistence and warns without a session", async () => {
      const trajectory = new InMemoryTrajectoryStore();
      const logger: LoggerPort = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const accountant = await UsageAccountant.create({
        modelName: MODEL,
        sessions: new InMemorySessionStore(),
        trajectory,
        logger,
      });

      await accountant.onCallEnd(CALL);

      expect(await trajectory.list()).toHaveLength(0);
      expect(logger.warn).toHaveBeenCalledWith("accounting:session-missing", {
        message: "session_id not initialized",
      });
    });

    it("logs and swallows a failed write", async () => {
      const trajectory = new InMemoryTrajectoryStore();
      vi.spyOn(trajectory, "create").mockRejectedValue(new Error("disk full"));
      const { accountant, logger } = await setup({}, { trajectory });

      await expect(accountant.onCallEnd(CALL)).resolves.toBeUndefined();

      expect(accountant.getStats().successfulRequests).toBe(1);
      expect(logger.error).toHaveBeenCalledWith(
        "accounting:persist-failed",
        expect.objectContaining({ recordType: "model_usage", message: "disk full" }),
      );
    });

    it("disables a ceiling whose value is malformed", async () => {
      const { accountant, trajectory, logger, confirm } = await setup({ maxCost: "lots" });

      await accountant.onCallEnd(CALL);

      expect(confirm).not.toHaveBeenCalled();
      expect(await trajectory.list({ recordType: "model_usage" })).toHaveLength(1);
      expect(logger.error).toHaveBeenCalledWith(
        "accounting:settings-invalid",
        expect.objectContaining({ field: "maxCost", code: "CONFIG_VALIDATION_ERROR" }),
      );
    });
  });

  describe("limits", () => {
    it("exits when the user declines at the cost limit", async () => {
      const { accountant, trajectory, confirm, exit, session } = await setup({ maxCost: 0.01 });
      confirm.mockResolvedValue(false);

      await accountant.onCallEnd(CALL);

      expect(confirm).toHaveBeenCalledWith("Cost limit exceeded: $0.010500 >= $0.010000. Continue anyway?", false);
      expect(log).toHaveBeenCalledWith("User chose to exit after cost limit warning.");
      expect(exit).toHaveBeenCalledWith(0);
      expect(accountant.decision).toBe("exit");
      expect(await trajectory.list({ recordType: "model_usage" })).toHaveLength(0);
      expect(await trajectory.list({ recordType: "limit_reached" })).toEqual([
        expect.objectContaining({
          sessionId: session.id,
          stepData: { limitType: "cost", currentValue: 0.0105, limitValue: 0.01, exitAtLimit: false },
        }),
      ]);
    });

    it("remembers a decline for later breaches", async () => {
      const { accountant, confirm, exit } = await setup({ maxCost: 0.01 });
      confirm.mockResolvedValue(false);

      await accountant.onCallEnd(CALL);
      await accountant.onCallEnd(CALL);

      expect(confirm).toHaveBeenCalledTimes(1);
      expect(exit).toHaveBeenCalledTimes(2);
      expect(log).toHaveBeenCalledWith(
        "Exiting due to cost limit (0.021 >= 0.01) and previous user decision to not continue.",
      );
    });

    it("persists and stops asking once the user accepts", async () => {
      const { accountant, trajectory, confirm, exit } = await setup({ maxCost: 0.01 });

      await accountant.onCallEnd(CALL);
      await accountant.onCallEnd(CALL);

      expect(confirm).toHaveBeenCalledTimes(1);
      expect(exit).not.toHaveBeenCalled();
      expect(accountant.decision).toBe("continue");
      expect(await trajectory.list({ recordType: "model_usage" })).toHaveLength(2);
      expect(await trajectory.list({ recordType: "limit_reached" })).toHaveLength(2);
    });

    it("exits without prompting when auto-exit is enabled", async () => {
      const { accountant, trajectory, confirm, exit } = await setup({ maxTokens: 1000, exitAtLimit: true });

      await accountant.onCallEnd({ usage: { total_tokens: 1500 } });

      expect(confirm).not.toHaveBeenCalled();
      expect(log).toHaveBeenCalledWith("Exiting due to tokens limit reached: 1500 >= 1000 (auto-exit enabled).");
      expect(exit).toHaveBeenCalledWith(0);
      expect(await trajectory.list({ recordType: "model_usage" })).toHaveLength(0);
      expect(await trajectory.list({ recordType: "limit_reached" })).toHaveLength(1);
    });

    it("keeps enforcing valid ceilings when a display flag is malformed", async () => {
      const { accountant, confirm, exit, logger } = await setup({ maxCost: 0.01, exitAtLimit: true, showCost: "yes" });

      await accountant.onCallEnd(CALL);

      expect(confirm).not.toHaveBeenCalled();
      expect(exit).toHaveBeenCalledTimes(1);
      expect(exit).toHaveBeenCalledWith(0);
      expect(logger.error).toHaveBeenCalledWith(
        "accounting:settings-invalid",
        expect.objectContaining({ field: "showCost" }),
      );
      expect(logger.error).not.toHaveBeenCalledWith(
        "accounting:settings-invalid",
        expect.objectContaining({ field: "maxCost" }),
      );
    });

    it("keeps the cost ceiling when the token ceiling is fractional", async () => {
      const { accountant, confirm, exit } = await setup({ maxCost: 0.01, maxTokens: 100000.5, exitAtLimit: true });

      await accountant.onCallEnd(CALL);

      expect(confirm).not.toHaveBeenCalled();
      expect(exit).toHaveBeenCalledWith(0);
    });

    it("does not check ceilings that are disabled", async () => {
      const { accountant, confirm } = await setup({ maxCost: 0, maxTokens: null });

      await accountant.onCallEnd(CALL);

      expect(confirm).not.toHaveBeenCalled();
    });

    it("asks once when concurrent calls breach together", async () => {
      const { accountant, confirm, trajectory } = await setup({ maxTokens: 10 });
      const call = { usage: { prompt_tokens: 10, completion_tokens: 0 } };

      await Promise.all([accountant.onCallEnd(call), accountant.onCallEnd(call)]);

      expect(confirm).toHaveBeenCalledTimes(1);
      expect(confirm).toHaveBeenCalledWith(expect.stringContaining("Token limit exceeded"), false);
      expect(await trajectory.list({ recordType: "model_usage" })).toHaveLength(2);
    });
  });

  describe("resets", () => {
    it("zeroes session totals but keeps the session id", async () => {
      const { accountant, session } = await setup();
      await accountant.onCallEnd(CALL);

      await accountant.resetSessionTotals();

      const stats = accountant.getStats();
      expect(stats.sessionTotals.tokens).toBe(0);
      expect(stats.sessionTotals.cost.isZero()).toBe(true);
      expect(stats.sessionTotals.sessionId).toBe(session.id);
      expect(stats.cumulativeTokens.total).toBe(1500);
      expect(stats.successfulRequests).toBe(1);
    });

    it("clears everything and re-resolves pricing and session", async () => {
      const { accountant, sessions, confirm } = await setup({ maxCost: 0.01 });
      confirm.mockResolvedValue(true);
      await accountant.onCallEnd(CALL);
      const next = await sessions.startSession();

      await accountant.resetAllTotals({ modelName: "claude-3-haiku-20240307" });

      const stats = accountant.getStats();
      expect(stats.successfulRequests).toBe(0);
      expect(stats.totalCost.isZero()).toBe(true);
      expect(stats.cumulativeTokens).toEqual({ total: 0, prompt: 0, completion: 0 });
      expect(stats.sessionTotals.sessionId).toBe(next.id);
      expect(stats.modelName).toBe("claude-3-haiku-20240307");
      expect(accountant.decision).toBe("undecided");

      const rule = accountant.pricingRule;
      expect(rule.kind === "flat" ? rule.input.toFixed() : null).toBe("0.00000025");
    });
  });

  describe("pricing notices", () => {
    it("re-reads showCost when pricing is resolved again", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const { accountant, config } = await setup({}, { modelName: "unlisted-model-a" });
      expect(warn).not.toHaveBeenCalled();

      config.set("showCost", true);
      await accountant.resetAllTotals({ modelName: "unlisted-model-b" });

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith("Could not find costs for model 'unlisted-model-b'. Defaulting to 0.0.");
    });
  });

  it("summarizes itself as text", async () => {
    const { accountant } = await setup();
    await accountant.onCallEnd(CALL);

    expect(accountant.toString()).toBe(
      [
        "Tokens Used: 1500",
        "\tPrompt Tokens: 1000",
        "\tCompletion Tokens: 500",
        "Successful Requests: 1",
        "Total Cost (USD): $0.010500",
      ].join("\n"),
    );
  });
});
