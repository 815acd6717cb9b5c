import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import { ReadlineConfirmationAdapter, parseAnswer } from "../readline-confirmation.adapter.js";

function collect(stream: PassThrough): () => string {
  const chunks: string[] = [];
  stream.on("data", (chunk: Buffer) => chunks.push(chunk.toString()));
  return () => chunks.join("");
}

describe("parseAnswer", () => {
  it.each([
    ["y", false, true],
    ["Yes", false, true],
    [" n ", true, false],
    ["NO", true, false],
    ["", false, false],
    ["", true, true],
    ["maybe", false, false],
  ])("%j with default %s → %s", (answer, defaultValue, expected) => {
    expect(parseAnswer(answer, defaultValue)).toBe(expected);
  });
});

describe("ReadlineConfirmationAdapter", () => {
  it("asks with a default hint and reads the answer", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const written = collect(output);
    const adapter = new ReadlineConfirmationAdapter({ input, output });

    const answer = adapter.confirm("Cost limit exceeded: $0.010500 >= $0.010000. Continue anyway?", false);
    input.write("y\n");

    await expect(answer).resolves.toBe(true);
    expect(written()).toBe("Cost limit exceeded: $0.010500 >= $0.010000. Continue anyway? [y/N] ");
  });

  it("falls back to the default on an empty answer", async () => {
    const input = new PassThrough();
    const adapter = new ReadlineConfirmationAdapter({ input, output: new PassThrough() });

    const answer = adapter.confirm("Continue?", false);
    input.write("\n");

    await expect(answer).resolves.toBe(false);
  });
});
