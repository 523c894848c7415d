import { describe, expect, it } from "@jest/globals";
import { AiCompletionEngine, getModelProvider } from "./completion-engine";

describe("getModelProvider", () => {
  it("routes claude models to anthropic and everything else to openai", () => {
    expect(getModelProvider("claude-3-5-haiku-20241022")).toBe("anthropic");
    expect(getModelProvider("gpt-4o")).toBe("openai");
  });
});

describe("AiCompletionEngine", () => {
  it("fails before any request when the provider key is missing", async () => {
    const engine = new AiCompletionEngine({ model: "gpt-4o" });

    await expect(
      engine.complete({ system: "s", context: "", question: "q" })
    ).rejects.toThrow("OpenAI API key not configured");
  });
});
