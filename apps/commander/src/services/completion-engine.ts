import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import { LanguageModel, generateText } from "ai";
import { withHistory } from "../prompt/system-prompt";

export interface CompletionRequest {
  system: string;
  context: string;
  question: string;
}

export interface CompletionEngine {
  complete(request: CompletionRequest): Promise<string>;
}

export type ModelProvider = "anthropic" | "openai";

export function getModelProvider(modelId: string): ModelProvider {
  return modelId.startsWith("claude") ? "anthropic" : "openai";
}

export interface AiCompletionOptions {
  model: string;
  openaiApiKey?: string;
  anthropicApiKey?: string;
  maxTokens?: number;
}

/**
 * Completion engine backed by the AI SDK
 */
export class AiCompletionEngine implements CompletionEngine {
  constructor(private options: AiCompletionOptions) {}

  async complete({
    system,
    context,
    question,
  }: CompletionRequest): Promise<string> {
    const { text } = await generateText({
      model: this.getModel(),
      system: withHistory(system, context),
      messages: [{ role: "user", content: question }],
      maxTokens: this.options.maxTokens ?? 1024,
    });

    return text;
  }

  private getModel(): LanguageModel {
    const { model } = this.options;

    switch (getModelProvider(model)) {
      case "anthropic":
        if (!this.options.anthropicApiKey) {
          throw new Error("Anthropic API key not configured");
        }
        return createAnthropic({ apiKey: this.options.anthropicApiKey })(model);

      case "openai":
        if (!this.options.openaiApiKey) {
          throw new Error("OpenAI API key not configured");
        }
        return createOpenAI({ apiKey: this.options.openaiApiKey })(model);
    }
  }
}

export default AiCompletionEngine;
