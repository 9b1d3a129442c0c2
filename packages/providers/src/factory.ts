import type { LLMAdapter } from "@course-rag/core";
import { AnthropicAdapter } from "./anthropic/anthropic-adapter.js";
import { OpenAIAdapter } from "./openai/openai-adapter.js";

export type ProviderConfig =
  | {
      provider: "anthropic";
      apiKey: string;
      defaultModel: string;
    }
  | {
      provider: "openai";
      apiKey: string;
      defaultModel: string;
      baseURL?: string | undefined;
    };

export type ProviderId = ProviderConfig["provider"];

/**
 * createAdapter() instantiates the LLMAdapter for a provider config.
 *
 * @example
 * const adapter = createAdapter({
 *   provider: "openai",
 *   apiKey: config.apiKey,
 *   defaultModel: "gpt-4o-mini",
 * });
 */
export function createAdapter(config: ProviderConfig): LLMAdapter {
  switch (config.provider) {
    case "anthropic":
      return new AnthropicAdapter({
        apiKey: config.apiKey,
        defaultModel: config.defaultModel,
      });

    case "openai":
      return new OpenAIAdapter({
        apiKey: config.apiKey,
        defaultModel: config.defaultModel,
        ...(config.baseURL ? { baseURL: config.baseURL } : {}),
      });

    default: {
      // TypeScript exhaustiveness check
      const _exhaustive: never = config;
      throw new Error(`Unknown provider: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
