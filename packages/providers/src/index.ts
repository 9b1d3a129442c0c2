export { AnthropicAdapter } from "./anthropic/anthropic-adapter.js";
export type { AnthropicAdapterConfig, MessagesClient } from "./anthropic/anthropic-adapter.js";

export { OpenAIAdapter } from "./openai/openai-adapter.js";
export type { OpenAIAdapterConfig, ChatCompletionsClient } from "./openai/openai-adapter.js";

export { toObjectSchema } from "./shared/json-schema.js";
export type { JsonSchemaProperty, ObjectJsonSchema } from "./shared/json-schema.js";

export { createAdapter } from "./factory.js";
export type { ProviderConfig, ProviderId } from "./factory.js";
