import OpenAI from "openai";
import type {
  LLMAdapter,
  CompletionOptions,
  CompletionSignal,
  Message,
  ToolDeclaration,
} from "@course-rag/core";
import { toObjectSchema } from "../shared/json-schema.js";

/** The slice of the OpenAI SDK the adapter calls; the SDK client satisfies it. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: OpenAI.ChatCompletionCreateParamsNonStreaming
      ): Promise<OpenAI.ChatCompletion>;
    };
  };
}

export interface OpenAIAdapterConfig {
  apiKey: string;
  defaultModel: string;
  baseURL?: string | undefined;
  /** Injected client, used instead of constructing one */
  client?: ChatCompletionsClient | undefined;
}

export class OpenAIAdapter implements LLMAdapter {
  readonly providerId = "openai";

  private readonly client: ChatCompletionsClient;
  private readonly defaultModel: string;

  constructor(config: OpenAIAdapterConfig) {
    this.client =
      config.client ??
      new OpenAI({
        apiKey: config.apiKey,
        ...(config.baseURL ? { baseURL: config.baseURL } : {}),
      });
    this.defaultModel = config.defaultModel;
  }

  async complete(
    messages: Message[],
    options: CompletionOptions
  ): Promise<CompletionSignal> {
    try {
      const convertedTools = options.tools ? this.convertTools(options.tools) : undefined;
      const response = await this.client.chat.completions.create({
        model: options.model || this.defaultModel,
        max_completion_tokens: options.maxTokens,
        temperature: options.temperature,
        messages: this.convertMessages(messages),
        ...(convertedTools !== undefined
          ? { tools: convertedTools, tool_choice: options.toolChoice ?? "auto" }
          : {}),
      });

      return this.normalizeResponse(response);
    } catch (error) {
      return this.normalizeError(error);
    }
  }

  private convertMessages(messages: Message[]): OpenAI.ChatCompletionMessageParam[] {
    return messages.map((msg): OpenAI.ChatCompletionMessageParam => {
      switch (msg.role) {
        case "system":
          return { role: "system", content: msg.content };
        case "user":
          return { role: "user", content: msg.content };
        case "assistant":
          if (msg.toolCalls && msg.toolCalls.length > 0) {
            return {
              role: "assistant",
              // the API wants null rather than "" next to tool calls
              content: msg.content || null,
              tool_calls: msg.toolCalls.map((call) => ({
                id: call.id,
                type: "function" as const,
                function: { name: call.name, arguments: call.arguments },
              })),
            };
          }
          return { role: "assistant", content: msg.content };
        case "tool":
          return {
            role: "tool",
            tool_call_id: msg.toolCallId ?? "",
            content: msg.content,
          };
      }
    });
  }

  private convertTools(tools: ToolDeclaration[]): OpenAI.ChatCompletionTool[] {
    return tools.map((tool) => ({
      type: "function" as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: toObjectSchema(tool.parameters),
      },
    }));
  }

  private normalizeResponse(response: OpenAI.ChatCompletion): CompletionSignal {
    const choice = response.choices[0];
    if (!choice) {
      return {
        type: "error",
        code: "no_choice",
        message: "No completion choice returned",
        retryable: false,
      };
    }

    const toolCalls = choice.message.tool_calls ?? [];
    if (toolCalls.length > 0) {
      return {
        type: "tool_use",
        content: choice.message.content ?? "",
        calls: toolCalls.map((tc) => ({
          id: tc.id,
          name: tc.function.name,
          arguments: tc.function.arguments,
        })),
      };
    }

    return {
      type: "text",
      content: choice.message.content ?? "",
      stopReason: choice.finish_reason === "length" ? "max_tokens" : "end_turn",
    };
  }

  private normalizeError(error: unknown): CompletionSignal {
    if (error instanceof OpenAI.APIError) {
      const status = error.status ?? 0;
      return {
        type: "error",
        code: status > 0 ? String(status) : "api_error",
        message: error.message,
        retryable: status === 429 || (status >= 500 && status < 600),
      };
    }
    return {
      type: "error",
      code: "unknown",
      message: error instanceof Error ? error.message : String(error),
      retryable: false,
    };
  }
}
