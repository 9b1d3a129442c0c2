import Anthropic from "@anthropic-ai/sdk";
import type {
  LLMAdapter,
  CompletionOptions,
  CompletionSignal,
  Message,
  ToolDeclaration,
  ToolInvocation,
} from "@course-rag/core";
import { toObjectSchema } from "../shared/json-schema.js";

export interface MessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming
    ): Promise<Pick<Anthropic.Message, "content" | "stop_reason">>;
  };
}

export interface AnthropicAdapterConfig {
  apiKey: string;
  defaultModel: string;
  client?: MessagesClient | undefined;
}

type ContentBlock = Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam | Anthropic.ToolResultBlockParam;

/**
 * Anthropic rejects tool_use blocks in a request that declares no tools, so
 * the tool-free follow-up gets the tool exchange rendered as plain text.
 */
export class AnthropicAdapter implements LLMAdapter {
  readonly providerId = "anthropic";

  private readonly client: MessagesClient;
  private readonly defaultModel: string;

  constructor(config: AnthropicAdapterConfig) {
    this.client = config.client ?? new Anthropic({ apiKey: config.apiKey });
    this.defaultModel = config.defaultModel;
  }

  async complete(
    messages: Message[],
    options: CompletionOptions
  ): Promise<CompletionSignal> {
    const hasTools = options.tools !== undefined && options.tools.length > 0;
    const { systemMessages, turns } = this.splitMessages(messages, hasTools);

    try {
      const systemText = systemMessages.length > 0 ? systemMessages.join("\n\n") : undefined;
      const convertedTools = options.tools ? this.convertTools(options.tools) : undefined;
      const response = await this.client.messages.create({
        model: options.model || this.defaultModel,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        ...(systemText !== undefined ? { system: systemText } : {}),
        messages: turns,
        ...(convertedTools !== undefined
          ? { tools: convertedTools, tool_choice: { type: options.toolChoice ?? "auto" } }
          : {}),
      });

      return this.normalizeResponse(response);
    } catch (error) {
      return this.normalizeError(error);
    }
  }

  private splitMessages(
    messages: Message[],
    nativeTools: boolean
  ): { systemMessages: string[]; turns: Anthropic.MessageParam[] } {
    const systemMessages: string[] = [];
    const turns: Anthropic.MessageParam[] = [];

    const push = (role: "user" | "assistant", blocks: ContentBlock[]): void => {
      if (blocks.length === 0) return;
      const last = turns.at(-1);
      // consecutive same-role messages must be merged into one turn
      if (last && last.role === role && Array.isArray(last.content)) {
        last.content.push(...blocks);
        return;
      }
      turns.push({ role, content: blocks });
    };

    for (const msg of messages) {
      switch (msg.role) {
        case "system":
          systemMessages.push(msg.content);
          break;
        case "user":
          push("user", [textBlock(msg.content)]);
          break;
        case "assistant": {
          const calls = msg.toolCalls ?? [];
          const blocks: ContentBlock[] = msg.content ? [textBlock(msg.content)] : [];
          if (nativeTools) {
            blocks.push(...calls.map(toolUseBlock));
          } else if (calls.length > 0) {
            blocks.push(textBlock(calls.map(renderCall).join("\n")));
          }
          push("assistant", blocks);
          break;
        }
        case "tool":
          push(
            "user",
            nativeTools
              ? [{ type: "tool_result", tool_use_id: msg.toolCallId ?? "", content: msg.content }]
              : [textBlock(`Tool result:\n${msg.content}`)]
          );
          break;
      }
    }

    return { systemMessages, turns };
  }

  private convertTools(tools: ToolDeclaration[]): Anthropic.Tool[] {
    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: toObjectSchema(tool.parameters),
    }));
  }

  private normalizeResponse(
    response: Pick<Anthropic.Message, "content" | "stop_reason">
  ): CompletionSignal {
    const toolCalls: ToolInvocation[] = [];
    let textContent = "";

    for (const block of response.content) {
      if (block.type === "text") {
        textContent += block.text;
      } else if (block.type === "tool_use") {
        toolCalls.push({
          id: block.id,
          name: block.name,
          arguments: JSON.stringify(block.input),
        });
      }
    }

    if (toolCalls.length > 0) {
      return { type: "tool_use", content: textContent, calls: toolCalls };
    }

    const stopReason =
      response.stop_reason === "max_tokens"
        ? "max_tokens"
        : response.stop_reason === "stop_sequence"
        ? "stop_sequence"
        : "end_turn";

    return { type: "text", content: textContent, stopReason };
  }

  private normalizeError(error: unknown): CompletionSignal {
    if (error instanceof Anthropic.APIError) {
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

function textBlock(text: string): Anthropic.TextBlockParam {
  return { type: "text", text };
}

function toolUseBlock(call: ToolInvocation): Anthropic.ToolUseBlockParam {
  return { type: "tool_use", id: call.id, name: call.name, input: parseInput(call.arguments) };
}

function parseInput(raw: string): unknown {
  if (raw.trim() === "") return {};
  try {
    return JSON.parse(raw);
  } catch {
    // pass the model's own malformed text back untouched
    return { raw };
  }
}

function renderCall(call: ToolInvocation): string {
  return `Called tool ${call.name} with ${call.arguments || "{}"}`;
}
