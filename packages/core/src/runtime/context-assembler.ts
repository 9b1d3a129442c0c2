import { createMessage, type Message } from "../interfaces/message.js";
import type { CompletionOptions } from "../interfaces/llm-adapter.js";
import type { ToolDeclaration } from "../interfaces/tool.js";

export interface ContextAssemblerOptions {
  /** Fixed policy text opening the system message */
  systemPrompt: string;
  /** Rendered session history; omitted from the prompt when empty */
  history?: string | undefined;
}

/**
 * ContextAssembler builds the Message[] that opens every turn.
 *
 * Assembly order:
 *   1. System message: policy prompt, then "Previous conversation:" + history
 *   2. The new user query
 *
 * History is carried inside the system message rather than replayed as
 * user/assistant messages, so a turn always starts with exactly two messages.
 */
export class ContextAssembler {
  assemble(query: string, options: ContextAssemblerOptions): Message[] {
    return [
      createMessage("system", this.systemContent(options)),
      createMessage("user", query),
    ];
  }

  systemContent(options: ContextAssemblerOptions): string {
    return options.history
      ? `${options.systemPrompt}\n\nPrevious conversation:\n${options.history}`
      : options.systemPrompt;
  }

  /**
   * Builds CompletionOptions, applying defaults. Tools are attached, with
   * tool choice left to the model, only when at least one is declared.
   */
  buildCompletionOptions(
    model: string,
    overrides: {
      maxTokens?: number | undefined;
      temperature?: number | undefined;
      tools?: readonly ToolDeclaration[] | undefined;
    }
  ): CompletionOptions {
    return {
      model,
      maxTokens: overrides.maxTokens ?? 800,
      temperature: overrides.temperature ?? 0,
      ...(overrides.tools !== undefined && overrides.tools.length > 0
        ? { tools: [...overrides.tools], toolChoice: "auto" as const }
        : {}),
    };
  }
}
