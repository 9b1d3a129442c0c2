import { z } from "zod";
import type { Message } from "./message.js";
import { ToolDeclarationSchema, ToolInvocationSchema } from "./tool.js";

export const CompletionOptionsSchema = z.object({
  model: z.string(),
  maxTokens: z.number().int().positive().default(800),
  temperature: z.number().min(0).max(2).default(0),
  tools: z.array(ToolDeclarationSchema).optional(),
  // the model may call a tool but is never forced to
  toolChoice: z.literal("auto").optional(),
});
export type CompletionOptions = z.infer<typeof CompletionOptionsSchema>;

export const StopReasonSchema = z.enum(["end_turn", "max_tokens", "stop_sequence"]);
export type StopReason = z.infer<typeof StopReasonSchema>;

// Discriminated union — the loop only ever receives one signal type per call
export const CompletionSignalSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("text"),
    content: z.string(),
    stopReason: StopReasonSchema,
  }),
  z.object({
    type: z.literal("tool_use"),
    // text the model sent alongside its invocations, often empty
    content: z.string(),
    calls: z.array(ToolInvocationSchema).min(1),
  }),
  z.object({
    type: z.literal("error"),
    code: z.string(),
    message: z.string(),
    retryable: z.boolean(),
  }),
]);
export type CompletionSignal = z.infer<typeof CompletionSignalSchema>;

/**
 * Provider boundary. Implementations normalize every provider failure into an
 * `error` signal instead of throwing.
 */
export interface LLMAdapter {
  readonly providerId: string;

  complete(
    messages: Message[],
    options: CompletionOptions
  ): Promise<CompletionSignal>;
}
