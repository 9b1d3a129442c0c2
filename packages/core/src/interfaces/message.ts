import { randomUUID } from "node:crypto";
import { z } from "zod";
import { ToolInvocationSchema } from "./tool.js";

export const RoleSchema = z.enum(["user", "assistant", "system", "tool"]);
export type Role = z.infer<typeof RoleSchema>;

export const MessageSchema = z.object({
  id: z.string().uuid(),
  role: RoleSchema,
  // empty when an assistant message only carries tool invocations
  content: z.string(),
  timestamp: z.number().int().positive(),
  toolCalls: z.array(ToolInvocationSchema).optional(),  // for role=assistant
  toolCallId: z.string().optional(),  // for role=tool responses
});
export type Message = z.infer<typeof MessageSchema>;

export function createMessage(
  role: Role,
  content: string,
  extra: Pick<Message, "toolCalls" | "toolCallId"> = {}
): Message {
  return {
    id: randomUUID(),
    role,
    content,
    timestamp: Date.now(),
    ...(extra.toolCalls !== undefined ? { toolCalls: extra.toolCalls } : {}),
    ...(extra.toolCallId !== undefined ? { toolCallId: extra.toolCallId } : {}),
  };
}
