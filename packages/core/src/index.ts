// ── Interfaces ────────────────────────────────────────────────────────────────

// message
export { RoleSchema, MessageSchema, createMessage } from "./interfaces/message.js";
export type { Role, Message } from "./interfaces/message.js";

// tool
export {
  ToolParameterTypeSchema,
  ToolParameterSchema,
  ToolNameSchema,
  ToolDeclarationSchema,
  ToolInvocationSchema,
  CitationSchema,
} from "./interfaces/tool.js";
export type {
  ToolParameterType,
  ToolParameter,
  ToolDeclaration,
  ToolInvocation,
  Citation,
  ToolOutcome,
  Tool,
  ToolExecutor,
} from "./interfaces/tool.js";

// llm-adapter
export {
  CompletionOptionsSchema,
  CompletionSignalSchema,
  StopReasonSchema,
} from "./interfaces/llm-adapter.js";
export type {
  CompletionOptions,
  CompletionSignal,
  StopReason,
  LLMAdapter,
} from "./interfaces/llm-adapter.js";

// ── Errors ────────────────────────────────────────────────────────────────────

export {
  CourseRagError,
  ArgumentError,
  UnknownToolError,
  DuplicateToolError,
  ToolExecutionError,
  SessionNotFoundError,
  UpstreamModelError,
  isCourseRagError,
} from "./errors.js";
export type { CourseRagErrorCode } from "./errors.js";

// ── Logging ───────────────────────────────────────────────────────────────────

export { createLogger, disabledLogger } from "./logging/logger.js";
export type { Logger, LoggerConfig } from "./logging/logger.js";

// ── Session ───────────────────────────────────────────────────────────────────

export { SessionStore } from "./session/session-store.js";
export type { Exchange, SessionStoreOptions } from "./session/session-store.js";

// ── Tools ─────────────────────────────────────────────────────────────────────

export { ToolRegistry } from "./tools/tool-registry.js";
export type { ToolRegistryOptions } from "./tools/tool-registry.js";
export { describeArguments } from "./tools/describe-arguments.js";

// ── Runtime ───────────────────────────────────────────────────────────────────

export { TurnState } from "./runtime/turn-state.js";
export type { TurnSnapshot, TurnPhase } from "./runtime/turn-state.js";

export { GenerationLoop } from "./runtime/generation-loop.js";
export type {
  GenerationLoopOptions,
  GenerationRequest,
  GenerationResult,
} from "./runtime/generation-loop.js";

export { ContextAssembler } from "./runtime/context-assembler.js";
export type { ContextAssemblerOptions } from "./runtime/context-assembler.js";

export { COURSE_ASSISTANT_PROMPT } from "./runtime/prompts.js";

// ── Orchestration ─────────────────────────────────────────────────────────────

export { RagSystem } from "./rag/rag-system.js";
export type {
  RagSystemOptions,
  RagAnswer,
  CourseAnalytics,
  CourseAnalyticsProvider,
} from "./rag/rag-system.js";
