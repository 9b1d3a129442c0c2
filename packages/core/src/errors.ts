export type CourseRagErrorCode =
  | "invalid_arguments"
  | "unknown_tool"
  | "duplicate_tool"
  | "tool_failed"
  | "session_not_found"
  | "upstream_model";

/**
 * Base class for every error the core raises. `code` is stable and safe to
 * branch on; `message` is meant for humans (and, for tool errors, the model).
 */
export class CourseRagError extends Error {
  readonly code: CourseRagErrorCode;

  constructor(message: string, code: CourseRagErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = "CourseRagError";
    this.code = code;
  }
}

/** The model's argument payload did not match the tool's schema. */
export class ArgumentError extends CourseRagError {
  readonly toolName: string;
  readonly issues: readonly string[];

  constructor(toolName: string, issues: readonly string[]) {
    super(
      `Invalid arguments for tool '${toolName}': ${issues.join("; ")}`,
      "invalid_arguments"
    );
    this.name = "ArgumentError";
    this.toolName = toolName;
    this.issues = issues;
  }
}

export class UnknownToolError extends CourseRagError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool '${toolName}' is not registered.`, "unknown_tool");
    this.name = "UnknownToolError";
    this.toolName = toolName;
  }
}

export class DuplicateToolError extends CourseRagError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool '${toolName}' is already registered.`, "duplicate_tool");
    this.name = "DuplicateToolError";
    this.toolName = toolName;
  }
}

export class ToolExecutionError extends CourseRagError {
  readonly toolName: string;

  constructor(toolName: string, cause: unknown) {
    super(
      `Tool '${toolName}' failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      "tool_failed",
      { cause }
    );
    this.name = "ToolExecutionError";
    this.toolName = toolName;
  }
}

export class SessionNotFoundError extends CourseRagError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super("Session not found", "session_not_found");
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}

/** Either model call failed. Never retried by the core. */
export class UpstreamModelError extends CourseRagError {
  readonly providerCode: string;
  readonly retryable: boolean;

  constructor(message: string, providerCode: string, retryable: boolean) {
    super(`Language model request failed: ${message}`, "upstream_model");
    this.name = "UpstreamModelError";
    this.providerCode = providerCode;
    this.retryable = retryable;
  }
}

export function isCourseRagError(error: unknown): error is CourseRagError {
  return error instanceof CourseRagError;
}
