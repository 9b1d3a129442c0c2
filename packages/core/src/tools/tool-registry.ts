import type { z } from "zod";
import type { Logger } from "pino";
import {
  ToolDeclarationSchema,
  type Tool,
  type ToolDeclaration,
  type ToolExecutor,
  type ToolOutcome,
} from "../interfaces/tool.js";
import {
  ArgumentError,
  DuplicateToolError,
  ToolExecutionError,
  UnknownToolError,
  isCourseRagError,
} from "../errors.js";
import { disabledLogger } from "../logging/logger.js";
import { describeArguments } from "./describe-arguments.js";

const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

export interface ToolRegistryOptions {
  /** Per-execution timeout; a handler still pending after it fails the call. */
  timeoutMs?: number | undefined;
  logger?: Logger | undefined;
}

interface RegisteredTool {
  readonly declaration: ToolDeclaration;
  run(args: unknown): Promise<ToolOutcome>;
}

/**
 * ToolRegistry maps tool names to handlers and is the only place model-issued
 * arguments are parsed and validated.
 *
 * - Registration is append-only: a taken name throws, nothing is overwritten.
 * - `execute()` throws typed errors (`UnknownToolError`, `ArgumentError`,
 *   `ToolExecutionError`); the generation loop turns them into tool-result
 *   text for the model.
 * - No state is kept between executions. Citations come back in the outcome,
 *   so concurrent turns sharing one registry never see each other's sources.
 */
export class ToolRegistry implements ToolExecutor {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(options: ToolRegistryOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.log = options.logger ?? disabledLogger();
  }

  register<S extends z.AnyZodObject>(tool: Tool<S>): void {
    if (this.tools.has(tool.name)) {
      throw new DuplicateToolError(tool.name);
    }

    const declaration = ToolDeclarationSchema.parse({
      name: tool.name,
      description: tool.description,
      parameters: describeArguments(tool.arguments),
    });

    this.tools.set(tool.name, {
      declaration,
      run: async (args) => {
        const parsed = tool.arguments.safeParse(args);
        if (!parsed.success) {
          throw new ArgumentError(
            tool.name,
            parsed.error.issues.map(
              (i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`
            )
          );
        }
        return tool.execute(parsed.data);
      },
    });
  }

  /** All declarations, in registration order. */
  declarations(): ToolDeclaration[] {
    return Array.from(this.tools.values(), (t) => t.declaration);
  }

  async execute(name: string, rawArguments: string): Promise<ToolOutcome> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }

    const args = parsePayload(name, rawArguments);
    const startMs = Date.now();

    try {
      const outcome = await withTimeout(tool.run(args), this.timeoutMs, name);
      this.log.debug(
        { tool: name, durationMs: Date.now() - startMs, citations: outcome.citations.length },
        "tool executed"
      );
      return outcome;
    } catch (err) {
      if (isCourseRagError(err)) {
        throw err;
      }
      throw new ToolExecutionError(name, err);
    }
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }
}

function parsePayload(toolName: string, raw: string): Record<string, unknown> {
  // some providers send "" for a call without arguments
  if (raw.trim() === "") {
    return {};
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new ArgumentError(toolName, ["arguments are not valid JSON"]);
  }

  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ArgumentError(toolName, ["arguments must be a JSON object"]);
  }
  return Object.fromEntries(Object.entries(value));
}

function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  toolName: string
): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(
        new ToolExecutionError(toolName, new Error(`timed out after ${timeoutMs}ms`))
      );
    }, timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}
