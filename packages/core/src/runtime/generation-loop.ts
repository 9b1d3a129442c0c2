import type { Logger } from "pino";
import type { LLMAdapter, CompletionOptions, CompletionSignal } from "../interfaces/llm-adapter.js";
import type {
  Citation,
  ToolDeclaration,
  ToolExecutor,
  ToolInvocation,
  ToolOutcome,
} from "../interfaces/tool.js";
import { createMessage } from "../interfaces/message.js";
import { UpstreamModelError } from "../errors.js";
import { disabledLogger } from "../logging/logger.js";
import { ContextAssembler } from "./context-assembler.js";
import { COURSE_ASSISTANT_PROMPT } from "./prompts.js";
import { TurnState, type TurnPhase, type TurnSnapshot } from "./turn-state.js";

export interface GenerationLoopOptions {
  adapter: LLMAdapter;
  model: string;
  maxTokens?: number | undefined;
  temperature?: number | undefined;
  /** Replaces the built-in course assistant policy */
  systemPrompt?: string | undefined;
  logger?: Logger | undefined;
  /** Called on each phase transition for observability */
  onPhaseChange?: ((phase: TurnPhase) => void) | undefined;
}

export interface GenerationRequest {
  query: string;
  /** Rendered session history, "" or undefined for a fresh session */
  history?: string | undefined;
  tools: readonly ToolDeclaration[];
  executor: ToolExecutor;
}

export interface GenerationResult {
  answer: string;
  /** Citations of the last tool invocation this turn; empty when none ran */
  citations: Citation[];
  transcript: TurnSnapshot;
}

type ModelReply = Exclude<CompletionSignal, { type: "error" }>;

/**
 * GenerationLoop runs one user turn against the model with at most one round
 * of tool use.
 *
 *   1. [assembling_context]  system policy + history, then the user query
 *   2. [awaiting_completion] first call, tools attached when any are declared
 *   3. [dispatching_tools]   only if the model asked: run every invocation,
 *                            append one tool message each, in emission order
 *   4. [awaiting_followup]   second call with no tools; its text is the answer
 *
 * The cap is structural: the follow-up request carries no tool declarations
 * and there is no path to a third call. Tool failures are narrated to the
 * model as the tool message content; model failures throw UpstreamModelError.
 */
export class GenerationLoop {
  private readonly assembler = new ContextAssembler();
  private readonly options: GenerationLoopOptions;
  private readonly log: Logger;

  constructor(options: GenerationLoopOptions) {
    this.options = options;
    this.log = options.logger ?? disabledLogger();
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const state = new TurnState();

    // [assembling_context]
    this.transition(state, "assembling_context");
    const opening = this.assembler.assemble(request.query, {
      systemPrompt: this.options.systemPrompt ?? COURSE_ASSISTANT_PROMPT,
      history: request.history,
    });
    for (const msg of opening) {
      state.appendMessage(msg);
    }

    // [awaiting_completion]
    this.transition(state, "awaiting_completion");
    const first = await this.complete(
      state,
      this.assembler.buildCompletionOptions(this.options.model, {
        maxTokens: this.options.maxTokens,
        temperature: this.options.temperature,
        tools: request.tools,
      })
    );

    if (first.type === "text") {
      return this.finish(state, first.content);
    }

    // [dispatching_tools]
    this.transition(state, "dispatching_tools");
    state.appendMessage(createMessage("assistant", first.content, { toolCalls: first.calls }));
    state.recordInvocations(first.calls);

    const outcomes = await Promise.all(
      first.calls.map((call) => this.dispatch(call, request.executor))
    );
    for (const { call, outcome } of outcomes) {
      state.appendMessage(createMessage("tool", outcome.content, { toolCallId: call.id }));
    }
    state.setCitations(outcomes.at(-1)?.outcome.citations ?? []);

    // [awaiting_followup]: no tools, so no second round
    this.transition(state, "awaiting_followup");
    const followUp = await this.complete(
      state,
      this.assembler.buildCompletionOptions(this.options.model, {
        maxTokens: this.options.maxTokens,
        temperature: this.options.temperature,
      })
    );

    if (followUp.type === "tool_use") {
      this.log.warn(
        { tools: followUp.calls.map((c) => c.name) },
        "follow-up asked for tools without any declared; ignoring"
      );
    }
    return this.finish(state, followUp.content);
  }

  private async complete(
    state: TurnState,
    options: CompletionOptions
  ): Promise<ModelReply> {
    state.recordModelCall();

    let signal: CompletionSignal;
    try {
      signal = await this.options.adapter.complete([...state.snapshot.messages], options);
    } catch (err) {
      this.transition(state, "error");
      throw err;
    }

    if (signal.type === "error") {
      this.transition(state, "error");
      this.log.error(
        { provider: this.options.adapter.providerId, code: signal.code, retryable: signal.retryable },
        signal.message
      );
      throw new UpstreamModelError(signal.message, signal.code, signal.retryable);
    }
    return signal;
  }

  private async dispatch(
    call: ToolInvocation,
    executor: ToolExecutor
  ): Promise<{ call: ToolInvocation; outcome: ToolOutcome }> {
    try {
      const outcome = await executor.execute(call.name, call.arguments);
      return { call, outcome };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log.warn({ tool: call.name, invocationId: call.id, err: message }, "tool invocation failed");
      return { call, outcome: { content: message, citations: [] } };
    }
  }

  private finish(state: TurnState, answer: string): GenerationResult {
    this.transition(state, "idle");
    const transcript = state.snapshot;
    this.log.debug(
      { modelCalls: transcript.modelCalls, invocations: transcript.invocations.length },
      "turn complete"
    );
    return { answer, citations: [...transcript.citations], transcript };
  }

  private transition(state: TurnState, phase: TurnPhase): void {
    state.setPhase(phase);
    this.options.onPhaseChange?.(phase);
  }
}
