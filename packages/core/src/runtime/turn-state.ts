import type { Message } from "../interfaces/message.js";
import type { Citation, ToolInvocation } from "../interfaces/tool.js";

// Immutable snapshot handed to hooks and returned with the result
export interface TurnSnapshot {
  readonly messages: readonly Message[];
  readonly invocations: readonly ToolInvocation[];
  readonly citations: readonly Citation[];
  readonly modelCalls: number;
  readonly phase: TurnPhase;
}

export type TurnPhase =
  | "idle"
  | "assembling_context"
  | "awaiting_completion"
  | "dispatching_tools"
  | "awaiting_followup"
  | "error";

// Mutable state for one generation turn; only the GenerationLoop mutates it
export class TurnState {
  private _snapshot: TurnSnapshot = {
    messages: [],
    invocations: [],
    citations: [],
    modelCalls: 0,
    phase: "idle",
  };

  get snapshot(): TurnSnapshot {
    return Object.freeze({ ...this._snapshot });
  }

  appendMessage(msg: Message): void {
    this._snapshot = {
      ...this._snapshot,
      messages: [...this._snapshot.messages, msg],
    };
  }

  recordModelCall(): void {
    this._snapshot = {
      ...this._snapshot,
      modelCalls: this._snapshot.modelCalls + 1,
    };
  }

  recordInvocations(calls: readonly ToolInvocation[]): void {
    this._snapshot = {
      ...this._snapshot,
      invocations: [...this._snapshot.invocations, ...calls],
    };
  }

  // Replaces rather than accumulates: only the latest execution is cited
  setCitations(citations: readonly Citation[]): void {
    this._snapshot = { ...this._snapshot, citations: [...citations] };
  }

  setPhase(phase: TurnPhase): void {
    this._snapshot = { ...this._snapshot, phase };
  }
}
