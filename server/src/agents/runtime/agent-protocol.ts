/**
 * Agent Protocol — Types shared by the orchestration runtime.
 *
 * Agents, tools, the per-step Decision produced by the model gateway, the
 * turn history a run accumulates, and the result handed back to callers.
 * Nothing here knows about a concrete LLM provider or product.
 */

// ─── Tools ───────────────────────────────────────────────────────────

export type ParameterType = 'string' | 'number' | 'boolean';

export interface ToolParameter {
  type: ParameterType;
  description?: string;
  /** Optional fields may be omitted by the model (default: required) */
  optional?: boolean;
}

/** Field name → primitive type, or a fuller parameter description */
export type ToolParameters = Readonly<Record<string, ParameterType | ToolParameter>>;

/** Validated arguments passed to `Tool.invoke` */
export type ToolArguments = Readonly<Record<string, string | number | boolean>>;

export interface ToolContext {
  readonly runId: string;
  /** Name of the agent that requested the call */
  readonly agent: string;
  /** Aborts on run cancellation or when the per-tool timeout elapses */
  readonly signal: AbortSignal;
}

/**
 * An externally invocable function. The model sees `name`, `description`
 * and the parameter schema; `invoke` runs when an agent calls it.
 * Failures are reported by throwing `ToolError`.
 */
export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly parameters: ToolParameters;
  invoke(args: ToolArguments, ctx: ToolContext): Promise<string>;
}

/** JSON Schema for a tool's input object, as offered to the model */
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, { type: ParameterType; description?: string }>;
  required: string[];
  additionalProperties: false;
};

export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: ToolInputSchema;
}

// ─── Agents ──────────────────────────────────────────────────────────

/** Configuration-time description of an agent. References are by name. */
export interface AgentSpec {
  name: string;
  instructions: string;
  /** Shown to other agents deciding whether to transfer here */
  handoffDescription?: string;
  tools?: string[];
  handoffs?: string[];
}

/**
 * A resolved, frozen agent. `handoffs` may form cycles; the runtime bounds
 * traversal with its step cap.
 */
export interface Agent {
  readonly name: string;
  readonly instructions: string;
  readonly handoffDescription?: string;
  readonly tools: readonly Tool[];
  readonly handoffs: readonly Agent[];
}

export interface AgentDescriptor {
  name: string;
  description: string;
}

// ─── Decisions ───────────────────────────────────────────────────────

export type Decision =
  | { type: 'final_answer'; text: string }
  | { type: 'tool_call'; toolName: string; arguments: Record<string, unknown> }
  | { type: 'handoff'; targetAgent: string };

// ─── Turn history ────────────────────────────────────────────────────

interface EntryBase {
  id: string;
  /** Agent active when the entry was recorded */
  agent: string;
  content: string;
}

export type TurnEntry =
  | (EntryBase & { role: 'user' })
  | (EntryBase & { role: 'assistant' })
  | (EntryBase & {
      role: 'tool_call';
      callId: string;
      toolName: string;
      arguments: Record<string, unknown>;
    })
  | (EntryBase & { role: 'tool_result'; callId: string; toolName: string; isError: boolean })
  | (EntryBase & { role: 'handoff'; from: string; to: string })
  | (EntryBase & { role: 'error'; code: 'unknown_tool' | 'unknown_handoff' });

export type TurnRole = TurnEntry['role'];

// ─── Model Completion Gateway ────────────────────────────────────────

export interface DecisionRequest {
  agent: string;
  instructions: string;
  /** Full history so far; the gateway must not mutate it */
  history: readonly TurnEntry[];
  availableTools: ToolDescriptor[];
  availableHandoffs: AgentDescriptor[];
  /** 1-based step number within the run */
  step: number;
}

/**
 * The component that decides, per step, whether the active agent answers,
 * calls a tool, or hands off. Failures are reported as `GatewayError`.
 */
export interface ModelGateway {
  decide(request: DecisionRequest, signal: AbortSignal): Promise<Decision>;
}

// ─── Events & results ────────────────────────────────────────────────

export type RunEvent =
  | { type: 'step_started'; runId: string; step: number; agent: string }
  | {
      type: 'tool_started';
      runId: string;
      agent: string;
      toolName: string;
      callId: string;
      arguments: Record<string, unknown>;
    }
  | {
      type: 'tool_finished';
      runId: string;
      agent: string;
      toolName: string;
      callId: string;
      isError: boolean;
      output: string;
    }
  | { type: 'handoff'; runId: string; from: string; to: string }
  | { type: 'final_answer'; runId: string; agent: string; output: string };

export type RunEventListener = (event: RunEvent) => void;

export interface RunResult {
  runId: string;
  /** Agent active when the run terminated */
  agent: Agent;
  output: string;
  history: TurnEntry[];
  /** Number of gateway decisions taken */
  steps: number;
}
