import type { Agent, TurnEntry } from './agent-protocol.js';

/** Invalid agent/tool graph. Raised before any run can start. */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}

/** The completion service was unreachable or rejected the request. */
export class GatewayError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, { cause: options?.cause });
    this.name = 'GatewayError';
    this.status = options?.status;
  }
}

/** A tool invocation failed. The message is shown to the model. */
export class ToolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ToolError';
  }
}

export type ExecutionErrorKind =
  | 'gateway_error'
  | 'invalid_decision_reference'
  | 'step_limit_exceeded'
  | 'tool_error';

/** Where a run stood when it stopped without a result. */
export interface RunSnapshot {
  runId: string;
  agent: Agent;
  history: TurnEntry[];
  steps: number;
}

/** A run failed. Never carries a partial answer. */
export class ExecutionError extends Error {
  readonly kind: ExecutionErrorKind;
  readonly detail: string;
  readonly runId: string;
  readonly agent: Agent;
  readonly history: TurnEntry[];
  readonly steps: number;

  constructor(kind: ExecutionErrorKind, detail: string, snapshot: RunSnapshot, options?: { cause?: unknown }) {
    super(`${kind}: ${detail}`, { cause: options?.cause });
    this.name = 'ExecutionError';
    this.kind = kind;
    this.detail = detail;
    this.runId = snapshot.runId;
    this.agent = snapshot.agent;
    this.history = snapshot.history;
    this.steps = snapshot.steps;
  }
}

export type CancelReason = 'aborted' | 'timeout';

/**
 * The caller cancelled the run, or its deadline passed. Not an
 * `ExecutionError`: callers handle it as its own outcome.
 */
export class RunCancelledError extends Error {
  readonly reason: CancelReason;
  readonly runId: string;
  readonly agent: Agent;
  readonly history: TurnEntry[];
  readonly steps: number;

  constructor(reason: CancelReason, snapshot: RunSnapshot) {
    super(reason === 'timeout' ? 'Run timed out' : 'Run was cancelled');
    this.name = 'RunCancelledError';
    this.reason = reason;
    this.runId = snapshot.runId;
    this.agent = snapshot.agent;
    this.history = snapshot.history;
    this.steps = snapshot.steps;
  }
}
