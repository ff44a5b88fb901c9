/**
 * Runner — public entry point of the orchestration runtime.
 *
 * `run()` resolves the start agent, creates a fresh TurnExecutor and
 * history, and drives it to a terminal state. The Runner itself keeps no
 * per-run state, so one instance can serve concurrent runs over the same
 * agent graph.
 */

import { randomUUID } from 'node:crypto';
import type { Agent, ModelGateway, RunEventListener, RunResult, TurnEntry } from './agent-protocol.js';
import type { AgentGraph } from './agent-registry.js';
import { ConfigurationError } from './errors.js';
import { TurnExecutor, type ToolErrorMode } from './turn-executor.js';
import { createCombinedAbortSignal } from '../../lib/abort.js';
import { createRunLogger } from '../../lib/logger.js';

// ─── Constants ───────────────────────────────────────────────────────

export const DEFAULT_MAX_STEPS = 10;
export const DEFAULT_RUN_TIMEOUT_MS = 120_000;
export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

// ─── Public API ──────────────────────────────────────────────────────

export interface RunnerConfig {
  graph: AgentGraph;
  gateway: ModelGateway;
  /** Max gateway decisions per run */
  maxSteps?: number;
  /** Deadline for a whole run (ms) */
  timeoutMs?: number;
  /** Deadline for a single tool invocation (ms) */
  toolTimeoutMs?: number;
}

export interface RunOptions {
  /** Caller-initiated cancellation, checked at every suspension boundary */
  signal?: AbortSignal;
  maxSteps?: number;
  timeoutMs?: number;
  /** Conversation from earlier turns; the runtime does not keep it */
  priorHistory?: readonly TurnEntry[];
  onEvent?: RunEventListener;
  /** 'recover' (default) feeds tool failures back to the model; 'fail' ends the run */
  toolErrorMode?: ToolErrorMode;
  runId?: string;
}

function assertPositiveInt(value: number, label: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${label} must be a positive integer (got ${value})`);
  }
  return value;
}

export class Runner {
  readonly graph: AgentGraph;
  private readonly gateway: ModelGateway;
  private readonly maxSteps: number;
  private readonly timeoutMs: number;
  private readonly toolTimeoutMs: number;

  constructor(config: RunnerConfig) {
    this.graph = config.graph;
    this.gateway = config.gateway;
    this.maxSteps = assertPositiveInt(config.maxSteps ?? DEFAULT_MAX_STEPS, 'maxSteps');
    this.timeoutMs = assertPositiveInt(config.timeoutMs ?? DEFAULT_RUN_TIMEOUT_MS, 'timeoutMs');
    this.toolTimeoutMs = assertPositiveInt(config.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS, 'toolTimeoutMs');
  }

  /**
   * Run one user turn to completion.
   *
   * @throws ExecutionError on gateway failure, an invalid decision, the step cap, or (with toolErrorMode 'fail') a tool failure
   * @throws RunCancelledError when `signal` aborts or the deadline passes
   * @throws ConfigurationError when `startAgent` is not part of this runner's graph
   */
  async run(startAgent: Agent | string, input: string, options: RunOptions = {}): Promise<RunResult> {
    const agent = this.resolveAgent(startAgent);
    if (typeof input !== 'string' || input.trim().length === 0) {
      throw new TypeError('input must be a non-empty string');
    }

    const runId = options.runId ?? randomUUID();
    const maxSteps = assertPositiveInt(options.maxSteps ?? this.maxSteps, 'maxSteps');
    const timeoutMs = assertPositiveInt(options.timeoutMs ?? this.timeoutMs, 'timeoutMs');
    const log = createRunLogger(runId, { startAgent: agent.name });

    const { signal, cleanup } = createCombinedAbortSignal(options.signal, timeoutMs);

    const executor = new TurnExecutor({
      runId,
      graph: this.graph,
      gateway: this.gateway,
      startAgent: agent,
      input,
      priorHistory: options.priorHistory,
      maxSteps,
      toolTimeoutMs: this.toolTimeoutMs,
      toolErrorMode: options.toolErrorMode ?? 'recover',
      signal,
      onEvent: options.onEvent,
      log,
    });

    log.info({ maxSteps, timeoutMs }, 'Run start');
    try {
      return await executor.execute();
    } finally {
      cleanup();
    }
  }

  private resolveAgent(ref: Agent | string): Agent {
    if (typeof ref === 'string') {
      return this.graph.require(ref);
    }
    if (!this.graph.has(ref)) {
      throw new ConfigurationError(`Agent "${ref.name}" is not part of this runner's agent graph`);
    }
    return ref;
  }
}
