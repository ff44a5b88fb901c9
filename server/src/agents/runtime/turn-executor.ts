/**
 * Turn Executor — drives one user turn through the decision loop.
 *
 *   AWAITING_DECISION ──final_answer──▶ DONE
 *        │  ▲   │
 *        │  │   └──handoff──▶ AWAITING_DECISION (new active agent)
 *        ▼  │
 *   EXECUTING_TOOL
 *
 * Each step asks the gateway for one Decision and dispatches it. The only
 * suspension points are the gateway call and a tool invocation. One
 * executor serves exactly one run and owns its history.
 */

import { randomUUID } from 'node:crypto';
import type {
  Agent,
  Decision,
  DecisionRequest,
  ModelGateway,
  RunEvent,
  RunEventListener,
  RunResult,
  Tool,
  TurnEntry,
} from './agent-protocol.js';
import type { AgentGraph } from './agent-registry.js';
import { describeAgent } from './agent-registry.js';
import {
  ExecutionError,
  GatewayError,
  RunCancelledError,
  ToolError,
  type ExecutionErrorKind,
} from './errors.js';
import { createCombinedAbortSignal, isTimeoutReason } from '../../lib/abort.js';
import type { Logger } from '../../lib/logger.js';

export type ToolErrorMode = 'recover' | 'fail';

export type ExecutorStatus = 'awaiting_decision' | 'executing_tool' | 'done' | 'failed' | 'cancelled';

export interface TurnExecutorParams {
  runId: string;
  graph: AgentGraph;
  gateway: ModelGateway;
  startAgent: Agent;
  input: string;
  /** Earlier turns supplied by the caller; copied, never mutated */
  priorHistory?: readonly TurnEntry[];
  maxSteps: number;
  toolTimeoutMs: number;
  toolErrorMode: ToolErrorMode;
  signal: AbortSignal;
  onEvent?: RunEventListener;
  log: Logger;
}

type ToolOutcome = { output: string; isError: boolean; cause?: unknown };

export class TurnExecutor {
  private readonly history: TurnEntry[];
  private activeAgent: Agent;
  private steps = 0;
  private _status: ExecutorStatus = 'awaiting_decision';
  private started = false;

  constructor(private readonly params: TurnExecutorParams) {
    this.activeAgent = params.startAgent;
    this.history = params.priorHistory ? [...params.priorHistory] : [];
    this.history.push({
      id: randomUUID(),
      role: 'user',
      agent: params.startAgent.name,
      content: params.input,
    });
  }

  get status(): ExecutorStatus {
    return this._status;
  }

  /**
   * Run the loop to a terminal state.
   *
   * @throws ExecutionError when the run fails
   * @throws RunCancelledError when the signal aborts first
   */
  async execute(): Promise<RunResult> {
    if (this.started) {
      throw new Error('TurnExecutor.execute() may only be called once');
    }
    this.started = true;

    const { maxSteps, log } = this.params;

    while (this.steps < maxSteps) {
      this.throwIfCancelled();

      this.steps += 1;
      const step = this.steps;
      const agent = this.activeAgent;
      log.debug({ step, agent: agent.name, historyLength: this.history.length }, 'Step start');
      this.emit({ type: 'step_started', runId: this.params.runId, step, agent: agent.name });

      const decision = await this.requestDecision(agent, step);
      this.throwIfCancelled();

      switch (decision.type) {
        case 'final_answer':
          return this.finish(agent, decision.text);
        case 'tool_call':
          await this.runToolCall(agent, decision);
          break;
        case 'handoff':
          this.applyHandoff(agent, decision);
          break;
      }
    }

    log.warn({ maxSteps, agent: this.activeAgent.name }, 'Step limit exceeded');
    throw this.fail('step_limit_exceeded', `Run did not finish within ${maxSteps} steps`);
  }

  // ─── Steps ──────────────────────────────────────────────────────────

  private async requestDecision(agent: Agent, step: number): Promise<Decision> {
    const { graph, gateway, signal, log } = this.params;
    const request: DecisionRequest = {
      agent: agent.name,
      instructions: agent.instructions,
      history: [...this.history],
      availableTools: graph.toolDescriptors(agent),
      availableHandoffs: agent.handoffs.map(describeAgent),
      step,
    };

    try {
      return await gateway.decide(request, signal);
    } catch (err) {
      // An abort surfacing as a transport error is still a cancellation
      this.throwIfCancelled();
      const error = err instanceof GatewayError
        ? err
        : new GatewayError(err instanceof Error ? err.message : String(err), { cause: err });
      log.error({ step, agent: agent.name, err: error }, 'Gateway call failed');
      throw this.fail('gateway_error', error.message, error);
    }
  }

  private async runToolCall(
    agent: Agent,
    decision: Extract<Decision, { type: 'tool_call' }>,
  ): Promise<void> {
    const { runId, log } = this.params;
    const tool = agent.tools.find(t => t.name === decision.toolName);

    if (!tool) {
      const allowed = agent.tools.map(t => t.name);
      log.error(
        { step: this.steps, agent: agent.name, toolName: decision.toolName, allowed, arguments: decision.arguments },
        'Gateway requested a tool the active agent may not call',
      );
      this.append({
        role: 'error',
        agent: agent.name,
        code: 'unknown_tool',
        content: `Agent "${agent.name}" has no tool named "${decision.toolName}". Allowed: ${allowed.join(', ') || '(none)'}`,
      });
      throw this.fail('invalid_decision_reference', `Tool "${decision.toolName}" is not available to agent "${agent.name}"`);
    }

    const callId = randomUUID();
    this.append({
      role: 'tool_call',
      agent: agent.name,
      callId,
      toolName: tool.name,
      arguments: decision.arguments,
      content: `${tool.name}(${JSON.stringify(decision.arguments)})`,
    });
    this.emit({
      type: 'tool_started',
      runId,
      agent: agent.name,
      toolName: tool.name,
      callId,
      arguments: decision.arguments,
    });

    this._status = 'executing_tool';
    const outcome = await this.invokeTool(agent, tool, decision.arguments);
    this._status = 'awaiting_decision';

    this.append({
      role: 'tool_result',
      agent: agent.name,
      callId,
      toolName: tool.name,
      isError: outcome.isError,
      content: outcome.output,
    });
    this.emit({
      type: 'tool_finished',
      runId,
      agent: agent.name,
      toolName: tool.name,
      callId,
      isError: outcome.isError,
      output: outcome.output,
    });

    // The invocation completed; cancellation still wins over further steps
    this.throwIfCancelled();

    if (outcome.isError && this.params.toolErrorMode === 'fail') {
      throw this.fail('tool_error', outcome.output, outcome.cause);
    }
  }

  private async invokeTool(agent: Agent, tool: Tool, rawArgs: Record<string, unknown>): Promise<ToolOutcome> {
    const { graph, runId, signal, toolTimeoutMs, log } = this.params;

    const check = graph.tools.checkArguments(tool.name, rawArgs);
    if (!check.ok) {
      log.warn({ tool: tool.name, message: check.message }, 'Rejected tool arguments');
      return { output: check.message, isError: true, cause: new ToolError(check.message) };
    }

    const { signal: toolSignal, cleanup } = createCombinedAbortSignal(signal, toolTimeoutMs);
    try {
      log.info({ tool: tool.name, step: this.steps }, 'Executing tool');
      const output = await raceAbort(
        tool.invoke(check.args, { runId, agent: agent.name, signal: toolSignal }),
        toolSignal,
      );
      return { output, isError: false };
    } catch (err) {
      if (signal.aborted) {
        return { output: `Tool ${tool.name} was cancelled`, isError: true, cause: err };
      }
      if (isTimeoutReason(err)) {
        const message = `Tool ${tool.name} timed out after ${toolTimeoutMs}ms`;
        log.warn({ tool: tool.name, timeoutMs: toolTimeoutMs }, 'Tool timed out');
        return { output: message, isError: true, cause: err };
      }
      if (err instanceof ToolError) {
        log.warn({ tool: tool.name, error: err.message }, 'Tool reported an error');
        return { output: err.message, isError: true, cause: err };
      }
      const message = err instanceof Error ? err.message : String(err);
      log.error({ tool: tool.name, err }, 'Tool execution error');
      return { output: `Error running tool ${tool.name}: ${message}`, isError: true, cause: err };
    } finally {
      cleanup();
    }
  }

  private applyHandoff(agent: Agent, decision: Extract<Decision, { type: 'handoff' }>): void {
    const { runId, log } = this.params;
    const target = agent.handoffs.find(a => a.name === decision.targetAgent);

    if (!target) {
      const allowed = agent.handoffs.map(a => a.name);
      log.error(
        { step: this.steps, agent: agent.name, targetAgent: decision.targetAgent, allowed },
        'Gateway requested a handoff the active agent may not make',
      );
      this.append({
        role: 'error',
        agent: agent.name,
        code: 'unknown_handoff',
        content: `Agent "${agent.name}" cannot hand off to "${decision.targetAgent}". Allowed: ${allowed.join(', ') || '(none)'}`,
      });
      throw this.fail('invalid_decision_reference', `Agent "${agent.name}" may not hand off to "${decision.targetAgent}"`);
    }

    this.append({
      role: 'handoff',
      agent: agent.name,
      from: agent.name,
      to: target.name,
      content: `Transferred from ${agent.name} to ${target.name}.`,
    });
    this.activeAgent = target;
    log.info({ from: agent.name, to: target.name, step: this.steps }, 'Handoff');
    this.emit({ type: 'handoff', runId, from: agent.name, to: target.name });
  }

  private finish(agent: Agent, text: string): RunResult {
    const { runId, log } = this.params;
    this.append({ role: 'assistant', agent: agent.name, content: text });
    this._status = 'done';
    log.info({ agent: agent.name, steps: this.steps }, 'Run completed');
    this.emit({ type: 'final_answer', runId, agent: agent.name, output: text });
    return {
      runId,
      agent,
      output: text,
      history: [...this.history],
      steps: this.steps,
    };
  }

  // ─── Helpers ────────────────────────────────────────────────────────

  private append(entry: DistributiveOmit<TurnEntry, 'id'>): void {
    this.history.push({ ...entry, id: randomUUID() });
  }

  private snapshot() {
    return {
      runId: this.params.runId,
      agent: this.activeAgent,
      history: [...this.history],
      steps: this.steps,
    };
  }

  private fail(kind: ExecutionErrorKind, detail: string, cause?: unknown): ExecutionError {
    this._status = 'failed';
    return new ExecutionError(kind, detail, this.snapshot(), { cause });
  }

  private throwIfCancelled(): void {
    const { signal, log } = this.params;
    if (!signal.aborted) return;
    const reason = isTimeoutReason(signal.reason) ? 'timeout' : 'aborted';
    this._status = 'cancelled';
    log.warn({ reason, steps: this.steps, agent: this.activeAgent.name }, 'Run cancelled');
    throw new RunCancelledError(reason, this.snapshot());
  }

  private emit(event: RunEvent): void {
    const listener = this.params.onEvent;
    if (!listener) return;
    try {
      listener(event);
    } catch (err) {
      this.params.log.warn({ err, event: event.type }, 'Run event listener threw');
    }
  }
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** Settle with `promise`, or reject with the signal's reason once it aborts. */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    // Keep a late rejection from surfacing as unhandled
    void promise.catch(() => undefined);
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      void promise.catch(() => undefined);
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
