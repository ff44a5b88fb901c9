/**
 * LLM Gateway — ModelGateway backed by a chat-completion provider.
 *
 * Tools are offered to the model as-is; every allowed handoff becomes a
 * `transfer_to_<agent>` tool. The model's reply is read back as exactly one
 * Decision: text with no tool call is the final answer, otherwise the first
 * tool call decides the step.
 */

import type { LLMProvider, ChatMessage, ChatResponse, ContentBlock, ToolDef } from '../../lib/llm-provider.js';
import { withRetry, getStatusCode } from '../../lib/retry.js';
import logger from '../../lib/logger.js';
import type { AgentDescriptor, Decision, DecisionRequest, ModelGateway, TurnEntry } from './agent-protocol.js';
import { GatewayError } from './errors.js';
import { handoffToolName } from './agent-registry.js';

function handoffToolDef(target: AgentDescriptor): ToolDef {
  const summary = target.description ? ` ${target.description}` : '';
  return {
    name: handoffToolName(target.name),
    description: `Handoff to the ${target.name} agent to handle the request.${summary}`,
    input_schema: { type: 'object', properties: {}, required: [], additionalProperties: false },
  };
}

/** Append blocks, folding consecutive messages of the same role together. */
function pushMessage(messages: ChatMessage[], role: ChatMessage['role'], blocks: ContentBlock[]): void {
  const last = messages[messages.length - 1];
  if (last && last.role === role) {
    const existing: ContentBlock[] = typeof last.content === 'string'
      ? [{ type: 'text', text: last.content }]
      : last.content;
    last.content = [...existing, ...blocks];
    return;
  }
  messages.push({ role, content: blocks });
}

export interface RenderOptions {
  /**
   * When false, tool calls, tool results and handoffs are written as plain
   * text turns. Providers reject tool_use/tool_result blocks in a request
   * that defines no tools.
   */
  toolBlocks?: boolean;
}

function renderAsText(entry: TurnEntry): { role: ChatMessage['role']; text: string } | null {
  switch (entry.role) {
    case 'tool_call':
      return { role: 'assistant', text: `[called ${entry.content}]` };
    case 'tool_result':
      return { role: 'user', text: `[${entry.toolName} ${entry.isError ? 'error' : 'result'}] ${entry.content}` };
    case 'handoff':
      return { role: 'assistant', text: `[transferred from ${entry.from} to ${entry.to}]` };
    default:
      return null;
  }
}

/**
 * Render run history as provider chat messages. Tool calls become
 * tool_use/tool_result pairs; a handoff becomes a transfer call and its
 * result, so the receiving agent sees how control reached it.
 */
export function renderHistory(history: readonly TurnEntry[], options: RenderOptions = {}): ChatMessage[] {
  const toolBlocks = options.toolBlocks ?? true;
  const messages: ChatMessage[] = [];

  for (const entry of history) {
    if (!toolBlocks) {
      const text = renderAsText(entry);
      if (text) {
        pushMessage(messages, text.role, [{ type: 'text', text: text.text }]);
        continue;
      }
    }

    switch (entry.role) {
      case 'user':
        pushMessage(messages, 'user', [{ type: 'text', text: entry.content }]);
        break;
      case 'assistant':
        pushMessage(messages, 'assistant', [{ type: 'text', text: entry.content }]);
        break;
      case 'tool_call':
        pushMessage(messages, 'assistant', [
          { type: 'tool_use', id: entry.callId, name: entry.toolName, input: entry.arguments },
        ]);
        break;
      case 'tool_result':
        pushMessage(messages, 'user', [
          { type: 'tool_result', tool_use_id: entry.callId, content: entry.content, is_error: entry.isError },
        ]);
        break;
      case 'handoff':
        pushMessage(messages, 'assistant', [
          { type: 'tool_use', id: entry.id, name: handoffToolName(entry.to), input: {} },
        ]);
        pushMessage(messages, 'user', [
          { type: 'tool_result', tool_use_id: entry.id, content: JSON.stringify({ assistant: entry.to }) },
        ]);
        break;
      case 'error':
        pushMessage(messages, 'user', [{ type: 'text', text: `[runtime error] ${entry.content}` }]);
        break;
    }
  }

  return messages;
}

export interface LlmGatewayConfig {
  provider: LLMProvider;
  model: string;
  maxTokens: number;
  /** Transport retries for transient failures (default 3 attempts) */
  maxAttempts?: number;
  baseDelayMs?: number;
}

export class LlmGateway implements ModelGateway {
  private readonly log = logger.child({ component: 'llm-gateway' });

  constructor(private readonly config: LlmGatewayConfig) {}

  async decide(request: DecisionRequest, signal: AbortSignal): Promise<Decision> {
    const { provider, model, maxTokens } = this.config;

    const handoffByToolName = new Map<string, string>();
    for (const target of request.availableHandoffs) {
      handoffByToolName.set(handoffToolName(target.name), target.name);
    }

    const tools: ToolDef[] = [
      ...request.availableTools.map((t): ToolDef => ({
        name: t.name,
        description: t.description,
        input_schema: t.parameters,
      })),
      ...request.availableHandoffs.map(handoffToolDef),
    ];

    let response: ChatResponse;
    try {
      response = await withRetry(
        () => provider.chat({
          model,
          system: request.instructions,
          messages: renderHistory(request.history, { toolBlocks: tools.length > 0 }),
          tools: tools.length > 0 ? tools : undefined,
          single_tool_call: true,
          max_tokens: maxTokens,
          signal,
        }),
        {
          maxAttempts: this.config.maxAttempts ?? 3,
          baseDelay: this.config.baseDelayMs ?? 1000,
          signal,
          onRetry: (attempt, err) => {
            this.log.warn({ attempt, agent: request.agent, error: err.message }, 'LLM call retry');
          },
        },
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new GatewayError(`${provider.name} request failed: ${message}`, {
        cause: err,
        status: getStatusCode(err) ?? undefined,
      });
    }

    this.log.debug(
      { agent: request.agent, step: request.step, usage: response.usage, toolCalls: response.tool_calls.length },
      'LLM response',
    );

    const [first, ...dropped] = response.tool_calls;
    if (!first) {
      if (!response.text.trim()) {
        throw new GatewayError('Model returned neither text nor a tool call');
      }
      return { type: 'final_answer', text: response.text };
    }

    if (dropped.length > 0) {
      this.log.warn(
        { agent: request.agent, kept: first.name, dropped: dropped.map(tc => tc.name) },
        'Model returned several tool calls; only the first is used',
      );
    }

    const target = handoffByToolName.get(first.name);
    if (target !== undefined) {
      return { type: 'handoff', targetAgent: target };
    }
    return { type: 'tool_call', toolName: first.name, arguments: first.input };
  }
}
