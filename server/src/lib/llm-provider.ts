import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { getAnthropicClient } from './anthropic.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  tools?: ToolDef[];
  /** Ask the model for at most one tool call per response */
  single_tool_call?: boolean;
  max_tokens: number;
  signal?: AbortSignal;
}

/** Anthropic-style message with content blocks */
export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string | ContentBlock[];
}

export type ContentBlock =
  | { type: 'text'; text: string }
  | { type: 'tool_use'; id: string; name: string; input: Record<string, unknown> }
  | { type: 'tool_result'; tool_use_id: string; content: string; is_error?: boolean };

/** JSON Schema for a tool's input object */
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, { type: string; description?: string }>;
  required: string[];
  additionalProperties?: boolean;
};

export interface ToolDef {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
}

export interface ChatResponse {
  text: string;
  tool_calls: ToolCall[];
  usage: { input_tokens: number; output_tokens: number };
}

export interface ToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

// ─── Provider interface ──────────────────────────────────────────────

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';

  constructor(private readonly getClient: () => Anthropic = getAnthropicClient) {}

  async chat(params: ChatParams): Promise<ChatResponse> {
    const anthropic = this.getClient();
    const request: Anthropic.MessageCreateParamsNonStreaming = {
      model: params.model,
      max_tokens: params.max_tokens,
      system: params.system,
      messages: params.messages,
    };
    if (params.tools && params.tools.length > 0) {
      request.tools = params.tools;
      request.tool_choice = { type: 'auto', disable_parallel_tool_use: params.single_tool_call ?? false };
    }

    const response = await anthropic.messages.create(request, { signal: params.signal });

    let text = '';
    const tool_calls: ToolCall[] = [];

    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      } else if (block.type === 'tool_use') {
        tool_calls.push({
          id: block.id,
          name: block.name,
          input: isRecord(block.input) ? block.input : {},
        });
      }
    }

    return {
      text,
      tool_calls,
      usage: {
        input_tokens: response.usage?.input_tokens ?? 0,
        output_tokens: response.usage?.output_tokens ?? 0,
      },
    };
  }
}

// ─── OpenAI-compatible provider ──────────────────────────────────────

interface OpenAICompatConfig {
  apiKey: string;
  baseUrl: string;
  fetchImpl?: typeof fetch;
}

const openAIChatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullish(),
      tool_calls: z.array(z.object({
        id: z.string(),
        type: z.literal('function').optional(),
        function: z.object({ name: z.string(), arguments: z.string() }),
      })).nullish(),
    }),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).nullish(),
});

type OpenAIChatResponse = z.infer<typeof openAIChatResponseSchema>;

interface OpenAIToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

type OpenAIMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: OpenAIToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };

export class OpenAICompatError extends Error {
  constructor(readonly status: number, body: string) {
    super(`OpenAI-compatible API error ${status}: ${body.slice(0, 500)}`);
    this.name = 'OpenAICompatError';
  }
}

export class OpenAICompatProvider implements LLMProvider {
  readonly name = 'openai-compat';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: OpenAICompatConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(this.buildRequestBody(params)),
      signal: params.signal,
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      throw new OpenAICompatError(response.status, errText);
    }

    const parsed = openAIChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`OpenAI-compatible API returned an unexpected body: ${parsed.error.message}`);
    }
    return this.parseResponse(parsed.data);
  }

  // ─── Translation helpers ─────────────────────────────────────────

  private buildRequestBody(params: ChatParams): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: params.model,
      max_tokens: params.max_tokens,
      messages: this.translateMessages(params.system, params.messages),
    };

    if (params.tools && params.tools.length > 0) {
      body.tools = params.tools.map(t => ({
        type: 'function',
        function: {
          name: t.name,
          description: t.description,
          parameters: t.input_schema,
        },
      }));
      body.tool_choice = 'auto';
      if (params.single_tool_call) {
        body.parallel_tool_calls = false;
      }
    }

    return body;
  }

  /**
   * Anthropic-shaped messages to OpenAI chat messages. `tool_use` blocks on
   * assistant messages become `tool_calls`; `tool_result` blocks on user
   * messages become separate `tool` messages, emitted before any user text.
   */
  private translateMessages(system: string, messages: ChatMessage[]): OpenAIMessage[] {
    const result: OpenAIMessage[] = [{ role: 'system', content: system }];

    for (const msg of messages) {
      if (typeof msg.content === 'string') {
        result.push(msg.role === 'user'
          ? { role: 'user', content: msg.content }
          : { role: 'assistant', content: msg.content });
        continue;
      }

      const textParts: string[] = [];

      if (msg.role === 'assistant') {
        const toolCalls: OpenAIToolCall[] = [];
        for (const block of msg.content) {
          if (block.type === 'text') {
            textParts.push(block.text);
          } else if (block.type === 'tool_use') {
            toolCalls.push({
              id: block.id,
              type: 'function',
              function: { name: block.name, arguments: JSON.stringify(block.input) },
            });
          }
        }
        result.push({
          role: 'assistant',
          content: textParts.length > 0 ? textParts.join('') : null,
          ...(toolCalls.length > 0 && { tool_calls: toolCalls }),
        });
        continue;
      }

      for (const block of msg.content) {
        if (block.type === 'tool_result') {
          result.push({ role: 'tool', tool_call_id: block.tool_use_id, content: block.content });
        } else if (block.type === 'text') {
          textParts.push(block.text);
        }
      }
      if (textParts.length > 0) {
        result.push({ role: 'user', content: textParts.join('\n') });
      }
    }

    return result;
  }

  private parseResponse(data: OpenAIChatResponse): ChatResponse {
    const message = data.choices[0].message;
    const tool_calls: ToolCall[] = [];

    for (const tc of message.tool_calls ?? []) {
      let input: Record<string, unknown> = {};
      try {
        const decoded: unknown = JSON.parse(tc.function.arguments);
        if (isRecord(decoded)) input = decoded;
      } catch {
        // Malformed arguments reach the tool as {} and fail its validation there
        input = {};
      }
      tool_calls.push({ id: tc.id, name: tc.function.name, input });
    }

    return {
      text: message.content ?? '',
      tool_calls,
      usage: {
        input_tokens: data.usage?.prompt_tokens ?? 0,
        output_tokens: data.usage?.completion_tokens ?? 0,
      },
    };
  }
}
