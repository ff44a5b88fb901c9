import { randomUUID } from 'node:crypto';
import { Hono, type Context } from 'hono';
import { streamSSE } from 'hono/streaming';
import { z } from 'zod';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import { validateBody, formatIssues } from '../lib/validate.js';
import type { RunLimiter } from '../lib/run-limiter.js';
import type { Runner } from '../agents/runtime/runner.js';
import type { Agent, RunResult, TurnEntry } from '../agents/runtime/agent-protocol.js';
import { ExecutionError, RunCancelledError } from '../agents/runtime/errors.js';

/** Shown to chat users when a run fails for any reason. */
export const CHAT_FALLBACK_MESSAGE = 'Sorry, I encountered an error processing your request.';

const MAX_CHAT_BODY_BYTES = 200_000;

const chatRequestSchema = z.object({
  message: z.string().trim().min(1, 'message is required').max(4000),
  agent: z.string().trim().min(1).optional(),
  history: z.array(z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string().max(20_000),
  })).max(50).optional(),
});

type ChatRequest = z.infer<typeof chatRequestSchema>;

export interface ChatRouteDeps {
  runner: Runner;
  limiter: RunLimiter;
  startAgent: string;
}

export function serializeResult(result: RunResult) {
  return {
    run_id: result.runId,
    agent: result.agent.name,
    output: result.output,
    steps: result.steps,
    history: result.history,
  };
}

/** Caller-held chat memory → history entries for the next run. */
function toPriorHistory(history: ChatRequest['history'], agent: Agent): TurnEntry[] {
  return (history ?? []).map((msg): TurnEntry => ({
    id: randomUUID(),
    role: msg.role,
    agent: agent.name,
    content: msg.content,
  }));
}

type RunFailure =
  | { status: 422; body: { error: { kind: string; detail: string }; message: string; run_id: string } }
  | { status: 408 | 504; body: { error: { kind: 'cancelled'; reason: string }; message: string; run_id: string } };

/** Map a rejected run to an HTTP status and body, or null for unexpected errors. */
export function describeRunFailure(err: unknown): RunFailure | null {
  if (err instanceof ExecutionError) {
    return {
      status: 422,
      body: { error: { kind: err.kind, detail: err.detail }, message: CHAT_FALLBACK_MESSAGE, run_id: err.runId },
    };
  }
  if (err instanceof RunCancelledError) {
    return {
      status: err.reason === 'timeout' ? 504 : 408,
      body: { error: { kind: 'cancelled', reason: err.reason }, message: CHAT_FALLBACK_MESSAGE, run_id: err.runId },
    };
  }
  return null;
}

type PreparedRun =
  | { ok: true; request: ChatRequest; agent: Agent; release: () => void }
  | { ok: false; response: Response };

async function prepareRun(c: Context, deps: ChatRouteDeps): Promise<PreparedRun> {
  const parsedBody = await parseJsonBodyWithLimit(c, MAX_CHAT_BODY_BYTES);
  if (!parsedBody.ok) return parsedBody;

  const validated = validateBody(chatRequestSchema, parsedBody.data);
  if (!validated.success) {
    return {
      ok: false,
      response: c.json({ error: 'Invalid request', details: formatIssues(validated.issues) }, 400),
    };
  }

  const agentName = validated.data.agent ?? deps.startAgent;
  const agent = deps.runner.graph.get(agentName);
  if (!agent) {
    return { ok: false, response: c.json({ error: `Unknown agent: ${agentName}` }, 404) };
  }

  const release = deps.limiter.tryAcquire();
  if (!release) {
    return { ok: false, response: c.json({ error: 'Server is at capacity. Please try again shortly.' }, 503) };
  }

  return { ok: true, request: validated.data, agent, release };
}

export function createChatRoutes(deps: ChatRouteDeps): Hono {
  const chat = new Hono();

  // POST /chat — run one turn and return the final answer
  chat.post('/', async (c) => {
    const prepared = await prepareRun(c, deps);
    if (!prepared.ok) return prepared.response;

    const { request, agent, release } = prepared;
    const log = c.get('log');
    try {
      const result = await deps.runner.run(agent, request.message, {
        signal: c.req.raw.signal,
        priorHistory: toPriorHistory(request.history, agent),
      });
      return c.json(serializeResult(result));
    } catch (err) {
      const failure = describeRunFailure(err);
      if (!failure) throw err;
      log.warn({ status: failure.status, error: failure.body.error }, 'Chat run failed');
      return c.json(failure.body, failure.status);
    } finally {
      release();
    }
  });

  // POST /chat/stream — same turn, streamed as Server-Sent Events
  chat.post('/stream', async (c) => {
    const prepared = await prepareRun(c, deps);
    if (!prepared.ok) return prepared.response;

    const { request, agent, release } = prepared;
    const log = c.get('log');

    return streamSSE(c, async (stream) => {
      const controller = new AbortController();
      stream.onAbort(() => {
        log.info('Chat stream closed by client — cancelling run');
        controller.abort();
      });

      const write = (event: string, data: unknown) =>
        stream.writeSSE({ event, data: JSON.stringify(data) });

      try {
        const result = await deps.runner.run(agent, request.message, {
          signal: controller.signal,
          priorHistory: toPriorHistory(request.history, agent),
          onEvent: (event) => {
            void write(event.type, event).catch(() => {
              log.warn({ event: event.type }, 'SSE write failed');
            });
          },
        });
        await write('result', serializeResult(result));
      } catch (err) {
        const failure = describeRunFailure(err);
        if (failure) {
          log.warn({ error: failure.body.error }, 'Chat stream run failed');
          await write('error', failure.body);
        } else {
          log.error({ err }, 'Chat stream run crashed');
          await write('error', { error: { kind: 'internal', detail: 'Internal server error' }, message: CHAT_FALLBACK_MESSAGE });
        }
      } finally {
        release();
      }
    });
  });

  return chat;
}
