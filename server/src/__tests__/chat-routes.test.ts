/**
 * Chat HTTP surface — status mapping, limits and streaming
 *
 * Requests go through `app.request()` against a Runner wired to a scripted
 * gateway, so no model or network is involved.
 */

import { vi, describe, it, expect } from 'vitest';

vi.mock('../lib/logger.js', () => {
  const noopLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
  return { default: noopLogger, createRunLogger: vi.fn(() => noopLogger) };
});

import { createApp } from '../app.js';
import { CHAT_FALLBACK_MESSAGE } from '../routes/chat.js';
import { Runner } from '../agents/runtime/runner.js';
import { RunLimiter } from '../lib/run-limiter.js';
import type { Decision } from '../agents/runtime/agent-protocol.js';
import {
  ScriptedGateway,
  buildDemoGraph,
  callTool,
  final,
  handoff,
  type ScriptStep,
  STOCK,
  TRIAGE,
} from './fixtures/runtime.js';

interface SetupOptions {
  maxConcurrent?: number;
  timeoutMs?: number;
  shuttingDown?: boolean;
}

function setup(script: ScriptStep[], options: SetupOptions = {}) {
  const gateway = new ScriptedGateway(script);
  const runner = new Runner({ graph: buildDemoGraph(), gateway, timeoutMs: options.timeoutMs });
  const limiter = new RunLimiter(options.maxConcurrent ?? 4);
  const app = createApp({
    runner,
    limiter,
    startAgent: TRIAGE,
    allowedOrigins: ['http://localhost:5173'],
    isProviderReady: () => true,
    isShuttingDown: () => options.shuttingDown ?? false,
  });
  return { app, gateway, limiter };
}

function postJson(app: ReturnType<typeof createApp>, path: string, body: unknown, headers: Record<string, string> = {}) {
  return app.request(`http://test${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

function parseSse(text: string): Array<{ event: string; data: unknown }> {
  return text
    .split('\n\n')
    .filter(block => block.trim().length > 0)
    .map((block) => {
      let event = 'message';
      let data = '';
      for (const line of block.split('\n')) {
        if (line.startsWith('event: ')) event = line.slice('event: '.length);
        else if (line.startsWith('data: ')) data += line.slice('data: '.length);
      }
      const parsed: unknown = JSON.parse(data);
      return { event, data: parsed };
    });
}

const workedExample = (): Decision[] => [
  handoff(STOCK),
  callTool('get_price', { symbol: 'ACME' }),
  final('ACME is 123.45'),
];

describe('POST /api/chat', () => {
  it('returns the final answer, active agent and history', async () => {
    const { app, limiter } = setup(workedExample());

    const res = await postJson(app, '/api/chat', { message: 'What is ACME trading at?' });

    expect(res.status).toBe(200);
    const body = await res.json() as {
      run_id: string;
      agent: string;
      output: string;
      steps: number;
      history: Array<{ role: string }>;
    };
    expect(body.agent).toBe(STOCK);
    expect(body.output).toBe('ACME is 123.45');
    expect(body.steps).toBe(3);
    expect(body.history.map(e => e.role)).toEqual(['user', 'handoff', 'tool_call', 'tool_result', 'assistant']);
    expect(typeof body.run_id).toBe('string');
    expect(limiter.stats().active).toBe(0);
  });

  it('echoes a caller-supplied request id', async () => {
    const { app } = setup([final('hi')]);

    const res = await postJson(app, '/api/chat', { message: 'hello' }, { 'X-Request-ID': 'req-123_ABC' });

    expect(res.headers.get('X-Request-ID')).toBe('req-123_ABC');
  });

  it('starts from the requested agent', async () => {
    const { app, gateway } = setup([final('hola')]);

    const res = await postJson(app, '/api/chat', { message: 'hello', agent: 'Spanish Agent' });

    expect(res.status).toBe(200);
    expect(gateway.requests[0].agent).toBe('Spanish Agent');
  });

  it('feeds caller history to the run ahead of the new message', async () => {
    const { app, gateway } = setup([final('ok')]);

    const res = await postJson(app, '/api/chat', {
      message: 'and now?',
      history: [
        { role: 'user', content: 'earlier question' },
        { role: 'assistant', content: 'earlier answer' },
      ],
    });

    expect(res.status).toBe(200);
    expect(gateway.requests[0].history.map(e => `${e.role}:${e.content}`)).toEqual([
      'user:earlier question',
      'assistant:earlier answer',
      'user:and now?',
    ]);
  });

  it('rejects an empty message', async () => {
    const { app, gateway } = setup([]);

    const res = await postJson(app, '/api/chat', { message: '   ' });

    expect(res.status).toBe(400);
    const body = await res.json() as { error: string; details: string[] };
    expect(body.error).toBe('Invalid request');
    expect(body.details).toEqual(['message: message is required']);
    expect(gateway.calls).toBe(0);
  });

  it('rejects a body that is not JSON', async () => {
    const { app } = setup([]);

    const res = await postJson(app, '/api/chat', 'not json');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid JSON body' });
  });

  it('returns 404 for an unknown start agent', async () => {
    const { app } = setup([]);

    const res = await postJson(app, '/api/chat', { message: 'hi', agent: 'Ghost Agent' });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Unknown agent: Ghost Agent' });
  });

  it('returns 503 when every run slot is taken', async () => {
    const { app, limiter, gateway } = setup([final('unused')], { maxConcurrent: 1 });
    const release = limiter.tryAcquire();

    const res = await postJson(app, '/api/chat', { message: 'hi' });

    expect(res.status).toBe(503);
    expect(gateway.calls).toBe(0);
    release?.();
  });

  it('maps a failed run to 422 with its kind', async () => {
    const { app, limiter } = setup([callTool('get_price', { symbol: 'ACME' })]);

    const res = await postJson(app, '/api/chat', { message: 'price?' });

    expect(res.status).toBe(422);
    const body = await res.json() as { error: unknown; message: string; run_id: string };
    expect(body.error).toEqual({
      kind: 'invalid_decision_reference',
      detail: 'Tool "get_price" is not available to agent "Triage Agent"',
    });
    expect(body.message).toBe(CHAT_FALLBACK_MESSAGE);
    expect(limiter.stats().active).toBe(0);
  });

  it('maps a run deadline to 504', async () => {
    const waitForAbort = (_request: unknown, signal: AbortSignal) =>
      new Promise<Decision>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      });
    const { app } = setup([waitForAbort], { timeoutMs: 20 });

    const res = await postJson(app, '/api/chat', { message: 'hi' });

    expect(res.status).toBe(504);
    const body = await res.json() as { error: unknown };
    expect(body.error).toEqual({ kind: 'cancelled', reason: 'timeout' });
  });
});

describe('POST /api/chat/stream', () => {
  it('streams run events and then the result', async () => {
    const { app } = setup(workedExample());

    const res = await postJson(app, '/api/chat/stream', { message: 'What is ACME trading at?' });

    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toContain('text/event-stream');
    const events = parseSse(await res.text());
    const names = events.map(e => e.event);
    expect(names.filter(n => n === 'step_started')).toHaveLength(3);
    expect(names).toContain('handoff');
    expect(names).toContain('tool_finished');
    expect(names[names.length - 1]).toBe('result');
    expect(events[events.length - 1].data).toMatchObject({ agent: STOCK, output: 'ACME is 123.45', steps: 3 });
  });

  it('ends with an error event when the run fails', async () => {
    const { app } = setup([handoff('Nobody')]);

    const res = await postJson(app, '/api/chat/stream', { message: 'hi' });

    const events = parseSse(await res.text());
    const last = events[events.length - 1];
    expect(last.event).toBe('error');
    expect(last.data).toMatchObject({
      error: { kind: 'invalid_decision_reference' },
      message: CHAT_FALLBACK_MESSAGE,
    });
  });

  it('validates the body before opening the stream', async () => {
    const { app } = setup([]);

    const res = await postJson(app, '/api/chat/stream', { message: '' });

    expect(res.status).toBe(400);
  });
});

describe('health and fallbacks', () => {
  it('reports readiness, capacity and agents', async () => {
    const { app } = setup([]);

    const res = await app.request('http://test/health');

    expect(res.status).toBe(200);
    expect(res.headers.get('Cache-Control')).toBe('no-store');
    const body = await res.json() as Record<string, unknown>;
    expect(body).toMatchObject({
      status: 'ok',
      provider_ready: true,
      active_runs: 0,
      max_concurrent_runs: 4,
      agents: [TRIAGE, STOCK, 'Spanish Agent'],
    });
  });

  it('refuses new chats while shutting down but still answers health', async () => {
    const { app } = setup([final('unused')], { shuttingDown: true });

    const chat = await postJson(app, '/api/chat', { message: 'hi' });
    const health = await app.request('http://test/health');

    expect(chat.status).toBe(503);
    expect(health.status).toBe(200);
    expect(await health.json()).toMatchObject({ status: 'draining' });
  });

  it('returns JSON 404 for unknown routes', async () => {
    const { app } = setup([]);

    const res = await app.request('http://test/api/nothing-here');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});
