import type { Context } from 'hono';

export function rejectOversizedJsonBody(c: Context, maxBytes: number): Response | null {
  const contentLength = c.req.header('content-length');
  if (!contentLength) return null;
  const parsed = Number.parseInt(contentLength, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return null;
  if (parsed <= maxBytes) return null;
  return c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413);
}

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

/**
 * Read and parse a JSON body, enforcing `maxBytes` on the decoded text as
 * well as on Content-Length (which a client may omit).
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const oversized = rejectOversizedJsonBody(c, maxBytes);
  if (oversized) return { ok: false, response: oversized };

  let raw: string;
  try {
    raw = await c.req.text();
  } catch {
    return { ok: false, response: c.json({ error: 'Failed to read request body' }, 400) };
  }

  if (Buffer.byteLength(raw, 'utf8') > maxBytes) {
    return { ok: false, response: c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413) };
  }
  if (!raw.trim()) {
    return { ok: false, response: c.json({ error: 'Request body is required' }, 400) };
  }

  try {
    const data: unknown = JSON.parse(raw);
    return { ok: true, data };
  } catch {
    return { ok: false, response: c.json({ error: 'Invalid JSON body' }, 400) };
  }
}
