import { describe, it, expect, vi } from 'vitest';
import { ToolRegistry, defineTool } from '../agents/runtime/tool-registry.js';
import { ConfigurationError } from '../agents/runtime/errors.js';
import type { Tool } from '../agents/runtime/agent-protocol.js';

function makeTool(overrides: Partial<Tool> = {}): Tool {
  return defineTool({
    name: 'get_price',
    description: 'Look up the latest price for a ticker',
    parameters: { symbol: 'string' },
    invoke: vi.fn(async () => 'ok'),
    ...overrides,
  });
}

describe('ToolRegistry', () => {
  it('looks tools up by name and keeps declaration order', () => {
    const price = makeTool();
    const news = makeTool({ name: 'get_news', description: 'Latest headlines' });
    const registry = new ToolRegistry([price, news]);

    expect(registry.get('get_price')).toBe(price);
    expect(registry.has('get_news')).toBe(true);
    expect(registry.has('get_weather')).toBe(false);
    expect(registry.get('get_weather')).toBeUndefined();
    expect(registry.list().map(t => t.name)).toEqual(['get_price', 'get_news']);
    expect(registry.size).toBe(2);
  });

  it('describes a tool with a JSON Schema of its parameters', () => {
    const registry = new ToolRegistry([
      makeTool({
        name: 'search',
        description: 'Search filings',
        parameters: {
          query: { type: 'string', description: 'Free text' },
          limit: { type: 'number', optional: true },
          exact: 'boolean',
        },
      }),
    ]);

    expect(registry.describe('search')).toEqual({
      name: 'search',
      description: 'Search filings',
      parameters: {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'Free text' },
          limit: { type: 'number' },
          exact: { type: 'boolean' },
        },
        required: ['query', 'exact'],
        additionalProperties: false,
      },
    });
    expect(registry.describe('missing')).toBeUndefined();
  });

  it('rejects duplicate tool names', () => {
    expect(() => new ToolRegistry([makeTool(), makeTool()])).toThrow(
      'Invalid tool configuration: duplicate tool name "get_price"',
    );
  });

  it('reports every invalid definition at once', () => {
    let caught: unknown;
    try {
      new ToolRegistry([
        makeTool({ name: 'has spaces' }),
        makeTool({ name: 'blank_description', description: '   ' }),
      ]);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.issues).toEqual([
      'tool has spaces: name: must be 1-64 letters, digits, "_" or "-"',
      'tool blank_description: description: description is required',
    ]);
  });
});

describe('ToolRegistry.checkArguments', () => {
  const registry = new ToolRegistry([
    makeTool(),
    makeTool({
      name: 'list_prices',
      description: 'Recent closing prices',
      parameters: { symbol: 'string', days: { type: 'number', optional: true } },
    }),
  ]);

  it('accepts well-typed arguments', () => {
    expect(registry.checkArguments('get_price', { symbol: 'ACME' })).toEqual({
      ok: true,
      args: { symbol: 'ACME' },
    });
  });

  it('allows optional fields to be omitted', () => {
    expect(registry.checkArguments('list_prices', { symbol: 'ACME' })).toEqual({
      ok: true,
      args: { symbol: 'ACME' },
    });
    expect(registry.checkArguments('list_prices', { symbol: 'ACME', days: 5 })).toEqual({
      ok: true,
      args: { symbol: 'ACME', days: 5 },
    });
  });

  it('rejects a wrong primitive type', () => {
    expect(registry.checkArguments('get_price', { symbol: 42 })).toEqual({
      ok: false,
      message: 'Invalid arguments for get_price: symbol: Expected string, received number',
    });
  });

  it('rejects a missing required field', () => {
    expect(registry.checkArguments('get_price', {})).toEqual({
      ok: false,
      message: 'Invalid arguments for get_price: symbol: Required',
    });
  });

  it('rejects fields the tool does not declare', () => {
    const check = registry.checkArguments('get_price', { symbol: 'ACME', exchange: 'NYSE' });
    expect(check.ok).toBe(false);
  });

  it('rejects non-finite numbers', () => {
    const check = registry.checkArguments('list_prices', { symbol: 'ACME', days: Number.POSITIVE_INFINITY });
    expect(check.ok).toBe(false);
  });

  it('reports an unknown tool', () => {
    expect(registry.checkArguments('get_weather', {})).toEqual({
      ok: false,
      message: 'Unknown tool: get_weather',
    });
  });
});

describe('defineTool', () => {
  it('returns a frozen definition with frozen parameters', () => {
    const tool = makeTool();
    expect(Object.isFrozen(tool)).toBe(true);
    expect(Object.isFrozen(tool.parameters)).toBe(true);
  });
});
