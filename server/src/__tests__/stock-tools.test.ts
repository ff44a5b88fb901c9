import { vi, describe, it, expect } from 'vitest';

vi.mock('../lib/logger.js', () => {
  const noopLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
  return { default: noopLogger };
});

import { createStockDataTool, formatQuote, STOCK_DATA_TOOL_NAME } from '../agents/stock/tools.js';
import { ToolError } from '../agents/runtime/errors.js';
import type { ToolContext } from '../agents/runtime/agent-protocol.js';
import type { QuoteSource, StockQuote } from '../lib/market-data.js';

const ctx: ToolContext = {
  runId: 'run-1',
  agent: 'Stock Agent',
  signal: new AbortController().signal,
};

function makeSource(impl: (symbol: string) => Promise<StockQuote | null>) {
  const getQuote = vi.fn(impl);
  const source: QuoteSource = { getQuote };
  return { source, getQuote };
}

describe('formatQuote', () => {
  it('includes every field the quote has', () => {
    expect(formatQuote('ACME', {
      symbol: 'ACME',
      name: 'Acme Corp',
      currentPrice: 110,
      dayLow: 101.5,
      dayHigh: 112.25,
      previousClose: 100,
      marketCap: 1234567890,
    })).toBe(
      "Stock: Acme Corp (ACME), Current Price: $110.00, Day's Range: $101.50 - $112.25, Change: $10.00 (10.00%), Market Cap: $1,234,567,890",
    );
  });

  it('falls back to the symbol when the quote has no name', () => {
    expect(formatQuote('ACME', { symbol: 'ACME', currentPrice: 5 })).toBe('Stock: ACME (ACME), Current Price: $5.00');
  });

  it('shows a negative change', () => {
    expect(formatQuote('ACME', { symbol: 'ACME', name: 'Acme Corp', currentPrice: 90, previousClose: 100 })).toBe(
      'Stock: Acme Corp (ACME), Current Price: $90.00, Change: $-10.00 (-10.00%)',
    );
  });

  it('leaves out the day range unless both ends are known', () => {
    expect(formatQuote('ACME', { symbol: 'ACME', currentPrice: 5, dayHigh: 6 })).toBe(
      'Stock: ACME (ACME), Current Price: $5.00',
    );
  });

  it('reports a zero percent change against a zero previous close', () => {
    expect(formatQuote('ACME', { symbol: 'ACME', currentPrice: 2, previousClose: 0 })).toBe(
      'Stock: ACME (ACME), Current Price: $2.00, Change: $2.00 (0.00%)',
    );
  });
});

describe('get_stock_data tool', () => {
  it('declares a single symbol parameter', () => {
    const tool = createStockDataTool(makeSource(async () => null).source);
    expect(tool.name).toBe(STOCK_DATA_TOOL_NAME);
    expect(Object.keys(tool.parameters)).toEqual(['symbol']);
  });

  it('looks the symbol up in upper case and formats the quote', async () => {
    const { source, getQuote } = makeSource(async (symbol) => ({
      symbol,
      name: 'Acme Corp',
      currentPrice: 42,
    }));
    const tool = createStockDataTool(source);

    const output = await tool.invoke({ symbol: ' acme ' }, ctx);

    expect(getQuote).toHaveBeenCalledWith('ACME', ctx.signal);
    expect(output).toBe('Stock: Acme Corp (acme), Current Price: $42.00');
  });

  it('answers plainly for an unknown symbol', async () => {
    const tool = createStockDataTool(makeSource(async () => null).source);

    await expect(tool.invoke({ symbol: 'ZZZZ' }, ctx)).resolves.toBe(
      'Could not find valid market data for symbol: ZZZZ.',
    );
  });

  it('treats a quote without a price as missing', async () => {
    const tool = createStockDataTool(makeSource(async (symbol) => ({ symbol, name: 'Halted Inc' })).source);

    await expect(tool.invoke({ symbol: 'HALT' }, ctx)).resolves.toBe(
      'Could not find valid market data for symbol: HALT.',
    );
  });

  it('raises a ToolError when the lookup fails', async () => {
    const tool = createStockDataTool(makeSource(async () => {
      throw new Error('connect ECONNREFUSED');
    }).source);

    const err = await tool.invoke({ symbol: 'ACME' }, ctx).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ToolError);
    expect(err).toHaveProperty(
      'message',
      'Error fetching data for ACME. Please ensure the symbol is correct and try again.',
    );
  });

  it('requires a non-blank symbol', async () => {
    const { source, getQuote } = makeSource(async () => null);
    const tool = createStockDataTool(source);

    await expect(tool.invoke({ symbol: '   ' }, ctx)).rejects.toThrow('A stock symbol is required.');
    expect(getQuote).not.toHaveBeenCalled();
  });
});
