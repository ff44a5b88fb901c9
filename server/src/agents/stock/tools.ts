/**
 * Stock Agent — Tools
 *
 * get_stock_data — current price, day's range, change and market cap for
 * one ticker, formatted as a single line the agent can quote back.
 */

import { defineTool } from '../runtime/tool-registry.js';
import { ToolError } from '../runtime/errors.js';
import type { Tool } from '../runtime/agent-protocol.js';
import type { QuoteSource, StockQuote } from '../../lib/market-data.js';
import logger from '../../lib/logger.js';

export const STOCK_DATA_TOOL_NAME = 'get_stock_data';

function money(value: number): string {
  return `$${value.toFixed(2)}`;
}

/**
 * `Stock: Name (SYM), Current Price: $1.00, Day's Range: ..., Change: ..., Market Cap: ...`
 * Optional parts are left out when the quote lacks them.
 */
export function formatQuote(symbol: string, quote: StockQuote & { currentPrice: number }): string {
  const name = quote.name ?? symbol;
  const parts = [`Stock: ${name} (${symbol})`, `Current Price: ${money(quote.currentPrice)}`];

  if (quote.dayHigh !== undefined && quote.dayLow !== undefined) {
    parts.push(`Day's Range: ${money(quote.dayLow)} - ${money(quote.dayHigh)}`);
  }

  if (quote.previousClose !== undefined) {
    const change = quote.currentPrice - quote.previousClose;
    const percent = quote.previousClose !== 0 ? (change / quote.previousClose) * 100 : 0;
    parts.push(`Change: ${money(change)} (${percent.toFixed(2)}%)`);
  }

  if (quote.marketCap) {
    parts.push(`Market Cap: $${quote.marketCap.toLocaleString('en-US')}`);
  }

  return parts.join(', ');
}

export function createStockDataTool(source: QuoteSource): Tool {
  return defineTool({
    name: STOCK_DATA_TOOL_NAME,
    description:
      'Fetch key stock data for a ticker symbol: name, current price, day\'s high/low, change since previous close, and market cap.',
    parameters: {
      symbol: { type: 'string', description: 'Ticker symbol, e.g. MSFT' },
    },
    async invoke(args, ctx) {
      const symbol = String(args.symbol ?? '').trim();
      if (!symbol) {
        throw new ToolError('A stock symbol is required.');
      }

      let quote: StockQuote | null;
      try {
        quote = await source.getQuote(symbol.toUpperCase(), ctx.signal);
      } catch (err) {
        logger.error({ err, symbol, runId: ctx.runId }, 'get_stock_data lookup failed');
        throw new ToolError(
          `Error fetching data for ${symbol}. Please ensure the symbol is correct and try again.`,
          { cause: err },
        );
      }

      if (!quote || quote.currentPrice === undefined) {
        return `Could not find valid market data for symbol: ${symbol}.`;
      }
      return formatQuote(symbol, { ...quote, currentPrice: quote.currentPrice });
    },
  });
}
