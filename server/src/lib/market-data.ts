import { z } from 'zod';
import { getConfig } from './config.js';

/**
 * Market data snapshot for one ticker. Any field may be missing when the
 * upstream has no value for it.
 */
export interface StockQuote {
  symbol: string;
  name?: string;
  currentPrice?: number;
  dayHigh?: number;
  dayLow?: number;
  previousClose?: number;
  marketCap?: number;
}

export interface QuoteSource {
  /** Resolves to null when the symbol is unknown upstream. */
  getQuote(symbol: string, signal?: AbortSignal): Promise<StockQuote | null>;
}

const chartMetaSchema = z.object({
  symbol: z.string(),
  longName: z.string().nullish(),
  shortName: z.string().nullish(),
  regularMarketPrice: z.number().nullish(),
  regularMarketDayHigh: z.number().nullish(),
  regularMarketDayLow: z.number().nullish(),
  chartPreviousClose: z.number().nullish(),
});

const chartResponseSchema = z.object({
  chart: z.object({
    result: z.array(z.object({ meta: chartMetaSchema })).nullish(),
  }),
});

export class QuoteApiError extends Error {
  constructor(readonly status: number, symbol: string) {
    super(`Quote API error ${status} for ${symbol}`);
    this.name = 'QuoteApiError';
  }
}

interface HttpQuoteSourceConfig {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

/**
 * Quote source over a Yahoo-style `/v8/finance/chart/<SYMBOL>` endpoint,
 * reading the snapshot from the chart's `meta` block. The chart endpoint
 * carries no market cap, so that field stays unset.
 */
export class HttpQuoteSource implements QuoteSource {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: HttpQuoteSourceConfig = {}) {
    this.baseUrl = (config.baseUrl ?? getConfig().QUOTE_API_URL).replace(/\/+$/, '');
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async getQuote(symbol: string, signal?: AbortSignal): Promise<StockQuote | null> {
    const url = new URL(`${this.baseUrl}/${encodeURIComponent(symbol)}`);
    url.searchParams.set('range', '1d');
    url.searchParams.set('interval', '1d');

    const response = await this.fetchImpl(url, {
      headers: { Accept: 'application/json' },
      signal,
    });
    if (response.status === 404) return null;
    if (!response.ok) {
      throw new QuoteApiError(response.status, symbol);
    }

    const parsed = chartResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Quote API returned an unexpected body for ${symbol}`);
    }

    const meta = parsed.data.chart.result?.[0]?.meta;
    if (!meta || meta.symbol.toUpperCase() !== symbol.toUpperCase()) return null;

    return {
      symbol: meta.symbol,
      name: meta.longName ?? meta.shortName ?? undefined,
      currentPrice: meta.regularMarketPrice ?? undefined,
      dayHigh: meta.regularMarketDayHigh ?? undefined,
      dayLow: meta.regularMarketDayLow ?? undefined,
      previousClose: meta.chartPreviousClose ?? undefined,
    };
  }
}
