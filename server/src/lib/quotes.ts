import { z } from 'zod';
import type { QuoteLookupError, StockQuote } from '../agents/types.js';
import logger from './logger.js';

export interface QuoteService {
  lookup(symbol: string, signal?: AbortSignal): Promise<StockQuote | QuoteLookupError>;
}

export function isQuoteError(value: StockQuote | QuoteLookupError): value is QuoteLookupError {
  return 'error' in value;
}

const ChartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({
            symbol: z.string().optional(),
            currency: z.string().nullish(),
            longName: z.string().nullish(),
            shortName: z.string().nullish(),
            regularMarketPrice: z.number().nullish(),
            regularMarketDayHigh: z.number().nullish(),
            regularMarketDayLow: z.number().nullish(),
            regularMarketVolume: z.number().nullish(),
            chartPreviousClose: z.number().nullish(),
            previousClose: z.number().nullish(),
            fiftyTwoWeekHigh: z.number().nullish(),
            fiftyTwoWeekLow: z.number().nullish(),
          }),
          indicators: z
            .object({
              quote: z.array(z.object({ open: z.array(z.number().nullable()).optional() })).optional(),
            })
            .optional(),
        }),
      )
      .nullable(),
    error: z.object({ code: z.string().optional(), description: z.string().optional() }).nullable().optional(),
  }),
});

type ChartEntry = NonNullable<z.infer<typeof ChartSchema>['chart']['result']>[number];

function toQuote(symbol: string, entry: ChartEntry): StockQuote | null {
  const { meta } = entry;
  const open = entry.indicators?.quote?.[0]?.open?.find((v): v is number => typeof v === 'number') ?? null;
  const currentPrice = meta.regularMarketPrice ?? open;
  if (currentPrice === null) return null;

  return {
    symbol: meta.symbol ?? symbol,
    companyName: meta.longName ?? meta.shortName ?? 'N/A',
    currency: meta.currency ?? 'USD',
    currentPrice,
    dayHigh: meta.regularMarketDayHigh ?? null,
    dayLow: meta.regularMarketDayLow ?? null,
    previousClose: meta.previousClose ?? meta.chartPreviousClose ?? null,
    openPrice: open,
    volume: meta.regularMarketVolume ?? null,
    fiftyTwoWeekHigh: meta.fiftyTwoWeekHigh ?? null,
    fiftyTwoWeekLow: meta.fiftyTwoWeekLow ?? null,
  };
}

/** Yahoo Finance chart endpoint; needs no API key. */
export class YahooQuoteClient implements QuoteService {
  private readonly baseUrl: string;

  constructor(baseUrl = 'https://query1.finance.yahoo.com/v8/finance/chart') {
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  async lookup(rawSymbol: string, signal?: AbortSignal): Promise<StockQuote | QuoteLookupError> {
    const symbol = rawSymbol.trim().toUpperCase();
    const fail = (reason: string): QuoteLookupError => ({
      error: `Failed to fetch data for ${symbol}: ${reason}`,
      symbol,
    });

    try {
      const response = await fetch(`${this.baseUrl}/${encodeURIComponent(symbol)}?interval=1d&range=1d`, {
        signal,
        headers: { Accept: 'application/json' },
      });
      if (!response.ok) {
        return fail(`HTTP ${response.status}`);
      }

      const parsed = ChartSchema.safeParse(await response.json());
      if (!parsed.success) return fail('unexpected response shape');

      const { result, error } = parsed.data.chart;
      if (error?.description) return fail(error.description);
      const first = result?.[0];
      const quote = first ? toQuote(symbol, first) : null;
      return quote ?? fail('no price data');
    } catch (err) {
      if (signal?.aborted) throw err;
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ symbol, error: message }, 'Quote lookup failed');
      return fail(message);
    }
  }
}
