import { isQuoteError } from '../../lib/quotes.js';
import type { StageInvocation } from '../stage-executor.js';
import type { StageDeps } from './shared.js';

/** Market data for the request's ticker. A lookup error fails the stage. */
export function quoteStage(deps: StageDeps, ticker: string, timeoutMs: number): StageInvocation {
  return {
    kind: 'quote',
    timeoutMs,
    run: async (signal) => {
      const result = await deps.quotes.lookup(ticker, signal);
      if (isQuoteError(result)) {
        throw new Error(result.error);
      }
      return result;
    },
  };
}
