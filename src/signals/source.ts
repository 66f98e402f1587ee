import type { AdvisoryVote, MarketContext } from '../types/index.js';

/**
 * One independent advisor. `advise` resolves with a vote or rejects; the
 * aggregator turns rejections and overruns into abstentions.
 */
export interface AdvisorySource {
  readonly name: string;
  advise(context: MarketContext, options: { signal: AbortSignal }): Promise<AdvisoryVote>;
}
