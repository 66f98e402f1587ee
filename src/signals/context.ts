import { z } from 'zod';

import type { MarketContext } from '../types/index.js';
import type { HyperliquidClient } from '../execution/hyperliquid/client.js';
import { normalizeToken } from '../execution/venue.js';

export interface MarketContextProvider {
  getContext(token: string): Promise<MarketContext>;
}

const optionalNumber = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value) => {
    if (value == null) return null;
    const num = Number(value);
    return Number.isFinite(num) ? num : null;
  });

const AssetCtxSchema = z.object({
  funding: optionalNumber,
  openInterest: optionalNumber,
  dayNtlVlm: optionalNumber,
  markPx: optionalNumber,
  midPx: optionalNumber,
  prevDayPx: optionalNumber,
});

const MetaAndAssetCtxsSchema = z.tuple([
  z.object({ universe: z.array(z.object({ name: z.string() })) }),
  z.array(AssetCtxSchema),
]);

/**
 * Market snapshot from Hyperliquid perp asset contexts: mid, funding,
 * open interest, 24h notional volume and 24h change.
 */
export class HyperliquidContextProvider implements MarketContextProvider {
  constructor(
    private client: Pick<HyperliquidClient, 'getMetaAndAssetCtxs'>,
    private now: () => Date = () => new Date()
  ) {}

  async getContext(token: string): Promise<MarketContext> {
    const symbol = normalizeToken(token);
    const [meta, ctxs] = MetaAndAssetCtxsSchema.parse(await this.client.getMetaAndAssetCtxs());
    const index = meta.universe.findIndex((asset) => asset.name === symbol);
    const ctx = index >= 0 ? ctxs[index] : undefined;
    if (!ctx) {
      return { token: symbol, asOf: this.now().toISOString(), price: null, data: {} };
    }

    const price = ctx.midPx ?? ctx.markPx;
    const data: Record<string, unknown> = {
      markPrice: ctx.markPx,
      fundingRate: ctx.funding,
      openInterest: ctx.openInterest,
      volume24hUsd: ctx.dayNtlVlm,
    };
    if (price != null && ctx.prevDayPx) {
      data.change24hPct = Number((((price - ctx.prevDayPx) / ctx.prevDayPx) * 100).toFixed(3));
    }
    return { token: symbol, asOf: this.now().toISOString(), price, data };
  }
}
