import type { SwarmTraderConfig } from '../../core/config.js';
import { Logger } from '../../core/logger.js';
import { HyperliquidClient } from '../hyperliquid/client.js';
import { ResilientVenueAdapter } from '../resilient.js';
import type { VenueAdapter } from '../venue.js';
import { HyperliquidPerpVenue } from './hyperliquid-perp.js';
import { PaperVenue, type PriceFeed } from './paper.js';

export { PaperVenue, type PaperVenueOptions, type PriceFeed } from './paper.js';
export { HyperliquidPerpVenue, type HyperliquidPerpVenueOptions } from './hyperliquid-perp.js';

export const HYPERLIQUID_VENUE_ID = 'hyperliquid';

/** Paper venues mark against Hyperliquid mids unless a feed is supplied. */
export function hyperliquidPriceFeed(client: HyperliquidClient): PriceFeed {
  return async (token) => {
    const mids = await client.getAllMids();
    return mids[token] ?? null;
  };
}

/**
 * Builds every configured venue, each wrapped with call timeouts and retry.
 * Paper venues are always present; the Hyperliquid perp venue only in live
 * mode with Hyperliquid enabled.
 */
export function createVenues(
  config: SwarmTraderConfig,
  options: { logger?: Logger; priceFeed?: PriceFeed; hyperliquidClient?: HyperliquidClient } = {}
): Map<string, VenueAdapter> {
  const logger = options.logger ?? new Logger(config.logging.level);
  let client = options.hyperliquidClient;
  const getClient = (): HyperliquidClient => {
    client ??= new HyperliquidClient(config);
    return client;
  };
  const priceFeed = options.priceFeed ?? hyperliquidPriceFeed(getClient());

  const raw: VenueAdapter[] = config.venues.paper.map(
    (venue) =>
      new PaperVenue({
        id: venue.id,
        kind: venue.kind,
        priceFeed,
        initialCashUsd: venue.initialCashUsd,
        slippageBps: venue.slippageBps,
        maxFillNotionalUsd: venue.maxFillNotionalUsd,
        leverage: venue.leverage,
      })
  );

  if (config.execution.mode === 'live' && config.hyperliquid.enabled) {
    raw.push(
      new HyperliquidPerpVenue({
        id: HYPERLIQUID_VENUE_ID,
        config,
        client: getClient(),
        logger: logger.child(HYPERLIQUID_VENUE_ID),
      })
    );
  }

  const venues = new Map<string, VenueAdapter>();
  for (const venue of raw) {
    if (venues.has(venue.id)) {
      throw new Error(`Duplicate venue id: ${venue.id}`);
    }
    venues.set(
      venue.id,
      new ResilientVenueAdapter(venue, {
        callTimeoutMs: config.execution.callTimeoutMs,
        retry: config.execution.retry,
        logger: logger.child(venue.id),
      })
    );
  }
  return venues;
}
