import type { SwarmTraderConfig } from './core/config.js';
import { DecisionCycle } from './core/cycle.js';
import { Logger } from './core/logger.js';
import { HyperliquidClient } from './execution/hyperliquid/client.js';
import { PositionTracker } from './execution/positions.js';
import { OrderRouter } from './execution/router.js';
import type { VenueAdapter } from './execution/venue.js';
import { createVenues } from './execution/venues/index.js';
import { setDatabasePath } from './memory/db.js';
import { attachJournal } from './memory/journal.js';
import { loadRiskState } from './memory/risk_state.js';
import { RiskGate } from './risk/gate.js';
import { SignalAggregator } from './signals/aggregator.js';
import { ConsensusEngine } from './signals/consensus.js';
import { HyperliquidContextProvider, type MarketContextProvider } from './signals/context.js';
import { createAdvisorySources } from './signals/registry.js';
import type { AdvisorySource } from './signals/source.js';

export const VERSION = '0.1.0';

export * from './types/index.js';
export * from './core/errors.js';
export { loadConfig, parseConfig, type SwarmTraderConfig } from './core/config.js';
export { Logger, type LogLevel } from './core/logger.js';
export { DecisionCycle, type CycleOutcome, type CycleStatus } from './core/cycle.js';
export { SignalAggregator, type SignalRound } from './signals/aggregator.js';
export { ConsensusEngine } from './signals/consensus.js';
export type { AdvisorySource } from './signals/source.js';
export type { MarketContextProvider } from './signals/context.js';
export { RiskGate } from './risk/gate.js';
export { OrderRouter, splitNotional } from './execution/router.js';
export { PositionTracker } from './execution/positions.js';
export type { VenueAdapter, VenueCapabilities, OrderOptions } from './execution/venue.js';
export { PaperVenue, HyperliquidPerpVenue, createVenues } from './execution/venues/index.js';
export { ResilientVenueAdapter } from './execution/resilient.js';

export interface TradingCore {
  config: SwarmTraderConfig;
  logger: Logger;
  tracker: PositionTracker;
  venues: Map<string, VenueAdapter>;
  risk: RiskGate;
  router: OrderRouter;
  sources: AdvisorySource[];
  cycle: DecisionCycle;
  /** Stops journaling; null when persistence is off */
  detachJournal: (() => void) | null;
}

export interface TradingCoreOptions {
  logger?: Logger;
  venues?: Map<string, VenueAdapter>;
  sources?: AdvisorySource[];
  context?: MarketContextProvider;
  /** Journal to SQLite and restore the persisted risk state (default true) */
  persist?: boolean;
}

/**
 * Wires one process-wide core: a single PositionTracker and RiskGate shared
 * by every cycle. The risk gate starts from the default venue's account
 * snapshot, carrying over a persisted trip and loss window when present.
 */
export async function createTradingCore(
  config: SwarmTraderConfig,
  options: TradingCoreOptions = {}
): Promise<TradingCore> {
  const logger = options.logger ?? new Logger(config.logging.level);
  const persist = options.persist ?? true;
  let client: HyperliquidClient | undefined;
  const getClient = (): HyperliquidClient => {
    client ??= new HyperliquidClient(config);
    return client;
  };

  const venues =
    options.venues ??
    createVenues(config, { logger: logger.child('venue'), hyperliquidClient: getClient() });
  const defaultVenue = venues.get(config.execution.venue);
  if (!defaultVenue) {
    throw new Error(
      `Default venue "${config.execution.venue}" is not configured (available: ${[...venues.keys()].join(', ')})`
    );
  }

  const tracker = new PositionTracker();
  const account = await defaultVenue.getAccount();
  const risk = new RiskGate({
    limits: config.risk,
    exposure: tracker,
    initialBalanceUsd: account.balanceUsd,
    initialEquityUsd: account.equityUsd,
    logger: logger.child('risk'),
  });

  if (persist) {
    setDatabasePath(config.memory.dbPath);
  }
  if (persist && config.memory.persistRiskState) {
    const stored = loadRiskState();
    if (stored) {
      await risk.restore({ ...stored, balanceUsd: account.balanceUsd, equityUsd: account.equityUsd });
      if (stored.tripped) {
        logger.warn(`Circuit breaker still tripped from ${stored.trippedAt ?? 'a previous session'}`);
      }
    }
  }

  const router = new OrderRouter({
    sizing: config.sizing,
    venues,
    tracker,
    logger: logger.child('router'),
  });
  const sources = options.sources ?? createAdvisorySources(config);
  const cycle = new DecisionCycle({
    context: options.context ?? new HyperliquidContextProvider(getClient()),
    sources,
    aggregator: new SignalAggregator(config.signals, { logger: logger.child('signals') }),
    consensus: new ConsensusEngine(config.signals, { logger: logger.child('consensus') }),
    risk,
    router,
    tracker,
    defaultVenue: defaultVenue.id,
    logger: logger.child('cycle'),
  });

  const detachJournal = persist
    ? attachJournal({
        cycle,
        risk,
        persistRiskState: config.memory.persistRiskState,
        logger: logger.child('journal'),
      })
    : null;

  return { config, logger, tracker, venues, risk, router, sources, cycle, detachJournal };
}
