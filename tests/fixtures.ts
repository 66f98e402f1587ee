import { parseConfig, type SwarmTraderConfig } from '../src/core/config.js';
import { Logger } from '../src/core/logger.js';
import type {
  AccountSnapshot,
  AdvisoryVote,
  ConsensusDecision,
  FillResult,
  MarketContext,
  Position,
  RiskApproval,
  Signal,
  SignalAction,
} from '../src/types/index.js';
import type { AdvisorySource } from '../src/signals/source.js';
import {
  derivativeCapabilities,
  flatPosition,
  normalizeToken,
  type OrderOptions,
  type VenueAdapter,
  type VenueCapabilities,
} from '../src/execution/venue.js';

/** Silent logger for tests. */
export const quietLogger = new Logger('error');

export function testConfig(raw: Record<string, unknown> = {}): SwarmTraderConfig {
  return parseConfig(raw);
}

export function signal(source: string, action: SignalAction, confidence = 70): Signal {
  return { source, action, confidence, rationale: `${source} says ${action}`, latencyMs: 5 };
}

export function decision(action: SignalAction, token = 'BTC'): ConsensusDecision {
  return {
    token,
    action,
    agreementRatio: 1,
    confidence: 80,
    dissentingCount: 0,
    responderCount: 1,
    abstainCount: 0,
    tally: { BUY: action === 'BUY' ? 1 : 0, SELL: action === 'SELL' ? 1 : 0, HOLD: action === 'HOLD' ? 1 : 0 },
    plurality: action,
    downgrade: null,
    signals: [signal('s1', action, 80)],
    timestamp: '2026-01-01T00:00:00.000Z',
  };
}

export function approval(approvedNotionalUsd: number, token = 'BTC', reduceOnly = false): RiskApproval {
  return {
    approved: true,
    token,
    requestedNotionalUsd: approvedNotionalUsd,
    approvedNotionalUsd,
    clampedBy: [],
    reduceOnly,
    reservationId: 'reservation-1',
  };
}

export function position(
  side: Position['side'],
  notionalUsd: number,
  overrides: Partial<Position> = {}
): Position {
  const entryPrice = overrides.entryPrice ?? 100;
  return {
    venue: 'test-perp',
    token: 'BTC',
    side,
    size: side === 'FLAT' ? 0 : notionalUsd / entryPrice,
    notionalUsd,
    entryPrice,
    ...overrides,
  };
}

export function context(token = 'BTC', price: number | null = 100): MarketContext {
  return { token, asOf: '2026-01-01T00:00:00.000Z', price, data: {} };
}

export function fixedSource(name: string, vote: AdvisoryVote | Error): AdvisorySource {
  return {
    name,
    async advise() {
      if (vote instanceof Error) throw vote;
      return vote;
    },
  };
}

/** Source that only settles by rejecting once its abort signal fires. */
export function hangingSource(name: string, seen: AbortSignal[] = []): AdvisorySource {
  return {
    name,
    advise(_context, { signal }) {
      seen.push(signal);
      return new Promise((_, reject) => {
        signal.addEventListener('abort', () => reject(new Error(`${name} aborted`)), { once: true });
      });
    },
  };
}

export type VenueCall = {
  operation: 'marketBuy' | 'marketSell' | 'closePosition';
  token: string;
  notionalUsd: number | null;
  options?: OrderOptions;
};

/**
 * Scripted venue: fills every order at `price` unless `failOn` returns an
 * error for the call index.
 */
export class ScriptedVenue implements VenueAdapter {
  readonly calls: VenueCall[] = [];
  readonly capabilities: VenueCapabilities;
  positions = new Map<string, Position>();
  account: AccountSnapshot;

  constructor(
    readonly id = 'test-perp',
    private opts: {
      price?: number;
      capabilities?: VenueCapabilities;
      failOn?: (index: number, call: VenueCall) => Error | null;
      onCall?: (index: number, call: VenueCall) => void;
    } = {}
  ) {
    this.capabilities = opts.capabilities ?? derivativeCapabilities('perp', 5);
    this.account = { venue: id, balanceUsd: 1000, equityUsd: 1000 };
  }

  async getPosition(token: string): Promise<Position> {
    return this.positions.get(normalizeToken(token)) ?? flatPosition(this.id, normalizeToken(token));
  }

  async getAccount(): Promise<AccountSnapshot> {
    return this.account;
  }

  marketBuy(token: string, notionalUsd: number, options?: OrderOptions): Promise<FillResult> {
    return this.order({ operation: 'marketBuy', token, notionalUsd, options }, 'buy');
  }

  marketSell(token: string, notionalUsd: number, options?: OrderOptions): Promise<FillResult> {
    return this.order({ operation: 'marketSell', token, notionalUsd, options }, 'sell');
  }

  async closePosition(token: string, options?: OrderOptions): Promise<FillResult> {
    const held = await this.getPosition(token);
    const side = held.side === 'SHORT' ? 'buy' : 'sell';
    return this.order({ operation: 'closePosition', token, notionalUsd: null, options }, side, held.size);
  }

  private async order(call: VenueCall, side: 'buy' | 'sell', size?: number): Promise<FillResult> {
    const index = this.calls.length;
    this.calls.push(call);
    this.opts.onCall?.(index, call);
    const failure = this.opts.failOn?.(index, call) ?? null;
    if (failure) throw failure;
    const price = this.opts.price ?? 100;
    const filledSize = size ?? (call.notionalUsd ?? 0) / price;
    return {
      venue: this.id,
      token: normalizeToken(call.token),
      side,
      avgPrice: price,
      filledNotionalUsd: filledSize * price,
      filledSize,
      orderId: `order-${index}`,
      reduceOnly: call.options?.reduceOnly ?? call.operation === 'closePosition',
      timestamp: '2026-01-01T00:00:00.000Z',
    };
  }
}
