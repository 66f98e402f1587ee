import { z } from 'zod';

import type { SwarmTraderConfig } from '../../core/config.js';
import type { AccountSnapshot, FillResult, OrderSide, Position } from '../../types/index.js';
import {
  InsufficientLiquidityError,
  RejectedByVenueError,
  VenueUnavailableError,
  describeCause,
  isTradingCoreError,
  type VenueOperation,
} from '../../core/errors.js';
import { Logger } from '../../core/logger.js';
import { HyperliquidClient, type HyperliquidMarket } from '../hyperliquid/client.js';
import { toHyperliquidCloid } from '../hyperliquid/cloid.js';
import {
  derivativeCapabilities,
  flatPosition,
  normalizeToken,
  type OrderOptions,
  type VenueAdapter,
  type VenueCapabilities,
} from '../venue.js';

const numeric = z.union([z.string(), z.number()]).transform((value) => Number(value));

const OrderStatusSchema = z.union([
  z.object({ filled: z.object({ totalSz: numeric, avgPx: numeric, oid: z.number() }) }),
  z.object({ resting: z.object({ oid: z.number() }) }),
  z.object({ error: z.string() }),
  z.string(),
]);

const OrderResponseSchema = z.object({
  response: z.object({
    data: z.object({ statuses: z.array(OrderStatusSchema) }),
  }),
});

type OrderPayload = Parameters<ReturnType<HyperliquidClient['getExchangeClient']>['order']>[0];

export interface HyperliquidPerpVenueOptions {
  id?: string;
  config: SwarmTraderConfig;
  client?: HyperliquidClient;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Live Hyperliquid perpetuals. Market orders are sent as IOC limits priced
 * off the mid with a slippage allowance; a fill is only reported once the
 * exchange confirms it.
 */
export class HyperliquidPerpVenue implements VenueAdapter {
  readonly id: string;
  readonly capabilities: VenueCapabilities;
  private client: HyperliquidClient;
  private logger: Logger;
  private slippageBps: number;
  private leverageApplied = new Set<number>();

  constructor(private options: HyperliquidPerpVenueOptions) {
    this.id = options.id ?? 'hyperliquid';
    this.client = options.client ?? new HyperliquidClient(options.config);
    this.logger = options.logger ?? new Logger('info');
    this.slippageBps = options.config.hyperliquid.defaultSlippageBps;
    this.capabilities = derivativeCapabilities('perp', options.config.hyperliquid.maxLeverage);
  }

  async getPosition(token: string): Promise<Position> {
    const symbol = normalizeToken(token);
    const state = await this.guard('getPosition', () => this.client.getClearinghouseState());
    const entry = state.assetPositions.find((item) => item.position.coin === symbol);
    const signedSize = entry?.position.szi ?? 0;
    if (!entry || !Number.isFinite(signedSize) || signedSize === 0) {
      return flatPosition(this.id, symbol);
    }
    const size = Math.abs(signedSize);
    const entryPrice = entry.position.entryPx ?? 0;
    return {
      venue: this.id,
      token: symbol,
      side: signedSize > 0 ? 'LONG' : 'SHORT',
      size,
      notionalUsd: entry.position.positionValue ?? size * entryPrice,
      entryPrice,
    };
  }

  async getAccount(): Promise<AccountSnapshot> {
    const state = await this.guard('getAccount', () => this.client.getClearinghouseState());
    return {
      venue: this.id,
      balanceUsd: state.withdrawable,
      equityUsd: state.marginSummary.accountValue,
    };
  }

  async marketBuy(token: string, notionalUsd: number, options?: OrderOptions): Promise<FillResult> {
    return this.placeNotional('marketBuy', token, 'buy', notionalUsd, options);
  }

  async marketSell(token: string, notionalUsd: number, options?: OrderOptions): Promise<FillResult> {
    return this.placeNotional('marketSell', token, 'sell', notionalUsd, options);
  }

  async closePosition(token: string, options?: OrderOptions): Promise<FillResult> {
    const position = await this.getPosition(token);
    if (position.side === 'FLAT') {
      throw new RejectedByVenueError(this.id, 'closePosition', `no open ${position.token} position`);
    }
    const side: OrderSide = position.side === 'LONG' ? 'sell' : 'buy';
    const market = await this.requireMarket('closePosition', position.token);
    const price = await this.slippedPrice('closePosition', position.token, side);
    return this.place('closePosition', market, side, position.size, price, true, options);
  }

  private async placeNotional(
    operation: VenueOperation,
    token: string,
    side: OrderSide,
    notionalUsd: number,
    options?: OrderOptions
  ): Promise<FillResult> {
    const symbol = normalizeToken(token);
    if (!Number.isFinite(notionalUsd) || notionalUsd <= 0) {
      throw new RejectedByVenueError(this.id, operation, `invalid notional ${notionalUsd}`);
    }
    const market = await this.requireMarket(operation, symbol);
    const price = await this.slippedPrice(operation, symbol, side);
    const reduceOnly = options?.reduceOnly ?? false;
    if (!reduceOnly) {
      await this.applyLeverage(operation, market);
    }
    return this.place(operation, market, side, notionalUsd / price, price, reduceOnly, options);
  }

  private async place(
    operation: VenueOperation,
    market: HyperliquidMarket,
    side: OrderSide,
    size: number,
    price: number,
    reduceOnly: boolean,
    options?: OrderOptions
  ): Promise<FillResult> {
    const sizeStr = formatDecimal(size, market.szDecimals);
    if (!Number.isFinite(Number(sizeStr)) || Number(sizeStr) <= 0) {
      throw new RejectedByVenueError(this.id, operation, `order size for ${market.symbol} rounds to zero`);
    }
    const payload: OrderPayload = {
      orders: [
        {
          a: market.assetId,
          b: side === 'buy',
          p: formatPrice(price, market.szDecimals),
          s: sizeStr,
          r: reduceOnly,
          t: { limit: { tif: 'Ioc' } },
          c: toHyperliquidCloid(options?.clientOrderId),
        },
      ],
      grouping: 'na',
    };

    const exchange = this.client.getExchangeClient();
    let raw: unknown;
    try {
      raw = await exchange.order(payload);
    } catch (error) {
      const rejected = error instanceof Error && error.name === 'ApiRequestError';
      throw this.classifyOrderFailure(operation, market.symbol, error, rejected);
    }

    const parsed = OrderResponseSchema.safeParse(raw);
    const status = parsed.success ? parsed.data.response.data.statuses[0] : undefined;
    if (status === undefined) {
      throw new VenueUnavailableError(this.id, operation, `unrecognised order response for ${market.symbol}`);
    }
    if (typeof status === 'string' || 'resting' in status) {
      throw new RejectedByVenueError(
        this.id,
        operation,
        `IOC order for ${market.symbol} did not fill (${typeof status === 'string' ? status : 'resting'})`
      );
    }
    if ('error' in status) {
      throw this.classifyOrderFailure(operation, market.symbol, new Error(status.error), true);
    }

    const { totalSz, avgPx, oid } = status.filled;
    this.logger.info(`Hyperliquid order filled (oid=${oid}): ${side} ${totalSz} ${market.symbol} @ ${avgPx}`);
    return {
      venue: this.id,
      token: market.symbol,
      side,
      avgPrice: avgPx,
      filledNotionalUsd: totalSz * avgPx,
      filledSize: totalSz,
      orderId: String(oid),
      reduceOnly,
      timestamp: (this.options.now?.() ?? new Date()).toISOString(),
    };
  }

  /** `answered` is true when the exchange itself replied with an error for the order. */
  private classifyOrderFailure(
    operation: VenueOperation,
    symbol: string,
    error: unknown,
    answered: boolean
  ): Error {
    const message = describeCause(error);
    if (/could not immediately match/i.test(message)) {
      return new InsufficientLiquidityError(this.id, operation, `no liquidity for ${symbol}: ${message}`);
    }
    if (answered) {
      return new RejectedByVenueError(this.id, operation, `order for ${symbol} rejected: ${message}`, error);
    }
    return new VenueUnavailableError(this.id, operation, `order for ${symbol} failed: ${message}`, error);
  }

  private async applyLeverage(operation: VenueOperation, market: HyperliquidMarket): Promise<void> {
    const configured = this.options.config.hyperliquid.leverage;
    if (configured == null || this.leverageApplied.has(market.assetId)) return;
    const leverage = Math.min(
      configured,
      market.maxLeverage ?? configured,
      this.capabilities.maxLeverage ?? configured
    );
    await this.guard(operation, () =>
      this.client.getExchangeClient().updateLeverage({
        asset: market.assetId,
        isCross: true,
        leverage,
      })
    );
    this.leverageApplied.add(market.assetId);
  }

  private async requireMarket(operation: VenueOperation, symbol: string): Promise<HyperliquidMarket> {
    const market = await this.guard(operation, () => this.client.getMarket(symbol));
    if (!market) {
      throw new RejectedByVenueError(this.id, operation, `Unknown Hyperliquid symbol: ${symbol}`);
    }
    return market;
  }

  private async slippedPrice(operation: VenueOperation, symbol: string, side: OrderSide): Promise<number> {
    const mids = await this.guard(operation, () => this.client.getAllMids());
    const mid = mids[symbol];
    if (typeof mid !== 'number' || !Number.isFinite(mid) || mid <= 0) {
      throw new VenueUnavailableError(this.id, operation, `Missing mid price for ${symbol}`);
    }
    const slippage = this.slippageBps / 10000;
    return side === 'buy' ? mid * (1 + slippage) : mid * (1 - slippage);
  }

  /** Anything the info API throws that is not already classified means the venue is unreachable. */
  private async guard<T>(operation: VenueOperation, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (isTradingCoreError(error)) throw error;
      throw new VenueUnavailableError(this.id, operation, describeCause(error), error);
    }
  }
}

export function formatDecimal(value: number, decimals: number): string {
  const bounded = Math.max(0, value);
  const fixed = bounded.toFixed(decimals);
  return fixed.includes('.') ? fixed.replace(/\.?0+$/, '') : fixed;
}

/** Perp prices: at most 5 significant figures and `6 - szDecimals` decimals. */
export function formatPrice(value: number, szDecimals: number): string {
  const significant = Number(value.toPrecision(5));
  return formatDecimal(significant, Math.max(0, 6 - szDecimals));
}
