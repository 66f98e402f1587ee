import type { AccountSnapshot, FillResult, OrderSide, Position, VenueKind } from '../../types/index.js';
import {
  InsufficientLiquidityError,
  RejectedByVenueError,
  UnsupportedOperationError,
  VenueUnavailableError,
  type VenueOperation,
} from '../../core/errors.js';
import {
  SPOT_CAPABILITIES,
  derivativeCapabilities,
  flatPosition,
  normalizeToken,
  type OrderOptions,
  type VenueAdapter,
  type VenueCapabilities,
} from '../venue.js';

export type PriceFeed = (token: string) => Promise<number | null> | number | null;

export interface PaperVenueOptions {
  id: string;
  kind: VenueKind;
  priceFeed: PriceFeed;
  initialCashUsd?: number;
  slippageBps?: number;
  /** Largest notional a single order can fill; larger orders fail with InsufficientLiquidity */
  maxFillNotionalUsd?: number;
  leverage?: number;
  now?: () => Date;
}

type PaperHolding = { size: number; entryPrice: number };

/** Client order ids remembered for retries, oldest evicted first. */
const CLIENT_ORDER_MEMORY = 500;

/**
 * Simulated venue. Spot holds longs only and pays the full notional from
 * cash; perp and futures post `notional / leverage` as margin and settle
 * PnL into cash when exposure shrinks.
 */
export class PaperVenue implements VenueAdapter {
  readonly id: string;
  readonly capabilities: VenueCapabilities;
  private cashUsd: number;
  private holdings = new Map<string, PaperHolding>();
  private ordersByClientId = new Map<string, Promise<FillResult>>();
  private orderSeq = 0;
  private leverage: number;
  private slippage: number;

  constructor(private options: PaperVenueOptions) {
    this.id = options.id;
    this.leverage = options.kind === 'spot' ? 1 : Math.max(1, options.leverage ?? 1);
    this.capabilities =
      options.kind === 'spot' ? SPOT_CAPABILITIES : derivativeCapabilities(options.kind, this.leverage);
    this.cashUsd = options.initialCashUsd ?? 1000;
    this.slippage = (options.slippageBps ?? 0) / 10000;
  }

  async getPosition(token: string): Promise<Position> {
    const normalized = normalizeToken(token);
    const holding = this.holdings.get(normalized);
    if (!holding || holding.size === 0) {
      return flatPosition(this.id, normalized);
    }
    const size = Math.abs(holding.size);
    return {
      venue: this.id,
      token: normalized,
      side: holding.size > 0 ? 'LONG' : 'SHORT',
      size,
      notionalUsd: size * holding.entryPrice,
      entryPrice: holding.entryPrice,
    };
  }

  async getAccount(): Promise<AccountSnapshot> {
    let positionValue = 0;
    for (const [token, holding] of this.holdings) {
      const mark = (await this.resolvePrice(token, 'getAccount')) ?? holding.entryPrice;
      if (this.options.kind === 'spot') {
        positionValue += holding.size * mark;
      } else {
        const margin = (Math.abs(holding.size) * holding.entryPrice) / this.leverage;
        positionValue += margin + holding.size * (mark - holding.entryPrice);
      }
    }
    return { venue: this.id, balanceUsd: this.cashUsd, equityUsd: this.cashUsd + positionValue };
  }

  marketBuy(token: string, notionalUsd: number, options?: OrderOptions): Promise<FillResult> {
    return this.idempotent(options, () => this.fill('marketBuy', token, 'buy', notionalUsd, options));
  }

  marketSell(token: string, notionalUsd: number, options?: OrderOptions): Promise<FillResult> {
    return this.idempotent(options, () => this.fill('marketSell', token, 'sell', notionalUsd, options));
  }

  closePosition(token: string, options?: OrderOptions): Promise<FillResult> {
    return this.idempotent(options, async () => {
      const normalized = normalizeToken(token);
      const holding = this.holdings.get(normalized);
      if (!holding || holding.size === 0) {
        throw new RejectedByVenueError(this.id, 'closePosition', `no open ${normalized} position`);
      }
      const price = await this.requirePrice(normalized, 'closePosition');
      const side: OrderSide = holding.size > 0 ? 'sell' : 'buy';
      const execPrice = this.applySlippage(price, side);
      return this.settle(normalized, side, Math.abs(holding.size), execPrice, true);
    });
  }

  private async fill(
    operation: VenueOperation,
    token: string,
    side: OrderSide,
    notionalUsd: number,
    options?: OrderOptions
  ): Promise<FillResult> {
    const normalized = normalizeToken(token);
    if (!Number.isFinite(notionalUsd) || notionalUsd <= 0) {
      throw new RejectedByVenueError(this.id, operation, `invalid notional ${notionalUsd}`);
    }
    const holding = this.holdings.get(normalized) ?? { size: 0, entryPrice: 0 };
    const reduceOnly = options?.reduceOnly ?? false;

    if (side === 'sell' && this.options.kind === 'spot' && holding.size <= 0) {
      throw new UnsupportedOperationError(
        this.id,
        operation,
        `cannot sell ${normalized}: spot venue holds no long position`
      );
    }
    if (reduceOnly && (holding.size === 0 || (side === 'buy') === holding.size > 0)) {
      throw new RejectedByVenueError(this.id, operation, `reduce-only ${side} would not reduce ${normalized}`);
    }

    const maxFill = this.options.maxFillNotionalUsd;
    if (maxFill != null && notionalUsd > maxFill) {
      throw new InsufficientLiquidityError(
        this.id,
        operation,
        `book depth $${maxFill.toFixed(2)} cannot fill $${notionalUsd.toFixed(2)}`
      );
    }

    const price = await this.requirePrice(normalized, operation);
    const execPrice = this.applySlippage(price, side);
    let size = notionalUsd / execPrice;

    const capToHolding = reduceOnly || (this.options.kind === 'spot' && side === 'sell');
    if (capToHolding) {
      size = Math.min(size, Math.abs(holding.size));
    }

    if (side === 'buy' && this.options.kind === 'spot' && size * execPrice > this.cashUsd + 1e-9) {
      throw new RejectedByVenueError(
        this.id,
        operation,
        `insufficient cash: $${this.cashUsd.toFixed(2)} available for $${(size * execPrice).toFixed(2)}`
      );
    }

    return this.settle(normalized, side, size, execPrice, reduceOnly);
  }

  private settle(
    token: string,
    side: OrderSide,
    size: number,
    price: number,
    reduceOnly: boolean
  ): FillResult {
    const holding = this.holdings.get(token) ?? { size: 0, entryPrice: 0 };
    const signed = side === 'buy' ? size : -size;
    const next = holding.size + signed;
    const notional = size * price;

    if (this.options.kind === 'spot') {
      this.cashUsd += side === 'buy' ? -notional : notional;
    } else {
      const sameDirection = holding.size === 0 || Math.sign(holding.size) === Math.sign(signed);
      if (sameDirection) {
        this.cashUsd -= notional / this.leverage;
      } else {
        const closed = Math.min(size, Math.abs(holding.size));
        const pnl = closed * (price - holding.entryPrice) * Math.sign(holding.size);
        this.cashUsd += (closed * holding.entryPrice) / this.leverage + pnl;
        const opened = size - closed;
        if (opened > 0) {
          this.cashUsd -= (opened * price) / this.leverage;
        }
      }
    }

    if (Math.abs(next) < 1e-12) {
      this.holdings.delete(token);
    } else if (holding.size === 0 || Math.sign(holding.size) === Math.sign(signed)) {
      const entryPrice = (Math.abs(holding.size) * holding.entryPrice + size * price) / Math.abs(next);
      this.holdings.set(token, { size: next, entryPrice });
    } else if (Math.sign(next) === Math.sign(holding.size)) {
      this.holdings.set(token, { size: next, entryPrice: holding.entryPrice });
    } else {
      this.holdings.set(token, { size: next, entryPrice: price });
    }

    this.orderSeq += 1;
    return {
      venue: this.id,
      token,
      side,
      avgPrice: price,
      filledNotionalUsd: notional,
      filledSize: size,
      orderId: `${this.id}-${this.orderSeq}`,
      reduceOnly,
      timestamp: (this.options.now?.() ?? new Date()).toISOString(),
    };
  }

  /**
   * A repeated clientOrderId joins the first order, including one still in
   * flight when the caller timed out. Failed orders are forgotten so a retry
   * places them again.
   */
  private idempotent(options: OrderOptions | undefined, run: () => Promise<FillResult>): Promise<FillResult> {
    const clientId = options?.clientOrderId;
    if (!clientId) {
      return run();
    }
    const existing = this.ordersByClientId.get(clientId);
    if (existing) {
      return existing;
    }
    const order = run().catch((error: unknown) => {
      this.ordersByClientId.delete(clientId);
      throw error;
    });
    this.ordersByClientId.set(clientId, order);
    for (const oldest of this.ordersByClientId.keys()) {
      if (this.ordersByClientId.size <= CLIENT_ORDER_MEMORY) break;
      this.ordersByClientId.delete(oldest);
    }
    return order;
  }

  private applySlippage(price: number, side: OrderSide): number {
    return side === 'buy' ? price * (1 + this.slippage) : price * (1 - this.slippage);
  }

  private async resolvePrice(token: string, operation: VenueOperation): Promise<number | null> {
    let raw: number | null;
    try {
      raw = await this.options.priceFeed(token);
    } catch (error) {
      throw new VenueUnavailableError(this.id, operation, `price feed failed for ${token}`, error);
    }
    return typeof raw === 'number' && Number.isFinite(raw) && raw > 0 ? raw : null;
  }

  private async requirePrice(token: string, operation: VenueOperation): Promise<number> {
    const price = await this.resolvePrice(token, operation);
    if (price == null) {
      throw new VenueUnavailableError(this.id, operation, `no price for ${token}`);
    }
    return price;
  }
}
