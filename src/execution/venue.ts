import type {
  AccountSnapshot,
  FillResult,
  OrderSide,
  Position,
  PositionSide,
  VenueKind,
} from '../types/index.js';

export interface VenueCapabilities {
  kind: VenueKind;
  /** Non-flat sides the venue can hold */
  sides: ReadonlyArray<Exclude<PositionSide, 'FLAT'>>;
  maxLeverage: number | null;
}

export interface OrderOptions {
  /** Stable across retries of one logical order */
  clientOrderId?: string;
  /** Never increase or flip the position */
  reduceOnly?: boolean;
}

export interface VenueAdapter {
  readonly id: string;
  readonly capabilities: VenueCapabilities;
  getPosition(token: string): Promise<Position>;
  marketBuy(token: string, notionalUsd: number, options?: OrderOptions): Promise<FillResult>;
  marketSell(token: string, notionalUsd: number, options?: OrderOptions): Promise<FillResult>;
  closePosition(token: string, options?: OrderOptions): Promise<FillResult>;
  getAccount(): Promise<AccountSnapshot>;
}

export const SPOT_CAPABILITIES: VenueCapabilities = {
  kind: 'spot',
  sides: ['LONG'],
  maxLeverage: null,
};

export function derivativeCapabilities(
  kind: Exclude<VenueKind, 'spot'>,
  maxLeverage: number
): VenueCapabilities {
  return { kind, sides: ['LONG', 'SHORT'], maxLeverage };
}

export function supportsShort(capabilities: VenueCapabilities): boolean {
  return capabilities.sides.includes('SHORT');
}

export function flatPosition(venue: string, token: string): Position {
  return { venue, token, side: 'FLAT', size: 0, notionalUsd: 0, entryPrice: 0 };
}

export function sideToOrder(side: Exclude<PositionSide, 'FLAT'>): OrderSide {
  return side === 'LONG' ? 'buy' : 'sell';
}

export const normalizeToken = (token: string): string => token.trim().toUpperCase();
