import type { FillResult, Position } from '../types/index.js';
import { KeyedMutex } from '../core/async.js';
import { flatPosition, normalizeToken } from './venue.js';

const SIZE_EPSILON = 1e-12;

export interface PositionUpdate {
  position: Position;
  realizedPnlUsd: number;
  /** True when the fill shrank or flipped an existing position */
  reduced: boolean;
}

const positionKey = (venue: string, token: string): string => `${venue}:${normalizeToken(token)}`;

/**
 * Process-wide record of exposure per (venue, token).
 *
 * Reads are lock-free snapshots. Writers must hold the key's lock through
 * `withLock` for the whole logical trade, so a position has one owner at a
 * time.
 */
export class PositionTracker {
  private positions = new Map<string, Position>();
  private locks = new KeyedMutex();

  get(venue: string, token: string): Position {
    const stored = this.positions.get(positionKey(venue, token));
    return stored ? { ...stored } : flatPosition(venue, normalizeToken(token));
  }

  has(venue: string, token: string): boolean {
    return this.positions.has(positionKey(venue, token));
  }

  list(): Position[] {
    return Array.from(this.positions.values(), (position) => ({ ...position }));
  }

  /** Sum of absolute notional across venues for one token. */
  exposureUsd(token: string): number {
    const normalized = normalizeToken(token);
    let total = 0;
    for (const position of this.positions.values()) {
      if (position.token === normalized) {
        total += Math.abs(position.notionalUsd);
      }
    }
    return total;
  }

  withLock<T>(venue: string, token: string, task: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(positionKey(venue, token), task);
  }

  isLocked(venue: string, token: string): boolean {
    return this.locks.isLocked(positionKey(venue, token));
  }

  /** Adopts a venue-reported position when nothing is tracked for the key yet. */
  seed(position: Position): boolean {
    const key = positionKey(position.venue, position.token);
    if (this.positions.has(key)) return false;
    if (position.side === 'FLAT' || position.size <= SIZE_EPSILON) return false;
    this.positions.set(key, { ...position, token: normalizeToken(position.token) });
    return true;
  }

  update(venue: string, token: string, fill: Pick<FillResult, 'side' | 'filledSize' | 'avgPrice'>): PositionUpdate {
    const key = positionKey(venue, token);
    const current = this.get(venue, token);
    const currentSigned = current.side === 'SHORT' ? -current.size : current.size;
    const fillSigned = fill.side === 'buy' ? fill.filledSize : -fill.filledSize;
    const next = currentSigned + fillSigned;

    let entryPrice = current.entryPrice;
    let realizedPnlUsd = 0;
    let reduced = false;

    if (currentSigned === 0 || Math.sign(currentSigned) === Math.sign(fillSigned)) {
      const totalSize = Math.abs(next);
      entryPrice =
        totalSize > 0
          ? (Math.abs(currentSigned) * current.entryPrice + Math.abs(fillSigned) * fill.avgPrice) /
            totalSize
          : 0;
    } else {
      reduced = true;
      const closedSize = Math.min(Math.abs(fillSigned), Math.abs(currentSigned));
      realizedPnlUsd = closedSize * (fill.avgPrice - current.entryPrice) * Math.sign(currentSigned);
      if (Math.abs(next) > SIZE_EPSILON && Math.sign(next) !== Math.sign(currentSigned)) {
        entryPrice = fill.avgPrice;
      }
    }

    if (Math.abs(next) <= SIZE_EPSILON) {
      this.positions.delete(key);
      return { position: flatPosition(venue, normalizeToken(token)), realizedPnlUsd, reduced };
    }

    const size = Math.abs(next);
    const position: Position = {
      venue,
      token: normalizeToken(token),
      side: next > 0 ? 'LONG' : 'SHORT',
      size,
      notionalUsd: size * entryPrice,
      entryPrice,
    };
    this.positions.set(key, position);
    return { position: { ...position }, realizedPnlUsd, reduced };
  }
}
