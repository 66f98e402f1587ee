import type {
  ChunkFill,
  ConsensusDecision,
  ExecutionReport,
  FillResult,
  OrderChunk,
  OrderIntent,
  OrderPlan,
  Position,
  RiskApproval,
} from '../types/index.js';
import { describeCause, UnsupportedOperationError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import type { SwarmTraderConfig } from '../core/config.js';
import type { PositionTracker } from './positions.js';
import { normalizeToken, supportsShort, type VenueAdapter, type VenueCapabilities } from './venue.js';

export type RouterSizing = SwarmTraderConfig['sizing'];

/**
 * Splits `totalUsd` into chunks of at most `maxChunkUsd`, in whole cents, so
 * the chunk sum equals the (cent-rounded) total exactly.
 */
export function splitNotional(totalUsd: number, maxChunkUsd: number): number[] {
  if (!(maxChunkUsd > 0)) {
    throw new Error(`Max chunk notional must be positive, got ${maxChunkUsd}`);
  }
  const totalCents = Math.round(totalUsd * 100);
  const maxCents = Math.floor(maxChunkUsd * 100 + 1e-9);
  if (totalCents <= 0) return [];
  if (maxCents <= 0) {
    throw new Error(`Max chunk notional ${maxChunkUsd} is below one cent`);
  }
  const chunks: number[] = [];
  let remaining = totalCents;
  while (remaining > 0) {
    const cents = Math.min(maxCents, remaining);
    chunks.push(cents / 100);
    remaining -= cents;
  }
  return chunks;
}

function emptyPlan(venue: string, token: string): OrderPlan {
  return { venue, token, intent: null, side: null, totalNotionalUsd: 0, chunks: [] };
}

export class OrderRouter {
  private logger: Logger;

  constructor(
    private params: {
      sizing: RouterSizing;
      venues: ReadonlyMap<string, VenueAdapter>;
      tracker: PositionTracker;
      logger?: Logger;
    }
  ) {
    this.logger = params.logger ?? new Logger('info');
  }

  getVenue(id: string): VenueAdapter {
    const venue = this.params.venues.get(id);
    if (!venue) {
      throw new Error(`Unknown venue: ${id}`);
    }
    return venue;
  }

  /**
   * What the decision asks of the current position, before risk sizing.
   * Opposing signals close the position; re-entry happens on a later cycle.
   */
  resolveIntent(
    decision: ConsensusDecision,
    position: Position,
    capabilities: VenueCapabilities
  ): OrderIntent | null {
    const { targetNotionalUsd, longOnly } = this.params.sizing;

    if (decision.action === 'HOLD') {
      return null;
    }

    if (decision.action === 'BUY') {
      switch (position.side) {
        case 'LONG':
          return null;
        case 'SHORT':
          return { kind: 'close', side: 'buy', notionalUsd: position.notionalUsd, reduceOnly: true };
        case 'FLAT':
          return { kind: 'open', side: 'buy', notionalUsd: targetNotionalUsd, reduceOnly: false };
      }
    }

    switch (position.side) {
      case 'SHORT':
        return null;
      case 'LONG':
        return { kind: 'close', side: 'sell', notionalUsd: position.notionalUsd, reduceOnly: true };
      case 'FLAT':
        if (!supportsShort(capabilities)) {
          throw new UnsupportedOperationError(
            position.venue,
            'plan',
            `cannot sell ${position.token}: no long position and the venue is long-only`
          );
        }
        if (longOnly) {
          this.logger.info(`SELL for ${position.token} skipped: long-only policy and no long to close`);
          return null;
        }
        return { kind: 'open', side: 'sell', notionalUsd: targetNotionalUsd, reduceOnly: false };
    }
  }

  plan(decision: ConsensusDecision, approval: RiskApproval, position: Position): OrderPlan {
    const token = normalizeToken(position.token);
    if (normalizeToken(approval.token) !== token || normalizeToken(decision.token) !== token) {
      throw new Error(
        `Plan inputs disagree on token: decision=${decision.token} approval=${approval.token} position=${position.token}`
      );
    }
    const venue = this.getVenue(position.venue);
    const intent = this.resolveIntent(decision, position, venue.capabilities);
    if (!intent || approval.approvedNotionalUsd <= 0) {
      return emptyPlan(venue.id, token);
    }
    if (intent.reduceOnly !== approval.reduceOnly) {
      throw new Error(
        `Approval for ${token} was evaluated as ${approval.reduceOnly ? 'reduce-only' : 'opening'} but the plan ${intent.kind}s a position`
      );
    }

    const notionals = splitNotional(approval.approvedNotionalUsd, this.params.sizing.maxChunkNotionalUsd);
    const chunks: OrderChunk[] = notionals.map((notionalUsd, index) => ({
      index,
      venue: venue.id,
      token,
      side: intent.side,
      notionalUsd,
      reduceOnly: intent.reduceOnly,
      closeOut: intent.kind === 'close' && index === notionals.length - 1,
    }));

    return {
      venue: venue.id,
      token,
      intent: intent.kind,
      side: intent.side,
      totalNotionalUsd: approval.approvedNotionalUsd,
      chunks,
    };
  }

  /**
   * Runs chunks one after another while holding the position lock for the
   * (venue, token). Stops at the first failure and reports the fills obtained
   * so far. An abort signal is honoured only between chunks.
   */
  execute(plan: OrderPlan, options: { signal?: AbortSignal } = {}): Promise<ExecutionReport> {
    if (plan.chunks.length === 0) {
      return this.executeLocked(plan, options);
    }
    return this.params.tracker.withLock(plan.venue, plan.token, () => this.executeLocked(plan, options));
  }

  /** `execute` for a caller that already holds the (venue, token) lock. */
  async executeLocked(plan: OrderPlan, options: { signal?: AbortSignal } = {}): Promise<ExecutionReport> {
    const report: ExecutionReport = {
      plan,
      status: 'empty',
      fills: [],
      filledNotionalUsd: 0,
      realizedPnlUsd: 0,
      failure: null,
    };
    if (plan.chunks.length === 0) {
      return report;
    }

    const venue = this.getVenue(plan.venue);
    const { tracker } = this.params;

    for (const chunk of plan.chunks) {
      if (options.signal?.aborted) {
        report.status = 'cancelled';
        this.logger.warn(`Execution cancelled before chunk ${chunk.index} of ${plan.token}`);
        return report;
      }

      let fill: FillResult;
      try {
        fill = await this.executeChunk(venue, chunk);
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(describeCause(error));
        report.failure = { chunk, error: failure };
        report.status = report.fills.length > 0 ? 'partial' : 'failed';
        this.logger.error(
          `Chunk ${chunk.index + 1}/${plan.chunks.length} for ${plan.token} on ${plan.venue} failed`,
          failure
        );
        return report;
      }

      const update = tracker.update(plan.venue, plan.token, fill);
      const chunkFill: ChunkFill = {
        chunk,
        fill,
        realizedPnlUsd: update.realizedPnlUsd,
        position: update.position,
      };
      report.fills.push(chunkFill);
      report.filledNotionalUsd += fill.filledNotionalUsd;
      report.realizedPnlUsd += update.realizedPnlUsd;
      this.logger.info(
        `Filled chunk ${chunk.index + 1}/${plan.chunks.length}: ${fill.side} ${plan.token} $${fill.filledNotionalUsd.toFixed(2)} @ ${fill.avgPrice}`,
        { venue: plan.venue }
      );

      if (update.position.side === 'FLAT' && chunk.reduceOnly) {
        break;
      }
    }
    report.status = 'complete';
    return report;
  }

  private executeChunk(venue: VenueAdapter, chunk: OrderChunk): Promise<FillResult> {
    if (chunk.closeOut) {
      return venue.closePosition(chunk.token);
    }
    const options = { reduceOnly: chunk.reduceOnly };
    return chunk.side === 'buy'
      ? venue.marketBuy(chunk.token, chunk.notionalUsd, options)
      : venue.marketSell(chunk.token, chunk.notionalUsd, options);
  }
}
