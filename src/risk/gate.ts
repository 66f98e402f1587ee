import { randomUUID } from 'node:crypto';

import { EventEmitter } from 'eventemitter3';

import type {
  RiskApproval,
  RiskClamp,
  RiskDenial,
  RiskEvaluation,
  RiskState,
  RiskTripReason,
} from '../types/index.js';
import type { SwarmTraderConfig } from '../core/config.js';
import { Mutex } from '../core/async.js';
import { Logger } from '../core/logger.js';
import { normalizeToken } from '../execution/venue.js';

export type RiskLimits = SwarmTraderConfig['risk'];

export interface ExposureReader {
  exposureUsd(token: string): number;
}

export interface RiskEvaluateOptions {
  /** Order only shrinks existing exposure; only the circuit breaker applies */
  reduceOnly?: boolean;
}

export interface RiskGateEvents {
  denied: (denial: RiskDenial) => void;
  clamped: (approval: RiskApproval) => void;
  tripped: (reason: RiskTripReason, state: RiskState) => void;
  reset: (state: RiskState) => void;
}

const roundUsd = (value: number): number => Math.round(value * 100) / 100;

/**
 * Account-level circuit breaker and sizing gate.
 *
 * State transitions: Normal -> Tripped on a loss breach or manual trip, and
 * back to Normal only through `reset()`. All reads and writes of the state
 * run under one exclusive lock so concurrent cycles on different tokens see
 * a consistent balance, loss and reservation total.
 */
export class RiskGate extends EventEmitter<RiskGateEvents> {
  private state: RiskState;
  private reservations = new Map<string, number>();
  private lock = new Mutex();
  private logger: Logger;

  constructor(
    private params: {
      limits: RiskLimits;
      exposure: ExposureReader;
      initialBalanceUsd: number;
      initialEquityUsd?: number;
      logger?: Logger;
      now?: () => Date;
    }
  ) {
    super();
    this.logger = params.logger ?? new Logger('info');
    this.state = {
      realizedPnlUsd: 0,
      accumulatedLossUsd: 0,
      balanceUsd: params.initialBalanceUsd,
      equityUsd: params.initialEquityUsd ?? params.initialBalanceUsd,
      tripped: false,
      tripReason: null,
      trippedAt: null,
    };
  }

  snapshot(): RiskState {
    return { ...this.state };
  }

  isTripped(): boolean {
    return this.state.tripped;
  }

  reservedUsd(): number {
    let total = 0;
    for (const amount of this.reservations.values()) total += amount;
    return total;
  }

  /** Replaces the state with a persisted snapshot, keeping a stored trip sticky. */
  restore(state: RiskState): Promise<void> {
    return this.lock.runExclusive(() => {
      this.state = { ...state };
    });
  }

  updateBalance(balanceUsd: number, equityUsd: number = balanceUsd): Promise<void> {
    return this.lock.runExclusive(() => {
      if (!Number.isFinite(balanceUsd) || !Number.isFinite(equityUsd)) {
        throw new Error(`Invalid account snapshot: balance=${balanceUsd} equity=${equityUsd}`);
      }
      this.state.balanceUsd = balanceUsd;
      this.state.equityUsd = equityUsd;
    });
  }

  evaluate(
    requestedNotionalUsd: number,
    token: string,
    options: RiskEvaluateOptions = {}
  ): Promise<RiskEvaluation> {
    return this.lock.runExclusive(() =>
      this.evaluateLocked(requestedNotionalUsd, normalizeToken(token), options.reduceOnly ?? false)
    );
  }

  /** Releases the balance held by an approval once its orders have run. */
  settle(approval: RiskApproval): Promise<void> {
    return this.lock.runExclusive(() => {
      this.reservations.delete(approval.reservationId);
    });
  }

  recordOutcome(realizedPnlUsd: number): Promise<RiskState> {
    return this.lock.runExclusive(() => {
      if (!Number.isFinite(realizedPnlUsd)) {
        throw new Error(`Invalid realized PnL: ${realizedPnlUsd}`);
      }
      this.state.realizedPnlUsd += realizedPnlUsd;
      this.state.accumulatedLossUsd = Math.max(0, -this.state.realizedPnlUsd);
      if (!this.state.tripped && this.state.accumulatedLossUsd > this.params.limits.maxLossUsd) {
        this.tripLocked(
          'MaxLossExceeded',
          `Accumulated loss $${this.state.accumulatedLossUsd.toFixed(2)} exceeds max $${this.params.limits.maxLossUsd.toFixed(2)}`
        );
      }
      return { ...this.state };
    });
  }

  trip(reason: RiskTripReason = 'Manual', message = 'Circuit breaker tripped manually'): Promise<RiskState> {
    return this.lock.runExclusive(() => {
      if (!this.state.tripped) {
        this.tripLocked(reason, message);
      }
      return { ...this.state };
    });
  }

  /** Manual return to Normal; starts a fresh loss window. */
  reset(): Promise<RiskState> {
    return this.lock.runExclusive(() => {
      this.state = {
        ...this.state,
        realizedPnlUsd: 0,
        accumulatedLossUsd: 0,
        tripped: false,
        tripReason: null,
        trippedAt: null,
      };
      this.logger.warn('Risk circuit breaker reset');
      this.emit('reset', { ...this.state });
      return { ...this.state };
    });
  }

  private evaluateLocked(requested: number, token: string, reduceOnly: boolean): RiskEvaluation {
    if (!Number.isFinite(requested) || requested <= 0) {
      throw new Error(`Requested notional must be a positive number, got ${requested}`);
    }
    const requestedNotionalUsd = roundUsd(requested);

    if (this.state.tripped) {
      return this.deny(
        token,
        requestedNotionalUsd,
        'CircuitBreakerTripped',
        `Circuit breaker tripped (${this.state.tripReason ?? 'unknown'}) at ${this.state.trippedAt ?? 'unknown time'}`
      );
    }

    if (reduceOnly) {
      return this.approve(token, requestedNotionalUsd, requestedNotionalUsd, [], true);
    }

    const { minimumBalanceUsd, maxPositionPercentage } = this.params.limits;
    const available = this.state.balanceUsd - this.reservedUsd();
    const projected = available - requestedNotionalUsd;
    if (projected < minimumBalanceUsd) {
      return this.deny(
        token,
        requestedNotionalUsd,
        'BelowMinimumBalance',
        `Projected balance $${projected.toFixed(2)} below minimum $${minimumBalanceUsd.toFixed(2)}`
      );
    }

    const existing = this.params.exposure.exposureUsd(token);
    const clampedBy: RiskClamp[] = [];
    let approved = requestedNotionalUsd;

    const equity = Math.max(0, this.state.equityUsd);
    const positionCeiling = Math.max(0, (equity * maxPositionPercentage) / 100 - existing);
    if (approved > positionCeiling) {
      approved = positionCeiling;
      clampedBy.push('maxPositionPercentage');
    }

    const tokenCap = this.params.limits.tokenCaps[token] ?? this.params.limits.maxTokenNotionalUsd;
    if (tokenCap != null) {
      const capCeiling = Math.max(0, tokenCap - existing);
      if (approved > capCeiling) {
        approved = capCeiling;
        clampedBy.push('tokenCap');
      }
    }

    return this.approve(token, requestedNotionalUsd, roundDownUsd(approved), clampedBy, false);
  }

  private approve(
    token: string,
    requestedNotionalUsd: number,
    approvedNotionalUsd: number,
    clampedBy: RiskClamp[],
    reduceOnly: boolean
  ): RiskApproval {
    const approval: RiskApproval = {
      approved: true,
      token,
      requestedNotionalUsd,
      approvedNotionalUsd,
      clampedBy,
      reduceOnly,
      reservationId: randomUUID(),
    };
    if (!reduceOnly && approvedNotionalUsd > 0) {
      this.reservations.set(approval.reservationId, approvedNotionalUsd);
    }
    if (clampedBy.length > 0) {
      this.logger.info(`Risk clamp for ${token}`, {
        requested: requestedNotionalUsd,
        approved: approvedNotionalUsd,
        clampedBy,
      });
      this.emit('clamped', approval);
    }
    return approval;
  }

  private deny(
    token: string,
    requestedNotionalUsd: number,
    reason: RiskDenial['reason'],
    message: string
  ): RiskDenial {
    const denial: RiskDenial = { approved: false, token, requestedNotionalUsd, reason, message };
    this.logger.warn(`Risk denial for ${token}: ${message}`, { reason, requestedNotionalUsd });
    this.emit('denied', denial);
    return denial;
  }

  private tripLocked(reason: RiskTripReason, message: string): void {
    this.state.tripped = true;
    this.state.tripReason = reason;
    this.state.trippedAt = (this.params.now?.() ?? new Date()).toISOString();
    this.logger.warn(`Risk circuit breaker tripped: ${message}`, { reason });
    this.emit('tripped', reason, { ...this.state });
  }
}

function roundDownUsd(value: number): number {
  return Math.floor(value * 100 + 1e-9) / 100;
}
