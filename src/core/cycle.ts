import { EventEmitter } from 'eventemitter3';

import type {
  ChunkFill,
  ConsensusDecision,
  ExecutionReport,
  Position,
  RiskApproval,
  RiskDenial,
  RiskEvaluation,
} from '../types/index.js';
import {
  CycleCancelledError,
  InsufficientSignalsError,
  type CycleStage,
  type SignalOutcome,
} from './errors.js';
import { Logger } from './logger.js';
import type { SignalAggregator } from '../signals/aggregator.js';
import type { ConsensusEngine } from '../signals/consensus.js';
import type { MarketContextProvider } from '../signals/context.js';
import type { AdvisorySource } from '../signals/source.js';
import type { RiskGate } from '../risk/gate.js';
import type { OrderRouter } from '../execution/router.js';
import type { PositionTracker } from '../execution/positions.js';
import { normalizeToken, type VenueAdapter } from '../execution/venue.js';

export type NoopReason = 'position_matches' | 'policy' | 'clamped_to_zero';

export type CycleOutcome =
  | { status: 'no_decision'; token: string; venue: string; error: InsufficientSignalsError; outcomes: SignalOutcome[] }
  | { status: 'hold'; token: string; venue: string; decision: ConsensusDecision }
  | { status: 'noop'; token: string; venue: string; decision: ConsensusDecision; position: Position; reason: NoopReason }
  | { status: 'denied'; token: string; venue: string; decision: ConsensusDecision; denial: RiskDenial }
  | {
      status: 'cancelled';
      token: string;
      venue: string;
      stage: CycleStage;
      decision: ConsensusDecision | null;
      report: ExecutionReport | null;
    }
  | {
      status: 'executed' | 'partial' | 'failed';
      token: string;
      venue: string;
      decision: ConsensusDecision;
      approval: RiskApproval;
      report: ExecutionReport;
    };

export type CycleStatus = CycleOutcome['status'];

export interface DecisionCycleEvents {
  decision: (decision: ConsensusDecision, venue: string) => void;
  risk: (evaluation: RiskEvaluation, decision: ConsensusDecision) => void;
  fill: (fill: ChunkFill, decision: ConsensusDecision) => void;
  outcome: (outcome: CycleOutcome) => void;
}

export interface DecisionCycleDeps {
  context: MarketContextProvider;
  sources: readonly AdvisorySource[];
  aggregator: SignalAggregator;
  consensus: ConsensusEngine;
  risk: RiskGate;
  router: OrderRouter;
  tracker: PositionTracker;
  defaultVenue: string;
  logger?: Logger;
}

export interface RunOptions {
  venueId?: string;
  signal?: AbortSignal;
}

/**
 * One pass for one token: context, signals, consensus, risk, plan, execute.
 * Every expected way a cycle ends is an outcome value; only unsupported
 * operations and infrastructure failures outside the venue calls throw.
 */
export class DecisionCycle extends EventEmitter<DecisionCycleEvents> {
  private logger: Logger;

  constructor(private deps: DecisionCycleDeps) {
    super();
    this.logger = deps.logger ?? new Logger('info');
  }

  async run(rawToken: string, options: RunOptions = {}): Promise<CycleOutcome> {
    const outcome = await this.runInner(normalizeToken(rawToken), options);
    this.logger.info(`Cycle for ${outcome.token} on ${outcome.venue}: ${outcome.status}`);
    this.emit('outcome', outcome);
    return outcome;
  }

  private async runInner(token: string, options: RunOptions): Promise<CycleOutcome> {
    const { aggregator, consensus, router, tracker } = this.deps;
    const venue = router.getVenue(options.venueId ?? this.deps.defaultVenue);
    const base = { token, venue: venue.id };
    const { signal } = options;

    if (signal?.aborted) {
      return { ...base, status: 'cancelled', stage: 'context', decision: null, report: null };
    }
    const context = await this.deps.context.getContext(token);

    let outcomes: SignalOutcome[];
    try {
      const round = await aggregator.collect(context, this.deps.sources, { signal });
      outcomes = round.outcomes;
    } catch (error) {
      if (error instanceof InsufficientSignalsError) {
        this.logger.warn(`No decision for ${token}: ${error.message}`);
        return { ...base, status: 'no_decision', error, outcomes: error.outcomes };
      }
      if (error instanceof CycleCancelledError) {
        return { ...base, status: 'cancelled', stage: error.stage, decision: null, report: null };
      }
      throw error;
    }

    const decision = consensus.reduce(outcomes, token);
    this.emit('decision', decision, venue.id);
    this.logger.info(`Consensus for ${token}: ${decision.action}`, {
      agreementRatio: decision.agreementRatio,
      confidence: decision.confidence,
      responders: decision.responderCount,
    });
    if (decision.action === 'HOLD') {
      return { ...base, status: 'hold', decision };
    }

    return tracker.withLock(venue.id, token, () => this.trade(venue, token, decision, signal));
  }

  /**
   * Position read, intent, risk and execution for one decision. Runs under the
   * (venue, token) lock so a concurrent cycle on the same key sees the result.
   */
  private async trade(
    venue: VenueAdapter,
    token: string,
    decision: ConsensusDecision,
    signal: AbortSignal | undefined
  ): Promise<CycleOutcome> {
    const { risk, router, tracker } = this.deps;
    const base = { token, venue: venue.id };

    await this.seedPosition(venue, token);
    const position = tracker.get(venue.id, token);
    const intent = router.resolveIntent(decision, position, venue.capabilities);
    if (!intent) {
      const reason: NoopReason = position.side === 'FLAT' ? 'policy' : 'position_matches';
      return { ...base, status: 'noop', decision, position, reason };
    }

    if (signal?.aborted) {
      return { ...base, status: 'cancelled', stage: 'risk', decision, report: null };
    }

    const account = await venue.getAccount();
    await risk.updateBalance(account.balanceUsd, account.equityUsd);
    const evaluation = await risk.evaluate(intent.notionalUsd, token, { reduceOnly: intent.reduceOnly });
    this.emit('risk', evaluation, decision);
    if (!evaluation.approved) {
      return { ...base, status: 'denied', decision, denial: evaluation };
    }

    try {
      const plan = router.plan(decision, evaluation, position);
      if (plan.chunks.length === 0) {
        return { ...base, status: 'noop', decision, position, reason: 'clamped_to_zero' };
      }

      const report = await router.executeLocked(plan, { signal });
      for (const fill of report.fills) {
        this.emit('fill', fill, decision);
      }
      if (report.realizedPnlUsd !== 0) {
        await risk.recordOutcome(report.realizedPnlUsd);
      }

      switch (report.status) {
        case 'complete':
          return { ...base, status: 'executed', decision, approval: evaluation, report };
        case 'partial':
        case 'failed':
          return { ...base, status: report.status, decision, approval: evaluation, report };
        case 'cancelled':
          return { ...base, status: 'cancelled', stage: 'execution', decision, report };
        case 'empty':
          return { ...base, status: 'noop', decision, position, reason: 'clamped_to_zero' };
      }
    } finally {
      await risk.settle(evaluation);
    }
  }

  /** First visit of a (venue, token) adopts whatever the venue already holds. Caller holds the lock. */
  private async seedPosition(venue: VenueAdapter, token: string): Promise<void> {
    const { tracker } = this.deps;
    if (tracker.has(venue.id, token)) return;
    const remote = await venue.getPosition(token);
    if (tracker.seed(remote)) {
      this.logger.info(`Adopted existing ${remote.side} ${token} position on ${venue.id}`, {
        size: remote.size,
        notionalUsd: remote.notionalUsd,
      });
    }
  }
}
