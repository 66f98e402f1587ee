import type { ConsensusDecision, ConsensusDowngrade, Signal, SignalAction } from '../types/index.js';
import { SIGNAL_ACTIONS } from '../types/index.js';
import { InsufficientSignalsError, isAbstain, type SignalOutcome } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { normalizeToken } from '../execution/venue.js';

export interface ConsensusSettings {
  minimumAgreementRatio: number;
}

function emptyTally(): Record<SignalAction, number> {
  return { BUY: 0, SELL: 0, HOLD: 0 };
}

/**
 * Plurality vote over responding sources. Abstentions never count toward
 * either side of the ratio. Any tie for the top count resolves to HOLD, and
 * so does a plurality whose share is below the minimum agreement ratio.
 */
export class ConsensusEngine {
  private logger: Logger;
  private now: () => Date;

  constructor(
    private settings: ConsensusSettings,
    options: { logger?: Logger; now?: () => Date } = {}
  ) {
    this.logger = options.logger ?? new Logger('info');
    this.now = options.now ?? (() => new Date());
  }

  reduce(outcomes: readonly SignalOutcome[], token: string): ConsensusDecision {
    const signals = outcomes.filter((outcome): outcome is Signal => !isAbstain(outcome));
    const abstainCount = outcomes.length - signals.length;
    if (signals.length === 0) {
      throw new InsufficientSignalsError(0, 1, [...outcomes]);
    }

    const tally = emptyTally();
    for (const signal of signals) {
      tally[signal.action] += 1;
    }

    const top = Math.max(...SIGNAL_ACTIONS.map((action) => tally[action]));
    const leaders = SIGNAL_ACTIONS.filter((action) => tally[action] === top);
    const plurality = leaders.length === 1 ? (leaders[0] ?? null) : null;

    let action: SignalAction;
    let downgrade: ConsensusDowngrade | null = null;
    if (plurality === null) {
      action = 'HOLD';
      downgrade = 'TIE';
    } else if (top / signals.length < this.settings.minimumAgreementRatio) {
      action = 'HOLD';
      downgrade = 'LOW_AGREEMENT';
    } else {
      action = plurality;
    }

    const voters = signals.filter((signal) => signal.action === action);
    const confidence =
      voters.length === 0 ? 0 : voters.reduce((sum, signal) => sum + signal.confidence, 0) / voters.length;

    const decision: ConsensusDecision = {
      token: normalizeToken(token),
      action,
      agreementRatio: voters.length / signals.length,
      confidence,
      dissentingCount: signals.length - voters.length,
      responderCount: signals.length,
      abstainCount,
      tally,
      plurality,
      downgrade,
      signals,
      timestamp: this.now().toISOString(),
    };

    if (downgrade) {
      this.logger.info(`Consensus for ${decision.token} downgraded to HOLD (${downgrade})`, { tally });
    }
    return decision;
  }
}
