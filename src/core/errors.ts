/**
 * Error taxonomy for the decision core.
 *
 * Every failure the core surfaces carries a stable `code` so callers can tell
 * "no decision" from "decision made but not executed" from "partially
 * executed" without matching on messages. Risk denials are not errors; they
 * are returned as `RiskDenial` values by the risk gate.
 */

import type { ConsensusDecision, Signal } from '../types/index.js';

export type TradingErrorCode =
  | 'ABSTAIN_TIMEOUT'
  | 'ABSTAIN_ERROR'
  | 'INVALID_SIGNAL'
  | 'INSUFFICIENT_SIGNALS'
  | 'UNSUPPORTED_OPERATION'
  | 'VENUE_TIMEOUT'
  | 'VENUE_UNAVAILABLE'
  | 'REJECTED_BY_VENUE'
  | 'INSUFFICIENT_LIQUIDITY'
  | 'CYCLE_CANCELLED';

export class TradingCoreError extends Error {
  readonly code: TradingErrorCode;
  readonly retryable: boolean;

  constructor(
    code: TradingErrorCode,
    message: string,
    options?: { retryable?: boolean; cause?: unknown }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TradingCoreError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

export function isTradingCoreError(error: unknown): error is TradingCoreError {
  return error instanceof TradingCoreError;
}

// ============================================================================
// Signals
// ============================================================================

export class InvalidSignalError extends TradingCoreError {
  constructor(
    readonly source: string,
    message: string
  ) {
    super('INVALID_SIGNAL', `Invalid signal from ${source}: ${message}`);
    this.name = 'InvalidSignalError';
  }
}

export type AbstainReason = 'timeout' | 'error' | 'invalid';

/**
 * Marker for a source that did not produce a usable vote in its window.
 * Never fatal on its own; excluded from the consensus tally.
 */
export class AbstainError extends TradingCoreError {
  readonly abstained = true;

  constructor(
    readonly source: string,
    readonly reason: AbstainReason,
    readonly latencyMs: number,
    cause?: unknown
  ) {
    super(
      reason === 'timeout' ? 'ABSTAIN_TIMEOUT' : 'ABSTAIN_ERROR',
      reason === 'timeout'
        ? `Advisory source ${source} timed out after ${latencyMs}ms`
        : `Advisory source ${source} abstained (${reason}): ${describeCause(cause)}`,
      { cause }
    );
    this.name = 'AbstainError';
  }
}

export type SignalOutcome = Signal | AbstainError;

export function isAbstain(outcome: SignalOutcome): outcome is AbstainError {
  return outcome instanceof AbstainError;
}

export class InsufficientSignalsError extends TradingCoreError {
  constructor(
    readonly responders: number,
    readonly required: number,
    readonly outcomes: SignalOutcome[]
  ) {
    super(
      'INSUFFICIENT_SIGNALS',
      `Only ${responders} advisory source(s) responded; at least ${required} required`
    );
    this.name = 'InsufficientSignalsError';
  }
}

// ============================================================================
// Venues
// ============================================================================

export type VenueOperation =
  | 'getPosition'
  | 'marketBuy'
  | 'marketSell'
  | 'closePosition'
  | 'getAccount';

export class UnsupportedOperationError extends TradingCoreError {
  constructor(
    readonly venue: string,
    readonly operation: VenueOperation | 'plan',
    message: string
  ) {
    super('UNSUPPORTED_OPERATION', `${venue}: ${message}`);
    this.name = 'UnsupportedOperationError';
  }
}

export class VenueError extends TradingCoreError {
  constructor(
    code: Extract<
      TradingErrorCode,
      'VENUE_TIMEOUT' | 'VENUE_UNAVAILABLE' | 'REJECTED_BY_VENUE' | 'INSUFFICIENT_LIQUIDITY'
    >,
    readonly venue: string,
    readonly operation: VenueOperation,
    message: string,
    options?: { retryable?: boolean; cause?: unknown }
  ) {
    super(code, `${venue} ${operation}: ${message}`, options);
    this.name = 'VenueError';
  }
}

export class VenueTimeoutError extends VenueError {
  constructor(venue: string, operation: VenueOperation, readonly timeoutMs: number) {
    super('VENUE_TIMEOUT', venue, operation, `timed out after ${timeoutMs}ms`, {
      retryable: true,
    });
    this.name = 'VenueTimeoutError';
  }
}

export class VenueUnavailableError extends VenueError {
  constructor(venue: string, operation: VenueOperation, message: string, cause?: unknown) {
    super('VENUE_UNAVAILABLE', venue, operation, message, { retryable: true, cause });
    this.name = 'VenueUnavailableError';
  }
}

export class RejectedByVenueError extends VenueError {
  constructor(venue: string, operation: VenueOperation, message: string, cause?: unknown) {
    super('REJECTED_BY_VENUE', venue, operation, message, { cause });
    this.name = 'RejectedByVenueError';
  }
}

export class InsufficientLiquidityError extends VenueError {
  constructor(venue: string, operation: VenueOperation, message: string) {
    super('INSUFFICIENT_LIQUIDITY', venue, operation, message);
    this.name = 'InsufficientLiquidityError';
  }
}

// ============================================================================
// Cycle
// ============================================================================

export type CycleStage = 'context' | 'signals' | 'risk' | 'execution';

export class CycleCancelledError extends TradingCoreError {
  constructor(
    readonly stage: CycleStage,
    readonly decision: ConsensusDecision | null = null
  ) {
    super('CYCLE_CANCELLED', `Decision cycle cancelled during ${stage}`);
    this.name = 'CycleCancelledError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}
