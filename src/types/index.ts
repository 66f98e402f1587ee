/**
 * Core type definitions for the decision core
 */

// ============================================================================
// Signal Types
// ============================================================================

export type SignalAction = 'BUY' | 'SELL' | 'HOLD';

export const SIGNAL_ACTIONS: readonly SignalAction[] = ['BUY', 'SELL', 'HOLD'];

export interface AdvisoryVote {
  action: SignalAction;
  confidence: number;
  rationale: string;
}

export interface Signal extends Readonly<AdvisoryVote> {
  readonly source: string;
  readonly latencyMs: number;
}

export interface MarketContext {
  token: string;
  asOf: string;
  price: number | null;
  data: Record<string, unknown>;
}

// ============================================================================
// Consensus Types
// ============================================================================

export type ConsensusDowngrade = 'TIE' | 'LOW_AGREEMENT';

export interface ConsensusDecision {
  token: string;
  action: SignalAction;
  /** Share of responding sources that voted the decided action, 0..1 */
  agreementRatio: number;
  /** Mean confidence of the sources that voted the decided action, 0..100 */
  confidence: number;
  dissentingCount: number;
  responderCount: number;
  abstainCount: number;
  tally: Record<SignalAction, number>;
  /** Raw plurality before tie-break or agreement downgrade; null on a tie */
  plurality: SignalAction | null;
  downgrade: ConsensusDowngrade | null;
  signals: Signal[];
  timestamp: string;
}

// ============================================================================
// Venue & Position Types
// ============================================================================

export type VenueKind = 'spot' | 'perp' | 'futures';

export type PositionSide = 'LONG' | 'SHORT' | 'FLAT';

export type OrderSide = 'buy' | 'sell';

export interface Position {
  venue: string;
  token: string;
  side: PositionSide;
  /** Base units, always non-negative; direction lives in `side` */
  size: number;
  notionalUsd: number;
  entryPrice: number;
}

export interface FillResult {
  venue: string;
  token: string;
  side: OrderSide;
  avgPrice: number;
  filledNotionalUsd: number;
  filledSize: number;
  orderId: string | null;
  reduceOnly: boolean;
  timestamp: string;
}

export interface AccountSnapshot {
  venue: string;
  /** Free collateral available for new orders */
  balanceUsd: number;
  /** Total account value including open positions */
  equityUsd: number;
}

// ============================================================================
// Order Plan Types
// ============================================================================

export type OrderIntentKind = 'open' | 'close';

export interface OrderIntent {
  kind: OrderIntentKind;
  side: OrderSide;
  notionalUsd: number;
  reduceOnly: boolean;
}

export interface OrderChunk {
  index: number;
  venue: string;
  token: string;
  side: OrderSide;
  notionalUsd: number;
  reduceOnly: boolean;
  /** Final chunk of a close: flattens whatever remains via closePosition */
  closeOut: boolean;
}

export interface OrderPlan {
  venue: string;
  token: string;
  intent: OrderIntentKind | null;
  side: OrderSide | null;
  totalNotionalUsd: number;
  chunks: OrderChunk[];
}

export interface ChunkFill {
  chunk: OrderChunk;
  fill: FillResult;
  realizedPnlUsd: number;
  position: Position;
}

export type ExecutionStatus = 'empty' | 'complete' | 'partial' | 'failed' | 'cancelled';

export interface ExecutionReport {
  plan: OrderPlan;
  status: ExecutionStatus;
  fills: ChunkFill[];
  filledNotionalUsd: number;
  realizedPnlUsd: number;
  failure: { chunk: OrderChunk; error: Error } | null;
}

// ============================================================================
// Risk Types
// ============================================================================

export type RiskDenialReason = 'CircuitBreakerTripped' | 'BelowMinimumBalance';

export type RiskTripReason = 'MaxLossExceeded' | 'Manual';

export type RiskClamp = 'maxPositionPercentage' | 'tokenCap';

export interface RiskApproval {
  approved: true;
  token: string;
  requestedNotionalUsd: number;
  approvedNotionalUsd: number;
  clampedBy: RiskClamp[];
  reduceOnly: boolean;
  reservationId: string;
}

export interface RiskDenial {
  approved: false;
  token: string;
  requestedNotionalUsd: number;
  reason: RiskDenialReason;
  message: string;
}

export type RiskEvaluation = RiskApproval | RiskDenial;

export interface RiskState {
  realizedPnlUsd: number;
  accumulatedLossUsd: number;
  balanceUsd: number;
  equityUsd: number;
  tripped: boolean;
  tripReason: RiskTripReason | null;
  trippedAt: string | null;
}
