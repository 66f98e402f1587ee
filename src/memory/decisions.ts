import type { CycleOutcome, CycleStatus } from '../core/cycle.js';
import type { ChunkFill, ConsensusDecision, SignalAction } from '../types/index.js';
import { SIGNAL_ACTIONS } from '../types/index.js';
import { openDatabase } from './db.js';
import { nullableNumber, nullableString, toRows, type Row } from './rows.js';

export interface DecisionRecord {
  id: number;
  createdAt: string;
  token: string;
  venue: string;
  status: string;
  action: SignalAction | null;
  agreementRatio: number | null;
  confidence: number | null;
  dissentingCount: number | null;
  responderCount: number | null;
  abstainCount: number | null;
  downgrade: string | null;
  detail: string | null;
}

export interface FillRecord {
  id: number;
  decisionId: number;
  createdAt: string;
  venue: string;
  token: string;
  side: 'buy' | 'sell';
  chunkIndex: number;
  chunkNotionalUsd: number;
  filledNotionalUsd: number;
  filledSize: number;
  avgPrice: number;
  orderId: string | null;
  reduceOnly: boolean;
  realizedPnlUsd: number;
}

function decisionOf(outcome: CycleOutcome): ConsensusDecision | null {
  return outcome.status === 'no_decision' ? null : outcome.decision;
}

function fillsOf(outcome: CycleOutcome): ChunkFill[] {
  switch (outcome.status) {
    case 'executed':
    case 'partial':
    case 'failed':
      return outcome.report.fills;
    case 'cancelled':
      return outcome.report?.fills ?? [];
    default:
      return [];
  }
}

function detailOf(outcome: CycleOutcome): string | null {
  switch (outcome.status) {
    case 'no_decision':
      return outcome.error.message;
    case 'noop':
      return outcome.reason;
    case 'denied':
      return `${outcome.denial.reason}: ${outcome.denial.message}`;
    case 'cancelled':
      return `cancelled during ${outcome.stage}`;
    case 'partial':
    case 'failed':
      return outcome.report.failure?.error.message ?? null;
    default:
      return null;
  }
}

/** Stores one cycle outcome and its fills; returns the decision row id. */
export function recordCycleOutcome(outcome: CycleOutcome): number {
  const db = openDatabase();
  const decision = decisionOf(outcome);
  const insertDecision = db.prepare(
    `
      INSERT INTO decisions (
        token,
        venue,
        status,
        action,
        agreement_ratio,
        confidence,
        dissenting_count,
        responder_count,
        abstain_count,
        downgrade,
        signals_json,
        detail
      ) VALUES (
        @token,
        @venue,
        @status,
        @action,
        @agreementRatio,
        @confidence,
        @dissentingCount,
        @responderCount,
        @abstainCount,
        @downgrade,
        @signalsJson,
        @detail
      )
    `
  );
  const insertFill = db.prepare(
    `
      INSERT INTO fills (
        decision_id,
        venue,
        token,
        side,
        chunk_index,
        chunk_notional_usd,
        filled_notional_usd,
        filled_size,
        avg_price,
        order_id,
        reduce_only,
        realized_pnl_usd
      ) VALUES (
        @decisionId,
        @venue,
        @token,
        @side,
        @chunkIndex,
        @chunkNotionalUsd,
        @filledNotionalUsd,
        @filledSize,
        @avgPrice,
        @orderId,
        @reduceOnly,
        @realizedPnlUsd
      )
    `
  );

  const write = db.transaction((): number => {
    const result = insertDecision.run({
      token: outcome.token,
      venue: outcome.venue,
      status: outcome.status,
      action: decision?.action ?? null,
      agreementRatio: decision?.agreementRatio ?? null,
      confidence: decision?.confidence ?? null,
      dissentingCount: decision?.dissentingCount ?? null,
      responderCount: decision?.responderCount ?? null,
      abstainCount: decision?.abstainCount ?? null,
      downgrade: decision?.downgrade ?? null,
      signalsJson: decision ? JSON.stringify(decision.signals) : null,
      detail: detailOf(outcome),
    });
    const decisionId = Number(result.lastInsertRowid);
    for (const { chunk, fill, realizedPnlUsd } of fillsOf(outcome)) {
      insertFill.run({
        decisionId,
        venue: fill.venue,
        token: fill.token,
        side: fill.side,
        chunkIndex: chunk.index,
        chunkNotionalUsd: chunk.notionalUsd,
        filledNotionalUsd: fill.filledNotionalUsd,
        filledSize: fill.filledSize,
        avgPrice: fill.avgPrice,
        orderId: fill.orderId,
        reduceOnly: fill.reduceOnly ? 1 : 0,
        realizedPnlUsd,
      });
    }
    return decisionId;
  });
  return write();
}

const toAction = (value: unknown): SignalAction | null =>
  SIGNAL_ACTIONS.find((action) => action === value) ?? null;

function rowToDecision(row: Row): DecisionRecord {
  return {
    id: Number(row.id),
    createdAt: String(row.created_at ?? ''),
    token: String(row.token ?? ''),
    venue: String(row.venue ?? ''),
    status: String(row.status ?? ''),
    action: toAction(row.action),
    agreementRatio: nullableNumber(row.agreement_ratio),
    confidence: nullableNumber(row.confidence),
    dissentingCount: nullableNumber(row.dissenting_count),
    responderCount: nullableNumber(row.responder_count),
    abstainCount: nullableNumber(row.abstain_count),
    downgrade: nullableString(row.downgrade),
    detail: nullableString(row.detail),
  };
}

export function listDecisions(params?: {
  token?: string;
  status?: CycleStatus;
  limit?: number;
}): DecisionRecord[] {
  const db = openDatabase();
  const limit = Math.min(Math.max(params?.limit ?? 20, 1), 500);
  const token = params?.token?.toUpperCase() ?? null;
  const status = params?.status ?? null;
  const rows = db
    .prepare(
      `
        SELECT id,
               created_at,
               token,
               venue,
               status,
               action,
               agreement_ratio,
               confidence,
               dissenting_count,
               responder_count,
               abstain_count,
               downgrade,
               detail
        FROM decisions
        WHERE (? IS NULL OR token = ?)
          AND (? IS NULL OR status = ?)
        ORDER BY id DESC
        LIMIT ?
      `
    )
    .all(token, token, status, status, limit);
  return toRows(rows).map(rowToDecision);
}

export function listFills(decisionId: number): FillRecord[] {
  const db = openDatabase();
  const rows = db
    .prepare(
      `
        SELECT id,
               decision_id,
               created_at,
               venue,
               token,
               side,
               chunk_index,
               chunk_notional_usd,
               filled_notional_usd,
               filled_size,
               avg_price,
               order_id,
               reduce_only,
               realized_pnl_usd
        FROM fills
        WHERE decision_id = ?
        ORDER BY chunk_index ASC
      `
    )
    .all(decisionId);
  return toRows(rows).map((row) => ({
    id: Number(row.id),
    decisionId: Number(row.decision_id),
    createdAt: String(row.created_at ?? ''),
    venue: String(row.venue ?? ''),
    token: String(row.token ?? ''),
    side: row.side === 'sell' ? 'sell' : 'buy',
    chunkIndex: Number(row.chunk_index ?? 0),
    chunkNotionalUsd: Number(row.chunk_notional_usd ?? 0),
    filledNotionalUsd: Number(row.filled_notional_usd ?? 0),
    filledSize: Number(row.filled_size ?? 0),
    avgPrice: Number(row.avg_price ?? 0),
    orderId: nullableString(row.order_id),
    reduceOnly: Number(row.reduce_only ?? 0) === 1,
    realizedPnlUsd: Number(row.realized_pnl_usd ?? 0),
  }));
}
