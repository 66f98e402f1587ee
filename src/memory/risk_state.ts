import { z } from 'zod';

import type { RiskState } from '../types/index.js';
import { openDatabase } from './db.js';
import { nullableString, toRows } from './rows.js';

const RiskStateSchema = z.object({
  realizedPnlUsd: z.number(),
  accumulatedLossUsd: z.number(),
  balanceUsd: z.number(),
  equityUsd: z.number(),
  tripped: z.boolean(),
  tripReason: z.enum(['MaxLossExceeded', 'Manual']).nullable(),
  trippedAt: z.string().nullable(),
});

export type RiskEventKind = 'denied' | 'clamped' | 'tripped' | 'reset';

export interface RiskEventInput {
  kind: RiskEventKind;
  token?: string | null;
  reason?: string | null;
  message?: string | null;
  payload?: unknown;
}

export interface RiskEventRecord {
  id: number;
  createdAt: string;
  kind: string;
  token: string | null;
  reason: string | null;
  message: string | null;
  payloadJson: string | null;
}

export function saveRiskState(state: RiskState): void {
  const db = openDatabase();
  db.prepare(
    `
      INSERT INTO risk_state (id, state_json, updated_at)
      VALUES (1, @stateJson, datetime('now'))
      ON CONFLICT(id) DO UPDATE SET
        state_json = excluded.state_json,
        updated_at = excluded.updated_at
    `
  ).run({ stateJson: JSON.stringify(state) });
}

/** Last persisted state, or null when none is stored or the row no longer parses. */
export function loadRiskState(): RiskState | null {
  const db = openDatabase();
  const [row] = toRows([db.prepare('SELECT state_json FROM risk_state WHERE id = 1').get()]);
  if (!row || typeof row.state_json !== 'string') return null;
  let raw: unknown;
  try {
    raw = JSON.parse(row.state_json);
  } catch {
    return null;
  }
  const parsed = RiskStateSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function recordRiskEvent(event: RiskEventInput): void {
  const db = openDatabase();
  db.prepare(
    `
      INSERT INTO risk_events (kind, token, reason, message, payload_json)
      VALUES (@kind, @token, @reason, @message, @payloadJson)
    `
  ).run({
    kind: event.kind,
    token: event.token ?? null,
    reason: event.reason ?? null,
    message: event.message ?? null,
    payloadJson: event.payload === undefined ? null : JSON.stringify(event.payload),
  });
}

export function listRiskEvents(limit = 20): RiskEventRecord[] {
  const db = openDatabase();
  const bounded = Math.min(Math.max(limit, 1), 500);
  const rows = db
    .prepare(
      `
        SELECT id, created_at, kind, token, reason, message, payload_json
        FROM risk_events
        ORDER BY id DESC
        LIMIT ?
      `
    )
    .all(bounded);
  return toRows(rows).map((row) => ({
    id: Number(row.id),
    createdAt: String(row.created_at ?? ''),
    kind: String(row.kind ?? ''),
    token: nullableString(row.token),
    reason: nullableString(row.reason),
    message: nullableString(row.message),
    payloadJson: nullableString(row.payload_json),
  }));
}
