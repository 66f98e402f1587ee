import { describe, it, expect, vi } from 'vitest';

import type { RiskState } from '../../src/types/index.js';
import { RiskGate, type RiskLimits } from '../../src/risk/gate.js';
import { quietLogger, testConfig } from '../fixtures.js';

function limits(raw: Record<string, unknown> = {}): RiskLimits {
  return testConfig({ risk: raw }).risk;
}

function gate(
  raw: Record<string, unknown> = {},
  options: { balance?: number; exposure?: Record<string, number> } = {}
): RiskGate {
  const exposure = options.exposure ?? {};
  return new RiskGate({
    limits: limits(raw),
    exposure: { exposureUsd: (token) => exposure[token] ?? 0 },
    initialBalanceUsd: options.balance ?? 1000,
    logger: quietLogger,
    now: () => new Date('2026-01-01T00:00:00.000Z'),
  });
}

describe('RiskGate', () => {
  it('denies an order that would breach the minimum balance', async () => {
    const risk = gate({ minimumBalanceUsd: 400 }, { balance: 500 });
    const denied = vi.fn();
    risk.on('denied', denied);

    const result = await risk.evaluate(150, 'btc');

    expect(result).toEqual({
      approved: false,
      token: 'BTC',
      requestedNotionalUsd: 150,
      reason: 'BelowMinimumBalance',
      message: 'Projected balance $350.00 below minimum $400.00',
    });
    expect(denied).toHaveBeenCalledTimes(1);
  });

  it('clamps to the equity share net of existing exposure', async () => {
    const risk = gate({ maxPositionPercentage: 20 }, { exposure: { BTC: 150 } });

    const result = await risk.evaluate(100, 'BTC');

    expect(result.approved).toBe(true);
    if (result.approved) {
      expect(result.approvedNotionalUsd).toBe(50);
      expect(result.clampedBy).toEqual(['maxPositionPercentage']);
    }
  });

  it('clamps to a per-token cap', async () => {
    const risk = gate({ tokenCaps: { ETH: 30 } });
    const clamped = vi.fn();
    risk.on('clamped', clamped);

    const result = await risk.evaluate(100, 'ETH');

    expect(result.approved && result.approvedNotionalUsd).toBe(30);
    expect(result.approved && result.clampedBy).toEqual(['tokenCap']);
    expect(clamped).toHaveBeenCalledTimes(1);
  });

  it('holds approved notional until the approval is settled', async () => {
    const risk = gate({ minimumBalanceUsd: 50, maxPositionPercentage: 100 }, { balance: 200 });

    const first = await risk.evaluate(100, 'BTC');
    expect(risk.reservedUsd()).toBe(100);
    const second = await risk.evaluate(100, 'ETH');
    expect(second.approved).toBe(false);

    if (!first.approved) throw new Error('expected approval');
    await risk.settle(first);
    expect(risk.reservedUsd()).toBe(0);
    expect((await risk.evaluate(100, 'ETH')).approved).toBe(true);
  });

  it('trips only when the loss exceeds the limit', async () => {
    const risk = gate({ maxLossUsd: 25 });
    const tripped = vi.fn();
    risk.on('tripped', tripped);

    await risk.recordOutcome(-10);
    const atLimit = await risk.recordOutcome(-15);
    expect(atLimit.accumulatedLossUsd).toBe(25);
    expect(atLimit.tripped).toBe(false);

    const over = await risk.recordOutcome(-5);
    expect(over).toMatchObject({
      realizedPnlUsd: -30,
      accumulatedLossUsd: 30,
      tripped: true,
      tripReason: 'MaxLossExceeded',
      trippedAt: '2026-01-01T00:00:00.000Z',
    });
    expect(tripped).toHaveBeenCalledWith('MaxLossExceeded', expect.objectContaining({ tripped: true }));

    const denial = await risk.evaluate(10, 'BTC');
    expect(denial.approved === false && denial.reason).toBe('CircuitBreakerTripped');
  });

  it('lets gains offset earlier losses', async () => {
    const risk = gate({ maxLossUsd: 25 });

    await risk.recordOutcome(-20);
    const state = await risk.recordOutcome(12);

    expect(state.realizedPnlUsd).toBe(-8);
    expect(state.accumulatedLossUsd).toBe(8);
  });

  it('approves reduce-only orders in full regardless of balance', async () => {
    const risk = gate({ minimumBalanceUsd: 50, tokenCaps: { BTC: 1 } }, { balance: 10 });

    const result = await risk.evaluate(80, 'BTC', { reduceOnly: true });

    expect(result).toMatchObject({ approved: true, approvedNotionalUsd: 80, reduceOnly: true, clampedBy: [] });
    expect(risk.reservedUsd()).toBe(0);
  });

  it('denies reduce-only orders while tripped', async () => {
    const risk = gate();
    await risk.trip('Manual', 'operator stop');

    const result = await risk.evaluate(80, 'BTC', { reduceOnly: true });

    expect(result).toMatchObject({
      approved: false,
      reason: 'CircuitBreakerTripped',
      message: 'Circuit breaker tripped (Manual) at 2026-01-01T00:00:00.000Z',
    });
  });

  it('returns to normal only through reset', async () => {
    const risk = gate({ maxLossUsd: 5 });
    const reset = vi.fn();
    risk.on('reset', reset);
    await risk.recordOutcome(-10);
    expect(risk.isTripped()).toBe(true);

    await risk.recordOutcome(20);
    expect(risk.isTripped()).toBe(true);

    const state = await risk.reset();
    expect(state).toMatchObject({
      realizedPnlUsd: 0,
      accumulatedLossUsd: 0,
      tripped: false,
      tripReason: null,
      trippedAt: null,
    });
    expect(reset).toHaveBeenCalledTimes(1);
  });

  it('keeps a restored trip sticky', async () => {
    const risk = gate();
    const stored: RiskState = {
      realizedPnlUsd: -40,
      accumulatedLossUsd: 40,
      balanceUsd: 900,
      equityUsd: 900,
      tripped: true,
      tripReason: 'MaxLossExceeded',
      trippedAt: '2025-12-31T00:00:00.000Z',
    };

    await risk.restore(stored);

    expect(risk.snapshot()).toEqual(stored);
    expect((await risk.evaluate(10, 'BTC')).approved).toBe(false);
  });

  it('rejects a non-positive request', async () => {
    await expect(gate().evaluate(0, 'BTC')).rejects.toThrow(
      'Requested notional must be a positive number, got 0'
    );
  });
});
