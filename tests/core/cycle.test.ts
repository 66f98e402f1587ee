import { describe, it, expect } from 'vitest';

import type { ChunkFill, RiskEvaluation, SignalAction } from '../../src/types/index.js';
import { DecisionCycle, type CycleOutcome } from '../../src/core/cycle.js';
import { UnsupportedOperationError, RejectedByVenueError } from '../../src/core/errors.js';
import { PositionTracker } from '../../src/execution/positions.js';
import { OrderRouter } from '../../src/execution/router.js';
import { SPOT_CAPABILITIES } from '../../src/execution/venue.js';
import { RiskGate } from '../../src/risk/gate.js';
import { SignalAggregator } from '../../src/signals/aggregator.js';
import { ConsensusEngine } from '../../src/signals/consensus.js';
import type { AdvisorySource } from '../../src/signals/source.js';
import { context, fixedSource, position, quietLogger, ScriptedVenue, testConfig } from '../fixtures.js';

function voters(...actions: SignalAction[]): AdvisorySource[] {
  return actions.map((action, index) => fixedSource(`source-${index + 1}`, { action, confidence: 70, rationale: '' }));
}

function harness(
  sources: AdvisorySource[],
  options: { venue?: ScriptedVenue; risk?: Record<string, unknown>; sizing?: Record<string, unknown> } = {}
) {
  const config = testConfig({ risk: options.risk ?? {}, sizing: options.sizing ?? {} });
  const venue = options.venue ?? new ScriptedVenue();
  const tracker = new PositionTracker();
  const risk = new RiskGate({ limits: config.risk, exposure: tracker, initialBalanceUsd: 1000, logger: quietLogger });
  const router = new OrderRouter({
    sizing: config.sizing,
    venues: new Map([[venue.id, venue]]),
    tracker,
    logger: quietLogger,
  });
  const cycle = new DecisionCycle({
    context: { getContext: async (token) => context(token) },
    sources,
    aggregator: new SignalAggregator(
      { minimumResponders: 1, perSourceTimeoutMs: 50, roundTimeoutMs: 100 },
      { logger: quietLogger }
    ),
    consensus: new ConsensusEngine({ minimumAgreementRatio: 0.5 }, { logger: quietLogger }),
    risk,
    router,
    tracker,
    defaultVenue: venue.id,
    logger: quietLogger,
  });
  const fills: ChunkFill[] = [];
  const evaluations: RiskEvaluation[] = [];
  const outcomes: CycleOutcome[] = [];
  const events = { fills, risk: evaluations, outcomes };
  cycle.on('fill', (fill) => events.fills.push(fill));
  cycle.on('risk', (evaluation) => events.risk.push(evaluation));
  cycle.on('outcome', (outcome) => events.outcomes.push(outcome));
  return { cycle, venue, tracker, risk, events };
}

describe('DecisionCycle', () => {
  it('opens a position in chunks on a BUY consensus', async () => {
    const { cycle, venue, tracker, risk, events } = harness(voters('BUY', 'BUY', 'SELL'));

    const outcome = await cycle.run('btc');

    expect(outcome.status).toBe('executed');
    if (outcome.status !== 'executed') return;
    expect(outcome.token).toBe('BTC');
    expect(outcome.venue).toBe('test-perp');
    expect(outcome.approval.approvedNotionalUsd).toBe(25);
    expect(outcome.report.plan.chunks.map((c) => c.notionalUsd)).toEqual([10, 10, 5]);
    expect(venue.calls.map((c) => c.operation)).toEqual(['marketBuy', 'marketBuy', 'marketBuy']);
    expect(tracker.get('test-perp', 'BTC').side).toBe('LONG');
    expect(events.fills).toHaveLength(3);
    expect(events.risk).toHaveLength(1);
    expect(events.outcomes).toEqual([outcome]);
    expect(risk.reservedUsd()).toBe(0);
  });

  it('holds on a tie without touching the venue', async () => {
    const { cycle, venue } = harness(voters('BUY', 'SELL'));

    const outcome = await cycle.run('BTC');

    expect(outcome.status).toBe('hold');
    expect(outcome.status === 'hold' && outcome.decision.downgrade).toBe('TIE');
    expect(venue.calls).toEqual([]);
  });

  it('reports no decision when every source abstains', async () => {
    const { cycle } = harness([fixedSource('a', new Error('down')), fixedSource('b', new Error('down'))]);

    const outcome = await cycle.run('BTC');

    expect(outcome.status).toBe('no_decision');
    if (outcome.status !== 'no_decision') return;
    expect(outcome.outcomes).toHaveLength(2);
    expect(outcome.error.responders).toBe(0);
  });

  it('returns the risk denial while the breaker is tripped', async () => {
    const { cycle, risk, venue } = harness(voters('BUY'));
    await risk.trip('Manual', 'halt');

    const outcome = await cycle.run('BTC');

    expect(outcome.status).toBe('denied');
    expect(outcome.status === 'denied' && outcome.denial.reason).toBe('CircuitBreakerTripped');
    expect(venue.calls).toEqual([]);
  });

  it('adopts the venue position and skips a matching signal', async () => {
    const venue = new ScriptedVenue();
    venue.positions.set('BTC', position('LONG', 25));
    const { cycle, tracker } = harness(voters('BUY'), { venue });

    const outcome = await cycle.run('BTC');

    expect(outcome.status).toBe('noop');
    expect(outcome.status === 'noop' && outcome.reason).toBe('position_matches');
    expect(tracker.get('test-perp', 'BTC').notionalUsd).toBe(25);
    expect(venue.calls).toEqual([]);
  });

  it('closes an opposing position and records the realized loss', async () => {
    const venue = new ScriptedVenue('test-perp', { price: 80 });
    venue.positions.set('BTC', position('LONG', 25));
    const { cycle, tracker, risk } = harness(voters('SELL', 'SELL'), { venue });

    const outcome = await cycle.run('BTC');

    expect(outcome.status).toBe('executed');
    if (outcome.status !== 'executed') return;
    expect(outcome.approval.reduceOnly).toBe(true);
    expect(outcome.report.fills).toHaveLength(2);
    expect(outcome.report.realizedPnlUsd).toBe(-5);
    expect(venue.calls.map((c) => [c.operation, c.options?.reduceOnly])).toEqual([
      ['marketSell', true],
      ['marketSell', true],
    ]);
    expect(tracker.get('test-perp', 'BTC').side).toBe('FLAT');
    expect(risk.snapshot()).toMatchObject({ realizedPnlUsd: -5, accumulatedLossUsd: 5, tripped: false });
  });

  it('throws when asked to open a short on a long-only venue', async () => {
    const venue = new ScriptedVenue('paper-spot', { capabilities: SPOT_CAPABILITIES });
    const { cycle } = harness(voters('SELL'), { venue });

    await expect(cycle.run('BTC')).rejects.toBeInstanceOf(UnsupportedOperationError);
  });

  it('skips opening a short under the long-only policy', async () => {
    const { cycle } = harness(voters('SELL'), { sizing: { longOnly: true } });

    const outcome = await cycle.run('BTC');

    expect(outcome.status === 'noop' && outcome.reason).toBe('policy');
  });

  it('treats a zero-sized approval as a no-op', async () => {
    const { cycle, venue } = harness(voters('BUY'), { risk: { tokenCaps: { BTC: 0 } } });

    const outcome = await cycle.run('BTC');

    expect(outcome.status === 'noop' && outcome.reason).toBe('clamped_to_zero');
    expect(venue.calls).toEqual([]);
  });

  it('reports a partial execution when a later chunk fails', async () => {
    const venue = new ScriptedVenue('test-perp', {
      failOn: (index) => (index === 2 ? new RejectedByVenueError('test-perp', 'marketBuy', 'margin') : null),
    });
    const { cycle, risk } = harness(voters('BUY'), { venue });

    const outcome = await cycle.run('BTC');

    expect(outcome.status).toBe('partial');
    if (outcome.status !== 'partial') return;
    expect(outcome.report.fills).toHaveLength(2);
    expect(outcome.report.failure?.chunk.index).toBe(2);
    expect(risk.reservedUsd()).toBe(0);
  });

  it('does nothing once cancelled before it starts', async () => {
    const controller = new AbortController();
    controller.abort();
    const { cycle, venue } = harness(voters('BUY'));

    const outcome = await cycle.run('BTC', { signal: controller.signal });

    expect(outcome).toMatchObject({ status: 'cancelled', stage: 'context', decision: null, report: null });
    expect(venue.calls).toEqual([]);
  });

  it('stops between chunks when cancelled mid-execution', async () => {
    const controller = new AbortController();
    const venue = new ScriptedVenue('test-perp', { onCall: () => controller.abort() });
    const { cycle, risk } = harness(voters('BUY'), { venue });

    const outcome = await cycle.run('BTC', { signal: controller.signal });

    expect(outcome.status).toBe('cancelled');
    if (outcome.status !== 'cancelled') return;
    expect(outcome.stage).toBe('execution');
    expect(outcome.report?.fills).toHaveLength(1);
    expect(venue.calls).toHaveLength(1);
    expect(risk.reservedUsd()).toBe(0);
  });

  it('lets only one of two concurrent cycles on a token open the position', async () => {
    const { cycle, venue, tracker, risk } = harness(voters('BUY', 'BUY'), { risk: { maxPositionPercentage: 3 } });

    const outcomes = await Promise.all([cycle.run('BTC'), cycle.run('btc')]);

    expect(outcomes.map((o) => o.status).sort()).toEqual(['executed', 'noop']);
    const skipped = outcomes.find((o) => o.status === 'noop');
    expect(skipped?.status === 'noop' && skipped.reason).toBe('position_matches');
    expect(venue.calls).toHaveLength(3);
    expect(tracker.get('test-perp', 'BTC').notionalUsd).toBeCloseTo(25, 9);
    expect(risk.reservedUsd()).toBe(0);
  });

  it('holds the position lock from position read through execution', async () => {
    const lockedAt: string[] = [];
    let isLocked = (): boolean => false;
    class ObservedVenue extends ScriptedVenue {
      async getPosition(token: string) {
        if (isLocked()) lockedAt.push('getPosition');
        return super.getPosition(token);
      }
    }
    const venue = new ObservedVenue('test-perp', {
      onCall: (_, call) => {
        if (isLocked()) lockedAt.push(call.operation);
      },
    });
    const { cycle, tracker } = harness(voters('BUY'), { venue });
    isLocked = () => tracker.isLocked('test-perp', 'BTC');

    const outcome = await cycle.run('BTC');

    expect(outcome.status).toBe('executed');
    expect(lockedAt).toEqual(['getPosition', 'marketBuy', 'marketBuy', 'marketBuy']);
    expect(tracker.isLocked('test-perp', 'BTC')).toBe(false);
  });

  it('rejects an unknown venue id', async () => {
    const { cycle } = harness(voters('BUY'));

    await expect(cycle.run('BTC', { venueId: 'nowhere' })).rejects.toThrow('Unknown venue: nowhere');
  });
});
