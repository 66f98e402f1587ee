import type { DecisionCycle, CycleOutcome } from '../core/cycle.js';
import { Logger } from '../core/logger.js';
import type { RiskGate } from '../risk/gate.js';
import type { RiskApproval, RiskDenial, RiskState, RiskTripReason } from '../types/index.js';
import { recordCycleOutcome } from './decisions.js';
import { recordRiskEvent, saveRiskState } from './risk_state.js';

/**
 * Writes cycle outcomes, fills and risk events to the store as they happen.
 * A failed write is logged and never interrupts trading. Returns a detach
 * function.
 */
export function attachJournal(params: {
  cycle: DecisionCycle;
  risk: RiskGate;
  persistRiskState?: boolean;
  logger?: Logger;
}): () => void {
  const { cycle, risk } = params;
  const logger = params.logger ?? new Logger('info');
  const persistState = params.persistRiskState ?? true;

  const guarded =
    <A extends unknown[]>(label: string, write: (...args: A) => void) =>
    (...args: A): void => {
      try {
        write(...args);
      } catch (error) {
        logger.error(`Failed to persist ${label}`, error);
      }
    };

  const onOutcome = guarded('cycle outcome', (outcome: CycleOutcome) => {
    recordCycleOutcome(outcome);
    if (persistState) saveRiskState(risk.snapshot());
  });
  const onDenied = guarded('risk denial', (denial: RiskDenial) => {
    recordRiskEvent({
      kind: 'denied',
      token: denial.token,
      reason: denial.reason,
      message: denial.message,
      payload: { requestedNotionalUsd: denial.requestedNotionalUsd },
    });
  });
  const onClamped = guarded('risk clamp', (approval: RiskApproval) => {
    recordRiskEvent({
      kind: 'clamped',
      token: approval.token,
      reason: approval.clampedBy.join(','),
      payload: {
        requestedNotionalUsd: approval.requestedNotionalUsd,
        approvedNotionalUsd: approval.approvedNotionalUsd,
      },
    });
  });
  const onTripped = guarded('circuit breaker trip', (reason: RiskTripReason, state: RiskState) => {
    recordRiskEvent({ kind: 'tripped', reason, payload: state });
    if (persistState) saveRiskState(state);
  });
  const onReset = guarded('circuit breaker reset', (state: RiskState) => {
    recordRiskEvent({ kind: 'reset', payload: state });
    if (persistState) saveRiskState(state);
  });

  cycle.on('outcome', onOutcome);
  risk.on('denied', onDenied);
  risk.on('clamped', onClamped);
  risk.on('tripped', onTripped);
  risk.on('reset', onReset);

  return () => {
    cycle.off('outcome', onOutcome);
    risk.off('denied', onDenied);
    risk.off('clamped', onClamped);
    risk.off('tripped', onTripped);
    risk.off('reset', onReset);
  };
}
