#!/usr/bin/env node
import 'dotenv/config';
/**
 * swarm-trader CLI
 *
 * Runs decision cycles and inspects risk state, positions and the decision journal.
 */

import { Command } from 'commander';

import { VERSION, createTradingCore } from '../index.js';
import { loadConfig, type SwarmTraderConfig } from '../core/config.js';
import type { CycleOutcome } from '../core/cycle.js';
import { describeCause } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { PositionTracker } from '../execution/positions.js';
import { createVenues } from '../execution/venues/index.js';
import { setDatabasePath } from '../memory/db.js';
import { listDecisions, listFills } from '../memory/decisions.js';
import { listRiskEvents, loadRiskState, recordRiskEvent, saveRiskState } from '../memory/risk_state.js';
import { RiskGate } from '../risk/gate.js';
import { listAdvisorySources } from '../signals/registry.js';

const program = new Command();
const config = loadConfig();
setDatabasePath(config.memory.dbPath);
const logger = new Logger(config.logging.level);

program
  .name('swarm-trader')
  .description('Multi-source consensus trading with risk-gated execution')
  .version(VERSION);

function formatUsd(value: number | null | undefined): string {
  return value == null ? '-' : `$${value.toFixed(2)}`;
}

function describeOutcome(outcome: CycleOutcome): string {
  switch (outcome.status) {
    case 'no_decision':
      return `no decision (${outcome.error.message})`;
    case 'hold':
      return `HOLD (ratio=${outcome.decision.agreementRatio.toFixed(2)}${
        outcome.decision.downgrade ? `, ${outcome.decision.downgrade}` : ''
      })`;
    case 'noop':
      return `${outcome.decision.action} no-op (${outcome.reason}, position ${outcome.position.side})`;
    case 'denied':
      return `${outcome.decision.action} denied: ${outcome.denial.reason}`;
    case 'cancelled':
      return `cancelled during ${outcome.stage}`;
    case 'executed':
    case 'partial':
    case 'failed': {
      const { report } = outcome;
      const failure = report.failure ? ` (${report.failure.error.message})` : '';
      return `${outcome.decision.action} ${outcome.status}: ${report.fills.length}/${report.plan.chunks.length} chunks, ${formatUsd(report.filledNotionalUsd)} filled${failure}`;
    }
  }
}

// ============================================================================
// Run
// ============================================================================

program
  .command('run <tokens...>')
  .description('Run one decision cycle per token, concurrently')
  .option('-v, --venue <id>', 'Venue id (defaults to execution.venue)')
  .option('--no-persist', 'Skip the SQLite journal and persisted risk state')
  .action(async (tokens: string[], options: { venue?: string; persist: boolean }) => {
    const core = await createTradingCore(config, { logger, persist: options.persist });
    const controller = new AbortController();
    const onSigint = () => {
      logger.warn('Interrupt received; cancelling cycles before their next order');
      controller.abort();
    };
    process.once('SIGINT', onSigint);

    const results = await Promise.allSettled(
      tokens.map((token) => core.cycle.run(token, { venueId: options.venue, signal: controller.signal }))
    );
    process.off('SIGINT', onSigint);
    core.detachJournal?.();

    console.log('Cycle Results');
    console.log('─'.repeat(80));
    let failed = false;
    results.forEach((result, index) => {
      const token = (tokens[index] ?? '').toUpperCase();
      if (result.status === 'fulfilled') {
        console.log(`${token} | ${result.value.venue} | ${describeOutcome(result.value)}`);
      } else {
        failed = true;
        console.log(`${token} | error | ${describeCause(result.reason)}`);
      }
    });
    if (failed) {
      process.exitCode = 1;
    }
  });

// ============================================================================
// Risk Commands
// ============================================================================

const risk = program.command('risk').description('Circuit breaker state');

function createOfflineGate(cfg: SwarmTraderConfig): RiskGate {
  return new RiskGate({
    limits: cfg.risk,
    exposure: new PositionTracker(),
    initialBalanceUsd: 0,
    logger,
  });
}

risk
  .command('status')
  .description('Show persisted risk state and recent risk events')
  .option('-l, --limit <number>', 'Number of events', '10')
  .action((options: { limit: string }) => {
    const state = loadRiskState();
    console.log('Risk State');
    console.log('─'.repeat(60));
    if (!state) {
      console.log('No persisted state (breaker normal).');
    } else {
      console.log(`Tripped:          ${state.tripped ? `YES (${state.tripReason ?? '-'})` : 'no'}`);
      if (state.trippedAt) console.log(`Tripped at:       ${state.trippedAt}`);
      console.log(`Realized PnL:     ${formatUsd(state.realizedPnlUsd)}`);
      console.log(`Accumulated loss: ${formatUsd(state.accumulatedLossUsd)} / ${formatUsd(config.risk.maxLossUsd)}`);
      console.log(`Last balance:     ${formatUsd(state.balanceUsd)}`);
    }
    const events = listRiskEvents(Number(options.limit));
    if (events.length > 0) {
      console.log('\nRecent Events');
      console.log('─'.repeat(60));
      for (const event of events) {
        console.log(
          `${event.createdAt} | ${event.kind} | ${event.token ?? '-'} | ${event.reason ?? '-'} | ${event.message ?? ''}`
        );
      }
    }
  });

risk
  .command('reset')
  .description('Return the circuit breaker to normal and start a fresh loss window')
  .action(async () => {
    const gate = createOfflineGate(config);
    const stored = loadRiskState();
    if (stored) await gate.restore(stored);
    const state = await gate.reset();
    saveRiskState(state);
    recordRiskEvent({ kind: 'reset', message: 'Reset from CLI', payload: state });
    console.log('Circuit breaker reset.');
  });

risk
  .command('trip')
  .description('Trip the circuit breaker manually (kill switch)')
  .option('-m, --message <message>', 'Reason to record', 'Tripped from CLI')
  .action(async (options: { message: string }) => {
    const gate = createOfflineGate(config);
    const stored = loadRiskState();
    if (stored) await gate.restore(stored);
    const state = await gate.trip('Manual', options.message);
    saveRiskState(state);
    recordRiskEvent({ kind: 'tripped', reason: 'Manual', message: options.message, payload: state });
    console.log('Circuit breaker tripped. New orders are denied until `swarm-trader risk reset`.');
  });

// ============================================================================
// Venue Commands
// ============================================================================

program
  .command('positions')
  .description('Show venue-reported positions for the configured tokens')
  .option('-v, --venue <id>', 'Venue id (defaults to execution.venue)')
  .option('-t, --token <token...>', 'Tokens (defaults to config tokens)')
  .action(async (options: { venue?: string; token?: string[] }) => {
    const venues = createVenues(config, { logger });
    const venueId = options.venue ?? config.execution.venue;
    const venue = venues.get(venueId);
    if (!venue) {
      console.log(`Unknown venue: ${venueId}`);
      process.exitCode = 1;
      return;
    }
    console.log(`Positions on ${venue.id} (${venue.capabilities.kind})`);
    console.log('─'.repeat(80));
    for (const token of options.token ?? config.tokens) {
      const position = await venue.getPosition(token);
      console.log(
        `${position.token} | ${position.side} | size=${position.size} | notional=${formatUsd(position.notionalUsd)} | entry=${position.entryPrice}`
      );
    }
  });

program
  .command('account')
  .description('Show venue account balance and equity')
  .option('-v, --venue <id>', 'Venue id (defaults to execution.venue)')
  .action(async (options: { venue?: string }) => {
    const venues = createVenues(config, { logger });
    const venueId = options.venue ?? config.execution.venue;
    const venue = venues.get(venueId);
    if (!venue) {
      console.log(`Unknown venue: ${venueId}`);
      process.exitCode = 1;
      return;
    }
    const account = await venue.getAccount();
    console.log(`${account.venue}: balance=${formatUsd(account.balanceUsd)} equity=${formatUsd(account.equityUsd)}`);
  });

// ============================================================================
// Journal Commands
// ============================================================================

const decisions = program.command('decisions').description('Decision journal');

decisions
  .command('list')
  .description('List recent decision cycles')
  .option('-t, --token <token>', 'Filter by token')
  .option('-l, --limit <number>', 'Limit results', '20')
  .option('--fills', 'Include fills per decision', false)
  .action((options: { token?: string; limit: string; fills: boolean }) => {
    const records = listDecisions({ token: options.token, limit: Number(options.limit) });
    console.log('Recent Decisions');
    console.log('─'.repeat(80));
    for (const record of records) {
      const ratio = record.agreementRatio == null ? '-' : record.agreementRatio.toFixed(2);
      const confidence = record.confidence == null ? '-' : record.confidence.toFixed(0);
      console.log(
        `${record.id} | ${record.createdAt} | ${record.token} | ${record.venue} | ${record.status} | ${record.action ?? '-'} | ratio=${ratio} | conf=${confidence}${
          record.detail ? ` | ${record.detail}` : ''
        }`
      );
      if (options.fills) {
        for (const fill of listFills(record.id)) {
          console.log(
            `    #${fill.chunkIndex + 1} ${fill.side} ${formatUsd(fill.filledNotionalUsd)} @ ${fill.avgPrice} (pnl ${formatUsd(fill.realizedPnlUsd)})`
          );
        }
      }
    }
  });

program
  .command('sources')
  .description('List advisory sources and whether they are polled')
  .action(() => {
    console.log(`Advisory Sources (mode ${config.signals.mode})`);
    console.log('─'.repeat(80));
    for (const source of listAdvisorySources(config)) {
      console.log(
        `${source.name} | ${source.provider}:${source.model} | ${source.active ? 'active' : 'idle'} | ${
          source.configured ? 'configured' : 'missing credentials'
        }`
      );
    }
  });

// ============================================================================
// Parse and Run
// ============================================================================

program.parseAsync().catch((error: unknown) => {
  logger.error('Command failed', error);
  process.exitCode = 1;
});
