import type { MarketContext, Signal } from '../types/index.js';
import type { SwarmTraderConfig } from '../core/config.js';
import { withTimeout } from '../core/async.js';
import {
  AbstainError,
  CycleCancelledError,
  InsufficientSignalsError,
  InvalidSignalError,
  isAbstain,
  type SignalOutcome,
} from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { parseVote } from './parse.js';
import type { AdvisorySource } from './source.js';

export type AggregatorSettings = Pick<
  SwarmTraderConfig['signals'],
  'minimumResponders' | 'perSourceTimeoutMs' | 'roundTimeoutMs'
>;

export interface SignalRound {
  token: string;
  outcomes: SignalOutcome[];
  signals: Signal[];
  abstains: AbstainError[];
}

/**
 * Fans one market context out to every source in parallel and collects
 * exactly one outcome per source, in source order. A source that errors,
 * returns an invalid vote, or misses its window becomes an abstention.
 */
export class SignalAggregator {
  private logger: Logger;
  private now: () => number;

  constructor(
    private settings: AggregatorSettings,
    options: { logger?: Logger; now?: () => number } = {}
  ) {
    this.logger = options.logger ?? new Logger('info');
    this.now = options.now ?? Date.now;
  }

  async collect(
    context: MarketContext,
    sources: readonly AdvisorySource[],
    options: { signal?: AbortSignal } = {}
  ): Promise<SignalRound> {
    const parent = options.signal;
    if (parent?.aborted) {
      throw new CycleCancelledError('signals');
    }

    const timeoutMs = Math.min(this.settings.perSourceTimeoutMs, this.settings.roundTimeoutMs);
    const controllers = sources.map(() => new AbortController());
    const abortAll = () => {
      for (const controller of controllers) controller.abort();
    };

    let rejectCancelled: (error: Error) => void = () => undefined;
    const cancelled = new Promise<never>((_, reject) => {
      rejectCancelled = reject;
    });
    cancelled.catch(() => undefined);
    const onParentAbort = () => {
      abortAll();
      rejectCancelled(new CycleCancelledError('signals'));
    };
    parent?.addEventListener('abort', onParentAbort, { once: true });

    const round = Promise.all(
      sources.map((source, index) => {
        const controller = controllers[index] ?? new AbortController();
        return this.ask(source, context, controller, timeoutMs);
      })
    );

    let outcomes: SignalOutcome[];
    try {
      outcomes = await Promise.race([round, cancelled]);
    } finally {
      parent?.removeEventListener('abort', onParentAbort);
    }

    const signals = outcomes.filter((outcome): outcome is Signal => !isAbstain(outcome));
    const abstains = outcomes.filter(isAbstain);
    const required = Math.max(1, this.settings.minimumResponders);

    this.logger.info(`Signal round for ${context.token}`, {
      responders: signals.length,
      abstains: abstains.map((a) => `${a.source}:${a.reason}`),
    });

    if (signals.length < required) {
      throw new InsufficientSignalsError(signals.length, required, outcomes);
    }
    return { token: context.token, outcomes, signals, abstains };
  }

  private async ask(
    source: AdvisorySource,
    context: MarketContext,
    controller: AbortController,
    timeoutMs: number
  ): Promise<SignalOutcome> {
    const started = this.now();
    try {
      const raw = await withTimeout(
        source.advise(context, { signal: controller.signal }),
        timeoutMs,
        () => {
          controller.abort();
          return new AbstainError(source.name, 'timeout', timeoutMs);
        }
      );
      const vote = parseVote(source.name, raw);
      return { ...vote, source: source.name, latencyMs: this.now() - started };
    } catch (error) {
      const latencyMs = this.now() - started;
      if (error instanceof AbstainError) {
        this.logger.warn(error.message);
        return error;
      }
      const reason = error instanceof InvalidSignalError ? 'invalid' : 'error';
      const abstain = new AbstainError(source.name, reason, latencyMs, error);
      this.logger.warn(abstain.message);
      return abstain;
    }
  }
}
