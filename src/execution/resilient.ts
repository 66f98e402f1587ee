import { randomUUID } from 'node:crypto';

import type { AccountSnapshot, FillResult, Position } from '../types/index.js';
import { retryWithBackoff, withTimeout, type BackoffPolicy } from '../core/async.js';
import {
  TradingCoreError,
  VenueTimeoutError,
  VenueUnavailableError,
  describeCause,
  type VenueOperation,
} from '../core/errors.js';
import { Logger } from '../core/logger.js';
import type { OrderOptions, VenueAdapter, VenueCapabilities } from './venue.js';

export interface ResilientVenueOptions {
  callTimeoutMs: number;
  retry: BackoffPolicy;
  logger?: Logger;
}

/**
 * Bounds every venue call with a timeout and retries retryable failures
 * (timeouts, unavailability) with capped exponential backoff. Rejections,
 * liquidity failures and unsupported operations propagate on the first try.
 * Raw errors thrown by an adapter are treated as the venue being unavailable.
 */
export class ResilientVenueAdapter implements VenueAdapter {
  readonly id: string;
  readonly capabilities: VenueCapabilities;
  private logger: Logger;

  constructor(
    private inner: VenueAdapter,
    private options: ResilientVenueOptions
  ) {
    this.id = inner.id;
    this.capabilities = inner.capabilities;
    this.logger = options.logger ?? new Logger('info');
  }

  getPosition(token: string): Promise<Position> {
    return this.call('getPosition', () => this.inner.getPosition(token));
  }

  marketBuy(token: string, notionalUsd: number, options?: OrderOptions): Promise<FillResult> {
    const orderOptions = withClientOrderId(options);
    return this.call('marketBuy', () => this.inner.marketBuy(token, notionalUsd, orderOptions));
  }

  marketSell(token: string, notionalUsd: number, options?: OrderOptions): Promise<FillResult> {
    const orderOptions = withClientOrderId(options);
    return this.call('marketSell', () => this.inner.marketSell(token, notionalUsd, orderOptions));
  }

  closePosition(token: string, options?: OrderOptions): Promise<FillResult> {
    const orderOptions = withClientOrderId(options);
    return this.call('closePosition', () => this.inner.closePosition(token, orderOptions));
  }

  getAccount(): Promise<AccountSnapshot> {
    return this.call('getAccount', () => this.inner.getAccount());
  }

  private call<T>(operation: VenueOperation, task: () => Promise<T>): Promise<T> {
    return retryWithBackoff(
      () =>
        withTimeout(
          task().catch((error: unknown) => {
            throw this.normalizeError(operation, error);
          }),
          this.options.callTimeoutMs,
          () => new VenueTimeoutError(this.id, operation, this.options.callTimeoutMs)
        ),
      {
        ...this.options.retry,
        shouldRetry: (error) => error instanceof TradingCoreError && error.retryable,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn(`Venue call failed; retrying`, {
            venue: this.id,
            operation,
            attempt,
            delayMs,
            error: describeCause(error),
          });
        },
      }
    );
  }

  private normalizeError(operation: VenueOperation, error: unknown): Error {
    if (error instanceof TradingCoreError) {
      return error;
    }
    return new VenueUnavailableError(this.id, operation, describeCause(error), error);
  }
}

function withClientOrderId(options?: OrderOptions): OrderOptions {
  return { ...options, clientOrderId: options?.clientOrderId ?? randomUUID() };
}
