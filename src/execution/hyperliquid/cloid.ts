import { randomBytes } from 'node:crypto';

import type { HexString } from './client.js';

/**
 * Hyperliquid client order id ("cloid") must be a 16-byte hex string: `0x` + 32 hex chars.
 * A UUID client order id maps onto one directly, so retries of the same
 * logical order reuse the same cloid.
 */
export function toHyperliquidCloid(clientOrderId?: string): HexString {
  const hex = clientOrderId?.replace(/-/g, '').toLowerCase() ?? '';
  if (/^[0-9a-f]{32}$/.test(hex)) {
    return `0x${hex}`;
  }
  return `0x${randomBytes(16).toString('hex')}`;
}
