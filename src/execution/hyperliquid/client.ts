import type { SwarmTraderConfig } from '../../core/config.js';
import { HttpTransport, InfoClient, ExchangeClient } from '@nktkas/hyperliquid';
import { privateKeyToAccount } from 'viem/accounts';
import { z } from 'zod';

export type HexString = `0x${string}`;

export type HyperliquidMarket = {
  symbol: string;
  assetId: number;
  maxLeverage?: number;
  szDecimals: number;
};

const MetaSchema = z.object({
  universe: z.array(
    z.object({
      name: z.string(),
      szDecimals: z.number().int().nonnegative().default(6),
      maxLeverage: z.number().optional(),
    })
  ),
});

const numeric = z.union([z.string(), z.number()]).transform((value) => Number(value));

export const ClearinghouseStateSchema = z.object({
  marginSummary: z.object({ accountValue: numeric }),
  withdrawable: numeric,
  assetPositions: z
    .array(
      z.object({
        position: z.object({
          coin: z.string(),
          szi: numeric,
          entryPx: numeric.nullable().optional(),
          positionValue: numeric.optional(),
        }),
      })
    )
    .default([]),
});

export type ClearinghouseState = z.infer<typeof ClearinghouseStateSchema>;

export function isHexString(value: string): value is HexString {
  return /^0x[0-9a-fA-F]*$/.test(value);
}

function toHex(value: string, label: string): HexString {
  const normalized = value.startsWith('0x') ? value : `0x${value}`;
  if (!isHexString(normalized)) {
    throw new Error(`Hyperliquid ${label} is not a hex string.`);
  }
  return normalized;
}

export class HyperliquidClient {
  private transport: HttpTransport;
  private info: InfoClient;
  private exchange?: ExchangeClient;
  private markets?: HyperliquidMarket[];

  constructor(private config: SwarmTraderConfig) {
    this.transport = new HttpTransport({ isTestnet: config.hyperliquid.testnet });
    this.info = new InfoClient({ transport: this.transport });
  }

  private privateKey(): string {
    return this.config.hyperliquid.privateKey ?? process.env.HYPERLIQUID_PRIVATE_KEY ?? '';
  }

  getAccountAddress(): HexString | null {
    const configured =
      this.config.hyperliquid.accountAddress ?? process.env.HYPERLIQUID_ACCOUNT_ADDRESS ?? '';
    if (configured) {
      return toHex(configured, 'account address');
    }
    const key = this.privateKey();
    if (!key) {
      return null;
    }
    return privateKeyToAccount(toHex(key, 'private key')).address;
  }

  private requireAccountAddress(): HexString {
    const user = this.getAccountAddress();
    if (!user) {
      throw new Error(
        'Hyperliquid account address not configured (hyperliquid.accountAddress or HYPERLIQUID_ACCOUNT_ADDRESS).'
      );
    }
    return user;
  }

  getExchangeClient(): ExchangeClient {
    if (this.exchange) return this.exchange;
    const key = this.privateKey();
    if (!key) {
      throw new Error('Hyperliquid private key not configured (HYPERLIQUID_PRIVATE_KEY).');
    }
    const wallet = privateKeyToAccount(toHex(key, 'private key'));
    this.exchange = new ExchangeClient({ wallet, transport: this.transport });
    return this.exchange;
  }

  /** Perp universe; cached because asset ids and size decimals are static per listing. */
  async listPerpMarkets(): Promise<HyperliquidMarket[]> {
    if (this.markets) return this.markets;
    const meta = MetaSchema.parse(await this.info.meta());
    this.markets = meta.universe.map((item, idx) => ({
      symbol: item.name,
      assetId: idx,
      maxLeverage: item.maxLeverage,
      szDecimals: item.szDecimals,
    }));
    return this.markets;
  }

  async getMarket(symbol: string): Promise<HyperliquidMarket | null> {
    const markets = await this.listPerpMarkets();
    return markets.find((m) => m.symbol === symbol) ?? null;
  }

  async getAllMids(): Promise<Record<string, number>> {
    const mids: Record<string, string> = await this.info.allMids();
    const out: Record<string, number> = {};
    for (const [symbol, value] of Object.entries(mids ?? {})) {
      const num = Number(value);
      if (Number.isFinite(num)) {
        out[symbol] = num;
      }
    }
    return out;
  }

  async getMetaAndAssetCtxs(): Promise<unknown> {
    return this.info.metaAndAssetCtxs();
  }

  async getClearinghouseState(): Promise<ClearinghouseState> {
    const raw: unknown = await this.info.clearinghouseState({ user: this.requireAccountAddress() });
    return ClearinghouseStateSchema.parse(raw);
  }
}
