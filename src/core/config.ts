import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { z } from 'zod';
import yaml from 'yaml';

import { isLogLevel } from './logger.js';

const expandHome = (value: string): string => {
  if (value.startsWith('~/')) {
    return join(homedir(), value.slice(2));
  }
  return value;
};

const AdvisorySourceSchema = z.object({
  name: z.string().min(1),
  provider: z.enum(['anthropic', 'openai']),
  model: z.string().min(1),
  enabled: z.boolean().default(true),
  temperature: z.number().min(0).max(2).default(0.2),
  maxTokens: z.number().int().positive().default(512),
  apiBaseUrl: z.string().optional(),
  instructions: z.string().optional(),
});

const PaperVenueSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(['spot', 'perp', 'futures']),
  initialCashUsd: z.number().nonnegative().default(1000),
  slippageBps: z.number().nonnegative().default(10),
  maxFillNotionalUsd: z.number().positive().optional(),
  leverage: z.number().positive().default(1),
});

const ConfigSchema = z.object({
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
  tokens: z.array(z.string()).default(['BTC', 'ETH']),
  signals: z
    .object({
      mode: z.enum(['SINGLE_SOURCE', 'SWARM']).default('SWARM'),
      primary: z.string().optional(),
      minimumResponders: z.number().int().min(1).default(1),
      minimumAgreementRatio: z.number().min(0).max(1).default(0.5),
      perSourceTimeoutMs: z.number().int().positive().default(60_000),
      roundTimeoutMs: z.number().int().positive().default(90_000),
      sources: z.array(AdvisorySourceSchema).default([]),
    })
    .default({}),
  risk: z
    .object({
      maxLossUsd: z.number().nonnegative().default(25),
      minimumBalanceUsd: z.number().nonnegative().default(50),
      maxPositionPercentage: z.number().min(0).max(100).default(20),
      maxTokenNotionalUsd: z.number().positive().optional(),
      tokenCaps: z.record(z.number().nonnegative()).default({}),
    })
    .default({}),
  sizing: z
    .object({
      targetNotionalUsd: z.number().positive().default(25),
      maxChunkNotionalUsd: z.number().positive().default(10),
      longOnly: z.boolean().default(false),
    })
    .default({}),
  execution: z
    .object({
      mode: z.enum(['paper', 'live']).default('paper'),
      venue: z.string().default('paper-perp'),
      callTimeoutMs: z.number().int().positive().default(15_000),
      retry: z
        .object({
          maxAttempts: z.number().int().min(1).max(10).default(3),
          baseDelayMs: z.number().int().nonnegative().default(500),
          maxDelayMs: z.number().int().nonnegative().default(4_000),
        })
        .default({}),
    })
    .default({}),
  venues: z
    .object({
      paper: z
        .array(PaperVenueSchema)
        .default([
          { id: 'paper-spot', kind: 'spot' },
          { id: 'paper-perp', kind: 'perp' },
        ]),
    })
    .default({}),
  hyperliquid: z
    .object({
      enabled: z.boolean().default(true),
      testnet: z.boolean().default(false),
      accountAddress: z.string().optional(),
      privateKey: z.string().optional(),
      maxLeverage: z.number().default(5),
      leverage: z.number().positive().optional(),
      defaultSlippageBps: z.number().default(10),
    })
    .default({}),
  memory: z
    .object({
      dbPath: z.string().optional(),
      persistRiskState: z.boolean().default(true),
    })
    .default({}),
});

export type SwarmTraderConfig = z.infer<typeof ConfigSchema>;
export type AdvisorySourceConfig = z.infer<typeof AdvisorySourceSchema>;
export type PaperVenueConfig = z.infer<typeof PaperVenueSchema>;

export function parseConfig(raw: unknown): SwarmTraderConfig {
  const cfg = ConfigSchema.parse(raw ?? {});
  if (cfg.signals.roundTimeoutMs < cfg.signals.perSourceTimeoutMs) {
    cfg.signals.perSourceTimeoutMs = cfg.signals.roundTimeoutMs;
  }
  if (cfg.memory.dbPath) {
    cfg.memory.dbPath = expandHome(cfg.memory.dbPath);
  }
  return cfg;
}

export function loadConfig(configPath?: string): SwarmTraderConfig {
  const path =
    configPath ??
    process.env.SWARM_TRADER_CONFIG_PATH ??
    join(homedir(), '.swarm-trader', 'config.yaml');

  const raw = readFileSync(path, 'utf-8');
  const parsed: unknown = yaml.parse(raw) ?? {};

  const cfg = parseConfig(parsed);

  const envLevel = process.env.SWARM_TRADER_LOG_LEVEL;
  if (isLogLevel(envLevel)) {
    cfg.logging.level = envLevel;
  }
  if (process.env.SWARM_TRADER_EXECUTION_MODE === 'live') {
    cfg.execution.mode = 'live';
  }

  return cfg;
}
