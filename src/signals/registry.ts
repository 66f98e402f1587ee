import type { AdvisorySourceConfig, SwarmTraderConfig } from '../core/config.js';
import { createLlmClient, type LlmClient } from '../core/llm.js';
import { LlmAdvisorySource } from './sources/llm.js';
import type { AdvisorySource } from './source.js';

export interface AdvisorySourceDescriptor {
  name: string;
  provider: AdvisorySourceConfig['provider'];
  model: string;
  enabled: boolean;
  /** Provider credentials are present in the environment */
  configured: boolean;
  /** Polled in the current signal mode */
  active: boolean;
}

const API_KEY_ENV: Record<AdvisorySourceConfig['provider'], string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
};

/**
 * Sources polled each cycle. SWARM polls every enabled source;
 * SINGLE_SOURCE polls only the configured primary, or the first enabled
 * source when no primary is named.
 */
export function selectActiveSources(signals: SwarmTraderConfig['signals']): AdvisorySourceConfig[] {
  const enabled = signals.sources.filter((source) => source.enabled);
  if (signals.mode === 'SWARM') {
    return enabled;
  }
  if (signals.primary) {
    const primary = signals.sources.find((source) => source.name === signals.primary);
    if (!primary) {
      throw new Error(`Primary advisory source not found: ${signals.primary}`);
    }
    return [primary];
  }
  return enabled.slice(0, 1);
}

export function listAdvisorySources(
  config: SwarmTraderConfig,
  env: NodeJS.ProcessEnv = process.env
): AdvisorySourceDescriptor[] {
  const active = new Set(selectActiveSources(config.signals).map((source) => source.name));
  return config.signals.sources.map((source) => ({
    name: source.name,
    provider: source.provider,
    model: source.model,
    enabled: source.enabled,
    configured: Boolean(env[API_KEY_ENV[source.provider]]) || Boolean(source.apiBaseUrl),
    active: active.has(source.name),
  }));
}

export function createAdvisorySources(
  config: SwarmTraderConfig,
  clientFactory: (source: AdvisorySourceConfig) => LlmClient = createLlmClient
): AdvisorySource[] {
  const selected = selectActiveSources(config.signals);
  const seen = new Set<string>();
  for (const source of selected) {
    if (seen.has(source.name)) {
      throw new Error(`Duplicate advisory source name: ${source.name}`);
    }
    seen.add(source.name);
  }
  return selected.map((source) => new LlmAdvisorySource(source, clientFactory(source)));
}
