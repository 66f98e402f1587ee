import { describe, it, expect, vi } from 'vitest';

import type { LlmClient } from '../../src/core/llm.js';
import {
  createAdvisorySources,
  listAdvisorySources,
  selectActiveSources,
} from '../../src/signals/registry.js';
import { testConfig } from '../fixtures.js';

const sources = [
  { name: 'claude', provider: 'anthropic', model: 'claude-test' },
  { name: 'gpt', provider: 'openai', model: 'gpt-test', enabled: false },
  { name: 'local', provider: 'openai', model: 'llama-test', apiBaseUrl: 'http://localhost:8080' },
];

const fakeClient: LlmClient = {
  complete: async () => ({ content: '{"action":"HOLD","confidence":50}', model: 'fake' }),
};

describe('advisory source registry', () => {
  it('polls every enabled source in swarm mode', () => {
    const config = testConfig({ signals: { sources } });

    expect(selectActiveSources(config.signals).map((s) => s.name)).toEqual(['claude', 'local']);
  });

  it('polls only the primary in single-source mode', () => {
    const config = testConfig({ signals: { mode: 'SINGLE_SOURCE', primary: 'local', sources } });

    expect(selectActiveSources(config.signals).map((s) => s.name)).toEqual(['local']);
  });

  it('falls back to the first enabled source without a primary', () => {
    const config = testConfig({ signals: { mode: 'SINGLE_SOURCE', sources } });

    expect(selectActiveSources(config.signals).map((s) => s.name)).toEqual(['claude']);
  });

  it('rejects an unknown primary', () => {
    const config = testConfig({ signals: { mode: 'SINGLE_SOURCE', primary: 'nope', sources } });

    expect(() => selectActiveSources(config.signals)).toThrow('Primary advisory source not found: nope');
  });

  it('describes credentials and activity per source', () => {
    const config = testConfig({ signals: { sources } });

    const listed = listAdvisorySources(config, { ANTHROPIC_API_KEY: 'test-secret' });

    expect(listed.map((s) => [s.name, s.enabled, s.configured, s.active])).toEqual([
      ['claude', true, true, true],
      ['gpt', false, false, false],
      ['local', true, true, true],
    ]);
  });

  it('builds one client per active source', () => {
    const config = testConfig({ signals: { sources } });
    const factory = vi.fn(() => fakeClient);

    const created = createAdvisorySources(config, factory);

    expect(created.map((s) => s.name)).toEqual(['claude', 'local']);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('rejects duplicate source names', () => {
    const config = testConfig({
      signals: {
        sources: [
          { name: 'dup', provider: 'anthropic', model: 'a' },
          { name: 'dup', provider: 'openai', model: 'b' },
        ],
      },
    });

    expect(() => createAdvisorySources(config, () => fakeClient)).toThrow(
      'Duplicate advisory source name: dup'
    );
  });
});
