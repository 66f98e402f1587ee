import type { AdvisoryVote, MarketContext } from '../../types/index.js';
import type { AdvisorySourceConfig } from '../../core/config.js';
import type { ChatMessage, LlmClient } from '../../core/llm.js';
import { parseVoteText } from '../parse.js';
import type { AdvisorySource } from '../source.js';

const SYSTEM_PROMPT = `You are one member of a panel advising on a single crypto token.
Decide whether to BUY, SELL or HOLD right now using only the market context you are given.
Reply with one JSON object and nothing else:
{"action": "BUY" | "SELL" | "HOLD", "confidence": <number 0-100>, "rationale": "<one or two sentences>"}`;

export function buildAdvisoryPrompt(context: MarketContext): string {
  const lines = [
    `Token: ${context.token}`,
    `As of: ${context.asOf}`,
    `Price: ${context.price == null ? 'unknown' : context.price}`,
  ];
  const extra = Object.entries(context.data);
  if (extra.length > 0) {
    lines.push('Market data:');
    for (const [key, value] of extra) {
      lines.push(`- ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
    }
  }
  return lines.join('\n');
}

/** Advisory source backed by a chat model. */
export class LlmAdvisorySource implements AdvisorySource {
  readonly name: string;

  constructor(
    private source: AdvisorySourceConfig,
    private client: LlmClient
  ) {
    this.name = source.name;
  }

  async advise(context: MarketContext, options: { signal: AbortSignal }): Promise<AdvisoryVote> {
    const system = this.source.instructions
      ? `${SYSTEM_PROMPT}\n\n${this.source.instructions}`
      : SYSTEM_PROMPT;
    const messages: ChatMessage[] = [
      { role: 'system', content: system },
      { role: 'user', content: buildAdvisoryPrompt(context) },
    ];
    const response = await this.client.complete(messages, {
      temperature: this.source.temperature,
      maxTokens: this.source.maxTokens,
      signal: options.signal,
    });
    return parseVoteText(this.name, response.content);
  }
}
