import { z } from 'zod';

import type { AdvisoryVote } from '../types/index.js';
import { InvalidSignalError } from '../core/errors.js';

export const AdvisoryVoteSchema = z.object({
  action: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
    z.enum(['BUY', 'SELL', 'HOLD'])
  ),
  confidence: z.number().finite().min(0).max(100),
  rationale: z.string().default(''),
});

function extractJsonObject(text: string): unknown {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const candidate = fenced?.[1] ?? text;
  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start === -1 || end === -1 || end <= start) return null;
  try {
    return JSON.parse(candidate.slice(start, end + 1));
  } catch {
    return null;
  }
}

/** Validates a vote object; confidence outside 0..100 or an unknown action is rejected. */
export function parseVote(source: string, raw: unknown): AdvisoryVote {
  const result = AdvisoryVoteSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.join('.') || 'vote';
    throw new InvalidSignalError(source, `${where}: ${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}

/** Pulls the first JSON object out of a model reply and validates it as a vote. */
export function parseVoteText(source: string, text: string): AdvisoryVote {
  const raw = extractJsonObject(text);
  if (raw === null) {
    throw new InvalidSignalError(source, 'reply contained no JSON object');
  }
  return parseVote(source, raw);
}
