import type { Logger } from 'pino';
import type { TurnT } from '../schemas/ideation.js';
import type { ConversationContext } from './context.js';

export const UNRELATED_MIN_LEN = 2;
export const MAX_HISTORY_TURNS = 3;

const LATIN_OR_HANGUL_ALNUM = /[A-Za-z0-9가-힣]/;

/**
 * Flags trivially unrelated input: too short, or without a single Latin or
 * Hangul alphanumeric character (emoji, punctuation, other scripts only).
 */
export function isUnrelated(message: string): boolean {
  if (message.trim().length < UNRELATED_MIN_LEN) return true;
  if (!LATIN_OR_HANGUL_ALNUM.test(message)) return true;
  return false;
}

export function lastUserText(turns: readonly TurnT[]): string {
  for (let i = turns.length - 1; i >= 0; i--) {
    const turn = turns[i];
    if (turn && turn.role === 'user') return turn.content;
  }
  return '';
}

export function shortHistory(turns: readonly TurnT[], k: number = MAX_HISTORY_TURNS): string {
  return turns
    .slice(-k)
    .map((t) => `${t.role}: ${t.content}`)
    .join('\n');
}

export function relevanceStage(ctx: ConversationContext, log?: Logger): ConversationContext {
  const msg = lastUserText(ctx.turns);
  const related = !isUnrelated(msg);
  ctx.outputs.relevance = { related };
  log?.debug({ related, length: msg.length }, 'relevance_checked');
  return ctx;
}
