import type { Logger } from 'pino';
import type { ProgressT, ScriptOutputT, SegmentT } from '../schemas/ideation.js';
import type { ConversationContext } from './context.js';
import { lastUserText } from './relevance.js';
import {
  SCRIPT_MESSAGES,
  chooseNextProgress,
  currentQuestion,
  firstProgress,
  normalizeProgress,
} from './script_catalog.js';

export type ScriptTurnInput = {
  progress?: ProgressT;
  userText: string;
  lastSlot?: string;
  segment: SegmentT | null;
  isOnTopic: boolean;
};

function endOutput(): ScriptOutputT {
  return { mode: 'end', message: SCRIPT_MESSAGES.end, progress: null };
}

/**
 * One interview turn. Stateless: the caller resubmits the returned progress
 * and the asked slot id on the next turn.
 */
export function runScriptTurn(input: ScriptTurnInput): ScriptOutputT {
  if (!input.isOnTopic) {
    return {
      mode: 'notice',
      message: SCRIPT_MESSAGES.offTopic,
      progress: input.progress ?? firstProgress(),
    };
  }

  let progress = normalizeProgress(input.progress ?? firstProgress());
  const userText = input.userText.trim();

  const asked = currentQuestion(progress, input.segment);
  if (input.lastSlot && asked && input.lastSlot === asked.id && userText) {
    const answered = progress.answered.includes(asked.id)
      ? [...progress.answered]
      : [...progress.answered, asked.id];
    const next = chooseNextProgress({ ...progress, answered }, userText);
    if (!next) return endOutput();
    progress = next;
  }

  const q = currentQuestion(progress, input.segment);
  if (!q) return endOutput();

  return {
    mode: 'ask',
    question: q.text,
    slotKey: q.id,
    section: progress.section,
    progress,
  };
}

export function scriptStage(ctx: ConversationContext, log?: Logger): ConversationContext {
  const domain = ctx.outputs.domain;
  const output = runScriptTurn({
    progress: ctx.params.scriptProgress,
    userText: lastUserText(ctx.turns),
    lastSlot: ctx.params.lastSlot,
    segment: domain?.segment ?? ctx.params.segment ?? null,
    isOnTopic: domain?.isOnTopic ?? true,
  });
  ctx.outputs.script = output;
  log?.debug(
    {
      mode: output.mode,
      slot: output.mode === 'ask' ? output.slotKey : null,
      answered: output.progress?.answered.length ?? 0,
    },
    'script_turn',
  );
  return ctx;
}
