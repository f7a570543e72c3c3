import type { Logger } from 'pino';
import type { IdeationConfig } from '../config/ideation.js';
import type { LengthStyleT, ProgressT } from '../schemas/ideation.js';
import type { ConversationContext } from './context.js';
import { lengthStage } from './length_control.js';
import type { TextClassifier } from './llm.js';
import type { JsonValue } from './payload.js';
import { relevanceStage } from './relevance.js';
import { domainStage } from './router.js';
import { scriptStage } from './script_engine.js';
import type { Tokenizer } from './tokenizer.js';

export type PipelineDeps = {
  classifier?: TextClassifier;
  tokenizer?: Tokenizer;
  config?: IdeationConfig;
  log?: Logger;
};

export type TurnResult = {
  // Trimmed stage outputs, ready to render.
  outputs: JsonValue;
  style: LengthStyleT;
  charCap: number;
  tokenCap: number | null;
  context: ConversationContext;
};

export async function runTurn(ctx: ConversationContext, deps: PipelineDeps = {}): Promise<TurnResult> {
  const { log } = deps;
  relevanceStage(ctx, log);
  await domainStage(ctx, deps);
  if (ctx.outputs.domain?.intent === 'script_qna') {
    scriptStage(ctx, log);
  }
  const trimmed = lengthStage(ctx, deps);
  return {
    outputs: trimmed.payload,
    style: trimmed.style,
    charCap: trimmed.charCap,
    tokenCap: trimmed.tokenCap,
    context: ctx,
  };
}

export type CarryOver = {
  scriptProgress?: ProgressT;
  lastSlot?: string;
  lengthStyle: LengthStyleT;
};

/**
 * Parameters the caller resubmits on the next turn. An ended interview
 * carries nothing, so the next turn starts over from the first question.
 */
export function carryOver(result: TurnResult): CarryOver {
  const { params, outputs } = result.context;
  const script = outputs.script;
  const carried: CarryOver = { lengthStyle: result.style };

  if (!script) {
    if (params.scriptProgress) carried.scriptProgress = params.scriptProgress;
    if (params.lastSlot) carried.lastSlot = params.lastSlot;
    return carried;
  }
  switch (script.mode) {
    case 'ask':
      carried.scriptProgress = script.progress;
      carried.lastSlot = script.slotKey;
      break;
    case 'notice':
      carried.scriptProgress = script.progress;
      if (params.lastSlot) carried.lastSlot = params.lastSlot;
      break;
    case 'end':
      break;
  }
  return carried;
}
