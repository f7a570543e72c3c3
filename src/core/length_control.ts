import type { Logger } from 'pino';
import { loadIdeationConfig, type IdeationConfig } from '../config/ideation.js';
import type { LengthStyleT } from '../schemas/ideation.js';
import { stageOutputsToJson, type ConversationContext, type LengthControlResult } from './context.js';
import { decideLengthStyle, resolveCaps } from './length_policy.js';
import { trimPayload, type JsonValue } from './payload.js';
import { lastUserText } from './relevance.js';
import type { Tokenizer } from './tokenizer.js';

export type LengthControlInput = {
  query: string;
  lengthStyle?: LengthStyleT;
  maxChars?: unknown;
  maxTokens?: unknown;
};

export type LengthControlDeps = {
  tokenizer?: Tokenizer;
  config?: IdeationConfig;
  log?: Logger;
};

export function applyLengthControl(
  payload: JsonValue,
  input: LengthControlInput,
  deps: LengthControlDeps = {},
): LengthControlResult {
  const config = deps.config ?? loadIdeationConfig();
  const style = decideLengthStyle(input.query, input.lengthStyle);
  const { charCap, tokenCap } = resolveCaps(style, input.maxChars, input.maxTokens, config.defaultMaxChars);
  const trimmed = trimPayload(payload, {
    lengthStyle: style,
    maxChars: charCap,
    maxTokens: tokenCap,
    tokenizer: deps.tokenizer,
  });
  deps.log?.debug({ style, charCap, tokenCap }, 'length_controlled');
  return { payload: trimmed, style, charCap, tokenCap };
}

/**
 * Final stage: trims everything the earlier stages wrote and records the
 * chosen style back into the params so the caller can carry it forward.
 */
export function lengthStage(ctx: ConversationContext, deps: LengthControlDeps = {}): LengthControlResult {
  const result = applyLengthControl(
    stageOutputsToJson(ctx.outputs),
    {
      query: lastUserText(ctx.turns),
      lengthStyle: ctx.params.lengthStyle,
      maxChars: ctx.params.maxChars,
      maxTokens: ctx.params.maxTokens,
    },
    deps,
  );
  ctx.params.lengthStyle = result.style;
  ctx.trimmed = result;
  return result;
}
