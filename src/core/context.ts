import {
  parseRequestParams,
  type DomainDecisionT,
  type IntentT,
  type LengthStyleT,
  type RequestParamsT,
  type ScriptOutputT,
  type TurnT,
} from '../schemas/ideation.js';
import type { JsonObject, JsonValue } from './payload.js';

export type RelevanceResult = { related: boolean };

/**
 * Named stage outputs. Each stage writes its own key; later stages read
 * earlier ones.
 */
export type StageOutputs = {
  relevance?: RelevanceResult;
  domain?: DomainDecisionT;
  script?: ScriptOutputT;
};

export type LengthControlResult = {
  payload: JsonValue;
  style: LengthStyleT;
  charCap: number;
  tokenCap: number | null;
};

/**
 * Request-scoped context. Built per turn, mutated in place by each stage,
 * dropped once the response is produced.
 */
export type ConversationContext = {
  turns: TurnT[];
  params: RequestParamsT;
  step?: IntentT;
  outputs: StageOutputs;
  trimmed?: LengthControlResult;
};

export function createContext(input: { turns: TurnT[]; params?: unknown; step?: IntentT }): ConversationContext {
  return {
    turns: [...input.turns],
    params: parseRequestParams(input.params ?? {}),
    ...(input.step ? { step: input.step } : {}),
    outputs: {},
  };
}

export function stageOutputsToJson(outputs: StageOutputs): JsonObject {
  const out: JsonObject = {};
  if (outputs.relevance) out.relevance = outputs.relevance;
  if (outputs.domain) out.domain = outputs.domain;
  if (outputs.script) out.script = outputs.script;
  return out;
}
