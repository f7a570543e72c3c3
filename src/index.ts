export * from './schemas/ideation.js';
export { loadIdeationConfig, loadLlmConfig, type IdeationConfig, type LlmConfig } from './config/ideation.js';
export { createContext, stageOutputsToJson, type ConversationContext, type LengthControlResult } from './core/context.js';
export { isUnrelated, lastUserText, shortHistory, relevanceStage } from './core/relevance.js';
export { normalizeText } from './core/text_normalize.js';
export { decideDomain, domainStage, ruleSegment, onTopicScore, classifySegmentZeroShot } from './core/router.js';
export {
  chooseNextProgress,
  currentQuestion,
  firstProgress,
  nextProgress,
  scoreSlot,
  totalSlotCount,
} from './core/script_catalog.js';
export { runScriptTurn, scriptStage, type ScriptTurnInput } from './core/script_engine.js';
export {
  autoClassifyStyle,
  coercePositiveInt,
  decideLengthStyle,
  detectUserStyle,
  lengthDirective,
  resolveCaps,
} from './core/length_policy.js';
export { balanceFences, enforceBullets, enforceCharCap, softCut } from './core/text_cut.js';
export { createTokenizer, enforceTokenCap, getDefaultTokenizer, WhitespaceTokenizer, type Tokenizer } from './core/tokenizer.js';
export { trimPayload, toPayloadNode, fromPayloadNode, type JsonValue, type JsonObject, type PayloadNode } from './core/payload.js';
export { applyLengthControl, lengthStage } from './core/length_control.js';
export { runTurn, carryOver, type TurnResult, type CarryOver, type PipelineDeps } from './core/pipeline.js';
export { callLLM, safeExtractJson, getDefaultClassifier, LlmTextClassifier, type TextClassifier } from './core/llm.js';
export { createLogger, type Logger } from './util/logging.js';
export { toStdError, LlmHttpError, LlmUnavailableError, type StandardError } from './util/errors.js';
