/**
 * Domain/segment router for the travel/leisure interview.
 *
 * Domain is fixed to travel; only the segment (camping / experience / sports)
 * is resolved, in this order:
 *   explicit step → unrelated guard → param override → keyword rules
 *   → optional single zero-shot attempt → default (no segment)
 * followed by the on-topic check, which may demote the result to "unrelated".
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import segmentTable from '../data/segment_keywords.json';
import {
  Segment,
  type DomainDecisionT,
  type IntentT,
  type ProvenanceT,
  type RequestParamsT,
  type SegmentT,
} from '../schemas/ideation.js';
import { loadIdeationConfig, type IdeationConfig } from '../config/ideation.js';
import { DeadlineExceededError, toStdError } from '../util/errors.js';
import { getDefaultClassifier, safeExtractJson, type TextClassifier } from './llm.js';
import { fillPrompt, getPrompt } from './prompts.js';
import { countKeywordHits, normalizeText } from './text_normalize.js';
import { lastUserText, MAX_HISTORY_TURNS, shortHistory } from './relevance.js';
import type { ConversationContext } from './context.js';

// ===== Confidence levels per decision path =====
export const CONF_EXPLICIT = 1.0;
export const CONF_PARAM = 0.95;
export const CONF_STRONG_RULE = 0.9;
export const CONF_ZERO_SHOT = 0.65;
export const CONF_DEFAULT = 0.5;
export const CONF_UNRELATED = 0.3;

// Distinct hits needed for a full on-topic score.
export const ON_TOPIC_HITS_FOR_FULL_SCORE = 5;

const ZERO_SHOT_MAX_TOKENS = 16;

const SegmentTableSchema = z.object({
  // Listed in tie-break priority order.
  segments: z
    .array(z.object({ name: Segment, keywords: z.array(z.string().min(1)).min(1) }))
    .min(1),
  onTopicHints: z.array(z.string().min(1)),
});

const TABLE = SegmentTableSchema.parse(segmentTable);

const SEGMENT_KEYWORDS: ReadonlyArray<{ segment: SegmentT; keywords: readonly string[] }> = TABLE.segments.map(
  (s) => ({ segment: s.name, keywords: s.keywords.map(normalizeText) }),
);
const ON_TOPIC_HINTS: readonly string[] = Array.from(new Set(TABLE.onTopicHints.map(normalizeText)));

export const SEGMENT_PRIORITY: readonly SegmentT[] = SEGMENT_KEYWORDS.map((s) => s.segment);

/**
 * Keyword vote: the segment with the most keyword hits wins; ties go to the
 * segment listed first in the table (camping > experience > sports).
 */
export function ruleSegment(message: string): SegmentT | null {
  const t = normalizeText(message);
  let best: SegmentT | null = null;
  let bestHits = 0;
  for (const { segment, keywords } of SEGMENT_KEYWORDS) {
    const hits = countKeywordHits(t, keywords);
    if (hits > bestHits) {
      best = segment;
      bestHits = hits;
    }
  }
  return best;
}

/**
 * Travel/leisure relevance in [0, 1]: distinct general hints matched, plus one
 * if any segment keyword matched at all.
 */
export function onTopicScore(message: string): number {
  const t = normalizeText(message);
  let hits = countKeywordHits(t, ON_TOPIC_HINTS);
  if (SEGMENT_KEYWORDS.some(({ keywords }) => countKeywordHits(t, keywords) > 0)) {
    hits += 1;
  }
  return Math.min(hits / ON_TOPIC_HITS_FOR_FULL_SCORE, 1.0);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

async function withDeadline<T>(run: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new DeadlineExceededError(timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

const ZeroShotAnswer = z.object({
  segment: z.string().nullable().optional(),
});

/**
 * Single bounded zero-shot attempt. Any failure (missing prompt, thrown
 * error, timeout, unparseable or out-of-range answer) yields null.
 */
export async function classifySegmentZeroShot(
  message: string,
  history: string,
  classifier: TextClassifier,
  opts: { timeoutMs: number; log?: Logger },
): Promise<SegmentT | null> {
  const { log } = opts;
  try {
    const system = await getPrompt('segment_classifier_system');
    const template = await getPrompt('segment_classifier_user');
    if (!system || !template) {
      log?.warn('zero_shot_prompt_missing');
      return null;
    }
    const prompt = fillPrompt(template, {
      history_turns: MAX_HISTORY_TURNS,
      history,
      message,
    });
    const raw = await withDeadline(
      (signal) => classifier.complete({ prompt, system, temperature: 0, maxTokens: ZERO_SHOT_MAX_TOKENS, signal, log }),
      opts.timeoutMs,
    );
    const parsed = ZeroShotAnswer.safeParse(safeExtractJson(raw));
    const label = parsed.success ? (parsed.data.segment ?? '').trim().toLowerCase() : '';
    const seg = Segment.safeParse(label);
    log?.debug({ label, accepted: seg.success }, 'zero_shot_answer');
    return seg.success ? seg.data : null;
  } catch (err) {
    log?.debug({ error: toStdError(err, 'segment_classifier') }, 'zero_shot_failed');
    return null;
  }
}

export type DecideDomainInput = {
  message: string;
  history: string;
  params: RequestParamsT;
  related: boolean;
  step?: IntentT;
  classifier?: TextClassifier;
  config?: IdeationConfig;
  log?: Logger;
};

export async function decideDomain(input: DecideDomainInput): Promise<DomainDecisionT> {
  const { message, params, log } = input;
  const config = input.config ?? loadIdeationConfig();

  // 1) Caller already routed the turn
  if (input.step) {
    const segment = params.segment ?? null;
    return {
      intent: input.step,
      domain: 'travel',
      segment,
      subdomain: segment,
      confidence: CONF_EXPLICIT,
      via: 'explicit',
      isOnTopic: true,
      onTopicScore: round2(onTopicScore(message)),
    };
  }

  // 2) Too short / no usable characters
  if (!input.related) {
    return {
      intent: 'script_qna',
      domain: 'travel',
      segment: null,
      subdomain: null,
      confidence: CONF_UNRELATED,
      via: 'unrelated',
      isOnTopic: false,
      onTopicScore: 0,
    };
  }

  // 3) Segment resolution
  let segment: SegmentT | null = params.segment ?? null;
  let via: ProvenanceT | null = segment ? 'param' : null;
  let confidence = segment ? CONF_PARAM : 0;

  if (!segment) {
    segment = ruleSegment(message);
    if (segment) {
      via = 'rule';
      confidence = CONF_STRONG_RULE;
    }
  }

  if (!segment && params.allowZeroShot) {
    const classifier = input.classifier ?? getDefaultClassifier();
    const zeroShot = await classifySegmentZeroShot(message, input.history, classifier, {
      timeoutMs: config.classifierTimeoutMs,
      log,
    });
    if (zeroShot) {
      segment = zeroShot;
      via = 'zero-shot';
      confidence = Math.max(confidence, CONF_ZERO_SHOT);
    }
  }

  if (!segment) {
    via = via ?? 'default';
    confidence = Math.max(confidence, CONF_DEFAULT);
  }

  // 4) On-topic check
  const topicScore = onTopicScore(message);
  const isOnTopic = topicScore >= config.onTopicThreshold || segment !== null;
  if (!isOnTopic) {
    via = 'unrelated';
    confidence = Math.min(confidence, CONF_UNRELATED);
  }

  return {
    intent: 'script_qna',
    domain: 'travel',
    segment,
    subdomain: segment,
    confidence,
    via: via ?? 'default',
    isOnTopic,
    onTopicScore: round2(topicScore),
  };
}

export async function domainStage(
  ctx: ConversationContext,
  deps: { classifier?: TextClassifier; config?: IdeationConfig; log?: Logger } = {},
): Promise<ConversationContext> {
  const { log } = deps;
  const message = lastUserText(ctx.turns);
  log?.debug({ step: ctx.step ?? null }, 'router_start');
  const decision = await decideDomain({
    message,
    history: shortHistory(ctx.turns, MAX_HISTORY_TURNS),
    params: ctx.params,
    related: ctx.outputs.relevance?.related ?? true,
    step: ctx.step,
    classifier: deps.classifier,
    config: deps.config,
    log,
  });
  ctx.outputs.domain = decision;
  log?.debug(
    {
      segment: decision.segment,
      via: decision.via,
      confidence: decision.confidence,
      isOnTopic: decision.isOnTopic,
      onTopicScore: decision.onTopicScore,
    },
    'domain_decided',
  );
  return ctx;
}
