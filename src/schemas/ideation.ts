import { z } from 'zod';

export const SEGMENTS = ['camping', 'experience', 'sports'] as const;
export const Segment = z.enum(SEGMENTS);
export type SegmentT = z.infer<typeof Segment>;

export const Intent = z.enum(['script_qna', 'ideate', 'feedback_quick', 'summary', 'research', 'revenue', 'write']);
export type IntentT = z.infer<typeof Intent>;

// Which decision path produced the segment.
export const Provenance = z.enum(['param', 'rule', 'zero-shot', 'default', 'unrelated', 'explicit']);
export type ProvenanceT = z.infer<typeof Provenance>;

export const DomainDecision = z.object({
  intent: Intent,
  domain: z.literal('travel'),
  segment: Segment.nullable(),
  subdomain: Segment.nullable(),
  confidence: z.number().min(0).max(1),
  via: Provenance,
  isOnTopic: z.boolean(),
  onTopicScore: z.number().min(0).max(1),
});
export type DomainDecisionT = z.infer<typeof DomainDecision>;

export const SectionId = z.enum(['A', 'B', 'C', 'D']);
export type SectionIdT = z.infer<typeof SectionId>;

export const Progress = z.object({
  section: SectionId,
  index: z.number().int().min(0),
  answered: z.array(z.string()),
});
export type ProgressT = z.infer<typeof Progress>;

export const ScriptOutput = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('notice'),
    message: z.string(),
    progress: Progress,
  }),
  z.object({
    mode: z.literal('ask'),
    question: z.string(),
    slotKey: z.string(),
    section: SectionId,
    progress: Progress,
  }),
  z.object({
    mode: z.literal('end'),
    message: z.string(),
    progress: z.null(),
  }),
]);
export type ScriptOutputT = z.infer<typeof ScriptOutput>;

export const LengthStyle = z.enum(['one_line', 'short', 'medium', 'long']);
export type LengthStyleT = z.infer<typeof LengthStyle>;

export const TurnRole = z.enum(['user', 'assistant', 'system']);

export const Turn = z.object({
  role: TurnRole,
  content: z.string(),
});
export type TurnT = z.infer<typeof Turn>;

/**
 * Per-request parameter bag. `maxChars` / `maxTokens` stay `unknown` here and
 * are coerced by the length governor, which owns their defaults.
 */
export type RequestParamsT = {
  segment?: SegmentT;
  allowZeroShot?: boolean;
  scriptProgress?: ProgressT;
  lastSlot?: string;
  lengthStyle?: LengthStyleT;
  maxChars?: unknown;
  maxTokens?: unknown;
};

const ParamFields = {
  segment: Segment,
  allowZeroShot: z.boolean(),
  scriptProgress: Progress,
  lastSlot: z.string().min(1),
  lengthStyle: LengthStyle,
} as const;

/**
 * Lenient parse: each recognised field is validated on its own and dropped
 * when invalid, so one bad value never discards the rest of the bag.
 */
export function parseRequestParams(raw: unknown): RequestParamsT {
  const bag = z.record(z.unknown()).safeParse(raw);
  if (!bag.success) return {};
  const src = bag.data;
  const out: RequestParamsT = {};

  const segment = ParamFields.segment.safeParse(src.segment);
  if (segment.success) out.segment = segment.data;
  const allowZeroShot = ParamFields.allowZeroShot.safeParse(src.allowZeroShot);
  if (allowZeroShot.success) out.allowZeroShot = allowZeroShot.data;
  const progress = ParamFields.scriptProgress.safeParse(src.scriptProgress);
  if (progress.success) out.scriptProgress = progress.data;
  const lastSlot = ParamFields.lastSlot.safeParse(src.lastSlot);
  if (lastSlot.success) out.lastSlot = lastSlot.data;
  const lengthStyle = ParamFields.lengthStyle.safeParse(src.lengthStyle);
  if (lengthStyle.success) out.lengthStyle = lengthStyle.data;

  if ('maxChars' in src) out.maxChars = src.maxChars;
  if ('maxTokens' in src) out.maxTokens = src.maxTokens;
  return out;
}
