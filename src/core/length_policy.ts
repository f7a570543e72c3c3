import { z } from 'zod';
import policyData from '../data/length_policy.json';
import { LengthStyle, type LengthStyleT } from '../schemas/ideation.js';

const PresetSchema = z.object({
  chars: z.number().int().positive(),
  tokens: z.number().int().positive(),
});

const FieldPolicySchema = z.object({
  kind: z.enum(['text', 'code', 'list']),
  maxChars: z.number().int().positive().optional(),
  maxEach: z.number().int().positive().optional(),
  maxCount: z.number().int().positive().optional(),
  tail: z.boolean().default(false),
});

const HintGroupSchema = z.object({
  style: LengthStyle,
  hints: z.array(z.string().min(1)).min(1),
});

const LengthPolicySchema = z.object({
  presets: z.object({
    one_line: PresetSchema,
    short: PresetSchema,
    medium: PresetSchema,
    long: PresetSchema,
  }),
  userHints: z.array(HintGroupSchema),
  autoHints: z.array(HintGroupSchema),
  fields: z.record(FieldPolicySchema),
  passthroughKeys: z.array(z.string()),
});

export type StylePreset = z.infer<typeof PresetSchema>;
export type FieldPolicy = z.infer<typeof FieldPolicySchema>;

const POLICY = LengthPolicySchema.parse(policyData);

export const DEFAULT_STYLE: LengthStyleT = 'medium';
export const LENGTH_PRESETS: Readonly<Record<LengthStyleT, StylePreset>> = POLICY.presets;
export const FIELD_POLICIES: ReadonlyMap<string, FieldPolicy> = new Map(Object.entries(POLICY.fields));
// Metadata fields copied through the trimmer untouched.
export const PASSTHROUGH_KEYS: ReadonlySet<string> = new Set(POLICY.passthroughKeys);

/**
 * Explicit length request in the user's wording; first matching group wins.
 */
export function detectUserStyle(query: string): LengthStyleT | null {
  for (const group of POLICY.userHints) {
    if (group.hints.some((h) => query.includes(h))) return group.style;
  }
  return null;
}

/**
 * Coarser ladder used when the user gave no explicit length cue.
 */
export function autoClassifyStyle(query: string): LengthStyleT {
  for (const group of POLICY.autoHints) {
    if (group.hints.some((h) => query.includes(h))) return group.style;
  }
  return DEFAULT_STYLE;
}

export function decideLengthStyle(query: string, explicit?: LengthStyleT | null): LengthStyleT {
  return explicit ?? detectUserStyle(query) ?? autoClassifyStyle(query);
}

/**
 * Positive integer or undefined. Blank, non-numeric, boolean, zero and
 * negative inputs all count as "not provided".
 */
export function coercePositiveInt(value: unknown): number | undefined {
  let n: number | undefined;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string') {
    const v = value.trim();
    n = v === '' ? undefined : Number(v);
  }
  if (n === undefined || !Number.isFinite(n)) return undefined;
  const int = Math.trunc(n);
  return int > 0 ? int : undefined;
}

export type EffectiveCaps = { charCap: number; tokenCap: number | null };

export function resolveCaps(
  style: LengthStyleT | null,
  maxChars: unknown,
  maxTokens: unknown,
  defaultMaxChars = 4000,
): EffectiveCaps {
  const charCap = coercePositiveInt(maxChars) ?? defaultMaxChars;
  const candidates = [coercePositiveInt(maxTokens), style ? LENGTH_PRESETS[style].tokens : undefined].filter(
    (t): t is number => t !== undefined,
  );
  return { charCap, tokenCap: candidates.length > 0 ? Math.min(...candidates) : null };
}

/**
 * Prompt directive for a generation step plus the style's token budget.
 */
export function lengthDirective(style: string): { text: string; tokenBudget: number } {
  const parsed = LengthStyle.safeParse(style);
  const key = parsed.success ? parsed.data : DEFAULT_STYLE;
  const { chars, tokens } = LENGTH_PRESETS[key];
  const text =
    'Write with explicit length control:\n' +
    `- Target length: '${key}'.\n` +
    `- Hard limits: ≤${chars} characters or the allowed token budget.\n` +
    '- Be concise. Avoid filler words.\n';
  return { text, tokenBudget: tokens };
}
