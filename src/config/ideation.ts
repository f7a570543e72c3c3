import { z } from 'zod';

export const TOKENIZER_ENCODINGS = ['cl100k_base', 'o200k_base', 'p50k_base', 'r50k_base', 'gpt2'] as const;

const IdeationConfigSchema = z.object({
  onTopicThreshold: z.coerce.number().min(0).max(1).catch(0.28),
  classifierTimeoutMs: z.coerce.number().int().min(100).catch(3000),
  defaultMaxChars: z.coerce.number().int().min(1).catch(4000),
  tokenizerEncoding: z.enum(TOKENIZER_ENCODINGS).catch('cl100k_base'),
});

export type IdeationConfig = z.infer<typeof IdeationConfigSchema>;

export function loadIdeationConfig(env: NodeJS.ProcessEnv = process.env): IdeationConfig {
  return IdeationConfigSchema.parse({
    onTopicThreshold: env.ON_TOPIC_THRESHOLD || 0.28,
    classifierTimeoutMs: env.CLASSIFIER_TIMEOUT_MS || 3000,
    defaultMaxChars: env.DEFAULT_MAX_CHARS || 4000,
    tokenizerEncoding: env.TOKENIZER_ENCODING || 'cl100k_base',
  });
}

const LlmConfigSchema = z.object({
  baseUrl: z.string().url().optional().catch(undefined),
  apiKey: z.string().min(1).optional().catch(undefined),
  model: z.string().min(1).catch('gpt-4o-mini'),
  timeoutMs: z.coerce.number().int().min(500).catch(2500),
});

export type LlmConfig = z.infer<typeof LlmConfigSchema>;

export function loadLlmConfig(env: NodeJS.ProcessEnv = process.env): LlmConfig {
  return LlmConfigSchema.parse({
    baseUrl: env.LLM_PROVIDER_BASEURL || undefined,
    apiKey: env.LLM_API_KEY || undefined,
    model: env.LLM_MODEL || 'gpt-4o-mini',
    timeoutMs: env.LLM_TIMEOUT_MS || 2500,
  });
}
