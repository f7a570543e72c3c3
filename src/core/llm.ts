import { z } from 'zod';
import { fetch as undiciFetch } from 'undici';
import type { Logger } from 'pino';
import { loadLlmConfig, type LlmConfig } from '../config/ideation.js';
import { LlmHttpError, LlmUnavailableError } from '../util/errors.js';

export type CompletionRequest = {
  prompt: string;
  system?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
  // Per-call logger; overrides the one the classifier was built with.
  log?: Logger;
};

/**
 * Free-text completion capability the router's zero-shot fallback depends on.
 */
export interface TextClassifier {
  complete(req: CompletionRequest): Promise<string>;
}

const ChatCompletionResponse = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

// Simple token counter (approximate, for logs only)
function countTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * One OpenAI-compatible chat completion. Throws on timeout, transport
 * failure, non-2xx status or when no provider is configured.
 */
export async function callLLM(
  req: CompletionRequest,
  opts: { config?: LlmConfig; log?: Logger } = {},
): Promise<string> {
  const config = opts.config ?? loadLlmConfig();
  const log = opts.log;
  if (!config.baseUrl || !config.apiKey) {
    throw new LlmUnavailableError();
  }

  const url = `${config.baseUrl.replace(/\/$/, '')}/chat/completions`;
  const messages = [
    ...(req.system ? [{ role: 'system', content: req.system }] : []),
    { role: 'user', content: req.prompt },
  ];
  const body = {
    model: config.model,
    messages,
    temperature: req.temperature ?? 0,
    ...(req.maxTokens !== undefined ? { max_tokens: req.maxTokens } : {}),
  };

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), config.timeoutMs);
  const onExternalAbort = () => controller.abort();
  if (req.signal) {
    if (req.signal.aborted) controller.abort();
    else req.signal.addEventListener('abort', onExternalAbort, { once: true });
  }

  const started = Date.now();
  log?.debug({ model: config.model, inputTokens: countTokens(req.prompt) }, 'llm_call_start');
  try {
    const res = await undiciFetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${config.apiKey}`,
      },
      body: JSON.stringify(body),
      signal: controller.signal,
    });

    if (!res.ok) {
      const errorText = await res.text();
      log?.debug({ model: config.model, status: res.status }, 'llm_call_failed');
      throw new LlmHttpError(res.status, errorText, res.headers.get('retry-after') ?? undefined);
    }

    const data = ChatCompletionResponse.parse(await res.json());
    const content = (data.choices[0]?.message?.content ?? '').trim();
    log?.debug(
      { model: config.model, latencyMs: Date.now() - started, outputTokens: countTokens(content) },
      'llm_call_done',
    );
    return content;
  } finally {
    clearTimeout(timer);
    req.signal?.removeEventListener('abort', onExternalAbort);
  }
}

/**
 * Try to extract a JSON object from an LLM response safely: the span from
 * the first `{` to the last `}`. Returns undefined if it does not parse.
 */
export function safeExtractJson(text: string): unknown | undefined {
  const m = text.match(/\{[\s\S]*\}/);
  if (!m) return undefined;
  try {
    return JSON.parse(m[0]);
  } catch {
    return undefined;
  }
}

export class LlmTextClassifier implements TextClassifier {
  constructor(
    private readonly config: LlmConfig,
    private readonly log?: Logger,
  ) {}

  complete(req: CompletionRequest): Promise<string> {
    return callLLM(req, { config: this.config, log: req.log ?? this.log });
  }
}

let defaultClassifier: TextClassifier | undefined;

/**
 * Process-wide classifier, built from the environment on first use. Callers
 * pass their logger on each request.
 */
export function getDefaultClassifier(): TextClassifier {
  if (!defaultClassifier) {
    defaultClassifier = new LlmTextClassifier(loadLlmConfig());
  }
  return defaultClassifier;
}
