import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';
import type { Logger } from 'pino';
import { loadIdeationConfig } from '../config/ideation.js';

/**
 * Text ↔ opaque units. `exact` is false for the approximate fallback.
 */
export interface Tokenizer<U = unknown> {
  readonly exact: boolean;
  encode(text: string): U[];
  decode(units: U[]): string;
}

// Rough chars-per-token ratio for the last-resort slice.
export const APPROX_CHARS_PER_TOKEN = 4;

/**
 * Whitespace split: one unit per word. Decoding rejoins with single spaces.
 */
export class WhitespaceTokenizer implements Tokenizer<string> {
  readonly exact = false;

  encode(text: string): string[] {
    return text.split(/\s+/).filter(Boolean);
  }

  decode(units: string[]): string {
    return units.join(' ');
  }
}

export class TiktokenTokenizer implements Tokenizer<number> {
  readonly exact = true;

  constructor(private readonly enc: Tiktoken) {}

  encode(text: string): number[] {
    // Special-token strings in user text are encoded as plain text.
    return this.enc.encode(text, [], []);
  }

  decode(units: number[]): string {
    // A cut subword sequence can end inside a multibyte character.
    return this.enc.decode(units).replace(/\uFFFD+$/, '');
  }
}

export function createTokenizer(encoding: TiktokenEncoding = 'cl100k_base', log?: Logger): Tokenizer {
  try {
    return new TiktokenTokenizer(getEncoding(encoding));
  } catch (err) {
    log?.warn({ encoding, error: String(err) }, 'tokenizer_fallback_whitespace');
    return new WhitespaceTokenizer();
  }
}

let defaultTokenizer: Tokenizer | undefined;

/**
 * Process-wide tokenizer, built on first use and never torn down.
 */
export function getDefaultTokenizer(log?: Logger): Tokenizer {
  if (!defaultTokenizer) {
    defaultTokenizer = createTokenizer(loadIdeationConfig().tokenizerEncoding, log);
  }
  return defaultTokenizer;
}

function isStringArray(units: readonly unknown[]): units is string[] {
  return units.every((u) => typeof u === 'string');
}

/**
 * Truncates `text` to at most `maxTokens` units. Decode failures fall back to
 * rejoining string units, then to a character slice.
 */
export function enforceTokenCap(
  text: string,
  maxTokens: number | null | undefined,
  tokenizer: Tokenizer = getDefaultTokenizer(),
): string {
  if (!maxTokens || maxTokens <= 0) return text;
  let units: unknown[];
  try {
    units = tokenizer.encode(text);
  } catch {
    units = new WhitespaceTokenizer().encode(text);
  }
  if (units.length <= maxTokens) return text;
  const head = units.slice(0, maxTokens);
  try {
    return tokenizer.decode(head);
  } catch {
    return head.length > 0 && isStringArray(head)
      ? head.join(' ')
      : text.slice(0, maxTokens * APPROX_CHARS_PER_TOKEN);
  }
}
