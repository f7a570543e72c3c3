import type { LengthStyleT } from '../schemas/ideation.js';
import { coercePositiveInt, FIELD_POLICIES, LENGTH_PRESETS, PASSTHROUGH_KEYS, type FieldPolicy } from './length_policy.js';
import { enforceBullets, enforceCharCap } from './text_cut.js';
import { enforceTokenCap, type Tokenizer } from './tokenizer.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

/**
 * Structured response payload. Trimming recurses over this instead of
 * inspecting raw JSON values.
 */
export type PayloadNode =
  | { kind: 'scalar'; value: number | boolean | null }
  | { kind: 'text'; value: string }
  | { kind: 'list'; items: PayloadNode[] }
  | { kind: 'map'; entries: Array<[string, PayloadNode]> };

type TextNode = Extract<PayloadNode, { kind: 'text' }>;

export const DEFAULT_GLOBAL_CHARS = 4000;
const DEFAULT_LIST_EACH = 250;
const DEFAULT_LIST_COUNT = 7;

const DEFAULT_TEXT_POLICY: FieldPolicy = { kind: 'text', tail: false };
const DEFAULT_LIST_POLICY: FieldPolicy = { kind: 'list', tail: false };

export function toPayloadNode(value: JsonValue): PayloadNode {
  if (typeof value === 'string') return { kind: 'text', value };
  if (Array.isArray(value)) return { kind: 'list', items: value.map(toPayloadNode) };
  if (value !== null && typeof value === 'object') {
    return {
      kind: 'map',
      entries: Object.entries(value).map(([k, v]): [string, PayloadNode] => [k, toPayloadNode(v)]),
    };
  }
  return { kind: 'scalar', value };
}

export function fromPayloadNode(node: PayloadNode): JsonValue {
  switch (node.kind) {
    case 'scalar':
    case 'text':
      return node.value;
    case 'list':
      return node.items.map(fromPayloadNode);
    case 'map':
      return Object.fromEntries(node.entries.map(([k, v]) => [k, fromPayloadNode(v)]));
  }
}

function isTextNode(node: PayloadNode): node is TextNode {
  return node.kind === 'text';
}

type Limits = {
  styleChars: number | null;
  globalCap: number;
  tokenCap: number | null;
  tokenizer?: Tokenizer;
};

function trimText(key: string | null, value: string, limits: Limits): string {
  const policy = (key !== null ? FIELD_POLICIES.get(key) : undefined) ?? DEFAULT_TEXT_POLICY;
  const isCode = policy.kind === 'code';
  const capped = !isCode && limits.tokenCap ? enforceTokenCap(value, limits.tokenCap, limits.tokenizer) : value;
  const chars = Math.min(policy.maxChars ?? limits.styleChars ?? limits.globalCap, limits.globalCap);
  return enforceCharCap(capped, chars, isCode);
}

function trimTextList(key: string | null, values: string[], limits: Limits): string[] {
  const policy = (key !== null ? FIELD_POLICIES.get(key) : undefined) ?? DEFAULT_LIST_POLICY;
  return enforceBullets(values, {
    maxEach: Math.min(policy.maxEach ?? limits.styleChars ?? DEFAULT_LIST_EACH, DEFAULT_LIST_EACH),
    maxCount: policy.maxCount ?? DEFAULT_LIST_COUNT,
    tail: policy.tail,
  });
}

function trimNode(key: string | null, node: PayloadNode, limits: Limits): PayloadNode {
  switch (node.kind) {
    case 'scalar':
      return node;
    case 'text':
      return { kind: 'text', value: trimText(key, node.value, limits) };
    case 'list': {
      const texts = node.items.filter(isTextNode);
      if (texts.length === node.items.length) {
        const values = trimTextList(
          key,
          texts.map((t) => t.value),
          limits,
        );
        return { kind: 'list', items: values.map((value): PayloadNode => ({ kind: 'text', value })) };
      }
      return { kind: 'list', items: node.items.map((item) => trimNode(key, item, limits)) };
    }
    case 'map':
      return {
        kind: 'map',
        entries: node.entries.map(([k, v]): [string, PayloadNode] => [
          k,
          PASSTHROUGH_KEYS.has(k) ? v : trimNode(k, v, limits),
        ]),
      };
  }
}

export type TrimOptions = {
  lengthStyle?: LengthStyleT | null;
  maxChars?: unknown;
  maxTokens?: unknown;
  tokenizer?: Tokenizer;
};

/**
 * Applies field policies, the style preset and the global caps to every text
 * leaf of `payload`. Keys are matched by name at any depth. Caps that are not
 * positive numbers fall back to the defaults.
 */
export function trimPayload(payload: JsonValue, opts: TrimOptions = {}): JsonValue {
  const preset = opts.lengthStyle ? LENGTH_PRESETS[opts.lengthStyle] : null;
  const tokenCaps = [coercePositiveInt(opts.maxTokens), preset?.tokens].filter(
    (t): t is number => t !== undefined && t > 0,
  );
  const limits: Limits = {
    styleChars: preset?.chars ?? null,
    globalCap: coercePositiveInt(opts.maxChars) ?? DEFAULT_GLOBAL_CHARS,
    tokenCap: tokenCaps.length > 0 ? Math.min(...tokenCaps) : null,
    tokenizer: opts.tokenizer,
  };
  return fromPayloadNode(trimNode(null, toPayloadNode(payload), limits));
}
