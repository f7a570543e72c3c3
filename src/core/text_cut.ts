/**
 * Boundary-aware truncation for free text and code.
 *
 * Cuts prefer a sentence end, then a word boundary, never land inside a
 * fenced code block or in the middle of a link, and always leave fences
 * balanced. Re-applying any function here to its own output is a no-op.
 */

export const ELLIPSIS = '…';
const FENCES = ['```', '~~~'] as const;
const LINK_TOKENS = ['](', 'http://', 'https://', '://'];
// How far back from the cut a link token still counts as "in a link".
const LINK_WINDOW = 6;

// Sentence punctuation runs, newlines, closing quotes and brackets.
const SENTENCE_END = /[.!?。！？…]+|\n+|[”’"'」』)\]]/g;
const WORD_BOUNDARY = /[\s,;:/·\-–—]+/g;
const TAIL_MARKER = /^… \(\+(\d+) more\)$/;

function countOf(text: string, marker: string): number {
  return text.split(marker).length - 1;
}

export function balanceFences(text: string): string {
  let out = text;
  for (const fence of FENCES) {
    if (countOf(out, fence) % 2 === 1) out += `\n${fence}`;
  }
  return out;
}

export function insideCodeBlock(text: string, index: number): boolean {
  const before = text.slice(0, Math.max(0, Math.min(index, text.length)));
  return FENCES.some((fence) => countOf(before, fence) % 2 === 1);
}

function lastSentenceEnd(snippet: string): number | null {
  let end: number | null = null;
  for (const m of snippet.matchAll(SENTENCE_END)) {
    end = (m.index ?? 0) + m[0].length;
  }
  return end;
}

function lastWordBoundary(snippet: string): number | null {
  let start: number | null = null;
  for (const m of snippet.matchAll(WORD_BOUNDARY)) {
    start = m.index ?? 0;
  }
  return start;
}

// Moves the cut back to the start of the fence that opened the block it is in.
function retreatOutOfCode(text: string, cut: number): number {
  let i = cut;
  while (i > 0 && insideCodeBlock(text, i)) {
    const before = text.slice(0, i);
    const opening = Math.max(
      ...FENCES.map((fence) => (countOf(before, fence) % 2 === 1 ? before.lastIndexOf(fence) : -1)),
    );
    i = opening >= 0 && opening < i ? opening : i - 1;
  }
  return i;
}

function backoffFromLink(text: string, cut: number): number {
  const window = text.slice(Math.max(0, cut - LINK_WINDOW), cut);
  if (!LINK_TOKENS.some((token) => window.includes(token))) return cut;
  return lastWordBoundary(text.slice(0, cut)) ?? cut;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function cutText(text: string, maxChars: number): string {
  // The ellipsis is counted inside the cap.
  const budget = Math.max(1, maxChars - ELLIPSIS.length);
  const snippet = text.slice(0, budget);
  let cut = lastSentenceEnd(snippet) ?? lastWordBoundary(snippet) ?? snippet.length;
  cut = retreatOutOfCode(text, cut);
  cut = backoffFromLink(text, cut);
  cut = retreatOutOfCode(text, cut);
  cut = Math.max(1, Math.min(cut, snippet.length));
  if (cut > 1 && isHighSurrogate(text.charCodeAt(cut - 1))) cut -= 1;
  return balanceFences(text.slice(0, cut).trimEnd()) + ELLIPSIS;
}

function cutCode(text: string, maxChars: number): string {
  const i = retreatOutOfCode(text, Math.min(maxChars, text.length));
  return balanceFences(text.slice(0, Math.max(1, i)).trimEnd());
}

/**
 * Caps `text` at `maxChars`. Prose gets a soft cut with a trailing ellipsis;
 * code is cut back to the last point outside a fence, with no ellipsis.
 */
export function enforceCharCap(text: string, maxChars: number, isCode = false): string {
  const balanced = balanceFences(text);
  if (balanced.length <= maxChars) return balanced;
  return isCode ? cutCode(text, maxChars) : cutText(text, maxChars);
}

/**
 * Soft cut without the balanced-length check: text within the cap is only
 * re-balanced.
 */
export function softCut(text: string, maxChars: number): string {
  if (text.length <= maxChars) return balanceFences(text);
  return cutText(text, maxChars);
}

export type BulletPolicy = { maxEach: number; maxCount: number; tail: boolean };

/**
 * Caps each entry and the entry count. With `tail`, dropped entries are
 * summarised as `… (+K more)`; an existing marker's K is carried forward.
 */
export function enforceBullets(entries: readonly string[], policy: BulletPolicy): string[] {
  let items = entries;
  let carried = 0;
  const last = items[items.length - 1];
  if (policy.tail && last !== undefined) {
    const m = TAIL_MARKER.exec(last);
    if (m?.[1]) {
      carried = Number(m[1]);
      items = items.slice(0, -1);
    }
  }
  const out = items.slice(0, policy.maxCount).map((s) => enforceCharCap(s, policy.maxEach));
  const remaining = Math.max(0, items.length - policy.maxCount) + carried;
  if (policy.tail && remaining > 0) out.push(`${ELLIPSIS} (+${remaining} more)`);
  return out;
}
