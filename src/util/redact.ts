/**
 * Redaction utilities for logs. Interview answers are free text, so contact
 * details are scrubbed before they reach a log line.
 * Redaction is disabled when LOG_LEVEL=debug to aid local debugging.
 */

function scrubString(input: string): string {
  let out = input;
  // E-mail addresses
  out = out.replace(/[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g, '[REDACTED_EMAIL]');
  // Phone numbers like 010-1234-5678, +82 10 1234 5678, (02) 123-4567
  out = out.replace(/(?:\+\d{1,3}[\s-]?)?\(?\d{2,4}\)?[\s-]\d{3,4}[\s-]\d{4}\b/g, '[REDACTED_PHONE]');
  // Remaining long digit runs (account / registration numbers)
  out = out.replace(/\b\d{9,}\b/g, '[REDACTED_NUMBER]');
  return out;
}

function scrubDeep(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === 'string') return scrubString(value);
  if (typeof value !== 'object' || value === null) return value;
  if (seen.has(value)) return value;
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((v) => scrubDeep(v, seen));
  }
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = scrubDeep(v, seen);
  }
  return out;
}

/**
 * Scrub contact-like patterns from a log argument.
 */
export function scrubPII(arg: unknown, enabled: boolean): unknown {
  if (!enabled) return arg;
  return scrubDeep(arg);
}

/**
 * Convenience for messages.
 */
export function scrubMessage(msg: string, enabled: boolean): string {
  return enabled ? scrubString(msg) : msg;
}
