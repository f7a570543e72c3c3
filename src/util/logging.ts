import pino from 'pino';
import { scrubMessage, scrubPII } from './redact.js';

export type Logger = pino.Logger;

/**
 * Creates a pino logger with contact-detail redaction unless LOG_LEVEL=debug.
 */
export function createLogger(options: { level?: string; destination?: pino.DestinationStream } = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  const redactEnabled = level !== 'debug';
  const highlightMsg = level === 'debug';

  const decorate = (value: string): string => {
    if (!highlightMsg) return value;
    const trimmed = value.trim();
    if (!trimmed) return value;
    return `✦ ${trimmed} ✦`;
  };

  const opts: pino.LoggerOptions = {
    level,
    hooks: {
      logMethod(args, method) {
        try {
          const scrubbed = args.map((a: unknown) => {
            if (typeof a === 'string') {
              return decorate(scrubMessage(a, redactEnabled));
            }
            const cleanObj = scrubPII(a, redactEnabled);
            if (highlightMsg && isRecord(cleanObj) && typeof cleanObj.msg === 'string') {
              cleanObj.msg = decorate(cleanObj.msg);
            }
            return cleanObj;
          });
          method.apply(this, scrubbed as Parameters<pino.LogFn>);
        } catch {
          method.apply(this, args);
        }
      },
    },
  };
  return options.destination ? pino(opts, options.destination) : pino(opts);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
