import type { IdeationConfig } from '../../../src/config/ideation.js';
import { applyLengthControl, lengthStage } from '../../../src/core/length_control.js';
import { createContext } from '../../../src/core/context.js';
import { WhitespaceTokenizer } from '../../../src/core/tokenizer.js';

const config: IdeationConfig = {
  onTopicThreshold: 0.28,
  classifierTimeoutMs: 3000,
  defaultMaxChars: 4000,
  tokenizerEncoding: 'cl100k_base',
};
const tokenizer = new WhitespaceTokenizer();

describe('applyLengthControl', () => {
  const payload = { script: { mode: 'ask', question: 'q'.repeat(500) } };

  it('should derive the style from the query', () => {
    const res = applyLengthControl(payload, { query: '한줄로 부탁해요' }, { tokenizer, config });
    expect(res.style).toBe('one_line');
    expect(res.charCap).toBe(4000);
    expect(res.tokenCap).toBe(50);
    expect(res.payload).toEqual({ script: { mode: 'ask', question: `${'q'.repeat(139)}…` } });
  });

  it('should coerce caller caps', () => {
    const res = applyLengthControl(
      payload,
      { query: '한줄로', maxChars: '100', maxTokens: 'lots' },
      { tokenizer, config },
    );
    expect(res.charCap).toBe(100);
    expect(res.tokenCap).toBe(50);
    expect(res.payload).toEqual({ script: { mode: 'ask', question: `${'q'.repeat(99)}…` } });
  });

  it('should use the configured default char cap', () => {
    const res = applyLengthControl({ answer: 'short' }, { query: '', maxChars: 0 }, {
      tokenizer,
      config: { ...config, defaultMaxChars: 2000 },
    });
    expect(res).toEqual({ payload: { answer: 'short' }, style: 'medium', charCap: 2000, tokenCap: 300 });
  });
});

describe('lengthStage', () => {
  it('should record the chosen style on the context', () => {
    const ctx = createContext({ turns: [{ role: 'user', content: '자세히 알려줘' }] });
    ctx.outputs.relevance = { related: true };
    const res = lengthStage(ctx, { tokenizer, config });
    expect(res.style).toBe('long');
    expect(ctx.params.lengthStyle).toBe('long');
    expect(ctx.trimmed).toBe(res);
    expect(res.payload).toEqual({ relevance: { related: true } });
  });
});
