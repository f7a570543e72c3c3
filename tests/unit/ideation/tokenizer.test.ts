import {
  WhitespaceTokenizer,
  createTokenizer,
  enforceTokenCap,
  type Tokenizer,
} from '../../../src/core/tokenizer.js';

describe('WhitespaceTokenizer', () => {
  const ws = new WhitespaceTokenizer();

  it('should split on any whitespace', () => {
    expect(ws.encode('  a  b\nc ')).toEqual(['a', 'b', 'c']);
    expect(ws.exact).toBe(false);
  });

  it('should truncate to the token cap', () => {
    expect(enforceTokenCap('a b c d', 2, ws)).toBe('a b');
    expect(enforceTokenCap('a b', 2, ws)).toBe('a b');
  });

  it('should ignore absent or non-positive caps', () => {
    expect(enforceTokenCap('a b c', null, ws)).toBe('a b c');
    expect(enforceTokenCap('a b c', 0, ws)).toBe('a b c');
    expect(enforceTokenCap('a b c', undefined, ws)).toBe('a b c');
  });
});

describe('enforceTokenCap fallbacks', () => {
  it('should slice by characters when decoding numeric units fails', () => {
    const broken: Tokenizer<number> = {
      exact: true,
      encode: () => [1, 2, 3, 4, 5],
      decode: () => {
        throw new Error('decode failed');
      },
    };
    expect(enforceTokenCap('abcdefghijkl', 2, broken)).toBe('abcdefgh');
  });

  it('should rejoin word units when encoding and decoding both fail', () => {
    const broken: Tokenizer = {
      exact: true,
      encode: () => {
        throw new Error('encode failed');
      },
      decode: () => {
        throw new Error('decode failed');
      },
    };
    expect(enforceTokenCap('one two three', 2, broken)).toBe('one two');
  });
});

describe('tiktoken tokenizer', () => {
  const tok = createTokenizer('cl100k_base');

  it('should be exact', () => {
    expect(tok.exact).toBe(true);
  });

  it('should truncate by subword tokens', () => {
    expect(enforceTokenCap('hello world, this is a test', 2, tok)).toBe('hello world');
  });

  it('should not leave a replacement character after a cut', () => {
    const out = enforceTokenCap('캠핑장 예약 플랫폼을 만들고 싶어요', 1, tok);
    expect(out).not.toMatch(/\uFFFD$/);
  });

  it('should encode special-token text as plain text', () => {
    expect(enforceTokenCap('<|endoftext|> and more words here', 100, tok)).toBe('<|endoftext|> and more words here');
  });
});
