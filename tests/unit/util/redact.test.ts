import { scrubMessage, scrubPII } from '../../../src/util/redact.js';

describe('Redact', () => {
  it('should scrub e-mail and phone numbers when enabled', () => {
    const message = 'Reach me at owner@camp.example or 010-1234-5678';
    expect(scrubMessage(message, true)).toBe('Reach me at [REDACTED_EMAIL] or [REDACTED_PHONE]');
  });

  it('should scrub long digit runs', () => {
    expect(scrubMessage('business no 1234567890', true)).toBe('business no [REDACTED_NUMBER]');
  });

  it('should not scrub message when disabled', () => {
    const message = 'My email is owner@camp.example';
    expect(scrubMessage(message, false)).toBe(message);
  });

  it('should scrub nested values when enabled', () => {
    const obj = { user: { email: 'test@example.com', notes: ['call +82 10 1234 5678'] }, count: 3 };
    expect(scrubPII(obj, true)).toEqual({
      user: { email: '[REDACTED_EMAIL]', notes: ['call [REDACTED_PHONE]'] },
      count: 3,
    });
  });

  it('should return the same object when disabled', () => {
    const obj = { email: 'test@example.com' };
    expect(scrubPII(obj, false)).toBe(obj);
  });

  it('should handle non-object inputs', () => {
    expect(scrubPII('string input', true)).toBe('string input');
    expect(scrubPII(42, true)).toBe(42);
    expect(scrubPII(null, true)).toBeNull();
  });
});
