import { describe, it, expect } from 'vitest';
import { maskEmail, maskMid, maskPhone, maybeMaskMids } from '../src/security/log_mask.js';
import { withEnv } from './helpers/mockEnv.js';

describe('log masking', () => {
  it('keeps the last four phone digits', () => {
    expect(maskPhone('010-1234-5678')).toBe('***-****-5678');
    expect(maskPhone(null)).toBeNull();
  });

  it('masks the local part of an email', () => {
    expect(maskEmail('alice@example.com')).toBe('a…e@example.com');
  });

  it('masks MIDs unless disabled', () => {
    expect(maskMid('A1234567A')).toBe('A1…7A');
    withEnv({ PII_MASK: 'true' }, () => expect(maybeMaskMids(['A1234567A', 'A7654321A'], 1)).toEqual(['A1…7A']));
    withEnv({ PII_MASK: 'false' }, () => expect(maybeMaskMids(['A1234567A'])).toEqual(['A1234567A']));
  });
});
