import { describe, it, expect } from 'vitest';
import { extractVerificationCode, toSmsRecord, SmsResolver } from '../../../../src/sync/sources/sms.js';

describe('extractVerificationCode', () => {
  it('should find a standalone 4 to 6 digit code', () => {
    expect(extractVerificationCode('Your code is 4829')).toBe('4829');
    expect(extractVerificationCode('482913 is your login code')).toBe('482913');
    expect(extractVerificationCode('Code: 55123.')).toBe('55123');
  });

  it('should ignore shorter and longer digit runs', () => {
    expect(extractVerificationCode('Call 123 now')).toBe('');
    expect(extractVerificationCode('Order 12345678 shipped')).toBe('');
  });

  it('should take the first match', () => {
    expect(extractVerificationCode('Ref 99 code 1111 or 2222')).toBe('1111');
  });

  it('should return an empty string when there is no code', () => {
    expect(extractVerificationCode('See you at lunch')).toBe('');
    expect(extractVerificationCode('')).toBe('');
  });
});

describe('toSmsRecord', () => {
  it('should fall back to Unknown for a blank sender', () => {
    expect(toSmsRecord('  ', 'hi')).toEqual({ sender: 'Unknown', content: 'hi', code: '' });
    expect(toSmsRecord(' Bank ', 'code 9876')).toEqual({ sender: 'Bank', content: 'code 9876', code: '9876' });
  });
});

describe('SmsResolver', () => {
  it('should produce a candidate without an item id', async () => {
    const resolver = new SmsResolver();
    const candidate = await resolver.locate({
      source: 'sms',
      message: { sender: 'Bank', content: 'code 9876' },
      arrivalTime: 0,
    });

    expect(candidate?.itemId).toBeUndefined();
    expect(candidate?.label).toBe('sms from Bank');
    expect(await candidate?.load()).toEqual({
      contentKind: 'json',
      payload: { sender: 'Bank', content: 'code 9876', code: '9876' },
      pathSuffix: '/sms',
    });
  });
});
