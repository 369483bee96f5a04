import { describe, it, expect } from 'vitest';
import { fingerprint } from '../../src/application/fingerprint.js';

describe('fingerprint', () => {
  it('ignores digit runs in the message', () => {
    expect(fingerprint('X', 'Timeout after 123 ms')).toBe(fingerprint('X', 'Timeout after 456 ms'));
  });

  it('is a 12-character lowercase hex string', () => {
    expect(fingerprint('X', 'boom')).toMatch(/^[0-9a-f]{12}$/);
  });

  it('distinguishes components and messages', () => {
    expect(fingerprint('X', 'boom')).not.toBe(fingerprint('Y', 'boom'));
    expect(fingerprint('X', 'boom')).not.toBe(fingerprint('X', 'bang'));
  });

  it('treats a missing component as empty', () => {
    expect(fingerprint(null, 'boom')).toBe(fingerprint('', 'boom'));
  });

  it('is deterministic', () => {
    expect(fingerprint('com.example.A', 'order 42 failed')).toBe(fingerprint('com.example.A', 'order 42 failed'));
  });
});
