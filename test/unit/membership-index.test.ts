import { describe, it, expect, beforeEach } from 'vitest';
import { MembershipIndex } from '../../src/services/membership-index.service.js';
import { ValidationErrorKind } from '../../src/errors/validation.error.js';

/**
 * Unit Tests - Disposable Membership Index
 */
function expectKind(action: () => unknown, kind: ValidationErrorKind): void {
  expect(action).toThrow(expect.objectContaining({ kind }));
}

describe('Membership Index - Exact mode', () => {
  let index: MembershipIndex;

  beforeEach(() => {
    index = new MembershipIndex();
  });

  it('should start empty in exact mode', () => {
    expect(index.mode).toBe('exact');
    expect(index.size).toBe(0);
    expect(index.verificationAttempts).toBe(0);
    expect(index.isDisposable('tempmail.com')).toBe(false);
  });

  it('should report registered domains case-insensitively', () => {
    index.register(['TempMail.com', '  throwaway.io ', '']);

    expect(index.size).toBe(2);
    expect(index.isDisposable('tempmail.com')).toBe(true);
    expect(index.isDisposable('TEMPMAIL.COM')).toBe(true);
    expect(index.isDisposable('throwaway.io')).toBe(true);
    expect(index.isDisposable('example.com')).toBe(false);
  });

  it('should keep earlier registrations when more are added', () => {
    index.register(['first.com']);
    index.register(['second.com']);

    expect(index.isDisposable('first.com')).toBe(true);
    expect(index.isDisposable('second.com')).toBe(true);
  });

  it('should refuse trusted overrides without a bloom filter', () => {
    expectKind(() => index.registerTrusted(['gmail.com']), ValidationErrorKind.FILTER_NOT_INITIALIZED);
  });

  it('should refuse to serialize without a bloom filter', () => {
    expectKind(() => index.serialize(), ValidationErrorKind.FILTER_NOT_INITIALIZED);
  });
});

describe('Membership Index - Upgrade', () => {
  let index: MembershipIndex;

  beforeEach(() => {
    index = new MembershipIndex();
  });

  it('should fold existing entries and the source into the filters', () => {
    index.register(['old.com']);
    index.upgrade(['new.com', 'other.com'], { falsePositiveRate: 0.001 });

    expect(index.mode).toBe('bloom');
    expect(index.verificationAttempts).toBe(1);
    expect(index.isDisposable('old.com')).toBe(true);
    expect(index.isDisposable('new.com')).toBe(true);
    expect(index.isDisposable('OTHER.com')).toBe(true);
  });

  it('should let trusted domains override the filter', () => {
    index.upgrade(['gmail.com', 'temp.com'], { trustedDomains: ['Gmail.com'] });

    expect(index.isDisposable('gmail.com')).toBe(false);
    expect(index.isDisposable('temp.com')).toBe(true);
    expect(index.size).toBe(1);
  });

  it('should accept trusted overrides after the upgrade', () => {
    index.upgrade(['temp.com', 'partner.com']);
    index.registerTrusted(['partner.com']);

    expect(index.isDisposable('partner.com')).toBe(false);
    expect(index.isDisposable('temp.com')).toBe(true);
  });

  it('should add later registrations to the filters', () => {
    index.upgrade(['temp.com']);
    index.register(['later.com']);

    expect(index.isDisposable('later.com')).toBe(true);
    expect(index.size).toBe(0);
  });

  it('should build one filter per verification attempt', () => {
    index.upgrade(['temp.com'], { verificationAttempts: 3 });

    expect(index.verificationAttempts).toBe(3);
    expect(index.isDisposable('temp.com')).toBe(true);
  });

  it('should refuse an empty source and stay in exact mode', () => {
    index.register(['kept.com']);

    expectKind(() => index.upgrade(['', '  ']), ValidationErrorKind.LIST_LOAD_FAILURE);
    expect(index.mode).toBe('exact');
    expect(index.isDisposable('kept.com')).toBe(true);
  });

  it('should refuse invalid bloom options', () => {
    expectKind(() => index.upgrade(['temp.com'], { falsePositiveRate: 0 }), ValidationErrorKind.INVALID_OPTIONS);
    expectKind(() => index.upgrade(['temp.com'], { falsePositiveRate: 1.5 }), ValidationErrorKind.INVALID_OPTIONS);
    expectKind(() => index.upgrade(['temp.com'], { verificationAttempts: 0 }), ValidationErrorKind.INVALID_OPTIONS);
    expectKind(() => index.upgrade(['temp.com'], { verificationAttempts: 17 }), ValidationErrorKind.INVALID_OPTIONS);
    expect(index.mode).toBe('exact');
  });

  it('should refuse a second upgrade', () => {
    index.upgrade(['temp.com']);

    expectKind(() => index.upgrade(['other.com']), ValidationErrorKind.FILTER_ALREADY_ACTIVE);
  });
});

describe('Membership Index - Verification attempts', () => {
  const source = Array.from({ length: 2000 }, (_, i) => `disposable-${i}.example`);

  function falsePositives(attempts: number): number {
    const index = new MembershipIndex();
    index.upgrade(source, { falsePositiveRate: 0.05, verificationAttempts: attempts });

    let count = 0;
    for (let i = 0; i < 20000; i++) {
      if (index.isDisposable(`legit-${i}.com`)) {
        count++;
      }
    }
    return count;
  }

  it('should lower the false-positive rate with each extra attempt', () => {
    const one = falsePositives(1);
    const two = falsePositives(2);
    const three = falsePositives(3);

    // Roughly 5%, 0.25% and 0.0125% of 20000 lookups
    expect(one / 20000).toBeGreaterThan(0.02);
    expect(one / 20000).toBeLessThan(0.09);
    expect(two).toBeLessThan(one);
    expect(two / 20000).toBeLessThan(0.01);
    expect(three).toBeLessThan(two);
    expect(three / 20000).toBeLessThan(0.002);
  });
});

describe('Membership Index - Persistence', () => {
  const source = Array.from({ length: 500 }, (_, i) => `spam-${i}.example`);

  it('should answer identically after a save/load round-trip', () => {
    const original = new MembershipIndex();
    original.upgrade(source, { falsePositiveRate: 0.01, verificationAttempts: 2 });

    const restored = new MembershipIndex();
    restored.deserialize(original.serialize());

    expect(restored.mode).toBe('bloom');
    expect(restored.verificationAttempts).toBe(2);
    expect(source.every((domain) => restored.isDisposable(domain))).toBe(true);
    for (let i = 0; i < 2000; i++) {
      const candidate = `candidate-${i}.org`;
      expect(restored.isDisposable(candidate)).toBe(original.isDisposable(candidate));
    }
  });

  it('should fold exact entries into filters loaded from exact mode', () => {
    const original = new MembershipIndex();
    original.upgrade(['tempmail.com']);

    const restored = new MembershipIndex();
    restored.register(['local-only.com']);
    restored.deserialize(original.serialize());

    expect(restored.mode).toBe('bloom');
    expect(restored.isDisposable('tempmail.com')).toBe(true);
    expect(restored.isDisposable('local-only.com')).toBe(true);
  });

  it('should keep trusted overrides when loading in bloom mode', () => {
    const original = new MembershipIndex();
    original.upgrade(['tempmail.com', 'partner.com']);

    const restored = new MembershipIndex();
    restored.upgrade(['placeholder.com'], { trustedDomains: ['partner.com'] });
    restored.deserialize(original.serialize());

    expect(restored.isDisposable('tempmail.com')).toBe(true);
    expect(restored.isDisposable('partner.com')).toBe(false);
  });

  it('should reject data that is not a filter blob and leave the index untouched', () => {
    const index = new MembershipIndex();
    index.register(['kept.com']);

    expectKind(() => index.deserialize(Buffer.from('not a bloom filter')), ValidationErrorKind.FILTER_DESERIALIZE_FAILURE);
    expect(index.mode).toBe('exact');
    expect(index.isDisposable('kept.com')).toBe(true);
  });

  it('should reject truncated and padded blobs', () => {
    const original = new MembershipIndex();
    original.upgrade(['tempmail.com'], { verificationAttempts: 2 });
    const blob = original.serialize();

    const index = new MembershipIndex();
    expectKind(() => index.deserialize(blob.subarray(0, blob.length - 3)), ValidationErrorKind.FILTER_DESERIALIZE_FAILURE);
    expectKind(() => index.deserialize(Buffer.concat([blob, Buffer.from([0])])), ValidationErrorKind.FILTER_DESERIALIZE_FAILURE);
    expect(index.mode).toBe('exact');
  });

  it('should reject an unknown format version', () => {
    const original = new MembershipIndex();
    original.upgrade(['tempmail.com']);
    const blob = original.serialize();
    blob.writeUInt8(9, 4);

    expectKind(() => new MembershipIndex().deserialize(blob), ValidationErrorKind.FILTER_DESERIALIZE_FAILURE);
  });
});
