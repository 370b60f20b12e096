import { describe, it, expect } from 'vitest';
import { BloomFilter } from '../../src/services/bloom-filter.service.js';
import { ValidationErrorKind } from '../../src/errors/validation.error.js';

/**
 * Unit Tests - Bloom Filter
 */
describe('Bloom Filter', () => {
  const domains = Array.from({ length: 1000 }, (_, i) => `disposable-${i}.example`);

  it('should size itself from the expected items and false-positive rate', () => {
    const filter = BloomFilter.withEstimates(1000, 0.01);

    expect(filter.bitCount).toBe(9586);
    expect(filter.hashCount).toBe(7);
  });

  it('should reject an out-of-range false-positive rate', () => {
    expect(() => BloomFilter.withEstimates(100, 0)).toThrow(RangeError);
    expect(() => BloomFilter.withEstimates(100, 1)).toThrow(RangeError);
  });

  it('should reject invalid dimensions', () => {
    expect(() => new BloomFilter(0, 3)).toThrow(RangeError);
    expect(() => new BloomFilter(64, 0)).toThrow(RangeError);
    expect(() => new BloomFilter(64, 65)).toThrow(RangeError);
  });

  it('should never report an added item as absent', () => {
    const filter = BloomFilter.withEstimates(domains.length, 0.01, 1);
    domains.forEach((domain) => filter.add(domain));

    expect(domains.every((domain) => filter.test(domain))).toBe(true);
  });

  it('should stay close to the target false-positive rate', () => {
    const filter = BloomFilter.withEstimates(domains.length, 0.01, 1);
    domains.forEach((domain) => filter.add(domain));

    let falsePositives = 0;
    for (let i = 0; i < 20000; i++) {
      if (filter.test(`legit-${i}.com`)) {
        falsePositives++;
      }
    }

    const rate = falsePositives / 20000;
    expect(rate).toBeGreaterThan(0.003);
    expect(rate).toBeLessThan(0.03);
  });

  it('should produce different bit patterns for different seeds', () => {
    const first = new BloomFilter(1024, 4, 1);
    const second = new BloomFilter(1024, 4, 2);
    domains.slice(0, 50).forEach((domain) => {
      first.add(domain);
      second.add(domain);
    });

    expect(first.serialize().subarray(12).equals(second.serialize().subarray(12))).toBe(false);
  });

  it('should answer identically after a serialize/deserialize round-trip', () => {
    const filter = BloomFilter.withEstimates(1000, 0.01, 7);
    domains.forEach((domain) => filter.add(domain));

    const blob = filter.serialize();
    const restored = BloomFilter.deserialize(blob);

    expect(blob.length).toBe(12 + Math.ceil(9586 / 8));
    expect(restored.seed).toBe(7);
    expect(restored.hashCount).toBe(7);
    expect(restored.bitCount).toBe(9586);

    for (let i = 0; i < 2000; i++) {
      const candidate = `candidate-${i}.net`;
      expect(restored.test(candidate)).toBe(filter.test(candidate));
    }
    expect(domains.every((domain) => restored.test(domain))).toBe(true);
  });

  it('should not alias the buffer it was restored from', () => {
    const filter = new BloomFilter(64, 2, 3);
    const blob = filter.serialize();
    const restored = BloomFilter.deserialize(blob);

    restored.add('tempmail.com');

    expect(BloomFilter.deserialize(blob).test('tempmail.com')).toBe(false);
  });

  it('should reject truncated data', () => {
    expect(() => BloomFilter.deserialize(Buffer.alloc(8))).toThrow(
      expect.objectContaining({ kind: ValidationErrorKind.FILTER_DESERIALIZE_FAILURE })
    );
  });

  it('should reject a header that does not match the data length', () => {
    const blob = new BloomFilter(64, 2).serialize();

    expect(() => BloomFilter.deserialize(blob.subarray(0, blob.length - 1))).toThrow(
      expect.objectContaining({ kind: ValidationErrorKind.FILTER_DESERIALIZE_FAILURE })
    );
  });

  it('should reject an implausible hash count', () => {
    const blob = new BloomFilter(64, 2).serialize();
    blob.writeUInt32BE(1000, 4);

    expect(() => BloomFilter.deserialize(blob)).toThrow(
      expect.objectContaining({ kind: ValidationErrorKind.FILTER_DESERIALIZE_FAILURE })
    );
  });
});
