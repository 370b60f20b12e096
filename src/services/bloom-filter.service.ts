import crypto from 'crypto';
import { ValidationError, ValidationErrorKind } from '../errors/validation.error.js';

/**
 * Bloom Filter
 *
 * Fixed-size bit array with k hash positions per item, derived by double hashing
 * a SHA-256 digest of (seed, item). The seed is part of the filter state, so two
 * filters built from the same items with the same seed answer identically and a
 * serialized filter reproduces its answers exactly after a round-trip.
 *
 * Binary layout (big-endian):
 *   u32 seed | u32 hashCount | u32 bitCount | bits (ceil(bitCount / 8) bytes)
 */

const HEADER_BYTES = 12;
const MAX_BIT_COUNT = 0xffffffff;
const MAX_HASH_COUNT = 64;

export class BloomFilter {
  readonly seed: number;
  readonly hashCount: number;
  readonly bitCount: number;
  private bits: Uint8Array;

  constructor(bitCount: number, hashCount: number, seed = 0, bits?: Uint8Array) {
    if (!Number.isInteger(bitCount) || bitCount < 1 || bitCount > MAX_BIT_COUNT) {
      throw new RangeError(`Invalid bloom filter size: ${bitCount} bits`);
    }
    if (!Number.isInteger(hashCount) || hashCount < 1 || hashCount > MAX_HASH_COUNT) {
      throw new RangeError(`Invalid bloom filter hash count: ${hashCount}`);
    }

    this.bitCount = bitCount;
    this.hashCount = hashCount;
    this.seed = seed >>> 0;
    this.bits = bits ?? new Uint8Array(Math.ceil(bitCount / 8));
  }

  /**
   * Sizes a filter for the expected number of items at the target false-positive rate:
   * m = -n ln(p) / (ln 2)^2, k = (m / n) ln 2
   */
  static withEstimates(expectedItems: number, falsePositiveRate: number, seed = 0): BloomFilter {
    if (!(falsePositiveRate > 0 && falsePositiveRate < 1)) {
      throw new RangeError(`False positive rate must be between 0 and 1, got ${falsePositiveRate}`);
    }
    const n = Math.max(1, Math.ceil(expectedItems));
    const bitCount = Math.min(
      MAX_BIT_COUNT,
      Math.max(8, Math.ceil((-n * Math.log(falsePositiveRate)) / (Math.LN2 * Math.LN2)))
    );
    const hashCount = Math.min(
      MAX_HASH_COUNT,
      Math.max(1, Math.round((bitCount / n) * Math.LN2))
    );
    return new BloomFilter(bitCount, hashCount, seed);
  }

  add(item: string): void {
    for (const index of this.positions(item)) {
      this.bits[index >>> 3] |= 1 << (index & 7);
    }
  }

  /**
   * False means definitely absent; true means possibly present
   */
  test(item: string): boolean {
    for (const index of this.positions(item)) {
      if ((this.bits[index >>> 3] & (1 << (index & 7))) === 0) {
        return false;
      }
    }
    return true;
  }

  serialize(): Buffer {
    const buffer = Buffer.alloc(HEADER_BYTES + this.bits.length);
    buffer.writeUInt32BE(this.seed, 0);
    buffer.writeUInt32BE(this.hashCount, 4);
    buffer.writeUInt32BE(this.bitCount, 8);
    buffer.set(this.bits, HEADER_BYTES);
    return buffer;
  }

  static deserialize(data: Buffer): BloomFilter {
    if (data.length < HEADER_BYTES) {
      throw new ValidationError(
        ValidationErrorKind.FILTER_DESERIALIZE_FAILURE,
        'Bloom filter data is truncated',
        { bytes: data.length }
      );
    }

    const seed = data.readUInt32BE(0);
    const hashCount = data.readUInt32BE(4);
    const bitCount = data.readUInt32BE(8);
    const expectedBytes = HEADER_BYTES + Math.ceil(bitCount / 8);

    if (
      hashCount < 1 ||
      hashCount > MAX_HASH_COUNT ||
      bitCount < 1 ||
      data.length !== expectedBytes
    ) {
      throw new ValidationError(
        ValidationErrorKind.FILTER_DESERIALIZE_FAILURE,
        'Bloom filter header does not match its data',
        { bytes: data.length, expectedBytes, hashCount, bitCount }
      );
    }

    // Copy so the filter does not alias the caller's buffer
    const bits = Uint8Array.from(data.subarray(HEADER_BYTES));
    return new BloomFilter(bitCount, hashCount, seed, bits);
  }

  private positions(item: string): number[] {
    const seedBytes = Buffer.alloc(4);
    seedBytes.writeUInt32BE(this.seed, 0);
    const digest = crypto.createHash('sha256').update(seedBytes).update(item).digest();

    const h1 = digest.readUInt32BE(0);
    // Odd step so successive bit positions do not collapse onto one bit
    const h2 = (digest.readUInt32BE(4) | 1) >>> 0;

    const positions: number[] = new Array(this.hashCount);
    for (let i = 0; i < this.hashCount; i++) {
      positions[i] = (h1 + i * h2) % this.bitCount;
    }
    return positions;
  }
}
