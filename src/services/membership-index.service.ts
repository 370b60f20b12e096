import { BloomFilter } from './bloom-filter.service.js';
import { ValidationError, ValidationErrorKind } from '../errors/validation.error.js';
import {
  DEFAULT_BLOOM_OPTIONS,
  type BloomOptions,
  type MembershipMode,
} from '../types/membership.types.js';

/**
 * Disposable-domain membership index
 *
 * Starts as an exact set. upgrade() switches it, once and for good, to a stack of
 * bloom filters (one per verification attempt, each with its own seed) plus a
 * trusted override set. Callers use the same isDisposable/register contract in
 * both modes.
 *
 * The index does no locking of its own; EmailValidationService wraps every call
 * in its read/write lock.
 *
 * Serialized layout (big-endian):
 *   "MSBF" | u8 version | f64 falsePositiveRate | u8 filterCount |
 *   filterCount x (u32 length | BloomFilter blob)
 */

type MembershipState =
  | { mode: 'exact'; domains: Set<string> }
  | {
      mode: 'bloom';
      filters: BloomFilter[];
      trusted: Set<string>;
      falsePositiveRate: number;
    };

const MAGIC = Buffer.from('MSBF', 'ascii');
const FORMAT_VERSION = 1;
const MAX_VERIFICATION_ATTEMPTS = 16;

export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase();
}

function normalizeAll(domains: Iterable<string>): string[] {
  const normalized: string[] = [];
  for (const domain of domains) {
    const value = normalizeDomain(domain);
    if (value.length > 0) {
      normalized.push(value);
    }
  }
  return normalized;
}

function filterSeed(attempt: number): number {
  return attempt + 1;
}

function deserializeFailure(message: string, context: Record<string, number> = {}): ValidationError {
  return new ValidationError(ValidationErrorKind.FILTER_DESERIALIZE_FAILURE, message, context);
}

export class MembershipIndex {
  private state: MembershipState = { mode: 'exact', domains: new Set() };

  get mode(): MembershipMode {
    return this.state.mode;
  }

  /**
   * Exact entries in exact mode, trusted overrides in bloom mode
   */
  get size(): number {
    return this.state.mode === 'exact' ? this.state.domains.size : this.state.trusted.size;
  }

  get verificationAttempts(): number {
    return this.state.mode === 'bloom' ? this.state.filters.length : 0;
  }

  isDisposable(domain: string): boolean {
    const value = normalizeDomain(domain);

    if (this.state.mode === 'exact') {
      return this.state.domains.has(value);
    }

    // Trusted domains always win
    if (this.state.trusted.has(value)) {
      return false;
    }

    // Every independent filter must agree; one miss means definitely absent
    for (const filter of this.state.filters) {
      if (!filter.test(value)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Adds disposable domains to whichever structure is active
   */
  register(domains: Iterable<string>): void {
    const values = normalizeAll(domains);

    if (this.state.mode === 'exact') {
      for (const value of values) {
        this.state.domains.add(value);
      }
      return;
    }

    for (const value of values) {
      for (const filter of this.state.filters) {
        filter.add(value);
      }
    }
  }

  /**
   * Adds trusted overrides. Only meaningful once a filter is active.
   */
  registerTrusted(domains: Iterable<string>): void {
    if (this.state.mode !== 'bloom') {
      throw new ValidationError(
        ValidationErrorKind.FILTER_NOT_INITIALIZED,
        'Trusted domains require an active bloom filter'
      );
    }
    for (const value of normalizeAll(domains)) {
      this.state.trusted.add(value);
    }
  }

  /**
   * Switches to bloom mode. Existing exact entries and the source domains are
   * folded into freshly sized filters; the exact set is replaced by the trusted
   * overrides. State is untouched if this throws.
   */
  upgrade(sourceDomains: readonly string[], options: Partial<BloomOptions> = {}): void {
    const current = this.state;
    if (current.mode === 'bloom') {
      throw new ValidationError(
        ValidationErrorKind.FILTER_ALREADY_ACTIVE,
        'Bloom filter is already active'
      );
    }

    const source = normalizeAll(sourceDomains);
    if (source.length === 0) {
      throw new ValidationError(
        ValidationErrorKind.LIST_LOAD_FAILURE,
        'At least one source domain is required to build a bloom filter'
      );
    }

    const falsePositiveRate = options.falsePositiveRate ?? DEFAULT_BLOOM_OPTIONS.falsePositiveRate;
    const attempts = options.verificationAttempts ?? DEFAULT_BLOOM_OPTIONS.verificationAttempts;

    if (!(falsePositiveRate > 0 && falsePositiveRate < 1)) {
      throw new ValidationError(
        ValidationErrorKind.INVALID_OPTIONS,
        `falsePositiveRate must be between 0 and 1, got ${falsePositiveRate}`,
        { falsePositiveRate }
      );
    }
    if (!Number.isInteger(attempts) || attempts < 1 || attempts > MAX_VERIFICATION_ATTEMPTS) {
      throw new ValidationError(
        ValidationErrorKind.INVALID_OPTIONS,
        `verificationAttempts must be an integer between 1 and ${MAX_VERIFICATION_ATTEMPTS}, got ${attempts}`,
        { verificationAttempts: attempts }
      );
    }

    const domains = new Set([...current.domains, ...source]);
    const expectedItems = Math.max(options.expectedItems ?? 0, domains.size);

    const filters: BloomFilter[] = [];
    for (let attempt = 0; attempt < attempts; attempt++) {
      const filter = BloomFilter.withEstimates(expectedItems, falsePositiveRate, filterSeed(attempt));
      for (const domain of domains) {
        filter.add(domain);
      }
      filters.push(filter);
    }

    this.state = {
      mode: 'bloom',
      filters,
      trusted: new Set(normalizeAll(options.trustedDomains ?? DEFAULT_BLOOM_OPTIONS.trustedDomains)),
      falsePositiveRate,
    };
  }

  serialize(): Buffer {
    if (this.state.mode !== 'bloom') {
      throw new ValidationError(
        ValidationErrorKind.FILTER_NOT_INITIALIZED,
        'Bloom filter not initialized'
      );
    }

    const header = Buffer.alloc(MAGIC.length + 1 + 8 + 1);
    MAGIC.copy(header, 0);
    header.writeUInt8(FORMAT_VERSION, 4);
    header.writeDoubleBE(this.state.falsePositiveRate, 5);
    header.writeUInt8(this.state.filters.length, 13);

    const parts: Buffer[] = [header];
    for (const filter of this.state.filters) {
      const blob = filter.serialize();
      const length = Buffer.alloc(4);
      length.writeUInt32BE(blob.length, 0);
      parts.push(length, blob);
    }
    return Buffer.concat(parts);
  }

  /**
   * Replaces the active filters with the serialized ones. From exact mode this
   * switches to bloom mode and folds the exact entries into the restored filters.
   * Trusted overrides are kept when already in bloom mode.
   */
  deserialize(data: Buffer): void {
    const headerBytes = MAGIC.length + 1 + 8 + 1;
    if (data.length < headerBytes || !data.subarray(0, MAGIC.length).equals(MAGIC)) {
      throw deserializeFailure('Not a bloom filter blob', { bytes: data.length });
    }

    const version = data.readUInt8(4);
    if (version !== FORMAT_VERSION) {
      throw deserializeFailure(`Unsupported bloom filter format version ${version}`, { version });
    }

    const falsePositiveRate = data.readDoubleBE(5);
    const filterCount = data.readUInt8(13);
    if (filterCount < 1 || filterCount > MAX_VERIFICATION_ATTEMPTS) {
      throw deserializeFailure(`Invalid filter count ${filterCount}`, { filterCount });
    }

    const filters: BloomFilter[] = [];
    let offset = headerBytes;
    for (let i = 0; i < filterCount; i++) {
      if (offset + 4 > data.length) {
        throw deserializeFailure('Bloom filter data is truncated', { bytes: data.length, offset });
      }
      const length = data.readUInt32BE(offset);
      offset += 4;
      if (offset + length > data.length) {
        throw deserializeFailure('Bloom filter data is truncated', { bytes: data.length, offset, length });
      }
      filters.push(BloomFilter.deserialize(data.subarray(offset, offset + length)));
      offset += length;
    }

    if (offset !== data.length) {
      throw deserializeFailure('Trailing bytes after bloom filter data', {
        bytes: data.length,
        offset,
      });
    }

    const current = this.state;
    if (current.mode === 'exact') {
      for (const domain of current.domains) {
        for (const filter of filters) {
          filter.add(domain);
        }
      }
      this.state = { mode: 'bloom', filters, trusted: new Set(), falsePositiveRate };
      return;
    }

    this.state = { ...current, filters, falsePositiveRate };
  }
}
