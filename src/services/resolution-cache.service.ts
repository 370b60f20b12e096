import { ReadWriteLock } from './read-write-lock.service.js';
import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';
import { metrics } from './metrics.service.js';
import { normalizeDomain } from './membership-index.service.js';
import { dnsMxLookup } from '../providers/dns-mx.provider.js';
import { ValidationError, ValidationErrorKind, getErrorMessage } from '../errors/validation.error.js';
import type {
  CacheEntry,
  MxLookup,
  ResolutionCacheConfig,
  ResolutionOutcome,
} from '../types/dns.types.js';
import type { MxRecord } from 'dns';

/**
 * DNS Resolution Cache
 *
 * Caches MX lookup outcomes, successes and failures alike, for ttlMs. Holds at
 * most `capacity` entries: when full, expired entries are dropped first, then
 * the entry read least recently.
 *
 * Locking follows the owner's read/write lock:
 * - freshness check: read
 * - last-read bookkeeping: separate write section, skipped if the entry is gone
 * - insert/evict: write
 * - live lookups run outside the lock
 */

export interface ResolutionCacheDependencies {
  lock?: ReadWriteLock;
  lookup?: MxLookup;
  now?: () => number;
  logger?: StructuredLogger;
}

type LookupSettled = { records: MxRecord[] } | { error: unknown };

function errorCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

export class ResolutionCache {
  private entries = new Map<string, CacheEntry>();
  private config: ResolutionCacheConfig;
  private lock: ReadWriteLock;
  private lookup: MxLookup;
  private now: () => number;
  private logger: StructuredLogger;

  constructor(config: ResolutionCacheConfig, deps: ResolutionCacheDependencies = {}) {
    this.config = config;
    this.lock = deps.lock ?? new ReadWriteLock();
    this.lookup = deps.lookup ?? dnsMxLookup;
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? defaultLogger;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Returns the cached outcome while fresh, otherwise performs a bounded live lookup
   */
  async resolve(domain: string): Promise<ResolutionOutcome> {
    const key = normalizeDomain(domain);

    const cached = await this.lock.read(() => {
      const entry = this.entries.get(key);
      if (entry && this.now() - entry.cachedAt < this.config.ttlMs) {
        return entry;
      }
      return null;
    });

    if (cached) {
      metrics.recordCacheLookup(true);
      await this.lock.write(() => {
        // Best-effort: evicted or replaced in between means nothing to touch
        if (this.entries.get(key) === cached) {
          cached.lastReadAt = this.now();
        }
      });
      return cached.outcome;
    }

    metrics.recordCacheLookup(false);
    this.logger.debug('DNS cache miss', { domain: key });
    const outcome = await this.lookupWithTimeout(key);

    await this.lock.write(() => this.store(key, outcome));
    return outcome;
  }

  /**
   * Cached entry for a domain regardless of age, without touching it
   */
  async peek(domain: string): Promise<Readonly<CacheEntry> | undefined> {
    const key = normalizeDomain(domain);
    return this.lock.read(() => {
      const entry = this.entries.get(key);
      return entry ? { ...entry } : undefined;
    });
  }

  async clear(): Promise<void> {
    await this.lock.write(() => {
      this.entries.clear();
      metrics.setCacheSize(0);
    });
  }

  private async lookupWithTimeout(domain: string): Promise<ResolutionOutcome> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.config.timeoutMs);
    });

    // Settle into a value so a lookup rejecting after the timeout is still handled
    const lookup: Promise<LookupSettled> = this.lookup(domain, controller.signal).then(
      (records) => ({ records }),
      (error: unknown) => ({ error })
    );

    try {
      const settled = await Promise.race([lookup, timeout]);

      if (settled === 'timeout') {
        controller.abort();
        this.logger.dnsLookupTimedOut({ domain, timeoutMs: this.config.timeoutMs });
        return {
          found: false,
          error: new ValidationError(
            ValidationErrorKind.DNS_TIMEOUT,
            `DNS lookup timeout after ${this.config.timeoutMs}ms`,
            { domain, timeoutMs: this.config.timeoutMs }
          ),
        };
      }

      if ('error' in settled) {
        return {
          found: false,
          error: new ValidationError(
            ValidationErrorKind.DNS_LOOKUP_FAILURE,
            `MX lookup failed for ${domain}: ${errorCode(settled.error) ?? getErrorMessage(settled.error)}`,
            { domain, code: errorCode(settled.error) },
            { cause: settled.error }
          ),
        };
      }

      if (settled.records.length === 0) {
        return {
          found: false,
          error: new ValidationError(
            ValidationErrorKind.DNS_LOOKUP_FAILURE,
            `No MX records found for ${domain}`,
            { domain, code: null }
          ),
        };
      }

      return { found: true, error: null };
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Must run under the write lock
   */
  private store(key: string, outcome: ResolutionOutcome): void {
    const now = this.now();

    // A refresh replaces its own slot and never needs room
    this.entries.delete(key);
    if (this.entries.size >= this.config.capacity) {
      this.evict(now);
    }

    this.entries.set(key, { outcome, cachedAt: now, lastReadAt: now });
    metrics.setCacheSize(this.entries.size);
  }

  private evict(now: number): void {
    let expired = 0;
    for (const [key, entry] of this.entries) {
      if (now - entry.cachedAt >= this.config.ttlMs) {
        this.entries.delete(key);
        expired++;
      }
    }

    let lru: string | null = null;
    if (this.entries.size >= this.config.capacity) {
      let oldest = Number.POSITIVE_INFINITY;
      for (const [key, entry] of this.entries) {
        // Strictly older, so ties go to the earliest inserted
        if (entry.lastReadAt < oldest) {
          oldest = entry.lastReadAt;
          lru = key;
        }
      }
      if (lru !== null) {
        this.entries.delete(lru);
      }
    }

    metrics.recordCacheEviction('expired', expired);
    metrics.recordCacheEviction('lru', lru === null ? 0 : 1);
    this.logger.dnsCacheEvicted({ expired, lru, size: this.entries.size });
  }
}
