/**
 * DNS resolution cache types
 */

import type { MxRecord } from 'dns';
import type { ValidationError } from '../errors/validation.error.js';

/**
 * Performs a live MX lookup. Implementations should stop work when the signal aborts.
 */
export type MxLookup = (domain: string, signal: AbortSignal) => Promise<MxRecord[]>;

/**
 * Outcome of resolving a domain, cached whether it succeeded or not
 */
export interface ResolutionOutcome {
  found: boolean;
  error: ValidationError | null;
}

export interface CacheEntry {
  outcome: ResolutionOutcome;
  cachedAt: number;
  lastReadAt: number;
}

export interface ResolutionCacheConfig {
  timeoutMs: number;
  ttlMs: number;
  capacity: number;
}
