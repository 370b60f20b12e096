/**
 * Disposable-domain membership index types
 */

export type MembershipMode = 'exact' | 'bloom';

/**
 * Options for switching the index to bloom-filter mode
 */
export interface BloomOptions {
  /** Target false-positive rate of each filter, between 0 and 1 exclusive */
  falsePositiveRate: number;
  /** Domains that are never reported disposable */
  trustedDomains: Iterable<string>;
  /**
   * Number of independently seeded filters a domain must match.
   * The effective false-positive rate is roughly falsePositiveRate^verificationAttempts.
   */
  verificationAttempts: number;
  /** Sizing hint; defaults to the number of domains folded in at upgrade */
  expectedItems?: number;
}

export const DEFAULT_BLOOM_OPTIONS: Readonly<BloomOptions> = {
  falsePositiveRate: 0.001, // 0.1%
  trustedDomains: [],
  verificationAttempts: 1,
};
