/**
 * Email validation types
 */

import type { ValidationError } from '../errors/validation.error.js';

/**
 * Result of validating a single address. Frozen once returned.
 */
export interface ValidationResult {
  readonly original: string;
  readonly name: string;
  readonly address: string;
  readonly isIpDomain: boolean;
  readonly isReserved: boolean;
  readonly isDisposable: boolean;
  readonly isFreeProvider: boolean;
  readonly isValid: boolean;
  readonly validationTimeMs: number;
  readonly error: ValidationError | null;
}

/**
 * Options for email validation
 */
export interface ValidatorOptions {
  checkDns: boolean;
  checkDisposable: boolean;
  checkFreeProvider: boolean;
  rejectDisposable: boolean;
  rejectFreeProvider: boolean;
  rejectIpDomains: boolean;
  rejectReserved: boolean;
  rejectNamedEmails: boolean;
  maxEmailLength: number;
  minDomainLength: number;
  dnsTimeoutMs: number;
  dnsCacheTtlMs: number;
  dnsCacheSize: number;
  disposableListUrl: string;
  freeProvidersUrl: string;
  maxConcurrency: number; // 0 = unbounded fan-out
}

/**
 * Options as accepted by the validator; unset fields take the configured defaults
 */
export type ValidatorOptionsInput = Partial<ValidatorOptions>;

/**
 * Parsed form of an address string
 */
export interface ParsedAddress {
  name: string;
  address: string;
}

/**
 * Anything that validates one address at a time
 */
export interface AddressValidator {
  validate(email: string): Promise<ValidationResult>;
}
