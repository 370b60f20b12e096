/**
 * Validator configuration
 * Builds the default options from the environment and validates caller overrides
 */

import { z } from 'zod';
import { config } from './env.js';
import type { ValidatorOptions, ValidatorOptionsInput } from '../types/validation.types.js';
import { ValidationError, ValidationErrorKind } from '../errors/validation.error.js';

export const defaultOptions: Readonly<ValidatorOptions> = Object.freeze({
  checkDns: config.checkDns,
  checkDisposable: config.checkDisposable,
  checkFreeProvider: config.checkFreeProvider,
  rejectDisposable: false,
  rejectFreeProvider: false,
  rejectIpDomains: true,
  rejectReserved: false,
  rejectNamedEmails: false,
  maxEmailLength: config.maxEmailLength,
  minDomainLength: config.minDomainLength,
  dnsTimeoutMs: config.dnsTimeoutMs,
  dnsCacheTtlMs: config.dnsCacheTtlMs,
  dnsCacheSize: config.dnsCacheSize,
  disposableListUrl: config.disposableListUrl,
  freeProvidersUrl: config.freeProvidersUrl,
  maxConcurrency: config.maxConcurrency,
});

export const DEFAULT_FREE_PROVIDERS: readonly string[] = [
  'gmail.com',
  'yahoo.com',
  'hotmail.com',
  'outlook.com',
  'aol.com',
];

const positiveInt = z.number().int().positive();

export const validatorOptionsSchema = z
  .object({
    checkDns: z.boolean().default(defaultOptions.checkDns),
    checkDisposable: z.boolean().default(defaultOptions.checkDisposable),
    checkFreeProvider: z.boolean().default(defaultOptions.checkFreeProvider),
    rejectDisposable: z.boolean().default(defaultOptions.rejectDisposable),
    rejectFreeProvider: z.boolean().default(defaultOptions.rejectFreeProvider),
    rejectIpDomains: z.boolean().default(defaultOptions.rejectIpDomains),
    rejectReserved: z.boolean().default(defaultOptions.rejectReserved),
    rejectNamedEmails: z.boolean().default(defaultOptions.rejectNamedEmails),
    maxEmailLength: positiveInt.default(defaultOptions.maxEmailLength),
    minDomainLength: z.number().int().nonnegative().default(defaultOptions.minDomainLength),
    dnsTimeoutMs: positiveInt.default(defaultOptions.dnsTimeoutMs),
    dnsCacheTtlMs: positiveInt.default(defaultOptions.dnsCacheTtlMs),
    dnsCacheSize: positiveInt.default(defaultOptions.dnsCacheSize),
    disposableListUrl: z.string().default(defaultOptions.disposableListUrl),
    freeProvidersUrl: z.string().default(defaultOptions.freeProvidersUrl),
    maxConcurrency: z.number().int().nonnegative().default(defaultOptions.maxConcurrency),
  })
  .strict();

/**
 * Back-fills unset fields from the defaults and freezes the result.
 * Throws INVALID_OPTIONS when a value is out of range or unknown.
 */
export function resolveOptions(input: ValidatorOptionsInput = {}): Readonly<ValidatorOptions> {
  const parsed = validatorOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      ValidationErrorKind.INVALID_OPTIONS,
      `Invalid validator options: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown issue'}`,
      { field: issue ? issue.path.join('.') : null }
    );
  }
  const options: ValidatorOptions = parsed.data;
  return Object.freeze(options);
}
