export {
  EmailValidationService,
  createEmailValidator,
  type EmailValidatorDependencies,
} from './services/email-validation.service.js';
export { ConcurrentDispatcher, type ConcurrentDispatcherConfig } from './services/concurrent-dispatcher.service.js';
export { ResolutionCache, type ResolutionCacheDependencies } from './services/resolution-cache.service.js';
export { MembershipIndex, normalizeDomain } from './services/membership-index.service.js';
export { BloomFilter } from './services/bloom-filter.service.js';
export { ReadWriteLock } from './services/read-write-lock.service.js';
export { isIpDomain, isReservedDomain } from './services/domain-classifier.service.js';
export { StructuredLogger, logger } from './services/logger.service.js';
export { MetricsService, metrics } from './services/metrics.service.js';

export { ValidatorAddressParser, addressParser } from './providers/address-parser.provider.js';
export { DomainListProvider, domainListProvider } from './providers/domain-list.provider.js';
export { dnsMxLookup } from './providers/dns-mx.provider.js';
export type { IAddressParser } from './providers/address-parser.provider.interface.js';
export type { IListSource } from './providers/list-source.provider.interface.js';

export { defaultOptions, resolveOptions, DEFAULT_FREE_PROVIDERS } from './config/config.js';
export {
  ValidationError,
  ValidationErrorKind,
  isValidationError,
  type ValidationErrorContext,
} from './errors/validation.error.js';

export type {
  AddressValidator,
  ParsedAddress,
  ValidationResult,
  ValidatorOptions,
  ValidatorOptionsInput,
} from './types/validation.types.js';
export { DEFAULT_BLOOM_OPTIONS, type BloomOptions, type MembershipMode } from './types/membership.types.js';
export type { CacheEntry, MxLookup, ResolutionCacheConfig, ResolutionOutcome } from './types/dns.types.js';
