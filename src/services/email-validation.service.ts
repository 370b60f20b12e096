import { buffer } from 'stream/consumers';
import type { Readable, Writable } from 'stream';
import { resolveOptions, DEFAULT_FREE_PROVIDERS } from '../config/config.js';
import { isIpDomain, isReservedDomain } from './domain-classifier.service.js';
import { MembershipIndex, normalizeDomain } from './membership-index.service.js';
import { ResolutionCache } from './resolution-cache.service.js';
import { ReadWriteLock } from './read-write-lock.service.js';
import { ConcurrentDispatcher } from './concurrent-dispatcher.service.js';
import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';
import { metrics } from './metrics.service.js';
import { addressParser } from '../providers/address-parser.provider.js';
import { domainListProvider } from '../providers/domain-list.provider.js';
import type { IAddressParser } from '../providers/address-parser.provider.interface.js';
import type { IListSource } from '../providers/list-source.provider.interface.js';
import type { MxLookup } from '../types/dns.types.js';
import {
  DEFAULT_BLOOM_OPTIONS,
  type BloomOptions,
  type MembershipMode,
} from '../types/membership.types.js';
import type {
  AddressValidator,
  ValidationResult,
  ValidatorOptions,
  ValidatorOptionsInput,
} from '../types/validation.types.js';
import {
  ValidationError,
  ValidationErrorKind,
  getErrorMessage,
  isValidationError,
} from '../errors/validation.error.js';

/**
 * Email validation service
 *
 * Pipeline, stopping at the first rejection:
 * 1. Length check
 * 2. Address parsing
 * 3. Named-address policy
 * 4-5. Domain extraction and minimum length
 * 6. IP-literal domain
 * 7. Reserved domain
 * 8. Disposable domain (when enabled)
 * 9. Free provider (when enabled)
 * 10. MX lookup through the resolution cache (when enabled)
 *
 * The disposable index, free-provider set and DNS cache are shared by concurrent
 * validate() calls and guarded by one read/write lock per instance.
 */

export interface EmailValidatorDependencies {
  parser?: IAddressParser;
  listSource?: IListSource;
  mxLookup?: MxLookup;
  /** Clock used for DNS cache ages, in epoch milliseconds */
  now?: () => number;
  logger?: StructuredLogger;
}

type DomainList = 'disposable' | 'free_provider';

type ResultDraft = { -readonly [K in keyof ValidationResult]: ValidationResult[K] };

export class EmailValidationService implements AddressValidator {
  readonly options: Readonly<ValidatorOptions>;

  private lock = new ReadWriteLock();
  private disposableIndex = new MembershipIndex();
  private freeProviders: Set<string>;
  private cache: ResolutionCache;
  private dispatcher: ConcurrentDispatcher;
  private parser: IAddressParser;
  private listSource: IListSource;
  private logger: StructuredLogger;

  constructor(options: ValidatorOptionsInput = {}, deps: EmailValidatorDependencies = {}) {
    this.options = resolveOptions(options);
    this.parser = deps.parser ?? addressParser;
    this.listSource = deps.listSource ?? domainListProvider;
    this.logger = deps.logger ?? defaultLogger;
    this.freeProviders = new Set(DEFAULT_FREE_PROVIDERS);

    this.cache = new ResolutionCache(
      {
        timeoutMs: this.options.dnsTimeoutMs,
        ttlMs: this.options.dnsCacheTtlMs,
        capacity: this.options.dnsCacheSize,
      },
      { lock: this.lock, lookup: deps.mxLookup, now: deps.now, logger: this.logger }
    );

    this.dispatcher = new ConcurrentDispatcher(
      this,
      { maxConcurrency: this.options.maxConcurrency },
      this.logger
    );
  }

  /**
   * Loads the configured disposable and free-provider lists
   */
  async initialize(): Promise<void> {
    await this.loadDisposableDomains(this.options.disposableListUrl);
    await this.loadFreeProviders(this.options.freeProvidersUrl);

    const summary = await this.lock.read(() => ({
      mode: this.disposableIndex.mode,
      disposable: this.disposableIndex.size,
      freeProviders: this.freeProviders.size,
    }));
    this.logger.info('Validator initialized', summary);
  }

  get membershipMode(): MembershipMode {
    return this.disposableIndex.mode;
  }

  get dnsCache(): ResolutionCache {
    return this.cache;
  }

  /**
   * Validate a single address. Never throws; failures are attached to the result.
   */
  async validate(email: string): Promise<ValidationResult> {
    const startedAt = performance.now();
    const draft: ResultDraft = {
      original: email,
      name: '',
      address: '',
      isIpDomain: false,
      isReserved: false,
      isDisposable: false,
      isFreeProvider: false,
      isValid: false,
      validationTimeMs: 0,
      error: null,
    };

    try {
      draft.error = await this.runPipeline(email, draft);
    } catch (error) {
      draft.error = isValidationError(error)
        ? error
        : new ValidationError(
            ValidationErrorKind.INTERNAL,
            `Unexpected validation failure: ${getErrorMessage(error)}`,
            { input: email },
            { cause: error }
          );
    }

    draft.isValid = draft.error === null;
    draft.validationTimeMs = performance.now() - startedAt;
    const result: ValidationResult = Object.freeze(draft);

    metrics.recordValidation(result.isValid, result.error?.kind ?? null, result.validationTimeMs);
    this.logger.emailValidated({
      email,
      valid: result.isValid,
      error_kind: result.error?.kind,
      reason: result.error?.message,
      duration: result.validationTimeMs,
    });

    return result;
  }

  /**
   * Validate many addresses concurrently. Result order is completion order.
   */
  async validateMany(emails: readonly string[]): Promise<ValidationResult[]> {
    return this.dispatcher.validateMany(emails);
  }

  /**
   * Merges a disposable list into the active index. No-op when disposable
   * checking is off or the URI is empty; nothing is merged on failure.
   */
  async loadDisposableDomains(uri: string): Promise<void> {
    if (!this.options.checkDisposable || uri === '') {
      return;
    }
    const domains = await this.fetchList('disposable', uri);
    await this.lock.write(() => this.disposableIndex.register(domains));
    this.logger.listLoaded({ list: 'disposable', source: uri, count: domains.length });
  }

  /**
   * Merges a free-provider list. No-op when free-provider checking is off or the URI is empty.
   */
  async loadFreeProviders(uri: string): Promise<void> {
    if (!this.options.checkFreeProvider || uri === '') {
      return;
    }
    const domains = await this.fetchList('free_provider', uri);
    await this.lock.write(() => {
      for (const domain of domains) {
        this.freeProviders.add(domain);
      }
    });
    this.logger.listLoaded({ list: 'free_provider', source: uri, count: domains.length });
  }

  async registerDisposableDomains(domains: readonly string[]): Promise<void> {
    await this.lock.write(() => this.disposableIndex.register(domains));
  }

  async registerFreeProviders(domains: readonly string[]): Promise<void> {
    await this.lock.write(() => {
      for (const domain of domains) {
        const value = normalizeDomain(domain);
        if (value.length > 0) {
          this.freeProviders.add(value);
        }
      }
    });
  }

  /**
   * Adds domains that the bloom filter must never report as disposable
   */
  async registerTrustedDomains(domains: readonly string[]): Promise<void> {
    await this.lock.write(() => this.disposableIndex.registerTrusted(domains));
  }

  /**
   * Switches disposable checking to bloom filters built from the list at `uri`
   * plus everything already registered. One-way; holds the write lock throughout.
   */
  async useBloomFilter(uri: string, bloomOptions: Partial<BloomOptions> = {}): Promise<void> {
    if (uri === '') {
      throw new ValidationError(ValidationErrorKind.LIST_LOAD_FAILURE, 'URL is required');
    }

    await this.lock.write(async () => {
      const domains = await this.fetchList('disposable', uri);
      this.disposableIndex.upgrade(domains, bloomOptions);
      this.logger.bloomFilterActivated({
        source: uri,
        domains: domains.length,
        falsePositiveRate: bloomOptions.falsePositiveRate ?? DEFAULT_BLOOM_OPTIONS.falsePositiveRate,
        verificationAttempts: this.disposableIndex.verificationAttempts,
      });
    });
  }

  /**
   * Writes the active filters to `stream` as one blob. The stream is left open.
   */
  async saveBloomFilter(stream: Writable): Promise<void> {
    const blob = await this.lock.read(() => this.disposableIndex.serialize());

    await new Promise<void>((resolve, reject) => {
      stream.write(blob, (error) => (error ? reject(error) : resolve()));
    });

    this.logger.bloomFilterSaved({ bytes: blob.length });
  }

  /**
   * Reads `stream` to its end and replaces the active filters with its contents
   */
  async loadBloomFilter(stream: Readable): Promise<void> {
    let data: Buffer;
    try {
      data = await buffer(stream);
    } catch (error) {
      throw new ValidationError(
        ValidationErrorKind.FILTER_DESERIALIZE_FAILURE,
        `Failed to read bloom filter: ${getErrorMessage(error)}`,
        {},
        { cause: error }
      );
    }

    const replaced = await this.lock.write(() => {
      const previous = this.disposableIndex.verificationAttempts;
      this.disposableIndex.deserialize(data);
      return previous;
    });
    if (replaced > 0) {
      this.logger.warn('Replaced the active bloom filter', { previousFilters: replaced });
    }
    this.logger.bloomFilterRestored({ bytes: data.length, filters: this.disposableIndex.verificationAttempts });
  }

  private async runPipeline(email: string, draft: ResultDraft): Promise<ValidationError | null> {
    const { options } = this;

    // Quick length check before more expensive operations
    const length = Buffer.byteLength(email, 'utf8');
    if (length > options.maxEmailLength) {
      return new ValidationError(
        ValidationErrorKind.LENGTH_EXCEEDED,
        `Email exceeds maximum length of ${options.maxEmailLength} characters`,
        { length, maxEmailLength: options.maxEmailLength }
      );
    }

    const parsed = this.parser.parse(email);
    draft.name = parsed.name;
    draft.address = parsed.address;

    if (options.rejectNamedEmails && parsed.address !== email) {
      return new ValidationError(
        ValidationErrorKind.NAMED_ADDRESS_NOT_ALLOWED,
        'Named email addresses are not allowed',
        { name: parsed.name, address: parsed.address }
      );
    }

    const domain = parsed.address.slice(parsed.address.lastIndexOf('@') + 1);

    if (Buffer.byteLength(domain, 'utf8') < options.minDomainLength) {
      return new ValidationError(
        ValidationErrorKind.DOMAIN_TOO_SHORT,
        `Domain must be at least ${options.minDomainLength} characters`,
        { domain, minDomainLength: options.minDomainLength }
      );
    }

    draft.isIpDomain = isIpDomain(domain);
    if (draft.isIpDomain && options.rejectIpDomains) {
      return new ValidationError(
        ValidationErrorKind.IP_DOMAIN_REJECTED,
        'IP address domains are not allowed',
        { domain }
      );
    }

    draft.isReserved = isReservedDomain(domain);
    if (draft.isReserved && options.rejectReserved) {
      return new ValidationError(
        ValidationErrorKind.RESERVED_DOMAIN_REJECTED,
        `Reserved domain: ${domain}`,
        { domain }
      );
    }

    if (options.checkDisposable) {
      draft.isDisposable = await this.lock.read(() => this.disposableIndex.isDisposable(domain));
      if (draft.isDisposable && options.rejectDisposable) {
        return new ValidationError(
          ValidationErrorKind.DISPOSABLE_DOMAIN_REJECTED,
          `Disposable domain: ${domain}`,
          { domain }
        );
      }
    }

    if (options.checkFreeProvider) {
      const key = normalizeDomain(domain);
      draft.isFreeProvider = await this.lock.read(() => this.freeProviders.has(key));
      if (draft.isFreeProvider && options.rejectFreeProvider) {
        return new ValidationError(
          ValidationErrorKind.FREE_PROVIDER_REJECTED,
          `Free email provider: ${domain}`,
          { domain }
        );
      }
    }

    if (options.checkDns) {
      const outcome = await this.cache.resolve(domain);
      if (!outcome.found) {
        return outcome.error ?? new ValidationError(
          ValidationErrorKind.DNS_LOOKUP_FAILURE,
          `Invalid domain: ${domain}`,
          { domain, code: null }
        );
      }
    }

    return null;
  }

  private async fetchList(list: DomainList, uri: string): Promise<string[]> {
    try {
      const domains = await this.listSource.fetchList(uri);
      metrics.recordListLoad(list, true);
      return domains;
    } catch (error) {
      metrics.recordListLoad(list, false);
      this.logger.listLoadFailed({ list, source: uri, error: getErrorMessage(error) });
      if (isValidationError(error)) {
        throw error;
      }
      throw new ValidationError(
        ValidationErrorKind.LIST_LOAD_FAILURE,
        `Failed to load ${list} domains: ${getErrorMessage(error)}`,
        { uri },
        { cause: error }
      );
    }
  }
}

/**
 * Creates a validator and loads its configured domain lists
 */
export async function createEmailValidator(
  options: ValidatorOptionsInput = {},
  deps: EmailValidatorDependencies = {}
): Promise<EmailValidationService> {
  const validator = new EmailValidationService(options, deps);
  await validator.initialize();
  return validator;
}
