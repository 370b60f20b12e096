import Bottleneck from 'bottleneck';
import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';
import { metrics } from './metrics.service.js';
import { ValidationError, ValidationErrorKind, getErrorMessage } from '../errors/validation.error.js';
import type { AddressValidator, ValidationResult } from '../types/validation.types.js';

/**
 * Concurrent Dispatcher
 *
 * Fans a batch out to one validation per address and collects the results in
 * completion order, so callers correlate by `original`. One address failing
 * never affects the others.
 *
 * maxConcurrency = 0 launches every address at once; a positive value bounds
 * in-flight validations through a Bottleneck limiter.
 */

export interface ConcurrentDispatcherConfig {
  maxConcurrency: number;
}

export class ConcurrentDispatcher {
  private validator: AddressValidator;
  private limiter: Bottleneck | null;
  private maxConcurrency: number;
  private logger: StructuredLogger;

  constructor(
    validator: AddressValidator,
    config: ConcurrentDispatcherConfig,
    logger: StructuredLogger = defaultLogger
  ) {
    this.validator = validator;
    this.maxConcurrency = config.maxConcurrency;
    this.logger = logger;
    this.limiter = config.maxConcurrency > 0
      ? new Bottleneck({ maxConcurrent: config.maxConcurrency })
      : null;
  }

  async validateMany(addresses: readonly string[]): Promise<ValidationResult[]> {
    if (addresses.length === 0) {
      return [];
    }

    const startedAt = performance.now();
    this.logger.batchStarted({ size: addresses.length, maxConcurrency: this.maxConcurrency });

    // Sized to the input; a slot is claimed only once its unit has finished
    const results: ValidationResult[] = new Array(addresses.length);
    let completed = 0;

    await Promise.all(
      addresses.map(async (address) => {
        const result = await this.runUnit(address);
        results[completed++] = result;
      })
    );

    metrics.recordBatch(addresses.length);
    this.logger.batchCompleted({
      size: addresses.length,
      valid: results.filter((result) => result.isValid).length,
      duration: Math.round(performance.now() - startedAt),
    });

    return results;
  }

  private async runUnit(address: string): Promise<ValidationResult> {
    try {
      if (this.limiter) {
        return await this.limiter.schedule(() => this.validator.validate(address));
      }
      return await this.validator.validate(address);
    } catch (error) {
      this.logger.error('Validation unit failed', { email: address, error });
      return Object.freeze({
        original: address,
        name: '',
        address: '',
        isIpDomain: false,
        isReserved: false,
        isDisposable: false,
        isFreeProvider: false,
        isValid: false,
        validationTimeMs: 0,
        error: new ValidationError(
          ValidationErrorKind.INTERNAL,
          `Validation failed unexpectedly: ${getErrorMessage(error)}`,
          { input: address },
          { cause: error }
        ),
      });
    }
  }
}
