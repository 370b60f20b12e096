/**
 * Structured Logger Service
 *
 * Structured JSON logging for validation, list loading, filter and cache events.
 *
 * Common fields per event:
 * - timestamp: ISO 8601 timestamp
 * - level: log level (info, warn, error, debug)
 * - event: dotted event name
 * - email / domain: the subject of the event (when applicable)
 * - error_kind: ValidationErrorKind (when applicable)
 * - duration: elapsed milliseconds (when applicable)
 * - message: human-readable message
 */

import pino from 'pino';
import { config } from '../config/env.js';

/**
 * Log context for validation events
 */
export interface ValidationLogContext {
  email?: string;
  domain?: string;
  list?: string;
  source?: string;
  error_kind?: string;
  duration?: number;
  [key: string]: unknown;
}

/**
 * Create base logger instance
 */
const baseLogger = pino({
  level: config.logLevel,

  // Format options
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },

  // Base fields included in every log
  base: {
    service: 'mailsift',
    environment: config.nodeEnv,
  },

  // Timestamp in ISO 8601 format
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

  // Pretty print in development
  transport: config.nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,
});

/**
 * Structured Logger
 */
export class StructuredLogger {
  private logger: pino.Logger;

  constructor(logger: pino.Logger = baseLogger) {
    this.logger = logger;
  }

  /**
   * Logs the outcome of a single validation
   */
  emailValidated(context: ValidationLogContext & { valid: boolean; reason?: string }) {
    this.logger.debug({
      event: 'email.validated',
      email: context.email,
      valid: context.valid,
      error_kind: context.error_kind,
      reason: context.reason,
      duration: context.duration,
      message: context.valid
        ? `Email validated: ${context.email}`
        : `Email invalid: ${context.email} (${context.reason})`,
    });
  }

  /**
   * Logs a domain list merged into the validator
   */
  listLoaded(context: { list: string; source: string; count: number }) {
    this.logger.info({
      event: 'list.loaded',
      list: context.list,
      source: context.source,
      count: context.count,
      message: `Loaded ${context.count} ${context.list} domains from ${context.source}`,
    });
  }

  /**
   * Logs a failed list load (nothing was merged)
   */
  listLoadFailed(context: { list: string; source: string; error: string }) {
    this.logger.error({
      event: 'list.load_failed',
      list: context.list,
      source: context.source,
      error: context.error,
      message: `Failed to load ${context.list} domains from ${context.source}: ${context.error}`,
    });
  }

  /**
   * Logs the switch from exact-set to bloom-filter membership
   */
  bloomFilterActivated(context: {
    source: string;
    domains: number;
    falsePositiveRate: number;
    verificationAttempts: number;
  }) {
    this.logger.info({
      event: 'bloom.activated',
      source: context.source,
      domains: context.domains,
      falsePositiveRate: context.falsePositiveRate,
      verificationAttempts: context.verificationAttempts,
      message: `Bloom filter activated with ${context.domains} domains (p=${context.falsePositiveRate}, k=${context.verificationAttempts})`,
    });
  }

  bloomFilterSaved(context: { bytes: number }) {
    this.logger.info({
      event: 'bloom.saved',
      bytes: context.bytes,
      message: `Bloom filter saved (${context.bytes} bytes)`,
    });
  }

  bloomFilterRestored(context: { bytes: number; filters: number }) {
    this.logger.info({
      event: 'bloom.restored',
      bytes: context.bytes,
      filters: context.filters,
      message: `Bloom filter restored (${context.bytes} bytes, ${context.filters} filters)`,
    });
  }

  /**
   * Logs an abandoned (cancelled) MX lookup
   */
  dnsLookupTimedOut(context: { domain: string; timeoutMs: number }) {
    this.logger.warn({
      event: 'dns.timeout',
      domain: context.domain,
      timeoutMs: context.timeoutMs,
      message: `MX lookup for ${context.domain} cancelled after ${context.timeoutMs}ms`,
    });
  }

  dnsCacheEvicted(context: { expired: number; lru: string | null; size: number }) {
    this.logger.debug({
      event: 'dns.cache_evicted',
      expired: context.expired,
      lru: context.lru,
      size: context.size,
      message: `DNS cache eviction: ${context.expired} expired${context.lru ? `, LRU ${context.lru}` : ''}`,
    });
  }

  batchStarted(context: { size: number; maxConcurrency: number }) {
    this.logger.debug({
      event: 'batch.started',
      size: context.size,
      maxConcurrency: context.maxConcurrency,
      message: `Validating batch of ${context.size} addresses`,
    });
  }

  batchCompleted(context: { size: number; valid: number; duration: number }) {
    this.logger.info({
      event: 'batch.completed',
      size: context.size,
      valid: context.valid,
      duration: context.duration,
      message: `Batch validated: ${context.valid}/${context.size} valid (${context.duration}ms)`,
    });
  }

  /**
   * Generic info log
   */
  info(message: string, context?: ValidationLogContext) {
    this.logger.info({ ...context, message });
  }

  /**
   * Generic warn log
   */
  warn(message: string, context?: ValidationLogContext) {
    this.logger.warn({ ...context, message });
  }

  /**
   * Generic error log
   */
  error(message: string, context?: ValidationLogContext & { error?: unknown }) {
    const error = context?.error;
    this.logger.error({
      ...context,
      error: error instanceof Error ? error.message : error,
      stack: error instanceof Error ? error.stack : undefined,
      message,
    });
  }

  /**
   * Generic debug log
   */
  debug(message: string, context?: ValidationLogContext) {
    this.logger.debug({ ...context, message });
  }
}

/**
 * Global logger instance
 */
export const logger = new StructuredLogger();
