/**
 * Prometheus Metrics Service
 *
 * Metrics:
 * - mailsift_validations_total{outcome,error_kind}: Validations by outcome
 * - mailsift_validation_duration_seconds: Per-address validation duration
 * - mailsift_dns_cache_lookups_total{result}: Cache hits and misses
 * - mailsift_dns_cache_evictions_total{reason}: Evictions (expired / lru)
 * - mailsift_dns_cache_size: Current cache size
 * - mailsift_list_loads_total{list,status}: Domain list loads
 * - mailsift_batch_size: Addresses per batch
 */

import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export class MetricsService {
  private registry: Registry;

  // Counters
  public validationsTotal: Counter<'outcome' | 'error_kind'>;
  public dnsCacheLookupsTotal: Counter<'result'>;
  public dnsCacheEvictionsTotal: Counter<'reason'>;
  public listLoadsTotal: Counter<'list' | 'status'>;

  // Histograms
  public validationDuration: Histogram<'outcome'>;
  public batchSize: Histogram;

  // Gauges
  public dnsCacheSize: Gauge;

  constructor() {
    this.registry = new Registry();

    this.registry.setDefaultLabels({
      app: 'mailsift',
    });

    this.validationsTotal = new Counter({
      name: 'mailsift_validations_total',
      help: 'Total number of validated addresses by outcome',
      labelNames: ['outcome', 'error_kind'] as const,
      registers: [this.registry],
    });

    this.dnsCacheLookupsTotal = new Counter({
      name: 'mailsift_dns_cache_lookups_total',
      help: 'DNS cache lookups by result',
      labelNames: ['result'] as const,
      registers: [this.registry],
    });

    this.dnsCacheEvictionsTotal = new Counter({
      name: 'mailsift_dns_cache_evictions_total',
      help: 'DNS cache evictions by reason',
      labelNames: ['reason'] as const,
      registers: [this.registry],
    });

    this.listLoadsTotal = new Counter({
      name: 'mailsift_list_loads_total',
      help: 'Domain list loads by list and status',
      labelNames: ['list', 'status'] as const,
      registers: [this.registry],
    });

    this.validationDuration = new Histogram({
      name: 'mailsift_validation_duration_seconds',
      help: 'Per-address validation duration in seconds',
      labelNames: ['outcome'] as const,
      buckets: [0.0001, 0.001, 0.01, 0.05, 0.1, 0.5, 1, 3, 5], // seconds
      registers: [this.registry],
    });

    this.batchSize = new Histogram({
      name: 'mailsift_batch_size',
      help: 'Number of addresses per batch validation',
      buckets: [1, 10, 50, 100, 500, 1000, 5000],
      registers: [this.registry],
    });

    this.dnsCacheSize = new Gauge({
      name: 'mailsift_dns_cache_size',
      help: 'Current number of entries in the DNS cache',
      registers: [this.registry],
    });
  }

  recordValidation(valid: boolean, errorKind: string | null, durationMs: number) {
    const outcome = valid ? 'valid' : 'invalid';
    this.validationsTotal.inc({ outcome, error_kind: errorKind ?? 'none' });
    this.validationDuration.observe({ outcome }, durationMs / 1000);
  }

  recordCacheLookup(hit: boolean) {
    this.dnsCacheLookupsTotal.inc({ result: hit ? 'hit' : 'miss' });
  }

  recordCacheEviction(reason: 'expired' | 'lru', count = 1) {
    if (count > 0) {
      this.dnsCacheEvictionsTotal.inc({ reason }, count);
    }
  }

  setCacheSize(size: number) {
    this.dnsCacheSize.set(size);
  }

  recordListLoad(list: string, success: boolean) {
    this.listLoadsTotal.inc({ list, status: success ? 'success' : 'failure' });
  }

  recordBatch(size: number) {
    this.batchSize.observe(size);
  }

  /**
   * Gets metrics in Prometheus text format
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}

/**
 * Global metrics instance
 */
export const metrics = new MetricsService();
