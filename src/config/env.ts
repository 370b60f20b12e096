import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env from the package root
dotenv.config({ path: resolve(__dirname, '../../.env') });

interface Config {
  nodeEnv: string;
  logLevel: string;
  checkDns: boolean;
  checkDisposable: boolean;
  checkFreeProvider: boolean;
  maxEmailLength: number;
  minDomainLength: number;
  dnsTimeoutMs: number;
  dnsCacheTtlMs: number;
  dnsCacheSize: number;
  disposableListUrl: string;
  freeProvidersUrl: string;
  maxConcurrency: number;
  listFetchTimeoutMs: number;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return value === 'true' || value === '1';
}

const nodeEnv = process.env.NODE_ENV || 'development';

export const config: Config = {
  nodeEnv,
  logLevel: process.env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),
  checkDns: parseBoolean(process.env.MAILSIFT_CHECK_DNS, true),
  checkDisposable: parseBoolean(process.env.MAILSIFT_CHECK_DISPOSABLE, false),
  checkFreeProvider: parseBoolean(process.env.MAILSIFT_CHECK_FREE_PROVIDER, false),
  maxEmailLength: parseInt(process.env.MAILSIFT_MAX_EMAIL_LENGTH || '254', 10),
  minDomainLength: parseInt(process.env.MAILSIFT_MIN_DOMAIN_LENGTH || '1', 10),
  dnsTimeoutMs: parseInt(process.env.MAILSIFT_DNS_TIMEOUT_MS || '3000', 10), // 3 seconds
  dnsCacheTtlMs: parseInt(process.env.MAILSIFT_DNS_CACHE_TTL_MS || '300000', 10), // 5 minutes
  dnsCacheSize: parseInt(process.env.MAILSIFT_DNS_CACHE_SIZE || '1000', 10),
  disposableListUrl:
    process.env.MAILSIFT_DISPOSABLE_LIST_URL ??
    'https://disposable.github.io/disposable-email-domains/domains.json',
  freeProvidersUrl: process.env.MAILSIFT_FREE_PROVIDERS_URL ?? '',
  maxConcurrency: parseInt(process.env.MAILSIFT_MAX_CONCURRENCY || '0', 10), // 0 = unbounded
  listFetchTimeoutMs: parseInt(process.env.MAILSIFT_LIST_FETCH_TIMEOUT_MS || '10000', 10),
};
