import { describe, it, expect } from 'vitest';
import {
  extractAddressLiteral,
  isIpDomain,
  isReservedDomain,
} from '../../src/services/domain-classifier.service.js';

/**
 * Unit Tests - Domain Classifier
 */
describe('Domain Classifier - IP domains', () => {
  it('should recognize bracketed IPv4 literals', () => {
    expect(isIpDomain('[192.168.1.1]')).toBe(true);
    expect(isIpDomain('user@[127.0.0.1]')).toBe(true);
  });

  it('should recognize bracketed IPv6 literals with or without the tag', () => {
    expect(isIpDomain('[IPv6:2001:db8::1]')).toBe(true);
    expect(isIpDomain('[2001:db8::1]')).toBe(true);
    expect(isIpDomain('user@[IPv6:::1]')).toBe(true);
  });

  it('should not treat a bare dotted quad as an IP domain', () => {
    expect(isIpDomain('192.168.1.1')).toBe(false);
    expect(isIpDomain('user@192.168.1.1')).toBe(false);
  });

  it('should reject malformed literals', () => {
    const malformed = [
      '[]',
      '[300.300.300.300]',
      '[192.168.1.]',
      '[192.168.001.001]',
      '[ 192.168.1.1 ]',
      '[192.168.1.1a]',
      '[[192.168.1.1]]',
      '[192.168.1.1',
      'example.com',
    ];

    for (const domain of malformed) {
      expect(isIpDomain(domain), domain).toBe(false);
    }
  });

  it('should strip brackets and the IPv6 tag when extracting a literal', () => {
    expect(extractAddressLiteral('[10.0.0.1]')).toBe('10.0.0.1');
    expect(extractAddressLiteral('[IPv6:::1]')).toBe('::1');
    expect(extractAddressLiteral('example.com')).toBeNull();
    expect(extractAddressLiteral('[')).toBeNull();
  });
});

describe('Domain Classifier - Reserved domains', () => {
  it('should match the reserved example domains exactly', () => {
    expect(isReservedDomain('example.com')).toBe(true);
    expect(isReservedDomain('example.org')).toBe(true);
    expect(isReservedDomain('EXAMPLE.COM')).toBe(true);
    expect(isReservedDomain('user@example.net')).toBe(true);
  });

  it('should match reserved TLDs on label boundaries', () => {
    expect(isReservedDomain('domain.test')).toBe(true);
    expect(isReservedDomain('user@domain.test')).toBe(true);
    expect(isReservedDomain('mydomain.example')).toBe(true);
    expect(isReservedDomain('foo.invalid')).toBe(true);
    expect(isReservedDomain('test')).toBe(true);
    expect(isReservedDomain('localhost')).toBe(true);
    expect(isReservedDomain('api.localhost')).toBe(true);
  });

  it('should not match reserved words that are not whole labels', () => {
    expect(isReservedDomain('mytest.com')).toBe(false);
    expect(isReservedDomain('user@mytest.com')).toBe(false);
    expect(isReservedDomain('test.com')).toBe(false);
    expect(isReservedDomain('localhost.company.com')).toBe(false);
    expect(isReservedDomain('sub.example.com')).toBe(false);
    expect(isReservedDomain('gmail.com')).toBe(false);
  });
});
