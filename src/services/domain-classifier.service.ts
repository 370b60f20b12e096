import validator from 'validator';

/**
 * Domain classifier
 *
 * Stateless predicates over the domain part of an address. Each accepts either a
 * bare domain or a full address, in which case the part after the last '@' is used.
 */

// Reserved full domains (exact matches)
const RESERVED_DOMAINS: ReadonlySet<string> = new Set([
  'example.com',
  'example.net',
  'example.org',
  'example.edu',
  'localhost',
]);

// Reserved TLDs, matched as the whole domain or as the final label
const RESERVED_TLDS: readonly string[] = ['test', 'example', 'invalid', 'localhost'];

const IPV6_TAG = 'IPv6:';

function domainOf(value: string): string {
  return value.slice(value.lastIndexOf('@') + 1);
}

/**
 * Returns the IP literal inside a bracketed domain, or null when the value is
 * not bracket-delimited. The optional IPv6: tag is stripped.
 */
export function extractAddressLiteral(domain: string): string | null {
  if (domain.length < 2 || !domain.startsWith('[') || !domain.endsWith(']')) {
    return null;
  }
  const literal = domain.slice(1, -1);
  return literal.startsWith(IPV6_TAG) ? literal.slice(IPV6_TAG.length) : literal;
}

/**
 * True only for bracketed IPv4/IPv6 literals such as [192.168.1.1] or [IPv6:::1].
 * A bare dotted quad is not an IP domain.
 */
export function isIpDomain(value: string): boolean {
  const literal = extractAddressLiteral(domainOf(value));
  if (literal === null || literal.length === 0) {
    return false;
  }
  return validator.isIP(literal);
}

/**
 * True for IANA example/test domains and anything under a reserved TLD.
 * TLD matches respect label boundaries: "mytest.com" is not reserved.
 */
export function isReservedDomain(value: string): boolean {
  const domain = domainOf(value).toLowerCase();

  if (RESERVED_DOMAINS.has(domain)) {
    return true;
  }

  return RESERVED_TLDS.some((tld) => domain === tld || domain.endsWith(`.${tld}`));
}
