import validator from 'validator';
import type { IAddressParser } from './address-parser.provider.interface.js';
import type { ParsedAddress } from '../types/validation.types.js';
import { extractAddressLiteral } from '../services/domain-classifier.service.js';
import { ValidationError, ValidationErrorKind } from '../errors/validation.error.js';

/**
 * Address parser built on validator.isEmail
 *
 * Accepts a bare address, an angle-bracketed address, or a display name followed
 * by an angle-bracketed address ("John Doe" <john@example.com>). Domain literals
 * are accepted when they hold a valid IP, with or without the IPv6: tag.
 */

// name <address>, with an optional (possibly quoted) name
const NAMED_ADDRESS = /^(.*?)\s*<([^<>]*)>$/s;

const EMAIL_OPTIONS = {
  allow_display_name: false,
  require_tld: false,
  allow_ip_domain: false,
  allow_utf8_local_part: true,
};

function parseFailure(raw: string, reason: string): ValidationError {
  return new ValidationError(
    ValidationErrorKind.PARSE_FAILURE,
    `Invalid email format: ${reason}`,
    { input: raw, reason }
  );
}

function unquoteName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/\\(.)/g, '$1');
  }
  return trimmed;
}

export class ValidatorAddressParser implements IAddressParser {
  parse(raw: string): ParsedAddress {
    const input = raw.trim();
    if (input.length === 0) {
      throw parseFailure(raw, 'empty address');
    }

    let name = '';
    let address = input;

    const named = NAMED_ADDRESS.exec(input);
    if (named) {
      name = unquoteName(named[1]);
      address = named[2].trim();
      if (/[<>]/.test(name)) {
        throw parseFailure(raw, 'unexpected angle bracket in display name');
      }
    }

    const at = address.lastIndexOf('@');
    if (at === -1) {
      throw parseFailure(raw, 'missing @');
    }

    const localPart = address.slice(0, at);
    const domain = address.slice(at + 1);
    if (localPart.length === 0) {
      throw parseFailure(raw, 'missing local part');
    }
    if (domain.length === 0) {
      throw parseFailure(raw, 'missing domain');
    }

    if (!this.isWellFormed(localPart, domain)) {
      throw parseFailure(raw, 'malformed address');
    }

    return { name, address };
  }

  private isWellFormed(localPart: string, domain: string): boolean {
    const literal = extractAddressLiteral(domain);
    if (literal === null) {
      return validator.isEmail(`${localPart}@${domain}`, EMAIL_OPTIONS);
    }

    // validator accepts [ip] literals but not the IPv6: tag, so check the literal on its own
    if (literal.length === 0 || !validator.isIP(literal)) {
      return false;
    }
    return validator.isEmail(`${localPart}@[${literal}]`, { ...EMAIL_OPTIONS, allow_ip_domain: true });
  }
}

export const addressParser = new ValidatorAddressParser();
