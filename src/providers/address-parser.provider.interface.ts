import type { ParsedAddress } from '../types/validation.types.js';

/**
 * Address Parser Interface
 *
 * Turns a raw address string into its display name and normalized address.
 * Implementations throw a ValidationError of kind PARSE_FAILURE on malformed input.
 */
export interface IAddressParser {
  parse(raw: string): ParsedAddress;
}
