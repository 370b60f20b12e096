/**
 * Error taxonomy shared by the validation pipeline and the list/filter operations.
 *
 * Pipeline errors are attached to a ValidationResult; operation errors
 * (list loading, filter activation, save/restore) are thrown.
 */

/**
 * Kinds of validation and operation failures
 */
export enum ValidationErrorKind {
  LENGTH_EXCEEDED = 'length_exceeded',
  PARSE_FAILURE = 'parse_failure',
  NAMED_ADDRESS_NOT_ALLOWED = 'named_address_not_allowed',
  DOMAIN_TOO_SHORT = 'domain_too_short',
  IP_DOMAIN_REJECTED = 'ip_domain_rejected',
  RESERVED_DOMAIN_REJECTED = 'reserved_domain_rejected',
  DISPOSABLE_DOMAIN_REJECTED = 'disposable_domain_rejected',
  FREE_PROVIDER_REJECTED = 'free_provider_rejected',
  DNS_TIMEOUT = 'dns_timeout',
  DNS_LOOKUP_FAILURE = 'dns_lookup_failure',
  LIST_LOAD_FAILURE = 'list_load_failure',
  FILTER_NOT_INITIALIZED = 'filter_not_initialized',
  FILTER_DESERIALIZE_FAILURE = 'filter_deserialize_failure',
  FILTER_ALREADY_ACTIVE = 'filter_already_active',
  INVALID_OPTIONS = 'invalid_options',
  INTERNAL = 'internal',
}

export type ValidationErrorContext = Record<string, string | number | boolean | null>;

export class ValidationError extends Error {
  readonly kind: ValidationErrorKind;
  readonly context: Readonly<ValidationErrorContext>;

  constructor(
    kind: ValidationErrorKind,
    message: string,
    context: ValidationErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ValidationError';
    this.kind = kind;
    // Cached outcomes share one instance across results
    this.context = Object.freeze({ ...context });
  }

  /**
   * Serializable view used by the logger
   */
  toJSON(): { kind: ValidationErrorKind; message: string; context: Readonly<ValidationErrorContext> } {
    return { kind: this.kind, message: this.message, context: this.context };
  }
}

/**
 * Narrows an unknown value to a ValidationError, optionally of a specific kind
 */
export function isValidationError(
  error: unknown,
  kind?: ValidationErrorKind
): error is ValidationError {
  if (!(error instanceof ValidationError)) {
    return false;
  }
  return kind === undefined || error.kind === kind;
}

/**
 * Extracts a readable message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
