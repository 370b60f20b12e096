/**
 * Shared helpers for tests
 */

import type { ValidationResult } from '../../src/types/validation.types.js';

export function fixtureUri(name: string): string {
  return new URL(`../fixtures/${name}`, import.meta.url).href;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, resolve: () => release() };
}

export function validResult(original: string): ValidationResult {
  return Object.freeze({
    original,
    name: '',
    address: original,
    isIpDomain: false,
    isReserved: false,
    isDisposable: false,
    isFreeProvider: false,
    isValid: true,
    validationTimeMs: 0,
    error: null,
  });
}
