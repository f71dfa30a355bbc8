/**
 * Package-name helpers for scan roots.
 */

import type { Config } from '../config.js';

const DELIMITERS = /[,; \t\n]+/;
const PLACEHOLDER = /\$\{([^}:]+)(?::([^}]*))?\}/g;

/** Splits a base-package declaration on `,; \t\n`, dropping empty tokens. */
export function tokenizePackages(value: string): string[] {
  return value
    .split(DELIMITERS)
    .map((token) => token.trim())
    .filter((token) => token !== '');
}

/**
 * Replaces `${key}` and `${key:default}` with configuration values.
 * Unresolvable placeholders without a default are left untouched.
 */
export function resolvePlaceholders(text: string, config: Config | null): string {
  return text.replace(PLACEHOLDER, (whole, key: string, fallback: string | undefined) => {
    const value = config?.get(key.trim());
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return String(value);
    }
    return fallback ?? whole;
  });
}
