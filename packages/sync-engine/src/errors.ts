/**
 * Sync Engine Errors
 */

import type { ProductRecord } from '@feedsync/integrations';

export type ValidationErrorCode =
  | 'INVALID_IDENTIFIER'
  | 'INVALID_STOCK'
  | 'INVALID_PRICE'
  | 'DUPLICATE_IDENTIFIER';

/**
 * A supplier record that cannot be listed. The record is skipped, the rest
 * of the batch goes on.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly identifier: string,
    public readonly field: keyof ProductRecord,
    public readonly code: ValidationErrorCode
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
