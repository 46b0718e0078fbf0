import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type AppError = ConfigInvalidError;

/**
 * Branded type for validated config.
 * (Kept here so callers can require a validated version without runtime checks.)
 */
export type ValidatedConfig<T> = Brand<T, 'ValidatedConfig'>;
