/**
 * Option type (explicit absence).
 *
 * Philosophy:
 * - Absence is data (no null checks scattered through callers)
 * - Discriminated union (exhaustive by compiler)
 * - Conversions into neverthrow's Result for the error channel
 */

import { err, ok, type Result } from 'neverthrow';

export type Some<T> = { readonly kind: 'some'; readonly value: T };
export type None = { readonly kind: 'none' };

export type Option<T> = Some<T> | None;

const NONE: None = Object.freeze({ kind: 'none' });

export const some = <T>(value: T): Option<T> => ({ kind: 'some', value });
export const none = <T = never>(): Option<T> => NONE;

export function fromNullable<T>(value: T | null | undefined): Option<T> {
  return value === null || value === undefined ? NONE : some(value);
}

export function isSome<T>(option: Option<T>): option is Some<T> {
  return option.kind === 'some';
}

export function isNone<T>(option: Option<T>): option is None {
  return option.kind === 'none';
}

export function map<T, U>(option: Option<T>, fn: (value: T) => U): Option<U> {
  return option.kind === 'some' ? some(fn(option.value)) : NONE;
}

export function andThen<T, U>(option: Option<T>, fn: (value: T) => Option<U>): Option<U> {
  return option.kind === 'some' ? fn(option.value) : NONE;
}

export function unwrapOr<T>(option: Option<T>, fallback: T): T {
  return option.kind === 'some' ? option.value : fallback;
}

export function match<T, R>(option: Option<T>, onSome: (value: T) => R, onNone: () => R): R {
  return option.kind === 'some' ? onSome(option.value) : onNone();
}

/** `some(v)` becomes `ok(v)`, `none` becomes `err(error)`. */
export function okOr<T, E>(option: Option<T>, error: E): Result<T, E> {
  return option.kind === 'some' ? ok(option.value) : err(error);
}

/** Like {@link okOr}, but the error is only built when the option is empty. */
export function okOrElse<T, E>(option: Option<T>, makeError: () => E): Result<T, E> {
  return option.kind === 'some' ? ok(option.value) : err(makeError());
}
