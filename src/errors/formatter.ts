import type { AppError } from './app-error.js';
import type { SyncError } from './sync-error.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    default:
      return assertNever(error);
  }
}

export function formatSyncError(error: SyncError): string {
  const base = error.message !== undefined ? `${describeKind(error)}: ${error.message}` : describeKind(error);
  return error.cause !== undefined ? `${base}\nCause: ${safeToString(error.cause)}` : base;
}

function describeKind(error: SyncError): string {
  switch (error.kind) {
    case 'Locked':
      return 'Lock held';
    case 'Failed':
      return 'Lock operation failed';
    case 'Disposed':
      return 'Lock disposed';
    case 'Timeout':
      return 'Lock wait timed out';
    case 'Cancelled':
      return 'Lock wait cancelled';
    case 'RecursionError':
      return 'Recursive lock acquisition';
    case 'UnknownError':
      return 'Unknown lock error';
    default:
      return assertNever(error.kind);
  }
}

function safeToString(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return typeof value === 'string' ? value : JSON.stringify(value);
  } catch {
    return String(value);
  }
}
