/**
 * Library configuration - parse, don't validate.
 *
 * - Single source of truth for the environment surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result); only the process-level accessor throws
 */

import { z } from 'zod';
import { err, ok, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import { formatAppError } from '../errors/formatter.js';
import { ConfigurationError } from '../errors/contract-violation.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type AcquireTimeoutMs = Brand<number, 'AcquireTimeoutMs'>;

export interface SyncConfig {
  readonly logLevel: LogLevel;
  /** Default wait bound for async acquisition; `null` waits until granted. */
  readonly acquireTimeoutMs: AcquireTimeoutMs | null;
}

export type ValidatedSyncConfig = ValidatedConfig<SyncConfig>;

export interface LoadSyncConfigOptions {
  readonly env: Record<string, string | undefined>;
}

export const MAX_ACQUIRE_TIMEOUT_MS = 3_600_000;

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const blankToUndefined = (v: string | undefined): string | undefined =>
  v === undefined || v.trim() === '' ? undefined : v.trim();

const EnvSchema = z.object({
  REFSYNC_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => blankToUndefined(v)?.toLowerCase())
    .pipe(z.enum(LOG_LEVELS).default('silent')),

  REFSYNC_ACQUIRE_TIMEOUT_MS: z
    .string()
    .optional()
    .transform((v) => {
      const trimmed = blankToUndefined(v);
      return trimmed === undefined ? undefined : Number(trimmed);
    })
    .pipe(
      z
        .number()
        .int('REFSYNC_ACQUIRE_TIMEOUT_MS must be an integer')
        .min(0, 'REFSYNC_ACQUIRE_TIMEOUT_MS cannot be negative')
        .max(MAX_ACQUIRE_TIMEOUT_MS, 'REFSYNC_ACQUIRE_TIMEOUT_MS cannot exceed 1 hour (3600000ms)')
        .optional()
    ),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadSyncConfigResult = Result<ValidatedSyncConfig, ConfigInvalidError>;

export function loadSyncConfig(options: LoadSyncConfigOptions): LoadSyncConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data) as ValidatedSyncConfig);
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedSyncConfig(value: SyncConfig): ValidatedSyncConfig {
  return value as ValidatedSyncConfig;
}

let _processConfig: ValidatedSyncConfig | null = null;

/**
 * Configuration parsed from `process.env`, once per process.
 *
 * @throws ConfigurationError when the environment does not parse
 */
export function getSyncConfig(): ValidatedSyncConfig {
  if (_processConfig === null) {
    _processConfig = loadSyncConfig({ env: process.env }).match(
      (config) => config,
      (e) => {
        throw new ConfigurationError(formatAppError(e), e.issues);
      }
    );
  }
  return _processConfig;
}

/** Drop the cached process config so the next access re-reads the environment. */
export function resetSyncConfig(): void {
  _processConfig = null;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): SyncConfig {
  const timeout = env.REFSYNC_ACQUIRE_TIMEOUT_MS;
  return {
    logLevel: env.REFSYNC_LOG_LEVEL,
    acquireTimeoutMs: timeout === undefined || timeout === 0 ? null : (timeout as AcquireTimeoutMs),
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
