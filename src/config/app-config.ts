/**
 * Application configuration: parse, don't validate.
 *
 * - Zod validates the environment at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';
import { LOG_LEVELS } from '../core/logging/types.js';

export type SubgraphUrl = Brand<string, 'SubgraphUrl'>;

export interface AppConfig {
  readonly logging: { readonly level: LogLevel };
  /** Endpoints a store starts with, in order, deduplicated. */
  readonly subgraphs: readonly SubgraphUrl[];
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema
// =============================================================================

const LogLevelSchema = z.enum(LOG_LEVELS);

const EnvSchema = z.object({
  RAINMETA_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(LogLevelSchema.default('silent')),

  RAINMETA_SUBGRAPHS: z
    .string()
    .optional()
    .transform((v) =>
      (v ?? '')
        .split(',')
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
    )
    .pipe(z.array(z.string().url('RAINMETA_SUBGRAPHS entries must be URLs'))),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data) as ValidatedConfig);
}

/**
 * Tests and local construction only: a validated config without env parsing.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    logging: { level: env.RAINMETA_LOG_LEVEL },
    subgraphs: [...new Set(env.RAINMETA_SUBGRAPHS)].map((url) => url as SubgraphUrl),
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
