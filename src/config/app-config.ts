/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for the environment surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 * - The temporary root is a value here, handed to whoever needs it; nothing
 *   else derives it from the environment
 */

import * as path from 'path';
import { z } from 'zod';
import { ok, err, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type EngineName = Brand<string, 'EngineName'>;
export type TempRoot = Brand<string, 'TempRoot'>;

export const OUTPUT_FORMATS = ['pdf', 'dvi', 'xdv'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const DEFAULT_ENGINE = 'pdflatex';
export const TEMP_ROOT_DIRNAME = 'texloop';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export interface AppConfig {
  readonly engine: EngineName;
  readonly paths: {
    readonly cwd: string;
    readonly tempRoot: TempRoot;
  };
  readonly output: { readonly format: OutputFormat };
  readonly logging: { readonly level: LogLevel };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  readonly cwd: string;
  /** Platform temp directory (os.tmpdir()). */
  readonly tmpdir: string;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const EnvSchema = z.object({
  // An empty TEX falls back to the default, same as an unset one.
  TEX: z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === '' ? DEFAULT_ENGINE : v)),

  VERBOSE: z.string().optional(),

  TEXLOOP_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(LOG_LEVELS).optional()),

  TEXLOOP_TMP_ROOT: z.string().min(1, 'TEXLOOP_TMP_ROOT cannot be empty').optional(),

  TEXLOOP_OUTPUT_FORMAT: z.enum(OUTPUT_FORMATS).default('pdf'),
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

  return ok(createValidatedConfig(buildConfig(parsed.data, options)));
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv, options: LoadConfigOptions): AppConfig {
  const tempRoot = env.TEXLOOP_TMP_ROOT
    ? path.resolve(options.cwd, env.TEXLOOP_TMP_ROOT)
    : path.join(options.tmpdir, TEMP_ROOT_DIRNAME);

  // VERBOSE is the historical switch; it wins over an explicit level.
  const level: LogLevel = env.VERBOSE ? 'debug' : (env.TEXLOOP_LOG_LEVEL ?? 'silent');

  return {
    engine: env.TEX as EngineName,
    paths: {
      cwd: options.cwd,
      tempRoot: tempRoot as TempRoot,
    },
    output: { format: env.TEXLOOP_OUTPUT_FORMAT },
    logging: { level },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
