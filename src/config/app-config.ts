/**
 * Unified Application Configuration
 *
 * Single source of truth for all configuration with Zod validation.
 * Values come from the environment (optionally seeded from a .env file) and
 * command-line overrides, in that order of increasing precedence.
 */

import { z } from 'zod';
import { DEFAULT_GITHUB, DEFAULT_RETRY_DELAYS_SECONDS, DEFAULT_SCAN } from './defaults.js';
import { ConfigurationError } from '../lib/errors.js';
import { Failure, Success, type Result } from '../domain/types/result.js';

// Zod validation schemas
const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('production');
const LogLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .default('info');

const BooleanFlagSchema = z.union([
  z.boolean(),
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform((value) => value === 'true' || value === '1' || value === 'yes'),
]);

const requiredString = (envVar: string): z.ZodString =>
  z
    .string({ required_error: `${envVar} is required` })
    .trim()
    .min(1, `${envVar} is required`);

// Main configuration schema
const AppConfigSchema = z.object({
  github: z.object({
    token: requiredString('GITHUB_TOKEN'),
    organization: requiredString('ORGANIZATION'),
    language: requiredString('LANGUAGE'),
    apiUrl: z.string().url().default(DEFAULT_GITHUB.apiUrl),
    perPage: z.coerce
      .number()
      .int()
      .min(1)
      .max(DEFAULT_GITHUB.maxItemsPerPage)
      .default(DEFAULT_GITHUB.maxItemsPerPage),
    retryDelaysSeconds: z.array(z.number().nonnegative()).default([...DEFAULT_RETRY_DELAYS_SECONDS]),
  }),
  scan: z.object({
    maxDepth: z.coerce.number().int().min(0).default(DEFAULT_SCAN.maxDepth),
    includeCommits: BooleanFlagSchema.default(DEFAULT_SCAN.includeCommits),
  }),
  output: z.object({
    directory: z.string().min(1).default(() => process.cwd()),
    csv: BooleanFlagSchema.default(true),
  }),
  logging: z.object({
    level: LogLevelSchema,
  }),
  server: z.object({
    nodeEnv: NodeEnvSchema,
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LogLevel = AppConfig['logging']['level'];

/**
 * Values given on the command line; they win over the environment
 */
export interface ConfigOverrides {
  organization?: string | undefined;
  language?: string | undefined;
  outputDirectory?: string | undefined;
  logLevel?: string | undefined;
  csv?: boolean | undefined;
}

type Environment = Record<string, string | undefined>;

/**
 * Blank environment variables count as unset
 */
function getEnvValue(env: Environment, key: string): string | undefined {
  const value = env[key];
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

function buildRawConfig(env: Environment, overrides: ConfigOverrides): Record<string, unknown> {
  const nodeEnv = getEnvValue(env, 'NODE_ENV');

  return {
    github: {
      token: getEnvValue(env, 'GITHUB_TOKEN'),
      organization: overrides.organization ?? getEnvValue(env, 'ORGANIZATION'),
      language: overrides.language ?? getEnvValue(env, 'LANGUAGE'),
      apiUrl: getEnvValue(env, 'GITHUB_API_URL'),
      perPage: getEnvValue(env, 'GITHUB_PER_PAGE'),
    },
    scan: {
      maxDepth: getEnvValue(env, 'SCAN_MAX_DEPTH'),
      includeCommits: getEnvValue(env, 'SCAN_INCLUDE_COMMITS')?.toLowerCase(),
    },
    output: {
      directory: overrides.outputDirectory ?? getEnvValue(env, 'OUTPUT_DIR'),
      csv: overrides.csv ?? getEnvValue(env, 'WRITE_CSV')?.toLowerCase(),
    },
    logging: {
      level:
        overrides.logLevel ??
        getEnvValue(env, 'LOG_LEVEL') ??
        (nodeEnv === 'development' ? 'debug' : undefined),
    },
    server: {
      nodeEnv,
    },
  };
}

/**
 * Validate configuration, collecting every problem instead of throwing
 */
export function validateAppConfig(
  env: Environment = process.env,
  overrides: ConfigOverrides = {},
): Result<AppConfig, string[]> {
  const result = AppConfigSchema.safeParse(buildRawConfig(env, overrides));

  if (!result.success) {
    return Failure<AppConfig, string[]>(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return Success<AppConfig, string[]>(result.data);
}

/**
 * Create configuration with environment variable overrides and validation
 */
export function createAppConfig(
  env: Environment = process.env,
  overrides: ConfigOverrides = {},
): AppConfig {
  const result = validateAppConfig(env, overrides);

  if (!result.ok) {
    throw new ConfigurationError(`Configuration validation failed: ${result.error.join('; ')}`, undefined, {
      issues: result.error,
    });
  }

  return result.value;
}

/**
 * Configuration summary safe to print: the token is masked
 */
export function getConfigSummary(config: AppConfig): Record<string, string | number | boolean> {
  const { token } = config.github;
  return {
    organization: config.github.organization,
    language: config.github.language,
    token: token.length > 4 ? `****${token.slice(-4)}` : '****',
    apiUrl: config.github.apiUrl,
    perPage: config.github.perPage,
    maxDepth: config.scan.maxDepth,
    includeCommits: config.scan.includeCommits,
    outputDirectory: config.output.directory,
    csv: config.output.csv,
    logLevel: config.logging.level,
    nodeEnv: config.server.nodeEnv,
  };
}
