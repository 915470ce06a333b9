/**
 * Organization Dependency Scanner CLI
 */

import { readFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { Command } from 'commander';
import type { Logger } from 'pino';
import { getConfigSummary, validateAppConfig, type AppConfig } from '../config/app-config.js';
import { loadEnvironmentFile } from '../config/env-file.js';
import { resolveManifests, supportedLanguages } from '../config/manifests.js';
import { formatReport } from '../application/services/report-formatter.js';
import { createGitHubClient } from '../infrastructure/github/index.js';
import type { GitHubClient } from '../infrastructure/github/client.js';
import { AuthenticationError, ErrorCodes, isScanError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { runScan } from '../workflows/scan-workflow.js';

export interface CliOptions {
  config?: string;
  org?: string;
  language?: string;
  outputDir?: string;
  logLevel?: string;
  csv: boolean;
  dev?: boolean;
  validate?: boolean;
  listLanguages?: boolean;
}

export interface Output {
  write(chunk: string): unknown;
}

export interface CliDependencies {
  stdout: Output;
  stderr: Output;
  env: NodeJS.ProcessEnv;
  loadEnv: typeof loadEnvironmentFile;
  createLogger: (config: AppConfig) => Logger;
  createClient: (config: AppConfig, logger: Logger) => GitHubClient;
}

const defaultDependencies: CliDependencies = {
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
  loadEnv: loadEnvironmentFile,
  createLogger: (config) => createLogger({ level: config.logging.level }),
  createClient: createGitHubClient,
};

export function createProgram(version: string): Command {
  return new Command()
    .name('org-dependency-scanner')
    .description("List an organization's repositories for a language and the dependency manifests they declare")
    .version(version)
    .option('--config <path>', 'path to a .env file (default: ./.env when present)')
    .option('--org <name>', 'organization to scan (overrides ORGANIZATION)')
    .option('--language <name>', 'repository language to look for (overrides LANGUAGE)')
    .option('--output-dir <dir>', 'directory for the CSV reports (overrides OUTPUT_DIR)')
    .option('--log-level <level>', 'logging level: trace, debug, info, warn, error, fatal, silent')
    .option('--no-csv', 'do not write CSV reports')
    .option('--dev', 'enable development mode with debug logging')
    .option('--validate', 'validate configuration and exit')
    .option('--list-languages', 'list languages with known dependency manifests and exit')
    .addHelpText(
      'after',
      `

Examples:
  $ org-dependency-scanner                               Scan using ./.env
  $ org-dependency-scanner --org acme --language go      Scan acme's Go repositories
  $ org-dependency-scanner --config ./prod.env --no-csv  Print the report only
  $ org-dependency-scanner --validate                    Check configuration

Environment Variables:
  GITHUB_TOKEN              Access token used as bearer credential (required)
  ORGANIZATION              Organization to scan (required)
  LANGUAGE                  Repository language to look for (required)
  GITHUB_API_URL            API base URL (default: https://api.github.com)
  GITHUB_PER_PAGE           Items per page, 1-100 (default: 100)
  SCAN_MAX_DEPTH            Deepest directory searched for manifests (default: 10)
  SCAN_INCLUDE_COMMITS      Look up each repository's latest commit (default: true)
  OUTPUT_DIR                Directory for CSV reports (default: current directory)
  WRITE_CSV                 Write CSV reports (default: true)
  LOG_LEVEL                 Logging level (default: info)
`,
    );
}

/**
 * Run the scanner for parsed options
 *
 * @returns the process exit code
 */
export async function run(options: CliOptions, deps: CliDependencies = defaultDependencies): Promise<number> {
  const { stdout, stderr, env } = deps;

  if (options.listLanguages) {
    for (const language of supportedLanguages()) {
      const files = resolveManifests(language).map((manifest) => manifest.fileName);
      stdout.write(`${language}: ${files.join(', ')}\n`);
    }
    return 0;
  }

  let logger: Logger | undefined;
  try {
    deps.loadEnv(options.config, env);
    if (options.dev) env.NODE_ENV = 'development';

    const validation = validateAppConfig(env, {
      organization: options.org,
      language: options.language,
      outputDirectory: options.outputDir,
      logLevel: options.logLevel,
      csv: options.csv ? undefined : false,
    });

    if (!validation.ok) {
      stderr.write('❌ Configuration errors:\n');
      for (const issue of validation.error) stderr.write(`  • ${issue}\n`);
      stderr.write('\n💡 Copy .env.example to .env and fill in GITHUB_TOKEN, ORGANIZATION and LANGUAGE\n');
      return 1;
    }

    const config = validation.value;
    // Fail on an unknown language before any request goes out
    resolveManifests(config.github.language);

    if (options.validate) {
      stderr.write('📋 Configuration Summary:\n');
      for (const [key, value] of Object.entries(getConfigSummary(config))) {
        stderr.write(`  • ${key}: ${value}\n`);
      }
      stderr.write('\n✅ Configuration validation complete!\n');
      return 0;
    }

    logger = deps.createLogger(config);
    const client = deps.createClient(config, logger);
    const result = await runScan(config, { client, logger });

    stdout.write(formatReport(result));
    for (const file of result.files) stderr.write(`📄 Wrote ${file}\n`);
    return 0;
  } catch (error) {
    logger?.error({ error }, 'Scan failed');
    provideContextualGuidance(error, stderr);
    return 1;
  }
}

function provideContextualGuidance(error: unknown, stderr: Output): void {
  const message = isScanError(error)
    ? error.getUserMessage()
    : error instanceof Error
      ? error.message
      : String(error);
  stderr.write(`\n🔍 Error: ${message}\n`);

  if (error instanceof AuthenticationError) {
    stderr.write('\n💡 Authentication issue detected:\n');
    stderr.write('  • Check that GITHUB_TOKEN is set and has not expired\n');
    stderr.write("  • Make sure the token can read the organization's repositories\n");
  } else if (isScanError(error) && error.code === ErrorCodes.UNSUPPORTED_LANGUAGE) {
    stderr.write('\n💡 Run with --list-languages to see supported languages\n');
  } else if (isScanError(error) && error.code === ErrorCodes.ENV_FILE_NOT_FOUND) {
    stderr.write('\n💡 Check the path given to --config\n');
  } else if (isScanError(error) && error.code === ErrorCodes.REPORT_WRITE_FAILED) {
    stderr.write('\n💡 Check that --output-dir (or OUTPUT_DIR) is writable\n');
  }
}

/**
 * Read the package version for an entry point in `apps/` or the built
 * `dist/apps/`
 */
export function readPackageVersion(entryDirectory: string): string {
  const root = basename(dirname(entryDirectory)) === 'dist'
    ? join(entryDirectory, '../..') // dist/apps/ -> root
    : join(entryDirectory, '..'); // apps/ -> root
  const packageJson: unknown = JSON.parse(readFileSync(join(root, 'package.json'), 'utf-8'));
  return typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';
}

export async function main(argv: readonly string[], version: string): Promise<void> {
  const program = createProgram(version);
  program.parse([...argv]);
  process.exitCode = await run(program.opts<CliOptions>());
}
