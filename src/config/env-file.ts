/**
 * .env file loading
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'dotenv';
import { ConfigurationError, ErrorCodes, toError } from '../lib/errors.js';

export const DEFAULT_ENV_FILE = '.env';

/**
 * Load a dotenv file into `env`. Variables already set win over the file.
 * A missing default file is fine; a missing explicit one is not.
 *
 * @returns the absolute path that was loaded, or undefined when none was
 */
export function loadEnvironmentFile(
  path?: string,
  env: Record<string, string | undefined> = process.env,
): string | undefined {
  const filePath = resolve(path ?? DEFAULT_ENV_FILE);

  if (!existsSync(filePath)) {
    if (path !== undefined) {
      throw new ConfigurationError(
        `Configuration file not found: ${path}`,
        ErrorCodes.ENV_FILE_NOT_FOUND,
        { path: filePath },
      );
    }
    return undefined;
  }

  let values: Record<string, string>;
  try {
    values = parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Could not read configuration file ${filePath}`,
      ErrorCodes.CONFIGURATION_INVALID,
      { path: filePath },
      toError(error),
    );
  }

  for (const [key, value] of Object.entries(values)) {
    if (env[key] === undefined) env[key] = value;
  }

  return filePath;
}
