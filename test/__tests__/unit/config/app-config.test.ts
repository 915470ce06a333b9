/**
 * Configuration Validation Tests
 */

import { describe, it, expect } from '@jest/globals';
import { createAppConfig, getConfigSummary, validateAppConfig } from '../../../../src/config/app-config';
import { ConfigurationError } from '../../../../src/lib/errors';

const REQUIRED = {
  GITHUB_TOKEN: 'test-secret',
  ORGANIZATION: 'acme',
  LANGUAGE: 'python',
};

describe('createAppConfig', () => {
  it('should apply defaults when only the required variables are set', () => {
    const config = createAppConfig(REQUIRED);

    expect(config).toEqual({
      github: {
        token: 'test-secret',
        organization: 'acme',
        language: 'python',
        apiUrl: 'https://api.github.com',
        perPage: 100,
        retryDelaysSeconds: [1, 2, 4, 8, 16, 32, 64],
      },
      scan: { maxDepth: 10, includeCommits: true },
      output: { directory: process.cwd(), csv: true },
      logging: { level: 'info' },
      server: { nodeEnv: 'production' },
    });
  });

  it('should parse optional environment variables', () => {
    const config = createAppConfig({
      ...REQUIRED,
      GITHUB_API_URL: 'https://ghe.example.test/api/v3',
      GITHUB_PER_PAGE: '50',
      SCAN_MAX_DEPTH: '3',
      SCAN_INCLUDE_COMMITS: 'no',
      OUTPUT_DIR: '/tmp/reports',
      WRITE_CSV: 'FALSE',
      LOG_LEVEL: 'warn',
    });

    expect(config.github.apiUrl).toBe('https://ghe.example.test/api/v3');
    expect(config.github.perPage).toBe(50);
    expect(config.scan).toEqual({ maxDepth: 3, includeCommits: false });
    expect(config.output).toEqual({ directory: '/tmp/reports', csv: false });
    expect(config.logging.level).toBe('warn');
  });

  it('should let command-line overrides win over the environment', () => {
    const config = createAppConfig(REQUIRED, {
      organization: 'globex',
      language: 'go',
      outputDirectory: '/tmp/out',
      logLevel: 'error',
      csv: false,
    });

    expect(config.github.organization).toBe('globex');
    expect(config.github.language).toBe('go');
    expect(config.output).toEqual({ directory: '/tmp/out', csv: false });
    expect(config.logging.level).toBe('error');
  });

  it('should default to debug logging in development', () => {
    expect(createAppConfig({ ...REQUIRED, NODE_ENV: 'development' }).logging.level).toBe('debug');
  });

  it('should throw ConfigurationError listing each problem', () => {
    expect(() => createAppConfig({ LANGUAGE: 'python' })).toThrow(ConfigurationError);
    expect(() => createAppConfig({ LANGUAGE: 'python' })).toThrow(
      'Configuration validation failed: github.token: GITHUB_TOKEN is required; github.organization: ORGANIZATION is required',
    );
  });
});

describe('validateAppConfig', () => {
  it('should treat blank values as missing', () => {
    const result = validateAppConfig({ ...REQUIRED, GITHUB_TOKEN: '   ' });

    expect(result).toEqual({ ok: false, error: ['github.token: GITHUB_TOKEN is required'] });
  });

  it('should reject page sizes above the API maximum', () => {
    const result = validateAppConfig({ ...REQUIRED, GITHUB_PER_PAGE: '500' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toHaveLength(1);
      expect(result.error[0]).toMatch(/^github\.perPage: /);
    }
  });

  it('should reject unknown log levels', () => {
    const result = validateAppConfig(REQUIRED, { logLevel: 'loud' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error[0]).toMatch(/^logging\.level: /);
    }
  });
});

describe('getConfigSummary', () => {
  it('should mask the token', () => {
    const summary = getConfigSummary(createAppConfig(REQUIRED));

    expect(summary.token).toBe('****cret');
    expect(summary.organization).toBe('acme');
  });
});
