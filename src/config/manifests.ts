/**
 * Dependency manifests per language, checked in order
 */

import { ConfigurationError, ErrorCodes } from '../lib/errors.js';

export interface ManifestRule {
  fileName: string;
  system: string;
}

const PYTHON: readonly ManifestRule[] = [
  { fileName: 'requirements.txt', system: 'pip' },
  { fileName: 'pyproject.toml', system: 'poetry or other build systems' },
  { fileName: 'Pipfile', system: 'pipenv' },
  { fileName: 'setup.py', system: 'setuptools' },
];

const NODE: readonly ManifestRule[] = [{ fileName: 'package.json', system: 'npm' }];

const JVM: readonly ManifestRule[] = [
  { fileName: 'pom.xml', system: 'maven' },
  { fileName: 'build.gradle', system: 'gradle' },
  { fileName: 'build.gradle.kts', system: 'gradle' },
];

export const DEPENDENCY_MANIFESTS: Readonly<Record<string, readonly ManifestRule[]>> = {
  python: PYTHON,
  javascript: NODE,
  typescript: NODE,
  go: [{ fileName: 'go.mod', system: 'go modules' }],
  rust: [{ fileName: 'Cargo.toml', system: 'cargo' }],
  java: JVM,
  kotlin: [
    { fileName: 'build.gradle.kts', system: 'gradle' },
    { fileName: 'build.gradle', system: 'gradle' },
    { fileName: 'pom.xml', system: 'maven' },
  ],
  ruby: [{ fileName: 'Gemfile', system: 'bundler' }],
  php: [{ fileName: 'composer.json', system: 'composer' }],
  elixir: [{ fileName: 'mix.exs', system: 'mix' }],
  dart: [{ fileName: 'pubspec.yaml', system: 'pub' }],
  swift: [{ fileName: 'Package.swift', system: 'swift package manager' }],
};

export function supportedLanguages(): string[] {
  return Object.keys(DEPENDENCY_MANIFESTS).sort();
}

/**
 * Look up the manifest table for a language, ignoring case
 */
export function resolveManifests(language: string): readonly ManifestRule[] {
  const key = language.trim().toLowerCase();
  if (!Object.hasOwn(DEPENDENCY_MANIFESTS, key)) {
    throw new ConfigurationError(
      `Unsupported language: ${language}. Supported languages: ${supportedLanguages().join(', ')}`,
      ErrorCodes.UNSUPPORTED_LANGUAGE,
      { language },
    );
  }
  return DEPENDENCY_MANIFESTS[key];
}
