/**
 * Organization scan workflow
 *
 * search -> list (+ CSV) -> detect manifests (+ CSV) -> select matches
 */

import type { Logger } from 'pino';
import type { AppConfig } from '../config/app-config.js';
import { REPORT_FILES } from '../config/defaults.js';
import { resolveManifests } from '../config/manifests.js';
import { DependencyDetector, selectMatching } from '../application/services/dependency-detector.js';
import { RepositoryCatalog } from '../application/services/repository-catalog.js';
import type { ScannedRepository } from '../domain/types/repository.js';
import type { GitHubClient } from '../infrastructure/github/client.js';
import {
  REPOSITORY_COLUMNS,
  SCANNED_REPOSITORY_COLUMNS,
  writeCsvReport,
} from '../infrastructure/report/csv.js';
import { createTimer } from '../lib/logger.js';

export interface ScanDependencies {
  client: GitHubClient;
  logger: Logger;
}

export interface ScanResult {
  organization: string;
  language: string;
  repositories: ScannedRepository[];
  matches: ScannedRepository[];
  /** CSV reports written, in order */
  files: string[];
}

export async function runScan(config: AppConfig, { client, logger }: ScanDependencies): Promise<ScanResult> {
  const { organization, language } = config.github;
  const manifests = resolveManifests(language);
  const catalog = new RepositoryCatalog(client, logger);
  const detector = new DependencyDetector(client, logger, { maxDepth: config.scan.maxDepth });
  const timer = createTimer(logger, 'scan', { organization, language });
  const files: string[] = [];

  try {
    const found = await catalog.searchRepositories(organization, language);
    const records = await catalog.listRepositories(found, { includeCommits: config.scan.includeCommits });
    timer.checkpoint('listed', { repositories: records.length });

    if (config.output.csv) {
      files.push(
        await writeCsvReport(
          config.output.directory,
          REPORT_FILES.repositories(organization, language),
          records,
          REPOSITORY_COLUMNS,
        ),
      );
    }

    const repositories = await detector.checkDependencyFiles(records, manifests);

    if (config.output.csv) {
      files.push(
        await writeCsvReport(
          config.output.directory,
          REPORT_FILES.dependencies,
          repositories,
          SCANNED_REPOSITORY_COLUMNS,
        ),
      );
    }

    const matches = selectMatching(repositories);
    timer.end({ repositories: repositories.length, matches: matches.length, files });

    return { organization, language, repositories, matches, files };
  } catch (error) {
    timer.error(error);
    throw error;
  }
}
