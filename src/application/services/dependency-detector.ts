/**
 * Dependency manifest detection over the repository contents API
 */

import type { Logger } from 'pino';
import { UNKNOWN_DEPENDENCY } from '../../config/defaults.js';
import type { ManifestRule } from '../../config/manifests.js';
import { ContentEntrySchema, type ContentEntry } from '../../domain/types/github.js';
import type { DependencyInfo, RepositoryRecord, ScannedRepository } from '../../domain/types/repository.js';
import type { GitHubClient } from '../../infrastructure/github/client.js';

export interface DetectionOptions {
  /** Deepest directory level searched; the repository root is level 0 */
  maxDepth: number;
}

/**
 * Depth-first search of one repository's tree. Directory listings are kept,
 * so looking for several file names walks the tree over the API only once.
 */
export class RepositoryTreeWalker {
  private readonly listings = new Map<string, ContentEntry[]>();

  constructor(
    private readonly client: GitHubClient,
    private readonly fullName: string,
    private readonly maxDepth: number,
  ) {}

  /**
   * Path of the first file named `fileName`, visiting entries in API order
   * and descending into each directory before its later siblings
   */
  async findFile(fileName: string): Promise<string | undefined> {
    return this.search('', fileName, 0);
  }

  get directoriesListed(): number {
    return this.listings.size;
  }

  private async search(path: string, fileName: string, depth: number): Promise<string | undefined> {
    for (const entry of await this.list(path)) {
      if (entry.type === 'file' && entry.name === fileName) return entry.path;
      if (entry.type === 'dir' && depth < this.maxDepth) {
        const found = await this.search(entry.path, fileName, depth + 1);
        if (found !== undefined) return found;
      }
    }
    return undefined;
  }

  private async list(path: string): Promise<ContentEntry[]> {
    const cached = this.listings.get(path);
    if (cached) return cached;

    const encodedPath = path.split('/').map(encodeURIComponent).join('/');
    const [firstPage] = await this.client.getPages(`/repos/${this.fullName}/contents/${encodedPath}`, {
      singlePage: true,
    });

    const entries: ContentEntry[] = [];
    if (Array.isArray(firstPage)) {
      for (const item of firstPage) {
        const parsed = ContentEntrySchema.safeParse(item);
        if (parsed.success) entries.push(parsed.data);
      }
    }

    this.listings.set(path, entries);
    return entries;
  }
}

export class DependencyDetector {
  private readonly logger: Logger;

  constructor(
    private readonly client: GitHubClient,
    logger: Logger,
    private readonly options: DetectionOptions,
  ) {
    this.logger = logger.child({ component: 'dependency-detector' });
  }

  /**
   * First manifest of the table present in the repository, in table order
   */
  async detectDependencyManagement(
    fullName: string,
    manifests: readonly ManifestRule[],
  ): Promise<DependencyInfo> {
    const walker = new RepositoryTreeWalker(this.client, fullName, this.options.maxDepth);

    for (const manifest of manifests) {
      const path = await walker.findFile(manifest.fileName);
      if (path !== undefined) {
        this.logger.debug({ repository: fullName, manifest: path }, `Found ${manifest.fileName}`);
        return { dependencyManagementSystem: manifest.system, dependencyFile: path };
      }
    }

    this.logger.debug(
      { repository: fullName, directoriesListed: walker.directoriesListed },
      'No dependency manifest found',
    );
    return {
      dependencyManagementSystem: UNKNOWN_DEPENDENCY.system,
      dependencyFile: UNKNOWN_DEPENDENCY.file,
    };
  }

  async checkDependencyFiles(
    records: readonly RepositoryRecord[],
    manifests: readonly ManifestRule[],
  ): Promise<ScannedRepository[]> {
    const scanned: ScannedRepository[] = [];
    for (const record of records) {
      scanned.push({ ...record, ...(await this.detectDependencyManagement(record.fullName, manifests)) });
    }
    return scanned;
  }
}

/**
 * Repositories whose manifest matched the configured language's table
 */
export function selectMatching(repositories: readonly ScannedRepository[]): ScannedRepository[] {
  return repositories.filter(
    (repository) => repository.dependencyManagementSystem !== UNKNOWN_DEPENDENCY.system,
  );
}
