/**
 * Repository discovery: search an organization by language and flatten the
 * results into report rows.
 */

import type { Logger } from 'pino';
import {
  CommitSchema,
  SearchPageSchema,
  SearchRepositorySchema,
  type SearchRepository,
} from '../../domain/types/github.js';
import type { CommitInfo, RepositoryRecord } from '../../domain/types/repository.js';
import type { GitHubClient } from '../../infrastructure/github/client.js';

const NO_COMMIT: CommitInfo = {
  mostRecentCommitSha: null,
  mostRecentCommitAuthor: null,
  mostRecentCommitDate: null,
};

export interface ListRepositoriesOptions {
  /** Look up the most recent commit of every repository (one request each) */
  includeCommits?: boolean;
}

export class RepositoryCatalog {
  private readonly logger: Logger;

  constructor(
    private readonly client: GitHubClient,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'repository-catalog' });
  }

  /**
   * Every repository of `organization` whose primary language is `language`
   */
  async searchRepositories(organization: string, language: string): Promise<SearchRepository[]> {
    const pages = await this.client.getPages('/search/repositories', {
      params: { q: `org:${organization} language:${language}` },
    });

    const repositories: SearchRepository[] = [];
    for (const page of pages) {
      const parsedPage = SearchPageSchema.safeParse(page);
      if (!parsedPage.success) {
        this.logger.warn({ issues: parsedPage.error.issues }, 'Ignoring malformed search page');
        continue;
      }

      for (const item of parsedPage.data.items) {
        const parsed = SearchRepositorySchema.safeParse(item);
        if (parsed.success) {
          repositories.push(parsed.data);
        } else {
          this.logger.warn({ issues: parsed.error.issues }, 'Ignoring malformed repository in search results');
        }
      }
    }

    this.logger.info(
      { organization, language, count: repositories.length },
      `Found ${repositories.length} ${language} repositories in ${organization}`,
    );
    return repositories;
  }

  async getMostRecentCommit(fullName: string): Promise<CommitInfo> {
    const pages = await this.client.getPages(`/repos/${fullName}/commits`, {
      params: { per_page: 1 },
      singlePage: true,
    });

    const [firstPage] = pages;
    if (!Array.isArray(firstPage) || firstPage.length === 0) return NO_COMMIT;

    const parsed = CommitSchema.safeParse(firstPage[0]);
    if (!parsed.success) {
      this.logger.warn({ repository: fullName }, 'Unexpected commit payload');
      return NO_COMMIT;
    }

    const { sha, commit } = parsed.data;
    return {
      mostRecentCommitSha: sha,
      mostRecentCommitAuthor: commit.author?.name ?? null,
      mostRecentCommitDate: commit.author?.date ?? null,
    };
  }

  async listRepositories(
    repositories: readonly SearchRepository[],
    options: ListRepositoriesOptions = {},
  ): Promise<RepositoryRecord[]> {
    const includeCommits = options.includeCommits ?? true;
    const records: RepositoryRecord[] = [];

    for (const repository of repositories) {
      const commit = includeCommits ? await this.getMostRecentCommit(repository.full_name) : NO_COMMIT;
      records.push(toRecord(repository, commit));
    }

    return records;
  }
}

export function toRecord(repository: SearchRepository, commit: CommitInfo): RepositoryRecord {
  return {
    name: repository.name,
    fullName: repository.full_name,
    htmlUrl: repository.html_url,
    description: repository.description,
    createdAt: repository.created_at,
    updatedAt: repository.updated_at,
    pushedAt: repository.pushed_at,
    stargazersCount: repository.stargazers_count,
    watchersCount: repository.watchers_count,
    forksCount: repository.forks_count,
    language: repository.language,
    owner: repository.owner.login,
    private: repository.private,
    size: repository.size,
    openIssuesCount: repository.open_issues_count,
    defaultBranch: repository.default_branch,
    ...commit,
  };
}
