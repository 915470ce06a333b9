export interface CommitInfo {
  mostRecentCommitSha: string | null;
  mostRecentCommitAuthor: string | null;
  mostRecentCommitDate: string | null;
}

/**
 * One row of the repository listing
 */
export interface RepositoryRecord extends CommitInfo {
  name: string;
  fullName: string;
  htmlUrl: string;
  description: string | null;
  createdAt: string;
  updatedAt: string;
  pushedAt: string | null;
  stargazersCount: number;
  watchersCount: number;
  forksCount: number;
  language: string | null;
  owner: string;
  private: boolean;
  size: number;
  openIssuesCount: number;
  defaultBranch: string;
}

export interface DependencyInfo {
  dependencyManagementSystem: string;
  dependencyFile: string;
}

export type ScannedRepository = RepositoryRecord & DependencyInfo;
