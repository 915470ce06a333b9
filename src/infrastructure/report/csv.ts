/**
 * CSV report writing
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RepositoryRecord, ScannedRepository } from '../../domain/types/repository.js';
import { FileSystemError, toError } from '../../lib/errors.js';

export type CsvValue = string | number | boolean | null;

export interface CsvColumn<T> {
  header: string;
  value: (row: T) => CsvValue;
}

export const REPOSITORY_COLUMNS: ReadonlyArray<CsvColumn<RepositoryRecord>> = [
  { header: 'name', value: (r) => r.name },
  { header: 'full_name', value: (r) => r.fullName },
  { header: 'html_url', value: (r) => r.htmlUrl },
  { header: 'description', value: (r) => r.description },
  { header: 'created_at', value: (r) => r.createdAt },
  { header: 'updated_at', value: (r) => r.updatedAt },
  { header: 'pushed_at', value: (r) => r.pushedAt },
  { header: 'stargazers_count', value: (r) => r.stargazersCount },
  { header: 'watchers_count', value: (r) => r.watchersCount },
  { header: 'forks_count', value: (r) => r.forksCount },
  { header: 'language', value: (r) => r.language },
  { header: 'owner', value: (r) => r.owner },
  { header: 'private', value: (r) => r.private },
  { header: 'size', value: (r) => r.size },
  { header: 'open_issues_count', value: (r) => r.openIssuesCount },
  { header: 'default_branch', value: (r) => r.defaultBranch },
  { header: 'most_recent_commit_sha', value: (r) => r.mostRecentCommitSha },
  { header: 'most_recent_commit_author', value: (r) => r.mostRecentCommitAuthor },
  { header: 'most_recent_commit_date', value: (r) => r.mostRecentCommitDate },
];

export const SCANNED_REPOSITORY_COLUMNS: ReadonlyArray<CsvColumn<ScannedRepository>> = [
  ...REPOSITORY_COLUMNS,
  { header: 'dependency_management_system', value: (r) => r.dependencyManagementSystem },
  { header: 'dependency_file', value: (r) => r.dependencyFile },
];

/**
 * RFC 4180 quoting: quoted when the field holds a comma, quote or line break
 */
export function escapeCsvField(value: CsvValue): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Header plus one line per row, each ending in `\n` */
export function toCsv<T>(rows: readonly T[], columns: ReadonlyArray<CsvColumn<T>>): string {
  const lines = [
    columns.map((column) => escapeCsvField(column.header)).join(','),
    ...rows.map((row) => columns.map((column) => escapeCsvField(column.value(row))).join(',')),
  ];
  return `${lines.join('\n')}\n`;
}

/**
 * Write rows to `directory/fileName`, creating the directory when needed
 *
 * @returns the path written
 */
export async function writeCsvReport<T>(
  directory: string,
  fileName: string,
  rows: readonly T[],
  columns: ReadonlyArray<CsvColumn<T>>,
): Promise<string> {
  const filePath = join(directory, fileName);
  try {
    await mkdir(directory, { recursive: true });
    await writeFile(filePath, toCsv(rows, columns), 'utf-8');
  } catch (error) {
    throw new FileSystemError(`Failed to write report ${filePath}`, undefined, { path: filePath }, toError(error));
  }
  return filePath;
}
