import type { ScannedRepository } from '../../domain/types/repository.js';

export interface ReportInput {
  organization: string;
  language: string;
  repositories: readonly ScannedRepository[];
  matches: readonly ScannedRepository[];
}

const HEADER = ['REPOSITORY', 'SYSTEM', 'MANIFEST'];

/**
 * Plain-text table of the matching repositories for stdout
 */
export function formatReport({ organization, language, repositories, matches }: ReportInput): string {
  if (matches.length === 0) {
    return `No ${language} dependency manifests found in ${organization} (${repositories.length} repositories scanned)\n`;
  }

  const rows = [
    HEADER,
    ...matches.map((r) => [r.fullName, r.dependencyManagementSystem, r.dependencyFile]),
  ];
  const widths = HEADER.map((_, column) => Math.max(...rows.map((row) => (row[column] ?? '').length)));
  const lines = rows.map((row) =>
    row
      .map((cell, column) => (column === row.length - 1 ? cell : cell.padEnd(widths[column] ?? 0)))
      .join('  '),
  );

  return [
    `${matches.length} of ${repositories.length} ${language} repositories in ${organization} declare a dependency manifest`,
    '',
    ...lines,
    '',
  ].join('\n');
}
