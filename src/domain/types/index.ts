/**
 * Domain Types - Unified exports
 */

export { Success, Failure } from './result.js';
export type { Result } from './result.js';

export type { CommitInfo, RepositoryRecord, DependencyInfo, ScannedRepository } from './repository.js';

export {
  SearchRepositorySchema,
  SearchPageSchema,
  CommitSchema,
  ContentEntrySchema,
  ApiErrorBodySchema,
} from './github.js';
export type { SearchRepository, Commit, ContentEntry } from './github.js';
