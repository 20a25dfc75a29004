/**
 * GitLab CI Parser Module
 * @module parsers/ci
 *
 * @example
 * ```typescript
 * import { GitLabCIParser } from './parsers/ci';
 *
 * const pipeline = new GitLabCIParser().parse(content);
 * console.log(`Found ${pipeline.jobs.length} jobs`);
 * ```
 */

export * from './types';

export {
  GitLabCIParser,
  collectWarnings,
  parseGitLabCI,
} from './gitlab-ci-parser';

export {
  getJobReferences,
  extractVariables,
  extractSecrets,
} from './pipeline-queries';
