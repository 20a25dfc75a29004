/**
 * Converters Module Exports
 * @module converters
 */

export {
  GitLabToGitHubConverter,
  RUNNER_MAPPING,
  IMAGE_SETUP_MAPPING,
  sanitizeJobId,
  convertTriggers,
  convertCondition,
  convertJobCondition,
  type ConvertOptions,
} from './gitlab-to-github';

export { serializeWorkflow, workflowToDocument } from './workflow-serializer';

export { parseDurationSeconds, parseTimeoutMinutes, parseRetentionDays } from './durations';
