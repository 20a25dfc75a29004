/**
 * GitHub Actions Workflow Type Definitions
 * @module types/github-workflow
 *
 * Keys mirror the workflow file syntax so a workflow serializes without renaming.
 */

export interface WorkflowStep {
  readonly name: string;
  readonly uses?: string;
  readonly with?: Readonly<Record<string, string | number>>;
  readonly run?: string;
  readonly env?: Readonly<Record<string, string>>;
  readonly if?: string;
  readonly 'continue-on-error'?: boolean;
}

export interface WorkflowContainer {
  readonly image: string;
  readonly options?: string;
}

export interface WorkflowJob {
  readonly name: string;
  readonly 'runs-on': string;
  readonly steps: readonly WorkflowStep[];
  readonly needs?: readonly string[];
  readonly env?: Readonly<Record<string, string>>;
  readonly 'timeout-minutes'?: number;
  readonly if?: string;
  readonly container?: WorkflowContainer;
}

export interface BranchFilter {
  readonly branches?: readonly string[];
}

export interface ScheduleTrigger {
  readonly cron: string;
}

export interface WorkflowTriggers {
  readonly push?: BranchFilter;
  readonly pull_request?: BranchFilter;
  readonly schedule?: readonly ScheduleTrigger[];
}

/**
 * Complete GitHub Actions workflow
 */
export interface GitHubWorkflow {
  readonly name: string;
  readonly on: WorkflowTriggers;
  readonly env?: Readonly<Record<string, string>>;
  /** Keyed by sanitized job id, in pipeline job order */
  readonly jobs: Readonly<Record<string, WorkflowJob>>;
}
