/**
 * Graph Type Definitions
 * @module types/graph
 *
 * Core type definitions for the job dependency graph.
 */

// ============================================================================
// Nodes and Edges
// ============================================================================

/**
 * Derived from the job's `when:` policy
 */
export type JobType = 'regular' | 'manual' | 'delayed';

/**
 * Relationship carried by an edge
 * - needs: explicit `needs:` ordering
 * - artifact: `dependencies:` artifact passing
 * - depends_on: implicit ordering from the previous stage
 */
export type EdgeType = 'needs' | 'artifact' | 'depends_on';

/**
 * One node per job
 */
export interface JobNode {
  /** Job name, unique within a graph */
  readonly id: string;
  readonly label: string;
  readonly stage: string;
  readonly jobType: JobType;
  readonly allowFailure: boolean;
}

/**
 * `source` must complete (or publish its artifacts) before `target` starts.
 * Identified by the (source, target) pair; the source may name an unknown job.
 */
export interface JobEdge {
  readonly source: string;
  readonly target: string;
  readonly type: EdgeType;
}

// ============================================================================
// Serialized Form
// ============================================================================

export interface SerializedNode {
  id: string;
  label: string;
  stage: string;
  type: JobType;
  allowFailure: boolean;
}

export interface SerializedEdge {
  source: string;
  target: string;
  type: EdgeType;
}

/**
 * Wire format of a graph. Field names are consumed by visualization clients.
 */
export interface SerializedGraph {
  nodes: SerializedNode[];
  edges: SerializedEdge[];
  variables: Record<string, string>;
  secrets: string[];
  stages: string[];
}

// ============================================================================
// Analysis Results
// ============================================================================

export interface JobDependencies {
  /** Sources of edges targeting the job, in edge order */
  readonly direct: string[];
  /** Every job reachable through incoming edges, in visit order */
  readonly transitive: string[];
}

export type Cycle = string[];

export interface GraphMetrics {
  total_nodes: number;
  total_edges: number;
  total_stages: number;
  total_variables: number;
  total_secrets: number;
  cycles: number;
  critical_path_length: number;
  avg_job_dependencies: number;
}
