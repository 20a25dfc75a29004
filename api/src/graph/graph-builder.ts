/**
 * Graph Builder Implementation
 * @module graph/graph-builder
 *
 * Constructs a job dependency graph from a parsed pipeline.
 *
 * Edge inference, per job:
 * 1. `needs` entries become `needs` edges
 * 2. `dependencies` entries become `artifact` edges
 * 3. a job declaring neither depends on every job of the previous stage
 */

import { DependencyGraph } from './dependency-graph';
import { JobType } from '../types/graph';
import { PipelineJob, PipelineModel, getJobsByStage } from '../types/pipeline';
import { StructuredLogger, createModuleLogger } from '../logging/logger';

// ============================================================================
// Interfaces
// ============================================================================

export interface IGraphBuilder {
  /**
   * Build a fresh graph for the model. Calls share no state.
   */
  build(model: PipelineModel): DependencyGraph;
}

export interface GraphBuilderOptions {
  readonly logger?: StructuredLogger;
}

// ============================================================================
// Implementation
// ============================================================================

export class GraphBuilder implements IGraphBuilder {
  private readonly logger: StructuredLogger;

  constructor(options: GraphBuilderOptions = {}) {
    this.logger = options.logger ?? createModuleLogger('graph-builder');
  }

  build(model: PipelineModel): DependencyGraph {
    const startTime = Date.now();
    const graph = new DependencyGraph(model.stages);

    this.addNodes(graph, model);
    this.addEdges(graph, model);
    this.addVariablesAndSecrets(graph, model);

    this.logger.graphBuilt(graph.nodes.length, graph.edges.length, Date.now() - startTime);
    return graph;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private addNodes(graph: DependencyGraph, model: PipelineModel): void {
    for (const job of model.jobs) {
      graph.addNode({
        id: job.name,
        label: job.name,
        stage: job.stage,
        jobType: determineJobType(job),
        allowFailure: job.allowFailure,
      });
    }
  }

  private addEdges(graph: DependencyGraph, model: PipelineModel): void {
    for (const job of model.jobs) {
      for (const need of job.needs) {
        graph.addEdge({ source: need, target: job.name, type: 'needs' });
      }

      for (const dependency of job.dependencies) {
        graph.addEdge({ source: dependency, target: job.name, type: 'artifact' });
      }

      if (job.needs.length === 0 && job.dependencies.length === 0) {
        this.addImplicitStageEdges(graph, model, job);
      }
    }
  }

  /**
   * Stage ordering: every job of the immediately preceding stage.
   * First-stage jobs and jobs in undeclared stages get none.
   */
  private addImplicitStageEdges(graph: DependencyGraph, model: PipelineModel, job: PipelineJob): void {
    const stageIndex = model.stages.indexOf(job.stage);
    if (stageIndex <= 0) {
      return;
    }

    const previousStage = model.stages[stageIndex - 1];
    for (const previousJob of getJobsByStage(model, previousStage)) {
      graph.addEdge({ source: previousJob.name, target: job.name, type: 'depends_on' });
    }
  }

  private addVariablesAndSecrets(graph: DependencyGraph, model: PipelineModel): void {
    for (const variable of model.variables) {
      graph.addVariable(variable.name, variable.value);
    }

    // Global values were stored first and are never overwritten
    for (const job of model.jobs) {
      for (const [name, value] of Object.entries(job.variables)) {
        graph.addVariable(name, String(value));
      }
    }

    for (const secret of model.secrets) {
      graph.addSecret(secret.name);
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function determineJobType(job: Pick<PipelineJob, 'when'>): JobType {
  if (job.when === 'manual') {
    return 'manual';
  }
  if (job.when === 'delayed') {
    return 'delayed';
  }
  return 'regular';
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createGraphBuilder(options?: GraphBuilderOptions): IGraphBuilder {
  return new GraphBuilder(options);
}

/**
 * Build a graph with a one-off builder
 */
export function buildDependencyGraph(model: PipelineModel): DependencyGraph {
  return new GraphBuilder().build(model);
}
