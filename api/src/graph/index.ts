/**
 * Graph Module Exports
 * @module graph
 *
 * Job dependency graph construction and analysis.
 */

export {
  DependencyGraph,
  type IDependencyGraph,
} from './dependency-graph';

export {
  GraphBuilder,
  type IGraphBuilder,
  type GraphBuilderOptions,
  createGraphBuilder,
  buildDependencyGraph,
  determineJobType,
} from './graph-builder';

export { GraphAnalyzer } from './graph-analyzer';
export type { PrecomputedAnalysis } from './graph-analyzer';
