/**
 * Graph Analyzer
 * @module graph/graph-analyzer
 *
 * Read-only queries over a built dependency graph: dependency closures,
 * cycle detection, critical path and summary metrics.
 *
 * All traversals use explicit stacks, so pipeline size is never bounded by
 * the call stack.
 */

import { IDependencyGraph } from './dependency-graph';
import { Cycle, GraphMetrics, JobDependencies } from '../types/graph';

/**
 * DFS frame: the job and the index of the next edge to follow
 */
interface TraversalFrame {
  readonly id: string;
  next: number;
}

export interface PrecomputedAnalysis {
  readonly cycles?: readonly Cycle[];
  readonly criticalPath?: readonly string[];
}

/**
 * Longest chain length ending at each job, and the dependency it continues through
 */
interface ChainMemo {
  readonly length: Map<string, number>;
  readonly via: Map<string, string>;
}

export class GraphAnalyzer {
  constructor(private readonly graph: IDependencyGraph) {}

  // ============================================================================
  // Dependency Closures
  // ============================================================================

  /**
   * Direct and transitive dependencies of a job. The job itself is never
   * listed as its own transitive dependency, even inside a cycle.
   */
  getJobDependencies(jobName: string): JobDependencies {
    const direct = this.graph.getIncomingEdges(jobName).map(edge => edge.source);

    const transitive: string[] = [];
    const visited = new Set<string>([jobName]);
    const stack: TraversalFrame[] = [{ id: jobName, next: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const incoming = this.graph.getIncomingEdges(frame.id);

      if (frame.next >= incoming.length) {
        stack.pop();
        continue;
      }

      const source = incoming[frame.next++].source;
      if (visited.has(source)) {
        continue;
      }
      visited.add(source);
      transitive.push(source);
      stack.push({ id: source, next: 0 });
    }

    return { direct, transitive };
  }

  // ============================================================================
  // Cycle Detection
  // ============================================================================

  /**
   * Depth-first search over source -> target edges, from every unvisited node
   * in node order. Each back edge to a job on the current path yields one
   * cycle ending with the job it closes on. Overlapping cycles are all kept.
   */
  detectCircularDependencies(): Cycle[] {
    const cycles: Cycle[] = [];
    const visited = new Set<string>();
    const onPath = new Set<string>();
    const path: string[] = [];
    const stack: TraversalFrame[] = [];

    const enter = (id: string): void => {
      visited.add(id);
      onPath.add(id);
      path.push(id);
      stack.push({ id, next: 0 });
    };

    for (const node of this.graph.nodes) {
      if (visited.has(node.id)) {
        continue;
      }
      enter(node.id);

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        const outgoing = this.graph.getOutgoingEdges(frame.id);

        if (frame.next >= outgoing.length) {
          stack.pop();
          path.pop();
          onPath.delete(frame.id);
          continue;
        }

        const target = outgoing[frame.next++].target;
        if (!visited.has(target)) {
          enter(target);
        } else if (onPath.has(target)) {
          cycles.push([...path.slice(path.indexOf(target)), target]);
        }
      }
    }

    return cycles;
  }

  // ============================================================================
  // Critical Path
  // ============================================================================

  /**
   * Longest simple chain of jobs, in execution order.
   *
   * Chains end at a root: a job that is never an edge source, i.e. nothing
   * waits on it. From each root (node order) the chain is extended through
   * its dependencies. The first longest chain found wins ties.
   * Returns [] when every job has a dependency.
   */
  getCriticalPath(): string[] {
    const nodes = this.graph.nodes;
    if (!nodes.some(node => this.graph.getIncomingEdges(node.id).length === 0)) {
      return [];
    }

    const roots = nodes
      .map(node => node.id)
      .filter(id => this.graph.getOutgoingEdges(id).length === 0);

    const order = this.topologicalOrder();
    const chains = this.memoizeChains(order);
    const chain = order.length === nodes.length
      ? this.longestChainAcyclic(roots, chains)
      : this.longestChainGuarded(roots, chains);
    return chain.reverse();
  }

  /**
   * Dependencies of a job that are themselves jobs in the graph
   */
  private predecessors(id: string): string[] {
    return this.graph
      .getIncomingEdges(id)
      .map(edge => edge.source)
      .filter(source => this.graph.hasNode(source));
  }

  /**
   * Kahn ordering over edges between known jobs, dependencies first.
   * Jobs on a cycle, or depending on one, are left out.
   */
  private topologicalOrder(): string[] {
    const remaining = new Map<string, number>();
    for (const node of this.graph.nodes) {
      remaining.set(node.id, this.predecessors(node.id).length);
    }

    const queue = this.graph.nodes.map(node => node.id).filter(id => remaining.get(id) === 0);
    const order: string[] = [];

    for (let i = 0; i < queue.length; i++) {
      const id = queue[i];
      order.push(id);
      for (const edge of this.graph.getOutgoingEdges(id)) {
        const count = remaining.get(edge.target);
        if (count === undefined) {
          continue;
        }
        remaining.set(edge.target, count - 1);
        if (count === 1) {
          queue.push(edge.target);
        }
      }
    }

    return order;
  }

  /**
   * Longest chain ending at every job with an acyclic ancestry. The chain
   * continues through the first dependency (edge order) with the longest
   * chain of its own, which is the chain a depth-first search finds first.
   */
  private memoizeChains(order: string[]): ChainMemo {
    const length = new Map<string, number>();
    const via = new Map<string, string>();

    for (const id of order) {
      let best: string | undefined;
      let bestLength = 0;
      for (const predecessor of this.predecessors(id)) {
        const predecessorLength = length.get(predecessor) ?? 0;
        if (predecessorLength > bestLength) {
          best = predecessor;
          bestLength = predecessorLength;
        }
      }
      length.set(id, bestLength + 1);
      if (best !== undefined) {
        via.set(id, best);
      }
    }

    return { length, via };
  }

  /**
   * Memoized chain from a job back to its earliest dependency
   */
  private chainFrom(start: string, chains: ChainMemo): string[] {
    const chain: string[] = [];
    for (let id: string | undefined = start; id !== undefined; id = chains.via.get(id)) {
      chain.push(id);
    }
    return chain;
  }

  /**
   * @returns the chain from a root back to its earliest dependency
   */
  private longestChainAcyclic(roots: string[], chains: ChainMemo): string[] {
    let start: string | undefined;
    let startLength = 0;
    for (const root of roots) {
      const rootLength = chains.length.get(root) ?? 0;
      if (rootLength > startLength) {
        start = root;
        startLength = rootLength;
      }
    }

    return start === undefined ? [] : this.chainFrom(start, chains);
  }

  /**
   * Search for graphs with cycles. A job already on the current chain is
   * never re-entered and a chain never exceeds the job count; a job with
   * nothing left to extend through ends the chain.
   *
   * A job with a memoized chain has no cycle among its dependencies, so none
   * of them can already be on the current chain: its memoized chain is
   * appended instead of searched.
   * @returns the chain from a root back to its earliest dependency
   */
  private longestChainGuarded(roots: string[], chains: ChainMemo): string[] {
    const limit = this.graph.nodes.length;
    let longest: string[] = [];

    const consider = (candidate: string[]): void => {
      if (candidate.length > longest.length) {
        longest = candidate;
      }
    };

    for (const root of roots) {
      if (chains.length.has(root)) {
        consider(this.chainFrom(root, chains));
        continue;
      }

      const chain: string[] = [root];
      const onChain = new Set<string>([root]);
      const stack: Array<TraversalFrame & { extended: boolean }> = [{ id: root, next: 0, extended: false }];

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        const candidates = chain.length < limit ? this.predecessors(frame.id) : [];

        let nextId: string | undefined;
        while (frame.next < candidates.length && nextId === undefined) {
          const candidate = candidates[frame.next++];
          if (onChain.has(candidate)) {
            continue;
          }
          if (chains.length.has(candidate)) {
            frame.extended = true;
            consider([...chain, ...this.chainFrom(candidate, chains)]);
            continue;
          }
          nextId = candidate;
        }

        if (nextId !== undefined) {
          frame.extended = true;
          chain.push(nextId);
          onChain.add(nextId);
          stack.push({ id: nextId, next: 0, extended: false });
          continue;
        }

        if (!frame.extended) {
          consider([...chain]);
        }
        stack.pop();
        chain.pop();
        onChain.delete(frame.id);
      }
    }

    return longest;
  }

  // ============================================================================
  // Metrics
  // ============================================================================

  /**
   * Summary counts. Cycles and the critical path already computed by the
   * caller can be passed in so they are not searched for again.
   */
  getGraphMetrics(precomputed: PrecomputedAnalysis = {}): GraphMetrics {
    const nodes = this.graph.nodes;
    const totalDirect = nodes.reduce(
      (sum, node) => sum + this.getJobDependencies(node.id).direct.length,
      0
    );
    const cycles = precomputed.cycles ?? this.detectCircularDependencies();
    const criticalPath = precomputed.criticalPath ?? this.getCriticalPath();

    return {
      total_nodes: nodes.length,
      total_edges: this.graph.edges.length,
      total_stages: this.graph.stages.length,
      total_variables: this.graph.variables.size,
      total_secrets: this.graph.secrets.length,
      cycles: cycles.length,
      critical_path_length: criticalPath.length,
      avg_job_dependencies: nodes.length > 0 ? totalDirect / nodes.length : 0,
    };
  }
}
