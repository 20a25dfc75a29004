/**
 * Dependency Graph Structure
 * @module graph/dependency-graph
 *
 * Ordered, deduplicated storage for job nodes and edges.
 * Adjacency indices keep incoming/outgoing lookups O(1) per job.
 */

import {
  JobNode,
  JobEdge,
  SerializedGraph,
} from '../types/graph';

// ============================================================================
// Interfaces
// ============================================================================

/**
 * Read-only view consumed by the analyzer
 */
export interface IDependencyGraph {
  readonly nodes: readonly JobNode[];
  readonly edges: readonly JobEdge[];
  readonly stages: readonly string[];
  readonly variables: ReadonlyMap<string, string>;
  readonly secrets: readonly string[];

  hasNode(nodeId: string): boolean;
  getNode(nodeId: string): JobNode | undefined;
  hasEdge(source: string, target: string): boolean;
  getIncomingEdges(nodeId: string): readonly JobEdge[];
  getOutgoingEdges(nodeId: string): readonly JobEdge[];
  toJSON(): SerializedGraph;
}

// ============================================================================
// Implementation
// ============================================================================

export class DependencyGraph implements IDependencyGraph {
  private readonly nodeList: JobNode[] = [];
  private readonly nodeIndex: Map<string, JobNode> = new Map();
  private readonly edgeList: JobEdge[] = [];
  private readonly edgeKeys: Set<string> = new Set();
  private readonly outgoingIndex: Map<string, JobEdge[]> = new Map();
  private readonly incomingIndex: Map<string, JobEdge[]> = new Map();
  private readonly variableMap: Map<string, string> = new Map();
  private readonly secretList: string[] = [];

  readonly stages: readonly string[];

  constructor(stages: readonly string[] = []) {
    this.stages = [...stages];
  }

  get nodes(): readonly JobNode[] {
    return this.nodeList;
  }

  get edges(): readonly JobEdge[] {
    return this.edgeList;
  }

  get variables(): ReadonlyMap<string, string> {
    return this.variableMap;
  }

  get secrets(): readonly string[] {
    return this.secretList;
  }

  /**
   * Add a node. A node whose id is already present is ignored.
   * @returns whether the node was inserted
   */
  addNode(node: JobNode): boolean {
    if (this.nodeIndex.has(node.id)) {
      return false;
    }
    this.nodeList.push(node);
    this.nodeIndex.set(node.id, node);
    return true;
  }

  /**
   * Add an edge. Edges are keyed by (source, target) only, so a second edge
   * between the same jobs is ignored whatever its type.
   * @returns whether the edge was inserted
   */
  addEdge(edge: JobEdge): boolean {
    const key = edgeKey(edge.source, edge.target);
    if (this.edgeKeys.has(key)) {
      return false;
    }

    this.edgeList.push(edge);
    this.edgeKeys.add(key);
    appendToIndex(this.outgoingIndex, edge.source, edge);
    appendToIndex(this.incomingIndex, edge.target, edge);
    return true;
  }

  /**
   * Set a variable unless one with the same name exists
   * @returns whether the value was stored
   */
  addVariable(name: string, value: string): boolean {
    if (this.variableMap.has(name)) {
      return false;
    }
    this.variableMap.set(name, value);
    return true;
  }

  addSecret(name: string): void {
    this.secretList.push(name);
  }

  hasNode(nodeId: string): boolean {
    return this.nodeIndex.has(nodeId);
  }

  getNode(nodeId: string): JobNode | undefined {
    return this.nodeIndex.get(nodeId);
  }

  hasEdge(source: string, target: string): boolean {
    return this.edgeKeys.has(edgeKey(source, target));
  }

  /**
   * Edges whose target is the job, in insertion order
   */
  getIncomingEdges(nodeId: string): readonly JobEdge[] {
    return this.incomingIndex.get(nodeId) ?? [];
  }

  /**
   * Edges whose source is the job, in insertion order
   */
  getOutgoingEdges(nodeId: string): readonly JobEdge[] {
    return this.outgoingIndex.get(nodeId) ?? [];
  }

  toJSON(): SerializedGraph {
    return {
      nodes: this.nodeList.map(node => ({
        id: node.id,
        label: node.label,
        stage: node.stage,
        type: node.jobType,
        allowFailure: node.allowFailure,
      })),
      edges: this.edgeList.map(edge => ({
        source: edge.source,
        target: edge.target,
        type: edge.type,
      })),
      variables: Object.fromEntries(this.variableMap),
      secrets: [...this.secretList],
      stages: [...this.stages],
    };
  }
}

// ============================================================================
// Helpers
// ============================================================================

function edgeKey(source: string, target: string): string {
  return JSON.stringify([source, target]);
}

function appendToIndex(index: Map<string, JobEdge[]>, key: string, edge: JobEdge): void {
  const existing = index.get(key);
  if (existing) {
    existing.push(edge);
  } else {
    index.set(key, [edge]);
  }
}
