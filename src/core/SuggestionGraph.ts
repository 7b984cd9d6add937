/**
 * Suggestion Graph
 *
 * Weighted adjacency list of next actions per dialogue node.
 *
 * @module core/SuggestionGraph
 */

import type { RankedSuggestion, SuggestionEdge } from '../types/index.js';

interface StoredEdge {
  target: string;
  weight: number;
  label: string;
}

/**
 * Ranks outgoing edges by weight. Weights are opaque reals: zero and
 * negative values are legal and simply rank low. Equal weights keep
 * insertion order.
 *
 * @example
 * ```typescript
 * const graph = new SuggestionGraph();
 * graph.addEdge('orders_menu', 'order_track', 0.5, 'Track Order');
 * graph.addEdge('orders_menu', 'order_cancel', 0.3, 'Cancel Order');
 * graph.suggestions('orders_menu', 1); // [{ label: 'Track Order', ... }]
 * ```
 */
export class SuggestionGraph {
  private readonly adjacency = new Map<string, StoredEdge[]>();
  private edges = 0;

  addEdge(source: string, target: string, weight: number, label: string = target): void {
    if (!Number.isFinite(weight)) {
      throw new RangeError(`Edge weight must be finite, got ${weight} for ${source} -> ${target}`);
    }
    this.ensureNode(target);
    this.ensureNode(source).push({ target, weight, label });
    this.edges++;
  }

  addEdges(edges: Iterable<SuggestionEdge>): void {
    for (const edge of edges) {
      this.addEdge(edge.source, edge.target, edge.weight, edge.label);
    }
  }

  /**
   * Top `topK` outgoing edges of `nodeId`, weight descending.
   * Unknown nodes, nodes without edges and `topK < 1` give an empty array.
   */
  suggestions(nodeId: string, topK: number): RankedSuggestion[] {
    const edges = this.adjacency.get(nodeId);
    if (!edges || edges.length === 0 || topK < 1) {
      return [];
    }

    // Array.prototype.sort is stable, so ties keep insertion order.
    return [...edges]
      .sort((a, b) => b.weight - a.weight)
      .slice(0, topK)
      .map(edge => ({ label: edge.label, target: edge.target, weight: edge.weight }));
  }

  /** Targets of `nodeId` in insertion order. */
  neighbors(nodeId: string): string[] {
    return (this.adjacency.get(nodeId) ?? []).map(edge => edge.target);
  }

  hasNode(nodeId: string): boolean {
    return this.adjacency.has(nodeId);
  }

  nodeIds(): string[] {
    return [...this.adjacency.keys()];
  }

  get edgeCount(): number {
    return this.edges;
  }

  private ensureNode(nodeId: string): StoredEdge[] {
    let edges = this.adjacency.get(nodeId);
    if (!edges) {
      edges = [];
      this.adjacency.set(nodeId, edges);
    }
    return edges;
  }
}
