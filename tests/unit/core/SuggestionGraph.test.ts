/**
 * SuggestionGraph Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SuggestionGraph } from '../../../src/core/SuggestionGraph.js';

describe('SuggestionGraph', () => {
  let graph: SuggestionGraph;

  beforeEach(() => {
    graph = new SuggestionGraph();
    graph.addEdge('orders_menu', 'order_modify', 0.15, 'Modify Order');
    graph.addEdge('orders_menu', 'root', 0.05, 'Main Menu');
    graph.addEdge('orders_menu', 'order_track', 0.5, 'Track Order');
    graph.addEdge('orders_menu', 'order_cancel', 0.3, 'Cancel Order');
  });

  it('should rank edges by weight descending', () => {
    expect(graph.suggestions('orders_menu', 4).map(s => s.weight)).toEqual([0.5, 0.3, 0.15, 0.05]);
  });

  it('should return the top K with label, target and weight', () => {
    expect(graph.suggestions('orders_menu', 2)).toEqual([
      { label: 'Track Order', target: 'order_track', weight: 0.5 },
      { label: 'Cancel Order', target: 'order_cancel', weight: 0.3 },
    ]);
  });

  it('should return every edge when K exceeds the edge count', () => {
    expect(graph.suggestions('orders_menu', 10)).toHaveLength(4);
  });

  it('should keep insertion order for equal weights', () => {
    const tied = new SuggestionGraph();
    tied.addEdge('a', 'x', 1, 'X');
    tied.addEdge('a', 'y', 2, 'Y');
    tied.addEdge('a', 'z', 1, 'Z');

    expect(tied.suggestions('a', 3).map(s => s.label)).toEqual(['Y', 'X', 'Z']);
  });

  it('should accept zero and negative weights', () => {
    const signed = new SuggestionGraph();
    signed.addEdge('a', 'neg', -1);
    signed.addEdge('a', 'zero', 0);

    expect(signed.suggestions('a', 2).map(s => s.target)).toEqual(['zero', 'neg']);
  });

  it('should default the label to the target', () => {
    const plain = new SuggestionGraph();
    plain.addEdge('a', 'b', 1);
    expect(plain.suggestions('a', 1)).toEqual([{ label: 'b', target: 'b', weight: 1 }]);
  });

  it('should return nothing for unknown nodes, leaf targets and K below 1', () => {
    expect(graph.suggestions('missing', 3)).toEqual([]);
    expect(graph.suggestions('order_track', 3)).toEqual([]);
    expect(graph.suggestions('orders_menu', 0)).toEqual([]);
  });

  it('should reject non-finite weights', () => {
    expect(() => graph.addEdge('a', 'b', Number.NaN)).toThrow(RangeError);
    expect(() => graph.addEdge('a', 'b', Infinity)).toThrow('Edge weight must be finite, got Infinity for a -> b');
  });

  it('should register both ends of an edge as nodes', () => {
    expect(graph.hasNode('order_track')).toBe(true);
    expect(graph.nodeIds()).toEqual(['order_modify', 'orders_menu', 'root', 'order_track', 'order_cancel']);
    expect(graph.edgeCount).toBe(4);
  });

  it('should list neighbors in insertion order', () => {
    expect(graph.neighbors('orders_menu')).toEqual(['order_modify', 'root', 'order_track', 'order_cancel']);
    expect(graph.neighbors('missing')).toEqual([]);
  });

  it('should add edges in bulk', () => {
    const bulk = new SuggestionGraph();
    bulk.addEdges([
      { source: 'root', target: 'orders_menu', weight: 0.4, label: 'Check Orders' },
      { source: 'root', target: 'contact_menu', weight: 0.6, label: 'Contact Support' },
    ]);
    expect(bulk.suggestions('root', 1)[0].label).toBe('Contact Support');
  });
});
