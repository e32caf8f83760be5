/**
 * GraphIndexBuilder
 *
 * Builds the inbound/outbound adjacency index of a flow.
 * This is pure structure - NO validation, NO traversal.
 *
 * Responsibilities:
 * 1. Give every declared node an inbound and an outbound entry
 * 2. File each edge under its source (outbound) and its target (inbound)
 * 3. Keep dangling edges visible so later rules can report them
 *
 * What it does NOT do:
 * - Does NOT reject unknown node references (that's StructuralValidator's job)
 * - Does NOT look for cycles (that's CycleDetector's job)
 */

import type { Flow, FlowEdge, FlowNode, GraphIndex } from '../types/flow-types.js';

/**
 * Builds adjacency indexes for flows.
 * Pure function - takes a flow, returns a fresh index.
 */
export class GraphIndexBuilder {
  /**
   * Build the index in O(N + E).
   * Edge order within each list follows declaration order.
   */
  static build(flow: Flow): GraphIndex {
    const inbound = new Map<string, FlowEdge[]>();
    const outbound = new Map<string, FlowEdge[]>();

    for (const node of flow.nodes) {
      if (!inbound.has(node.id)) {
        inbound.set(node.id, []);
        outbound.set(node.id, []);
      }
    }

    for (const edge of flow.edges) {
      this.append(outbound, edge.source, edge);
      this.append(inbound, edge.target, edge);
    }

    return { inbound, outbound };
  }

  private static append(index: Map<string, FlowEdge[]>, key: string, edge: FlowEdge): void {
    const existing = index.get(key);
    if (existing) {
      existing.push(edge);
    } else {
      index.set(key, [edge]);
    }
  }

  /**
   * Declared nodes keyed by id, in first-declaration order.
   * When an id is declared twice the later node wins.
   */
  static nodesById(flow: Flow): Map<string, FlowNode> {
    const nodes = new Map<string, FlowNode>();
    for (const node of flow.nodes) {
      nodes.set(node.id, node);
    }
    return nodes;
  }

  /**
   * Get declared nodes with no inbound edge (entry points).
   */
  static findRoots(flow: Flow, index: GraphIndex): string[] {
    const roots: string[] = [];
    for (const nodeId of this.nodesById(flow).keys()) {
      if (this.inboundOf(index, nodeId).length === 0) {
        roots.push(nodeId);
      }
    }
    return roots;
  }

  /**
   * Get message nodes with no outbound edge (conversation endings).
   */
  static findTerminals(flow: Flow, index: GraphIndex): string[] {
    const terminals: string[] = [];
    for (const [nodeId, node] of this.nodesById(flow)) {
      if (node.type === 'message' && this.outboundOf(index, nodeId).length === 0) {
        terminals.push(nodeId);
      }
    }
    return terminals;
  }

  static inboundOf(index: GraphIndex, nodeId: string): readonly FlowEdge[] {
    return index.inbound.get(nodeId) ?? [];
  }

  static outboundOf(index: GraphIndex, nodeId: string): readonly FlowEdge[] {
    return index.outbound.get(nodeId) ?? [];
  }
}

/**
 * Build the adjacency index of a flow.
 */
export function buildIndex(flow: Flow): GraphIndex {
  return GraphIndexBuilder.build(flow);
}
