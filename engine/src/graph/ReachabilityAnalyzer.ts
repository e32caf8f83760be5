/**
 * ReachabilityAnalyzer
 *
 * Forward traversal from every root to find nodes no conversation can reach.
 * Plain reachability: a visited set, no coloring, no ordering guarantees.
 */

import { compareCodePoints, type Flow, type GraphIndex } from '../types/flow-types.js';
import { GraphIndexBuilder } from './GraphIndexBuilder.js';

/**
 * Result of reachability analysis
 */
export interface ReachabilityResult {
  readonly reachable: ReadonlySet<string>;
  /** Declared node ids outside the reachable set, sorted */
  readonly unreachable: readonly string[];
}

export class ReachabilityAnalyzer {
  /**
   * Walk outbound edges from every root.
   * Edges to undeclared targets are skipped.
   */
  static analyze(flow: Flow, index: GraphIndex): ReachabilityResult {
    const nodes = GraphIndexBuilder.nodesById(flow);
    const reachable = new Set<string>();
    const pending = GraphIndexBuilder.findRoots(flow, index);

    while (pending.length > 0) {
      const nodeId = pending.pop();
      if (nodeId === undefined || reachable.has(nodeId)) {
        continue;
      }
      reachable.add(nodeId);

      for (const edge of GraphIndexBuilder.outboundOf(index, nodeId)) {
        if (nodes.has(edge.target) && !reachable.has(edge.target)) {
          pending.push(edge.target);
        }
      }
    }

    const unreachable = [...nodes.keys()].filter((nodeId) => !reachable.has(nodeId)).sort(compareCodePoints);

    return { reachable, unreachable };
  }
}
