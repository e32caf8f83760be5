/**
 * CycleDetector
 *
 * Detects cycles in a flow graph using Depth-First Search (DFS).
 * This is about VALIDATION - a conversation engine cannot run a graph
 * that loops back on itself.
 *
 * Algorithm: DFS with three-color marking
 * - WHITE (unvisited): Node not yet explored
 * - GRAY (visiting): Node currently on the DFS path
 * - BLACK (visited): Node fully explored, all descendants visited
 *
 * A cycle exists if we encounter a GRAY node during traversal.
 *
 * The search starts from each root in declaration order, then from any node
 * still WHITE (components no root reaches). It stops at the first cycle.
 * Frames live on an explicit stack so deep graphs never hit the host
 * call-stack limit; the visiting order is the same as the recursive form.
 */

import type { Flow, GraphIndex } from '../types/flow-types.js';
import { GraphIndexBuilder } from './GraphIndexBuilder.js';

/**
 * Visit state of a node during DFS
 */
export enum VisitState {
  WHITE = 'white',
  GRAY = 'gray',
  BLACK = 'black',
}

/**
 * Result of cycle detection
 */
export interface CycleDetectionResult {
  readonly hasCycle: boolean;
  /** Node ids of the cycle, first node repeated at the end */
  readonly cyclePath?: readonly string[];
}

interface Frame {
  readonly nodeId: string;
  cursor: number;
}

/**
 * Detects cycles in flow graphs.
 * Pure function - takes flow and index, returns cycle information.
 */
export class CycleDetector {
  /**
   * Find the first cycle, if any.
   *
   * @param flow - The flow being checked
   * @param index - Adjacency index built from the same flow
   */
  static detect(flow: Flow, index: GraphIndex): CycleDetectionResult {
    const nodes = GraphIndexBuilder.nodesById(flow);
    const visitState = new Map<string, VisitState>();

    for (const nodeId of nodes.keys()) {
      visitState.set(nodeId, VisitState.WHITE);
    }

    const starts = [...GraphIndexBuilder.findRoots(flow, index), ...nodes.keys()];

    for (const start of starts) {
      if (visitState.get(start) !== VisitState.WHITE) {
        continue;
      }
      const cyclePath = this.dfs(start, index, nodes, visitState);
      if (cyclePath) {
        return { hasCycle: true, cyclePath: Object.freeze(cyclePath) };
      }
    }

    return { hasCycle: false };
  }

  /**
   * Iterative DFS from one start node.
   *
   * @returns The cycle path, or null when everything reachable turned BLACK
   */
  private static dfs(
    start: string,
    index: GraphIndex,
    nodes: ReadonlyMap<string, unknown>,
    visitState: Map<string, VisitState>
  ): string[] | null {
    const stack: Frame[] = [{ nodeId: start, cursor: 0 }];
    visitState.set(start, VisitState.GRAY);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const edges = GraphIndexBuilder.outboundOf(index, frame.nodeId);

      if (frame.cursor >= edges.length) {
        // All descendants explored
        stack.pop();
        visitState.set(frame.nodeId, VisitState.BLACK);
        continue;
      }

      const target = edges[frame.cursor].target;
      frame.cursor++;

      if (!nodes.has(target)) {
        continue;
      }

      const state = visitState.get(target);
      if (state === VisitState.GRAY) {
        return this.reconstructCycle(stack, target);
      }
      if (state === VisitState.WHITE) {
        visitState.set(target, VisitState.GRAY);
        stack.push({ nodeId: target, cursor: 0 });
      }
      // BLACK nodes are already fully explored, skip them
    }

    return null;
  }

  /**
   * Suffix of the current path from the repeated node, closed by that node.
   */
  private static reconstructCycle(stack: readonly Frame[], repeated: string): string[] {
    const path = stack.map((frame) => frame.nodeId);
    const start = path.indexOf(repeated);
    return [...path.slice(start), repeated];
  }

  /**
   * Render a cycle path as `A -> B -> A`.
   */
  static format(cyclePath: readonly string[]): string {
    return cyclePath.join(' -> ');
  }
}
