/**
 * PathEnumerator
 *
 * Lists every simple path from a root to a terminal message node, for
 * review and test generation. Works on unvalidated graphs: nodes already on
 * the current path are never revisited, and a branch deeper than
 * MAX_PATH_DEPTH is abandoned while the rest of the search goes on.
 *
 * Backtracking runs on an explicit frame stack. Paths come out in the same
 * order a recursive depth-first walk over declared edge order produces.
 */

import type { Flow, FlowPath, GraphIndex, PathStep } from '../types/flow-types.js';
import { edgeLabel } from '../types/flow-types.js';
import { GraphIndexBuilder } from './GraphIndexBuilder.js';
import type { EngineLogger } from '../logging/EngineLogger.js';

/**
 * Longest path (in steps) the enumerator will follow
 */
export const MAX_PATH_DEPTH = 1000;

interface Frame {
  readonly nodeId: string;
  cursor: number;
}

export class PathEnumerator {
  /**
   * Enumerate root-to-terminal paths.
   *
   * @returns Paths in discovery order; empty when the flow has no root or no terminal
   */
  static enumerate(flow: Flow, index: GraphIndex): FlowPath[] {
    if (flow.nodes.length === 0) {
      return [];
    }

    const nodes = GraphIndexBuilder.nodesById(flow);
    const roots = GraphIndexBuilder.findRoots(flow, index);
    const terminals = new Set(GraphIndexBuilder.findTerminals(flow, index));

    if (roots.length === 0 || terminals.size === 0) {
      return [];
    }

    const results: FlowPath[] = [];

    for (const root of roots) {
      const path: PathStep[] = [];
      const onPath = new Set<string>();
      const frames: Frame[] = [];

      const enter = (step: PathStep): void => {
        if (path.length + 1 > MAX_PATH_DEPTH) {
          return;
        }
        path.push(step);
        onPath.add(step.nodeId);
        frames.push({ nodeId: step.nodeId, cursor: 0 });
        if (terminals.has(step.nodeId)) {
          results.push(path.map((s) => ({ ...s })));
        }
      };

      enter({ nodeId: root });

      while (frames.length > 0) {
        const frame = frames[frames.length - 1];
        const edges = GraphIndexBuilder.outboundOf(index, frame.nodeId);

        if (frame.cursor >= edges.length) {
          frames.pop();
          const left = path.pop();
          if (left) {
            onPath.delete(left.nodeId);
          }
          continue;
        }

        const edge = edges[frame.cursor];
        frame.cursor++;

        if (!nodes.has(edge.target) || onPath.has(edge.target)) {
          continue;
        }

        const via = edgeLabel(edge);
        enter(via === undefined ? { nodeId: edge.target } : { nodeId: edge.target, via });
      }
    }

    return results;
  }
}

export interface EnumerateOptions {
  /** Prebuilt index of the same flow */
  index?: GraphIndex;
  logger?: EngineLogger | null;
}

/**
 * Every simple root-to-terminal path of a flow.
 */
export function enumeratePaths(flow: Flow, options: EnumerateOptions = {}): FlowPath[] {
  const paths = PathEnumerator.enumerate(flow, options.index ?? GraphIndexBuilder.build(flow));
  options.logger?.debug('Enumerated paths', { flowId: flow.id, paths: paths.length });
  return paths;
}
