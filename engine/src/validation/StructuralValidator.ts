/**
 * StructuralValidator
 *
 * Certifies that a flow graph is structurally sound before a conversation
 * engine runs it. Problems come back as data, never as thrown errors:
 * errors block validity, warnings are advisory.
 *
 * Rules (all evaluated, in this order):
 *  1. at least one node (short-circuits everything else)
 *  2. unique node ids
 *  3. edges reference declared nodes
 *  4. no repeated (source, target, label) edges      - warning
 *  5. at least one start node; several are ambiguous - warning
 *  6. at least one terminal message node
 *  7. message nodes with outgoing edges              - warning
 *  8. question answer labels come from expectedAnswers
 *  9. no cycles (CycleDetector)
 * 10. every node reachable from a start node         - warning
 */

import type { Flow, GraphIndex, ValidationResult } from '../types/flow-types.js';
import { compareCodePoints, edgeLabel } from '../types/flow-types.js';
import { GraphIndexBuilder } from '../graph/GraphIndexBuilder.js';
import { CycleDetector } from '../graph/CycleDetector.js';
import { ReachabilityAnalyzer } from '../graph/ReachabilityAnalyzer.js';
import type { EngineLogger } from '../logging/EngineLogger.js';

export interface ValidateOptions {
  /** Prebuilt index of the same flow */
  index?: GraphIndex;
  logger?: EngineLogger | null;
}

export class StructuralValidator {
  static validate(flow: Flow, options: ValidateOptions = {}): ValidationResult {
    const { logger } = options;
    const errors: string[] = [];
    const warnings: string[] = [];

    if (flow.nodes.length === 0) {
      logger?.debug('Flow has no nodes', { flowId: flow.id });
      return { valid: false, errors: ['Flow must contain at least one node.'], warnings };
    }

    const duplicates = this.findDuplicateIds(flow.nodes.map((node) => node.id));
    if (duplicates.length > 0) {
      errors.push(`Duplicate node identifiers detected: ${duplicates.join(', ')}`);
    }

    const nodes = GraphIndexBuilder.nodesById(flow);
    const index = options.index ?? GraphIndexBuilder.build(flow);

    const seenSignatures = new Set<string>();
    for (const edge of flow.edges) {
      if (!nodes.has(edge.source)) {
        errors.push(`Edge references unknown source node '${edge.source}'.`);
      }
      if (!nodes.has(edge.target)) {
        errors.push(`Edge references unknown target node '${edge.target}'.`);
      }
      const signature = JSON.stringify([edge.source, edge.target, edge.viaLabel ?? null]);
      if (seenSignatures.has(signature)) {
        warnings.push(
          `Duplicate edge detected from '${edge.source}' to '${edge.target}' with label '${edge.viaLabel ?? ''}'.`
        );
      } else {
        seenSignatures.add(signature);
      }
    }

    const roots = GraphIndexBuilder.findRoots(flow, index);
    if (roots.length === 0) {
      errors.push('Flow must contain at least one start node (no incoming edges).');
    } else if (roots.length > 1) {
      warnings.push('Multiple start nodes detected; execution order may be ambiguous.');
    }

    if (GraphIndexBuilder.findTerminals(flow, index).length === 0) {
      errors.push('Flow must contain at least one terminal message node (message without outgoing edges).');
    }

    for (const [nodeId, node] of nodes) {
      const outgoing = GraphIndexBuilder.outboundOf(index, nodeId);

      switch (node.type) {
        case 'message':
          if (outgoing.length > 0) {
            warnings.push(`Message node '${nodeId}' has outgoing edges and will not terminate the flow.`);
          }
          break;
        case 'question': {
          const expected = new Set(node.data.expectedAnswers ?? []);
          if (expected.size === 0) {
            break;
          }
          for (const edge of outgoing) {
            const label = edgeLabel(edge);
            if (label !== undefined && !expected.has(label)) {
              errors.push(
                `Edge from question '${nodeId}' uses label '${label}' not present in expected answers.`
              );
            }
          }
          break;
        }
        case 'action':
          break;
      }
    }

    const cycle = CycleDetector.detect(flow, index);
    if (cycle.hasCycle && cycle.cyclePath) {
      errors.push(`Cycle detected: ${CycleDetector.format(cycle.cyclePath)}`);
    }

    const { unreachable } = ReachabilityAnalyzer.analyze(flow, index);
    if (unreachable.length > 0) {
      warnings.push(`Unreachable nodes detected: ${unreachable.join(', ')}`);
    }

    logger?.debug('Structural validation finished', {
      flowId: flow.id,
      errors: errors.length,
      warnings: warnings.length,
    });

    return { valid: errors.length === 0, errors, warnings };
  }

  /**
   * Ids that occur more than once, sorted
   */
  private static findDuplicateIds(ids: readonly string[]): string[] {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const id of ids) {
      if (seen.has(id)) {
        duplicates.add(id);
      } else {
        seen.add(id);
      }
    }
    return [...duplicates].sort(compareCodePoints);
  }
}

/**
 * Validate the structure of a flow.
 */
export function validate(flow: Flow, options: ValidateOptions = {}): ValidationResult {
  return StructuralValidator.validate(flow, options);
}
