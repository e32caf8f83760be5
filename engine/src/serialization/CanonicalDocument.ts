/**
 * Canonical Document
 *
 * Projects a flow onto the ordered document the serializers render.
 * Ordering is what makes the export diff-stable: two flows that differ only
 * in node/edge declaration order produce the same document.
 *
 * - nodes by (kind rank, id): question, action, message
 * - edges leaving a node by (source, target, label)
 * - keys of `metadata` and `parameters` sorted
 *
 * Strings compare by code point.
 *
 * Maps are real `Map`s: plain objects would move integer-like keys
 * (answer labels such as "0", "1") to the front.
 *
 * @module serialization
 */

import type {
  ActionNode,
  Flow,
  FlowEdge,
  FlowNode,
  GraphIndex,
  JsonObject,
  JsonValue,
  MessageNode,
  NodeKind,
  QuestionNode,
} from '../types/flow-types.js';
import { compareCodePoints, edgeLabel } from '../types/flow-types.js';
import { GraphIndexBuilder } from '../graph/GraphIndexBuilder.js';

export type CanonicalScalar = string | number | boolean | null;

export type CanonicalValue = CanonicalScalar | CanonicalMap | CanonicalList;

export type CanonicalMap = ReadonlyMap<string, CanonicalValue>;

export type CanonicalList = readonly CanonicalValue[];

/** Key used in a `next` map for edges without a label */
export const DEFAULT_BRANCH = 'default';

const KIND_RANK: Record<NodeKind, number> = {
  question: 0,
  action: 1,
  message: 2,
};

export class CanonicalDocument {
  /**
   * Build the canonical document of a flow.
   *
   * @param index - Prebuilt index of the same flow (built when omitted)
   */
  static build(flow: Flow, index: GraphIndex = GraphIndexBuilder.build(flow)): CanonicalMap {
    const flowMap = new Map<string, CanonicalValue>();
    for (const node of this.sortNodes(flow.nodes)) {
      flowMap.set(node.id, this.nodeEntry(node, GraphIndexBuilder.outboundOf(index, node.id)));
    }

    const document = new Map<string, CanonicalValue>();
    document.set('id', flow.id);
    document.set('name', flow.name);
    if (this.hasEntries(flow.metadata)) {
      document.set('metadata', this.sortedMap(flow.metadata));
    }
    document.set('flow', flowMap);
    return document;
  }

  static sortNodes(nodes: readonly FlowNode[]): FlowNode[] {
    return [...nodes].sort(
      (a, b) => KIND_RANK[a.type] - KIND_RANK[b.type] || compareCodePoints(a.id, b.id)
    );
  }

  static sortEdges(edges: readonly FlowEdge[]): FlowEdge[] {
    return [...edges].sort(
      (a, b) =>
        compareCodePoints(a.source, b.source) ||
        compareCodePoints(a.target, b.target) ||
        compareCodePoints(a.viaLabel ?? '', b.viaLabel ?? '')
    );
  }

  /**
   * The `next` value of a node entry.
   *
   * A single unlabelled edge collapses to its target id; anything else
   * (several edges, or any labelled edge) becomes a label -> target map
   * with DEFAULT_BRANCH standing in for missing labels.
   *
   * @returns undefined when the node has no outgoing edge
   */
  static buildNext(edges: readonly FlowEdge[]): CanonicalValue | undefined {
    if (edges.length === 0) {
      return undefined;
    }
    if (edges.length === 1 && edgeLabel(edges[0]) === undefined) {
      return edges[0].target;
    }

    const next = new Map<string, CanonicalValue>();
    for (const edge of this.sortEdges(edges)) {
      next.set(edgeLabel(edge) ?? DEFAULT_BRANCH, edge.target);
    }
    return next;
  }

  static nodeEntry(node: FlowNode, edges: readonly FlowEdge[]): CanonicalMap {
    switch (node.type) {
      case 'question':
        return this.questionEntry(node, edges);
      case 'action':
        return this.actionEntry(node, edges);
      case 'message':
        return this.messageEntry(node, edges);
    }
  }

  private static questionEntry(node: QuestionNode, edges: readonly FlowEdge[]): CanonicalMap {
    const entry = new Map<string, CanonicalValue>();
    const { data } = node;
    entry.set('type', node.type);
    if (data.question) {
      entry.set('question', data.question);
    }
    if (data.check) {
      entry.set('check', data.check);
    }
    if (data.expectedAnswers && data.expectedAnswers.length > 0) {
      entry.set('expected_answers', data.expectedAnswers.map((answer) => String(answer)));
    }
    this.setNext(entry, edges);
    this.setMetadata(entry, data.metadata);
    return entry;
  }

  private static actionEntry(node: ActionNode, edges: readonly FlowEdge[]): CanonicalMap {
    const entry = new Map<string, CanonicalValue>();
    const { data } = node;
    entry.set('type', node.type);
    if (data.action) {
      entry.set('action', data.action);
    }
    if (data.parameters && this.hasEntries(data.parameters)) {
      entry.set('parameters', this.sortedMap(data.parameters));
    }
    this.setNext(entry, edges);
    this.setMetadata(entry, data.metadata);
    return entry;
  }

  private static messageEntry(node: MessageNode, edges: readonly FlowEdge[]): CanonicalMap {
    const entry = new Map<string, CanonicalValue>();
    const { data } = node;
    entry.set('type', node.type);
    if (data.message) {
      entry.set('message', data.message);
    }
    if (data.severity) {
      entry.set('severity', data.severity);
    }
    this.setMetadata(entry, data.metadata);
    this.setNext(entry, edges);
    return entry;
  }

  private static setNext(entry: Map<string, CanonicalValue>, edges: readonly FlowEdge[]): void {
    const next = this.buildNext(edges);
    if (next !== undefined) {
      entry.set('next', next);
    }
  }

  private static setMetadata(entry: Map<string, CanonicalValue>, metadata: JsonObject | undefined): void {
    if (metadata && this.hasEntries(metadata)) {
      entry.set('metadata', this.sortedMap(metadata));
    }
  }

  /**
   * Copy of an open map with its keys sorted (nested maps keep their order)
   */
  static sortedMap(source: JsonObject): CanonicalMap {
    const sorted = new Map<string, CanonicalValue>();
    for (const key of Object.keys(source).sort(compareCodePoints)) {
      const value = source[key];
      if (value !== undefined) {
        sorted.set(key, this.toCanonical(value));
      }
    }
    return sorted;
  }

  static toCanonical(value: JsonValue): CanonicalValue {
    if (value === null || typeof value !== 'object') {
      return value;
    }
    if (Array.isArray(value)) {
      return value.map((item: JsonValue) => this.toCanonical(item));
    }
    const map = new Map<string, CanonicalValue>();
    for (const [key, item] of Object.entries(value)) {
      if (item !== undefined) {
        map.set(key, this.toCanonical(item));
      }
    }
    return map;
  }

  private static hasEntries(source: JsonObject): boolean {
    return Object.values(source).some((value) => value !== undefined);
  }
}
