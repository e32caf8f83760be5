/**
 * Flow graph types
 *
 * Value objects the analysis core consumes. They are built fresh per call by
 * the parser (or by a caller that already validated its input) and are never
 * mutated by the engine.
 *
 * @module types
 */

/**
 * JSON-like value carried by the open `data` / `metadata` maps
 */
export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;

export type JsonArray = readonly JsonValue[];

export interface JsonObject {
  readonly [key: string]: JsonValue | undefined;
}

/**
 * The three node kinds a conversation is built from
 */
export type NodeKind = 'question' | 'action' | 'message';

export const NODE_KINDS: readonly NodeKind[] = ['question', 'action', 'message'];

/**
 * Fields every node kind may carry in `data`.
 * Unknown keys are kept as they are.
 */
export interface NodeDataBase extends JsonObject {
  readonly metadata?: JsonObject;
}

export interface QuestionData extends NodeDataBase {
  readonly question?: string;
  readonly check?: string;
  /** Answer labels the outgoing edges are allowed to use */
  readonly expectedAnswers?: readonly string[];
}

export interface ActionData extends NodeDataBase {
  readonly action?: string;
  readonly parameters?: JsonObject;
}

export interface MessageData extends NodeDataBase {
  readonly message?: string;
  readonly severity?: string;
}

interface NodeShape<K extends NodeKind, D extends NodeDataBase> {
  /** Unique key within the flow (by invariant, not by construction) */
  readonly id: string;
  readonly type: K;
  readonly label?: string;
  readonly data: D;
}

export type QuestionNode = NodeShape<'question', QuestionData>;
export type ActionNode = NodeShape<'action', ActionData>;
export type MessageNode = NodeShape<'message', MessageData>;

/**
 * A flow node, discriminated on `type`
 */
export type FlowNode = QuestionNode | ActionNode | MessageNode;

/**
 * Directed transition between two nodes
 */
export interface FlowEdge {
  readonly id?: string;
  readonly source: string;
  readonly target: string;
  /** Answer/branch label, disambiguates sibling edges */
  readonly viaLabel?: string;
  readonly data: JsonObject;
}

/**
 * A complete conversational flow graph
 */
export interface Flow {
  readonly id: string;
  readonly name: string;
  readonly nodes: readonly FlowNode[];
  readonly edges: readonly FlowEdge[];
  readonly metadata: JsonObject;
}

/**
 * Inbound and outbound adjacency keyed by node id.
 * Every declared node has an entry on both sides, possibly empty.
 */
export interface GraphIndex {
  readonly inbound: ReadonlyMap<string, readonly FlowEdge[]>;
  readonly outbound: ReadonlyMap<string, readonly FlowEdge[]>;
}

/**
 * Outcome of structural validation.
 * `valid` is true exactly when `errors` is empty.
 */
export interface ValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
}

/**
 * One step of a conversational path. `via` is the label of the edge
 * that led here, absent on the first step and on unlabelled edges.
 */
export interface PathStep {
  readonly nodeId: string;
  readonly via?: string;
}

export type FlowPath = readonly PathStep[];

/**
 * Validation result combined with every root-to-terminal path
 */
export interface FlowReport extends ValidationResult {
  readonly paths: readonly FlowPath[];
}

/**
 * Canonical text plus a suggested file name
 */
export interface FlowExport {
  readonly content: string;
  readonly filename: string;
}

/**
 * Label of an edge, treating the empty string as no label
 */
export function edgeLabel(edge: FlowEdge): string | undefined {
  return edge.viaLabel ? edge.viaLabel : undefined;
}

/**
 * Order strings by Unicode code point rather than UTF-16 code unit, so
 * astral characters sort after U+E000..U+FFFF
 */
export function compareCodePoints(a: string, b: string): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a.charCodeAt(i);
    const right = b.charCodeAt(i);
    if (left !== right) {
      // at a pair's high surrogate this reads the whole code point; at a
      // low surrogate the high halves already matched
      return (a.codePointAt(i) ?? left) - (b.codePointAt(i) ?? right);
    }
  }
  return a.length - b.length;
}
