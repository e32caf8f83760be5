/**
 * Flow Parser
 *
 * Turns YAML/JSON text or an already-decoded value into a typed Flow.
 * Everything that is not a Flow becomes a FlowSchemaError listing one
 * `path.to.field: message` line per problem.
 *
 * What it does NOT do:
 * - check graph soundness (StructuralValidator)
 * - read files (FlowLoader)
 *
 * @module parser
 */

import YAML from 'yaml';
import { z } from 'zod';
import type { Flow } from '../types/flow-types.js';
import { NODE_KINDS } from '../types/flow-types.js';
import { FlowErrorCode, FlowSchemaError, findClosestMatch, findMatches } from '../errors/index.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { FLOW_FIELDS, FlowSchema } from './FlowSchema.js';

export type SafeParseResult =
  | { readonly success: true; readonly flow: Flow }
  | { readonly success: false; readonly error: FlowSchemaError };

export class FlowParser {
  /**
   * Validate a decoded document (object from YAML/JSON) as a Flow
   *
   * @throws {FlowSchemaError} when the value does not match the flow schema
   */
  static parse(raw: unknown): Flow {
    const result = FlowSchema.safeParse(raw);
    if (!result.success) {
      throw this.transformZodError(result.error, raw);
    }

    const flow: Flow = result.data;
    LoggerManager.tryGetLogger()?.debug('Parsed flow document', {
      flowId: flow.id,
      nodes: flow.nodes.length,
      edges: flow.edges.length,
    });
    return flow;
  }

  /**
   * Non-throwing variant of parse()
   */
  static safeParse(raw: unknown): SafeParseResult {
    try {
      return { success: true, flow: this.parse(raw) };
    } catch (error) {
      if (error instanceof FlowSchemaError) {
        return { success: false, error };
      }
      throw error;
    }
  }

  static fromYAML(content: string): Flow {
    let raw: unknown;
    try {
      raw = YAML.parse(content);
    } catch (error) {
      throw FlowSchemaError.syntax('YAML', error instanceof Error ? error.message : String(error));
    }
    return this.parse(raw);
  }

  static fromJSON(content: string): Flow {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw FlowSchemaError.syntax('JSON', error instanceof Error ? error.message : String(error));
    }
    return this.parse(raw);
  }

  /**
   * Parse file content, picking the format from the file extension.
   * Unknown extensions are read as YAML, which also accepts JSON.
   */
  static fromContent(content: string, filename?: string): Flow {
    if (filename?.endsWith('.json')) {
      return this.fromJSON(content);
    }
    return this.fromYAML(content);
  }

  /**
   * Convert zod issues into a single FlowSchemaError with hints
   */
  private static transformZodError(error: z.ZodError, raw: unknown): FlowSchemaError {
    const issues = error.issues.map((issue) => this.formatIssue(issue));
    const first = error.issues[0];
    const path = first && first.path.length > 0 ? first.path.join('.') : undefined;

    const discriminator = error.issues.find(
      (issue) => issue.code === z.ZodIssueCode.invalid_union_discriminator
    );
    if (discriminator) {
      const received = valueAt(raw, discriminator.path);
      const suggestion = typeof received === 'string' ? findClosestMatch(received, NODE_KINDS) : undefined;
      return new FlowSchemaError({
        code: FlowErrorCode.SCHEMA_UNKNOWN_NODE_TYPE,
        message:
          received === undefined
            ? `Missing node type at ${discriminator.path.join('.')}`
            : `Unknown node type ${JSON.stringify(received)} at ${discriminator.path.join('.')}`,
        path: discriminator.path.join('.'),
        hint: suggestion
          ? `Did you mean "${suggestion}"?`
          : `Node type must be one of: ${NODE_KINDS.join(', ')}`,
        issues,
      });
    }

    return new FlowSchemaError({
      code: FlowErrorCode.SCHEMA_INVALID,
      message: issues.length === 1 ? `Invalid flow document: ${issues[0]}` : `Invalid flow document (${issues.length} issues)`,
      path,
      hint: this.missingFieldHint(raw),
      issues,
    });
  }

  private static formatIssue(issue: z.ZodIssue): string {
    return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
  }

  /**
   * Suggest a top-level field when a misspelt one stands in for a missing one
   */
  private static missingFieldHint(raw: unknown): string | undefined {
    if (!isRecord(raw)) {
      return 'A flow document is a mapping with id, name, nodes and edges.';
    }
    const unknown = Object.keys(raw).filter((key) => !FLOW_FIELDS.includes(key));
    for (const key of unknown) {
      const [match] = findMatches(key, FLOW_FIELDS, 1);
      if (match && !(match in raw)) {
        return `Unknown field "${key}". Did you mean "${match}"?`;
      }
    }
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function valueAt(root: unknown, path: readonly (string | number)[]): unknown {
  let current = root;
  for (const key of path) {
    if (Array.isArray(current) && typeof key === 'number') {
      current = current[key];
    } else if (isRecord(current)) {
      current = current[String(key)];
    } else {
      return undefined;
    }
  }
  return current;
}
