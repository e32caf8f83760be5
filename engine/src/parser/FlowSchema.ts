/**
 * Flow Schema
 *
 * zod schemas for the raw flow document. They check shape and field
 * types only; graph soundness is the StructuralValidator's job.
 *
 * Open `data` and `metadata` maps accept any JSON value and keep unknown
 * keys. Edges accept their label as `viaLabel` or `via_label`.
 *
 * @module parser
 */

import { z } from 'zod';
import type { JsonValue } from '../types/flow-types.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const JsonObjectSchema = z.record(JsonValueSchema);

const QuestionDataSchema = z
  .object({
    question: z.string().optional(),
    check: z.string().optional(),
    expectedAnswers: z
      .array(z.union([z.string(), z.number(), z.boolean()]))
      .transform((answers) => answers.map((answer) => String(answer)))
      .optional(),
    metadata: JsonObjectSchema.optional(),
  })
  .catchall(JsonValueSchema);

const ActionDataSchema = z
  .object({
    action: z.string().optional(),
    parameters: JsonObjectSchema.optional(),
    metadata: JsonObjectSchema.optional(),
  })
  .catchall(JsonValueSchema);

const MessageDataSchema = z
  .object({
    message: z.string().optional(),
    severity: z.string().optional(),
    metadata: JsonObjectSchema.optional(),
  })
  .catchall(JsonValueSchema);

const nodeFields = {
  id: z.string(),
  label: z.string().optional(),
};

export const FlowNodeSchema = z.discriminatedUnion('type', [
  z.object({ ...nodeFields, type: z.literal('question'), data: QuestionDataSchema.default({}) }),
  z.object({ ...nodeFields, type: z.literal('action'), data: ActionDataSchema.default({}) }),
  z.object({ ...nodeFields, type: z.literal('message'), data: MessageDataSchema.default({}) }),
]);

export const FlowEdgeSchema = z
  .object({
    id: z.string().optional(),
    source: z.string(),
    target: z.string(),
    viaLabel: z.string().nullish(),
    via_label: z.string().nullish(),
    data: JsonObjectSchema.default({}),
  })
  .transform(({ viaLabel, via_label, ...edge }) => {
    const label = viaLabel ?? via_label;
    return label === null || label === undefined ? edge : { ...edge, viaLabel: label };
  });

export const FlowSchema = z.object({
  id: z.string(),
  name: z.string(),
  nodes: z.array(FlowNodeSchema),
  edges: z.array(FlowEdgeSchema).default([]),
  metadata: JsonObjectSchema.default({}),
});

/** Top-level fields of a flow document */
export const FLOW_FIELDS: readonly string[] = ['id', 'name', 'nodes', 'edges', 'metadata'];
