import type { Result } from 'neverthrow';
import { z } from 'zod';
import type { MetaDocumentItem } from '../document.js';
import type { MetaError } from '../errors.js';
import { jsonPayload, jsonToItem, parseWithSchema } from './shared.js';

const Described = {
  name: z.string().min(1),
  desc: z.string(),
  alias: z.string().optional(),
};

const ContextCell = z.object({ ...Described, cell: z.number().int().min(0) });

const ContextColumn = z.object({
  ...Described,
  column: z.number().int().min(0),
  cells: z.array(ContextCell).optional(),
});

const MethodInput = z.object({ ...Described, abiName: z.string(), path: z.string() });

const MethodExpression = z.object({
  ...Described,
  abiName: z.string(),
  path: z.string(),
  signedContext: z.boolean().optional(),
  callerContext: z.boolean().optional(),
  contextColumns: z.array(ContextColumn).optional(),
});

const Method = z.object({
  ...Described,
  abiName: z.string(),
  inputs: z.array(MethodInput),
  expressions: z.array(MethodExpression),
});

/**
 * Describes a contract that calls an interpreter: which of its methods take
 * expressions and what context those expressions see.
 */
export const InterpreterCallerMetaV1Schema = z.object({
  ...Described,
  abiName: z.string(),
  source: z.string(),
  url: z.string().optional(),
  methods: z.array(Method),
});

export type InterpreterCallerMetaV1 = z.infer<typeof InterpreterCallerMetaV1Schema>;

export function interpreterCallerMetaV1FromItem(item: MetaDocumentItem): Result<InterpreterCallerMetaV1, MetaError> {
  return jsonPayload(item, 'interpreter-caller-meta-v1', InterpreterCallerMetaV1Schema);
}

export function interpreterCallerMetaV1ToItem(meta: InterpreterCallerMetaV1): Result<MetaDocumentItem, MetaError> {
  return parseWithSchema(InterpreterCallerMetaV1Schema, meta).map((valid) =>
    jsonToItem(valid, 'interpreter-caller-meta-v1')
  );
}
