import type { Result } from 'neverthrow';
import { z } from 'zod';
import type { MetaDocumentItem } from '../document.js';
import type { MetaError } from '../errors.js';
import { jsonPayload, jsonToItem, parseWithSchema } from './shared.js';

// Bit range within the operand, inclusive start and end.
const BitRange = z.tuple([z.number().int().min(0).max(255), z.number().int().min(0).max(255)]);

const OperandArg = z.object({
  name: z.string(),
  bits: BitRange,
  desc: z.string().optional(),
  computation: z.string().optional(),
  validRange: z.array(z.union([z.tuple([z.number().int()]), z.tuple([z.number().int(), z.number().int()])])).optional(),
});

const InputArg = z.object({
  name: z.string(),
  desc: z.string().optional(),
  bits: BitRange.optional(),
});

const ComputedOutput = z.object({
  bits: BitRange,
  computation: z.string(),
});

export const OpMetaSchema = z.object({
  name: z.string().min(1),
  desc: z.string(),
  operand: z.union([z.number().int().min(0), z.array(OperandArg)]),
  inputs: z.union([z.number().int().min(0), z.array(InputArg)]),
  outputs: z.union([z.number().int().min(0), ComputedOutput]),
  aliases: z.array(z.string()).optional(),
});

/** Opcode descriptions: one entry per opcode, in opcode order. */
export const OpMetaV1Schema = z.array(OpMetaSchema);

export type OpMeta = z.infer<typeof OpMetaSchema>;
export type OpMetaV1 = z.infer<typeof OpMetaV1Schema>;

export function opMetaV1FromItem(item: MetaDocumentItem): Result<OpMetaV1, MetaError> {
  return jsonPayload(item, 'op-meta-v1', OpMetaV1Schema);
}

export function opMetaV1ToItem(meta: OpMetaV1): Result<MetaDocumentItem, MetaError> {
  return parseWithSchema(OpMetaV1Schema, meta).map((valid) => jsonToItem(valid, 'op-meta-v1'));
}
