import { AbiCoder, getBytes } from 'ethers';
import { ok, err, Result } from 'neverthrow';
import { z } from 'zod';
import type { MetaDocumentItem } from '../document.js';
import { metaItem, unpack } from '../document.js';
import type { MetaError } from '../errors.js';
import { MetaErr, describeCause } from '../errors.js';
import { bytes32ToStr, strToBytes32 } from '../bytes32.js';
import { hexToBytes } from '../hex.js';
import { expectMagic, parseWithSchema } from './shared.js';

/**
 * Authoring meta: the words a parser accepts, ABI-encoded.
 *
 * v1: `(bytes32 word, uint8 operandParserOffset, string description)[]`
 * v2: `(bytes32 word, string description)[]`
 *
 * Words are stored as left-aligned, zero-padded bytes32.
 */
export interface AuthoringWordV1 {
  readonly word: string;
  readonly operandParserOffset: number;
  readonly description: string;
}
export type AuthoringMetaV1 = readonly AuthoringWordV1[];

export interface AuthoringWordV2 {
  readonly word: string;
  readonly description: string;
}
export type AuthoringMetaV2 = readonly AuthoringWordV2[];

const AUTHORING_V1_TYPES = ['tuple(bytes32,uint8,string)[]'];
const AUTHORING_V2_TYPES = ['tuple(bytes32,string)[]'];

const WORD_PATTERN = /^[a-z][0-9a-z-]*$/;

const WordSchema = z.string().regex(WORD_PATTERN, 'word must match ^[a-z][0-9a-z-]*$');

function uniqueWords(words: readonly { readonly word: string }[], ctx: z.RefinementCtx): void {
  const seen = new Set<string>();
  words.forEach((w, i) => {
    if (seen.has(w.word)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'word'], message: `duplicate word "${w.word}"` });
    }
    seen.add(w.word);
  });
}

const AuthoringMetaV1Schema = z
  .array(
    z.object({
      word: WordSchema,
      operandParserOffset: z.number().int().min(0).max(255),
      description: z.string(),
    })
  )
  .superRefine(uniqueWords);

const AuthoringMetaV2Schema = z
  .array(z.object({ word: WordSchema, description: z.string() }))
  .superRefine(uniqueWords);

// Shapes ethers hands back from `decode`.
const DecodedV1Rows = z.array(z.tuple([z.string(), z.bigint(), z.string()]));
const DecodedV2Rows = z.array(z.tuple([z.string(), z.string()]));

const coder = AbiCoder.defaultAbiCoder();

function abiEncode(types: readonly string[], values: readonly unknown[]): Result<Uint8Array, MetaError> {
  try {
    return ok(getBytes(coder.encode(types, values)));
  } catch (e) {
    return err(MetaErr.of('ABI_ENCODE_ERROR', describeCause(e)));
  }
}

function abiDecodeFirst(types: readonly string[], data: Uint8Array): Result<unknown, MetaError> {
  try {
    const decoded: unknown = coder.decode(types, data)[0];
    return ok(decoded);
  } catch (e) {
    return err(MetaErr.of('ABI_DECODE_ERROR', describeCause(e)));
  }
}

function wordFromHex(hex: string): Result<string, MetaError> {
  return hexToBytes(hex).andThen(bytes32ToStr);
}

function abiRows<S extends z.ZodTypeAny>(schema: S, value: unknown): Result<z.output<S>, MetaError> {
  const parsed = schema.safeParse(value);
  return parsed.success ? ok(parsed.data) : err(MetaErr.of('ABI_DECODE_ERROR', 'unexpected decoded ABI shape'));
}

export function encodeAuthoringMetaV1(meta: AuthoringMetaV1): Result<Uint8Array, MetaError> {
  return parseWithSchema(AuthoringMetaV1Schema, meta)
    .andThen((words) =>
      Result.combine(words.map((w) => strToBytes32(w.word).map((b) => [b, w.operandParserOffset, w.description])))
    )
    .andThen((rows) => abiEncode(AUTHORING_V1_TYPES, [rows]));
}

export function decodeAuthoringMetaV1(data: Uint8Array): Result<AuthoringMetaV1, MetaError> {
  return abiDecodeFirst(AUTHORING_V1_TYPES, data)
    .andThen((value) => abiRows(DecodedV1Rows, value))
    .andThen((rows) =>
      Result.combine(
        rows.map(([wordHex, offset, description]) =>
          wordFromHex(wordHex).map((word): AuthoringWordV1 => ({
            word,
            operandParserOffset: Number(offset),
            description,
          }))
        )
      )
    );
}

export function encodeAuthoringMetaV2(meta: AuthoringMetaV2): Result<Uint8Array, MetaError> {
  return parseWithSchema(AuthoringMetaV2Schema, meta)
    .andThen((words) => Result.combine(words.map((w) => strToBytes32(w.word).map((b) => [b, w.description]))))
    .andThen((rows) => abiEncode(AUTHORING_V2_TYPES, [rows]));
}

export function decodeAuthoringMetaV2(data: Uint8Array): Result<AuthoringMetaV2, MetaError> {
  return abiDecodeFirst(AUTHORING_V2_TYPES, data)
    .andThen((value) => abiRows(DecodedV2Rows, value))
    .andThen((rows) =>
      Result.combine(
        rows.map(([wordHex, description]) =>
          wordFromHex(wordHex).map((word): AuthoringWordV2 => ({ word, description }))
        )
      )
    );
}

export function authoringMetaV1FromItem(item: MetaDocumentItem): Result<AuthoringMetaV1, MetaError> {
  return expectMagic(item, 'authoring-meta-v1').andThen(unpack).andThen(decodeAuthoringMetaV1);
}

export function authoringMetaV2FromItem(item: MetaDocumentItem): Result<AuthoringMetaV2, MetaError> {
  return expectMagic(item, 'authoring-meta-v2').andThen(unpack).andThen(decodeAuthoringMetaV2);
}

export function authoringMetaV1ToItem(meta: AuthoringMetaV1): Result<MetaDocumentItem, MetaError> {
  return encodeAuthoringMetaV1(meta).map((payload) =>
    metaItem({ payload, magic: 'authoring-meta-v1', contentType: 'application/cbor' })
  );
}

export function authoringMetaV2ToItem(meta: AuthoringMetaV2): Result<MetaDocumentItem, MetaError> {
  return encodeAuthoringMetaV2(meta).map((payload) =>
    metaItem({ payload, magic: 'authoring-meta-v2', contentType: 'application/cbor' })
  );
}
