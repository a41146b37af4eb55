import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { z } from 'zod';
import type { KnownMagic } from '../magic.js';
import type { MetaDocumentItem } from '../document.js';
import { metaItem, unpack } from '../document.js';
import { encodeContent } from '../content.js';
import type { MetaError } from '../errors.js';
import { MetaErr, describeCause } from '../errors.js';
import { decodeUtf8, encodeUtf8 } from '../bytes32.js';

export function expectMagic(item: MetaDocumentItem, magic: KnownMagic): Result<MetaDocumentItem, MetaError> {
  return item.magic === magic ? ok(item) : err(MetaErr.invalidMagic(magic, item.magic));
}

export function zodIssues(error: z.ZodError): readonly string[] {
  return error.errors.map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

export function parseWithSchema<S extends z.ZodTypeAny>(schema: S, value: unknown): Result<z.output<S>, MetaError> {
  const parsed = schema.safeParse(value);
  return parsed.success ? ok(parsed.data) : err(MetaErr.schema(zodIssues(parsed.error)));
}

function parseJson(text: string): Result<unknown, MetaError> {
  try {
    const value: unknown = JSON.parse(text);
    return ok(value);
  } catch (e) {
    return err(MetaErr.of('JSON_PARSE_ERROR', describeCause(e)));
  }
}

/** Unpack, decode UTF-8, parse JSON and validate: the path shared by all JSON meta types. */
export function jsonPayload<S extends z.ZodTypeAny>(
  item: MetaDocumentItem,
  magic: KnownMagic,
  schema: S
): Result<z.output<S>, MetaError> {
  return expectMagic(item, magic)
    .andThen(unpack)
    .andThen(decodeUtf8)
    .andThen(parseJson)
    .andThen((value) => parseWithSchema(schema, value));
}

/** JSON meta items are stored deflated, tagged as English JSON. */
export function jsonToItem(value: unknown, magic: KnownMagic): MetaDocumentItem {
  return metaItem({
    payload: encodeContent('deflate', encodeUtf8(JSON.stringify(value))),
    magic,
    contentType: 'application/json',
    contentEncoding: 'deflate',
    contentLanguage: 'en',
  });
}
