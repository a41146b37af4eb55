import { deflateSync, inflateSync, inflateRawSync } from 'node:zlib';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { MetaError } from './errors.js';
import { MetaErr, describeCause } from './errors.js';
import { assertNever } from '../runtime/assert-never.js';

// `none` means the field is absent from the encoded map.
export type ContentType = 'none' | 'application/json' | 'application/cbor' | 'application/octet-stream';
export type ContentEncoding = 'none' | 'identity' | 'deflate';
export type ContentLanguage = 'none' | 'en';

const CONTENT_TYPES: readonly ContentType[] = ['application/json', 'application/cbor', 'application/octet-stream'];
const CONTENT_ENCODINGS: readonly ContentEncoding[] = ['identity', 'deflate'];
const CONTENT_LANGUAGES: readonly ContentLanguage[] = ['en'];

function parseWire<T extends string>(field: string, known: readonly T[], wire: string): Result<T, MetaError> {
  const found = known.find((k) => k === wire);
  return found === undefined
    ? err(MetaErr.of('CBOR_DECODE_ERROR', `unknown ${field} "${wire}"`))
    : ok(found);
}

export function parseContentType(wire: string): Result<ContentType, MetaError> {
  return parseWire('content type', CONTENT_TYPES, wire);
}

export function parseContentEncoding(wire: string): Result<ContentEncoding, MetaError> {
  return parseWire('content encoding', CONTENT_ENCODINGS, wire);
}

export function parseContentLanguage(wire: string): Result<ContentLanguage, MetaError> {
  return parseWire('content language', CONTENT_LANGUAGES, wire);
}

/** Apply the encoding to raw payload bytes. `none` and `identity` return the input. */
export function encodeContent(encoding: ContentEncoding, data: Uint8Array): Uint8Array {
  switch (encoding) {
    case 'none':
    case 'identity':
      return data;
    case 'deflate':
      return new Uint8Array(deflateSync(data));
    default:
      return assertNever(encoding);
  }
}

/**
 * Undo the encoding.
 *
 * Deflate payloads are accepted both zlib-wrapped and raw: zlib inflate is
 * tried first and raw inflate second.
 */
export function decodeContent(encoding: ContentEncoding, data: Uint8Array): Result<Uint8Array, MetaError> {
  switch (encoding) {
    case 'none':
    case 'identity':
      return ok(data);
    case 'deflate':
      return inflateEither(data);
    default:
      return assertNever(encoding);
  }
}

function inflateEither(data: Uint8Array): Result<Uint8Array, MetaError> {
  try {
    return ok(new Uint8Array(inflateSync(data)));
  } catch (zlibError) {
    try {
      return ok(new Uint8Array(inflateRawSync(data)));
    } catch (rawError) {
      return err(
        MetaErr.of('INFLATE_ERROR', `zlib: ${describeCause(zlibError)}; raw: ${describeCause(rawError)}`)
      );
    }
  }
}
