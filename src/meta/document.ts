import { encode, decodeFirst } from 'cborg';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { KnownMagic } from './magic.js';
import { MAGIC_PREFIX_LENGTH, hasMagicPrefix, magicFromU64, magicToPrefixBytes, magicValue } from './magic.js';
import type { ContentEncoding, ContentLanguage, ContentType } from './content.js';
import { decodeContent, parseContentEncoding, parseContentLanguage, parseContentType } from './content.js';
import type { MetaError } from './errors.js';
import { MetaErr, describeCause } from './errors.js';
import { bytesEqual, concatBytes } from './hex.js';

/**
 * One meta item: a payload plus the fields needed to interpret it.
 */
export interface MetaDocumentItem {
  readonly payload: Uint8Array;
  readonly magic: KnownMagic;
  readonly contentType: ContentType;
  readonly contentEncoding: ContentEncoding;
  readonly contentLanguage: ContentLanguage;
}

/**
 * CBOR map keys of an encoded item.
 *
 * LOCKED: wire format. Keys are written in ascending order and a `none`
 * content field is omitted rather than written as null.
 */
export const META_MAP_KEYS = {
  payload: 0,
  magic: 1,
  contentType: 2,
  contentEncoding: 3,
  contentLanguage: 4,
} as const;

export interface MetaItemInit {
  readonly payload: Uint8Array;
  readonly magic: KnownMagic;
  readonly contentType?: ContentType;
  readonly contentEncoding?: ContentEncoding;
  readonly contentLanguage?: ContentLanguage;
}

export function metaItem(init: MetaItemInit): MetaDocumentItem {
  return {
    payload: init.payload,
    magic: init.magic,
    contentType: init.contentType ?? 'none',
    contentEncoding: init.contentEncoding ?? 'none',
    contentLanguage: init.contentLanguage ?? 'none',
  };
}

export function itemsEqual(a: MetaDocumentItem, b: MetaDocumentItem): boolean {
  return (
    a.magic === b.magic &&
    a.contentType === b.contentType &&
    a.contentEncoding === b.contentEncoding &&
    a.contentLanguage === b.contentLanguage &&
    bytesEqual(a.payload, b.payload)
  );
}

/** Number of entries in the encoded map: payload and magic, plus each present content field. */
export function fieldCount(item: MetaDocumentItem): number {
  let count = 2;
  if (item.contentType !== 'none') count++;
  if (item.contentEncoding !== 'none') count++;
  if (item.contentLanguage !== 'none') count++;
  return count;
}

export function cborEncode(item: MetaDocumentItem): Uint8Array {
  const map = new Map<number, Uint8Array | bigint | string>();
  map.set(META_MAP_KEYS.payload, item.payload);
  map.set(META_MAP_KEYS.magic, magicValue(item.magic));
  if (item.contentType !== 'none') map.set(META_MAP_KEYS.contentType, item.contentType);
  if (item.contentEncoding !== 'none') map.set(META_MAP_KEYS.contentEncoding, item.contentEncoding);
  if (item.contentLanguage !== 'none') map.set(META_MAP_KEYS.contentLanguage, item.contentLanguage);
  return encode(map);
}

/** `magic` prefix followed by each item's encoding, in order. */
export function cborEncodeSeq(items: readonly MetaDocumentItem[], magic: KnownMagic): Uint8Array {
  return concatBytes([magicToPrefixBytes(magic), ...items.map(cborEncode)]);
}

/**
 * Decode a single item or a `rain-meta-document-v1` sequence.
 *
 * Values are read one at a time. The stream ends at end of input, at a value
 * that is not a map, or at bytes that do not parse; in the last two cases the
 * leftover bytes make the whole input CORRUPT_META. A map that does not
 * describe an item (unknown key, missing payload or magic, unknown magic) is
 * reported as its own error.
 */
export function cborDecode(data: Uint8Array): Result<MetaDocumentItem[], MetaError> {
  const body = hasMagicPrefix(data, 'rain-meta-document-v1') ? data.subarray(MAGIC_PREFIX_LENGTH) : data;

  const items: MetaDocumentItem[] = [];
  const offsets: number[] = [];
  let remaining = body;
  let stopReason = 'end of input';

  while (remaining.length > 0) {
    let value: unknown;
    let rest: Uint8Array;
    try {
      [value, rest] = decodeFirst(remaining, { useMaps: true, rejectDuplicateMapKeys: true });
    } catch (e) {
      stopReason = describeCause(e);
      break;
    }
    if (!(value instanceof Map)) {
      stopReason = 'value is not a meta map';
      break;
    }

    const item = itemFromMap(value);
    if (item.isErr()) return err(item.error);

    items.push(item.value);
    remaining = rest;
    offsets.push(body.length - remaining.length);
  }

  if (items.length === 0 || offsets.length !== items.length) {
    return err(MetaErr.of('CORRUPT_META', `no meta items decoded (${stopReason})`));
  }
  const last = offsets[offsets.length - 1];
  if (last !== body.length) {
    return err(
      MetaErr.of('CORRUPT_META', `${body.length - (last ?? 0)} trailing bytes after last item (${stopReason})`)
    );
  }
  return ok(items);
}

function itemFromMap(map: Map<unknown, unknown>): Result<MetaDocumentItem, MetaError> {
  let payload: Uint8Array | undefined;
  let magic: KnownMagic | undefined;
  let contentType: ContentType = 'none';
  let contentEncoding: ContentEncoding = 'none';
  let contentLanguage: ContentLanguage = 'none';

  for (const [key, value] of map) {
    switch (key) {
      case META_MAP_KEYS.payload:
        if (!(value instanceof Uint8Array)) return err(invalidField('payload', 'byte string'));
        payload = value.slice();
        break;

      case META_MAP_KEYS.magic: {
        const raw = magicInteger(value);
        if (raw === null) return err(invalidField('magic', 'integer'));
        const parsed = magicFromU64(raw);
        if (parsed.isErr()) return err(parsed.error);
        magic = parsed.value;
        break;
      }

      case META_MAP_KEYS.contentType: {
        if (typeof value !== 'string') return err(invalidField('content type', 'text string'));
        const parsed = parseContentType(value);
        if (parsed.isErr()) return err(parsed.error);
        contentType = parsed.value;
        break;
      }

      case META_MAP_KEYS.contentEncoding: {
        if (typeof value !== 'string') return err(invalidField('content encoding', 'text string'));
        const parsed = parseContentEncoding(value);
        if (parsed.isErr()) return err(parsed.error);
        contentEncoding = parsed.value;
        break;
      }

      case META_MAP_KEYS.contentLanguage: {
        if (typeof value !== 'string') return err(invalidField('content language', 'text string'));
        const parsed = parseContentLanguage(value);
        if (parsed.isErr()) return err(parsed.error);
        contentLanguage = parsed.value;
        break;
      }

      default:
        return err(MetaErr.of('CBOR_DECODE_ERROR', `unexpected meta map key ${String(key)}`));
    }
  }

  if (payload === undefined) return err(MetaErr.of('CBOR_DECODE_ERROR', 'meta map has no payload'));
  if (magic === undefined) return err(MetaErr.of('CBOR_DECODE_ERROR', 'meta map has no magic'));

  return ok({ payload, magic, contentType, contentEncoding, contentLanguage });
}

/** cborg yields small integers as numbers and floats as numbers too; only whole values are magics. */
function magicInteger(value: unknown): bigint | null {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value);
  return null;
}

function invalidField(field: string, expected: string): MetaError {
  return MetaErr.of('CBOR_DECODE_ERROR', `meta ${field} must be a ${expected}`);
}

/** Payload with its content encoding removed. */
export function unpack(item: MetaDocumentItem): Result<Uint8Array, MetaError> {
  return decodeContent(item.contentEncoding, item.payload);
}

/** Magics that `unpackInto` hands to a converter. */
export const UNPACKABLE_MAGICS: ReadonlySet<KnownMagic> = new Set<KnownMagic>([
  'op-meta-v1',
  'dotrain-v1',
  'rainlang-v1',
  'solidity-abi-v2',
  'authoring-meta-v1',
  'interpreter-caller-meta-v1',
  'expression-deployer-v2-bytecode-v1',
  'rainlang-source-v1',
]);

export type MetaConverter<T> = (item: MetaDocumentItem) => Result<T, MetaError>;

/**
 * Run `convert` on an item whose magic is in `UNPACKABLE_MAGICS`; any other
 * magic is UNSUPPORTED_META without calling the converter.
 */
export function unpackInto<T>(item: MetaDocumentItem, convert: MetaConverter<T>): Result<T, MetaError> {
  if (!UNPACKABLE_MAGICS.has(item.magic)) return err(MetaErr.unsupported(item.magic));
  return convert(item);
}
