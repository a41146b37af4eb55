/**
 * Meta item codec: byte layout, sequences and corruption handling.
 */
import { describe, it, expect } from 'vitest';
import { encode } from 'cborg';
import {
  cborDecode,
  cborEncode,
  cborEncodeSeq,
  fieldCount,
  itemsEqual,
  metaItem,
  unpack,
  unpackInto,
} from '../../../src/meta/document.js';
import type { MetaDocumentItem } from '../../../src/meta/document.js';
import { encodeContent } from '../../../src/meta/content.js';
import { magicToPrefixBytes } from '../../../src/meta/magic.js';
import { itemHash } from '../../../src/meta/hashing.js';
import { textFromItem, textToItem } from '../../../src/meta/types/text.js';
import { NobleKeccak256 } from '../../../src/infra/keccak256/index.js';
import { keccak_256 } from '@noble/hashes/sha3';
import { ascii, bytes } from '../../helpers/bytes.js';

const dotrainMagicBytes = [0xff, 0xda, 0xc2, 0xf2, 0xf3, 0x7b, 0xe8, 0x94];

const fullItem = metaItem({
  payload: Uint8Array.from([1, 2, 3]),
  magic: 'dotrain-v1',
  contentType: 'application/octet-stream',
  contentEncoding: 'identity',
  contentLanguage: 'en',
});

const bareItem = metaItem({ payload: Uint8Array.from([0x2a]), magic: 'rainlang-v1' });

describe('cborEncode', () => {
  it('writes a five-entry map with ascending integer keys', () => {
    expect(cborEncode(fullItem)).toEqual(
      bytes(
        0xa5,
        [0x00, 0x43, 1, 2, 3],
        [0x01, 0x1b, ...dotrainMagicBytes],
        [0x02, 0x78, 0x18, ...ascii('application/octet-stream')],
        [0x03, 0x68, ...ascii('identity')],
        [0x04, 0x62, ...ascii('en')]
      )
    );
  });

  it('omits none fields entirely', () => {
    expect(cborEncode(bareItem)).toEqual(
      bytes(0xa2, [0x00, 0x41, 0x2a], [0x01, 0x1b, 0xff, 0x1c, 0x19, 0x8c, 0xec, 0x3b, 0x48, 0xa7])
    );
  });

  it('compares structurally', () => {
    expect(itemsEqual(fullItem, { ...fullItem, payload: Uint8Array.from([1, 2, 3]) })).toBe(true);
    expect(itemsEqual(fullItem, { ...fullItem, contentLanguage: 'none' })).toBe(false);
  });

  it('is deterministic', () => {
    expect(cborEncode(fullItem)).toEqual(cborEncode({ ...fullItem, payload: Uint8Array.from([1, 2, 3]) }));
  });
});

describe('fieldCount', () => {
  it('counts payload, magic and present content fields', () => {
    expect(fieldCount(fullItem)).toBe(5);
    expect(fieldCount(bareItem)).toBe(2);
    expect(fieldCount({ ...bareItem, contentLanguage: 'en' })).toBe(3);
  });
});

describe('cborEncodeSeq', () => {
  it('writes the prefix then each item in order', () => {
    const seq = cborEncodeSeq([fullItem, bareItem], 'rain-meta-document-v1');
    expect(seq).toEqual(
      Uint8Array.from([...magicToPrefixBytes('rain-meta-document-v1'), ...cborEncode(fullItem), ...cborEncode(bareItem)])
    );
  });
});

describe('cborDecode', () => {
  it('round-trips a single item', () => {
    expect(cborDecode(cborEncode(fullItem))._unsafeUnwrap()).toEqual([fullItem]);
  });

  it('round-trips a prefixed sequence in order', () => {
    const decoded = cborDecode(cborEncodeSeq([bareItem, fullItem], 'rain-meta-document-v1'))._unsafeUnwrap();
    expect(decoded).toHaveLength(2);
    expect(decoded.map((i) => i.magic)).toEqual(['rainlang-v1', 'dotrain-v1']);
    expect(decoded[1]?.contentLanguage).toBe('en');
  });

  it('decodes unprefixed concatenated items', () => {
    const decoded = cborDecode(Uint8Array.from([...cborEncode(fullItem), ...cborEncode(bareItem)]))._unsafeUnwrap();
    expect(decoded).toHaveLength(2);
  });

  it('rejects empty input as corrupt', () => {
    expect(cborDecode(new Uint8Array())._unsafeUnwrapErr().code).toBe('CORRUPT_META');
    expect(cborDecode(magicToPrefixBytes('rain-meta-document-v1'))._unsafeUnwrapErr().code).toBe('CORRUPT_META');
  });

  it.each([0x00, 0xff, 0xa5])('rejects trailing byte %i as corrupt', (extra) => {
    const res = cborDecode(Uint8Array.from([...cborEncode(fullItem), extra]));
    expect(res._unsafeUnwrapErr().code).toBe('CORRUPT_META');
  });

  it('rejects a truncated item as corrupt', () => {
    const encoded = cborEncode(fullItem);
    expect(cborDecode(encoded.subarray(0, encoded.length - 1))._unsafeUnwrapErr().code).toBe('CORRUPT_META');
  });

  it('fails on an unknown integer key instead of skipping it', () => {
    const map = new Map<number, unknown>([
      [0, Uint8Array.from([1])],
      [1, 0xffdac2f2f37be894n],
      [9, 'extra'],
    ]);
    expect(cborDecode(encode(map))._unsafeUnwrapErr().code).toBe('CBOR_DECODE_ERROR');
  });

  it('fails on an unknown magic', () => {
    const map = new Map<number, unknown>([
      [0, Uint8Array.from([1])],
      [1, 0xff00000000000001n],
    ]);
    expect(cborDecode(encode(map))._unsafeUnwrapErr().code).toBe('UNKNOWN_MAGIC');
  });

  it.each([1.5, Number.NaN, Number.POSITIVE_INFINITY])('rejects magic %s that is not a whole number', (magic) => {
    const map = new Map<number, unknown>([
      [0, Uint8Array.from([1])],
      [1, magic],
    ]);
    const prefixed = Uint8Array.from([...magicToPrefixBytes('rain-meta-document-v1'), ...encode(map)]);
    expect(cborDecode(encode(map))._unsafeUnwrapErr().code).toBe('CBOR_DECODE_ERROR');
    expect(cborDecode(prefixed)._unsafeUnwrapErr().code).toBe('CBOR_DECODE_ERROR');
  });

  it('fails when the payload is missing', () => {
    const map = new Map<number, unknown>([[1, 0xffdac2f2f37be894n]]);
    expect(cborDecode(encode(map))._unsafeUnwrapErr().code).toBe('CBOR_DECODE_ERROR');
  });

  it('fails on an unknown content type string', () => {
    const map = new Map<number, unknown>([
      [0, Uint8Array.from([1])],
      [1, 0xffdac2f2f37be894n],
      [2, 'text/plain'],
    ]);
    expect(cborDecode(encode(map))._unsafeUnwrapErr().code).toBe('CBOR_DECODE_ERROR');
  });
});

describe('dotrain source item', () => {
  const source = '#main _ _: int-add(1 2)';
  const item = textToItem(source, 'dotrain-source-v1');

  it('survives encode and decode', () => {
    const [decoded] = cborDecode(cborEncode(item))._unsafeUnwrap();
    expect(decoded).toEqual(item);
    expect(textFromItem(decoded, 'dotrain-source-v1')._unsafeUnwrap()).toBe(source);
  });

  it('is addressed by the hash of its encoding, not of its text', () => {
    const hash = itemHash(item, new NobleKeccak256());
    expect(hash).toEqual(keccak_256(cborEncode(item)));
    expect(hash).not.toEqual(keccak_256(new TextEncoder().encode(source)));
  });
});

describe('unpack', () => {
  it('inflates deflated payloads', () => {
    const text = new TextEncoder().encode('some dotrain');
    const item = metaItem({
      payload: encodeContent('deflate', text),
      magic: 'dotrain-v1',
      contentEncoding: 'deflate',
    });
    expect(unpack(item)._unsafeUnwrap()).toEqual(text);
  });
});

describe('unpackInto', () => {
  const identity = (item: MetaDocumentItem) => unpack(item);

  it('converts whitelisted magics', () => {
    expect(unpackInto(bareItem, identity)._unsafeUnwrap()).toEqual(Uint8Array.from([0x2a]));
  });

  it('refuses magics outside the whitelist without calling the converter', () => {
    let called = false;
    const res = unpackInto({ ...bareItem, magic: 'dotrain-source-v1' }, (item) => {
      called = true;
      return unpack(item);
    });
    expect(res._unsafeUnwrapErr().code).toBe('UNSUPPORTED_META');
    expect(called).toBe(false);
  });
});
