import type { Result } from 'neverthrow';
import type { KnownMagic } from '../magic.js';
import type { MetaDocumentItem } from '../document.js';
import { metaItem, unpack } from '../document.js';
import type { MetaError } from '../errors.js';
import { expectMagic } from './shared.js';

/** Meta types whose unpacked payload is used as raw bytes. */
export type BytesMagic = Extract<KnownMagic, 'expression-deployer-v2-bytecode-v1' | 'address-list'>;

export function bytesFromItem(item: MetaDocumentItem, magic: BytesMagic): Result<Uint8Array, MetaError> {
  return expectMagic(item, magic).andThen(unpack);
}

export function bytesToItem(bytes: Uint8Array, magic: BytesMagic): MetaDocumentItem {
  return metaItem({ payload: bytes, magic, contentType: 'application/octet-stream' });
}
