import type { Result } from 'neverthrow';
import type { KnownMagic } from '../magic.js';
import type { MetaDocumentItem } from '../document.js';
import { metaItem, unpack } from '../document.js';
import type { MetaError } from '../errors.js';
import { decodeUtf8, encodeUtf8 } from '../bytes32.js';
import { expectMagic } from './shared.js';

/** Meta types whose unpacked payload is UTF-8 source text. */
export type TextMagic = Extract<KnownMagic, 'dotrain-v1' | 'rainlang-v1' | 'rainlang-source-v1' | 'dotrain-source-v1'>;

export function textFromItem(item: MetaDocumentItem, magic: TextMagic): Result<string, MetaError> {
  return expectMagic(item, magic).andThen(unpack).andThen(decodeUtf8);
}

/** Text items are stored as uncompressed octet-stream. */
export function textToItem(text: string, magic: TextMagic): MetaDocumentItem {
  return metaItem({ payload: encodeUtf8(text), magic, contentType: 'application/octet-stream' });
}
