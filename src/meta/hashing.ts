import type { Keccak256Port } from '../ports/keccak256.port.js';
import type { MetaDocumentItem } from './document.js';
import { cborEncode, cborEncodeSeq } from './document.js';

/**
 * Hash of the item's own encoding. This is the key an item is indexed under
 * when a stored document is split into its parts.
 */
export function itemHash(item: MetaDocumentItem, crypto: Keccak256Port): Uint8Array {
  return crypto.keccak256(cborEncode(item));
}

/**
 * Hash of the item wrapped as a one-item `rain-meta-document-v1` sequence.
 * Differs from `itemHash` for every item, because the sequence bytes carry the
 * 8-byte document prefix.
 */
export function documentHash(item: MetaDocumentItem, crypto: Keccak256Port): Uint8Array {
  return crypto.keccak256(cborEncodeSeq([item], 'rain-meta-document-v1'));
}
