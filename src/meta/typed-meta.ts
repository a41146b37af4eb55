import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { KnownMagic } from './magic.js';
import { hasMagicPrefix } from './magic.js';
import type { MetaDocumentItem } from './document.js';
import { cborDecode, unpackInto } from './document.js';
import type { MetaError } from './errors.js';
import { MetaErr } from './errors.js';
import { hexToBytes } from './hex.js';
import { assertNever } from '../runtime/assert-never.js';
import type { AuthoringMetaV1, AuthoringMetaV2 } from './types/authoring.js';
import {
  authoringMetaV1FromItem,
  authoringMetaV1ToItem,
  authoringMetaV2FromItem,
  authoringMetaV2ToItem,
} from './types/authoring.js';
import type { DotrainGuiStateV1 } from './types/dotrain-gui-state.js';
import { dotrainGuiStateFromItem, dotrainGuiStateToItem } from './types/dotrain-gui-state.js';
import type { InterpreterCallerMetaV1 } from './types/interpreter-caller-meta.js';
import { interpreterCallerMetaV1FromItem, interpreterCallerMetaV1ToItem } from './types/interpreter-caller-meta.js';
import type { OpMetaV1 } from './types/op-meta.js';
import { opMetaV1FromItem, opMetaV1ToItem } from './types/op-meta.js';
import type { SolidityAbiV2 } from './types/solidity-abi.js';
import { solidityAbiV2FromItem, solidityAbiV2ToItem } from './types/solidity-abi.js';
import { textFromItem, textToItem } from './types/text.js';
import { bytesFromItem, bytesToItem } from './types/bytes.js';

/**
 * A decoded meta payload, tagged by what it is.
 *
 * `kind` maps one-to-one onto a magic (see `magicOf`); the sequence wrapper
 * `rain-meta-document-v1` has no typed form.
 */
export type TypedMeta =
  | { readonly kind: 'authoring-v1'; readonly value: AuthoringMetaV1 }
  | { readonly kind: 'authoring-v2'; readonly value: AuthoringMetaV2 }
  | { readonly kind: 'dotrain-v1'; readonly value: string }
  | { readonly kind: 'dotrain-source-v1'; readonly value: string }
  | { readonly kind: 'dotrain-gui-state-v1'; readonly value: DotrainGuiStateV1 }
  | { readonly kind: 'rainlang-v1'; readonly value: string }
  | { readonly kind: 'rainlang-source-v1'; readonly value: string }
  | { readonly kind: 'expression-deployer-v2-bytecode-v1'; readonly value: Uint8Array }
  | { readonly kind: 'interpreter-caller-v1'; readonly value: InterpreterCallerMetaV1 }
  | { readonly kind: 'op-v1'; readonly value: OpMetaV1 }
  | { readonly kind: 'solidity-abi-v2'; readonly value: SolidityAbiV2 }
  | { readonly kind: 'address-list'; readonly value: Uint8Array };

export type TypedMetaKind = TypedMeta['kind'];

export function magicOf(meta: TypedMeta): KnownMagic {
  switch (meta.kind) {
    case 'authoring-v1':
      return 'authoring-meta-v1';
    case 'authoring-v2':
      return 'authoring-meta-v2';
    case 'dotrain-v1':
      return 'dotrain-v1';
    case 'dotrain-source-v1':
      return 'dotrain-source-v1';
    case 'dotrain-gui-state-v1':
      return 'dotrain-gui-state-v1';
    case 'rainlang-v1':
      return 'rainlang-v1';
    case 'rainlang-source-v1':
      return 'rainlang-source-v1';
    case 'expression-deployer-v2-bytecode-v1':
      return 'expression-deployer-v2-bytecode-v1';
    case 'interpreter-caller-v1':
      return 'interpreter-caller-meta-v1';
    case 'op-v1':
      return 'op-meta-v1';
    case 'solidity-abi-v2':
      return 'solidity-abi-v2';
    case 'address-list':
      return 'address-list';
    default:
      return assertNever(meta);
  }
}

/**
 * Convert an item by its magic alone. Magics in `UNPACKABLE_MAGICS` go through
 * `unpackInto`; the rest use their own converters, which check the magic.
 */
export function typedMetaFromItem(item: MetaDocumentItem): Result<TypedMeta, MetaError> {
  switch (item.magic) {
    case 'authoring-meta-v1':
      return unpackInto(item, authoringMetaV1FromItem).map((value) => ({ kind: 'authoring-v1' as const, value }));
    case 'dotrain-v1':
      return unpackInto(item, (i) => textFromItem(i, 'dotrain-v1')).map((value) => ({ kind: 'dotrain-v1' as const, value }));
    case 'rainlang-v1':
      return unpackInto(item, (i) => textFromItem(i, 'rainlang-v1')).map((value) => ({ kind: 'rainlang-v1' as const, value }));
    case 'rainlang-source-v1':
      return unpackInto(item, (i) => textFromItem(i, 'rainlang-source-v1')).map((value) => ({
        kind: 'rainlang-source-v1' as const,
        value,
      }));
    case 'expression-deployer-v2-bytecode-v1':
      return unpackInto(item, (i) => bytesFromItem(i, 'expression-deployer-v2-bytecode-v1')).map((value) => ({
        kind: 'expression-deployer-v2-bytecode-v1' as const,
        value,
      }));
    case 'interpreter-caller-meta-v1':
      return unpackInto(item, interpreterCallerMetaV1FromItem).map((value) => ({
        kind: 'interpreter-caller-v1' as const,
        value,
      }));
    case 'op-meta-v1':
      return unpackInto(item, opMetaV1FromItem).map((value) => ({ kind: 'op-v1' as const, value }));
    case 'solidity-abi-v2':
      return unpackInto(item, solidityAbiV2FromItem).map((value) => ({ kind: 'solidity-abi-v2' as const, value }));

    case 'authoring-meta-v2':
      return authoringMetaV2FromItem(item).map((value) => ({ kind: 'authoring-v2' as const, value }));
    case 'dotrain-source-v1':
      return textFromItem(item, 'dotrain-source-v1').map((value) => ({ kind: 'dotrain-source-v1' as const, value }));
    case 'dotrain-gui-state-v1':
      return dotrainGuiStateFromItem(item).map((value) => ({ kind: 'dotrain-gui-state-v1' as const, value }));
    case 'address-list':
      return bytesFromItem(item, 'address-list').map((value) => ({ kind: 'address-list' as const, value }));

    case 'rain-meta-document-v1':
      return err(MetaErr.unsupported(item.magic));
    default:
      return assertNever(item.magic);
  }
}

/** Pack a typed value back into an item, using the storage conventions of its type. */
export function typedMetaToItem(meta: TypedMeta): Result<MetaDocumentItem, MetaError> {
  switch (meta.kind) {
    case 'authoring-v1':
      return authoringMetaV1ToItem(meta.value);
    case 'authoring-v2':
      return authoringMetaV2ToItem(meta.value);
    case 'dotrain-v1':
    case 'dotrain-source-v1':
    case 'rainlang-v1':
    case 'rainlang-source-v1':
      return ok(textToItem(meta.value, meta.kind));
    case 'dotrain-gui-state-v1':
      return dotrainGuiStateToItem(meta.value);
    case 'expression-deployer-v2-bytecode-v1':
    case 'address-list':
      return ok(bytesToItem(meta.value, meta.kind));
    case 'interpreter-caller-v1':
      return interpreterCallerMetaV1ToItem(meta.value);
    case 'op-v1':
      return opMetaV1ToItem(meta.value);
    case 'solidity-abi-v2':
      return solidityAbiV2ToItem(meta.value);
    default:
      return assertNever(meta);
  }
}

/**
 * Parse a hex-encoded `rain-meta-document-v1` sequence into typed values, in
 * item order. A bare item without the sequence prefix is rejected, and the
 * first item that fails to convert fails the whole call.
 */
export function parseFromHex(text: string): Result<TypedMeta[], MetaError> {
  const bytes = hexToBytes(text);
  if (bytes.isErr()) return err(bytes.error);
  if (!hasMagicPrefix(bytes.value, 'rain-meta-document-v1')) {
    return err(MetaErr.of('CORRUPT_META', 'expected a rain-meta-document-v1 sequence prefix'));
  }

  const items = cborDecode(bytes.value);
  if (items.isErr()) return err(items.error);

  const out: TypedMeta[] = [];
  for (const item of items.value) {
    const typed = typedMetaFromItem(item);
    if (typed.isErr()) return err(typed.error);
    out.push(typed.value);
  }
  return ok(out);
}
