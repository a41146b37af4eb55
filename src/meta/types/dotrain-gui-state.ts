import { encode, decode } from 'cborg';
import { ok, err, Result } from 'neverthrow';
import { z } from 'zod';
import type { MetaDocumentItem } from '../document.js';
import { cborDecode, metaItem, unpack } from '../document.js';
import type { MetaError } from '../errors.js';
import { MetaErr, describeCause } from '../errors.js';
import { bytesToHex, hexToBytes } from '../hex.js';
import { expectMagic, parseWithSchema } from './shared.js';

/**
 * A user's configuration of a dotrain template for one deployed order.
 *
 * Hashes and addresses are `0x` hex here; the payload carries them as byte
 * strings under snake_case keys.
 */
export interface ValueCfg {
  readonly id: string;
  readonly name: string | null;
  readonly value: string;
}

export interface TokenCfg {
  readonly network: string;
  readonly address: string;
}

export interface DotrainGuiStateV1 {
  /** Hash of the dotrain template the state refers to. */
  readonly dotrainHash: string;
  readonly fieldValues: Readonly<Record<string, ValueCfg>>;
  readonly deposits: Readonly<Record<string, ValueCfg>>;
  readonly selectTokens: Readonly<Record<string, TokenCfg>>;
  /** Keyed by `input`/`output` and index; null means not chosen yet. */
  readonly vaultIds: Readonly<Record<string, string | null>>;
  readonly selectedDeployment: string;
}

const fixedBytes = (length: number) =>
  z.instanceof(Uint8Array).refine((b) => b.length === length, `expected ${length} bytes`);

const ValueCfgWire = z.object({ id: z.string(), name: z.string().nullable(), value: z.string() });

const GuiStateWire = z.object({
  dotrain_hash: fixedBytes(32),
  field_values: z.record(ValueCfgWire),
  deposits: z.record(ValueCfgWire),
  select_tokens: z.record(z.object({ network: z.string(), address: fixedBytes(20) })),
  vault_ids: z.record(z.string().nullable()),
  selected_deployment: z.string(),
});

type GuiStateWire = z.infer<typeof GuiStateWire>;

function mapValues<A, B>(record: Readonly<Record<string, A>>, fn: (a: A) => B): Record<string, B> {
  return Object.fromEntries(Object.entries(record).map(([k, v]) => [k, fn(v)]));
}

function fromWire(wire: GuiStateWire): DotrainGuiStateV1 {
  return {
    dotrainHash: bytesToHex(wire.dotrain_hash),
    fieldValues: wire.field_values,
    deposits: wire.deposits,
    selectTokens: mapValues(wire.select_tokens, (t) => ({ network: t.network, address: bytesToHex(t.address) })),
    vaultIds: wire.vault_ids,
    selectedDeployment: wire.selected_deployment,
  };
}

function toWire(state: DotrainGuiStateV1): Result<GuiStateWire, MetaError> {
  const tokenEntries = Result.combine(
    Object.entries(state.selectTokens).map(([key, token]) =>
      hexToBytes(token.address).map((address) => [key, { network: token.network, address }] as const)
    )
  );
  return hexToBytes(state.dotrainHash)
    .andThen((dotrainHash) =>
      tokenEntries.map((tokens) => ({
        dotrain_hash: dotrainHash,
        field_values: { ...state.fieldValues },
        deposits: { ...state.deposits },
        select_tokens: Object.fromEntries(tokens),
        vault_ids: { ...state.vaultIds },
        selected_deployment: state.selectedDeployment,
      }))
    )
    .andThen((wire) => parseWithSchema(GuiStateWire, wire));
}

export function encodeDotrainGuiState(state: DotrainGuiStateV1): Result<Uint8Array, MetaError> {
  return toWire(state).andThen((wire) => {
    try {
      return ok(encode(wire));
    } catch (e) {
      return err(MetaErr.of('CBOR_ENCODE_ERROR', describeCause(e)));
    }
  });
}

export function decodeDotrainGuiState(payload: Uint8Array): Result<DotrainGuiStateV1, MetaError> {
  let value: unknown;
  try {
    value = decode(payload);
  } catch (e) {
    return err(MetaErr.of('CBOR_DECODE_ERROR', describeCause(e)));
  }
  return parseWithSchema(GuiStateWire, value).map(fromWire);
}

export function dotrainGuiStateFromItem(item: MetaDocumentItem): Result<DotrainGuiStateV1, MetaError> {
  return expectMagic(item, 'dotrain-gui-state-v1').andThen(unpack).andThen(decodeDotrainGuiState);
}

export function dotrainGuiStateToItem(state: DotrainGuiStateV1): Result<MetaDocumentItem, MetaError> {
  return encodeDotrainGuiState(state).map((payload) =>
    metaItem({ payload, magic: 'dotrain-gui-state-v1', contentType: 'application/octet-stream' })
  );
}

export function tokenAddresses(state: DotrainGuiStateV1): string[] {
  return Object.values(state.selectTokens).map((t) => t.address);
}

/** Vault ids that have been chosen. */
export function chosenVaultIds(state: DotrainGuiStateV1): string[] {
  return Object.values(state.vaultIds).filter((id): id is string => id !== null);
}

/**
 * First GUI state found in `metaBytes`, searching nested documents depth-first
 * in item order. `null` when the bytes decode but hold no GUI state.
 */
export function extractDotrainGuiState(metaBytes: Uint8Array): Result<DotrainGuiStateV1 | null, MetaError> {
  const items = cborDecode(metaBytes);
  if (items.isErr()) return err(items.error);

  for (const item of items.value) {
    if (item.magic === 'rain-meta-document-v1') {
      const nested = extractDotrainGuiState(item.payload);
      if (nested.isErr()) return nested;
      if (nested.value !== null) return nested;
    }
    if (item.magic === 'dotrain-gui-state-v1') {
      return dotrainGuiStateFromItem(item);
    }
  }
  return ok(null);
}
