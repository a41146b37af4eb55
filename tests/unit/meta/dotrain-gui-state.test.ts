import { describe, it, expect } from 'vitest';
import {
  chosenVaultIds,
  decodeDotrainGuiState,
  dotrainGuiStateFromItem,
  dotrainGuiStateToItem,
  extractDotrainGuiState,
  tokenAddresses,
} from '../../../src/meta/types/dotrain-gui-state.js';
import type { DotrainGuiStateV1 } from '../../../src/meta/types/dotrain-gui-state.js';
import { cborEncodeSeq, metaItem } from '../../../src/meta/document.js';
import { typedMetaFromItem } from '../../../src/meta/typed-meta.js';
import { textToItem } from '../../../src/meta/types/text.js';

const state: DotrainGuiStateV1 = {
  dotrainHash: `0x${'ab'.repeat(32)}`,
  fieldValues: {
    'max-spread': { id: 'max-spread', name: 'Max spread', value: '0.002' },
    'min-amount': { id: 'min-amount', name: null, value: '10' },
  },
  deposits: {
    usdc: { id: 'usdc', name: null, value: '100' },
  },
  selectTokens: {
    input: { network: 'flare', address: `0x${'11'.repeat(20)}` },
    output: { network: 'flare', address: `0x${'22'.repeat(20)}` },
  },
  vaultIds: {
    'input-0': '0x1234',
    'output-0': null,
  },
  selectedDeployment: 'flare-limit',
};

describe('dotrain GUI state', () => {
  it('round-trips through an item', () => {
    const item = dotrainGuiStateToItem(state)._unsafeUnwrap();
    expect(item.magic).toBe('dotrain-gui-state-v1');
    expect(item.contentType).toBe('application/octet-stream');
    expect(dotrainGuiStateFromItem(item)._unsafeUnwrap()).toEqual(state);
  });

  it('is reachable through the typed registry', () => {
    const item = dotrainGuiStateToItem(state)._unsafeUnwrap();
    expect(typedMetaFromItem(item)._unsafeUnwrap()).toEqual({ kind: 'dotrain-gui-state-v1', value: state });
  });

  it('lists token addresses and chosen vault ids', () => {
    expect(tokenAddresses(state)).toEqual([`0x${'11'.repeat(20)}`, `0x${'22'.repeat(20)}`]);
    expect(chosenVaultIds(state)).toEqual(['0x1234']);
  });

  it('rejects a hash of the wrong width', () => {
    const res = dotrainGuiStateToItem({ ...state, dotrainHash: '0xabcd' });
    expect(res._unsafeUnwrapErr().code).toBe('SCHEMA_VIOLATION');
  });

  it('rejects payloads that are not CBOR', () => {
    expect(decodeDotrainGuiState(Uint8Array.from([0xff, 0xfe]))._unsafeUnwrapErr().code).toBe('CBOR_DECODE_ERROR');
  });

  it('refuses items with another magic', () => {
    const res = dotrainGuiStateFromItem(textToItem('#main', 'dotrain-v1'));
    expect(res._unsafeUnwrapErr().code).toBe('INVALID_META_MAGIC');
  });
});

describe('extractDotrainGuiState', () => {
  const guiItem = () => dotrainGuiStateToItem(state)._unsafeUnwrap();
  const source = textToItem('#calculate-io _ _: 0 0;', 'dotrain-source-v1');

  it('finds the state among sibling items', () => {
    const bytes = cborEncodeSeq([source, guiItem()], 'rain-meta-document-v1');
    expect(extractDotrainGuiState(bytes)._unsafeUnwrap()).toEqual(state);
  });

  it('finds the state inside a nested document', () => {
    const nested = metaItem({
      payload: cborEncodeSeq([guiItem()], 'rain-meta-document-v1'),
      magic: 'rain-meta-document-v1',
    });
    const bytes = cborEncodeSeq([source, nested], 'rain-meta-document-v1');
    expect(extractDotrainGuiState(bytes)._unsafeUnwrap()).toEqual(state);
  });

  it('returns null when there is none', () => {
    const bytes = cborEncodeSeq([source], 'rain-meta-document-v1');
    expect(extractDotrainGuiState(bytes)._unsafeUnwrap()).toBeNull();
  });

  it('fails on bytes that are not meta', () => {
    expect(extractDotrainGuiState(Uint8Array.from([0xff, 0xfe, 0xfd]))._unsafeUnwrapErr().code).toBe('CORRUPT_META');
  });
});
