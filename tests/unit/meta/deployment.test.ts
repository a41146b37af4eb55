import { describe, it, expect } from 'vitest';
import { Interface } from 'ethers';
import { keccak_256 } from '@noble/hashes/sha3';
import { generateDotrainDeployment } from '../../../src/meta/deployment.js';
import type { DeploymentDeps } from '../../../src/meta/deployment.js';
import { cborDecode } from '../../../src/meta/document.js';
import { bytesToHex, hexToBytes } from '../../../src/meta/hex.js';
import { textFromItem } from '../../../src/meta/types/text.js';
import { NobleKeccak256 } from '../../../src/infra/keccak256/index.js';
import { EthersEmitMetaEncoder, METABOARD_ABI } from '../../../src/infra/ethers/emit-meta-encoder.js';
import type { EmitMetaEncoderPort } from '../../../src/ports/emit-meta-encoder.port.js';

const source = '#calculate-io\n_ _: 1 2;\n#handle-io\n:;';

describe('generateDotrainDeployment', () => {
  const deps: DeploymentDeps = { crypto: new NobleKeccak256(), encoder: new EthersEmitMetaEncoder() };

  it('uses the hash of the meta bytes as subject', () => {
    const data = generateDotrainDeployment(source, deps)._unsafeUnwrap();
    const metaBytes = hexToBytes(data.metaBytes)._unsafeUnwrap();
    expect(data.subject).toBe(bytesToHex(keccak_256(metaBytes)));
  });

  it('emits a one-item document holding the source', () => {
    const data = generateDotrainDeployment(source, deps)._unsafeUnwrap();
    expect(data.metaBytes.startsWith('0xff0a89c674ee7874')).toBe(true);

    const items = cborDecode(hexToBytes(data.metaBytes)._unsafeUnwrap())._unsafeUnwrap();
    expect(items).toHaveLength(1);
    const [item] = items;
    expect(item.magic).toBe('dotrain-source-v1');
    expect(textFromItem(item, 'dotrain-source-v1')._unsafeUnwrap()).toBe(source);
  });

  it('builds emitMeta calldata', () => {
    const data = generateDotrainDeployment(source, deps)._unsafeUnwrap();
    const iface = new Interface(METABOARD_ABI);
    const [subject, meta] = iface.decodeFunctionData('emitMeta', data.calldata);
    expect(subject).toBe(data.subject);
    expect(meta).toBe(data.metaBytes);
  });

  it('hands subject and meta bytes to the encoder', () => {
    const seen: Array<{ subject: string; meta: string }> = [];
    const encoder: EmitMetaEncoderPort = {
      encodeEmitMeta(subject, meta) {
        seen.push({ subject: bytesToHex(subject), meta: bytesToHex(meta) });
        return Uint8Array.of(1, 2, 3);
      },
    };
    const data = generateDotrainDeployment(source, { crypto: deps.crypto, encoder })._unsafeUnwrap();
    expect(seen).toEqual([{ subject: data.subject, meta: data.metaBytes }]);
    expect(data.calldata).toBe('0x010203');
  });

  it.each(['', '  \n\t'])('rejects blank content %j', (content) => {
    expect(generateDotrainDeployment(content, deps)._unsafeUnwrapErr().code).toBe('INVALID_INPUT');
  });
});
