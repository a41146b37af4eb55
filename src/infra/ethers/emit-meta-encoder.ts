import { Interface, getBytes } from 'ethers';
import type { EmitMetaEncoderPort } from '../../ports/emit-meta-encoder.port.js';

export const METABOARD_ABI = ['function emitMeta(bytes32 subject, bytes meta)'] as const;

export class EthersEmitMetaEncoder implements EmitMetaEncoderPort {
  private readonly iface = new Interface(METABOARD_ABI);

  encodeEmitMeta(subject: Uint8Array, meta: Uint8Array): Uint8Array {
    return getBytes(this.iface.encodeFunctionData('emitMeta', [subject, meta]));
  }
}
