import { keccak_256 } from '@noble/hashes/sha3';
import type { Keccak256Port } from '../../ports/keccak256.port.js';

export class NobleKeccak256 implements Keccak256Port {
  keccak256(bytes: Uint8Array): Uint8Array {
    return keccak_256(bytes);
  }
}
