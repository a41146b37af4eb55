import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { MetaError } from './errors.js';
import { MetaErr } from './errors.js';

/**
 * Known meta magic numbers.
 *
 * LOCKED: values are part of the wire format. Every one starts with 0xff and is
 * written as an unsigned 64-bit CBOR integer (and as an 8-byte big-endian
 * prefix for the document sequence wrapper).
 */
export const MAGIC_VALUES = {
  'rain-meta-document-v1': 0xff0a89c674ee7874n,
  'solidity-abi-v2': 0xffe5ffb4a3ff2cden,
  'op-meta-v1': 0xffe5282f43e495b4n,
  'interpreter-caller-meta-v1': 0xffc21bbf86cc199bn,
  'authoring-meta-v1': 0xffe9e3a02ca8e235n,
  'authoring-meta-v2': 0xff52fe42f1a05093n,
  'rainlang-v1': 0xff1c198cec3b48a7n,
  'dotrain-v1': 0xffdac2f2f37be894n,
  'expression-deployer-v2-bytecode-v1': 0xffdb988a8cd04d32n,
  'rainlang-source-v1': 0xff13109e41336ff2n,
  'address-list': 0xffb2637608c09e38n,
  'dotrain-source-v1': 0xffa15ef0fc437099n,
  'dotrain-gui-state-v1': 0xffda7b2fb167c286n,
} as const satisfies Record<string, bigint>;

export type KnownMagic = keyof typeof MAGIC_VALUES;

export const KNOWN_MAGICS = Object.keys(MAGIC_VALUES) as readonly KnownMagic[];

export const MAGIC_PREFIX_LENGTH = 8;

export function magicValue(magic: KnownMagic): bigint {
  return MAGIC_VALUES[magic];
}

/** 8-byte big-endian encoding of the magic. */
export function magicToPrefixBytes(magic: KnownMagic): Uint8Array {
  const out = new Uint8Array(MAGIC_PREFIX_LENGTH);
  new DataView(out.buffer).setBigUint64(0, MAGIC_VALUES[magic], false);
  return out;
}

export function magicFromU64(value: bigint): Result<KnownMagic, MetaError> {
  const found = KNOWN_MAGICS.find((m) => MAGIC_VALUES[m] === value);
  return found === undefined ? err(MetaErr.unknownMagic(value)) : ok(found);
}

export function magicFromName(name: string): KnownMagic | null {
  return KNOWN_MAGICS.find((m) => m === name) ?? null;
}

/** True when `bytes` begins with the 8-byte prefix of `magic`. */
export function hasMagicPrefix(bytes: Uint8Array, magic: KnownMagic): boolean {
  if (bytes.length < MAGIC_PREFIX_LENGTH) return false;
  const prefix = magicToPrefixBytes(magic);
  return prefix.every((b, i) => bytes[i] === b);
}
