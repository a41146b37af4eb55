import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { MetaError } from './errors.js';
import { MetaErr } from './errors.js';

const HEX_BODY = /^(?:[0-9a-fA-F]{2})*$/;

export function stripHexPrefix(hex: string): string {
  return hex.startsWith('0x') || hex.startsWith('0X') ? hex.slice(2) : hex;
}

/**
 * Parse hex text into bytes. A leading `0x` is optional and either case is accepted.
 */
export function hexToBytes(hex: string): Result<Uint8Array, MetaError> {
  const body = stripHexPrefix(hex);
  if (body.length % 2 !== 0) {
    return err(MetaErr.of('DECODE_HEX_STRING_ERROR', 'hex string must have even length'));
  }
  if (!HEX_BODY.test(body)) {
    return err(MetaErr.of('DECODE_HEX_STRING_ERROR', 'hex string contains a non-hex character'));
  }
  const out = new Uint8Array(body.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = Number.parseInt(body.slice(i * 2, i * 2 + 2), 16);
  }
  return ok(out);
}

/** Lowercase hex, `0x`-prefixed. */
export function bytesToHex(bytes: Uint8Array): string {
  let out = '0x';
  for (const b of bytes) out += b.toString(16).padStart(2, '0');
  return out;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}
