import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { MetaError } from './errors.js';
import { MetaErr } from './errors.js';

const utf8 = new TextEncoder();
const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

/** UTF-8 bytes of `text`, right-padded with zeros to 32. */
export function strToBytes32(text: string): Result<Uint8Array, MetaError> {
  const bytes = utf8.encode(text);
  if (bytes.length > 32) return err(MetaErr.biggerThan32Bytes(bytes.length));
  const out = new Uint8Array(32);
  out.set(bytes);
  return ok(out);
}

/** Inverse of `strToBytes32`: content up to the first zero byte. */
export function bytes32ToStr(bytes: Uint8Array): Result<string, MetaError> {
  if (bytes.length > 32) return err(MetaErr.biggerThan32Bytes(bytes.length));
  const end = bytes.indexOf(0);
  return decodeUtf8(end === -1 ? bytes : bytes.subarray(0, end));
}

export function decodeUtf8(bytes: Uint8Array): Result<string, MetaError> {
  try {
    return ok(strictUtf8.decode(bytes));
  } catch {
    return err(MetaErr.of('INVALID_UTF8', 'payload is not valid UTF-8'));
  }
}

export function encodeUtf8(text: string): Uint8Array {
  return utf8.encode(text);
}
