import type { KnownMagic } from './magic.js';

/**
 * Failures of the meta codec and typed conversions.
 *
 * Errors are data: every fallible operation in `src/meta` returns
 * `Result<T, MetaError>` and library exceptions (cborg, zlib, ethers) are
 * mapped at the call site.
 */
export type MetaError =
  | { readonly code: 'UNKNOWN_MAGIC'; readonly value: bigint; readonly message: string }
  | { readonly code: 'UNSUPPORTED_META'; readonly magic: KnownMagic; readonly message: string }
  | {
      readonly code: 'INVALID_META_MAGIC';
      readonly expected: KnownMagic;
      readonly actual: KnownMagic;
      readonly message: string;
    }
  | { readonly code: 'CORRUPT_META'; readonly message: string }
  | { readonly code: 'INFLATE_ERROR'; readonly message: string }
  | { readonly code: 'CBOR_DECODE_ERROR'; readonly message: string }
  | { readonly code: 'CBOR_ENCODE_ERROR'; readonly message: string }
  | { readonly code: 'INVALID_UTF8'; readonly message: string }
  | { readonly code: 'JSON_PARSE_ERROR'; readonly message: string }
  | { readonly code: 'SCHEMA_VIOLATION'; readonly issues: readonly string[]; readonly message: string }
  | { readonly code: 'ABI_DECODE_ERROR'; readonly message: string }
  | { readonly code: 'ABI_ENCODE_ERROR'; readonly message: string }
  | { readonly code: 'BIGGER_THAN_32_BYTES'; readonly length: number; readonly message: string }
  | { readonly code: 'DECODE_HEX_STRING_ERROR'; readonly message: string }
  | { readonly code: 'INVALID_INPUT'; readonly message: string };

export type MetaErrorCode = MetaError['code'];

type SimpleCode = Exclude<
  MetaErrorCode,
  'UNKNOWN_MAGIC' | 'UNSUPPORTED_META' | 'INVALID_META_MAGIC' | 'SCHEMA_VIOLATION' | 'BIGGER_THAN_32_BYTES'
>;

export const MetaErr = {
  unknownMagic: (value: bigint): MetaError => ({
    code: 'UNKNOWN_MAGIC',
    value,
    message: `unknown magic number 0x${value.toString(16)}`,
  }),

  unsupported: (magic: KnownMagic): MetaError => ({
    code: 'UNSUPPORTED_META',
    magic,
    message: `no typed conversion for ${magic} in this context`,
  }),

  invalidMagic: (expected: KnownMagic, actual: KnownMagic): MetaError => ({
    code: 'INVALID_META_MAGIC',
    expected,
    actual,
    message: `expected ${expected} meta, got ${actual}`,
  }),

  schema: (issues: readonly string[]): MetaError => ({
    code: 'SCHEMA_VIOLATION',
    issues,
    message: `payload does not match schema: ${issues.join('; ')}`,
  }),

  biggerThan32Bytes: (length: number): MetaError => ({
    code: 'BIGGER_THAN_32_BYTES',
    length,
    message: `string is ${length} bytes, bytes32 holds at most 32`,
  }),

  of: (code: SimpleCode, message: string): MetaError => ({ code, message }),
} as const;

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
