/**
 * Port: Keccak-256 over raw bytes.
 *
 * Every meta hash in this package (item hash, document hash, cache keys) is a
 * Keccak-256 digest of encoded bytes, so the hash function is injected the same
 * way everywhere it is needed.
 *
 * Guarantees:
 * - Deterministic: same bytes, same 32-byte digest
 * - Pure (no side effects)
 */
export interface Keccak256Port {
  keccak256(bytes: Uint8Array): Uint8Array;
}
