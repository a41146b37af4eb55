/**
 * Port: calldata for the metadata board's `emitMeta(bytes32 subject, bytes meta)`.
 *
 * Kept behind a port so the meta package does not depend on how ABI encoding
 * is done, and tests can assert on subject/meta without decoding calldata.
 */
export interface EmitMetaEncoderPort {
  encodeEmitMeta(subject: Uint8Array, meta: Uint8Array): Uint8Array;
}
