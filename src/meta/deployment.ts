import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Keccak256Port } from '../ports/keccak256.port.js';
import type { EmitMetaEncoderPort } from '../ports/emit-meta-encoder.port.js';
import { cborEncodeSeq } from './document.js';
import { documentHash } from './hashing.js';
import type { MetaError } from './errors.js';
import { MetaErr } from './errors.js';
import { bytesToHex } from './hex.js';
import { textToItem } from './types/text.js';

/** What a caller needs to publish a dotrain source on a metadata board. All fields are `0x` hex. */
export interface DeploymentData {
  readonly subject: string;
  readonly metaBytes: string;
  readonly calldata: string;
}

export interface DeploymentDeps {
  readonly crypto: Keccak256Port;
  readonly encoder: EmitMetaEncoderPort;
}

/**
 * Wrap `content` as a `dotrain-source-v1` item inside a one-item document.
 * The subject is the document hash, so it equals keccak256 of `metaBytes`.
 */
export function generateDotrainDeployment(content: string, deps: DeploymentDeps): Result<DeploymentData, MetaError> {
  if (content.trim().length === 0) {
    return err(MetaErr.of('INVALID_INPUT', 'dotrain content is empty'));
  }

  const item = textToItem(content, 'dotrain-source-v1');
  const subject = documentHash(item, deps.crypto);
  const metaBytes = cborEncodeSeq([item], 'rain-meta-document-v1');

  return ok({
    subject: bytesToHex(subject),
    metaBytes: bytesToHex(metaBytes),
    calldata: bytesToHex(deps.encoder.encodeEmitMeta(subject, metaBytes)),
  });
}
