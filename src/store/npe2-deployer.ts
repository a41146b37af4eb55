import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { DeployerResponse } from '../ports/metadata-resolver.port.js';
import { cborDecode } from '../meta/document.js';
import type { MetaError } from '../meta/errors.js';
import type { AuthoringMetaV1 } from '../meta/types/authoring.js';
import { authoringMetaV1FromItem } from '../meta/types/authoring.js';

/**
 * An expression deployer's artifacts: its meta and the bytecode of the
 * contracts it wires together.
 */
export interface Npe2Deployer {
  readonly metaHash: Uint8Array;
  readonly metaBytes: Uint8Array;
  readonly bytecode: Uint8Array;
  readonly parser: Uint8Array;
  readonly store: Uint8Array;
  readonly interpreter: Uint8Array;
  /** Words the parser accepts, when the deployer meta carries them. */
  readonly authoringMeta: AuthoringMetaV1 | null;
}

/** Completeness check only: true when any artifact is empty. Nothing is hashed. */
export function isDeployerCorrupt(deployer: Npe2Deployer): boolean {
  return (
    deployer.metaHash.length === 0 ||
    deployer.metaBytes.length === 0 ||
    deployer.bytecode.length === 0 ||
    deployer.parser.length === 0 ||
    deployer.store.length === 0 ||
    deployer.interpreter.length === 0
  );
}

/**
 * Authoring meta from the first `authoring-meta-v1` item of the deployer meta,
 * or null when there is none.
 */
export function deriveAuthoringMeta(metaBytes: Uint8Array): Result<AuthoringMetaV1 | null, MetaError> {
  const items = cborDecode(metaBytes);
  if (items.isErr()) return err(items.error);
  const item = items.value.find((i) => i.magic === 'authoring-meta-v1');
  return item === undefined ? ok(null) : authoringMetaV1FromItem(item);
}

export function deployerFromResponse(
  response: DeployerResponse,
  authoringMeta: AuthoringMetaV1 | null
): Npe2Deployer {
  return {
    metaHash: response.metaHash,
    metaBytes: response.metaBytes,
    bytecode: response.bytecode,
    parser: response.parser,
    store: response.store,
    interpreter: response.interpreter,
    authoringMeta,
  };
}
