import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { z } from 'zod';
import type { MetaError } from '../meta/errors.js';
import { MetaErr } from '../meta/errors.js';
import { bytesToHex, hexToBytes } from '../meta/hex.js';
import { zodIssues } from '../meta/types/shared.js';
import type { MetaStoreContents } from './meta-store.js';
import type { Npe2Deployer } from './npe2-deployer.js';
import { deriveAuthoringMeta } from './npe2-deployer.js';

/**
 * JSON form of a store's contents, all bytes as `0x` hex.
 *
 * LOCKED: version 1. Authoring meta is not written; it is derived again from
 * the deployer meta bytes on load.
 */
export const META_STORE_SNAPSHOT_VERSION = 1;

const HexBytes = z.string().transform((hex, ctx) => {
  const bytes = hexToBytes(hex);
  if (bytes.isErr()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: bytes.error.message });
    return z.NEVER;
  }
  return bytes.value;
});

const Hash = HexBytes.refine((b) => b.length === 32, 'expected a 32-byte hash');

const DeployerSnapshot = z.object({
  hash: Hash,
  metaHash: HexBytes,
  metaBytes: HexBytes,
  bytecode: HexBytes,
  parser: HexBytes,
  store: HexBytes,
  interpreter: HexBytes,
});

export const MetaStoreSnapshotSchema = z.object({
  version: z.literal(META_STORE_SNAPSHOT_VERSION),
  subgraphs: z.array(z.string().url()),
  cache: z.array(z.object({ hash: Hash, bytes: HexBytes })),
  dotrainCache: z.array(z.object({ uri: z.string(), hash: Hash })),
  deployers: z.array(DeployerSnapshot),
  deployerAliases: z.array(z.object({ txHash: Hash, deployerHash: Hash })),
});

/** The JSON shape, before hex is parsed. */
export type MetaStoreSnapshot = z.input<typeof MetaStoreSnapshotSchema>;

export function toSnapshot(contents: MetaStoreContents): MetaStoreSnapshot {
  return {
    version: META_STORE_SNAPSHOT_VERSION,
    subgraphs: [...contents.subgraphs],
    cache: contents.cache.map(({ hash, bytes }) => ({ hash: bytesToHex(hash), bytes: bytesToHex(bytes) })),
    dotrainCache: contents.dotrainCache.map(({ uri, hash }) => ({ uri, hash: bytesToHex(hash) })),
    deployers: contents.deployers.map(({ hash, deployer }) => ({
      hash: bytesToHex(hash),
      metaHash: bytesToHex(deployer.metaHash),
      metaBytes: bytesToHex(deployer.metaBytes),
      bytecode: bytesToHex(deployer.bytecode),
      parser: bytesToHex(deployer.parser),
      store: bytesToHex(deployer.store),
      interpreter: bytesToHex(deployer.interpreter),
    })),
    deployerAliases: contents.deployerAliases.map(({ txHash, deployerHash }) => ({
      txHash: bytesToHex(txHash),
      deployerHash: bytesToHex(deployerHash),
    })),
  };
}

/**
 * Parse snapshot JSON into store contents. Shape and hex are checked here;
 * hashes are checked by `MetaStore.create`.
 */
export function parseMetaStoreSnapshot(json: unknown): Result<MetaStoreContents, MetaError> {
  const parsed = MetaStoreSnapshotSchema.safeParse(json);
  if (!parsed.success) return err(MetaErr.schema(zodIssues(parsed.error)));

  const snapshot = parsed.data;
  return ok({
    subgraphs: snapshot.subgraphs,
    cache: snapshot.cache,
    dotrainCache: snapshot.dotrainCache,
    deployers: snapshot.deployers.map(({ hash, ...artifacts }) => {
      const deployer: Npe2Deployer = {
        ...artifacts,
        authoringMeta: deriveAuthoringMeta(artifacts.metaBytes).unwrapOr(null),
      };
      return { hash, deployer };
    }),
    deployerAliases: snapshot.deployerAliases,
  });
}
