import type { Brand } from '../runtime/brand.js';
import type { Logger } from '../core/logging/index.js';
import { createBootstrapLogger } from '../core/logging/index.js';
import type { Keccak256Port } from '../ports/keccak256.port.js';
import type { DeployerResponse, MetadataResolverPort } from '../ports/metadata-resolver.port.js';
import { hasMagicPrefix } from '../meta/magic.js';
import { cborDecode, cborEncode } from '../meta/document.js';
import { itemHash } from '../meta/hashing.js';
import { bytesEqual, bytesToHex, hexToBytes } from '../meta/hex.js';
import { textToItem } from '../meta/types/text.js';
import type { Npe2Deployer } from './npe2-deployer.js';
import { deployerFromResponse, deriveAuthoringMeta, isDeployerCorrupt } from './npe2-deployer.js';

/** Lowercase `0x` hex of a hash, used as the map key for byte-valued hashes. */
export type HashKey = Brand<string, 'HashKey'>;

export function asHashKey(hash: Uint8Array): HashKey {
  return bytesToHex(hash) as HashKey;
}

function keyBytes(key: HashKey): Uint8Array {
  // Keys are only ever produced by asHashKey, so they always parse.
  return hexToBytes(key).unwrapOr(new Uint8Array());
}

export interface MetaStoreDeps {
  readonly crypto: Keccak256Port;
  /** Without a resolver, network lookups find nothing. */
  readonly resolver?: MetadataResolverPort;
  readonly logger?: Logger;
}

/** Everything a store holds, as plain entries. Input to `create` and output of `contents`. */
export interface MetaStoreContents {
  readonly subgraphs: readonly string[];
  readonly cache: readonly { readonly hash: Uint8Array; readonly bytes: Uint8Array }[];
  readonly dotrainCache: readonly { readonly uri: string; readonly hash: Uint8Array }[];
  readonly deployers: readonly { readonly hash: Uint8Array; readonly deployer: Npe2Deployer }[];
  readonly deployerAliases: readonly { readonly txHash: Uint8Array; readonly deployerHash: Uint8Array }[];
}

export const EMPTY_CONTENTS: MetaStoreContents = {
  subgraphs: [],
  cache: [],
  dotrainCache: [],
  deployers: [],
  deployerAliases: [],
};

export type UpdateWithOutcome =
  | { readonly kind: 'stored'; readonly bytes: Uint8Array }
  | { readonly kind: 'already_cached'; readonly bytes: Uint8Array }
  | { readonly kind: 'hash_mismatch' };

export interface SetDotrainResult {
  readonly newHash: Uint8Array;
  /** Hash previously bound to the uri when it differed from `newHash`. */
  readonly oldHash: Uint8Array | null;
}

/**
 * In-memory content-addressed store for meta.
 *
 * - `cache`: hash → bytes, where keccak256(bytes) == hash
 * - `dotrainCache`: uri → hash of the dotrain item stored for it
 * - `deployerCache`: bytecode meta hash → deployer artifacts
 * - `deployerHashMap`: deployment tx hash → bytecode meta hash
 *
 * Single writer: no locking. Only `update`, `searchDeployer` and
 * `searchDeployerCheck` await, and they touch the maps after the resolver
 * answers, never across an await.
 */
export class MetaStore {
  private readonly _subgraphs: string[] = [];
  private readonly cache = new Map<HashKey, Uint8Array>();
  private readonly dotrainCache = new Map<string, HashKey>();
  private readonly deployerCache = new Map<HashKey, Npe2Deployer>();
  private readonly deployerHashMap = new Map<HashKey, HashKey>();

  private readonly crypto: Keccak256Port;
  private readonly resolver: MetadataResolverPort | null;
  private readonly logger: Logger;

  constructor(deps: MetaStoreDeps, subgraphs: readonly string[] = []) {
    this.crypto = deps.crypto;
    this.resolver = deps.resolver ?? null;
    this.logger = deps.logger ?? createBootstrapLogger('MetaStore');
    this.addSubgraphs(subgraphs);
  }

  /**
   * Build a store from untrusted contents.
   *
   * Cache entries are kept only when their bytes hash to their key, dotrain
   * uris only when their hash survived, and deployers only when complete.
   * `bootstrapSubgraphs` come first, then the snapshot's own endpoints.
   */
  static create(
    deps: MetaStoreDeps,
    contents: MetaStoreContents,
    bootstrapSubgraphs: readonly string[] = []
  ): MetaStore {
    const store = new MetaStore(deps, bootstrapSubgraphs);
    store.addSubgraphs(contents.subgraphs);

    for (const { hash, bytes } of contents.cache) {
      if (store.checkedUpdateWith(hash, bytes).kind === 'hash_mismatch') {
        store.logger.debug({ hash: bytesToHex(hash) }, 'dropped cache entry whose bytes do not match its hash');
      }
    }

    for (const { uri, hash } of contents.dotrainCache) {
      const key = asHashKey(hash);
      if (!store.dotrainCache.has(uri) && store.cache.has(key)) {
        store.dotrainCache.set(uri, key);
      }
    }

    for (const { hash, deployer } of contents.deployers) {
      if (isDeployerCorrupt(deployer)) {
        store.logger.debug({ hash: bytesToHex(hash) }, 'dropped incomplete deployer');
        continue;
      }
      store.setDeployer(hash, deployer);
    }

    for (const { txHash, deployerHash } of contents.deployerAliases) {
      store.deployerHashMap.set(asHashKey(txHash), asHashKey(deployerHash));
    }

    return store;
  }

  // ---------------------------------------------------------------------------
  // Subgraphs
  // ---------------------------------------------------------------------------

  subgraphs(): readonly string[] {
    return this._subgraphs;
  }

  addSubgraphs(subgraphs: readonly string[]): void {
    for (const url of subgraphs) {
      if (!this._subgraphs.includes(url)) this._subgraphs.push(url);
    }
  }

  // ---------------------------------------------------------------------------
  // Meta cache
  // ---------------------------------------------------------------------------

  getMeta(hash: Uint8Array): Uint8Array | null {
    return this.cache.get(asHashKey(hash)) ?? null;
  }

  /**
   * Fetch `hash` from the subgraphs, first answer wins. The answer is kept
   * only if it hashes to `hash`; a document answer also has each of its
   * items indexed under its own item hash.
   */
  async update(hash: Uint8Array): Promise<Uint8Array | null> {
    const hashHex = bytesToHex(hash);
    if (this.resolver === null) {
      this.logger.debug({ hash: hashHex }, 'no resolver configured');
      return null;
    }

    const found = await this.resolver.search(hash, this._subgraphs);
    if (found.isErr()) {
      this.logger.debug({ hash: hashHex, code: found.error.code, reason: found.error.message }, 'meta not resolved');
      return null;
    }

    // The cache keeps its own copy: keccak256(cached) == key must hold.
    const bytes = found.value.bytes.slice();
    if (!bytesEqual(this.crypto.keccak256(bytes), hash)) {
      this.logger.debug({ hash: hashHex }, 'resolved meta does not match requested hash');
      return null;
    }

    this.storeContent(bytes);
    this.cache.set(asHashKey(hash), bytes);
    return bytes;
  }

  async updateCheck(hash: Uint8Array): Promise<Uint8Array | null> {
    return this.getMeta(hash) ?? this.update(hash);
  }

  /** Cached bytes for `hash` after the call, or null when `bytes` do not hash to `hash`. */
  updateWith(hash: Uint8Array, bytes: Uint8Array): Uint8Array | null {
    const outcome = this.checkedUpdateWith(hash, bytes);
    return outcome.kind === 'hash_mismatch' ? null : outcome.bytes;
  }

  /**
   * Like `updateWith`, but says which case happened. An existing entry is
   * returned as-is and `bytes` are ignored.
   */
  checkedUpdateWith(hash: Uint8Array, bytes: Uint8Array): UpdateWithOutcome {
    const key = asHashKey(hash);
    const existing = this.cache.get(key);
    if (existing !== undefined) return { kind: 'already_cached', bytes: existing };

    const owned = bytes.slice();
    if (!bytesEqual(this.crypto.keccak256(owned), hash)) return { kind: 'hash_mismatch' };

    this.storeContent(owned);
    this.cache.set(key, owned);
    return { kind: 'stored', bytes: owned };
  }

  /** Index the items of a document under their item hashes. Anything else is left alone. */
  private storeContent(bytes: Uint8Array): void {
    if (!hasMagicPrefix(bytes, 'rain-meta-document-v1')) return;

    const items = cborDecode(bytes);
    if (items.isErr()) {
      this.logger.debug({ code: items.error.code, reason: items.error.message }, 'document not indexed');
      return;
    }
    for (const item of items.value) {
      const key = asHashKey(itemHash(item, this.crypto));
      if (!this.cache.has(key)) this.cache.set(key, cborEncode(item));
    }
  }

  // ---------------------------------------------------------------------------
  // Dotrain
  // ---------------------------------------------------------------------------

  getDotrainHash(uri: string): Uint8Array | null {
    const key = this.dotrainCache.get(uri);
    return key === undefined ? null : keyBytes(key);
  }

  getDotrainUri(hash: Uint8Array): string | null {
    const wanted = asHashKey(hash);
    for (const [uri, key] of this.dotrainCache) {
      if (key === wanted) return uri;
    }
    return null;
  }

  getDotrainMeta(uri: string): Uint8Array | null {
    const key = this.dotrainCache.get(uri);
    return key === undefined ? null : (this.cache.get(key) ?? null);
  }

  /**
   * Store `text` as the dotrain for `uri`.
   *
   * When the uri was bound to different content, the binding moves and the
   * old bytes are evicted unless `keepOld`; `oldHash` reports the previous
   * hash. Setting the same text again changes nothing and reports no old hash.
   */
  setDotrain(text: string, uri: string, keepOld: boolean): SetDotrainResult {
    const bytes = cborEncode(textToItem(text, 'dotrain-v1'));
    const newHash = this.crypto.keccak256(bytes);
    const newKey = asHashKey(newHash);

    const oldKey = this.dotrainCache.get(uri);
    this.cache.set(newKey, bytes);
    this.dotrainCache.set(uri, newKey);

    if (oldKey === undefined || oldKey === newKey) {
      return { newHash, oldHash: null };
    }
    if (!keepOld) this.cache.delete(oldKey);
    return { newHash, oldHash: keyBytes(oldKey) };
  }

  deleteDotrain(uri: string, keepMeta: boolean): void {
    const key = this.dotrainCache.get(uri);
    if (key === undefined) return;
    this.dotrainCache.delete(uri);
    if (!keepMeta) this.cache.delete(key);
  }

  // ---------------------------------------------------------------------------
  // Deployers
  // ---------------------------------------------------------------------------

  /** Direct lookup first, then through the tx hash alias. A dangling alias finds nothing. */
  getDeployer(hash: Uint8Array): Npe2Deployer | null {
    const key = asHashKey(hash);
    const direct = this.deployerCache.get(key);
    if (direct !== undefined) return direct;

    const aliased = this.deployerHashMap.get(key);
    return aliased === undefined ? null : (this.deployerCache.get(aliased) ?? null);
  }

  /**
   * Record a deployer under `hash` (its bytecode meta hash), with `txHash` as
   * an alias. Its meta bytes enter the cache through the same hash check as
   * `updateWith`.
   */
  setDeployer(hash: Uint8Array, deployer: Npe2Deployer, txHash?: Uint8Array): void {
    if (this.checkedUpdateWith(deployer.metaHash, deployer.metaBytes).kind === 'hash_mismatch') {
      this.logger.debug({ metaHash: bytesToHex(deployer.metaHash) }, 'deployer meta bytes do not match meta hash');
    }
    const key = asHashKey(hash);
    this.deployerCache.set(key, deployer);
    if (txHash !== undefined) this.deployerHashMap.set(asHashKey(txHash), key);
  }

  setDeployerFromResponse(response: DeployerResponse): Npe2Deployer {
    const authoring = deriveAuthoringMeta(response.metaBytes);
    if (authoring.isErr()) {
      this.logger.debug({ code: authoring.error.code, reason: authoring.error.message }, 'no authoring meta for deployer');
    }
    const deployer = deployerFromResponse(response, authoring.unwrapOr(null));
    this.setDeployer(response.bytecodeMetaHash, deployer, response.txHash);
    return deployer;
  }

  /** Resolve a deployer by bytecode meta hash or deployment tx hash. */
  async searchDeployer(hash: Uint8Array): Promise<Npe2Deployer | null> {
    const hashHex = bytesToHex(hash);
    if (this.resolver === null) {
      this.logger.debug({ hash: hashHex }, 'no resolver configured');
      return null;
    }

    const found = await this.resolver.searchDeployer(hash, this._subgraphs);
    if (found.isErr()) {
      this.logger.debug({ hash: hashHex, code: found.error.code, reason: found.error.message }, 'deployer not resolved');
      return null;
    }

    this.setDeployerFromResponse(found.value);
    return this.getDeployer(hash);
  }

  async searchDeployerCheck(hash: Uint8Array): Promise<Npe2Deployer | null> {
    return this.getDeployer(hash) ?? this.searchDeployer(hash);
  }

  // ---------------------------------------------------------------------------
  // Merge / export
  // ---------------------------------------------------------------------------

  /**
   * Fold `other` into this store. Entries already here win for the cache,
   * dotrain and deployer maps; tx hash aliases from `other` overwrite.
   */
  merge(other: MetaStore): void {
    this.addSubgraphs(other._subgraphs);

    for (const [key, bytes] of other.cache) {
      if (!this.cache.has(key)) this.cache.set(key, bytes);
    }
    for (const [key, deployer] of other.deployerCache) {
      if (!this.deployerCache.has(key)) this.deployerCache.set(key, deployer);
    }
    for (const [uri, key] of other.dotrainCache) {
      if (!this.dotrainCache.has(uri)) this.dotrainCache.set(uri, key);
    }
    for (const [txKey, key] of other.deployerHashMap) {
      this.deployerHashMap.set(txKey, key);
    }
  }

  contents(): MetaStoreContents {
    return {
      subgraphs: [...this._subgraphs],
      cache: [...this.cache].map(([key, bytes]) => ({ hash: keyBytes(key), bytes })),
      dotrainCache: [...this.dotrainCache].map(([uri, key]) => ({ uri, hash: keyBytes(key) })),
      deployers: [...this.deployerCache].map(([key, deployer]) => ({ hash: keyBytes(key), deployer })),
      deployerAliases: [...this.deployerHashMap].map(([txKey, key]) => ({
        txHash: keyBytes(txKey),
        deployerHash: keyBytes(key),
      })),
    };
  }
}
