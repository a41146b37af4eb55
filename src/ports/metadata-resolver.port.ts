import type { ResultAsync } from 'neverthrow';

/**
 * Port: resolves meta bytes and deployer bundles by hash from remote indexers
 * (subgraph endpoints).
 *
 * The store owns the endpoint list and passes it on each call; the resolver
 * never keeps global state. A call succeeds when any endpoint has the hash.
 *
 * Lookup failures are data (`ResolverError`); the store collapses them to
 * "not found".
 */
export type ResolverError =
  | { readonly code: 'RESOLVER_NO_ENDPOINTS'; readonly message: string }
  | { readonly code: 'RESOLVER_NOT_FOUND'; readonly endpoint: string; readonly message: string }
  | { readonly code: 'RESOLVER_REQUEST_FAILED'; readonly endpoint: string; readonly message: string }
  | { readonly code: 'RESOLVER_ALL_FAILED'; readonly failures: readonly ResolverError[]; readonly message: string };

export interface MetaResponse {
  readonly bytes: Uint8Array;
}

/** A deployer as indexed on chain, keyed by its bytecode meta hash. */
export interface DeployerResponse {
  /** Transaction that deployed the expression deployer. */
  readonly txHash: Uint8Array;
  readonly bytecodeMetaHash: Uint8Array;
  readonly metaHash: Uint8Array;
  readonly metaBytes: Uint8Array;
  readonly bytecode: Uint8Array;
  readonly parser: Uint8Array;
  readonly store: Uint8Array;
  readonly interpreter: Uint8Array;
}

export interface MetadataResolverPort {
  search(hash: Uint8Array, endpoints: readonly string[]): ResultAsync<MetaResponse, ResolverError>;

  /** `hash` is either a bytecode meta hash or a deployment tx hash. */
  searchDeployer(hash: Uint8Array, endpoints: readonly string[]): ResultAsync<DeployerResponse, ResolverError>;
}

/**
 * Port: one request against one endpoint. `RacingMetadataResolver` turns this
 * into a `MetadataResolverPort`.
 */
export interface SubgraphEndpointClientPort {
  fetchMeta(hash: Uint8Array, endpoint: string): ResultAsync<MetaResponse, ResolverError>;
  fetchDeployer(hash: Uint8Array, endpoint: string): ResultAsync<DeployerResponse, ResolverError>;
}
