import type { ResultAsync } from 'neverthrow';
import type {
  DeployerResponse,
  MetaResponse,
  MetadataResolverPort,
  ResolverError,
  SubgraphEndpointClientPort,
} from '../../ports/metadata-resolver.port.js';
import { firstOk } from './first-ok.js';

/**
 * Queries every endpoint concurrently and takes the first success.
 * There is no timeout or retry here; a client that needs one adds it.
 */
export class RacingMetadataResolver implements MetadataResolverPort {
  constructor(private readonly client: SubgraphEndpointClientPort) {}

  search(hash: Uint8Array, endpoints: readonly string[]): ResultAsync<MetaResponse, ResolverError> {
    return firstOk(endpoints.map((endpoint) => this.client.fetchMeta(hash, endpoint)));
  }

  searchDeployer(hash: Uint8Array, endpoints: readonly string[]): ResultAsync<DeployerResponse, ResolverError> {
    return firstOk(endpoints.map((endpoint) => this.client.fetchDeployer(hash, endpoint)));
  }
}
