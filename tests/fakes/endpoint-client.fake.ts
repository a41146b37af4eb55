/**
 * Endpoint client whose answers the test releases by hand, one endpoint at a
 * time, to drive race ordering deterministically.
 */

import { ResultAsync, ok, err, type Result } from 'neverthrow';
import type {
  DeployerResponse,
  MetaResponse,
  ResolverError,
  SubgraphEndpointClientPort,
} from '../../src/ports/metadata-resolver.port.js';

interface Pending<T> {
  readonly promise: Promise<Result<T, ResolverError>>;
  readonly resolve: (result: Result<T, ResolverError>) => void;
}

function pending<T>(): Pending<T> {
  let resolve: (result: Result<T, ResolverError>) => void = () => undefined;
  const promise = new Promise<Result<T, ResolverError>>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export class ManualEndpointClient implements SubgraphEndpointClientPort {
  readonly requested: string[] = [];

  private readonly metas = new Map<string, Pending<MetaResponse>>();
  private readonly deployers = new Map<string, Pending<DeployerResponse>>();

  fetchMeta(_hash: Uint8Array, endpoint: string): ResultAsync<MetaResponse, ResolverError> {
    this.requested.push(endpoint);
    return new ResultAsync(this.metaSlot(endpoint).promise);
  }

  fetchDeployer(_hash: Uint8Array, endpoint: string): ResultAsync<DeployerResponse, ResolverError> {
    this.requested.push(endpoint);
    return new ResultAsync(this.deployerSlot(endpoint).promise);
  }

  answerMeta(endpoint: string, bytes: Uint8Array): void {
    this.metaSlot(endpoint).resolve(ok({ bytes }));
  }

  answerDeployer(endpoint: string, response: DeployerResponse): void {
    this.deployerSlot(endpoint).resolve(ok(response));
  }

  failMeta(endpoint: string): void {
    const failure: ResolverError = { code: 'RESOLVER_REQUEST_FAILED', endpoint, message: `${endpoint} unavailable` };
    this.metaSlot(endpoint).resolve(err(failure));
  }

  failDeployer(endpoint: string): void {
    const failure: ResolverError = { code: 'RESOLVER_NOT_FOUND', endpoint, message: `${endpoint} has no deployer` };
    this.deployerSlot(endpoint).resolve(err(failure));
  }

  private metaSlot(endpoint: string): Pending<MetaResponse> {
    let slot = this.metas.get(endpoint);
    if (slot === undefined) {
      slot = pending<MetaResponse>();
      this.metas.set(endpoint, slot);
    }
    return slot;
  }

  private deployerSlot(endpoint: string): Pending<DeployerResponse> {
    let slot = this.deployers.get(endpoint);
    if (slot === undefined) {
      slot = pending<DeployerResponse>();
      this.deployers.set(endpoint, slot);
    }
    return slot;
  }
}
