import { describe, it, expect, beforeEach } from 'vitest';
import { RacingMetadataResolver } from '../../../src/infra/resolver/racing-resolver.js';
import type { DeployerResponse } from '../../../src/ports/metadata-resolver.port.js';
import { ManualEndpointClient } from '../../fakes/index.js';
import { filled32 } from '../../helpers/bytes.js';

const A = 'https://a.subgraph.test';
const B = 'https://b.subgraph.test';
const C = 'https://c.subgraph.test';

describe('RacingMetadataResolver', () => {
  let client: ManualEndpointClient;
  let resolver: RacingMetadataResolver;
  beforeEach(() => {
    client = new ManualEndpointClient();
    resolver = new RacingMetadataResolver(client);
  });

  it('asks every endpoint at once', () => {
    void resolver.search(filled32(1), [A, B, C]);
    expect(client.requested).toEqual([A, B, C]);
  });

  it('answers with the first success, ignoring earlier failures', async () => {
    const pending = resolver.search(filled32(1), [A, B, C]);
    client.failMeta(A);
    client.answerMeta(C, Uint8Array.of(0xcc));
    client.answerMeta(B, Uint8Array.of(0xbb));

    const result = await pending;
    expect(result._unsafeUnwrap().bytes).toEqual(Uint8Array.of(0xcc));
  });

  it('fails once every endpoint has failed', async () => {
    const pending = resolver.search(filled32(1), [A, B]);
    client.failMeta(B);
    client.failMeta(A);

    const error = (await pending)._unsafeUnwrapErr();
    expect(error.code).toBe('RESOLVER_ALL_FAILED');
    if (error.code === 'RESOLVER_ALL_FAILED') {
      expect(error.failures.map((f) => f.code)).toEqual(['RESOLVER_REQUEST_FAILED', 'RESOLVER_REQUEST_FAILED']);
    }
  });

  it('fails without endpoints', async () => {
    const error = (await resolver.search(filled32(1), []))._unsafeUnwrapErr();
    expect(error.code).toBe('RESOLVER_NO_ENDPOINTS');
    expect(client.requested).toEqual([]);
  });

  it('races deployer lookups the same way', async () => {
    const response: DeployerResponse = {
      txHash: filled32(0x71),
      bytecodeMetaHash: filled32(0xb1),
      metaHash: filled32(0x3e),
      metaBytes: Uint8Array.of(1),
      bytecode: Uint8Array.of(2),
      parser: Uint8Array.of(3),
      store: Uint8Array.of(4),
      interpreter: Uint8Array.of(5),
    };
    const pending = resolver.searchDeployer(filled32(0x71), [A, B]);
    client.failDeployer(A);
    client.answerDeployer(B, response);

    expect((await pending)._unsafeUnwrap()).toBe(response);
  });
});
