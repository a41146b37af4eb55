import { describe, it, expect } from 'vitest';
import { keccak_256 } from '@noble/hashes/sha3';
import {
  container,
  initializeContainer,
  isInitialized,
  resolveDeploymentDeps,
  resolveMetaStore,
} from '../../../src/di/container.js';
import { DI } from '../../../src/di/tokens.js';
import type { Keccak256Port } from '../../../src/ports/keccak256.port.js';
import { generateDotrainDeployment } from '../../../src/meta/deployment.js';
import { InMemoryMetadataResolver } from '../../fakes/index.js';

const SUBGRAPH = 'https://subgraph.test/meta';

describe('container', () => {
  it('refuses to resolve before initialization', () => {
    expect(resolveMetaStore()._unsafeUnwrapErr()._tag).toBe('ContainerNotInitialized');
    expect(resolveDeploymentDeps()._unsafeUnwrapErr()._tag).toBe('ContainerNotInitialized');
  });

  it('reports bad configuration and stays uninitialized', () => {
    const result = initializeContainer({ env: { RAINMETA_SUBGRAPHS: 'nope' } });
    expect(result._unsafeUnwrapErr()._tag).toBe('ConfigInvalid');
    expect(isInitialized()).toBe(false);
  });

  it('builds one store seeded with the configured subgraphs', () => {
    initializeContainer({ env: { RAINMETA_SUBGRAPHS: SUBGRAPH } })._unsafeUnwrap();
    const store = resolveMetaStore()._unsafeUnwrap();
    expect(store.subgraphs()).toEqual([SUBGRAPH]);
    expect(resolveMetaStore()._unsafeUnwrap()).toBe(store);
  });

  it('wires the given resolver into the store', async () => {
    const bytes = Uint8Array.of(1, 2, 3);
    const hash = keccak_256(bytes);
    const resolver = new InMemoryMetadataResolver().putMeta(hash, bytes);

    initializeContainer({ env: { RAINMETA_SUBGRAPHS: SUBGRAPH }, resolver })._unsafeUnwrap();
    const store = resolveMetaStore()._unsafeUnwrap();

    await expect(store.update(hash)).resolves.toEqual(bytes);
    expect(store.getMeta(hash)).toEqual(bytes);
  });

  it('keeps registrations made before initialization', () => {
    const fixed: Keccak256Port = { keccak256: () => new Uint8Array(32).fill(0x42) };
    container.register<Keccak256Port>(DI.Crypto.Keccak256, { useValue: fixed });

    initializeContainer({ env: {} })._unsafeUnwrap();
    const deps = resolveDeploymentDeps()._unsafeUnwrap();
    expect(deps.crypto).toBe(fixed);

    const data = generateDotrainDeployment('#main _: 1;', deps)._unsafeUnwrap();
    expect(data.subject).toBe(`0x${'42'.repeat(32)}`);
  });
});
