import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { AppError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory } from '../core/logging/index.js';
import type { Keccak256Port } from '../ports/keccak256.port.js';
import { NobleKeccak256 } from '../infra/keccak256/index.js';
import type { EmitMetaEncoderPort } from '../ports/emit-meta-encoder.port.js';
import { EthersEmitMetaEncoder } from '../infra/ethers/emit-meta-encoder.js';
import type { MetadataResolverPort } from '../ports/metadata-resolver.port.js';
import { MetaStore } from '../store/meta-store.js';
import type { DeploymentDeps } from '../meta/deployment.js';

let initialized = false;

export interface ContainerInitOptions {
  /** Skips env parsing when given. */
  readonly config?: ValidatedConfig;
  readonly env?: Record<string, string | undefined>;
  readonly resolver?: MetadataResolverPort;
}

/**
 * Composition root. Registrations a caller made beforehand (fakes in tests)
 * are kept.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, AppError> {
  if (initialized) return ok(undefined);

  let config: ValidatedConfig;
  if (options.config !== undefined) {
    config = options.config;
  } else {
    const loaded = loadConfig({ env: options.env ?? process.env });
    if (loaded.isErr()) return err(loaded.error);
    config = loaded.value;
  }

  container.register<ValidatedConfig>(DI.Config.App, { useValue: config });

  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, { useValue: new PinoLoggerFactory(config.logging.level) });
  }
  if (!container.isRegistered(DI.Crypto.Keccak256)) {
    container.register<Keccak256Port>(DI.Crypto.Keccak256, { useValue: new NobleKeccak256() });
  }
  if (!container.isRegistered(DI.Encoding.EmitMeta)) {
    container.register<EmitMetaEncoderPort>(DI.Encoding.EmitMeta, { useValue: new EthersEmitMetaEncoder() });
  }
  if (options.resolver !== undefined) {
    container.register<MetadataResolverPort>(DI.Resolver.Metadata, { useValue: options.resolver });
  }

  container.register<MetaStore>(DI.Store.Meta, {
    useFactory: instanceCachingFactory((c) => {
      const resolver = c.isRegistered(DI.Resolver.Metadata)
        ? c.resolve<MetadataResolverPort>(DI.Resolver.Metadata)
        : undefined;
      const deps = {
        crypto: c.resolve<Keccak256Port>(DI.Crypto.Keccak256),
        logger: c.resolve<ILoggerFactory>(DI.Logging.Factory).create('MetaStore'),
        ...(resolver !== undefined ? { resolver } : {}),
      };
      return new MetaStore(deps, c.resolve<ValidatedConfig>(DI.Config.App).subgraphs);
    }),
  });

  initialized = true;
  return ok(undefined);
}

export function resolveMetaStore(): Result<MetaStore, AppError> {
  if (!initialized) return err(Err.containerNotInitialized('MetaStore'));
  return ok(container.resolve<MetaStore>(DI.Store.Meta));
}

export function resolveDeploymentDeps(): Result<DeploymentDeps, AppError> {
  if (!initialized) return err(Err.containerNotInitialized('deployment dependencies'));
  return ok({
    crypto: container.resolve<Keccak256Port>(DI.Crypto.Keccak256),
    encoder: container.resolve<EmitMetaEncoderPort>(DI.Encoding.EmitMeta),
  });
}

export function isInitialized(): boolean {
  return initialized;
}

/** Tests only: drop every registration so the next initializeContainer starts clean. */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export { container };
