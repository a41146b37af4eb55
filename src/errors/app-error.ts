import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type ContainerNotInitializedError = Readonly<{
  readonly _tag: 'ContainerNotInitialized';
  readonly message: string;
}>;

export type AppError = ConfigInvalidError | ContainerNotInitializedError;

/**
 * Marks a config value that came out of `loadConfig` (or an explicit test constructor).
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
